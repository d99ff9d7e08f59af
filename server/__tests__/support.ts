import os from 'node:os';
import type { AppConfig } from '../../shared/config';
import type { Env } from '../config/config';
import { buildConfig } from '../config/config';
import type { HostResolver } from '../security/urlValidator';

const NO_FEEDS_FILE = 'feed-acquisition-test-missing-feeds.txt';

/** Config built from an explicit env only; the feed file never comes from the repo. */
export const testConfig = (env: Env = {}): AppConfig =>
  buildConfig({ NODE_ENV: 'test', RSS_FEEDS_FILE: NO_FEEDS_FILE, ...env }, { cwd: os.tmpdir() });

/** Resolver backed by a fixed table; unknown hosts resolve to nothing. */
export const staticResolver =
  (table: Record<string, string[]>): HostResolver =>
  async (hostname) =>
    table[hostname] ?? [];

export interface RecordedRequest {
  url: string;
  init: RequestInit;
}

type Responder = (url: string, init: RequestInit) => Response | Promise<Response>;

/**
 * Routes requests by exact URL. Unrouted URLs fail like a refused connection.
 */
export const routedFetch = (routes: Record<string, Responder>) => {
  const requests: RecordedRequest[] = [];
  const fetchImpl = async (url: string, init: RequestInit): Promise<Response> => {
    requests.push({ url, init });
    const route = routes[url];
    if (!route) {
      throw new TypeError(`fetch failed: no route for ${url}`);
    }
    return route(url, init);
  };
  return { fetchImpl, requests };
};

export const textResponse = (body: string, contentType: string, status = 200): Response =>
  new Response(body, { status, headers: { 'content-type': contentType } });

export const redirectResponse = (location: string | null, status = 302): Response =>
  new Response(null, { status, headers: location ? { location } : {} });
