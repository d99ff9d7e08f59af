import type { AppConfig, FetchPurpose } from '../../shared/config';
import type { RejectionReason } from '../../shared/types';
import type { Logger } from '../obs/logger';
import { redactUrl } from '../obs/logger';
import { TimeoutError, linkAbortSignal, withTimeout } from '../utils/async';
import { charsetOf } from '../utils/text';
import type { UrlValidator } from './urlValidator';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface FetchResult {
  /** Final URL after every redirect hop was validated. */
  url: string;
  body: Buffer;
  contentType: string;
  charset: string | null;
  redirects: number;
}

export type FetchFailure =
  | { kind: 'invalid_url'; url: string; reason: RejectionReason; message: string }
  | { kind: 'connection'; url: string; message: string }
  | { kind: 'timeout'; url: string; message: string }
  | { kind: 'status'; url: string; status: number }
  | { kind: 'redirect_disabled'; url: string; status: number }
  | { kind: 'redirect_missing_location'; url: string; status: number }
  | { kind: 'redirect_limit'; url: string; maxRedirects: number }
  | { kind: 'unsupported_content_type'; url: string; contentType: string }
  | { kind: 'too_large'; url: string; limitBytes: number; declaredBytes?: number };

export type FetchOutcome = { ok: true; result: FetchResult } | { ok: false; failure: FetchFailure };

export interface SecureFetcher {
  fetch: (
    url: string,
    purpose: FetchPurpose,
    extraHeaders?: Record<string, string>,
    signal?: AbortSignal,
  ) => Promise<FetchOutcome>;
}

export interface SecureFetcherOptions {
  validator: UrlValidator;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

export const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

const ACCEPT_HEADERS: Record<FetchPurpose, string> = {
  article: 'text/html,application/xhtml+xml,text/plain;q=0.9',
  feed: 'application/rss+xml, application/atom+xml, application/xml, text/xml;q=0.9, text/plain;q=0.5',
};

const parseContentLength = (value: string | null): number | null => {
  if (!value || !/^\s*\d+\s*$/.test(value)) return null;
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) ? parsed : null;
};

export const parseMediaType = (header: string | null): string => (header || '').split(';', 1)[0].trim().toLowerCase();

type ReadOutcome =
  | { ok: true; body: Buffer }
  | { ok: false; kind: 'too_large' | 'timeout' | 'connection'; message: string };

const fail = (failure: FetchFailure): FetchOutcome => ({ ok: false, failure });

/** One-line summary of a fetch failure, safe for logs and API payloads (URLs are not included). */
export const describeFetchFailure = (failure: FetchFailure): string => {
  switch (failure.kind) {
    case 'invalid_url':
      return `URL rejected (${failure.reason}): ${failure.message}`;
    case 'connection':
      return `Connection failed: ${failure.message}`;
    case 'timeout':
      return `Timed out: ${failure.message}`;
    case 'status':
      return `Upstream responded with HTTP ${failure.status}`;
    case 'redirect_disabled':
      return `Redirect (HTTP ${failure.status}) refused: redirects are disabled`;
    case 'redirect_missing_location':
      return `Redirect (HTTP ${failure.status}) without a Location header`;
    case 'redirect_limit':
      return `Redirect limit of ${failure.maxRedirects} exceeded`;
    case 'unsupported_content_type':
      return `Unsupported content type: ${failure.contentType}`;
    case 'too_large':
      return `Body exceeds ${failure.limitBytes} bytes`;
  }
};

export const createSecureFetcher = (config: AppConfig, options: SecureFetcherOptions): SecureFetcher => {
  const { validator, logger } = options;
  const doFetch: FetchLike = (input, init) => (options.fetchImpl ? options.fetchImpl(input, init) : fetch(input, init));
  const { allowRedirects, maxRedirects } = config.security;
  const { connectTimeoutMs, readTimeoutMs, totalTimeoutMs } = config.http;

  // Each wait gets its own limit, cut short by whatever remains of the whole fetch's deadline.
  const stepTimeout = (deadline: number, stepMs: number, stepMessage: string) => {
    const left = Math.max(0, deadline - Date.now());
    return left < stepMs ? { ms: left, message: `Fetch exceeded ${totalTimeoutMs}ms` } : { ms: stepMs, message: stepMessage };
  };

  const discardBody = async (response: Response) => {
    try {
      await response.body?.cancel();
    } catch (error) {
      logger?.debug('Failed to discard response body', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  };

  /**
   * Streams the body into memory, giving up as soon as the running total passes `maxBytes`.
   * Partial data is dropped; a truncated body is never returned.
   */
  const readCapped = async (
    response: Response,
    maxBytes: number,
    deadline: number,
    abort: () => void,
  ): Promise<ReadOutcome> => {
    if (!response.body) {
      return { ok: true, body: Buffer.alloc(0) };
    }
    const reader = response.body.getReader();
    const chunks: Uint8Array[] = [];
    let received = 0;
    try {
      for (;;) {
        const timeout = stepTimeout(deadline, readTimeoutMs, 'Read timed out');
        const { done, value } = await withTimeout(reader.read(), timeout.ms, timeout.message, abort);
        if (done) break;
        if (!value || value.byteLength === 0) continue;
        received += value.byteLength;
        if (received > maxBytes) {
          chunks.length = 0;
          await reader.cancel();
          return { ok: false, kind: 'too_large', message: `Body exceeded ${maxBytes} bytes` };
        }
        chunks.push(value);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { ok: false, kind: error instanceof TimeoutError ? 'timeout' : 'connection', message };
    }
    return { ok: true, body: Buffer.concat(chunks) };
  };

  const fetchBytes: SecureFetcher['fetch'] = async (url, purpose, extraHeaders = {}, signal) => {
    const limits = config.limits[purpose];
    const headers: Record<string, string> = {
      'User-Agent': config.http.userAgent,
      Accept: ACCEPT_HEADERS[purpose],
      ...extraHeaders,
    };

    const deadline = Date.now() + totalTimeoutMs;
    let currentUrl = url;
    let hops = 0;
    while (hops <= maxRedirects) {
      if (Date.now() >= deadline) {
        return fail({ kind: 'timeout', url: currentUrl, message: `Fetch exceeded ${totalTimeoutMs}ms` });
      }
      const verdict = await validator.validate(currentUrl, purpose);
      if (!verdict.ok) {
        return fail({ kind: 'invalid_url', url: currentUrl, reason: verdict.reason, message: verdict.message });
      }
      const target = verdict.url;

      const { controller, release } = linkAbortSignal(signal);
      const abort = () => controller.abort();
      try {
        let response: Response;
        try {
          const timeout = stepTimeout(deadline, connectTimeoutMs, `No response within ${connectTimeoutMs}ms`);
          response = await withTimeout(
            doFetch(target, { method: 'GET', headers, redirect: 'manual', signal: controller.signal }),
            timeout.ms,
            timeout.message,
            abort,
          );
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          return fail(
            error instanceof TimeoutError
              ? { kind: 'timeout', url: target, message }
              : { kind: 'connection', url: target, message },
          );
        }

        if (REDIRECT_STATUSES.has(response.status)) {
          await discardBody(response);
          if (!allowRedirects) {
            return fail({ kind: 'redirect_disabled', url: target, status: response.status });
          }
          const location = response.headers.get('location');
          if (!location) {
            return fail({ kind: 'redirect_missing_location', url: target, status: response.status });
          }
          let next: string;
          try {
            next = new URL(location, target).toString();
          } catch {
            return fail({ kind: 'invalid_url', url: location, reason: 'malformed', message: 'Redirect target could not be parsed' });
          }
          hops += 1;
          logger?.debug('Following redirect', { purpose, from: redactUrl(target), to: redactUrl(next), hops });
          currentUrl = next;
          continue;
        }

        if (!response.ok) {
          await discardBody(response);
          return fail({ kind: 'status', url: target, status: response.status });
        }

        const contentTypeHeader = response.headers.get('content-type');
        const contentType = parseMediaType(contentTypeHeader);
        if (contentType && !limits.contentTypes.some((prefix) => contentType.startsWith(prefix))) {
          await discardBody(response);
          return fail({ kind: 'unsupported_content_type', url: target, contentType });
        }

        const declaredBytes = parseContentLength(response.headers.get('content-length'));
        if (declaredBytes !== null && declaredBytes > limits.maxBytes) {
          await discardBody(response);
          return fail({ kind: 'too_large', url: target, limitBytes: limits.maxBytes, declaredBytes });
        }

        const read = await readCapped(response, limits.maxBytes, deadline, abort);
        if (!read.ok) {
          if (read.kind === 'too_large') {
            return fail({ kind: 'too_large', url: target, limitBytes: limits.maxBytes });
          }
          return fail(
            read.kind === 'timeout'
              ? { kind: 'timeout', url: target, message: read.message }
              : { kind: 'connection', url: target, message: read.message },
          );
        }

        return {
          ok: true,
          result: { url: target, body: read.body, contentType, charset: charsetOf(contentTypeHeader), redirects: hops },
        };
      } finally {
        release();
      }
    }

    return fail({ kind: 'redirect_limit', url: currentUrl, maxRedirects });
  };

  return { fetch: fetchBytes };
};
