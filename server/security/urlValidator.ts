import dns from 'node:dns';
import type { AppConfig, FetchPurpose } from '../../shared/config';
import type { RejectionReason } from '../../shared/types';
import type { Logger } from '../obs/logger';
import { redactUrl } from '../obs/logger';
import { findBlockedRange } from './blockedRanges';

/** Resolves a hostname to every address it has, across families. */
export type HostResolver = (hostname: string) => Promise<string[]>;

export type ValidationVerdict =
  | { ok: true; url: string; hostname: string; addresses: string[] }
  | { ok: false; reason: RejectionReason; message: string };

export interface UrlValidator {
  validate: (url: string, purpose: FetchPurpose) => Promise<ValidationVerdict>;
}

export interface UrlValidatorOptions {
  resolveHost?: HostResolver;
  logger?: Logger;
}

export const resolveAllAddresses: HostResolver = async (hostname) => {
  const records = await dns.promises.lookup(hostname, { all: true, verbatim: true });
  return Array.from(new Set(records.map((record) => record.address)));
};

const normalizeDomain = (value: string): string => value.trim().toLowerCase().replace(/\.+$/, '');

/**
 * Exact match or subdomain of a listed domain; a leading `*.` in a list entry means the domain itself.
 */
export const isDomainAllowed = (host: string, allowlist: readonly string[]): boolean => {
  const h = normalizeDomain(host);
  if (!h) return false;
  return allowlist.some((entry) => {
    let domain = normalizeDomain(entry);
    if (domain.startsWith('*.')) {
      domain = domain.slice(2);
    }
    if (!domain) return false;
    return h === domain || h.endsWith(`.${domain}`);
  });
};

const reject = (reason: RejectionReason, message: string): ValidationVerdict => ({ ok: false, reason, message });

export const createUrlValidator = (config: AppConfig, options: UrlValidatorOptions = {}): UrlValidator => {
  const resolveHost = options.resolveHost ?? resolveAllAddresses;
  const logger = options.logger;
  const allowedSchemes = new Set(config.security.allowedSchemes.map((s) => s.toLowerCase()));
  const allowlist = config.security.allowlistDomains;

  const resolveSafely = async (hostname: string): Promise<string[]> => {
    try {
      return await resolveHost(hostname);
    } catch (error) {
      logger?.debug('DNS resolution failed', {
        hostname,
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }
  };

  const validate = async (rawUrl: string, purpose: FetchPurpose): Promise<ValidationVerdict> => {
    const raw = String(rawUrl ?? '').trim();
    if (!raw) {
      return reject('malformed', 'URL is empty');
    }

    let parsed: URL;
    try {
      parsed = new URL(raw);
    } catch {
      return reject('malformed', 'URL could not be parsed');
    }
    const scheme = parsed.protocol.replace(/:$/, '').toLowerCase();
    const hostname = parsed.hostname.toLowerCase().replace(/^\[|\]$/g, '');
    if (!scheme || !hostname) {
      return reject('malformed', 'URL must carry a scheme and a host');
    }

    if (!allowedSchemes.has(scheme)) {
      return reject('scheme_not_allowed', `Scheme not allowed: ${scheme}`);
    }

    if (parsed.username || parsed.password) {
      return reject('credentials_present', 'URLs with embedded credentials are not allowed');
    }

    if (hostname === 'localhost' || hostname === 'localhost.') {
      return reject('localhost', 'localhost targets are not allowed');
    }

    if (allowlist.length && !isDomainAllowed(hostname, allowlist)) {
      return reject('domain_not_allowlisted', `Domain not in allowlist: ${hostname}`);
    }

    if (!config.security.blockPrivateIps) {
      return { ok: true, url: raw, hostname, addresses: [] };
    }

    const addresses = await resolveSafely(hostname);
    if (!addresses.length) {
      return reject('unresolvable_host', `Host could not be resolved: ${hostname}`);
    }
    for (const address of addresses) {
      const blocked = findBlockedRange(address);
      if (blocked) {
        logger?.info('Blocked outbound target', { purpose, url: redactUrl(raw), address, range: blocked });
        return reject('blocked_address', 'Target resolves to a blocked address');
      }
    }

    return { ok: true, url: raw, hostname, addresses };
  };

  return { validate };
};
