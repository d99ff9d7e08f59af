import type { LinkPolicyMode } from '../../shared/config';

export type LinkDecisionReason = 'same_site' | 'allowlist_deferred' | 'permissive' | 'foreign_host' | 'invalid_link';

export interface LinkDecision {
  allow: boolean;
  reason: LinkDecisionReason;
}

const hostOf = (value: string): string | null => {
  try {
    const host = new URL(value).hostname.toLowerCase().replace(/\.+$/, '');
    return host || null;
  } catch {
    return null;
  }
};

const isSameOrSubdomain = (host: string, parent: string): boolean => host === parent || host.endsWith(`.${parent}`);

/**
 * Decides whether a feed item's link may be followed.
 *
 * Mode A keeps items on the feed's own host (or its subdomains). Foreign hosts pass only when a
 * domain allowlist exists, in which case the validator's allowlist check makes the final call.
 * Mode B allows everything and leaves safety to the validator and fetcher.
 */
export const decideItemLink = (
  itemLink: string,
  feedUrl: string | null | undefined,
  mode: LinkPolicyMode,
  allowlist: readonly string[],
): LinkDecision => {
  if (mode === 'B') {
    return { allow: true, reason: 'permissive' };
  }

  const itemHost = hostOf(itemLink);
  const feedHost = feedUrl ? hostOf(feedUrl) : null;
  if (!itemHost) {
    return { allow: false, reason: 'invalid_link' };
  }
  if (feedHost && isSameOrSubdomain(itemHost, feedHost)) {
    return { allow: true, reason: 'same_site' };
  }
  if (allowlist.length > 0) {
    return { allow: true, reason: 'allowlist_deferred' };
  }
  return { allow: false, reason: 'foreign_host' };
};
