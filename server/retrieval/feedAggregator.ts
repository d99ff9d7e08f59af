import type { AppConfig } from '../../shared/config';
import type { FeedItem } from '../../shared/types';
import type { Logger } from '../obs/logger';
import { redactUrl } from '../obs/logger';
import type { SecureFetcher } from '../security/secureFetch';
import { describeFetchFailure } from '../security/secureFetch';
import { Semaphore } from '../utils/concurrency';
import { decodeBody } from '../utils/text';
import { parseFeed } from './feedParser';

export interface AggregatedItem extends FeedItem {
  feedUrl: string;
}

export interface FeedReport {
  url: string;
  ok: boolean;
  itemCount: number;
  error?: string;
}

export interface AggregationResult {
  items: AggregatedItem[];
  feeds: FeedReport[];
}

export interface AggregateOptions {
  config: AppConfig;
  fetcher: SecureFetcher;
  logger?: Logger;
  signal?: AbortSignal;
}

interface FeedOutcome {
  report: FeedReport;
  items: AggregatedItem[];
}

const collectFeed = async (feedUrl: string, options: AggregateOptions): Promise<FeedOutcome> => {
  const { fetcher, logger, signal } = options;
  const fetched = await fetcher.fetch(feedUrl, 'feed', {}, signal);
  if (!fetched.ok) {
    const error = describeFetchFailure(fetched.failure);
    logger?.warn('Feed fetch failed', { feed: redactUrl(feedUrl), kind: fetched.failure.kind, error });
    return { report: { url: feedUrl, ok: false, itemCount: 0, error }, items: [] };
  }

  const { result } = fetched;
  const parsed = parseFeed(decodeBody(result.body, result.charset), result.url);
  if (parsed.error) {
    logger?.warn('Feed parse failed', { feed: redactUrl(feedUrl), error: parsed.error });
    return { report: { url: feedUrl, ok: false, itemCount: 0, error: parsed.error }, items: [] };
  }
  if (parsed.dropped > 0) {
    logger?.debug('Dropped feed items without a link', { feed: redactUrl(feedUrl), dropped: parsed.dropped });
  }

  const items = parsed.items.map((item) => ({ ...item, feedUrl }));
  return { report: { url: feedUrl, ok: true, itemCount: items.length }, items };
};

/**
 * Fetches and parses each feed, concatenating surviving items in feed-list order.
 * A feed that fails to fetch or parse is reported and skipped; it never aborts the others.
 */
export const aggregateFeeds = async (feedUrls: readonly string[], options: AggregateOptions): Promise<AggregationResult> => {
  const { config, logger, signal } = options;
  const selected = feedUrls.slice(0, config.feeds.maxFeedsPerCall);
  if (feedUrls.length > selected.length) {
    logger?.info('Feed list truncated', { configured: feedUrls.length, processed: selected.length });
  }

  const semaphore = new Semaphore(config.feeds.concurrency);
  const outcomes = await Promise.all(
    selected.map((feedUrl) =>
      semaphore.run(() => collectFeed(feedUrl, options), signal).catch((error: unknown): FeedOutcome => {
        const message = error instanceof Error ? error.message : String(error);
        logger?.warn('Feed skipped', { feed: redactUrl(feedUrl), error: message });
        return { report: { url: feedUrl, ok: false, itemCount: 0, error: message }, items: [] };
      }),
    ),
  );

  const result: AggregationResult = { items: [], feeds: [] };
  for (const outcome of outcomes) {
    result.feeds.push(outcome.report);
    result.items.push(...outcome.items);
  }
  logger?.info('Feeds aggregated', {
    feeds: result.feeds.length,
    failed: result.feeds.filter((feed) => !feed.ok).length,
    items: result.items.length,
  });
  return result;
};
