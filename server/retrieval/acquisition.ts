import type { AppConfig } from '../../shared/config';
import { hashString } from '../../shared/crypto';
import type { ArticleDocument, Failure, Outcome, TopicAcquisition } from '../../shared/types';
import type { Logger } from '../obs/logger';
import { redactUrl } from '../obs/logger';
import type { FetchFailure, FetchLike, FetchResult, SecureFetcher } from '../security/secureFetch';
import { createSecureFetcher, describeFetchFailure } from '../security/secureFetch';
import type { HostResolver, UrlValidator, ValidationVerdict } from '../security/urlValidator';
import { createUrlValidator } from '../security/urlValidator';
import { decodeBody } from '../utils/text';
import { extractText } from './extraction';
import { aggregateFeeds } from './feedAggregator';
import { decideItemLink } from './linkPolicy';
import { rankItems, tokenizeQuery } from './ranking';

export interface AcquisitionService {
  /** Direct-URL path: validator then fetcher, no feeds involved. */
  fetchDirect: (url: string, signal?: AbortSignal) => Promise<Outcome<ArticleDocument>>;
  /** Keyword path: aggregate, rank, scope, then fetch up to the configured number of articles. */
  searchFeeds: (query: string, signal?: AbortSignal) => Promise<Outcome<ArticleDocument[]>>;
  /** Routes `scheme://…` input to `fetchDirect` and anything else to `searchFeeds`. */
  acquireTopic: (topic: string, signal?: AbortSignal) => Promise<Outcome<TopicAcquisition>>;
  validateUrl: (url: string) => Promise<ValidationVerdict>;
}

export interface AcquisitionServiceOptions {
  config: AppConfig;
  logger?: Logger;
  fetchImpl?: FetchLike;
  resolveHost?: HostResolver;
  validator?: UrlValidator;
  fetcher?: SecureFetcher;
}

const URL_TOPIC_RE = /^[a-z][a-z0-9+.-]*:\/\//i;

export const isUrlTopic = (topic: string): boolean => URL_TOPIC_RE.test(topic.trim());

export const toFailure = (failure: FetchFailure): Failure => {
  switch (failure.kind) {
    case 'invalid_url':
      return { kind: 'invalid_url', reason: failure.reason, message: failure.message };
    case 'too_large':
      return { kind: 'too_large', limitBytes: failure.limitBytes };
    case 'unsupported_content_type':
      return { kind: 'unsupported_content', contentType: failure.contentType };
    case 'connection':
    case 'timeout':
    case 'status':
    case 'redirect_disabled':
    case 'redirect_missing_location':
    case 'redirect_limit':
      return { kind: 'unreachable', reason: describeFetchFailure(failure) };
  }
};

const fail = (failure: Failure): { ok: false; failure: Failure } => ({ ok: false, failure });

interface DocumentContext {
  requestedUrl: string;
  fallbackTitle?: string;
  feedUrl?: string;
  score?: number;
}

const buildDocument = (result: FetchResult, context: DocumentContext): ArticleDocument => {
  const text = decodeBody(result.body, result.charset);
  const extracted = extractText(text, result.contentType, context.fallbackTitle || result.url);
  return {
    id: hashString(result.url),
    sourceUrl: result.url,
    requestedUrl: context.requestedUrl,
    title: extracted.title,
    body: extracted.body,
    excerpt: extracted.excerpt,
    contentType: result.contentType,
    byteLength: result.body.byteLength,
    fetchedAt: new Date().toISOString(),
    feedUrl: context.feedUrl ?? null,
    score: context.score ?? null,
  };
};

export const createAcquisitionService = (options: AcquisitionServiceOptions): AcquisitionService => {
  const { config, logger } = options;
  const validator =
    options.validator ?? createUrlValidator(config, { resolveHost: options.resolveHost, logger });
  const fetcher =
    options.fetcher ?? createSecureFetcher(config, { validator, fetchImpl: options.fetchImpl, logger });

  const fetchDirect: AcquisitionService['fetchDirect'] = async (url, signal) => {
    const fetched = await fetcher.fetch(url, 'article', {}, signal);
    if (!fetched.ok) {
      logger?.info('Direct fetch failed', { url: redactUrl(url), kind: fetched.failure.kind });
      return fail(toFailure(fetched.failure));
    }
    return { ok: true, value: buildDocument(fetched.result, { requestedUrl: url }) };
  };

  const searchFeeds: AcquisitionService['searchFeeds'] = async (query, signal) => {
    const trimmed = (query || '').trim();
    if (!tokenizeQuery(trimmed).length) {
      return fail({ kind: 'no_keyword_match', query: trimmed });
    }
    if (!config.feeds.urls.length) {
      return fail({ kind: 'feeds_unavailable', reason: 'No feeds are configured' });
    }

    const aggregation = await aggregateFeeds(config.feeds.urls, { config, fetcher, logger, signal });
    if (aggregation.feeds.every((feed) => !feed.ok)) {
      return fail({ kind: 'feeds_unavailable', reason: `All ${aggregation.feeds.length} configured feeds failed` });
    }

    const ranked = rankItems(aggregation.items, trimmed, config.feeds.rankLimit);
    if (!ranked.length) {
      logger?.info('No feed items matched query', { items: aggregation.items.length });
      return fail({ kind: 'no_keyword_match', query: trimmed });
    }

    const cap = config.feeds.maxSelectedArticles;
    const documents: ArticleDocument[] = [];
    const seen = new Set<string>();
    let attempted = 0;
    for (const item of ranked) {
      if (documents.length >= cap || signal?.aborted) break;
      if (seen.has(item.link)) continue;
      seen.add(item.link);

      const decision = decideItemLink(
        item.link,
        item.feedUrl,
        config.feeds.itemLinkPolicy,
        config.security.allowlistDomains,
      );
      if (!decision.allow) {
        logger?.info('Feed item skipped by link policy', {
          link: redactUrl(item.link),
          feed: redactUrl(item.feedUrl),
          reason: decision.reason,
        });
        continue;
      }

      attempted += 1;
      const fetched = await fetcher.fetch(item.link, 'article', {}, signal);
      if (!fetched.ok) {
        logger?.warn('Candidate article fetch failed', {
          link: redactUrl(item.link),
          kind: fetched.failure.kind,
          error: describeFetchFailure(fetched.failure),
        });
        continue;
      }
      documents.push(
        buildDocument(fetched.result, {
          requestedUrl: item.link,
          fallbackTitle: item.title,
          feedUrl: item.feedUrl,
          score: item.score,
        }),
      );
    }

    logger?.info('Keyword search finished', {
      ranked: ranked.length,
      attempted,
      selected: documents.length,
    });
    if (!documents.length) {
      return fail({ kind: 'no_candidates', attempted });
    }
    return { ok: true, value: documents };
  };

  const acquireTopic: AcquisitionService['acquireTopic'] = async (topic, signal) => {
    const trimmed = (topic || '').trim();
    if (isUrlTopic(trimmed)) {
      const outcome = await fetchDirect(trimmed, signal);
      return outcome.ok
        ? { ok: true, value: { mode: 'url', topic: trimmed, documents: [outcome.value] } }
        : outcome;
    }
    const outcome = await searchFeeds(trimmed, signal);
    return outcome.ok ? { ok: true, value: { mode: 'keyword', topic: trimmed, documents: outcome.value } } : outcome;
  };

  return {
    fetchDirect,
    searchFeeds,
    acquireTopic,
    validateUrl: (url) => validator.validate(url, 'article'),
  };
};
