export type RejectionReason =
  | 'malformed'
  | 'scheme_not_allowed'
  | 'credentials_present'
  | 'localhost'
  | 'domain_not_allowlisted'
  | 'unresolvable_host'
  | 'blocked_address';

export interface FeedItem {
  title: string;
  link: string;
  summary: string;
  published: string;
}

export interface ScoredItem extends FeedItem {
  /** Always > 0; zero-score items are never ranked. */
  score: number;
  feedUrl?: string;
}

export interface ArticleDocument {
  id: string;
  /** Final URL after redirects. */
  sourceUrl: string;
  requestedUrl: string;
  title: string;
  body: string;
  excerpt: string;
  contentType: string;
  byteLength: number;
  fetchedAt: string;
  feedUrl?: string | null;
  score?: number | null;
}

/**
 * Closed set of failures surfaced to callers of the acquisition surface.
 * `no_keyword_match` is a clean stop; `no_candidates` and `feeds_unavailable` are retryable or misconfigured states.
 */
export type Failure =
  | { kind: 'invalid_url'; reason: RejectionReason; message: string }
  | { kind: 'unreachable'; reason: string }
  | { kind: 'too_large'; limitBytes: number }
  | { kind: 'unsupported_content'; contentType: string }
  | { kind: 'no_candidates'; attempted: number }
  | { kind: 'no_keyword_match'; query: string }
  | { kind: 'feeds_unavailable'; reason: string };

export type FailureKind = Failure['kind'];

export type Outcome<T> = { ok: true; value: T } | { ok: false; failure: Failure };

export type TopicMode = 'url' | 'keyword';

export interface TopicAcquisition {
  mode: TopicMode;
  topic: string;
  documents: ArticleDocument[];
}
