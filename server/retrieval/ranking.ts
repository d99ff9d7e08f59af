import type { FeedItem, ScoredItem } from '../../shared/types';

const MIN_TOKEN_WEIGHT = 1;
const MAX_TOKEN_WEIGHT = 6;
const MIN_CJK_BIGRAM_SOURCE_LENGTH = 4;
const MAX_CJK_BIGRAMS = 32;

// CJK punctuation, kana, ideographs (incl. extension A and compatibility), half-width katakana
const CJK_RE = /[\u3000-\u303f\u3040-\u309f\u30a0-\u30ff\u3400-\u4dbf\u4e00-\u9fff\uf900-\ufaff\uff66-\uff9f]/;

export const containsCjk = (value: string): boolean => CJK_RE.test(value);

const charLength = (value: string): number => Array.from(value).length;

export const cjkBigrams = (token: string, maxCount = MAX_CJK_BIGRAMS): string[] => {
  const chars = Array.from(token);
  const out: string[] = [];
  for (let i = 0; i + 1 < chars.length && out.length < maxCount; i += 1) {
    out.push(chars[i] + chars[i + 1]);
  }
  return out;
};

/**
 * Whitespace tokens; a lone CJK token of 4+ characters also contributes its overlapping bigrams,
 * since CJK text has no word boundaries to split on.
 */
export const tokenizeQuery = (query: string): string[] => {
  const tokens = (query || '').trim().split(/\s+/).filter(Boolean);
  if (tokens.length !== 1) {
    return tokens;
  }
  const [token] = tokens;
  if (!containsCjk(token) || charLength(token) < MIN_CJK_BIGRAM_SOURCE_LENGTH) {
    return tokens;
  }
  return Array.from(new Set([token, ...cjkBigrams(token)]));
};

export const tokenWeight = (token: string): number =>
  Math.max(MIN_TOKEN_WEIGHT, Math.min(MAX_TOKEN_WEIGHT, charLength(token)));

export const scoreItem = (item: Pick<FeedItem, 'title' | 'summary'>, tokens: readonly string[]): number => {
  const haystack = `${item.title}\n${item.summary}`.toLowerCase();
  const unique = new Set(tokens.map((token) => token.toLowerCase()).filter(Boolean));
  let score = 0;
  for (const token of unique) {
    if (haystack.includes(token)) {
      score += tokenWeight(token);
    }
  }
  return score;
};

/**
 * Orders items by score, highest first, keeping encounter order among equal scores.
 * Items that match nothing are left out entirely.
 */
export const rankItems = (
  items: ReadonlyArray<FeedItem & { feedUrl?: string }>,
  query: string,
  limit: number,
): ScoredItem[] => {
  const tokens = tokenizeQuery(query);
  if (!tokens.length || limit <= 0) {
    return [];
  }
  const scored: ScoredItem[] = [];
  for (const item of items) {
    const score = scoreItem(item, tokens);
    if (score > 0) {
      scored.push({ ...item, score });
    }
  }
  scored.sort((a, b) => b.score - a.score);
  return scored.slice(0, Math.floor(limit));
};
