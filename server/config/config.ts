import fs from 'node:fs';
import path from 'node:path';
import {
  ConfigSchema,
  DEFAULT_ARTICLE_CONTENT_TYPES,
  DEFAULT_FEED_CONTENT_TYPES,
  type AppConfig,
  type PublicConfig,
  getPublicConfig as getPublicConfigShared,
} from '../../shared/config';

export type Env = Record<string, string | undefined>;

export interface BuildConfigOptions {
  cwd?: string;
}

const DEFAULT_FEEDS_FILE = path.join('config', 'rss_feeds.txt');

const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36';

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? Math.trunc(parsed) : fallback;
};

const booleanFromEnv = (value: string | undefined, fallback: boolean): boolean => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'y', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'n', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
};

export const listFromEnv = (value: string | undefined): string[] => {
  if (!value) return [];
  return value
    .split(/[\s,]+/)
    .map((v) => v.trim())
    .filter(Boolean);
};

const dedupePreserveOrder = (values: string[]): string[] => Array.from(new Set(values));

/**
 * Parses a feed list file: one URL per line, blank lines and `#` comments skipped.
 */
export const parseFeedListFile = (content: string): string[] =>
  dedupePreserveOrder(
    content
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0 && !line.startsWith('#')),
  );

/**
 * The environment value wins over the file; a missing file means no feeds.
 */
export const loadFeedUrls = (env: Env, cwd: string): string[] => {
  const fromEnv = listFromEnv(env.RSS_FEED_URLS);
  if (fromEnv.length) {
    return dedupePreserveOrder(fromEnv);
  }
  const filePath = path.resolve(cwd, env.RSS_FEEDS_FILE?.trim() || DEFAULT_FEEDS_FILE);
  if (!fs.existsSync(filePath)) {
    return [];
  }
  return parseFeedListFile(fs.readFileSync(filePath, 'utf-8'));
};

const deepFreeze = <T>(value: T): T => {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
};

const parseLogLevel = (value: string | undefined): string => (value || 'info').trim().toLowerCase();

const parseLinkPolicy = (value: string | undefined): string => (value || 'A').trim().toUpperCase();

export type { AppConfig, PublicConfig };

export const buildConfig = (env: Env = process.env, options: BuildConfigOptions = {}): AppConfig => {
  const cwd = options.cwd ?? process.cwd();
  const environment = (env.NODE_ENV || 'development').trim().toLowerCase();
  const allowedSchemes = listFromEnv(env.URL_ALLOWED_SCHEMES).map((s) => s.toLowerCase().replace(/:$/, ''));

  const rawConfig = {
    environment: environment === 'production' ? 'production' : environment === 'test' ? 'test' : 'development',
    server: {
      port: numberFromEnv(env.PORT, 3001),
    },
    security: {
      allowedSchemes: allowedSchemes.length ? allowedSchemes : ['https'],
      allowlistDomains: listFromEnv(env.URL_ALLOWLIST_DOMAINS).map((d) => d.toLowerCase()),
      blockPrivateIps: booleanFromEnv(env.URL_BLOCK_PRIVATE_IPS, true),
      allowRedirects: booleanFromEnv(env.URL_ALLOW_REDIRECTS, false),
      maxRedirects: Math.max(0, numberFromEnv(env.URL_MAX_REDIRECTS, 2)),
    },
    http: {
      connectTimeoutMs: numberFromEnv(env.HTTP_CONNECT_TIMEOUT_MS, 3_000),
      readTimeoutMs: numberFromEnv(env.HTTP_READ_TIMEOUT_MS, 7_000),
      totalTimeoutMs: numberFromEnv(env.HTTP_TOTAL_TIMEOUT_MS, 30_000),
      userAgent: env.HTTP_USER_AGENT?.trim() || DEFAULT_USER_AGENT,
    },
    limits: {
      article: {
        maxBytes: numberFromEnv(env.HTTP_MAX_BYTES, 5_000_000),
        contentTypes: DEFAULT_ARTICLE_CONTENT_TYPES,
      },
      feed: {
        maxBytes: numberFromEnv(env.RSS_MAX_BYTES, 2_000_000),
        contentTypes: DEFAULT_FEED_CONTENT_TYPES,
      },
    },
    feeds: {
      urls: loadFeedUrls(env, cwd),
      maxFeedsPerCall: numberFromEnv(env.RSS_MAX_FEEDS, 10),
      concurrency: Math.max(1, numberFromEnv(env.RSS_FEED_CONCURRENCY, 1)),
      rankLimit: numberFromEnv(env.RSS_RANK_LIMIT, 10),
      // Hard cap: never more than 3 articles per keyword search
      maxSelectedArticles: Math.max(1, Math.min(3, numberFromEnv(env.RSS_MAX_ARTICLES, 3))),
      itemLinkPolicy: parseLinkPolicy(env.RSS_ITEM_LINK_POLICY),
    },
    observability: {
      logLevel: parseLogLevel(env.LOG_LEVEL),
    },
  };

  return deepFreeze(ConfigSchema.parse(rawConfig));
};

let cachedConfig: AppConfig | null = null;

export const loadConfig = (): AppConfig => {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = buildConfig(process.env);
  return cachedConfig;
};

export const getPublicConfig = (config: AppConfig = loadConfig()): PublicConfig => getPublicConfigShared(config);

export const refreshConfig = (): AppConfig => {
  cachedConfig = null;
  return loadConfig();
};
