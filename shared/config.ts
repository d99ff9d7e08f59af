import { z } from 'zod';

export const DEFAULT_ARTICLE_CONTENT_TYPES = ['text/html', 'application/xhtml', 'text/plain'];

export const DEFAULT_FEED_CONTENT_TYPES = [
  'application/rss',
  'application/atom',
  'application/xml',
  'text/xml',
  'text/plain',
];

const PurposeLimitsSchema = z.object({
  maxBytes: z.number().int().positive(),
  contentTypes: z.array(z.string().min(1)).min(1),
});

export const ConfigSchema = z.object({
  environment: z.enum(['development', 'test', 'production']),
  server: z.object({
    port: z.number().int().positive().max(65535),
  }),
  security: z.object({
    allowedSchemes: z.array(z.string().min(1)).min(1),
    allowlistDomains: z.array(z.string().min(1)),
    blockPrivateIps: z.boolean(),
    allowRedirects: z.boolean(),
    maxRedirects: z.number().int().nonnegative(),
  }),
  http: z.object({
    connectTimeoutMs: z.number().int().positive(),
    readTimeoutMs: z.number().int().positive(),
    totalTimeoutMs: z.number().int().positive(),
    userAgent: z.string().min(1),
  }),
  limits: z.object({
    article: PurposeLimitsSchema,
    feed: PurposeLimitsSchema,
  }),
  feeds: z.object({
    urls: z.array(z.string().min(1)),
    maxFeedsPerCall: z.number().int().positive(),
    concurrency: z.number().int().positive(),
    rankLimit: z.number().int().positive(),
    maxSelectedArticles: z.number().int().min(1).max(3),
    itemLinkPolicy: z.enum(['A', 'B']),
  }),
  observability: z.object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export type FetchPurpose = keyof AppConfig['limits'];

export type LinkPolicyMode = AppConfig['feeds']['itemLinkPolicy'];

export interface PublicConfig {
  security: {
    allowedSchemes: string[];
    allowlistDomains: string[];
    allowRedirects: boolean;
    maxRedirects: number;
  };
  limits: {
    articleMaxBytes: number;
    feedMaxBytes: number;
  };
  feeds: {
    count: number;
    maxFeedsPerCall: number;
    maxSelectedArticles: number;
    itemLinkPolicy: LinkPolicyMode;
  };
}

export const getPublicConfig = (config: AppConfig): PublicConfig => ({
  security: {
    allowedSchemes: [...config.security.allowedSchemes],
    allowlistDomains: [...config.security.allowlistDomains],
    allowRedirects: config.security.allowRedirects,
    maxRedirects: config.security.maxRedirects,
  },
  limits: {
    articleMaxBytes: config.limits.article.maxBytes,
    feedMaxBytes: config.limits.feed.maxBytes,
  },
  feeds: {
    count: config.feeds.urls.length,
    maxFeedsPerCall: config.feeds.maxFeedsPerCall,
    maxSelectedArticles: config.feeds.maxSelectedArticles,
    itemLinkPolicy: config.feeds.itemLinkPolicy,
  },
});
