import { describe, expect, it } from 'vitest';
import type { Env } from '../../config/config';
import { createSecureFetcher } from '../../security/secureFetch';
import type { FetchLike } from '../../security/secureFetch';
import { createUrlValidator } from '../../security/urlValidator';
import { routedFetch, staticResolver, testConfig, textResponse } from '../../__tests__/support';
import { aggregateFeeds } from '../feedAggregator';

const rss = (...items: Array<{ title: string; link?: string }>) =>
  `<?xml version="1.0"?><rss version="2.0"><channel><title>Feed</title>${items
    .map((i) => `<item><title>${i.title}</title>${i.link ? `<link>${i.link}</link>` : ''}</item>`)
    .join('')}</channel></rss>`;

const HOSTS = {
  'example.com': ['93.184.216.34'],
  'example.org': ['93.184.216.35'],
  'internal.example.com': ['192.168.10.10'],
};

const setup = (env: Env, fetchImpl: FetchLike) => {
  const config = testConfig(env);
  const validator = createUrlValidator(config, { resolveHost: staticResolver(HOSTS) });
  return { config, fetcher: createSecureFetcher(config, { validator, fetchImpl }) };
};

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('aggregateFeeds', () => {
  it('skips failing feeds and keeps the rest in feed-list order', async () => {
    const feeds = [
      'https://example.com/broken.xml',
      'https://example.com/a.xml',
      'https://example.com/down.xml',
      'https://internal.example.com/feed.xml',
      'https://example.org/b.xml',
    ];
    const { fetchImpl } = routedFetch({
      'https://example.com/broken.xml': () => textResponse('<rss><channel><item>', 'application/rss+xml'),
      'https://example.com/a.xml': () =>
        textResponse(
          rss({ title: 'A1', link: 'https://example.com/a1' }, { title: 'no link' }, { title: 'A2', link: '/a2' }),
          'application/rss+xml',
        ),
      'https://example.org/b.xml': () =>
        textResponse(rss({ title: 'B1', link: 'https://example.org/b1' }), 'application/xml'),
    });
    const { config, fetcher } = setup({}, fetchImpl);

    const result = await aggregateFeeds(feeds, { config, fetcher });

    expect(result.items).toEqual([
      { title: 'A1', link: 'https://example.com/a1', summary: '', published: '', feedUrl: 'https://example.com/a.xml' },
      { title: 'A2', link: 'https://example.com/a2', summary: '', published: '', feedUrl: 'https://example.com/a.xml' },
      { title: 'B1', link: 'https://example.org/b1', summary: '', published: '', feedUrl: 'https://example.org/b.xml' },
    ]);
    expect(result.feeds.map((f) => [f.url, f.ok, f.itemCount])).toEqual([
      ['https://example.com/broken.xml', false, 0],
      ['https://example.com/a.xml', true, 2],
      ['https://example.com/down.xml', false, 0],
      ['https://internal.example.com/feed.xml', false, 0],
      ['https://example.org/b.xml', true, 1],
    ]);
    expect(result.feeds[3]?.error).toMatch(/^URL rejected \(blocked_address\)/);
  });

  it('keeps feed-list order when feeds are fetched in parallel', async () => {
    const { fetchImpl } = routedFetch({
      'https://example.com/slow.xml': async () => {
        await delay(30);
        return textResponse(rss({ title: 'slow', link: 'https://example.com/slow' }), 'text/xml');
      },
      'https://example.com/fast.xml': () =>
        textResponse(rss({ title: 'fast', link: 'https://example.com/fast' }), 'text/xml'),
    });
    const { config, fetcher } = setup({ RSS_FEED_CONCURRENCY: '2' }, fetchImpl);

    const result = await aggregateFeeds(['https://example.com/slow.xml', 'https://example.com/fast.xml'], {
      config,
      fetcher,
    });

    expect(result.items.map((item) => item.title)).toEqual(['slow', 'fast']);
  });

  it('processes at most the configured number of feeds', async () => {
    const { fetchImpl, requests } = routedFetch({
      'https://example.com/one.xml': () => textResponse(rss({ title: 'one', link: 'https://example.com/1' }), 'text/xml'),
      'https://example.com/two.xml': () => textResponse(rss({ title: 'two', link: 'https://example.com/2' }), 'text/xml'),
    });
    const { config, fetcher } = setup({ RSS_MAX_FEEDS: '1' }, fetchImpl);

    const result = await aggregateFeeds(['https://example.com/one.xml', 'https://example.com/two.xml'], {
      config,
      fetcher,
    });

    expect(result.feeds).toHaveLength(1);
    expect(requests.map((r) => r.url)).toEqual(['https://example.com/one.xml']);
  });

  it('reports every feed as skipped when the caller has already aborted', async () => {
    const { fetchImpl, requests } = routedFetch({});
    const { config, fetcher } = setup({}, fetchImpl);
    const controller = new AbortController();
    controller.abort();

    const result = await aggregateFeeds(['https://example.com/one.xml'], { config, fetcher, signal: controller.signal });

    expect(result.items).toEqual([]);
    expect(result.feeds).toEqual([{ url: 'https://example.com/one.xml', ok: false, itemCount: 0, error: 'Aborted' }]);
    expect(requests).toHaveLength(0);
  });
});
