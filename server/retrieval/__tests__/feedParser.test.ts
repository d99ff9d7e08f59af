import { describe, expect, it } from 'vitest';
import { parseFeed } from '../feedParser';

const RSS = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:dc="http://purl.org/dc/elements/1.1/">
  <channel>
    <title>Example News</title>
    <item>
      <title>Solar &amp; wind capacity grows</title>
      <link>https://example.com/news/solar</link>
      <description><![CDATA[<p>Record <b>solar</b> installs.</p>]]></description>
      <pubDate>Mon, 06 Jan 2025 10:00:00 GMT</pubDate>
    </item>
    <item>
      <title>No link here</title>
      <description>Dropped</description>
    </item>
    <item>
      <title>Relative link</title>
      <link>/news/relative</link>
      <dc:date>2025-01-07T08:00:00Z</dc:date>
    </item>
  </channel>
</rss>`;

const ATOM = `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Example Atom</title>
  <entry>
    <title type="html">Grid storage &lt;em&gt;update&lt;/em&gt;</title>
    <link rel="alternate" href="https://example.org/posts/grid"/>
    <link rel="enclosure" href="https://example.org/media/grid.mp3"/>
    <summary>Batteries everywhere</summary>
    <published>2025-01-01T00:00:00Z</published>
    <updated>2025-01-02T00:00:00Z</updated>
  </entry>
  <entry>
    <title>Content fallback</title>
    <link href="https://example.org/posts/content"/>
    <content type="html">&lt;p&gt;Body text&lt;/p&gt;</content>
    <published>2025-01-03T00:00:00Z</published>
  </entry>
  <entry>
    <title>Missing link</title>
  </entry>
</feed>`;

describe('parseFeed', () => {
  it('reads RSS items, strips markup and drops items without a link', () => {
    const parsed = parseFeed(RSS, 'https://example.com/rss.xml');

    expect(parsed.format).toBe('rss');
    expect(parsed.dropped).toBe(1);
    expect(parsed.items).toEqual([
      {
        title: 'Solar & wind capacity grows',
        link: 'https://example.com/news/solar',
        summary: 'Record solar installs.',
        published: 'Mon, 06 Jan 2025 10:00:00 GMT',
      },
      {
        title: 'Relative link',
        link: 'https://example.com/news/relative',
        summary: '',
        published: '2025-01-07T08:00:00Z',
      },
    ]);
  });

  it('drops relative links when no base URL is known', () => {
    const parsed = parseFeed(RSS);
    expect(parsed.items.map((item) => item.link)).toEqual(['https://example.com/news/solar']);
    expect(parsed.dropped).toBe(2);
  });

  it('reads Atom entries using the first link href and summary/content fallbacks', () => {
    const parsed = parseFeed(ATOM, 'https://example.org/atom.xml');

    expect(parsed.format).toBe('atom');
    expect(parsed.dropped).toBe(1);
    expect(parsed.items).toEqual([
      {
        title: 'Grid storage update',
        link: 'https://example.org/posts/grid',
        summary: 'Batteries everywhere',
        published: '2025-01-02T00:00:00Z',
      },
      {
        title: 'Content fallback',
        link: 'https://example.org/posts/content',
        summary: 'Body text',
        published: '2025-01-03T00:00:00Z',
      },
    ]);
  });

  it('ignores namespace prefixes on element names', () => {
    const xml = `<?xml version="1.0"?>
<atom:feed xmlns:atom="http://www.w3.org/2005/Atom">
  <atom:entry>
    <atom:title>Prefixed</atom:title>
    <atom:link href="https://example.net/prefixed"/>
  </atom:entry>
</atom:feed>`;
    const parsed = parseFeed(xml);
    expect(parsed.format).toBe('atom');
    expect(parsed.items).toEqual([
      { title: 'Prefixed', link: 'https://example.net/prefixed', summary: '', published: '' },
    ]);
  });

  it('falls back to link text in Atom and href in RSS', () => {
    const atom = `<feed><entry><title>T</title><link>https://example.net/text-link</link></entry></feed>`;
    const rss = `<rss><channel><item><title>T</title><link href="https://example.net/href-link"/></item></channel></rss>`;
    expect(parseFeed(atom).items[0]?.link).toBe('https://example.net/text-link');
    expect(parseFeed(rss).items[0]?.link).toBe('https://example.net/href-link');
  });

  it('handles a single-item channel', () => {
    const xml = `<rss><channel><item><title>Only</title><link>https://example.com/only</link></item></channel></rss>`;
    expect(parseFeed(xml).items).toHaveLength(1);
  });

  it('yields no items for malformed XML', () => {
    const parsed = parseFeed('<rss><channel><item><title>Broken</channel></rss>');
    expect(parsed.items).toEqual([]);
    expect(parsed.format).toBeNull();
    expect(parsed.error).toMatch(/^Malformed XML/);
  });

  it('yields no items for an unknown root element', () => {
    const parsed = parseFeed('<html><body>Not a feed</body></html>');
    expect(parsed).toEqual({ format: null, items: [], dropped: 0, error: 'Not an RSS or Atom document' });
  });
});
