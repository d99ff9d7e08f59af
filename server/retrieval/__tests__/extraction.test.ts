import { describe, expect, it } from 'vitest';
import { extractText, isHtmlContentType } from '../extraction';

describe('extractText', () => {
  it('prefers og:title and the article block', () => {
    const html = `
      <html>
        <head>
          <title>Site | Fallback title</title>
          <meta property="og:title" content="Acme launches a marketplace &amp; more">
          <style>.x { color: red }</style>
        </head>
        <body>
          <nav>Home About</nav>
          <article class="story">
            <h1>Acme launches</h1>
            <script>trackPageView()</script>
            <p>Acme&#39;s new&nbsp;marketplace opened on Monday.</p>
          </article>
          <footer>Copyright</footer>
        </body>
      </html>`;

    const extracted = extractText(html, 'text/html', 'Feed title');

    expect(extracted.title).toBe('Acme launches a marketplace & more');
    expect(extracted.body).toBe("Acme launches Acme's new marketplace opened on Monday.");
    expect(extracted.excerpt).toBe(extracted.body);
  });

  it('falls back to <title>, then <main>', () => {
    const html = '<html><head><title> Plain   title </title></head><body><main><p>Main text</p></main><aside>Side</aside></body></html>';
    const extracted = extractText(html, 'application/xhtml+xml', 'Feed title');
    expect(extracted.title).toBe('Plain title');
    expect(extracted.body).toBe('Main text');
  });

  it('uses the body when there is no article or main element', () => {
    const html = '<html><body><div>Just <em>body</em> text</div></body></html>';
    const extracted = extractText(html, 'text/html', 'Feed title');
    expect(extracted.title).toBe('Feed title');
    expect(extracted.body).toBe('Just body text');
  });

  it('uses the first non-empty line of plain text as title', () => {
    const extracted = extractText('\n\n  Headline here  \nSecond line\n', 'text/plain', 'Feed title');
    expect(extracted.title).toBe('Headline here');
    expect(extracted.body).toBe('Headline here  \nSecond line');
  });

  it('sniffs markup when no content type was sent', () => {
    const extracted = extractText('<html><head><title>Sniffed</title></head><body>Hi</body></html>', '', 'x');
    expect(extracted.title).toBe('Sniffed');
    expect(extracted.body).toBe('Hi');
  });

  it('shortens long bodies in the excerpt', () => {
    const body = 'word '.repeat(200).trim();
    const extracted = extractText(body, 'text/plain', 'Feed title');
    expect(extracted.excerpt.length).toBe(600);
    expect(extracted.excerpt.endsWith('...')).toBe(true);
  });
});

describe('isHtmlContentType', () => {
  it('accepts html and xhtml media types', () => {
    expect(isHtmlContentType('text/html')).toBe(true);
    expect(isHtmlContentType('application/xhtml+xml')).toBe(true);
    expect(isHtmlContentType('text/plain')).toBe(false);
  });
});
