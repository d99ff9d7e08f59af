import { buildExcerpt, decodeEntities, htmlToText, normalizeWhitespace } from '../utils/text';

export interface ExtractedText {
  title: string;
  body: string;
  excerpt: string;
}

const HTML_TYPES = ['text/html', 'application/xhtml'];
const MAX_TITLE_CHARS = 300;

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const findMetaContent = (html: string, key: string): string | null => {
  const needle = escapeRegExp(key);
  const metaRe = new RegExp(`<meta[^>]+(?:property|name)=["']${needle}["'][^>]*>`, 'i');
  const match = html.match(metaRe);
  if (!match) return null;
  const contentMatch = match[0].match(/content=["']([^"']+)["']/i);
  return contentMatch ? contentMatch[1] : null;
};

const extractTagBlock = (html: string, tag: string): string | null => {
  const re = new RegExp(`<${tag}(?:\\s[^>]*)?>([\\s\\S]*?)<\\/${tag}>`, 'i');
  const match = html.match(re);
  return match ? match[1] : null;
};

const extractHtmlTitle = (html: string): string => {
  const ogTitle = findMetaContent(html, 'og:title');
  if (ogTitle) return normalizeWhitespace(decodeEntities(ogTitle));
  const titleMatch = html.match(/<title[^>]*>([\s\S]*?)<\/title>/i);
  return titleMatch ? normalizeWhitespace(decodeEntities(titleMatch[1])) : '';
};

const clip = (value: string, max: number): string => (value.length <= max ? value : value.slice(0, max).trimEnd());

export const isHtmlContentType = (contentType: string): boolean =>
  HTML_TYPES.some((prefix) => contentType.startsWith(prefix));

/**
 * Pulls a title and readable body out of a fetched document.
 * HTML prefers `<article>`, then `<main>`, then `<body>`; plain text uses its first non-empty line as title.
 * An empty or unknown content type is sniffed for markup.
 */
export const extractText = (raw: string, contentType: string, fallbackTitle: string): ExtractedText => {
  const looksLikeHtml = isHtmlContentType(contentType) || (!contentType && /<html[\s>]/i.test(raw));

  if (looksLikeHtml) {
    const block = extractTagBlock(raw, 'article') || extractTagBlock(raw, 'main') || extractTagBlock(raw, 'body');
    let body = block ? htmlToText(block) : '';
    if (!body) {
      body = htmlToText(raw);
    }
    const title = clip(extractHtmlTitle(raw) || fallbackTitle, MAX_TITLE_CHARS);
    return { title, body, excerpt: buildExcerpt(body) };
  }

  const lines = raw.split(/\r?\n/);
  const firstLine = lines.map((line) => line.trim()).find(Boolean) ?? '';
  const body = raw.trim();
  return {
    title: clip(firstLine || fallbackTitle, MAX_TITLE_CHARS),
    body,
    excerpt: buildExcerpt(body),
  };
};
