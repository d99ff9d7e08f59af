import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { FeedItem } from '../../shared/types';
import { htmlToText } from '../utils/text';

export type FeedFormat = 'rss' | 'atom';

export interface ParsedFeed {
  format: FeedFormat | null;
  items: FeedItem[];
  /** Items skipped because they carried no usable link. */
  dropped: number;
  error?: string;
}

const ARRAY_TAGS = new Set(['item', 'entry', 'link']);

// Namespace prefixes are removed so `atom:link` and `link` look the same downstream.
const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  removeNSPrefix: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  isArray: (name: string) => ARRAY_TAGS.has(name),
});

const ABSOLUTE_URL_RE = /^[a-z][a-z0-9+.-]*:/i;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const asList = (value: unknown): unknown[] => {
  if (value == null) return [];
  return Array.isArray(value) ? value : [value];
};

const first = (value: unknown): unknown => (Array.isArray(value) ? value[0] : value);

const textOf = (value: unknown): string => {
  const node = first(value);
  if (typeof node === 'string') return node.trim();
  if (typeof node === 'number' || typeof node === 'boolean') return String(node);
  if (isRecord(node)) {
    const text = node['#text'];
    if (typeof text === 'string') return text.trim();
    if (typeof text === 'number') return String(text);
  }
  return '';
};

const attrOf = (value: unknown, name: string): string => {
  if (!isRecord(value)) return '';
  const attr = value[`@_${name}`];
  return typeof attr === 'string' ? attr.trim() : '';
};

const resolveLink = (link: string, baseUrl?: string): string | null => {
  if (!link) return null;
  if (ABSOLUTE_URL_RE.test(link)) return link;
  if (!baseUrl) return null;
  try {
    return new URL(link, baseUrl).toString();
  } catch {
    return null;
  }
};

const rssLink = (links: unknown[]): string => {
  for (const link of links) {
    const text = textOf(link);
    if (text) return text;
    const href = attrOf(link, 'href');
    if (href) return href;
  }
  return '';
};

const atomLink = (links: unknown[]): string => {
  for (const link of links) {
    const href = attrOf(link, 'href');
    if (href) return href;
    const text = textOf(link);
    if (text) return text;
  }
  return '';
};

const findRoot = (doc: Record<string, unknown>): { format: FeedFormat; node: unknown } | null => {
  for (const [key, node] of Object.entries(doc)) {
    const name = key.toLowerCase();
    if (name === 'rss') return { format: 'rss', node };
    if (name === 'feed') return { format: 'atom', node };
  }
  return null;
};

interface RawEntry {
  title: string;
  link: string;
  summary: string;
  published: string;
}

const readRssItems = (root: unknown): RawEntry[] => {
  const channel = isRecord(root) ? first(root.channel) : null;
  if (!isRecord(channel)) return [];
  return asList(channel.item)
    .filter(isRecord)
    .map((item) => ({
      title: textOf(item.title),
      link: rssLink(asList(item.link)),
      summary: textOf(item.description),
      published: textOf(item.pubDate) || textOf(item.date),
    }));
};

const readAtomEntries = (root: unknown): RawEntry[] => {
  if (!isRecord(root)) return [];
  return asList(root.entry)
    .filter(isRecord)
    .map((entry) => ({
      title: textOf(entry.title),
      link: atomLink(asList(entry.link)),
      summary: textOf(entry.summary) || textOf(entry.content),
      published: textOf(entry.updated) || textOf(entry.published),
    }));
};

/**
 * Parses an RSS 2.0 or Atom document. Malformed XML and unknown roots yield no items rather than throwing.
 */
export const parseFeed = (xml: string, baseUrl?: string): ParsedFeed => {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    return { format: null, items: [], dropped: 0, error: `Malformed XML: ${validation.err.msg}` };
  }

  let doc: unknown;
  try {
    doc = parser.parse(xml);
  } catch (error) {
    return { format: null, items: [], dropped: 0, error: error instanceof Error ? error.message : String(error) };
  }
  if (!isRecord(doc)) {
    return { format: null, items: [], dropped: 0, error: 'Empty document' };
  }

  const root = findRoot(doc);
  if (!root) {
    return { format: null, items: [], dropped: 0, error: 'Not an RSS or Atom document' };
  }

  const raw = root.format === 'rss' ? readRssItems(root.node) : readAtomEntries(root.node);
  const items: FeedItem[] = [];
  let dropped = 0;
  for (const entry of raw) {
    const link = resolveLink(entry.link, baseUrl);
    if (!link) {
      dropped += 1;
      continue;
    }
    items.push({
      title: htmlToText(entry.title),
      link,
      summary: htmlToText(entry.summary),
      published: entry.published,
    });
  }
  return { format: root.format, items, dropped };
};
