export const buildExcerpt = (value: string | null | undefined, maxLength = 600): string => {
  if (!value) return '';
  const normalized = String(value).replace(/\s+/g, ' ').trim();
  if (normalized.length <= maxLength) return normalized;
  return `${normalized.slice(0, Math.max(0, maxLength - 3)).trim()}...`;
};

export const stripTags = (html: string): string => {
  const withoutScripts = html.replace(/<script[\s\S]*?<\/script>/gi, ' ');
  const withoutStyles = withoutScripts.replace(/<style[\s\S]*?<\/style>/gi, ' ');
  return withoutStyles.replace(/<[^>]+>/g, ' ');
};

const NAMED_ENTITIES: Record<string, string> = {
  '&nbsp;': ' ',
  '&amp;': '&',
  '&quot;': '"',
  '&#39;': "'",
  '&apos;': "'",
  '&lt;': '<',
  '&gt;': '>',
};

const fromCodePoint = (code: number): string => {
  if (!Number.isInteger(code) || code < 0 || code > 0x10ffff) return '';
  return String.fromCodePoint(code);
};

export const decodeEntities = (text: string): string => {
  let out = text;
  for (const [key, value] of Object.entries(NAMED_ENTITIES)) {
    out = out.replaceAll(key, value);
  }
  out = out.replace(/&#(\d+);/g, (_match, num: string) => fromCodePoint(Number(num)));
  out = out.replace(/&#x([0-9a-f]+);/gi, (_match, hex: string) => fromCodePoint(Number.parseInt(hex, 16)));
  return out;
};

export const normalizeWhitespace = (text: string): string =>
  text.replace(/\s+/g, ' ').trim();

export const htmlToText = (html: string): string => normalizeWhitespace(decodeEntities(stripTags(html)));

export const charsetOf = (contentTypeHeader: string | null | undefined): string | null => {
  const match = (contentTypeHeader || '').match(/charset\s*=\s*"?([^";\s]+)"?/i);
  return match ? match[1].toLowerCase() : null;
};

const createDecoder = (charset?: string | null) => {
  try {
    return new TextDecoder(charset || 'utf-8');
  } catch {
    return new TextDecoder('utf-8');
  }
};

/**
 * Decodes fetched bytes with the declared charset, falling back to UTF-8 for unknown labels.
 */
export const decodeBody = (bytes: Uint8Array, charset?: string | null): string => createDecoder(charset).decode(bytes);
