import { describe, expect, it } from 'vitest';
import { hashString } from '../crypto';

describe('hashString', () => {
  it('produces 32-bit FNV-1a hex digests', () => {
    expect(hashString('')).toBe('811c9dc5');
    expect(hashString('a')).toBe('e40c292c');
  });

  it('is stable per input', () => {
    expect(hashString('https://example.com/a')).toBe(hashString('https://example.com/a'));
    expect(hashString('https://example.com/a')).not.toBe(hashString('https://example.com/b'));
  });
});
