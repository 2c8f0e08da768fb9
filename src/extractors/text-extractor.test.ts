import { describe, it, expect } from 'vitest';
import { decodeText, extractPlainText, normalizeLines } from './text-extractor.js';

describe('decodeText', () => {
  it('should decode UTF-8', () => {
    expect(decodeText(new TextEncoder().encode('naïve café'))).toBe('naïve café');
  });

  it('should fall back to latin1 for invalid UTF-8', () => {
    // "José" with a single latin1 byte for é
    const data = new Uint8Array([0x4a, 0x6f, 0x73, 0xe9]);

    expect(decodeText(data)).toBe('José');
  });

  it('should strip a UTF-8 byte order mark', () => {
    const data = new Uint8Array([0xef, 0xbb, 0xbf, 0x68, 0x69]);

    expect(decodeText(data)).toBe('hi');
  });
});

describe('extractPlainText', () => {
  it('should trim surrounding whitespace', async () => {
    await expect(extractPlainText(new TextEncoder().encode('\n  body text  \n'))).resolves.toBe(
      'body text'
    );
  });

  it('should return an empty string for empty input', async () => {
    await expect(extractPlainText(new Uint8Array())).resolves.toBe('');
  });
});

describe('normalizeLines', () => {
  it('should trim lines and drop blank ones', () => {
    expect(normalizeLines('  first  \n\n   \nsecond\n')).toBe('first\nsecond');
  });
});
