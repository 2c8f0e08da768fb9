/**
 * Tests for the extractor registry and the default extractor set
 */

import { describe, it, expect, vi } from 'vitest';
import { ExtractorRegistry, normalizeContentType } from './registry.js';
import { createDefaultRegistry } from './index.js';

vi.mock('pdfjs-dist/legacy/build/pdf.mjs', () => ({ getDocument: vi.fn() }));
vi.mock('tesseract.js', () => ({ createWorker: vi.fn() }));

const bytes = (text: string) => new TextEncoder().encode(text);

describe('normalizeContentType', () => {
  it('should lower-case and strip parameters', () => {
    expect(normalizeContentType('Text/Plain; charset=UTF-8')).toBe('text/plain');
  });
});

describe('ExtractorRegistry', () => {
  it('should dispatch by content type', async () => {
    const extract = vi.fn().mockResolvedValue('hello');
    const registry = new ExtractorRegistry().register({
      name: 'fake',
      contentTypes: ['application/x-fake'],
      extract,
    });

    const result = await registry.extract(bytes('raw'), 'application/x-fake; v=1');

    expect(result).toEqual({ status: 'ok', text: 'hello', extractor: 'fake' });
    expect(extract).toHaveBeenCalledWith(bytes('raw'), 'application/x-fake');
  });

  it('should fall back to the file extension', async () => {
    const registry = new ExtractorRegistry().register({
      name: 'fake',
      contentTypes: [],
      extensions: ['fake'],
      extract: async () => 'by extension',
    });

    const result = await registry.extract(bytes(''), 'application/octet-stream', 'notes.FAKE');

    expect(result).toEqual({ status: 'ok', text: 'by extension', extractor: 'fake' });
  });

  it('should report unsupported content types instead of throwing', async () => {
    const registry = new ExtractorRegistry();

    const result = await registry.extract(bytes('x'), 'application/zip', 'archive.zip');

    expect(result).toEqual({ status: 'unsupported', contentType: 'application/zip' });
    expect(registry.isSupported('application/zip', 'archive.zip')).toBe(false);
  });

  it('should capture extractor errors as a failed result', async () => {
    const registry = new ExtractorRegistry().register({
      name: 'broken',
      contentTypes: ['text/broken'],
      extract: async () => {
        throw new Error('corrupt');
      },
    });

    const result = await registry.extract(bytes('x'), 'text/broken');

    expect(result.status).toBe('failed');
    if (result.status === 'failed') {
      expect(result.extractor).toBe('broken');
      expect(result.error.message).toBe('corrupt');
    }
  });

  it('should ignore files without a usable extension', () => {
    const registry = createDefaultRegistry();

    expect(registry.isSupported('application/octet-stream', 'README')).toBe(false);
    expect(registry.isSupported('application/octet-stream', '.txt')).toBe(false);
    expect(registry.isSupported('application/octet-stream', 'notes.')).toBe(false);
  });
});

describe('createDefaultRegistry', () => {
  it('should register text, csv and pdf but not OCR by default', () => {
    const registry = createDefaultRegistry();

    expect(registry.isSupported('text/plain')).toBe(true);
    expect(registry.isSupported('text/markdown')).toBe(true);
    expect(registry.isSupported('text/csv')).toBe(true);
    expect(registry.isSupported('application/pdf')).toBe(true);
    expect(registry.isSupported('image/png')).toBe(false);
  });

  it('should register OCR when enabled', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});

    const registry = createDefaultRegistry({ ocr: { enabled: true, language: 'eng' } });

    expect(registry.isSupported('image/png')).toBe(true);
    expect(registry.isSupported('application/octet-stream', 'scan.JPEG')).toBe(true);
  });

  it('should extract plain text end to end', async () => {
    const registry = createDefaultRegistry();

    const result = await registry.extract(bytes('  quarterly plan \n'), 'text/plain');

    expect(result).toEqual({ status: 'ok', text: 'quarterly plan', extractor: 'text' });
  });

  it('should list registered content types sorted', () => {
    const types = createDefaultRegistry().listContentTypes();

    expect(types[0]).toBe('application/csv');
    expect(types).toContain('text/x-markdown');
  });
});
