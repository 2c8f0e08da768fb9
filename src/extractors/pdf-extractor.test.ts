/**
 * Tests for PDF extraction
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as pdfjsLib from 'pdfjs-dist/legacy/build/pdf.mjs';
import { extractTextFromPDF, isPDFBuffer } from './pdf-extractor.js';
import { ExtractionError } from '../errors/index.js';

vi.mock('pdfjs-dist/legacy/build/pdf.mjs', () => ({
  getDocument: vi.fn(),
}));

type FakeItem = { str: string; hasEOL: boolean } | { type: string };

function mockDocument(pages: FakeItem[][]) {
  const destroy = vi.fn().mockResolvedValue(undefined);
  const pdf = {
    numPages: pages.length,
    getPage: vi.fn(async (pageNum: number) => ({
      getTextContent: async () => ({ items: pages[pageNum - 1] }),
    })),
  };

  vi.mocked(pdfjsLib.getDocument).mockReturnValue({
    promise: Promise.resolve(pdf),
    destroy,
  } as unknown as ReturnType<typeof pdfjsLib.getDocument>);

  return { pdf, destroy };
}

const pdfHeader = new TextEncoder().encode('%PDF-1.7\n');

describe('isPDFBuffer', () => {
  it('should detect the %PDF magic number', () => {
    expect(isPDFBuffer(pdfHeader)).toBe(true);
    expect(isPDFBuffer(new TextEncoder().encode('PK\u0003\u0004'))).toBe(false);
    expect(isPDFBuffer(new Uint8Array([0x25, 0x50]))).toBe(false);
  });
});

describe('extractTextFromPDF', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should join items per page and pages in order', async () => {
    const { destroy } = mockDocument([
      [
        { str: 'Quarterly', hasEOL: false },
        { str: 'report', hasEOL: true },
        { str: 'Revenue up', hasEOL: false },
      ],
      [{ type: 'beginMarkedContent' }, { str: '  Page two  ', hasEOL: true }],
    ]);

    const text = await extractTextFromPDF(pdfHeader);

    expect(text).toBe('Quarterly report\nRevenue up\nPage two');
    expect(destroy).toHaveBeenCalledTimes(1);
  });

  it('should return an empty string for a PDF without text', async () => {
    mockDocument([[], []]);

    await expect(extractTextFromPDF(pdfHeader)).resolves.toBe('');
  });

  it('should reject content without a PDF header', async () => {
    await expect(extractTextFromPDF(new TextEncoder().encode('hello'))).rejects.toBeInstanceOf(
      ExtractionError
    );
    expect(pdfjsLib.getDocument).not.toHaveBeenCalled();
  });

  it('should wrap parser failures in an ExtractionError', async () => {
    const destroy = vi.fn().mockResolvedValue(undefined);
    vi.mocked(pdfjsLib.getDocument).mockReturnValue({
      promise: Promise.reject(new Error('Invalid XRef stream')),
      destroy,
    } as unknown as ReturnType<typeof pdfjsLib.getDocument>);

    await expect(extractTextFromPDF(pdfHeader)).rejects.toThrow(
      'PDF text extraction failed: Invalid XRef stream'
    );
    expect(destroy).toHaveBeenCalledTimes(1);
  });

  it('should not hand the caller buffer to the parser', async () => {
    mockDocument([]);

    await extractTextFromPDF(pdfHeader);

    const [params] = vi.mocked(pdfjsLib.getDocument).mock.calls[0];
    const { data } = params as { data: Uint8Array };
    expect(params).toMatchObject({ isEvalSupported: false });
    expect(data).not.toBe(pdfHeader);
    expect(data).toEqual(pdfHeader);
  });
});
