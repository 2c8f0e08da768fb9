/**
 * PDF text extraction utilities
 */

import * as pdfjsLib from 'pdfjs-dist/legacy/build/pdf.mjs';
import { ExtractionError, toError } from '../errors/index.js';
import { normalizeLines } from './text-extractor.js';
import type { ExtractorRegistration } from './registry.js';

/**
 * Check if buffer appears to be a valid PDF
 */
export function isPDFBuffer(buffer: Uint8Array): boolean {
  // PDF magic number: %PDF
  return (
    buffer.length >= 4 &&
    buffer[0] === 0x25 && // %
    buffer[1] === 0x50 && // P
    buffer[2] === 0x44 && // D
    buffer[3] === 0x46 // F
  );
}

/**
 * Extract text content from PDF bytes, page by page in reading order
 */
export async function extractTextFromPDF(pdfBuffer: Uint8Array): Promise<string> {
  if (!isPDFBuffer(pdfBuffer)) {
    throw new ExtractionError('Not a PDF document (missing %PDF header)');
  }

  // pdfjs may transfer the buffer it is given; hand it a copy
  const loadingTask = pdfjsLib.getDocument({
    data: new Uint8Array(pdfBuffer),
    isEvalSupported: false,
  });

  try {
    const pdf = await loadingTask.promise;
    const textPages: string[] = [];

    for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
      const page = await pdf.getPage(pageNum);
      const textContent = await page.getTextContent();

      const pageText = textContent.items
        .map(item => {
          if ('str' in item) {
            return item.hasEOL ? `${item.str}\n` : `${item.str} `;
          }
          return '';
        })
        .join('');

      textPages.push(pageText);
    }

    return normalizeLines(textPages.join('\n'));
  } catch (error) {
    throw new ExtractionError(`PDF text extraction failed: ${toError(error).message}`);
  } finally {
    await loadingTask.destroy();
  }
}

export const pdfExtractor: ExtractorRegistration = {
  name: 'pdf',
  contentTypes: ['application/pdf', 'application/x-pdf'],
  extensions: ['.pdf'],
  extract: extractTextFromPDF,
};
