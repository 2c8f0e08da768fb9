/**
 * Default extractor set
 */

import { ExtractorRegistry } from './registry.js';
import { textExtractor } from './text-extractor.js';
import { csvExtractor } from './csv-extractor.js';
import { pdfExtractor } from './pdf-extractor.js';
import { createImageExtractor, type OcrOptions } from './image-extractor.js';

export interface RegistryOptions {
  ocr?: OcrOptions & { enabled: boolean };
}

export function createDefaultRegistry(options: RegistryOptions = {}): ExtractorRegistry {
  const registry = new ExtractorRegistry()
    .register(textExtractor)
    .register(csvExtractor)
    .register(pdfExtractor);

  if (options.ocr?.enabled) {
    registry.register(createImageExtractor({ language: options.ocr.language }));
    console.log(`Image OCR extractor enabled (${options.ocr.language})`);
  }

  return registry;
}

export { ExtractorRegistry, normalizeContentType } from './registry.js';
export type { ExtractFn, ExtractionResult, ExtractorRegistration } from './registry.js';
