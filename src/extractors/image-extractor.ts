/**
 * Image OCR extraction using tesseract.js
 *
 * Recognition is best-effort: low-confidence text is still returned.
 * Language data is read from the installed @tesseract.js-data/<language> package.
 */

import { createRequire } from 'node:module';
import { dirname, join } from 'node:path';
import { OEM, createWorker } from 'tesseract.js';
import { ConfigError, ExtractionError, toError } from '../errors/index.js';
import { normalizeLines } from './text-extractor.js';
import type { ExtractorRegistration } from './registry.js';

const require = createRequire(import.meta.url);

// Model directory inside each @tesseract.js-data package for the LSTM engine
const LSTM_MODEL_DIR = '4.0.0_best_int';

export interface OcrOptions {
  language: string;
  /**
   * Directory holding <language>.traineddata.gz; defaults to the installed data package
   */
  langPath?: string;
}

export function languageDataPath(language: string): string {
  let manifest: string;
  try {
    manifest = require.resolve(`@tesseract.js-data/${language}/package.json`);
  } catch (error) {
    throw new ConfigError(
      `No OCR language data for '${language}': install @tesseract.js-data/${language}`,
      { language, error: toError(error).message }
    );
  }
  return join(dirname(manifest), LSTM_MODEL_DIR);
}

export function createImageExtractor(options: OcrOptions): ExtractorRegistration {
  const langPath = options.langPath ?? languageDataPath(options.language);

  return {
    name: 'ocr',
    contentTypes: ['image/png', 'image/jpeg', 'image/jpg', 'image/tiff', 'image/bmp'],
    extensions: ['.png', '.jpg', '.jpeg', '.tiff', '.bmp'],
    extract: async data => {
      const worker = await createWorker(options.language, OEM.LSTM_ONLY, {
        langPath,
        gzip: true,
        cacheMethod: 'none',
      });

      try {
        const { data: result } = await worker.recognize(Buffer.from(data));

        if (result.confidence < 50) {
          console.warn(`Low OCR confidence (${result.confidence.toFixed(0)}%), keeping text`);
        }

        return normalizeLines(result.text);
      } catch (error) {
        throw new ExtractionError(`OCR failed: ${toError(error).message}`);
      } finally {
        await worker.terminate();
      }
    },
  };
}
