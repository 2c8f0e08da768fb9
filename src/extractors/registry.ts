/**
 * Content extractor registry
 *
 * Maps a content type (or, failing that, a file extension) to a function
 * that turns raw bytes into plain text. New formats are added by registering
 * another function; nothing needs subclassing.
 */

import { toError } from '../errors/index.js';

export type ExtractFn = (data: Uint8Array, contentType: string) => Promise<string>;

export interface ExtractorRegistration {
  /**
   * Short label used in logs ("text", "csv", "pdf", ...)
   */
  name: string;
  contentTypes: string[];
  extensions?: string[];
  extract: ExtractFn;
}

export type ExtractionResult =
  | { status: 'ok'; text: string; extractor: string }
  | { status: 'unsupported'; contentType: string }
  | { status: 'failed'; extractor: string; error: Error };

/**
 * Lower-case the type and drop parameters such as "; charset=utf-8"
 */
export function normalizeContentType(contentType: string): string {
  return contentType.split(';')[0].trim().toLowerCase();
}

function extensionOf(fileName: string): string | undefined {
  const dot = fileName.lastIndexOf('.');
  if (dot <= 0 || dot === fileName.length - 1) {
    return undefined;
  }
  return fileName.slice(dot).toLowerCase();
}

export class ExtractorRegistry {
  private byContentType = new Map<string, ExtractorRegistration>();
  private byExtension = new Map<string, ExtractorRegistration>();

  /**
   * Register an extractor; later registrations win for overlapping keys
   */
  register(registration: ExtractorRegistration): this {
    for (const contentType of registration.contentTypes) {
      this.byContentType.set(normalizeContentType(contentType), registration);
    }
    for (const extension of registration.extensions ?? []) {
      const key = extension.startsWith('.') ? extension : `.${extension}`;
      this.byExtension.set(key.toLowerCase(), registration);
    }
    return this;
  }

  /**
   * Find the extractor for a content type, falling back to the file extension
   */
  resolve(contentType: string, fileName?: string): ExtractorRegistration | undefined {
    const direct = this.byContentType.get(normalizeContentType(contentType));
    if (direct) {
      return direct;
    }

    const extension = fileName ? extensionOf(fileName) : undefined;
    return extension ? this.byExtension.get(extension) : undefined;
  }

  isSupported(contentType: string, fileName?: string): boolean {
    return this.resolve(contentType, fileName) !== undefined;
  }

  /**
   * Extract text. Never throws: unsupported types and extractor errors
   * come back as typed results.
   */
  async extract(data: Uint8Array, contentType: string, fileName?: string): Promise<ExtractionResult> {
    const registration = this.resolve(contentType, fileName);

    if (!registration) {
      return { status: 'unsupported', contentType: normalizeContentType(contentType) };
    }

    try {
      const text = await registration.extract(data, normalizeContentType(contentType));
      return { status: 'ok', text, extractor: registration.name };
    } catch (error) {
      return { status: 'failed', extractor: registration.name, error: toError(error) };
    }
  }

  /**
   * Registered content types, sorted
   */
  listContentTypes(): string[] {
    return [...this.byContentType.keys()].sort();
  }
}
