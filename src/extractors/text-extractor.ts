/**
 * Plain text extraction
 */

import type { ExtractorRegistration } from './registry.js';

/**
 * Decode bytes as UTF-8, falling back to latin1 for invalid sequences.
 * latin1 maps every byte, so this never throws.
 */
export function decodeText(data: Uint8Array): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(data);
  } catch {
    return new TextDecoder('latin1').decode(data);
  }
}

/**
 * Trim every line and drop the blank ones
 */
export function normalizeLines(text: string): string {
  return text
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0)
    .join('\n');
}

export async function extractPlainText(data: Uint8Array): Promise<string> {
  return decodeText(data).trim();
}

export const textExtractor: ExtractorRegistration = {
  name: 'text',
  contentTypes: ['text/plain', 'text/markdown', 'text/x-markdown', 'text/txt', 'application/txt'],
  extensions: ['.txt', '.text', '.md', '.markdown'],
  extract: extractPlainText,
};
