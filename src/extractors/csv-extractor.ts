/**
 * CSV extraction
 *
 * Rows are flattened into lines, keeping the header line so column names
 * stay searchable:
 *
 *   Headers: name, team
 *   Row 1: Ada | Platform
 */

import { parse } from 'csv-parse/sync';
import { ExtractionError, toError } from '../errors/index.js';
import { decodeText } from './text-extractor.js';
import type { ExtractorRegistration } from './registry.js';

function toRows(records: unknown): string[][] {
  if (!Array.isArray(records)) {
    throw new ExtractionError('CSV parser returned an unexpected shape');
  }

  return records.map(record =>
    Array.isArray(record) ? record.map(cell => String(cell ?? '').trim()) : []
  );
}

export function renderRows(rows: string[][]): string {
  if (rows.length === 0) {
    return '';
  }

  const [header, ...body] = rows;
  const lines = [`Headers: ${header.join(', ')}`];

  body.forEach((row, index) => {
    const cells = row.filter(cell => cell.length > 0);
    if (cells.length > 0) {
      lines.push(`Row ${index + 1}: ${cells.join(' | ')}`);
    }
  });

  return lines.join('\n').trim();
}

export async function extractCsvText(data: Uint8Array): Promise<string> {
  const content = decodeText(data);

  let records: unknown;
  try {
    records = parse(content, {
      bom: true,
      relax_column_count: true,
      skip_empty_lines: true,
    });
  } catch (error) {
    throw new ExtractionError(`Could not parse CSV: ${toError(error).message}`);
  }

  return renderRows(toRows(records));
}

export const csvExtractor: ExtractorRegistration = {
  name: 'csv',
  contentTypes: ['text/csv', 'application/csv', 'text/comma-separated-values'],
  extensions: ['.csv'],
  extract: extractCsvText,
};
