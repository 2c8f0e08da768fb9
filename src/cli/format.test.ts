import { describe, it, expect } from 'vitest';
import {
  formatPlan,
  formatSearchResults,
  formatSyncReport,
  highlightSnippet,
  shortenUrl,
} from './format.js';
import { SyncDecision, type SyncReport } from '../types/index.js';
import { remoteFile } from '../testing/in-memory.js';

const RULE = '='.repeat(70);

function report(overrides: Partial<SyncReport> = {}): SyncReport {
  return {
    mode: 'full',
    clean: false,
    startedAt: '2024-06-01T10:00:00.000Z',
    finishedAt: '2024-06-01T10:00:01.500Z',
    durationMs: 1500,
    totalRemoteFiles: 3,
    indexed: 2,
    added: 1,
    updated: 1,
    skipped: 1,
    deleted: 0,
    cleared: 0,
    failed: 0,
    failures: [],
    degraded: [],
    ...overrides,
  };
}

describe('shortenUrl', () => {
  it('should keep URLs under 60 characters', () => {
    const url = 'https://drive.example/file/1';
    expect(shortenUrl(url)).toBe(url);
  });

  it('should cut URLs of 60 characters or more to 57 plus an ellipsis', () => {
    const url = `https://drive.example/${'a'.repeat(38)}`;
    expect(url).toHaveLength(60);

    expect(shortenUrl(url)).toBe(`${url.slice(0, 57)}...`);
  });
});

describe('highlightSnippet', () => {
  it('should strip emphasis tags', () => {
    expect(highlightSnippet('the <em>budget</em> review')).toBe('the budget review');
  });

  it('should truncate long snippets to 80 characters', () => {
    const snippet = highlightSnippet(`<em>x</em>${'y'.repeat(90)}`);

    expect(snippet).toBe(`x${'y'.repeat(76)}...`);
    expect(snippet).toHaveLength(80);
  });
});

describe('formatSearchResults', () => {
  it('should render each result with its details', () => {
    const output = formatSearchResults({
      query: 'budget',
      total_results: 1,
      results: [
        {
          file_id: '1',
          file_name: 'budget.csv',
          file_path: 'Finance/budget.csv',
          url: 'https://drive.example/1',
          mime_type: 'text/csv',
          score: 3.5,
          updated_time: '2024-06-01T10:00:00.000Z',
          highlights: ['<em>budget</em> for Q3'],
        },
      ],
    });

    expect(output.split('\n')).toEqual([
      '',
      RULE,
      "Search Results for: 'budget'",
      RULE,
      'Found 1 result(s)',
      '',
      '1. budget.csv',
      '   Score: 3.5',
      '   Path:  Finance/budget.csv',
      '   Type:  text/csv',
      '   URL:   https://drive.example/1',
      '   Match: ...budget for Q3...',
      '',
      RULE,
      '',
    ]);
  });

  it('should omit empty URL and highlight lines', () => {
    const output = formatSearchResults({
      query: 'x',
      total_results: 1,
      results: [
        {
          file_name: 'x.txt',
          file_path: 'x.txt',
          url: '',
          mime_type: 'text/plain',
          score: 1,
          updated_time: '',
          highlights: [],
        },
      ],
    });

    expect(output).not.toContain('URL:');
    expect(output).not.toContain('Match:');
  });

  it('should say when nothing matched', () => {
    const output = formatSearchResults({ query: 'zzz', total_results: 0, results: [] });

    expect(output.split('\n')).toEqual([
      '',
      RULE,
      "Search Results for: 'zzz'",
      RULE,
      'Found 0 result(s)',
      '',
      'No documents found matching your query.',
      '',
    ]);
  });
});

describe('formatSyncReport', () => {
  it('should summarize a clean run', () => {
    expect(formatSyncReport(report()).split('\n')).toEqual([
      'Sync complete (full) in 1500ms',
      '  Remote files: 3',
      '  Indexed:      2 (1 added, 1 updated)',
      '  Skipped:      1',
      '  Deleted:      0',
      '  Failed:       0',
      '  Degraded:     0',
    ]);
  });

  it('should list failures, degradations and cleared documents', () => {
    const output = formatSyncReport(
      report({
        mode: 'incremental',
        clean: true,
        cleared: 4,
        failed: 1,
        failures: [
          { fileId: 'b', fileName: 'b.pdf', reason: 'FETCH_FAILED', message: 'not found' },
        ],
        degraded: [{ fileId: 'c', reason: 'EXTRACTION_UNSUPPORTED', message: 'No extractor' }],
      })
    );

    expect(output.split('\n')).toEqual([
      'Sync complete (incremental, clean) in 1500ms',
      '  Remote files: 3',
      '  Indexed:      2 (1 added, 1 updated)',
      '  Skipped:      1',
      '  Deleted:      0',
      '  Cleared:      4',
      '  Failed:       1',
      '  Degraded:     1',
      'Failures:',
      '  - b.pdf (b): FETCH_FAILED not found',
      'Indexed without text:',
      '  - c: EXTRACTION_UNSUPPORTED No extractor',
    ]);
  });
});

describe('formatPlan', () => {
  it('should list files to index and ids to delete', () => {
    const output = formatPlan({
      mode: 'incremental',
      totalRemoteFiles: 2,
      plan: {
        toIndex: [{ file: remoteFile('a', { path: 'Docs/a.txt' }), decision: SyncDecision.IndexNew }],
        toSkip: [remoteFile('b')],
        toDelete: ['gone'],
        duplicates: [],
      },
    });

    expect(output.split('\n')).toEqual([
      'Dry run (incremental): 2 remote files',
      '  To index:  1',
      '    + Docs/a.txt [INDEX_NEW]',
      '  Unchanged: 1',
      '  To delete: 1',
      '    - gone',
    ]);
  });
});
