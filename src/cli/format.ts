/**
 * Plain-text rendering for CLI output
 */

import type { PlanPreview } from '../sync/sync-orchestrator.js';
import type { FileIssue, SyncReport } from '../types/index.js';
import type { SearchResponse } from './api-client.js';

const RULE = '='.repeat(70);
const MAX_URL_LENGTH = 60;
const MAX_SNIPPET_LENGTH = 80;

export function shortenUrl(url: string): string {
  return url.length < MAX_URL_LENGTH ? url : `${url.slice(0, MAX_URL_LENGTH - 3)}...`;
}

/**
 * First highlight without <em> markup, cut to fit one line
 */
export function highlightSnippet(highlight: string): string {
  const text = highlight.replaceAll('<em>', '').replaceAll('</em>', '');
  return text.length > MAX_SNIPPET_LENGTH ? `${text.slice(0, MAX_SNIPPET_LENGTH - 3)}...` : text;
}

export function formatSearchResults(data: SearchResponse): string {
  const lines = ['', RULE, `Search Results for: '${data.query}'`, RULE, `Found ${data.total_results} result(s)`, ''];

  if (data.results.length === 0) {
    lines.push('No documents found matching your query.', '');
    return lines.join('\n');
  }

  data.results.forEach((result, i) => {
    lines.push(`${i + 1}. ${result.file_name}`);
    lines.push(`   Score: ${result.score}`);
    lines.push(`   Path:  ${result.file_path}`);
    lines.push(`   Type:  ${result.mime_type}`);
    if (result.url) {
      lines.push(`   URL:   ${shortenUrl(result.url)}`);
    }
    if (result.highlights.length > 0) {
      lines.push(`   Match: ...${highlightSnippet(result.highlights[0])}...`);
    }
    lines.push('');
  });

  lines.push(RULE, '');
  return lines.join('\n');
}

function formatIssue(issue: FileIssue<string>): string {
  const label = issue.fileName ? `${issue.fileName} (${issue.fileId})` : issue.fileId;
  return `  - ${label}: ${issue.reason} ${issue.message}`;
}

export function formatSyncReport(report: SyncReport): string {
  const lines = [
    `Sync complete (${report.mode}${report.clean ? ', clean' : ''}) in ${report.durationMs}ms`,
    `  Remote files: ${report.totalRemoteFiles}`,
    `  Indexed:      ${report.indexed} (${report.added} added, ${report.updated} updated)`,
    `  Skipped:      ${report.skipped}`,
    `  Deleted:      ${report.deleted}`,
  ];

  if (report.clean) {
    lines.push(`  Cleared:      ${report.cleared}`);
  }

  lines.push(`  Failed:       ${report.failed}`, `  Degraded:     ${report.degraded.length}`);

  if (report.failures.length > 0) {
    lines.push('Failures:', ...report.failures.map(formatIssue));
  }
  if (report.degraded.length > 0) {
    lines.push('Indexed without text:', ...report.degraded.map(formatIssue));
  }

  return lines.join('\n');
}

export function formatPlan(preview: PlanPreview): string {
  const { plan } = preview;
  const lines = [
    `Dry run (${preview.mode}): ${preview.totalRemoteFiles} remote files`,
    `  To index:  ${plan.toIndex.length}`,
    ...plan.toIndex.map(({ file, decision }) => `    + ${file.path} [${decision}]`),
    `  Unchanged: ${plan.toSkip.length}`,
    `  To delete: ${plan.toDelete.length}`,
    ...plan.toDelete.map(fileId => `    - ${fileId}`),
  ];

  return lines.join('\n');
}
