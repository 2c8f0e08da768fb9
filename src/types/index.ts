/**
 * Core type definitions for the sync system
 */

/**
 * One file as seen at the source, captured at listing time
 */
export interface RemoteFile {
  readonly id: string;
  readonly name: string;
  /**
   * Slash-separated path relative to the sync root (root folder name excluded)
   */
  readonly path: string;
  readonly mimeType: string;
  readonly size: number;
  /**
   * ISO-8601 timestamp on the source clock
   */
  readonly modifiedTime: string;
  readonly url: string;
}

/**
 * Document record persisted in the search index.
 * Field names are read by the query surfaces; keep them stable.
 */
export interface IndexedDocument {
  file_id: string;
  file_name: string;
  file_path: string;
  url: string;
  mime_type: string;
  extracted_text: string;
  updated_time: string;
  size: number;
  indexed_time: string;
}

export type SyncMode = 'full' | 'incremental';

export interface SyncOptions {
  mode: SyncMode;
  /**
   * Delete every indexed document before processing
   */
  clean?: boolean;
}

export enum SyncDecision {
  IndexNew = 'INDEX_NEW',
  IndexUpdated = 'INDEX_UPDATED',
  SkipUnchanged = 'SKIP_UNCHANGED',
  DeleteStale = 'DELETE_STALE',
}

export type FailureReason = 'FETCH_FAILED' | 'INDEX_WRITE_FAILED' | 'DELETE_FAILED';

export type DegradationReason = 'EXTRACTION_UNSUPPORTED' | 'EXTRACTION_FAILED';

export interface FileIssue<R extends string> {
  fileId: string;
  fileName?: string;
  reason: R;
  message: string;
}

export type SyncFailure = FileIssue<FailureReason>;

export type SyncDegradation = FileIssue<DegradationReason>;

/**
 * Aggregate outcome of one sync run
 */
export interface SyncReport {
  mode: SyncMode;
  clean: boolean;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  totalRemoteFiles: number;
  indexed: number;
  added: number;
  updated: number;
  skipped: number;
  deleted: number;
  cleared: number;
  failed: number;
  failures: SyncFailure[];
  degraded: SyncDegradation[];
}

/**
 * Ranked search result returned by the index store
 */
export interface SearchHit {
  file_id: string;
  file_name: string;
  file_path: string;
  url: string;
  mime_type: string;
  score: number;
  updated_time: string;
  highlights: string[];
}
