/**
 * Common interface for search index backends
 *
 * The orchestrator and the query surfaces depend on this interface,
 * so an alternative backend can be dropped in without touching them.
 */

import type { IndexedDocument, SearchHit } from './index.js';

export interface IndexStore {
  /**
   * Verify connectivity and create the index with its mapping if missing
   */
  ensureReady(): Promise<void>;

  /**
   * Insert or replace the document keyed by its file_id
   */
  upsert(document: IndexedDocument): Promise<void>;

  /**
   * Delete a document; deleting an absent id is a no-op
   */
  delete(fileId: string): Promise<void>;

  /**
   * Every indexed file_id mapped to its stored updated_time
   */
  listIdsWithTimestamps(): Promise<Map<string, string>>;

  /**
   * Full-text query with highlighted excerpts, best match first
   */
  search(query: string, limit: number): Promise<SearchHit[]>;

  /**
   * Number of indexed documents
   */
  count(): Promise<number>;

  /**
   * Whether the backend answers at all
   */
  ping(): Promise<boolean>;
}
