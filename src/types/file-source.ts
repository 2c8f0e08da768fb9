/**
 * Capability interface for the remote document store.
 * The orchestrator is written against this interface only.
 */

import type { RemoteFile } from './index.js';

/**
 * Raw file content together with the type it was actually delivered as
 * (exported Workspace documents differ from their listed type)
 */
export interface FetchedContent {
  data: Uint8Array;
  contentType: string;
}

export interface FileSource {
  /**
   * Recursively list every file under the root. Exhaustive; order not guaranteed.
   */
  listFiles(rootId: string): Promise<RemoteFile[]>;

  /**
   * Fetch raw content. Rejects with a FileSourceError describing the failure kind.
   */
  fetchContent(fileId: string): Promise<FetchedContent>;
}
