/**
 * Per-file processing: fetch, extract, upsert
 */

import { logError, toError } from '../errors/index.js';
import type { ExtractorRegistry } from '../extractors/index.js';
import type { MetricsCollector } from '../monitoring/metrics.js';
import type { FileSource } from '../types/file-source.js';
import type { IndexStore } from '../types/index-store.js';
import type {
  IndexedDocument,
  RemoteFile,
  SyncDegradation,
  SyncFailure,
} from '../types/index.js';
import type { IndexDecision } from './sync-plan.js';

export type FileOutcome =
  | {
      status: 'indexed';
      file: RemoteFile;
      decision: IndexDecision;
      /**
       * Set when the document was indexed with empty text
       */
      degradation?: SyncDegradation;
    }
  | {
      status: 'failed';
      file: RemoteFile;
      decision: IndexDecision;
      failure: SyncFailure;
    };

export function buildDocument(file: RemoteFile, text: string, indexedAt: Date): IndexedDocument {
  return {
    file_id: file.id,
    file_name: file.name,
    file_path: file.path,
    url: file.url,
    mime_type: file.mimeType,
    extracted_text: text,
    updated_time: file.modifiedTime,
    size: file.size,
    indexed_time: indexedAt.toISOString(),
  };
}

export class FilePipeline {
  constructor(
    private fileSource: FileSource,
    private indexStore: IndexStore,
    private registry: ExtractorRegistry,
    private metrics: MetricsCollector,
    private now: () => Date = () => new Date()
  ) {}

  /**
   * Bring one file's document up to date. Never throws; at most one upsert.
   */
  async processFile(file: RemoteFile, decision: IndexDecision): Promise<FileOutcome> {
    console.log(`Processing file: ${file.path} (${file.id})`);

    let data: Uint8Array;
    let contentType: string;
    try {
      this.metrics.recordSourceApiCall();
      ({ data, contentType } = await this.fileSource.fetchContent(file.id));
    } catch (error) {
      return this.fail(file, decision, 'FETCH_FAILED', toError(error));
    }

    const extraction = await this.registry.extract(data, contentType, file.name);
    let text = '';
    let degradation: SyncDegradation | undefined;

    switch (extraction.status) {
      case 'ok':
        text = extraction.text;
        break;
      case 'unsupported':
        degradation = {
          fileId: file.id,
          fileName: file.name,
          reason: 'EXTRACTION_UNSUPPORTED',
          message: `No extractor for content type ${extraction.contentType}`,
        };
        break;
      case 'failed':
        degradation = {
          fileId: file.id,
          fileName: file.name,
          reason: 'EXTRACTION_FAILED',
          message: extraction.error.message,
        };
        break;
    }

    if (degradation) {
      console.warn(`Indexing ${file.name} without text: ${degradation.message}`, {
        fileId: file.id,
        reason: degradation.reason,
      });
    }

    try {
      this.metrics.recordIndexCall();
      await this.indexStore.upsert(buildDocument(file, text, this.now()));
    } catch (error) {
      return this.fail(file, decision, 'INDEX_WRITE_FAILED', toError(error));
    }

    return { status: 'indexed', file, decision, degradation };
  }

  private fail(
    file: RemoteFile,
    decision: IndexDecision,
    reason: SyncFailure['reason'],
    error: Error
  ): FileOutcome {
    logError(error, { fileId: file.id, fileName: file.name, reason });
    this.metrics.recordError(error, { fileId: file.id, reason });

    return {
      status: 'failed',
      file,
      decision,
      failure: { fileId: file.id, fileName: file.name, reason, message: error.message },
    };
  }
}
