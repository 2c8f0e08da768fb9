/**
 * Main sync orchestrator
 * Reconciles the search index with the remote file tree
 */

import { SyncError, logError, toError } from '../errors/index.js';
import type { ExtractorRegistry } from '../extractors/index.js';
import { MetricsCollector } from '../monitoring/metrics.js';
import type { FileSource } from '../types/file-source.js';
import type { IndexStore } from '../types/index-store.js';
import {
  SyncDecision,
  SyncDegradation,
  SyncFailure,
  SyncMode,
  SyncOptions,
  SyncReport,
} from '../types/index.js';
import { FileOutcome, FilePipeline } from './file-pipeline.js';
import { PlannedFile, SyncPlan, planSync } from './sync-plan.js';

export interface SyncConfig {
  rootFolderId: string;
  /**
   * Files processed at once; 1 means strictly sequential
   */
  maxConcurrency: number;
}

export interface PlanPreview {
  mode: SyncMode;
  totalRemoteFiles: number;
  plan: SyncPlan;
}

/**
 * Main sync orchestrator
 */
export class SyncOrchestrator {
  private metricsCollector: MetricsCollector;
  private pipeline: FilePipeline;

  constructor(
    private fileSource: FileSource,
    private indexStore: IndexStore,
    registry: ExtractorRegistry,
    private config: SyncConfig,
    private now: () => Date = () => new Date()
  ) {
    this.metricsCollector = new MetricsCollector(() => this.now().getTime());
    this.pipeline = new FilePipeline(fileSource, indexStore, registry, this.metricsCollector, now);
  }

  /**
   * Compute what a run would do, without writing anything
   */
  async preview(mode: SyncMode, clean = false): Promise<PlanPreview> {
    const remoteFiles = await this.fileSource.listFiles(this.config.rootFolderId);
    const indexed = await this.indexStore.listIdsWithTimestamps();
    const plan = planSync(remoteFiles, indexed, clean ? 'full' : mode);

    return { mode, totalRemoteFiles: remoteFiles.length - plan.duplicates.length, plan };
  }

  /**
   * Run one sync pass. Per-file problems are collected in the report;
   * failures to reach the source or the index abort the run.
   */
  async runSync(options: SyncOptions): Promise<SyncReport> {
    const { mode } = options;
    const clean = options.clean ?? false;
    const startedAt = this.now();
    const failures: SyncFailure[] = [];
    const degraded: SyncDegradation[] = [];

    console.log(`Starting ${mode} sync${clean ? ' with clean' : ''}...`);
    this.metricsCollector.start();

    try {
      // 1. Make sure the index exists
      this.metricsCollector.recordIndexCall();
      await this.indexStore.ensureReady();

      // 2. Optionally wipe it; ids it could not delete wait for a later step
      const cleanFailures = new Map<string, SyncFailure>();
      const cleared = clean ? await this.clearIndex(cleanFailures) : 0;

      // 3. Both inventories
      this.metricsCollector.recordSourceApiCall();
      const remoteFiles = await this.fileSource.listFiles(this.config.rootFolderId);
      console.log(`Found ${remoteFiles.length} files`);

      this.metricsCollector.recordIndexCall();
      const indexed = await this.indexStore.listIdsWithTimestamps();

      // 4. Decide per file. After a clean every remote file is reprocessed,
      // including those whose document survived the clean phase.
      const plan = planSync(remoteFiles, indexed, clean ? 'full' : mode);
      const totalRemoteFiles = remoteFiles.length - plan.duplicates.length;
      this.metricsCollector.recordFilesListed(totalRemoteFiles);

      if (plan.duplicates.length > 0) {
        console.warn(`Ignoring ${plan.duplicates.length} duplicate file ids in listing`, {
          duplicates: plan.duplicates,
        });
      }

      console.log(
        `Plan: ${plan.toIndex.length} to index, ${plan.toSkip.length} unchanged, ${plan.toDelete.length} to delete`
      );

      for (let i = 0; i < plan.toSkip.length; i++) {
        this.metricsCollector.recordFileProcessed(SyncDecision.SkipUnchanged);
      }

      // 5. Index new and changed files
      let added = 0;
      let updated = 0;

      for (const outcome of await this.processFiles(plan.toIndex)) {
        cleanFailures.delete(outcome.file.id);

        if (outcome.status === 'failed') {
          failures.push(outcome.failure);
          continue;
        }

        if (outcome.decision === SyncDecision.IndexNew) {
          added++;
        } else {
          updated++;
        }
        this.metricsCollector.recordFileProcessed(outcome.decision);

        if (outcome.degradation) {
          degraded.push(outcome.degradation);
          this.metricsCollector.recordDegraded();
        }
      }

      // 6. Remove documents whose file is gone
      let deleted = 0;

      for (const fileId of plan.toDelete) {
        const failure = await this.deleteDocument(fileId);
        if (!failure) {
          cleanFailures.delete(fileId);
          deleted++;
          this.metricsCollector.recordFileProcessed(SyncDecision.DeleteStale);
        } else if (!cleanFailures.has(fileId)) {
          failures.push(failure);
        }
      }

      // One entry per file: clean-phase failures not resolved later come first
      failures.unshift(...cleanFailures.values());

      const finishedAt = this.now();
      this.metricsCollector.end(true);
      console.log(this.metricsCollector.getSummary());

      if (failures.length > 0) {
        console.warn(`${failures.length} files did not sync and will be retried on the next run`);
      }

      return {
        mode,
        clean,
        startedAt: startedAt.toISOString(),
        finishedAt: finishedAt.toISOString(),
        durationMs: finishedAt.getTime() - startedAt.getTime(),
        totalRemoteFiles,
        indexed: added + updated,
        added,
        updated,
        skipped: plan.toSkip.length,
        deleted,
        cleared,
        failed: failures.length,
        failures,
        degraded,
      };
    } catch (error) {
      const err = toError(error);

      this.metricsCollector.recordError(err);
      this.metricsCollector.end(false);
      console.log(this.metricsCollector.getSummary());

      logError(err, { mode, clean });

      if (err instanceof SyncError) {
        throw err;
      }
      throw new SyncError(`Sync aborted: ${err.message}`, 'SYNC_ABORTED', { mode, clean });
    }
  }

  /**
   * Delete every indexed document, one by one
   */
  private async clearIndex(failures: Map<string, SyncFailure>): Promise<number> {
    this.metricsCollector.recordIndexCall();
    const ids = await this.indexStore.listIdsWithTimestamps();
    console.log(`Clearing ${ids.size} indexed documents`);

    let cleared = 0;
    for (const fileId of ids.keys()) {
      const failure = await this.deleteDocument(fileId);
      if (failure) {
        failures.set(fileId, failure);
      } else {
        cleared++;
        this.metricsCollector.recordCleared();
      }
    }

    return cleared;
  }

  /**
   * Delete one document; resolves to the failure when the store refused
   */
  private async deleteDocument(fileId: string): Promise<SyncFailure | undefined> {
    try {
      this.metricsCollector.recordIndexCall();
      await this.indexStore.delete(fileId);
      return undefined;
    } catch (error) {
      const err = toError(error);
      logError(err, { fileId, reason: 'DELETE_FAILED' });
      this.metricsCollector.recordError(err, { fileId });
      return { fileId, reason: 'DELETE_FAILED', message: err.message };
    }
  }

  /**
   * Run the pipeline over planned files in batches of maxConcurrency
   */
  private async processFiles(planned: PlannedFile[]): Promise<FileOutcome[]> {
    const batchSize = Math.max(1, this.config.maxConcurrency);
    const outcomes: FileOutcome[] = [];

    for (let i = 0; i < planned.length; i += batchSize) {
      const batch = planned.slice(i, i + batchSize);
      // processFile reports failures as outcomes and does not reject
      const results = await Promise.all(
        batch.map(({ file, decision }) => this.pipeline.processFile(file, decision))
      );
      outcomes.push(...results);
    }

    return outcomes;
  }
}
