/**
 * Drive search indexer
 *
 * Service factories shared by the CLI commands, plus the library surface.
 */

import { SearchHandler } from './api/search-handler.js';
import { type AppConfig, requireDriveConfig } from './config.js';
import { DriveClient } from './drive/drive-client.js';
import { ElasticIndexStore } from './elastic/elastic-index-store.js';
import { createDefaultRegistry } from './extractors/index.js';
import { SyncOrchestrator } from './sync/sync-orchestrator.js';
import type { IndexStore } from './types/index-store.js';

export function createIndexStore(config: AppConfig): ElasticIndexStore {
  return new ElasticIndexStore(config.elasticsearch, { maxRetries: config.sync.maxRetries });
}

/**
 * Wire Drive, Elasticsearch and the extractors into an orchestrator.
 * Throws ConfigError when Drive credentials are missing.
 */
export function createSyncOrchestrator(
  config: AppConfig,
  indexStore: IndexStore = createIndexStore(config)
): SyncOrchestrator {
  const drive = requireDriveConfig(config);

  const driveClient = DriveClient.fromJSON(drive.serviceAccountJson, drive.impersonationEmail, {
    maxRetries: config.sync.maxRetries,
  });

  return new SyncOrchestrator(driveClient, indexStore, createDefaultRegistry({ ocr: config.ocr }), {
    rootFolderId: drive.rootFolderId,
    maxConcurrency: config.sync.maxConcurrency,
  });
}

export function createSearchHandler(
  config: AppConfig,
  indexStore: IndexStore = createIndexStore(config)
): SearchHandler {
  return new SearchHandler(indexStore, config.elasticsearch.indexName);
}

export { loadConfig, requireDriveConfig } from './config.js';
export type { AppConfig } from './config.js';
export { SearchHandler } from './api/search-handler.js';
export { DriveClient } from './drive/drive-client.js';
export { ElasticIndexStore } from './elastic/elastic-index-store.js';
export { ExtractorRegistry, createDefaultRegistry } from './extractors/index.js';
export { SyncOrchestrator } from './sync/sync-orchestrator.js';
export { planSync } from './sync/sync-plan.js';
export { startServer, createApp } from './server.js';
export * from './errors/index.js';
export * from './types/index.js';
export type { FileSource } from './types/file-source.js';
export type { IndexStore } from './types/index-store.js';
