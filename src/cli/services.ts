/**
 * Collaborators the CLI commands build from configuration.
 * Commands receive these explicitly so tests can substitute fakes.
 */

import type { Server } from 'node:http';
import { type AppConfig, type ServerConfig, loadConfig } from '../config.js';
import { createIndexStore, createSearchHandler, createSyncOrchestrator } from '../index.js';
import { type FetchHandler, startServer } from '../server.js';
import type { PlanPreview } from '../sync/sync-orchestrator.js';
import type { IndexStore } from '../types/index-store.js';
import type { SyncMode, SyncOptions, SyncReport } from '../types/index.js';
import { type HealthResponse, type SearchResponse, SearchApiClient } from './api-client.js';

export interface SyncRunner {
  preview(mode: SyncMode, clean?: boolean): Promise<PlanPreview>;
  runSync(options: SyncOptions): Promise<SyncReport>;
}

export interface SearchClient {
  health(): Promise<HealthResponse>;
  search(query: string, limit: number): Promise<SearchResponse>;
}

export interface CliServices {
  loadConfig(): AppConfig;
  createSyncRunner(config: AppConfig): SyncRunner;
  createIndexStore(config: AppConfig): IndexStore;
  createSearchHandler(config: AppConfig): FetchHandler;
  createSearchClient(baseUrl: string): SearchClient;
  startServer(handler: FetchHandler, config: ServerConfig): Promise<Server>;
}

export const defaultServices: CliServices = {
  loadConfig: () => loadConfig(),
  createSyncRunner: config => createSyncOrchestrator(config),
  createIndexStore,
  createSearchHandler: config => createSearchHandler(config),
  createSearchClient: baseUrl => new SearchApiClient(baseUrl),
  startServer,
};
