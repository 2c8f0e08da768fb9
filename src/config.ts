/**
 * Application configuration
 *
 * Built once from the environment (after .env is loaded) and passed
 * explicitly into the clients and the orchestrator.
 */

import { z } from 'zod';
import { ConfigError } from './errors/index.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(value => value === 'true' || value === '1' || value === 'yes');

const EnvSchema = z.object({
  GOOGLE_SERVICE_ACCOUNT_JSON: z.string().min(1).optional(),
  GOOGLE_IMPERSONATION_EMAIL: z.string().email().optional(),
  GOOGLE_ROOT_FOLDER_ID: z.string().min(1).optional(),

  ELASTICSEARCH_URL: z.string().url().default('http://localhost:9200'),
  ELASTICSEARCH_API_KEY: z.string().min(1).optional(),
  ELASTICSEARCH_INDEX: z.string().min(1).default('documents'),

  API_HOST: z.string().min(1).default('0.0.0.0'),
  API_PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  SEARCH_API_URL: z.string().url().default('http://localhost:8000'),

  MAX_CONCURRENCY: z.coerce.number().int().min(1).default(1),
  MAX_RETRIES: z.coerce.number().int().min(1).default(3),

  OCR_ENABLED: booleanFlag.default('false'),
  OCR_LANGUAGE: z.string().min(1).default('eng'),
});

export interface DriveConfig {
  serviceAccountJson: string;
  impersonationEmail?: string;
  rootFolderId: string;
}

export interface ElasticsearchConfig {
  url: string;
  apiKey?: string;
  indexName: string;
}

export interface ServerConfig {
  host: string;
  port: number;
}

export interface SyncSettings {
  maxConcurrency: number;
  maxRetries: number;
}

export interface OcrConfig {
  enabled: boolean;
  language: string;
}

export interface AppConfig {
  /**
   * Absent unless Google credentials are configured; only sync needs it
   */
  drive?: DriveConfig;
  elasticsearch: ElasticsearchConfig;
  server: ServerConfig;
  searchApiUrl: string;
  sync: SyncSettings;
  ocr: OcrConfig;
}

/**
 * Parse and validate configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings from .env files mean "unset"
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const result = EnvSchema.safeParse(cleaned);

  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }

  const parsed = result.data;

  return {
    drive:
      parsed.GOOGLE_SERVICE_ACCOUNT_JSON && parsed.GOOGLE_ROOT_FOLDER_ID
        ? {
            serviceAccountJson: parsed.GOOGLE_SERVICE_ACCOUNT_JSON,
            impersonationEmail: parsed.GOOGLE_IMPERSONATION_EMAIL,
            rootFolderId: parsed.GOOGLE_ROOT_FOLDER_ID,
          }
        : undefined,
    elasticsearch: {
      url: parsed.ELASTICSEARCH_URL,
      apiKey: parsed.ELASTICSEARCH_API_KEY,
      indexName: parsed.ELASTICSEARCH_INDEX,
    },
    server: {
      host: parsed.API_HOST,
      port: parsed.API_PORT,
    },
    searchApiUrl: parsed.SEARCH_API_URL,
    sync: {
      maxConcurrency: parsed.MAX_CONCURRENCY,
      maxRetries: parsed.MAX_RETRIES,
    },
    ocr: {
      enabled: parsed.OCR_ENABLED,
      language: parsed.OCR_LANGUAGE,
    },
  };
}

/**
 * Drive settings, or a ConfigError naming what is missing
 */
export function requireDriveConfig(config: AppConfig): DriveConfig {
  if (!config.drive) {
    throw new ConfigError(
      'Google Drive is not configured: set GOOGLE_SERVICE_ACCOUNT_JSON and GOOGLE_ROOT_FOLDER_ID'
    );
  }

  return config.drive;
}
