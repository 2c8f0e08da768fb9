/**
 * Custom error classes and error handling utilities
 */

/**
 * Base error class for domain errors
 */
export class SyncError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SyncError';
  }
}

/**
 * Drive API related errors (listing, authentication)
 */
export class DriveError extends SyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'DRIVE_ERROR', context);
    this.name = 'DriveError';
  }
}

/**
 * Distinguishes permanent from retryable content fetch failures
 */
export type FileSourceErrorKind = 'NOT_FOUND' | 'PERMISSION_DENIED' | 'TRANSIENT_IO';

/**
 * Content fetch failure for a single file
 */
export class FileSourceError extends SyncError {
  constructor(
    message: string,
    public readonly kind: FileSourceErrorKind,
    context?: Record<string, unknown>
  ) {
    super(message, 'FILE_SOURCE_ERROR', { kind, ...context });
    this.name = 'FileSourceError';
  }

  get retryable(): boolean {
    return this.kind === 'TRANSIENT_IO';
  }
}

/**
 * Text extraction errors (corrupt or unparseable content)
 */
export class ExtractionError extends SyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'EXTRACTION_ERROR', context);
    this.name = 'ExtractionError';
  }
}

/**
 * Search index backend errors
 */
export class IndexStoreError extends SyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INDEX_STORE_ERROR', context);
    this.name = 'IndexStoreError';
  }
}

/**
 * Invalid or missing configuration
 */
export class ConfigError extends SyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigError';
  }
}

/**
 * Retry configuration
 */
export interface RetryConfig {
  maxRetries: number;
  delayMs: number;
  exponentialBackoff?: boolean;
  /**
   * Return false to give up immediately on an error that retrying cannot fix
   */
  shouldRetry?: (error: Error) => boolean;
}

/**
 * Retry a function with exponential backoff
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = { maxRetries: 3, delayMs: 1000, exponentialBackoff: true }
): Promise<T> {
  let lastError: Error = new Error('Retry attempts exhausted');
  const attempts = Math.max(1, config.maxRetries);

  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = toError(error);

      if (config.shouldRetry && !config.shouldRetry(lastError)) {
        break;
      }

      // Don't retry on last attempt
      if (attempt === attempts - 1) {
        break;
      }

      const delay = config.exponentialBackoff
        ? config.delayMs * Math.pow(2, attempt)
        : config.delayMs;

      console.warn(`Attempt ${attempt + 1}/${attempts} failed. Retrying in ${delay}ms...`, {
        error: lastError.message,
      });

      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }

  throw lastError;
}

/**
 * Log structured error
 */
export function logError(error: Error, context?: Record<string, unknown>): void {
  const errorData: Record<string, unknown> = {
    name: error.name,
    message: error.message,
    stack: error.stack,
    timestamp: new Date().toISOString(),
    ...context,
  };

  if (error instanceof SyncError) {
    errorData.code = error.code;
    errorData.context = error.context;
  }

  console.error('Error occurred:', JSON.stringify(errorData, null, 2));
}

/**
 * Normalize anything thrown into an Error instance
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }

  if (typeof value === 'string') {
    return new Error(value);
  }

  if (
    typeof value === 'object' &&
    value !== null &&
    'message' in value &&
    typeof value.message === 'string'
  ) {
    return new Error(value.message);
  }

  return new Error(`Unknown error: ${String(value)}`);
}
