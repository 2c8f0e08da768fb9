import { SyncError, toError } from '../errors/index.js';

export const MIN_LIMIT = 1;
export const MAX_LIMIT = 100;

/**
 * Print a command failure and mark the process as failed
 */
export function reportFailure(error: unknown): void {
  const err = toError(error);
  const code = err instanceof SyncError ? ` [${err.code}]` : '';
  console.error(`Error${code}: ${err.message}`);
  process.exitCode = 1;
}

/**
 * Parse a result limit; undefined when it is not an integer in range
 */
export function parseLimit(value: string): number | undefined {
  if (!/^\d+$/.test(value.trim())) {
    return undefined;
  }
  const limit = Number(value);
  return limit >= MIN_LIMIT && limit <= MAX_LIMIT ? limit : undefined;
}

export function parsePort(value: string): number | undefined {
  if (!/^\d+$/.test(value.trim())) {
    return undefined;
  }
  const port = Number(value);
  return port >= 1 && port <= 65535 ? port : undefined;
}
