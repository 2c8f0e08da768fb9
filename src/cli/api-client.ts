/**
 * HTTP client for the search API, used by the search command
 */

import { z } from 'zod';
import { toError } from '../errors/index.js';

export type ApiErrorCode = 'HTTP_ERROR' | 'VALIDATION_ERROR' | 'NETWORK_ERROR' | 'TIMEOUT';

export class ApiError extends Error {
  constructor(
    message: string,
    public readonly code: ApiErrorCode,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export const SearchResultSchema = z.object({
  file_id: z.string().optional(),
  file_name: z.string(),
  file_path: z.string(),
  url: z.string(),
  mime_type: z.string(),
  score: z.number(),
  updated_time: z.string(),
  highlights: z.array(z.string()).default([]),
});

export const SearchResponseSchema = z.object({
  query: z.string(),
  total_results: z.number().int().nonnegative(),
  results: z.array(SearchResultSchema),
});

export const HealthResponseSchema = z.object({
  status: z.string(),
  elasticsearch_connected: z.boolean(),
  index_name: z.string(),
});

export type SearchResult = z.infer<typeof SearchResultSchema>;
export type SearchResponse = z.infer<typeof SearchResponseSchema>;
export type HealthResponse = z.infer<typeof HealthResponseSchema>;

const ErrorBodySchema = z.object({
  error: z.string().optional(),
  detail: z.string().optional(),
  message: z.string().optional(),
});

function errorMessageFrom(payload: unknown, status: number): string {
  const parsed = ErrorBodySchema.safeParse(payload);
  if (parsed.success) {
    const { error, detail, message } = parsed.data;
    const parts = [error, detail ?? message].filter(Boolean);
    if (parts.length > 0) {
      return `API returned status ${status}: ${parts.join(': ')}`;
    }
  }
  return `API returned status ${status}`;
}

function parseBody(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * Fetch a URL and validate its JSON body
 */
export async function fetchJson<T>(
  url: URL,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  timeoutMs: number
): Promise<T> {
  let response: Response;
  try {
    response = await fetch(url, {
      headers: { Accept: 'application/json' },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    const err = toError(error);
    if (err.name === 'TimeoutError' || err.name === 'AbortError') {
      throw new ApiError(`Request to ${url.origin} timed out`, 'TIMEOUT');
    }
    throw new ApiError(`Could not connect to search API at ${url.origin}`, 'NETWORK_ERROR');
  }

  const payload = parseBody(await response.text());

  if (!response.ok) {
    throw new ApiError(errorMessageFrom(payload, response.status), 'HTTP_ERROR', response.status);
  }

  const result = schema.safeParse(payload);
  if (!result.success) {
    const issues = result.error.issues.map(
      issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ApiError(`Invalid API response format: ${issues.join(', ')}`, 'VALIDATION_ERROR');
  }

  return result.data;
}

export class SearchApiClient {
  private static readonly HEALTH_TIMEOUT_MS = 2_000;
  private static readonly REQUEST_TIMEOUT_MS = 10_000;

  constructor(private baseUrl: string) {}

  private url(path: string): URL {
    return new URL(path, this.baseUrl.endsWith('/') ? this.baseUrl : `${this.baseUrl}/`);
  }

  async health(): Promise<HealthResponse> {
    return fetchJson(
      this.url('health'),
      HealthResponseSchema,
      SearchApiClient.HEALTH_TIMEOUT_MS
    );
  }

  async search(query: string, limit: number): Promise<SearchResponse> {
    const url = this.url('search');
    url.searchParams.set('q', query);
    url.searchParams.set('limit', String(limit));

    return fetchJson(url, SearchResponseSchema, SearchApiClient.REQUEST_TIMEOUT_MS);
  }
}
