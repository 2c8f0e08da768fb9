/**
 * Search API endpoints handler
 *
 * Fetch-style handler (Request in, Response out); src/server.ts mounts it on Node.
 */

import { toError } from '../errors/index.js';
import type { IndexStore } from '../types/index-store.js';
import type { SearchHit } from '../types/index.js';
import { buildCorsHeaders } from '../utils/cors.js';

export const SERVICE_NAME = 'Drive Search API';
export const SERVICE_VERSION = '1.0.0';

const DEFAULT_LIMIT = 10;
const MAX_LIMIT = 100;

export interface SearchResult {
  file_id: string;
  file_name: string;
  file_path: string;
  url: string;
  mime_type: string;
  score: number;
  updated_time: string;
  highlights: string[];
}

export interface SearchResponse {
  query: string;
  total_results: number;
  results: SearchResult[];
}

export interface HealthResponse {
  status: 'healthy' | 'unhealthy';
  elasticsearch_connected: boolean;
  index_name: string;
}

export interface StatsResponse {
  total_documents: number;
  index_name: string;
}

function toSearchResult(hit: SearchHit): SearchResult {
  return {
    file_id: hit.file_id,
    file_name: hit.file_name,
    file_path: hit.file_path,
    url: hit.url,
    mime_type: hit.mime_type,
    score: Math.round(hit.score * 100) / 100,
    updated_time: hit.updated_time,
    highlights: hit.highlights,
  };
}

/**
 * Search API request handler
 */
export class SearchHandler {
  constructor(
    private indexStore: IndexStore,
    private indexName: string
  ) {}

  /**
   * Handle search API requests
   */
  async handleRequest(request: Request): Promise<Response> {
    const url = new URL(request.url);
    const path = url.pathname;

    if (request.method === 'OPTIONS') {
      return new Response(null, { status: 204, headers: buildCorsHeaders(request) });
    }

    const routes: Record<string, () => Promise<Response>> = {
      '/': async () => this.handleRoot(request),
      '/health': () => this.handleHealth(request),
      '/search': () => this.handleSearch(request, url),
      '/stats': () => this.handleStats(request),
    };

    const route = routes[path];
    if (!route) {
      return this.jsonResponse(request, { error: 'Not found', path }, 404);
    }

    if (request.method !== 'GET') {
      return this.jsonResponse(request, { error: 'Method not allowed', path }, 405);
    }

    try {
      return await route();
    } catch (error) {
      const err = toError(error);
      console.error('Search API error:', { path, error: err.message });
      return this.jsonResponse(
        request,
        {
          error: 'Internal server error',
          message: err.message,
        },
        500
      );
    }
  }

  /**
   * Handle GET /
   */
  private handleRoot(request: Request): Response {
    return this.jsonResponse(request, {
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      endpoints: {
        search: '/search?q=<query>&limit=<optional_limit>',
        health: '/health',
        stats: '/stats',
      },
    });
  }

  /**
   * Handle GET /health
   */
  private async handleHealth(request: Request): Promise<Response> {
    const connected = await this.indexStore.ping();
    const body: HealthResponse = {
      status: connected ? 'healthy' : 'unhealthy',
      elasticsearch_connected: connected,
      index_name: this.indexName,
    };

    return this.jsonResponse(request, body);
  }

  /**
   * Handle GET /search
   */
  private async handleSearch(request: Request, url: URL): Promise<Response> {
    const query = url.searchParams.get('q')?.trim() ?? '';
    if (!query) {
      return this.jsonResponse(request, { error: 'Missing query parameter q' }, 400);
    }

    const limitParam = url.searchParams.get('limit');
    const limit = limitParam === null ? DEFAULT_LIMIT : Number(limitParam);

    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIMIT) {
      return this.jsonResponse(request, { error: `Invalid limit parameter (1-${MAX_LIMIT})` }, 400);
    }

    let hits: SearchHit[];
    try {
      hits = await this.indexStore.search(query, limit);
    } catch (error) {
      const err = toError(error);
      console.error('Search failed:', { query, error: err.message });
      return this.jsonResponse(request, { error: 'Search failed', detail: err.message }, 500);
    }

    const body: SearchResponse = {
      query,
      total_results: hits.length,
      results: hits.map(toSearchResult),
    };

    return this.jsonResponse(request, body);
  }

  /**
   * Handle GET /stats
   */
  private async handleStats(request: Request): Promise<Response> {
    const body: StatsResponse = {
      total_documents: await this.indexStore.count(),
      index_name: this.indexName,
    };

    return this.jsonResponse(request, body);
  }

  /**
   * Create JSON response with CORS headers
   */
  private jsonResponse(request: Request, data: unknown, status: number = 200): Response {
    return new Response(JSON.stringify(data, null, 2), {
      status,
      headers: {
        'Content-Type': 'application/json',
        ...buildCorsHeaders(request),
      },
    });
  }
}
