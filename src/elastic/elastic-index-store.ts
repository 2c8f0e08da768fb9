/**
 * Elasticsearch-backed index store
 *
 * One document per Drive file, keyed by file_id. Full-text search runs
 * over the extracted text, name and path with highlighted excerpts.
 */

import { Client } from '@elastic/elasticsearch';
import type { estypes } from '@elastic/elasticsearch';
import { IndexStoreError, toError } from '../errors/index.js';
import type { ElasticsearchConfig } from '../config.js';
import type { IndexStore } from '../types/index-store.js';
import type { IndexedDocument, SearchHit } from '../types/index.js';

const SCROLL_KEEP_ALIVE = '2m';
const SCROLL_PAGE_SIZE = 1000;

export const INDEX_MAPPINGS: estypes.MappingTypeMapping = {
  properties: {
    file_id: { type: 'keyword' },
    file_name: { type: 'text', fields: { keyword: { type: 'keyword' } } },
    file_path: { type: 'text', fields: { keyword: { type: 'keyword' } } },
    url: { type: 'keyword' },
    mime_type: { type: 'keyword' },
    extracted_text: { type: 'text' },
    updated_time: { type: 'date' },
    indexed_time: { type: 'date' },
    size: { type: 'long' },
  },
};

export const INDEX_SETTINGS: estypes.IndicesIndexSettings = {
  number_of_shards: 1,
  number_of_replicas: 0,
};

export interface ElasticIndexStoreOptions {
  /**
   * Transport-level retries for failed requests
   */
  maxRetries?: number;
}

/**
 * Status code carried by an Elasticsearch ResponseError, if any
 */
export function statusCodeOf(error: unknown): number | undefined {
  if (
    typeof error === 'object' &&
    error !== null &&
    'meta' in error &&
    typeof error.meta === 'object' &&
    error.meta !== null &&
    'statusCode' in error.meta &&
    typeof error.meta.statusCode === 'number'
  ) {
    return error.meta.statusCode;
  }
  return undefined;
}

const isNotFound = (error: unknown): boolean => statusCodeOf(error) === 404;

/**
 * Elasticsearch client wrapper implementing IndexStore
 */
export class ElasticIndexStore implements IndexStore {
  private client: Client;
  private indexName: string;

  constructor(config: ElasticsearchConfig, options: ElasticIndexStoreOptions = {}, client?: Client) {
    this.client =
      client ??
      new Client({
        node: config.url,
        auth: config.apiKey ? { apiKey: config.apiKey } : undefined,
        maxRetries: options.maxRetries ?? 3,
      });
    this.indexName = config.indexName;
  }

  get index(): string {
    return this.indexName;
  }

  async ping(): Promise<boolean> {
    try {
      return await this.client.ping();
    } catch (error) {
      console.warn('Elasticsearch ping failed', { error: toError(error).message });
      return false;
    }
  }

  /**
   * Check connectivity and create the index with its mapping if missing
   */
  async ensureReady(): Promise<void> {
    if (!(await this.ping())) {
      throw new IndexStoreError('Cannot connect to Elasticsearch', { indexName: this.indexName });
    }

    try {
      const exists = await this.client.indices.exists({ index: this.indexName });

      if (exists) {
        return;
      }

      await this.client.indices.create({
        index: this.indexName,
        settings: INDEX_SETTINGS,
        mappings: INDEX_MAPPINGS,
      });

      console.log(`Index ${this.indexName} created successfully`);
    } catch (error) {
      throw new IndexStoreError('Failed to initialize index', {
        indexName: this.indexName,
        error: toError(error).message,
      });
    }
  }

  async upsert(document: IndexedDocument): Promise<void> {
    try {
      await this.client.index({
        index: this.indexName,
        id: document.file_id,
        document,
        refresh: 'wait_for',
      });
    } catch (error) {
      throw new IndexStoreError('Failed to index document', {
        fileId: document.file_id,
        error: toError(error).message,
      });
    }
  }

  async delete(fileId: string): Promise<void> {
    try {
      await this.client.delete({ index: this.indexName, id: fileId, refresh: 'wait_for' });
    } catch (error) {
      if (isNotFound(error)) {
        return;
      }
      throw new IndexStoreError('Failed to delete document', {
        fileId,
        error: toError(error).message,
      });
    }
  }

  /**
   * Scroll through every document, reading only updated_time
   */
  async listIdsWithTimestamps(): Promise<Map<string, string>> {
    const result = new Map<string, string>();
    let scrollId: string | undefined;

    try {
      let response = await this.client.search<Pick<IndexedDocument, 'updated_time'>>({
        index: this.indexName,
        scroll: SCROLL_KEEP_ALIVE,
        size: SCROLL_PAGE_SIZE,
        _source: ['updated_time'],
        query: { match_all: {} },
      });

      while (response.hits.hits.length > 0) {
        scrollId = response._scroll_id;

        for (const hit of response.hits.hits) {
          if (hit._id && hit._source) {
            result.set(hit._id, hit._source.updated_time);
          }
        }

        if (!scrollId) {
          break;
        }

        response = await this.client.scroll<Pick<IndexedDocument, 'updated_time'>>({
          scroll_id: scrollId,
          scroll: SCROLL_KEEP_ALIVE,
        });
      }

      scrollId = response._scroll_id ?? scrollId;
      return result;
    } catch (error) {
      if (isNotFound(error)) {
        return result;
      }
      throw new IndexStoreError('Failed to list indexed documents', {
        indexName: this.indexName,
        error: toError(error).message,
      });
    } finally {
      if (scrollId) {
        await this.clearScroll(scrollId);
      }
    }
  }

  private async clearScroll(scrollId: string): Promise<void> {
    try {
      await this.client.clearScroll({ scroll_id: scrollId });
    } catch (error) {
      // The scroll context expires on its own after the keep-alive
      console.warn('Failed to clear scroll context', { error: toError(error).message });
    }
  }

  async search(query: string, limit: number): Promise<SearchHit[]> {
    try {
      const response = await this.client.search<IndexedDocument>({
        index: this.indexName,
        size: limit,
        query: {
          multi_match: {
            query,
            fields: ['extracted_text', 'file_name^2', 'file_path'],
            type: 'best_fields',
            fuzziness: 'AUTO',
          },
        },
        highlight: {
          fields: {
            extracted_text: { fragment_size: 150, number_of_fragments: 3 },
          },
        },
        _source: ['file_id', 'file_name', 'file_path', 'url', 'mime_type', 'updated_time'],
      });

      return response.hits.hits.map(hit => ({
        file_id: hit._source?.file_id ?? hit._id ?? '',
        file_name: hit._source?.file_name ?? '',
        file_path: hit._source?.file_path ?? '',
        url: hit._source?.url ?? '',
        mime_type: hit._source?.mime_type ?? '',
        score: hit._score ?? 0,
        updated_time: hit._source?.updated_time ?? '',
        highlights: hit.highlight?.extracted_text ?? [],
      }));
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw new IndexStoreError('Search failed', {
        query,
        error: toError(error).message,
      });
    }
  }

  async count(): Promise<number> {
    try {
      const response = await this.client.count({ index: this.indexName });
      return response.count;
    } catch (error) {
      if (isNotFound(error)) {
        return 0;
      }
      throw new IndexStoreError('Failed to count documents', {
        indexName: this.indexName,
        error: toError(error).message,
      });
    }
  }
}
