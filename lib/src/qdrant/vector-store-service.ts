/**
 * Vector Store Service
 *
 * Search, upsert and delete operations on the document chunk collection.
 */

import type { QdrantClient } from '@qdrant/js-client-rest';

import { collectionExists } from './client.js';
import {
  type BatchUpsertResult,
  type DocumentChunkPayload,
  type SearchFilter,
  type SearchOptionsInput,
  type SearchResult,
  type UpsertOptionsInput,
  type VectorPoint,
  type VectorStoreServiceConfig,
  type VectorStoreServiceConfigInput,
  SearchOptionsSchema,
  UpsertOptionsSchema,
  VectorStoreError,
  VectorStoreErrorCode,
  VectorStoreServiceConfigSchema,
  parseChunkPayload,
} from './types.js';

type QdrantFilter = NonNullable<Parameters<QdrantClient['search']>[1]['filter']>;

type FieldCondition =
  | { key: string; match: { value: string } }
  | { key: string; match: { any: string[] } };

const SCROLL_PAGE_SIZE = 256;

// =============================================================================
// VectorStoreService Class
// =============================================================================

/**
 * @example
 * ```typescript
 * const service = new VectorStoreService(client, { collectionName: 'local_rag_documents' });
 *
 * const results = await service.search(queryVector, {
 *   limit: 4,
 *   filter: { topic: 'prompt engineering' },
 * });
 *
 * await service.deleteBySource('https://example.com/post');
 * ```
 */
export class VectorStoreService {
  private readonly client: QdrantClient;
  private readonly config: VectorStoreServiceConfig;

  constructor(client: QdrantClient, config?: VectorStoreServiceConfigInput) {
    this.client = client;
    this.config = VectorStoreServiceConfigSchema.parse(config ?? {});
  }

  get collectionName(): string {
    return this.config.collectionName;
  }

  // ===========================================================================
  // Search Operations
  // ===========================================================================

  /**
   * Nearest chunks to `queryVector`, best first. Points whose payload does
   * not describe a chunk are dropped.
   *
   * @throws {VectorStoreError}
   */
  async search(queryVector: number[], options?: SearchOptionsInput): Promise<SearchResult[]> {
    const parsed = SearchOptionsSchema.parse(options ?? {});
    this.assertDimensions(queryVector);

    const params: Parameters<QdrantClient['search']>[1] = {
      vector: queryVector,
      limit: parsed.limit,
      with_payload: true,
      with_vector: false,
    };
    if (parsed.scoreThreshold !== undefined) {
      params.score_threshold = parsed.scoreThreshold;
    }
    if (parsed.filter) {
      params.filter = this.buildQdrantFilter(parsed.filter);
    }

    let points: Awaited<ReturnType<QdrantClient['search']>>;
    try {
      points = await this.client.search(this.config.collectionName, params);
    } catch (error) {
      throw this.wrapError(error, 'Search operation failed');
    }

    const results: SearchResult[] = [];
    for (const point of points) {
      const payload = parseChunkPayload(point.payload);
      if (payload) {
        results.push({ id: point.id, score: point.score, payload });
      }
    }
    return results;
  }

  /**
   * Reads every chunk payload matching `filter`, page by page.
   *
   * @throws {VectorStoreError}
   */
  async scrollPayloads(filter?: SearchFilter, maxPoints = Infinity): Promise<DocumentChunkPayload[]> {
    const payloads: DocumentChunkPayload[] = [];
    let offset: string | number | undefined;

    try {
      do {
        const page = await this.client.scroll(this.config.collectionName, {
          limit: SCROLL_PAGE_SIZE,
          with_payload: true,
          with_vector: false,
          ...(filter && { filter: this.buildQdrantFilter(filter) }),
          ...(offset !== undefined && { offset }),
        });

        for (const point of page.points) {
          const payload = parseChunkPayload(point.payload);
          if (payload) payloads.push(payload);
          if (payloads.length >= maxPoints) return payloads;
        }

        const next = page.next_page_offset;
        offset = typeof next === 'string' || typeof next === 'number' ? next : undefined;
      } while (offset !== undefined);
    } catch (error) {
      throw this.wrapError(error, 'Scroll operation failed');
    }

    return payloads;
  }

  // ===========================================================================
  // Upsert Operations
  // ===========================================================================

  /**
   * Upserts in batches. A failed batch is recorded and the rest continue.
   *
   * @throws {VectorStoreError} DIMENSION_MISMATCH before anything is written
   */
  async upsertBatch(
    points: VectorPoint[],
    options?: UpsertOptionsInput,
    onProgress?: (progress: { current: number; total: number }) => void
  ): Promise<BatchUpsertResult> {
    const parsed = UpsertOptionsSchema.parse({
      batchSize: this.config.defaultBatchSize,
      ...options,
    });

    for (const point of points) {
      this.assertDimensions(point.vector);
    }

    const errors: string[] = [];
    let totalUpserted = 0;

    for (let i = 0; i < points.length; i += parsed.batchSize) {
      const batch = points.slice(i, i + parsed.batchSize);

      try {
        await this.client.upsert(this.config.collectionName, {
          wait: parsed.wait,
          points: batch.map((point) => ({
            id: point.id,
            vector: point.vector,
            payload: point.payload,
          })),
        });
        totalUpserted += batch.length;
      } catch (error) {
        const message = error instanceof Error ? error.message : 'Unknown error';
        errors.push(`Batch ${Math.floor(i / parsed.batchSize) + 1}: ${message}`);
      }

      onProgress?.({ current: Math.min(i + parsed.batchSize, points.length), total: points.length });
    }

    return {
      success: errors.length === 0,
      totalUpserted,
      failedCount: points.length - totalUpserted,
      errors,
    };
  }

  // ===========================================================================
  // Delete Operations
  // ===========================================================================

  /**
   * Removes every chunk of one source, so re-ingesting a URL replaces it.
   *
   * @throws {VectorStoreError}
   */
  async deleteBySource(source: string): Promise<void> {
    try {
      await this.client.delete(this.config.collectionName, {
        wait: true,
        filter: this.buildQdrantFilter({ source }),
      });
    } catch (error) {
      throw this.wrapError(error, 'Delete operation failed');
    }
  }

  // ===========================================================================
  // Collection Operations
  // ===========================================================================

  async collectionExists(): Promise<boolean> {
    const result = await collectionExists(this.client, this.config.collectionName);
    return result.exists;
  }

  /**
   * @throws {VectorStoreError}
   */
  async getPointCount(filter?: SearchFilter): Promise<number> {
    try {
      const result = await this.client.count(this.config.collectionName, {
        exact: true,
        ...(filter && { filter: this.buildQdrantFilter(filter) }),
      });
      return result.count;
    } catch (error) {
      throw this.wrapError(error, 'Failed to count points');
    }
  }

  // ===========================================================================
  // Private Helper Methods
  // ===========================================================================

  private assertDimensions(vector: number[]): void {
    if (vector.length !== this.config.vectorDimensions) {
      throw new VectorStoreError(
        `Vector dimension mismatch: expected ${this.config.vectorDimensions}, got ${vector.length}`,
        VectorStoreErrorCode.DIMENSION_MISMATCH
      );
    }
  }

  private buildQdrantFilter(filter: SearchFilter): QdrantFilter {
    const must: FieldCondition[] = [];

    if (filter.topic !== undefined) {
      must.push({ key: 'topic', match: { value: filter.topic } });
    }
    if (filter.topics && filter.topics.length > 0) {
      must.push({ key: 'topic', match: { any: filter.topics } });
    }
    if (filter.source !== undefined) {
      must.push({ key: 'source', match: { value: filter.source } });
    }

    return { must };
  }

  private wrapError(error: unknown, context: string): VectorStoreError {
    if (error instanceof VectorStoreError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const lower = message.toLowerCase();

    let code: VectorStoreErrorCode = VectorStoreErrorCode.UNKNOWN;
    if (lower.includes('timeout') || lower.includes('timed out')) {
      code = VectorStoreErrorCode.TIMEOUT;
    } else if (lower.includes('econnrefused') || lower.includes('fetch failed') || lower.includes('connection')) {
      code = VectorStoreErrorCode.CONNECTION_ERROR;
    } else if (lower.includes('not found') || lower.includes("doesn't exist")) {
      code = VectorStoreErrorCode.COLLECTION_NOT_FOUND;
    } else if (lower.includes('dimension')) {
      code = VectorStoreErrorCode.DIMENSION_MISMATCH;
    }

    return new VectorStoreError(`${context}: ${message}`, code, { cause: error });
  }
}
