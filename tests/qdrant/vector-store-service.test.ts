/**
 * Unit Tests for VectorStoreService
 *
 * The Qdrant client is replaced by an object of vi.fn() methods.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { QdrantClient } from '@qdrant/js-client-rest';
import { VectorStoreService } from '../../lib/src/qdrant/vector-store-service.js';
import {
  type DocumentChunkPayload,
  type VectorPoint,
  VectorStoreError,
  VectorStoreErrorCode,
} from '../../lib/src/qdrant/types.js';

// =============================================================================
// Fixtures
// =============================================================================

function createMockClient() {
  const fns = {
    search: vi.fn(),
    scroll: vi.fn(),
    upsert: vi.fn(),
    delete: vi.fn(),
    count: vi.fn(),
    collectionExists: vi.fn(),
  };
  return { client: fns as unknown as QdrantClient, ...fns };
}

function payload(overrides: Partial<DocumentChunkPayload> = {}): DocumentChunkPayload {
  return {
    chunkId: 'chunk-1',
    content: 'Agents keep short-term memory in the context window.',
    source: 'https://blog.example.com/agents',
    title: 'Agents',
    topic: 'agents',
    chunkIndex: 0,
    ingestedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

function point(id: string, vector: number[]): VectorPoint {
  return { id, vector, payload: payload({ chunkId: id }) };
}

async function codeOf(promise: Promise<unknown>): Promise<string | undefined> {
  const error = await promise.catch((e: unknown) => e);
  return error instanceof VectorStoreError ? error.code : undefined;
}

// =============================================================================
// Tests
// =============================================================================

describe('VectorStoreService', () => {
  let mock: ReturnType<typeof createMockClient>;
  let service: VectorStoreService;

  beforeEach(() => {
    mock = createMockClient();
    service = new VectorStoreService(mock.client, { collectionName: 'docs', vectorDimensions: 3, defaultBatchSize: 2 });
  });

  describe('search', () => {
    it('should query the collection and keep valid payloads', async () => {
      mock.search.mockResolvedValue([
        { id: 'a', version: 1, score: 0.91, payload: payload() },
        { id: 'b', version: 1, score: 0.5, payload: { text: 'written by another tool' } },
      ]);

      const results = await service.search([0.1, 0.2, 0.3], { limit: 2, scoreThreshold: 0.4 });

      expect(mock.search).toHaveBeenCalledWith('docs', {
        vector: [0.1, 0.2, 0.3],
        limit: 2,
        with_payload: true,
        with_vector: false,
        score_threshold: 0.4,
      });
      expect(results).toEqual([{ id: 'a', score: 0.91, payload: payload() }]);
    });

    it('should translate a topic filter', async () => {
      mock.search.mockResolvedValue([]);

      await service.search([1, 2, 3], { filter: { topics: ['agents', 'prompting'], source: 'https://x.example.com' } });

      expect(mock.search.mock.calls[0]?.[1].filter).toEqual({
        must: [
          { key: 'topic', match: { any: ['agents', 'prompting'] } },
          { key: 'source', match: { value: 'https://x.example.com' } },
        ],
      });
    });

    it('should reject a vector of the wrong size', async () => {
      expect(await codeOf(service.search([1, 2]))).toBe(VectorStoreErrorCode.DIMENSION_MISMATCH);
      expect(mock.search).not.toHaveBeenCalled();
    });

    it('should classify client failures', async () => {
      mock.search.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:6333'));
      expect(await codeOf(service.search([1, 2, 3]))).toBe(VectorStoreErrorCode.CONNECTION_ERROR);

      mock.search.mockRejectedValue(new Error('Collection `docs` not found'));
      expect(await codeOf(service.search([1, 2, 3]))).toBe(VectorStoreErrorCode.COLLECTION_NOT_FOUND);

      mock.search.mockRejectedValue(new Error('Request timed out'));
      expect(await codeOf(service.search([1, 2, 3]))).toBe(VectorStoreErrorCode.TIMEOUT);
    });
  });

  describe('scrollPayloads', () => {
    it('should follow page offsets', async () => {
      mock.scroll
        .mockResolvedValueOnce({ points: [{ id: 'a', payload: payload({ topic: 'agents' }) }], next_page_offset: 'a' })
        .mockResolvedValueOnce({ points: [{ id: 'b', payload: payload({ topic: 'prompting' }) }], next_page_offset: null });

      const payloads = await service.scrollPayloads();

      expect(payloads.map((p) => p.topic)).toEqual(['agents', 'prompting']);
      expect(mock.scroll).toHaveBeenCalledTimes(2);
      expect(mock.scroll.mock.calls[1]?.[1]).toEqual({ limit: 256, with_payload: true, with_vector: false, offset: 'a' });
    });

    it('should stop at maxPoints', async () => {
      mock.scroll.mockResolvedValue({
        points: [
          { id: 'a', payload: payload() },
          { id: 'b', payload: payload() },
        ],
        next_page_offset: 'b',
      });

      const payloads = await service.scrollPayloads(undefined, 1);

      expect(payloads).toHaveLength(1);
      expect(mock.scroll).toHaveBeenCalledTimes(1);
    });
  });

  describe('upsertBatch', () => {
    it('should upsert in batches and report progress', async () => {
      mock.upsert.mockResolvedValue({ status: 'completed' });
      const progress: Array<{ current: number; total: number }> = [];

      const result = await service.upsertBatch(
        [point('1', [1, 0, 0]), point('2', [0, 1, 0]), point('3', [0, 0, 1])],
        undefined,
        (p) => progress.push(p)
      );

      expect(result).toEqual({ success: true, totalUpserted: 3, failedCount: 0, errors: [] });
      expect(mock.upsert).toHaveBeenCalledTimes(2);
      expect(progress).toEqual([
        { current: 2, total: 3 },
        { current: 3, total: 3 },
      ]);
    });

    it('should record a failed batch and continue', async () => {
      mock.upsert.mockRejectedValueOnce(new Error('payload too large')).mockResolvedValue({ status: 'completed' });

      const result = await service.upsertBatch([point('1', [1, 0, 0]), point('2', [0, 1, 0]), point('3', [0, 0, 1])]);

      expect(result).toEqual({
        success: false,
        totalUpserted: 1,
        failedCount: 2,
        errors: ['Batch 1: payload too large'],
      });
    });

    it('should check every vector before writing', async () => {
      expect(await codeOf(service.upsertBatch([point('1', [1, 0, 0]), point('2', [1])]))).toBe(
        VectorStoreErrorCode.DIMENSION_MISMATCH
      );
      expect(mock.upsert).not.toHaveBeenCalled();
    });
  });

  describe('deleteBySource', () => {
    it('should delete by a source filter', async () => {
      mock.delete.mockResolvedValue({ status: 'completed' });

      await service.deleteBySource('https://blog.example.com/agents');

      expect(mock.delete).toHaveBeenCalledWith('docs', {
        wait: true,
        filter: { must: [{ key: 'source', match: { value: 'https://blog.example.com/agents' } }] },
      });
    });
  });

  describe('getPointCount / collectionExists', () => {
    it('should count exactly', async () => {
      mock.count.mockResolvedValue({ count: 12 });

      await expect(service.getPointCount({ topic: 'agents' })).resolves.toBe(12);
      expect(mock.count).toHaveBeenCalledWith('docs', {
        exact: true,
        filter: { must: [{ key: 'topic', match: { value: 'agents' } }] },
      });
    });

    it('should report a missing collection', async () => {
      mock.collectionExists.mockResolvedValue({ exists: false });

      await expect(service.collectionExists()).resolves.toBe(false);
    });
  });
});
