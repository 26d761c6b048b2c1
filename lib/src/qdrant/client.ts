/**
 * Qdrant Client
 *
 * Builds the `@qdrant/js-client-rest` client and provides the collection
 * setup used by the create-collection script and the ingestion pipeline.
 */

import { QdrantClient } from '@qdrant/js-client-rest';

import type { QdrantConfig } from './config.js';

export function createQdrantClient(config: QdrantConfig): QdrantClient {
  return new QdrantClient({
    url: config.url,
    apiKey: config.apiKey,
    timeout: config.timeout,
  });
}

// =============================================================================
// Health / Existence
// =============================================================================

export interface ClusterHealthResult {
  healthy: boolean;
  collectionsCount?: number;
  error?: string;
}

export async function checkClusterHealth(client: QdrantClient): Promise<ClusterHealthResult> {
  try {
    const { collections } = await client.getCollections();
    return { healthy: true, collectionsCount: collections.length };
  } catch (error) {
    return { healthy: false, error: error instanceof Error ? error.message : 'Unknown error' };
  }
}

export interface CollectionExistsResult {
  exists: boolean;
  error?: string;
}

export async function collectionExists(
  client: QdrantClient,
  collectionName: string
): Promise<CollectionExistsResult> {
  try {
    const response = await client.collectionExists(collectionName);
    return { exists: response.exists };
  } catch (error) {
    return { exists: false, error: error instanceof Error ? error.message : 'Unknown error' };
  }
}

// =============================================================================
// Collection Setup
// =============================================================================

export interface CreateCollectionResult {
  success: boolean;
  created: boolean;
  error?: string;
}

/**
 * Creates the document collection unless it already exists.
 */
export async function ensureCollection(
  client: QdrantClient,
  config: Pick<QdrantConfig, 'collectionName' | 'vectorSize' | 'distance' | 'onDiskPayload'>
): Promise<CreateCollectionResult> {
  const existing = await collectionExists(client, config.collectionName);
  if (existing.error) {
    return { success: false, created: false, error: existing.error };
  }
  if (existing.exists) {
    return { success: true, created: false };
  }

  try {
    await client.createCollection(config.collectionName, {
      vectors: { size: config.vectorSize, distance: config.distance },
      on_disk_payload: config.onDiskPayload,
    });
    return { success: true, created: true };
  } catch (error) {
    return {
      success: false,
      created: false,
      error: error instanceof Error ? error.message : 'Unknown error',
    };
  }
}

export interface CollectionInfoResult {
  exists: boolean;
  pointsCount?: number;
  vectorSize?: number;
  status?: string;
  error?: string;
}

export async function getCollectionInfo(
  client: QdrantClient,
  collectionName: string
): Promise<CollectionInfoResult> {
  try {
    const info = await client.getCollection(collectionName);
    const vectors = info.config.params.vectors;
    const vectorSize =
      vectors !== undefined && 'size' in vectors && typeof vectors.size === 'number'
        ? vectors.size
        : undefined;

    return {
      exists: true,
      pointsCount: info.points_count ?? 0,
      vectorSize,
      status: info.status,
    };
  } catch (error) {
    return { exists: false, error: error instanceof Error ? error.message : 'Unknown error' };
  }
}

// =============================================================================
// Payload Indexes
// =============================================================================

export interface PayloadIndexField {
  name: string;
  type: 'keyword' | 'integer' | 'float' | 'text';
}

/**
 * Indexes backing the `source` filter (re-ingestion deletes) and the
 * `topic` filter.
 */
export const DOCUMENT_PAYLOAD_INDEXES: PayloadIndexField[] = [
  { name: 'source', type: 'keyword' },
  { name: 'topic', type: 'keyword' },
];

export interface CreatePayloadIndexesResult {
  success: boolean;
  created: string[];
  errors: string[];
}

export async function createPayloadIndexes(
  client: QdrantClient,
  collectionName: string,
  indexes: PayloadIndexField[] = DOCUMENT_PAYLOAD_INDEXES
): Promise<CreatePayloadIndexesResult> {
  const created: string[] = [];
  const errors: string[] = [];

  for (const index of indexes) {
    try {
      await client.createPayloadIndex(collectionName, {
        field_name: index.name,
        field_schema: index.type,
        wait: true,
      });
      created.push(index.name);
    } catch (error) {
      errors.push(`${index.name}: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }

  return { success: errors.length === 0, created, errors };
}

export { QdrantClient };
