/**
 * Qdrant Configuration
 *
 * Connection and collection settings for the local vector store, read from
 * environment variables. A local Qdrant needs no API key; Qdrant Cloud does.
 */

import { z } from 'zod';

import { parseOptionalInt } from '../config/env.js';

export const QdrantConfigSchema = z.object({
  /** e.g. http://localhost:6333 or a Qdrant Cloud cluster URL */
  url: z.string().url().min(1),

  /** Only needed for Qdrant Cloud */
  apiKey: z.string().min(1).optional(),

  collectionName: z.string().min(1).default('local_rag_documents'),

  /** Must match the embedding model's output size */
  vectorSize: z.number().int().positive().default(768),

  distance: z.enum(['Cosine', 'Euclid', 'Dot']).default('Cosine'),

  onDiskPayload: z.boolean().default(true),

  /** Request timeout in milliseconds */
  timeout: z.number().int().positive().default(30000),
});

export type QdrantConfig = z.infer<typeof QdrantConfigSchema>;

export const DEFAULT_QDRANT_CONFIG = {
  url: 'http://localhost:6333',
  collectionName: 'local_rag_documents',
  vectorSize: 768, // nomic-embed-text
  distance: 'Cosine' as const,
  onDiskPayload: true,
  timeout: 30000,
} as const;

/**
 * Loads Qdrant configuration from the environment.
 *
 * - QDRANT_URL (default http://localhost:6333)
 * - QDRANT_API_KEY (optional)
 * - QDRANT_COLLECTION_NAME (default local_rag_documents)
 * - EMBEDDING_DIMENSIONS (default 768)
 * - QDRANT_TIMEOUT (default 30000)
 *
 * @throws {z.ZodError} If a variable is set to an invalid value
 */
export function loadQdrantConfig(env: NodeJS.ProcessEnv = process.env): QdrantConfig {
  return QdrantConfigSchema.parse({
    url: env['QDRANT_URL'] || DEFAULT_QDRANT_CONFIG.url,
    apiKey: env['QDRANT_API_KEY'] || undefined,
    collectionName: env['QDRANT_COLLECTION_NAME'] || DEFAULT_QDRANT_CONFIG.collectionName,
    vectorSize: parseOptionalInt(env['EMBEDDING_DIMENSIONS']) ?? DEFAULT_QDRANT_CONFIG.vectorSize,
    distance: DEFAULT_QDRANT_CONFIG.distance,
    onDiskPayload: DEFAULT_QDRANT_CONFIG.onDiskPayload,
    timeout: parseOptionalInt(env['QDRANT_TIMEOUT']) ?? DEFAULT_QDRANT_CONFIG.timeout,
  });
}

/**
 * Checks the Qdrant variables without throwing.
 */
export function validateQdrantEnv(env: NodeJS.ProcessEnv = process.env): {
  isValid: boolean;
  errors: string[];
} {
  const errors: string[] = [];

  const url = env['QDRANT_URL'];
  if (url) {
    try {
      new URL(url);
    } catch {
      errors.push('QDRANT_URL is not a valid URL');
    }
  }

  const dimensions = env['EMBEDDING_DIMENSIONS'];
  if (dimensions && !/^\d+$/.test(dimensions.trim())) {
    errors.push('EMBEDDING_DIMENSIONS must be a positive integer');
  }

  return { isValid: errors.length === 0, errors };
}
