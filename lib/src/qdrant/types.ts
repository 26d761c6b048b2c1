/**
 * Qdrant Vector Store Types
 *
 * Payload, search, upsert and delete types for the VectorStoreService.
 */

import { z } from 'zod';

// =============================================================================
// Vector Store Error Types
// =============================================================================

export const VectorStoreErrorCode = {
  CONNECTION_ERROR: 'CONNECTION_ERROR',
  COLLECTION_NOT_FOUND: 'COLLECTION_NOT_FOUND',
  DIMENSION_MISMATCH: 'DIMENSION_MISMATCH',
  INVALID_FILTER: 'INVALID_FILTER',
  TIMEOUT: 'TIMEOUT',
  UNKNOWN: 'UNKNOWN',
} as const;

export type VectorStoreErrorCode =
  (typeof VectorStoreErrorCode)[keyof typeof VectorStoreErrorCode];

export class VectorStoreError extends Error {
  readonly code: VectorStoreErrorCode;
  override readonly cause: unknown;

  constructor(message: string, code: VectorStoreErrorCode, options?: { cause?: unknown }) {
    super(message);
    this.name = 'VectorStoreError';
    this.code = code;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, VectorStoreError);
    }
  }

  static fromError(error: unknown, code?: VectorStoreErrorCode): VectorStoreError {
    if (error instanceof VectorStoreError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    return new VectorStoreError(message, code ?? VectorStoreErrorCode.UNKNOWN, { cause: error });
  }
}

// =============================================================================
// Point/Vector Types
// =============================================================================

/**
 * Payload stored with every document chunk.
 */
export const DocumentChunkPayloadSchema = z.object({
  chunkId: z.string(),
  content: z.string(),
  /** URL (or path) the chunk was loaded from */
  source: z.string(),
  title: z.string().optional(),
  /** Coarse subject label used for routing and filtering */
  topic: z.string().optional(),
  chunkIndex: z.number().int().nonnegative(),
  /** ISO timestamp */
  ingestedAt: z.string(),
});

export type DocumentChunkPayload = z.infer<typeof DocumentChunkPayloadSchema>;

export interface VectorPoint {
  /** UUID */
  id: string;
  vector: number[];
  payload: DocumentChunkPayload;
}

// =============================================================================
// Search Types
// =============================================================================

export const SearchFilterSchema = z.object({
  topic: z.string().optional(),
  topics: z.array(z.string()).optional(),
  source: z.string().optional(),
});

export type SearchFilter = z.infer<typeof SearchFilterSchema>;

export const SearchOptionsSchema = z.object({
  limit: z.number().int().positive().default(4),
  /** Minimum similarity (0-1 for cosine) */
  scoreThreshold: z.number().min(0).max(1).optional(),
  filter: SearchFilterSchema.optional(),
});

export type SearchOptions = z.infer<typeof SearchOptionsSchema>;
export type SearchOptionsInput = z.input<typeof SearchOptionsSchema>;

export interface SearchResult {
  id: string | number;
  score: number;
  payload: DocumentChunkPayload;
}

// =============================================================================
// Upsert / Delete Types
// =============================================================================

export const UpsertOptionsSchema = z.object({
  /** Wait for the write to be applied before returning */
  wait: z.boolean().default(true),
  batchSize: z.number().int().positive().default(100),
});

export type UpsertOptionsInput = z.input<typeof UpsertOptionsSchema>;

export interface BatchUpsertResult {
  success: boolean;
  totalUpserted: number;
  failedCount: number;
  errors: string[];
}

// =============================================================================
// Service Configuration
// =============================================================================

export const VectorStoreServiceConfigSchema = z.object({
  collectionName: z.string().default('local_rag_documents'),
  vectorDimensions: z.number().int().positive().default(768),
  defaultBatchSize: z.number().int().positive().default(100),
});

export type VectorStoreServiceConfig = z.infer<typeof VectorStoreServiceConfigSchema>;
export type VectorStoreServiceConfigInput = z.input<typeof VectorStoreServiceConfigSchema>;

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Validates a payload read back from Qdrant. Points written by other tools
 * may not match; those are skipped by callers.
 */
export function parseChunkPayload(
  payload: Record<string, unknown> | null | undefined
): DocumentChunkPayload | undefined {
  const parsed = DocumentChunkPayloadSchema.safeParse(payload);
  return parsed.success ? parsed.data : undefined;
}
