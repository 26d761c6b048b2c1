/**
 * Embedding Types and Schemas
 *
 * Types for the Ollama embedding model that vectorizes queries and
 * document chunks for the local store.
 */

import { z } from 'zod';

// =============================================================================
// Embedder Configuration
// =============================================================================

export const DEFAULT_EMBEDDING_MODEL = 'nomic-embed-text';

/** Output size of nomic-embed-text */
export const DEFAULT_EMBEDDING_DIMENSIONS = 768;

export const OllamaEmbedderConfigSchema = z.object({
  model: z.string().min(1).default(DEFAULT_EMBEDDING_MODEL),
  baseUrl: z.string().url().default('http://localhost:11434'),
  /** Expected vector length; must match the Qdrant collection */
  dimensions: z.number().int().positive().default(DEFAULT_EMBEDDING_DIMENSIONS),
  /** Texts sent per `/api/embed` request */
  batchSize: z.number().int().positive().max(512).default(32),
  /**
   * Prepend the task prefix (`search_query: ` / `search_document: `) that
   * nomic-embed-text was trained with.
   */
  applyTaskPrefix: z.boolean().default(true),
  /** Cache query embeddings */
  enableCache: z.boolean().default(true),
  maxCacheSize: z.number().int().positive().default(1000),
  /** 0 disables expiry */
  cacheTtlMs: z.number().int().nonnegative().default(0),
  requestTimeoutMs: z.number().int().positive().default(60000),
});

export type OllamaEmbedderConfig = z.infer<typeof OllamaEmbedderConfigSchema>;
export type OllamaEmbedderConfigInput = z.input<typeof OllamaEmbedderConfigSchema>;

// =============================================================================
// Embedding Tasks
// =============================================================================

export const EmbeddingTask = {
  /** A search query */
  QUERY: 'query',
  /** A chunk stored in the index */
  DOCUMENT: 'document',
} as const;

export type EmbeddingTask = (typeof EmbeddingTask)[keyof typeof EmbeddingTask];

export const EmbeddingTaskSchema = z.enum(['query', 'document']);

export const TASK_PREFIXES: Record<EmbeddingTask, string> = {
  [EmbeddingTask.QUERY]: 'search_query: ',
  [EmbeddingTask.DOCUMENT]: 'search_document: ',
};

// =============================================================================
// Embedding Result Types
// =============================================================================

export const EmbeddingResultSchema = z.object({
  embedding: z.array(z.number()),
  dimensions: z.number().int().positive(),
  /** Original text, without the task prefix */
  text: z.string(),
  task: EmbeddingTaskSchema,
  cached: z.boolean(),
});

export type EmbeddingResult = z.infer<typeof EmbeddingResultSchema>;

// =============================================================================
// Error Types
// =============================================================================

export const EmbeddingErrorCode = {
  /** Ollama is not reachable */
  SERVER_UNAVAILABLE: 'SERVER_UNAVAILABLE',
  /** The embedding model has not been pulled */
  MODEL_NOT_FOUND: 'MODEL_NOT_FOUND',
  EMPTY_INPUT: 'EMPTY_INPUT',
  REQUEST_FAILED: 'REQUEST_FAILED',
  TIMEOUT: 'TIMEOUT',
  /** Response body did not match the API */
  INVALID_RESPONSE: 'INVALID_RESPONSE',
  DIMENSION_MISMATCH: 'DIMENSION_MISMATCH',
  ABORTED: 'ABORTED',
  UNKNOWN: 'UNKNOWN',
} as const;

export type EmbeddingErrorCode =
  (typeof EmbeddingErrorCode)[keyof typeof EmbeddingErrorCode];

export class EmbeddingError extends Error {
  readonly code: EmbeddingErrorCode;
  override readonly cause: unknown;

  constructor(message: string, code: EmbeddingErrorCode, options?: { cause?: unknown }) {
    super(message);
    this.name = 'EmbeddingError';
    this.code = code;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EmbeddingError);
    }
  }

  static fromError(error: unknown, code?: EmbeddingErrorCode): EmbeddingError {
    if (error instanceof EmbeddingError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    return new EmbeddingError(message, code ?? EmbeddingErrorCode.UNKNOWN, { cause: error });
  }
}

// =============================================================================
// Utility Functions
// =============================================================================

export function applyTaskPrefix(text: string, task: EmbeddingTask): string {
  return `${TASK_PREFIXES[task]}${text}`;
}

/**
 * @throws {EmbeddingError} DIMENSION_MISMATCH when the vector length differs
 */
export function assertDimensions(embedding: number[], expected: number): void {
  if (embedding.length !== expected) {
    throw new EmbeddingError(
      `Embedding has ${embedding.length} dimensions, expected ${expected}. ` +
        'Check EMBEDDING_DIMENSIONS against the embedding model.',
      EmbeddingErrorCode.DIMENSION_MISMATCH
    );
  }
}
