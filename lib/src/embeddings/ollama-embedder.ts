/**
 * Ollama Embedder
 *
 * Vectorizes queries and document chunks through Ollama's `/api/embed`
 * endpoint. Query vectors are cached; document vectors are produced in
 * batches during ingestion and never looked up twice.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';

import { createSilentLogger, type Logger } from '../logging/index.js';
import { EmbeddingCache, generateCacheKey, type CacheStats } from './cache.js';
import {
  type EmbeddingResult,
  type OllamaEmbedderConfig,
  type OllamaEmbedderConfigInput,
  EmbeddingError,
  EmbeddingErrorCode,
  EmbeddingTask,
  OllamaEmbedderConfigSchema,
  applyTaskPrefix,
  assertDimensions,
} from './types.js';

const EmbedResponseSchema = z.object({
  model: z.string().optional(),
  embeddings: z.array(z.array(z.number())),
});

export interface EmbedOptions {
  signal?: AbortSignal | undefined;
}

export interface OllamaEmbedderDependencies {
  http?: AxiosInstance;
  logger?: Logger;
}

/**
 * @example
 * ```typescript
 * const embedder = new OllamaEmbedder({ model: 'nomic-embed-text', dimensions: 768 });
 * const { embedding } = await embedder.embedQuery('What is agent memory?');
 * const chunks = await embedder.embedDocuments(['first chunk', 'second chunk']);
 * ```
 */
export class OllamaEmbedder {
  private readonly config: OllamaEmbedderConfig;
  private readonly http: AxiosInstance;
  private readonly logger: Logger;
  private readonly cache: EmbeddingCache | null;

  constructor(config?: OllamaEmbedderConfigInput, deps: OllamaEmbedderDependencies = {}) {
    this.config = OllamaEmbedderConfigSchema.parse(config ?? {});
    this.http =
      deps.http ??
      axios.create({
        baseURL: this.config.baseUrl,
        timeout: this.config.requestTimeoutMs,
        headers: { 'Content-Type': 'application/json' },
      });
    this.logger = deps.logger ?? createSilentLogger();
    this.cache = this.config.enableCache
      ? new EmbeddingCache({ maxSize: this.config.maxCacheSize, ttlMs: this.config.cacheTtlMs })
      : null;
  }

  get model(): string {
    return this.config.model;
  }

  get dimensions(): number {
    return this.config.dimensions;
  }

  /**
   * @throws {EmbeddingError}
   */
  async embedQuery(text: string, options: EmbedOptions = {}): Promise<EmbeddingResult> {
    const query = text.trim();
    if (!query) {
      throw new EmbeddingError('Cannot embed an empty query', EmbeddingErrorCode.EMPTY_INPUT);
    }

    const key = generateCacheKey(this.config.model, EmbeddingTask.QUERY, query);
    const cached = this.cache?.get(key);
    if (cached) {
      return this.toResult(cached, query, EmbeddingTask.QUERY, true);
    }

    const [embedding] = await this.request([this.prefix(query, EmbeddingTask.QUERY)], options);
    if (!embedding) {
      throw new EmbeddingError('Ollama returned no embedding', EmbeddingErrorCode.INVALID_RESPONSE);
    }

    this.cache?.set(key, embedding);
    return this.toResult(embedding, query, EmbeddingTask.QUERY, false);
  }

  /**
   * Embeds chunks in batches of `batchSize`, preserving input order.
   *
   * @throws {EmbeddingError}
   */
  async embedDocuments(texts: string[], options: EmbedOptions = {}): Promise<EmbeddingResult[]> {
    if (texts.some((t) => !t.trim())) {
      throw new EmbeddingError('Cannot embed an empty document', EmbeddingErrorCode.EMPTY_INPUT);
    }

    const results: EmbeddingResult[] = [];
    for (let start = 0; start < texts.length; start += this.config.batchSize) {
      const batch = texts.slice(start, start + this.config.batchSize);
      const vectors = await this.request(
        batch.map((t) => this.prefix(t, EmbeddingTask.DOCUMENT)),
        options
      );

      if (vectors.length !== batch.length) {
        throw new EmbeddingError(
          `Ollama returned ${vectors.length} embeddings for ${batch.length} inputs`,
          EmbeddingErrorCode.INVALID_RESPONSE
        );
      }

      batch.forEach((text, i) => {
        const vector = vectors[i];
        if (vector) {
          results.push(this.toResult(vector, text, EmbeddingTask.DOCUMENT, false));
        }
      });

      this.logger.debug('Embedded document batch', {
        done: Math.min(start + batch.length, texts.length),
        total: texts.length,
      });
    }

    return results;
  }

  getCacheStats(): CacheStats | null {
    return this.cache?.getStats() ?? null;
  }

  clearCache(): void {
    this.cache?.clear();
  }

  // ===========================================================================
  // Private Helper Methods
  // ===========================================================================

  private prefix(text: string, task: EmbeddingTask): string {
    return this.config.applyTaskPrefix ? applyTaskPrefix(text, task) : text;
  }

  private toResult(
    embedding: number[],
    text: string,
    task: EmbeddingTask,
    cached: boolean
  ): EmbeddingResult {
    return { embedding, dimensions: embedding.length, text, task, cached };
  }

  private async request(input: string[], options: EmbedOptions): Promise<number[][]> {
    let data: unknown;
    try {
      const response = await this.http.post<unknown>(
        '/api/embed',
        { model: this.config.model, input },
        { signal: options.signal }
      );
      data = response.data;
    } catch (error) {
      throw this.handleError(error);
    }

    const parsed = EmbedResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new EmbeddingError('Unexpected /api/embed response', EmbeddingErrorCode.INVALID_RESPONSE, {
        cause: parsed.error,
      });
    }

    for (const vector of parsed.data.embeddings) {
      assertDimensions(vector, this.config.dimensions);
    }
    return parsed.data.embeddings;
  }

  private handleError(error: unknown): EmbeddingError {
    if (axios.isCancel(error)) {
      return new EmbeddingError('Embedding request aborted', EmbeddingErrorCode.ABORTED, { cause: error });
    }

    if (axios.isAxiosError(error)) {
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new EmbeddingError(`Embedding request timed out: ${error.message}`, EmbeddingErrorCode.TIMEOUT, {
          cause: error,
        });
      }

      const status = error.response?.status;
      if (status === undefined) {
        return new EmbeddingError(
          `Cannot reach Ollama at ${this.config.baseUrl}: ${error.message}`,
          EmbeddingErrorCode.SERVER_UNAVAILABLE,
          { cause: error }
        );
      }
      if (status === 404) {
        return new EmbeddingError(
          `Embedding model '${this.config.model}' not found (ollama pull ${this.config.model})`,
          EmbeddingErrorCode.MODEL_NOT_FOUND,
          { cause: error }
        );
      }
      return new EmbeddingError(`Embedding request failed with status ${status}`, EmbeddingErrorCode.REQUEST_FAILED, {
        cause: error,
      });
    }

    return EmbeddingError.fromError(error);
  }
}

export function createOllamaEmbedder(
  config?: OllamaEmbedderConfigInput,
  deps?: OllamaEmbedderDependencies
): OllamaEmbedder {
  return new OllamaEmbedder(config, deps);
}
