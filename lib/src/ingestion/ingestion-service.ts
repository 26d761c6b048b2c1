/**
 * Ingestion Service
 *
 * Loads pages, splits them into chunks, embeds the chunks and writes them to
 * the vector store. Re-ingesting a URL first deletes its previous chunks.
 */

import { randomUUID } from 'node:crypto';

import { splitText, type TextSplitterConfigInput } from '../chunking/index.js';
import type { EmbeddingResult } from '../embeddings/index.js';
import { createSilentLogger, type Logger } from '../logging/index.js';
import type { VectorPoint, VectorStoreService } from '../qdrant/index.js';
import {
  type IngestionResult,
  type IngestionSource,
  type IngestionSummary,
  type LoadedPage,
  IngestionSourceSchema,
} from './types.js';

export interface PageLoader {
  load(url: string): Promise<LoadedPage>;
}

export interface DocumentEmbedder {
  embedDocuments(texts: string[]): Promise<EmbeddingResult[]>;
}

export type ChunkWriter = Pick<VectorStoreService, 'deleteBySource' | 'upsertBatch'>;

export interface IngestionServiceDependencies {
  loader: PageLoader;
  embedder: DocumentEmbedder;
  vectorStore: ChunkWriter;
  logger?: Logger;
  splitter?: TextSplitterConfigInput;
  /** Injected for tests */
  now?: () => Date;
}

export class IngestionService {
  private readonly loader: PageLoader;
  private readonly embedder: DocumentEmbedder;
  private readonly vectorStore: ChunkWriter;
  private readonly logger: Logger;
  private readonly splitter: TextSplitterConfigInput | undefined;
  private readonly now: () => Date;

  constructor(deps: IngestionServiceDependencies) {
    this.loader = deps.loader;
    this.embedder = deps.embedder;
    this.vectorStore = deps.vectorStore;
    this.logger = deps.logger ?? createSilentLogger();
    this.splitter = deps.splitter;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Ingests each source in turn. One failing URL does not stop the others.
   */
  async ingestUrls(sources: IngestionSource[]): Promise<IngestionSummary> {
    const results: IngestionResult[] = [];

    for (const source of sources) {
      results.push(await this.ingestOne(source));
    }

    const succeeded = results.filter((r) => r.success).length;
    return {
      results,
      succeeded,
      failed: results.length - succeeded,
      totalChunks: results.reduce((sum, r) => sum + r.chunkCount, 0),
    };
  }

  private async ingestOne(input: IngestionSource): Promise<IngestionResult> {
    const parsed = IngestionSourceSchema.safeParse(input);
    if (!parsed.success) {
      const error = parsed.error.errors.map((e) => e.message).join(', ');
      this.logger.warn('Skipping invalid source', { url: input.url, error });
      return { url: input.url, success: false, chunkCount: 0, error };
    }

    const { url, topic } = parsed.data;
    try {
      const page = await this.loader.load(url);
      const chunks = splitText(page.text, this.splitter);
      const embeddings = await this.embedder.embedDocuments(chunks.map((c) => c.content));
      const ingestedAt = this.now().toISOString();

      const points: VectorPoint[] = chunks.flatMap((chunk, i) => {
        const embedding = embeddings[i];
        if (!embedding) return [];
        const chunkId = randomUUID();
        return [
          {
            id: chunkId,
            vector: embedding.embedding,
            payload: {
              chunkId,
              content: chunk.content,
              source: url,
              chunkIndex: chunk.index,
              ingestedAt,
              ...(page.title !== undefined && { title: page.title }),
              ...(topic !== undefined && { topic }),
            },
          },
        ];
      });

      await this.vectorStore.deleteBySource(url);
      const upsert = await this.vectorStore.upsertBatch(points);
      if (!upsert.success) {
        throw new Error(upsert.errors.join('; '));
      }

      this.logger.info('Ingested page', { url, topic, chunks: points.length });
      return { url, success: true, chunkCount: points.length };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error('Failed to ingest page', error, { url });
      return { url, success: false, chunkCount: 0, error: message };
    }
  }
}
