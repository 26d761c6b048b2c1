/**
 * Qdrant Document Store
 *
 * Local knowledge source: embeds the query with the Ollama embedder and
 * searches the chunk collection.
 */

import type { EmbedOptions, EmbeddingResult } from '../embeddings/index.js';
import type { SearchFilter, VectorStoreService } from '../qdrant/index.js';
import { AdapterKind, toAdapterError } from './errors.js';
import {
  type CallOptions,
  type Document,
  type DocumentStore,
  DocumentSource,
  createDocument,
} from './types.js';

export interface QueryEmbedder {
  embedQuery(text: string, options?: EmbedOptions): Promise<EmbeddingResult>;
}

export type ChunkIndex = Pick<VectorStoreService, 'search' | 'scrollPayloads'>;

export interface QdrantDocumentStoreOptions {
  /** Restricts every search, e.g. to a set of topics */
  filter?: SearchFilter;
  scoreThreshold?: number;
}

/** One ingested source and how many chunks it contributed */
export interface StoredSource {
  source: string;
  title?: string;
  topic?: string;
  chunkCount: number;
}

export class QdrantDocumentStore implements DocumentStore {
  private readonly embedder: QueryEmbedder;
  private readonly index: ChunkIndex;
  private readonly options: QdrantDocumentStoreOptions;

  constructor(embedder: QueryEmbedder, index: ChunkIndex, options: QdrantDocumentStoreOptions = {}) {
    this.embedder = embedder;
    this.index = index;
    this.options = options;
  }

  /**
   * @throws {RetrievalError}
   */
  async search(query: string, k: number, options: CallOptions = {}): Promise<Document[]> {
    try {
      const { embedding } = await this.embedder.embedQuery(query, { signal: options.signal });
      const results = await this.index.search(embedding, {
        limit: k,
        ...(this.options.filter && { filter: this.options.filter }),
        ...(this.options.scoreThreshold !== undefined && { scoreThreshold: this.options.scoreThreshold }),
      });

      return results.map(({ id, score, payload }) => {
        const metadata: Record<string, string> = {
          score: String(score),
          chunkId: payload.chunkId || String(id),
          url: payload.source,
        };
        if (payload.title) metadata['title'] = payload.title;
        if (payload.topic) metadata['topic'] = payload.topic;
        return createDocument(payload.content, DocumentSource.LOCAL, metadata);
      });
    } catch (error) {
      throw toAdapterError(error, AdapterKind.RETRIEVAL, 'Local document search failed');
    }
  }

  /**
   * Distinct sources in the store, sorted by URL.
   *
   * @throws {RetrievalError}
   */
  async listContents(): Promise<StoredSource[]> {
    let payloads: Awaited<ReturnType<ChunkIndex['scrollPayloads']>>;
    try {
      payloads = await this.index.scrollPayloads(this.options.filter);
    } catch (error) {
      throw toAdapterError(error, AdapterKind.RETRIEVAL, 'Listing stored documents failed');
    }

    const bySource = new Map<string, StoredSource>();
    for (const payload of payloads) {
      const existing = bySource.get(payload.source);
      if (existing) {
        existing.chunkCount++;
        continue;
      }
      const entry: StoredSource = { source: payload.source, chunkCount: 1 };
      if (payload.title) entry.title = payload.title;
      if (payload.topic) entry.topic = payload.topic;
      bySource.set(payload.source, entry);
    }

    return [...bySource.values()].sort((a, b) => a.source.localeCompare(b.source));
  }

  /**
   * Distinct topics, sorted. Used to tell the router what the store covers.
   *
   * @throws {RetrievalError}
   */
  async getTopics(): Promise<string[]> {
    const contents = await this.listContents();
    const topics = new Set<string>();
    for (const entry of contents) {
      if (entry.topic) topics.add(entry.topic);
    }
    return [...topics].sort((a, b) => a.localeCompare(b));
  }
}
