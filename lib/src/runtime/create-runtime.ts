/**
 * Runtime
 *
 * Composition root shared by the API handler and the scripts: builds the
 * concrete adapters from an `AppConfig` and wires them into the
 * orchestrator and the ingestion service.
 */

import type { AppConfig } from '../config/index.js';
import { OllamaEmbedder } from '../embeddings/index.js';
import { IngestionService, WebPageLoader } from '../ingestion/index.js';
import { type LLMAdapter, createLLMAdapter } from '../llm/index.js';
import { type Logger, createLogger } from '../logging/index.js';
import { type QdrantClient, VectorStoreService, createQdrantClient } from '../qdrant/index.js';
import {
  type WebSearch,
  AdapterLanguageModel,
  QdrantDocumentStore,
  TavilyWebSearch,
  UnavailableWebSearch,
} from '../sources/index.js';
import { AdaptiveRAGOrchestrator } from '../workflow/index.js';

export interface Runtime {
  config: AppConfig;
  logger: Logger;
  qdrant: QdrantClient;
  vectorStore: VectorStoreService;
  embedder: OllamaEmbedder;
  documentStore: QdrantDocumentStore;
  webSearch: WebSearch;
  llm: LLMAdapter;
  orchestrator: AdaptiveRAGOrchestrator;
  ingestion: IngestionService;
}

export interface RuntimeOptions {
  logger?: Logger;
}

/**
 * @example
 * ```typescript
 * const runtime = createRuntime(loadAppConfig());
 * const result = await runtime.orchestrator.run('What is prompt engineering?');
 * ```
 */
export function createRuntime(config: AppConfig, options: RuntimeOptions = {}): Runtime {
  const logger = options.logger ?? createLogger('rag');

  const qdrant = createQdrantClient(config.qdrant);
  const vectorStore = new VectorStoreService(qdrant, {
    collectionName: config.qdrant.collectionName,
    vectorDimensions: config.qdrant.vectorSize,
  });
  const embedder = new OllamaEmbedder(config.embedding, { logger: logger.child('embeddings') });
  const documentStore = new QdrantDocumentStore(embedder, vectorStore);

  const webSearch: WebSearch = config.webSearch
    ? new TavilyWebSearch(config.webSearch)
    : new UnavailableWebSearch();
  if (!config.webSearch) {
    logger.warn('TAVILY_API_KEY is not set; web search is disabled');
  }

  const llm = createLLMAdapter(config.llm);
  const orchestrator = new AdaptiveRAGOrchestrator(
    {
      documentStore,
      webSearch,
      model: new AdapterLanguageModel(llm),
      topicsProvider: () => documentStore.getTopics(),
      logger: logger.child('workflow'),
    },
    config.workflow
  );

  const ingestion = new IngestionService({
    loader: new WebPageLoader(),
    embedder,
    vectorStore,
    logger: logger.child('ingestion'),
  });

  return { config, logger, qdrant, vectorStore, embedder, documentStore, webSearch, llm, orchestrator, ingestion };
}
