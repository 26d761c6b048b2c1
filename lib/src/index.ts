/**
 * Local Adaptive RAG - Shared Library
 *
 * Everything the API handler and the scripts build on.
 */

// Logging
export * from './logging/index.js';

// Configuration (environment variables)
export * from './config/index.js';

// LLM (Language Model Adapters)
export * from './llm/index.js';

// Embeddings (Ollama)
export * from './embeddings/index.js';

// Qdrant (Vector Database)
export * from './qdrant/index.js';

// Chunking (Recursive Text Splitting)
export * from './chunking/index.js';

// Ingestion (Web Pages into the Vector Store)
export * from './ingestion/index.js';

// Knowledge Sources (Document Store, Web Search, Language Model)
export * from './sources/index.js';

// Grading (Router, Graders, Generation)
export * from './grading/index.js';

// Workflow (Adaptive RAG State Machine)
export * from './workflow/index.js';

// Runtime (Composition Root)
export * from './runtime/index.js';
