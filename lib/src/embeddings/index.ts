/**
 * Embeddings Module
 *
 * Query and document embeddings from a local Ollama model.
 */

export * from './types.js';
export * from './cache.js';
export * from './ollama-embedder.js';
