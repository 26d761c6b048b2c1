/**
 * Knowledge Sources Module
 *
 * Document store, web search and language model capabilities used by the
 * workflow, with their concrete adapters.
 */

export * from './types.js';
export * from './errors.js';
export * from './topics.js';
export * from './language-model.js';
export * from './document-store.js';
export * from './web-search.js';
