/**
 * Qdrant Module
 *
 * Client setup and the vector store service for document chunks.
 */

export * from './config.js';
export * from './client.js';
export * from './types.js';
export * from './vector-store-service.js';
