/**
 * Ingestion Module
 *
 * Loads web pages into the local vector store.
 */

export * from './types.js';
export * from './html.js';
export * from './loader.js';
export * from './ingestion-service.js';
