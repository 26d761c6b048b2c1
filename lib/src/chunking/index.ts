/**
 * Chunking Module
 *
 * Splits loaded pages into overlapping chunks for embedding.
 */

export * from './types.js';
export * from './text-splitter.js';
