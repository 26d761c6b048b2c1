/**
 * LLM Module
 *
 * Chat model adapters used for routing, grading and answer generation.
 */

export * from './types.js';
export * from './errors.js';
export * from './adapter.js';
export * from './factory.js';
export * from './retry.js';
export * from './adapters/index.js';
