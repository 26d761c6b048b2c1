/**
 * LLM Adapters
 *
 * Importing this module registers every adapter with the factory.
 */

export * from './ollama.js';
export * from './anthropic.js';
