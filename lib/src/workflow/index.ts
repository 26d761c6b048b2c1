/**
 * Workflow Module
 *
 * Adaptive RAG state machine: pure transitions, evidence bookkeeping and
 * the orchestrator that runs them.
 */

export * from './types.js';
export * from './transitions.js';
export * from './evidence.js';
export * from './timeout.js';
export * from './orchestrator.js';
export * from './graph.js';
