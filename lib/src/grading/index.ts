/**
 * Grading Module
 *
 * Router, retrieval grader, hallucination grader, answer grader and answer
 * generation.
 */

export * from './decisions.js';
export * from './prompts.js';
export * from './graders.js';
