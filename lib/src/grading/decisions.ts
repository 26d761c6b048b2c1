/**
 * Decision Labels
 *
 * Closed label sets the graders map model output onto.
 */

import type { Classification } from '../sources/index.js';

export const RouteDecision = {
  USE_LOCAL_STORE: 'USE_LOCAL_STORE',
  USE_WEB_SEARCH: 'USE_WEB_SEARCH',
} as const;

export type RouteDecision = (typeof RouteDecision)[keyof typeof RouteDecision];

export const RelevanceDecision = {
  RELEVANT: 'RELEVANT',
  NOT_RELEVANT: 'NOT_RELEVANT',
} as const;

export type RelevanceDecision = (typeof RelevanceDecision)[keyof typeof RelevanceDecision];

export const GroundingDecision = {
  GROUNDED: 'GROUNDED',
  NOT_GROUNDED: 'NOT_GROUNDED',
} as const;

export type GroundingDecision = (typeof GroundingDecision)[keyof typeof GroundingDecision];

export const AnswerDecision = {
  ADDRESSES_QUESTION: 'ADDRESSES_QUESTION',
  DOES_NOT_ADDRESS: 'DOES_NOT_ADDRESS',
} as const;

export type AnswerDecision = (typeof AnswerDecision)[keyof typeof AnswerDecision];

/** A label plus the model's raw rationale */
export type Decision<D extends string> = Classification<D>;

/** Labels the model is asked to produce */
export const ROUTER_LABELS = ['vectorstore', 'websearch'] as const;
export const BINARY_LABELS = ['yes', 'no'] as const;

export type BinaryLabel = (typeof BINARY_LABELS)[number];
