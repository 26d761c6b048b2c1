/**
 * Workflow Transitions
 *
 * Pure transition function of the adaptive RAG state machine. All control
 * flow of a run is decided here from the current step, the event the step
 * produced and the loop counters.
 */

import { AnswerDecision, GroundingDecision, RouteDecision } from '../grading/index.js';
import { DocumentSource } from '../sources/index.js';
import {
  type LoopState,
  type RetryLimits,
  type TransitionResult,
  type WorkflowEvent,
  type WorkflowStep,
  FailureReason,
  WorkflowState,
  isTerminal,
} from './types.js';

// =============================================================================
// Errors
// =============================================================================

/**
 * Raised for an event the current step cannot produce. Indicates a bug in
 * the caller, never a runtime condition.
 */
export class InvalidTransitionError extends Error {
  readonly step: WorkflowStep;
  readonly event: WorkflowEvent;

  constructor(step: WorkflowStep, event: WorkflowEvent) {
    super(`No transition from ${step.state} on ${event.type}`);
    this.name = 'InvalidTransitionError';
    this.step = step;
    this.event = event;
    Error.captureStackTrace(this, this.constructor);
  }
}

// =============================================================================
// Transition Function
// =============================================================================

function fail(reason: FailureReason, loop: LoopState): TransitionResult {
  return { next: { state: WorkflowState.FAIL, reason }, loop };
}

/**
 * Next step for `event` observed in `step`.
 *
 * Retry counters are compared with `<` against their limits before being
 * incremented, so a limit of N allows exactly N retries.
 *
 * @throws {InvalidTransitionError} When `step` is terminal or cannot emit `event`
 *
 * @example
 * ```typescript
 * const { next } = transition(
 *   { state: 'CHECK_GROUNDING' },
 *   { type: 'GROUNDING_GRADED', decision: 'GROUNDED' },
 *   INITIAL_LOOP_STATE,
 *   { maxRetrievalRetries: 2, maxGenerationRetries: 3 }
 * );
 * // next => { state: 'CHECK_RELEVANCE' }
 * ```
 */
export function transition(
  step: WorkflowStep,
  event: WorkflowEvent,
  loop: LoopState,
  limits: RetryLimits
): TransitionResult {
  if (isTerminal(step)) {
    throw new InvalidTransitionError(step, event);
  }

  if (event.type === 'ADAPTER_FAILED') {
    return fail(FailureReason.ADAPTER_ERROR, loop);
  }
  if (event.type === 'CANCELLED') {
    return fail(FailureReason.CANCELLED, loop);
  }

  switch (step.state) {
    case WorkflowState.ROUTE: {
      if (event.type !== 'ROUTED') break;
      const source =
        step.forceWeb || event.decision === RouteDecision.USE_WEB_SEARCH
          ? DocumentSource.WEB
          : DocumentSource.LOCAL;
      return { next: { state: WorkflowState.RETRIEVE, source }, loop };
    }

    case WorkflowState.RETRIEVE:
      if (event.type !== 'DOCUMENTS_FETCHED') break;
      return { next: { state: WorkflowState.GRADE_DOCS, source: step.source }, loop };

    case WorkflowState.GRADE_DOCS: {
      if (event.type !== 'DOCUMENTS_GRADED') break;
      const graded: LoopState = {
        ...loop,
        localExhausted: loop.localExhausted || (step.source === DocumentSource.LOCAL && event.accepted === 0),
      };
      if (event.evidenceSize > 0) {
        return { next: { state: WorkflowState.GENERATE }, loop: graded };
      }
      if (step.source === DocumentSource.LOCAL && graded.retrievalRetries < limits.maxRetrievalRetries) {
        return {
          next: { state: WorkflowState.ROUTE, forceWeb: true },
          loop: { ...graded, retrievalRetries: graded.retrievalRetries + 1 },
        };
      }
      return fail(FailureReason.ROUTING_EXHAUSTION, graded);
    }

    case WorkflowState.GENERATE:
      if (event.type !== 'ANSWER_GENERATED') break;
      return { next: { state: WorkflowState.CHECK_GROUNDING }, loop };

    case WorkflowState.CHECK_GROUNDING:
      if (event.type !== 'GROUNDING_GRADED') break;
      if (event.decision === GroundingDecision.GROUNDED) {
        return { next: { state: WorkflowState.CHECK_RELEVANCE }, loop };
      }
      if (loop.generationRetries < limits.maxGenerationRetries) {
        return {
          next: { state: WorkflowState.GENERATE },
          loop: { ...loop, generationRetries: loop.generationRetries + 1 },
        };
      }
      return fail(FailureReason.ROUTING_EXHAUSTION, loop);

    case WorkflowState.CHECK_RELEVANCE:
      if (event.type !== 'RELEVANCE_GRADED') break;
      if (event.decision === AnswerDecision.ADDRESSES_QUESTION) {
        return { next: { state: WorkflowState.RETURN }, loop };
      }
      if (loop.retrievalRetries < limits.maxRetrievalRetries) {
        return {
          next: { state: WorkflowState.ROUTE, forceWeb: loop.localExhausted },
          loop: { ...loop, retrievalRetries: loop.retrievalRetries + 1 },
        };
      }
      return fail(FailureReason.ROUTING_EXHAUSTION, loop);
  }

  throw new InvalidTransitionError(step, event);
}

/**
 * Upper bound on the number of steps any run can execute under `limits`.
 * Each routing round costs three steps (route, retrieve, grade) and each
 * generation attempt at most three (generate, two checks).
 */
export function maxWorkflowSteps(limits: RetryLimits): number {
  const rounds = limits.maxRetrievalRetries + 1;
  const generations = limits.maxGenerationRetries + rounds;
  return 3 * rounds + 3 * generations;
}
