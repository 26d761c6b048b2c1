/**
 * Workflow Types
 *
 * States, events and results of the adaptive RAG state machine.
 */

import { z } from 'zod';

import type {
  AnswerDecision,
  GroundingDecision,
  RouteDecision,
} from '../grading/index.js';
import type { Document, DocumentSource } from '../sources/index.js';

// =============================================================================
// States
// =============================================================================

export const WorkflowState = {
  ROUTE: 'ROUTE',
  RETRIEVE: 'RETRIEVE',
  GRADE_DOCS: 'GRADE_DOCS',
  GENERATE: 'GENERATE',
  CHECK_GROUNDING: 'CHECK_GROUNDING',
  CHECK_RELEVANCE: 'CHECK_RELEVANCE',
  RETURN: 'RETURN',
  FAIL: 'FAIL',
} as const;

export type WorkflowStateName = (typeof WorkflowState)[keyof typeof WorkflowState];

export const FailureReason = {
  /** A collaborator failed or timed out */
  ADAPTER_ERROR: 'ADAPTER_ERROR',
  /** Retry budgets ran out without a grounded, on-topic answer */
  ROUTING_EXHAUSTION: 'ROUTING_EXHAUSTION',
  CANCELLED: 'CANCELLED',
} as const;

export type FailureReason = (typeof FailureReason)[keyof typeof FailureReason];

/**
 * A state plus the data that state needs. `forceWeb` skips the router.
 */
export type WorkflowStep =
  | { state: 'ROUTE'; forceWeb: boolean }
  | { state: 'RETRIEVE'; source: DocumentSource }
  | { state: 'GRADE_DOCS'; source: DocumentSource }
  | { state: 'GENERATE' }
  | { state: 'CHECK_GROUNDING' }
  | { state: 'CHECK_RELEVANCE' }
  | { state: 'RETURN' }
  | { state: 'FAIL'; reason: FailureReason };

export type TerminalStep = Extract<WorkflowStep, { state: 'RETURN' | 'FAIL' }>;

export function isTerminal(step: WorkflowStep): step is TerminalStep {
  return step.state === WorkflowState.RETURN || step.state === WorkflowState.FAIL;
}

export const INITIAL_STEP: WorkflowStep = { state: WorkflowState.ROUTE, forceWeb: false };

// =============================================================================
// Events
// =============================================================================

export type WorkflowEvent =
  | { type: 'ROUTED'; decision: RouteDecision }
  | { type: 'DOCUMENTS_FETCHED'; count: number }
  | { type: 'DOCUMENTS_GRADED'; accepted: number; evidenceSize: number }
  | { type: 'ANSWER_GENERATED' }
  | { type: 'GROUNDING_GRADED'; decision: GroundingDecision }
  | { type: 'RELEVANCE_GRADED'; decision: AnswerDecision }
  | { type: 'ADAPTER_FAILED' }
  | { type: 'CANCELLED' };

export type WorkflowEventType = WorkflowEvent['type'];

// =============================================================================
// Counters
// =============================================================================

/**
 * Per-run loop bookkeeping. Counters only ever increase.
 */
export interface LoopState {
  retrievalRetries: number;
  generationRetries: number;
  /** A local retrieval had every document rejected; later routes go to web */
  localExhausted: boolean;
}

export const INITIAL_LOOP_STATE: LoopState = Object.freeze({
  retrievalRetries: 0,
  generationRetries: 0,
  localExhausted: false,
});

export interface RetryLimits {
  maxRetrievalRetries: number;
  maxGenerationRetries: number;
}

export interface TransitionResult {
  next: WorkflowStep;
  loop: LoopState;
}

// =============================================================================
// Results
// =============================================================================

export interface TraceEntry {
  from: WorkflowStateName;
  to: WorkflowStateName;
  event: WorkflowEventType;
  /** Decision label or retrieval source, when the step produced one */
  detail?: string;
}

export interface RunFailure {
  reason: FailureReason;
  message: string;
  /** State the run was in when it failed */
  state: WorkflowStateName;
  cause?: unknown;
}

export const RunStatus = {
  SUCCESS: 'SUCCESS',
  FAILURE: 'FAILURE',
} as const;

export type RunStatus = (typeof RunStatus)[keyof typeof RunStatus];

export interface RunResult {
  status: RunStatus;
  /** On success the accepted answer; on failure the last generated one, if any */
  answer?: string;
  /** Accepted evidence in retrieval order */
  evidence: readonly Document[];
  trace: readonly TraceEntry[];
  failure?: RunFailure;
  retries: { retrieval: number; generation: number };
}

// =============================================================================
// Configuration
// =============================================================================

export const WorkflowConfigSchema = z.object({
  /** Documents taken from the local store per retrieval */
  topK: z.number().int().positive().default(4),
  maxRetrievalRetries: z.number().int().nonnegative().default(2),
  maxGenerationRetries: z.number().int().nonnegative().default(3),
  /** Applies to every collaborator call */
  adapterTimeoutMs: z.number().int().positive().default(60000),
  /** Character budget for the context handed to generation */
  maxEvidenceChars: z.number().int().positive().default(12000),
  /** What the local store covers; read from the store when empty */
  storeTopics: z.array(z.string()).default([]),
});

export type WorkflowConfig = z.infer<typeof WorkflowConfigSchema>;
export type WorkflowConfigInput = z.input<typeof WorkflowConfigSchema>;
