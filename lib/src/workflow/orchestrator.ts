/**
 * Adaptive RAG Orchestrator
 *
 * Drives one question through the workflow: routes it, retrieves and grades
 * documents, generates an answer and checks it, looping back through the
 * pure `transition` function until a terminal state.
 */

import {
  type Decision,
  AnswerDecision,
  GroundingDecision,
  RelevanceDecision,
  RouteDecision,
  gradeAnswer,
  gradeDocument,
  gradeGrounding,
  generateAnswer,
  routeQuery,
} from '../grading/index.js';
import { createSilentLogger, type Logger } from '../logging/index.js';
import {
  type Document,
  type DocumentStore,
  type LanguageModel,
  type WebSearch,
  AdapterErrorCode,
  AdapterKind,
  DocumentSource,
  createAdapterError,
  formatStoreTopics,
  isAdapterError,
  toAdapterError,
} from '../sources/index.js';
import { EvidenceSet, buildContext } from './evidence.js';
import { withTimeout } from './timeout.js';
import { maxWorkflowSteps, transition } from './transitions.js';
import {
  type LoopState,
  type RetryLimits,
  type RunFailure,
  type RunResult,
  type TraceEntry,
  type WorkflowConfig,
  type WorkflowConfigInput,
  type WorkflowEvent,
  type WorkflowStateName,
  type WorkflowStep,
  FailureReason,
  INITIAL_LOOP_STATE,
  INITIAL_STEP,
  RunStatus,
  WorkflowConfigSchema,
  WorkflowState,
  isTerminal,
} from './types.js';

// =============================================================================
// Dependencies
// =============================================================================

/** Supplies the local store's topics when none are configured */
export type TopicsProvider = (options: { signal: AbortSignal }) => Promise<readonly string[]>;

export interface OrchestratorDependencies {
  documentStore: DocumentStore;
  webSearch: WebSearch;
  model: LanguageModel;
  topicsProvider?: TopicsProvider;
  logger?: Logger;
}

export interface RunOptions {
  signal?: AbortSignal;
}

/** Mutable per-run data threaded through the steps */
interface RunContext {
  readonly query: string;
  readonly evidence: EvidenceSet;
  readonly signal: AbortSignal | undefined;
  /** Documents fetched by the last retrieval that still need grading */
  pending: Document[];
  /** Context the current answer was generated from */
  context: string;
  answer?: string;
  storeTopics?: string;
}

interface StepOutcome {
  event: WorkflowEvent;
  detail?: string;
}

// =============================================================================
// Orchestrator
// =============================================================================

export class AdaptiveRAGOrchestrator {
  private readonly deps: OrchestratorDependencies;
  private readonly config: WorkflowConfig;
  private readonly limits: RetryLimits;
  private readonly logger: Logger;

  constructor(dependencies: OrchestratorDependencies, config: WorkflowConfigInput = {}) {
    this.deps = dependencies;
    this.config = WorkflowConfigSchema.parse(config);
    this.limits = {
      maxRetrievalRetries: this.config.maxRetrievalRetries,
      maxGenerationRetries: this.config.maxGenerationRetries,
    };
    this.logger = dependencies.logger ?? createSilentLogger();
  }

  getConfig(): Readonly<WorkflowConfig> {
    return this.config;
  }

  /**
   * Answers `query`. Never throws for adapter failures, exhausted budgets or
   * cancellation; those end the run with a FAILURE result. Cancellation is
   * checked before each step, so a call already under way completes and its
   * answer is kept.
   *
   * @example
   * ```typescript
   * const result = await orchestrator.run('What is agent memory?');
   * if (result.status === 'SUCCESS') {
   *   console.log(result.answer);
   * }
   * ```
   */
  async run(query: string, options: RunOptions = {}): Promise<RunResult> {
    const ctx: RunContext = {
      query,
      evidence: new EvidenceSet(),
      signal: options.signal,
      pending: [],
      context: '',
    };
    const trace: TraceEntry[] = [];
    const stepLimit = maxWorkflowSteps(this.limits);

    let step: WorkflowStep = INITIAL_STEP;
    let loop: LoopState = INITIAL_LOOP_STATE;
    let lastState: WorkflowStateName = step.state;
    let cause: unknown;
    let steps = 0;

    this.logger.info('Run started', { queryLength: query.length });

    while (!isTerminal(step)) {
      if (steps >= stepLimit) {
        // unreachable while transition() honours the retry limits
        return this.finish(ctx, trace, loop, {
          reason: FailureReason.ROUTING_EXHAUSTION,
          message: `Run exceeded ${stepLimit} steps`,
          state: step.state,
        });
      }
      steps++;

      const outcome = await this.runStep(step, ctx).catch((error: unknown): StepOutcome => {
        // anything else is a bug in the workflow, not a collaborator failure
        if (!isAdapterError(error)) throw error;
        cause = error;
        this.logger.error(`${step.state} failed`, error, { state: step.state });
        return { event: { type: 'ADAPTER_FAILED' } };
      });

      const result = transition(step, outcome.event, loop, this.limits);
      this.logger.info(`${step.state} -> ${result.next.state}`, {
        event: outcome.event.type,
        ...(outcome.detail !== undefined && { detail: outcome.detail }),
      });

      if (!isTerminal(result.next)) {
        trace.push({
          from: step.state,
          to: result.next.state,
          event: outcome.event.type,
          ...(outcome.detail !== undefined && { detail: outcome.detail }),
        });
      }

      lastState = step.state;
      step = result.next;
      loop = result.loop;
    }

    if (step.state === WorkflowState.RETURN) {
      return this.finish(ctx, trace, loop);
    }

    return this.finish(ctx, trace, loop, {
      reason: step.reason,
      message: failureMessage(step.reason, lastState, cause),
      state: lastState,
      ...(cause !== undefined && { cause }),
    });
  }

  // ===========================================================================
  // Steps
  // ===========================================================================

  private async runStep(step: WorkflowStep, ctx: RunContext): Promise<StepOutcome> {
    if (ctx.signal?.aborted) {
      return { event: { type: 'CANCELLED' } };
    }

    const startedAt = Date.now();
    try {
      switch (step.state) {
        case WorkflowState.ROUTE:
          return await this.route(step.forceWeb, ctx);
        case WorkflowState.RETRIEVE:
          return await this.retrieve(step.source, ctx);
        case WorkflowState.GRADE_DOCS:
          return await this.gradeDocuments(ctx);
        case WorkflowState.GENERATE:
          return await this.generate(ctx);
        case WorkflowState.CHECK_GROUNDING:
          return await this.checkGrounding(ctx);
        case WorkflowState.CHECK_RELEVANCE:
          return await this.checkRelevance(ctx);
        default:
          throw new Error(`Cannot execute terminal state ${step.state}`);
      }
    } finally {
      this.logger.debug('Step finished', { state: step.state, durationMs: Date.now() - startedAt });
    }
  }

  private async route(forceWeb: boolean, ctx: RunContext): Promise<StepOutcome> {
    if (forceWeb) {
      return {
        event: { type: 'ROUTED', decision: RouteDecision.USE_WEB_SEARCH },
        detail: RouteDecision.USE_WEB_SEARCH,
      };
    }

    const storeTopics = await this.resolveStoreTopics(ctx);
    const decision = await this.callModel('Routing', (signal) =>
      routeQuery(this.deps.model, ctx.query, { storeTopics, signal, logger: this.logger })
    );
    this.logger.debug('Route decided', { decision: decision.label, rationale: decision.rationale });

    return { event: { type: 'ROUTED', decision: decision.label }, detail: decision.label };
  }

  private async retrieve(source: DocumentSource, ctx: RunContext): Promise<StepOutcome> {
    let documents: Document[];

    if (source === DocumentSource.LOCAL) {
      const found = await this.call('retrieval', 'Local retrieval', (signal) =>
        this.deps.documentStore.search(ctx.query, this.config.topK, { signal })
      );
      documents = rankByScore(found).slice(0, this.config.topK);
    } else {
      documents = await this.call('search', 'Web search', (signal) =>
        this.deps.webSearch.search(ctx.query, { signal })
      );
    }

    ctx.pending = ctx.evidence.offer(documents);
    return { event: { type: 'DOCUMENTS_FETCHED', count: documents.length }, detail: source };
  }

  private async gradeDocuments(ctx: RunContext): Promise<StepOutcome> {
    let accepted = 0;

    for (const document of ctx.pending) {
      const grade: Decision<RelevanceDecision> = await this.callModel('Document grading', (signal) =>
        gradeDocument(this.deps.model, ctx.query, document, { signal })
      );

      if (grade.label === RelevanceDecision.RELEVANT) {
        ctx.evidence.accept(document);
        accepted++;
      } else {
        ctx.evidence.reject(document);
      }
    }

    const rejected = ctx.pending.length - accepted;
    ctx.pending = [];
    return {
      event: { type: 'DOCUMENTS_GRADED', accepted, evidenceSize: ctx.evidence.size },
      detail: `${accepted} accepted, ${rejected} rejected`,
    };
  }

  private async generate(ctx: RunContext): Promise<StepOutcome> {
    const { text } = buildContext(ctx.evidence.documents(), this.config.maxEvidenceChars);
    ctx.context = text;
    ctx.answer = await this.callModel('Generation', (signal) =>
      generateAnswer(this.deps.model, ctx.query, text, { signal })
    );
    return { event: { type: 'ANSWER_GENERATED' } };
  }

  private async checkGrounding(ctx: RunContext): Promise<StepOutcome> {
    const answer = requireAnswer(ctx);
    const grade: Decision<GroundingDecision> = await this.callModel('Grounding check', (signal) =>
      gradeGrounding(this.deps.model, answer, ctx.context, { signal })
    );
    return { event: { type: 'GROUNDING_GRADED', decision: grade.label }, detail: grade.label };
  }

  private async checkRelevance(ctx: RunContext): Promise<StepOutcome> {
    const answer = requireAnswer(ctx);
    const grade: Decision<AnswerDecision> = await this.callModel('Answer check', (signal) =>
      gradeAnswer(this.deps.model, ctx.query, answer, { signal })
    );
    return { event: { type: 'RELEVANCE_GRADED', decision: grade.label }, detail: grade.label };
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private async resolveStoreTopics(ctx: RunContext): Promise<string> {
    if (ctx.storeTopics !== undefined) {
      return ctx.storeTopics;
    }

    let topics: readonly string[] = this.config.storeTopics;
    const provider = this.deps.topicsProvider;
    if (topics.length === 0 && provider) {
      topics = await this.call('retrieval', 'Listing store topics', (signal) =>
        provider({ signal }).catch((error: unknown) => {
          throw toAdapterError(error, AdapterKind.RETRIEVAL, 'Listing store topics failed');
        })
      );
    }

    ctx.storeTopics = formatStoreTopics(topics);
    return ctx.storeTopics;
  }

  private callModel<T>(label: string, operation: (signal: AbortSignal) => Promise<T>): Promise<T> {
    return this.call('model', label, operation);
  }

  private call<T>(
    kind: AdapterKind,
    label: string,
    operation: (signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    const timeoutMs = this.config.adapterTimeoutMs;
    return withTimeout(operation, {
      timeoutMs,
      onTimeout: () => createAdapterError(kind, AdapterErrorCode.TIMEOUT, `${label} timed out after ${timeoutMs}ms`),
    });
  }

  private finish(ctx: RunContext, trace: TraceEntry[], loop: LoopState, failure?: RunFailure): RunResult {
    const result: RunResult = {
      status: failure ? RunStatus.FAILURE : RunStatus.SUCCESS,
      evidence: ctx.evidence.documents(),
      trace,
      retries: { retrieval: loop.retrievalRetries, generation: loop.generationRetries },
      ...(ctx.answer !== undefined && { answer: ctx.answer }),
      ...(failure && { failure }),
    };

    if (failure) {
      this.logger.warn('Run failed', { reason: failure.reason, state: failure.state, message: failure.message });
    } else {
      this.logger.info('Run succeeded', { steps: trace.length, evidence: result.evidence.length });
    }
    return result;
  }
}

// =============================================================================
// Functions
// =============================================================================

function scoreOf(document: Document): number {
  const score = Number.parseFloat(document.metadata['score'] ?? '');
  return Number.isNaN(score) ? Number.NEGATIVE_INFINITY : score;
}

/**
 * Stable sort by descending `metadata.score`; unscored documents keep their
 * relative order after scored ones.
 */
export function rankByScore(documents: readonly Document[]): Document[] {
  return [...documents].sort((a, b) => {
    const sa = scoreOf(a);
    const sb = scoreOf(b);
    if (sa === sb) return 0;
    return sb > sa ? 1 : -1;
  });
}

function requireAnswer(ctx: RunContext): string {
  if (ctx.answer === undefined) {
    throw new Error('No answer has been generated yet');
  }
  return ctx.answer;
}

function failureMessage(reason: FailureReason, state: WorkflowStateName, cause: unknown): string {
  switch (reason) {
    case FailureReason.CANCELLED:
      return 'Run was cancelled';
    case FailureReason.ADAPTER_ERROR:
      return cause instanceof Error ? cause.message : `${state} failed`;
    case FailureReason.ROUTING_EXHAUSTION:
      if (state === WorkflowState.GRADE_DOCS) {
        return 'No relevant documents were found';
      }
      if (state === WorkflowState.CHECK_GROUNDING) {
        return 'No grounded answer within the generation retry budget';
      }
      return 'No answer addressing the question within the retrieval retry budget';
  }
}
