/**
 * Tests for AdaptiveRAGOrchestrator
 */

import { describe, it, expect, vi } from 'vitest';
import { AdaptiveRAGOrchestrator, rankByScore } from '../../lib/src/workflow/orchestrator.js';
import { maxWorkflowSteps } from '../../lib/src/workflow/transitions.js';
import type { OrchestratorDependencies, TopicsProvider } from '../../lib/src/workflow/orchestrator.js';
import type { WorkflowConfigInput } from '../../lib/src/workflow/types.js';
import { Logger } from '../../lib/src/logging/logger.js';
import { type Document, ModelError, RetrievalError, createDocument } from '../../lib/src/sources/index.js';
import {
  InMemoryDocumentStore,
  ScriptedModel,
  StaticWebSearch,
  localDoc,
  untilAborted,
  webDoc,
} from '../helpers/fakes.js';

const QUESTION = 'How do autonomous agents use memory?';

const MEMORY_DOC = localDoc('Short-term memory keeps the working context of an agent.', 0.92);
const PLANNING_DOC = localDoc('Task decomposition splits a goal into subgoals.', 0.81);
const WEB_DOC = webDoc('Recent reports describe vector memory for assistants.');

interface Setup {
  model: ScriptedModel;
  store: InMemoryDocumentStore;
  web: StaticWebSearch;
  orchestrator: AdaptiveRAGOrchestrator;
}

function setup(
  model: ScriptedModel,
  options: {
    local?: Document[];
    localFailure?: Error;
    web?: Document[];
    webFailure?: Error;
    config?: WorkflowConfigInput;
    extra?: Partial<OrchestratorDependencies>;
  } = {}
): Setup {
  const store = new InMemoryDocumentStore(options.local ?? [MEMORY_DOC, PLANNING_DOC], options.localFailure);
  const web = new StaticWebSearch(options.web ?? [WEB_DOC], options.webFailure);
  const orchestrator = new AdaptiveRAGOrchestrator(
    { documentStore: store, webSearch: web, model, ...options.extra },
    { storeTopics: ['agents', 'prompt engineering'], ...options.config }
  );
  return { model, store, web, orchestrator };
}

describe('AdaptiveRAGOrchestrator', () => {
  describe('constructor', () => {
    it('should apply configuration defaults', () => {
      const { orchestrator } = setup(new ScriptedModel(), { config: { storeTopics: [] } });

      expect(orchestrator.getConfig()).toEqual({
        topK: 4,
        maxRetrievalRetries: 2,
        maxGenerationRetries: 3,
        adapterTimeoutMs: 60000,
        maxEvidenceChars: 12000,
        storeTopics: [],
      });
    });

    it('should reject an invalid configuration', () => {
      expect(() => setup(new ScriptedModel(), { config: { topK: 0 } })).toThrow();
    });
  });

  describe('run', () => {
    it('should answer from the local store on the happy path', async () => {
      const tools = localDoc('Tool use lets an agent call external APIs.', 0.77);
      const reflection = localDoc('Reflection lets an agent critique past actions.', 0.7);
      const { model, orchestrator } = setup(
        new ScriptedModel({
          route: ['vectorstore'],
          relevant: ['Short-term', 'subgoals', 'Tool use', 'Reflection'],
          answers: ['Agents keep context.'],
        }),
        { local: [MEMORY_DOC, PLANNING_DOC, tools, reflection] }
      );

      const result = await orchestrator.run(QUESTION);

      expect(result.status).toBe('SUCCESS');
      expect(result.answer).toBe('Agents keep context.');
      expect(result.evidence).toEqual([MEMORY_DOC, PLANNING_DOC, tools, reflection]);
      expect(result.failure).toBeUndefined();
      expect(result.retries).toEqual({ retrieval: 0, generation: 0 });
      expect(result.trace).toEqual([
        { from: 'ROUTE', to: 'RETRIEVE', event: 'ROUTED', detail: 'USE_LOCAL_STORE' },
        { from: 'RETRIEVE', to: 'GRADE_DOCS', event: 'DOCUMENTS_FETCHED', detail: 'local' },
        { from: 'GRADE_DOCS', to: 'GENERATE', event: 'DOCUMENTS_GRADED', detail: '4 accepted, 0 rejected' },
        { from: 'GENERATE', to: 'CHECK_GROUNDING', event: 'ANSWER_GENERATED' },
        { from: 'CHECK_GROUNDING', to: 'CHECK_RELEVANCE', event: 'GROUNDING_GRADED', detail: 'GROUNDED' },
      ]);
      expect(model.calls.map((call) => call.kind)).toEqual([
        'route',
        'relevance',
        'relevance',
        'relevance',
        'relevance',
        'generate',
        'grounding',
        'answer',
      ]);
    });

    it('should generate from the accepted evidence only', async () => {
      const { model, orchestrator } = setup(new ScriptedModel({ relevant: ['Short-term'] }));

      const result = await orchestrator.run(QUESTION);
      const generation = model.callsOf('generate')[0]?.prompt ?? '';

      expect(result.evidence).toEqual([MEMORY_DOC]);
      expect(generation).toContain(`Here is the context to use to answer the question:\n\n${MEMORY_DOC.content}\n\nThink`);
      expect(model.callsOf('grounding')[0]?.prompt).toContain(`FACTS:\n\n${MEMORY_DOC.content}\n\nSTUDENT ANSWER`);
    });

    it('should fall back to web search when no local document is relevant', async () => {
      const { model, store, web, orchestrator } = setup(new ScriptedModel({ route: ['vectorstore'], relevant: ['Recent'] }));

      const result = await orchestrator.run(QUESTION);

      expect(result.status).toBe('SUCCESS');
      expect(result.evidence).toEqual([WEB_DOC]);
      expect(result.retries).toEqual({ retrieval: 1, generation: 0 });
      expect(result.trace).toHaveLength(8);
      expect(result.trace[2]).toEqual({
        from: 'GRADE_DOCS',
        to: 'ROUTE',
        event: 'DOCUMENTS_GRADED',
        detail: '0 accepted, 2 rejected',
      });
      expect(result.trace[3]).toEqual({ from: 'ROUTE', to: 'RETRIEVE', event: 'ROUTED', detail: 'USE_WEB_SEARCH' });
      expect(model.callsOf('route')).toHaveLength(1);
      expect(store.queries).toEqual([{ query: QUESTION, k: 4 }]);
      expect(web.queries).toEqual([QUESTION]);
    });

    it('should give up after the generation retry budget', async () => {
      const { model, orchestrator } = setup(
        new ScriptedModel({ relevant: ['Short-term'], grounding: ['no'], answers: ['first', 'second', 'third', 'fourth'] })
      );

      const result = await orchestrator.run(QUESTION);

      expect(result.status).toBe('FAILURE');
      expect(result.failure).toEqual({
        reason: 'ROUTING_EXHAUSTION',
        message: 'No grounded answer within the generation retry budget',
        state: 'CHECK_GROUNDING',
      });
      expect(result.answer).toBe('fourth');
      expect(result.retries).toEqual({ retrieval: 0, generation: 3 });
      expect(model.callsOf('generate')).toHaveLength(4);
      expect(model.callsOf('answer')).toHaveLength(0);
    });

    it('should end with an adapter error when the store fails', async () => {
      const failure = new RetrievalError('UNAVAILABLE', 'Vector store unreachable');
      const { model, orchestrator } = setup(new ScriptedModel(), { localFailure: failure });

      const result = await orchestrator.run(QUESTION);

      expect(result.status).toBe('FAILURE');
      expect(result.failure).toEqual({
        reason: 'ADAPTER_ERROR',
        message: 'Vector store unreachable',
        state: 'RETRIEVE',
        cause: failure,
      });
      expect(result.trace).toEqual([{ from: 'ROUTE', to: 'RETRIEVE', event: 'ROUTED', detail: 'USE_LOCAL_STORE' }]);
      expect(model.calls.map((call) => call.kind)).toEqual(['route']);
      expect(result.answer).toBeUndefined();
    });

    it('should re-route without regrading documents it has already seen', async () => {
      const { model, store, orchestrator } = setup(
        new ScriptedModel({ route: ['vectorstore'], relevant: ['Short-term', 'subgoals'], answer: ['no', 'yes'], answers: ['vague', 'precise'] })
      );

      const result = await orchestrator.run(QUESTION);

      expect(result.status).toBe('SUCCESS');
      expect(result.answer).toBe('precise');
      expect(result.retries).toEqual({ retrieval: 1, generation: 0 });
      expect(result.trace).toHaveLength(11);
      expect(result.trace[5]).toEqual({
        from: 'CHECK_RELEVANCE',
        to: 'ROUTE',
        event: 'RELEVANCE_GRADED',
        detail: 'DOES_NOT_ADDRESS',
      });
      expect(result.trace[8]).toEqual({
        from: 'GRADE_DOCS',
        to: 'GENERATE',
        event: 'DOCUMENTS_GRADED',
        detail: '0 accepted, 0 rejected',
      });
      expect(store.queries).toHaveLength(2);
      expect(model.callsOf('route')).toHaveLength(2);
      expect(model.callsOf('relevance')).toHaveLength(2);
      expect(result.evidence).toEqual([MEMORY_DOC, PLANNING_DOC]);
    });

    it('should fail when the retrieval budget runs out on off-topic answers', async () => {
      const { model, orchestrator } = setup(
        new ScriptedModel({ route: ['websearch'], relevant: ['Recent'], answer: ['no'] }),
        { config: { maxRetrievalRetries: 1 } }
      );

      const result = await orchestrator.run(QUESTION);

      expect(result.failure).toEqual({
        reason: 'ROUTING_EXHAUSTION',
        message: 'No answer addressing the question within the retrieval retry budget',
        state: 'CHECK_RELEVANCE',
      });
      expect(result.retries).toEqual({ retrieval: 1, generation: 0 });
      expect(model.callsOf('answer')).toHaveLength(2);
    });

    it('should fail when web search returns nothing', async () => {
      const { model, orchestrator } = setup(new ScriptedModel({ route: ['websearch'] }), { web: [] });

      const result = await orchestrator.run(QUESTION);

      expect(result.failure).toEqual({
        reason: 'ROUTING_EXHAUSTION',
        message: 'No relevant documents were found',
        state: 'GRADE_DOCS',
      });
      expect(result.trace).toEqual([
        { from: 'ROUTE', to: 'RETRIEVE', event: 'ROUTED', detail: 'USE_WEB_SEARCH' },
        { from: 'RETRIEVE', to: 'GRADE_DOCS', event: 'DOCUMENTS_FETCHED', detail: 'web' },
      ]);
      expect(model.callsOf('generate')).toHaveLength(0);
    });

    it('should use web search when the router output is unusable', async () => {
      const { store, web, orchestrator } = setup(new ScriptedModel({ route: ['library'], relevant: ['Recent'] }));

      const result = await orchestrator.run(QUESTION);

      expect(result.status).toBe('SUCCESS');
      expect(result.trace[0]).toEqual({ from: 'ROUTE', to: 'RETRIEVE', event: 'ROUTED', detail: 'USE_WEB_SEARCH' });
      expect(store.queries).toEqual([]);
      expect(web.queries).toEqual([QUESTION]);
    });

    it('should rank local documents by score and keep the top k', async () => {
      const low = localDoc('memory notes, low score', 0.2);
      const high = localDoc('memory notes, high score', 0.9);
      const { model, orchestrator } = setup(new ScriptedModel({ relevant: ['notes'] }), {
        local: [low, high],
        config: { topK: 2 },
      });

      const result = await orchestrator.run(QUESTION);

      expect(result.evidence).toEqual([high, low]);
      expect(model.callsOf('relevance')[0]?.prompt).toContain('high score');
    });

    it('should stay within the step bound when both retry budgets run out', async () => {
      const { model, orchestrator } = setup(
        new ScriptedModel({ relevant: ['Short-term', 'subgoals'], grounding: ['no', 'no', 'no', 'yes'], answer: ['no'] })
      );

      const result = await orchestrator.run(QUESTION);

      expect(result.failure).toEqual({
        reason: 'ROUTING_EXHAUSTION',
        message: 'No answer addressing the question within the retrieval retry budget',
        state: 'CHECK_RELEVANCE',
      });
      expect(result.retries).toEqual({ retrieval: 2, generation: 3 });
      expect(model.callsOf('generate')).toHaveLength(6);
      expect(result.trace).toHaveLength(23);
      expect(result.trace.length).toBeLessThan(
        maxWorkflowSteps({ maxRetrievalRetries: 2, maxGenerationRetries: 3 })
      );
    });

    it('should propagate errors that do not come from a collaborator', async () => {
      const { orchestrator } = setup(
        new ScriptedModel({ override: { route: () => Promise.reject(new TypeError('label is not a string')) } })
      );

      await expect(orchestrator.run(QUESTION)).rejects.toThrow(new TypeError('label is not a string'));
    });

    it('should produce the same trace for the same inputs', async () => {
      const script = { route: ['vectorstore'], relevant: ['Short-term'], answer: ['no', 'yes'] };

      const first = await setup(new ScriptedModel(script)).orchestrator.run(QUESTION);
      const second = await setup(new ScriptedModel(script)).orchestrator.run(QUESTION);

      expect(second).toEqual(first);
    });

    it('should log each transition', async () => {
      const lines: string[] = [];
      const logger = new Logger({
        format: 'text',
        timestamps: false,
        output: (line) => {
          lines.push(line);
        },
      });
      const { orchestrator } = setup(new ScriptedModel({ relevant: ['Short-term'] }), { extra: { logger } });

      await orchestrator.run(QUESTION);

      expect(lines).toContain('INFO  ROUTE -> RETRIEVE {"event":"ROUTED","detail":"USE_LOCAL_STORE"}');
      expect(lines).toContain('INFO  GENERATE -> CHECK_GROUNDING {"event":"ANSWER_GENERATED"}');
    });
  });

  describe('store topics', () => {
    it('should ask the topics provider once per run when none are configured', async () => {
      const provider = vi.fn<TopicsProvider>(async () => ['agents', 'tool use']);
      const { model, orchestrator } = setup(
        new ScriptedModel({ relevant: ['Short-term'], answer: ['no', 'yes'] }),
        { config: { storeTopics: [] }, extra: { topicsProvider: provider } }
      );

      await orchestrator.run(QUESTION);

      expect(provider).toHaveBeenCalledTimes(1);
      expect(model.callsOf('route')).toHaveLength(2);
      expect(model.callsOf('route')[1]?.instructions).toContain(
        'The vectorstore contains documents related to agents and tool use.'
      );
    });

    it('should prefer configured topics over the provider', async () => {
      const provider = vi.fn<TopicsProvider>(async () => ['unused']);
      const { model, orchestrator } = setup(new ScriptedModel({ relevant: ['Short-term'] }), {
        config: { storeTopics: ['memory'] },
        extra: { topicsProvider: provider },
      });

      await orchestrator.run(QUESTION);

      expect(provider).not.toHaveBeenCalled();
      expect(model.callsOf('route')[0]?.instructions).toContain('The vectorstore contains documents related to memory.');
    });

    it('should end the run when the provider fails', async () => {
      const provider = vi.fn<TopicsProvider>(async () => {
        throw new RetrievalError('UNAVAILABLE', 'Collection listing failed');
      });
      const { model, orchestrator } = setup(new ScriptedModel(), {
        config: { storeTopics: [] },
        extra: { topicsProvider: provider },
      });

      const result = await orchestrator.run(QUESTION);

      expect(result.failure?.reason).toBe('ADAPTER_ERROR');
      expect(result.failure?.message).toBe('Collection listing failed');
      expect(result.failure?.state).toBe('ROUTE');
      expect(model.calls).toEqual([]);
    });
    it('should report a provider failure of unknown type as an adapter error', async () => {
      const provider = vi.fn<TopicsProvider>(async () => {
        throw new Error('index offline');
      });
      const { orchestrator } = setup(new ScriptedModel(), {
        config: { storeTopics: [] },
        extra: { topicsProvider: provider },
      });

      const result = await orchestrator.run(QUESTION);

      expect(result.failure?.reason).toBe('ADAPTER_ERROR');
      expect(result.failure?.message).toBe('Listing store topics failed: index offline');
      expect(result.failure?.cause instanceof RetrievalError).toBe(true);
    });
  });

  describe('cancellation and deadlines', () => {
    it('should not call anything when already cancelled', async () => {
      const controller = new AbortController();
      controller.abort();
      const { model, store, orchestrator } = setup(new ScriptedModel());

      const result = await orchestrator.run(QUESTION, { signal: controller.signal });

      expect(result.failure).toEqual({ reason: 'CANCELLED', message: 'Run was cancelled', state: 'ROUTE' });
      expect(result.trace).toEqual([]);
      expect(model.calls).toEqual([]);
      expect(store.queries).toEqual([]);
    });

    it('should let a call in flight finish and keep its answer when cancelled', async () => {
      const controller = new AbortController();
      const { model, orchestrator } = setup(
        new ScriptedModel({
          relevant: ['Short-term'],
          override: {
            generate: async () => {
              controller.abort(new Error('client went away'));
              await new Promise((resolve) => setTimeout(resolve, 10));
              return 'finished answer';
            },
          },
        })
      );

      const result = await orchestrator.run(QUESTION, { signal: controller.signal });

      expect(result.status).toBe('FAILURE');
      expect(result.failure).toEqual({ reason: 'CANCELLED', message: 'Run was cancelled', state: 'CHECK_GROUNDING' });
      expect(result.answer).toBe('finished answer');
      expect(result.trace.at(-1)).toEqual({ from: 'GENERATE', to: 'CHECK_GROUNDING', event: 'ANSWER_GENERATED' });
      expect(model.callsOf('grounding')).toHaveLength(0);
    });

    it('should time out a call that never returns', async () => {
      const { orchestrator } = setup(
        new ScriptedModel({ override: { route: (options) => untilAborted(options.signal) } }),
        { config: { adapterTimeoutMs: 20 } }
      );

      const result = await orchestrator.run(QUESTION);
      const cause = result.failure?.cause;

      expect(result.failure?.reason).toBe('ADAPTER_ERROR');
      expect(result.failure?.message).toBe('Routing timed out after 20ms');
      expect(result.failure?.state).toBe('ROUTE');
      expect(cause instanceof ModelError && cause.code).toBe('TIMEOUT');
    });
  });
});

describe('rankByScore', () => {
  it('should sort by descending score and keep unscored documents last in order', () => {
    const a = createDocument('a', 'local', { score: '0.3' });
    const b = createDocument('b', 'local');
    const c = createDocument('c', 'local', { score: '0.7' });
    const d = createDocument('d', 'local', { score: 'n/a' });

    expect(rankByScore([a, b, c, d])).toEqual([c, a, b, d]);
  });
});
