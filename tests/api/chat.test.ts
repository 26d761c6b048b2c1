/**
 * Tests for the chat API handler
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { VercelRequest, VercelResponse } from '@vercel/node';
import {
  createChatHandler,
  documentsToSources,
  formatResponse,
  getAllowedOrigin,
} from '../../api/chat.js';
import type { AdaptiveRAGOrchestrator, RunResult } from '../../lib/src/index.js';
import { ModelError, createDocument } from '../../lib/src/sources/index.js';

interface FakeResponse {
  statusCode: number;
  body: unknown;
  headers: Record<string, string>;
  ended: boolean;
}

interface ResponseStub {
  writableEnded: boolean;
  status(code: number): ResponseStub;
  json(body: unknown): ResponseStub;
  end(): ResponseStub;
  setHeader(name: string, value: string): ResponseStub;
  on(): ResponseStub;
}

function createResponse(): { res: VercelResponse; sent: FakeResponse } {
  const sent: FakeResponse = { statusCode: 0, body: undefined, headers: {}, ended: false };
  const res: ResponseStub = {
    writableEnded: false,
    status(code: number) {
      sent.statusCode = code;
      return res;
    },
    json(body: unknown) {
      sent.body = body;
      sent.ended = true;
      res.writableEnded = true;
      return res;
    },
    end() {
      sent.ended = true;
      res.writableEnded = true;
      return res;
    },
    setHeader(name: string, value: string) {
      sent.headers[name] = value;
      return res;
    },
    on() {
      return res;
    },
  };
  return { res: res as unknown as VercelResponse, sent };
}

function createRequest(method: string, body?: unknown, origin?: string): VercelRequest {
  return { method, body, headers: origin ? { origin } : {} } as unknown as VercelRequest;
}

const EVIDENCE = [
  createDocument('Short-term memory keeps the working context.', 'local', {
    url: 'https://notes.example.com/memory',
    title: 'Memory',
    score: '0.92',
  }),
  createDocument('Web result about agents.', 'web', { url: 'https://news.example.com/agents' }),
];

const SUCCESS: RunResult = {
  status: 'SUCCESS',
  answer: 'Agents keep context in short-term memory.',
  evidence: EVIDENCE,
  trace: [{ from: 'ROUTE', to: 'RETRIEVE', event: 'ROUTED', detail: 'USE_LOCAL_STORE' }],
  retries: { retrieval: 0, generation: 0 },
};

function providerFor(result: RunResult) {
  const run = vi.fn(async () => result);
  const orchestrator = { run } as unknown as AdaptiveRAGOrchestrator;
  return { run, provider: async () => orchestrator };
}

describe('chat API', () => {
  beforeEach(() => {
    vi.stubEnv('ALLOWED_ORIGINS', 'https://app.example.com');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe('getAllowedOrigin', () => {
    it('should echo an allowed origin', () => {
      expect(getAllowedOrigin('https://app.example.com', 'https://app.example.com, https://admin.example.com')).toBe(
        'https://app.example.com'
      );
    });

    it('should reject unknown origins and an unset allow list', () => {
      expect(getAllowedOrigin('https://evil.example.com', 'https://app.example.com')).toBeNull();
      expect(getAllowedOrigin('https://app.example.com', '')).toBeNull();
    });
  });

  describe('documentsToSources', () => {
    it('should number sources and keep metadata that is present', () => {
      expect(documentsToSources(EVIDENCE)).toEqual([
        {
          index: 1,
          origin: 'local',
          excerpt: 'Short-term memory keeps the working context.',
          url: 'https://notes.example.com/memory',
          title: 'Memory',
          score: 0.92,
        },
        {
          index: 2,
          origin: 'web',
          excerpt: 'Web result about agents.',
          url: 'https://news.example.com/agents',
        },
      ]);
    });

    it('should cut long excerpts', () => {
      const [source] = documentsToSources([createDocument('x'.repeat(500), 'web')]);

      expect(source?.excerpt).toHaveLength(300);
    });
  });

  describe('formatResponse', () => {
    it('should hide adapter failure details', () => {
      const response = formatResponse(
        {
          status: 'FAILURE',
          evidence: [],
          trace: [],
          retries: { retrieval: 0, generation: 0 },
          failure: {
            reason: 'ADAPTER_ERROR',
            message: 'connect ECONNREFUSED 10.0.0.5:6333',
            state: 'RETRIEVE',
            cause: new Error('connect ECONNREFUSED 10.0.0.5:6333'),
          },
        },
        'req-1',
        12
      );

      expect(response).toEqual({
        status: 'FAILURE',
        sources: [],
        trace: [],
        metadata: { requestId: 'req-1', totalLatencyMs: 12, retries: { retrieval: 0, generation: 0 } },
        failure: { reason: 'ADAPTER_ERROR', state: 'RETRIEVE', message: 'An upstream service failed while answering' },
      });
    });
  });

  describe('handler', () => {
    it('should answer preflight requests with CORS headers', async () => {
      const { provider } = providerFor(SUCCESS);
      const { res, sent } = createResponse();

      await createChatHandler(provider)(createRequest('OPTIONS', undefined, 'https://app.example.com'), res);

      expect(sent.statusCode).toBe(200);
      expect(sent.ended).toBe(true);
      expect(sent.headers).toEqual({
        'Access-Control-Allow-Origin': 'https://app.example.com',
        'Access-Control-Allow-Methods': 'POST, OPTIONS',
        'Access-Control-Allow-Headers': 'Content-Type',
        Vary: 'Origin',
      });
    });

    it('should reject other methods', async () => {
      const { provider } = providerFor(SUCCESS);
      const { res, sent } = createResponse();

      await createChatHandler(provider)(createRequest('GET'), res);

      expect(sent.statusCode).toBe(405);
      expect(sent.body).toMatchObject({ error: { message: 'Method not allowed', code: 'METHOD_NOT_ALLOWED' } });
      expect(sent.headers).toEqual({});
    });

    it('should validate the question', async () => {
      const { run, provider } = providerFor(SUCCESS);
      const { res, sent } = createResponse();

      await createChatHandler(provider)(createRequest('POST', { question: '   ' }), res);

      expect(sent.statusCode).toBe(400);
      expect(sent.body).toMatchObject({
        error: {
          message: 'Question cannot be only whitespace',
          code: 'VALIDATION_ERROR',
          validationErrors: [{ field: 'question', message: 'Question cannot be only whitespace', code: 'validation_custom' }],
        },
      });
      expect(run).not.toHaveBeenCalled();
    });

    it('should reject unexpected fields', async () => {
      const { provider } = providerFor(SUCCESS);
      const { res, sent } = createResponse();

      await createChatHandler(provider)(createRequest('POST', { question: 'q', topK: 10 }), res);

      expect(sent.statusCode).toBe(400);
      expect(sent.body).toMatchObject({
        error: { validationErrors: [{ field: 'body', code: 'unexpected_field' }] },
      });
    });

    it('should run the trimmed question and return the answer', async () => {
      const { run, provider } = providerFor(SUCCESS);
      const { res, sent } = createResponse();

      await createChatHandler(provider)(createRequest('POST', { question: '  What is agent memory?  ' }), res);

      expect(run).toHaveBeenCalledWith('What is agent memory?', { signal: expect.any(AbortSignal) });
      expect(sent.statusCode).toBe(200);
      expect(sent.body).toMatchObject({
        status: 'SUCCESS',
        answer: 'Agents keep context in short-term memory.',
        trace: SUCCESS.trace,
        metadata: { retries: { retrieval: 0, generation: 0 } },
      });
    });

    it('should answer 200 for an exhausted run', async () => {
      const { provider } = providerFor({
        status: 'FAILURE',
        evidence: [],
        trace: [],
        retries: { retrieval: 2, generation: 0 },
        failure: { reason: 'ROUTING_EXHAUSTION', message: 'No relevant documents were found', state: 'GRADE_DOCS' },
      });
      const { res, sent } = createResponse();

      await createChatHandler(provider)(createRequest('POST', { question: 'q' }), res);

      expect(sent.statusCode).toBe(200);
      expect(sent.body).toMatchObject({
        status: 'FAILURE',
        failure: { reason: 'ROUTING_EXHAUSTION', message: 'No relevant documents were found', state: 'GRADE_DOCS' },
      });
    });

    it('should answer 502 when a collaborator failed', async () => {
      const { provider } = providerFor({
        status: 'FAILURE',
        evidence: [],
        trace: [],
        retries: { retrieval: 0, generation: 0 },
        failure: {
          reason: 'ADAPTER_ERROR',
          message: 'Routing timed out after 60000ms',
          state: 'ROUTE',
          cause: new ModelError('TIMEOUT', 'Routing timed out after 60000ms'),
        },
      });
      const { res, sent } = createResponse();

      await createChatHandler(provider)(createRequest('POST', { question: 'q' }), res);

      expect(sent.statusCode).toBe(502);
      expect(sent.body).toMatchObject({
        failure: { reason: 'ADAPTER_ERROR', message: 'An upstream service failed while answering' },
      });
    });

    it('should answer 500 when the runtime cannot start', async () => {
      const { res, sent } = createResponse();

      await createChatHandler(async () => {
        throw new Error('QDRANT_URL is not a valid URL');
      })(createRequest('POST', { question: 'q' }), res);

      expect(sent.statusCode).toBe(500);
      expect(sent.body).toMatchObject({ error: { message: 'An unexpected error occurred', code: 'INTERNAL_ERROR' } });
    });
  });
});
