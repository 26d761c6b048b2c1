/**
 * Unit Tests for Anthropic Adapter
 *
 * Uses a mocked Anthropic SDK; nothing leaves the process.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import Anthropic from '@anthropic-ai/sdk';
import { AnthropicAdapter, type AnthropicAdapterConfig } from '../../../lib/src/llm/adapters/anthropic.js';
import {
  AbortedError,
  AuthenticationError,
  InvalidRequestError,
  ModelNotFoundError,
  NetworkError,
  RateLimitError,
  ServerError,
  TimeoutError,
} from '../../../lib/src/llm/errors.js';
import type { LLMMessage, LLMStreamChunk, RetryEvent } from '../../../lib/src/llm/types.js';

// =============================================================================
// Mock Setup
// =============================================================================

vi.mock('@anthropic-ai/sdk', () => {
  const MockAnthropic = vi.fn();

  class APIError extends Error {
    status: number | undefined;
    headers: Record<string, string> | undefined;
    constructor(status: number | undefined, _error: unknown, message: string | undefined, headers?: Record<string, string>) {
      super(message);
      this.name = 'APIError';
      this.status = status;
      this.headers = headers;
    }
  }

  class APIConnectionError extends APIError {
    constructor({ message }: { message?: string } = {}) {
      super(undefined, undefined, message ?? 'Connection error.');
      this.name = 'APIConnectionError';
    }
  }

  class APIConnectionTimeoutError extends APIConnectionError {
    constructor({ message }: { message?: string } = {}) {
      super({ message: message ?? 'Request timed out.' });
      this.name = 'APIConnectionTimeoutError';
    }
  }

  class APIUserAbortError extends APIError {
    constructor() {
      super(undefined, undefined, 'Request was aborted.');
      this.name = 'APIUserAbortError';
    }
  }

  Object.assign(MockAnthropic, { APIError, APIConnectionError, APIConnectionTimeoutError, APIUserAbortError });

  return {
    default: MockAnthropic,
    APIError,
    APIConnectionError,
    APIConnectionTimeoutError,
    APIUserAbortError,
  };
});

// =============================================================================
// Test Fixtures
// =============================================================================

const createMockConfig = (overrides: Partial<AnthropicAdapterConfig> = {}): AnthropicAdapterConfig => ({
  provider: 'anthropic',
  model: 'claude-3-5-haiku-20241022',
  apiKey: 'test-secret',
  retry: { maxRetries: 0 },
  ...overrides,
});

const messagesWithSystem: LLMMessage[] = [
  { role: 'system', content: 'You grade documents.' },
  { role: 'user', content: 'Is this document relevant?' },
];

const createMockResponse = () => ({
  id: 'msg_1',
  type: 'message',
  role: 'assistant',
  content: [
    { type: 'text', text: '{"label":' },
    { type: 'text', text: '"yes"}' },
  ],
  model: 'claude-3-5-haiku-20241022',
  stop_reason: 'end_turn',
  usage: { input_tokens: 12, output_tokens: 4 },
});

async function* events(...items: object[]): AsyncGenerator<object, void, unknown> {
  for (const item of items) yield item;
}

async function collect(generator: AsyncGenerator<LLMStreamChunk, void, unknown>): Promise<LLMStreamChunk[]> {
  const chunks: LLMStreamChunk[] = [];
  for await (const chunk of generator) chunks.push(chunk);
  return chunks;
}

// =============================================================================
// Test Suites
// =============================================================================

describe('AnthropicAdapter', () => {
  let create: ReturnType<typeof vi.fn>;
  let stream: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    vi.clearAllMocks();
    create = vi.fn();
    stream = vi.fn();
    vi.mocked(Anthropic).mockImplementation(() => ({ messages: { create, stream } }) as unknown as Anthropic);
  });

  describe('constructor', () => {
    it('should apply config defaults', () => {
      const adapter = new AnthropicAdapter(createMockConfig());

      expect(adapter.provider).toBe('anthropic');
      expect(adapter.model).toBe('claude-3-5-haiku-20241022');
      expect(adapter.getConfig().maxTokens).toBe(1024);
      expect(adapter.getConfig().temperature).toBe(0);
    });

    it('should pass the key and base URL to the client', () => {
      new AnthropicAdapter(createMockConfig({ baseUrl: 'https://proxy.example.com' }));

      expect(Anthropic).toHaveBeenCalledWith({ apiKey: 'test-secret', baseURL: 'https://proxy.example.com' });
    });
  });

  describe('complete', () => {
    it('should send the system prompt separately from the conversation', async () => {
      create.mockResolvedValue(createMockResponse());
      const adapter = new AnthropicAdapter(createMockConfig());

      await adapter.complete(messagesWithSystem, { stopSequences: ['END'], topP: 0.5 });

      expect(create).toHaveBeenCalledWith(
        {
          model: 'claude-3-5-haiku-20241022',
          max_tokens: 1024,
          temperature: 0,
          system: 'You grade documents.',
          messages: [{ role: 'user', content: 'Is this document relevant?' }],
          stop_sequences: ['END'],
          top_p: 0.5,
        },
        { signal: undefined }
      );
    });

    it('should append the JSON instruction when JSON output is requested', async () => {
      create.mockResolvedValue(createMockResponse());
      const adapter = new AnthropicAdapter(createMockConfig());

      await adapter.complete(messagesWithSystem, { responseFormat: 'json' });

      expect(create.mock.calls[0]?.[0].system).toBe(
        'You grade documents.\n\nRespond with a single JSON object and nothing else. Do not wrap it in markdown.'
      );
    });

    it('should use the JSON instruction alone without a system message', async () => {
      create.mockResolvedValue(createMockResponse());
      const adapter = new AnthropicAdapter(createMockConfig());

      await adapter.complete([{ role: 'user', content: 'Hi' }], { responseFormat: 'json' });

      expect(create.mock.calls[0]?.[0].system).toBe(
        'Respond with a single JSON object and nothing else. Do not wrap it in markdown.'
      );
    });

    it('should join text blocks and map usage', async () => {
      create.mockResolvedValue(createMockResponse());
      const adapter = new AnthropicAdapter(createMockConfig());

      const response = await adapter.complete(messagesWithSystem);

      expect(response).toEqual({
        content: '{"label":"yes"}',
        model: 'claude-3-5-haiku-20241022',
        usage: { inputTokens: 12, outputTokens: 4 },
      });
    });

    it('should retry a server error and report retry events', async () => {
      const onRetryEvent = vi.fn<(event: RetryEvent) => void>();
      const adapter = new AnthropicAdapter(
        createMockConfig({ retry: { maxRetries: 1, maxDelayMs: 1 }, onRetryEvent })
      );
      create.mockRejectedValueOnce(new Anthropic.APIError(503, undefined, 'overloaded', undefined))
        .mockResolvedValue(createMockResponse());

      const response = await adapter.complete(messagesWithSystem);

      expect(response.content).toBe('{"label":"yes"}');
      expect(create).toHaveBeenCalledTimes(2);
      expect(onRetryEvent.mock.calls.map(([event]) => event.type)).toEqual(['attempt_failed', 'retrying']);
    });
  });

  describe('error mapping', () => {
    const cases: Array<[string, () => Error, new (...args: never[]) => Error]> = [
      ['401', () => new Anthropic.APIError(401, undefined, 'invalid x-api-key', undefined), AuthenticationError],
      ['400', () => new Anthropic.APIError(400, undefined, 'bad request', undefined), InvalidRequestError],
      ['404', () => new Anthropic.APIError(404, undefined, 'no such model', undefined), ModelNotFoundError],
      ['500', () => new Anthropic.APIError(500, undefined, 'internal', undefined), ServerError],
      ['timeout', () => new Anthropic.APIConnectionTimeoutError({ message: 'timed out' }), TimeoutError],
      ['connection', () => new Anthropic.APIConnectionError({ message: 'socket hang up' }), NetworkError],
      ['abort', () => new Anthropic.APIUserAbortError(), AbortedError],
    ];

    it.each(cases)('should map %s', async (_label, makeError, expected) => {
      create.mockRejectedValue(makeError());
      const adapter = new AnthropicAdapter(createMockConfig());

      await expect(adapter.complete(messagesWithSystem)).rejects.toBeInstanceOf(expected);
    });

    it('should read retry-after seconds on a rate limit', async () => {
      create.mockRejectedValue(new Anthropic.APIError(429, undefined, 'slow down', { 'retry-after': '7' }));
      const adapter = new AnthropicAdapter(createMockConfig());

      const error = await adapter.complete(messagesWithSystem).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RateLimitError);
      expect(error instanceof RateLimitError && error.retryAfterMs).toBe(7000);
    });

    it('should fall back to a default rate limit delay', async () => {
      create.mockRejectedValue(new Anthropic.APIError(429, undefined, 'slow down', undefined));
      const adapter = new AnthropicAdapter(createMockConfig());

      const error = await adapter.complete(messagesWithSystem).catch((e: unknown) => e);

      expect(error instanceof RateLimitError && error.retryAfterMs).toBe(60000);
    });
  });

  describe('stream', () => {
    it('should yield text deltas and usage on the final chunk', async () => {
      stream.mockReturnValue(
        events(
          { type: 'message_start', message: { usage: { input_tokens: 9, output_tokens: 0 } } },
          { type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text: 'Paris' } },
          { type: 'content_block_delta', index: 0, delta: { type: 'input_json_delta', partial_json: '{' } },
          { type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text: '.' } },
          { type: 'message_delta', delta: {}, usage: { output_tokens: 3 } },
          { type: 'message_stop' }
        )
      );
      const adapter = new AnthropicAdapter(createMockConfig());

      const chunks = await collect(adapter.stream(messagesWithSystem));

      expect(chunks).toEqual([
        { content: 'Paris', done: false },
        { content: '.', done: false },
        { content: '', done: true, usage: { inputTokens: 9, outputTokens: 3 } },
      ]);
    });

    it('should validate messages before streaming', async () => {
      const adapter = new AnthropicAdapter(createMockConfig());

      await expect(collect(adapter.stream([]))).rejects.toBeInstanceOf(InvalidRequestError);
      expect(stream).not.toHaveBeenCalled();
    });
  });
});
