/**
 * Ollama LLM Adapter
 *
 * Talks to a local Ollama server over its REST API (`/api/chat`,
 * `/api/tags`). Streaming responses arrive as newline-delimited JSON.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';

import { LLMAdapter } from '../adapter.js';
import { registerAdapter } from '../factory.js';
import {
  type LLMMessage,
  type LLMResponse,
  type LLMStreamChunk,
  type LLMCompletionOptions,
  type OllamaConfig,
  type RetryEventHandler,
  LLMProvider,
  OllamaConfigSchema,
} from '../types.js';
import {
  AbortedError,
  InvalidRequestError,
  InvalidResponseError,
  LLMError,
  ModelNotFoundError,
  NetworkError,
  RateLimitError,
  ServerError,
  TimeoutError,
} from '../errors.js';
import { withRetry, withRetryGenerator, type WithRetryOptions } from '../retry.js';

// =============================================================================
// Wire Schemas
// =============================================================================

const OllamaChatResponseSchema = z.object({
  model: z.string(),
  message: z.object({
    role: z.string(),
    content: z.string(),
  }),
  done: z.boolean(),
  done_reason: z.string().optional(),
  prompt_eval_count: z.number().int().nonnegative().optional(),
  eval_count: z.number().int().nonnegative().optional(),
});

type OllamaChatResponse = z.infer<typeof OllamaChatResponseSchema>;

const OllamaStreamLineSchema = OllamaChatResponseSchema.partial({ model: true }).extend({
  error: z.string().optional(),
});

const OllamaTagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })),
});

interface OllamaChatRequest {
  model: string;
  messages: LLMMessage[];
  stream: boolean;
  format?: 'json';
  keep_alive?: string;
  options: {
    temperature: number;
    num_predict: number;
    top_p?: number;
    stop?: string[];
  };
}

// =============================================================================
// Adapter Config
// =============================================================================

export type OllamaAdapterConfig = z.input<typeof OllamaConfigSchema> & {
  onRetryEvent?: RetryEventHandler | undefined;
};

// =============================================================================
// OllamaAdapter Implementation
// =============================================================================

/**
 * @example
 * ```typescript
 * const adapter = new OllamaAdapter({
 *   provider: 'ollama',
 *   model: 'llama3.2:3b-instruct-fp16',
 * });
 *
 * const response = await adapter.complete(
 *   [{ role: 'user', content: 'Is the sky blue? Answer in JSON.' }],
 *   { responseFormat: 'json' }
 * );
 * ```
 */
export class OllamaAdapter extends LLMAdapter {
  protected override readonly config: OllamaConfig;
  private readonly http: AxiosInstance;
  private readonly retryOptions: Omit<WithRetryOptions, 'signal'>;

  /**
   * @param config - Ollama configuration
   * @param http - Pre-configured HTTP client (tests inject one)
   */
  constructor(config: OllamaAdapterConfig, http?: AxiosInstance) {
    const parsed = OllamaConfigSchema.parse(config);
    super(parsed);
    this.config = parsed;
    this.http =
      http ??
      axios.create({
        baseURL: parsed.baseUrl,
        timeout: parsed.requestTimeoutMs,
        headers: { 'Content-Type': 'application/json' },
      });
    this.retryOptions = {
      provider: LLMProvider.OLLAMA,
      config: parsed.retry,
      onRetryEvent: config.onRetryEvent,
    };
  }

  async complete(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): Promise<LLMResponse> {
    this.validateMessages(messages);
    const body = this.buildRequest(messages, options, false);

    return withRetry(
      async () => {
        try {
          const response = await this.http.post<unknown>('/api/chat', body, {
            signal: options?.signal,
          });
          return this.toResponse(this.parseChatResponse(response.data));
        } catch (error) {
          throw this.handleError(error);
        }
      },
      { ...this.retryOptions, signal: options?.signal }
    );
  }

  async *stream(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): AsyncGenerator<LLMStreamChunk, void, unknown> {
    this.validateMessages(messages);
    const body = this.buildRequest(messages, options, true);
    const self = this;

    yield* withRetryGenerator<LLMStreamChunk>(
      async function* () {
        try {
          const response = await self.http.post<AsyncIterable<Buffer | string>>(
            '/api/chat',
            body,
            { responseType: 'stream', signal: options?.signal }
          );
          yield* self.readNdjson(response.data);
        } catch (error) {
          throw self.handleError(error);
        }
      },
      { ...this.retryOptions, signal: options?.signal }
    );
  }

  override async isAvailable(): Promise<boolean> {
    try {
      const models = await this.listModels();
      return models.some((name) => name === this.config.model || name === `${this.config.model}:latest`);
    } catch {
      return false;
    }
  }

  /**
   * Names of the models pulled on the server.
   */
  async listModels(): Promise<string[]> {
    try {
      const response = await this.http.get<unknown>('/api/tags');
      const parsed = OllamaTagsResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new InvalidResponseError('Unexpected /api/tags response', LLMProvider.OLLAMA);
      }
      return parsed.data.models.map((m) => m.name);
    } catch (error) {
      throw this.handleError(error);
    }
  }

  // ===========================================================================
  // Private Helper Methods
  // ===========================================================================

  private buildRequest(
    messages: LLMMessage[],
    options: LLMCompletionOptions | undefined,
    stream: boolean
  ): OllamaChatRequest {
    const merged = this.mergeOptions(options);
    const request: OllamaChatRequest = {
      model: this.config.model,
      messages,
      stream,
      options: {
        temperature: merged.temperature,
        num_predict: merged.maxTokens,
      },
    };

    if (merged.responseFormat === 'json') {
      request.format = 'json';
    }
    if (this.config.keepAlive !== undefined) {
      request.keep_alive = this.config.keepAlive;
    }
    if (merged.topP !== undefined) {
      request.options.top_p = merged.topP;
    }
    if (merged.stopSequences !== undefined) {
      request.options.stop = merged.stopSequences;
    }

    return request;
  }

  private parseChatResponse(data: unknown): OllamaChatResponse {
    const parsed = OllamaChatResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new InvalidResponseError(
        `Unexpected /api/chat response: ${parsed.error.errors[0]?.message ?? 'invalid body'}`,
        LLMProvider.OLLAMA,
        parsed.error
      );
    }
    return parsed.data;
  }

  private toResponse(data: OllamaChatResponse): LLMResponse {
    return {
      content: data.message.content,
      model: data.model,
      usage: {
        inputTokens: data.prompt_eval_count ?? 0,
        outputTokens: data.eval_count ?? 0,
      },
    };
  }

  /**
   * Splits the byte stream into lines and turns each JSON line into a chunk.
   * A line may span several network chunks.
   */
  private async *readNdjson(
    source: AsyncIterable<Buffer | string>
  ): AsyncGenerator<LLMStreamChunk, void, unknown> {
    let buffered = '';

    for await (const piece of source) {
      buffered += typeof piece === 'string' ? piece : piece.toString('utf8');

      let newline = buffered.indexOf('\n');
      while (newline >= 0) {
        const line = buffered.slice(0, newline).trim();
        buffered = buffered.slice(newline + 1);
        if (line) {
          const chunk = this.parseStreamLine(line);
          yield chunk;
          if (chunk.done) return;
        }
        newline = buffered.indexOf('\n');
      }
    }

    const rest = buffered.trim();
    if (rest) {
      yield this.parseStreamLine(rest);
    }
  }

  private parseStreamLine(line: string): LLMStreamChunk {
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (error) {
      throw new InvalidResponseError('Malformed stream line from Ollama', LLMProvider.OLLAMA, error);
    }

    const parsed = OllamaStreamLineSchema.safeParse(json);
    if (!parsed.success) {
      throw new InvalidResponseError('Unexpected stream line from Ollama', LLMProvider.OLLAMA, parsed.error);
    }
    if (parsed.data.error) {
      throw new ServerError(`Ollama stream error: ${parsed.data.error}`, LLMProvider.OLLAMA);
    }

    const chunk: LLMStreamChunk = {
      content: parsed.data.message?.content ?? '',
      done: parsed.data.done ?? false,
    };
    if (chunk.done) {
      chunk.usage = {
        inputTokens: parsed.data.prompt_eval_count ?? 0,
        outputTokens: parsed.data.eval_count ?? 0,
      };
    }
    return chunk;
  }

  /**
   * Maps axios failures and HTTP statuses to specific `LLMError`s.
   */
  private handleError(error: unknown): LLMError {
    if (error instanceof LLMError) {
      return error;
    }

    const provider = LLMProvider.OLLAMA;

    if (axios.isCancel(error)) {
      return new AbortedError('Ollama request aborted', provider, error);
    }

    if (axios.isAxiosError(error)) {
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new TimeoutError(`Ollama request timed out: ${error.message}`, provider, 1000, error);
      }

      const status = error.response?.status;
      const detail = describeOllamaError(error.response?.data) ?? error.message;

      if (status === undefined) {
        return new NetworkError(
          `Cannot reach Ollama at ${this.config.baseUrl}: ${error.message}`,
          provider,
          1000,
          error
        );
      }
      if (status === 404) {
        return new ModelNotFoundError(
          `Model '${this.config.model}' not found (ollama pull ${this.config.model}): ${detail}`,
          provider,
          error
        );
      }
      if (status === 429) {
        return new RateLimitError(`Ollama is busy: ${detail}`, provider, 2000, error);
      }
      if (status === 400) {
        return new InvalidRequestError(`Invalid request: ${detail}`, provider, error);
      }
      if (status >= 500) {
        return new ServerError(`Ollama server error (${status}): ${detail}`, provider, 2000, error);
      }
    }

    return LLMError.fromError(error, provider);
  }
}

function describeOllamaError(data: unknown): string | undefined {
  const parsed = z.object({ error: z.string() }).safeParse(data);
  return parsed.success ? parsed.data.error : undefined;
}

// =============================================================================
// Register the Ollama Adapter
// =============================================================================

registerAdapter(LLMProvider.OLLAMA, (config) => new OllamaAdapter(config));

export default OllamaAdapter;
