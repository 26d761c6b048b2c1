/**
 * Anthropic LLM Adapter
 *
 * Hosted alternative to the local Ollama model, backed by the Claude
 * Messages API.
 */

import Anthropic from '@anthropic-ai/sdk';
import type {
  ContentBlock,
  MessageCreateParamsNonStreaming,
  MessageParam,
  MessageStreamEvent,
  TextBlock,
} from '@anthropic-ai/sdk/resources/messages';
import type { z } from 'zod';

import { LLMAdapter } from '../adapter.js';
import { registerAdapter } from '../factory.js';
import {
  type AnthropicConfig,
  type LLMCompletionOptions,
  type LLMMessage,
  type LLMResponse,
  type LLMStreamChunk,
  type RetryEventHandler,
  AnthropicConfigSchema,
  LLMProvider,
} from '../types.js';
import {
  AbortedError,
  AuthenticationError,
  InvalidRequestError,
  LLMError,
  ModelNotFoundError,
  NetworkError,
  RateLimitError,
  ServerError,
  TimeoutError,
} from '../errors.js';
import { withRetry, withRetryGenerator, type WithRetryOptions } from '../retry.js';

// Claude has no constrained JSON mode; the instruction is appended to the
// system prompt instead.
const JSON_ONLY_INSTRUCTION =
  'Respond with a single JSON object and nothing else. Do not wrap it in markdown.';

const DEFAULT_RATE_LIMIT_DELAY_MS = 60000;

// =============================================================================
// Extended Configuration Types
// =============================================================================

export type AnthropicAdapterConfig = z.input<typeof AnthropicConfigSchema> & {
  /** Receives retry events, e.g. for logging */
  onRetryEvent?: RetryEventHandler | undefined;
};

// =============================================================================
// AnthropicAdapter Implementation
// =============================================================================

/**
 * @example
 * ```typescript
 * const adapter = new AnthropicAdapter({
 *   provider: 'anthropic',
 *   model: 'claude-3-5-haiku-20241022',
 *   apiKey: process.env.ANTHROPIC_API_KEY,
 *   retry: { maxRetries: 5, initialDelayMs: 2000 },
 *   onRetryEvent: (event) => logger.warn('llm retry', { type: event.type }),
 * });
 *
 * const response = await adapter.complete([
 *   { role: 'user', content: 'What is retrieval-augmented generation?' },
 * ]);
 * ```
 */
export class AnthropicAdapter extends LLMAdapter {
  private readonly client: Anthropic;
  protected override readonly config: AnthropicConfig;
  private readonly retryOptions: Omit<WithRetryOptions, 'signal'>;

  constructor(config: AnthropicAdapterConfig) {
    const parsed = AnthropicConfigSchema.parse(config);
    super(parsed);
    this.config = parsed;
    this.retryOptions = {
      provider: LLMProvider.ANTHROPIC,
      config: parsed.retry,
      onRetryEvent: config.onRetryEvent,
    };

    this.client = new Anthropic({
      apiKey: parsed.apiKey ?? process.env.ANTHROPIC_API_KEY,
      baseURL: parsed.baseUrl,
    });
  }

  // ===========================================================================
  // Abstract Method Implementations
  // ===========================================================================

  async complete(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): Promise<LLMResponse> {
    this.validateMessages(messages);
    const params = this.buildParams(messages, options);

    return withRetry(
      async () => {
        try {
          const response = await this.client.messages.create(params, {
            signal: options?.signal,
          });

          return {
            content: this.extractTextContent(response.content),
            model: response.model,
            usage: {
              inputTokens: response.usage.input_tokens,
              outputTokens: response.usage.output_tokens,
            },
          };
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
    const params = this.buildParams(messages, options);
    const self = this;

    yield* withRetryGenerator<LLMStreamChunk>(
      async function* () {
        try {
          const stream = self.client.messages.stream(params, { signal: options?.signal });

          let inputTokens = 0;
          let outputTokens = 0;

          for await (const event of stream) {
            if (event.type === 'message_start') {
              inputTokens = event.message.usage.input_tokens;
            } else if (event.type === 'message_delta') {
              outputTokens = event.usage.output_tokens;
            }

            const chunk = self.processStreamEvent(event);
            if (chunk) {
              if (chunk.done) {
                chunk.usage = { inputTokens, outputTokens };
              }
              yield chunk;
            }
          }
        } catch (error) {
          throw self.handleError(error);
        }
      },
      { ...this.retryOptions, signal: options?.signal }
    );
  }

  // ===========================================================================
  // Private Helper Methods
  // ===========================================================================

  private buildParams(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): MessageCreateParamsNonStreaming {
    const merged = this.mergeOptions(options);
    const [systemMessage, conversation] = this.extractSystemMessage(messages);
    const system =
      merged.responseFormat === 'json'
        ? [systemMessage, JSON_ONLY_INSTRUCTION].filter(Boolean).join('\n\n')
        : systemMessage;

    const params: MessageCreateParamsNonStreaming = {
      model: this.config.model,
      max_tokens: merged.maxTokens,
      temperature: merged.temperature,
      messages: this.convertMessages(conversation),
    };

    if (system !== undefined) {
      params.system = system;
    }
    if (merged.stopSequences !== undefined) {
      params.stop_sequences = merged.stopSequences;
    }
    if (merged.topP !== undefined) {
      params.top_p = merged.topP;
    }

    return params;
  }

  private convertMessages(messages: LLMMessage[]): MessageParam[] {
    return messages.flatMap((msg): MessageParam[] =>
      msg.role === 'system' ? [] : [{ role: msg.role, content: msg.content }]
    );
  }

  private extractTextContent(content: ContentBlock[]): string {
    return content
      .filter((block): block is TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('');
  }

  private processStreamEvent(event: MessageStreamEvent): LLMStreamChunk | undefined {
    switch (event.type) {
      case 'content_block_delta':
        if (event.delta.type === 'text_delta') {
          return { content: event.delta.text, done: false };
        }
        break;

      case 'message_stop':
        return { content: '', done: true };
    }

    return undefined;
  }

  /**
   * Maps SDK errors to specific `LLMError`s. Connection errors are checked
   * first since the SDK derives them from `APIError`.
   */
  private handleError(error: unknown): LLMError {
    const provider = LLMProvider.ANTHROPIC;

    if (error instanceof LLMError) {
      return error;
    }
    if (error instanceof Anthropic.APIUserAbortError) {
      return new AbortedError('Request aborted', provider, error);
    }
    if (error instanceof Anthropic.APIConnectionTimeoutError) {
      return new TimeoutError(`Request timeout: ${error.message}`, provider, 1000, error);
    }
    if (error instanceof Anthropic.APIConnectionError) {
      return new NetworkError(`Connection error: ${error.message}`, provider, 2000, error);
    }

    if (error instanceof Anthropic.APIError) {
      const status = error.status;
      const message = error.message;

      if (status === 401) {
        return new AuthenticationError(`Authentication failed: ${message}`, provider, error);
      }
      if (status === 429) {
        return new RateLimitError(
          `Rate limit exceeded: ${message}`,
          provider,
          this.extractRetryAfter(error.headers),
          error
        );
      }
      if (status === 400) {
        return new InvalidRequestError(`Invalid request: ${message}`, provider, error);
      }
      if (status === 404) {
        return new ModelNotFoundError(`Model not found: ${message}`, provider, error);
      }
      if (status !== undefined && status >= 500) {
        return new ServerError(`Server error: ${message}`, provider, 5000, error);
      }
    }

    return LLMError.fromError(error, provider);
  }

  /**
   * `retry-after` is given in seconds.
   */
  private extractRetryAfter(
    headers: Record<string, string | null | undefined> | undefined
  ): number {
    const retryAfter = headers?.['retry-after'];
    if (retryAfter) {
      const seconds = parseInt(retryAfter, 10);
      if (!isNaN(seconds)) {
        return seconds * 1000;
      }
    }
    return DEFAULT_RATE_LIMIT_DELAY_MS;
  }
}

// =============================================================================
// Register the Anthropic Adapter
// =============================================================================

registerAdapter(LLMProvider.ANTHROPIC, (config) => new AnthropicAdapter(config));

export default AnthropicAdapter;
