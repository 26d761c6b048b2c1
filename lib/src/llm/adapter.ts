/**
 * LLM Adapter Base Class
 *
 * Common surface for chat model providers. Subclasses implement `complete`
 * and `stream`; everything else is shared.
 */

import type {
  LLMConfig,
  LLMMessage,
  LLMResponse,
  LLMStreamChunk,
  LLMCompletionOptions,
  LLMTokenUsage,
  LLMProvider,
} from './types.js';
import { InvalidRequestError } from './errors.js';

/**
 * Options after merging request overrides over the adapter config.
 */
export type MergedCompletionOptions = Omit<LLMCompletionOptions, 'temperature' | 'maxTokens'> & {
  temperature: number;
  maxTokens: number;
};

/**
 * @example
 * ```typescript
 * class EchoAdapter extends LLMAdapter {
 *   async complete(messages: LLMMessage[]): Promise<LLMResponse> {
 *     const last = messages[messages.length - 1];
 *     return { content: last?.content ?? '', model: this.model, usage: { inputTokens: 0, outputTokens: 0 } };
 *   }
 *   async *stream(messages: LLMMessage[]) {
 *     yield { content: (await this.complete(messages)).content, done: true };
 *   }
 * }
 * ```
 */
export abstract class LLMAdapter {
  protected readonly config: LLMConfig;

  constructor(config: LLMConfig) {
    this.config = config;
  }

  // ===========================================================================
  // Abstract Methods
  // ===========================================================================

  /**
   * @throws {LLMError} If the completion fails after provider-level retries
   */
  abstract complete(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): Promise<LLMResponse>;

  abstract stream(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): AsyncGenerator<LLMStreamChunk, void, unknown>;

  /**
   * Whether the provider is reachable and the model can be used. Providers
   * without a cheap health endpoint report true.
   */
  async isAvailable(): Promise<boolean> {
    return true;
  }

  // ===========================================================================
  // Public Methods
  // ===========================================================================

  get provider(): LLMProvider {
    return this.config.provider;
  }

  get model(): string {
    return this.config.model;
  }

  getConfig(): Readonly<LLMConfig> {
    return { ...this.config };
  }

  /**
   * Drains `stream()` into a single response.
   */
  async streamToCompletion(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): Promise<LLMResponse> {
    const parts: string[] = [];
    let usage: LLMTokenUsage | undefined;

    for await (const chunk of this.stream(messages, options)) {
      parts.push(chunk.content);
      if (chunk.done && chunk.usage) {
        usage = chunk.usage;
      }
    }

    return {
      content: parts.join(''),
      model: this.config.model,
      usage: usage ?? { inputTokens: 0, outputTokens: 0 },
    };
  }

  // ===========================================================================
  // Protected Helper Methods
  // ===========================================================================

  protected mergeOptions(options?: LLMCompletionOptions): MergedCompletionOptions {
    return {
      ...options,
      temperature: options?.temperature ?? this.config.temperature,
      maxTokens: options?.maxTokens ?? this.config.maxTokens,
    };
  }

  /**
   * Splits out the system messages (joined with a blank line) from the
   * conversation.
   */
  protected extractSystemMessage(
    messages: LLMMessage[]
  ): [string | undefined, LLMMessage[]] {
    const system = messages.filter((m) => m.role === 'system').map((m) => m.content);
    const conversation = messages.filter((m) => m.role !== 'system');

    return [system.length > 0 ? system.join('\n\n') : undefined, conversation];
  }

  /**
   * @throws {InvalidRequestError} On an empty conversation
   */
  protected validateMessages(messages: LLMMessage[]): void {
    if (messages.length === 0) {
      throw new InvalidRequestError('Messages array must not be empty', this.config.provider);
    }

    if (!messages.some((m) => m.role !== 'system')) {
      throw new InvalidRequestError(
        'Messages must contain at least one user or assistant message',
        this.config.provider
      );
    }
  }
}
