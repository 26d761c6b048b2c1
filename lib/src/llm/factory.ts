/**
 * LLM Adapter Factory
 *
 * Builds an adapter from a provider config. Adapter modules register
 * themselves on import, so import `./adapters/index.js` (or the module
 * root) before calling the factory.
 */

import { LLMAdapter } from './adapter.js';
import { LLMError } from './errors.js';
import {
  type AnthropicConfig,
  type LLMProvider,
  type OllamaConfig,
  type ProviderConfigInput,
  DEFAULT_MODELS,
  LLMErrorCode,
  ProviderConfigSchema,
} from './types.js';

// =============================================================================
// Adapter Registry
// =============================================================================

interface ProviderConfigMap {
  ollama: OllamaConfig;
  anthropic: AnthropicConfig;
}

export type AdapterBuilder<P extends LLMProvider> = (
  config: ProviderConfigMap[P]
) => LLMAdapter;

const adapterRegistry: { [P in LLMProvider]?: AdapterBuilder<P> } = {};

/**
 * @example
 * ```typescript
 * registerAdapter('ollama', (config) => new OllamaAdapter(config));
 * ```
 */
export function registerAdapter<P extends LLMProvider>(
  provider: P,
  build: AdapterBuilder<P>
): void {
  const registry: { [K in P]?: AdapterBuilder<K> } = adapterRegistry;
  registry[provider] = build;
}

export function isAdapterRegistered(provider: LLMProvider): boolean {
  return adapterRegistry[provider] !== undefined;
}

export function getRegisteredProviders(): LLMProvider[] {
  const providers: LLMProvider[] = ['ollama', 'anthropic'];
  return providers.filter(isAdapterRegistered);
}

// =============================================================================
// Factory Function
// =============================================================================

function notRegistered(provider: LLMProvider): LLMError {
  const registered = getRegisteredProviders();
  const available =
    registered.length > 0
      ? `Available providers: ${registered.join(', ')}`
      : 'No providers are registered; import the adapters module first.';

  return new LLMError({
    code: LLMErrorCode.MODEL_NOT_FOUND,
    message: `LLM provider '${provider}' is not registered. ${available}`,
    provider,
    retryable: false,
  });
}

/**
 * @throws {LLMError} `invalid_request` when the config fails validation,
 *   `model_not_found` when no adapter is registered for the provider
 *
 * @example
 * ```typescript
 * const adapter = createLLMAdapter({
 *   provider: 'ollama',
 *   model: 'llama3.2:3b-instruct-fp16',
 *   baseUrl: 'http://localhost:11434',
 * });
 * ```
 */
export function createLLMAdapter(input: ProviderConfigInput): LLMAdapter {
  const parsed = ProviderConfigSchema.safeParse(input);

  if (!parsed.success) {
    throw new LLMError({
      code: LLMErrorCode.INVALID_REQUEST,
      message: `Invalid LLM configuration: ${parsed.error.errors
        .map((e) => `${e.path.join('.')}: ${e.message}`)
        .join(', ')}`,
      provider: input.provider,
      retryable: false,
    });
  }

  const config = parsed.data;
  switch (config.provider) {
    case 'ollama': {
      const build = adapterRegistry.ollama;
      if (!build) throw notRegistered(config.provider);
      return build(config);
    }
    case 'anthropic': {
      const build = adapterRegistry.anthropic;
      if (!build) throw notRegistered(config.provider);
      return build(config);
    }
  }
}

/**
 * Adapter for `provider` with its default model.
 */
export function createDefaultAdapter(
  provider: LLMProvider,
  overrides?: { model?: string; temperature?: number; maxTokens?: number }
): LLMAdapter {
  return createLLMAdapter({
    provider,
    model: overrides?.model ?? DEFAULT_MODELS[provider],
    temperature: overrides?.temperature,
    maxTokens: overrides?.maxTokens,
  });
}
