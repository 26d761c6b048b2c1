/**
 * LLM Adapter Types
 *
 * Provider-neutral request/response types for the chat models that drive
 * routing, grading and generation. A local Ollama server is the default
 * provider; Anthropic is available as a hosted alternative.
 */

import { z } from 'zod';

// ============================================================================
// LLM Provider Types
// ============================================================================

export const LLMProvider = {
  OLLAMA: 'ollama',
  ANTHROPIC: 'anthropic',
} as const;

export type LLMProvider = (typeof LLMProvider)[keyof typeof LLMProvider];

export const LLMProviderSchema = z.enum(['ollama', 'anthropic']);

// ============================================================================
// Message Types
// ============================================================================

export const MessageRole = {
  SYSTEM: 'system',
  USER: 'user',
  ASSISTANT: 'assistant',
} as const;

export type MessageRole = (typeof MessageRole)[keyof typeof MessageRole];

export const LLMMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string().min(1),
});

export type LLMMessage = z.infer<typeof LLMMessageSchema>;

// ============================================================================
// Configuration Types
// ============================================================================

export const LLMConfigSchema = z.object({
  provider: LLMProviderSchema,
  /** Model identifier, e.g. `llama3.2:3b-instruct-fp16` */
  model: z.string().min(1),
  maxTokens: z.number().int().positive().max(100000).default(1024),
  /** Graders need deterministic output, so the default is 0 */
  temperature: z.number().min(0).max(2).default(0),
});

export type LLMConfig = z.infer<typeof LLMConfigSchema>;

// ============================================================================
// Token Usage / Response Types
// ============================================================================

export const LLMTokenUsageSchema = z.object({
  inputTokens: z.number().int().nonnegative(),
  outputTokens: z.number().int().nonnegative(),
});

export type LLMTokenUsage = z.infer<typeof LLMTokenUsageSchema>;

export const LLMResponseSchema = z.object({
  content: z.string(),
  usage: LLMTokenUsageSchema,
  model: z.string().min(1),
});

export type LLMResponse = z.infer<typeof LLMResponseSchema>;

export const LLMStreamChunkSchema = z.object({
  content: z.string(),
  done: z.boolean(),
  /** Only present on the final chunk */
  usage: LLMTokenUsageSchema.optional(),
});

export type LLMStreamChunk = z.infer<typeof LLMStreamChunkSchema>;

// ============================================================================
// Request Types
// ============================================================================

/**
 * Output format requested from the model. `json` switches providers that
 * support it into constrained JSON decoding.
 */
export const ResponseFormat = {
  TEXT: 'text',
  JSON: 'json',
} as const;

export type ResponseFormat = (typeof ResponseFormat)[keyof typeof ResponseFormat];

export const LLMCompletionOptionsSchema = z.object({
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().max(100000).optional(),
  stopSequences: z.array(z.string()).optional(),
  topP: z.number().min(0).max(1).optional(),
  responseFormat: z.enum(['text', 'json']).optional(),
  /** Aborts the underlying HTTP request */
  signal: z.instanceof(AbortSignal).optional(),
});

export type LLMCompletionOptions = z.infer<typeof LLMCompletionOptionsSchema>;

// ============================================================================
// Error Types
// ============================================================================

export const LLMErrorCode = {
  RATE_LIMIT: 'rate_limit',
  AUTH_ERROR: 'auth_error',
  INVALID_REQUEST: 'invalid_request',
  MODEL_NOT_FOUND: 'model_not_found',
  TIMEOUT: 'timeout',
  SERVER_ERROR: 'server_error',
  NETWORK_ERROR: 'network_error',
  /** Provider answered with a body that does not match its API */
  INVALID_RESPONSE: 'invalid_response',
  /** Caller aborted the request */
  ABORTED: 'aborted',
  UNKNOWN: 'unknown',
} as const;

export type LLMErrorCode = (typeof LLMErrorCode)[keyof typeof LLMErrorCode];

export const LLMErrorCodeSchema = z.enum([
  'rate_limit',
  'auth_error',
  'invalid_request',
  'model_not_found',
  'timeout',
  'server_error',
  'network_error',
  'invalid_response',
  'aborted',
  'unknown',
]);

export const LLMErrorInfoSchema = z.object({
  code: LLMErrorCodeSchema,
  message: z.string(),
  provider: LLMProviderSchema,
  retryable: z.boolean(),
  retryAfterMs: z.number().int().nonnegative().optional(),
  originalError: z.unknown().optional(),
});

export type LLMErrorInfo = z.infer<typeof LLMErrorInfoSchema>;

// ============================================================================
// Retry Configuration Types
// ============================================================================

export const RetryableErrorCodeSchema = z.enum([
  'rate_limit',
  'timeout',
  'server_error',
  'network_error',
]);

export type RetryableErrorCode = z.infer<typeof RetryableErrorCodeSchema>;

export const RetryConfigSchema = z.object({
  /** Retries after the initial attempt */
  maxRetries: z.number().int().nonnegative().default(2),
  initialDelayMs: z.number().int().positive().default(500),
  maxDelayMs: z.number().int().positive().default(10000),
  backoffMultiplier: z.number().positive().default(2),
  jitter: z.boolean().default(true),
  /** Maximum jitter as a fraction of the delay */
  jitterFactor: z.number().min(0).max(1).default(0.25),
  retryableErrorCodes: z.array(RetryableErrorCodeSchema).default([
    'rate_limit',
    'timeout',
    'server_error',
    'network_error',
  ]),
});

export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type RetryConfigInput = z.input<typeof RetryConfigSchema>;

export interface RetryEvent {
  type: 'attempt_failed' | 'retrying' | 'max_retries_exceeded';
  /** 1-based */
  attemptNumber: number;
  maxRetries: number;
  error: LLMErrorInfo;
  /** Only set on 'retrying' */
  nextDelayMs?: number;
  timestamp: Date;
}

export type RetryEventHandler = (event: RetryEvent) => void;

// ============================================================================
// Provider-Specific Configuration Types
// ============================================================================

export const OllamaConfigSchema = LLMConfigSchema.extend({
  provider: z.literal('ollama'),
  /** Ollama server root, e.g. http://localhost:11434 */
  baseUrl: z.string().url().default('http://localhost:11434'),
  /** How long Ollama keeps the model loaded after a request, e.g. '5m' */
  keepAlive: z.string().optional(),
  /** HTTP timeout for one request */
  requestTimeoutMs: z.number().int().positive().default(120000),
  retry: RetryConfigSchema.partial().optional(),
});

export type OllamaConfig = z.infer<typeof OllamaConfigSchema>;

export const AnthropicConfigSchema = LLMConfigSchema.extend({
  provider: z.literal('anthropic'),
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
  retry: RetryConfigSchema.partial().optional(),
});

export type AnthropicConfig = z.infer<typeof AnthropicConfigSchema>;

export const ProviderConfigSchema = z.discriminatedUnion('provider', [
  OllamaConfigSchema,
  AnthropicConfigSchema,
]);

export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type ProviderConfigInput = z.input<typeof ProviderConfigSchema>;

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_MODELS: Record<LLMProvider, string> = {
  ollama: 'llama3.2:3b-instruct-fp16',
  anthropic: 'claude-3-5-haiku-20241022',
};
