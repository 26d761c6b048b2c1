/**
 * LLM Error Types
 *
 * Error classes raised by the LLM adapters. Each carries structured
 * `LLMErrorInfo` so retry logic and the workflow's error mapping can branch
 * on the code instead of parsing messages.
 */

import {
  type LLMProvider,
  type LLMErrorInfo,
  LLMErrorCode,
} from './types.js';

// =============================================================================
// Base LLM Error Class
// =============================================================================

export class LLMError extends Error {
  readonly info: LLMErrorInfo;

  constructor(info: LLMErrorInfo) {
    super(info.message);
    this.name = 'LLMError';
    this.info = info;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  get code(): LLMErrorCode {
    return this.info.code;
  }

  get provider(): LLMProvider {
    return this.info.provider;
  }

  get retryable(): boolean {
    return this.info.retryable;
  }

  get retryAfterMs(): number | undefined {
    return this.info.retryAfterMs;
  }

  static fromError(error: unknown, provider: LLMProvider): LLMError {
    if (error instanceof LLMError) {
      return error;
    }

    return new LLMError({
      code: LLMErrorCode.UNKNOWN,
      message: error instanceof Error ? error.message : String(error),
      provider,
      retryable: false,
      originalError: error,
    });
  }
}

// =============================================================================
// Specific Error Classes
// =============================================================================

/**
 * Provider throttled the request. Retryable after `retryAfterMs`.
 */
export class RateLimitError extends LLMError {
  constructor(
    message: string,
    provider: LLMProvider,
    retryAfterMs = 30000,
    originalError?: unknown
  ) {
    super({
      code: LLMErrorCode.RATE_LIMIT,
      message,
      provider,
      retryable: true,
      retryAfterMs,
      originalError,
    });
    this.name = 'RateLimitError';
  }
}

export class AuthenticationError extends LLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super({
      code: LLMErrorCode.AUTH_ERROR,
      message,
      provider,
      retryable: false,
      originalError,
    });
    this.name = 'AuthenticationError';
  }
}

export class InvalidRequestError extends LLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super({
      code: LLMErrorCode.INVALID_REQUEST,
      message,
      provider,
      retryable: false,
      originalError,
    });
    this.name = 'InvalidRequestError';
  }
}

/**
 * The model is not pulled (Ollama) or not offered (hosted provider).
 *
 * @example
 * ```typescript
 * if (error instanceof ModelNotFoundError) {
 *   console.log(`Run: ollama pull ${adapter.model}`);
 * }
 * ```
 */
export class ModelNotFoundError extends LLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super({
      code: LLMErrorCode.MODEL_NOT_FOUND,
      message,
      provider,
      retryable: false,
      originalError,
    });
    this.name = 'ModelNotFoundError';
  }
}

export class TimeoutError extends LLMError {
  constructor(
    message: string,
    provider: LLMProvider,
    retryAfterMs = 1000,
    originalError?: unknown
  ) {
    super({
      code: LLMErrorCode.TIMEOUT,
      message,
      provider,
      retryable: true,
      retryAfterMs,
      originalError,
    });
    this.name = 'TimeoutError';
  }
}

export class ServerError extends LLMError {
  constructor(
    message: string,
    provider: LLMProvider,
    retryAfterMs = 2000,
    originalError?: unknown
  ) {
    super({
      code: LLMErrorCode.SERVER_ERROR,
      message,
      provider,
      retryable: true,
      retryAfterMs,
      originalError,
    });
    this.name = 'ServerError';
  }
}

/**
 * Connection refused or reset; usually the local server is not running.
 */
export class NetworkError extends LLMError {
  constructor(
    message: string,
    provider: LLMProvider,
    retryAfterMs = 1000,
    originalError?: unknown
  ) {
    super({
      code: LLMErrorCode.NETWORK_ERROR,
      message,
      provider,
      retryable: true,
      retryAfterMs,
      originalError,
    });
    this.name = 'NetworkError';
  }
}

export class InvalidResponseError extends LLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super({
      code: LLMErrorCode.INVALID_RESPONSE,
      message,
      provider,
      retryable: false,
      originalError,
    });
    this.name = 'InvalidResponseError';
  }
}

export class AbortedError extends LLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super({
      code: LLMErrorCode.ABORTED,
      message,
      provider,
      retryable: false,
      originalError,
    });
    this.name = 'AbortedError';
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isLLMError(error: unknown): error is LLMError {
  return error instanceof LLMError;
}

export function isRetryableError(error: unknown): boolean {
  return isLLMError(error) && error.retryable;
}

// =============================================================================
// Error Factory Function
// =============================================================================

/**
 * Creates the specific error class matching `info.code`.
 */
export function createSpecificError(info: LLMErrorInfo): LLMError {
  const { message, provider, retryAfterMs, originalError } = info;

  switch (info.code) {
    case LLMErrorCode.RATE_LIMIT:
      return new RateLimitError(message, provider, retryAfterMs, originalError);
    case LLMErrorCode.AUTH_ERROR:
      return new AuthenticationError(message, provider, originalError);
    case LLMErrorCode.INVALID_REQUEST:
      return new InvalidRequestError(message, provider, originalError);
    case LLMErrorCode.MODEL_NOT_FOUND:
      return new ModelNotFoundError(message, provider, originalError);
    case LLMErrorCode.TIMEOUT:
      return new TimeoutError(message, provider, retryAfterMs, originalError);
    case LLMErrorCode.SERVER_ERROR:
      return new ServerError(message, provider, retryAfterMs, originalError);
    case LLMErrorCode.NETWORK_ERROR:
      return new NetworkError(message, provider, retryAfterMs, originalError);
    case LLMErrorCode.INVALID_RESPONSE:
      return new InvalidResponseError(message, provider, originalError);
    case LLMErrorCode.ABORTED:
      return new AbortedError(message, provider, originalError);
    case LLMErrorCode.UNKNOWN:
    default:
      return new LLMError(info);
  }
}
