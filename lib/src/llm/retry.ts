/**
 * Retry Utilities for LLM Adapters
 *
 * Exponential backoff with jitter for transient provider failures. These
 * retries live inside an adapter call; the workflow itself never retries a
 * failed adapter call.
 */

import {
  RetryConfigSchema,
  type LLMProvider,
  type RetryConfig,
  type RetryConfigInput,
  type RetryEvent,
  type RetryEventHandler,
} from './types.js';
import { AbortedError, LLMError } from './errors.js';

// ============================================================================
// Retry Utilities
// ============================================================================

/**
 * Delay before the retry that follows attempt `attemptNumber` (1-based).
 * A provider-supplied retry-after wins, capped at `maxDelayMs`.
 */
export function calculateRetryDelay(
  attemptNumber: number,
  config: RetryConfig,
  errorRetryAfterMs?: number,
  random: () => number = Math.random
): number {
  if (errorRetryAfterMs !== undefined && errorRetryAfterMs > 0) {
    return Math.min(errorRetryAfterMs, config.maxDelayMs);
  }

  const exponential =
    config.initialDelayMs * Math.pow(config.backoffMultiplier, attemptNumber - 1);
  let delay = Math.min(exponential, config.maxDelayMs);

  if (config.jitter) {
    const jitterRange = delay * config.jitterFactor;
    delay = Math.max(0, delay + (random() - 0.5) * jitterRange);
  }

  return Math.round(delay);
}

export function shouldRetry(error: unknown, config: RetryConfig): boolean {
  if (!(error instanceof LLMError) || !error.retryable) {
    return false;
  }
  return config.retryableErrorCodes.some((code) => code === error.code);
}

export function mergeRetryConfig(config?: RetryConfigInput): RetryConfig {
  return RetryConfigSchema.parse(config ?? {});
}

/**
 * Resolves after `ms`, or rejects early when `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

// ============================================================================
// withRetry / withRetryGenerator
// ============================================================================

export interface WithRetryOptions {
  /** Provider recorded on errors raised by the retry loop itself */
  provider: LLMProvider;
  config?: RetryConfigInput | undefined;
  onRetryEvent?: RetryEventHandler | undefined;
  signal?: AbortSignal | undefined;
}

interface RetryLoop {
  config: RetryConfig;
  options: WithRetryOptions;
}

function emit(
  options: WithRetryOptions,
  event: Omit<RetryEvent, 'timestamp'>
): void {
  options.onRetryEvent?.({ ...event, timestamp: new Date() });
}

function assertNotAborted(options: WithRetryOptions): void {
  if (options.signal?.aborted) {
    throw new AbortedError('Request aborted', options.provider, options.signal.reason);
  }
}

async function backoff(options: WithRetryOptions, delayMs: number): Promise<void> {
  try {
    await sleep(delayMs, options.signal);
  } catch (reason) {
    throw new AbortedError('Request aborted during backoff', options.provider, reason);
  }
}

/**
 * Records a failed attempt. Returns the backoff delay when another attempt
 * should follow, otherwise throws the normalized error.
 */
function onAttemptFailed(
  loop: RetryLoop,
  attempt: number,
  error: unknown
): number {
  const { config, options } = loop;
  const llmError = LLMError.fromError(error, options.provider);

  emit(options, {
    type: 'attempt_failed',
    attemptNumber: attempt,
    maxRetries: config.maxRetries,
    error: llmError.info,
  });

  const exhausted = attempt > config.maxRetries;
  if (exhausted || !shouldRetry(llmError, config) || options.signal?.aborted) {
    if (exhausted) {
      emit(options, {
        type: 'max_retries_exceeded',
        attemptNumber: attempt,
        maxRetries: config.maxRetries,
        error: llmError.info,
      });
    }
    throw llmError;
  }

  const delayMs = calculateRetryDelay(attempt, config, llmError.retryAfterMs);
  emit(options, {
    type: 'retrying',
    attemptNumber: attempt,
    maxRetries: config.maxRetries,
    error: llmError.info,
    nextDelayMs: delayMs,
  });
  return delayMs;
}

/**
 * Runs `fn`, retrying retryable `LLMError`s with exponential backoff.
 *
 * @example
 * ```typescript
 * const response = await withRetry(() => http.post('/api/chat', body), {
 *   provider: 'ollama',
 *   config: { maxRetries: 3 },
 * });
 * ```
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: WithRetryOptions
): Promise<T> {
  const loop: RetryLoop = { config: mergeRetryConfig(options.config), options };

  for (let attempt = 1; ; attempt++) {
    assertNotAborted(options);
    try {
      return await fn();
    } catch (error) {
      await backoff(options, onAttemptFailed(loop, attempt, error));
    }
  }
}

/**
 * Streaming variant of {@link withRetry}. A failed stream is restarted from
 * the beginning, so retries only happen before the first chunk is yielded.
 */
export async function* withRetryGenerator<T>(
  fn: () => AsyncGenerator<T, void, unknown>,
  options: WithRetryOptions
): AsyncGenerator<T, void, unknown> {
  const loop: RetryLoop = { config: mergeRetryConfig(options.config), options };

  for (let attempt = 1; ; attempt++) {
    assertNotAborted(options);
    let yielded = false;
    try {
      for await (const value of fn()) {
        yielded = true;
        yield value;
      }
      return;
    } catch (error) {
      if (yielded) {
        throw LLMError.fromError(error, options.provider);
      }
      await backoff(options, onAttemptFailed(loop, attempt, error));
    }
  }
}
