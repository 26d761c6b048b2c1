/**
 * Call Deadlines
 */

export interface TimeoutOptions {
  timeoutMs: number;
  /** Error to reject with once the deadline passes */
  onTimeout: () => Error;
}

/**
 * Runs `operation` with a signal that aborts after `timeoutMs`. The returned
 * promise settles at the deadline even if the operation ignores its signal.
 *
 * Run cancellation is not wired in here: the orchestrator checks it between
 * steps, so a call that is already under way is allowed to finish.
 *
 * @example
 * ```typescript
 * const docs = await withTimeout((signal) => store.search(query, 4, { signal }), {
 *   timeoutMs: 60000,
 *   onTimeout: () => new RetrievalError('TIMEOUT', 'Local retrieval timed out'),
 * });
 * ```
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  options: TimeoutOptions
): Promise<T> {
  const { timeoutMs, onTimeout } = options;
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = onTimeout();
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
