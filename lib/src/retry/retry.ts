/**
 * Retry Utilities
 *
 * Exponential backoff around a single upstream call. The wrapped function is
 * the whole unit of work that gets repeated: callers put exactly the network
 * boundary inside it and keep local, pure steps outside.
 */

import {
  DEFAULT_RETRY_CONFIG,
  RetryEventType,
  type RetryConfig,
  type RetryEvent,
  type RetryEventHandler,
  type RetryPolicy,
} from './types.js';

// ============================================================================
// Retry Utilities
// ============================================================================

/**
 * Calculates the delay before the next retry attempt using exponential backoff.
 *
 * @param attemptNumber - The attempt that just failed (1-based)
 * @param errorRetryAfterMs - Wait hint from the upstream, capped at `maxDelayMs`
 * @returns Delay in milliseconds before the next retry
 *
 * @example
 * calculateRetryDelay(1, { ...DEFAULT_RETRY_CONFIG }); // 1000
 * calculateRetryDelay(2, { ...DEFAULT_RETRY_CONFIG }); // 2000
 */
export function calculateRetryDelay(
  attemptNumber: number,
  config: RetryConfig,
  errorRetryAfterMs?: number
): number {
  if (errorRetryAfterMs !== undefined && errorRetryAfterMs > 0) {
    return Math.min(errorRetryAfterMs, config.maxDelayMs);
  }

  // initialDelayMs * (multiplier ^ (attempt - 1))
  const exponentialDelay =
    config.initialDelayMs * Math.pow(config.backoffMultiplier, attemptNumber - 1);

  let delay = Math.min(exponentialDelay, config.maxDelayMs);

  if (config.jitter) {
    const jitterRange = delay * config.jitterFactor;
    delay += (Math.random() - 0.5) * jitterRange;
    delay = Math.max(0, delay);
  }

  return Math.round(delay);
}

export function createRetryEvent(
  type: RetryEventType,
  attemptNumber: number,
  maxRetries: number,
  error?: unknown,
  nextDelayMs?: number
): RetryEvent {
  return {
    type,
    attemptNumber,
    maxRetries,
    error: error === undefined ? undefined : describeError(error),
    nextDelayMs,
    timestamp: new Date(),
  };
}

function describeError(error: unknown): { name: string; message: string } {
  return error instanceof Error
    ? { name: error.name, message: error.message }
    : { name: 'UnknownError', message: String(error) };
}

/**
 * Sleeps for the specified number of milliseconds. Rejects early when the
 * signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RetryAbortedError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new RetryAbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Merges partial retry config with defaults.
 */
export function mergeRetryConfig(config?: Partial<RetryConfig>): RetryConfig {
  return {
    ...DEFAULT_RETRY_CONFIG,
    ...config,
  };
}

/**
 * Thrown when the caller's abort signal fires between attempts.
 */
export class RetryAbortedError extends Error {
  constructor() {
    super('Operation aborted');
    this.name = 'RetryAbortedError';
  }
}

// ============================================================================
// withRetry Function
// ============================================================================

export interface WithRetryOptions extends RetryPolicy {
  config?: Partial<RetryConfig> | undefined;
  /** Event handler for retry events (useful for logging) */
  onRetryEvent?: RetryEventHandler | undefined;
  abortSignal?: AbortSignal | undefined;
}

/**
 * Runs `fn` until it succeeds, the failure is not retryable, or the retry
 * budget is spent. The last underlying error is rethrown unchanged.
 *
 * @example
 * ```typescript
 * const matches = await withRetry(
 *   async () => index.query(await embedder.embed(query), topK, filter),
 *   { onRetryEvent: (event) => logger.debug('retry', { ...event }) }
 * );
 * ```
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: WithRetryOptions = {}
): Promise<T> {
  const config = mergeRetryConfig(options.config);
  const { onRetryEvent, abortSignal } = options;
  const isRetryable = options.isRetryable ?? (() => true);

  for (let attempt = 1; ; attempt++) {
    if (abortSignal?.aborted) {
      throw new RetryAbortedError();
    }

    onRetryEvent?.(
      createRetryEvent(RetryEventType.ATTEMPT_START, attempt, config.maxRetries)
    );

    try {
      const result = await fn();
      onRetryEvent?.(
        createRetryEvent(
          RetryEventType.ATTEMPT_SUCCEEDED,
          attempt,
          config.maxRetries
        )
      );
      return result;
    } catch (error) {
      const delayMs = handleFailure(
        error,
        attempt,
        config,
        options,
        isRetryable(error)
      );
      await sleep(delayMs, abortSignal);
    }
  }
}

// ============================================================================
// withRetryGenerator Function
// ============================================================================

/**
 * Wraps an async generator with retry logic for streaming.
 *
 * A stream is only restarted while it has produced nothing. Once a value has
 * been yielded, a failure is rethrown as-is so the consumer never sees the
 * same output twice.
 */
export async function* withRetryGenerator<T>(
  fn: () => AsyncGenerator<T, void, unknown>,
  options: WithRetryOptions = {}
): AsyncGenerator<T, void, unknown> {
  const config = mergeRetryConfig(options.config);
  const { onRetryEvent, abortSignal } = options;
  const isRetryable = options.isRetryable ?? (() => true);

  for (let attempt = 1; ; attempt++) {
    if (abortSignal?.aborted) {
      throw new RetryAbortedError();
    }

    onRetryEvent?.(
      createRetryEvent(RetryEventType.ATTEMPT_START, attempt, config.maxRetries)
    );

    let yielded = false;
    try {
      for await (const value of fn()) {
        yielded = true;
        yield value;
      }
      onRetryEvent?.(
        createRetryEvent(
          RetryEventType.ATTEMPT_SUCCEEDED,
          attempt,
          config.maxRetries
        )
      );
      return;
    } catch (error) {
      const delayMs = handleFailure(
        error,
        attempt,
        config,
        options,
        !yielded && isRetryable(error)
      );
      await sleep(delayMs, abortSignal);
    }
  }
}

/**
 * Emits failure events and either rethrows or returns the delay to wait
 * before the next attempt.
 */
function handleFailure(
  error: unknown,
  attempt: number,
  config: RetryConfig,
  options: WithRetryOptions,
  retryable: boolean
): number {
  const { onRetryEvent } = options;

  onRetryEvent?.(
    createRetryEvent(
      RetryEventType.ATTEMPT_FAILED,
      attempt,
      config.maxRetries,
      error
    )
  );

  const isLastAttempt = attempt > config.maxRetries;
  if (isLastAttempt || !retryable) {
    if (isLastAttempt) {
      onRetryEvent?.(
        createRetryEvent(
          RetryEventType.MAX_RETRIES_EXCEEDED,
          attempt,
          config.maxRetries,
          error
        )
      );
    }
    throw error;
  }

  const delayMs = calculateRetryDelay(
    attempt,
    config,
    options.retryAfterMs?.(error)
  );

  onRetryEvent?.(
    createRetryEvent(
      RetryEventType.RETRYING,
      attempt,
      config.maxRetries,
      error,
      delayMs
    )
  );

  return delayMs;
}
