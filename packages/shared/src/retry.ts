/**
 * Retry Utilities
 *
 * Exponential backoff retry logic with jitter.
 */

import { isRetryableError, toError } from "./errors";

// ============================================
// Configuration
// ============================================

export interface RetryOptions {
  /** Maximum number of attempts, first call included */
  maxAttempts?: number;
  /** Base delay between retries (ms) */
  baseDelayMs?: number;
  /** Maximum delay between retries (ms) */
  maxDelayMs?: number;
  /** Upper bound of the random jitter added to each delay (ms) */
  jitterMs?: number;
  /** Custom function to check if error is retryable */
  isRetryable?: (error: unknown) => boolean;
  /** Callback called before each retry */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Stops further attempts once aborted */
  signal?: AbortSignal;
}

const DEFAULT_OPTIONS: Required<
  Omit<RetryOptions, "onRetry" | "isRetryable" | "signal">
> = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 10_000,
  jitterMs: 250,
};

// ============================================
// Retry Function
// ============================================

/**
 * Execute a function with exponential backoff retry.
 *
 * @throws Last error if all retries fail, or the abort reason once aborted
 *
 * @example
 * ```typescript
 * const rows = await withRetry(
 *   () => client.getLogs(project, logstore, request),
 *   { maxAttempts: 3, baseDelayMs: 500 }
 * );
 * ```
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options?: RetryOptions
): Promise<T> {
  const { maxAttempts, baseDelayMs, maxDelayMs, jitterMs } = {
    ...DEFAULT_OPTIONS,
    ...options,
  };

  const checkRetryable = options?.isRetryable ?? isRetryableError;
  const signal = options?.signal;

  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= Math.max(1, maxAttempts); attempt++) {
    signal?.throwIfAborted();

    try {
      return await fn();
    } catch (error) {
      lastError = toError(error);

      if (!checkRetryable(error)) {
        throw lastError;
      }

      // No delay after the last attempt
      if (attempt >= maxAttempts) {
        break;
      }

      const delay = calculateDelay(attempt, baseDelayMs, maxDelayMs, jitterMs);

      options?.onRetry?.(attempt, lastError, delay);

      await sleep(delay, signal);
    }
  }

  throw lastError;
}

// ============================================
// Helper Functions
// ============================================

/**
 * Calculate delay with exponential backoff and jitter.
 */
export function calculateDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  jitterMs: number
): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt - 1);
  const jitter = Math.random() * jitterMs;
  return Math.min(exponentialDelay + jitter, maxDelayMs);
}

/**
 * Sleep for specified milliseconds, waking early with the abort reason.
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
