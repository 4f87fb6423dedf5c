/**
 * Reusable retry logic utility
 */

import { sleep } from "./time";

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  backoffMultiplier?: number;
  jitterMs?: number;
  retryCondition?: (error: Error) => boolean;
  /** Server-provided wait (e.g. Retry-After) that replaces the computed backoff */
  delayHint?: (error: Error) => number | undefined;
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  /** Aborting cuts the backoff short and rethrows the last error */
  signal?: AbortSignal;
}

/**
 * Computes the backoff delay before retry number `attempt` (0-based)
 */
export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  backoffMultiplier = 2,
  jitterMs = 0,
): number {
  const jitter = jitterMs > 0 ? Math.floor(Math.random() * jitterMs) : 0;
  return baseDelayMs * Math.pow(backoffMultiplier, attempt) + jitter;
}

/**
 * Executes an operation with retry logic
 * @param operation - The operation to retry, given the 0-based attempt number
 * @param options - Retry configuration
 * @returns Promise that resolves with the operation result
 * @throws The last error once retries are exhausted or the error is not retryable
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const {
    maxRetries,
    baseDelayMs,
    backoffMultiplier = 2,
    jitterMs = 250,
    retryCondition = () => true,
    delayHint,
    onRetry,
    signal,
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (caught) {
      const error = caught instanceof Error ? caught : new Error(String(caught));

      if (attempt >= maxRetries || !retryCondition(error)) {
        throw error;
      }

      const delay =
        delayHint?.(error) ??
        backoffDelay(attempt, baseDelayMs, backoffMultiplier, jitterMs);
      onRetry?.(error, attempt + 1, delay);
      await sleep(delay, signal);
      if (signal?.aborted) throw error;
    }
  }
}
