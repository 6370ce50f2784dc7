/**
 * Reusable retry logic utility
 */

import { sleep as defaultSleep } from "./date";

export type BackoffStrategy = "fixed" | "linear" | "exponential";

export interface RetryOptions {
  /** Total attempts, including the first one */
  maxAttempts: number;
  baseDelayMs: number;
  backoff?: BackoffStrategy;
  jitterMs?: number;
  retryCondition?: (error: unknown) => boolean;
  /** Lower bound for the next delay, e.g. from a Retry-After header */
  minDelayFor?: (error: unknown) => number;
  onRetry?: (state: RetryState, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

/** Scoped to one call of withRetry */
export interface RetryState {
  attempt: number;
  lastError: unknown;
}

export class RetryError extends Error {
  constructor(
    message: string,
    public readonly originalError: unknown,
    public readonly attempt: number,
  ) {
    super(message, { cause: originalError });
    this.name = "RetryError";
  }
}

/**
 * Delay before the attempt following `attempt` (1-based)
 */
export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  backoff: BackoffStrategy,
): number {
  switch (backoff) {
    case "fixed":
      return baseDelayMs;
    case "linear":
      return baseDelayMs * attempt;
    case "exponential":
      return baseDelayMs * Math.pow(2, attempt - 1);
  }
}

/**
 * Executes an operation with retry logic
 * @param operation - The operation to retry; receives the 1-based attempt number
 * @param options - Retry configuration
 * @returns Promise that resolves with the operation result
 * @throws The original error when retryCondition rejects it
 * @throws RetryError if all attempts are exhausted
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const {
    maxAttempts,
    baseDelayMs,
    backoff = "fixed",
    jitterMs = 0,
    retryCondition = () => true,
    minDelayFor = () => 0,
    onRetry,
    sleep = defaultSleep,
  } = options;

  const attempts = Math.max(1, Math.floor(maxAttempts));
  const state: RetryState = { attempt: 0, lastError: undefined };

  while (state.attempt < attempts) {
    state.attempt++;
    try {
      return await operation(state.attempt);
    } catch (error) {
      state.lastError = error;

      if (!retryCondition(error)) {
        throw error;
      }
      if (state.attempt >= attempts) break;

      const jitter = jitterMs > 0 ? Math.floor(Math.random() * jitterMs) : 0;
      const delay = Math.max(
        backoffDelay(state.attempt, baseDelayMs, backoff) + jitter,
        minDelayFor(error),
      );
      onRetry?.({ ...state }, delay);
      await sleep(delay);
    }
  }

  throw new RetryError(
    `Operation failed after ${state.attempt} attempts`,
    state.lastError,
    state.attempt,
  );
}
