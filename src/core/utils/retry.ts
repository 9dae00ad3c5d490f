/**
 * Reusable retry logic utility
 */

import { sleep, toError } from "./async";

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  backoffMultiplier?: number;
  maxDelayMs?: number;
  jitterMs?: number;
  retryCondition?: (error: Error) => boolean;
  /** Server-provided wait (e.g. Retry-After) that replaces the backoff delay */
  delayHint?: (error: Error) => number | undefined;
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
}

export class RetryError extends Error {
  constructor(
    message: string,
    public originalError: Error,
    public attempt: number,
  ) {
    super(message);
    this.name = "RetryError";
  }
}

/**
 * Computes the wait before retry number `attempt + 1`
 * @param attempt - Zero-based index of the attempt that just failed
 */
export function backoffDelay(
  attempt: number,
  options: Pick<
    RetryOptions,
    "baseDelayMs" | "backoffMultiplier" | "maxDelayMs" | "jitterMs"
  >,
  hintMs?: number,
): number {
  const {
    baseDelayMs,
    backoffMultiplier = 2,
    maxDelayMs = Number.POSITIVE_INFINITY,
    jitterMs = 250,
  } = options;
  const jitter = jitterMs > 0 ? Math.floor(Math.random() * jitterMs) : 0;
  const computed =
    hintMs !== undefined
      ? hintMs
      : baseDelayMs * Math.pow(backoffMultiplier, attempt) + jitter;
  return Math.max(0, Math.min(computed, maxDelayMs));
}

/**
 * Executes an operation with retry logic
 * @param operation - The operation to retry, given the zero-based attempt
 * @param options - Retry configuration
 * @returns Promise that resolves with the operation result
 * @throws The original error when `retryCondition` rejects it
 * @throws RetryError if all retries are exhausted
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { maxRetries, retryCondition = () => true, signal } = options;
  const retries = Math.max(0, Math.floor(maxRetries));

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      const lastError = toError(error);

      if (!retryCondition(lastError)) {
        throw lastError;
      }

      if (attempt >= retries) {
        throw new RetryError(
          `Operation failed after ${attempt + 1} attempts`,
          lastError,
          attempt + 1,
        );
      }

      const delay = backoffDelay(
        attempt,
        options,
        options.delayHint?.(lastError),
      );
      options.onRetry?.(lastError, attempt + 1, delay);
      await sleep(delay, signal);
    }
  }
}
