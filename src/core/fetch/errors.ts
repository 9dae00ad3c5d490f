/**
 * Classified fetch failures
 *
 * The fetch client only classifies; whether a failure is retried is decided
 * by the scheduler through `isRetryable`.
 */

export type FetchFailureKind =
  | "timeout"
  | "connection"
  | "http"
  | "rate-limited"
  | "cancelled";

export abstract class FetchFailure extends Error {
  abstract readonly kind: FetchFailureKind;

  constructor(
    message: string,
    public readonly url: string,
  ) {
    super(message);
  }
}

/** Transient: request exceeded the configured timeout */
export class TimeoutError extends FetchFailure {
  readonly kind = "timeout";

  constructor(url: string, timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms: ${url}`, url);
    this.name = "TimeoutError";
  }
}

/** Transient: DNS, refused or reset connection, any transport failure */
export class ConnectionError extends FetchFailure {
  readonly kind = "connection";

  constructor(url: string, cause?: string) {
    super(`Connection failed for ${url}${cause ? `: ${cause}` : ""}`, url);
    this.name = "ConnectionError";
  }
}

export class HttpError extends FetchFailure {
  readonly kind = "http";

  constructor(
    url: string,
    public readonly status: number,
  ) {
    super(`HTTP ${status} for ${url}`, url);
    this.name = "HttpError";
  }

  /** Non-429 client errors are never worth repeating */
  get permanent(): boolean {
    return this.status >= 400 && this.status < 500;
  }
}

export class RateLimitedError extends FetchFailure {
  readonly kind = "rate-limited";

  constructor(
    url: string,
    public readonly status: number,
    public readonly retryAfterMs?: number,
  ) {
    super(`Rate limited (HTTP ${status}) for ${url}`, url);
    this.name = "RateLimitedError";
  }
}

export class CancelledError extends FetchFailure {
  readonly kind = "cancelled";

  constructor(url: string) {
    super(`Request cancelled: ${url}`, url);
    this.name = "CancelledError";
  }
}

/**
 * Retry policy: timeouts, connection errors, throttling and 5xx are retried;
 * 4xx and cancellation are not.
 */
export function isRetryable(error: Error): boolean {
  if (error instanceof TimeoutError) return true;
  if (error instanceof ConnectionError) return true;
  if (error instanceof RateLimitedError) return true;
  if (error instanceof HttpError) return !error.permanent;
  return false;
}

/**
 * Parses a Retry-After header (delta-seconds or HTTP date)
 * @returns Wait in milliseconds, or undefined when absent/unparsable
 */
export function parseRetryAfter(
  value: string | undefined,
  now = Date.now(),
): number | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) return Number(trimmed) * 1000;
  const at = Date.parse(trimmed);
  if (!Number.isFinite(at)) return undefined;
  return Math.max(0, at - now);
}
