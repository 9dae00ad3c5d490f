/**
 * Promise helpers shared by the crawl loop
 */

export class AbortError extends Error {
  constructor(message = "Operation aborted") {
    super(message);
    this.name = "AbortError";
  }
}

/**
 * Waits `ms` milliseconds; rejects with AbortError as soon as `signal` fires
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(new AbortError());
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Normalizes anything thrown into an Error
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(typeof value === "string" ? value : String(value));
}

/**
 * Aborts when any of the given signals aborts
 * @returns The combined signal and a cleanup that detaches the listeners
 */
export function linkSignals(
  ...signals: Array<AbortSignal | undefined>
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const active = signals.filter((s): s is AbortSignal => s !== undefined);
  const onAbort = (event: Event) => {
    const source = event.target;
    controller.abort(
      source instanceof AbortSignal ? source.reason : undefined,
    );
  };
  for (const s of active) {
    if (s.aborted) {
      controller.abort(s.reason);
      break;
    }
    s.addEventListener("abort", onAbort, { once: true });
  }
  return {
    signal: controller.signal,
    dispose: () => {
      for (const s of active) s.removeEventListener("abort", onAbort);
    },
  };
}
