/**
 * Per-host politeness spacing
 */

import { sleep } from "../utils/async";
import { hostOf } from "../utils/url";

export interface Clock {
  now: () => number;
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
}

const systemClock: Clock = { now: () => Date.now(), sleep };

/**
 * Hands out start slots so that successive requests to the same host begin
 * at least `delayMs` apart. Slots are reserved synchronously, so concurrent
 * callers queue up behind each other instead of racing for the same slot.
 */
export class HostPacer {
  private readonly nextSlot = new Map<string, number>();

  constructor(
    private readonly delayMs: number,
    private readonly clock: Clock = systemClock,
  ) {}

  /**
   * Resolves when a request to `url` may start
   * @returns The milliseconds actually waited
   */
  async wait(url: string, signal?: AbortSignal): Promise<number> {
    if (this.delayMs <= 0) return 0;
    const host = hostOf(url);
    const now = this.clock.now();
    const at = Math.max(now, this.nextSlot.get(host) ?? now);
    this.nextSlot.set(host, at + this.delayMs);
    const waitMs = at - now;
    if (waitMs > 0) await this.clock.sleep(waitMs, signal);
    return waitMs;
  }
}
