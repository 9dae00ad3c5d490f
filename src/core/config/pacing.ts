/**
 * Pacing configuration utilities
 */

import { EXECUTION_CONSTANTS } from "../constants";
import type { PacingConfig } from "../types";

/** Safe defaults so every field resolves to a number */
const DEFAULTS: Required<PacingConfig> = {
  concurrency: EXECUTION_CONSTANTS.DEFAULT_CONCURRENCY,
  politenessDelayMs: EXECUTION_CONSTANTS.DEFAULT_POLITENESS_DELAY_MS,
  requestTimeoutMs: EXECUTION_CONSTANTS.DEFAULT_TIMEOUT_MS,
  fetchRetries: EXECUTION_CONSTANTS.DEFAULT_RETRIES,
  fetchRetryBaseMs: EXECUTION_CONSTANTS.DEFAULT_BASE_DELAY_MS,
  fetchRetryMaxMs: EXECUTION_CONSTANTS.DEFAULT_MAX_DELAY_MS,
  jitterMs: EXECUTION_CONSTANTS.DEFAULT_JITTER_MS,
  pageSize: EXECUTION_CONSTANTS.DEFAULT_PAGE_SIZE,
  maxPagesPerCategory: 0,
};

const KEYS: ReadonlyArray<keyof PacingConfig> = [
  "concurrency",
  "politenessDelayMs",
  "requestTimeoutMs",
  "fetchRetries",
  "fetchRetryBaseMs",
  "fetchRetryMaxMs",
  "jitterMs",
  "pageSize",
  "maxPagesPerCategory",
];

const nonNegative = (n: number) => Math.max(0, Math.floor(n));

/**
 * Layers pacing configs (later wins) over the defaults and clamps the result
 * @param layers - e.g. site pacing, env overrides, CLI overrides
 */
export function withDefaults(
  ...layers: Array<PacingConfig | undefined>
): Required<PacingConfig> {
  const c: Required<PacingConfig> = { ...DEFAULTS };
  for (const layer of layers) {
    if (!layer) continue;
    for (const key of KEYS) {
      const v = layer[key];
      if (v !== undefined && Number.isFinite(v)) c[key] = v;
    }
  }
  return {
    concurrency: Math.min(
      EXECUTION_CONSTANTS.MAX_CONCURRENCY,
      Math.max(1, Math.floor(c.concurrency)),
    ),
    politenessDelayMs: nonNegative(c.politenessDelayMs),
    requestTimeoutMs: Math.max(1, Math.floor(c.requestTimeoutMs)),
    fetchRetries: nonNegative(c.fetchRetries),
    fetchRetryBaseMs: nonNegative(c.fetchRetryBaseMs),
    fetchRetryMaxMs: nonNegative(c.fetchRetryMaxMs),
    jitterMs: nonNegative(c.jitterMs),
    pageSize: Math.max(1, Math.floor(c.pageSize)),
    maxPagesPerCategory: nonNegative(c.maxPagesPerCategory),
  };
}

/** Fetch-retry parameters (integers) */
export function retryParams(cfg: Required<PacingConfig>) {
  return {
    maxRetries: cfg.fetchRetries,
    baseDelayMs: cfg.fetchRetryBaseMs,
    maxDelayMs: Math.max(cfg.fetchRetryMaxMs, cfg.fetchRetryBaseMs),
    jitterMs: cfg.jitterMs,
  };
}
