/**
 * Crawl scheduler
 *
 * Runs one pagination walker per category. All walkers share a global cap
 * on in-flight fetches and a per-host politeness pacer; every fetch attempt
 * goes through the retry policy.
 */

import pLimit, { type LimitFunction } from "p-limit";
import {
  CancelledError,
  RateLimitedError,
  isRetryable,
} from "../fetch/errors";
import type { FetchClient } from "../fetch/client";
import type {
  Category,
  City,
  CrawlOutcome,
  FetchResponse,
  PageRequest,
  RequestContext,
} from "../types";
import { uniq } from "../utils/array";
import { AbortError } from "../utils/async";
import { Logger } from "../utils/logger";
import { withRetry } from "../utils/retry";
import { HostPacer, type Clock } from "./host-pacer";
import {
  PaginationWalker,
  type RetryListener,
  type WalkPlan,
} from "./walker";

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
}

export interface SchedulerOptions {
  fetchClient: FetchClient;
  concurrencyLimit: number;
  politenessDelayMs: number;
  retry: RetryPolicy;
  maxPagesPerCategory?: number;
  signal?: AbortSignal;
  clock?: Clock;
}

export interface FetchStats {
  attempts: number;
  retries: number;
  rateLimited: number;
  maxActive: number;
}

export class CrawlScheduler {
  private readonly limit: LimitFunction;
  private readonly pacer: HostPacer;
  private active = 0;
  private readonly counters: FetchStats = {
    attempts: 0,
    retries: 0,
    rateLimited: 0,
    maxActive: 0,
  };

  constructor(private readonly options: SchedulerOptions) {
    this.limit = pLimit(Math.max(1, Math.floor(options.concurrencyLimit)));
    this.pacer = new HostPacer(options.politenessDelayMs, options.clock);
  }

  get stats(): FetchStats {
    return { ...this.counters };
  }

  /**
   * Crawls every requested category of `city` exactly once
   * @param city - Resolved city scoping every request
   * @param categorySlugs - Requested slugs; duplicates collapse to one walker
   * @param plan - Site-specific request/extract/emit plan
   * @returns One outcome per distinct slug, in request order
   */
  async run<T>(
    city: City,
    categorySlugs: readonly string[],
    plan: WalkPlan<T>,
  ): Promise<CrawlOutcome[]> {
    const slugs = uniq(categorySlugs);
    Logger.info(`Crawling ${slugs.length} categories`, {
      city: city.id,
      categories: slugs,
      concurrency: this.options.concurrencyLimit,
      politenessDelayMs: this.options.politenessDelayMs,
    });
    return Promise.all(
      slugs.map((slug) => this.walk({ slug, city }, plan)),
    );
  }

  /**
   * Walks a single category (or unscoped listing) to a terminal state
   */
  walk<T>(category: Category, plan: WalkPlan<T>): Promise<CrawlOutcome> {
    const walker = new PaginationWalker(
      category,
      plan,
      (request, context, onRetry) => this.fetch(request, context, onRetry),
      {
        maxPages: this.options.maxPagesPerCategory ?? 0,
        signal: this.options.signal,
      },
    );
    return walker.run();
  }

  /**
   * One logical page fetch with the full policy applied: each attempt waits
   * for a concurrency slot and its politeness turn, failures are retried
   * with capped exponential backoff. The slot is released between attempts.
   * @throws CancelledError when the run is aborted
   * @throws RetryError when retries are exhausted
   * @throws FetchFailure as-is when the failure is not retryable
   */
  async fetch(
    request: PageRequest,
    context: RequestContext,
    onRetry?: RetryListener,
  ): Promise<FetchResponse> {
    const { signal, retry } = this.options;
    try {
      return await withRetry(
        () => this.limit(() => this.attempt(request, context)),
        {
          ...retry,
          retryCondition: isRetryable,
          delayHint: (error) =>
            error instanceof RateLimitedError ? error.retryAfterMs : undefined,
          onRetry: (error, attempt, delayMs) => {
            this.counters.retries++;
            onRetry?.(error, attempt, delayMs);
          },
          signal,
        },
      );
    } catch (e) {
      if (e instanceof AbortError || signal?.aborted) {
        throw new CancelledError(request.url);
      }
      throw e;
    }
  }

  private async attempt(
    request: PageRequest,
    context: RequestContext,
  ): Promise<FetchResponse> {
    const { signal, fetchClient } = this.options;
    await this.pacer.wait(request.url, signal);

    this.active++;
    this.counters.attempts++;
    this.counters.maxActive = Math.max(this.counters.maxActive, this.active);
    try {
      return await fetchClient.fetch(request.url, context, {
        method: request.method,
        signal,
      });
    } catch (e) {
      if (e instanceof RateLimitedError) this.counters.rateLimited++;
      throw e;
    } finally {
      this.active--;
    }
  }
}
