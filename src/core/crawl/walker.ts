/**
 * Pagination walker – one state machine per category
 *
 * idle → fetching → extracting → (fetching | done | failed)
 *
 * Pages are fetched strictly in order: page N+1 is requested only after
 * page N's records have been emitted and accepted downstream.
 */

import { performance } from "node:perf_hooks";
import type { PageExtractor } from "../extraction/types";
import { FetchFailure, HttpError, RateLimitedError } from "../fetch/errors";
import type {
  Category,
  CrawlOutcome,
  EndReason,
  FailureSummary,
  FetchResponse,
  PageCursor,
  PageError,
  PageRequest,
  PageType,
  PaginationInfo,
  RequestContext,
  WalkerState,
} from "../types/crawl";
import { AbortError, toError } from "../utils/async";
import { Logger } from "../utils/logger";
import { RetryError } from "../utils/retry";

/** What to request and how to read it, for one kind of paginated listing */
export interface WalkPlan<T> {
  pageType: PageType;
  context: (category: Category) => RequestContext;
  request: (cursor: PageCursor) => PageRequest;
  /** Token the first page is requested under, when the site has one */
  firstPageToken?: string;
  extractor: PageExtractor<T>;
  /** Downstream consumer; awaited before the next page is fetched */
  emit: (records: T[], cursor: PageCursor) => Promise<void>;
}

export type RetryListener = (
  error: Error,
  attempt: number,
  delayMs: number,
) => void;

/** Fetch with the scheduler's policy (cap, politeness, retries) applied */
export type PageFetcher = (
  request: PageRequest,
  context: RequestContext,
  onRetry: RetryListener,
) => Promise<FetchResponse>;

export interface WalkerOptions {
  maxPages?: number; // 0 = unlimited
  signal?: AbortSignal;
}

type Step =
  | { kind: "advance"; token: string }
  | { kind: "end"; reason: EndReason };

export class PaginationWalker<T> {
  private current: WalkerState = "idle";
  private pagesFetched = 0;
  private recordsExtracted = 0;
  private retries = 0;
  private pageRetries = 0;
  private readonly extractionErrors: PageError[] = [];
  private readonly visitedTokens = new Set<string>();
  private cursor: PageCursor;

  constructor(
    private readonly category: Category,
    private readonly plan: WalkPlan<T>,
    private readonly fetchPage: PageFetcher,
    private readonly options: WalkerOptions = {},
  ) {
    this.cursor = { category, pageIndex: 1, nextToken: null };
    if (plan.firstPageToken !== undefined) {
      this.visitedTokens.add(plan.firstPageToken);
    }
  }

  get state(): WalkerState {
    return this.current;
  }

  /**
   * Walks the category to a terminal state. Never rejects: every failure
   * ends up in the returned outcome.
   */
  async run(): Promise<CrawlOutcome> {
    const t0 = performance.now();
    const { slug, city } = this.category;
    Logger.categoryStarted(slug, city?.id ?? null);

    let outcome: CrawlOutcome;
    try {
      const context = this.plan.context(this.category);
      outcome = await this.walk(context);
    } catch (e) {
      outcome = this.fail(this.summarize(e, this.cursor.pageIndex));
    }

    Logger.categoryFinished(
      slug,
      outcome.endReason
        ? `${outcome.terminalStatus}: ${outcome.endReason}`
        : `${outcome.terminalStatus}: ${outcome.failure?.message ?? "unknown"}`,
      outcome.pagesFetched,
      outcome.recordsExtracted,
      Math.round(performance.now() - t0),
    );
    return outcome;
  }

  private async walk(context: RequestContext): Promise<CrawlOutcome> {
    const { signal, maxPages = 0 } = this.options;

    for (;;) {
      const cursor = this.cursor;
      if (signal?.aborted) throw new AbortError("Crawl cancelled");

      this.current = "fetching";
      this.pageRetries = 0;
      const request = this.plan.request(cursor);
      const response = await this.fetchPage(
        request,
        context,
        (error, attempt, delayMs) => {
          this.retries++;
          this.pageRetries++;
          Logger.retryScheduled(request.url, attempt, delayMs, error.message);
        },
      );
      this.pagesFetched++;

      this.current = "extracting";
      const result = this.plan.extractor.extract(response.body, {
        pageType: this.plan.pageType,
        cursor,
        url: response.url,
        status: response.status,
        headers: response.headers,
      });

      let pagination: PaginationInfo | null;
      let recordCount = 0;
      if (result.status === "ok") {
        pagination = result.pagination;
        recordCount = result.records.length;
        if (recordCount > 0) {
          this.recordsExtracted += recordCount;
          await this.plan.emit(result.records, cursor);
        }
      } else {
        pagination = result.pagination;
        this.extractionErrors.push({
          pageIndex: cursor.pageIndex,
          message: result.error.message,
        });
        Logger.warn(`Extraction failed: ${result.error.message}`, {
          category: cursor.category.slug,
          page: cursor.pageIndex,
          url: response.url,
        });
      }
      Logger.pageExtracted(cursor.category.slug, cursor.pageIndex, recordCount);

      const step = this.nextStep(
        pagination,
        result.status === "ok",
        recordCount,
      );
      if (step.kind === "end") return this.done(step.reason);

      if (maxPages > 0 && this.pagesFetched >= maxPages) {
        Logger.warn(`Page limit ${maxPages} reached`, {
          category: cursor.category.slug,
        });
        return this.done("page-limit");
      }

      this.visitedTokens.add(step.token);
      this.cursor = {
        category: cursor.category,
        pageIndex: cursor.pageIndex + 1,
        nextToken: step.token,
      };
    }
  }

  /**
   * Uniform end-of-results rules on top of what the extractor reported:
   * an empty page or an already visited token ends the walk.
   */
  private nextStep(
    pagination: PaginationInfo | null,
    wellFormed: boolean,
    recordCount: number,
  ): Step {
    if (!pagination) return { kind: "end", reason: "malformed-page" };
    if (pagination.kind === "end") {
      return { kind: "end", reason: "end-of-results" };
    }
    if (wellFormed && recordCount === 0) {
      return { kind: "end", reason: "empty-page" };
    }
    if (this.visitedTokens.has(pagination.token)) {
      Logger.debug(`Pagination token ${pagination.token} repeated`, {
        category: this.category.slug,
      });
      return { kind: "end", reason: "cycle-detected" };
    }
    return { kind: "advance", token: pagination.token };
  }

  private done(reason: EndReason): CrawlOutcome {
    this.current = "done";
    return this.outcome("Completed", reason, null);
  }

  private fail(failure: FailureSummary): CrawlOutcome {
    this.current = "failed";
    return this.outcome("Failed", null, failure);
  }

  private outcome(
    terminalStatus: CrawlOutcome["terminalStatus"],
    endReason: EndReason | null,
    failure: FailureSummary | null,
  ): CrawlOutcome {
    return {
      category: this.category.slug,
      cityId: this.category.city?.id ?? null,
      pagesFetched: this.pagesFetched,
      recordsExtracted: this.recordsExtracted,
      terminalStatus,
      endReason,
      failure,
      extractionErrors: [...this.extractionErrors],
      retries: this.retries,
    };
  }

  private summarize(e: unknown, pageIndex: number): FailureSummary {
    const error = toError(e);
    const original = error instanceof RetryError ? error.originalError : error;
    const attempts =
      error instanceof RetryError ? error.attempt : this.pageRetries + 1;
    const cancelled =
      this.options.signal?.aborted === true ||
      original instanceof AbortError ||
      (original instanceof FetchFailure && original.kind === "cancelled");

    const summary: FailureSummary = {
      kind: cancelled
        ? "cancelled"
        : original instanceof FetchFailure
          ? original.kind
          : "internal",
      message: cancelled ? "Crawl cancelled" : original.message,
      pageIndex,
      attempts,
    };
    if (original instanceof HttpError || original instanceof RateLimitedError) {
      summary.status = original.status;
    }
    return summary;
  }
}
