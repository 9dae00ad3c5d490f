/**
 * Main execution runner
 *
 * Wires configuration, the crawl scheduler and the product sink together for
 * one city, and produces the run report the CLI turns into an exit status.
 */

import { performance } from "node:perf_hooks";
import { enumerateCities, resolveCity } from "../cities/enumerator";
import { cityFormatterFor } from "../cities/format";
import { AppConfig } from "../config/app-config";
import { retryParams, withDefaults } from "../config/pacing";
import { sectionFor } from "../crawl/category-menu";
import type { Clock } from "../crawl/host-pacer";
import { CrawlScheduler, type FetchStats } from "../crawl/scheduler";
import type { WalkPlan } from "../crawl/walker";
import { HttpFetchClient, type FetchClient } from "../fetch/client";
import {
  FileDestination,
  type OutputDestination,
} from "../sink/destination";
import { ProductSink, type CategorySinkStats } from "../sink/product-sink";
import type {
  CatalogSiteAdapter,
  CategoryNode,
  City,
  CityEntry,
  CrawlOutcome,
  PacingConfig,
  ProductRow,
  RawProductRecord,
} from "../types";
import { uniq } from "../utils/array";
import { toError } from "../utils/async";
import { formatDuration } from "../utils/date";
import { Logger } from "../utils/logger";
import { RetryError } from "../utils/retry";
import { DetailEnricher, type DetailStats } from "./detail-enricher";
import { RunError } from "./errors";

/** Shared by both run modes */
export interface RunnerOptions {
  adapter: CatalogSiteAdapter;
  /** Overrides on top of site pacing and environment */
  pacing?: PacingConfig;
  signal?: AbortSignal;
  /** Replaces the HTTP client (tests, alternative transports) */
  fetchClient?: FetchClient;
  clock?: Clock;
}

export interface CrawlRunOptions extends RunnerOptions {
  cityId: string;
  categories: readonly string[];
  outputPath?: string;
  destination?: OutputDestination<ProductRow>;
  fetchDetails?: boolean;
  /** Resolve the city through the city selector first (default true) */
  cityLookup?: boolean;
}

export interface RunReport {
  city: City;
  outcomes: CrawlOutcome[];
  written: number;
  sinkStats: Record<string, CategorySinkStats>;
  fetchStats: FetchStats;
  details: DetailStats | null;
  elapsedSec: number;
  cancelled: boolean;
  outputPath: string;
}

export interface CityListingOptions extends RunnerOptions {
  outputPath?: string;
  destination?: OutputDestination<CityEntry>;
}

export interface CityListingReport {
  cities: City[];
  outcome: CrawlOutcome;
  written: number;
  outputPath: string;
}

function createScheduler(options: RunnerOptions) {
  const { adapter, signal, clock } = options;
  const cfg = withDefaults(
    adapter.pacing,
    AppConfig.pacingOverrides(),
    options.pacing,
  );
  const fetchClient =
    options.fetchClient ??
    new HttpFetchClient({
      timeoutMs: cfg.requestTimeoutMs,
      isThrottled: adapter.isThrottled,
    });
  const scheduler = new CrawlScheduler({
    fetchClient,
    concurrencyLimit: cfg.concurrency,
    politenessDelayMs: cfg.politenessDelayMs,
    retry: retryParams(cfg),
    maxPagesPerCategory: cfg.maxPagesPerCategory,
    signal,
    clock,
  });
  return { cfg, scheduler };
}

const failureMessage = (e: unknown) => {
  const error = toError(e);
  return (error instanceof RetryError ? error.originalError : error).message;
};

/**
 * Looks the city id up in the site's city selector. A selector that cannot
 * be read falls back to using the id as name and region context.
 * @throws RunError if the selector was read and does not list the id
 */
async function resolveRunCity(
  scheduler: CrawlScheduler,
  adapter: CatalogSiteAdapter,
  cityId: string,
  lookup: boolean,
): Promise<City> {
  const fallback: City = { id: cityId, name: cityId, regionContext: cityId };
  if (!lookup) return fallback;

  const listing = await enumerateCities(scheduler, adapter);
  if (
    listing.outcome.terminalStatus !== "Completed" ||
    listing.cities.length === 0
  ) {
    Logger.warn(`City list unavailable, using city id ${cityId} as is`, {
      city: cityId,
      error: listing.outcome.failure?.message,
    });
    return fallback;
  }

  const city = resolveCity(listing.cities, cityId);
  if (!city) {
    throw new RunError(
      `Unknown city id "${cityId}" (${listing.cities.length} cities available)`,
    );
  }
  Logger.info(`City resolved: ${city.name}`, { city: city.id });
  return city;
}

/**
 * Fetches the category menu once. Failures only cost the section labels.
 */
async function loadMenu(
  scheduler: CrawlScheduler,
  adapter: CatalogSiteAdapter,
  city: City,
): Promise<CategoryNode[]> {
  const { categoryMenuRequest, parseCategoryMenu } = adapter;
  if (!categoryMenuRequest || !parseCategoryMenu) return [];
  const request = categoryMenuRequest();
  try {
    const response = await scheduler.fetch(
      request,
      adapter.requestContext(city),
    );
    return parseCategoryMenu(response.body, response.url);
  } catch (e) {
    Logger.warn(`Category menu unavailable: ${failureMessage(e)}`, {
      url: request.url,
    });
    return [];
  }
}

function logSummary(report: RunReport): void {
  for (const o of report.outcomes) {
    const stats = report.sinkStats[o.category];
    const meta = {
      category: o.category,
      status: o.terminalStatus,
      pages: o.pagesFetched,
      records: o.recordsExtracted,
      created: stats?.created ?? 0,
      merged: stats?.merged ?? 0,
      rejected: stats?.rejected ?? 0,
      retries: o.retries,
      extractionErrors: o.extractionErrors.length,
    };
    if (o.terminalStatus === "Completed") {
      Logger.info(`✅ ${o.category}: ${o.endReason}`, meta);
    } else {
      Logger.warn(`❌ ${o.category}: ${o.failure?.message}`, {
        ...meta,
        kind: o.failure?.kind,
        pageIndex: o.failure?.pageIndex,
        attempts: o.failure?.attempts,
      });
    }
  }
  const completed = report.outcomes.filter(
    (o) => o.terminalStatus === "Completed",
  ).length;
  Logger.info(
    `done city=${report.city.id} ok=${completed} fails=${
      report.outcomes.length - completed
    } wrote=${report.written} elapsed=${formatDuration(report.elapsedSec)}`,
    {
      city: report.city.id,
      output: report.outputPath,
      fetchAttempts: report.fetchStats.attempts,
      fetchRetries: report.fetchStats.retries,
      rateLimited: report.fetchStats.rateLimited,
      details: report.details ?? undefined,
      cancelled: report.cancelled,
    },
  );
}

/**
 * Crawls the requested categories of one city and writes the deduplicated
 * product document
 * @throws RunError on invalid input, an unknown city, or an unwritable output
 */
export async function runCrawl(options: CrawlRunOptions): Promise<RunReport> {
  const t0 = performance.now();
  const { adapter, signal } = options;

  const cityId = options.cityId.trim();
  if (!cityId) throw new RunError("A city id is required");
  const categories = uniq(
    options.categories.map((c) => c.trim()).filter(Boolean),
  );
  if (categories.length === 0) {
    throw new RunError("At least one category slug is required");
  }

  const { cfg, scheduler } = createScheduler(options);
  const outputPath = options.outputPath ?? AppConfig.OUTPUT_PATH;
  const destination =
    options.destination ?? new FileDestination<ProductRow>(outputPath);

  const city = await resolveRunCity(
    scheduler,
    adapter,
    cityId,
    options.cityLookup ?? true,
  );

  const menu = await loadMenu(scheduler, adapter, city);
  const sections = new Map<string, string[]>();
  if (menu.length > 0) {
    for (const slug of categories) {
      const { titles, unresolved } = sectionFor(menu, slug);
      if (titles.length > 0) sections.set(slug, titles);
      if (unresolved.length > 0) {
        Logger.warn(`Category ${slug}: ${unresolved.join(", ")} not in menu`, {
          category: slug,
          unresolved,
          section: titles,
        });
      }
    }
  }

  const sink = new ProductSink(destination);
  const fetchDetails = options.fetchDetails ?? AppConfig.FETCH_DETAILS;
  const enricher = fetchDetails
    ? new DetailEnricher(adapter, scheduler, sink)
    : null;
  if (enricher && !enricher.supported) {
    Logger.warn(`${adapter.displayName} has no detail pages`);
  }

  const plan: WalkPlan<RawProductRecord> = {
    pageType: "listing",
    context: (category) => adapter.requestContext(category.city),
    request: (cursor) =>
      adapter.listingRequest(cursor.category, cursor, cfg.pageSize),
    firstPageToken: adapter.firstPageToken,
    extractor: adapter.listingExtractor(cfg.pageSize),
    emit: async (records, cursor) => {
      const { category } = cursor;
      const created: Array<{ sku: string; raw: RawProductRecord }> = [];
      for (const record of records) {
        const raw: RawProductRecord = {
          ...record,
          section: record.section ?? sections.get(category.slug) ?? null,
        };
        const result = await sink.accept(raw, category.slug);
        if (result.status === "created") {
          created.push({ sku: result.sku, raw });
        }
      }
      if (enricher?.supported) {
        await Promise.all(
          created.map(({ sku, raw }) => enricher.enrich(sku, raw, category)),
        );
      }
    },
  };

  const outcomes = await scheduler.run(city, categories, plan);

  let written: number;
  try {
    written = await sink.finalize();
  } catch (e) {
    throw new RunError(
      `Could not write output to ${destination.location}: ${failureMessage(e)}`,
      e,
    );
  }

  const report: RunReport = {
    city,
    outcomes,
    written,
    sinkStats: sink.stats(),
    fetchStats: scheduler.stats,
    details: enricher ? enricher.stats : null,
    elapsedSec: (performance.now() - t0) / 1000,
    cancelled: signal?.aborted ?? false,
    outputPath: destination.location,
  };
  logSummary(report);
  return report;
}

/**
 * Exit status of a crawl: at least one category must have completed
 */
export function runSucceeded(report: RunReport): boolean {
  return report.outcomes.some((o) => o.terminalStatus === "Completed");
}

/**
 * Enumerates the site's cities and writes them as a table (or JSON array for
 * a `.json` output)
 * @throws RunError if the selector cannot be crawled or the file written
 */
export async function runCityListing(
  options: CityListingOptions,
): Promise<CityListingReport> {
  const { scheduler } = createScheduler(options);
  const outputPath = options.outputPath ?? AppConfig.CITIES_OUTPUT_PATH;
  const destination =
    options.destination ??
    new FileDestination<CityEntry>(outputPath, cityFormatterFor(outputPath));

  const listing = await enumerateCities(scheduler, options.adapter);
  if (listing.outcome.terminalStatus !== "Completed") {
    throw new RunError(
      `City list could not be fetched: ${
        listing.outcome.failure?.message ?? "unknown error"
      }`,
    );
  }

  const rows: CityEntry[] = listing.cities.map(({ id, name }) => ({
    id,
    name,
  }));
  try {
    await destination.write(rows);
  } catch (e) {
    throw new RunError(
      `Could not write cities to ${destination.location}: ${failureMessage(e)}`,
      e,
    );
  }
  Logger.info(`Wrote ${rows.length} cities`, {
    count: rows.length,
    output: destination.location,
  });
  return {
    cities: listing.cities,
    outcome: listing.outcome,
    written: rows.length,
    outputPath: destination.location,
  };
}
