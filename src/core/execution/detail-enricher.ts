/**
 * Optional detail-page pass for newly created products
 */

import type { CrawlScheduler } from "../crawl/scheduler";
import { CancelledError } from "../fetch/errors";
import type { ProductSink } from "../sink/product-sink";
import type {
  CatalogSiteAdapter,
  Category,
  FetchResponse,
  RawProductRecord,
} from "../types";
import { AbortError, toError } from "../utils/async";
import { Logger } from "../utils/logger";
import { RetryError } from "../utils/retry";

export interface DetailStats {
  requested: number;
  enriched: number;
  failed: number;
}

export class DetailEnricher {
  private readonly counters: DetailStats = {
    requested: 0,
    enriched: 0,
    failed: 0,
  };

  constructor(
    private readonly adapter: CatalogSiteAdapter,
    private readonly scheduler: CrawlScheduler,
    private readonly sink: ProductSink,
  ) {}

  get stats(): DetailStats {
    return { ...this.counters };
  }

  /** True when the adapter can fetch detail pages at all */
  get supported(): boolean {
    return Boolean(this.adapter.detailRequest && this.adapter.detailExtractor);
  }

  /**
   * Fetches the detail page of `listing` and merges it into product `sku`.
   * Failures keep the listing-level product; cancellation propagates.
   */
  async enrich(
    sku: string,
    listing: RawProductRecord,
    category: Category,
  ): Promise<void> {
    const { detailRequest, detailExtractor } = this.adapter;
    if (!detailRequest || !detailExtractor) return;
    const request = detailRequest(listing);
    if (!request) return;

    this.counters.requested++;
    let response: FetchResponse;
    try {
      response = await this.scheduler.fetch(
        request,
        this.adapter.requestContext(category.city),
      );
    } catch (e) {
      if (e instanceof CancelledError || e instanceof AbortError) throw e;
      const error = toError(e);
      const cause = error instanceof RetryError ? error.originalError : error;
      this.counters.failed++;
      Logger.warn(`Detail fetch failed for ${sku}: ${cause.message}`, {
        sku,
        category: category.slug,
        url: request.url,
      });
      return;
    }

    const result = detailExtractor.extract(response.body, {
      pageType: "detail",
      cursor: { category, pageIndex: 1, nextToken: null },
      url: response.url,
      status: response.status,
      headers: response.headers,
    });
    if (result.status !== "ok" || result.records.length === 0) {
      this.counters.failed++;
      Logger.warn(`Detail page for ${sku} not usable`, {
        sku,
        url: response.url,
        error:
          result.status === "malformed" ? result.error.message : "no record",
      });
      return;
    }

    // The listing SKU stays the key even if the card reports another one
    if (await this.sink.enrich(sku, { ...result.records[0], sku })) {
      this.counters.enriched++;
    } else {
      this.counters.failed++;
    }
  }
}
