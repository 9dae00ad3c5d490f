/**
 * Configuration-related types
 */

import type { PageExtractor } from "../extraction/types";
import type { City, RawCityRecord } from "./city";
import type {
  Category,
  FetchResponse,
  PageCursor,
  PageRequest,
  RequestContext,
} from "./crawl";
import type { RawProductRecord } from "./product";

/** Pacing/rate-limiting per site */
export interface PacingConfig {
  concurrency?: number; // global cap on in-flight fetches
  politenessDelayMs?: number; // min spacing between fetch starts per host
  requestTimeoutMs?: number;
  fetchRetries?: number;
  fetchRetryBaseMs?: number;
  fetchRetryMaxMs?: number;
  jitterMs?: number;
  pageSize?: number;
  maxPagesPerCategory?: number; // 0 = unlimited
}

/** Node of the site's category tree */
export interface CategoryNode {
  slug: string;
  title: string;
  children: CategoryNode[];
}

/** CatalogSiteAdapter – contract for a crawlable catalog site */
export interface CatalogSiteAdapter {
  key: string;
  displayName: string;

  pacing?: PacingConfig;

  /** Headers/scoping for requests made on behalf of `city` */
  requestContext: (city: City | null) => RequestContext;

  listingRequest: (
    category: Category,
    cursor: PageCursor,
    pageSize: number,
  ) => PageRequest;
  listingExtractor: (pageSize: number) => PageExtractor<RawProductRecord>;
  /** Listing token of page 1 (the cursor's null token maps to it) */
  firstPageToken?: string;

  citySelectorRequest: (cursor: PageCursor) => PageRequest;
  cityExtractor: PageExtractor<RawCityRecord>;

  /** Optional per-product detail page */
  detailRequest?: (record: RawProductRecord) => PageRequest | null;
  detailExtractor?: PageExtractor<RawProductRecord>;

  /** Optional category tree used to label products with their section */
  categoryMenuRequest?: () => PageRequest;
  parseCategoryMenu?: (body: string, url?: string) => CategoryNode[];

  /** Site-specific throttle signal on an otherwise successful response */
  isThrottled?: (response: FetchResponse) => boolean;
}
