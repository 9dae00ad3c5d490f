// src/sites/fixprice/adapter.ts
import { AppConfig } from "../../core/config/app-config";
import type { CatalogSiteAdapter, City } from "../../core/types";
import {
  cityExtractor,
  detailExtractor,
  listingExtractor,
  parseCategoryMenu,
} from "./extractors";

export const API_BASE = "https://api.fix-price.com/buyer/v1";

/** The listing endpoint rejects larger pages */
export const MAX_PAGE_SIZE = 99;

const FIRST_PAGE = "1";

const clampPageSize = (n: number) =>
  Math.min(MAX_PAGE_SIZE, Math.max(1, Math.floor(n)));

const encodeSlug = (slug: string) =>
  slug
    .split("/")
    .filter(Boolean)
    .map(encodeURIComponent)
    .join("/");

/**
 * Fix Price – buyer JSON API
 * - City scoping: `x-city` header carrying the city id
 * - Listing: POST product/in/{slug}?limit&page, total in `x-count`
 * - Detail: GET product/{url}
 * - Throttling shows up as an HTML page instead of JSON
 */
export const adapter: CatalogSiteAdapter = {
  key: "fixprice",
  displayName: "Fix Price",

  pacing: {
    concurrency: 4,
    politenessDelayMs: 250,
    requestTimeoutMs: 30_000,
    fetchRetries: 3,
    fetchRetryBaseMs: 800,
    fetchRetryMaxMs: 15_000,
    pageSize: MAX_PAGE_SIZE,
  },

  requestContext: (city: City | null) => {
    const headers: Record<string, string> = {
      "content-type": "application/json",
      referer: "https://fix-price.com/",
      origin: "https://fix-price.com",
      "x-language": AppConfig.FIXPRICE_LANGUAGE,
    };
    if (city) headers["x-city"] = city.regionContext;
    if (AppConfig.FIXPRICE_API_KEY) {
      headers["x-key"] = AppConfig.FIXPRICE_API_KEY;
    }
    return { city, headers };
  },

  listingRequest: (category, cursor, pageSize) => ({
    method: "POST",
    url:
      `${API_BASE}/product/in/${encodeSlug(category.slug)}` +
      `?limit=${clampPageSize(pageSize)}&page=${cursor.nextToken ?? FIRST_PAGE}`,
  }),
  firstPageToken: FIRST_PAGE,
  listingExtractor: (pageSize) => listingExtractor(clampPageSize(pageSize)),

  citySelectorRequest: () => ({
    method: "GET",
    url: `${API_BASE}/location/city`,
  }),
  cityExtractor,

  detailRequest: (record) =>
    record.productSlug
      ? {
          method: "GET",
          url: `${API_BASE}/product/${record.productSlug.replace(/^\/+/, "")}`,
        }
      : null,
  detailExtractor,

  categoryMenuRequest: () => ({
    method: "GET",
    url: `${API_BASE}/category/menu`,
  }),
  parseCategoryMenu,

  isThrottled: (response) =>
    (response.headers["content-type"] ?? "").includes("text/html"),
};
