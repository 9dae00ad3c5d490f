/**
 * Fix Price page extractors
 *
 * Listing pages are plain JSON arrays paged by `page`/`limit`, with the
 * category total in the `x-count` response header.
 */

import { parseJsonBody } from "../../core/extraction/json";
import type {
  ExtractContext,
  ExtractResult,
  PageExtractor,
} from "../../core/extraction/types";
import type {
  CategoryNode,
  PaginationInfo,
  RawCityRecord,
  RawProductRecord,
} from "../../core/types";
import { parseHttpDate } from "../../core/utils/date";
import {
  cityListSchema,
  detailSchema,
  listingPageSchema,
  menuSchema,
  type ListingItem,
  type MenuItem,
  type ProductDetail,
} from "./schemas";

export const CATALOG_URL = "https://fix-price.com/catalog";

/** Variant keys that are not copied into product metadata */
const VARIANT_SKIP_KEYS = new Set([
  "id",
  "image",
  "title",
  "properties",
  "count",
  "price",
  "fixPrice",
]);

const asNumber = (value: number | string | null | undefined): number =>
  typeof value === "number"
    ? value
    : typeof value === "string"
      ? Number(value.trim().replace(",", "."))
      : Number.NaN;

/**
 * Discount label, e.g. "Скидка 20%"
 * @returns null when there is no discount or a price is not numeric
 */
export function saleTag(
  original: number | string | null | undefined,
  current: number | string | null | undefined,
): string | null {
  const o = asNumber(original);
  const c = asNumber(current);
  if (!Number.isFinite(o) || !Number.isFinite(c) || o <= 0 || c >= o) {
    return null;
  }
  return `Скидка ${Math.round(((o - c) / o) * 100)}%`;
}

export function productUrl(path: string): string {
  return `${CATALOG_URL}/${path.replace(/^\/+/, "")}`;
}

const skuOf = (sku: string | number | null | undefined): string | null =>
  sku === null || sku === undefined ? null : String(sku);

/**
 * Next page from the `x-count` header. Without the header a short page is
 * the last one; without both the position is unknown.
 */
export function listingPagination(
  context: ExtractContext,
  pageSize: number,
  recordCount: number | null,
): PaginationInfo | null {
  const page = context.cursor.pageIndex;
  const next: PaginationInfo = { kind: "next", token: String(page + 1) };
  const total = Number.parseInt(context.headers["x-count"] ?? "", 10);
  if (Number.isFinite(total) && total >= 0) {
    return page * pageSize < total ? next : { kind: "end" };
  }
  if (recordCount === null) return null;
  return recordCount < pageSize ? { kind: "end" } : next;
}

function fromListingItem(
  item: ListingItem,
  timestamp: number | null,
): RawProductRecord {
  const original = item.price ?? null;
  const current = item.specialPrice?.price ?? original;
  const images = item.images?.map((i) => i.src) ?? null;
  return {
    sku: skuOf(item.sku),
    name: item.title,
    price: current,
    originalPrice: original,
    saleTag: saleTag(original, current),
    url: item.url ? productUrl(item.url) : null,
    productSlug: item.url,
    brand: item.brand?.title,
    mainImage: item.image ?? images?.[0] ?? null,
    images,
    variants: item.variantCount,
    timestamp,
  };
}

function fromDetail(
  detail: ProductDetail,
  timestamp: number | null,
): RawProductRecord {
  const first = detail.variants[0];
  const original = first.price;
  const current = detail.specialPrice?.price ?? original;
  const stockCount = detail.variants.reduce(
    (sum, v) => sum + (v.count ?? 0),
    0,
  );

  const metadata: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(first)) {
    if (!VARIANT_SKIP_KEYS.has(key)) metadata[key] = value;
  }
  const origin = detail.properties?.[0]?.value;
  if (origin !== null && origin !== undefined) {
    metadata.country_of_origin = String(origin);
  }

  const images = detail.images?.length
    ? detail.images.map((i) => i.src)
    : null;

  return {
    sku: skuOf(detail.sku),
    name: detail.title,
    price: current,
    originalPrice: original,
    saleTag: saleTag(original, current),
    url: detail.url ? productUrl(detail.url) : null,
    productSlug: detail.url,
    brand: detail.brand?.title,
    inStock: stockCount > 0,
    stockCount,
    mainImage: images?.[0] ?? null,
    images,
    video: detail.videoLink || null,
    description: detail.description,
    metadata,
    variants: detail.variants.length,
    timestamp,
  };
}

/** Product listing of one category page */
export function listingExtractor(
  pageSize: number,
): PageExtractor<RawProductRecord> {
  return {
    extract(body, context): ExtractResult<RawProductRecord> {
      const parsed = parseJsonBody(body, listingPageSchema, context);
      if (!parsed.success) {
        return {
          status: "malformed",
          error: parsed.error,
          pagination: listingPagination(context, pageSize, null),
        };
      }
      const timestamp = parseHttpDate(context.headers.date);
      const records = parsed.data.map((item) =>
        fromListingItem(item, timestamp),
      );
      return {
        status: "ok",
        records,
        pagination:
          listingPagination(context, pageSize, records.length) ??
          { kind: "end" },
      };
    },
  };
}

/** Single product card; always the only page */
export const detailExtractor: PageExtractor<RawProductRecord> = {
  extract(body, context) {
    const parsed = parseJsonBody(body, detailSchema, context);
    if (!parsed.success) {
      return { status: "malformed", error: parsed.error, pagination: null };
    }
    const timestamp = parseHttpDate(context.headers.date);
    return {
      status: "ok",
      records: [fromDetail(parsed.data, timestamp)],
      pagination: { kind: "end" },
    };
  },
};

/** City selector; the whole list comes in one response */
export const cityExtractor: PageExtractor<RawCityRecord> = {
  extract(body, context) {
    const parsed = parseJsonBody(body, cityListSchema, context);
    if (!parsed.success) {
      return { status: "malformed", error: parsed.error, pagination: null };
    }
    return {
      status: "ok",
      records: parsed.data.map((c) => ({
        id: c.id,
        name: c.name,
        regionContext:
          c.id === null || c.id === undefined ? null : String(c.id),
      })),
      pagination: { kind: "end" },
    };
  },
};

function toNode(item: MenuItem): CategoryNode {
  return {
    slug: item.alias,
    title: item.title,
    children: (item.items ?? []).map(toNode),
  };
}

/**
 * Category tree from the `category/menu` payload
 * @throws ExtractionError if the payload is not a menu
 */
export function parseCategoryMenu(body: string, url?: string): CategoryNode[] {
  const parsed = parseJsonBody(body, menuSchema, { pageType: "menu", url });
  if (!parsed.success) throw parsed.error;
  return parsed.data.map(toNode);
}
