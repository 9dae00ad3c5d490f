/**
 * Product validation utilities
 *
 * Promotion from a raw listing record to a canonical Product. Malformed
 * fields are rejected, never coerced.
 */

import type { City, RawCityRecord } from "../types/city";
import type { Product, RawProductRecord } from "../types/product";
import { sanitizeUrl } from "../utils/url";

export class ValidationError extends Error {
  constructor(
    message: string,
    public field?: string,
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

const PRICE_RE = /^\d+(?:[.,]\d+)?$/;

/**
 * Reads a price given as a number or a plain decimal string ("99", "99.90",
 * "99,90")
 * @returns The price, or null when absent
 * @throws ValidationError if present but not a finite, non-negative number
 */
export function parsePrice(
  value: number | string | null | undefined,
  field: string,
): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "number") {
    if (!Number.isFinite(value) || value < 0) {
      throw new ValidationError(
        `Product ${field} must be a finite non-negative number`,
        field,
      );
    }
    return value;
  }
  const trimmed = value.trim();
  if (!PRICE_RE.test(trimmed)) {
    throw new ValidationError(
      `Product ${field} is not a number: "${value}"`,
      field,
    );
  }
  return Number(trimmed.replace(",", "."));
}

function requiredText(
  value: string | null | undefined,
  field: string,
): string {
  const text = typeof value === "string" ? value.trim() : "";
  if (!text) {
    throw new ValidationError(`Product ${field} is required`, field);
  }
  return text;
}

function optionalUrl(value: string | null | undefined, field: string) {
  if (value === null || value === undefined || value === "") return null;
  const url = sanitizeUrl(value);
  if (!url) {
    throw new ValidationError(`Product ${field} must be a valid URL`, field);
  }
  return url;
}

function optionalCount(value: number | null | undefined, field: string) {
  if (value === null || value === undefined) return null;
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(
      `Product ${field} must be a non-negative integer`,
      field,
    );
  }
  return value;
}

/**
 * Validates a raw record and builds the canonical Product for its first
 * sighting under `categorySlug`
 * @throws ValidationError if the record is invalid
 */
export function validateProduct(
  raw: RawProductRecord,
  categorySlug: string,
): Product {
  const sku = requiredText(raw.sku, "sku");
  const name = requiredText(raw.name, "name");

  const current = parsePrice(raw.price, "price");
  if (current === null) {
    throw new ValidationError("Product price is required", "price");
  }
  const original = parsePrice(raw.originalPrice, "originalPrice");

  const setImages = raw.images
    ? raw.images
        .map((i) => optionalUrl(i, "images"))
        .filter((i): i is string => i !== null)
    : null;
  const mainImage =
    optionalUrl(raw.mainImage, "mainImage") ?? setImages?.[0] ?? null;

  const metadata: Record<string, unknown> = { ...(raw.metadata ?? {}) };
  if (raw.description !== null && raw.description !== undefined) {
    metadata.description = raw.description;
  }

  return {
    sku,
    name,
    price: current,
    categorySlugs: new Set([categorySlug]),
    url: optionalUrl(raw.url, "url"),
    brand: raw.brand?.trim() || null,
    section: raw.section ? [...raw.section] : [],
    timestamp: raw.timestamp ?? null,
    priceData: {
      current,
      original,
      saleTag: raw.saleTag ?? null,
    },
    stock: {
      inStock: raw.inStock ?? null,
      count: optionalCount(raw.stockCount, "stockCount"),
    },
    assets: {
      mainImage,
      setImages: setImages && setImages.length > 0 ? setImages : null,
      view360: null,
      video: optionalUrl(raw.video, "video"),
    },
    metadata,
    variants: optionalCount(raw.variants, "variants"),
    marketingTags: raw.marketingTags ? [...raw.marketingTags] : [],
  };
}

/**
 * Validates one entry of the city selector. The region context defaults to
 * the id.
 * @throws ValidationError if id or name is missing
 */
export function validateCity(raw: RawCityRecord): City {
  const id =
    typeof raw.id === "number" && Number.isFinite(raw.id)
      ? String(raw.id)
      : typeof raw.id === "string"
        ? raw.id.trim()
        : "";
  if (!id) throw new ValidationError("City id is required", "id");
  const name = typeof raw.name === "string" ? raw.name.trim() : "";
  if (!name) throw new ValidationError("City name is required", "name");
  const regionContext = raw.regionContext?.trim() || id;
  return { id, name, regionContext };
}
