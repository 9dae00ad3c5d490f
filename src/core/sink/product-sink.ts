/**
 * Deduplicating product sink
 *
 * Single owner of the Product set. Every mutation runs through a one-slot
 * queue, so concurrently running walkers can call `accept` freely while the
 * one-product-per-SKU invariant holds.
 */

import pLimit from "p-limit";
import type { Product, ProductRow, RawProductRecord } from "../types/product";
import { Logger } from "../utils/logger";
import {
  ValidationError,
  validateProduct,
} from "../validation/product-validator";
import type { OutputDestination } from "./destination";

export type AcceptResult =
  | { status: "created"; sku: string }
  | { status: "merged"; sku: string }
  | { status: "rejected"; reason: string; field?: string };

export interface CategorySinkStats {
  created: number;
  merged: number;
  rejected: number;
}

export interface ProductSinkOptions {
  /** Sort the document by SKU for reproducible output (default true) */
  sortBySku?: boolean;
}

interface Entry {
  product: Product;
  raw: RawProductRecord;
  firstCategory: string;
}

export class ProductSink {
  private readonly entries = new Map<string, Entry>();
  private readonly perCategory = new Map<string, CategorySinkStats>();
  private readonly serial = pLimit(1);
  private finalized = false;

  constructor(
    private readonly destination: OutputDestination<ProductRow>,
    private readonly options: ProductSinkOptions = {},
  ) {}

  get size(): number {
    return this.entries.size;
  }

  /**
   * Offers one raw record seen under `sourceCategory`. The first sighting
   * of a SKU creates the product; later sightings only add the category.
   */
  accept(
    raw: RawProductRecord,
    sourceCategory: string,
  ): Promise<AcceptResult> {
    return this.serial(() => this.acceptNow(raw, sourceCategory));
  }

  /**
   * Merges detail-page fields into an existing product. The merged record is
   * validated again; on failure the product is left as it was.
   * @returns true if the product was updated
   */
  enrich(sku: string, detail: RawProductRecord): Promise<boolean> {
    return this.serial(() => {
      this.assertOpen();
      const entry = this.entries.get(sku);
      if (!entry) return false;

      const raw = mergeRaw(entry.raw, detail);
      try {
        const product = validateProduct(raw, entry.firstCategory);
        product.categorySlugs = entry.product.categorySlugs;
        this.entries.set(sku, { ...entry, product, raw });
        return true;
      } catch (e) {
        if (!(e instanceof ValidationError)) throw e;
        Logger.warn(`Detail for ${sku} rejected: ${e.message}`, {
          sku,
          field: e.field,
        });
        return false;
      }
    });
  }

  /**
   * Writes every accepted product to the destination as one document
   * @returns Number of distinct products written
   */
  finalize(): Promise<number> {
    return this.serial(async () => {
      this.finalized = true;
      const rows = this.rows();
      await this.destination.write(rows);
      Logger.info(`Wrote ${rows.length} products`, {
        count: rows.length,
        output: this.destination.location,
      });
      return rows.length;
    });
  }

  /** Current document, in output order */
  rows(): ProductRow[] {
    const products = Array.from(this.entries.values(), (e) => e.product);
    if (this.options.sortBySku ?? true) {
      products.sort((a, b) =>
        a.sku.localeCompare(b.sku, "en", { numeric: true }),
      );
    }
    return products.map(toRow);
  }

  stats(): Record<string, CategorySinkStats> {
    return Object.fromEntries(
      Array.from(this.perCategory, ([slug, s]) => [slug, { ...s }]),
    );
  }

  private acceptNow(
    raw: RawProductRecord,
    sourceCategory: string,
  ): AcceptResult {
    this.assertOpen();
    const stats = this.statsFor(sourceCategory);

    let candidate: Product;
    try {
      candidate = validateProduct(raw, sourceCategory);
    } catch (e) {
      if (!(e instanceof ValidationError)) throw e;
      stats.rejected++;
      Logger.recordRejected(sourceCategory, e.message);
      return { status: "rejected", reason: e.message, field: e.field };
    }

    const existing = this.entries.get(candidate.sku);
    if (existing) {
      existing.product.categorySlugs.add(sourceCategory);
      stats.merged++;
      return { status: "merged", sku: candidate.sku };
    }

    this.entries.set(candidate.sku, {
      product: candidate,
      raw,
      firstCategory: sourceCategory,
    });
    stats.created++;
    return { status: "created", sku: candidate.sku };
  }

  private statsFor(slug: string): CategorySinkStats {
    let stats = this.perCategory.get(slug);
    if (!stats) {
      stats = { created: 0, merged: 0, rejected: 0 };
      this.perCategory.set(slug, stats);
    }
    return stats;
  }

  private assertOpen(): void {
    if (this.finalized) throw new Error("Product sink already finalized");
  }
}

/** Detail values win wherever they are present */
export function mergeRaw(
  base: RawProductRecord,
  detail: RawProductRecord,
): RawProductRecord {
  return {
    sku: detail.sku ?? base.sku,
    name: detail.name ?? base.name,
    price: detail.price ?? base.price,
    originalPrice: detail.originalPrice ?? base.originalPrice,
    saleTag: detail.saleTag ?? base.saleTag,
    url: detail.url ?? base.url,
    productSlug: detail.productSlug ?? base.productSlug,
    brand: detail.brand ?? base.brand,
    section: detail.section ?? base.section,
    inStock: detail.inStock ?? base.inStock,
    stockCount: detail.stockCount ?? base.stockCount,
    mainImage: detail.mainImage ?? base.mainImage,
    images: detail.images ?? base.images,
    video: detail.video ?? base.video,
    description: detail.description ?? base.description,
    metadata:
      base.metadata || detail.metadata
        ? { ...base.metadata, ...detail.metadata }
        : null,
    variants: detail.variants ?? base.variants,
    marketingTags: detail.marketingTags ?? base.marketingTags,
    timestamp: detail.timestamp ?? base.timestamp,
  };
}

export function toRow(p: Product): ProductRow {
  return {
    sku: p.sku,
    name: p.name,
    price: p.price,
    category_slugs: Array.from(p.categorySlugs),
    url: p.url,
    brand: p.brand,
    section: p.section,
    timestamp: p.timestamp,
    price_data: {
      current: p.priceData.current,
      original: p.priceData.original,
      sale_tag: p.priceData.saleTag,
    },
    stock: {
      in_stock: p.stock.inStock,
      count: p.stock.count,
    },
    assets: {
      main_image: p.assets.mainImage,
      set_images: p.assets.setImages,
      view_360: p.assets.view360,
      video: p.assets.video,
    },
    metadata: p.metadata,
    variants: p.variants,
    marketing_tags: p.marketingTags,
  };
}
