/**
 * Product-related types
 */

/**
 * Fields a listing or detail page yields for one product, before validation.
 * Every field is optional; extractors fill what the payload carries.
 */
export interface RawProductRecord {
  sku?: string | null;
  name?: string | null;
  price?: number | string | null; // current (possibly discounted) price
  originalPrice?: number | string | null;
  saleTag?: string | null;
  url?: string | null;
  productSlug?: string | null; // site path used to request the detail page
  brand?: string | null;
  section?: readonly string[] | null;
  inStock?: boolean | null;
  stockCount?: number | null;
  mainImage?: string | null;
  images?: readonly string[] | null;
  video?: string | null;
  description?: string | null;
  metadata?: Readonly<Record<string, unknown>> | null;
  variants?: number | null;
  marketingTags?: readonly string[] | null;
  timestamp?: number | null; // unix seconds, from the response date
}

export interface PriceData {
  current: number;
  original: number | null;
  saleTag: string | null;
}

export interface StockData {
  inStock: boolean | null;
  count: number | null;
}

export interface Assets {
  mainImage: string | null;
  setImages: string[] | null;
  view360: string | null;
  video: string | null;
}

/** Canonical product, one per SKU for the lifetime of a run */
export interface Product {
  sku: string;
  name: string;
  price: number;
  categorySlugs: Set<string>;
  url: string | null;
  brand: string | null;
  section: string[];
  timestamp: number | null;
  priceData: PriceData;
  stock: StockData;
  assets: Assets;
  metadata: Record<string, unknown>;
  variants: number | null;
  marketingTags: string[];
}

/** Shape written to the output document */
export interface ProductRow {
  sku: string;
  name: string;
  price: number;
  category_slugs: string[];
  url: string | null;
  brand: string | null;
  section: string[];
  timestamp: number | null;
  price_data: {
    current: number;
    original: number | null;
    sale_tag: string | null;
  };
  stock: {
    in_stock: boolean | null;
    count: number | null;
  };
  assets: {
    main_image: string | null;
    set_images: string[] | null;
    view_360: string | null;
    video: string | null;
  };
  metadata: Record<string, unknown>;
  variants: number | null;
  marketing_tags: string[];
}
