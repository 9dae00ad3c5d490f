import { describe, expect, it } from "vitest";
import type { ProductRow } from "../types";
import { MemoryDestination } from "./destination";
import { ProductSink, mergeRaw, toRow } from "./product-sink";

const raw = (sku: string, extra: Record<string, unknown> = {}) => ({
  sku,
  name: `Product ${sku}`,
  price: 10,
  ...extra,
});

function setup(sortBySku?: boolean) {
  const destination = new MemoryDestination<ProductRow>();
  const sink = new ProductSink(destination, { sortBySku });
  return { destination, sink };
}

describe("ProductSink", () => {
  it("should create on first sighting and merge categories later", async () => {
    const { sink } = setup();

    expect(await sink.accept(raw("1"), "a")).toEqual({
      status: "created",
      sku: "1",
    });
    expect(await sink.accept(raw("1", { name: "Renamed" }), "b")).toEqual({
      status: "merged",
      sku: "1",
    });
    expect(await sink.accept(raw("1"), "a")).toEqual({
      status: "merged",
      sku: "1",
    });

    const [row] = sink.rows();
    expect(sink.size).toBe(1);
    expect(row.name).toBe("Product 1");
    expect(row.category_slugs).toEqual(["a", "b"]);
  });

  it("should hold one product per SKU under concurrent accepts", async () => {
    const { sink } = setup();
    const slugs = ["a", "b", "c", "d"];

    const results = await Promise.all(
      slugs.flatMap((slug) => ["1", "2", "3"].map((sku) => sink.accept(raw(sku), slug))),
    );

    expect(results.filter((r) => r.status === "created")).toHaveLength(3);
    expect(results.filter((r) => r.status === "merged")).toHaveLength(9);
    expect(sink.rows().map((r) => [r.sku, r.category_slugs.length])).toEqual([
      ["1", 4],
      ["2", 4],
      ["3", 4],
    ]);
  });

  it("should reject invalid records and count them per category", async () => {
    const { sink } = setup();

    const result = await sink.accept({ sku: "9", name: "Bad", price: -5 }, "a");
    await sink.accept(raw("1"), "a");
    await sink.accept(raw("1"), "b");

    expect(result).toEqual({
      status: "rejected",
      reason: "Product price must be a finite non-negative number",
      field: "price",
    });
    expect(sink.size).toBe(1);
    expect(sink.stats()).toEqual({
      a: { created: 1, merged: 0, rejected: 1 },
      b: { created: 0, merged: 1, rejected: 0 },
    });
  });

  it("should sort the document by SKU, numbers in numeric order", async () => {
    const { sink, destination } = setup();
    for (const sku of ["10", "9", "100", "A-2"]) {
      await sink.accept(raw(sku), "a");
    }

    expect(await sink.finalize()).toBe(4);
    expect(destination.rows?.map((r) => r.sku)).toEqual([
      "9",
      "10",
      "100",
      "A-2",
    ]);
  });

  it("should keep first-sighting order when sorting is off", async () => {
    const { sink } = setup(false);
    for (const sku of ["10", "9", "100"]) {
      await sink.accept(raw(sku), "a");
    }

    expect(sink.rows().map((r) => r.sku)).toEqual(["10", "9", "100"]);
  });

  it("should refuse records after finalize", async () => {
    const { sink, destination } = setup();
    await sink.accept(raw("1"), "a");
    await sink.finalize();

    await expect(sink.accept(raw("2"), "a")).rejects.toThrow(
      "Product sink already finalized",
    );
    expect(destination.writes).toBe(1);
  });

  describe("enrich", () => {
    it("should merge detail fields and keep category membership", async () => {
      const { sink } = setup();
      await sink.accept(raw("1", { section: ["Дом"] }), "a");
      await sink.accept(raw("1"), "b");

      const updated = await sink.enrich("1", {
        sku: "1",
        price: 8,
        originalPrice: 10,
        stockCount: 3,
        inStock: true,
        description: "Soft",
        metadata: { country_of_origin: "Китай" },
      });

      const [row] = sink.rows();
      expect(updated).toBe(true);
      expect(row.price).toBe(8);
      expect(row.price_data.original).toBe(10);
      expect(row.stock).toEqual({ in_stock: true, count: 3 });
      expect(row.section).toEqual(["Дом"]);
      expect(row.metadata).toEqual({
        country_of_origin: "Китай",
        description: "Soft",
      });
      expect(row.category_slugs).toEqual(["a", "b"]);
    });

    it("should leave the product untouched when the detail is invalid", async () => {
      const { sink } = setup();
      await sink.accept(raw("1"), "a");

      expect(await sink.enrich("1", { stockCount: -1 })).toBe(false);
      expect(await sink.enrich("404", { price: 1 })).toBe(false);
      expect(sink.rows()[0].stock).toEqual({ in_stock: null, count: null });
    });
  });
});

describe("mergeRaw", () => {
  it("should let present detail values win and merge metadata", () => {
    expect(
      mergeRaw(
        { sku: "1", name: "A", brand: "X", metadata: { a: 1 } },
        { name: null, brand: "Y", metadata: { b: 2 } },
      ),
    ).toMatchObject({
      sku: "1",
      name: "A",
      brand: "Y",
      metadata: { a: 1, b: 2 },
    });
  });
});

describe("toRow", () => {
  it("should use the snake_case output shape", () => {
    expect(
      toRow({
        sku: "1",
        name: "A",
        price: 5,
        categorySlugs: new Set(["a"]),
        url: null,
        brand: null,
        section: [],
        timestamp: null,
        priceData: { current: 5, original: 6, saleTag: "Скидка 17%" },
        stock: { inStock: false, count: 0 },
        assets: {
          mainImage: "https://img.test/1.jpg",
          setImages: null,
          view360: null,
          video: null,
        },
        metadata: {},
        variants: null,
        marketingTags: [],
      }),
    ).toEqual({
      sku: "1",
      name: "A",
      price: 5,
      category_slugs: ["a"],
      url: null,
      brand: null,
      section: [],
      timestamp: null,
      price_data: { current: 5, original: 6, sale_tag: "Скидка 17%" },
      stock: { in_stock: false, count: 0 },
      assets: {
        main_image: "https://img.test/1.jpg",
        set_images: null,
        view_360: null,
        video: null,
      },
      metadata: {},
      variants: null,
      marketing_tags: [],
    });
  });
});
