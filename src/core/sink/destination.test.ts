import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileDestination, MemoryDestination } from "./destination";

describe("FileDestination", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "catalog-out-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("should write the document as pretty JSON and leave no temp file", async () => {
    const target = path.join(dir, "nested", "output.json");
    const destination = new FileDestination<{ sku: string }>(target);

    await destination.write([{ sku: "1" }, { sku: "2" }]);

    expect(await fs.readFile(target, "utf8")).toBe(
      '[\n  {\n    "sku": "1"\n  },\n  {\n    "sku": "2"\n  }\n]\n',
    );
    expect(await fs.readdir(path.dirname(target))).toEqual(["output.json"]);
  });

  it("should replace an earlier document", async () => {
    const target = path.join(dir, "output.json");
    const destination = new FileDestination<number>(target);

    await destination.write([1, 2, 3]);
    await destination.write([]);

    expect(await fs.readFile(target, "utf8")).toBe("[]\n");
  });

  it("should use a custom serializer", async () => {
    const target = path.join(dir, "cities.txt");
    const destination = new FileDestination<string>(
      target,
      (rows) => rows.join(";"),
    );

    await destination.write(["a", "b"]);

    expect(await fs.readFile(target, "utf8")).toBe("a;b");
    expect(destination.location).toBe(target);
  });
});

describe("MemoryDestination", () => {
  it("should keep the last document", async () => {
    const destination = new MemoryDestination<number>();

    await destination.write([1]);
    await destination.write([2, 3]);

    expect(destination.rows).toEqual([2, 3]);
    expect(destination.writes).toBe(2);
  });
});
