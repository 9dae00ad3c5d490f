import { describe, expect, it } from "vitest";
import { UsageError, parseArgs } from "./cli-args";

describe("parseArgs", () => {
  it("should show help without arguments or with --help", () => {
    expect(parseArgs([])).toEqual({ command: "help" });
    expect(parseArgs(["crawl", "--help"])).toEqual({ command: "help" });
    expect(parseArgs(["-h"])).toEqual({ command: "help" });
  });

  it("should parse a crawl command", () => {
    expect(
      parseArgs([
        "crawl",
        "--city",
        " 55 ",
        "--categories",
        "kosmetika-i-gigiena, dom/kukhnya,,",
        "--concurrency",
        "2",
        "--delay",
        "0",
        "--max-pages",
        "5",
        "--out",
        "out/products.json",
        "--details",
      ]),
    ).toEqual({
      command: "crawl",
      site: undefined,
      cityId: "55",
      categories: ["kosmetika-i-gigiena", "dom/kukhnya"],
      outputPath: "out/products.json",
      pacing: { concurrency: 2, politenessDelayMs: 0, maxPagesPerCategory: 5 },
      fetchDetails: true,
      cityLookup: true,
    });
  });

  it("should leave unset options to the configuration", () => {
    const cmd = parseArgs([
      "crawl",
      "--city",
      "7",
      "--categories",
      "igrushki",
      "--no-city-lookup",
    ]);

    expect(cmd).toMatchObject({
      pacing: {},
      outputPath: undefined,
      fetchDetails: undefined,
      cityLookup: false,
    });
  });

  it("should turn detail fetching off with --no-details", () => {
    expect(
      parseArgs([
        "crawl",
        "--city",
        "7",
        "--categories",
        "igrushki",
        "--details",
        "--no-details",
      ]),
    ).toMatchObject({ fetchDetails: false });
  });

  it("should parse the cities command", () => {
    expect(
      parseArgs(["cities", "--out", "cities.json", "--site", "fixprice"]),
    ).toEqual({
      command: "cities",
      site: "fixprice",
      outputPath: "cities.json",
      pacing: {},
    });
  });

  it.each([
    [["crawl", "--categories", "a"], "Missing --city <id>"],
    [["crawl", "--city", "55"], "Missing --categories <slug1,slug2>"],
    [["crawl", "--city", "55", "--categories", " , "], "Missing --categories <slug1,slug2>"],
    [["crawl", "--city", "--categories", "a"], "Missing value for --city"],
    [["cities", "--out"], "Missing value for --out"],
    [["cities", "--retries", "-1"], '--retries expects a non-negative integer, got "-1"'],
    [["cities", "--timeout", "1.5"], '--timeout expects a non-negative integer, got "1.5"'],
    [["scrape"], 'Unknown command "scrape"'],
  ])("should reject %j", (argv, message) => {
    expect(() => parseArgs(argv)).toThrow(new UsageError(message));
  });
});
