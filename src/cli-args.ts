/**
 * Command-line argument parsing
 */

import type { PacingConfig } from "./core/types";
import { splitList } from "./core/utils/array";

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export type CliCommand =
  | { command: "help" }
  | {
      command: "crawl";
      site?: string;
      cityId: string;
      categories: string[];
      outputPath?: string;
      pacing: PacingConfig;
      fetchDetails?: boolean;
      cityLookup: boolean;
    }
  | {
      command: "cities";
      site?: string;
      outputPath?: string;
      pacing: PacingConfig;
    };

export const USAGE = `Usage:
  catalog-crawler crawl --city <id> --categories <slug1,slug2/child> [options]
  catalog-crawler cities [--out available_cities.txt]

Crawl options:
  --out             Output JSON file (default: OUTPUT_PATH or output.json)
  --concurrency     Max in-flight requests (default: 4)
  --delay           Min ms between requests to the same host (default: 250)
  --retries         Retries per request after the first attempt (default: 3)
  --timeout         Request timeout in ms (default: 30000)
  --page-size       Products per listing page (max 99)
  --max-pages       Page cap per category (default: 0 = no limit)
  --details         Fetch each product's detail card (default: FETCH_DETAILS or on)
  --no-details      Listing fields only: no stock, description or variant metadata
  --no-city-lookup  Use the city id without checking the city list

Common options:
  --site            Site adapter (default: fixprice)
  --help            Show this help

Examples:
  npm run crawl -- --city 55 --categories kosmetika-i-gigiena,igrushki
  npm run cities -- --out cities.json`;

/**
 * Parses argv (without the node and script entries)
 * @throws UsageError on a missing or malformed argument
 */
export function parseArgs(argv: readonly string[]): CliCommand {
  const hasFlag = (flag: string) => argv.includes(flag);
  const getArg = (flag: string) => {
    const i = argv.lastIndexOf(flag);
    if (i < 0) return undefined;
    const value = argv[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new UsageError(`Missing value for ${flag}`);
    }
    return value;
  };
  const intArg = (flag: string): number | undefined => {
    const raw = getArg(flag);
    if (raw === undefined) return undefined;
    if (!/^\d+$/.test(raw.trim())) {
      throw new UsageError(
        `${flag} expects a non-negative integer, got "${raw}"`,
      );
    }
    return Number(raw);
  };

  if (hasFlag("--help") || hasFlag("-h") || argv.length === 0) {
    return { command: "help" };
  }

  const [command] = argv;
  const site = getArg("--site");
  const outputPath = getArg("--out");
  const pacing: PacingConfig = {};
  const set = (key: keyof PacingConfig, flag: string) => {
    const value = intArg(flag);
    if (value !== undefined) pacing[key] = value;
  };
  set("concurrency", "--concurrency");
  set("politenessDelayMs", "--delay");
  set("fetchRetries", "--retries");
  set("requestTimeoutMs", "--timeout");
  set("pageSize", "--page-size");
  set("maxPagesPerCategory", "--max-pages");

  switch (command) {
    case "crawl": {
      const cityId = getArg("--city")?.trim();
      if (!cityId) throw new UsageError("Missing --city <id>");
      const categories = splitList(getArg("--categories") ?? "");
      if (categories.length === 0) {
        throw new UsageError("Missing --categories <slug1,slug2>");
      }
      return {
        command: "crawl",
        site,
        cityId,
        categories,
        outputPath,
        pacing,
        fetchDetails: hasFlag("--no-details")
          ? false
          : hasFlag("--details")
            ? true
            : undefined,
        cityLookup: !hasFlag("--no-city-lookup"),
      };
    }
    case "cities":
      return { command: "cities", site, outputPath, pacing };
    default:
      throw new UsageError(`Unknown command "${command}"`);
  }
}
