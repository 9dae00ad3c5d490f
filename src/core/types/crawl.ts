/**
 * Crawl-related types
 */

import type { City } from "./city";

export type PageType = "listing" | "detail" | "city-selector";

/**
 * One category of one city. `city` is null only for unscoped listings
 * such as the city selector itself.
 */
export interface Category {
  slug: string;
  city: City | null;
}

export interface PageCursor {
  category: Category;
  pageIndex: number; // 1-based
  nextToken: string | null;
}

/** Headers and scoping resolved once per walker, before the first fetch */
export interface RequestContext {
  city: City | null;
  headers: Record<string, string>;
}

export type HttpMethod = "GET" | "POST";

export interface PageRequest {
  url: string;
  method: HttpMethod;
}

export interface FetchResponse {
  url: string;
  status: number;
  body: string;
  /** Lower-cased header names */
  headers: Record<string, string>;
}

export type PaginationInfo =
  | { kind: "next"; token: string }
  | { kind: "end" };

export type WalkerState =
  | "idle"
  | "fetching"
  | "extracting"
  | "done"
  | "failed";

export type TerminalStatus = "Completed" | "Failed";

export type EndReason =
  | "end-of-results"
  | "empty-page"
  | "cycle-detected"
  | "malformed-page"
  | "page-limit";

export interface FailureSummary {
  kind: string;
  message: string;
  pageIndex: number;
  status?: number;
  attempts: number;
}

export interface PageError {
  pageIndex: number;
  message: string;
}

export interface CrawlOutcome {
  category: string;
  cityId: string | null;
  pagesFetched: number;
  recordsExtracted: number;
  terminalStatus: TerminalStatus;
  endReason: EndReason | null;
  failure: FailureSummary | null;
  extractionErrors: PageError[];
  retries: number;
}
