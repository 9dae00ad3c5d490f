import type {
  PageCursor,
  PageType,
  PaginationInfo,
} from "../types/crawl";
import type { ExtractionError } from "./errors";

export interface ExtractContext {
  pageType: PageType;
  cursor: PageCursor;
  url: string;
  status: number;
  headers: Record<string, string>;
}

export type ExtractResult<T> =
  | { status: "ok"; records: T[]; pagination: PaginationInfo }
  | {
      status: "malformed";
      error: ExtractionError;
      /** Next page can sometimes still be derived (e.g. from headers) */
      pagination: PaginationInfo | null;
    };

/** Turns one fetched page into raw records plus pagination metadata */
export interface PageExtractor<T> {
  extract(body: string, context: ExtractContext): ExtractResult<T>;
}
