/**
 * JSON payload parsing shared by API-backed extractors
 */

import type { ZodType, ZodTypeDef } from "zod";
import { ExtractionError } from "./errors";

export type JsonParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: ExtractionError };

/**
 * Parses `body` as JSON and checks it against `schema`
 * @returns The typed payload, or an ExtractionError naming the first issue
 */
export function parseJsonBody<T>(
  body: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  source: { pageType: string; url?: string },
): JsonParseResult<T> {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    return {
      success: false,
      error: new ExtractionError(
        `Invalid JSON: ${reason}`,
        source.pageType,
        source.url,
      ),
    };
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? ` at ${issue.path.join(".")}` : "";
    return {
      success: false,
      error: new ExtractionError(
        `Unexpected payload${where}: ${issue?.message ?? "schema mismatch"}`,
        source.pageType,
        source.url,
      ),
    };
  }
  return { success: true, data: parsed.data };
}
