/**
 * Centralized application configuration
 */

import { OUTPUT_CONSTANTS } from "../constants";
import type { PacingConfig } from "../types";
import { envBool, envOptionalInt, envStr } from "./env";

export class AppConfig {
  // Output configuration
  static readonly OUTPUT_PATH = envStr(
    "OUTPUT_PATH",
    OUTPUT_CONSTANTS.DEFAULT_OUTPUT_PATH,
  );
  static readonly CITIES_OUTPUT_PATH = envStr(
    "CITIES_OUTPUT_PATH",
    OUTPUT_CONSTANTS.DEFAULT_CITIES_PATH,
  );

  // Execution configuration
  static readonly FETCH_DETAILS = envBool("FETCH_DETAILS", true);

  // Site configuration
  static readonly FIXPRICE_API_KEY = envStr("FIXPRICE_API_KEY", "");
  static readonly FIXPRICE_LANGUAGE = envStr("FIXPRICE_LANGUAGE", "ru");

  /**
   * Pacing values explicitly set in the environment; unset keys are omitted
   * so they do not shadow site defaults
   */
  static pacingOverrides(): PacingConfig {
    const out: PacingConfig = {};
    const set = (key: keyof PacingConfig, envKey: string) => {
      const value = envOptionalInt(envKey);
      if (value !== undefined) out[key] = value;
    };
    set("concurrency", "CONCURRENCY");
    set("politenessDelayMs", "POLITENESS_DELAY_MS");
    set("requestTimeoutMs", "REQUEST_TIMEOUT_MS");
    set("fetchRetries", "FETCH_RETRIES");
    set("fetchRetryBaseMs", "FETCH_RETRY_BASE_MS");
    set("fetchRetryMaxMs", "FETCH_RETRY_MAX_MS");
    set("pageSize", "PAGE_SIZE");
    set("maxPagesPerCategory", "MAX_PAGES_PER_CATEGORY");
    return out;
  }
}
