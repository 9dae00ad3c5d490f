/**
 * Application constants
 */

// Execution constants
export const EXECUTION_CONSTANTS = {
  MAX_CONCURRENCY: 16,
  DEFAULT_CONCURRENCY: 4,
  DEFAULT_POLITENESS_DELAY_MS: 250,
  DEFAULT_TIMEOUT_MS: 30000,
  DEFAULT_RETRIES: 3,
  DEFAULT_BASE_DELAY_MS: 800,
  DEFAULT_MAX_DELAY_MS: 15000,
  DEFAULT_JITTER_MS: 250,
  DEFAULT_PAGE_SIZE: 99,
  FORCED_EXIT_MS: 5000,
} as const;

// HTTP constants
export const HTTP_CONSTANTS = {
  USER_AGENT:
    "Mozilla/5.0 (X11; Ubuntu; Linux x86_64; rv:129.0) Gecko/20100101 Firefox/129.0",
  ACCEPT_HEADER: "application/json, text/plain, */*",
  ACCEPT_LANGUAGE: "en-US,en;q=0.5",
} as const;

// Output constants
export const OUTPUT_CONSTANTS = {
  DEFAULT_OUTPUT_PATH: "output.json",
  DEFAULT_CITIES_PATH: "available_cities.txt",
} as const;
