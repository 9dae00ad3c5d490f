import pino from "pino";

// Set log level via env LOG_LEVEL (default: info)
const logger = pino({
  level: process.env.LOG_LEVEL || "info",
  transport:
    process.env.NODE_ENV === "production" || process.env.NODE_ENV === "test"
      ? undefined
      : {
          target: "pino-pretty",
          options: { colorize: true },
        },
});

export interface LogMeta {
  category?: string;
  city?: string;
  url?: string;
  page?: number;
  duration?: number;
  count?: number;
  error?: string;
  [key: string]: unknown;
}

export class Logger {
  static info(message: string, meta?: LogMeta): void {
    logger.info(meta || {}, message);
  }
  static warn(message: string, meta?: LogMeta): void {
    logger.warn(meta || {}, message);
  }
  static error(message: string, error?: unknown, meta?: LogMeta): void {
    const errorMeta =
      error instanceof Error
        ? { ...meta, error: error.message, stack: error.stack }
        : { ...meta, error: error === undefined ? undefined : String(error) };
    logger.error(errorMeta, message);
  }
  static debug(message: string, meta?: LogMeta): void {
    logger.debug(meta || {}, message);
  }
  // Convenience methods for common logging patterns
  static categoryStarted(category: string, city: string | null): void {
    this.info(`Category started: ${category}`, {
      category,
      city: city ?? undefined,
    });
  }
  static pageExtracted(category: string, page: number, count: number): void {
    this.debug(`Page ${page} extracted`, { category, page, count });
  }
  static retryScheduled(
    url: string,
    attempt: number,
    delayMs: number,
    reason: string,
  ): void {
    this.warn(`Retrying in ${delayMs}ms (attempt ${attempt}): ${reason}`, {
      url,
      attempt,
      delayMs,
    });
  }
  static categoryFinished(
    category: string,
    status: string,
    pages: number,
    records: number,
    duration: number,
  ): void {
    this.info(`Category finished: ${category} (${status})`, {
      category,
      status,
      pages,
      records,
      duration,
    });
  }
  static recordRejected(category: string, reason: string): void {
    this.warn(`Record rejected: ${reason}`, { category, reason });
  }
}
