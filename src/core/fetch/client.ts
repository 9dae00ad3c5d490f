/**
 * HTTP fetch client
 *
 * Performs exactly one request per call and classifies failures. Retries,
 * pacing and concurrency limits belong to the crawl scheduler.
 */

import { HTTP_CONSTANTS } from "../constants";
import type {
  FetchResponse,
  HttpMethod,
  RequestContext,
} from "../types/crawl";
import { linkSignals } from "../utils/async";
import {
  CancelledError,
  ConnectionError,
  HttpError,
  RateLimitedError,
  TimeoutError,
  parseRetryAfter,
} from "./errors";

export interface FetchOptions {
  method?: HttpMethod;
  signal?: AbortSignal;
}

/** Replaceable network capability */
export interface FetchClient {
  fetch(
    url: string,
    context: RequestContext,
    options?: FetchOptions,
  ): Promise<FetchResponse>;
}

export interface HttpFetchClientOptions {
  timeoutMs: number;
  defaultHeaders?: Record<string, string>;
  /** Site-specific throttle signal, consulted for 2xx responses only */
  isThrottled?: (response: FetchResponse) => boolean;
  fetchImpl?: typeof fetch;
}

export class HttpFetchClient implements FetchClient {
  private readonly fetchImpl: typeof fetch;
  private readonly defaultHeaders: Record<string, string>;

  constructor(private readonly options: HttpFetchClientOptions) {
    this.fetchImpl = options.fetchImpl ?? globalThis.fetch;
    this.defaultHeaders = options.defaultHeaders ?? {
      "user-agent": HTTP_CONSTANTS.USER_AGENT,
      accept: HTTP_CONSTANTS.ACCEPT_HEADER,
      "accept-language": HTTP_CONSTANTS.ACCEPT_LANGUAGE,
    };
  }

  async fetch(
    url: string,
    context: RequestContext,
    options: FetchOptions = {},
  ): Promise<FetchResponse> {
    const { timeoutMs } = this.options;
    const external = options.signal;
    if (external?.aborted) throw new CancelledError(url);

    const timeout = new AbortController();
    const timer = setTimeout(() => timeout.abort(), timeoutMs);
    const { signal, dispose } = linkSignals(external, timeout.signal);

    let response: FetchResponse;
    try {
      const r = await this.fetchImpl(url, {
        method: options.method ?? "GET",
        redirect: "follow",
        headers: { ...this.defaultHeaders, ...context.headers },
        signal,
      });
      const headers: Record<string, string> = {};
      r.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });
      response = {
        url,
        status: r.status,
        headers,
        body: await r.text(),
      };
    } catch (e) {
      if (external?.aborted) throw new CancelledError(url);
      if (timeout.signal.aborted) throw new TimeoutError(url, timeoutMs);
      throw new ConnectionError(url, describeCause(e));
    } finally {
      clearTimeout(timer);
      dispose();
    }

    if (response.status === 429) {
      throw new RateLimitedError(
        url,
        response.status,
        parseRetryAfter(response.headers["retry-after"]),
      );
    }
    const succeeded = response.status >= 200 && response.status < 300;
    if (succeeded && this.options.isThrottled?.(response)) {
      throw new RateLimitedError(
        url,
        response.status,
        parseRetryAfter(response.headers["retry-after"]),
      );
    }
    if (response.status >= 400) {
      throw new HttpError(url, response.status);
    }
    return response;
  }
}

function describeCause(e: unknown): string {
  if (!(e instanceof Error)) return String(e);
  const cause = e.cause;
  if (cause instanceof Error) return `${e.message} (${cause.message})`;
  return e.message;
}
