import { describe, expect, it } from "vitest";
import type { RequestContext } from "../types";
import { HttpFetchClient } from "./client";
import {
  CancelledError,
  ConnectionError,
  HttpError,
  RateLimitedError,
  TimeoutError,
} from "./errors";

const url = "https://api.test/v1/items";
const context: RequestContext = {
  city: { id: "55", name: "Test City", regionContext: "55" },
  headers: { "x-city": "55", "user-agent": "test-agent" },
};

interface Call {
  url: string;
  method: string;
  headers: Headers;
}

function stub(reply: () => Promise<Response>) {
  const calls: Call[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    calls.push({
      url: String(input),
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
    });
    return reply();
  };
  return { calls, fetchImpl };
}

/** Never settles on its own; rejects once the request signal aborts */
const hanging: typeof fetch = (_input, init) =>
  new Promise<Response>((_resolve, reject) => {
    init?.signal?.addEventListener("abort", () =>
      reject(new Error("This operation was aborted")),
    );
  });

describe("HttpFetchClient", () => {
  it("should return body, status and lower-cased headers", async () => {
    const { calls, fetchImpl } = stub(async () =>
      new Response('[{"sku":"1"}]', {
        status: 200,
        headers: { "Content-Type": "application/json", "X-Count": "1" },
      }),
    );
    const client = new HttpFetchClient({ timeoutMs: 1000, fetchImpl });

    const response = await client.fetch(url, context, { method: "POST" });

    expect(response).toEqual({
      url,
      status: 200,
      body: '[{"sku":"1"}]',
      headers: { "content-type": "application/json", "x-count": "1" },
    });
    expect(calls).toHaveLength(1);
    expect(calls[0].method).toBe("POST");
    expect(calls[0].headers.get("x-city")).toBe("55");
    expect(calls[0].headers.get("user-agent")).toBe("test-agent");
    expect(calls[0].headers.get("accept")).toBe(
      "application/json, text/plain, */*",
    );
    expect(calls[0].headers.get("accept-language")).toBe("en-US,en;q=0.5");
  });

  it("should classify 429 as rate limited with the Retry-After wait", async () => {
    const { fetchImpl } = stub(async () =>
      new Response("slow down", { status: 429, headers: { "Retry-After": "2" } }),
    );
    const client = new HttpFetchClient({ timeoutMs: 1000, fetchImpl });

    const error = await client.fetch(url, context).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error).toMatchObject({ status: 429, retryAfterMs: 2000 });
  });

  it("should classify other error statuses as HTTP errors", async () => {
    for (const status of [404, 503]) {
      const { fetchImpl } = stub(async () => new Response("", { status }));
      const client = new HttpFetchClient({ timeoutMs: 1000, fetchImpl });

      const error = await client.fetch(url, context).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(HttpError);
      expect(error).toMatchObject({ status, permanent: status < 500 });
    }
  });

  it("should apply the site's throttle signal", async () => {
    const { fetchImpl } = stub(async () =>
      new Response("<html>captcha</html>", {
        status: 200,
        headers: { "Content-Type": "text/html; charset=utf-8" },
      }),
    );
    const client = new HttpFetchClient({
      timeoutMs: 1000,
      fetchImpl,
      isThrottled: (r) => r.headers["content-type"].startsWith("text/html"),
    });

    await expect(client.fetch(url, context)).rejects.toBeInstanceOf(
      RateLimitedError,
    );
  });

  it("should keep an HTML error page a plain HTTP error", async () => {
    const { calls, fetchImpl } = stub(async () =>
      new Response("<html>not found</html>", {
        status: 404,
        headers: { "Content-Type": "text/html; charset=utf-8" },
      }),
    );
    const client = new HttpFetchClient({
      timeoutMs: 1000,
      fetchImpl,
      isThrottled: (r) => r.headers["content-type"].startsWith("text/html"),
    });

    const error = await client.fetch(url, context).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpError);
    expect(error).not.toBeInstanceOf(RateLimitedError);
    expect(error).toMatchObject({ status: 404, permanent: true });
    expect(calls).toHaveLength(1);
  });

  it("should classify transport failures as connection errors", async () => {
    const { fetchImpl } = stub(async () => {
      throw new TypeError("fetch failed", {
        cause: new Error("getaddrinfo ENOTFOUND api.test"),
      });
    });
    const client = new HttpFetchClient({ timeoutMs: 1000, fetchImpl });

    const error = await client.fetch(url, context).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toMatchObject({
      message: `Connection failed for ${url}: fetch failed (getaddrinfo ENOTFOUND api.test)`,
    });
  });

  it("should time out a request that takes too long", async () => {
    const client = new HttpFetchClient({ timeoutMs: 20, fetchImpl: hanging });

    await expect(client.fetch(url, context)).rejects.toBeInstanceOf(
      TimeoutError,
    );
  });

  it("should report cancellation instead of a timeout", async () => {
    const controller = new AbortController();
    const client = new HttpFetchClient({
      timeoutMs: 60_000,
      fetchImpl: hanging,
    });

    const pending = client.fetch(url, context, { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });

  it("should not send anything when already cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const { calls, fetchImpl } = stub(async () => new Response("[]"));
    const client = new HttpFetchClient({ timeoutMs: 1000, fetchImpl });

    await expect(
      client.fetch(url, context, { signal: controller.signal }),
    ).rejects.toBeInstanceOf(CancelledError);
    expect(calls).toHaveLength(0);
  });
});
