import { describe, expect, it, vi } from "vitest";
import { AbortError } from "./async";
import { RetryError, backoffDelay, withRetry } from "./retry";

describe("backoffDelay", () => {
  it("should grow exponentially from the base delay", () => {
    const opts = { baseDelayMs: 100, jitterMs: 0 };
    expect([0, 1, 2, 3].map((a) => backoffDelay(a, opts))).toEqual([
      100, 200, 400, 800,
    ]);
  });

  it("should cap the delay at maxDelayMs", () => {
    expect(backoffDelay(10, { baseDelayMs: 100, maxDelayMs: 1500, jitterMs: 0 }))
      .toBe(1500);
  });

  it("should prefer a server hint, still capped", () => {
    const opts = { baseDelayMs: 100, maxDelayMs: 1000, jitterMs: 0 };
    expect(backoffDelay(0, opts, 700)).toBe(700);
    expect(backoffDelay(0, opts, 5000)).toBe(1000);
    expect(backoffDelay(3, opts, 0)).toBe(0);
  });

  it("should add at most jitterMs of jitter", () => {
    for (let i = 0; i < 20; i++) {
      const d = backoffDelay(1, { baseDelayMs: 50, jitterMs: 10 });
      expect(d).toBeGreaterThanOrEqual(100);
      expect(d).toBeLessThan(110);
    }
  });
});

describe("withRetry", () => {
  const fast = { baseDelayMs: 0, jitterMs: 0 };

  it("should return the first successful result", async () => {
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error("flaky"))
      .mockResolvedValueOnce("ok");

    await expect(withRetry(operation, { maxRetries: 3, ...fast })).resolves.toBe(
      "ok",
    );
    expect(operation).toHaveBeenCalledTimes(2);
    expect(operation.mock.calls.map(([attempt]) => attempt)).toEqual([0, 1]);
  });

  it("should give up after exactly maxRetries retries", async () => {
    const failure = new Error("down");
    const operation = vi.fn(async () => {
      throw failure;
    });
    const onRetry = vi.fn();

    const error = await withRetry(operation, {
      maxRetries: 2,
      ...fast,
      onRetry,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryError);
    expect(error).toMatchObject({ attempt: 3, originalError: failure });
    expect(operation).toHaveBeenCalledTimes(3);
    expect(onRetry.mock.calls).toEqual([
      [failure, 1, 0],
      [failure, 2, 0],
    ]);
  });

  it("should throw errors the condition rejects without retrying", async () => {
    const permanent = new Error("not found");
    const operation = vi.fn(async () => {
      throw permanent;
    });

    await expect(
      withRetry(operation, {
        maxRetries: 5,
        ...fast,
        retryCondition: (e) => e !== permanent,
      }),
    ).rejects.toBe(permanent);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("should stop waiting when the signal aborts", async () => {
    const controller = new AbortController();
    const operation = vi.fn(async () => {
      throw new Error("down");
    });

    await expect(
      withRetry(operation, {
        maxRetries: 5,
        baseDelayMs: 60_000,
        jitterMs: 0,
        signal: controller.signal,
        onRetry: () => controller.abort(),
      }),
    ).rejects.toBeInstanceOf(AbortError);
    expect(operation).toHaveBeenCalledTimes(1);
  });
});
