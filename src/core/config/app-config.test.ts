import { afterEach, describe, expect, it, vi } from "vitest";

async function loadConfig() {
  vi.resetModules();
  const { AppConfig } = await import("./app-config");
  return AppConfig;
}

describe("AppConfig", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("should fetch detail cards unless turned off", async () => {
    expect((await loadConfig()).FETCH_DETAILS).toBe(true);

    vi.stubEnv("FETCH_DETAILS", "false");
    expect((await loadConfig()).FETCH_DETAILS).toBe(false);
  });

  it("should only report pacing values set in the environment", async () => {
    vi.stubEnv("CONCURRENCY", "8");
    vi.stubEnv("POLITENESS_DELAY_MS", "");
    vi.stubEnv("FETCH_RETRIES", "many");

    expect((await loadConfig()).pacingOverrides()).toEqual({ concurrency: 8 });
  });
});
