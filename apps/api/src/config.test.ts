import { afterEach, describe, expect, it, vi } from "vitest";

async function loadConfig() {
  vi.resetModules();
  return import("./config.js");
}

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("config", () => {
  it("falls back to the defaults", async () => {
    vi.stubEnv("EMBEDDING_DIMENSION", "");
    vi.stubEnv("MIN_ACCEPTED_SAMPLES", "");
    vi.stubEnv("FACEKEEP_STORE", "");

    const config = await loadConfig();

    expect(config.EMBEDDING_DIMENSION).toBe(128);
    expect(config.MIN_ACCEPTED_SAMPLES).toBe(1);
    expect(config.STORE_KIND).toBe("file");
  });

  it("reads overrides from the environment", async () => {
    vi.stubEnv("MIN_ACCEPTED_SAMPLES", "3");
    vi.stubEnv("FACEKEEP_STORE", "directory");

    const config = await loadConfig();

    expect(config.MIN_ACCEPTED_SAMPLES).toBe(3);
    expect(config.STORE_KIND).toBe("directory");
  });

  it("fails at load when the minimum sample count is below 1", async () => {
    vi.stubEnv("MIN_ACCEPTED_SAMPLES", "0");
    await expect(loadConfig()).rejects.toThrow(
      "Environment variable MIN_ACCEPTED_SAMPLES must be a positive integer, got: 0",
    );
  });

  it("fails at load when the dimension is fractional", async () => {
    vi.stubEnv("EMBEDDING_DIMENSION", "12.5");
    await expect(loadConfig()).rejects.toThrow(
      "Environment variable EMBEDDING_DIMENSION must be a positive integer, got: 12.5",
    );
  });
});
