import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { closeLogger, formatArgs, getLogFilePath, initLogger } from "./logger.js";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "facekeep-log-"));
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

afterEach(async () => {
  closeLogger();
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

describe("formatArgs", () => {
  it("joins strings and serializes objects", () => {
    expect(formatArgs(["[Registry] Loaded", 2, { dimension: 3 }])).toBe(
      '[Registry] Loaded 2 {"dimension":3}',
    );
  });

  it("falls back to String for values JSON cannot encode", () => {
    expect(formatArgs([10n])).toBe("10");
  });
});

describe("initLogger", () => {
  it("mirrors console output into a dated file", async () => {
    const path = initLogger(join(dir, "logs"), new Date("2026-03-01T12:00:00.000Z"));
    expect(path).toBe(join(dir, "logs", "facekeep-2026-03-01.log"));
    expect(getLogFilePath()).toBe(path);

    console.log("[Matching] Accepted 'alice'");
    console.warn("[Enrollment] Dropped sample 1");

    const lines = (await readFile(path, "utf-8")).trim().split("\n");
    expect(lines).toContain("  FaceKeep Session Started: 2026-03-01T12:00:00.000Z");
    expect(lines.at(-2)).toMatch(/^\[\d{2}:\d{2}:\d{2}\.\d{3}\] \[INFO \] \[Matching\] Accepted 'alice'$/);
    expect(lines.at(-1)).toMatch(/^\[\d{2}:\d{2}:\d{2}\.\d{3}\] \[WARN \] \[Enrollment\] Dropped sample 1$/);
  });

  it("stops writing after closeLogger", async () => {
    const path = initLogger(dir, new Date("2026-03-01T12:00:00.000Z"));
    closeLogger();
    console.log("after close");

    expect(getLogFilePath()).toBeNull();
    expect(await readFile(path, "utf-8")).not.toContain("after close");
  });
});
