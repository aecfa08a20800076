import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { JsonFileStore, getRegistryFilePath } from "./json_file_store.js";
import { MalformedRecordError } from "../../errors.js";
import type { RegistrySnapshot } from "../../schemas/index.js";
import { record } from "../../__test-setup__.js";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "facekeep-json-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

const snapshot: RegistrySnapshot = {
  version: "1.0",
  dimension: 3,
  threshold: 0.6,
  records: [record("alice", [[0.1, -0.25, 1e-7], [3, 2, 1]]), record("bob", [[0, 0, 0]])],
};

describe("JsonFileStore", () => {
  it("returns null before anything is saved", async () => {
    const store = new JsonFileStore(getRegistryFilePath(dir));
    expect(await store.load()).toBeNull();
  });

  it("round-trips a snapshot exactly", async () => {
    const store = new JsonFileStore(join(dir, "nested", "registry.json"));
    await store.save(snapshot);

    expect(await store.load()).toEqual(snapshot);
    expect(existsSync(join(dir, "nested", "registry.json.tmp"))).toBe(false);
  });

  it("writes pretty-printed JSON", async () => {
    const path = getRegistryFilePath(dir);
    await new JsonFileStore(path).save(snapshot);

    expect(await readFile(path, "utf-8")).toBe(JSON.stringify(snapshot, null, 2));
  });

  it("rejects invalid JSON", async () => {
    const path = getRegistryFilePath(dir);
    await writeFile(path, "{ not json", "utf-8");

    await expect(new JsonFileStore(path).load()).rejects.toThrow(MalformedRecordError);
  });

  it("rejects a snapshot that drifted from the layout", async () => {
    const path = getRegistryFilePath(dir);
    await writeFile(path, JSON.stringify({ ...snapshot, dimension: "three" }), "utf-8");

    await expect(new JsonFileStore(path).load()).rejects.toThrow(
      `Schema validation failed for ${path}`,
    );
  });
});
