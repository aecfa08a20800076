import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { createStore } from "./create_store.js";
import { DirectoryStore } from "./stores/directory_store.js";
import { JsonFileStore } from "./stores/json_file_store.js";

describe("createStore", () => {
  it("roots a directory store at the data directory", () => {
    const store = createStore("directory", join("var", "facekeep"));
    expect(store).toBeInstanceOf(DirectoryStore);
    expect(store.location).toBe(join("var", "facekeep"));
  });

  it("keeps a file store's snapshot in the data directory", () => {
    const store = createStore("file", join("var", "facekeep"));
    expect(store).toBeInstanceOf(JsonFileStore);
    expect(store.location).toBe(join("var", "facekeep", "registry.json"));
  });
});
