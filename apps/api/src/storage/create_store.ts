import type { StoreKind } from "../config.js";
import type { RegistryStore } from "./store.js";
import { DirectoryStore } from "./stores/directory_store.js";
import { JsonFileStore, getRegistryFilePath } from "./stores/json_file_store.js";

/**
 * Store for a data directory. Both kinds keep `registry.json` at the
 * directory root; the directory store adds `identities/` beside it.
 */
export function createStore(kind: StoreKind, dataDir: string): RegistryStore {
  return kind === "directory"
    ? new DirectoryStore(dataDir)
    : new JsonFileStore(getRegistryFilePath(dataDir));
}
