/**
 * Storage Layer - Main Export
 *
 * The identity registry and the stores it persists through.
 * No matching logic lives here.
 */

export {
  IdentityRegistry,
  type RegistryOptions,
  type InsertOptions,
  type EnrollOptions,
} from "./registry.js";

export { parseWithSchema, parseJson, type RegistryStore } from "./store.js";
export { MemoryStore } from "./stores/memory_store.js";
export { JsonFileStore, getRegistryFilePath } from "./stores/json_file_store.js";
export { DirectoryStore, identityFileName } from "./stores/directory_store.js";
export { createStore } from "./create_store.js";
