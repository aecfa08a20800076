/**
 * JSON File Store
 *
 * Persists the whole registry snapshot as one pretty-printed JSON file.
 * The snapshot is schema-validated on load so corrupted or drifted data
 * never reaches the matching logic.
 */

import { readFile, writeFile, mkdir, rename } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname, join } from "node:path";
import { RegistrySnapshotSchema, type RegistrySnapshot } from "../../schemas/index.js";
import { parseJson, parseWithSchema, type RegistryStore } from "../store.js";

export class JsonFileStore implements RegistryStore {
  readonly location: string;

  constructor(filePath: string) {
    this.location = filePath;
  }

  async load(): Promise<RegistrySnapshot | null> {
    if (!existsSync(this.location)) return null;

    const content = await readFile(this.location, "utf-8");
    const data = parseJson(content, this.location);
    return parseWithSchema(RegistrySnapshotSchema, data, this.location);
  }

  /**
   * Write to a sibling temp file and rename it over the target, so a crash
   * mid-write leaves the previous snapshot intact.
   */
  async save(snapshot: RegistrySnapshot): Promise<void> {
    const dir = dirname(this.location);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }

    const tempPath = `${this.location}.tmp`;
    await writeFile(tempPath, JSON.stringify(snapshot, null, 2), "utf-8");
    await rename(tempPath, this.location);
  }
}

/** Default snapshot location inside a data directory. */
export function getRegistryFilePath(dataDir: string): string {
  return join(dataDir, "registry.json");
}
