/**
 * Directory Store
 *
 * One JSON file per identity under `<root>/identities/`, plus
 * `<root>/registry.json` holding dimension, threshold and identity order.
 * Identity files can be dropped into the directory by hand; files not listed
 * in the order are loaded after the listed ones, sorted by identity_id.
 */

import { readFile, writeFile, mkdir, readdir, rename, unlink } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join } from "node:path";
import {
  IdentityRecordSchema,
  LAYOUT_VERSION,
  RegistryMetaSchema,
  type IdentityRecord,
  type RegistryMeta,
  type RegistrySnapshot,
} from "../../schemas/index.js";
import { MalformedRecordError } from "../../errors.js";
import { parseJson, parseWithSchema, type RegistryStore } from "../store.js";

const META_FILE = "registry.json";
const IDENTITIES_DIR = "identities";
const RECORD_SUFFIX = ".json";

async function writeAtomic(path: string, content: string): Promise<void> {
  const tempPath = `${path}.tmp`;
  await writeFile(tempPath, content, "utf-8");
  await rename(tempPath, path);
}

export function identityFileName(identityId: string): string {
  return `${encodeURIComponent(identityId)}${RECORD_SUFFIX}`;
}

export class DirectoryStore implements RegistryStore {
  readonly location: string;

  constructor(rootDir: string) {
    this.location = rootDir;
  }

  private get metaPath(): string {
    return join(this.location, META_FILE);
  }

  private get identitiesDir(): string {
    return join(this.location, IDENTITIES_DIR);
  }

  async load(): Promise<RegistrySnapshot | null> {
    if (!existsSync(this.metaPath)) return null;

    const meta = parseWithSchema(
      RegistryMetaSchema,
      parseJson(await readFile(this.metaPath, "utf-8"), this.metaPath),
      this.metaPath,
    );

    const files = existsSync(this.identitiesDir)
      ? (await readdir(this.identitiesDir)).filter((f) => f.endsWith(RECORD_SUFFIX))
      : [];

    const byId = new Map<string, IdentityRecord>();
    for (const file of files) {
      const record = await this.readRecord(file);
      byId.set(record.identity_id, record);
    }

    const records: IdentityRecord[] = [];
    for (const id of meta.identity_order) {
      const record = byId.get(id);
      if (!record) {
        throw new MalformedRecordError(this.metaPath, `missing identity file for '${id}'`);
      }
      records.push(record);
      byId.delete(id);
    }

    const unlisted = [...byId.values()].sort((a, b) =>
      a.identity_id < b.identity_id ? -1 : a.identity_id > b.identity_id ? 1 : 0,
    );
    if (unlisted.length > 0) {
      console.log(`[DirectoryStore] Loaded ${unlisted.length} unlisted identity file(s)`);
    }

    return {
      version: meta.version,
      dimension: meta.dimension,
      threshold: meta.threshold,
      records: [...records, ...unlisted],
    };
  }

  /**
   * Record files first, then the meta file, each written to a temp file and
   * renamed into place. Stale record files are deleted only once the new
   * meta is in place, so a failed save never leaves the meta listing an
   * identity whose file is gone.
   */
  async save(snapshot: RegistrySnapshot): Promise<void> {
    await mkdir(this.identitiesDir, { recursive: true });

    const keep = new Set<string>();
    for (const record of snapshot.records) {
      const file = identityFileName(record.identity_id);
      keep.add(file);
      await writeAtomic(join(this.identitiesDir, file), JSON.stringify(record, null, 2));
    }

    const meta: RegistryMeta = {
      version: snapshot.version || LAYOUT_VERSION,
      dimension: snapshot.dimension,
      threshold: snapshot.threshold,
      identity_order: snapshot.records.map((r) => r.identity_id),
    };
    await writeAtomic(this.metaPath, JSON.stringify(meta, null, 2));

    for (const file of await readdir(this.identitiesDir)) {
      if (file.endsWith(RECORD_SUFFIX) && !keep.has(file)) {
        await unlink(join(this.identitiesDir, file));
      }
    }
  }

  private async readRecord(file: string): Promise<IdentityRecord> {
    const path = join(this.identitiesDir, file);
    const record = parseWithSchema(
      IdentityRecordSchema,
      parseJson(await readFile(path, "utf-8"), path),
      path,
    );
    if (identityFileName(record.identity_id) !== file) {
      throw new MalformedRecordError(path, `file name does not match identity '${record.identity_id}'`);
    }
    return record;
  }
}
