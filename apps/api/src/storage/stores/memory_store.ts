/**
 * In-process store. Keeps a deep copy of the last saved snapshot, so later
 * changes to registry objects never leak into "persisted" state.
 */

import type { RegistrySnapshot } from "../../schemas/index.js";
import type { RegistryStore } from "../store.js";

export class MemoryStore implements RegistryStore {
  readonly location = "memory";
  private snapshot: RegistrySnapshot | null;
  /** Number of completed saves */
  saveCount = 0;

  constructor(initial: RegistrySnapshot | null = null) {
    this.snapshot = initial ? structuredClone(initial) : null;
  }

  async load(): Promise<RegistrySnapshot | null> {
    return this.snapshot ? structuredClone(this.snapshot) : null;
  }

  async save(snapshot: RegistrySnapshot): Promise<void> {
    this.snapshot = structuredClone(snapshot);
    this.saveCount++;
  }

  /** The last saved snapshot, as stored. */
  peek(): RegistrySnapshot | null {
    return this.snapshot;
  }
}
