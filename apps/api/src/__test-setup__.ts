/**
 * Shared test utilities: fixed clock, quiet console, small registries.
 */

import { afterEach, beforeEach, vi } from "vitest";
import type { Embedding, IdentityRecord } from "./schemas/index.js";
import { ManualClock } from "./services/clock.js";
import { IdentityRegistry } from "./storage/registry.js";
import { MemoryStore } from "./storage/stores/memory_store.js";

/** The instant every test clock starts at. */
export const T0 = "2026-03-01T12:00:00.000Z";

/**
 * Register hooks that silence console output for each test in the suite.
 */
export function silenceConsole(): void {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });
}

export function sample(
  vector: number[],
  capturedAt: string = T0,
  provenance: string = "test-capture",
): Embedding {
  return { vector, captured_at: capturedAt, provenance };
}

export function record(identityId: string, vectors: number[][]): IdentityRecord {
  return {
    identity_id: identityId,
    samples: vectors.map((v, i) => sample(v, T0, `${identityId}-${i}`)),
    enrolled_at: T0,
    last_matched_at: null,
    match_count: 0,
  };
}

export interface TestRegistry {
  registry: IdentityRegistry;
  store: MemoryStore;
  clock: ManualClock;
}

/** An empty registry over a MemoryStore with a manual clock at T0. */
export async function openTestRegistry(
  options: { dimension?: number; threshold?: number; store?: MemoryStore } = {},
): Promise<TestRegistry> {
  const store = options.store ?? new MemoryStore();
  const clock = new ManualClock(T0);
  const registry = await IdentityRegistry.open({
    store,
    clock,
    dimension: options.dimension ?? 3,
    threshold: options.threshold ?? 0.6,
  });
  return { registry, store, clock };
}
