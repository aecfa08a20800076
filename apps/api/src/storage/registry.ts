/**
 * Identity Registry
 *
 * In-memory collection of Identity Records with write-through persistence:
 * - Reads work on the current map and never wait for writes
 * - Writes are serialized through a single registry-wide queue
 * - A write is acknowledged only after the store has saved it; if the save
 *   fails the in-memory change is rolled back
 *
 * Records are replaced, never mutated in place, so a snapshot taken by a
 * reader never contains a half-updated record.
 */

import pLimit from "p-limit";
import {
  IdentityRecordSchema,
  LAYOUT_VERSION,
  type IdentityRecord,
  type IdentitySummary,
  type RegistrySnapshot,
} from "../schemas/index.js";
import {
  DimensionMismatchError,
  DuplicateIdentityError,
  InvalidValueError,
  MalformedRecordError,
  UnknownIdentityError,
} from "../errors.js";
import { EMBEDDING_DIMENSION, MATCH_TOLERANCE } from "../config.js";
import { systemClock, type Clock } from "../services/clock.js";
import {
  acceptSamples,
  appendToRecord,
  assertIdentityId,
  enroll,
  type EnrollmentPolicy,
} from "../services/enrollment/enrollment_pipeline.js";
import type { RegistryView } from "../services/matching/matching_engine.js";
import { parseWithSchema, type RegistryStore } from "./store.js";

export interface RegistryOptions {
  store: RegistryStore;
  /** Required embedding length; must agree with a stored snapshot */
  dimension?: number;
  /** Default tolerance; falls back to the stored value, then config */
  threshold?: number;
  clock?: Clock;
}

export interface InsertOptions {
  /** Replace an existing record with the same identity_id */
  overwrite?: boolean;
}

export interface EnrollOptions extends InsertOptions {
  policy?: Partial<EnrollmentPolicy>;
  /** Samples lost before validation (e.g. failed extraction) */
  droppedUpstream?: number;
}

export class IdentityRegistry implements RegistryView {
  readonly dimension: number;
  readonly threshold: number;
  readonly clock: Clock;
  private readonly store: RegistryStore;
  private items: Map<string, IdentityRecord> = new Map();
  private readonly writeLock = pLimit(1);

  private constructor(store: RegistryStore, dimension: number, threshold: number, clock: Clock) {
    if (!Number.isInteger(dimension) || dimension < 1) {
      throw new InvalidValueError(`Registry dimension must be a positive integer, got ${dimension}`);
    }
    if (!Number.isFinite(threshold) || threshold < 0) {
      throw new InvalidValueError(`Registry threshold must be a finite non-negative number, got ${threshold}`);
    }
    this.store = store;
    this.dimension = dimension;
    this.threshold = threshold;
    this.clock = clock;
  }

  /**
   * Create a registry hydrated from the store (empty when nothing is stored).
   */
  static async open(options: RegistryOptions): Promise<IdentityRegistry> {
    const snapshot = await options.store.load();
    const dimension = options.dimension ?? snapshot?.dimension ?? EMBEDDING_DIMENSION;

    if (snapshot && snapshot.dimension !== dimension) {
      throw new DimensionMismatchError(dimension, snapshot.dimension);
    }

    const registry = new IdentityRegistry(
      options.store,
      dimension,
      options.threshold ?? snapshot?.threshold ?? MATCH_TOLERANCE,
      options.clock ?? systemClock,
    );

    for (const record of snapshot?.records ?? []) {
      if (registry.items.has(record.identity_id)) {
        throw new MalformedRecordError(
          options.store.location,
          `duplicate identity '${record.identity_id}'`,
        );
      }
      registry.items.set(record.identity_id, registry.checkRecord(record));
    }

    console.log(
      `[Registry] Loaded ${registry.size} identities from ${options.store.location} (dimension ${dimension})`,
    );
    return registry;
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  get size(): number {
    return this.items.size;
  }

  has(identityId: string): boolean {
    return this.items.has(identityId);
  }

  get(identityId: string): IdentityRecord | undefined {
    return this.items.get(identityId);
  }

  /** Get a record or fail with UnknownIdentity */
  require(identityId: string): IdentityRecord {
    const record = this.items.get(identityId);
    if (!record) throw new UnknownIdentityError(identityId);
    return record;
  }

  /** Snapshot of all records in insertion order. */
  records(): readonly IdentityRecord[] {
    return Array.from(this.items.values());
  }

  list(): IdentitySummary[] {
    return this.records().map((r) => ({
      identity_id: r.identity_id,
      sample_count: r.samples.length,
      enrolled_at: r.enrolled_at,
    }));
  }

  toSnapshot(): RegistrySnapshot {
    return {
      version: LAYOUT_VERSION,
      dimension: this.dimension,
      threshold: this.threshold,
      records: [...this.records()],
    };
  }

  // ===========================================================================
  // Writes
  // ===========================================================================

  /**
   * Insert a complete record. Fails with DuplicateIdentity unless `overwrite`;
   * an overwrite replaces the whole record in one step.
   */
  async insert(record: IdentityRecord, options: InsertOptions = {}): Promise<IdentityRecord> {
    const checked = this.checkRecord(record);
    return this.commit(`insert '${checked.identity_id}'`, () => {
      if (!options.overwrite && this.items.has(checked.identity_id)) {
        throw new DuplicateIdentityError(checked.identity_id);
      }
      this.items.set(checked.identity_id, checked);
      return checked;
    });
  }

  /**
   * Replace or create a record from the current one, under the write lock.
   * `resolve` sees the record as it is at commit time and may throw to
   * refuse the write.
   */
  async put(
    identityId: string,
    resolve: (existing: IdentityRecord | undefined) => IdentityRecord,
  ): Promise<IdentityRecord> {
    return this.commit(`put '${identityId}'`, () => {
      const next = this.checkRecord(resolve(this.items.get(identityId)));
      if (next.identity_id !== identityId) {
        throw new InvalidValueError(
          `Record identity '${next.identity_id}' does not match '${identityId}'`,
        );
      }
      this.items.set(identityId, next);
      return next;
    });
  }

  /**
   * Run the enrollment pipeline and insert the resulting record.
   */
  async enroll(
    identityId: string,
    candidates: readonly unknown[],
    options: EnrollOptions = {},
  ): Promise<IdentityRecord> {
    assertIdentityId(identityId);
    if (!options.overwrite && this.items.has(identityId)) {
      throw new DuplicateIdentityError(identityId);
    }

    const record = enroll(identityId, candidates, {
      dimension: this.dimension,
      policy: options.policy,
      clock: this.clock,
      droppedUpstream: options.droppedUpstream,
    });
    return this.insert(record, { overwrite: options.overwrite });
  }

  /**
   * Append validated samples to an existing identity without touching its
   * counters.
   */
  async appendSamples(
    identityId: string,
    candidates: readonly unknown[],
    policy?: Partial<EnrollmentPolicy>,
  ): Promise<IdentityRecord> {
    this.require(identityId);
    const samples = acceptSamples(identityId, candidates, {
      dimension: this.dimension,
      policy,
      clock: this.clock,
    });

    return this.commit(`append ${samples.length} samples to '${identityId}'`, () => {
      const updated = appendToRecord(this.require(identityId), samples);
      this.items.set(identityId, updated);
      return updated;
    });
  }

  /**
   * Record a verified match: bump match_count and set last_matched_at.
   * Call only for results with `accepted: true`.
   */
  async recordSuccessfulMatch(
    identityId: string,
    at: Date = this.clock.now(),
  ): Promise<IdentityRecord> {
    return this.commit(`record match for '${identityId}'`, () => {
      const existing = this.require(identityId);
      const updated: IdentityRecord = {
        ...existing,
        last_matched_at: at.toISOString(),
        match_count: existing.match_count + 1,
      };
      this.items.set(identityId, updated);
      return updated;
    });
  }

  /** Delete an identity; UnknownIdentity if absent. */
  async remove(identityId: string): Promise<IdentityRecord> {
    return this.commit(`remove '${identityId}'`, () => {
      const existing = this.require(identityId);
      this.items.delete(identityId);
      return existing;
    });
  }

  /** Delete every identity. Returns how many were removed. */
  async clear(): Promise<number> {
    return this.commit("clear", () => {
      const count = this.items.size;
      this.items = new Map();
      return count;
    });
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  /**
   * Apply a change under the write lock and persist it. `change` must throw
   * before touching the map if the write is invalid.
   */
  private commit<T>(label: string, change: () => T): Promise<T> {
    return this.writeLock(async () => {
      const previous = new Map(this.items);
      const result = change();
      try {
        await this.store.save(this.toSnapshot());
      } catch (error) {
        this.items = previous;
        console.error(`[Registry] Save failed during ${label}, change rolled back:`, error);
        throw error;
      }
      console.log(`[Registry] Committed ${label}`);
      return result;
    });
  }

  /** Schema-validate a record and check every sample against the dimension. */
  private checkRecord(record: unknown): IdentityRecord {
    const parsed = parseWithSchema(IdentityRecordSchema, record, "identity record");
    for (const sample of parsed.samples) {
      if (sample.vector.length !== this.dimension) {
        throw new DimensionMismatchError(this.dimension, sample.vector.length);
      }
    }
    return parsed;
  }
}
