/**
 * Transfer Operations
 *
 * Moves single identities between registries as export envelopes.
 *
 * Conflict policy on import, when the identity already exists:
 * - default: DuplicateIdentity, nothing changes
 * - overwrite: the stored record is replaced as a whole (samples replaced,
 *   not merged)
 * - merge: imported samples not already present are appended, counters are
 *   combined
 */

import { v4 as uuid } from "uuid";
import {
  ExportEnvelopeSchema,
  LAYOUT_VERSION,
  type Embedding,
  type ExportEnvelope,
  type IdentityRecord,
  type IdentitySummary,
} from "../../schemas/index.js";
import { DuplicateIdentityError, InvalidValueError } from "../../errors.js";
import type { IdentityRegistry } from "../../storage/registry.js";
import { parseJson, parseWithSchema } from "../../storage/store.js";
import { nowISO } from "../clock.js";

export interface ImportOptions {
  overwrite?: boolean;
  merge?: boolean;
}

// =============================================================================
// Export
// =============================================================================

/**
 * Wrap a copy of an identity's full record (samples and counters) in an
 * envelope. Fails with UnknownIdentity if absent.
 */
export function exportIdentity(registry: IdentityRegistry, identityId: string): ExportEnvelope {
  const record = structuredClone(registry.require(identityId));
  return {
    export_id: uuid(),
    identity_id: identityId,
    record,
    exported_at: nowISO(registry.clock),
    version: LAYOUT_VERSION,
  };
}

export function serializeExport(envelope: ExportEnvelope): string {
  return JSON.stringify(envelope, null, 2);
}

/**
 * Parse a serialized or already-decoded envelope against the layout.
 */
export function parseExport(payload: unknown): ExportEnvelope {
  const data = typeof payload === "string" ? parseJson(payload, "export envelope") : payload;
  const envelope = parseWithSchema(ExportEnvelopeSchema, data, "export envelope");
  if (envelope.identity_id !== envelope.record.identity_id) {
    throw new InvalidValueError(
      `Envelope identity '${envelope.identity_id}' does not match record '${envelope.record.identity_id}'`,
    );
  }
  return envelope;
}

// =============================================================================
// Import
// =============================================================================

function sameSample(a: Embedding, b: Embedding): boolean {
  return (
    a.captured_at === b.captured_at &&
    a.provenance === b.provenance &&
    a.vector.length === b.vector.length &&
    a.vector.every((v, i) => v === b.vector[i])
  );
}

function laterOf(a: string | null, b: string | null): string | null {
  if (a === null) return b;
  if (b === null) return a;
  return Date.parse(a) >= Date.parse(b) ? a : b;
}

/**
 * Combine an imported record into an existing one.
 */
export function mergeRecords(existing: IdentityRecord, incoming: IdentityRecord): IdentityRecord {
  const added = incoming.samples.filter(
    (sample) => !existing.samples.some((s) => sameSample(s, sample)),
  );

  return {
    identity_id: existing.identity_id,
    samples: [...existing.samples, ...added],
    enrolled_at:
      Date.parse(incoming.enrolled_at) < Date.parse(existing.enrolled_at)
        ? incoming.enrolled_at
        : existing.enrolled_at,
    last_matched_at: laterOf(existing.last_matched_at, incoming.last_matched_at),
    match_count: existing.match_count + incoming.match_count,
  };
}

/**
 * Import an exported identity. See the module header for conflict handling.
 */
export async function importIdentity(
  registry: IdentityRegistry,
  payload: unknown,
  options: ImportOptions = {},
): Promise<IdentityRecord> {
  if (options.overwrite && options.merge) {
    throw new InvalidValueError("Choose either overwrite or merge, not both");
  }

  const envelope = parseExport(payload);
  const incoming = envelope.record;
  let outcome = "new";

  const stored = await registry.put(incoming.identity_id, (existing) => {
    if (!existing) return incoming;
    if (options.merge) {
      outcome = "merged";
      return mergeRecords(existing, incoming);
    }
    if (options.overwrite) {
      outcome = "overwritten";
      return incoming;
    }
    throw new DuplicateIdentityError(incoming.identity_id);
  });

  console.log(
    `[Transfer] Imported '${stored.identity_id}' (${outcome}, exported ${envelope.exported_at})`,
  );
  return stored;
}

// =============================================================================
// Listing
// =============================================================================

export function listIdentities(registry: IdentityRegistry): IdentitySummary[] {
  return registry.list();
}
