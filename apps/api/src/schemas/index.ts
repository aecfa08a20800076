/**
 * FaceKeep Data Schemas
 *
 * These schemas define the persisted layout of identities and registries.
 * Everything loaded from disk or received for import is parsed against them
 * before it reaches the matching logic.
 */

import { z } from "zod";

/** Layout version written into snapshots and export envelopes. */
export const LAYOUT_VERSION = "1.0";

// =============================================================================
// 1. Embedding
// =============================================================================

/** JSON cannot carry -0, so it is folded to 0 wherever a vector is parsed. */
export const EmbeddingComponentSchema = z
  .number()
  .finite()
  .transform((value) => (value === 0 ? 0 : value));

export const EmbeddingVectorSchema = z.array(EmbeddingComponentSchema);

export const EmbeddingSchema = z.object({
  vector: EmbeddingVectorSchema,
  captured_at: z.string().datetime(),
  provenance: z.string(),
});

/**
 * Shape accepted from callers before validation. Timestamps and provenance
 * are filled in when missing.
 */
export const EmbeddingInputSchema = z.object({
  vector: z.array(z.number()),
  captured_at: z.string().datetime().optional(),
  provenance: z.string().optional(),
});

export type EmbeddingVector = z.infer<typeof EmbeddingVectorSchema>;
export type Embedding = z.infer<typeof EmbeddingSchema>;
export type EmbeddingInput = z.infer<typeof EmbeddingInputSchema>;

// =============================================================================
// 2. Identity Record
// =============================================================================

export function isValidIdentityId(identityId: string): boolean {
  return identityId.trim().length > 0;
}

export const IdentityIdSchema = z
  .string()
  .refine(isValidIdentityId, { message: "identity_id must be a non-empty string" });

export const IdentityRecordSchema = z.object({
  identity_id: IdentityIdSchema,
  samples: z.array(EmbeddingSchema).min(1),
  enrolled_at: z.string().datetime(),
  last_matched_at: z.string().datetime().nullable(),
  match_count: z.number().int().nonnegative(),
});

export type IdentityRecord = z.infer<typeof IdentityRecordSchema>;

// =============================================================================
// 3. Registry Snapshot
// =============================================================================

export const RegistrySnapshotSchema = z.object({
  version: z.string(),
  dimension: z.number().int().positive(),
  threshold: z.number().finite().nonnegative(),
  records: z.array(IdentityRecordSchema),
});

export type RegistrySnapshot = z.infer<typeof RegistrySnapshotSchema>;

/** Registry-level metadata, stored beside per-identity files. */
export const RegistryMetaSchema = RegistrySnapshotSchema.omit({ records: true }).extend({
  identity_order: z.array(z.string()),
});

export type RegistryMeta = z.infer<typeof RegistryMetaSchema>;

// =============================================================================
// 4. Export Envelope
// =============================================================================

export const ExportEnvelopeSchema = z.object({
  export_id: z.string().uuid(),
  identity_id: IdentityIdSchema,
  record: IdentityRecordSchema,
  exported_at: z.string().datetime(),
  version: z.string(),
});

export type ExportEnvelope = z.infer<typeof ExportEnvelopeSchema>;

// =============================================================================
// 5. Matching output (not persisted)
// =============================================================================

export interface IdentityScore {
  identity_id: string;
  min_distance: number;
  mean_distance: number;
  /** 0.7 * min_distance + 0.3 * mean_distance */
  score: number;
  sample_count: number;
}

export interface MatchResult {
  /** Best-ranked identity, null only when the registry is empty */
  matched_identity: string | null;
  score: number | null;
  min_distance: number | null;
  mean_distance: number | null;
  /** Display only: max(0, 1 - min_distance) */
  confidence: number;
  threshold: number;
  accepted: boolean;
  /** Every identity, best first */
  candidates: IdentityScore[];
}

export interface IdentitySummary {
  identity_id: string;
  sample_count: number;
  enrolled_at: string;
}

// =============================================================================
// Input schemas for the process surface
// =============================================================================

export const EnrollRequestSchema = z.object({
  identity_id: IdentityIdSchema,
  samples: z.array(z.unknown()),
  minimum_accepted_samples: z.number().int().positive().optional(),
  overwrite: z.boolean().optional(),
});

export const AppendSamplesRequestSchema = z.object({
  samples: z.array(z.unknown()),
});

export const AuthenticateRequestSchema = z.object({
  vector: z.array(z.number()),
  tolerance: z.number().optional(),
  record_match: z.boolean().optional(),
});

export const ImportRequestSchema = z.object({
  envelope: z.unknown(),
  overwrite: z.boolean().optional(),
  merge: z.boolean().optional(),
});

export type EnrollRequest = z.infer<typeof EnrollRequestSchema>;
export type AppendSamplesRequest = z.infer<typeof AppendSamplesRequestSchema>;
export type AuthenticateRequest = z.infer<typeof AuthenticateRequestSchema>;
export type ImportRequest = z.infer<typeof ImportRequestSchema>;
