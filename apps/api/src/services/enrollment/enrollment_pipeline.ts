/**
 * Enrollment Pipeline
 *
 * Turns a batch of candidate embeddings into a validated Identity Record.
 *
 * Per-sample failures (wrong dimension, non-finite values) drop that sample
 * and are counted; the batch only fails when fewer than the policy minimum
 * survive. Accepted samples keep their input order.
 *
 * This component does NOT:
 * - Insert records into a registry (the registry does, under its write lock)
 * - Extract embeddings from raw samples
 */

import { isValidIdentityId, type Embedding, type IdentityRecord } from "../../schemas/index.js";
import {
  InsufficientSamplesError,
  InvalidValueError,
  type FaceKeepError,
} from "../../errors.js";
import { MIN_ACCEPTED_SAMPLES } from "../../config.js";
import { nowISO, systemClock, type Clock } from "../clock.js";
import { tryValidateEmbedding } from "./embedding_validator.js";

export interface EnrollmentPolicy {
  /** Minimum number of valid samples required (>= 1) */
  minimumAcceptedSamples: number;
}

export interface EnrollmentOptions {
  /** Registry dimension every sample must match */
  dimension: number;
  policy?: Partial<EnrollmentPolicy>;
  clock?: Clock;
  /** Samples already lost upstream (e.g. failed extraction), reported in errors */
  droppedUpstream?: number;
}

export interface RejectedSample {
  /** Position of the sample in the input batch */
  index: number;
  error: FaceKeepError;
}

export interface SampleBatch {
  accepted: Embedding[];
  rejected: RejectedSample[];
}

const DEFAULT_POLICY: EnrollmentPolicy = {
  minimumAcceptedSamples: MIN_ACCEPTED_SAMPLES,
};

/**
 * Merge a partial policy with defaults and reject unusable values.
 * A minimum below 1 would allow an enrolled record with no samples.
 */
export function resolvePolicy(policy: Partial<EnrollmentPolicy> = {}): EnrollmentPolicy {
  const resolved = { ...DEFAULT_POLICY, ...policy };
  if (
    !Number.isInteger(resolved.minimumAcceptedSamples) ||
    resolved.minimumAcceptedSamples < 1
  ) {
    throw new InvalidValueError(
      `minimumAcceptedSamples must be an integer >= 1, got ${resolved.minimumAcceptedSamples}`,
    );
  }
  return resolved;
}

export function assertIdentityId(identityId: unknown): asserts identityId is string {
  if (typeof identityId !== "string" || !isValidIdentityId(identityId)) {
    throw new InvalidValueError("identity_id must be a non-empty string");
  }
}

/**
 * Validate every candidate, keeping the ones that pass in input order.
 */
export function collectSamples(
  candidates: readonly unknown[],
  dimension: number,
  clock: Clock = systemClock,
): SampleBatch {
  const accepted: Embedding[] = [];
  const rejected: RejectedSample[] = [];

  candidates.forEach((candidate, index) => {
    const outcome = tryValidateEmbedding(candidate, dimension, clock);
    if (outcome.ok) {
      accepted.push(outcome.embedding);
    } else {
      rejected.push({ index, error: outcome.error });
    }
  });

  return { accepted, rejected };
}

/**
 * Validate a batch and enforce the policy minimum.
 */
export function acceptSamples(
  identityId: string,
  candidates: readonly unknown[],
  options: EnrollmentOptions,
): Embedding[] {
  const policy = resolvePolicy(options.policy);
  const batch = collectSamples(candidates, options.dimension, options.clock);

  for (const { index, error } of batch.rejected) {
    console.warn(`[Enrollment] Dropped sample ${index} for '${identityId}': ${error.message}`);
  }

  if (batch.accepted.length < policy.minimumAcceptedSamples) {
    throw new InsufficientSamplesError(
      batch.accepted.length,
      policy.minimumAcceptedSamples,
      batch.rejected.length + (options.droppedUpstream ?? 0),
    );
  }

  return batch.accepted;
}

/**
 * Build a new Identity Record from candidate embeddings.
 */
export function enroll(
  identityId: string,
  candidates: readonly unknown[],
  options: EnrollmentOptions,
): IdentityRecord {
  assertIdentityId(identityId);
  const samples = acceptSamples(identityId, candidates, options);

  console.log(
    `[Enrollment] Built record '${identityId}' with ${samples.length}/${candidates.length + (options.droppedUpstream ?? 0)} samples`,
  );

  return {
    identity_id: identityId,
    samples,
    enrolled_at: nowISO(options.clock),
    last_matched_at: null,
    match_count: 0,
  };
}

/**
 * Return a copy of the record with samples appended. Counters are untouched.
 */
export function appendToRecord(record: IdentityRecord, samples: readonly Embedding[]): IdentityRecord {
  return {
    ...record,
    samples: [...record.samples, ...samples],
  };
}
