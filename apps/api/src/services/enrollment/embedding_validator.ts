/**
 * Embedding Validator
 *
 * Checks a candidate embedding against the registry dimension and turns it
 * into a stored Embedding. Vectors are kept exactly as received: no
 * normalization, no rounding. The one exception is -0, stored as 0 because
 * the JSON layouts cannot represent it.
 *
 * This component does NOT:
 * - Extract embeddings from raw samples
 * - Decide whether an enrollment batch succeeds
 */

import { v4 as uuid } from "uuid";
import type { Embedding } from "../../schemas/index.js";
import {
  DimensionMismatchError,
  FaceKeepError,
  InvalidValueError,
} from "../../errors.js";
import { nowISO, systemClock, type Clock } from "../clock.js";

export type ValidationOutcome =
  | { ok: true; embedding: Embedding }
  | { ok: false; error: FaceKeepError };

/**
 * Check a raw vector: array of numbers, expected length, finite components.
 */
export function validateVector(vector: unknown, expectedDimension: number): number[] {
  if (!Array.isArray(vector)) {
    throw new InvalidValueError("Embedding vector must be an array of numbers");
  }
  if (vector.length !== expectedDimension) {
    throw new DimensionMismatchError(expectedDimension, vector.length);
  }

  const values: number[] = [];
  for (let i = 0; i < vector.length; i++) {
    const component: unknown = vector[i];
    if (typeof component !== "number" || !Number.isFinite(component)) {
      throw new InvalidValueError(
        `Embedding component ${i} is not a finite number: ${String(component)}`,
      );
    }
    values.push(component === 0 ? 0 : component);
  }
  return values;
}

function isObject(candidate: unknown): candidate is Record<string, unknown> {
  return typeof candidate === "object" && candidate !== null && !Array.isArray(candidate);
}

/**
 * Validate a candidate and build the stored Embedding.
 *
 * A bare number array is accepted as a vector with no metadata. Missing
 * `captured_at` comes from the clock; missing `provenance` gets a fresh
 * sample id.
 */
export function validateEmbedding(
  candidate: unknown,
  expectedDimension: number,
  clock: Clock = systemClock,
): Embedding {
  const input = Array.isArray(candidate) ? { vector: candidate } : candidate;
  if (!isObject(input)) {
    throw new InvalidValueError("Embedding must be an object with a vector");
  }

  const vector = validateVector(input.vector, expectedDimension);

  let capturedAt = nowISO(clock);
  const rawCapturedAt = input.captured_at;
  if (rawCapturedAt !== undefined) {
    if (typeof rawCapturedAt !== "string" || Number.isNaN(Date.parse(rawCapturedAt))) {
      throw new InvalidValueError(`Invalid captured_at timestamp: ${String(rawCapturedAt)}`);
    }
    capturedAt = new Date(rawCapturedAt).toISOString();
  }

  let provenance = `sample:${uuid()}`;
  const rawProvenance = input.provenance;
  if (rawProvenance !== undefined) {
    if (typeof rawProvenance !== "string") {
      throw new InvalidValueError("Embedding provenance must be a string");
    }
    provenance = rawProvenance;
  }

  return { vector, captured_at: capturedAt, provenance };
}

/**
 * Non-throwing form of validateEmbedding, for batch processing.
 */
export function tryValidateEmbedding(
  candidate: unknown,
  expectedDimension: number,
  clock: Clock = systemClock,
): ValidationOutcome {
  try {
    return { ok: true, embedding: validateEmbedding(candidate, expectedDimension, clock) };
  } catch (error) {
    if (error instanceof FaceKeepError) {
      return { ok: false, error };
    }
    throw error;
  }
}
