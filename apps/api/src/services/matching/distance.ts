/**
 * Distance math over embedding vectors. Pure, no dependencies.
 */

import type { EmbeddingVector } from "../../schemas/index.js";

/**
 * Euclidean (L2) distance between two vectors of equal length.
 *
 * Throws if the lengths differ; callers validate dimensions before this
 * point, so a mismatch here is a programming error.
 */
export function euclideanDistance(a: EmbeddingVector, b: EmbeddingVector): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = a[i] - b[i];
    sum += diff * diff;
  }
  return Math.sqrt(sum);
}

/** Distances from one probe to each of several vectors, in order. */
export function distancesTo(
  probe: EmbeddingVector,
  vectors: readonly EmbeddingVector[],
): number[] {
  return vectors.map((v) => euclideanDistance(probe, v));
}
