/**
 * Matching Engine
 *
 * Ranks every identity in a registry snapshot against a probe embedding and
 * renders the accept/reject decision.
 *
 * Scoring per identity u, over the distances D_u from the probe to each of
 * u's samples:
 *
 *   score_u = 0.7 * min(D_u) + 0.3 * mean(D_u)
 *
 * The best identity has the lowest score; equal scores go to the
 * lexicographically smaller identity_id. A match is accepted when the best
 * score is <= tolerance.
 *
 * Scoring is a pure map over identities and selection is a deterministic
 * reduce, so the result never depends on evaluation order.
 *
 * This component does NOT:
 * - Mutate the registry (record_successful_match is the caller's call)
 * - Treat "no match" as an error
 */

import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import type {
  Embedding,
  EmbeddingVector,
  IdentityRecord,
  IdentityScore,
  MatchResult,
} from "../../schemas/index.js";
import { InvalidValueError } from "../../errors.js";
import { validateVector } from "../enrollment/embedding_validator.js";
import { distancesTo } from "./distance.js";

/** Weight of the closest sample. Calibrated together with the default tolerance. */
export const MIN_DISTANCE_WEIGHT = 0.7;
/** Weight of the mean distance over all samples. */
export const MEAN_DISTANCE_WEIGHT = 0.3;

/** What the engine needs from a registry: a read-only snapshot. */
export interface RegistryView {
  readonly dimension: number;
  readonly threshold: number;
  records(): readonly IdentityRecord[];
}

export interface AuthenticateOptions {
  /** Overrides the registry threshold for this call */
  tolerance?: number;
}

export interface AuthenticateAsyncOptions extends AuthenticateOptions {
  /** Abort to stop scoring early; use AbortSignal.timeout(ms) for a deadline */
  signal?: AbortSignal;
  /** Identities scored between event-loop yields */
  chunkSize?: number;
}

const DEFAULT_CHUNK_SIZE = 256;

// =============================================================================
// Scoring
// =============================================================================

/**
 * Score one identity against a probe vector of the right dimension.
 */
export function scoreIdentity(probe: EmbeddingVector, record: IdentityRecord): IdentityScore {
  // Summing in ascending order makes the mean independent of sample order.
  const distances = distancesTo(
    probe,
    record.samples.map((s) => s.vector),
  ).sort((a, b) => a - b);

  const min = distances[0];
  let sum = 0;
  for (const d of distances) {
    sum += d;
  }
  const mean = sum / distances.length;

  return {
    identity_id: record.identity_id,
    min_distance: min,
    mean_distance: mean,
    score: MIN_DISTANCE_WEIGHT * min + MEAN_DISTANCE_WEIGHT * mean,
    sample_count: distances.length,
  };
}

/** Lower score first, then lower identity_id. */
export function compareScores(a: IdentityScore, b: IdentityScore): number {
  if (a.score !== b.score) return a.score < b.score ? -1 : 1;
  if (a.identity_id === b.identity_id) return 0;
  return a.identity_id < b.identity_id ? -1 : 1;
}

/**
 * Turn completed per-identity scores into the decision.
 */
export function decide(scores: readonly IdentityScore[], tolerance: number): MatchResult {
  const candidates = [...scores].sort(compareScores);
  const best = candidates[0];

  if (!best) {
    return {
      matched_identity: null,
      score: null,
      min_distance: null,
      mean_distance: null,
      confidence: 0,
      threshold: tolerance,
      accepted: false,
      candidates: [],
    };
  }

  return {
    matched_identity: best.identity_id,
    score: best.score,
    min_distance: best.min_distance,
    mean_distance: best.mean_distance,
    confidence: Math.max(0, 1 - best.min_distance),
    threshold: tolerance,
    accepted: best.score <= tolerance,
    candidates,
  };
}

function resolveTolerance(registry: RegistryView, tolerance: number | undefined): number {
  const value = tolerance ?? registry.threshold;
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidValueError(`Tolerance must be a finite non-negative number, got ${value}`);
  }
  return value;
}

function probeVector(probe: Embedding | EmbeddingVector, dimension: number): EmbeddingVector {
  const vector = Array.isArray(probe) ? probe : probe.vector;
  return validateVector(vector, dimension);
}

// =============================================================================
// Authentication
// =============================================================================

/**
 * Rank all identities against the probe and decide.
 *
 * Fails fast with DimensionMismatch (or InvalidValue) on a bad probe before
 * any comparison. An empty registry yields `matched_identity: null`.
 */
export function authenticate(
  probe: Embedding | EmbeddingVector,
  registry: RegistryView,
  options: AuthenticateOptions = {},
): MatchResult {
  const vector = probeVector(probe, registry.dimension);
  const tolerance = resolveTolerance(registry, options.tolerance);

  const scores = registry.records().map((record) => scoreIdentity(vector, record));
  const result = decide(scores, tolerance);

  logDecision(result);
  return result;
}

/**
 * Same decision as `authenticate`, scored in chunks with a yield to the event
 * loop between them so an AbortSignal (or its timeout) can stop a scan of a
 * large registry. Abandoning the scan leaves nothing to clean up.
 */
export async function authenticateAsync(
  probe: Embedding | EmbeddingVector,
  registry: RegistryView,
  options: AuthenticateAsyncOptions = {},
): Promise<MatchResult> {
  const vector = probeVector(probe, registry.dimension);
  const tolerance = resolveTolerance(registry, options.tolerance);
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new InvalidValueError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }

  const records = registry.records();
  const scores: IdentityScore[] = [];

  options.signal?.throwIfAborted();
  for (let start = 0; start < records.length; start += chunkSize) {
    for (const record of records.slice(start, start + chunkSize)) {
      scores.push(scoreIdentity(vector, record));
    }
    await yieldToEventLoop();
    options.signal?.throwIfAborted();
  }

  const result = decide(scores, tolerance);
  logDecision(result);
  return result;
}

function logDecision(result: MatchResult): void {
  if (result.matched_identity === null) {
    console.log("[Matching] Registry empty, no candidates");
    return;
  }
  console.log(
    `[Matching] ${result.accepted ? "Accepted" : "Rejected"} '${result.matched_identity}' ` +
      `score=${result.score?.toFixed(3)} threshold=${result.threshold.toFixed(3)} ` +
      `over ${result.candidates.length} identities`,
  );
}
