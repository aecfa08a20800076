/**
 * Extraction collaborator contract.
 *
 * The engine never looks at raw samples (images, frames). An extractor turns
 * one raw sample into an embedding candidate and throws ExtractionFailedError
 * when the sample yields none. During enrollment such samples are dropped
 * and counted like validation failures; any other error propagates.
 */

import pLimit from "p-limit";
import type { EmbeddingInput, IdentityRecord } from "../../schemas/index.js";
import { DimensionMismatchError, ExtractionFailedError } from "../../errors.js";
import type { EnrollOptions, IdentityRegistry } from "../../storage/registry.js";

/** A pluggable embedding extractor. */
export interface EmbeddingExtractor<TRaw> {
  /** Length of every vector this extractor produces */
  readonly dimension: number;
  extract(raw: TRaw): Promise<EmbeddingInput>;
}

export interface ExtractionFailure {
  index: number;
  error: ExtractionFailedError;
}

export interface ExtractionBatch {
  /** Successful extractions, in input order */
  candidates: EmbeddingInput[];
  failures: ExtractionFailure[];
}

export interface ExtractionOptions {
  /** Concurrent extract() calls (default 1, i.e. one sample at a time) */
  concurrency?: number;
}

/**
 * Run the extractor over every raw sample.
 */
export async function extractCandidates<TRaw>(
  rawSamples: readonly TRaw[],
  extractor: EmbeddingExtractor<TRaw>,
  options: ExtractionOptions = {},
): Promise<ExtractionBatch> {
  const limiter = pLimit(options.concurrency ?? 1);

  const outcomes = await Promise.all(
    rawSamples.map((raw) =>
      limiter(async (): Promise<EmbeddingInput | ExtractionFailedError> => {
        try {
          return await extractor.extract(raw);
        } catch (error) {
          if (error instanceof ExtractionFailedError) return error;
          throw error;
        }
      }),
    ),
  );

  const batch: ExtractionBatch = { candidates: [], failures: [] };
  outcomes.forEach((outcome, index) => {
    if (outcome instanceof ExtractionFailedError) {
      console.warn(`[Extraction] Sample ${index} failed: ${outcome.message}`);
      batch.failures.push({ index, error: outcome });
    } else {
      batch.candidates.push(outcome);
    }
  });
  return batch;
}

/**
 * Extract embeddings from raw samples and enroll the identity.
 */
export async function enrollFromRaw<TRaw>(
  registry: IdentityRegistry,
  identityId: string,
  rawSamples: readonly TRaw[],
  extractor: EmbeddingExtractor<TRaw>,
  options: EnrollOptions & ExtractionOptions = {},
): Promise<IdentityRecord> {
  if (extractor.dimension !== registry.dimension) {
    throw new DimensionMismatchError(registry.dimension, extractor.dimension);
  }

  const batch = await extractCandidates(rawSamples, extractor, options);
  return registry.enroll(identityId, batch.candidates, {
    ...options,
    droppedUpstream: (options.droppedUpstream ?? 0) + batch.failures.length,
  });
}

