/**
 * Enrollment - Main Export
 *
 * Validation of candidate embeddings and construction of Identity Records.
 */

export {
  validateVector,
  validateEmbedding,
  tryValidateEmbedding,
  type ValidationOutcome,
} from "./embedding_validator.js";

export {
  enroll,
  acceptSamples,
  collectSamples,
  appendToRecord,
  resolvePolicy,
  assertIdentityId,
  type EnrollmentPolicy,
  type EnrollmentOptions,
  type RejectedSample,
  type SampleBatch,
} from "./enrollment_pipeline.js";

export {
  extractCandidates,
  enrollFromRaw,
  type EmbeddingExtractor,
  type ExtractionBatch,
  type ExtractionFailure,
  type ExtractionOptions,
} from "./extraction.js";
