/**
 * FaceKeep error taxonomy.
 *
 * Every failure the engine raises is a FaceKeepError with a stable `code`.
 * Callers map codes to exit statuses or HTTP statuses; the engine itself never
 * formats user-facing text beyond the message.
 *
 * "No match" is not an error: it is a MatchResult with `accepted: false`.
 */

export type FaceKeepErrorCode =
  | "DIMENSION_MISMATCH"
  | "INVALID_VALUE"
  | "INSUFFICIENT_SAMPLES"
  | "DUPLICATE_IDENTITY"
  | "UNKNOWN_IDENTITY"
  | "EXTRACTION_FAILED"
  | "MALFORMED_RECORD";

export class FaceKeepError extends Error {
  readonly code: FaceKeepErrorCode;

  constructor(code: FaceKeepErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "FaceKeepError";
    this.code = code;
  }
}

/** A vector whose length differs from the registry dimension. */
export class DimensionMismatchError extends FaceKeepError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super("DIMENSION_MISMATCH", `Dimension mismatch: expected ${expected}, got ${actual}`);
    this.name = "DimensionMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

/** A non-finite vector component, or an otherwise unusable input value. */
export class InvalidValueError extends FaceKeepError {
  constructor(message: string) {
    super("INVALID_VALUE", message);
    this.name = "InvalidValueError";
  }
}

export class InsufficientSamplesError extends FaceKeepError {
  readonly accepted: number;
  readonly required: number;
  readonly rejected: number;

  constructor(accepted: number, required: number, rejected: number) {
    super(
      "INSUFFICIENT_SAMPLES",
      `Insufficient samples: ${accepted} accepted, ${required} required (${rejected} rejected)`,
    );
    this.name = "InsufficientSamplesError";
    this.accepted = accepted;
    this.required = required;
    this.rejected = rejected;
  }
}

export class DuplicateIdentityError extends FaceKeepError {
  readonly identityId: string;

  constructor(identityId: string) {
    super("DUPLICATE_IDENTITY", `Identity already exists: ${identityId}`);
    this.name = "DuplicateIdentityError";
    this.identityId = identityId;
  }
}

export class UnknownIdentityError extends FaceKeepError {
  readonly identityId: string;

  constructor(identityId: string) {
    super("UNKNOWN_IDENTITY", `Unknown identity: ${identityId}`);
    this.name = "UnknownIdentityError";
    this.identityId = identityId;
  }
}

/**
 * Raised by an embedding extractor when a raw sample yields no embedding
 * (no face found, unreadable image). Propagated unchanged by the engine.
 */
export class ExtractionFailedError extends FaceKeepError {
  constructor(message: string, options?: ErrorOptions) {
    super("EXTRACTION_FAILED", message, options);
    this.name = "ExtractionFailedError";
  }
}

/** Loaded or imported data that does not match the persisted layout. */
export class MalformedRecordError extends FaceKeepError {
  constructor(source: string, detail: string) {
    super("MALFORMED_RECORD", `Schema validation failed for ${source}: ${detail}`);
    this.name = "MalformedRecordError";
  }
}

/**
 * Map an error to the HTTP status the process surface reports.
 */
export function httpStatusFor(error: unknown): number {
  if (!(error instanceof FaceKeepError)) return 500;

  switch (error.code) {
    case "DIMENSION_MISMATCH":
    case "INVALID_VALUE":
    case "MALFORMED_RECORD":
      return 400;
    case "DUPLICATE_IDENTITY":
      return 409;
    case "UNKNOWN_IDENTITY":
      return 404;
    case "INSUFFICIENT_SAMPLES":
    case "EXTRACTION_FAILED":
      return 422;
  }
}
