/**
 * Centralized configuration for the FaceKeep engine.
 *
 * Values fall back to defaults and can be overridden via environment
 * variables (the server entry loads `.env` through dotenv first).
 *
 * The default tolerance is calibrated against 128-dimension face encodings
 * and the fixed 0.7 / 0.3 score weights; a different extractor needs its
 * own calibration.
 */

function optionalEnv(name: string, fallback: string): string {
  return process.env[name] || fallback;
}

function optionalNumericEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (Number.isNaN(parsed)) {
    throw new Error(`Environment variable ${name} must be a number, got: ${raw}`);
  }
  return parsed;
}

function positiveIntegerEnv(name: string, fallback: number): number {
  const value = optionalNumericEnv(name, fallback);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`Environment variable ${name} must be a positive integer, got: ${value}`);
  }
  return value;
}

export type StoreKind = "file" | "directory";

function storeKindEnv(name: string, fallback: StoreKind): StoreKind {
  const raw = process.env[name];
  if (!raw) return fallback;
  if (raw === "file" || raw === "directory") return raw;
  throw new Error(`Environment variable ${name} must be "file" or "directory", got: ${raw}`);
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

/** Length of every embedding vector in the registry. */
export const EMBEDDING_DIMENSION = positiveIntegerEnv("EMBEDDING_DIMENSION", 128);

/** Default maximum score at which a match is accepted. */
export const MATCH_TOLERANCE = optionalNumericEnv("MATCH_TOLERANCE", 0.6);

/** Minimum number of valid samples for an enrollment to succeed. */
export const MIN_ACCEPTED_SAMPLES = positiveIntegerEnv("MIN_ACCEPTED_SAMPLES", 1);

// ---------------------------------------------------------------------------
// Storage
// ---------------------------------------------------------------------------

/** Directory holding the registry data and logs. */
export const DATA_DIR = optionalEnv("FACEKEEP_DATA_DIR", "data");

/** `file`: one snapshot file. `directory`: one file per identity. */
export const STORE_KIND = storeKindEnv("FACEKEEP_STORE", "file");

// ---------------------------------------------------------------------------
// API
// ---------------------------------------------------------------------------

export const API_PORT = optionalNumericEnv("FACEKEEP_API_PORT", 8300);
