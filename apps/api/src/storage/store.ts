/**
 * Persistence contract for the identity registry.
 *
 * A store must round-trip a snapshot exactly: vector values, sample order
 * and counters. The registry calls `save` after every mutation and only
 * acknowledges the mutation once `save` resolves.
 */

import { ZodError, type ZodTypeAny, type z } from "zod";
import type { RegistrySnapshot } from "../schemas/index.js";
import { MalformedRecordError } from "../errors.js";

export interface RegistryStore {
  /** Load the persisted snapshot, or null when nothing has been saved yet. */
  load(): Promise<RegistrySnapshot | null>;
  save(snapshot: RegistrySnapshot): Promise<void>;
  /** Human-readable location, for logs. */
  readonly location: string;
}

/**
 * Parse data against a schema, reporting drift as MalformedRecordError.
 */
export function parseWithSchema<S extends ZodTypeAny>(
  schema: S,
  data: unknown,
  source: string,
): z.output<S> {
  try {
    return schema.parse(data);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new MalformedRecordError(source, error.message);
    }
    throw error;
  }
}

/**
 * Parse JSON text, reporting syntax errors as MalformedRecordError.
 */
export function parseJson(content: string, source: string): unknown {
  try {
    return JSON.parse(content);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new MalformedRecordError(source, `invalid JSON (${detail})`);
  }
}
