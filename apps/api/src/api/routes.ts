/**
 * FaceKeep API Routes
 *
 * Request routing for the HTTP surface, kept free of sockets so it can be
 * driven directly.
 *
 * Endpoints:
 * - GET    /health                   - Health check
 * - GET    /identities               - List identities
 * - POST   /identities               - Enroll an identity
 * - GET    /identities/:id           - Get one identity record
 * - DELETE /identities/:id           - Remove an identity
 * - POST   /identities/:id/samples   - Append samples
 * - GET    /identities/:id/export    - Export envelope
 * - POST   /identities/import        - Import an envelope
 * - POST   /authenticate             - Match a probe vector
 */

import { ZodError, type ZodTypeAny, type z } from "zod";
import {
  AppendSamplesRequestSchema,
  AuthenticateRequestSchema,
  EnrollRequestSchema,
  ImportRequestSchema,
} from "../schemas/index.js";
import { FaceKeepError, InvalidValueError, httpStatusFor } from "../errors.js";
import type { IdentityRegistry } from "../storage/index.js";
import { authenticate } from "../services/matching/index.js";
import { exportIdentity, importIdentity, listIdentities } from "../services/transfer/index.js";

export interface ApiResponse {
  success: boolean;
  data?: unknown;
  error?: string;
  code?: string;
}

export interface RouteResult {
  status: number;
  body: ApiResponse;
}

// =============================================================================
// Helpers
// =============================================================================

function decodePathParam(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch (error) {
    if (error instanceof URIError) {
      throw new InvalidValueError(`Malformed path parameter: ${raw}`);
    }
    throw error;
  }
}

export function matchRoute(path: string, pattern: string): Record<string, string> | null {
  const pathParts = path.split("/").filter(Boolean);
  const patternParts = pattern.split("/").filter(Boolean);

  if (pathParts.length !== patternParts.length) return null;

  const params: Record<string, string> = {};
  for (let i = 0; i < patternParts.length; i++) {
    if (patternParts[i].startsWith(":")) {
      params[patternParts[i].slice(1)] = decodePathParam(pathParts[i]);
    } else if (patternParts[i] !== pathParts[i]) {
      return null;
    }
  }
  return params;
}

function parseRequest<S extends ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  try {
    return schema.parse(body);
  } catch (error) {
    if (error instanceof ZodError) {
      const detail = error.issues
        .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
        .join("; ");
      throw new InvalidValueError(`Invalid request body: ${detail}`);
    }
    throw error;
  }
}

function ok(data: unknown, status = 200): RouteResult {
  return { status, body: { success: true, data } };
}

function fail(error: unknown): RouteResult {
  const status = httpStatusFor(error);
  if (status === 500) {
    console.error("[API] Unhandled error:", error);
    return { status, body: { success: false, error: "Internal server error" } };
  }

  const message = error instanceof Error ? error.message : String(error);
  const code = error instanceof FaceKeepError ? error.code : undefined;
  return { status, body: { success: false, error: message, code } };
}

// =============================================================================
// Router
// =============================================================================

export async function handleRequest(
  registry: IdentityRegistry,
  method: string,
  url: string,
  body: unknown,
): Promise<RouteResult> {
  const path = url.split("?")[0];

  try {
    if (method === "GET" && path === "/health") {
      return ok({ status: "ok", identities: registry.size, dimension: registry.dimension });
    }

    if (method === "GET" && path === "/identities") {
      return ok(listIdentities(registry));
    }

    if (method === "POST" && path === "/identities") {
      const input = parseRequest(EnrollRequestSchema, body);
      const record = await registry.enroll(input.identity_id, input.samples, {
        overwrite: input.overwrite,
        policy:
          input.minimum_accepted_samples === undefined
            ? undefined
            : { minimumAcceptedSamples: input.minimum_accepted_samples },
      });
      return ok(record, 201);
    }

    if (method === "POST" && path === "/identities/import") {
      const input = parseRequest(ImportRequestSchema, body);
      const record = await importIdentity(registry, input.envelope, {
        overwrite: input.overwrite,
        merge: input.merge,
      });
      return ok(record);
    }

    if (method === "POST" && path === "/authenticate") {
      const input = parseRequest(AuthenticateRequestSchema, body);
      const result = authenticate(input.vector, registry, { tolerance: input.tolerance });

      let recorded = false;
      if (result.accepted && result.matched_identity !== null && input.record_match !== false) {
        await registry.recordSuccessfulMatch(result.matched_identity);
        recorded = true;
      }
      return ok({ result, recorded });
    }

    let params = matchRoute(path, "/identities/:id/samples");
    if (method === "POST" && params) {
      const input = parseRequest(AppendSamplesRequestSchema, body);
      return ok(await registry.appendSamples(params.id, input.samples));
    }

    params = matchRoute(path, "/identities/:id/export");
    if (method === "GET" && params) {
      return ok(exportIdentity(registry, params.id));
    }

    params = matchRoute(path, "/identities/:id");
    if (params && method === "GET") {
      return ok(registry.require(params.id));
    }
    if (params && method === "DELETE") {
      const removed = await registry.remove(params.id);
      return ok({ identity_id: removed.identity_id });
    }

    return { status: 404, body: { success: false, error: "Not found" } };
  } catch (error) {
    return fail(error);
  }
}
