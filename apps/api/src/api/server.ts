/**
 * FaceKeep API Server
 *
 * JSON-over-HTTP surface for the identity registry. Routing lives in
 * routes.ts; this module owns sockets, startup and shutdown.
 */

import "dotenv/config";

import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import { join } from "node:path";
import { API_PORT, DATA_DIR, EMBEDDING_DIMENSION, MATCH_TOLERANCE, STORE_KIND } from "../config.js";
import { initLogger, getLogFilePath } from "../services/logger.js";
import { IdentityRegistry, createStore } from "../storage/index.js";
import { handleRequest, type ApiResponse } from "./routes.js";

// =============================================================================
// Request Parsing
// =============================================================================

async function parseBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    let body = "";
    req.on("data", (chunk: Buffer) => {
      body += chunk.toString();
    });
    req.on("end", () => {
      try {
        resolve(body ? JSON.parse(body) : undefined);
      } catch {
        reject(new SyntaxError("Invalid JSON body"));
      }
    });
    req.on("error", reject);
  });
}

function sendJson(res: ServerResponse, status: number, data: ApiResponse): void {
  res.writeHead(status, {
    "Content-Type": "application/json",
    "Access-Control-Allow-Origin": "*",
    "Access-Control-Allow-Methods": "GET, POST, DELETE, OPTIONS",
    "Access-Control-Allow-Headers": "Content-Type",
  });
  res.end(JSON.stringify(data));
}

// =============================================================================
// Startup
// =============================================================================

async function serve(req: IncomingMessage, res: ServerResponse, registry: IdentityRegistry): Promise<void> {
  if (req.method === "OPTIONS") {
    sendJson(res, 204, { success: true });
    return;
  }

  let body: unknown;
  try {
    body = await parseBody(req);
  } catch (error) {
    const message = error instanceof Error ? error.message : "Invalid body";
    sendJson(res, 400, { success: false, error: message });
    return;
  }

  const result = await handleRequest(registry, req.method ?? "GET", req.url ?? "/", body);
  sendJson(res, result.status, result.body);
}

async function main(): Promise<void> {
  initLogger(join(DATA_DIR, "logs"));
  console.log(`[API] Logging to ${getLogFilePath()}`);

  const registry = await IdentityRegistry.open({
    store: createStore(STORE_KIND, DATA_DIR),
    dimension: EMBEDDING_DIMENSION,
    threshold: MATCH_TOLERANCE,
  });

  const server = createServer((req, res) => {
    serve(req, res, registry).catch((error: unknown) => {
      console.error("[API] Request failed:", error);
      if (!res.headersSent) {
        sendJson(res, 500, { success: false, error: "Internal server error" });
      }
    });
  });

  server.listen(API_PORT, () => {
    console.log(`[API] FaceKeep listening on http://localhost:${API_PORT}`);
  });

  const shutdown = (): void => {
    console.log("[API] Shutting down");
    server.close(() => process.exit(0));
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  console.error("[API] Failed to start:", error);
  process.exit(1);
});
