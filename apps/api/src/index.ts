/**
 * FaceKeep - Main Entry Point
 *
 * This module exports:
 * - All data schemas (Zod validated)
 * - The error taxonomy
 * - The identity registry and its stores
 * - Enrollment, matching and transfer services
 */

export * from "./schemas/index.js";
export * from "./errors.js";
export * from "./storage/index.js";

export * from "./services/enrollment/index.js";
export * from "./services/matching/index.js";
export * from "./services/transfer/index.js";
export { systemClock, ManualClock, nowISO, type Clock } from "./services/clock.js";
export { initLogger, closeLogger, getLogFilePath } from "./services/logger.js";
