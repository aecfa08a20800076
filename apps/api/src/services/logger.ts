/**
 * File-Based Logger
 *
 * Mirrors console output to a daily log file so the history of enrollments
 * and match decisions survives a closed terminal.
 *
 * Usage: call `initLogger(dir)` at server startup.
 * Logs are written to: <dir>/facekeep-YYYY-MM-DD.log
 */

import { mkdirSync, appendFileSync, existsSync } from "node:fs";
import { join } from "node:path";

type ConsoleMethod = (...args: unknown[]) => void;

let logFilePath: string | null = null;
let originals: { log: ConsoleMethod; error: ConsoleMethod; warn: ConsoleMethod } | null = null;

/**
 * Initialize file-based logging.
 * Hooks console.log, console.error and console.warn and mirrors output to a file.
 */
export function initLogger(logDir: string, now: Date = new Date()): string {
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const date = now.toISOString().split("T")[0];
  const path = join(logDir, `facekeep-${date}.log`);
  logFilePath = path;

  if (!originals) {
    originals = { log: console.log, error: console.error, warn: console.warn };
    const saved = originals;

    console.log = (...args: unknown[]) => {
      saved.log.apply(console, args);
      writeToFile("INFO", args);
    };
    console.error = (...args: unknown[]) => {
      saved.error.apply(console, args);
      writeToFile("ERROR", args);
    };
    console.warn = (...args: unknown[]) => {
      saved.warn.apply(console, args);
      writeToFile("WARN", args);
    };
  }

  const startupMsg = `\n${"=".repeat(70)}\n  FaceKeep Session Started: ${now.toISOString()}\n${"=".repeat(70)}\n`;
  appendFileSync(path, startupMsg);

  return path;
}

/**
 * Restore the original console methods and stop writing to the file.
 */
export function closeLogger(): void {
  if (originals) {
    console.log = originals.log;
    console.error = originals.error;
    console.warn = originals.warn;
    originals = null;
  }
  logFilePath = null;
}

/** Render console arguments as one log line body. */
export function formatArgs(args: unknown[]): string {
  return args
    .map((arg) => {
      if (typeof arg === "string") return arg;
      if (arg instanceof Error) return `${arg.message}\n${arg.stack}`;
      try {
        return JSON.stringify(arg, null, 0);
      } catch {
        return String(arg);
      }
    })
    .join(" ");
}

function writeToFile(level: string, args: unknown[]): void {
  if (!logFilePath) return;

  const timestamp = new Date().toISOString().substring(11, 23); // HH:mm:ss.SSS
  const line = `[${timestamp}] [${level.padEnd(5)}] ${formatArgs(args)}\n`;
  try {
    appendFileSync(logFilePath, line);
  } catch (error) {
    // Stop mirroring; the console output itself is unaffected.
    const failedPath = logFilePath;
    logFilePath = null;
    originals?.error.call(console, `[Logger] Disabled file logging, write to ${failedPath} failed:`, error);
  }
}

export function getLogFilePath(): string | null {
  return logFilePath;
}
