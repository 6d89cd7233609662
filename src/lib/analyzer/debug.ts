/**
 * Debug logging utilities for the citecheck analyzer
 *
 * Every line goes to stderr so the JSON report written to stdout stays
 * machine-readable. Lines can also be appended to a file for long runs.
 *
 * @module analyzer/debug
 */

import * as fs from "fs";
import * as path from "path";

// ============================================================================
// CONFIGURATION
// ============================================================================

// Read on every call: the command loads .env after this module is imported
function debugLogPath(): string {
  return process.env.CITECHECK_DEBUG_LOG_PATH || path.join(process.cwd(), "citecheck-debug.log");
}

function isDebugFileEnabled(): boolean {
  return (process.env.CITECHECK_DEBUG_LOG_FILE ?? "false").toLowerCase() === "true";
}

const DEBUG_LOG_MAX_DATA_CHARS = 8000;

// ============================================================================
// DEBUG LOGGING FUNCTIONS
// ============================================================================

/**
 * Render a log line: timestamp, message and an optional payload.
 * Payloads that are not strings are JSON-encoded and truncated.
 */
export function formatDebugLine(message: string, data?: unknown, now: Date = new Date()): string {
  let logLine = `[${now.toISOString()}] ${message}`;

  if (data !== undefined) {
    let payload: string;
    try {
      payload = typeof data === "string" ? data : JSON.stringify(data, null, 2);
    } catch {
      payload = "[unserializable]";
    }
    if (payload.length > DEBUG_LOG_MAX_DATA_CHARS) {
      payload = payload.slice(0, DEBUG_LOG_MAX_DATA_CHARS) + "…[truncated]";
    }
    logLine += ` | ${payload}`;
  }

  return logLine;
}

/**
 * Log a message to stderr and, when enabled, to the debug file
 */
export function debugLog(message: string, data?: unknown): void {
  const logLine = formatDebugLine(message, data);

  if (isDebugFileEnabled()) {
    const logPath = debugLogPath();
    fs.promises.appendFile(logPath, logLine + "\n").catch((err: unknown) => {
      console.error(`[Debug] Could not append to ${logPath}: ${String(err)}`);
    });
  }

  console.error(logLine);
}

/**
 * Start a fresh debug log file for a new run
 */
export async function clearDebugLog(): Promise<void> {
  if (!isDebugFileEnabled()) return;
  await fs.promises.writeFile(
    debugLogPath(),
    `=== citecheck debug log started at ${new Date().toISOString()} ===\n`,
  );
}
