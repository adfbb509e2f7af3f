/**
 * Debug logging utilities for the theme engine
 *
 * Provides file-based and console logging for inspecting discovery runs.
 * Configured via environment variables.
 *
 * @module themes/debug
 */

import * as fs from "fs";
import * as path from "path";

// ============================================================================
// CONFIGURATION
// ============================================================================

function resolveLogPath(): string {
  return process.env.TDE_DEBUG_LOG_PATH || path.join(process.cwd(), "debug-themes.log");
}

function isFileLoggingEnabled(): boolean {
  return (process.env.TDE_DEBUG_LOG_FILE ?? "false").toLowerCase() === "true";
}

const DEBUG_LOG_MAX_DATA_CHARS = 8000;

// ============================================================================
// DEBUG LOGGING FUNCTIONS
// ============================================================================

/**
 * Format a log line: ISO timestamp, message, and an optional JSON payload
 * truncated to DEBUG_LOG_MAX_DATA_CHARS.
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
      payload = payload.slice(0, DEBUG_LOG_MAX_DATA_CHARS) + "...[truncated]";
    }
    logLine += ` | ${payload}`;
  }
  return logLine;
}

/**
 * Log a message to the console and, when enabled, append it to the debug file.
 */
export function debugLog(message: string, data?: unknown): void {
  const logLine = formatDebugLine(message, data);

  // Async append so long runs are not blocked on disk
  if (isFileLoggingEnabled()) {
    fs.promises.appendFile(resolveLogPath(), logLine + "\n").catch((err: unknown) => {
      const reason = err instanceof Error ? err.message : String(err);
      console.warn(`[Themes] Debug log write failed: ${reason}`);
    });
  }

  console.log(logLine);
}

/**
 * Truncate the debug file and write a run header.
 */
export async function clearDebugLog(): Promise<void> {
  if (!isFileLoggingEnabled()) return;
  await fs.promises.writeFile(
    resolveLogPath(),
    `=== Theme Engine Debug Log Started at ${new Date().toISOString()} ===\n`,
  );
}
