/**
 * File-based hedge event logging.
 *
 * Creates a unique log file per run:
 * logs/hedge_YYYY-MM-DD_HH-MM-SS.txt
 *
 * One JSON line per event, appended with Node.js appendFile.
 */

import { join, dirname } from "path";
import { appendFile, mkdir } from "node:fs/promises";

// Capture startup time once (used for unique log filename per run)
const STARTUP_TS = new Date();

/**
 * Log entry types for hedge events.
 */
export type HedgeLogType =
  | "STARTUP"
  | "BOOTSTRAP_LOT"
  | "ORDER_PLACED"
  | "ORDER_CANCELLED"
  | "ORDER_CLOSED"
  | "FILL_APPLIED"
  | "COOLDOWN"
  | "ALERT"
  | "ERROR"
  | "SHUTDOWN";

/**
 * Structured log entry for file logging.
 */
export interface HedgeLogEntry {
  /** ISO timestamp */
  timestamp: string;
  type: HedgeLogType;
  data: Record<string, unknown>;
}

/**
 * Sink for structured hedge events.
 */
export interface EventLog {
  record(type: HedgeLogType, data: Record<string, unknown>): void;
}

/**
 * Get the log file path for this run (unique per startup).
 */
export function getLogFilePath(logsDir: string = join(process.cwd(), "logs")): string {
  const year = STARTUP_TS.getUTCFullYear();
  const month = String(STARTUP_TS.getUTCMonth() + 1).padStart(2, "0");
  const day = String(STARTUP_TS.getUTCDate()).padStart(2, "0");
  const hours = String(STARTUP_TS.getUTCHours()).padStart(2, "0");
  const minutes = String(STARTUP_TS.getUTCMinutes()).padStart(2, "0");
  const seconds = String(STARTUP_TS.getUTCSeconds()).padStart(2, "0");

  const filename = `hedge_${year}-${month}-${day}_${hours}-${minutes}-${seconds}.txt`;
  return join(logsDir, filename);
}

/**
 * Format a log entry as a single line for file output.
 */
export function formatLogEntry(entry: HedgeLogEntry): string {
  const dataStr = JSON.stringify(entry.data);
  return `[${entry.timestamp}] [${entry.type}] ${dataStr}\n`;
}

/**
 * Append a log entry to the event log file.
 *
 * Creates the directory and file if they don't exist. Write failures are
 * reported on stderr and never propagate.
 */
export async function appendToEventLog(
  entry: HedgeLogEntry,
  filePath: string
): Promise<void> {
  const line = formatLogEntry(entry);

  try {
    await mkdir(dirname(filePath), { recursive: true });
    await appendFile(filePath, line, { encoding: "utf-8" });
  } catch (error) {
    console.error(`[FILE_LOGGER] Failed to write to ${filePath}:`, error);
  }
}

/**
 * Create a log entry with current timestamp.
 */
export function createLogEntry(
  type: HedgeLogType,
  data: Record<string, unknown>
): HedgeLogEntry {
  return {
    timestamp: new Date().toISOString(),
    type,
    data,
  };
}

/**
 * Event log backed by a per-run file. Appends are serialized so lines keep
 * their emission order.
 */
export function createFileEventLog(filePath: string = getLogFilePath()): EventLog {
  let tail: Promise<void> = Promise.resolve();

  return {
    record(type, data) {
      const entry = createLogEntry(type, data);
      tail = tail.then(() => appendToEventLog(entry, filePath));
    },
  };
}

/**
 * Event log that drops everything.
 */
export const noopEventLog: EventLog = {
  record() {},
};
