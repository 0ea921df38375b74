/**
 * Structured logger for the hedge engine.
 *
 * Provides:
 * - Leveled logging (debug, info, warn, error)
 * - Periodic per-symbol status table
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * One row of the periodic status report.
 */
export interface SymbolStatusLine {
  instrument: string;
  mode: string;
  absA: string;
  absB: string;
  openLots: number;
  activeOrders: number;
  /** Set while the symbol is in placement cooldown */
  cooldownLeftSec?: number;
  /** Set while the legs are unequal */
  unhedgedForSec?: number;
}

/**
 * Logger interface.
 */
export interface Logger {
  debug(msg: string, data?: object): void;
  info(msg: string, data?: object): void;
  warn(msg: string, data?: object): void;
  error(msg: string, data?: object): void;

  /** Log a status table, one line per symbol */
  logStatus(lines: SymbolStatusLine[]): void;
}

/**
 * Format a timestamp for logging.
 */
function formatTimestamp(): string {
  const now = new Date();
  return now.toISOString().replace("T", " ").substring(0, 19);
}

function formatStatusLine(line: SymbolStatusLine): string {
  let text =
    `${line.instrument} [${line.mode}] A=${line.absA} B=${line.absB} ` +
    `lots=${line.openLots} orders=${line.activeOrders}`;
  if (line.cooldownLeftSec !== undefined) {
    text += ` cooldown=${line.cooldownLeftSec}s`;
  }
  if (line.unhedgedForSec !== undefined) {
    text += ` unhedged=${line.unhedgedForSec}s`;
  }
  return text;
}

/**
 * Create a logger instance.
 */
export function createLogger(level: LogLevel = "info"): Logger {
  const minLevel = LOG_LEVEL_VALUES[level];

  function shouldLog(msgLevel: LogLevel): boolean {
    return LOG_LEVEL_VALUES[msgLevel] >= minLevel;
  }

  function formatData(data?: object): string {
    if (!data) return "";
    try {
      return " " + JSON.stringify(data);
    } catch {
      return "";
    }
  }

  function log(msgLevel: LogLevel, prefix: string, msg: string, data?: object): void {
    if (!shouldLog(msgLevel)) return;
    const line = `[${formatTimestamp()}] ${prefix} ${msg}${formatData(data)}`;
    if (msgLevel === "error") {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  const logger: Logger = {
    debug(msg: string, data?: object) {
      log("debug", "[DEBUG]", msg, data);
    },

    info(msg: string, data?: object) {
      log("info", "[INFO]", msg, data);
    },

    warn(msg: string, data?: object) {
      log("warn", "[WARN]", msg, data);
    },

    error(msg: string, data?: object) {
      log("error", "[ERROR]", msg, data);
    },

    logStatus(lines: SymbolStatusLine[]) {
      if (!shouldLog("info") || lines.length === 0) return;
      console.log("");
      console.log(`[${formatTimestamp()}] [STATUS] ${lines.length} symbol(s)`);
      for (const line of lines) {
        console.log(`  ${formatStatusLine(line)}`);
      }
      console.log("");
    },
  };

  return logger;
}

/**
 * Logger that discards everything. Used by tests and dry tooling.
 */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
  logStatus() {},
};
