/**
 * Lightweight logging utility.
 * Outputs to console (and optionally a log file) with timestamps, the
 * verification ID and the emitting component, as text or JSON lines.
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { dirname } from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Fields attached to every entry of a logger */
export interface LogBindings {
  component?: string;
  runId?: string;
}

export interface LoggerOptions extends LogBindings {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Emit one JSON object per line instead of text */
  json?: boolean;
  /** Enable console output */
  console?: boolean;
  /** Append entries to this file */
  file?: string;
  /** Receives every formatted entry; replaces console output when set */
  sink?: (level: LogLevel, line: string) => void;
  /** Clock used for timestamps */
  now?: () => Date;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Logger with additional bound fields */
  child(bindings: LogBindings): Logger;
}

/**
 * Format a log entry with timestamp, level, verification ID, component and message.
 */
function formatLogEntry(
  level: LogLevel,
  message: string,
  bindings: LogBindings,
  timestamp: string,
  json: boolean,
  context?: Record<string, unknown>
): string {
  if (json) {
    return JSON.stringify({
      timestamp,
      level,
      runId: bindings.runId,
      component: bindings.component,
      message,
      ...context,
    });
  }

  const runId = bindings.runId ?? "no-run-id";
  const levelStr = level.toUpperCase().padEnd(5);
  const component = bindings.component ? `${bindings.component}: ` : "";

  let entry = `[${timestamp}] [${levelStr}] [${runId}] ${component}${message}`;

  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context)}`;
  }

  return entry;
}

/**
 * Get console method for log level.
 */
function getConsoleMethod(level: LogLevel): typeof console.log {
  switch (level) {
    case "debug":
      return console.debug;
    case "info":
      return console.info;
    case "warn":
      return console.warn;
    case "error":
      return console.error;
  }
}

/**
 * Create a logger instance.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  const json = options.json ?? false;
  const toConsole = options.console ?? true;
  const now = options.now ?? (() => new Date());

  // Ensure log directory exists
  if (options.file !== undefined) {
    const dir = dirname(options.file);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  function build(bindings: LogBindings): Logger {
    function log(entryLevel: LogLevel, message: string, context?: Record<string, unknown>): void {
      // Check if this level should be logged
      if (LOG_LEVEL_PRIORITY[entryLevel] < LOG_LEVEL_PRIORITY[level]) {
        return;
      }

      const entry = formatLogEntry(entryLevel, message, bindings, now().toISOString(), json, context);

      if (options.sink !== undefined) {
        options.sink(entryLevel, entry);
      } else if (toConsole) {
        getConsoleMethod(entryLevel)(entry);
      }

      if (options.file !== undefined) {
        try {
          appendFileSync(options.file, entry + "\n");
        } catch (err) {
          // Fallback to console if file write fails
          console.error(`Failed to write to log file: ${err}`);
        }
      }
    }

    return {
      debug: (message, context) => log("debug", message, context),
      info: (message, context) => log("info", message, context),
      warn: (message, context) => log("warn", message, context),
      error: (message, context) => log("error", message, context),
      child: (extra) => build({ ...bindings, ...extra }),
    };
  }

  return build({ component: options.component, runId: options.runId });
}

/**
 * Logger that discards everything.
 */
export function createSilentLogger(): Logger {
  return createLogger({ console: false });
}
