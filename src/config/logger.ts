/**
 * Structured logger for the image server.
 *
 * Stdout belongs to the stdio MCP transport and may only carry JSON-RPC
 * frames, so every line goes to stderr. Lines are JSON when
 * NODE_ENV=production and `[component] LEVEL message {extra}` otherwise.
 * LOG_LEVEL (debug, info, warn, error; default info) is read on every call
 * so tests and the entry point can change it after import.
 *
 * `Error` values in `extra` are flattened to `{ name, message }` (plus the
 * cause chain), since JSON.stringify renders them as `{}`.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

type LogLevel = "debug" | "info" | "warn" | "error";

type LogFormat = "json" | "pretty";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  [key: string]: unknown;
}

type LogMethod = (component: string, message: string, extra?: Record<string, unknown>) => void;

interface Logger {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
}

interface LoggerOptions {
  /** Minimum level, resolved per call (default: LOG_LEVEL) */
  level?: () => LogLevel;
  /** Output format, resolved per call (default: json in production) */
  format?: () => LogFormat;
  /** Receives each formatted line without its newline (default: stderr) */
  write?: (line: string) => void;
  /** Clock for the entry timestamp */
  now?: () => Date;
}

// ---------------------------------------------------------------------------
// Levels and defaults
// ---------------------------------------------------------------------------

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function parseLogLevel(raw: string | undefined): LogLevel {
  switch ((raw || "").trim().toLowerCase()) {
    case "debug":
      return "debug";
    case "warn":
      return "warn";
    case "error":
      return "error";
    default:
      return "info";
  }
}

function envLevel(): LogLevel {
  return parseLogLevel(process.env.LOG_LEVEL);
}

function envFormat(): LogFormat {
  return process.env.NODE_ENV === "production" ? "json" : "pretty";
}

function writeStderr(line: string): void {
  process.stderr.write(line + "\n");
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

function serializeError(error: Error): Record<string, unknown> {
  return {
    name: error.name,
    message: error.message,
    ...(error.cause instanceof Error ? { cause: serializeError(error.cause) } : {}),
  };
}

function serializeExtra(extra: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(extra)) {
    out[key] = value instanceof Error ? serializeError(value) : value;
  }
  return out;
}

function formatPretty(entry: LogEntry): string {
  const { timestamp: _ts, level, component, message, ...extra } = entry;
  const extraStr = Object.keys(extra).length > 0 ? " " + JSON.stringify(extra) : "";
  return `[${component}] ${level.toUpperCase()} ${message}${extraStr}`;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? envLevel;
  const format = options.format ?? envFormat;
  const write = options.write ?? writeStderr;
  const now = options.now ?? (() => new Date());

  const method =
    (entryLevel: LogLevel): LogMethod =>
    (component, message, extra) => {
      if (LEVEL_PRIORITY[entryLevel] < LEVEL_PRIORITY[level()]) return;

      const entry: LogEntry = {
        timestamp: now().toISOString(),
        level: entryLevel,
        component,
        message,
      };
      // Extra fields never replace the fixed ones
      for (const [key, value] of Object.entries(extra ? serializeExtra(extra) : {})) {
        if (!Object.hasOwn(entry, key)) entry[key] = value;
      }

      write(format() === "json" ? JSON.stringify(entry) : formatPretty(entry));
    };

  return {
    debug: method("debug"),
    info: method("info"),
    warn: method("warn"),
    error: method("error"),
  };
}

const logger = createLogger();

export { logger, createLogger, parseLogLevel };
export type { LogLevel, LogFormat, LogEntry, Logger, LoggerOptions };
