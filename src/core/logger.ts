/**
 * Level-based logging with a replaceable handler.
 *
 * Default output is one line per entry: `[hostfetch] message key=value ...`,
 * warnings and errors on stderr.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: Record<string, unknown>;
}

export type LogHandler = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

const PRIORITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function formatValue(value: unknown): string {
  if (typeof value === "string") {
    return /[\s"=]/.test(value) ? JSON.stringify(value) : value;
  }
  return String(value);
}

export function formatEntry(entry: LogEntry): string {
  const fields = Object.entries(entry.context)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${formatValue(v)}`);
  return ["[hostfetch]", entry.message, ...fields].join(" ");
}

const defaultHandler: LogHandler = (entry) => {
  const line = formatEntry(entry);
  if (entry.level === "warn" || entry.level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
};

let currentHandler: LogHandler = defaultHandler;
let currentMinLevel: LogLevel = "info";

/** Replace the handler, e.g. to capture entries in tests. Returns the previous one. */
export function setLogHandler(handler: LogHandler): LogHandler {
  const previous = currentHandler;
  currentHandler = handler;
  return previous;
}

export function resetLogHandler(): void {
  currentHandler = defaultHandler;
}

export function setLogLevel(level: LogLevel): void {
  currentMinLevel = level;
}

function log(level: LogLevel, message: string, context: Record<string, unknown>): void {
  if (PRIORITY[level] < PRIORITY[currentMinLevel]) return;
  currentHandler({ level, message, context });
}

export function createLogger(base: Record<string, unknown> = {}): Logger {
  return {
    debug: (msg, ctx) => log("debug", msg, { ...base, ...ctx }),
    info: (msg, ctx) => log("info", msg, { ...base, ...ctx }),
    warn: (msg, ctx) => log("warn", msg, { ...base, ...ctx }),
    error: (msg, ctx) => log("error", msg, { ...base, ...ctx }),
    child: (ctx) => createLogger({ ...base, ...ctx }),
  };
}

export const logger = createLogger();
