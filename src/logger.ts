/**
 * Service logging.
 *
 * One JSON object per line on the console. Every entry carries `level`,
 * `ts` and `msg`, plus whatever context the calling logger has
 * accumulated through child(). Tests and embedders swap the sink with
 * setLogHandler().
 */

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

const SEVERITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 10,
  [LogLevel.Info]: 20,
  [LogLevel.Warn]: 30,
  [LogLevel.Error]: 40,
};

const CONSOLE_WRITERS: Record<LogLevel, (line: string) => void> = {
  [LogLevel.Debug]: (line) => console.log(line),
  [LogLevel.Info]: (line) => console.log(line),
  [LogLevel.Warn]: (line) => console.warn(line),
  [LogLevel.Error]: (line) => console.error(line),
};

/**
 * Serialize an entry as a single JSON line. Context fields come first so
 * a context key can never shadow `level`, `ts` or `msg`.
 */
export function formatLogLine(entry: LogEntry): string {
  return JSON.stringify({
    ...entry.context,
    level: entry.level,
    ts: entry.timestamp,
    msg: entry.message,
  });
}

const consoleHandler: LogHandler = (entry) => {
  CONSOLE_WRITERS[entry.level](formatLogLine(entry));
};

let handler: LogHandler = consoleHandler;
let threshold = SEVERITY[LogLevel.Info];

export function setLogHandler(next: LogHandler): void {
  handler = next;
}

/** Restore the console handler. */
export function resetLogHandler(): void {
  handler = consoleHandler;
}

/** Entries below `level` are dropped before they reach the handler. */
export function setLogLevel(level: LogLevel): void {
  threshold = SEVERITY[level];
}

/** Parse a level name such as "debug" or "WARN". Returns undefined for unknown names. */
export function parseLogLevel(value: string): LogLevel | undefined {
  const normalized = value.trim().toLowerCase();
  return Object.values(LogLevel).find((level) => level === normalized);
}

function emit(level: LogLevel, message: string, base: Record<string, unknown>, extra?: Record<string, unknown>): void {
  if (SEVERITY[level] < threshold) return;
  handler({
    level,
    message,
    context: extra ? { ...base, ...extra } : { ...base },
    timestamp: new Date().toISOString(),
  });
}

/** Create a logger whose entries all carry `baseContext`. */
export function createLogger(baseContext: Record<string, unknown> = {}): Logger {
  return {
    debug: (msg, ctx) => emit(LogLevel.Debug, msg, baseContext, ctx),
    info: (msg, ctx) => emit(LogLevel.Info, msg, baseContext, ctx),
    warn: (msg, ctx) => emit(LogLevel.Warn, msg, baseContext, ctx),
    error: (msg, ctx) => emit(LogLevel.Error, msg, baseContext, ctx),
    child: (childCtx) => createLogger({ ...baseContext, ...childCtx }),
  };
}

/** Root logger; request and pipeline loggers are children of it. */
export const logger = createLogger({ component: 'radar-api' });
