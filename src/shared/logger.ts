/**
 * Levelled diagnostic logger.
 *
 * Lines are prefixed with [IDSPLIT] and go to stderr through `console`, so a
 * CLI can keep stdout for results. Messages may be passed as thunks; a thunk
 * is only evaluated when its level is enabled, which keeps the per-cut debug
 * trace of the splitter free when tracing is off.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogMessage = string | (() => string);

export type LogSink = (level: Exclude<LogLevel, "silent">, line: string) => void;

export interface Logger {
  readonly level: LogLevel;
  isEnabled(level: Exclude<LogLevel, "silent">): boolean;
  debug(message: LogMessage): void;
  info(message: LogMessage): void;
  warn(message: LogMessage): void;
  error(message: LogMessage): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
  prefix?: string;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export const DEFAULT_LOG_LEVEL: LogLevel = "info";

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

const consoleSink: LogSink = (_level, line) => {
  console.error(line);
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? DEFAULT_LOG_LEVEL;
  const sink = options.sink ?? consoleSink;
  const prefix = options.prefix ?? "[IDSPLIT]";

  const isEnabled = (target: Exclude<LogLevel, "silent">): boolean =>
    LEVEL_PRIORITY[target] >= LEVEL_PRIORITY[level];

  const emit = (target: Exclude<LogLevel, "silent">, message: LogMessage): void => {
    if (!isEnabled(target)) {
      return;
    }
    const text = typeof message === "function" ? message() : message;
    sink(target, `${prefix} ${text}`);
  };

  return {
    level,
    isEnabled,
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
  };
}

/**
 * Logger that drops everything. Used when a caller supplies none.
 */
export const silentLogger: Logger = createLogger({ level: "silent" });
