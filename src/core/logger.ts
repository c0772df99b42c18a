/**
 * Logger Adapter
 *
 * The library logs through whatever `getLogger()` returns at the point of
 * use, so `setLogger()` takes effect for searches already configured.
 * The default writes to the console at `info` and above; search tracing is
 * emitted at `debug`.
 *
 * @module digraph-kit/core/logger
 */

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface ConsoleLoggerOptions {
  /** Prepended to every message (default: "[digraph]") */
  prefix?: string;
  /** Least severe level written (default: "info") */
  level?: LogLevel;
}

export const DEFAULT_CONSOLE_LOGGER_OPTIONS: Required<ConsoleLoggerOptions> = {
  prefix: "[digraph]",
  level: "info",
};

/**
 * Console logger that drops messages below `level`
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const prefix = options.prefix ?? DEFAULT_CONSOLE_LOGGER_OPTIONS.prefix;
  const threshold = LEVEL_RANK[options.level ?? DEFAULT_CONSOLE_LOGGER_OPTIONS.level];
  const emit = (at: Exclude<LogLevel, "silent">) =>
    (msg: string, ...args: unknown[]): void => {
      if (LEVEL_RANK[at] >= threshold) {
        console[at](`${prefix} ${msg}`, ...args);
      }
    };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}

const defaultLogger: Logger = createConsoleLogger();

let currentLogger: Logger = defaultLogger;

export function getLogger(): Logger {
  return currentLogger;
}

export function setLogger(logger: Logger): void {
  currentLogger = logger;
}

/** Back to the console logger at `info` */
export function resetLogger(): void {
  currentLogger = defaultLogger;
}
