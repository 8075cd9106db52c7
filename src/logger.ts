/**
 * Leveled logger for the CLI and pipeline.
 *
 * Everything goes to stderr so command output on stdout stays parseable.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export function isLogLevel(v: unknown): v is LogLevel {
  return typeof v === "string" && Object.hasOwn(LEVELS, v);
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  /** Same sink and level, nested module prefix. */
  child(module: string): Logger;
}

export type LogSink = (line: string, ...args: unknown[]) => void;

export interface LoggerOptions {
  level?: LogLevel;
  module?: string;
  sink?: LogSink;
}

const PREFIX = "[freqdict]";

const stderrSink: LogSink = (line, ...args) => console.error(line, ...args);

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVELS[options.level ?? "info"];
  const sink = options.sink ?? stderrSink;
  const module = options.module;

  const log = (level: LogLevel, message: string, args: unknown[]): void => {
    if (LEVELS[level] < threshold) return;
    const modulePrefix = module ? ` [${module}]` : "";
    sink(`${PREFIX} ${level.toUpperCase()}${modulePrefix} ${message}`, ...args);
  };

  return {
    debug: (message, ...args) => log("debug", message, args),
    info: (message, ...args) => log("info", message, args),
    warn: (message, ...args) => log("warn", message, args),
    error: (message, ...args) => log("error", message, args),
    child: (name) =>
      createLogger({ level: options.level, sink, module: module ? `${module}:${name}` : name }),
  };
}

/** Drops everything; used where a caller passes no logger. */
export const silentLogger: Logger = createLogger({ sink: () => {} });
