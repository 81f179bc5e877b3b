export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface Logger {
  debug(message: string, metadata?: Record<string, unknown>): void;
  info(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, error?: unknown, metadata?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Prefix for every line, e.g. "client" → "[client] Logged in". */
  scope?: string;
}

const RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Console logger with "[scope]" prefixes. Metadata is passed through as a
 * second argument so objects stay inspectable in a terminal.
 */
export function createConsoleLogger(opts: LoggerOptions = {}): Logger {
  const threshold = RANK[opts.level ?? "info"];
  const prefix = opts.scope ? `[${opts.scope}] ` : "";
  const enabled = (level: LogLevel) => RANK[level] >= threshold;
  const extra = (metadata?: Record<string, unknown>) => (metadata ? [metadata] : []);

  return {
    debug(message, metadata) {
      if (enabled("debug")) console.debug(prefix + message, ...extra(metadata));
    },
    info(message, metadata) {
      if (enabled("info")) console.log(prefix + message, ...extra(metadata));
    },
    warn(message, metadata) {
      if (enabled("warn")) console.warn(prefix + message, ...extra(metadata));
    },
    error(message, error, metadata) {
      if (!enabled("error")) return;
      const args: unknown[] = [];
      if (error !== undefined) args.push(error);
      if (metadata) args.push(metadata);
      console.error(prefix + message, ...args);
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
