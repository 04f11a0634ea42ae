// src/core/log.ts
// Scoped console logging with a process-wide level

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

let currentLevel: LogLevel = levelFromEnv();

function levelFromEnv(): LogLevel {
  const raw = process.env.FORTHIC_LOG_LEVEL?.toLowerCase();
  return raw && isLogLevel(raw) ? raw : "info";
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export type Logger = {
  error(message: string, ...extra: unknown[]): void;
  warn(message: string, ...extra: unknown[]): void;
  info(message: string, ...extra: unknown[]): void;
  debug(message: string, ...extra: unknown[]): void;
};

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] <= LEVEL_ORDER[currentLevel];
}

/**
 * Logger whose lines are prefixed with `[scope]`.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    error(message, ...extra) {
      if (enabled("error")) console.error(prefix, message, ...extra);
    },
    warn(message, ...extra) {
      if (enabled("warn")) console.warn(prefix, message, ...extra);
    },
    info(message, ...extra) {
      if (enabled("info")) console.log(prefix, message, ...extra);
    },
    debug(message, ...extra) {
      if (enabled("debug")) console.debug(prefix, message, ...extra);
    },
  };
}
