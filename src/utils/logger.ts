/**
 * Scoped console logger.
 *
 * Every line is prefixed with `[scope]` and goes to stderr: stdout carries the
 * CSV output of `analyze`.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let currentLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];

export interface Logger {
  debug(message: string, ...extra: unknown[]): void;
  info(message: string, ...extra: unknown[]): void;
  warn(message: string, ...extra: unknown[]): void;
  error(message: string, ...extra: unknown[]): void;
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (message, ...extra) => {
      if (enabled("debug")) console.error(prefix, message, ...extra);
    },
    info: (message, ...extra) => {
      if (enabled("info")) console.error(prefix, message, ...extra);
    },
    warn: (message, ...extra) => {
      if (enabled("warn")) console.warn(prefix, message, ...extra);
    },
    error: (message, ...extra) => {
      if (enabled("error")) console.error(prefix, message, ...extra);
    },
  };
}
