/**
 * Purpose: Scoped console logging (`[scope] message`) with a process-wide level gate.
 * Context: Used by the marathon service, stores and the bootstrap; the level comes from
 * `LOG_LEVEL` through the configuration module.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let currentLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export interface ScopedLogger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const enabled = (level: LogLevel): boolean =>
  LEVEL_RANK[level] >= LEVEL_RANK[currentLevel];

export function createLogger(scope: string): ScopedLogger {
  const prefix = `[${scope}]`;
  return {
    debug(message, ...details) {
      if (enabled("debug")) console.debug(prefix, message, ...details);
    },
    info(message, ...details) {
      if (enabled("info")) console.log(prefix, message, ...details);
    },
    warn(message, ...details) {
      if (enabled("warn")) console.warn(prefix, message, ...details);
    },
    error(message, ...details) {
      if (enabled("error")) console.error(prefix, message, ...details);
    },
  };
}
