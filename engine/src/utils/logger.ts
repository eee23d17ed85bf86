/**
 * UAGen Engine -- Structured Logger
 *
 * Wraps pino for structured logging. Silent by default so stdout only
 * ever carries generated User-Agents; when enabled, logs go to stderr.
 *
 * NOTE: We use pino.destination() instead of pino transports because
 * transports spawn worker_threads, which would keep short CLI runs alive.
 */

import pino from "pino";

export type LogLevel = "silent" | "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = [
  "silent",
  "debug",
  "info",
  "warn",
  "error",
];

export interface LoggerOptions {
  level: LogLevel;
}

const DEFAULT_OPTIONS: LoggerOptions = {
  level: "silent",
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(
  options: Partial<LoggerOptions> = {},
): pino.Logger {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  return pino(
    {
      level: opts.level,
      formatters: {
        level(label: string) {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ fd: 2, sync: true }), // stderr
  );
}

export type Logger = pino.Logger;
