/**
 * UAGen CLI — Configuration
 *
 * Central location for CLI defaults and environment lookups.
 *
 * Catalog path, first match wins:
 *   1. positional [file] argument
 *   2. UAGEN_CATALOG environment variable
 *   3. ./user_agents.json
 */

import { isLogLevel, LoggerOptions, LogLevel } from "@uagen/engine";

export const DEFAULT_CATALOG_FILE = "user_agents.json";

/** Environment variables the CLI reads */
export const ENV_VARS = {
  catalog: "UAGEN_CATALOG",
  logLevel: "UAGEN_LOG_LEVEL",
} as const;

export function resolveCatalogPath(
  file?: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  return file || env[ENV_VARS.catalog] || DEFAULT_CATALOG_FILE;
}

/**
 * --debug wins; otherwise UAGEN_LOG_LEVEL if it names a known level.
 */
export function resolveLogLevel(
  debug: boolean,
  env: NodeJS.ProcessEnv = process.env,
): LogLevel {
  if (debug) return "debug";
  const fromEnv = env[ENV_VARS.logLevel]?.trim().toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : "silent";
}

export function getLoggerOptions(
  debug: boolean = false,
  env: NodeJS.ProcessEnv = process.env,
): Partial<LoggerOptions> {
  return { level: resolveLogLevel(debug, env) };
}
