/**
 * UAGen CLI — Generate Command
 *
 * Loads a catalog and prints freshly generated User-Agents, one per line.
 * This is the default command, so `uagen catalog.json` works too.
 *
 * Usage:
 *   uagen [file]                    One User-Agent from any browser/OS
 *   uagen generate [file] -n 5      Five User-Agents
 *   uagen [file] -b firefox -o linux
 */

import { Command, InvalidArgumentError } from "commander";
import { loadCatalog } from "@uagen/catalog";
import { createLogger, UserAgentGenerator } from "@uagen/engine";
import { getLoggerOptions, resolveCatalogPath } from "../config";
import { printUserAgent } from "../output";

export interface GenerateCommandOptions {
  count: number;
  browser?: string;
  os?: string;
  debug: boolean;
}

export function parseCount(value: string): number {
  const count = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(count) || count < 1) {
    throw new InvalidArgumentError("Count must be a positive integer.");
  }
  return count;
}

/**
 * Load, generate and return every User-Agent before anything is printed,
 * so a failure part-way leaves stdout empty.
 */
export function runGenerate(
  file: string | undefined,
  opts: GenerateCommandOptions,
  env: NodeJS.ProcessEnv = process.env,
): string[] {
  const logger = createLogger(getLoggerOptions(opts.debug, env));
  const catalogPath = resolveCatalogPath(file, env);

  const catalog = loadCatalog(catalogPath);
  logger.debug(
    { catalogPath, browsers: catalog.size, combinations: catalog.combinationCount },
    "Catalog loaded",
  );

  const generator = new UserAgentGenerator({ logger });
  return generator.generateMany(catalog.data, opts.count, {
    browser: opts.browser,
    os: opts.os,
  });
}

export function registerGenerateCommand(program: Command): void {
  program
    .command("generate [file]", { isDefault: true })
    .description("Generate User-Agent strings from a catalog file")
    .option("-n, --count <n>", "Number of User-Agents to generate", parseCount, 1)
    .option("-b, --browser <name>", "Only use this browser")
    .option("-o, --os <name>", "Only use this operating system")
    .option("--debug", "Log selection details to stderr", false)
    .action((file: string | undefined, opts: GenerateCommandOptions) => {
      for (const userAgent of runGenerate(file, opts)) {
        printUserAgent(userAgent);
      }
    });
}
