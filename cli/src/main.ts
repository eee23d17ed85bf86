/**
 * UAGen CLI — Program
 *
 * Builds the commander program and maps every failure to an exit code:
 * 0 on success, 1 on any error. Errors are reported as a single line
 * on stderr.
 */

import { Command, CommanderError } from "commander";
import { isUserAgentError } from "@uagen/catalog";
import { registerGenerateCommand } from "./commands/generate";
import { registerListCommand } from "./commands/list";

export const VERSION = "0.1.0";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("uagen")
    .description("Generate plausible HTTP User-Agent strings from a browser/OS catalog")
    .version(VERSION)
    // Throw instead of calling process.exit so main() owns the exit code
    .exitOverride();

  registerGenerateCommand(program);
  registerListCommand(program);

  return program;
}

export function reportError(err: unknown): number {
  // commander has already printed its own message (or help/version)
  if (err instanceof CommanderError) return err.exitCode;

  if (isUserAgentError(err)) {
    console.error(`Error: ${err.message}`);
  } else {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Unexpected error: ${message}`);
  }
  return 1;
}

export async function main(argv: string[] = process.argv): Promise<number> {
  try {
    await createProgram().parseAsync(argv);
    return 0;
  } catch (err) {
    return reportError(err);
  }
}
