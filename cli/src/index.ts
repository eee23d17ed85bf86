#!/usr/bin/env node

/**
 * UAGen CLI — Entry Point
 *
 * Commands:
 *   uagen [file]              Print one generated User-Agent (default)
 *   uagen generate [file]     Same, with --count/--browser/--os/--debug
 *   uagen list [file]         Show what a catalog contains
 *
 * [file] defaults to $UAGEN_CATALOG, then ./user_agents.json.
 */

import { main } from "./main";

main(process.argv).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`Unexpected error: ${String(err)}`);
    process.exitCode = 1;
  },
);
