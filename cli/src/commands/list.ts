/**
 * UAGen CLI - List Command
 *
 * Shows every browser in a catalog with its versions and operating
 * systems, plus how many combinations generation can draw from.
 *
 * Usage:
 *   uagen list [file]
 */

import { Command } from "commander";
import { Browser, loadCatalog } from "@uagen/catalog";
import { resolveCatalogPath } from "../config";
import { colors, printInfo, printTable } from "../output";

export function formatBrowserRow(browser: Browser): string[] {
  return [
    colors.app(browser.name),
    colors.version(browser.versions.join(", ")),
    browser.os
      .map((os) => `${os.name} (${os.versions.join(", ")})`)
      .join("\n"),
  ];
}

export function registerListCommand(program: Command): void {
  program
    .command("list [file]")
    .description("Show the browsers and operating systems in a catalog")
    .action((file: string | undefined) => {
      const catalogPath = resolveCatalogPath(file);
      const catalog = loadCatalog(catalogPath);

      printInfo(
        `${colors.bold(String(catalog.size))} browser(s) in ${catalogPath}:\n`,
      );
      printTable({
        head: ["Browser", "Versions", "Operating systems"],
        rows: catalog.browsers.map(formatBrowserRow),
      });
      printInfo(`${catalog.combinationCount} possible combination(s).`);
    });
}
