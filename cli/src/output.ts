/**
 * UAGen CLI -- Output Helpers
 *
 * Centralized formatting for CLI output. Uses chalk (v4, CommonJS
 * compatible) for ANSI colors and cli-table3 for tabular data.
 *
 * Generated User-Agents are written bare, one per line, so the output
 * can be piped straight into other tools. Everything decorated goes
 * through the helpers below.
 */

import chalk from "chalk";
import Table from "cli-table3";

// ─── Color Shortcuts ────────────────────────────────────────

export const colors = {
  bold: chalk.bold,
  app: chalk.bold.white,
  version: chalk.cyan,
};

// ─── Symbols (safe for Windows terminals) ───────────────────

export const symbols = {
  info: chalk.cyan("\u2139"), // ℹ
};

// ─── Print Helpers ──────────────────────────────────────────

export function printUserAgent(userAgent: string): void {
  console.log(userAgent);
}

export function printInfo(msg: string): void {
  console.log(`${symbols.info} ${msg}`);
}

// ─── Tables ─────────────────────────────────────────────────

/**
 * Detect whether to use ASCII-only box drawing characters.
 * On Windows cmd/PowerShell without TERM set, Unicode borders corrupt.
 */
export function shouldUseAsciiBorders(): boolean {
  return process.platform === "win32" && !process.env.TERM;
}

const ASCII_CHARS = {
  top: "-",
  "top-mid": "+",
  "top-left": "+",
  "top-right": "+",
  bottom: "-",
  "bottom-mid": "+",
  "bottom-left": "+",
  "bottom-right": "+",
  left: "|",
  "left-mid": "+",
  mid: "-",
  "mid-mid": "+",
  right: "|",
  "right-mid": "+",
  middle: "|",
};

export interface TableOptions {
  head: string[];
  rows: string[][];
}

export function printTable({ head, rows }: TableOptions): void {
  const ascii = shouldUseAsciiBorders();
  const tableOpts: ConstructorParameters<typeof Table>[0] = {
    head: head.map((h) => chalk.bold.cyan(h)),
    style: { head: [], border: ascii ? [] : ["gray"] },
    wordWrap: false,
    ...(ascii ? { chars: ASCII_CHARS } : {}),
  };

  const table = new Table(tableOpts);
  for (const row of rows) {
    table.push(row);
  }
  console.log(table.toString());
}
