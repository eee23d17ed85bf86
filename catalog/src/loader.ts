/**
 * UAGen Catalog — Catalog Loader
 *
 * Reads a catalog file from disk, parses it and validates it.
 *
 * Catalog structure (JSON or YAML):
 *   browsers:
 *     - name: Chrome
 *       versions: ["120.0.0.0", ...]
 *       os:
 *         - name: Windows
 *           versions: ["10.0", ...]
 *
 * YAML is parsed with the failsafe schema, so unquoted versions such as
 * `10.0` stay strings.
 *
 * The parsed data is wrapped in a read-only Catalog with lookup helpers.
 */

import * as fs from "fs";
import * as path from "path";
import { parse as parseYaml } from "yaml";
import {
  FileNotFoundError,
  InvalidFormatError,
  PermissionDeniedError,
  UserAgentError,
} from "./errors";
import { Browser, CatalogData, CatalogFormat } from "./types";
import { assertCatalog } from "./validator";

export class Catalog {
  readonly data: CatalogData;
  /** Path the catalog was loaded from, if any */
  readonly source?: string;

  constructor(data: CatalogData, source?: string) {
    this.data = data;
    this.source = source;
  }

  get browsers(): Browser[] {
    return this.data.browsers;
  }

  get size(): number {
    return this.data.browsers.length;
  }

  /**
   * Find a browser by name (case-insensitive).
   */
  getBrowser(name: string): Browser | undefined {
    const n = name.toLowerCase();
    return this.data.browsers.find((b) => b.name.toLowerCase() === n);
  }

  has(name: string): boolean {
    return this.getBrowser(name) !== undefined;
  }

  /**
   * Distinct OS names across all browsers, in first-seen order.
   */
  operatingSystems(): string[] {
    const names = new Set<string>();
    for (const browser of this.data.browsers) {
      for (const os of browser.os) names.add(os.name);
    }
    return [...names];
  }

  /**
   * Number of distinct (browser version, OS version) pairs the catalog
   * can produce.
   */
  get combinationCount(): number {
    return this.data.browsers.reduce((total, browser) => {
      const osVersions = browser.os.reduce((n, os) => n + os.versions.length, 0);
      return total + browser.versions.length * osVersions;
    }, 0);
  }
}

/**
 * Infer the catalog format from a file extension. Anything that is not
 * .yaml/.yml is treated as JSON.
 */
export function detectFormat(filePath: string): CatalogFormat {
  const ext = path.extname(filePath).toLowerCase();
  return ext === ".yaml" || ext === ".yml" ? "yaml" : "json";
}

/**
 * Parse and validate catalog text.
 */
export function parseCatalog(
  content: string,
  format: CatalogFormat = "json",
  source?: string,
): Catalog {
  let data: unknown;
  try {
    data = format === "yaml" ? parseYaml(content, { schema: "failsafe" }) : JSON.parse(content);
  } catch (err) {
    const label = format === "yaml" ? "YAML" : "JSON";
    throw new InvalidFormatError(
      `Invalid ${label} format: ${errorMessage(err)}`,
      { source },
    );
  }

  assertCatalog(data);
  return new Catalog(data, source);
}

/**
 * Load a catalog file. Throws FileNotFoundError, PermissionDeniedError or
 * InvalidFormatError; anything else surfaces as a plain UserAgentError.
 */
export function loadCatalog(filePath: string): Catalog {
  const content = readCatalogFile(filePath);
  return parseCatalog(content, detectFormat(filePath), filePath);
}

// ─── Private ────────────────────────────────────────────────

function readCatalogFile(filePath: string): string {
  try {
    return fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    if (isErrnoException(err)) {
      if (err.code === "ENOENT") throw new FileNotFoundError(filePath);
      if (err.code === "EACCES" || err.code === "EPERM") {
        throw new PermissionDeniedError(filePath);
      }
    }
    throw new UserAgentError(
      `Error loading user agents: ${errorMessage(err)}`,
      "USER_AGENT_ERROR",
      { filePath },
    );
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
