/**
 * UAGen Engine — User-Agent Generator
 *
 * Picks a browser, browser version, OS and OS version uniformly at
 * random from catalog data, formats them with the browser's template
 * and verifies the result.
 *
 * Entries without versions (or browsers without OSes) are skipped
 * rather than treated as errors, so data built in code does not have
 * to pass the loader's schema first.
 */

import {
  Browser,
  CatalogData,
  EmptyDataError,
  InvalidUserAgentError,
  OperatingSystem,
} from "@uagen/catalog";
import { formatOsString } from "./os-string";
import { pickRandom, RandomSource } from "./random";
import { formatUserAgent } from "./templates";
import { createLogger, Logger } from "./utils/logger";
import { verifyUserAgent } from "./verifier";

export interface GeneratorOptions {
  /** Defaults to Math.random */
  random?: RandomSource;
  logger?: Logger;
}

/** Restricts generation to one browser and/or OS, matched case-insensitively */
export interface GenerateOptions {
  browser?: string;
  os?: string;
}

export interface UserAgentSelection {
  browser: string;
  browserVersion: string;
  os: string;
  osVersion: string;
}

export interface GeneratedUserAgent extends UserAgentSelection {
  userAgent: string;
}

function matchesName(name: string, wanted?: string): boolean {
  return wanted === undefined || name.toLowerCase() === wanted.toLowerCase();
}

function feasibleOs(browser: Browser, osName?: string): OperatingSystem[] {
  return browser.os.filter(
    (os) => os.versions.length > 0 && matchesName(os.name, osName),
  );
}

function matching(kind: string, value?: string): string {
  return value === undefined ? "" : ` matching ${kind} '${value}'`;
}

export class UserAgentGenerator {
  private readonly random: RandomSource;
  private readonly logger: Logger;

  constructor(options: GeneratorOptions = {}) {
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? createLogger();
  }

  /**
   * Choose a browser/OS combination. Draws from the random source four
   * times: browser, browser version, OS, OS version.
   */
  select(data: CatalogData, options: GenerateOptions = {}): UserAgentSelection {
    if (!data || !Array.isArray(data.browsers) || data.browsers.length === 0) {
      throw new EmptyDataError("No browser data available");
    }

    const browsers = data.browsers.filter(
      (b) =>
        b.os.length > 0 &&
        b.versions.length > 0 &&
        matchesName(b.name, options.browser) &&
        (options.os === undefined ||
          b.os.some((os) => matchesName(os.name, options.os))),
    );

    if (browsers.length === 0) {
      throw new EmptyDataError(
        "No feasible browser data available" +
          matching("browser", options.browser) +
          matching("OS", options.os),
      );
    }

    const browser = pickRandom(browsers, this.random);
    const browserVersion = pickRandom(browser.versions, this.random);

    const systems = feasibleOs(browser, options.os);
    if (systems.length === 0) {
      throw new EmptyDataError(
        `No feasible OS data available for browser: ${browser.name}`,
      );
    }

    const os = pickRandom(systems, this.random);
    const osVersion = pickRandom(os.versions, this.random);

    const selection = {
      browser: browser.name,
      browserVersion,
      os: os.name,
      osVersion,
    };
    this.logger.debug(selection, "Selected browser/OS combination");
    return selection;
  }

  /**
   * Generate one User-Agent along with the combination it was built from.
   */
  build(data: CatalogData, options: GenerateOptions = {}): GeneratedUserAgent {
    const selection = this.select(data, options);
    const osString = formatOsString(selection.os, selection.osVersion);
    const userAgent = formatUserAgent(
      selection.browser,
      selection.browserVersion,
      osString,
    );

    const result = verifyUserAgent(userAgent);
    if (!result.valid) {
      this.logger.warn(
        { userAgent, rule: result.failedRule },
        "Generated User-Agent failed verification",
      );
      throw new InvalidUserAgentError(userAgent, result.failedRule);
    }

    return { ...selection, userAgent };
  }

  generate(data: CatalogData, options: GenerateOptions = {}): string {
    return this.build(data, options).userAgent;
  }

  generateMany(
    data: CatalogData,
    count: number,
    options: GenerateOptions = {},
  ): string[] {
    const agents: string[] = [];
    for (let i = 0; i < count; i++) {
      agents.push(this.generate(data, options));
    }
    return agents;
  }
}

/**
 * Generate a single User-Agent with the default random source.
 */
export function generateUserAgent(
  data: CatalogData,
  options: GenerateOptions = {},
): string {
  return new UserAgentGenerator().generate(data, options);
}
