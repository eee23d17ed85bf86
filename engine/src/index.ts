/**
 * UAGen Engine — Public API
 *
 * This is the single entry point for the engine package.
 * The CLI imports from here — never from internal modules.
 */

export { UserAgentGenerator, generateUserAgent } from "./generator";
export type {
  GeneratorOptions,
  GenerateOptions,
  UserAgentSelection,
  GeneratedUserAgent,
} from "./generator";

export { formatOsString, normalizeMacVersion, FROZEN_MAC_VERSION } from "./os-string";
export { formatUserAgent, BROWSER_TEMPLATES } from "./templates";
export type { UserAgentTemplate } from "./templates";

export {
  verifyUserAgent,
  isValidUserAgent,
  USER_AGENT_PREFIX,
  MIN_USER_AGENT_LENGTH,
  BROWSER_PATTERNS,
  OS_PATTERNS,
} from "./verifier";
export type { VerificationResult, VerificationRule } from "./verifier";

export { pickRandom } from "./random";
export type { RandomSource } from "./random";

export { createLogger, isLogLevel, LOG_LEVELS } from "./utils/logger";
export type { Logger, LogLevel, LoggerOptions } from "./utils/logger";
