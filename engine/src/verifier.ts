/**
 * UAGen Engine — User-Agent Verification
 *
 * Structural sanity checks on a generated User-Agent. These are
 * heuristics, not a grammar: they catch broken templates and unknown
 * platforms, nothing more.
 */

export type VerificationRule =
  | "prefix"
  | "balanced-parentheses"
  | "min-length"
  | "browser-token"
  | "os-token";

export interface VerificationResult {
  valid: boolean;
  /** First rule that failed, in check order */
  failedRule?: VerificationRule;
}

export const USER_AGENT_PREFIX = "Mozilla/5.0";
export const MIN_USER_AGENT_LENGTH = 30;
export const BROWSER_PATTERNS = ["Chrome", "Firefox", "Safari", "Edg"] as const;
export const OS_PATTERNS = ["Windows", "Mac OS X", "Linux", "X11"] as const;

function count(s: string, ch: string): number {
  return s.split(ch).length - 1;
}

const CHECKS: Array<[VerificationRule, (ua: string) => boolean]> = [
  ["prefix", (ua) => ua.startsWith(USER_AGENT_PREFIX)],
  ["balanced-parentheses", (ua) => count(ua, "(") === count(ua, ")")],
  ["min-length", (ua) => ua.length >= MIN_USER_AGENT_LENGTH],
  ["browser-token", (ua) => BROWSER_PATTERNS.some((p) => ua.includes(p))],
  ["os-token", (ua) => OS_PATTERNS.some((p) => ua.includes(p))],
];

export function verifyUserAgent(userAgent: string): VerificationResult {
  for (const [rule, check] of CHECKS) {
    if (!check(userAgent)) return { valid: false, failedRule: rule };
  }
  return { valid: true };
}

export function isValidUserAgent(userAgent: string): boolean {
  return verifyUserAgent(userAgent).valid;
}
