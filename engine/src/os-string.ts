/**
 * UAGen Engine — OS Descriptor Formatting
 *
 * Builds the platform token that goes inside the first parentheses of
 * a User-Agent, e.g. "Windows NT 10.0; Win64; x64".
 */

/**
 * Browsers on macOS 10.15 and later all report this version, so newer
 * releases are mapped onto it.
 */
export const FROZEN_MAC_VERSION = "10_15_7";

/**
 * Normalize a macOS version to the underscore form used in User-Agents.
 *
 *   "10.14.6" → "10_14_6"
 *   "10.15"   → "10_15_7"
 *   "14.2"    → "10_15_7"
 *   "10_13_6" → "10_13_6"
 */
export function normalizeMacVersion(version: string): string {
  const normalized = version.trim().replace(/\./g, "_");
  const match = normalized.match(/^(\d+)(?:_(\d+))?/);
  if (!match) return normalized;

  const major = parseInt(match[1], 10);
  const minor = match[2] !== undefined ? parseInt(match[2], 10) : 0;
  if (major > 10 || (major === 10 && minor >= 15)) {
    return FROZEN_MAC_VERSION;
  }
  return normalized;
}

export function formatOsString(osName: string, osVersion: string): string {
  switch (osName) {
    case "Windows":
      return `Windows NT ${osVersion}; Win64; x64`;
    case "Mac OS":
      return `Macintosh; Intel Mac OS X ${normalizeMacVersion(osVersion)}`;
    case "Linux":
      return `X11; Linux ${osVersion}`;
    default:
      return `${osName} ${osVersion}`;
  }
}
