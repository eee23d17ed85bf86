/**
 * UAGen Engine — User-Agent Templates
 *
 * One template per browser family. Unknown browsers get a WebKit-style
 * fallback carrying their own name as the product token.
 */

export type UserAgentTemplate = (version: string, osString: string) => string;

export const BROWSER_TEMPLATES = new Map<string, UserAgentTemplate>([
  [
    "Chrome",
    (v, os) =>
      `Mozilla/5.0 (${os}) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/${v} Safari/537.36`,
  ],
  [
    "Firefox",
    (v, os) => `Mozilla/5.0 (${os}; rv:${v}) Gecko/20100101 Firefox/${v}`,
  ],
  [
    "Safari",
    (v, os) =>
      `Mozilla/5.0 (${os}) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/${v} Safari/605.1.15`,
  ],
  [
    "Edge",
    (v, os) =>
      `Mozilla/5.0 (${os}) AppleWebKit/537.36 (KHTML, like Gecko) Edg/${v}`,
  ],
]);

export function formatUserAgent(
  browserName: string,
  browserVersion: string,
  osString: string,
): string {
  const template = BROWSER_TEMPLATES.get(browserName);
  if (template) return template(browserVersion, osString);

  return `Mozilla/5.0 (${osString}) AppleWebKit/537.36 (KHTML, like Gecko) ${browserName}/${browserVersion}`;
}
