/**
 * UAGen Catalog — Error Taxonomy
 *
 * Every failure the loader, generator or verifier can raise is a
 * UserAgentError. The `category` tag lets callers branch without
 * instanceof chains and is what the CLI reports in debug logs.
 */

export type ErrorCategory =
  | "USER_AGENT_ERROR"
  | "FILE_NOT_FOUND"
  | "PERMISSION_DENIED"
  | "INVALID_FORMAT"
  | "EMPTY_DATA"
  | "INVALID_USER_AGENT";

export class UserAgentError extends Error {
  readonly category: ErrorCategory;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    category: ErrorCategory = "USER_AGENT_ERROR",
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "UserAgentError";
    this.category = category;
    this.details = details;
  }
}

export class FileNotFoundError extends UserAgentError {
  constructor(filePath: string) {
    super(`File not found: ${filePath}`, "FILE_NOT_FOUND", { filePath });
    this.name = "FileNotFoundError";
  }
}

export class PermissionDeniedError extends UserAgentError {
  constructor(filePath: string) {
    super(`Permission denied: cannot read ${filePath}`, "PERMISSION_DENIED", {
      filePath,
    });
    this.name = "PermissionDeniedError";
  }
}

export class InvalidFormatError extends UserAgentError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "INVALID_FORMAT", details);
    this.name = "InvalidFormatError";
  }
}

export class EmptyDataError extends UserAgentError {
  constructor(message: string) {
    super(message, "EMPTY_DATA");
    this.name = "EmptyDataError";
  }
}

export class InvalidUserAgentError extends UserAgentError {
  constructor(userAgent: string, rule?: string) {
    super(`Generated invalid user agent: ${userAgent}`, "INVALID_USER_AGENT", {
      userAgent,
      rule,
    });
    this.name = "InvalidUserAgentError";
  }
}

export function isUserAgentError(value: unknown): value is UserAgentError {
  return value instanceof UserAgentError;
}
