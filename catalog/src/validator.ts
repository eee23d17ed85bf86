/**
 * UAGen Catalog — Catalog Validator
 *
 * Validates parsed catalog data against the JSON Schema in schema.json
 * using AJV, then turns the first violation into a message that names
 * the offending browser or OS entry.
 *
 * Validation stops at the first violation; the walk is top-down, so
 * `browsers[0]` problems are reported before `browsers[1]` ones.
 */

import Ajv, { ErrorObject, ValidateFunction } from "ajv";
import catalogSchema from "../schema.json";
import { InvalidFormatError } from "./errors";
import { CatalogData } from "./types";

/** A validation result */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

export interface ValidationError {
  path: string;
  message: string;
  rule: string;
}

let _validate: ValidateFunction<CatalogData> | null = null;

function getValidator(): ValidateFunction<CatalogData> {
  if (_validate) return _validate;

  const ajv = new Ajv({ allErrors: false, strict: false });
  _validate = ajv.compile<CatalogData>(catalogSchema);
  return _validate;
}

/**
 * Check whether a parsed value is catalog data.
 */
export function isCatalogData(data: unknown): data is CatalogData {
  return getValidator()(data);
}

/**
 * Validate parsed catalog data. On failure `errors` holds the first
 * violation found.
 */
export function validateCatalog(data: unknown): ValidationResult {
  const validate = getValidator();
  if (validate(data)) {
    return { valid: true, errors: [] };
  }

  const errors = (validate.errors ?? []).slice(0, 1).map((err) => ({
    path: err.instancePath || "/",
    message: describeError(err, data),
    rule: `schema:${err.keyword}`,
  }));

  return { valid: false, errors };
}

/**
 * Throw InvalidFormatError unless `data` is valid catalog data.
 */
export function assertCatalog(data: unknown): asserts data is CatalogData {
  const result = validateCatalog(data);
  if (result.valid) return;

  const [first] = result.errors;
  throw new InvalidFormatError(first?.message ?? "Invalid catalog data", {
    path: first?.path,
    rule: first?.rule,
  });
}

// ─── Messages ───────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function entryAt(
  list: unknown,
  index: number,
): Record<string, unknown> | undefined {
  if (!Array.isArray(list)) return undefined;
  const entry: unknown = list[index];
  return isRecord(entry) ? entry : undefined;
}

/** `'Chrome'` when the entry has a name, `at index 2` otherwise */
function label(entry: Record<string, unknown> | undefined, index: number): string {
  const name = entry?.name;
  return typeof name === "string" ? `'${name}'` : `at index ${index}`;
}

function describeError(err: ErrorObject, data: unknown): string {
  const segments = err.instancePath.split("/").slice(1);
  const missing =
    err.keyword === "required" ? String(err.params.missingProperty) : "";

  if (segments.length === 0) {
    return err.keyword === "required"
      ? `Catalog data must contain a '${missing}' key`
      : "Catalog data must be an object";
  }

  if (segments.length === 1) {
    return "'browsers' must be a non-empty list";
  }

  const browsers = isRecord(data) ? data.browsers : undefined;
  const b = Number(segments[1]);
  const browser = entryAt(browsers, b);
  const browserLabel = label(browser, b);

  if (segments.length === 2) {
    return err.keyword === "required"
      ? `Browser at index ${b} is missing '${missing}' field`
      : `Browser at index ${b} must be an object`;
  }

  const field = segments[2];

  if (segments.length === 3) {
    if (field === "name") {
      return `Browser at index ${b} must have a string 'name'`;
    }
    return `Browser ${browserLabel} must have non-empty '${field}' list`;
  }

  if (field === "versions") {
    return `Browser ${browserLabel} has a non-string version at index ${segments[3]}`;
  }

  const o = Number(segments[3]);
  const os = entryAt(browser?.os, o);
  const osVersions = `OS ${label(os, o)} for browser ${browserLabel} must have non-empty 'versions' list`;

  if (segments.length === 4) {
    if (err.keyword !== "required") {
      return `OS at index ${o} for browser ${browserLabel} must be an object`;
    }
    return missing === "name"
      ? `OS at index ${o} for browser ${browserLabel} is missing 'name' field`
      : osVersions;
  }

  if (segments.length === 5) {
    return segments[4] === "name"
      ? `OS at index ${o} for browser ${browserLabel} must have a string 'name'`
      : osVersions;
  }

  if (segments.length === 6) {
    return `OS ${label(os, o)} for browser ${browserLabel} has a non-string version at index ${segments[5]}`;
  }

  return `Invalid catalog at ${err.instancePath}: ${err.message ?? "unknown error"}`;
}
