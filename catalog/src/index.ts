/**
 * UAGen Catalog — Public API
 *
 * Main entry point for the catalog package.
 * Exports the Catalog class, loader, validator, errors and types.
 */

export { Catalog, loadCatalog, parseCatalog, detectFormat } from "./loader";
export {
  validateCatalog,
  assertCatalog,
  isCatalogData,
} from "./validator";
export type { ValidationResult, ValidationError } from "./validator";
export {
  UserAgentError,
  FileNotFoundError,
  PermissionDeniedError,
  InvalidFormatError,
  EmptyDataError,
  InvalidUserAgentError,
  isUserAgentError,
} from "./errors";
export type { ErrorCategory } from "./errors";
export type {
  CatalogData,
  Browser,
  OperatingSystem,
  CatalogFormat,
} from "./types";
