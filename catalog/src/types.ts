/**
 * UAGen Catalog — Data Model
 *
 * Shape of a catalog file once it has passed schema validation.
 * Entries are reference data: nothing mutates them after load.
 */

export interface OperatingSystem {
  name: string;
  versions: string[];
}

export interface Browser {
  name: string;
  versions: string[];
  os: OperatingSystem[];
}

export interface CatalogData {
  browsers: Browser[];
}

/** Formats the loader knows how to parse */
export type CatalogFormat = "json" | "yaml";
