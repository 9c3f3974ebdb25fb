/**
 * Raw glossary record shapes, as stored in source files and the database.
 * snake_case matches the storage layer exactly.
 */

/** One record of a source collection. Only `term` and `plain_alternative` are read. */
export interface RawGlossaryRecord {
  term?: unknown;
  plain_alternative?: unknown;
  [key: string]: unknown;
}

export interface GlossaryTermRow {
  id: number;
  source: string;
  term: string;
  plain_alternative: string;
}

/**
 * A named source collection, or the reason it could not be read.
 * Records are left unchecked here; the index builder validates each one.
 */
export type SourceCollectionResult =
  | { name: string; records: readonly unknown[] }
  | { name: string; error: string };
