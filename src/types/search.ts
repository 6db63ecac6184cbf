/**
 * Type definitions for search index fragments
 */

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * One searchable record. Fields are owned by the search engine and passed through untouched.
 */
export interface SearchIndexEntry {
  [field: string]: JsonValue;
}

/**
 * Output of `SearchEngine.precompile`, handed to the search script template
 */
export interface SearchPayload {
  version: number;
  fields: string[];
  docs: SearchIndexEntry[];
  /** token -> positions in `docs` */
  index: Record<string, number[]>;
}
