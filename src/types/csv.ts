/**
 * Types for reading per-sheet CSV/TSV exports.
 */

export interface ParseOptions {
  /** Delimiter character (default: ',') */
  delimiter?: ',' | '\t' | string;
  /** Trim whitespace from values (default: true) */
  trim?: boolean;
}

/**
 * Callback for streaming parse operations
 */
export type RowCallback = (row: string[], lineNumber: number) => void;
