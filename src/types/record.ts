/**
 * Cell and row types for tables loaded from a survey workbook or its sheet exports.
 *
 * Workbook cells keep their native type. Empty text is normalised to null so that
 * "missing" has a single representation downstream.
 */

export type CellValue = string | number | boolean | Date | null;

export interface SourceRow {
  [column: string]: CellValue;
}

export interface SourceTable<R extends SourceRow = SourceRow> {
  /** Sheet the rows were read from */
  sheet: string;
  /** Canonical column names, in schema order */
  columns: string[];
  rows: R[];
}

/**
 * Output cell: already formatted text, or null when the value is absent.
 */
export type OutputValue = string | null;

export type OutputRow<C extends string = string> = Record<C, OutputValue>;

export interface OutputTable<C extends string = string> {
  name: string;
  columns: readonly C[];
  rows: OutputRow<C>[];
}
