/**
 * Schema definitions for the source sheets.
 *
 * A sheet schema names the columns the transformers read and how raw cell text
 * is coerced when it comes from a delimited export instead of a typed workbook.
 */

export type FieldType = 'string' | 'number' | 'date' | 'auto';

export interface ColumnSchema {
  /** The name of the column in the sheet header (matched case-insensitively) */
  columnName: string;
  /** The type raw text is converted to (default: 'auto') */
  type?: FieldType;
  /** Whether loading fails when the column is absent (default: true) */
  required?: boolean;
}

export interface SheetSchema {
  /** Sheet name in the workbook, and base file name of a delimited export */
  name: string;
  columns: ColumnSchema[];
}
