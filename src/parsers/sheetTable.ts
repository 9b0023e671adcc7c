import { SourceReadError, SchemaMismatchError } from '../errors';
import { CellValue, SourceRow, SourceTable } from '../types/record';
import { FieldType, SheetSchema } from '../types/schema';

/**
 * Shared header handling and row building for workbook sheets and delimited exports.
 */

const NUMERIC_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const DATE_TIME_TEXT = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?)?$/;

/**
 * Parse `YYYY-MM-DD[ HH:MM[:SS]]` into a Date whose UTC fields hold the written
 * wall-clock time, the same shape a workbook date cell loads as.
 */
export function parseDateTimeText(text: string): Date | null {
  const match = DATE_TIME_TEXT.exec(text);
  if (!match) {
    return null;
  }
  const [, year, month, day, hours = '0', minutes = '0', seconds = '0'] = match;
  const date = new Date(
    Date.UTC(Number(year), Number(month) - 1, Number(day), Number(hours), Number(minutes), Number(seconds))
  );
  // Reject rolled-over values such as 2024-02-30
  return date.getUTCDate() === Number(day) && date.getUTCMonth() === Number(month) - 1 ? date : null;
}

/**
 * Convert a raw text value to the column's type.
 * Empty text becomes null; text that does not fit a numeric column is kept as text.
 */
export function convertText(value: string, type: FieldType = 'auto'): CellValue {
  const trimmed = value.trim();

  if (trimmed === '') {
    return null;
  }

  switch (type) {
    case 'number': {
      const compact = trimmed.replace(/,/g, '');
      return NUMERIC_TEXT.test(compact) ? Number(compact) : trimmed;
    }

    case 'date':
      return parseDateTimeText(trimmed) ?? trimmed;

    case 'string':
    case 'auto':
    default:
      return trimmed;
  }
}

function normaliseHeader(value: CellValue): string {
  if (value === null) {
    return '';
  }
  const text = value instanceof Date ? value.toISOString() : String(value);
  return text.trim().toLowerCase();
}

/**
 * Map each schema column to its position in the header row.
 * A repeated header only fails the load when the schema reads that column.
 */
export function resolveColumns(
  headerCells: CellValue[],
  schema: SheetSchema,
  source: string
): Map<string, number> {
  const headerMap = new Map<string, number>();
  const duplicates = new Set<string>();

  headerCells.forEach((cell, index) => {
    const header = normaliseHeader(cell);
    if (header === '') {
      return;
    }
    if (headerMap.has(header)) {
      duplicates.add(header);
      return;
    }
    headerMap.set(header, index);
  });

  if (headerMap.size === 0) {
    throw new SourceReadError(source, `Sheet "${schema.name}" has no header row`);
  }

  const columnIndex = new Map<string, number>();
  const missing: string[] = [];

  for (const column of schema.columns) {
    const header = column.columnName.toLowerCase();
    if (duplicates.has(header)) {
      throw new SourceReadError(source, `Sheet "${schema.name}" has duplicate column "${column.columnName}"`);
    }
    const index = headerMap.get(header);
    if (index === undefined) {
      if (column.required !== false) {
        missing.push(column.columnName);
      }
      continue;
    }
    columnIndex.set(column.columnName, index);
  }

  if (missing.length > 0) {
    throw new SchemaMismatchError(schema.name, missing);
  }

  return columnIndex;
}

/**
 * Build a table from a header row and data rows. Rows with no value in any
 * schema column are skipped.
 */
export function buildSheetTable(
  headerCells: CellValue[],
  dataRows: CellValue[][],
  schema: SheetSchema,
  source: string
): SourceTable {
  const columnIndex = resolveColumns(headerCells, schema, source);
  const rows: SourceRow[] = [];

  for (const cells of dataRows) {
    const row: SourceRow = {};
    let hasValue = false;

    for (const column of schema.columns) {
      const index = columnIndex.get(column.columnName);
      const raw = index === undefined ? null : cells[index] ?? null;
      const value = typeof raw === 'string' ? convertText(raw, column.type) : raw;

      row[column.columnName] = value;
      if (value !== null) {
        hasValue = true;
      }
    }

    if (hasValue) {
      rows.push(row);
    }
  }

  return {
    sheet: schema.name,
    columns: schema.columns.map(column => column.columnName),
    rows,
  };
}
