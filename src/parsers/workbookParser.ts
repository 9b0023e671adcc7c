import { Workbook, Worksheet, CellValue as ExcelCellValue } from 'exceljs';
import { SourceReadError } from '../errors';
import { CellValue, SourceTable } from '../types/record';
import { SheetSchema } from '../types/schema';
import { buildSheetTable } from './sheetTable';

/**
 * Flatten an exceljs cell value to a plain cell.
 * Formulas resolve to their cached result, rich text to its plain text and
 * hyperlinks to their display text. Error cells are treated as empty.
 */
export function normalizeCellValue(value: ExcelCellValue): CellValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (value instanceof Date) {
    return value;
  }
  if ('richText' in value) {
    return value.richText.map(part => part.text).join('');
  }
  if ('hyperlink' in value) {
    return value.text;
  }
  if ('formula' in value || 'sharedFormula' in value) {
    return normalizeCellValue(value.result ?? null);
  }
  return null;
}

function readRow(worksheet: Worksheet, rowNumber: number, columnCount: number): CellValue[] {
  const row = worksheet.getRow(rowNumber);
  const cells: CellValue[] = [];
  for (let column = 1; column <= columnCount; column++) {
    cells.push(normalizeCellValue(row.getCell(column).value));
  }
  return cells;
}

/**
 * Open an .xlsx workbook. Fails with SourceReadError if the file is missing or unreadable.
 */
export async function openWorkbook(filePath: string): Promise<Workbook> {
  const workbook = new Workbook();
  try {
    await workbook.xlsx.readFile(filePath);
  } catch (err) {
    const reason = err instanceof Error ? err.message : 'Unknown error';
    throw new SourceReadError(filePath, `Cannot open workbook ${filePath}: ${reason}`, { cause: err });
  }
  return workbook;
}

/**
 * Read one named sheet into a table. Row 1 is the header row.
 */
export function readSheet(workbook: Workbook, schema: SheetSchema, source: string): SourceTable {
  const worksheet = workbook.getWorksheet(schema.name);
  if (!worksheet) {
    throw new SourceReadError(source, `Workbook ${source} has no sheet named "${schema.name}"`);
  }

  const columnCount = worksheet.columnCount;
  const headerCells = worksheet.rowCount > 0 ? readRow(worksheet, 1, columnCount) : [];
  const dataRows: CellValue[][] = [];

  for (let rowNumber = 2; rowNumber <= worksheet.rowCount; rowNumber++) {
    dataRows.push(readRow(worksheet, rowNumber, columnCount));
  }

  return buildSheetTable(headerCells, dataRows, schema, source);
}
