import { CellValue, OutputValue } from '../types/record';

const pad = (value: number) => String(value).padStart(2, '0');

/**
 * Render a workbook date-time as local wall-clock text (`YYYY-MM-DDTHH:MM:SS`).
 * Workbooks store no zone; the cell's UTC fields are the time as recorded.
 */
export function formatDateTime(value: Date): string {
  const date = `${value.getUTCFullYear()}-${pad(value.getUTCMonth() + 1)}-${pad(value.getUTCDate())}`;
  const time = `${pad(value.getUTCHours())}:${pad(value.getUTCMinutes())}:${pad(value.getUTCSeconds())}`;
  return `${date}T${time}`;
}

/**
 * Render a source cell as output text. Dates are written without a zone;
 * numbers use their shortest round-trip form.
 */
export function formatCell(value: CellValue | undefined): OutputValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (value instanceof Date) {
    return isNaN(value.getTime()) ? null : formatDateTime(value);
  }
  return String(value);
}

/**
 * Join identifier parts with "_". Missing parts become empty text.
 */
export function joinKey(parts: (CellValue | undefined)[]): string {
  return parts.map(part => formatCell(part) ?? '').join('_');
}
