import { parse } from 'csv-parse';
import { Readable } from 'stream';
import * as fs from 'fs';
import { SourceReadError } from '../errors';
import { CellValue, SourceTable } from '../types/record';
import { SheetSchema } from '../types/schema';
import { ParseOptions, RowCallback } from '../types/csv';
import { buildSheetTable } from './sheetTable';

/**
 * Sniff the delimiter of a sheet export from its header line.
 * Exports may be comma or tab-separated whatever their extension; tabs win a tie.
 */
export function detectDelimiter(filePath: string): ',' | '\t' {
  let sample: string;
  try {
    sample = fs.readFileSync(filePath, { encoding: 'utf-8' }).slice(0, 4096);
  } catch (err) {
    const reason = err instanceof Error ? err.message : 'Unknown error';
    throw new SourceReadError(filePath, `Cannot read ${filePath}: ${reason}`, { cause: err });
  }

  const firstLine = sample.replace(/^\ufeff/, '').split(/\r?\n/)[0] ?? '';
  const tabCount = (firstLine.match(/\t/g) || []).length;
  const commaCount = (firstLine.match(/,/g) || []).length;

  return tabCount > 0 && tabCount >= commaCount ? '\t' : ',';
}

/**
 * Stream raw rows out of a delimited file, one callback per row (header included).
 * Empty lines are skipped.
 */
export function parseCSVStream(
  stream: Readable,
  onRow: RowCallback,
  options: ParseOptions = {}
): Promise<void> {
  return new Promise((resolve, reject) => {
    const parser = parse({
      delimiter: options.delimiter || ',',
      skip_empty_lines: true,
      trim: options.trim !== false,
      bom: true,
      relax_column_count: true,
    });

    let lineNumber = 0;
    let failed = false;

    const fail = (err: unknown) => {
      if (failed) return;
      failed = true;
      stream.unpipe(parser);
      stream.destroy();
      parser.destroy();
      reject(err);
    };

    parser.on('readable', () => {
      let row: string[] | null;
      while ((row = parser.read()) !== null) {
        lineNumber++;
        try {
          onRow(row, lineNumber);
        } catch (err) {
          fail(err);
          return;
        }
      }
    });

    stream.on('error', fail);
    parser.on('error', fail);
    parser.on('end', () => {
      if (!failed) resolve();
    });

    stream.pipe(parser);
  });
}

/**
 * Read a per-sheet export (e.g. Station.csv) into a table.
 */
export async function readDelimitedSheet(filePath: string, schema: SheetSchema): Promise<SourceTable> {
  const delimiter = detectDelimiter(filePath);
  const rows: CellValue[][] = [];

  try {
    await parseCSVStream(
      fs.createReadStream(filePath),
      row => {
        rows.push(row);
      },
      { delimiter, trim: false }
    );
  } catch (err) {
    const reason = err instanceof Error ? err.message : 'Unknown error';
    throw new SourceReadError(filePath, `Cannot parse ${filePath}: ${reason}`, { cause: err });
  }

  const [headerCells = [], ...dataRows] = rows;
  return buildSheetTable(headerCells, dataRows, schema, filePath);
}
