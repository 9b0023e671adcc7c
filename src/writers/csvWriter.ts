import { stringify } from 'csv-stringify/sync';
import { promises as fs } from 'fs';
import * as path from 'path';
import { SinkWriteError } from '../errors';
import { OutputTable } from '../types/record';
import { OutputDelimiter } from '../config/settings';

export interface WriteOptions {
  delimiter?: OutputDelimiter;
}

/**
 * Render a table as delimited text: header row first, absent values as empty fields.
 */
export function serializeTable<C extends string>(table: OutputTable<C>, options: WriteOptions = {}): string {
  const records = table.rows.map(row =>
    Object.fromEntries(table.columns.map(column => [column, row[column] ?? '']))
  );

  return stringify(records, {
    header: true,
    columns: [...table.columns],
    delimiter: options.delimiter || ',',
    record_delimiter: 'unix',
  });
}

/**
 * Write text to a file, creating parent directories as needed.
 */
export async function writeTextFile(filePath: string, content: string): Promise<void> {
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
  } catch (err) {
    throw new SinkWriteError(filePath, { cause: err });
  }
}

export async function writeTable<C extends string>(
  table: OutputTable<C>,
  filePath: string,
  options: WriteOptions = {}
): Promise<void> {
  await writeTextFile(filePath, serializeTable(table, options));
}
