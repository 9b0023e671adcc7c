import { promises as fs } from 'fs';
import * as path from 'path';
import { SourceReadError } from '../errors';
import { sourceSchemas, SourceSheetKey } from '../config/sourceSchema';
import { SourceTable } from '../types/record';
import { SheetSchema } from '../types/schema';
import { openWorkbook, readSheet } from './workbookParser';
import { readDelimitedSheet } from './csvParser';

export type SourceTables = Record<SourceSheetKey, SourceTable>;

const EXPORT_EXTENSIONS = ['.csv', '.txt'];

async function findSheetExport(dir: string, schema: SheetSchema): Promise<string> {
  const entries = await fs.readdir(dir);
  for (const extension of EXPORT_EXTENSIONS) {
    const fileName = `${schema.name}${extension}`.toLowerCase();
    const match = entries.find(entry => entry.toLowerCase() === fileName);
    if (match) {
      return path.join(dir, match);
    }
  }
  throw new SourceReadError(
    dir,
    `No export for sheet "${schema.name}" in ${dir} (expected ${schema.name}.csv or ${schema.name}.txt)`
  );
}

/**
 * Load the Station, CPUE and Measurements tables.
 *
 * `sourcePath` is either an .xlsx workbook or a directory holding one delimited
 * export per sheet.
 */
export async function loadSourceTables(sourcePath: string): Promise<SourceTables> {
  const stats = await fs.stat(sourcePath).catch((err: unknown) => {
    throw new SourceReadError(sourcePath, `Source not found: ${sourcePath}`, { cause: err });
  });

  if (stats.isDirectory()) {
    return {
      station: await readDelimitedSheet(await findSheetExport(sourcePath, sourceSchemas.station), sourceSchemas.station),
      cpue: await readDelimitedSheet(await findSheetExport(sourcePath, sourceSchemas.cpue), sourceSchemas.cpue),
      measurements: await readDelimitedSheet(
        await findSheetExport(sourcePath, sourceSchemas.measurements),
        sourceSchemas.measurements
      ),
    };
  }

  const workbook = await openWorkbook(sourcePath);
  return {
    station: readSheet(workbook, sourceSchemas.station, sourcePath),
    cpue: readSheet(workbook, sourceSchemas.cpue, sourcePath),
    measurements: readSheet(workbook, sourceSchemas.measurements, sourcePath),
  };
}
