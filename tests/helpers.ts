import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CellValue, SourceRow, SourceTable } from '../src/types/record';
import { SheetSchema } from '../src/types/schema';
import { sourceSchemas } from '../src/config/sourceSchema';
import { SourceTables } from '../src/parsers/sourceLoader';
import { writeWorkbook } from '../sandbox/workbookFixtures';

export const FIXTURE_DIR = path.join(__dirname, 'fixtures', 'survey');

/**
 * In-memory table in the shape the loaders produce; unspecified columns are null.
 */
export function makeTable(schema: SheetSchema, rows: Record<string, CellValue>[]): SourceTable {
  return {
    sheet: schema.name,
    columns: schema.columns.map(column => column.columnName),
    rows: rows.map(partial => {
      const row: SourceRow = {};
      for (const column of schema.columns) {
        row[column.columnName] = partial[column.columnName] ?? null;
      }
      return row;
    }),
  };
}

export function makeTables(parts: {
  station?: Record<string, CellValue>[];
  cpue?: Record<string, CellValue>[];
  measurements?: Record<string, CellValue>[];
}): SourceTables {
  return {
    station: makeTable(sourceSchemas.station, parts.station ?? []),
    cpue: makeTable(sourceSchemas.cpue, parts.cpue ?? []),
    measurements: makeTable(sourceSchemas.measurements, parts.measurements ?? []),
  };
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'survey-dwc-'));
}

/**
 * Write the survey held in fixtures/survey as a workbook with native cell types.
 */
export async function writeFixtureWorkbook(filePath: string): Promise<void> {
  await writeWorkbook(filePath, [
    {
      name: sourceSchemas.station.name,
      headers: sourceSchemas.station.columns.map(column => column.columnName),
      rows: [
        ['S01', 7, 'deployment', new Date(Date.UTC(2024, 5, 3, 11, 45, 0)), -71.25, 41.1, -71.24, 41.11, 22, 10, 'SW', '1-2 ft', 3, 'RL-101', null, 'A. Rivera'],
        ['S02', 7, 'deployment', new Date(Date.UTC(2024, 5, 3, 12, 30, 0)), -71.3, 41.15, null, null, 25, null, 'W', null, 5, null, 'buoy missing, reset', 'A. Rivera'],
        ['S03', 7, 'recovery', new Date(Date.UTC(2024, 5, 5, 9, 10, 0)), -71.25, 41.1, -71.26, 41.09, 23, 8, 'S', '2-3 ft', null, 'RL-101', null, 'B. Chen'],
      ],
    },
    {
      name: sourceSchemas.cpue.name,
      headers: sourceSchemas.cpue.columns.map(column => column.columnName),
      rows: [
        ['S01', 'P1', 'black sea bass', 4, 1, 'near', null],
        ['S01', 'P2', 'scup', 0, 2, 'far', 'empty pot'],
        ['S03', 'P1', 'black sea bass', 2, 1, null, null],
      ],
    },
    {
      name: sourceSchemas.measurements.name,
      headers: sourceSchemas.measurements.columns.map(column => column.columnName),
      rows: [
        ['S01', 'black sea bass', 310, 455, 12, 443, 'M', 'Y', 'mild', 'calm', 'near'],
        ['S01', 'black sea bass', 295, null, null, 390, 'F', 'N', null, null, 'near'],
        ['S03', 'black sea bass', 402, 980, null, 980, 'U', null, 'everted stomach', null, null],
      ],
    },
  ]);
}
