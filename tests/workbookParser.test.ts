import { describe, it, expect, beforeAll } from 'vitest';
import * as path from 'path';
import { Workbook } from 'exceljs';
import { normalizeCellValue, openWorkbook, readSheet } from '../src/parsers/workbookParser';
import { loadSourceTables } from '../src/parsers/sourceLoader';
import { cpueSchema, stationSchema } from '../src/config/sourceSchema';
import { SchemaMismatchError, SourceReadError } from '../src/errors';
import { writeWorkbook, generateSurveySheets } from '../sandbox/workbookFixtures';
import { FIXTURE_DIR, makeTempDir } from './helpers';

const deployedAt = new Date(Date.UTC(2024, 5, 3, 11, 45, 0));

describe('normalizeCellValue', () => {
  it('passes primitives and dates through', () => {
    expect(normalizeCellValue(42)).toBe(42);
    expect(normalizeCellValue('scup')).toBe('scup');
    expect(normalizeCellValue(true)).toBe(true);
    expect(normalizeCellValue(deployedAt)).toBe(deployedAt);
    expect(normalizeCellValue(null)).toBeNull();
    expect(normalizeCellValue(undefined)).toBeNull();
  });

  it('flattens rich text, hyperlinks and formula results', () => {
    expect(normalizeCellValue({ richText: [{ text: 'black ' }, { text: 'sea bass' }] })).toBe('black sea bass');
    expect(normalizeCellValue({ text: 'RL-101', hyperlink: 'https://example.org/rl/101' })).toBe('RL-101');
    expect(normalizeCellValue({ formula: 'A1-B1', result: 443, date1904: false })).toBe(443);
  });

  it('treats error cells as empty', () => {
    expect(normalizeCellValue({ error: '#N/A' })).toBeNull();
  });
});

describe('workbook loading', () => {
  let workbookPath: string;

  beforeAll(async () => {
    workbookPath = path.join(makeTempDir(), 'survey.xlsx');
    await writeWorkbook(workbookPath, [
      {
        name: 'Station',
        headers: stationSchema.columns.map(c => c.columnName),
        rows: [
          ['S01', 7, 'deployment', deployedAt, -71.25, 41.1, -71.24, 41.11, 22, 10, 'SW', '1-2 ft', 3, 'RL-101', null, 'A. Rivera'],
          [null, null, null, null, null, null, null, null, null, null, null, null, null, null, null, null],
          ['S02', 7, 'deployment', deployedAt, -71.3, 41.15, null, null, 25, null, 'W', null, 5, null, '  ', 'A. Rivera'],
        ],
      },
      {
        name: 'CPUE',
        headers: cpueSchema.columns.map(c => c.columnName),
        rows: [['S01', 'P1', 'scup', 3, 1, 'near', null]],
      },
      {
        name: 'Measurements',
        headers: ['Station', 'Species', 'TL_mm', 'Wt_g_recorded', 'scale_tare_g', 'Wt_g', 'Sex', 'Retained', 'Barotrauma', 'Notes', 'Near/Far'],
        rows: [],
      },
    ]);
  });

  it('keeps native cell types and skips blank rows', async () => {
    const workbook = await openWorkbook(workbookPath);
    const table = readSheet(workbook, stationSchema, workbookPath);

    expect(table.rows).toHaveLength(2);
    expect(table.rows[0].cruise_id).toBe(7);
    expect(table.rows[0].lon_start).toBe(-71.25);
    expect(table.rows[0].datetime).toEqual(deployedAt);
    expect(table.rows[1].notes).toBeNull();
  });

  it('loads all three sheets from a workbook path', async () => {
    const tables = await loadSourceTables(workbookPath);
    expect(tables.station.rows).toHaveLength(2);
    expect(tables.cpue.rows).toEqual([
      { Station: 'S01', Pot_ID: 'P1', Species: 'scup', Catch: 3, Pot_position: 1, Near_Far: 'near', Notes: null },
    ]);
    expect(tables.measurements.rows).toEqual([]);
  });

  it('fails with SourceReadError when a sheet is absent', async () => {
    const workbook = new Workbook();
    workbook.addWorksheet('Station');
    expect(() => readSheet(workbook, cpueSchema, 'memory.xlsx')).toThrow(
      'Workbook memory.xlsx has no sheet named "CPUE"'
    );
  });

  it('fails with SourceReadError when a sheet has no header row', () => {
    const workbook = new Workbook();
    workbook.addWorksheet('CPUE');
    expect(() => readSheet(workbook, cpueSchema, 'memory.xlsx')).toThrow(SourceReadError);
  });

  it('fails with SchemaMismatchError when a column is absent', () => {
    const workbook = new Workbook();
    workbook.addWorksheet('CPUE').addRow(['Station', 'Pot_ID', 'Species', 'Catch', 'Pot_position', 'Notes']);
    expect(() => readSheet(workbook, cpueSchema, 'memory.xlsx')).toThrow(SchemaMismatchError);
  });

  it('fails with SourceReadError when the workbook cannot be opened', async () => {
    await expect(openWorkbook(path.join(FIXTURE_DIR, 'CPUE.csv'))).rejects.toBeInstanceOf(SourceReadError);
    await expect(loadSourceTables(path.join(makeTempDir(), 'missing.xlsx'))).rejects.toThrow('Source not found');
  });

  it('reads a generated sample survey', async () => {
    const samplePath = path.join(makeTempDir(), 'sample.xlsx');
    const sheets = generateSurveySheets(6, 3);
    await writeWorkbook(samplePath, sheets);

    const tables = await loadSourceTables(samplePath);
    expect(tables.station.rows).toHaveLength(6);
    expect(tables.cpue.rows).toHaveLength(sheets[1].rows.length);
    expect(tables.measurements.rows).toHaveLength(sheets[2].rows.length);
    expect(new Set(tables.station.rows.map(row => row.type))).toEqual(new Set(['deployment', 'recovery']));
  });
});

describe('directory sources', () => {
  it('loads per-sheet exports from a directory', async () => {
    const tables = await loadSourceTables(FIXTURE_DIR);
    expect(tables.station.rows.map(row => row.station)).toEqual(['S01', 'S02', 'S03']);
    expect(tables.cpue.rows).toHaveLength(3);
    expect(tables.measurements.rows).toHaveLength(3);
  });

  it('fails with SourceReadError when an export is missing', async () => {
    await expect(loadSourceTables(makeTempDir())).rejects.toThrow(
      /No export for sheet "Station"/
    );
  });
});
