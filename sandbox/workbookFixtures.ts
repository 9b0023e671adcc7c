import { Workbook } from 'exceljs';
import { CellValue } from '../src/types/record';
import { cpueSchema, measurementsSchema, stationSchema } from '../src/config/sourceSchema';

export interface SheetData {
  name: string;
  headers: string[];
  rows: CellValue[][];
}

// Sample data pools for generating survey records
const speciesPool = ['black sea bass', 'scup', 'tautog', 'cunner', 'jonah crab', 'american lobster'];
const windDirections = ['N', 'NE', 'E', 'SE', 'S', 'SW', 'W', 'NW'];
const sexes = ['M', 'F', 'U'];
const barotraumaSigns = ['none', 'mild', 'everted stomach', 'bulging eyes'];
const crew = ['R. Alvarez', 'K. Osei', 'M. Lindqvist', 'T. Nakamura'];

function randomElement<T>(arr: T[]): T {
  return arr[Math.floor(Math.random() * arr.length)];
}

function randomInt(min: number, max: number): number {
  return Math.floor(Math.random() * (max - min + 1)) + min;
}

function randomFloat(min: number, max: number, decimals: number = 4): number {
  return Number((Math.random() * (max - min) + min).toFixed(decimals));
}

function maybe<T>(value: T, probability: number = 0.8): T | null {
  return Math.random() < probability ? value : null;
}

/**
 * Write sheets to an .xlsx file. Row 1 of each sheet is its header row.
 */
export async function writeWorkbook(filePath: string, sheets: SheetData[]): Promise<void> {
  const workbook = new Workbook();
  for (const sheet of sheets) {
    const worksheet = workbook.addWorksheet(sheet.name);
    worksheet.addRow(sheet.headers);
    for (const row of sheet.rows) {
      worksheet.addRow(row);
    }
  }
  await workbook.xlsx.writeFile(filePath);
}

/**
 * Random survey with `stationCount` stations split over deployment and recovery trips.
 */
export function generateSurveySheets(stationCount: number, cruiseId: number = 1): SheetData[] {
  const stationRows: CellValue[][] = [];
  const cpueRows: CellValue[][] = [];
  const measurementRows: CellValue[][] = [];
  const start = Date.UTC(2024, 5, 3, 11, 0, 0);

  for (let i = 1; i <= stationCount; i++) {
    const station = `S${String(i).padStart(3, '0')}`;
    const type = i <= Math.ceil(stationCount / 2) ? 'deployment' : 'recovery';
    const lon = randomFloat(-71.6, -70.8);
    const lat = randomFloat(40.9, 41.4);

    stationRows.push([
      station,
      cruiseId,
      type,
      new Date(start + i * 45 * 60 * 1000),
      lon,
      lat,
      maybe(randomFloat(lon - 0.01, lon + 0.01)),
      maybe(randomFloat(lat - 0.01, lat + 0.01)),
      randomInt(12, 45),
      maybe(randomInt(2, 22)),
      maybe(randomElement(windDirections)),
      maybe(`${randomInt(1, 4)}-${randomInt(4, 6)} ft`),
      maybe(randomInt(0, 10)),
      maybe(`RL-${randomInt(100, 199)}`, 0.5),
      maybe('routine set', 0.3),
      randomElement(crew),
    ]);

    const potCount = randomInt(1, 4);
    for (let pot = 1; pot <= potCount; pot++) {
      const species = randomElement(speciesPool);
      cpueRows.push([
        station,
        `P${pot}`,
        species,
        randomInt(0, 12),
        pot,
        randomElement(['near', 'far']),
        maybe('ghost gear nearby', 0.1),
      ]);

      const measuredCount = randomInt(0, 2);
      for (let fish = 0; fish < measuredCount; fish++) {
        const weight = randomInt(150, 1800);
        const tare = maybe(randomInt(5, 20), 0.5);
        measurementRows.push([
          station,
          species,
          randomInt(180, 520),
          weight,
          tare,
          tare === null ? weight : weight - tare,
          randomElement(sexes),
          randomElement(['Y', 'N']),
          maybe(randomElement(barotraumaSigns), 0.4),
          maybe('tagged', 0.2),
          randomElement(['near', 'far']),
        ]);
      }
    }
  }

  return [
    { name: stationSchema.name, headers: stationSchema.columns.map(c => c.columnName), rows: stationRows },
    { name: cpueSchema.name, headers: cpueSchema.columns.map(c => c.columnName), rows: cpueRows },
    { name: measurementsSchema.name, headers: measurementsSchema.columns.map(c => c.columnName), rows: measurementRows },
  ];
}
