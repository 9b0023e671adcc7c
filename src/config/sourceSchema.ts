import { SheetSchema } from '../types/schema';

/**
 * Column layout of the survey workbook.
 *
 * Column names are the canonical keys of loaded rows. Workbook cells keep their
 * native type; the `type` only applies to text read from CSV/TSV exports.
 */
export const stationSchema: SheetSchema = {
  name: 'Station',
  columns: [
    { columnName: 'station', type: 'string' },
    { columnName: 'cruise_id', type: 'auto' },
    { columnName: 'type', type: 'string' },
    { columnName: 'datetime', type: 'date' },
    { columnName: 'lon_start', type: 'number' },
    { columnName: 'lat_start', type: 'number' },
    { columnName: 'lon_end', type: 'number' },
    { columnName: 'lat_end', type: 'number' },
    { columnName: 'depth', type: 'number' },
    { columnName: 'wind_speed', type: 'number' },
    { columnName: 'wind_dir', type: 'string' },
    { columnName: 'wave_height', type: 'auto' },
    { columnName: 'cloud_cover_10th', type: 'number' },
    { columnName: 'ropeless_id', type: 'auto' },
    { columnName: 'notes', type: 'string' },
    { columnName: 'participants', type: 'string' },
  ],
};

export const cpueSchema: SheetSchema = {
  name: 'CPUE',
  columns: [
    { columnName: 'Station', type: 'string' },
    { columnName: 'Pot_ID', type: 'auto' },
    { columnName: 'Species', type: 'string' },
    { columnName: 'Catch', type: 'number' },
    { columnName: 'Pot_position', type: 'auto' },
    { columnName: 'Near_Far', type: 'string' },
    { columnName: 'Notes', type: 'string' },
  ],
};

export const measurementsSchema: SheetSchema = {
  name: 'Measurements',
  columns: [
    { columnName: 'Station', type: 'string' },
    { columnName: 'Species', type: 'string' },
    { columnName: 'TL_mm', type: 'number' },
    { columnName: 'Wt_g_recorded', type: 'number' },
    { columnName: 'scale_tare_g', type: 'number' },
    { columnName: 'Wt_g', type: 'number' },
    { columnName: 'Sex', type: 'string' },
    { columnName: 'Retained', type: 'auto' },
    { columnName: 'Barotrauma', type: 'string' },
    { columnName: 'Notes', type: 'string' },
    { columnName: 'Near/Far', type: 'string' },
  ],
};

export const sourceSchemas = {
  station: stationSchema,
  cpue: cpueSchema,
  measurements: measurementsSchema,
} as const;

export type SourceSheetKey = keyof typeof sourceSchemas;
