import { SourceSheetKey } from './sourceSchema';

const QUDT_UNIT = 'http://qudt.org/vocab/unit/';

/**
 * What a measurement row is attached to: the individual (occurrence) or the
 * station it was sampled at (event).
 */
export type MeasurementSubject = 'occurrence' | 'event';

export interface MeasurementMapping {
  sheet: SourceSheetKey;
  column: string;
  measurementType: string;
  unit?: string;
  unitId?: string;
  subject: MeasurementSubject;
}

/**
 * Source columns pivoted into MeasurementOrFact rows. Output order follows this list.
 */
export const measurementMappings: readonly MeasurementMapping[] = [
  // Organism measurements
  { sheet: 'measurements', column: 'TL_mm', measurementType: 'total length', unit: 'mm', unitId: `${QUDT_UNIT}MilliM`, subject: 'occurrence' },
  { sheet: 'measurements', column: 'Wt_g_recorded', measurementType: 'weight (recorded)', unit: 'g', unitId: `${QUDT_UNIT}GM`, subject: 'occurrence' },
  { sheet: 'measurements', column: 'scale_tare_g', measurementType: 'scale tare weight', unit: 'g', unitId: `${QUDT_UNIT}GM`, subject: 'occurrence' },
  { sheet: 'measurements', column: 'Wt_g', measurementType: 'weight', unit: 'g', unitId: `${QUDT_UNIT}GM`, subject: 'occurrence' },
  { sheet: 'measurements', column: 'Retained', measurementType: 'retained', subject: 'occurrence' },

  // Station conditions
  { sheet: 'station', column: 'wind_speed', measurementType: 'wind speed', unit: 'kn', unitId: `${QUDT_UNIT}KN`, subject: 'event' },
  { sheet: 'station', column: 'wind_dir', measurementType: 'wind direction', subject: 'event' },
  { sheet: 'station', column: 'wave_height', measurementType: 'wave height', subject: 'event' },
  { sheet: 'station', column: 'cloud_cover_10th', measurementType: 'cloud cover', unit: 'tenths', subject: 'event' },
  { sheet: 'station', column: 'ropeless_id', measurementType: 'ropeless gear ID', subject: 'event' },
  { sheet: 'station', column: 'cruise_id', measurementType: 'cruise ID', subject: 'event' },

  // Gear
  { sheet: 'cpue', column: 'Pot_position', measurementType: 'pot position', subject: 'event' },
  { sheet: 'cpue', column: 'Pot_ID', measurementType: 'pot ID', subject: 'event' },
  { sheet: 'cpue', column: 'Near_Far', measurementType: 'distance category', subject: 'event' },
  { sheet: 'measurements', column: 'Near/Far', measurementType: 'distance category', subject: 'event' },
];
