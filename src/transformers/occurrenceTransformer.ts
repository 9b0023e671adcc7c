import { BASIS_OF_RECORD, OCCURRENCE_COLUMNS, OccurrenceColumn, OccurrenceTable } from '../types/dwc';
import { OutputRow, SourceRow, SourceTable } from '../types/record';
import { formatCell, joinKey } from './format';

type OccurrenceRow = OutputRow<OccurrenceColumn>;

export const MEASUREMENT_OCCURRENCE_TAG = 'MEAS';

/** `Station_Pot_ID_Species_n`, n counting CPUE rows from 1. */
export function cpueOccurrenceId(row: SourceRow, index: number): string {
  return joinKey([row.Station, row.Pot_ID, row.Species, index + 1]);
}

/** `MEAS_Station_Species_n`, n counting Measurements rows from 1. */
export function measurementOccurrenceId(row: SourceRow, index: number): string {
  return joinKey([MEASUREMENT_OCCURRENCE_TAG, row.Station, row.Species, index + 1]);
}

export function combineRemarks(row: SourceRow): string | null {
  const barotrauma = formatCell(row.Barotrauma);
  const notes = formatCell(row.Notes);

  if (barotrauma !== null && notes !== null) {
    return `Barotrauma: ${barotrauma}; ${notes}`;
  }
  if (barotrauma !== null) {
    return `Barotrauma: ${barotrauma}`;
  }
  return notes;
}

export function buildCpueOccurrences(cpue: SourceTable): OccurrenceRow[] {
  return cpue.rows.map((row, index) => ({
    occurrenceID: cpueOccurrenceId(row, index),
    eventID: formatCell(row.Station),
    vernacularName: formatCell(row.Species),
    individualCount: formatCell(row.Catch),
    sex: null,
    basisOfRecord: BASIS_OF_RECORD,
    occurrenceRemarks: formatCell(row.Notes),
  }));
}

export function buildMeasurementOccurrences(measurements: SourceTable): OccurrenceRow[] {
  return measurements.rows.map((row, index) => ({
    occurrenceID: measurementOccurrenceId(row, index),
    eventID: formatCell(row.Station),
    vernacularName: formatCell(row.Species),
    individualCount: null,
    sex: formatCell(row.Sex),
    basisOfRecord: BASIS_OF_RECORD,
    occurrenceRemarks: combineRemarks(row),
  }));
}

/**
 * Catch records first, then individually measured organisms.
 */
export function transformOccurrences(cpue: SourceTable, measurements: SourceTable): OccurrenceTable {
  return {
    name: 'occurrence',
    columns: OCCURRENCE_COLUMNS,
    rows: [...buildCpueOccurrences(cpue), ...buildMeasurementOccurrences(measurements)],
  };
}
