import { measurementMappings, MeasurementMapping } from '../config/measurementMappings';
import { SourceTables } from '../parsers/sourceLoader';
import { MEASUREMENT_COLUMNS, MeasurementColumn, MeasurementTable } from '../types/dwc';
import { OutputRow, SourceRow } from '../types/record';
import { formatCell } from './format';
import { measurementOccurrenceId } from './occurrenceTransformer';

type MeasurementRow = OutputRow<MeasurementColumn>;

function eventIdFor(mapping: MeasurementMapping, row: SourceRow): string | null {
  return formatCell(mapping.sheet === 'station' ? row.station : row.Station);
}

/**
 * Rows for a single mapping: one per source row with a value in the mapped column.
 */
export function applyMeasurementMapping(mapping: MeasurementMapping, tables: SourceTables): MeasurementRow[] {
  const rows: MeasurementRow[] = [];

  tables[mapping.sheet].rows.forEach((row, index) => {
    const value = formatCell(row[mapping.column]);
    if (value === null) {
      return;
    }

    rows.push({
      occurrenceID: mapping.subject === 'occurrence' ? measurementOccurrenceId(row, index) : null,
      eventID: mapping.subject === 'event' ? eventIdFor(mapping, row) : null,
      measurementType: mapping.measurementType,
      measurementValue: value,
      measurementUnit: mapping.unit ?? null,
      measurementUnitID: mapping.unitId ?? null,
    });
  });

  return rows;
}

export function transformMeasurements(
  tables: SourceTables,
  mappings: readonly MeasurementMapping[] = measurementMappings
): MeasurementTable {
  return {
    name: 'measurementorfact',
    columns: MEASUREMENT_COLUMNS,
    rows: mappings.flatMap(mapping => applyMeasurementMapping(mapping, tables)),
  };
}
