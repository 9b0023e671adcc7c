import { describe, it, expect } from 'vitest';
import {
  buildCpueOccurrences,
  buildMeasurementOccurrences,
  combineRemarks,
  transformOccurrences,
} from '../src/transformers/occurrenceTransformer';
import { cpueSchema, measurementsSchema } from '../src/config/sourceSchema';
import { makeTable } from './helpers';

const cpue = makeTable(cpueSchema, [
  { Station: 'S01', Pot_ID: 'P1', Species: 'scup', Catch: 3, Notes: 'gear tangled' },
  { Station: 'S01', Pot_ID: 'P1', Species: 'scup', Catch: 1 },
]);

const measurements = makeTable(measurementsSchema, [
  { Station: 'S01', Species: 'scup', Sex: 'F', Barotrauma: 'mild', Notes: 'calm' },
  { Station: 'S01', Species: 'scup', Barotrauma: 'severe' },
  { Station: 'S02', Species: 'tautog', Notes: 'tagged' },
  { Station: 'S02', Species: 'tautog' },
]);

describe('combineRemarks', () => {
  it('joins barotrauma and notes', () => {
    expect(combineRemarks(measurements.rows[0])).toBe('Barotrauma: mild; calm');
  });

  it('uses whichever part is present', () => {
    expect(combineRemarks(measurements.rows[1])).toBe('Barotrauma: severe');
    expect(combineRemarks(measurements.rows[2])).toBe('tagged');
    expect(combineRemarks(measurements.rows[3])).toBeNull();
  });
});

describe('buildCpueOccurrences', () => {
  it('maps catch records and disambiguates repeated keys with the row number', () => {
    expect(buildCpueOccurrences(cpue)).toEqual([
      {
        occurrenceID: 'S01_P1_scup_1',
        eventID: 'S01',
        vernacularName: 'scup',
        individualCount: '3',
        sex: null,
        basisOfRecord: 'HumanObservation',
        occurrenceRemarks: 'gear tangled',
      },
      {
        occurrenceID: 'S01_P1_scup_2',
        eventID: 'S01',
        vernacularName: 'scup',
        individualCount: '1',
        sex: null,
        basisOfRecord: 'HumanObservation',
        occurrenceRemarks: null,
      },
    ]);
  });
});

describe('buildMeasurementOccurrences', () => {
  it('maps measured individuals under the MEAS prefix', () => {
    const rows = buildMeasurementOccurrences(measurements);
    expect(rows.map(row => row.occurrenceID)).toEqual([
      'MEAS_S01_scup_1',
      'MEAS_S01_scup_2',
      'MEAS_S02_tautog_3',
      'MEAS_S02_tautog_4',
    ]);
    expect(rows[0]).toEqual({
      occurrenceID: 'MEAS_S01_scup_1',
      eventID: 'S01',
      vernacularName: 'scup',
      individualCount: null,
      sex: 'F',
      basisOfRecord: 'HumanObservation',
      occurrenceRemarks: 'Barotrauma: mild; calm',
    });
  });
});

describe('transformOccurrences', () => {
  it('lists catch occurrences first and keeps every occurrenceID unique', () => {
    const table = transformOccurrences(cpue, measurements);
    const ids = table.rows.map(row => row.occurrenceID);

    expect(table.rows).toHaveLength(6);
    expect(ids.slice(0, 2)).toEqual(['S01_P1_scup_1', 'S01_P1_scup_2']);
    expect(new Set(ids).size).toBe(ids.length);
  });

  it('formats missing key parts as empty text', () => {
    const table = transformOccurrences(makeTable(cpueSchema, [{ Station: 'S09', Species: 'cunner', Catch: 0 }]), makeTable(measurementsSchema, []));
    expect(table.rows[0].occurrenceID).toBe('S09__cunner_1');
  });
});
