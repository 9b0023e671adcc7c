import { OutputTable } from './record';

/**
 * Darwin Core output tables. Column order here is the column order on disk.
 */

export const EVENT_COLUMNS = [
  'eventID',
  'eventDate',
  'eventType',
  'parentEventID',
  'footprintWKT',
  'locationID',
  'decimalLatitude',
  'decimalLongitude',
  'minimumDepthInMeters',
  'maximumDepthInMeters',
  'eventRemarks',
  'recordedBy',
] as const;

export const OCCURRENCE_COLUMNS = [
  'occurrenceID',
  'eventID',
  'vernacularName',
  'individualCount',
  'sex',
  'basisOfRecord',
  'occurrenceRemarks',
] as const;

export const MEASUREMENT_COLUMNS = [
  'occurrenceID',
  'eventID',
  'measurementType',
  'measurementValue',
  'measurementUnit',
  'measurementUnitID',
] as const;

export type EventColumn = (typeof EVENT_COLUMNS)[number];
export type OccurrenceColumn = (typeof OCCURRENCE_COLUMNS)[number];
export type MeasurementColumn = (typeof MEASUREMENT_COLUMNS)[number];

export type EventTable = OutputTable<EventColumn>;
export type OccurrenceTable = OutputTable<OccurrenceColumn>;
export type MeasurementTable = OutputTable<MeasurementColumn>;

export interface DwcArchive {
  event: EventTable;
  occurrence: OccurrenceTable;
  measurementOrFact: MeasurementTable;
}

export const BASIS_OF_RECORD = 'HumanObservation';
