import { EVENT_COLUMNS, EventColumn, EventTable } from '../types/dwc';
import { CellValue, OutputRow, SourceRow, SourceTable } from '../types/record';
import { formatCell, joinKey } from './format';

type EventRow = OutputRow<EventColumn>;

interface CruiseGroup {
  eventID: string;
  type: CellValue;
  firstDatetime: CellValue;
  rows: SourceRow[];
}

function coordinatePair(lon: CellValue, lat: CellValue): string | null {
  if (lon === null || lat === null) {
    return null;
  }
  return `${formatCell(lon)} ${formatCell(lat)}`;
}

/**
 * WKT LINESTRING through every start point of the cruise's stations, then every end point.
 * Pairs with a missing coordinate are dropped. Fewer than two points still render
 * (`LINESTRING ()`, `LINESTRING (x y)`).
 */
export function buildFootprintWKT(rows: SourceRow[]): string {
  const starts = rows.map(row => coordinatePair(row.lon_start, row.lat_start));
  const ends = rows.map(row => coordinatePair(row.lon_end, row.lat_end));
  const coords = [...starts, ...ends].filter((pair): pair is string => pair !== null);
  return `LINESTRING (${coords.join(', ')})`;
}

export function cruiseEventId(row: SourceRow): string {
  return joinKey([row.cruise_id, row.type]);
}

/**
 * One root event per (cruise_id, type), in the order the pairs first appear.
 */
export function buildCruiseEvents(station: SourceTable): EventRow[] {
  const groups = new Map<string, CruiseGroup>();

  for (const row of station.rows) {
    const eventID = cruiseEventId(row);
    const group = groups.get(eventID);
    if (group) {
      group.rows.push(row);
    } else {
      groups.set(eventID, { eventID, type: row.type, firstDatetime: row.datetime, rows: [row] });
    }
  }

  return [...groups.values()].map(group => ({
    eventID: group.eventID,
    eventDate: formatCell(group.firstDatetime),
    eventType: `${formatCell(group.type) ?? ''} cruise`,
    parentEventID: null,
    footprintWKT: buildFootprintWKT(group.rows),
    locationID: null,
    decimalLatitude: null,
    decimalLongitude: null,
    minimumDepthInMeters: null,
    maximumDepthInMeters: null,
    eventRemarks: null,
    recordedBy: null,
  }));
}

/**
 * One point event per station row, parented to its cruise event.
 */
export function buildStationEvents(station: SourceTable): EventRow[] {
  return station.rows.map(row => {
    const stationId = formatCell(row.station);
    const depth = formatCell(row.depth);
    return {
      eventID: stationId,
      eventDate: formatCell(row.datetime),
      eventType: formatCell(row.type),
      parentEventID: cruiseEventId(row),
      footprintWKT: null,
      locationID: stationId,
      decimalLatitude: formatCell(row.lat_start),
      decimalLongitude: formatCell(row.lon_start),
      minimumDepthInMeters: depth,
      maximumDepthInMeters: depth,
      eventRemarks: formatCell(row.notes),
      recordedBy: formatCell(row.participants),
    };
  });
}

export function transformEvents(station: SourceTable): EventTable {
  return {
    name: 'event',
    columns: EVENT_COLUMNS,
    rows: [...buildCruiseEvents(station), ...buildStationEvents(station)],
  };
}
