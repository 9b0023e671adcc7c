import { DwcArchive } from '../types/dwc';

export type IssueCode =
  | 'DUPLICATE_EVENT_ID'
  | 'DUPLICATE_OCCURRENCE_ID'
  | 'ORPHAN_PARENT_EVENT'
  | 'ORPHAN_OCCURRENCE'
  | 'MOF_SUBJECT_NOT_EXCLUSIVE'
  | 'ORPHAN_MOF_OCCURRENCE'
  | 'ORPHAN_MOF_EVENT';

export interface ArchiveIssue {
  table: 'event' | 'occurrence' | 'measurementorfact';
  /** 0-based index into the table's rows */
  rowIndex: number;
  code: IssueCode;
  message: string;
}

function collectIds(
  ids: (string | null)[],
  onDuplicate: (id: string, rowIndex: number) => void
): Set<string> {
  const seen = new Set<string>();
  ids.forEach((id, rowIndex) => {
    if (id === null) return;
    if (seen.has(id)) {
      onDuplicate(id, rowIndex);
    }
    seen.add(id);
  });
  return seen;
}

/**
 * Check identifier uniqueness and the links between the three tables.
 * Issues are reported, not thrown: the archive is still written.
 */
export function validateArchive(archive: DwcArchive): ArchiveIssue[] {
  const issues: ArchiveIssue[] = [];

  const eventIds = collectIds(
    archive.event.rows.map(row => row.eventID),
    (id, rowIndex) =>
      issues.push({ table: 'event', rowIndex, code: 'DUPLICATE_EVENT_ID', message: `Duplicate eventID "${id}"` })
  );

  archive.event.rows.forEach((row, rowIndex) => {
    if (row.parentEventID !== null && !eventIds.has(row.parentEventID)) {
      issues.push({
        table: 'event',
        rowIndex,
        code: 'ORPHAN_PARENT_EVENT',
        message: `parentEventID "${row.parentEventID}" does not match any event`,
      });
    }
  });

  const occurrenceIds = collectIds(
    archive.occurrence.rows.map(row => row.occurrenceID),
    (id, rowIndex) =>
      issues.push({
        table: 'occurrence',
        rowIndex,
        code: 'DUPLICATE_OCCURRENCE_ID',
        message: `Duplicate occurrenceID "${id}"`,
      })
  );

  archive.occurrence.rows.forEach((row, rowIndex) => {
    if (row.eventID === null || !eventIds.has(row.eventID)) {
      issues.push({
        table: 'occurrence',
        rowIndex,
        code: 'ORPHAN_OCCURRENCE',
        message: `eventID "${row.eventID ?? ''}" does not match any event`,
      });
    }
  });

  archive.measurementOrFact.rows.forEach((row, rowIndex) => {
    const hasOccurrence = row.occurrenceID !== null;
    const hasEvent = row.eventID !== null;

    if (hasOccurrence === hasEvent) {
      issues.push({
        table: 'measurementorfact',
        rowIndex,
        code: 'MOF_SUBJECT_NOT_EXCLUSIVE',
        message: `"${row.measurementType ?? ''}" must reference exactly one of occurrenceID or eventID`,
      });
      return;
    }
    if (row.occurrenceID !== null && !occurrenceIds.has(row.occurrenceID)) {
      issues.push({
        table: 'measurementorfact',
        rowIndex,
        code: 'ORPHAN_MOF_OCCURRENCE',
        message: `occurrenceID "${row.occurrenceID}" does not match any occurrence`,
      });
    }
    if (row.eventID !== null && !eventIds.has(row.eventID)) {
      issues.push({
        table: 'measurementorfact',
        rowIndex,
        code: 'ORPHAN_MOF_EVENT',
        message: `eventID "${row.eventID}" does not match any event`,
      });
    }
  });

  return issues;
}
