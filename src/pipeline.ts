import * as path from 'path';
import { eachSeries } from 'async';
import { loadSettings, Settings, OutputDelimiter } from './config/settings';
import { loadSourceTables, SourceTables } from './parsers/sourceLoader';
import { transformEvents } from './transformers/eventTransformer';
import { transformOccurrences } from './transformers/occurrenceTransformer';
import { transformMeasurements } from './transformers/measurementTransformer';
import { validateArchive, ArchiveIssue } from './validators/archiveValidator';
import { serializeTable, writeTextFile } from './writers/csvWriter';
import { DwcArchive } from './types/dwc';

export interface PipelineOptions extends Partial<Settings> {
  /** Suppress informational logging (warnings are still printed) */
  quiet?: boolean;
}

export interface PipelineSummary {
  events: number;
  occurrences: number;
  measurements: number;
  issues: ArchiveIssue[];
  /** Paths written, in write order */
  files: string[];
}

export interface ArchiveFileNames {
  event: string;
  occurrence: string;
  measurementOrFact: string;
}

interface WriteJob {
  label: string;
  filePath: string;
  content: string;
}

export function outputFileNames(prefix: string, delimiter: OutputDelimiter): ArchiveFileNames {
  const extension = delimiter === '\t' ? 'txt' : 'csv';
  return {
    event: `${prefix}event.${extension}`,
    occurrence: `${prefix}occurrence.${extension}`,
    measurementOrFact: `${prefix}measurementorfact.${extension}`,
  };
}

/**
 * Derive the three Darwin Core tables. The transformers are independent of each other.
 */
export function buildArchive(tables: SourceTables): DwcArchive {
  return {
    event: transformEvents(tables.station),
    occurrence: transformOccurrences(tables.cpue, tables.measurements),
    measurementOrFact: transformMeasurements(tables),
  };
}

/**
 * Load the survey source, build the archive and write it. Any error aborts the run.
 */
export async function runPipeline(options: PipelineOptions = {}): Promise<PipelineSummary> {
  const { quiet } = options;
  const settings = resolveSettings(options);
  const log = (message: string) => {
    if (!quiet) console.log(message);
  };

  log(`[Load] Reading ${settings.sourcePath}`);
  const tables = await loadSourceTables(settings.sourcePath);
  log(`[Load] Station: ${tables.station.rows.length} rows`);
  log(`[Load] CPUE: ${tables.cpue.rows.length} rows`);
  log(`[Load] Measurements: ${tables.measurements.rows.length} rows`);

  const archive = buildArchive(tables);
  const cruiseCount = archive.event.rows.filter(row => row.parentEventID === null).length;
  log(`[Transform] Events: ${archive.event.rows.length} (${cruiseCount} cruise, ${archive.event.rows.length - cruiseCount} station)`);
  log(`[Transform] Occurrences: ${archive.occurrence.rows.length} (${tables.cpue.rows.length} catch, ${tables.measurements.rows.length} measured)`);
  log(`[Transform] MeasurementOrFact: ${archive.measurementOrFact.rows.length}`);

  const issues = validateArchive(archive);
  for (const issue of issues) {
    console.warn(`[Validate] ${issue.table} row ${issue.rowIndex + 1}: ${issue.code} ${issue.message}`);
  }
  if (issues.length === 0) {
    log('[Validate] No integrity issues found');
  }

  const names = outputFileNames(settings.outputPrefix, settings.delimiter);
  const writeOptions = { delimiter: settings.delimiter };
  const jobs: WriteJob[] = [
    { label: 'event', filePath: path.join(settings.outputDir, names.event), content: serializeTable(archive.event, writeOptions) },
    { label: 'occurrence', filePath: path.join(settings.outputDir, names.occurrence), content: serializeTable(archive.occurrence, writeOptions) },
    {
      label: 'measurementorfact',
      filePath: path.join(settings.outputDir, names.measurementOrFact),
      content: serializeTable(archive.measurementOrFact, writeOptions),
    },
  ];

  const files: string[] = [];
  await eachSeries(jobs, async (job: WriteJob) => {
    await writeTextFile(job.filePath, job.content);
    files.push(job.filePath);
    log(`[Write] ${job.label} -> ${job.filePath}`);
  });

  return {
    events: archive.event.rows.length,
    occurrences: archive.occurrence.rows.length,
    measurements: archive.measurementOrFact.rows.length,
    issues,
    files,
  };
}

function resolveSettings(options: PipelineOptions): Settings {
  const defaults = loadSettings();
  return {
    sourcePath: options.sourcePath ?? defaults.sourcePath,
    outputDir: options.outputDir ?? defaults.outputDir,
    outputPrefix: options.outputPrefix ?? defaults.outputPrefix,
    delimiter: options.delimiter ?? defaults.delimiter,
  };
}
