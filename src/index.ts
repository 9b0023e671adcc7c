export { runPipeline, buildArchive, outputFileNames } from './pipeline';
export type { PipelineOptions, PipelineSummary, ArchiveFileNames } from './pipeline';
export { loadSettings, parseDelimiter } from './config/settings';
export type { Settings, OutputDelimiter } from './config/settings';
export { sourceSchemas, stationSchema, cpueSchema, measurementsSchema } from './config/sourceSchema';
export { measurementMappings } from './config/measurementMappings';
export type { MeasurementMapping, MeasurementSubject } from './config/measurementMappings';
export { loadSourceTables } from './parsers/sourceLoader';
export type { SourceTables } from './parsers/sourceLoader';
export { transformEvents, buildFootprintWKT } from './transformers/eventTransformer';
export { transformOccurrences, combineRemarks } from './transformers/occurrenceTransformer';
export { transformMeasurements } from './transformers/measurementTransformer';
export { validateArchive } from './validators/archiveValidator';
export type { ArchiveIssue, IssueCode } from './validators/archiveValidator';
export { serializeTable, writeTable } from './writers/csvWriter';
export { PipelineError, SourceReadError, SchemaMismatchError, SinkWriteError } from './errors';
export * from './types/dwc';
export type { CellValue, SourceRow, SourceTable, OutputRow, OutputTable, OutputValue } from './types/record';
