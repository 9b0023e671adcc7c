/**
 * Errors that abort a conversion run.
 *
 * Every failure is fatal: the pipeline never writes partial output or retries.
 */
export class PipelineError extends Error {
  readonly details?: unknown;

  constructor(message: string, details?: unknown, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.details = details;
  }
}

/** The source workbook, directory or sheet could not be read. */
export class SourceReadError extends PipelineError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super(message, { source }, options);
    this.name = 'SourceReadError';
    this.source = source;
  }
}

/** A loaded sheet lacks columns the transformers depend on. */
export class SchemaMismatchError extends PipelineError {
  readonly sheet: string;
  readonly missingColumns: string[];

  constructor(sheet: string, missingColumns: string[]) {
    super(
      `Sheet "${sheet}" is missing required column(s): ${missingColumns.join(', ')}`,
      { sheet, missingColumns }
    );
    this.name = 'SchemaMismatchError';
    this.sheet = sheet;
    this.missingColumns = missingColumns;
  }
}

/** An output file could not be created or written. */
export class SinkWriteError extends PipelineError {
  readonly destination: string;

  constructor(destination: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Cannot write ${destination}${reason}`, { destination }, options);
    this.name = 'SinkWriteError';
    this.destination = destination;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return `${err.name}: ${err.message}`;
  }
  return String(err);
}
