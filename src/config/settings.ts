/**
 * Run configuration, read from the environment once at start-up.
 * CLI flags take precedence over these values.
 */

export type OutputDelimiter = ',' | '\t';

export interface Settings {
  sourcePath: string;
  outputDir: string;
  outputPrefix: string;
  delimiter: OutputDelimiter;
}

export function parseDelimiter(value: string | undefined): OutputDelimiter {
  if (value === undefined || value === '' || value === ',' || value.toLowerCase() === 'comma') {
    return ',';
  }
  if (value === '\t' || value === '\\t' || value.toLowerCase() === 'tab') {
    return '\t';
  }
  throw new Error(`Unsupported delimiter "${value}" (expected "," or "tab")`);
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return {
    sourcePath: env.SOURCE_PATH || 'Data_sample.xlsx',
    outputDir: env.OUTPUT_DIR || 'outputs',
    outputPrefix: env.OUTPUT_PREFIX ?? 'dwc_',
    delimiter: parseDelimiter(env.OUTPUT_DELIMITER),
  };
}
