import { Command } from 'commander';
import { parseDelimiter } from '../config/settings';
import { runPipeline, PipelineOptions } from '../pipeline';

interface CliOptions {
  outputDir?: string;
  prefix?: string;
  delimiter?: string;
  quiet?: boolean;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('survey-dwc-export')
    .description('Convert a pot-survey workbook into Darwin Core event, occurrence and measurementorfact tables')
    .argument('[source]', 'workbook (.xlsx) or directory of Station/CPUE/Measurements exports (default: $SOURCE_PATH)')
    .option('-o, --output-dir <dir>', 'output directory (default: $OUTPUT_DIR or "outputs")')
    .option('-p, --prefix <prefix>', 'output file name prefix (default: $OUTPUT_PREFIX or "dwc_")')
    .option('-d, --delimiter <delimiter>', 'output delimiter: "," or "tab"')
    .option('-q, --quiet', 'only print warnings and errors')
    .action(async (source: string | undefined, options: CliOptions) => {
      const pipelineOptions: PipelineOptions = {
        sourcePath: source,
        outputDir: options.outputDir,
        outputPrefix: options.prefix,
        delimiter: options.delimiter === undefined ? undefined : parseDelimiter(options.delimiter),
        quiet: options.quiet,
      };

      const summary = await runPipeline(pipelineOptions);
      if (!options.quiet) {
        console.log(
          `[Done] ${summary.events} events, ${summary.occurrences} occurrences, ${summary.measurements} measurements` +
            (summary.issues.length > 0 ? ` (${summary.issues.length} integrity warning(s))` : '')
        );
      }
    });

  return program;
}
