#!/usr/bin/env node
import { buildProgram } from './commands/program';
import { describeError } from './errors';

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(`[Error] ${describeError(err)}`);
    process.exit(1);
  });
