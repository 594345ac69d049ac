#!/usr/bin/env node
import { ExitCode } from './domain/model/RunOutcome.js';
import { runCli } from './cli/runCli.js';

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`isolation-sources: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = ExitCode.INTERNAL_ERROR;
  },
);
