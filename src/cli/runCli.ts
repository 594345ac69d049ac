import { existsSync, statSync } from 'node:fs';
import { ExitCode } from '../domain/model/RunOutcome.js';
import type { LogSink } from '../domain/ports/LogSink.js';
import type { IsolationSourceLookupConfig } from '../IsolationSourceLookup.js';
import { IsolationSourceLookup, resolveOutputBase } from '../IsolationSourceLookup.js';
import { attachLogSink } from '../infrastructure/logging/attachLogSink.js';
import { ConsoleLogSink } from '../infrastructure/logging/ConsoleLogSink.js';
import { FileLogSink } from '../infrastructure/logging/FileLogSink.js';
import { TeeLogSink } from '../infrastructure/logging/TeeLogSink.js';
import type { CliArgs } from './parseCliArgs.js';
import { parseCliArgs, USAGE, UsageError } from './parseCliArgs.js';

export interface CliEnvironment {
  readonly stdout: NodeJS.WritableStream;
  readonly stderr: NodeJS.WritableStream;
  /** Builds the lookup from the parsed configuration. */
  readonly createLookup: (config: IsolationSourceLookupConfig) => IsolationSourceLookup;
}

const defaultEnvironment: CliEnvironment = {
  stdout: process.stdout,
  stderr: process.stderr,
  createLookup: (config) => new IsolationSourceLookup(config),
};

/**
 * Log file of a run: `--log-file`, or `<base>.isolation_sources.log` beside the
 * report. `null` when the output directory is missing, which the run reports itself.
 */
export function resolveLogPath(paths: readonly string[], outputDir: string | undefined, logFile?: string): string | null {
  if (logFile !== undefined) return logFile;
  const { directory, base } = resolveOutputBase(paths, outputDir);
  return existsSync(directory) && statSync(directory).isDirectory() ? `${base}.isolation_sources.log` : null;
}

/** Run the command line and resolve to the process exit code. */
export async function runCli(argv: readonly string[], env: CliEnvironment = defaultEnvironment): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    env.stderr.write(`isolation-sources: ${error.message}\n\n${USAGE}\n`);
    return ExitCode.USAGE;
  }

  if (args.kind === 'help') {
    env.stdout.write(`${USAGE}\n`);
    return ExitCode.SUCCESS;
  }

  const consoleSink = new ConsoleLogSink(env.stdout, env.stderr);
  const logPath = resolveLogPath(args.paths, args.config.outputDir, args.logFile);
  const sink: LogSink = logPath ? new TeeLogSink(consoleSink, new FileLogSink(logPath)) : consoleSink;

  try {
    const lookup = env.createLookup(args.config);
    const detach = attachLogSink(lookup, sink);
    try {
      const outcome = await lookup.run(args.paths);
      return outcome.exitCode;
    } finally {
      detach();
    }
  } catch (error) {
    sink.write('error', `Unexpected error: ${error instanceof Error ? error.message : String(error)}`);
    return ExitCode.INTERNAL_ERROR;
  } finally {
    await sink.close();
  }
}
