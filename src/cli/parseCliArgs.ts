import { parseArgs } from 'node:util';
import { isDatabase } from '../domain/model/Accession.js';
import type { IsolationSourceLookupConfig } from '../IsolationSourceLookup.js';

export const USAGE = `Usage: isolation-sources -e <email> [options] <file...>

Looks up the isolation source and country of every sequence in FASTA or
GenBank files and writes <name>.isolation_sources.csv,
<name>.isolation_sources.histogram.csv and the run log
<name>.isolation_sources.log.

Options:
  -e, --email <address>    contact address sent to NCBI (required)
  -d, --database <name>    nucleotide or protein (default: nucleotide)
  -b, --batch-size <n>     identifiers per request (default: 20)
  -p, --pause <seconds>    pause length for large runs (default: 60)
  -t, --pause-threshold <n> batch count above which pauses start (default: 100)
  -r, --retries <n>        attempts per request (default: 3)
      --timeout <ms>       per-request timeout (default: 60000)
      --api-key <key>      NCBI API key
      --no-references      omit the REFERENCES column
  -o, --output-dir <dir>   output directory (default: directory of the first file)
  -l, --log-file <path>    append diagnostics here instead of the default log
  -h, --help               show this help`;

export type CliArgs =
  | { readonly kind: 'help' }
  | {
      readonly kind: 'run';
      readonly config: IsolationSourceLookupConfig;
      readonly paths: readonly string[];
      readonly logFile: string | undefined;
    };

/** Thrown for invalid command lines; the CLI exits with the usage code. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function parseNumber(value: string | undefined, flag: string, min: number): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new UsageError(`--${flag} expects an integer of at least ${String(min)}, got '${value}'`);
  }
  return parsed;
}

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      options: {
        email: { type: 'string', short: 'e' },
        database: { type: 'string', short: 'd' },
        'batch-size': { type: 'string', short: 'b' },
        pause: { type: 'string', short: 'p' },
        'pause-threshold': { type: 'string', short: 't' },
        retries: { type: 'string', short: 'r' },
        timeout: { type: 'string' },
        'api-key': { type: 'string' },
        'no-references': { type: 'boolean' },
        'output-dir': { type: 'string', short: 'o' },
        'log-file': { type: 'string', short: 'l' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

/** Parse the command line (without the node and script entries). */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const { values, positionals } = readArgs(argv);
  if (values.help) return { kind: 'help' };

  if (values.email === undefined || values.email.trim() === '') {
    throw new UsageError('--email is required');
  }
  if (positionals.length === 0) {
    throw new UsageError('at least one sequence file is required');
  }
  const database = values.database ?? 'nucleotide';
  if (!isDatabase(database)) {
    throw new UsageError(`--database must be 'nucleotide' or 'protein', got '${database}'`);
  }

  return {
    kind: 'run',
    paths: positionals,
    logFile: values['log-file'],
    config: {
      email: values.email,
      database,
      batchSize: parseNumber(values['batch-size'], 'batch-size', 1),
      pauseSeconds: parseNumber(values.pause, 'pause', 0),
      pauseThreshold: parseNumber(values['pause-threshold'], 'pause-threshold', 1),
      maxRetries: parseNumber(values.retries, 'retries', 1),
      requestTimeoutMs: parseNumber(values.timeout, 'timeout', 1),
      apiKey: values['api-key'],
      includeReferences: !values['no-references'],
      outputDir: values['output-dir'],
    },
  };
}
