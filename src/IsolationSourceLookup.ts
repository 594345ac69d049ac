import { existsSync, statSync } from 'node:fs';
import { basename, dirname, extname, join } from 'node:path';
import type { Database } from './domain/model/Accession.js';
import { isDatabase } from './domain/model/Accession.js';
import type { RunOutcome } from './domain/model/RunOutcome.js';
import { ExitCode } from './domain/model/RunOutcome.js';
import { computePacingPolicy } from './domain/model/PacingPolicy.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import type { ReportWriterFactory } from './domain/ports/ReportWriter.js';
import type { SequenceDatabaseClient } from './domain/ports/SequenceDatabaseClient.js';
import { SourceExtractor } from './domain/services/SourceExtractor.js';
import { EventBus } from './application/EventBus.js';
import type { HandlerErrorListener } from './application/EventBus.js';
import { RunContext, publish } from './application/RunContext.js';
import { RetryExecutor } from './application/RetryExecutor.js';
import { RemoteFetcher } from './application/RemoteFetcher.js';
import type { ScheduleOutcome, SleepFn } from './application/BatchScheduler.js';
import { BatchScheduler, sleep } from './application/BatchScheduler.js';
import { ResultAggregator } from './application/ResultAggregator.js';
import { LoadIdentifiers } from './application/usecases/LoadIdentifiers.js';
import { CollectIsolationSources } from './application/usecases/CollectIsolationSources.js';
import { EntrezClient } from './infrastructure/ncbi/EntrezClient.js';
import { GenBankParser } from './infrastructure/parsers/GenBankParser.js';
import { openCsvReport } from './infrastructure/report/CsvReportWriter.js';

export interface IsolationSourceLookupConfig {
  /** Contact address sent to NCBI with every request. Required. */
  readonly email: string;
  /** Target database. Default: `'nucleotide'`. */
  readonly database?: Database;
  /** Identifiers per search/fetch round trip. Default: `20`. */
  readonly batchSize?: number;
  /** Batch count above which pauses are inserted. Default: `100`. */
  readonly pauseThreshold?: number;
  /** Length of each pause. Default: `60`. */
  readonly pauseSeconds?: number;
  /** Attempts per remote call. Default: `3`. */
  readonly maxRetries?: number;
  /** Default: `60000`. */
  readonly requestTimeoutMs?: number;
  /** Add the `REFERENCES` column. Default: `true`. */
  readonly includeReferences?: boolean;
  /** Where the report and histogram are written. Default: the directory of the first input file. */
  readonly outputDir?: string;
  /** Default: `'isolation-sources'`. */
  readonly tool?: string;
  readonly apiKey?: string;
  /** Replaces the NCBI client, e.g. with an in-memory stand-in. */
  readonly client?: SequenceDatabaseClient;
  readonly sleep?: SleepFn;
  readonly reportWriterFactory?: ReportWriterFactory;
  /** Receives errors thrown by event subscribers. Without it they propagate out of `run()`. */
  readonly onHandlerError?: HandlerErrorListener;
}

interface ResolvedConfig {
  readonly database: Database;
  readonly batchSize: number;
  readonly pauseThreshold: number;
  readonly pauseSeconds: number;
  readonly maxRetries: number;
  readonly includeReferences: boolean;
  readonly outputDir: string | undefined;
}

/** Base name of the report files: the first input's file name without its extension. */
export function outputBaseName(path: string): string {
  const name = basename(path);
  const ext = extname(name);
  return ext ? name.slice(0, -ext.length) : name;
}

/**
 * Directory of the run's artifacts and the path prefix they share: `outputDir`,
 * or the first input's directory, joined with the first input's base name.
 */
export function resolveOutputBase(
  paths: readonly string[],
  outputDir: string | undefined,
): { readonly directory: string; readonly base: string } {
  const first = paths[0];
  const directory = outputDir ?? (first !== undefined ? dirname(first) : '.');
  return { directory, base: join(directory, outputBaseName(first ?? 'isolation_sources')) };
}

/**
 * Looks up the isolation source and country of every sequence in a set of
 * FASTA or GenBank files and writes them, with a histogram, as CSV.
 *
 * @example
 * ```ts
 * const lookup = new IsolationSourceLookup({ email: 'someone@example.org' });
 * lookup.on('batch:completed', (e) => console.log(e.batchIndex));
 * const outcome = await lookup.run(['silva_export.fasta']);
 * process.exitCode = outcome.exitCode;
 * ```
 */
export class IsolationSourceLookup {
  private readonly config: ResolvedConfig;
  private readonly eventBus: EventBus;
  private readonly client: SequenceDatabaseClient;
  private readonly sleepFn: SleepFn;
  private readonly openReport: ReportWriterFactory;

  constructor(config: IsolationSourceLookupConfig) {
    if (config.email.trim() === '') {
      throw new Error('An email address is required by NCBI');
    }
    const database = config.database ?? 'nucleotide';
    if (!isDatabase(database)) {
      throw new Error(`Unsupported database '${String(database)}' (expected 'nucleotide' or 'protein')`);
    }
    const maxRetries = config.maxRetries ?? 3;
    if (!Number.isInteger(maxRetries) || maxRetries < 1) {
      throw new Error('Retry count must be at least 1');
    }

    this.config = {
      database,
      batchSize: config.batchSize ?? 20,
      pauseThreshold: config.pauseThreshold ?? 100,
      pauseSeconds: config.pauseSeconds ?? 60,
      maxRetries,
      includeReferences: config.includeReferences ?? true,
      outputDir: config.outputDir,
    };
    // Fails fast on a bad batch size, threshold or pause length.
    computePacingPolicy(0, this.config);

    this.client =
      config.client ??
      new EntrezClient({
        email: config.email,
        tool: config.tool,
        apiKey: config.apiKey,
        timeout: config.requestTimeoutMs,
      });
    this.eventBus = new EventBus(config.onHandlerError);
    this.sleepFn = config.sleep ?? sleep;
    this.openReport = config.reportWriterFactory ?? openCsvReport;
  }

  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.on(type, handler);
    return this;
  }

  onAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.onAny(handler);
    return this;
  }

  offAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.offAny(handler);
    return this;
  }

  /** Run one lookup over `paths`. Input problems are reported as outcomes, not thrown. */
  async run(paths: readonly string[]): Promise<RunOutcome> {
    const ctx = new RunContext(this.eventBus);
    ctx.startedAt = Date.now();
    const { database } = this.config;

    const { directory: outputDir, base } = resolveOutputBase(paths, this.config.outputDir);
    if (!existsSync(outputDir) || !statSync(outputDir).isDirectory()) {
      ctx.transitionTo('LOADING');
      ctx.transitionTo('FAILED');
      publish(ctx, {
        type: 'run:failed',
        reason: 'missing-directory',
        message: `Directory ${outputDir} does not exist`,
      });
      return { status: 'missing-directory', exitCode: ExitCode.MISSING_DIRECTORY, directory: outputDir };
    }

    ctx.transitionTo('LOADING');
    const loaded = await new LoadIdentifiers(ctx).execute(paths, database);

    if (loaded.records === 0) {
      ctx.transitionTo('FAILED');
      publish(ctx, { type: 'run:failed', reason: 'no-records', message: 'No sequences could be loaded' });
      return { status: 'no-records', exitCode: ExitCode.NO_RECORDS, summary: ctx.buildSummary() };
    }
    if (loaded.identifiers.length === 0) {
      ctx.transitionTo('FAILED');
      publish(ctx, {
        type: 'run:failed',
        reason: 'no-identifiers',
        message: `No ${database} accession numbers found in ${String(loaded.records)} sequences`,
      });
      return { status: 'no-identifiers', exitCode: ExitCode.NO_IDENTIFIERS, summary: ctx.buildSummary() };
    }

    ctx.transitionTo('FETCHING');
    const aggregator = new ResultAggregator(
      this.openReport(`${base}.isolation_sources.csv`),
      () => this.openReport(`${base}.isolation_sources.histogram.csv`),
      this.config.includeReferences,
    );

    const fetcher = new RemoteFetcher(
      this.client,
      new RetryExecutor(ctx, this.config.maxRetries),
      new GenBankParser(),
    );
    const scheduler = new BatchScheduler(ctx, fetcher, this.config, this.sleepFn);
    const extractor = new SourceExtractor(this.config.includeReferences);
    const collect = new CollectIsolationSources(ctx, scheduler, extractor, aggregator);

    let schedule: ScheduleOutcome;
    try {
      schedule = await collect.execute(loaded.identifiers, database);
    } catch (error) {
      await aggregator.close();
      ctx.transitionTo('FAILED');
      throw error;
    }

    if (schedule.status === 'aborted') {
      await aggregator.close();
      ctx.transitionTo('ABORTED');
      const summary = ctx.buildSummary();
      publish(ctx, { type: 'run:aborted', batchIndex: schedule.batchIndex, error: schedule.error, summary });
      return {
        status: 'aborted',
        exitCode: ExitCode.QUERY_ABORTED,
        batchIndex: schedule.batchIndex,
        error: schedule.error,
        summary,
        artifacts: { reportPath: aggregator.reportPath, histogramPath: null },
      };
    }

    await aggregator.finalize();
    ctx.transitionTo('COMPLETED');
    const summary = ctx.buildSummary();
    const artifacts = { reportPath: aggregator.reportPath, histogramPath: aggregator.writtenHistogramPath };
    publish(ctx, { type: 'run:completed', summary, artifacts });
    return { status: 'completed', exitCode: ExitCode.SUCCESS, summary, artifacts };
  }
}
