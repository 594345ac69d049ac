import type { ClassifiedIdentifier, Database } from '../domain/model/Accession.js';
import type { Batch } from '../domain/model/Batch.js';
import type { PacingOptions, PacingPolicy } from '../domain/model/PacingPolicy.js';
import { computePacingPolicy, isPauseDue } from '../domain/model/PacingPolicy.js';
import type { RemoteRecord } from '../domain/model/SequenceRecord.js';
import { BatchSplitter } from '../domain/services/BatchSplitter.js';
import type { RemoteFetcher } from './RemoteFetcher.js';
import type { EventContext } from './RunContext.js';
import { publish } from './RunContext.js';

/** Awaitable delay. Injected so tests do not wait on real timers. */
export type SleepFn = (ms: number) => Promise<void>;

/** Callback invoked for every fetched record, in fetch order. */
export type RecordConsumer = (record: RemoteRecord, batch: Batch) => void | Promise<void>;

export type ScheduleOutcome =
  | { readonly status: 'completed'; readonly batches: number; readonly records: number }
  | {
      readonly status: 'aborted';
      /** Index of the batch that exhausted its retries. */
      readonly batchIndex: number;
      readonly error: string;
      /** Batches finished before the abort. */
      readonly batches: number;
      readonly records: number;
    };

export const sleep: SleepFn = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Drives the batches of a run one after another, pausing at the checkpoints of
 * the run's pacing policy and stopping at the first batch-fatal failure.
 */
export class BatchScheduler {
  constructor(
    private readonly ctx: EventContext,
    private readonly fetcher: RemoteFetcher,
    private readonly options: PacingOptions,
    private readonly sleepFn: SleepFn = sleep,
  ) {}

  /** Pacing for `total` identifiers. A fresh policy is computed for every run. */
  plan(total: number): PacingPolicy {
    return computePacingPolicy(total, this.options);
  }

  async run(
    identifiers: readonly ClassifiedIdentifier[],
    database: Database,
    consumer: RecordConsumer,
  ): Promise<ScheduleOutcome> {
    const policy = this.plan(identifiers.length);
    publish(this.ctx, { type: 'run:started', database, policy });

    const splitter = new BatchSplitter(policy.batchSize);
    let nextPause = policy.pauseEvery;
    let pauses = 0;
    let batches = 0;
    let records = 0;

    for (const batch of splitter.split(identifiers)) {
      if (isPauseDue(policy, batch.index, nextPause)) {
        pauses++;
        publish(this.ctx, {
          type: 'batch:paused',
          batchIndex: batch.index,
          pause: pauses,
          totalPauses: policy.numPauses,
          pauseSeconds: policy.pauseSeconds,
        });
        await this.sleepFn(policy.pauseSeconds * 1000);
        nextPause += policy.pauseEvery;
      }

      publish(this.ctx, {
        type: 'batch:started',
        batchIndex: batch.index,
        totalBatches: policy.numQueries,
        start: batch.start,
        stop: batch.stop,
      });

      const outcome = await this.fetcher.fetch(batch, database);

      switch (outcome.status) {
        case 'failed':
          publish(this.ctx, { type: 'batch:failed', batchIndex: batch.index, error: outcome.error });
          return { status: 'aborted', batchIndex: batch.index, error: outcome.error, batches, records };
        case 'empty':
          publish(this.ctx, { type: 'batch:empty', batchIndex: batch.index, query: outcome.query });
          break;
        case 'unparseable':
          publish(this.ctx, { type: 'batch:unparseable', batchIndex: batch.index, error: outcome.error });
          break;
        case 'fetched':
          for (const record of outcome.records) {
            await consumer(record, batch);
            records++;
          }
          publish(this.ctx, {
            type: 'batch:completed',
            batchIndex: batch.index,
            matched: outcome.matched,
            records: outcome.records.length,
          });
          break;
      }

      batches++;
    }

    return { status: 'completed', batches, records };
  }
}
