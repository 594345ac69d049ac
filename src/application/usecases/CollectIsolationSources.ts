import type { ClassifiedIdentifier, Database } from '../../domain/model/Accession.js';
import type { RemoteRecord } from '../../domain/model/SequenceRecord.js';
import type { SourceExtractor } from '../../domain/services/SourceExtractor.js';
import type { BatchScheduler, ScheduleOutcome } from '../BatchScheduler.js';
import type { ResultAggregator } from '../ResultAggregator.js';
import type { RunContext } from '../RunContext.js';
import { publish } from '../RunContext.js';

/** Use case: fetch every batch and stream one report row per record with a `source` feature. */
export class CollectIsolationSources {
  constructor(
    private readonly ctx: RunContext,
    private readonly scheduler: BatchScheduler,
    private readonly extractor: SourceExtractor,
    private readonly aggregator: ResultAggregator,
  ) {}

  async execute(identifiers: readonly ClassifiedIdentifier[], database: Database): Promise<ScheduleOutcome> {
    const outcome = await this.scheduler.run(identifiers, database, (record) => {
      this.consume(record);
    });
    this.ctx.batches = outcome.batches;
    return outcome;
  }

  private consume(record: RemoteRecord): void {
    this.ctx.remoteRecords++;

    const extraction = this.extractor.extract(record);
    if (!extraction) {
      publish(this.ctx, { type: 'record:skipped', accession: record.id, description: record.description });
      return;
    }

    for (const missing of extraction.missing) {
      publish(this.ctx, { type: 'record:anomaly', accession: record.id, missing });
    }

    this.aggregator.record({
      description: record.description,
      accession: record.id,
      ...extraction.source,
    });
    this.ctx.rows = this.aggregator.rows;
  }
}
