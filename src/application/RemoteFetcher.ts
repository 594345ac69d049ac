import type { Database } from '../domain/model/Accession.js';
import type { Batch } from '../domain/model/Batch.js';
import { buildBatchQuery } from '../domain/model/Batch.js';
import type { RemoteRecord } from '../domain/model/SequenceRecord.js';
import type { RecordStream, SequenceDatabaseClient } from '../domain/ports/SequenceDatabaseClient.js';
import type { SequenceParser } from '../domain/ports/SequenceParser.js';
import type { RetryExecutor } from './RetryExecutor.js';

/** Result of one search + fetch round trip, tagged by what the scheduler should do next. */
export type FetchOutcome =
  | { readonly status: 'fetched'; readonly records: readonly RemoteRecord[]; readonly matched: number }
  /** The search matched no IDs. */
  | { readonly status: 'empty'; readonly query: string }
  /** The payload arrived but could not be parsed. Non-fatal. */
  | { readonly status: 'unparseable'; readonly error: string }
  /** A phase exhausted its retries. Fatal for the run. */
  | { readonly status: 'failed'; readonly error: string };

async function readAll(stream: RecordStream): Promise<string> {
  let text = '';
  for await (const chunk of stream.read()) {
    text += chunk;
  }
  return text;
}

/** Issues one search and one fetch per batch and parses the returned GenBank records. */
export class RemoteFetcher {
  constructor(
    private readonly client: SequenceDatabaseClient,
    private readonly retry: RetryExecutor,
    private readonly parser: SequenceParser,
  ) {}

  async fetch(batch: Batch, database: Database): Promise<FetchOutcome> {
    const query = buildBatchQuery(batch);
    const label = `batch ${String(batch.index + 1)} [${String(batch.start)}, ${String(batch.stop)})`;

    const search = await this.retry.execute(
      () => this.client.search(database, query, batch.identifiers.length),
      `Unable to search ${database} for ${label}`,
      'search',
    );
    if (!search.success) {
      return { status: 'failed', error: search.error };
    }

    const { ids, context } = search.value;
    if (ids.length === 0) {
      return { status: 'empty', query };
    }

    // The body is read inside the retried call: a download that stalls or
    // breaks off is a failed attempt, not an unparseable payload.
    const fetched = await this.retry.execute(
      async () => {
        const stream = await this.client.fetch(database, context, ids.length);
        try {
          return await readAll(stream);
        } finally {
          await stream.close();
        }
      },
      `Unable to fetch ${database} records for ${label}`,
      'fetch',
    );
    if (!fetched.success) {
      return { status: 'failed', error: fetched.error };
    }

    try {
      const records = [...this.parser.parse(fetched.value)];
      return { status: 'fetched', records, matched: ids.length };
    } catch (error) {
      return { status: 'unparseable', error: error instanceof Error ? error.message : String(error) };
    }
  }
}
