import type { Database } from '../model/Accession.js';

/** Opaque handle to a server-side result set, returned by `search()` and consumed by `fetch()`. */
export interface ContinuationContext {
  readonly webEnv: string;
  readonly queryKey: string;
}

export interface SearchResult {
  /** Total number of hits reported by the service. */
  readonly count: number;
  /** Database UIDs of the hits. Empty when nothing matched. */
  readonly ids: readonly string[];
  readonly context: ContinuationContext;
}

/**
 * A fetched payload, read lazily. The consumer must `close()` it once done,
 * whether or not reading succeeded.
 */
export interface RecordStream {
  read(): AsyncIterable<string>;
  close(): Promise<void>;
}

/**
 * Port for the remote sequence database (NCBI Entrez in production).
 *
 * Both calls may fail with transient network errors; callers retry them.
 */
export interface SequenceDatabaseClient {
  /** Run `query` against `database`, keeping the result set on the server for `fetch()`. */
  search(database: Database, query: string, retmax: number): Promise<SearchResult>;
  /** Stream the full GenBank flat-file records of a previous search. */
  fetch(database: Database, context: ContinuationContext, retmax: number): Promise<RecordStream>;
}
