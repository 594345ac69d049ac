import type { AccessionKind, Database } from '../model/Accession.js';
import type { PacingPolicy } from '../model/PacingPolicy.js';
import type { RunArtifacts, RunSummary } from '../model/RunOutcome.js';

/** Remote call phases wrapped by the retry executor. */
export type RequestOperation = 'search' | 'fetch';

/** Emitted after a sequence file was parsed. */
export interface FileLoadedEvent {
  readonly type: 'file:loaded';
  readonly runId: string;
  readonly path: string;
  readonly sequences: number;
  readonly timestamp: number;
}

/** Emitted when a sequence file cannot be read or parsed. The run continues without it. */
export interface FileSkippedEvent {
  readonly type: 'file:skipped';
  readonly runId: string;
  readonly path: string;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted for a sequence whose description yields no usable accession. */
export interface IdentifierSkippedEvent {
  readonly type: 'identifier:skipped';
  readonly runId: string;
  readonly recordId: string;
  readonly description: string;
  readonly reason: 'unrecognized' | 'database-mismatch';
  /** Family of the accession found, for `database-mismatch`. */
  readonly kind?: AccessionKind;
  readonly database: Database;
  readonly supportedFormats: readonly string[];
  readonly timestamp: number;
}

/** Emitted once the pacing policy is known, before the first batch. */
export interface RunStartedEvent {
  readonly type: 'run:started';
  readonly runId: string;
  readonly database: Database;
  readonly policy: PacingPolicy;
  readonly timestamp: number;
}

/** Emitted when all batches were fetched and the histogram was written. */
export interface RunCompletedEvent {
  readonly type: 'run:completed';
  readonly runId: string;
  readonly summary: RunSummary;
  readonly artifacts: RunArtifacts;
  readonly timestamp: number;
}

/** Emitted when a batch-fatal error stopped the schedule. */
export interface RunAbortedEvent {
  readonly type: 'run:aborted';
  readonly runId: string;
  readonly batchIndex: number;
  readonly error: string;
  readonly summary: RunSummary;
  readonly timestamp: number;
}

/** Emitted when the run ends on an input error before any remote call. */
export interface RunFailedEvent {
  readonly type: 'run:failed';
  readonly runId: string;
  readonly reason: 'missing-directory' | 'no-records' | 'no-identifiers';
  readonly message: string;
  readonly timestamp: number;
}

/** Emitted when a batch begins. */
export interface BatchStartedEvent {
  readonly type: 'batch:started';
  readonly runId: string;
  readonly batchIndex: number;
  readonly totalBatches: number;
  /** First identifier index, inclusive. */
  readonly start: number;
  /** Last identifier index, exclusive. */
  readonly stop: number;
  readonly timestamp: number;
}

/** Emitted right before the scheduler sleeps ahead of a batch. */
export interface BatchPausedEvent {
  readonly type: 'batch:paused';
  readonly runId: string;
  readonly batchIndex: number;
  /** 1-based pause number. */
  readonly pause: number;
  readonly totalPauses: number;
  readonly pauseSeconds: number;
  readonly timestamp: number;
}

/** Emitted when a batch's records were fetched and parsed. */
export interface BatchCompletedEvent {
  readonly type: 'batch:completed';
  readonly runId: string;
  readonly batchIndex: number;
  /** Number of IDs the search matched. */
  readonly matched: number;
  /** Number of records parsed from the fetched payload. */
  readonly records: number;
  readonly timestamp: number;
}

/** Emitted when the search for a batch matched nothing. Not an error. */
export interface BatchEmptyEvent {
  readonly type: 'batch:empty';
  readonly runId: string;
  readonly batchIndex: number;
  readonly query: string;
  readonly timestamp: number;
}

/** Emitted when a batch's payload could not be parsed. The batch yields no rows. */
export interface BatchUnparseableEvent {
  readonly type: 'batch:unparseable';
  readonly runId: string;
  readonly batchIndex: number;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted when a batch exhausted its retries. The run is aborted. */
export interface BatchFailedEvent {
  readonly type: 'batch:failed';
  readonly runId: string;
  readonly batchIndex: number;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted when a remote call failed and is about to be retried. */
export interface RequestRetriedEvent {
  readonly type: 'request:retried';
  readonly runId: string;
  readonly operation: RequestOperation;
  /** Attempt that failed (1-based). */
  readonly attempt: number;
  readonly maxRetries: number;
  /** Error from the failed attempt. */
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted when a remote call failed on its last attempt. */
export interface RequestFailedEvent {
  readonly type: 'request:failed';
  readonly runId: string;
  readonly operation: RequestOperation;
  readonly attempts: number;
  /** Message handed to the caller. */
  readonly error: string;
  /** Error from the last attempt. */
  readonly cause: string;
  readonly timestamp: number;
}

/** Emitted for a remote record that has no `source` feature. No row is written. */
export interface RecordSkippedEvent {
  readonly type: 'record:skipped';
  readonly runId: string;
  readonly accession: string;
  readonly description: string;
  readonly timestamp: number;
}

/** Emitted when a `source` feature lacks a qualifier and a placeholder was written. */
export interface RecordAnomalyEvent {
  readonly type: 'record:anomaly';
  readonly runId: string;
  readonly accession: string;
  readonly missing: 'isolation_source' | 'country';
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | FileLoadedEvent
  | FileSkippedEvent
  | IdentifierSkippedEvent
  | RunStartedEvent
  | RunCompletedEvent
  | RunAbortedEvent
  | RunFailedEvent
  | BatchStartedEvent
  | BatchPausedEvent
  | BatchCompletedEvent
  | BatchEmptyEvent
  | BatchUnparseableEvent
  | BatchFailedEvent
  | RequestRetriedEvent
  | RequestFailedEvent
  | RecordSkippedEvent
  | RecordAnomalyEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
