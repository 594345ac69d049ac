import type { DomainEvent } from '../domain/events/DomainEvents.js';
import type { RunStatus } from '../domain/model/RunStatus.js';
import { canTransition } from '../domain/model/RunStatus.js';
import type { RunSummary } from '../domain/model/RunOutcome.js';
import { EventBus } from './EventBus.js';

/** What a component needs to report diagnostics for the current run. */
export interface EventContext {
  readonly runId: string;
  readonly eventBus: EventBus;
}

/** Distributive `Omit` so each member of the event union keeps its own fields. */
type WithoutEnvelope<E> = E extends DomainEvent ? Omit<E, 'runId' | 'timestamp'> : never;

/** Event payload without the run id and timestamp, which `publish()` fills in. */
export type EventBody = WithoutEnvelope<DomainEvent>;

/** Stamp an event with the run id and the current time, then emit it. */
export function publish(ctx: EventContext, body: EventBody): void {
  ctx.eventBus.emit({ ...body, runId: ctx.runId, timestamp: Date.now() });
}

/**
 * Mutable state of one run, shared by the use cases of `IsolationSourceLookup`.
 *
 * A new context is created per run, so counters and pacing never leak between runs.
 */
export class RunContext implements EventContext {
  readonly runId: string;
  readonly eventBus: EventBus;

  status: RunStatus = 'CREATED';
  startedAt = 0;
  files = 0;
  sequences = 0;
  identifiers = 0;
  skipped = 0;
  batches = 0;
  remoteRecords = 0;
  rows = 0;

  constructor(eventBus: EventBus) {
    this.eventBus = eventBus;
    this.runId = crypto.randomUUID();
  }

  transitionTo(newStatus: RunStatus): void {
    if (!canTransition(this.status, newStatus)) {
      throw new Error(`Invalid state transition: ${this.status} → ${newStatus}`);
    }
    this.status = newStatus;
  }

  buildSummary(): RunSummary {
    return {
      files: this.files,
      sequences: this.sequences,
      identifiers: this.identifiers,
      skipped: this.skipped,
      batches: this.batches,
      remoteRecords: this.remoteRecords,
      rows: this.rows,
      elapsedMs: this.startedAt > 0 ? Date.now() - this.startedAt : 0,
    };
  }
}
