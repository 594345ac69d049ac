import type { DomainEvent } from '../../domain/events/DomainEvents.js';
import type { LogLevel } from '../../domain/ports/LogSink.js';

export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
}

/** Render a duration in seconds as `1 h 2 min 3 s`. */
export function formatDuration(seconds: number): string {
  const total = Math.round(seconds);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;
  const parts: string[] = [];
  if (hours > 0) parts.push(`${String(hours)} h`);
  if (minutes > 0) parts.push(`${String(minutes)} min`);
  if (secs > 0 || parts.length === 0) parts.push(`${String(secs)} s`);
  return parts.join(' ');
}

function batchLabel(batchIndex: number): string {
  return `Batch ${String(batchIndex + 1)}`;
}

/** Turn a domain event into one human-readable log line. */
export function describeEvent(event: DomainEvent): LogEntry {
  switch (event.type) {
    case 'file:loaded':
      return { level: 'info', message: `Loaded ${String(event.sequences)} sequences from ${event.path}` };
    case 'file:skipped':
      return { level: 'warn', message: `Skipping ${event.path}: ${event.error}` };
    case 'identifier:skipped': {
      const formats = `Supported ${event.database} formats: ${event.supportedFormats.join(', ')}`;
      const message =
        event.reason === 'unrecognized'
          ? `No supported accession number in "${event.description}". ${formats}`
          : `"${event.description}" holds a ${event.kind ?? 'different'} accession, not a ${event.database} one. ${formats}`;
      return { level: 'warn', message };
    }
    case 'run:started': {
      const { policy } = event;
      const lines = [
        `Fetching ${String(policy.totalIdentifiers)} ${event.database} records in ${String(policy.numQueries)} batches of up to ${String(policy.batchSize)}.`,
      ];
      if (policy.numPauses > 0) {
        lines.push(
          `Pausing ${formatDuration(policy.pauseSeconds)} every ${String(policy.pauseEvery)} batches (${String(policy.numPauses)} pauses, ${formatDuration(policy.totalPauseSeconds)} in total).`,
        );
      }
      lines.push(
        `Estimated query time: ${formatDuration(policy.estimatedQuerySeconds)}; minimum total time: ${formatDuration(policy.estimatedTotalSeconds)}.`,
      );
      return { level: 'info', message: lines.join(' ') };
    }
    case 'run:completed':
      return {
        level: 'info',
        message: `Done: ${String(event.summary.rows)} rows from ${String(event.summary.remoteRecords)} records in ${String(event.summary.batches)} batches (${formatDuration(event.summary.elapsedMs / 1000)}). Report: ${event.artifacts.reportPath}; histogram: ${event.artifacts.histogramPath ?? 'not written'}`,
      };
    case 'run:aborted':
      return {
        level: 'error',
        message: `Query aborted at ${batchLabel(event.batchIndex).toLowerCase()}: ${event.error}. ${String(event.summary.rows)} rows written so far are kept.`,
      };
    case 'run:failed':
      return { level: 'error', message: event.message };
    case 'batch:started':
      return {
        level: 'info',
        message: `${batchLabel(event.batchIndex)}/${String(event.totalBatches)}: identifiers ${String(event.start + 1)}-${String(event.stop)}`,
      };
    case 'batch:paused':
      return {
        level: 'info',
        message: `Pause ${String(event.pause)}/${String(event.totalPauses)}: waiting ${formatDuration(event.pauseSeconds)} before ${batchLabel(event.batchIndex).toLowerCase()}`,
      };
    case 'batch:completed':
      return {
        level: 'info',
        message: `${batchLabel(event.batchIndex)}: ${String(event.matched)} IDs matched, ${String(event.records)} records received`,
      };
    case 'batch:empty':
      return { level: 'warn', message: `${batchLabel(event.batchIndex)}: no IDs found for ${event.query}` };
    case 'batch:unparseable':
      return { level: 'warn', message: `${batchLabel(event.batchIndex)}: unable to parse fetched records: ${event.error}` };
    case 'batch:failed':
      return { level: 'error', message: `${batchLabel(event.batchIndex)} failed: ${event.error}` };
    case 'request:retried':
      return {
        level: 'warn',
        message: `${event.operation} attempt ${String(event.attempt)}/${String(event.maxRetries)} failed: ${event.error}`,
      };
    case 'request:failed':
      return {
        level: 'error',
        message: `${event.operation} failed after ${String(event.attempts)} attempts: ${event.cause}`,
      };
    case 'record:skipped':
      return { level: 'warn', message: `${event.accession}: no source feature in "${event.description}"` };
    case 'record:anomaly':
      return { level: 'warn', message: `${event.accession}: no ${event.missing} qualifier` };
  }
}
