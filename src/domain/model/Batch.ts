import type { ClassifiedIdentifier } from './Accession.js';

/** A contiguous `[start, stop)` slice of the run's identifier list, queried in one round trip. */
export interface Batch {
  /** Zero-based batch index within the run. */
  readonly index: number;
  /** First identifier index, inclusive. */
  readonly start: number;
  /** Last identifier index, exclusive. */
  readonly stop: number;
  /** Identifiers in this batch, in input order. */
  readonly identifiers: readonly ClassifiedIdentifier[];
}

/** Create a batch view over `identifiers[start, stop)`. */
export function createBatch(
  index: number,
  identifiers: readonly ClassifiedIdentifier[],
  start: number,
  stop: number,
): Batch {
  return {
    index,
    start,
    stop,
    identifiers: identifiers.slice(start, stop),
  };
}

/** Build the Entrez query that matches every accession of the batch. */
export function buildBatchQuery(batch: Batch): string {
  return batch.identifiers.map((id) => `${id.accession}[accn]`).join(' OR ');
}
