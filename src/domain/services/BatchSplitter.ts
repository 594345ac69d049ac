import type { ClassifiedIdentifier } from '../model/Accession.js';
import type { Batch } from '../model/Batch.js';
import { createBatch } from '../model/Batch.js';

/**
 * Domain service that partitions the identifier list into fixed-size batches.
 *
 * Pure logic with no I/O. Batches are yielded lazily, in input order,
 * and together cover every identifier exactly once.
 */
export class BatchSplitter {
  constructor(private readonly batchSize: number) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new Error('Batch size must be at least 1');
    }
  }

  /** Number of batches `split()` yields for `total` identifiers. */
  count(total: number): number {
    return Math.ceil(total / this.batchSize);
  }

  /**
   * Split `identifiers` into batches of `batchSize`.
   *
   * The final batch may contain fewer identifiers than `batchSize`.
   */
  *split(identifiers: readonly ClassifiedIdentifier[]): Iterable<Batch> {
    let index = 0;
    for (let start = 0; start < identifiers.length; start += this.batchSize) {
      const stop = Math.min(start + this.batchSize, identifiers.length);
      yield createBatch(index, identifiers, start, stop);
      index++;
    }
  }
}
