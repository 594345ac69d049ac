/** Request ceiling assumed for time estimates (Entrez without an API key). */
export const REQUESTS_PER_SECOND = 3;

/** Every batch costs one search and one fetch request. */
export const REQUESTS_PER_BATCH = 2;

/**
 * Pacing derived once from the identifier count before any request is made.
 *
 * Read-only for the rest of the run and never shared between runs.
 */
export interface PacingPolicy {
  readonly totalIdentifiers: number;
  readonly batchSize: number;
  /** Number of batches: `ceil(totalIdentifiers / batchSize)`. */
  readonly numQueries: number;
  /** Batch count above which pausing kicks in. */
  readonly pauseThreshold: number;
  /** Number of pauses over the whole run. `0` disables pausing. */
  readonly numPauses: number;
  /** Batches between two pauses. `0` when pausing is disabled. */
  readonly pauseEvery: number;
  readonly pauseSeconds: number;
  readonly totalPauseSeconds: number;
  readonly estimatedQuerySeconds: number;
  readonly estimatedTotalSeconds: number;
}

export interface PacingOptions {
  readonly batchSize: number;
  readonly pauseThreshold: number;
  readonly pauseSeconds: number;
}

/**
 * Compute the pacing for a run of `totalIdentifiers` identifiers.
 *
 * Above the threshold, `floor(numQueries / pauseThreshold)` pauses are spread
 * evenly: one every `floor(numQueries / (numPauses + 1)) + 1` batches, so they
 * do not pile up at the threshold boundary.
 */
export function computePacingPolicy(totalIdentifiers: number, options: PacingOptions): PacingPolicy {
  const { batchSize, pauseThreshold, pauseSeconds } = options;
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new Error('Batch size must be at least 1');
  }
  if (!Number.isInteger(pauseThreshold) || pauseThreshold < 1) {
    throw new Error('Pause threshold must be at least 1');
  }
  if (pauseSeconds < 0) {
    throw new Error('Pause duration cannot be negative');
  }

  const numQueries = Math.ceil(totalIdentifiers / batchSize);
  let numPauses = 0;
  let pauseEvery = 0;

  if (numQueries > pauseThreshold) {
    numPauses = Math.floor(numQueries / pauseThreshold);
    pauseEvery = Math.floor(numQueries / (numPauses + 1)) + 1;
  }

  const totalPauseSeconds = numPauses * pauseSeconds;
  const estimatedQuerySeconds = (numQueries * REQUESTS_PER_BATCH) / REQUESTS_PER_SECOND;

  return Object.freeze({
    totalIdentifiers,
    batchSize,
    numQueries,
    pauseThreshold,
    numPauses,
    pauseEvery,
    pauseSeconds,
    totalPauseSeconds,
    estimatedQuerySeconds,
    estimatedTotalSeconds: estimatedQuerySeconds + totalPauseSeconds,
  });
}

/** Whether a pause is due before `batchIndex`, given the next pause checkpoint. */
export function isPauseDue(policy: PacingPolicy, batchIndex: number, nextPause: number): boolean {
  return policy.numPauses > 0 && batchIndex >= nextPause;
}
