import { describe, it, expect } from 'vitest';
import { computePacingPolicy, isPauseDue } from '../../../src/domain/model/PacingPolicy.js';

const defaults = { batchSize: 20, pauseThreshold: 100, pauseSeconds: 60 };

/** Batch indices before which the scheduler pauses, replaying its checkpoint logic. */
function pauseIndices(totalIdentifiers: number): number[] {
  const policy = computePacingPolicy(totalIdentifiers, defaults);
  const indices: number[] = [];
  let nextPause = policy.pauseEvery;
  for (let i = 0; i < policy.numQueries; i++) {
    if (isPauseDue(policy, i, nextPause)) {
      indices.push(i);
      nextPause += policy.pauseEvery;
    }
  }
  return indices;
}

describe('computePacingPolicy', () => {
  it('should not pause a run below the threshold', () => {
    const policy = computePacingPolicy(45, defaults);

    expect(policy).toMatchObject({
      totalIdentifiers: 45,
      numQueries: 3,
      numPauses: 0,
      pauseEvery: 0,
      totalPauseSeconds: 0,
      estimatedQuerySeconds: 2,
      estimatedTotalSeconds: 2,
    });
  });

  it('should not pause when the batch count equals the threshold', () => {
    const policy = computePacingPolicy(2000, defaults);

    expect(policy.numQueries).toBe(100);
    expect(policy.numPauses).toBe(0);
  });

  it('should insert one pause just above the threshold', () => {
    const policy = computePacingPolicy(2001, defaults);

    expect(policy.numQueries).toBe(101);
    expect(policy.numPauses).toBe(1);
    expect(policy.pauseEvery).toBe(51);
    expect(policy.totalPauseSeconds).toBe(60);
  });

  it('should spread pauses evenly over a large run', () => {
    const policy = computePacingPolicy(5000, defaults);

    expect(policy.numQueries).toBe(250);
    expect(policy.numPauses).toBe(2);
    expect(policy.pauseEvery).toBe(84);
    expect(policy.totalPauseSeconds).toBe(120);
    expect(policy.estimatedQuerySeconds).toBeCloseTo(166.667, 3);
    expect(policy.estimatedTotalSeconds).toBeCloseTo(286.667, 3);
  });

  it('should pause exactly numPauses times', () => {
    expect(pauseIndices(5000)).toEqual([84, 168]);
    expect(pauseIndices(2001)).toEqual([51]);
    expect(pauseIndices(45)).toEqual([]);
  });

  it('should return a frozen policy', () => {
    expect(Object.isFrozen(computePacingPolicy(45, defaults))).toBe(true);
  });

  it('should reject invalid options', () => {
    expect(() => computePacingPolicy(10, { ...defaults, batchSize: 0 })).toThrow('Batch size must be at least 1');
    expect(() => computePacingPolicy(10, { ...defaults, pauseThreshold: 0 })).toThrow(
      'Pause threshold must be at least 1',
    );
    expect(() => computePacingPolicy(10, { ...defaults, batchSize: 2.5 })).toThrow('Batch size must be at least 1');
    expect(() => computePacingPolicy(10, { ...defaults, pauseThreshold: 1.5 })).toThrow(
      'Pause threshold must be at least 1',
    );
    expect(() => computePacingPolicy(10, { ...defaults, pauseSeconds: -1 })).toThrow(
      'Pause duration cannot be negative',
    );
  });

  it('should handle an empty run', () => {
    const policy = computePacingPolicy(0, defaults);

    expect(policy.numQueries).toBe(0);
    expect(policy.estimatedTotalSeconds).toBe(0);
  });
});
