import { describe, it, expect } from 'vitest';
import { NoDataError } from '@lineup-sim/model';
import { grandTotalRuns, summarize } from './stats.js';

function games(...runs: number[]) {
  return runs.map((value) => ({ runs: value }));
}

describe('summarize', () => {
  it('should compute the mean and distribution of runs', () => {
    const summary = summarize(games(3, 0, 5, 4));

    expect(summary).toEqual({
      games: 4,
      mean: 3,
      totalRuns: 12,
      min: 0,
      max: 5,
      median: 3.5,
      standardDeviation: Math.sqrt(3.5),
      histogram: [1, 0, 0, 1, 1, 1],
    });
  });

  it('should take the middle value for an odd number of games', () => {
    expect(summarize(games(7, 1, 2)).median).toBe(2);
  });

  it('should not depend on the order of the games', () => {
    const forward = summarize(games(1, 2, 3, 4, 10, 0, 6));
    const backward = summarize(games(6, 0, 10, 4, 3, 2, 1));

    expect(backward).toEqual(forward);
  });

  it('should throw NoDataError for zero games', () => {
    expect(() => summarize([])).toThrow(NoDataError);
  });
});

describe('grandTotalRuns', () => {
  it('should add mean times games across lineups', () => {
    const summaries = [summarize(games(2, 4)), summarize(games(1, 1, 1))];
    expect(grandTotalRuns(summaries)).toBe(9);
  });
});
