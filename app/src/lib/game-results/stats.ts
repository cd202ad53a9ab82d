/**
 * Lineup aggregation: per-game runs -> LineupScoreSummary
 */

import { NoDataError } from '@lineup-sim/model';
import type { GameResult } from '../game/types.js';
import type { LineupScoreSummary } from './types.js';

/**
 * Summarize games for one batting order.
 *
 * Works on a sorted copy of the run totals, so the result does not depend
 * on the order the games were produced in.
 */
export function summarize(results: readonly Pick<GameResult, 'runs'>[]): LineupScoreSummary {
  if (results.length === 0) {
    throw new NoDataError('Cannot summarize zero games');
  }

  const runs = results.map((result) => result.runs).sort((a, b) => a - b);
  const games = runs.length;
  const totalRuns = runs.reduce((sum, value) => sum + value, 0);
  const mean = totalRuns / games;

  const middle = Math.floor(games / 2);
  const median = games % 2 === 1 ? runs[middle] : (runs[middle - 1] + runs[middle]) / 2;

  const variance = runs.reduce((sum, value) => sum + (value - mean) ** 2, 0) / games;

  const max = runs[games - 1];
  const histogram = new Array<number>(max + 1).fill(0);
  for (const value of runs) {
    histogram[value]++;
  }

  return {
    games,
    mean,
    totalRuns,
    min: runs[0],
    max,
    median,
    standardDeviation: Math.sqrt(variance),
    histogram,
  };
}

/**
 * Total runs implied by a set of summaries (sum of mean × games)
 */
export function grandTotalRuns(summaries: readonly LineupScoreSummary[]): number {
  return summaries.reduce((sum, summary) => sum + summary.mean * summary.games, 0);
}
