/**
 * Utility functions for the outcome model
 */

import { InvalidStatsError } from './errors.js';
import type { OutcomeDistribution, PlayerStats } from './types.js';
import { OUTCOMES } from './types.js';

const COUNT_FIELDS = [
  'plateAppearances',
  'atBats',
  'hits',
  'doubles',
  'triples',
  'homeRuns',
  'walks',
  'strikeouts',
  'hitByPitch',
] as const satisfies readonly (keyof PlayerStats)[];

/**
 * Check the invariants a player's counting stats must satisfy before
 * they can be turned into rates.
 */
export function validatePlayerStats(playerId: string, stats: PlayerStats): void {
  for (const field of COUNT_FIELDS) {
    const value = stats[field];
    if (!Number.isFinite(value) || value < 0) {
      throw new InvalidStatsError(playerId, `${field} must be a non-negative number, got ${value}`);
    }
  }

  if (stats.plateAppearances === 0) {
    throw new InvalidStatsError(playerId, 'no recorded plate appearances');
  }

  const extraBaseHits = stats.doubles + stats.triples + stats.homeRuns;
  if (stats.hits < extraBaseHits) {
    throw new InvalidStatsError(
      playerId,
      `hits (${stats.hits}) is less than doubles + triples + home runs (${extraBaseHits})`
    );
  }
  if (stats.atBats < stats.hits) {
    throw new InvalidStatsError(playerId, `at bats (${stats.atBats}) is less than hits (${stats.hits})`);
  }
  if (stats.atBats > stats.plateAppearances) {
    throw new InvalidStatsError(
      playerId,
      `at bats (${stats.atBats}) exceeds plate appearances (${stats.plateAppearances})`
    );
  }

  const xbp = stats.extraBasePercentage;
  if (!Number.isFinite(xbp) || xbp < 0 || xbp > 1) {
    throw new InvalidStatsError(playerId, `extraBasePercentage must be within [0, 1], got ${xbp}`);
  }
  if (!Number.isFinite(stats.gbFbRatio) || stats.gbFbRatio < 0) {
    throw new InvalidStatsError(playerId, `gbFbRatio must be >= 0, got ${stats.gbFbRatio}`);
  }
}

/**
 * Sum of all outcome probabilities
 */
export function sumDistribution(distribution: OutcomeDistribution): number {
  return OUTCOMES.reduce((sum, outcome) => sum + distribution[outcome], 0);
}
