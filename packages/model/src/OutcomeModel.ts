/**
 * Plate appearance outcome model
 *
 * Turns a hitter's cumulative season line into a probability for each of
 * the nine outcomes:
 * - walk, hit by pitch and strikeout rates are counted per plate appearance
 * - single/double/triple/home run rates are counted per at bat, then scaled
 *   by AB/PA into plate-appearance space
 * - whatever probability is left is a ball in play turned into an out, split
 *   into ground outs and fly outs by the GB/FB ratio:
 *   P(GO) = rest × ratio / (1 + ratio), P(FO) = rest - P(GO)
 */

import type { ModelConfig, Outcome, OutcomeDistribution, Player, PlayerStats } from './types.js';
import { OUTCOMES } from './types.js';
import { ModelConsistencyError } from './errors.js';
import type { RandomSource } from './random.js';
import { sumDistribution, validatePlayerStats } from './utils.js';

const DEFAULT_TOLERANCE = 1e-6;

/**
 * Compute the distribution for one stat line. Pure.
 */
function computeDistribution(playerId: string, stats: PlayerStats, tolerance: number): OutcomeDistribution {
  validatePlayerStats(playerId, stats);

  const pa = stats.plateAppearances;
  const ab = stats.atBats;
  const singles = stats.hits - (stats.doubles + stats.triples + stats.homeRuns);

  // Rate per at bat, rescaled to plate appearances. AB = 0 implies no hits.
  const perAtBat = (count: number): number => (ab > 0 ? (count / ab) * (ab / pa) : 0);

  const walk = stats.walks / pa;
  const hitByPitch = stats.hitByPitch / pa;
  const strikeout = stats.strikeouts / pa;
  const single = perAtBat(singles);
  const double = perAtBat(stats.doubles);
  const triple = perAtBat(stats.triples);
  const homeRun = perAtBat(stats.homeRuns);

  const rest = 1 - (walk + hitByPitch + strikeout + single + double + triple + homeRun);
  if (rest < -tolerance) {
    throw new ModelConsistencyError(
      `Player ${playerId}: walks, HBP, strikeouts and hits account for ${(1 - rest).toFixed(6)} of plate appearances`
    );
  }
  const inPlayOuts = Math.max(rest, 0);

  const groundOutShare = stats.gbFbRatio / (1 + stats.gbFbRatio);
  const groundOut = inPlayOuts * groundOutShare;
  const flyOut = inPlayOuts - groundOut;

  const distribution: OutcomeDistribution = {
    walk,
    hitByPitch,
    strikeout,
    single,
    double,
    triple,
    homeRun,
    groundOut,
    flyOut,
  };

  for (const outcome of OUTCOMES) {
    const p = distribution[outcome];
    if (!Number.isFinite(p) || p < 0) {
      throw new ModelConsistencyError(`Player ${playerId}: ${outcome} probability is ${p}`);
    }
  }

  const sum = sumDistribution(distribution);
  if (Math.abs(sum - 1.0) > tolerance) {
    throw new ModelConsistencyError(`Player ${playerId}: distribution sums to ${sum}, expected 1.0`);
  }

  return Object.freeze(distribution);
}

/**
 * OutcomeModel class for deriving and sampling plate appearance outcomes.
 *
 * Distributions are cached per player ID. The cache is only ever filled,
 * never mutated, so one model can serve many lineups.
 */
export class OutcomeModel {
  private config: ModelConfig;
  private cache = new Map<string, OutcomeDistribution>();

  constructor(config: Partial<ModelConfig> = {}) {
    this.config = {
      tolerance: config.tolerance ?? DEFAULT_TOLERANCE,
    };
  }

  /**
   * Distribution for a bare stat line (not cached)
   */
  distribution(stats: PlayerStats, playerId: string = 'unknown'): OutcomeDistribution {
    return computeDistribution(playerId, stats, this.config.tolerance);
  }

  /**
   * Distribution for a rostered player, computed once per player ID
   */
  distributionFor(player: Player): OutcomeDistribution {
    const cached = this.cache.get(player.id);
    if (cached) {
      return cached;
    }
    const distribution = computeDistribution(player.id, player.stats, this.config.tolerance);
    this.cache.set(player.id, distribution);
    return distribution;
  }

  /**
   * Sample an outcome from a probability distribution
   * Uses inverse transform sampling
   */
  sample(distribution: OutcomeDistribution, random: RandomSource): Outcome {
    const r = random();

    let cumulative = 0;
    for (const outcome of OUTCOMES) {
      cumulative += distribution[outcome];
      if (r < cumulative) {
        return outcome;
      }
    }

    // Rounding left the total a hair under r; use the last outcome that can happen
    for (let i = OUTCOMES.length - 1; i >= 0; i--) {
      if (distribution[OUTCOMES[i]] > 0) {
        return OUTCOMES[i];
      }
    }
    throw new ModelConsistencyError('Cannot sample from an all-zero distribution');
  }

  /**
   * Number of cached player distributions
   */
  get cacheSize(): number {
    return this.cache.size;
  }

  clearCache(): void {
    this.cache.clear();
  }

  /**
   * Get current model configuration
   */
  getConfig(): ModelConfig {
    return { ...this.config };
  }
}
