/**
 * @lineup-sim/model - Plate appearance outcome model
 *
 * Derives per-player outcome probabilities from season statistics and
 * provides the injected random sources the simulator draws from.
 */

// Core types
export type {
  Outcome,
  PlayerStats,
  Player,
  Roster,
  OutcomeDistribution,
  ModelConfig,
} from './types.js';
export { OUTCOMES } from './types.js';

// Main model class
export { OutcomeModel } from './OutcomeModel.js';

// Errors
export {
  SimulationError,
  InvalidStatsError,
  InvalidLineupError,
  InvalidStateError,
  ModelConsistencyError,
  NoDataError,
  InvalidConfigError,
  SimulationAbortedError,
} from './errors.js';

// Randomness
export type { RandomSource, WeightedCandidate } from './random.js';
export {
  createSeededRandom,
  createSequenceRandom,
  deriveSeed,
  chance,
  weightedDraw,
} from './random.js';

// Utility functions
export { validatePlayerStats, sumDistribution } from './utils.js';
