/**
 * Core types for the plate appearance outcome model
 */

/**
 * The nine plate appearance outcomes the simulator resolves.
 * Grouped by category for readability.
 */
export type Outcome =
  // Hits
  | 'single'
  | 'double'
  | 'triple'
  | 'homeRun'
  // Free passes
  | 'walk'
  | 'hitByPitch'
  // Strikeout
  | 'strikeout'
  // Ball-in-play outs
  | 'groundOut'
  | 'flyOut';

/**
 * Canonical outcome order. Sampling walks the distribution in this order,
 * so it must stay stable for seeded runs to be reproducible.
 */
export const OUTCOMES: readonly Outcome[] = [
  'walk',
  'hitByPitch',
  'strikeout',
  'single',
  'double',
  'triple',
  'homeRun',
  'groundOut',
  'flyOut',
] as const;

/**
 * Cumulative season statistics for one hitter.
 */
export interface PlayerStats {
  plateAppearances: number;
  atBats: number;
  hits: number;
  doubles: number;
  triples: number;
  homeRuns: number;
  walks: number;
  strikeouts: number;
  hitByPitch: number;
  /** Probability (0-1) of taking an extra, unforced base when the play allows it */
  extraBasePercentage: number;
  /** Ground ball to fly ball ratio (>= 0); splits balls in play that become outs */
  gbFbRatio: number;
}

/**
 * A rostered player. Read-only for the duration of a simulation.
 */
export interface Player {
  readonly id: string;
  readonly name: string;
  readonly stats: Readonly<PlayerStats>;
}

/**
 * Roster keyed by player ID
 */
export type Roster = ReadonlyMap<string, Player>;

/**
 * Probability of each outcome for one plate appearance. Sums to 1.0.
 */
export type OutcomeDistribution = Readonly<Record<Outcome, number>>;

/**
 * Outcome model configuration
 */
export interface ModelConfig {
  /** Allowed deviation of the distribution sum from 1.0 */
  tolerance: number;
}
