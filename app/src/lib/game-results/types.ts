/**
 * Types for lineup results and the results database
 */

/**
 * Distribution of per-game runs for one batting order.
 * The externally visible artifact of a lineup run.
 */
export interface LineupScoreSummary {
  games: number;
  /** Arithmetic mean runs per game */
  mean: number;
  totalRuns: number;
  min: number;
  max: number;
  median: number;
  /** Population standard deviation */
  standardDeviation: number;
  /** histogram[r] = number of games with exactly r runs */
  histogram: number[];
}

/**
 * What produced a run: one lineup, a permutation sweep, or the re-run of a
 * sweep's best lineups
 */
export type RunKind = 'single' | 'sweep' | 'rerun';

export type RunStatus = 'running' | 'completed' | 'aborted' | 'failed';

export interface RunRecord {
  id: string;
  kind: RunKind;
  parentRunId: string | null;
  /** SimulationConfig as JSON */
  configJson: string;
  numGames: number;
  seed: number | null;
  createdAt: string;
  completedAt: string | null;
  status: RunStatus;
}

export interface RunInput {
  kind: RunKind;
  config: object;
  numGames: number;
  seed?: number | null;
  parentRunId?: string | null;
}

export interface LineupResult {
  runId: string;
  /** Player IDs, leadoff first */
  lineup: string[];
  summary: LineupScoreSummary;
}
