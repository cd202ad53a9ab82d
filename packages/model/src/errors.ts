/**
 * Error taxonomy for the lineup simulator.
 *
 * None of these are transient: they mean bad input or a bug, so callers
 * surface them instead of retrying.
 */

export class SimulationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed player statistics, or a player with no plate appearances */
export class InvalidStatsError extends SimulationError {
  constructor(
    readonly playerId: string,
    message: string
  ) {
    super(`Player ${playerId}: ${message}`);
  }
}

/** Wrong lineup size, duplicate IDs, or IDs missing from the roster */
export class InvalidLineupError extends SimulationError {
  constructor(
    message: string,
    readonly problems: string[] = []
  ) {
    super(problems.length > 0 ? `${message}: ${problems.join('; ')}` : message);
  }
}

/** Base/out state that can never arise from legal play */
export class InvalidStateError extends SimulationError {}

/** Outcome distribution with a negative rate or a sum away from 1.0 */
export class ModelConsistencyError extends SimulationError {}

/** Aggregation requested over zero game results */
export class NoDataError extends SimulationError {}

/** Unusable simulation config or setup file */
export class InvalidConfigError extends SimulationError {}

/** A caller's AbortSignal fired between games or lineups */
export class SimulationAbortedError extends SimulationError {
  constructor(readonly completed: number) {
    super(`Simulation aborted after ${completed} completed item(s)`);
  }
}
