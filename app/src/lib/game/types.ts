/**
 * Types for the lineup game engine
 */

import type { Outcome, Player } from '@lineup-sim/model';

// Re-export model types used throughout the app
export type { Outcome, Player, PlayerStats, Roster, OutcomeDistribution, RandomSource } from '@lineup-sim/model';

/** Number of batting order slots */
export const LINEUP_SIZE = 9;

/**
 * Index (0-8) of a batting order slot. A runner on base is identified by
 * the slot that put them there, never by a copy of the player.
 */
export type LineupSlot = number;

export type Base = 'first' | 'second' | 'third';

/** Who can be retired on a fielder's choice: the batter or a runner on a base */
export type FieldersChoiceTarget = 'batter' | Base;

/**
 * Immutable knobs for baserunning resolution and game length.
 * Build with createSimulationConfig().
 */
export interface SimulationConfig {
	/** Probability a ground ball with a force in order and < 2 outs is turned into a double play attempt */
	readonly dpAttemptProbabilityOnGroundOut: number;
	/** Relative weight of each forced runner being the second out of a double play */
	readonly doublePlayRunnerOutWeights: Readonly<Record<Base, number>>;
	/** Relative weight of each candidate being retired on a fielder's choice */
	readonly fieldersChoiceOutWeights: Readonly<Record<FieldersChoiceTarget, number>>;
	readonly inningsPerGame: number;
	/** Games simulated per lineup */
	readonly numGames: number;
}

/**
 * Base occupancy as [first, second, third]
 */
export type BasesSnapshot = readonly [LineupSlot | null, LineupSlot | null, LineupSlot | null];

/**
 * How a plate appearance was resolved on the field
 */
export type PlayType =
	| 'single'
	| 'double'
	| 'triple'
	| 'homeRun'
	| 'walk'
	| 'hitByPitch'
	| 'strikeout'
	| 'groundOut'
	| 'doublePlay'
	| 'fieldersChoice'
	| 'flyOut'
	| 'sacrificeFly';

/**
 * One plate appearance in the play-by-play trace
 */
export interface PlayEvent {
	gameNumber: number;
	inning: number;
	batterSlot: LineupSlot;
	playerId: string;
	outcome: Outcome;
	play: PlayType;
	outsBefore: number;
	outsAfter: number;
	basesBefore: BasesSnapshot;
	basesAfter: BasesSnapshot;
	runsScored: number;
	scorerSlots: LineupSlot[];
	outSlots: LineupSlot[];
}

/**
 * End-of-inning line
 */
export interface InningSummary {
	gameNumber: number;
	inning: number;
	runs: number;
	plateAppearances: number;
	/** Slot due up to lead off the next inning */
	nextBatterSlot: LineupSlot;
}

/**
 * Total runs for one simulated game
 */
export interface GameResult {
	gameNumber: number;
	runs: number;
	inningRuns: number[];
	plateAppearances: number;
}

/**
 * Side-channel observers. They only read; simulation outcomes never depend
 * on whether they are attached.
 */
export interface GameObserver {
	onPlay?: (event: PlayEvent) => void;
	onInningEnd?: (summary: InningSummary) => void;
}

/**
 * A batting order resolved against the roster, slot 0 leading off
 */
export type ResolvedLineup = readonly Player[];
