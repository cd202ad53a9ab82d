/**
 * Baseball game state machine - state transition function
 * Pure given the injected random source, for testability
 */

import type { LineupSlot, Outcome, PlayType } from '../types.js';
import type { BaserunningEvent, BaserunningState } from './state.js';
import { assertValidState, createEmptyState } from './state.js';
import type { ResolutionContext, RuleResult } from './movement.js';
import { createPlayLog } from './movement.js';
import { handleGroundOut } from './rules/ground-out.js';
import { handleWalkOrHBP } from './rules/walk.js';
import { handleHit } from './rules/hit.js';
import { handleStrikeout } from './rules/strikeout.js';
import { handleFlyOut } from './rules/fly-out.js';

/**
 * Result of a state transition
 */
export interface TransitionResult {
	/** outs === 3 means the half-inning is over; bases are then empty */
	nextState: BaserunningState;
	runsScored: number;
	scorerSlots: LineupSlot[];
	/** Slots retired on the play, batter included */
	outSlots: LineupSlot[];
	advancement: BaserunningEvent[];
	play: PlayType;
}

/**
 * Core state transition function
 * Returns the next state based on baseball rules
 *
 * @param currentState - Base/out state before the plate appearance (0-2 outs)
 * @param outcome - The outcome of the plate appearance
 * @param batterSlot - Batting order slot at the plate
 * @param context - Config, random source and per-slot extra-base percentage
 */
export function transition(
	currentState: BaserunningState,
	outcome: Outcome,
	batterSlot: LineupSlot,
	context: ResolutionContext
): TransitionResult {
	assertValidState(currentState, batterSlot);

	const log = createPlayLog();
	let result: RuleResult;

	switch (outcome) {
		case 'single':
		case 'double':
		case 'triple':
		case 'homeRun':
			result = handleHit(currentState, outcome, batterSlot, log, context);
			break;
		case 'walk':
		case 'hitByPitch':
			result = handleWalkOrHBP(currentState, outcome, batterSlot, log);
			break;
		case 'strikeout':
			result = handleStrikeout(currentState, batterSlot, log);
			break;
		case 'groundOut':
			result = handleGroundOut(currentState, batterSlot, log, context);
			break;
		case 'flyOut':
			result = handleFlyOut(currentState, batterSlot, log, context);
			break;
		default: {
			const exhaustive: never = outcome;
			throw new Error(`Unhandled outcome: ${String(exhaustive)}`);
		}
	}

	// Third out: nothing on the play counts and the half-inning is over
	if (result.nextState.outs === 3) {
		const nextState = createEmptyState();
		nextState.outs = 3;
		return {
			nextState,
			runsScored: 0,
			scorerSlots: [],
			outSlots: log.outSlots,
			advancement: log.advancement,
			play: result.play,
		};
	}

	return {
		nextState: result.nextState,
		runsScored: log.scorerSlots.length,
		scorerSlots: log.scorerSlots,
		outSlots: log.outSlots,
		advancement: log.advancement,
		play: result.play,
	};
}
