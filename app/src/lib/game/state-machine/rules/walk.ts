/**
 * Walk / Hit By Pitch baserunning rules
 *
 * Rules:
 * - Batter takes 1B
 * - Only the contiguous chain of runners from 1B is forced up one base
 * - Bases loaded: runner from 3B scores
 */

import type { LineupSlot } from '../../types.js';
import type { BaserunningState } from '../state.js';
import { cloneState } from '../state.js';
import type { PlayLog, RuleResult } from '../movement.js';
import { forceBatterToFirst } from '../movement.js';

export function handleWalkOrHBP(
	currentState: BaserunningState,
	outcome: 'walk' | 'hitByPitch',
	batterSlot: LineupSlot,
	log: PlayLog
): RuleResult {
	const nextState = cloneState(currentState);
	forceBatterToFirst(nextState, log, batterSlot);
	return { nextState, play: outcome };
}
