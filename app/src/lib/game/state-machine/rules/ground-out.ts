/**
 * Ground out baserunning rules
 *
 * Rules:
 * - 2 outs before: third out, no advancement, no scoring
 * - Bases empty: plain out
 * - Runners on but 1B empty (no force): batter out, each runner tries for
 *   one extra base
 * - Force in order: double play with dpAttemptProbabilityOnGroundOut,
 *   otherwise fielder's choice
 */

import { chance } from '@lineup-sim/model';
import type { LineupSlot } from '../../types.js';
import type { BaserunningState } from '../state.js';
import { cloneState, isBaseOccupied, isBasesEmpty, toOutCount } from '../state.js';
import type { PlayLog, ResolutionContext, RuleResult } from '../movement.js';
import { putOut, tryExtraBaseEach } from '../movement.js';
import { resolveDoublePlay } from './double-play.js';
import { resolveFieldersChoice } from './fielders-choice.js';

export function handleGroundOut(
	currentState: BaserunningState,
	batterSlot: LineupSlot,
	log: PlayLog,
	context: ResolutionContext
): RuleResult {
	const nextState = cloneState(currentState);

	if (currentState.outs >= 2 || isBasesEmpty(currentState)) {
		putOut(nextState, log, batterSlot, 'batter');
		nextState.outs = toOutCount(currentState.outs + 1);
		return { nextState, play: 'groundOut' };
	}

	if (!isBaseOccupied(currentState, 'first')) {
		putOut(nextState, log, batterSlot, 'batter');
		nextState.outs = toOutCount(currentState.outs + 1);
		tryExtraBaseEach(nextState, log, context);
		return { nextState, play: 'groundOut' };
	}

	if (chance(context.config.dpAttemptProbabilityOnGroundOut, context.random)) {
		resolveDoublePlay(nextState, batterSlot, log, context);
		return { nextState, play: 'doublePlay' };
	}

	resolveFieldersChoice(nextState, batterSlot, log, context);
	return { nextState, play: 'fieldersChoice' };
}
