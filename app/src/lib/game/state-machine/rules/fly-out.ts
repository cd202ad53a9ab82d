/**
 * Fly out baserunning rules
 *
 * Rules:
 * - 2 outs before: third out, nothing else happens
 * - Otherwise: runner on 3B tags and scores (sacrifice fly);
 *   runners on 2B and 1B each tag up one base on an extra-base draw,
 *   holding if the base ahead is still occupied
 */

import type { LineupSlot } from '../../types.js';
import type { BaserunningState } from '../state.js';
import { cloneState, toOutCount } from '../state.js';
import type { PlayLog, ResolutionContext, RuleResult } from '../movement.js';
import { putOut, scoreRunner, tryExtraBaseEach } from '../movement.js';

export function handleFlyOut(
	currentState: BaserunningState,
	batterSlot: LineupSlot,
	log: PlayLog,
	context: ResolutionContext
): RuleResult {
	const nextState = cloneState(currentState);
	putOut(nextState, log, batterSlot, 'batter');
	nextState.outs = toOutCount(currentState.outs + 1);

	if (nextState.outs === 3) {
		return { nextState, play: 'flyOut' };
	}

	const third = nextState.runners.third;
	if (third !== null) {
		scoreRunner(nextState, log, third, 'third');
	}
	tryExtraBaseEach(nextState, log, context, ['second', 'first']);

	return { nextState, play: third !== null ? 'sacrificeFly' : 'flyOut' };
}
