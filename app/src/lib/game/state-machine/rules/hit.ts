/**
 * Hit baserunning rules
 *
 * Rules:
 * - Single: 3B scores. 2B goes to 3B, or scores on an extra-base draw.
 *   1B goes to 2B, or to 3B on an extra-base draw if 3B is free by then.
 * - Double: 3B and 2B score. 1B goes to 3B, or scores on an extra-base draw.
 * - Triple: everyone scores, batter to 3B
 * - Home run: everyone scores, bases cleared
 *
 * Runners are resolved lead first so that a trailing runner only sees a
 * base as free once the runner ahead has left it.
 */

import { chance } from '@lineup-sim/model';
import type { LineupSlot } from '../../types.js';
import type { BaserunningState } from '../state.js';
import { BASES_LEAD_FIRST, cloneState } from '../state.js';
import type { PlayLog, ResolutionContext, RuleResult } from '../movement.js';
import { advanceRunner, advanceWithTraffic, scoreRunner } from '../movement.js';

export type HitOutcome = 'single' | 'double' | 'triple' | 'homeRun';

function extraBase(state: BaserunningState, base: 'first' | 'second', context: ResolutionContext): boolean {
	const slot = state.runners[base];
	return slot !== null && chance(context.extraBasePercentage(slot), context.random);
}

function scoreEveryone(state: BaserunningState, log: PlayLog): void {
	for (const base of BASES_LEAD_FIRST) {
		const slot = state.runners[base];
		if (slot !== null) {
			scoreRunner(state, log, slot, base);
		}
	}
}

export function handleHit(
	currentState: BaserunningState,
	outcome: HitOutcome,
	batterSlot: LineupSlot,
	log: PlayLog,
	context: ResolutionContext
): RuleResult {
	const nextState = cloneState(currentState);
	const { second, third } = nextState.runners;

	switch (outcome) {
		case 'single': {
			if (third !== null) {
				scoreRunner(nextState, log, third, 'third');
			}
			if (second !== null) {
				advanceWithTraffic(nextState, log, 'second', extraBase(nextState, 'second', context) ? 3 : 2, 2);
			}
			if (nextState.runners.first !== null) {
				advanceWithTraffic(nextState, log, 'first', extraBase(nextState, 'first', context) ? 2 : 1, 1);
			}
			advanceRunner(nextState, log, batterSlot, 'batter', 'first');
			break;
		}
		case 'double': {
			if (third !== null) {
				scoreRunner(nextState, log, third, 'third');
			}
			if (second !== null) {
				scoreRunner(nextState, log, second, 'second');
			}
			if (nextState.runners.first !== null) {
				advanceWithTraffic(nextState, log, 'first', extraBase(nextState, 'first', context) ? 3 : 2, 2);
			}
			advanceRunner(nextState, log, batterSlot, 'batter', 'second');
			break;
		}
		case 'triple':
			scoreEveryone(nextState, log);
			advanceRunner(nextState, log, batterSlot, 'batter', 'third');
			break;
		case 'homeRun':
			scoreEveryone(nextState, log);
			scoreRunner(nextState, log, batterSlot, 'batter');
			break;
	}

	return { nextState, play: outcome };
}
