/**
 * Fielder's choice: exactly one of {batter, forced runners} is retired,
 * drawn by fieldersChoiceOutWeights.
 *
 * - A runner is the out: runners no longer forced once that runner is gone
 *   each try for one extra base, then the batter takes 1B and pushes the
 *   remaining forced chain.
 * - The batter is the out: every runner tries for one extra base.
 */

import { weightedDraw } from '@lineup-sim/model';
import type { Base, FieldersChoiceTarget, LineupSlot } from '../../types.js';
import type { BaserunningState } from '../state.js';
import { BASES, forcedBases, toOutCount } from '../state.js';
import type { PlayLog, ResolutionContext } from '../movement.js';
import { forceBatterToFirst, putOut, tryExtraBaseEach } from '../movement.js';

/**
 * Resolve a fielder's choice in place on an already cloned state.
 * Callers guarantee a runner on first and fewer than two outs.
 */
export function resolveFieldersChoice(
	nextState: BaserunningState,
	batterSlot: LineupSlot,
	log: PlayLog,
	context: ResolutionContext
): void {
	const forced = forcedBases(nextState);
	const candidates: FieldersChoiceTarget[] = ['batter', ...forced];
	const victim = weightedDraw(
		candidates.map((target) => ({ value: target, weight: context.config.fieldersChoiceOutWeights[target] })),
		context.random
	);
	nextState.outs = toOutCount(nextState.outs + 1);

	if (victim === 'batter') {
		putOut(nextState, log, batterSlot, 'batter');
		tryExtraBaseEach(nextState, log, context);
		return;
	}

	const runnerSlot = nextState.runners[victim];
	if (runnerSlot !== null) {
		putOut(nextState, log, runnerSlot, victim);
	}
	const stillForced = forcedBases(nextState);
	const unforced: Base[] = BASES.filter((base) => !stillForced.includes(base));
	tryExtraBaseEach(nextState, log, context, unforced);
	forceBatterToFirst(nextState, log, batterSlot);
}
