/**
 * Double play: the batter and one forced runner are retired.
 *
 * The runner is drawn by weight from the forced chain starting at 1B
 * (doublePlayRunnerOutWeights, keyed by base). If the play does not end the
 * inning, the surviving runners each try for one extra base.
 */

import { weightedDraw } from '@lineup-sim/model';
import type { Base, LineupSlot } from '../../types.js';
import type { BaserunningState } from '../state.js';
import { forcedBases, toOutCount } from '../state.js';
import type { PlayLog, ResolutionContext } from '../movement.js';
import { putOut, tryExtraBaseEach } from '../movement.js';

/**
 * Resolve a double play in place on an already cloned state.
 * Callers guarantee a runner on first and fewer than two outs.
 */
export function resolveDoublePlay(
	nextState: BaserunningState,
	batterSlot: LineupSlot,
	log: PlayLog,
	context: ResolutionContext
): void {
	const forced = forcedBases(nextState);
	const victim: Base = weightedDraw(
		forced.map((base) => ({ value: base, weight: context.config.doublePlayRunnerOutWeights[base] })),
		context.random
	);

	const runnerSlot = nextState.runners[victim];
	if (runnerSlot !== null) {
		putOut(nextState, log, runnerSlot, victim);
	}
	putOut(nextState, log, batterSlot, 'batter');
	nextState.outs = toOutCount(nextState.outs + 2);

	if (nextState.outs < 3) {
		tryExtraBaseEach(nextState, log, context);
	}
}
