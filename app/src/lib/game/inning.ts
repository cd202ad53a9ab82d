/**
 * Half-inning loop: plate appearances through the batting order until
 * three outs.
 */

import type { OutcomeDistribution, OutcomeModel } from '@lineup-sim/model';
import type { GameObserver, InningSummary, LineupSlot, ResolvedLineup } from './types.js';
import { LINEUP_SIZE } from './types.js';
import { createEmptyState, snapshotBases, transition } from './state-machine/index.js';
import type { ResolutionContext } from './state-machine/index.js';

export interface InningContext {
	lineup: ResolvedLineup;
	/** OutcomeDistribution per slot, computed once per lineup */
	distributions: readonly OutcomeDistribution[];
	model: OutcomeModel;
	resolution: ResolutionContext;
	observer?: GameObserver;
}

/**
 * Play one half-inning starting with `leadoffSlot` at the plate.
 * There is no cap on plate appearances; the caller guarantees the lineup
 * can make outs.
 */
export function simulateInning(
	context: InningContext,
	gameNumber: number,
	inning: number,
	leadoffSlot: LineupSlot
): InningSummary {
	const { lineup, distributions, model, resolution, observer } = context;
	let state = createEmptyState();
	let batterSlot = leadoffSlot;
	let runs = 0;
	let plateAppearances = 0;

	while (state.outs < 3) {
		const outcome = model.sample(distributions[batterSlot], resolution.random);
		const result = transition(state, outcome, batterSlot, resolution);

		runs += result.runsScored;
		plateAppearances++;

		observer?.onPlay?.({
			gameNumber,
			inning,
			batterSlot,
			playerId: lineup[batterSlot].id,
			outcome,
			play: result.play,
			outsBefore: state.outs,
			outsAfter: result.nextState.outs,
			basesBefore: snapshotBases(state),
			basesAfter: snapshotBases(result.nextState),
			runsScored: result.runsScored,
			scorerSlots: result.scorerSlots,
			outSlots: result.outSlots,
		});

		state = result.nextState;
		batterSlot = (batterSlot + 1) % LINEUP_SIZE;
	}

	const summary: InningSummary = {
		gameNumber,
		inning,
		runs,
		plateAppearances,
		nextBatterSlot: batterSlot,
	};
	observer?.onInningEnd?.(summary);
	return summary;
}
