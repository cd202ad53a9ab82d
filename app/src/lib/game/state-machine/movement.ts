/**
 * Runner movement primitives shared by the outcome rules.
 *
 * Rules mutate a cloned state through these helpers so that every move is
 * recorded in the play log and the base bitmap stays in sync.
 */

import { InvalidStateError, chance } from '@lineup-sim/model';
import type { RandomSource } from '@lineup-sim/model';
import type { Base, LineupSlot, PlayType, SimulationConfig } from '../types.js';
import type { BaserunningEvent, BaserunningState } from './state.js';
import { BASES, BASES_LEAD_FIRST, BASE_INDEX, runnersToBaseConfig } from './state.js';

/**
 * What a rule needs beyond the state itself
 */
export interface ResolutionContext {
	config: SimulationConfig;
	random: RandomSource;
	/** Extra-base percentage of the player batting in a slot */
	extraBasePercentage: (slot: LineupSlot) => number;
}

/**
 * Everything that happened to runners on one play
 */
export interface PlayLog {
	advancement: BaserunningEvent[];
	scorerSlots: LineupSlot[];
	outSlots: LineupSlot[];
}

/**
 * What each outcome rule hands back to transition()
 */
export interface RuleResult {
	nextState: BaserunningState;
	play: PlayType;
}

/** Index 3 is home plate */
export type Destination = 0 | 1 | 2 | 3;

const HOME: Destination = 3;

export function createPlayLog(): PlayLog {
	return { advancement: [], scorerSlots: [], outSlots: [] };
}

function vacate(state: BaserunningState, from: 'batter' | Base): void {
	if (from !== 'batter') {
		state.runners[from] = null;
	}
}

/**
 * Move a runner (or the batter) to a base or home and record it
 */
export function advanceRunner(
	state: BaserunningState,
	log: PlayLog,
	slot: LineupSlot,
	from: 'batter' | Base,
	to: Base | 'home'
): void {
	vacate(state, from);
	if (to === 'home') {
		log.scorerSlots.push(slot);
	} else {
		if (state.runners[to] !== null) {
			throw new InvalidStateError(`Slot ${slot} cannot move to occupied ${to} base`);
		}
		state.runners[to] = slot;
	}
	state.bases = runnersToBaseConfig(state.runners);
	log.advancement.push({ runnerSlot: slot, from, to });
}

/**
 * Score a runner from a base
 */
export function scoreRunner(state: BaserunningState, log: PlayLog, slot: LineupSlot, from: 'batter' | Base): void {
	advanceRunner(state, log, slot, from, 'home');
}

/**
 * Retire a runner (or the batter). Does not touch the out count.
 */
export function putOut(state: BaserunningState, log: PlayLog, slot: LineupSlot, from: 'batter' | Base): void {
	vacate(state, from);
	state.bases = runnersToBaseConfig(state.runners);
	log.outSlots.push(slot);
	log.advancement.push({ runnerSlot: slot, from, to: 'out' });
}

/**
 * Batter takes first; the contiguous chain of runners from first moves up
 * exactly one base. Runners beyond a gap stay put.
 */
export function forceBatterToFirst(state: BaserunningState, log: PlayLog, batterSlot: LineupSlot): void {
	const { first, second, third } = state.runners;
	if (first !== null) {
		if (second !== null) {
			if (third !== null) {
				scoreRunner(state, log, third, 'third');
			}
			advanceRunner(state, log, second, 'second', 'third');
		}
		advanceRunner(state, log, first, 'first', 'second');
	}
	advanceRunner(state, log, batterSlot, 'batter', 'first');
}

function destinationName(index: Destination): Base | 'home' {
	return index === HOME ? 'home' : BASES[index];
}

/**
 * Send a runner toward `target`, holding up one base at a time when the
 * base ahead is still occupied, but never short of `floor`.
 *
 * Rules call this lead runner first, so a base counts as free only once
 * the runner ahead has actually left it this play.
 */
export function advanceWithTraffic(
	state: BaserunningState,
	log: PlayLog,
	from: Base,
	target: Destination,
	floor: Destination
): void {
	const slot = state.runners[from];
	if (slot === null) {
		throw new InvalidStateError(`No runner on ${from} to advance`);
	}
	const start = BASE_INDEX[from];

	for (let index: number = target; index >= floor; index--) {
		if (index === start) {
			return; // holds
		}
		if (index === HOME) {
			scoreRunner(state, log, slot, from);
			return;
		}
		const base = BASES[index];
		if (state.runners[base] === null) {
			advanceRunner(state, log, slot, from, base);
			return;
		}
	}

	throw new InvalidStateError(`Runner on ${from} is blocked short of ${destinationName(floor)}`);
}

/**
 * Destination `bases` past a runner's base, capped at home
 */
export function basesAhead(from: Base, bases: number): Destination {
	const index = BASE_INDEX[from] + bases;
	if (index <= 0) return 0;
	if (index === 1) return 1;
	if (index === 2) return 2;
	return HOME;
}

/**
 * Each listed runner independently tries for one extra base with their
 * extra-base percentage; a runner whose next base is still occupied holds.
 * Used for tag-ups on fly balls and for runners on a ground ball who are
 * not forced.
 */
export function tryExtraBaseEach(
	state: BaserunningState,
	log: PlayLog,
	context: ResolutionContext,
	eligible: readonly Base[] = BASES_LEAD_FIRST
): void {
	for (const base of BASES_LEAD_FIRST) {
		if (!eligible.includes(base)) continue;
		const slot = state.runners[base];
		if (slot === null) continue;
		if (chance(context.extraBasePercentage(slot), context.random)) {
			advanceWithTraffic(state, log, base, basesAhead(base, 1), BASE_INDEX[base]);
		}
	}
}
