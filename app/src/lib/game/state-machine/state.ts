/**
 * Baseball game state machine - state types and utilities
 * Models the 24 base/out states (0/1/2 outs × 8 base configurations)
 */

import { InvalidStateError } from '@lineup-sim/model';
import type { Base, BasesSnapshot, LineupSlot } from '../types.js';
import { LINEUP_SIZE } from '../types.js';

/**
 * Base configuration as a 3-bit bitmap for efficient representation
 * bit 0 = 1B, bit 1 = 2B, bit 2 = 3B
 */
export type BaseConfig = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7;

export type OutCount = 0 | 1 | 2 | 3;

export const BaseConfigNames: Record<BaseConfig, string> = {
	0: 'empty',
	1: '1B',
	2: '2B',
	3: '1B&2B',
	4: '3B',
	5: '1B&3B',
	6: '2B&3B',
	7: 'loaded',
};

/** Bases in order from first to third */
export const BASES: readonly Base[] = ['first', 'second', 'third'];

/** Bases in lead-runner-first order */
export const BASES_LEAD_FIRST: readonly Base[] = ['third', 'second', 'first'];

/** 0-based base index used by config weights and snapshots */
export const BASE_INDEX: Record<Base, 0 | 1 | 2> = { first: 0, second: 1, third: 2 };

/**
 * Base/out state for baserunning transitions.
 * outs === 3 only ever appears on a result and signals the inning is over.
 */
export interface BaserunningState {
	outs: OutCount;
	bases: BaseConfig;
	runners: {
		first: LineupSlot | null;
		second: LineupSlot | null;
		third: LineupSlot | null;
	};
}

/**
 * Individual baserunning event for tracking runner movement
 */
export interface BaserunningEvent {
	runnerSlot: LineupSlot;
	from: 'batter' | Base;
	to: Base | 'home' | 'out';
}

/**
 * Convert runners object to BaseConfig bitmap
 */
export function runnersToBaseConfig(runners: BaserunningState['runners']): BaseConfig {
	const first = runners.first !== null ? 1 : 0;
	const second = runners.second !== null ? 2 : 0;
	const third = runners.third !== null ? 4 : 0;
	switch (first | second | third) {
		case 0:
			return 0;
		case 1:
			return 1;
		case 2:
			return 2;
		case 3:
			return 3;
		case 4:
			return 4;
		case 5:
			return 5;
		case 6:
			return 6;
		default:
			return 7;
	}
}

/**
 * Clamp a raw out count into the state's range
 */
export function toOutCount(outs: number): OutCount {
	if (outs <= 0) return 0;
	if (outs === 1) return 1;
	if (outs === 2) return 2;
	return 3;
}

/**
 * Create a baserunning state from an out count and [first, second, third]
 */
export function createBaserunningState(outs: number, bases: BasesSnapshot): BaserunningState {
	const runners = {
		first: bases[0],
		second: bases[1],
		third: bases[2],
	};
	return {
		outs: toOutCount(outs),
		bases: runnersToBaseConfig(runners),
		runners,
	};
}

/**
 * State at the start of every half-inning
 */
export function createEmptyState(): BaserunningState {
	return createBaserunningState(0, [null, null, null]);
}

/**
 * Independent copy for mutation by a rule
 */
export function cloneState(state: BaserunningState): BaserunningState {
	return {
		outs: state.outs,
		bases: state.bases,
		runners: {
			first: state.runners.first,
			second: state.runners.second,
			third: state.runners.third,
		},
	};
}

/**
 * [first, second, third] view of the runners
 */
export function snapshotBases(state: BaserunningState): BasesSnapshot {
	return [state.runners.first, state.runners.second, state.runners.third];
}

/**
 * Check if a specific base is occupied
 */
export function isBaseOccupied(state: BaserunningState, base: Base): boolean {
	return state.runners[base] !== null;
}

/**
 * Check if bases are empty
 */
export function isBasesEmpty(state: BaserunningState): boolean {
	return state.bases === 0;
}

/**
 * Count runners on base
 */
export function countRunners(state: BaserunningState): number {
	return BASES.filter((base) => state.runners[base] !== null).length;
}

/**
 * Runners forced to move if the batter reaches first: the contiguous chain
 * of occupied bases starting at first, in base order.
 */
export function forcedBases(state: BaserunningState): Base[] {
	const forced: Base[] = [];
	for (const base of BASES) {
		if (state.runners[base] === null) break;
		forced.push(base);
	}
	return forced;
}

function isSlot(value: number): boolean {
	return Number.isInteger(value) && value >= 0 && value < LINEUP_SIZE;
}

/**
 * Guard against states that legal play can never produce.
 * Throws InvalidStateError; never expected to fire in a correct engine.
 */
export function assertValidState(state: BaserunningState, batterSlot: LineupSlot): void {
	if (!Number.isInteger(state.outs) || state.outs < 0 || state.outs > 2) {
		throw new InvalidStateError(`Cannot resolve a plate appearance with ${state.outs} outs`);
	}
	if (!isSlot(batterSlot)) {
		throw new InvalidStateError(`Batter slot ${batterSlot} is outside the batting order`);
	}
	if (runnersToBaseConfig(state.runners) !== state.bases) {
		throw new InvalidStateError(
			`Base bitmap ${state.bases} does not match runners (${BaseConfigNames[runnersToBaseConfig(state.runners)]})`
		);
	}

	const seen = new Set<LineupSlot>();
	for (const base of BASES) {
		const slot = state.runners[base];
		if (slot === null) continue;
		if (!isSlot(slot)) {
			throw new InvalidStateError(`Runner on ${base} has invalid slot ${slot}`);
		}
		if (seen.has(slot)) {
			throw new InvalidStateError(`Slot ${slot} occupies more than one base`);
		}
		if (slot === batterSlot) {
			throw new InvalidStateError(`Slot ${slot} is on ${base} while due up to bat`);
		}
		seen.add(slot);
	}
}
