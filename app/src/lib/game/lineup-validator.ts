/**
 * Lineup Validator
 *
 * Checks that a batting order is exactly nine distinct player IDs, all of
 * them on the roster, before any game is simulated.
 */

import { InvalidLineupError } from '@lineup-sim/model';
import type { Player, ResolvedLineup, Roster } from './types.js';
import { LINEUP_SIZE } from './types.js';

export interface LineupValidationResult {
	/** Whether the lineup passes all validation rules */
	isValid: boolean;
	/** Critical errors that prevent the lineup from being simulated */
	errors: string[];
	/** Warnings about unusual but legal lineups */
	warnings: string[];
}

/**
 * A player whose line contains no strikeouts and no outs on balls in play
 * can never be retired.
 */
function neverMakesAnOut(player: Player): boolean {
	const { atBats, hits, strikeouts } = player.stats;
	return strikeouts === 0 && atBats - hits <= 0;
}

/**
 * Validate a batting order against the roster
 */
export function validateLineup(lineupIds: readonly string[], roster: Roster): LineupValidationResult {
	const errors: string[] = [];
	const warnings: string[] = [];

	if (lineupIds.length !== LINEUP_SIZE) {
		errors.push(`Lineup has ${lineupIds.length} players, expected ${LINEUP_SIZE}`);
	}

	const seen = new Set<string>();
	lineupIds.forEach((id, index) => {
		if (seen.has(id)) {
			errors.push(`Player ${id} appears more than once (slot ${index + 1})`);
		}
		seen.add(id);

		const player = roster.get(id);
		if (!player) {
			errors.push(`Player ${id} (slot ${index + 1}) is not on the roster`);
		} else if (neverMakesAnOut(player)) {
			warnings.push(`Player ${id} (slot ${index + 1}) has no recorded outs and can never be retired`);
		}
	});

	return {
		isValid: errors.length === 0,
		errors,
		warnings,
	};
}

export interface ResolveLineupOptions {
	/** Log validation warnings (default true); sweeps report them once up front */
	reportWarnings?: boolean;
}

/**
 * Validate and resolve a batting order to players, slot 0 leading off.
 * Throws InvalidLineupError listing every problem found.
 */
export function resolveLineup(
	lineupIds: readonly string[],
	roster: Roster,
	options: ResolveLineupOptions = {}
): ResolvedLineup {
	const validation = validateLineup(lineupIds, roster);
	if (!validation.isValid) {
		throw new InvalidLineupError('Invalid lineup', validation.errors);
	}
	if (options.reportWarnings ?? true) {
		for (const warning of validation.warnings) {
			console.warn(`[Simulator] ${warning}`);
		}
	}

	const lineup: Player[] = [];
	for (const id of lineupIds) {
		const player = roster.get(id);
		if (player) {
			lineup.push(player);
		}
	}
	return lineup;
}
