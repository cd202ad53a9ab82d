/**
 * Human-readable play-by-play lines for the game log
 */

import type { BasesSnapshot, InningSummary, LineupSlot, PlayEvent, ResolvedLineup } from './types.js';

const BASE_LABELS: readonly string[] = ['1B', '2B', '3B'];

function nameOf(lineup: ResolvedLineup, slot: LineupSlot): string {
	return lineup[slot]?.name ?? `Slot ${slot + 1}`;
}

/**
 * "1B: Ann Lee, 3B: Bo Park" or "bases empty"
 */
export function describeBases(bases: BasesSnapshot, lineup: ResolvedLineup): string {
	const occupied = bases.flatMap((slot, index) =>
		slot === null ? [] : [`${BASE_LABELS[index]}: ${nameOf(lineup, slot)}`]
	);
	return occupied.length > 0 ? occupied.join(', ') : 'bases empty';
}

// Create play description
export function describePlay(event: PlayEvent, lineup: ResolvedLineup): string {
	const batter = nameOf(lineup, event.batterSlot);
	const runsText = event.runsScored > 0 ? ` (${event.runsScored} run${event.runsScored > 1 ? 's' : ''} scored)` : '';
	const runnersOut = event.outSlots.filter((slot) => slot !== event.batterSlot).map((slot) => nameOf(lineup, slot));

	switch (event.play) {
		case 'single':
			return `${batter} singles${runsText}`;
		case 'double':
			return `${batter} doubles${runsText}`;
		case 'triple':
			return `${batter} triples${runsText}`;
		case 'homeRun':
			return `${batter} homers${runsText}`;
		case 'walk':
			return `${batter} walks${runsText}`;
		case 'hitByPitch':
			return `${batter} is hit by a pitch${runsText}`;
		case 'strikeout':
			return `${batter} strikes out`;
		case 'groundOut':
			return `${batter} grounds out${runsText}`;
		case 'doublePlay':
			return `${batter} grounds into a double play (${runnersOut.join(', ')} out)${runsText}`;
		case 'fieldersChoice':
			if (runnersOut.length > 0) {
				return `${batter} reaches on a fielder's choice (${runnersOut.join(', ')} out)${runsText}`;
			}
			return `${batter} is out on a fielder's choice${runsText}`;
		case 'flyOut':
			return `${batter} flies out${runsText}`;
		case 'sacrificeFly':
			return `${batter} hits a sacrifice fly${runsText}`;
		default: {
			const exhaustive: never = event.play;
			return `${batter} - ${String(exhaustive)}`;
		}
	}
}

/**
 * Full log line: "[G1 I3, 1 out] Ann Lee singles (1 run scored) | 1B: Ann Lee"
 */
export function formatPlayLine(event: PlayEvent, lineup: ResolvedLineup): string {
	const outs = `${event.outsAfter} out${event.outsAfter === 1 ? '' : 's'}`;
	const bases = event.outsAfter === 3 ? 'inning over' : describeBases(event.basesAfter, lineup);
	return `[G${event.gameNumber} I${event.inning}, ${outs}] ${describePlay(event, lineup)} | ${bases}`;
}

export function formatInningLine(summary: InningSummary): string {
	return `[G${summary.gameNumber}] End of inning ${summary.inning}: ${summary.runs} R, ${summary.plateAppearances} PA`;
}
