/**
 * Player fixtures shared by the app tests
 */

import type { Player, PlayerStats, Roster } from '@lineup-sim/model';

export function makeStats(overrides: Partial<PlayerStats> = {}): PlayerStats {
	return {
		plateAppearances: 600,
		atBats: 540,
		hits: 150,
		doubles: 30,
		triples: 3,
		homeRuns: 18,
		walks: 50,
		strikeouts: 110,
		hitByPitch: 10,
		extraBasePercentage: 0.35,
		gbFbRatio: 1.0,
		...overrides,
	};
}

export function makePlayer(id: string, overrides: Partial<PlayerStats> = {}): Player {
	return { id, name: `Player ${id}`, stats: makeStats(overrides) };
}

/** Strikes out every plate appearance */
export function strikeoutPlayer(id: string): Player {
	return makePlayer(id, {
		plateAppearances: 10,
		atBats: 10,
		hits: 0,
		doubles: 0,
		triples: 0,
		homeRuns: 0,
		walks: 0,
		strikeouts: 10,
		hitByPitch: 0,
		extraBasePercentage: 0,
	});
}

/** Homers every plate appearance */
export function homeRunPlayer(id: string): Player {
	return makePlayer(id, {
		plateAppearances: 10,
		atBats: 10,
		hits: 10,
		doubles: 0,
		triples: 0,
		homeRuns: 10,
		walks: 0,
		strikeouts: 0,
		hitByPitch: 0,
	});
}

export const LINEUP_IDS = ['p1', 'p2', 'p3', 'p4', 'p5', 'p6', 'p7', 'p8', 'p9'];

/**
 * Nine ordinary hitters with slightly different lines
 */
export function makeRoster(): Roster {
	return new Map(
		LINEUP_IDS.map((id, index) => [
			id,
			makePlayer(id, {
				hits: 130 + index * 5,
				homeRuns: 10 + index,
				walks: 40 + index * 2,
				extraBasePercentage: 0.2 + index * 0.05,
			}),
		])
	);
}
