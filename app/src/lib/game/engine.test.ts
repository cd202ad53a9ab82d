/**
 * Game engine tests - innings, cursor carry-over, cancellation and tracing
 */

import { describe, it, expect } from 'vitest';
import { InvalidLineupError, SimulationAbortedError, createSeededRandom } from '@lineup-sim/model';
import { GameEngine } from './engine.js';
import { createSimulationConfig } from './config.js';
import type { InningSummary, PlayEvent, Player } from './types.js';
import { homeRunPlayer, makeRoster, strikeoutPlayer, LINEUP_IDS } from '../test-helpers/players.js';

function strikeoutLineup(): Player[] {
	return LINEUP_IDS.map((id) => strikeoutPlayer(id));
}

function realisticLineup(): Player[] {
	const roster = makeRoster();
	return LINEUP_IDS.flatMap((id) => {
		const player = roster.get(id);
		return player ? [player] : [];
	});
}

describe('GameEngine', () => {
	it('should retire the side in order when everyone strikes out', () => {
		const innings: InningSummary[] = [];
		const engine = new GameEngine(strikeoutLineup(), {
			observer: { onInningEnd: (summary) => innings.push(summary) },
		});

		const result = engine.playGame();

		expect(result).toEqual({
			gameNumber: 1,
			runs: 0,
			inningRuns: [0, 0, 0, 0, 0, 0, 0, 0, 0],
			plateAppearances: 27,
		});
		expect(innings.map((summary) => summary.nextBatterSlot)).toEqual([3, 6, 0, 3, 6, 0, 3, 6, 0]);
	});

	it('should carry the batting order across innings', () => {
		const lineup = strikeoutLineup();
		lineup[0] = homeRunPlayer('slugger');
		const engine = new GameEngine(lineup);

		const result = engine.playGame();

		// Leadoff homers in innings 1, 3, 6 and 9
		expect(result.inningRuns).toEqual([1, 0, 1, 0, 0, 1, 0, 0, 1]);
		expect(result.runs).toBe(4);
		expect(result.plateAppearances).toBe(31);
	});

	it('should honor inningsPerGame and numGames from the config', () => {
		const config = createSimulationConfig({ inningsPerGame: 3, numGames: 5 });
		const engine = new GameEngine(strikeoutLineup(), { config });

		const results = engine.playGames();

		expect(results.map((result) => result.gameNumber)).toEqual([1, 2, 3, 4, 5]);
		expect(results[0].inningRuns).toHaveLength(3);
		expect(engine.getGamesPlayed()).toBe(5);
	});

	it('should reject a lineup of the wrong size', () => {
		expect(() => new GameEngine(strikeoutLineup().slice(0, 8))).toThrow(InvalidLineupError);
	});

	it('should reject a lineup that can never make an out', () => {
		const lineup = LINEUP_IDS.map((id) => homeRunPlayer(id));
		expect(() => new GameEngine(lineup)).toThrow('No player in the lineup can make an out');
	});

	it('should stop between games when the signal fires', () => {
		const controller = new AbortController();
		const engine = new GameEngine(strikeoutLineup(), {
			observer: {
				onInningEnd: (summary) => {
					if (summary.gameNumber === 2 && summary.inning === 9) controller.abort();
				},
			},
		});

		let caught: unknown;
		try {
			engine.playGames(10, controller.signal);
		} catch (error) {
			caught = error;
		}

		expect(caught).toBeInstanceOf(SimulationAbortedError);
		expect(caught instanceof SimulationAbortedError && caught.completed).toBe(2);
	});

	it('should terminate with non-negative integer totals for a realistic lineup', () => {
		const engine = new GameEngine(realisticLineup(), { random: createSeededRandom(11) });

		for (const result of engine.playGames(200)) {
			expect(Number.isInteger(result.runs)).toBe(true);
			expect(result.runs).toBeGreaterThanOrEqual(0);
			expect(result.inningRuns).toHaveLength(9);
			expect(result.inningRuns.reduce((sum, runs) => sum + runs, 0)).toBe(result.runs);
		}
	});

	it('should produce the same games whether or not a trace observer is attached', () => {
		const plays: PlayEvent[] = [];
		const traced = new GameEngine(realisticLineup(), {
			random: createSeededRandom(5),
			observer: { onPlay: (event) => plays.push(event) },
		});
		const untraced = new GameEngine(realisticLineup(), { random: createSeededRandom(5) });

		const tracedResults = traced.playGames(20);
		expect(untraced.playGames(20)).toEqual(tracedResults);

		const totalPlateAppearances = tracedResults.reduce((sum, result) => sum + result.plateAppearances, 0);
		expect(plays).toHaveLength(totalPlateAppearances);
		expect(plays.reduce((sum, event) => sum + event.runsScored, 0)).toBe(
			tracedResults.reduce((sum, result) => sum + result.runs, 0)
		);
	});

	it('should trace each plate appearance with the state before and after', () => {
		const plays: PlayEvent[] = [];
		const engine = new GameEngine(strikeoutLineup(), { observer: { onPlay: (event) => plays.push(event) } });

		engine.playGame();

		expect(plays[0]).toEqual({
			gameNumber: 1,
			inning: 1,
			batterSlot: 0,
			playerId: 'p1',
			outcome: 'strikeout',
			play: 'strikeout',
			outsBefore: 0,
			outsAfter: 1,
			basesBefore: [null, null, null],
			basesAfter: [null, null, null],
			runsScored: 0,
			scorerSlots: [],
			outSlots: [0],
		});
		expect(plays[2].outsAfter).toBe(3);
	});
});
