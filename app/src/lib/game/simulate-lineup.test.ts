import { describe, it, expect } from 'vitest';
import { InvalidLineupError, OutcomeModel, SimulationAbortedError, createSeededRandom } from '@lineup-sim/model';
import { simulateLineup } from './simulate-lineup.js';
import { createSimulationConfig } from './config.js';
import { LINEUP_IDS, makeRoster, strikeoutPlayer } from '../test-helpers/players.js';

describe('simulateLineup', () => {
	const roster = makeRoster();

	it('should play config.numGames games and summarize them', () => {
		const config = createSimulationConfig({ numGames: 30 });
		const run = simulateLineup(LINEUP_IDS, roster, config, { random: createSeededRandom(3) });

		expect(run.lineup).toEqual(LINEUP_IDS);
		expect(run.results).toHaveLength(30);
		expect(run.summary.games).toBe(30);
		expect(run.summary.totalRuns).toBe(run.results.reduce((sum, result) => sum + result.runs, 0));
		expect(run.summary.mean).toBeCloseTo(run.summary.totalRuns / 30, 12);
	});

	it('should reproduce a run from the same seed', () => {
		const config = createSimulationConfig({ numGames: 25 });
		const first = simulateLineup(LINEUP_IDS, roster, config, { random: createSeededRandom(99) });
		const second = simulateLineup(LINEUP_IDS, roster, config, { random: createSeededRandom(99) });

		expect(second.summary).toEqual(first.summary);
	});

	it('should let numGames override the config', () => {
		const run = simulateLineup(LINEUP_IDS, roster, createSimulationConfig(), { numGames: 3, random: createSeededRandom(1) });

		expect(run.summary.games).toBe(3);
	});

	it('should score nothing for a lineup that always strikes out', () => {
		const hopeless = new Map(LINEUP_IDS.map((id) => [id, strikeoutPlayer(id)]));
		const run = simulateLineup(LINEUP_IDS, hopeless, createSimulationConfig({ numGames: 4 }));

		expect(run.summary.mean).toBe(0);
		expect(run.summary.histogram).toEqual([4]);
	});

	it('should share one distribution cache across lineups', () => {
		const model = new OutcomeModel();
		const config = createSimulationConfig({ numGames: 1 });

		simulateLineup(LINEUP_IDS, roster, config, { model, random: createSeededRandom(1) });
		simulateLineup([...LINEUP_IDS].reverse(), roster, config, { model, random: createSeededRandom(2) });

		expect(model.cacheSize).toBe(9);
	});

	it('should reject an invalid lineup before playing', () => {
		expect(() => simulateLineup(LINEUP_IDS.slice(1), roster, createSimulationConfig())).toThrow(InvalidLineupError);
	});

	it('should stop when the signal is already aborted', () => {
		const controller = new AbortController();
		controller.abort();

		expect(() =>
			simulateLineup(LINEUP_IDS, roster, createSimulationConfig({ numGames: 5 }), { signal: controller.signal })
		).toThrow(SimulationAbortedError);
	});
});
