import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createSeededRandom } from '@lineup-sim/model';
import { runLineupSim } from './lineup-sim.js';
import { loadSetup } from '../game/setup-loader.js';
import { simulateLineup } from '../game/simulate-lineup.js';

const IDS = ['a1', 'a2', 'a3', 'a4', 'a5', 'a6', 'a7', 'a8', 'a9'];

const RAW_STATS = {
	plate_appearances: 600,
	at_bats: 540,
	hits: 150,
	doubles: 30,
	triples: 3,
	home_runs: 18,
	walks: 50,
	strikeouts: 110,
	hit_by_pitch: 10,
	extra_base_percentage: 0.35,
	gb_fb_ratio: 1.2,
};

describe('runLineupSim', () => {
	let dir: string;
	let configPath: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), 'lineup-sim-'));
		configPath = join(dir, 'config.json');
		writeFileSync(join(dir, 'players.json'), JSON.stringify({ lineup: IDS.map((id) => ({ id, stats: RAW_STATS })) }));
		writeFileSync(configPath, JSON.stringify({ playerDataFile: 'players.json', simulationParams: { num_games: 30 } }));
	});

	afterEach(() => {
		vi.restoreAllMocks();
		rmSync(dir, { recursive: true, force: true });
	});

	function expectedMean(seed: number, numGames: number): string {
		const setup = loadSetup(configPath, { quiet: true });
		const run = simulateLineup(setup.defaultLineup, setup.roster, setup.config, {
			random: createSeededRandom(seed),
			numGames,
		});
		return run.summary.mean.toFixed(4);
	}

	it('should print only the mean to stdout when quiet, even with --db and --csv', () => {
		const expected = expectedMean(11, 20);
		const log = vi.spyOn(console, 'log').mockImplementation(() => {});
		const csvPath = join(dir, 'out.csv');

		runLineupSim({
			configPath,
			numGames: 20,
			seed: 11,
			dbPath: ':memory:',
			csvPath,
			showGameLogs: true,
			quiet: true,
			help: false,
		});

		expect(log.mock.calls).toEqual([[expected]]);
		expect(expected).toMatch(/^\d+\.\d{4}$/);
		expect(readFileSync(csvPath, 'utf-8').split('\n')[1]).toBe(`${IDS.join(',')},${expected}`);
	});

	it('should report setup and summary lines otherwise', () => {
		const log = vi.spyOn(console, 'log').mockImplementation(() => {});

		const run = runLineupSim({ configPath, numGames: 5, seed: 3, showGameLogs: false, quiet: false, help: false });

		expect(log.mock.calls[0]).toEqual([`[Config] Loaded 9 players from ${join(dir, 'players.json')}`]);
		expect(log.mock.calls[1]).toEqual([`[Simulator] Lineup: ${IDS.join(', ')}`]);
		expect(log.mock.calls[2]).toEqual(['[Simulator] Simulating 5 game(s), seed 3']);
		expect(run.summary.games).toBe(5);
		expect(existsSync(join(dir, 'out.csv'))).toBe(false);
	});
});
