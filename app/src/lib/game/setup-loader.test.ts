import { describe, it, expect, vi, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { InvalidConfigError, InvalidStatsError } from '@lineup-sim/model';
import {
	DEFAULT_CONFIG_PATH,
	loadSetup,
	parsePlayerFile,
	parsePlayerStats,
	parseSimulationParams,
	parseSweepParams,
} from './setup-loader.js';

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

describe('setup loader', () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	describe('parseSimulationParams', () => {
		it('should map snake_case keys and numeric base indexes', () => {
			const config = parseSimulationParams({
				dp_attempt_probability_on_go: 0.25,
				double_play_runner_out_weights: { '0': 2 },
				fielders_choice_out_weights: { '-1': 0, '2': 5 },
				innings_per_game: 7,
				num_games: 50,
			});

			expect(config).toEqual({
				dpAttemptProbabilityOnGroundOut: 0.25,
				doublePlayRunnerOutWeights: { first: 2, second: 1, third: 1 },
				fieldersChoiceOutWeights: { batter: 0, first: 1, second: 1, third: 5 },
				inningsPerGame: 7,
				numGames: 50,
			});
		});

		it('should fall back to defaults when the section is missing', () => {
			expect(parseSimulationParams(undefined).numGames).toBe(162);
		});

		it('should reject an unknown weight key', () => {
			expect(() => parseSimulationParams({ double_play_runner_out_weights: { '3': 1 } })).toThrow(
				InvalidConfigError
			);
		});

		it('should reject a non-numeric value', () => {
			expect(() => parseSimulationParams({ num_games: '100' })).toThrow('simulationParams.num_games must be a number');
		});
	});

	describe('parseSweepParams', () => {
		it('should default every field', () => {
			expect(parseSweepParams({})).toEqual({ autoRerun: false, rerunTopN: 10, rerunNumGames: 1000 });
		});

		it('should reject a non-positive rerunTopN', () => {
			expect(() => parseSweepParams({ rerunTopN: 0 })).toThrow('sweepParams.rerunTopN must be a positive integer, got 0');
		});
	});

	describe('parsePlayerStats', () => {
		it('should map every field', () => {
			expect(parsePlayerStats('p1', RAW_STATS)).toEqual({
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
				gbFbRatio: 1.2,
			});
		});

		it('should default extra_base_percentage to 0 and a bad gb_fb_ratio to 1.0', () => {
			const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
			const { extra_base_percentage: _xbp, ...withoutXbp } = RAW_STATS;

			const stats = parsePlayerStats('p2', { ...withoutXbp, gb_fb_ratio: -2 });

			expect(stats.extraBasePercentage).toBe(0);
			expect(stats.gbFbRatio).toBe(1.0);
			expect(warn).toHaveBeenCalledWith('[Config] Player p2: gb_fb_ratio missing or not positive (-2), using 1.0');
		});

		it('should reject a missing counting stat', () => {
			const { walks: _walks, ...withoutWalks } = RAW_STATS;
			expect(() => parsePlayerStats('p3', withoutWalks)).toThrow('Player p3: missing or non-numeric walks');
		});

		it('should reject stats that break the hit invariants', () => {
			expect(() => parsePlayerStats('p4', { ...RAW_STATS, hits: 40 })).toThrow(InvalidStatsError);
		});
	});

	describe('parsePlayerFile', () => {
		it('should keep file order and default the name to the id', () => {
			const players = parsePlayerFile({
				lineup: [
					{ id: 'b', name: 'Bee', stats: RAW_STATS },
					{ id: 'a', stats: RAW_STATS },
				],
			});

			expect(players.map((player) => [player.id, player.name])).toEqual([
				['b', 'Bee'],
				['a', 'a'],
			]);
		});

		it('should reject duplicate ids and a missing lineup array', () => {
			expect(() =>
				parsePlayerFile({
					lineup: [
						{ id: 'a', stats: RAW_STATS },
						{ id: 'a', stats: RAW_STATS },
					],
				})
			).toThrow('Player id a appears more than once in the player file');
			expect(() => parsePlayerFile({ players: [] })).toThrow(InvalidConfigError);
		});
	});

	describe('loadSetup', () => {
		it('should resolve the player file next to the config file', () => {
			vi.spyOn(console, 'log').mockImplementation(() => {});
			const dir = mkdtempSync(join(tmpdir(), 'lineup-setup-'));
			try {
				const ids = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h', 'i', 'j'];
				writeFileSync(
					join(dir, 'roster.json'),
					JSON.stringify({ lineup: ids.map((id) => ({ id, stats: RAW_STATS })) })
				);
				writeFileSync(
					join(dir, 'config.json'),
					JSON.stringify({ playerDataFile: 'roster.json', simulationParams: { num_games: 12 } })
				);

				const setup = loadSetup(join(dir, 'config.json'));

				expect(setup.playerDataPath).toBe(join(dir, 'roster.json'));
				expect(setup.config.numGames).toBe(12);
				expect(setup.roster.size).toBe(10);
				expect(setup.defaultLineup).toEqual(ids.slice(0, 9));
				expect(setup.sweep.rerunTopN).toBe(10);
			} finally {
				rmSync(dir, { recursive: true, force: true });
			}
		});

		it('should report an unreadable config file', () => {
			expect(() => loadSetup('/nonexistent/lineup-config.json')).toThrow(InvalidConfigError);
		});

		it('should load the bundled setup', () => {
			vi.spyOn(console, 'log').mockImplementation(() => {});
			const setup = loadSetup(DEFAULT_CONFIG_PATH);

			expect(setup.defaultLineup).toEqual(['P001', 'P002', 'P003', 'P004', 'P005', 'P006', 'P007', 'P008', 'P009']);
			expect(setup.config.dpAttemptProbabilityOnGroundOut).toBe(0.4);
			expect(setup.sweep.autoRerun).toBe(false);
		});
	});
});
