import { describe, it, expect } from 'vitest';
import { UsageError, parseLineupSimArgs, parseSweepArgs } from './args.js';

describe('parseLineupSimArgs', () => {
	it('should default to no options', () => {
		expect(parseLineupSimArgs([])).toEqual({ showGameLogs: false, quiet: false, help: false });
	});

	it('should read a space separated lineup up to the next option', () => {
		const args = parseLineupSimArgs(['--lineup', 'a', 'b', 'c', '--num-games', '50', '--quiet']);

		expect(args.lineup).toEqual(['a', 'b', 'c']);
		expect(args.numGames).toBe(50);
		expect(args.quiet).toBe(true);
	});

	it('should read a comma separated lineup', () => {
		expect(parseLineupSimArgs(['--lineup', 'a,b, c']).lineup).toEqual(['a', 'b', 'c']);
	});

	it('should read paths, seed and log flag', () => {
		expect(
			parseLineupSimArgs(['--config', 'cfg.json', '--seed', '0', '--show-game-logs', '--db', 'r.sqlite', '--csv', 'out.csv'])
		).toEqual({
			configPath: 'cfg.json',
			seed: 0,
			showGameLogs: true,
			dbPath: 'r.sqlite',
			csvPath: 'out.csv',
			quiet: false,
			help: false,
		});
	});

	it('should reject bad input', () => {
		expect(() => parseLineupSimArgs(['--num-games', '0'])).toThrow('--num-games must be an integer >= 1, got 0');
		expect(() => parseLineupSimArgs(['--num-games', 'ten'])).toThrow(UsageError);
		expect(() => parseLineupSimArgs(['--config'])).toThrow('--config needs a value');
		expect(() => parseLineupSimArgs(['--lineup', '--quiet'])).toThrow('--lineup needs a value');
		expect(() => parseLineupSimArgs(['--verbose'])).toThrow('Unknown option: --verbose');
	});
});

describe('parseSweepArgs', () => {
	it('should leave rerun to the config unless asked', () => {
		expect(parseSweepArgs([]).rerun).toBeUndefined();
		expect(parseSweepArgs(['--rerun']).rerun).toBe(true);
		expect(parseSweepArgs(['--no-rerun']).rerun).toBe(false);
	});

	it('should read every numeric option', () => {
		expect(
			parseSweepArgs(['--num-games', '20', '--limit', '100', '--seed', '9', '--rerun-top', '5', '--rerun-games', '500'])
		).toEqual({ numGames: 20, limit: 100, seed: 9, rerunTopN: 5, rerunGames: 500, help: false });
	});

	it('should accept -h for help', () => {
		expect(parseSweepArgs(['-h']).help).toBe(true);
	});
});
