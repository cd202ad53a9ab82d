/**
 * Setup file loading
 *
 * Reads the JSON config (simulation params, player file, sweep params) and
 * the player file it points to. Keys inside simulationParams and player
 * stats are snake_case; everything is mapped to the camelCase types here.
 */

import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { InvalidConfigError, InvalidStatsError, validatePlayerStats } from '@lineup-sim/model';
import type { Player, PlayerStats, Roster } from '@lineup-sim/model';
import { createSimulationConfig } from './config.js';
import type { SimulationConfigInput } from './config.js';
import type { Base, FieldersChoiceTarget, SimulationConfig } from './types.js';
import { LINEUP_SIZE } from './types.js';

export const DEFAULT_CONFIG_PATH = fileURLToPath(new URL('../../../data/config.json', import.meta.url));

export interface SweepParams {
	/** Re-run the best lineups with more games after the sweep */
	autoRerun: boolean;
	rerunTopN: number;
	rerunNumGames: number;
}

export const DEFAULT_SWEEP_PARAMS: SweepParams = Object.freeze({
	autoRerun: false,
	rerunTopN: 10,
	rerunNumGames: 1000,
});

export interface SimulationSetup {
	configPath: string;
	playerDataPath: string;
	config: SimulationConfig;
	sweep: SweepParams;
	/** Player file order */
	players: Player[];
	roster: Roster;
	/** The first nine players in the file */
	defaultLineup: string[];
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalNumber(source: JsonObject, key: string, where: string): number | undefined {
	const value = source[key];
	if (value === undefined) return undefined;
	if (typeof value !== 'number') {
		throw new InvalidConfigError(`${where}.${key} must be a number`);
	}
	return value;
}

const DOUBLE_PLAY_KEYS: Record<string, Base> = { '0': 'first', '1': 'second', '2': 'third' };
const FIELDERS_CHOICE_KEYS: Record<string, FieldersChoiceTarget> = {
	'-1': 'batter',
	'0': 'first',
	'1': 'second',
	'2': 'third',
};

/**
 * Map a {"0": w, "1": w, ...} weight table onto named bases
 */
function parseWeights<K extends string>(
	raw: unknown,
	keys: Record<string, K>,
	where: string
): Partial<Record<K, number>> | undefined {
	if (raw === undefined) return undefined;
	if (!isObject(raw)) {
		throw new InvalidConfigError(`${where} must be an object`);
	}
	const weights: Partial<Record<K, number>> = {};
	for (const [key, value] of Object.entries(raw)) {
		const target = keys[key];
		if (target === undefined) {
			throw new InvalidConfigError(`${where} has unknown key ${key} (expected ${Object.keys(keys).join(', ')})`);
		}
		if (typeof value !== 'number') {
			throw new InvalidConfigError(`${where}.${key} must be a number`);
		}
		weights[target] = value;
	}
	return weights;
}

/**
 * snake_case simulationParams -> frozen SimulationConfig
 */
export function parseSimulationParams(raw: unknown): SimulationConfig {
	if (raw === undefined) return createSimulationConfig();
	if (!isObject(raw)) {
		throw new InvalidConfigError('simulationParams must be an object');
	}
	const where = 'simulationParams';
	const input: SimulationConfigInput = {
		dpAttemptProbabilityOnGroundOut: optionalNumber(raw, 'dp_attempt_probability_on_go', where),
		doublePlayRunnerOutWeights: parseWeights(
			raw.double_play_runner_out_weights,
			DOUBLE_PLAY_KEYS,
			`${where}.double_play_runner_out_weights`
		),
		fieldersChoiceOutWeights: parseWeights(
			raw.fielders_choice_out_weights,
			FIELDERS_CHOICE_KEYS,
			`${where}.fielders_choice_out_weights`
		),
		inningsPerGame: optionalNumber(raw, 'innings_per_game', where),
		numGames: optionalNumber(raw, 'num_games', where),
	};
	return createSimulationConfig(input);
}

export function parseSweepParams(raw: unknown): SweepParams {
	if (raw === undefined) return DEFAULT_SWEEP_PARAMS;
	if (!isObject(raw)) {
		throw new InvalidConfigError('sweepParams must be an object');
	}
	const autoRerun = raw.autoRerun ?? DEFAULT_SWEEP_PARAMS.autoRerun;
	if (typeof autoRerun !== 'boolean') {
		throw new InvalidConfigError('sweepParams.autoRerun must be true or false');
	}
	const rerunTopN = optionalNumber(raw, 'rerunTopN', 'sweepParams') ?? DEFAULT_SWEEP_PARAMS.rerunTopN;
	const rerunNumGames = optionalNumber(raw, 'rerunNumGames', 'sweepParams') ?? DEFAULT_SWEEP_PARAMS.rerunNumGames;
	for (const [key, value] of [
		['rerunTopN', rerunTopN],
		['rerunNumGames', rerunNumGames],
	] as const) {
		if (!Number.isInteger(value) || value <= 0) {
			throw new InvalidConfigError(`sweepParams.${key} must be a positive integer, got ${value}`);
		}
	}
	return { autoRerun, rerunTopN, rerunNumGames };
}

const REQUIRED_STATS = [
	['plateAppearances', 'plate_appearances'],
	['atBats', 'at_bats'],
	['hits', 'hits'],
	['doubles', 'doubles'],
	['triples', 'triples'],
	['homeRuns', 'home_runs'],
	['walks', 'walks'],
	['strikeouts', 'strikeouts'],
	['hitByPitch', 'hit_by_pitch'],
] as const;

/**
 * snake_case player stats -> PlayerStats, with the optional fields defaulted
 */
export function parsePlayerStats(playerId: string, raw: unknown): PlayerStats {
	if (!isObject(raw)) {
		throw new InvalidStatsError(playerId, 'stats must be an object');
	}
	const source: JsonObject = raw;
	const count = (key: string): number => {
		const value = source[key];
		if (typeof value !== 'number') {
			throw new InvalidStatsError(playerId, `missing or non-numeric ${key}`);
		}
		return value;
	};

	const [pa, ab, h, doubles, triples, hr, bb, so, hbp] = REQUIRED_STATS.map(([, key]) => count(key));

	const xbpRaw = raw.extra_base_percentage;
	const extraBasePercentage = typeof xbpRaw === 'number' ? xbpRaw : 0;

	const gbFbRaw = raw.gb_fb_ratio;
	let gbFbRatio = 1.0;
	if (typeof gbFbRaw === 'number' && gbFbRaw > 0) {
		gbFbRatio = gbFbRaw;
	} else {
		console.warn(`[Config] Player ${playerId}: gb_fb_ratio missing or not positive (${String(gbFbRaw)}), using 1.0`);
	}

	const stats: PlayerStats = {
		plateAppearances: pa,
		atBats: ab,
		hits: h,
		doubles,
		triples,
		homeRuns: hr,
		walks: bb,
		strikeouts: so,
		hitByPitch: hbp,
		extraBasePercentage,
		gbFbRatio,
	};
	validatePlayerStats(playerId, stats);
	return stats;
}

/**
 * { "lineup": [{ id, name, stats }] } -> players in file order
 */
export function parsePlayerFile(raw: unknown): Player[] {
	const lineup: unknown = isObject(raw) ? raw.lineup : undefined;
	if (!Array.isArray(lineup)) {
		throw new InvalidConfigError('Player file must contain a "lineup" array');
	}

	const seen = new Set<string>();
	return lineup.map((entry: unknown, index: number): Player => {
		const id: unknown = isObject(entry) ? entry.id : undefined;
		if (!isObject(entry) || typeof id !== 'string' || id === '') {
			throw new InvalidConfigError(`Player entry ${index + 1} needs a string id`);
		}
		if (seen.has(id)) {
			throw new InvalidConfigError(`Player id ${id} appears more than once in the player file`);
		}
		seen.add(id);
		const name = typeof entry.name === 'string' ? entry.name : id;
		return { id, name, stats: parsePlayerStats(id, entry.stats) };
	});
}

function readJson(filePath: string): unknown {
	let text: string;
	try {
		text = readFileSync(filePath, 'utf-8');
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new InvalidConfigError(`Cannot read ${filePath}: ${reason}`);
	}
	try {
		return JSON.parse(text);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new InvalidConfigError(`${filePath} is not valid JSON: ${reason}`);
	}
}

/**
 * Load the config file and the player file it references
 * (playerDataFile is resolved relative to the config file).
 */
export function loadSetup(configPath: string = DEFAULT_CONFIG_PATH, options: { quiet?: boolean } = {}): SimulationSetup {
	const resolvedConfigPath = resolve(configPath);
	const raw = readJson(resolvedConfigPath);
	if (!isObject(raw)) {
		throw new InvalidConfigError(`${resolvedConfigPath} must contain a JSON object`);
	}
	const playerDataFile = raw.playerDataFile;
	if (typeof playerDataFile !== 'string') {
		throw new InvalidConfigError(`${resolvedConfigPath} needs a "playerDataFile" string`);
	}

	const playerDataPath = resolve(dirname(resolvedConfigPath), playerDataFile);
	const players = parsePlayerFile(readJson(playerDataPath));
	if (!options.quiet) {
		console.log(`[Config] Loaded ${players.length} players from ${playerDataPath}`);
	}

	return {
		configPath: resolvedConfigPath,
		playerDataPath,
		config: parseSimulationParams(raw.simulationParams),
		sweep: parseSweepParams(raw.sweepParams),
		players,
		roster: new Map(players.map((player) => [player.id, player])),
		defaultLineup: players.slice(0, LINEUP_SIZE).map((player) => player.id),
	};
}
