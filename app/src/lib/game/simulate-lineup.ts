/**
 * One batting order, numGames games, one summary
 */

import { OutcomeModel } from '@lineup-sim/model';
import type { GameObserver, GameResult, RandomSource, Roster, SimulationConfig } from './types.js';
import { GameEngine } from './engine.js';
import { resolveLineup } from './lineup-validator.js';
import { summarize } from '../game-results/stats.js';
import type { LineupScoreSummary } from '../game-results/types.js';

export interface SimulateLineupOptions {
	/** Defaults to Math.random */
	random?: RandomSource;
	/** Shared distribution cache across lineups */
	model?: OutcomeModel;
	observer?: GameObserver;
	/** Checked between games */
	signal?: AbortSignal;
	/** Overrides config.numGames */
	numGames?: number;
	/** Log lineup validation warnings (default true) */
	reportWarnings?: boolean;
}

export interface LineupRunResult {
	lineup: string[];
	summary: LineupScoreSummary;
	results: GameResult[];
}

/**
 * Validate the lineup, play its games and summarize them
 */
export function simulateLineup(
	lineupIds: readonly string[],
	roster: Roster,
	config: SimulationConfig,
	options: SimulateLineupOptions = {}
): LineupRunResult {
	const lineup = resolveLineup(lineupIds, roster, { reportWarnings: options.reportWarnings });
	const engine = new GameEngine(lineup, {
		config,
		random: options.random,
		model: options.model ?? new OutcomeModel(),
		observer: options.observer,
	});

	const results = engine.playGames(options.numGames ?? config.numGames, options.signal);
	return {
		lineup: [...lineupIds],
		summary: summarize(results),
		results,
	};
}
