/**
 * Game engine: nine (configurable) innings per game, N games per lineup,
 * batting order cursor carried across innings.
 */

import { InvalidLineupError, OutcomeModel, SimulationAbortedError } from '@lineup-sim/model';
import type { OutcomeDistribution } from '@lineup-sim/model';
import type { GameObserver, GameResult, LineupSlot, RandomSource, ResolvedLineup, SimulationConfig } from './types.js';
import { LINEUP_SIZE } from './types.js';
import { DEFAULT_SIMULATION_CONFIG } from './config.js';
import type { ResolutionContext } from './state-machine/index.js';
import { simulateInning } from './inning.js';
import type { InningContext } from './inning.js';

export interface GameEngineOptions {
	config?: SimulationConfig;
	/** Defaults to Math.random */
	random?: RandomSource;
	/** Shared distribution cache; a fresh model is created when omitted */
	model?: OutcomeModel;
	observer?: GameObserver;
}

/**
 * Probability that one plate appearance ends in an out for the batter
 */
function outProbability(distribution: OutcomeDistribution): number {
	return distribution.strikeout + distribution.groundOut + distribution.flyOut;
}

export class GameEngine {
	private readonly config: SimulationConfig;
	private readonly inningContext: InningContext;
	private gamesPlayed = 0;

	constructor(lineup: ResolvedLineup, options: GameEngineOptions = {}) {
		if (lineup.length !== LINEUP_SIZE) {
			throw new InvalidLineupError(`Lineup has ${lineup.length} players, expected ${LINEUP_SIZE}`);
		}

		this.config = options.config ?? DEFAULT_SIMULATION_CONFIG;
		const model = options.model ?? new OutcomeModel();
		const distributions = lineup.map((player) => model.distributionFor(player));

		// Without any chance of an out an inning would never end
		if (distributions.every((distribution) => outProbability(distribution) <= 0)) {
			throw new InvalidLineupError('No player in the lineup can make an out', lineup.map((player) => player.id));
		}

		const resolution: ResolutionContext = {
			config: this.config,
			random: options.random ?? Math.random,
			extraBasePercentage: (slot: LineupSlot) => lineup[slot].stats.extraBasePercentage,
		};

		this.inningContext = {
			lineup,
			distributions,
			model,
			resolution,
			observer: options.observer,
		};
	}

	getConfig(): SimulationConfig {
		return this.config;
	}

	getGamesPlayed(): number {
		return this.gamesPlayed;
	}

	/**
	 * Play one complete game with the leadoff hitter starting the first inning
	 */
	playGame(): GameResult {
		const gameNumber = ++this.gamesPlayed;
		const inningRuns: number[] = [];
		let batterSlot: LineupSlot = 0;
		let plateAppearances = 0;

		for (let inning = 1; inning <= this.config.inningsPerGame; inning++) {
			const summary = simulateInning(this.inningContext, gameNumber, inning, batterSlot);
			inningRuns.push(summary.runs);
			plateAppearances += summary.plateAppearances;
			batterSlot = summary.nextBatterSlot;
		}

		return {
			gameNumber,
			runs: inningRuns.reduce((sum, runs) => sum + runs, 0),
			inningRuns,
			plateAppearances,
		};
	}

	/**
	 * Play `count` games (config.numGames by default). The signal is checked
	 * between games, never mid-game.
	 */
	playGames(count: number = this.config.numGames, signal?: AbortSignal): GameResult[] {
		const results: GameResult[] = [];
		for (let i = 0; i < count; i++) {
			if (signal?.aborted) {
				throw new SimulationAbortedError(results.length);
			}
			results.push(this.playGame());
		}
		return results;
	}
}
