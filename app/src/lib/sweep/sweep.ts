/**
 * Permutation sweep: simulate every batting order of nine players and rank
 * them by mean runs, optionally re-running the best with more games.
 */

import { setImmediate as nextTick } from 'timers/promises';
import { OutcomeModel, SimulationAbortedError, createSeededRandom, deriveSeed } from '@lineup-sim/model';
import type { Roster, SimulationConfig } from '../game/types.js';
import { simulateLineup } from '../game/simulate-lineup.js';
import { validateLineup } from '../game/lineup-validator.js';
import { grandTotalRuns } from '../game-results/stats.js';
import { completeRun, createRun } from '../game-results/runs.js';
import { saveLineupResult } from '../game-results/lineups.js';
import type { ResultsDatabase } from '../game-results/database.js';
import type { LineupScoreSummary } from '../game-results/types.js';
import { countPermutations, lineupPermutations } from './permutations.js';

export interface SweepProgress {
	phase: 'sweep' | 'rerun';
	completed: number;
	total: number;
	lineup: readonly string[];
	summary: LineupScoreSummary;
	elapsedMs: number;
}

export interface SweepOptions {
	/** The nine players to permute; their order is the first lineup tried */
	playerIds: readonly string[];
	roster: Roster;
	config: SimulationConfig;
	/** Games per lineup, config.numGames by default */
	numGames?: number;
	/** Stop after this many lineups */
	limit?: number;
	/** Base seed; each lineup gets its own derived stream */
	seed?: number;
	/** Re-run the best `topN` lineups with `numGames` games each */
	rerun?: { topN: number; numGames: number } | null;
	/** Results are saved here as each lineup completes */
	db?: ResultsDatabase;
	signal?: AbortSignal;
	onProgress?: (progress: SweepProgress) => void;
}

export interface SweepLineupResult {
	lineup: string[];
	summary: LineupScoreSummary;
}

export interface SweepPhaseResult {
	runId: string | null;
	results: SweepLineupResult[];
}

export interface SweepResult extends SweepPhaseResult {
	seed: number;
	/** True when the signal stopped the sweep early; results hold what finished */
	aborted: boolean;
	grandTotalRuns: number;
	rerun: SweepPhaseResult | null;
}

/**
 * Best first; ties keep the order the lineups were simulated in
 */
export function rankResults(results: readonly SweepLineupResult[]): SweepLineupResult[] {
	return results
		.map((result, index) => ({ result, index }))
		.sort((a, b) => b.result.summary.mean - a.result.summary.mean || a.index - b.index)
		.map(({ result }) => result);
}

interface PhaseInput {
	phase: SweepProgress['phase'];
	lineups: Iterable<readonly string[]>;
	total: number;
	numGames: number;
	seed: number;
	runId: string | null;
}

/**
 * Simulate a sequence of lineups. Returns early (aborted) when the signal
 * fires; any other failure (simulation or database write) propagates
 * after marking the run failed.
 * Yields to the event loop between lineups so a SIGINT handler can abort.
 */
async function runPhase(
	options: SweepOptions,
	model: OutcomeModel,
	input: PhaseInput
): Promise<{ results: SweepLineupResult[]; aborted: boolean }> {
	const { roster, config, db, signal, onProgress } = options;
	const results: SweepLineupResult[] = [];
	const startedAt = Date.now();

	let index = 0;
	for (const lineup of input.lineups) {
		if (signal?.aborted) {
			return { results, aborted: true };
		}

		let summary: LineupScoreSummary;
		try {
			summary = simulateLineup(lineup, roster, config, {
				model,
				random: createSeededRandom(deriveSeed(input.seed, index)),
				numGames: input.numGames,
				signal,
				reportWarnings: false,
			}).summary;
			if (db && input.runId) {
				saveLineupResult(db, input.runId, lineup, summary);
			}
		} catch (error) {
			if (error instanceof SimulationAbortedError) {
				return { results, aborted: true };
			}
			if (db && input.runId) {
				completeRun(db, input.runId, 'failed');
			}
			console.error(`[Sweep] Lineup ${lineup.join(',')} failed:`, error);
			throw error;
		}

		results.push({ lineup: [...lineup], summary });
		index++;

		onProgress?.({
			phase: input.phase,
			completed: index,
			total: input.total,
			lineup,
			summary,
			elapsedMs: Date.now() - startedAt,
		});
		await nextTick();
	}

	return { results, aborted: false };
}

/**
 * Simulate every permutation of the given players (up to `limit`).
 */
export async function runSweep(options: SweepOptions): Promise<SweepResult> {
	const { config, db } = options;
	const numGames = options.numGames ?? config.numGames;
	const seed = options.seed ?? Math.floor(Math.random() * 2 ** 32);
	const allLineups = countPermutations(options.playerIds.length);
	const total = options.limit !== undefined ? Math.min(options.limit, allLineups) : allLineups;
	const model = new OutcomeModel();

	// Same players in every ordering, so lineup warnings are reported once here
	for (const warning of validateLineup(options.playerIds, options.roster).warnings) {
		console.warn(`[Sweep] ${warning}`);
	}

	console.log(`[Sweep] Simulating ${total} lineup(s) × ${numGames} game(s), seed ${seed}`);

	const runId = db ? createRun(db, { kind: 'sweep', config, numGames, seed }).id : null;
	const sweep = await runPhase(options, model, {
		phase: 'sweep',
		lineups: take(lineupPermutations(options.playerIds), total),
		total,
		numGames,
		seed,
		runId,
	});
	if (db && runId) {
		completeRun(db, runId, sweep.aborted ? 'aborted' : 'completed');
	}

	const result: SweepResult = {
		runId,
		seed,
		results: sweep.results,
		aborted: sweep.aborted,
		grandTotalRuns: grandTotalRuns(sweep.results.map((entry) => entry.summary)),
		rerun: null,
	};

	if (sweep.aborted) {
		console.warn(`[Sweep] Aborted after ${sweep.results.length} of ${total} lineup(s)`);
		return result;
	}

	if (options.rerun && sweep.results.length > 0) {
		const best = rankResults(sweep.results).slice(0, options.rerun.topN);
		const rerunGames = options.rerun.numGames;
		console.log(`[Sweep] Re-running top ${best.length} lineup(s) with ${rerunGames} game(s) each`);

		const rerunId = db
			? createRun(db, { kind: 'rerun', config, numGames: rerunGames, seed, parentRunId: runId }).id
			: null;
		const rerun = await runPhase(options, model, {
			phase: 'rerun',
			lineups: best.map((entry) => entry.lineup),
			total: best.length,
			numGames: rerunGames,
			seed: deriveSeed(seed, allLineups),
			runId: rerunId,
		});
		if (db && rerunId) {
			completeRun(db, rerunId, rerun.aborted ? 'aborted' : 'completed');
		}

		result.rerun = { runId: rerunId, results: rerun.results };
		result.aborted = rerun.aborted;
	}

	return result;
}

function* take<T>(items: Iterable<T>, count: number): Generator<T, void, undefined> {
	if (count <= 0) return;
	let taken = 0;
	for (const item of items) {
		yield item;
		if (++taken >= count) return;
	}
}
