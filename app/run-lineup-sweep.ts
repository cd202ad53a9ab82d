#!/usr/bin/env tsx
/**
 * Simulate every batting order of the first nine players and rank them
 * Usage: npx tsx app/run-lineup-sweep.ts [--limit N] [--num-games N] [--seed N] [--csv out.csv]
 *
 * Ctrl-C stops the sweep after the current lineup; results so far are kept.
 */

import { loadSetup } from './src/lib/game/setup-loader.js';
import { rankResults, runSweep } from './src/lib/sweep/sweep.js';
import type { SweepLineupResult, SweepProgress } from './src/lib/sweep/sweep.js';
import {
	closeResultsDatabase,
	generateTimestampedFilename,
	openResultsDatabase,
	writeResultsCsv,
} from './src/lib/game-results/index.js';
import type { ResultsDatabase } from './src/lib/game-results/index.js';
import { SWEEP_USAGE, UsageError, parseSweepArgs } from './src/lib/cli/args.js';

const TOP_LINEUPS_SHOWN = 10;

function logProgress(progress: SweepProgress): void {
	const { phase, completed, total, elapsedMs } = progress;
	if (completed % 1000 !== 0 && completed !== total) return;

	const perSecond = elapsedMs > 0 ? (completed / elapsedMs) * 1000 : 0;
	const remaining = perSecond > 0 ? Math.round((total - completed) / perSecond) : 0;
	console.log(
		`[Sweep] ${phase}: ${completed}/${total} (${((completed / total) * 100).toFixed(1)}%), ` +
			`${perSecond.toFixed(1)} lineups/s, ~${remaining}s left`
	);
}

function printTop(title: string, results: readonly SweepLineupResult[]): void {
	console.log(`\n${title}`);
	rankResults(results)
		.slice(0, TOP_LINEUPS_SHOWN)
		.forEach((result, index) => {
			console.log(`  ${String(index + 1).padStart(2)}. ${result.summary.mean.toFixed(4)}  ${result.lineup.join(', ')}`);
		});
}

async function main(): Promise<void> {
	const args = parseSweepArgs(process.argv.slice(2));
	if (args.help) {
		console.log(SWEEP_USAGE);
		return;
	}

	const setup = loadSetup(args.configPath);
	const autoRerun = args.rerun ?? setup.sweep.autoRerun;

	const controller = new AbortController();
	process.once('SIGINT', () => {
		console.warn('\n[Sweep] Interrupted, stopping after the current lineup...');
		controller.abort();
	});

	let db: ResultsDatabase | undefined;
	try {
		db = args.dbPath ? openResultsDatabase(args.dbPath) : undefined;

		const sweep = await runSweep({
			playerIds: setup.defaultLineup,
			roster: setup.roster,
			config: setup.config,
			numGames: args.numGames,
			limit: args.limit,
			seed: args.seed,
			rerun: autoRerun
				? {
						topN: args.rerunTopN ?? setup.sweep.rerunTopN,
						numGames: args.rerunGames ?? setup.sweep.rerunNumGames,
					}
				: null,
			db,
			signal: controller.signal,
			onProgress: logProgress,
		});

		printTop(`Top lineups of ${sweep.results.length} simulated:`, sweep.results);
		if (sweep.rerun) {
			printTop('Top lineups after re-run:', sweep.rerun.results);
		}
		console.log(`\nGrand total runs: ${Math.round(sweep.grandTotalRuns)} (seed ${sweep.seed})`);

		const csvPath = args.csvPath ?? generateTimestampedFilename();
		writeResultsCsv(csvPath, sweep.results, { grandTotalRuns: sweep.grandTotalRuns });
		if (sweep.rerun) {
			writeResultsCsv(csvPath.replace(/\.csv$/, '') + '-rerun.csv', rankResults(sweep.rerun.results));
		}

		if (sweep.aborted) {
			process.exitCode = 130;
		}
	} finally {
		if (db) {
			closeResultsDatabase(db);
		}
	}
}

main().catch((error: unknown) => {
	if (error instanceof UsageError) {
		console.error(`[Sweep] ${error.message}\n\n${SWEEP_USAGE}`);
	} else {
		console.error('[Sweep] Fatal:', error instanceof Error ? error.message : error);
	}
	process.exit(1);
});
