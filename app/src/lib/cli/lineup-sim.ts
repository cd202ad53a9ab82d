/**
 * Single-lineup run behind app/run-lineup-sim.ts
 *
 * With `quiet`, stdout carries only the mean to 4 decimals so a parent
 * process can read the score; warnings still go to stderr.
 */

import { createSeededRandom } from '@lineup-sim/model';
import type { GameObserver } from '../game/types.js';
import { loadSetup } from '../game/setup-loader.js';
import { simulateLineup } from '../game/simulate-lineup.js';
import type { LineupRunResult } from '../game/simulate-lineup.js';
import { formatInningLine, formatPlayLine } from '../game/describe-play.js';
import { resolveLineup } from '../game/lineup-validator.js';
import {
	closeResultsDatabase,
	completeRun,
	createRun,
	openResultsDatabase,
	saveLineupResult,
	writeResultsCsv,
} from '../game-results/index.js';
import type { LineupSimArgs } from './args.js';

function printSummary({ summary }: LineupRunResult): void {
	console.log(`\nAverage score: ${summary.mean.toFixed(4)} runs/game over ${summary.games} game(s)`);
	console.log(`  Total runs:   ${summary.totalRuns}`);
	console.log(`  Min / Max:    ${summary.min} / ${summary.max}`);
	console.log(`  Median:       ${summary.median}`);
	console.log(`  Std dev:      ${summary.standardDeviation.toFixed(4)}`);
	console.log('  Runs  Games');
	summary.histogram.forEach((games, runs) => {
		if (games > 0) {
			console.log(`  ${String(runs).padStart(4)}  ${games}`);
		}
	});
}

export function runLineupSim(args: LineupSimArgs): LineupRunResult {
	const { quiet } = args;
	const setup = loadSetup(args.configPath, { quiet });
	const lineupIds = args.lineup ?? setup.defaultLineup;
	const numGames = args.numGames ?? setup.config.numGames;

	// Play-by-play would mix into the score line
	let observer: GameObserver | undefined;
	if (args.showGameLogs && !quiet) {
		const lineup = resolveLineup(lineupIds, setup.roster, { reportWarnings: false });
		observer = {
			onPlay: (event) => console.log(formatPlayLine(event, lineup)),
			onInningEnd: (summary) => console.log(formatInningLine(summary)),
		};
	}

	if (!quiet) {
		console.log(`[Simulator] Lineup: ${lineupIds.join(', ')}`);
		console.log(`[Simulator] Simulating ${numGames} game(s)${args.seed !== undefined ? `, seed ${args.seed}` : ''}`);
	}

	const run = simulateLineup(lineupIds, setup.roster, setup.config, {
		random: args.seed !== undefined ? createSeededRandom(args.seed) : undefined,
		observer,
		numGames,
	});

	if (quiet) {
		console.log(run.summary.mean.toFixed(4));
	} else {
		printSummary(run);
	}

	if (args.dbPath) {
		const db = openResultsDatabase(args.dbPath, { quiet });
		try {
			const record = createRun(db, { kind: 'single', config: setup.config, numGames, seed: args.seed });
			saveLineupResult(db, record.id, run.lineup, run.summary);
			completeRun(db, record.id);
			if (!quiet) {
				console.log(`[Simulator] Saved run ${record.id} to ${args.dbPath}`);
			}
		} finally {
			closeResultsDatabase(db);
		}
	}

	if (args.csvPath) {
		writeResultsCsv(args.csvPath, [run], { quiet });
	}

	return run;
}
