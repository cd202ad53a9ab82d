#!/usr/bin/env tsx
/**
 * Simulate one batting order and print its scoring summary
 * Usage: npx tsx app/run-lineup-sim.ts [--lineup id1 ... id9] [--num-games N] [--seed N]
 *
 * Without --lineup the first nine players of the player file bat in file order.
 */

import { LINEUP_SIM_USAGE, UsageError, parseLineupSimArgs } from './src/lib/cli/args.js';
import { runLineupSim } from './src/lib/cli/lineup-sim.js';

try {
	const args = parseLineupSimArgs(process.argv.slice(2));
	if (args.help) {
		console.log(LINEUP_SIM_USAGE);
	} else {
		runLineupSim(args);
	}
} catch (error) {
	if (error instanceof UsageError) {
		console.error(`[Simulator] ${error.message}\n\n${LINEUP_SIM_USAGE}`);
	} else {
		console.error('[Simulator] Fatal:', error instanceof Error ? error.message : error);
	}
	process.exit(1);
}
