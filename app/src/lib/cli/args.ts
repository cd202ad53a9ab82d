/**
 * Command line parsing for the lineup scripts
 *
 * Hand-rolled loops over process.argv.slice(2), one per script.
 */

export class UsageError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'UsageError';
	}
}

export interface LineupSimArgs {
	configPath?: string;
	/** Nine player IDs, leadoff first */
	lineup?: string[];
	numGames?: number;
	seed?: number;
	showGameLogs: boolean;
	dbPath?: string;
	csvPath?: string;
	/** Print only the mean to stdout */
	quiet: boolean;
	help: boolean;
}

export interface SweepArgs {
	configPath?: string;
	numGames?: number;
	limit?: number;
	seed?: number;
	/** undefined: use sweepParams.autoRerun from the config */
	rerun?: boolean;
	rerunTopN?: number;
	rerunGames?: number;
	dbPath?: string;
	csvPath?: string;
	help: boolean;
}

export const LINEUP_SIM_USAGE = `Usage: tsx app/run-lineup-sim.ts [options]
  --config <file>        setup file (default app/data/config.json)
  --lineup <id x9>       batting order, space or comma separated (default: first nine players)
  --num-games <n>        games to simulate (default: simulationParams.num_games)
  --seed <n>             seed for a reproducible run
  --show-game-logs       print play-by-play
  --db <file>            save the result to a SQLite results database
  --csv <file>           write the result as CSV
  --quiet                print only the average score
  --help`;

export const SWEEP_USAGE = `Usage: tsx app/run-lineup-sweep.ts [options]
  --config <file>        setup file (default app/data/config.json)
  --num-games <n>        games per lineup (default: simulationParams.num_games)
  --limit <n>            stop after n lineups
  --seed <n>             base seed for a reproducible sweep
  --rerun | --no-rerun   re-run the best lineups (default: sweepParams.autoRerun)
  --rerun-top <n>        lineups to re-run (default: sweepParams.rerunTopN)
  --rerun-games <n>      games per re-run lineup (default: sweepParams.rerunNumGames)
  --db <file>            save results to a SQLite results database
  --csv <file>           write all results as CSV
  --help`;

/**
 * Reads option values off an argument list
 */
class ArgReader {
	private index = 0;

	constructor(private readonly args: readonly string[]) {}

	next(): string | undefined {
		return this.args[this.index++];
	}

	value(option: string): string {
		const value = this.args[this.index];
		if (value === undefined || value.startsWith('--')) {
			throw new UsageError(`${option} needs a value`);
		}
		this.index++;
		return value;
	}

	/** Every value up to the next option */
	values(option: string): string[] {
		const values: string[] = [];
		while (this.index < this.args.length && !this.args[this.index].startsWith('--')) {
			values.push(this.args[this.index++]);
		}
		if (values.length === 0) {
			throw new UsageError(`${option} needs a value`);
		}
		return values;
	}

	integer(option: string, min: number): number {
		const raw = this.value(option);
		const value = Number(raw);
		if (!Number.isInteger(value) || value < min) {
			throw new UsageError(`${option} must be an integer >= ${min}, got ${raw}`);
		}
		return value;
	}
}

export function parseLineupSimArgs(argv: readonly string[]): LineupSimArgs {
	const args: LineupSimArgs = { showGameLogs: false, quiet: false, help: false };
	const reader = new ArgReader(argv);

	for (let arg = reader.next(); arg !== undefined; arg = reader.next()) {
		switch (arg) {
			case '--config':
				args.configPath = reader.value(arg);
				break;
			case '--lineup':
				args.lineup = reader
					.values(arg)
					.flatMap((value) => value.split(','))
					.map((id) => id.trim())
					.filter((id) => id !== '');
				break;
			case '--num-games':
				args.numGames = reader.integer(arg, 1);
				break;
			case '--seed':
				args.seed = reader.integer(arg, 0);
				break;
			case '--show-game-logs':
				args.showGameLogs = true;
				break;
			case '--db':
				args.dbPath = reader.value(arg);
				break;
			case '--csv':
				args.csvPath = reader.value(arg);
				break;
			case '--quiet':
				args.quiet = true;
				break;
			case '--help':
			case '-h':
				args.help = true;
				break;
			default:
				throw new UsageError(`Unknown option: ${arg}`);
		}
	}

	return args;
}

export function parseSweepArgs(argv: readonly string[]): SweepArgs {
	const args: SweepArgs = { help: false };
	const reader = new ArgReader(argv);

	for (let arg = reader.next(); arg !== undefined; arg = reader.next()) {
		switch (arg) {
			case '--config':
				args.configPath = reader.value(arg);
				break;
			case '--num-games':
				args.numGames = reader.integer(arg, 1);
				break;
			case '--limit':
				args.limit = reader.integer(arg, 1);
				break;
			case '--seed':
				args.seed = reader.integer(arg, 0);
				break;
			case '--rerun':
				args.rerun = true;
				break;
			case '--no-rerun':
				args.rerun = false;
				break;
			case '--rerun-top':
				args.rerunTopN = reader.integer(arg, 1);
				break;
			case '--rerun-games':
				args.rerunGames = reader.integer(arg, 1);
				break;
			case '--db':
				args.dbPath = reader.value(arg);
				break;
			case '--csv':
				args.csvPath = reader.value(arg);
				break;
			case '--help':
			case '-h':
				args.help = true;
				break;
			default:
				throw new UsageError(`Unknown option: ${arg}`);
		}
	}

	return args;
}
