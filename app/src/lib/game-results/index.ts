/**
 * Lineup Results - Public API Entry Point
 *
 * Aggregates per-game runs into lineup summaries, stores them in SQLite
 * (better-sqlite3) and exports them as CSV.
 *
 * @example
 * ```ts
 * import { openResultsDatabase, createRun, saveLineupResult, completeRun, summarize } from './game-results/index.js';
 *
 * const db = openResultsDatabase('results.sqlite');
 * const run = createRun(db, { kind: 'single', config, numGames: 162 });
 * saveLineupResult(db, run.id, lineup, summarize(games));
 * completeRun(db, run.id);
 * ```
 */

// ====================================================================
// Core Database
// ====================================================================
export { openResultsDatabase, closeResultsDatabase, type ResultsDatabase } from './database.js';
export { RESULTS_SCHEMA, createResultsSchema } from './schema.js';

// ====================================================================
// Types
// ====================================================================
export type { LineupScoreSummary, LineupResult, RunKind, RunStatus, RunRecord, RunInput } from './types.js';

// ====================================================================
// Aggregation
// ====================================================================
export { summarize, grandTotalRuns } from './stats.js';

// ====================================================================
// Runs & Lineup Results
// ====================================================================
export { createRun, getRun, completeRun } from './runs.js';
export { saveLineupResult, getRunResults, getTopLineups } from './lineups.js';

// ====================================================================
// Export
// ====================================================================
export { formatResultsCsv, writeResultsCsv, generateTimestampedFilename, type CsvOptions, type WriteCsvOptions } from './export.js';
