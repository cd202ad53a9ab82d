/**
 * Per-lineup results for a run
 */

import type { ResultsDatabase } from './database.js';
import type { LineupResult, LineupScoreSummary } from './types.js';

interface LineupResultRow {
  run_id: string;
  lineup_json: string;
  games: number;
  mean_runs: number;
  total_runs: number;
  min_runs: number;
  max_runs: number;
  median_runs: number;
  stddev_runs: number;
  histogram_json: string;
}

function parseJsonArray<T>(json: string, isItem: (value: unknown) => value is T, column: string): T[] {
  const parsed: unknown = JSON.parse(json);
  if (!Array.isArray(parsed) || !parsed.every(isItem)) {
    throw new Error(`Corrupt ${column} value: ${json}`);
  }
  return parsed;
}

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

function isCount(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function toLineupResult(row: LineupResultRow): LineupResult {
  return {
    runId: row.run_id,
    lineup: parseJsonArray(row.lineup_json, isString, 'lineup_json'),
    summary: {
      games: row.games,
      mean: row.mean_runs,
      totalRuns: row.total_runs,
      min: row.min_runs,
      max: row.max_runs,
      median: row.median_runs,
      standardDeviation: row.stddev_runs,
      histogram: parseJsonArray(row.histogram_json, isCount, 'histogram_json'),
    },
  };
}

const SELECT_COLUMNS = `run_id, lineup_json, games, mean_runs, total_runs, min_runs, max_runs,
  median_runs, stddev_runs, histogram_json`;

/**
 * Store (or replace) the summary for one lineup in a run.
 * Each call commits on its own, so results already saved survive a
 * later failure in the same run.
 */
export function saveLineupResult(
  db: ResultsDatabase,
  runId: string,
  lineup: readonly string[],
  summary: LineupScoreSummary
): void {
  try {
    const next = db
      .prepare<[string], { next: number }>(
        'SELECT COALESCE(MAX(sequence), 0) + 1 AS next FROM lineup_results WHERE run_id = ?'
      )
      .get(runId);

    db.prepare(
      `INSERT OR REPLACE INTO lineup_results
       (run_id, sequence, lineup_json, games, mean_runs, total_runs, min_runs, max_runs,
        median_runs, stddev_runs, histogram_json)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    ).run(
      runId,
      next?.next ?? 1,
      JSON.stringify(lineup),
      summary.games,
      summary.mean,
      summary.totalRuns,
      summary.min,
      summary.max,
      summary.median,
      summary.standardDeviation,
      JSON.stringify(summary.histogram)
    );
  } catch (error) {
    console.error('[ResultsDB] Failed to save lineup result:', error);
    throw new Error(`Failed to save lineup result: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }
}

/**
 * All lineup results of a run in the order they were saved
 */
export function getRunResults(db: ResultsDatabase, runId: string): LineupResult[] {
  return db
    .prepare<[string], LineupResultRow>(
      `SELECT ${SELECT_COLUMNS} FROM lineup_results WHERE run_id = ? ORDER BY sequence ASC`
    )
    .all(runId)
    .map(toLineupResult);
}

/**
 * Best lineups of a run by mean runs (ties keep save order)
 */
export function getTopLineups(db: ResultsDatabase, runId: string, limit: number = 10): LineupResult[] {
  return db
    .prepare<[string, number], LineupResultRow>(
      `SELECT ${SELECT_COLUMNS} FROM lineup_results WHERE run_id = ?
       ORDER BY mean_runs DESC, sequence ASC LIMIT ?`
    )
    .all(runId, limit)
    .map(toLineupResult);
}
