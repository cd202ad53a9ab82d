/**
 * SQL schema for the lineup results database
 */

import type { ResultsDatabase } from './database.js';

export const RESULTS_SCHEMA = `
  CREATE TABLE IF NOT EXISTS runs (
    id TEXT PRIMARY KEY,
    kind TEXT NOT NULL CHECK(kind IN ('single', 'sweep', 'rerun')),
    parent_run_id TEXT,
    config_json TEXT NOT NULL,
    num_games INTEGER NOT NULL,
    seed INTEGER,
    created_at TEXT NOT NULL,
    completed_at TEXT,
    status TEXT NOT NULL DEFAULT 'running' CHECK(status IN ('running', 'completed', 'aborted', 'failed')),
    FOREIGN KEY (parent_run_id) REFERENCES runs(id) ON DELETE SET NULL
  );

  CREATE TABLE IF NOT EXISTS lineup_results (
    run_id TEXT NOT NULL,
    sequence INTEGER NOT NULL,
    lineup_json TEXT NOT NULL,
    games INTEGER NOT NULL,
    mean_runs REAL NOT NULL,
    total_runs INTEGER NOT NULL,
    min_runs INTEGER NOT NULL,
    max_runs INTEGER NOT NULL,
    median_runs REAL NOT NULL,
    stddev_runs REAL NOT NULL,
    histogram_json TEXT NOT NULL,
    PRIMARY KEY (run_id, lineup_json),
    FOREIGN KEY (run_id) REFERENCES runs(id) ON DELETE CASCADE
  );

  CREATE INDEX IF NOT EXISTS idx_lineup_results_mean ON lineup_results(run_id, mean_runs DESC);
  CREATE INDEX IF NOT EXISTS idx_lineup_results_sequence ON lineup_results(run_id, sequence);
`;

/**
 * Create all tables and indexes in an open database
 */
export function createResultsSchema(db: ResultsDatabase): void {
  db.exec(RESULTS_SCHEMA);
}
