/**
 * Run bookkeeping: one row per lineup run, sweep or re-run
 */

import { randomUUID } from 'crypto';
import type { ResultsDatabase } from './database.js';
import type { RunInput, RunKind, RunRecord, RunStatus } from './types.js';

interface RunRow {
  id: string;
  kind: RunKind;
  parent_run_id: string | null;
  config_json: string;
  num_games: number;
  seed: number | null;
  created_at: string;
  completed_at: string | null;
  status: RunStatus;
}

function toRunRecord(row: RunRow): RunRecord {
  return {
    id: row.id,
    kind: row.kind,
    parentRunId: row.parent_run_id,
    configJson: row.config_json,
    numGames: row.num_games,
    seed: row.seed,
    createdAt: row.created_at,
    completedAt: row.completed_at,
    status: row.status,
  };
}

/**
 * Create a new run in the 'running' state
 */
export function createRun(db: ResultsDatabase, input: RunInput): RunRecord {
  const record: RunRecord = {
    id: randomUUID(),
    kind: input.kind,
    parentRunId: input.parentRunId ?? null,
    configJson: JSON.stringify(input.config),
    numGames: input.numGames,
    seed: input.seed ?? null,
    createdAt: new Date().toISOString(),
    completedAt: null,
    status: 'running',
  };

  try {
    db.prepare(
      `INSERT INTO runs (id, kind, parent_run_id, config_json, num_games, seed, created_at, status)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
    ).run(
      record.id,
      record.kind,
      record.parentRunId,
      record.configJson,
      record.numGames,
      record.seed,
      record.createdAt,
      record.status
    );
  } catch (error) {
    console.error('[ResultsDB] Failed to create run:', error);
    throw new Error(`Failed to create run: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }

  return record;
}

/**
 * Get a run by id
 */
export function getRun(db: ResultsDatabase, runId: string): RunRecord | null {
  const row = db.prepare<[string], RunRow>('SELECT * FROM runs WHERE id = ?').get(runId);
  return row ? toRunRecord(row) : null;
}

/**
 * Mark a run finished (completed, aborted or failed)
 */
export function completeRun(db: ResultsDatabase, runId: string, status: Exclude<RunStatus, 'running'> = 'completed'): void {
  const result = db
    .prepare('UPDATE runs SET status = ?, completed_at = ? WHERE id = ?')
    .run(status, new Date().toISOString(), runId);
  if (result.changes === 0) {
    throw new Error(`Run not found: ${runId}`);
  }
}
