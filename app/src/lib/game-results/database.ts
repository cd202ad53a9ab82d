/**
 * Results database lifecycle (better-sqlite3)
 */

import Database from 'better-sqlite3';
import { createResultsSchema } from './schema.js';

export type ResultsDatabase = Database.Database;

/**
 * Open (creating if needed) a results database. ':memory:' gives a
 * throwaway database.
 */
export function openResultsDatabase(filename: string = ':memory:', options: { quiet?: boolean } = {}): ResultsDatabase {
  const db = new Database(filename);
  db.pragma('foreign_keys = ON');
  if (filename !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  createResultsSchema(db);
  if (!options.quiet) {
    console.log(`[ResultsDB] Opened ${filename}`);
  }
  return db;
}

export function closeResultsDatabase(db: ResultsDatabase): void {
  if (db.open) {
    db.close();
  }
}
