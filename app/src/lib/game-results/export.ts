/**
 * CSV export of lineup results
 *
 * Layout: P1_ID..P9_ID,AverageScore, one row per lineup, mean to 4 decimals,
 * optionally followed by a GRAND_TOTAL_RUNS row.
 */

import { writeFileSync } from 'fs';
import type { LineupResult } from './types.js';

/**
 * Default filename for exported results
 */
const DEFAULT_FILENAME = 'lineup-results.csv';

const LINEUP_COLUMNS = 9;

/**
 * Generate a timestamped filename
 *
 * @param baseName - Base filename, with or without extension
 * @param now - Clock for the timestamp
 */
export function generateTimestampedFilename(baseName: string = DEFAULT_FILENAME, now: Date = new Date()): string {
  const timestamp = now.toISOString().replace(/[:.]/g, '-').slice(0, -5);
  const extension = baseName.includes('.') ? baseName.split('.').pop() : 'csv';
  const name = baseName.includes('.') ? baseName.split('.').slice(0, -1).join('.') : baseName;
  return `${name}-${timestamp}.${extension}`;
}

function escapeCsv(field: string): string {
  return /[",\r\n]/.test(field) ? `"${field.replace(/"/g, '""')}"` : field;
}

export interface CsvOptions {
  /** Appends a GRAND_TOTAL_RUNS row, rounded to a whole number */
  grandTotalRuns?: number;
}

/**
 * Render results as CSV text (trailing newline included)
 */
export function formatResultsCsv(results: readonly Pick<LineupResult, 'lineup' | 'summary'>[], options: CsvOptions = {}): string {
  const header = [...Array.from({ length: LINEUP_COLUMNS }, (_, i) => `P${i + 1}_ID`), 'AverageScore'];
  const lines = [header.join(',')];

  for (const result of results) {
    const ids = Array.from({ length: LINEUP_COLUMNS }, (_, i) => escapeCsv(result.lineup[i] ?? ''));
    lines.push([...ids, result.summary.mean.toFixed(4)].join(','));
  }

  if (options.grandTotalRuns !== undefined) {
    const blanks = new Array<string>(LINEUP_COLUMNS - 1).fill('');
    lines.push(['GRAND_TOTAL_RUNS', ...blanks, Math.round(options.grandTotalRuns).toFixed(0)].join(','));
  }

  return `${lines.join('\n')}\n`;
}

export interface WriteCsvOptions extends CsvOptions {
  /** Skip the status line on stdout */
  quiet?: boolean;
}

/**
 * Write results CSV to disk
 */
export function writeResultsCsv(
  filePath: string,
  results: readonly Pick<LineupResult, 'lineup' | 'summary'>[],
  options: WriteCsvOptions = {}
): void {
  writeFileSync(filePath, formatResultsCsv(results, options), 'utf-8');
  if (!options.quiet) {
    console.log(`[ResultsDB] Wrote ${results.length} lineup result(s) to ${filePath}`);
  }
}
