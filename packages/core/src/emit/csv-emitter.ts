/**
 * Writes rows as CSV for spreadsheet-style importers:
 * UTF-8 with BOM, CRLF line endings, every field quoted.
 */

import { writeFileSync } from 'node:fs';
import { stringify } from 'csv-stringify/sync';
import type { Column, OutputRow } from '../types/columns.js';

export const BOM = '\uFEFF';

const STRINGIFY_OPTIONS = {
  quoted: true,
  quoted_empty: true,
  record_delimiter: 'windows',
} as const;

/** Header line plus one line per row; no rows gives a header-only file */
export function serializeCsv(rows: readonly OutputRow[], columns: readonly Column[]): string {
  const records: string[][] = [
    [...columns],
    ...rows.map(row => columns.map(column => row[column] ?? '')),
  ];
  return BOM + stringify(records, STRINGIFY_OPTIONS);
}

/**
 * Write the CSV file and return the number of data rows.
 * With dryRun nothing touches the filesystem; the count is what would have been written.
 */
export function emit(path: string, rows: readonly OutputRow[], columns: readonly Column[], dryRun: boolean): number {
  if (dryRun) return rows.length;
  writeFileSync(path, serializeCsv(rows, columns), 'utf-8');
  return rows.length;
}
