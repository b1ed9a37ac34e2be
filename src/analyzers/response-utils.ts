/**
 * response-utils.ts
 * Row filtering over column-major response tables.
 */

import type { Cell, ResponseTable } from '../models/survey.js';

/** Reserved export value meaning "no response". */
export const MISSING_SENTINEL = '-99';

export function isBlankCell(cell: Cell | undefined): boolean {
  if (cell === null || cell === undefined) return true;
  const text = String(cell);
  return text === '' || text === MISSING_SENTINEL;
}

/** Number of respondent rows (longest column). */
export function rowCount(responses: ResponseTable, columns: readonly string[]): number {
  return columns.reduce((max, c) => Math.max(max, responses[c]?.length ?? 0), 0);
}

/**
 * Row-major view of the given columns, keeping only rows where at least one
 * of those columns holds an actual response. Only the named columns are
 * materialized.
 */
export function answeredRows(responses: ResponseTable, columns: readonly string[]): Cell[][] {
  const rows: Cell[][] = [];
  const n = rowCount(responses, columns);
  for (let r = 0; r < n; r++) {
    const row = columns.map((c) => responses[c]?.[r] ?? null);
    if (!row.every(isBlankCell)) rows.push(row);
  }
  return rows;
}
