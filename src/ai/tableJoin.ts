import type { Cell, Table } from './types.js';
import { normalizeCell } from './cells.js';
import { AnalysisError } from '../utils/errors.js';

export interface JoinResult {
  table: Table;
  keys: string[];
  truncated: boolean;
}

function joinKey(row: Cell[], indexes: number[]): string | null {
  const parts: string[] = [];
  for (const index of indexes) {
    const cell = normalizeCell(row[index] ?? null);
    if (cell === null) return null;
    parts.push(String(cell).trim().toLowerCase());
  }
  return parts.join('\u0000');
}

/** Columns present in both tables, compared case-insensitively, in left-table order. */
export function sharedColumns(left: Table, right: Table): string[] {
  const rightNames = new Set(right.columns.map((c) => c.toLowerCase()));
  return left.columns.filter((c) => rightNames.has(c.toLowerCase()));
}

/**
 * Inner join on every shared column. Output keeps the left table's columns
 * followed by the right table's remaining columns. Rows whose key has a null
 * never match.
 */
export function innerJoin(left: Table, right: Table, maxRows = Number.POSITIVE_INFINITY): JoinResult {
  const keys = sharedColumns(left, right);
  if (keys.length === 0) {
    throw new AnalysisError(
      'The query result and the attached file share no column to combine them on.',
    );
  }

  const lowered = keys.map((k) => k.toLowerCase());
  const leftIndexes = keys.map((k) => left.columns.indexOf(k));
  const rightIndexes = lowered.map((k) => right.columns.findIndex((c) => c.toLowerCase() === k));
  const rightExtra = right.columns
    .map((name, index) => ({ name, index }))
    .filter(({ name }) => !lowered.includes(name.toLowerCase()));

  const buckets = new Map<string, Cell[][]>();
  for (const row of right.rows) {
    const key = joinKey(row, rightIndexes);
    if (key === null) continue;
    const bucket = buckets.get(key);
    if (bucket) bucket.push(row);
    else buckets.set(key, [row]);
  }

  const rows: Cell[][] = [];
  let truncated = false;

  outer: for (const leftRow of left.rows) {
    const key = joinKey(leftRow, leftIndexes);
    if (key === null) continue;
    for (const rightRow of buckets.get(key) ?? []) {
      if (rows.length >= maxRows) {
        truncated = true;
        break outer;
      }
      rows.push([...leftRow, ...rightExtra.map(({ index }) => rightRow[index] ?? null)]);
    }
  }

  return {
    table: { columns: [...left.columns, ...rightExtra.map(({ name }) => name)], rows },
    keys,
    truncated,
  };
}
