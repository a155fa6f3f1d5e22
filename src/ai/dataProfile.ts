/**
 * Builds the DataProfile the chart selector works from: a semantic type and
 * cardinality per column, whether there is a usable time axis, and whether
 * the data splits a total into parts.
 */

import type { Cell, ColumnProfile, DataProfile, DescriptiveStats, SemanticType, Table } from './types.js';

/** Distinct counting stops here; beyond it the exact number does not change any decision. */
export const CARDINALITY_CAP = 10_000;
export const CATEGORICAL_MAX_CARDINALITY = 50;
export const PIE_MAX_SLICES = 6;

const ISO_DATE_RE = /^\d{4}-\d{2}(-\d{2})?([T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;
const TIME_NAME_RE = /(^|_)(year|yr|month|quarter|week|day|date)$/i;
const SHARE_NAME_RE = /share|percent|pct|proportion|fraction|ratio|portion|breakdown|distribution|mix/i;

function isTemporalCell(cell: Cell): boolean {
  if (cell instanceof Date) return !Number.isNaN(cell.getTime());
  if (typeof cell === 'string') return ISO_DATE_RE.test(cell) && !Number.isNaN(Date.parse(cell));
  return false;
}

function nonNullCells(table: Table, index: number): Cell[] {
  const cells: Cell[] = [];
  for (const row of table.rows) {
    const cell = row[index] ?? null;
    if (cell !== null) cells.push(cell);
  }
  return cells;
}

function distinctCount(cells: Cell[]): number {
  const seen = new Set<string | number | boolean>();
  for (const cell of cells) {
    seen.add(cell instanceof Date ? cell.getTime() : cell ?? '');
    if (seen.size >= CARDINALITY_CAP) break;
  }
  return seen.size;
}

function inferSemanticType(
  name: string,
  cells: Cell[],
  cardinality: number,
  isNumeric: boolean,
): SemanticType {
  if (isNumeric) {
    const integral = cells.every((cell) => typeof cell === 'number' && Number.isInteger(cell));
    return integral && TIME_NAME_RE.test(name) ? 'datetime' : 'numeric';
  }

  if (cells.length > 0 && cells.every(isTemporalCell)) return 'datetime';

  if (cardinality <= CATEGORICAL_MAX_CARDINALITY || cardinality <= cells.length / 2) {
    return 'categorical';
  }
  return 'text';
}

function isPartOfWhole(table: Table, columns: ColumnProfile[], stats: DescriptiveStats): boolean {
  const categorical = columns.filter((c) => c.semanticType === 'categorical');
  const numeric = columns.filter((c) => c.semanticType === 'numeric');
  if (categorical.length !== 1 || numeric.length !== 1) return false;

  const [label] = categorical;
  const [value] = numeric;
  if (!label || !value) return false;

  // Each slice appears once
  if (label.cardinality > PIE_MAX_SLICES || label.nullCount > 0 || label.cardinality !== table.rows.length) {
    return false;
  }

  const valueStats = stats.numeric[value.name];
  if (!valueStats || valueStats.count === 0 || valueStats.min < 0 || valueStats.sum <= 0) return false;

  if (SHARE_NAME_RE.test(value.name)) return true;
  return Math.abs(valueStats.sum - 100) <= 0.5 || Math.abs(valueStats.sum - 1) <= 0.005;
}

export function buildProfile(table: Table, stats: DescriptiveStats): DataProfile {
  const columns: ColumnProfile[] = table.columns.map((name, index) => {
    const cells = nonNullCells(table, index);
    const categoricalStats = stats.categorical[name];
    const cardinality = categoricalStats ? categoricalStats.cardinality : distinctCount(cells);
    const semanticType = inferSemanticType(name, cells, cardinality, name in stats.numeric);

    return {
      name,
      semanticType,
      cardinality,
      nullCount: table.rows.length - cells.length,
    };
  });

  const timeColumn = columns.find((c) => c.semanticType === 'datetime' && c.cardinality >= 2);

  return {
    rowCount: table.rows.length,
    columns,
    hasTimeAxis: timeColumn !== undefined,
    ...(timeColumn ? { timeColumn: timeColumn.name } : {}),
    partOfWhole: isPartOfWhole(table, columns, stats),
  };
}
