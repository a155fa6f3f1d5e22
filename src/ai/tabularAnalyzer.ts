/**
 * Tabular Analyzer — descriptive statistics over an in-memory table.
 *
 * Tables below the chunk threshold are analysed directly with exact two-pass
 * statistics. At or above it, rows are processed in fixed-size chunks: each
 * chunk fills its own accumulators, which are merged into the running totals
 * and then dropped.
 */

import { createHash } from 'node:crypto';
import type {
  CategoricalStats,
  Cell,
  CorrelationMatrix,
  DataQuality,
  DescriptiveStats,
  NumericStats,
  Table,
  ValueCount,
} from './types.js';
import {
  CoMomentAccumulator,
  HyperLogLog,
  MomentAccumulator,
  QuantileSketch,
  SpaceSaving,
  interpolatedQuantile,
} from './sketches.js';
import { AnalysisError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_CHUNK_SIZE = 10_000;
export const TOP_VALUES_LIMIT = 10;

export interface AnalyzeOptions {
  chunkSize?: number;
}

export type ColumnKind = 'numeric' | 'categorical';

export function cellKey(cell: Cell): string {
  if (cell instanceof Date) return cell.toISOString();
  return String(cell);
}

/**
 * A column is numeric when it has at least one value and every non-null
 * value is a finite number.
 */
export function inferColumnKinds(table: Table): ColumnKind[] {
  return table.columns.map((_, index) => {
    let seen = 0;
    for (const row of table.rows) {
      const cell = row[index] ?? null;
      if (cell === null) continue;
      if (typeof cell !== 'number' || !Number.isFinite(cell)) return 'categorical';
      seen += 1;
    }
    return seen > 0 ? 'numeric' : 'categorical';
  });
}

type PartialStats = Omit<DescriptiveStats, 'quality' | 'chunked' | 'chunkCount'>;

/** Row identity for duplicate detection. Type-tagged so 1 and '1' differ. */
export function rowKey(row: Cell[]): string {
  return row
    .map((cell) => {
      if (cell === null) return '\u0000';
      const tag = cell instanceof Date ? 'd' : typeof cell === 'number' ? 'n' : typeof cell === 'boolean' ? 'b' : 's';
      return tag + cellKey(cell);
    })
    .join('\u0001');
}

function roundPercent(part: number, whole: number): number {
  return whole === 0 ? 0 : Math.round((part / whole) * 10_000) / 100;
}

export function qualityScore(averageMissingPercent: number, duplicatePercent: number): number {
  const score = 100 - Math.min(averageMissingPercent * 2, 50) - Math.min(duplicatePercent, 30);
  return Math.max(Math.trunc(score), 0);
}

function assessQuality(stats: PartialStats, columns: string[], duplicateRows: number): DataQuality {
  const missingPercentage: Record<string, number> = {};
  for (const column of columns) {
    const missing = stats.numeric[column]?.missing ?? stats.categorical[column]?.missing ?? 0;
    missingPercentage[column] = roundPercent(missing, stats.rowCount);
  }

  const percents = Object.values(missingPercentage);
  const averageMissing = percents.reduce((acc, value) => acc + value, 0) / (percents.length || 1);
  const duplicatePercentage = roundPercent(duplicateRows, stats.rowCount);

  return {
    duplicateRows,
    duplicatePercentage,
    missingPercentage,
    score: qualityScore(averageMissing, duplicatePercentage),
  };
}

function assertAnalysable(table: Table): void {
  if (table.columns.length === 0) {
    throw new AnalysisError('The table has no columns to analyse.');
  }
  if (table.rows.length === 0) {
    throw new AnalysisError('The table has no rows to analyse.');
  }
}

function numericIndexes(kinds: ColumnKind[]): number[] {
  return kinds.flatMap((kind, index) => (kind === 'numeric' ? [index] : []));
}

function readNumber(row: Cell[], index: number): number | null {
  const cell = row[index];
  return typeof cell === 'number' && Number.isFinite(cell) ? cell : null;
}

function rankValues(counts: Map<string, number>): ValueCount[] {
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
    .slice(0, TOP_VALUES_LIMIT)
    .map(([value, count]) => ({ value, count }));
}

// ── Direct path ─────────────────────────────────────────────────────

function directNumeric(values: number[], missing: number): NumericStats {
  const count = values.length;
  if (count === 0) {
    return { count: 0, missing, sum: 0, mean: 0, std: 0, min: 0, max: 0, q1: 0, median: 0, q3: 0 };
  }

  const sum = values.reduce((acc, value) => acc + value, 0);
  const mean = sum / count;
  const squared = values.reduce((acc, value) => acc + (value - mean) ** 2, 0);
  const std = count > 1 ? Math.sqrt(squared / (count - 1)) : 0;
  const sorted = [...values].sort((a, b) => a - b);

  return {
    count,
    missing,
    sum,
    mean,
    std,
    min: sorted[0] ?? 0,
    max: sorted[count - 1] ?? 0,
    q1: interpolatedQuantile(sorted, 0.25),
    median: interpolatedQuantile(sorted, 0.5),
    q3: interpolatedQuantile(sorted, 0.75),
  };
}

function pearson(xs: number[], ys: number[]): number | null {
  const n = xs.length;
  if (n < 2) return null;
  const meanX = xs.reduce((acc, x) => acc + x, 0) / n;
  const meanY = ys.reduce((acc, y) => acc + y, 0) / n;
  let cov = 0;
  let varX = 0;
  let varY = 0;
  for (let i = 0; i < n; i++) {
    const dx = (xs[i] ?? 0) - meanX;
    const dy = (ys[i] ?? 0) - meanY;
    cov += dx * dy;
    varX += dx * dx;
    varY += dy * dy;
  }
  if (varX === 0 || varY === 0) return null;
  return cov / Math.sqrt(varX * varY);
}

function countDuplicateRows(rows: Cell[][]): number {
  const seen = new Set<string>();
  let duplicates = 0;
  for (const row of rows) {
    const key = rowKey(row);
    if (seen.has(key)) duplicates += 1;
    else seen.add(key);
  }
  return duplicates;
}

function analyzeDirect(table: Table, kinds: ColumnKind[]): PartialStats {
  const numeric: Record<string, NumericStats> = {};
  const categorical: Record<string, CategoricalStats> = {};

  table.columns.forEach((column, index) => {
    if (kinds[index] === 'numeric') {
      const values: number[] = [];
      let missing = 0;
      for (const row of table.rows) {
        const value = readNumber(row, index);
        if (value === null) missing += 1;
        else values.push(value);
      }
      numeric[column] = directNumeric(values, missing);
      return;
    }

    const counts = new Map<string, number>();
    let missing = 0;
    for (const row of table.rows) {
      const cell = row[index] ?? null;
      if (cell === null) {
        missing += 1;
        continue;
      }
      const key = cellKey(cell);
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }
    categorical[column] = {
      count: table.rows.length - missing,
      missing,
      cardinality: counts.size,
      cardinalityEstimated: false,
      topValues: rankValues(counts),
    };
  });

  const numericCols = numericIndexes(kinds);
  let correlation: CorrelationMatrix | undefined;
  if (numericCols.length >= 2) {
    const values = numericCols.map((a) =>
      numericCols.map((b) => {
        if (a === b) return 1;
        const xs: number[] = [];
        const ys: number[] = [];
        for (const row of table.rows) {
          const x = readNumber(row, a);
          const y = readNumber(row, b);
          if (x === null || y === null) continue;
          xs.push(x);
          ys.push(y);
        }
        return pearson(xs, ys);
      }),
    );
    correlation = { columns: numericCols.map((i) => table.columns[i] ?? ''), values };
  }

  return {
    rowCount: table.rows.length,
    columnCount: table.columns.length,
    numeric,
    categorical,
    ...(correlation ? { correlation } : {}),
  };
}

// ── Chunked path ────────────────────────────────────────────────────

interface NumericPartial {
  moments: MomentAccumulator;
  quantiles: QuantileSketch;
  missing: number;
}

interface CategoricalPartial {
  distinct: HyperLogLog;
  frequent: SpaceSaving;
  missing: number;
}

interface ChunkAccumulators {
  numeric: Map<number, NumericPartial>;
  categorical: Map<number, CategoricalPartial>;
  pairs: Array<{ a: number; b: number; comoment: CoMomentAccumulator }>;
}

function emptyAccumulators(kinds: ColumnKind[]): ChunkAccumulators {
  const acc: ChunkAccumulators = { numeric: new Map(), categorical: new Map(), pairs: [] };
  kinds.forEach((kind, index) => {
    if (kind === 'numeric') {
      acc.numeric.set(index, {
        moments: new MomentAccumulator(),
        quantiles: new QuantileSketch(),
        missing: 0,
      });
    } else {
      acc.categorical.set(index, {
        distinct: new HyperLogLog(),
        frequent: new SpaceSaving(),
        missing: 0,
      });
    }
  });

  const numericCols = numericIndexes(kinds);
  for (let i = 0; i < numericCols.length; i++) {
    for (let j = i + 1; j < numericCols.length; j++) {
      acc.pairs.push({
        a: numericCols[i] ?? -1,
        b: numericCols[j] ?? -1,
        comoment: new CoMomentAccumulator(),
      });
    }
  }
  return acc;
}

function accumulateChunk(rows: Cell[][], acc: ChunkAccumulators): void {
  for (const row of rows) {
    for (const [index, partial] of acc.numeric) {
      const value = readNumber(row, index);
      if (value === null) {
        partial.missing += 1;
        continue;
      }
      partial.moments.add(value);
      partial.quantiles.add(value);
    }

    for (const [index, partial] of acc.categorical) {
      const cell = row[index] ?? null;
      if (cell === null) {
        partial.missing += 1;
        continue;
      }
      const key = cellKey(cell);
      partial.distinct.add(key);
      partial.frequent.add(key);
    }

    for (const { a, b, comoment } of acc.pairs) {
      const x = readNumber(row, a);
      const y = readNumber(row, b);
      if (x !== null && y !== null) comoment.add(x, y);
    }
  }
}

function mergeAccumulators(target: ChunkAccumulators, source: ChunkAccumulators): void {
  for (const [index, partial] of source.numeric) {
    const into = target.numeric.get(index);
    if (!into) continue;
    into.moments.merge(partial.moments);
    into.quantiles.merge(partial.quantiles);
    into.missing += partial.missing;
  }
  for (const [index, partial] of source.categorical) {
    const into = target.categorical.get(index);
    if (!into) continue;
    into.distinct.merge(partial.distinct);
    into.frequent.merge(partial.frequent);
    into.missing += partial.missing;
  }
  source.pairs.forEach(({ comoment }, i) => {
    target.pairs[i]?.comoment.merge(comoment);
  });
}

function analyzeChunked(
  table: Table,
  kinds: ColumnKind[],
  chunkSize: number,
): PartialStats & { duplicateRows: number } {
  const totals = emptyAccumulators(kinds);
  // Fixed-width row digests keep the duplicate set independent of row width
  const seenRows = new Set<string>();
  let duplicateRows = 0;

  for (let start = 0; start < table.rows.length; start += chunkSize) {
    const rows = table.rows.slice(start, start + chunkSize);
    const chunk = emptyAccumulators(kinds);
    accumulateChunk(rows, chunk);
    mergeAccumulators(totals, chunk);

    for (const row of rows) {
      const digest = createHash('sha1').update(rowKey(row)).digest('base64');
      if (seenRows.has(digest)) duplicateRows += 1;
      else seenRows.add(digest);
    }
  }

  const numeric: Record<string, NumericStats> = {};
  for (const [index, partial] of totals.numeric) {
    const { moments, quantiles } = partial;
    const column = table.columns[index] ?? '';
    numeric[column] =
      moments.count === 0
        ? { count: 0, missing: partial.missing, sum: 0, mean: 0, std: 0, min: 0, max: 0, q1: 0, median: 0, q3: 0 }
        : {
            count: moments.count,
            missing: partial.missing,
            sum: moments.sum,
            mean: moments.mean,
            std: moments.std,
            min: moments.min,
            max: moments.max,
            q1: quantiles.quantile(0.25),
            median: quantiles.quantile(0.5),
            q3: quantiles.quantile(0.75),
          };
  }

  const categorical: Record<string, CategoricalStats> = {};
  for (const [index, partial] of totals.categorical) {
    const column = table.columns[index] ?? '';
    categorical[column] = {
      count: table.rows.length - partial.missing,
      missing: partial.missing,
      cardinality: partial.distinct.estimate(),
      cardinalityEstimated: true,
      topValues: partial.frequent.top(TOP_VALUES_LIMIT),
    };
  }

  const numericCols = numericIndexes(kinds);
  let correlation: CorrelationMatrix | undefined;
  if (numericCols.length >= 2) {
    const values = numericCols.map((a) =>
      numericCols.map((b) => {
        if (a === b) return 1;
        const pair = totals.pairs.find(
          (p) => (p.a === a && p.b === b) || (p.a === b && p.b === a),
        );
        return pair?.comoment.correlation() ?? null;
      }),
    );
    correlation = { columns: numericCols.map((i) => table.columns[i] ?? ''), values };
  }

  return {
    rowCount: table.rows.length,
    columnCount: table.columns.length,
    numeric,
    categorical,
    ...(correlation ? { correlation } : {}),
    duplicateRows,
  };
}

export function analyzeTable(table: Table, options: AnalyzeOptions = {}): DescriptiveStats {
  assertAnalysable(table);

  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  if (!(chunkSize > 0)) {
    throw new AnalysisError(`Invalid chunk size: ${chunkSize}`);
  }

  const kinds = inferColumnKinds(table);
  const chunked = table.rows.length >= chunkSize;
  const chunkCount = chunked ? Math.ceil(table.rows.length / chunkSize) : 1;

  logger.debug(
    { rowCount: table.rows.length, columnCount: table.columns.length, chunked, chunkCount },
    'Tabular analyzer: starting analysis',
  );

  let stats: PartialStats;
  let duplicateRows: number;
  if (chunked) {
    const { duplicateRows: counted, ...rest } = analyzeChunked(table, kinds, chunkSize);
    stats = rest;
    duplicateRows = counted;
  } else {
    stats = analyzeDirect(table, kinds);
    duplicateRows = countDuplicateRows(table.rows);
  }

  return { ...stats, quality: assessQuality(stats, table.columns, duplicateRows), chunked, chunkCount };
}
