/**
 * Chart selection + result table → render payload.
 *
 * Produces a Chart.js-style configuration for line, bar, pie and scatter
 * charts, a correlation matrix payload for heatmaps, and a table payload
 * otherwise. Pure and synchronous; everything returned is JSON-serialisable.
 */

import type {
  Cell,
  ChartConfiguration,
  ChartSelection,
  ChartSpec,
  DescriptiveStats,
  HeatmapPayload,
  Table,
  TablePayload,
} from './types.js';
import { BAR_MAX_CATEGORIES } from './chartSelector.js';
import { logger } from '../utils/logger.js';

export const TABLE_PREVIEW_ROWS = 100;
export const SCATTER_MAX_POINTS = 2000;

/**
 * Visually distinct, print-friendly palette. Adjacent colours contrast.
 */
const COLOR_PALETTE = [
  'rgba(54, 162, 235, 0.7)', // blue
  'rgba(255, 99, 132, 0.7)', // red
  'rgba(75, 192, 192, 0.7)', // teal
  'rgba(255, 159, 64, 0.7)', // orange
  'rgba(153, 102, 255, 0.7)', // purple
  'rgba(255, 205, 86, 0.7)', // yellow
  'rgba(201, 203, 207, 0.7)', // grey
  'rgba(46, 204, 113, 0.7)', // green
  'rgba(231, 76, 60, 0.7)', // dark red
  'rgba(52, 73, 94, 0.7)', // dark blue-grey
  'rgba(26, 188, 156, 0.7)', // turquoise
  'rgba(241, 196, 15, 0.7)', // gold
] as const;

const BORDER_PALETTE = COLOR_PALETTE.map((c) => c.replace('0.7)', '1)'));

export function generateColors(count: number): string[] {
  return Array.from({ length: count }, (_, i) => COLOR_PALETTE[i % COLOR_PALETTE.length] ?? COLOR_PALETTE[0]);
}

export function generateBorderColors(count: number): string[] {
  return Array.from({ length: count }, (_, i) => BORDER_PALETTE[i % BORDER_PALETTE.length] ?? '');
}

export function toLabel(cell: Cell | undefined): string {
  if (cell === null || cell === undefined) return '';
  if (cell instanceof Date) return cell.toISOString().slice(0, 10);
  return String(cell);
}

function toNumber(cell: Cell | undefined): number | null {
  return typeof cell === 'number' && Number.isFinite(cell) ? cell : null;
}

function timeValue(cell: Cell | undefined): number {
  if (cell instanceof Date) return cell.getTime();
  if (typeof cell === 'number') return cell;
  if (typeof cell === 'string') {
    const parsed = Date.parse(cell);
    return Number.isNaN(parsed) ? Number.POSITIVE_INFINITY : parsed;
  }
  return Number.POSITIVE_INFINITY;
}

/**
 * Sum `valueKey` per distinct `labelKey`, keeping first-seen order.
 * Rows with no numeric value are skipped.
 */
export function aggregateByLabel(
  table: Table,
  labelKey: string,
  valueKey: string,
): Array<{ label: string; raw: Cell; value: number }> {
  const labelIndex = table.columns.indexOf(labelKey);
  const valueIndex = table.columns.indexOf(valueKey);
  const groups = new Map<string, { label: string; raw: Cell; value: number }>();

  for (const row of table.rows) {
    const value = toNumber(row[valueIndex]);
    if (value === null) continue;
    const raw = row[labelIndex] ?? null;
    const label = toLabel(raw);
    const group = groups.get(label);
    if (group) group.value += value;
    else groups.set(label, { label, raw, value });
  }
  return [...groups.values()];
}

function axisConfig(
  type: 'bar' | 'line',
  title: string,
  xKey: string,
  yKey: string,
  labels: string[],
  data: number[],
): ChartConfiguration {
  return {
    type,
    data: {
      labels,
      datasets: [
        {
          label: yKey,
          data,
          backgroundColor: generateColors(data.length),
          borderColor: generateBorderColors(data.length),
          borderWidth: 1,
        },
      ],
    },
    options: {
      responsive: true,
      plugins: {
        title: { display: true, text: title },
      },
      scales: {
        x: { title: { display: true, text: xKey } },
        y: { title: { display: true, text: yKey } },
      },
    },
  };
}

function buildLine(table: Table, title: string, xKey: string, yKey: string): ChartConfiguration {
  const points = aggregateByLabel(table, xKey, yKey).sort((a, b) => timeValue(a.raw) - timeValue(b.raw));
  return axisConfig(
    'line',
    title,
    xKey,
    yKey,
    points.map((p) => p.label),
    points.map((p) => p.value),
  );
}

function buildBar(table: Table, title: string, xKey: string, yKey: string): ChartConfiguration {
  const bars = aggregateByLabel(table, xKey, yKey)
    .sort((a, b) => b.value - a.value)
    .slice(0, BAR_MAX_CATEGORIES);
  return axisConfig(
    'bar',
    title,
    xKey,
    yKey,
    bars.map((b) => b.label),
    bars.map((b) => b.value),
  );
}

function buildPie(table: Table, title: string, labelKey: string, valueKey: string): ChartConfiguration {
  const slices = aggregateByLabel(table, labelKey, valueKey);
  return {
    type: 'pie',
    data: {
      labels: slices.map((s) => s.label),
      datasets: [
        {
          label: valueKey,
          data: slices.map((s) => s.value),
          backgroundColor: generateColors(slices.length),
          borderColor: generateBorderColors(slices.length),
          borderWidth: 1,
        },
      ],
    },
    options: {
      responsive: true,
      plugins: {
        title: { display: true, text: title },
        legend: { display: true, position: 'right' },
      },
    },
  };
}

function buildScatter(table: Table, title: string, xKey: string, yKey: string): ChartConfiguration {
  const xIndex = table.columns.indexOf(xKey);
  const yIndex = table.columns.indexOf(yKey);
  const points: Array<{ x: number; y: number }> = [];

  for (const row of table.rows) {
    const x = toNumber(row[xIndex]);
    const y = toNumber(row[yIndex]);
    if (x === null || y === null) continue;
    points.push({ x, y });
    if (points.length >= SCATTER_MAX_POINTS) break;
  }

  return {
    type: 'scatter',
    data: {
      datasets: [
        {
          label: `${yKey} vs ${xKey}`,
          data: points,
          backgroundColor: generateColors(1),
          borderColor: generateBorderColors(1),
          borderWidth: 1,
        },
      ],
    },
    options: {
      responsive: true,
      plugins: {
        title: { display: true, text: title },
      },
      scales: {
        x: { title: { display: true, text: xKey } },
        y: { title: { display: true, text: yKey } },
      },
    },
  };
}

function buildHeatmap(title: string, columns: string[], stats: DescriptiveStats): HeatmapPayload | null {
  const correlation = stats.correlation;
  if (!correlation) return null;

  const positions = columns.map((name) => correlation.columns.indexOf(name)).filter((i) => i >= 0);
  return {
    type: 'heatmap',
    title,
    labels: positions.map((i) => correlation.columns[i] ?? ''),
    matrix: positions.map((i) => positions.map((j) => correlation.values[i]?.[j] ?? null)),
  };
}

function buildTable(table: Table, title: string): TablePayload {
  return {
    type: 'table',
    title,
    headers: [...table.columns],
    rows: table.rows.slice(0, TABLE_PREVIEW_ROWS),
  };
}

function hasColumns(table: Table, ...keys: string[]): boolean {
  return keys.every((key) => table.columns.includes(key));
}

/**
 * Attach a render payload to a chart selection. A selection whose keys are
 * missing from the table degrades to a table payload.
 */
export function renderChart(selection: ChartSelection, table: Table, stats: DescriptiveStats): ChartSpec {
  const { type, config } = selection;
  const fallback = (): ChartSpec => {
    logger.warn({ chartType: type, rule: config.rule }, 'Chart spec: selection keys not usable, rendering table');
    return {
      type: 'table',
      config: { title: config.title, rule: 'fallback', columns: [...table.columns] },
      renderPayload: buildTable(table, config.title),
    };
  };

  const { xKey, yKey, labelKey, valueKey } = config;

  switch (type) {
    case 'line': {
      if (xKey === undefined || yKey === undefined || !hasColumns(table, xKey, yKey)) return fallback();
      return { type, config, renderPayload: buildLine(table, config.title, xKey, yKey) };
    }
    case 'bar': {
      if (xKey === undefined || yKey === undefined || !hasColumns(table, xKey, yKey)) return fallback();
      return { type, config, renderPayload: buildBar(table, config.title, xKey, yKey) };
    }
    case 'pie': {
      if (labelKey === undefined || valueKey === undefined || !hasColumns(table, labelKey, valueKey)) {
        return fallback();
      }
      return { type, config, renderPayload: buildPie(table, config.title, labelKey, valueKey) };
    }
    case 'scatter': {
      if (xKey === undefined || yKey === undefined || !hasColumns(table, xKey, yKey)) return fallback();
      return { type, config, renderPayload: buildScatter(table, config.title, xKey, yKey) };
    }
    case 'heatmap': {
      const payload = buildHeatmap(config.title, config.columns ?? [], stats);
      if (!payload) return fallback();
      return { type, config, renderPayload: payload };
    }
    case 'table':
      return { type, config, renderPayload: buildTable(table, config.title) };
  }
}
