/**
 * Rule-based insight lines derived from the chart payload and statistics.
 * The inference service's narrative, when available, is appended after these.
 */

import type { ChartConfiguration, ChartSpec, DescriptiveStats, RenderPayload } from './types.js';

export function formatNumber(value: number): string {
  return value.toLocaleString('en-US', { maximumFractionDigits: 2 });
}

function isChartConfiguration(payload: RenderPayload): payload is ChartConfiguration {
  return 'data' in payload;
}

function series(payload: ChartConfiguration): Array<{ label: string; value: number }> {
  const labels = payload.data.labels ?? [];
  const data = payload.data.datasets[0]?.data ?? [];
  const points: Array<{ label: string; value: number }> = [];
  data.forEach((value, i) => {
    if (typeof value === 'number') points.push({ label: labels[i] ?? '', value });
  });
  return points;
}

function extremes(points: Array<{ label: string; value: number }>) {
  let max = points[0];
  let min = points[0];
  for (const point of points) {
    if (max && point.value > max.value) max = point;
    if (min && point.value < min.value) min = point;
  }
  return { max, min };
}

export function describeCorrelation(r: number): string {
  const magnitude = Math.abs(r);
  const strength = magnitude > 0.7 ? 'strong' : magnitude > 0.3 ? 'moderate' : 'weak';
  const direction = r > 0 ? 'positive' : r < 0 ? 'negative' : 'no';
  return `${strength} ${direction} correlation (r=${r.toFixed(3)})`;
}

function lineInsights(chart: ChartSpec, payload: ChartConfiguration): string[] {
  const points = series(payload);
  const first = points[0];
  const last = points[points.length - 1];
  if (!first || !last) return [];

  const yKey = chart.config.yKey ?? 'value';
  const lines = [`${points.length} data points from ${first.label} to ${last.label}`];

  if (points.length >= 2) {
    const trend = last.value > first.value ? 'increasing' : last.value < first.value ? 'decreasing' : 'flat';
    lines.push(`Trend: ${trend} (${formatNumber(first.value)} → ${formatNumber(last.value)})`);
  }

  const { max, min } = extremes(points);
  if (max) lines.push(`Peak ${yKey}: ${formatNumber(max.value)} at ${max.label}`);
  if (min) lines.push(`Lowest ${yKey}: ${formatNumber(min.value)} at ${min.label}`);
  return lines;
}

function barInsights(chart: ChartSpec, payload: ChartConfiguration, stats: DescriptiveStats): string[] {
  const points = series(payload);
  const { max, min } = extremes(points);
  if (!max || !min) return [];

  const xKey = chart.config.xKey ?? 'category';
  const yKey = chart.config.yKey ?? 'value';
  const lines = [
    `${max.label} has the highest ${yKey}: ${formatNumber(max.value)}`,
    `${min.label} has the lowest ${yKey}: ${formatNumber(min.value)}`,
  ];

  const cardinality = stats.categorical[xKey]?.cardinality ?? points.length;
  if (cardinality > points.length) {
    lines.push(`Showing the top ${points.length} of ${cardinality} ${xKey} values`);
  }
  return lines;
}

function pieInsights(chart: ChartSpec, payload: ChartConfiguration): string[] {
  const points = series(payload);
  const total = points.reduce((acc, p) => acc + p.value, 0);
  const { max, min } = extremes(points);
  if (!max || !min || total <= 0) return [];

  const labelKey = chart.config.labelKey ?? 'category';
  return [
    `${points.length} ${labelKey} groups`,
    `Largest share: ${max.label} (${((max.value / total) * 100).toFixed(1)}%)`,
    `Smallest share: ${min.label} (${((min.value / total) * 100).toFixed(1)}%)`,
  ];
}

function scatterInsights(chart: ChartSpec, stats: DescriptiveStats): string[] {
  const { xKey, yKey } = chart.config;
  if (!xKey || !yKey) return [];

  const lines: string[] = [];
  const correlation = stats.correlation;
  if (correlation) {
    const i = correlation.columns.indexOf(xKey);
    const j = correlation.columns.indexOf(yKey);
    const r = correlation.values[i]?.[j];
    if (typeof r === 'number') lines.push(`${xKey} and ${yKey} show a ${describeCorrelation(r)}`);
  }

  for (const key of [xKey, yKey]) {
    const column = stats.numeric[key];
    if (column) lines.push(`${key} ranges from ${formatNumber(column.min)} to ${formatNumber(column.max)}`);
  }
  return lines;
}

function heatmapInsights(stats: DescriptiveStats): string[] {
  const correlation = stats.correlation;
  if (!correlation) return [];

  let best: { a: string; b: string; r: number } | undefined;
  for (let i = 0; i < correlation.values.length; i++) {
    const row = correlation.values[i] ?? [];
    for (let j = i + 1; j < row.length; j++) {
      const r = row[j];
      if (r === null || r === undefined) continue;
      if (!best || Math.abs(r) > Math.abs(best.r)) {
        best = { a: correlation.columns[i] ?? '', b: correlation.columns[j] ?? '', r };
      }
    }
  }

  if (!best) return [`${correlation.columns.length} numeric columns compared`];
  return [
    `${correlation.columns.length} numeric columns compared`,
    `Strongest relationship: ${best.a} and ${best.b}, ${describeCorrelation(best.r)}`,
  ];
}

function tableInsights(stats: DescriptiveStats): string[] {
  return [
    `${stats.rowCount} rows, ${stats.columnCount} columns`,
    `${Object.keys(stats.numeric).length} numeric and ${Object.keys(stats.categorical).length} non-numeric columns`,
  ];
}

export function buildInsights(chart: ChartSpec, stats: DescriptiveStats, truncated: boolean): string[] {
  const payload = chart.renderPayload;
  let lines: string[] = [];

  switch (chart.type) {
    case 'line':
      lines = isChartConfiguration(payload) ? lineInsights(chart, payload) : [];
      break;
    case 'bar':
      lines = isChartConfiguration(payload) ? barInsights(chart, payload, stats) : [];
      break;
    case 'pie':
      lines = isChartConfiguration(payload) ? pieInsights(chart, payload) : [];
      break;
    case 'scatter':
      lines = scatterInsights(chart, stats);
      break;
    case 'heatmap':
      lines = heatmapInsights(stats);
      break;
    case 'table':
      lines = tableInsights(stats);
      break;
  }

  if (truncated) {
    lines.push(`Results were capped at ${stats.rowCount} rows`);
  }
  return lines;
}
