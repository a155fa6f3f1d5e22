/**
 * Chart Selector — ordered decision table from DataProfile to chart type.
 *
 * The first rule whose condition matches wins. The final `table` rule always
 * matches, so selection never fails.
 */

import type { ChartConfig, ChartSelection, ChartType, ColumnProfile, DataProfile } from './types.js';
import { PIE_MAX_SLICES } from './dataProfile.js';

export const BAR_MAX_CATEGORIES = 12;

interface ProfileView {
  profile: DataProfile;
  numeric: ColumnProfile[];
  categorical: ColumnProfile[];
}

interface ChartRule {
  name: string;
  type: ChartType;
  matches(view: ProfileView): boolean;
  config(view: ProfileView): Omit<ChartConfig, 'rule'>;
}

function single(columns: ColumnProfile[]): ColumnProfile | undefined {
  return columns.length === 1 ? columns[0] : undefined;
}

function byName(columns: ColumnProfile[]): string[] {
  return columns.map((c) => c.name);
}

export const CHART_RULES: readonly ChartRule[] = [
  {
    name: 'time-series',
    type: 'line',
    matches: ({ profile, numeric }) => profile.hasTimeAxis && numeric.length === 1,
    config: ({ profile, numeric }) => ({
      title: `${numeric[0]?.name ?? 'Value'} over ${profile.timeColumn ?? 'time'}`,
      xKey: profile.timeColumn,
      yKey: numeric[0]?.name,
    }),
  },
  {
    name: 'category-comparison',
    type: 'bar',
    matches: ({ profile, numeric, categorical }) => {
      const label = single(categorical);
      if (!label || numeric.length !== 1) return false;
      if (label.cardinality > BAR_MAX_CATEGORIES) return false;
      return !(profile.partOfWhole && label.cardinality <= PIE_MAX_SLICES);
    },
    config: ({ numeric, categorical }) => ({
      title: `${numeric[0]?.name ?? 'Value'} by ${categorical[0]?.name ?? 'category'}`,
      xKey: categorical[0]?.name,
      yKey: numeric[0]?.name,
    }),
  },
  {
    name: 'part-of-whole',
    type: 'pie',
    matches: ({ profile, numeric, categorical }) => {
      const label = single(categorical);
      return (
        label !== undefined &&
        numeric.length === 1 &&
        label.cardinality <= PIE_MAX_SLICES &&
        profile.partOfWhole
      );
    },
    config: ({ numeric, categorical }) => ({
      title: `${numeric[0]?.name ?? 'Value'} share by ${categorical[0]?.name ?? 'category'}`,
      labelKey: categorical[0]?.name,
      valueKey: numeric[0]?.name,
    }),
  },
  {
    name: 'numeric-relationship',
    type: 'scatter',
    matches: ({ numeric, categorical }) => numeric.length === 2 && categorical.length === 0,
    config: ({ numeric }) => ({
      title: `${numeric[1]?.name ?? 'y'} vs ${numeric[0]?.name ?? 'x'}`,
      xKey: numeric[0]?.name,
      yKey: numeric[1]?.name,
    }),
  },
  {
    name: 'correlation-matrix',
    type: 'heatmap',
    matches: ({ numeric }) => numeric.length >= 3,
    config: ({ numeric }) => ({
      title: 'Correlation between numeric columns',
      columns: byName(numeric),
    }),
  },
  {
    name: 'fallback',
    type: 'table',
    matches: () => true,
    config: ({ profile }) => ({
      title: 'Query results',
      columns: byName(profile.columns),
    }),
  },
];

export function selectChart(profile: DataProfile): ChartSelection {
  const view: ProfileView = {
    profile,
    numeric: profile.columns.filter((c) => c.semanticType === 'numeric'),
    categorical: profile.columns.filter((c) => c.semanticType === 'categorical'),
  };

  const rule = CHART_RULES.find((candidate) => candidate.matches(view)) ?? fallbackRule();
  return { type: rule.type, config: { ...rule.config(view), rule: rule.name } };
}

function fallbackRule(): ChartRule {
  const last = CHART_RULES[CHART_RULES.length - 1];
  if (!last) throw new RangeError('Chart rule table is empty');
  return last;
}
