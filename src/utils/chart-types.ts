import { UnsupportedChartTypeError } from './errors';

export const CHART_KINDS = [
  'bar',
  'horizontal-bar',
  'stacked-bar',
  'line',
  'area',
  'pie',
  'donut',
  'scatter'
] as const;

export type ChartKind = (typeof CHART_KINDS)[number];

const CHART_KIND_ALIASES: Record<string, ChartKind> = {
  'bar': 'bar',
  'vertical-bar': 'bar',
  'column': 'bar',
  'histogram': 'bar',
  'horizontal-bar': 'horizontal-bar',
  'hbar': 'horizontal-bar',
  'stacked-bar': 'stacked-bar',
  'stacked-column': 'stacked-bar',
  'line': 'line',
  'time-series': 'line',
  'area': 'area',
  'stacked-area': 'area',
  'pie': 'pie',
  'donut': 'donut',
  'doughnut': 'donut',
  'scatter': 'scatter'
};

/**
 * Normalizes free text such as "Bar Chart", "scatter_plot" or "doughnut graph"
 * to an alias key: lower case, hyphen separated, without a trailing
 * chart/plot/graph word.
 */
export function normalizeChartType(chartType: string): string {
  return chartType
    .trim()
    .toLowerCase()
    .replace(/[\s_]+/g, '-')
    .replace(/-+(chart|plot|graph)s?$/, '')
    .replace(/^-+|-+$/g, '');
}

export function resolveChartKind(chartType: string): ChartKind {
  const kind = CHART_KIND_ALIASES[normalizeChartType(chartType)];
  if (!kind) {
    throw new UnsupportedChartTypeError(chartType, CHART_KINDS);
  }
  return kind;
}

/** Pie and donut charts show a single series as parts of a whole. */
export function isPartToWholeKind(kind: ChartKind): boolean {
  return kind === 'pie' || kind === 'donut';
}
