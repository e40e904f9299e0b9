// engine/kpis/t12Analytics.ts
// Descriptive statistics over the monthly series of a CanonicalTable.
//
//   - per-metric stats across the trailing twelve months
//   - current month against the prior three-month average
//   - highlights: largest month-over-month moves, zero-valued metrics

import type {
  CanonicalTable,
  DataHighlights,
  MetricChange,
  PeriodKey,
  RollingVariance,
  T12MetricStats,
  TrendDelta,
  TrendDirection
} from '../types';
import { addMonths, comparePeriods } from '../periods';
import { roundTo } from '../normalizeFields';

export const T12_WINDOW_MONTHS = 12;

// Half-over-half change beyond ±5% counts as a direction
const DIRECTION_THRESHOLD = 0.05;

const ROLLING_BASE_MONTHS = 3;
const LARGEST_CHANGES_LIMIT = 5;

export interface SeriesPoint {
  period: PeriodKey;
  value: number;
}

const cents = (value: number): number => roundTo(value, 2);

function mean(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function populationStdDev(values: readonly number[]): number {
  const avg = mean(values);
  return Math.sqrt(mean(values.map((v) => (v - avg) ** 2)));
}

/** Monthly values of one metric in the twelve months ending at asOf, oldest first. */
export function monthlySeries(table: CanonicalTable, metric: string, asOf: PeriodKey): SeriesPoint[] {
  const from = addMonths(asOf, -(T12_WINDOW_MONTHS - 1));
  return table
    .filter(
      (r) =>
        !r.is_ytd &&
        r.metric_name === metric &&
        Number.isFinite(r.value) &&
        comparePeriods(r.period, from) >= 0 &&
        comparePeriods(r.period, asOf) <= 0
    )
    .map((r) => ({ period: r.period, value: r.value }))
    .sort((a, b) => comparePeriods(a.period, b.period));
}

export function trendDirectionOf(values: readonly number[]): { direction: TrendDirection; change?: number } | undefined {
  if (values.length < 3) return undefined;
  const half = Math.floor(values.length / 2);
  const first = mean(values.slice(0, half));
  const second = mean(values.slice(half));
  if (first === 0) return { direction: 'unknown' };

  const change = (second - first) / Math.abs(first);
  const direction: TrendDirection =
    change > DIRECTION_THRESHOLD ? 'increasing' : change < -DIRECTION_THRESHOLD ? 'decreasing' : 'stable';
  return { direction, change: roundTo(change) };
}

/** Undefined for fewer than two months. */
export function t12StatsOf(series: readonly SeriesPoint[]): T12MetricStats | undefined {
  if (series.length < 2) return undefined;

  const values = series.map((p) => p.value);
  let low = series[0];
  let high = series[0];
  for (const point of series) {
    if (point.value < low.value) low = point;
    if (point.value > high.value) high = point;
  }
  const start = values[0];
  const end = values[values.length - 1];

  const stats: T12MetricStats = {
    months_of_data: series.length,
    average: cents(mean(values)),
    total: cents(values.reduce((sum, v) => sum + v, 0)),
    min: low.value,
    min_period: low.period,
    max: high.value,
    max_period: high.period,
    std_dev: cents(populationStdDev(values)),
    start_value: start,
    end_value: end
  };
  if (start !== 0) stats.total_change = roundTo((end - start) / Math.abs(start));
  if (values.length >= 3) stats.rolling_3mo_avg = cents(mean(values.slice(-3)));
  if (values.length >= 6) stats.rolling_6mo_avg = cents(mean(values.slice(-6)));

  const trend = trendDirectionOf(values);
  if (trend) {
    stats.direction = trend.direction;
    if (trend.change !== undefined) stats.direction_change = trend.change;
  }
  return stats;
}

/**
 * Current month against the mean of the three calendar months before it.
 * Undefined unless the current month and all three prior months carry a value.
 */
export function rollingVarianceOf(series: readonly SeriesPoint[], asOf: PeriodKey): RollingVariance | undefined {
  const byPeriod = new Map(series.map((p) => [p.period, p.value]));
  const current = byPeriod.get(asOf);
  if (current === undefined) return undefined;

  const prior: number[] = [];
  for (let back = 1; back <= ROLLING_BASE_MONTHS; back++) {
    const value = byPeriod.get(addMonths(asOf, -back));
    if (value === undefined) return undefined;
    prior.push(value);
  }

  const avg = mean(prior);
  const result: RollingVariance = {
    current,
    prior_3mo_avg: cents(avg),
    variance: cents(current - avg)
  };
  if (avg !== 0) result.variance_pct = roundTo((current - avg) / Math.abs(avg));
  return result;
}

export function buildHighlights(
  table: CanonicalTable,
  trend: Readonly<Record<string, TrendDelta>>,
  current: Readonly<Record<string, number>>,
  metrics: readonly string[]
): DataHighlights {
  const months = new Set(table.filter((r) => !r.is_ytd && r.value !== 0).map((r) => r.period));

  const largest_changes: MetricChange[] = Object.entries(trend)
    .filter(([, delta]) => delta.percent_delta !== undefined)
    .map(([metric, delta]) => ({ metric, ...delta }))
    .sort((a, b) => Math.abs(b.percent_delta ?? 0) - Math.abs(a.percent_delta ?? 0))
    .slice(0, LARGEST_CHANGES_LIMIT);

  return {
    months_with_data: months.size,
    largest_changes,
    zero_value_metrics: metrics.filter((m) => current[m] === 0)
  };
}

export interface T12Analytics {
  t12_trends: Record<string, T12MetricStats>;
  rolling_variance: Record<string, RollingVariance>;
}

export function analyzeSeries(table: CanonicalTable, metrics: readonly string[], asOf: PeriodKey): T12Analytics {
  const t12_trends: Record<string, T12MetricStats> = {};
  const rolling_variance: Record<string, RollingVariance> = {};

  for (const metric of metrics) {
    const series = monthlySeries(table, metric, asOf);
    const stats = t12StatsOf(series);
    if (stats) t12_trends[metric] = stats;
    const rolling = rollingVarianceOf(series, asOf);
    if (rolling) rolling_variance[metric] = rolling;
  }

  return { t12_trends, rolling_variance };
}
