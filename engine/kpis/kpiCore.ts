// engine/kpis/kpiCore.ts
// Format-agnostic KPI computation shared by every calculator.
//
// A calculator is a plain object conforming to KpiCalculator; the
// format-specific parts (key metrics, ratio formulas, descriptor) are data
// handed to createKpiCalculator.

import type { FormatDescriptor, SignConvention } from '../config';
import { DEFAULT_ENGINE_SETTINGS } from '../config';
import type { MetricLexicon } from '../metricLexicon';
import type {
  BudgetVariance,
  CanonicalTable,
  DuplicatePeriodColumns,
  KpiSummary,
  MetricRecord,
  NoiBreakdown,
  ParseWarning,
  PeriodKey,
  TrendDelta
} from '../types';
import { EngineError, ErrorCodes } from '../errorCodes';
import { comparePeriods, formatPeriodLabel, periodYear, previousPeriod } from '../periods';
import { roundTo } from '../normalizeFields';
import { analyzeSeries, buildHighlights } from './t12Analytics';

export type MetricValues = Readonly<Record<string, number>>;

export interface RatioDefinition {
  name: string;
  compute(values: MetricValues): number | undefined;
}

export interface ComputeOptions {
  sheet?: string;
  /** Parse warnings carried over from the tidy pass. */
  warnings?: readonly ParseWarning[];
  /** Months the tidy pass found under more than one header column. */
  duplicatePeriods?: readonly DuplicatePeriodColumns[];
  /** Absolute tolerance for the YTD and NOI identity checks. */
  tolerance?: number;
}

export interface KpiCalculator {
  readonly formatName: string;
  readonly description: string;
  readonly keyMetrics: readonly string[];
  compute(table: CanonicalTable, options?: ComputeOptions): KpiSummary;
}

export interface CalculatorDefinition {
  descriptor: FormatDescriptor;
  lexicon: MetricLexicon;
  description: string;
  keyMetrics: readonly string[];
  ratios: readonly RatioDefinition[];
}

export const OTHER_CATEGORY = 'OTHER_METRICS';

// ------------------------------------------------------------
// Period selection
// ------------------------------------------------------------

function latestOf(periods: readonly PeriodKey[]): PeriodKey {
  return [...periods].sort(comparePeriods)[periods.length - 1];
}

function ambiguousPeriod(asOf: PeriodKey, columns: ReadonlyArray<{ column: number; label: string }>, sheet: string): EngineError {
  const described = columns.map(({ column, label }) => `column ${column} ("${label}")`).join(', ');
  return new EngineError(
    ErrorCodes.AMBIGUOUS_PERIOD,
    `Most recent month ${formatPeriodLabel(asOf)} appears in more than one column: ${described}.`,
    { sheet, column: columns[1]?.column }
  );
}

/**
 * Latest month with at least one monthly record. Two header columns that
 * both resolve to that month make it ambiguous, whether or not both hold
 * figures.
 */
export function resolveCurrentPeriod(
  table: CanonicalTable,
  sheet = '',
  duplicatePeriods: readonly DuplicatePeriodColumns[] = []
): PeriodKey {
  const monthly = table.filter((r) => !r.is_ytd);
  if (monthly.length === 0) {
    throw new EngineError(ErrorCodes.NO_MONTHLY_DATA, `Sheet "${sheet}" has no monthly records.`, { sheet });
  }

  const asOf = latestOf(monthly.map((r) => r.period));
  const duplicate = duplicatePeriods.find((d) => d.period === asOf);
  if (duplicate) throw ambiguousPeriod(asOf, duplicate.columns, sheet);

  const columns = new Map<number, string>();
  for (const r of monthly) {
    if (r.period === asOf) columns.set(r.source_column, r.period_label);
  }
  if (columns.size > 1) {
    throw ambiguousPeriod(asOf, [...columns.entries()].map(([column, label]) => ({ column, label })), sheet);
  }

  return asOf;
}

export function valuesOf(records: readonly Readonly<MetricRecord>[]): Record<string, number> {
  const values: Record<string, number> = {};
  for (const r of records) {
    if (!(r.metric_name in values) && Number.isFinite(r.value)) values[r.metric_name] = r.value;
  }
  return values;
}

// ------------------------------------------------------------
// Deltas
// ------------------------------------------------------------

/** percent_delta = (current - prior) / |prior|, omitted when prior is zero. */
export function deltaOf(prior: number, current: number): TrendDelta {
  const diff = current - prior;
  const delta: TrendDelta = { prior, current, absolute_delta: roundTo(diff) };
  if (prior !== 0) {
    const pct = diff / Math.abs(prior);
    if (Number.isFinite(pct)) delta.percent_delta = roundTo(pct);
  }
  return delta;
}

export function buildTrend(current: MetricValues, prior: MetricValues): Record<string, TrendDelta> {
  const trend: Record<string, TrendDelta> = {};
  for (const [metric, value] of Object.entries(current)) {
    const before = prior[metric];
    if (before !== undefined) trend[metric] = deltaOf(before, value);
  }
  return trend;
}

export function varianceOf(actual: number, budget: number): BudgetVariance {
  const variance = roundTo(actual - budget);
  const result: BudgetVariance = { actual, budget, variance };
  if (budget !== 0) result.variance_pct = roundTo(variance / Math.abs(budget));
  return result;
}

// ------------------------------------------------------------
// Ratios
// ------------------------------------------------------------

/** numerator / denominator for a positive denominator; undefined otherwise. */
export function ratioOf(
  numerator: number | undefined,
  denominator: number | undefined,
  absoluteNumerator = false
): number | undefined {
  if (numerator === undefined || denominator === undefined || !(denominator > 0)) return undefined;
  const value = (absoluteNumerator ? Math.abs(numerator) : numerator) / denominator;
  return Number.isFinite(value) ? roundTo(value) : undefined;
}

export interface RentRollMetrics {
  askingRent: string;
  grossRent: string;
  income: string;
  lossToLease: string;
  vacancy: string;
  delinquency: string;
  noi: string;
  totalExpense: string;
}

/** Collection, loss-to-lease, vacancy, delinquency, economic occupancy, NOI margin, expense ratio. */
export function rentRollRatios(m: RentRollMetrics): RatioDefinition[] {
  return [
    { name: 'collection_rate', compute: (v) => ratioOf(v[m.income], v[m.askingRent]) },
    { name: 'loss_to_lease_rate', compute: (v) => ratioOf(v[m.lossToLease], v[m.askingRent], true) },
    { name: 'vacancy_rate', compute: (v) => ratioOf(v[m.vacancy], v[m.askingRent], true) },
    { name: 'delinquency_rate', compute: (v) => ratioOf(v[m.delinquency], v[m.income], true) },
    { name: 'economic_occupancy', compute: (v) => ratioOf(v[m.income], v[m.grossRent]) },
    { name: 'noi_margin', compute: (v) => ratioOf(v[m.noi], v[m.income]) },
    { name: 'expense_ratio', compute: (v) => ratioOf(v[m.totalExpense], v[m.income], true) }
  ];
}

// ------------------------------------------------------------
// NOI
// ------------------------------------------------------------

/** Express an expense line as a negative contribution to NOI. */
export function asNoiContribution(value: number, sign: SignConvention): number {
  return sign === 'positive' && value !== 0 ? -value : value;
}

/**
 * NOI = income + Σ expense lines, each read in the sign its format declares
 * for it. A reported NOI line that disagrees is flagged, not overwritten.
 */
export function computeNoi(
  current: MetricValues,
  descriptor: FormatDescriptor,
  lexicon: MetricLexicon,
  tolerance: number,
  sheet: string,
  warnings: ParseWarning[]
): NoiBreakdown | null {
  const income = current[descriptor.income_metric];
  const reported = current[descriptor.noi_metric];

  const expenses: Record<string, number> = {};
  for (const metric of descriptor.expense_metrics) {
    const value = current[metric];
    if (value !== undefined) expenses[metric] = asNoiContribution(value, lexicon.signOf(metric));
  }
  const expenseValues = Object.values(expenses);

  if (income === undefined && reported === undefined) return null;

  const noi: NoiBreakdown = { expenses };
  if (income !== undefined) noi.income = income;
  if (reported !== undefined) noi.reported = reported;
  if (income !== undefined && expenseValues.length > 0) {
    noi.derived = roundTo(expenseValues.reduce((sum, v) => sum + v, income));
  }

  if (noi.derived !== undefined && reported !== undefined && Math.abs(noi.derived - reported) > tolerance) {
    warnings.push({
      code: ErrorCodes.NOI_MISMATCH,
      message: `Derived NOI ${noi.derived} differs from reported ${descriptor.noi_metric} ${reported}.`,
      sheet,
      metric: descriptor.noi_metric
    });
  }

  return noi;
}

// ------------------------------------------------------------
// YTD identity
// ------------------------------------------------------------

/** Σ monthly values for the YTD year must match the YTD figure. */
export function checkYtdIdentity(
  table: CanonicalTable,
  ytd: MetricValues,
  ytdAsOf: PeriodKey,
  tolerance: number,
  sheet: string
): ParseWarning[] {
  const year = periodYear(ytdAsOf);
  const sums = new Map<string, number>();
  for (const r of table) {
    if (r.is_ytd || periodYear(r.period) !== year || comparePeriods(r.period, ytdAsOf) > 0) continue;
    if (!(r.metric_name in ytd)) continue;
    sums.set(r.metric_name, (sums.get(r.metric_name) ?? 0) + r.value);
  }

  const warnings: ParseWarning[] = [];
  for (const [metric, sum] of sums) {
    const reported = ytd[metric];
    if (Math.abs(roundTo(sum) - reported) > tolerance) {
      warnings.push({
        code: ErrorCodes.YTD_IDENTITY_MISMATCH,
        message: `Monthly ${metric} for ${year} sums to ${roundTo(sum)} but YTD reports ${reported}.`,
        sheet,
        metric
      });
    }
  }
  return warnings;
}

// ------------------------------------------------------------
// Calculator factory
// ------------------------------------------------------------

export function createKpiCalculator(def: CalculatorDefinition): KpiCalculator {
  const { descriptor, lexicon } = def;
  const analysedMetrics = [...new Set([descriptor.income_metric, ...def.keyMetrics])];

  return Object.freeze({
    formatName: descriptor.name,
    description: def.description,
    keyMetrics: Object.freeze([...def.keyMetrics]),

    compute(table: CanonicalTable, options: ComputeOptions = {}): KpiSummary {
      const sheet = options.sheet ?? '';
      const tolerance = options.tolerance ?? DEFAULT_ENGINE_SETTINGS.ytdTolerance;
      const warnings: ParseWarning[] = [...(options.warnings ?? [])];

      const asOf = resolveCurrentPeriod(table, sheet, options.duplicatePeriods);
      const priorPeriod = previousPeriod(asOf);

      const currentRecords = table.filter((r) => !r.is_ytd && r.period === asOf);
      const current = valuesOf(currentRecords);
      const prior = valuesOf(table.filter((r) => !r.is_ytd && r.period === priorPeriod));

      const ytdRecords = table.filter((r) => r.is_ytd);
      const ytdAsOf = ytdRecords.length > 0 ? latestOf(ytdRecords.map((r) => r.period)) : null;
      const ytd: Record<string, number> = ytdAsOf === null ? {} : valuesOf(ytdRecords.filter((r) => r.period === ytdAsOf));
      if (ytdAsOf !== null) warnings.push(...checkYtdIdentity(table, ytd, ytdAsOf, tolerance, sheet));

      const budget: Record<string, BudgetVariance> = {};
      for (const r of currentRecords) {
        if (r.budget_value !== undefined && !(r.metric_name in budget)) {
          budget[r.metric_name] = varianceOf(r.value, r.budget_value);
        }
      }

      const ratios: Record<string, number> = {};
      for (const ratio of def.ratios) {
        const value = ratio.compute(current);
        if (value !== undefined && Number.isFinite(value)) ratios[ratio.name] = value;
      }

      const noi = computeNoi(current, descriptor, lexicon, tolerance, sheet, warnings);

      const trend = buildTrend(current, prior);
      const { t12_trends, rolling_variance } = analyzeSeries(table, analysedMetrics, asOf);

      const categories: Record<string, string> = {};
      for (const metric of [...Object.keys(current), ...Object.keys(ytd)]) {
        categories[metric] = lexicon.categoryOf(metric) ?? OTHER_CATEGORY;
      }

      return {
        format_name: descriptor.name,
        sheet,
        as_of: asOf,
        prior_period: priorPeriod,
        ytd_as_of: ytdAsOf,
        current_period: current,
        ytd,
        trend,
        budget,
        ratios,
        noi,
        categories,
        t12_trends,
        rolling_variance,
        highlights: buildHighlights(table, trend, current, analysedMetrics),
        key_metrics: def.keyMetrics.filter((m) => m in current),
        warnings
      };
    }
  });
}
