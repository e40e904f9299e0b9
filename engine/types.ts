// engine/types.ts
// Shared TypeScript interfaces for the T12 KPI engine
import type { ErrorCode } from './errorCodes';

/**
 * Raw value of a single spreadsheet cell after workbook decoding.
 * Formula cells are reduced to their cached result; blanks are null.
 */
export type CellValue = string | number | boolean | Date | null;

/**
 * RawSheet – one worksheet as a 0-based grid (rows[r][c]).
 * Rows may be ragged; a missing cell reads as blank.
 */
export interface RawSheet {
  name: string;
  rows: ReadonlyArray<ReadonlyArray<CellValue>>;
}

/** Canonical calendar month, `YYYY-MM`. */
export type PeriodKey = string;

/**
 * MetricRecord – the canonical unit of data.
 * (metric_name, period, is_ytd) is unique within a CanonicalTable.
 */
export interface MetricRecord {
  metric_name: string;

  /**
   * Month the figure belongs to. For YTD records this is the month the
   * cumulative figure runs through.
   */
  period: PeriodKey;

  /** Header text the period was read from (e.g. "Jul 2024", "YTD"). */
  period_label: string;

  is_ytd: boolean;

  /** Signed amount, in the producing format's own sign convention. */
  value: number;

  /** Budgeted amount for the same fact, where the format carries budgets. */
  budget_value?: number;

  /** True when the label was not found in the format's alias table. */
  unmapped: boolean;

  /** 1-based worksheet row the value came from. Diagnostics only. */
  source_row_id: number;

  /** 1-based worksheet column the value came from. Diagnostics only. */
  source_column: number;
}

export type CanonicalTable = ReadonlyArray<Readonly<MetricRecord>>;

/**
 * ParseWarning – non-fatal data-quality finding.
 * Returned beside a usable result, never thrown.
 */
export interface ParseWarning {
  code: ErrorCode;
  message: string;
  sheet: string;
  row?: number;
  column?: number;
  metric?: string;
}

/** A month header that several columns resolve to (1-based columns). */
export interface DuplicatePeriodColumns {
  period: PeriodKey;
  columns: Array<{ column: number; label: string }>;
}

export interface TidyResult {
  table: CanonicalTable;
  warnings: ParseWarning[];
  duplicate_periods?: DuplicatePeriodColumns[];
}

export interface TrendDelta {
  prior: number;
  current: number;
  absolute_delta: number;

  /**
   * (current - prior) / |prior| as a fraction.
   * Absent when prior is zero.
   */
  percent_delta?: number;
}

export interface BudgetVariance {
  actual: number;
  budget: number;
  variance: number;

  /** variance / |budget|; absent when the budget is zero. */
  variance_pct?: number;
}

export interface NoiBreakdown {
  /** NOI line as reported on the sheet, when present. */
  reported?: number;

  /** Income plus every expense line normalised to a negative sign. */
  derived?: number;

  income?: number;

  /** Expense lines used for the derivation, already normalised to negative. */
  expenses: Record<string, number>;
}

export type TrendDirection = 'increasing' | 'decreasing' | 'stable' | 'unknown';

/**
 * Statistics over one metric's monthly values in the twelve months ending
 * at `as_of`. Money figures are rounded to cents, fractions to 6 places.
 */
export interface T12MetricStats {
  months_of_data: number;
  average: number;
  total: number;
  min: number;
  min_period: PeriodKey;
  max: number;
  max_period: PeriodKey;
  /** Population standard deviation. */
  std_dev: number;
  start_value: number;
  end_value: number;

  /** (end - start) / |start|; absent when the first month is zero. */
  total_change?: number;

  rolling_3mo_avg?: number;
  rolling_6mo_avg?: number;

  /**
   * Second-half average against first-half average, as a fraction.
   * Both need three months of data; the change is absent when the first
   * half averages zero (direction "unknown").
   */
  direction?: TrendDirection;
  direction_change?: number;
}

/** Current month against the average of the three calendar months before it. */
export interface RollingVariance {
  current: number;
  prior_3mo_avg: number;
  variance: number;
  /** variance / |prior_3mo_avg|; absent when that average is zero. */
  variance_pct?: number;
}

export interface MetricChange extends TrendDelta {
  metric: string;
}

export interface DataHighlights {
  /** Distinct months with at least one non-zero monthly figure. */
  months_with_data: number;
  /** Up to five trend entries with the largest |percent_delta|, largest first. */
  largest_changes: MetricChange[];
  /** Analysed metrics whose current-month value is exactly zero. */
  zero_value_metrics: string[];
}

/**
 * KpiSummary – derived, read-only snapshot of one CanonicalTable.
 * Every metric in `trend` also appears in `current_period`; metrics with no
 * prior-month record are absent from `trend`.
 */
export interface KpiSummary {
  format_name: string;
  sheet: string;

  /** Latest month with at least one monthly record. */
  as_of: PeriodKey;

  /** Calendar month immediately before `as_of`. */
  prior_period: PeriodKey;

  /** Month the YTD figures run through, or null when the table has none. */
  ytd_as_of: PeriodKey | null;

  current_period: Record<string, number>;
  ytd: Record<string, number>;
  trend: Record<string, TrendDelta>;
  budget: Record<string, BudgetVariance>;
  ratios: Record<string, number>;
  noi: NoiBreakdown | null;

  /** Metric → category name from the format descriptor. */
  categories: Record<string, string>;

  /** Keyed by metric; only metrics with two or more months of data. */
  t12_trends: Record<string, T12MetricStats>;
  rolling_variance: Record<string, RollingVariance>;
  highlights: DataHighlights;

  key_metrics: string[];
  warnings: ParseWarning[];
}

export type QualityLevel = 'Excellent' | 'Good' | 'Fair' | 'Poor';

/**
 * QualityReport – result of the narrative quality gate.
 */
export interface QualityReport {
  passed: boolean;
  missing: string[];

  /** 0..1 */
  score: number;

  codes: ErrorCode[];

  /** Weighted 0..100 score across the dimensions below. */
  overall_score: number;
  quality_level: QualityLevel;
  dimension_scores: {
    completeness: number;
    structure: number;
    relevance: number;
    actionability: number;
  };
  recommendations: string[];
}
