// engine/kpiSummaryText.ts
// KpiSummary → bullet-point text block used as prompt context.

import type { KpiSummary, RollingVariance, T12MetricStats, TrendDelta } from './types';
import { OTHER_CATEGORY } from './kpis/kpiCore';
import { formatPeriodLabel } from './periods';
import { roundTo } from './normalizeFields';
import { propertyNameOf } from './readRawSheets';

const CATEGORY_TITLES: Record<string, string> = {
  REVENUE_PERFORMANCE: 'REVENUE PERFORMANCE',
  REVENUE_LOSS_FACTORS: 'REVENUE LOSS FACTORS',
  EXPENSES: 'EXPENSES',
  NOI_AND_BELOW_LINE: 'NOI & BELOW LINE',
  BALANCE_SHEET_ESCROW: 'BALANCE SHEET & ESCROW',
  OCCUPANCY: 'OCCUPANCY',
  [OTHER_CATEGORY]: 'OTHER METRICS'
};

const RATIO_TITLES: Record<string, string> = {
  collection_rate: 'Collection Rate',
  loss_to_lease_rate: 'Loss-to-Lease Rate',
  vacancy_rate: 'Vacancy Rate',
  delinquency_rate: 'Delinquency Rate',
  economic_occupancy: 'Economic Occupancy Rate',
  noi_margin: 'NOI Margin',
  expense_ratio: 'Expense Ratio',
  debt_service_coverage: 'Debt Service Coverage',
  physical_occupancy: 'Physical Occupancy'
};

/** -82.3 → "-$82.30" */
export function formatCurrency(value: number): string {
  const body = Math.abs(value).toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });
  return value < 0 ? `-$${body}` : `$${body}`;
}

/** Fraction → percent text with at most three decimals (0.01715 → "1.715%"). */
export function formatPercent(fraction: number): string {
  return `${roundTo(fraction * 100, 3)}%`;
}

/** Fraction → percent text with one decimal (0.95 → "95.0%"). */
export function formatRatio(fraction: number): string {
  return `${(fraction * 100).toFixed(1)}%`;
}

export function describeTrend(metric: string, delta: TrendDelta): string {
  const direction = delta.absolute_delta > 0 ? 'up' : delta.absolute_delta < 0 ? 'down' : 'flat';
  const magnitude = formatCurrency(Math.abs(delta.absolute_delta));
  const pct = delta.percent_delta === undefined ? '' : ` (${formatPercent(Math.abs(delta.percent_delta))})`;
  return `• ${metric}: ${direction} ${magnitude}${pct}, ${formatCurrency(delta.prior)} → ${formatCurrency(delta.current)}`;
}

/** Only rendered once a direction can be read (three months or more). */
export function describeT12Stats(metric: string, stats: T12MetricStats): string | null {
  if (stats.direction === undefined) return null;
  const change = stats.direction_change === undefined ? '' : ` (${formatPercent(stats.direction_change)})`;
  return (
    `• ${metric}: ${stats.months_of_data} months, avg ${formatCurrency(stats.average)}, ` +
    `low ${formatCurrency(stats.min)} (${formatPeriodLabel(stats.min_period)}), ` +
    `high ${formatCurrency(stats.max)} (${formatPeriodLabel(stats.max_period)}), ${stats.direction}${change}`
  );
}

export function describeRollingVariance(metric: string, v: RollingVariance): string {
  const pct = v.variance_pct === undefined ? '' : `, ${formatPercent(v.variance_pct)}`;
  return `• ${metric}: ${formatCurrency(v.current)} vs 3-month avg ${formatCurrency(v.prior_3mo_avg)} (variance ${formatCurrency(v.variance)}${pct})`;
}

function categoryOrder(categories: Record<string, string>): string[] {
  const known = Object.keys(CATEGORY_TITLES).filter((c) => c !== OTHER_CATEGORY);
  const present = new Set(Object.values(categories));
  const extra = [...present].filter((c) => !known.includes(c) && c !== OTHER_CATEGORY);
  return [...known, ...extra, OTHER_CATEGORY].filter((c) => present.has(c));
}

export function buildKpiSummaryText(summary: KpiSummary): string {
  const lines: string[] = [];

  lines.push(`=== T12 PROPERTY ANALYSIS - ${formatPeriodLabel(summary.as_of)} ===`);
  lines.push(`Property: ${propertyNameOf(summary.sheet)}`);
  lines.push(`Sheet: ${summary.sheet}`);
  lines.push(`Format: ${summary.format_name}`);
  lines.push('');

  for (const category of categoryOrder(summary.categories)) {
    const metrics = Object.keys(summary.current_period).filter(
      (m) => (summary.categories[m] ?? OTHER_CATEGORY) === category
    );
    if (metrics.length === 0) continue;
    lines.push(`=== ${CATEGORY_TITLES[category] ?? category.replace(/_/g, ' ')} ===`);
    for (const metric of metrics) lines.push(`• ${metric}: ${formatCurrency(summary.current_period[metric])}`);
    lines.push('');
  }

  const trendEntries = Object.entries(summary.trend);
  if (trendEntries.length > 0) {
    lines.push(`=== MONTH-OVER-MONTH TRENDS (vs ${formatPeriodLabel(summary.prior_period)}) ===`);
    for (const [metric, delta] of trendEntries) lines.push(describeTrend(metric, delta));
    lines.push('');
  }

  const ratioEntries = Object.entries(summary.ratios);
  if (ratioEntries.length > 0) {
    lines.push('=== KEY PERFORMANCE RATIOS ===');
    for (const [name, value] of ratioEntries) {
      const shown = name === 'debt_service_coverage' ? `${value.toFixed(2)}x` : formatRatio(value);
      lines.push(`• ${RATIO_TITLES[name] ?? name}: ${shown}`);
    }
    lines.push('');
  }

  if (summary.noi) {
    lines.push('=== NOI ===');
    if (summary.noi.reported !== undefined) lines.push(`• Reported NOI: ${formatCurrency(summary.noi.reported)}`);
    if (summary.noi.derived !== undefined) lines.push(`• Derived NOI (income less expenses): ${formatCurrency(summary.noi.derived)}`);
    lines.push('');
  }

  const budgetEntries = Object.entries(summary.budget);
  if (budgetEntries.length > 0) {
    lines.push('=== BUDGET VARIANCE ===');
    for (const [metric, b] of budgetEntries) {
      const pct = b.variance_pct === undefined ? '' : `, ${formatPercent(b.variance_pct)}`;
      lines.push(`• ${metric}: actual ${formatCurrency(b.actual)} vs budget ${formatCurrency(b.budget)} (variance ${formatCurrency(b.variance)}${pct})`);
    }
    lines.push('');
  }

  const ytdEntries = Object.entries(summary.ytd);
  if (summary.ytd_as_of !== null && ytdEntries.length > 0) {
    lines.push(`=== YEAR TO DATE (through ${formatPeriodLabel(summary.ytd_as_of)}) ===`);
    for (const [metric, value] of ytdEntries) lines.push(`• ${metric}: ${formatCurrency(value)}`);
    lines.push('');
  }

  const t12Lines = Object.entries(summary.t12_trends)
    .map(([metric, stats]) => describeT12Stats(metric, stats))
    .filter((line): line is string => line !== null);
  if (t12Lines.length > 0) {
    lines.push('=== T12 TRENDS ===');
    lines.push(...t12Lines);
    lines.push('');
  }

  const rollingEntries = Object.entries(summary.rolling_variance);
  if (rollingEntries.length > 0) {
    lines.push('=== VS PRIOR 3-MONTH AVERAGE ===');
    for (const [metric, v] of rollingEntries) lines.push(describeRollingVariance(metric, v));
    lines.push('');
  }

  if (summary.highlights.zero_value_metrics.length > 0) {
    lines.push(`Zero-valued this month: ${summary.highlights.zero_value_metrics.join(', ')}`);
    lines.push('');
  }

  if (summary.warnings.length > 0) {
    lines.push('=== DATA QUALITY NOTES ===');
    for (const w of summary.warnings) lines.push(`• [${w.code}] ${w.message}`);
    lines.push('');
  }

  return lines.join('\n').trimEnd();
}
