// engine/formats/databaseT12Processor.ts
// Portfolio database export.
//
// Actuals live on "<Property>-Fin", budgets on the paired "<Property>-Bgt".
// Row 7 is the header: column A reads "Actuals"/"Metric", the rest are native
// dates. The export has no YTD column, so YTD records are synthesised as the
// sum of the latest calendar year's months.
// Sign convention: expenses are reported negative.

import type { FormatDescriptor } from '../config';
import type { MetricRecord, RawSheet, TidyResult } from '../types';
import { buildMetricLexicon } from '../metricLexicon';
import { freezeTable, tidySheet, type TidyLayout } from '../tidyEngine';
import { comparePeriods, periodYear } from '../periods';
import { cellToText, labelKey, roundTo } from '../normalizeFields';
import { FIN_SHEET_SUFFIX } from '../regex';
import { budgetCutoffRow, mergeBudgets, readBudgetGrid } from './budgetMerge';
import {
  cellAt,
  clampScore,
  countNativeDateCells,
  hasKeywordInColumn,
  rowHasBudgetLabel,
  type FormatProcessor,
  type ProcessContext
} from './formatProcessor';

export const DATABASE_T12_FORMAT = 'Database_T12_Workbook';

const DEFAULT_HEADER_ROW = 7;
const KEYWORD_WINDOW_ROWS = 40;
export const SYNTHETIC_YTD_LABEL = 'YTD';

/** "Maple Court-Fin" → "Maple Court-Bgt"; null for sheets without the suffix. */
export function budgetSheetName(finSheet: string): string | null {
  return FIN_SHEET_SUFFIX.test(finSheet) ? finSheet.replace(FIN_SHEET_SUFFIX, '-Bgt') : null;
}

interface YtdTotal {
  first: Readonly<MetricRecord>;
  value: number;
  budget?: number;
}

/**
 * Append one YTD record per metric: the sum of its monthly values in the
 * calendar year of the latest month, dated to that month. Metrics that
 * already carry a YTD figure for that month keep it.
 */
export function synthesizeYtd(result: TidyResult, metricColumn: number): TidyResult {
  const monthly = result.table.filter((r) => !r.is_ytd);
  if (monthly.length === 0) return result;

  const latest = monthly.map((r) => r.period).sort(comparePeriods)[monthly.length - 1];
  const year = periodYear(latest);

  const existing = new Set(result.table.filter((r) => r.is_ytd && r.period === latest).map((r) => r.metric_name));

  const totals = new Map<string, YtdTotal>();
  for (const record of monthly) {
    if (periodYear(record.period) !== year || comparePeriods(record.period, latest) > 0) continue;
    if (existing.has(record.metric_name)) continue;

    const total: YtdTotal = totals.get(record.metric_name) ?? { first: record, value: 0 };
    total.value += record.value;
    if (record.budget_value !== undefined) total.budget = (total.budget ?? 0) + record.budget_value;
    totals.set(record.metric_name, total);
  }

  const ytdRecords: MetricRecord[] = [...totals.values()].map(({ first, value, budget }) => {
    const record: MetricRecord = {
      metric_name: first.metric_name,
      period: latest,
      period_label: SYNTHETIC_YTD_LABEL,
      is_ytd: true,
      value: roundTo(value),
      unmapped: first.unmapped,
      source_row_id: first.source_row_id,
      source_column: metricColumn + 1
    };
    if (budget !== undefined) record.budget_value = roundTo(budget);
    return record;
  });

  return { ...result, table: freezeTable([...result.table, ...ytdRecords]) };
}

export function createDatabaseT12Processor(descriptor: FormatDescriptor): FormatProcessor {
  const lexicon = buildMetricLexicon(descriptor);
  const headerRow = (descriptor.header_row ?? DEFAULT_HEADER_ROW) - 1;

  const layout: TidyLayout = {
    headerRow,
    scanRows: descriptor.header_scan_rows,
    minPeriodColumns: descriptor.min_period_columns,
    metricColumn: 0,
    nativeDates: 'dates-and-serials'
  };

  return {
    name: descriptor.name,
    descriptor,
    lexicon,

    detect(sheet: RawSheet): number {
      if (rowHasBudgetLabel(sheet, headerRow)) return 0;

      let score = 0;
      if (countNativeDateCells(sheet, headerRow, layout.metricColumn) >= descriptor.min_period_columns) score += 0.4;

      const marker = labelKey(cellToText(cellAt(sheet, headerRow, layout.metricColumn)));
      if (marker.includes('actuals') || marker.includes('metric')) score += 0.2;

      if (FIN_SHEET_SUFFIX.test(sheet.name)) score += 0.2;

      if (hasKeywordInColumn(sheet, descriptor.detection_keywords, headerRow + 1, headerRow + 1 + KEYWORD_WINDOW_ROWS)) {
        score += 0.2;
      }

      return clampScore(score);
    },

    process(sheet: RawSheet, context?: ProcessContext): TidyResult {
      let result = tidySheet(sheet, layout, lexicon);

      const siblingName = budgetSheetName(sheet.name);
      const sibling = siblingName ? context?.workbook.find((s) => s.name === siblingName) : undefined;
      if (sibling) {
        const budget = readBudgetGrid(sibling, { ...layout, minPeriodColumns: 1 }, lexicon);
        if (budget) {
          result = mergeBudgets(result, budget.table, budget.warnings, sibling.name, budgetCutoffRow(sibling, headerRow));
        }
      }

      return synthesizeYtd(result, layout.metricColumn);
    }
  };
}
