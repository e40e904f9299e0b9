// engine/formats/budgetMerge.ts
// Attach budget figures to the matching actual records.
//
// Budgets are read with the same tidy engine as actuals, then joined on
// (metric, period, is_ytd). Lines below "Monthly Cash Flow" are balance-sheet
// or occupancy items and never carry a budget.

import type { CanonicalTable, MetricRecord, ParseWarning, RawSheet, TidyResult } from '../types';
import type { MetricLexicon } from '../metricLexicon';
import { ErrorCodes, isEngineError } from '../errorCodes';
import { logEngineInfo } from '../logger';
import { freezeTable, tidySheet, type TidyLayout } from '../tidyEngine';
import { findLabelRow } from './formatProcessor';

export const BUDGET_CUTOFF_LABEL = 'Monthly Cash Flow';

/**
 * Tidy a budget grid. A grid with no recognisable header or no figures
 * means "no budgets", not a failed upload.
 */
export function readBudgetGrid(sheet: RawSheet, layout: TidyLayout, lexicon: MetricLexicon): TidyResult | null {
  try {
    return tidySheet(sheet, layout, lexicon);
  } catch (err) {
    if (isEngineError(err) && (err.code === ErrorCodes.LAYOUT_MISMATCH || err.code === ErrorCodes.EMPTY_SHEET)) {
      logEngineInfo('budget_grid_absent', { sheet: sheet.name, code: err.code });
      return null;
    }
    throw err;
  }
}

/** 1-based row of the cash-flow line below the header, or null. */
export function budgetCutoffRow(sheet: RawSheet, headerRow: number, metricColumn = 0): number | null {
  const row = findLabelRow(sheet, BUDGET_CUTOFF_LABEL, headerRow + 1, metricColumn);
  return row < 0 ? null : row + 1;
}

function factKey(r: Readonly<MetricRecord>): string {
  return `${r.metric_name}\u0000${r.period}\u0000${r.is_ytd}`;
}

/**
 * @param cutoffRow 1-based row of the cash-flow line in the budget grid;
 *   budget rows after it are dropped. null when the grid has no such line.
 */
export function mergeBudgets(
  actual: TidyResult,
  budget: CanonicalTable,
  budgetWarnings: readonly ParseWarning[],
  sheetName: string,
  cutoffRow: number | null
): TidyResult {
  const pending = new Map<string, Readonly<MetricRecord>>();
  for (const record of budget) {
    if (cutoffRow !== null && record.source_row_id > cutoffRow) continue;
    const key = factKey(record);
    if (!pending.has(key)) pending.set(key, record);
  }

  const merged = actual.table.map((record) => {
    const key = factKey(record);
    const match = pending.get(key);
    if (!match) return record;
    pending.delete(key);
    return { ...record, budget_value: match.value };
  });

  // Unmapped labels were already reported by the actuals pass.
  const warnings: ParseWarning[] = [
    ...actual.warnings,
    ...budgetWarnings.filter((w) => w.code !== ErrorCodes.UNMAPPED_METRIC)
  ];

  if (pending.size > 0) {
    const metrics = [...new Set([...pending.values()].map((r) => r.metric_name))];
    warnings.push({
      code: ErrorCodes.BUDGET_WITHOUT_ACTUAL,
      message: `${pending.size} budget figure(s) on sheet "${sheetName}" have no matching actual and were not recorded (${metrics.slice(0, 5).join(', ')}${metrics.length > 5 ? ', …' : ''}).`,
      sheet: sheetName
    });
  }

  return { ...actual, table: freezeTable(merged), warnings };
}
