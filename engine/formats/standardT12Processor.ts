// engine/formats/standardT12Processor.ts
// Standard T12 workbook, fixed layout:
//
//   row 7        header
//   column A     metric label (a bare 0..1 number is a valuation cap rate)
//   B–M          monthly actuals
//   N            "YTD" actual
//   O            "Budget" (YTD budget)
//   R–AC         monthly budgets
//
// Sign convention: expenses are reported positive; revenue-loss lines
// (vacancy, concessions, ...) are negative.

import type { FormatDescriptor } from '../config';
import type { CellValue, RawSheet, TidyResult } from '../types';
import { buildMetricLexicon } from '../metricLexicon';
import { locateHeader, tidySheet, type TidyLayout } from '../tidyEngine';
import { classifyHeaderCell } from '../periods';
import { cellToText, labelKey } from '../normalizeFields';
import { budgetCutoffRow, mergeBudgets, readBudgetGrid } from './budgetMerge';
import { cellAt, clampScore, hasKeywordInColumn, type FormatProcessor } from './formatProcessor';

export const STANDARD_T12_FORMAT = 'Standard_T12_Workbook';

const DEFAULT_HEADER_ROW = 7;

const ACTUAL_MONTH_COLUMNS = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12];
const YTD_ACTUAL_COLUMN = 13;
const YTD_BUDGET_COLUMN = 14;
const BUDGET_MONTH_COLUMNS = [17, 18, 19, 20, 21, 22, 23, 24, 25, 26, 27, 28];

/** 0.055 → "Valuation p/unit 5.5%" */
export function valuationLabel(cell: CellValue): string | null {
  if (typeof cell === 'number') {
    if (cell > 0 && cell < 1) return `Valuation p/unit ${Math.round(cell * 10000) / 100}%`;
    return Number.isFinite(cell) ? String(cell) : null;
  }
  if (typeof cell === 'boolean') return String(cell);
  return null;
}

export function createStandardT12Processor(descriptor: FormatDescriptor): FormatProcessor {
  const lexicon = buildMetricLexicon(descriptor);
  const headerRow = (descriptor.header_row ?? DEFAULT_HEADER_ROW) - 1;

  const actualLayout: TidyLayout = {
    headerRow,
    scanRows: descriptor.header_scan_rows,
    minPeriodColumns: descriptor.min_period_columns,
    metricColumn: 0,
    periodColumns: [...ACTUAL_MONTH_COLUMNS, YTD_ACTUAL_COLUMN],
    ytdColumns: [YTD_ACTUAL_COLUMN],
    nativeDates: 'dates-and-serials',
    labelForCell: valuationLabel
  };

  return {
    name: descriptor.name,
    descriptor,
    lexicon,

    detect(sheet: RawSheet): number {
      const ytd = labelKey(cellToText(cellAt(sheet, headerRow, YTD_ACTUAL_COLUMN)));
      const budget = labelKey(cellToText(cellAt(sheet, headerRow, YTD_BUDGET_COLUMN)));
      if (ytd !== 'ytd' || budget !== 'budget') return 0;

      let score = 0.6;

      const months = ACTUAL_MONTH_COLUMNS.filter(
        (column) => classifyHeaderCell(cellAt(sheet, headerRow, column))?.kind === 'month'
      ).length;
      if (months >= descriptor.min_period_columns) score += 0.2;

      if (hasKeywordInColumn(sheet, descriptor.detection_keywords, headerRow + 1, headerRow + 2)) score += 0.2;

      return clampScore(score);
    },

    process(sheet: RawSheet): TidyResult {
      const actual = tidySheet(sheet, actualLayout, lexicon);
      // Budget YTD runs through the same month as the actual YTD column.
      const ytdPeriod = actual.table.find((r) => r.is_ytd)?.period ?? locateHeader(sheet, actualLayout)?.latestPeriod;

      const budget = readBudgetGrid(
        sheet,
        {
          ...actualLayout,
          minPeriodColumns: 0,
          periodColumns: [YTD_BUDGET_COLUMN, ...BUDGET_MONTH_COLUMNS],
          ytdColumns: [YTD_BUDGET_COLUMN],
          ytdPeriod
        },
        lexicon
      );
      if (!budget) return actual;

      return mergeBudgets(actual, budget.table, budget.warnings, sheet.name, budgetCutoffRow(sheet, headerRow));
    }
  };
}
