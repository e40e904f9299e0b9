// engine/__tests__/fixtures.ts
// In-memory sheets shared by the engine and API tests.

import type { FormatDescriptor } from '../config';
import { loadFormatDescriptors } from '../config';
import type { CellValue, MetricRecord, RawSheet } from '../types';

export function descriptorFor(name: string): FormatDescriptor {
  const descriptor = loadFormatDescriptors().get(name);
  if (!descriptor) throw new Error(`fixture: no descriptor "${name}"`);
  return descriptor;
}

export function sheetOf(name: string, rows: CellValue[][]): RawSheet {
  return { name, rows };
}

/** Two-month monthly report: income 200 → 196.57, expense -82.30 → -110.15. */
export function mapleCourtSheet(): RawSheet {
  return sheetOf('Maple Court', [
    [null, 'Jan 2024', 'Feb 2024'],
    ['Net Eff. Gross Income', 200, 196.57],
    ['Total Expense', -82.3, -110.15]
  ]);
}

export const MAPLE_COURT_CSV = ',Jan 2024,Feb 2024\nNet Eff. Gross Income,200,196.57\nTotal Expense,-82.30,-110.15\n';

export function unknownSheet(): RawSheet {
  return sheetOf('Notes', [
    ['Owner', 'A. Placeholder'],
    ['Units', 12]
  ]);
}

const MONTHS_H1 = ['Jan 2024', 'Feb 2024', 'Mar 2024', 'Apr 2024', 'May 2024', 'Jun 2024'];

/** Build a 29-column standard row: six monthly actuals, YTD, YTD budget, six monthly budgets. */
function standardRow(
  label: CellValue,
  months: CellValue[],
  ytd: CellValue = null,
  ytdBudget: CellValue = null,
  monthlyBudgets: CellValue[] = []
): CellValue[] {
  const row: CellValue[] = new Array<CellValue>(29).fill(null);
  row[0] = label;
  months.forEach((v, i) => (row[1 + i] = v));
  row[13] = ytd;
  row[14] = ytdBudget;
  monthlyBudgets.forEach((v, i) => (row[17 + i] = v));
  return row;
}

/**
 * Standard workbook, Jan–Jun 2024 actuals with June budgets.
 * Row 14 carries a 5.5% valuation line; "Total Cash" sits below the cash-flow cutoff.
 */
export function standardSheet(): RawSheet {
  const blank = [null, null, null, null, null];
  return sheetOf('Maple Court - CRES', [
    ['Maple Court T12'],
    [],
    [],
    [],
    [],
    [],
    standardRow(null, MONTHS_H1, 'YTD', 'Budget', MONTHS_H1),
    standardRow('Property Asking Rent', [1000, 1000, 1000, 1000, 1000, 1000], 6000, 6000, [...blank, 1000]),
    standardRow('Net Eff. Gross Income', [900, 900, 900, 900, 900, 950], 5450, 5500, [...blank, 920]),
    standardRow('Total Expense', [400, 400, 400, 400, 400, 350], 2350, 2400, [...blank, 400]),
    standardRow('EBITDA (NOI)', [500, 500, 500, 500, 500, 600], 3100, null, [...blank, 520]),
    standardRow('Monthly Cash Flow', [100, 100, 100, 100, 100, 150], 650),
    standardRow('Total Cash', [...blank, 5000], null, null, [...blank, 4000]),
    standardRow(0.055, [...blank, 2100000])
  ]);
}

const MONTHS_2024 = [...MONTHS_H1, 'Jul 2024', 'Aug 2024', 'Sep 2024', 'Oct 2024', 'Nov 2024', 'Dec 2024'];

/** Standard workbook with Jan–Dec headers but figures only through March. */
export function standardQ1Sheet(): RawSheet {
  return sheetOf('Birch Hollow - CRES', [
    ['Birch Hollow T12'],
    [],
    [],
    [],
    [],
    [],
    standardRow(null, MONTHS_2024, 'YTD', 'Budget', MONTHS_2024),
    standardRow('Net Eff. Gross Income', [900, 910, 920], 2730, 2800, [930, 930, 930]),
    standardRow('Total Expense', [400, 410, 420], 1230, 1200, [400, 400, 400]),
    standardRow('EBITDA (NOI)', [500, 500, 500], 1500)
  ]);
}

const utc = (y: number, m: number, d: number): Date => new Date(Date.UTC(y, m - 1, d));

/** "<Property>-Fin" database export, Jan–Mar 2024. */
export function databaseFinSheet(): RawSheet {
  return sheetOf('Maple Court-Fin', [
    ['Maple Court'],
    [],
    [],
    [],
    [],
    [],
    ['Actuals', utc(2024, 1, 31), utc(2024, 2, 29), utc(2024, 3, 31)],
    ['Net Eff. Gross Income', 100, 110, 120],
    ['Total Expense', -40, -45, -50],
    ['EBITDA (NOI)', 60, 65, 70]
  ]);
}

/** Paired budget sheet: March budgets, plus an Insurance line with no actual. */
export function databaseBgtSheet(): RawSheet {
  return sheetOf('Maple Court-Bgt', [
    ['Maple Court Budget'],
    [],
    [],
    [],
    [],
    [],
    ['Metric', utc(2024, 3, 31)],
    ['Net Eff. Gross Income', 115],
    ['Total Expense', -48],
    ['Insurance', -5]
  ]);
}

export function record(partial: Partial<MetricRecord> & Pick<MetricRecord, 'metric_name' | 'period' | 'value'>): MetricRecord {
  return {
    period_label: partial.period,
    is_ytd: false,
    unmapped: false,
    source_row_id: 1,
    source_column: 2,
    ...partial
  };
}
