// engine/formats/formatProcessor.ts
// Capability interface shared by every supported layout, plus the cheap
// header-shape checks the processors use in detect().

import type { FormatDescriptor } from '../config';
import type { MetricLexicon } from '../metricLexicon';
import type { CellValue, RawSheet, TidyResult } from '../types';
import { cellToText, labelKey } from '../normalizeFields';
import { classifyHeaderCell } from '../periods';
import { BUDGET_LABEL } from '../regex';

export interface ProcessContext {
  /** Every sheet of the uploaded workbook, for layouts that pair sheets. */
  workbook: readonly RawSheet[];
}

export interface FormatProcessor {
  readonly name: string;
  readonly descriptor: FormatDescriptor;
  readonly lexicon: MetricLexicon;

  /**
   * Confidence in [0, 1] that this processor understands the sheet.
   * Inspects header shape only; never parses the data body.
   */
  detect(sheet: RawSheet): number;

  /** Throws EngineError (E101 / E103) when the sheet cannot be reshaped. */
  process(sheet: RawSheet, context?: ProcessContext): TidyResult;
}

// ------------------------------------------------------------
// Detection checks
// ------------------------------------------------------------

export function clampScore(score: number): number {
  if (!Number.isFinite(score)) return 0;
  return Math.round(Math.min(1, Math.max(0, score)) * 100) / 100;
}

export function cellAt(sheet: RawSheet, row: number, column: number): CellValue {
  return sheet.rows[row]?.[column] ?? null;
}

export function rowHasBudgetLabel(sheet: RawSheet, row: number): boolean {
  return (sheet.rows[row] ?? []).some((cell) => typeof cell === 'string' && BUDGET_LABEL.test(cell));
}

/** Native date cells (Date or Excel serial) in a row, metric column excluded. */
export function countNativeDateCells(sheet: RawSheet, row: number, metricColumn = 0): number {
  let count = 0;
  (sheet.rows[row] ?? []).forEach((cell, column) => {
    if (column === metricColumn || typeof cell === 'string') return;
    const header = classifyHeaderCell(cell);
    if (header?.kind === 'month' && header.native) count++;
  });
  return count;
}

/** Any keyword (case-insensitive substring) in the metric column of rows [from, to). */
export function hasKeywordInColumn(
  sheet: RawSheet,
  keywords: readonly string[],
  from: number,
  to: number,
  column = 0
): boolean {
  const needles = keywords.map(labelKey).filter(Boolean);
  const end = Math.min(to, sheet.rows.length);
  for (let row = Math.max(0, from); row < end; row++) {
    const text = labelKey(cellToText(cellAt(sheet, row, column)));
    if (text && needles.some((needle) => text.includes(needle))) return true;
  }
  return false;
}

/** First data row (0-based, after `from`) whose label contains `needle`, or -1. */
export function findLabelRow(sheet: RawSheet, needle: string, from: number, column = 0): number {
  const key = labelKey(needle);
  for (let row = from; row < sheet.rows.length; row++) {
    if (labelKey(cellToText(cellAt(sheet, row, column))).includes(key)) return row;
  }
  return -1;
}
