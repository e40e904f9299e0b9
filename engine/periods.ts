// engine/periods.ts
// Period header recognition and calendar-month arithmetic.
//
// Every monthly figure is keyed by a canonical `YYYY-MM` string, so plain
// string comparison orders periods chronologically.

import type { CellValue, PeriodKey } from './types';
import {
  PERIOD_ACTUAL_SUFFIX,
  PERIOD_ISO,
  PERIOD_TEXT_MONTH_YEAR,
  PERIOD_US_DATE,
  YTD_MARKER
} from './regex';

export type HeaderCell =
  | { kind: 'month'; period: PeriodKey; label: string; native: boolean }
  | { kind: 'ytd'; period: PeriodKey | null; label: string }
  | { kind: 'unparseable'; label: string };

// Excel serial-date window used for numeric headers (≈1968 – 2036)
const EXCEL_SERIAL_MIN = 25000;
const EXCEL_SERIAL_MAX = 50000;
const EXCEL_EPOCH_MS = Date.UTC(1899, 11, 30);
const MS_PER_DAY = 24 * 60 * 60 * 1000;

const MONTH_PREFIXES = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];
const MONTH_SHORT = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

export function toPeriodKey(year: number, month: number): PeriodKey {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}`;
}

export function parsePeriodKey(key: PeriodKey): { year: number; month: number } {
  const [y, m] = key.split('-');
  return { year: Number(y), month: Number(m) };
}

export function previousPeriod(key: PeriodKey): PeriodKey {
  const { year, month } = parsePeriodKey(key);
  return month === 1 ? toPeriodKey(year - 1, 12) : toPeriodKey(year, month - 1);
}

/** Shift a month key by `delta` months ("2024-02", -3 → "2023-11"). */
export function addMonths(key: PeriodKey, delta: number): PeriodKey {
  const { year, month } = parsePeriodKey(key);
  const index = year * 12 + (month - 1) + delta;
  return toPeriodKey(Math.floor(index / 12), (((index % 12) + 12) % 12) + 1);
}

export function comparePeriods(a: PeriodKey, b: PeriodKey): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function periodYear(key: PeriodKey): number {
  return parsePeriodKey(key).year;
}

/** "2024-07" → "Jul 2024" */
export function formatPeriodLabel(key: PeriodKey): string {
  const { year, month } = parsePeriodKey(key);
  return `${MONTH_SHORT[month - 1] ?? '???'} ${year}`;
}

function expandYear(raw: string): number {
  const n = Number(raw);
  return raw.length === 2 ? 2000 + n : n;
}

function isValidMonth(year: number, month: number): boolean {
  return Number.isInteger(year) && year >= 1900 && year <= 2200 && month >= 1 && month <= 12;
}

function fromDate(d: Date): PeriodKey | null {
  if (Number.isNaN(d.getTime())) return null;
  return toPeriodKey(d.getUTCFullYear(), d.getUTCMonth() + 1);
}

/**
 * Parse a text period label ("Jul 2024", "2024-07-31", "07/31/2024").
 * Returns undefined when the text does not look like a period at all,
 * null when it has a period shape but an impossible date.
 */
export function parsePeriodText(text: string): PeriodKey | null | undefined {
  const s = text.trim().replace(PERIOD_ACTUAL_SUFFIX, '');

  const textMatch = PERIOD_TEXT_MONTH_YEAR.exec(s);
  if (textMatch) {
    const month = MONTH_PREFIXES.indexOf(textMatch[1].slice(0, 3).toLowerCase()) + 1;
    const year = expandYear(textMatch[2]);
    return isValidMonth(year, month) ? toPeriodKey(year, month) : null;
  }

  const isoMatch = PERIOD_ISO.exec(s);
  if (isoMatch) {
    const year = Number(isoMatch[1]);
    const month = Number(isoMatch[2]);
    const day = isoMatch[3] === undefined ? 1 : Number(isoMatch[3]);
    return isValidMonth(year, month) && day >= 1 && day <= 31 ? toPeriodKey(year, month) : null;
  }

  const usMatch = PERIOD_US_DATE.exec(s);
  if (usMatch) {
    const month = Number(usMatch[1]);
    const day = Number(usMatch[2]);
    const year = expandYear(usMatch[3]);
    return isValidMonth(year, month) && day >= 1 && day <= 31 ? toPeriodKey(year, month) : null;
  }

  return undefined;
}

export function excelSerialToDate(serial: number): Date {
  return new Date(EXCEL_EPOCH_MS + Math.floor(serial) * MS_PER_DAY);
}

/**
 * Classify one header cell as a month column, a YTD column, a malformed
 * period label, or nothing (null).
 */
export function classifyHeaderCell(cell: CellValue): HeaderCell | null {
  if (cell instanceof Date) {
    const period = fromDate(cell);
    if (!period) return null;
    return { kind: 'month', period, label: cell.toISOString().slice(0, 10), native: true };
  }

  if (typeof cell === 'number') {
    if (!Number.isInteger(cell) || cell < EXCEL_SERIAL_MIN || cell > EXCEL_SERIAL_MAX) return null;
    const period = fromDate(excelSerialToDate(cell));
    if (!period) return null;
    return { kind: 'month', period, label: String(cell), native: true };
  }

  if (typeof cell !== 'string') return null;
  const label = cell.replace(/\s+/g, ' ').trim();
  if (!label) return null;

  const ytd = YTD_MARKER.exec(label);
  if (ytd) {
    const rest = label.slice(ytd[0].length).replace(/^actuals?\b\s*/i, '');
    const period = rest ? parsePeriodText(rest) : undefined;
    return { kind: 'ytd', period: period ?? null, label };
  }

  const period = parsePeriodText(label);
  if (period === undefined) return null;
  if (period === null) return { kind: 'unparseable', label };
  return { kind: 'month', period, label, native: false };
}
