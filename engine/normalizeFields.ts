// engine/normalizeFields.ts
// Cell normalization helpers for the T12 KPI engine

import type { CellValue } from './types';
import { ACCOUNTING_ZERO, CURRENCY_SYMBOLS, PLAIN_DECIMAL } from './regex';

// ------------------------------------------------------------
// Core string helpers
// ------------------------------------------------------------

export function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/** Case- and spacing-insensitive lookup key for labels. */
export function labelKey(value: string): string {
  return normalizeWhitespace(value).toLowerCase();
}

/** Render a cell as display text (dates as YYYY-MM-DD). */
export function cellToText(cell: CellValue): string {
  if (cell === null) return '';
  if (cell instanceof Date) {
    return Number.isNaN(cell.getTime()) ? '' : cell.toISOString().slice(0, 10);
  }
  return normalizeWhitespace(String(cell));
}

export function isBlankCell(cell: CellValue | undefined): boolean {
  return cell === undefined || cell === null || (typeof cell === 'string' && cell.trim() === '');
}

// ------------------------------------------------------------
// Money parsing
// ------------------------------------------------------------

export type MoneyParseResult =
  | { kind: 'number'; value: number }
  | { kind: 'blank' }
  | { kind: 'invalid'; raw: string };

/**
 * Parse an accounting cell into a signed decimal.
 *
 * Accepts numbers and text such as "$1,234.56", "(1,234.56)", "($1,234.56)",
 * "-$1,234.56", "12.5%" (→ 0.125) and the accounting dash for zero.
 * Blank cells are reported as blank, never as zero.
 */
export function parseMoney(cell: CellValue | undefined): MoneyParseResult {
  if (cell === undefined || cell === null) return { kind: 'blank' };

  if (typeof cell === 'number') {
    return Number.isFinite(cell) ? { kind: 'number', value: cell } : { kind: 'invalid', raw: String(cell) };
  }

  if (typeof cell !== 'string') return { kind: 'invalid', raw: cellToText(cell) };

  const raw = normalizeWhitespace(cell);
  if (!raw) return { kind: 'blank' };
  if (ACCOUNTING_ZERO.test(raw)) return { kind: 'number', value: 0 };

  let s = raw.replace(/\s+/g, '');
  let negative = false;

  if (s.startsWith('(') && s.endsWith(')')) {
    negative = true;
    s = s.slice(1, -1);
  }

  let percent = false;
  if (s.endsWith('%')) {
    percent = true;
    s = s.slice(0, -1);
  }

  s = s.replace(CURRENCY_SYMBOLS, '').replace(/,/g, '');

  // "-$1,234" and "$-1,234" both reduce to "-1234" here
  if (!PLAIN_DECIMAL.test(s)) return { kind: 'invalid', raw };

  let value = Number(s);
  if (!Number.isFinite(value)) return { kind: 'invalid', raw };
  if (negative) value = -Math.abs(value);
  if (percent) value = value / 100;

  // -0 and 0 must serialize identically
  if (value === 0) value = 0;

  return { kind: 'number', value };
}

// ------------------------------------------------------------
// Rounding
// ------------------------------------------------------------

/** Round derived figures so float noise (196.57 - 200) does not leak out. */
export function roundTo(value: number, digits = 6): number {
  const factor = 10 ** digits;
  const rounded = Math.round(value * factor) / factor;
  return rounded === 0 ? 0 : rounded;
}
