// engine/tidyEngine.ts
// Tidy transformation: one RawSheet grid → long-form CanonicalTable.
//
// The engine knows nothing about KPIs. The calling format processor supplies
// a TidyLayout (where the header is, which columns hold periods, which are
// YTD) and the MetricLexicon used to name rows.
//
// Steps:
//   1) locate the header row (first row with enough period labels)
//   2) name every data row through the lexicon (unmapped labels kept verbatim)
//   3) emit one record per numeric (row, period column) cell; blanks skipped
//   4) drop exact (metric, period, is_ytd) collisions, keeping the first
//
// Month headers that several columns resolve to are reported on the result,
// so the calculator can refuse to pick one when that month is the latest.

import type {
  CanonicalTable,
  CellValue,
  DuplicatePeriodColumns,
  MetricRecord,
  ParseWarning,
  PeriodKey,
  RawSheet,
  TidyResult
} from './types';
import type { MetricLexicon } from './metricLexicon';
import { EngineError, ErrorCodes } from './errorCodes';
import { classifyHeaderCell, comparePeriods } from './periods';
import { cellToText, isBlankCell, parseMoney } from './normalizeFields';

/**
 * Which non-text header cells count as periods.
 * - none: text labels only
 * - dates: text labels + native Date cells
 * - dates-and-serials: also integer Excel serial dates
 */
export type NativeDatePolicy = 'none' | 'dates' | 'dates-and-serials';

export interface TidyLayout {
  /** 0-based fixed header row. When absent the header is found by scanning. */
  headerRow?: number;
  /** Rows scanned from the top when headerRow is absent. */
  scanRows: number;
  /** Month columns required for a row to count as the header. */
  minPeriodColumns: number;
  /** 0-based column holding the metric label. */
  metricColumn: number;
  /** Restrict period columns to these 0-based indices. */
  periodColumns?: readonly number[];
  /** Columns read as YTD regardless of their header label. */
  ytdColumns?: readonly number[];
  /** Month bare YTD columns run through; defaults to the latest month column holding data. */
  ytdPeriod?: PeriodKey;
  nativeDates: NativeDatePolicy;
  /** Label for a non-text metric cell; rows whose label resolves to null are skipped. */
  labelForCell?: (cell: CellValue) => string | null;
}

export interface HeaderColumn {
  /** 0-based */
  column: number;
  period: PeriodKey;
  label: string;
  is_ytd: boolean;
  /** Bare YTD column dated by fallback rather than by its label or the layout. */
  undated?: boolean;
}

export interface LocatedHeader {
  /** 0-based */
  rowIndex: number;
  columns: HeaderColumn[];
  /** Latest month column; absent for YTD-only headers. */
  latestPeriod?: PeriodKey;
  /** Months that more than one month column resolves to. */
  duplicatePeriods: DuplicatePeriodColumns[];
  warnings: ParseWarning[];
}

function cellAt(sheet: RawSheet, row: number, column: number): CellValue {
  return sheet.rows[row]?.[column] ?? null;
}

function admitsNative(cell: CellValue, policy: NativeDatePolicy): boolean {
  if (cell instanceof Date) return policy !== 'none';
  if (typeof cell === 'number') return policy === 'dates-and-serials';
  return true;
}

function candidateColumns(sheet: RawSheet, row: number, layout: TidyLayout): number[] {
  if (layout.periodColumns) return [...layout.periodColumns];
  const width = sheet.rows[row]?.length ?? 0;
  const columns: number[] = [];
  for (let c = 0; c < width; c++) {
    if (c !== layout.metricColumn) columns.push(c);
  }
  return columns;
}

function readHeaderRow(sheet: RawSheet, row: number, layout: TidyLayout): LocatedHeader | null {
  const months: HeaderColumn[] = [];
  const ytd: Array<{ column: number; label: string; period: PeriodKey | null }> = [];
  const warnings: ParseWarning[] = [];
  const forcedYtd = new Set(layout.ytdColumns ?? []);

  for (const column of candidateColumns(sheet, row, layout)) {
    const cell = cellAt(sheet, row, column);

    if (forcedYtd.has(column)) {
      ytd.push({ column, label: cellToText(cell) || 'YTD', period: null });
      continue;
    }
    if (!admitsNative(cell, layout.nativeDates)) continue;

    const header = classifyHeaderCell(cell);
    if (!header) continue;

    if (header.kind === 'month') {
      months.push({ column, period: header.period, label: header.label, is_ytd: false });
    } else if (header.kind === 'ytd') {
      ytd.push({ column, label: header.label, period: header.period });
    } else {
      warnings.push({
        code: ErrorCodes.UNPARSEABLE_PERIOD_HEADER,
        message: `Header "${header.label}" looks like a period but is not a valid month.`,
        sheet: sheet.name,
        row: row + 1,
        column: column + 1
      });
    }
  }

  if (months.length < layout.minPeriodColumns) return null;

  const sorted = months.map((m) => m.period).sort(comparePeriods);
  const latestPeriod: PeriodKey | undefined = sorted.length > 0 ? sorted[sorted.length - 1] : undefined;
  const ytdPeriod = layout.ytdPeriod ?? latestPeriod;
  if (ytdPeriod === undefined) return null;

  const ytdColumns = ytd.map((y): HeaderColumn => {
    if (y.period !== null) return { column: y.column, label: y.label, period: y.period, is_ytd: true };
    const column: HeaderColumn = { column: y.column, label: y.label, period: ytdPeriod, is_ytd: true };
    if (layout.ytdPeriod === undefined) column.undated = true;
    return column;
  });
  const columns: HeaderColumn[] = [...months, ...ytdColumns].sort((a, b) => a.column - b.column);
  if (columns.length === 0) return null;

  const seen = new Map<string, HeaderColumn>();
  const duplicates = new Map<PeriodKey, HeaderColumn[]>();
  for (const col of columns) {
    const key = `${col.period}|${col.is_ytd}`;
    const first = seen.get(key);
    if (first) {
      if (!col.is_ytd) duplicates.set(col.period, [...(duplicates.get(col.period) ?? [first]), col]);
      warnings.push({
        code: ErrorCodes.DUPLICATE_PERIOD_COLUMN,
        message: `Columns ${first.column + 1} ("${first.label}") and ${col.column + 1} ("${col.label}") both resolve to ${col.period}${col.is_ytd ? ' YTD' : ''}.`,
        sheet: sheet.name,
        row: row + 1,
        column: col.column + 1
      });
    } else {
      seen.set(key, col);
    }
  }

  const duplicatePeriods: DuplicatePeriodColumns[] = [...duplicates.entries()].map(([period, cols]) => ({
    period,
    columns: cols.map((c) => ({ column: c.column + 1, label: c.label }))
  }));

  return { rowIndex: row, columns, latestPeriod, duplicatePeriods, warnings };
}

/**
 * Find the header row. Fixed-row layouts inspect only that row; scanning
 * layouts take the first row (top-down) with enough month labels.
 */
export function locateHeader(sheet: RawSheet, layout: TidyLayout): LocatedHeader | null {
  if (layout.headerRow !== undefined) {
    return readHeaderRow(sheet, layout.headerRow, layout);
  }
  const limit = Math.min(layout.scanRows, sheet.rows.length);
  for (let row = 0; row < limit; row++) {
    const header = readHeaderRow(sheet, row, layout);
    if (header) return header;
  }
  return null;
}

function readMetricLabel(cell: CellValue, layout: TidyLayout): string | null {
  if (typeof cell === 'string') return cell.trim() ? cell : null;
  if (isBlankCell(cell)) return null;
  return layout.labelForCell ? layout.labelForCell(cell) : null;
}

function readsAsPeriod(cell: CellValue, layout: TidyLayout): boolean {
  if (!admitsNative(cell, layout.nativeDates)) return false;
  const header = classifyHeaderCell(cell);
  return header !== null && header.kind !== 'unparseable';
}

/**
 * A header repeated further down the sheet: the label cell and at least
 * minPeriodColumns of the header's columns read as periods. A data line
 * whose label merely starts with a date or "YTD" is not one.
 */
function isRepeatedHeader(sheet: RawSheet, row: number, header: LocatedHeader, layout: TidyLayout): boolean {
  if (!readsAsPeriod(cellAt(sheet, row, layout.metricColumn), layout)) return false;
  const periodCells = header.columns.filter((col) => readsAsPeriod(cellAt(sheet, row, col.column), layout)).length;
  return periodCells >= Math.max(layout.minPeriodColumns, 1);
}

/** Latest month column with a numeric cell in any labelled data row. */
function latestPopulatedPeriod(sheet: RawSheet, header: LocatedHeader, layout: TidyLayout): PeriodKey | undefined {
  const months = header.columns.filter((col) => !col.is_ytd).sort((a, b) => comparePeriods(b.period, a.period));
  for (const col of months) {
    for (let row = header.rowIndex + 1; row < sheet.rows.length; row++) {
      if (readMetricLabel(cellAt(sheet, row, layout.metricColumn), layout) === null) continue;
      if (parseMoney(cellAt(sheet, row, col.column)).kind === 'number') return col.period;
    }
  }
  return undefined;
}

export function tidySheet(sheet: RawSheet, layout: TidyLayout, lexicon: MetricLexicon): TidyResult {
  const header = locateHeader(sheet, layout);
  if (!header) {
    const where = layout.headerRow !== undefined ? `row ${layout.headerRow + 1}` : `the first ${layout.scanRows} rows`;
    throw new EngineError(
      ErrorCodes.LAYOUT_MISMATCH,
      `No header row with at least ${Math.max(layout.minPeriodColumns, 1)} month labels found in ${where} of sheet "${sheet.name}".`,
      { sheet: sheet.name, row: layout.headerRow !== undefined ? layout.headerRow + 1 : undefined }
    );
  }

  const dataThrough = latestPopulatedPeriod(sheet, header, layout);
  const columns = header.columns.map((col) =>
    col.undated && dataThrough !== undefined ? { ...col, period: dataThrough } : col
  );

  const warnings: ParseWarning[] = [...header.warnings];
  const records: MetricRecord[] = [];
  const seenFacts = new Set<string>();
  const reportedUnmapped = new Set<string>();

  for (let row = header.rowIndex + 1; row < sheet.rows.length; row++) {
    const labelCell = cellAt(sheet, row, layout.metricColumn);
    const label = readMetricLabel(labelCell, layout);
    if (label === null || isRepeatedHeader(sheet, row, header, layout)) continue;

    const metric = lexicon.resolve(label);
    if (!metric.name) continue;

    if (metric.unmapped && !reportedUnmapped.has(metric.name)) {
      reportedUnmapped.add(metric.name);
      warnings.push({
        code: ErrorCodes.UNMAPPED_METRIC,
        message: `Metric "${metric.name}" is not a known ${lexicon.formatName} line; kept as-is.`,
        sheet: sheet.name,
        row: row + 1,
        column: layout.metricColumn + 1,
        metric: metric.name
      });
    }

    for (const col of columns) {
      const parsed = parseMoney(cellAt(sheet, row, col.column));
      if (parsed.kind === 'blank') continue;
      if (parsed.kind === 'invalid') {
        warnings.push({
          code: ErrorCodes.NON_NUMERIC_CELL,
          message: `Non-numeric value "${parsed.raw}" for "${metric.name}" (${col.label}) skipped.`,
          sheet: sheet.name,
          row: row + 1,
          column: col.column + 1,
          metric: metric.name
        });
        continue;
      }

      const factKey = `${metric.name}\u0000${col.period}\u0000${col.is_ytd}`;
      if (seenFacts.has(factKey)) {
        warnings.push({
          code: ErrorCodes.DUPLICATE_FACT,
          message: `Duplicate value for "${metric.name}" ${col.is_ytd ? 'YTD ' : ''}${col.period}; first occurrence kept.`,
          sheet: sheet.name,
          row: row + 1,
          column: col.column + 1,
          metric: metric.name
        });
        continue;
      }
      seenFacts.add(factKey);

      records.push(
        Object.freeze({
          metric_name: metric.name,
          period: col.period,
          period_label: col.label,
          is_ytd: col.is_ytd,
          value: parsed.value,
          unmapped: metric.unmapped,
          source_row_id: row + 1,
          source_column: col.column + 1
        })
      );
    }
  }

  if (records.length === 0) {
    throw new EngineError(
      ErrorCodes.EMPTY_SHEET,
      `Sheet "${sheet.name}" has no numeric data below its header (row ${header.rowIndex + 1}).`,
      { sheet: sheet.name, row: header.rowIndex + 1 }
    );
  }

  const result: TidyResult = { table: freezeTable(records), warnings };
  if (header.duplicatePeriods.length > 0) result.duplicate_periods = header.duplicatePeriods;
  return result;
}

export function freezeTable(records: ReadonlyArray<Readonly<MetricRecord>>): CanonicalTable {
  return Object.freeze(records.map((r) => (Object.isFrozen(r) ? r : Object.freeze({ ...r }))));
}
