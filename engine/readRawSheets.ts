// engine/readRawSheets.ts
// Uploaded file → RawSheet[].
//
// .xlsx goes through exceljs (visible worksheets only, portfolio roll-ups
// skipped); .csv becomes a single sheet through csv-parse.

import ExcelJS from 'exceljs';
import { parse } from 'csv-parse/sync';
import type { CellValue, RawSheet } from './types';
import { EngineError, ErrorCodes } from './errorCodes';
import { logEngineInfo } from './logger';
import { CRES_SHEET_SUFFIX, FIN_SHEET_SUFFIX } from './regex';

export const ROLLUP_SHEET_NAMES: readonly string[] = ['Portfolio Summary', 'Total Portfolio', 'TEMPLATE'];

export type SkipReason = 'hidden' | 'rollup' | 'empty';

export interface ReadSheetsResult {
  sheets: RawSheet[];
  skipped: Array<{ name: string; reason: SkipReason }>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Reduce an exceljs cell value to a plain CellValue.
 * Formulas yield their cached result; rich text and hyperlinks their text;
 * error cells and uncached formulas are blank.
 */
export function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return value.trim() === '' ? null : value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'boolean') return value;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
  if (!isRecord(value)) return null;

  if ('error' in value) return null;
  if ('result' in value) return toCellValue(value.result);
  if ('richText' in value && Array.isArray(value.richText)) {
    const text = value.richText.map((part: unknown) => (isRecord(part) && typeof part.text === 'string' ? part.text : '')).join('');
    return toCellValue(text);
  }
  if ('text' in value) return toCellValue(value.text);
  return null;
}

function trimTrailingBlanks(cells: CellValue[]): CellValue[] {
  let end = cells.length;
  while (end > 0 && cells[end - 1] === null) end--;
  return cells.slice(0, end);
}

function freezeSheet(name: string, rows: CellValue[][]): RawSheet {
  return Object.freeze({ name, rows: Object.freeze(rows.map((r) => Object.freeze(r))) });
}

export function worksheetToRawSheet(worksheet: ExcelJS.Worksheet): RawSheet {
  const rows: CellValue[][] = [];
  for (let r = 1; r <= worksheet.rowCount; r++) {
    const row = worksheet.getRow(r);
    const cells: CellValue[] = [];
    for (let c = 1; c <= row.cellCount; c++) cells.push(toCellValue(row.getCell(c).value));
    rows.push(trimTrailingBlanks(cells));
  }
  while (rows.length > 0 && rows[rows.length - 1].length === 0) rows.pop();
  return freezeSheet(worksheet.name, rows);
}

export async function readWorkbookSheets(buffer: Buffer): Promise<ReadSheetsResult> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.load(buffer);
  } catch (err) {
    throw new EngineError(
      ErrorCodes.WORKBOOK_UNREADABLE,
      `File could not be read as an .xlsx workbook: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const result: ReadSheetsResult = { sheets: [], skipped: [] };
  for (const worksheet of workbook.worksheets) {
    if (worksheet.state !== 'visible') {
      result.skipped.push({ name: worksheet.name, reason: 'hidden' });
      continue;
    }
    if (ROLLUP_SHEET_NAMES.includes(worksheet.name)) {
      result.skipped.push({ name: worksheet.name, reason: 'rollup' });
      continue;
    }
    const sheet = worksheetToRawSheet(worksheet);
    if (sheet.rows.length === 0) {
      result.skipped.push({ name: worksheet.name, reason: 'empty' });
      continue;
    }
    result.sheets.push(sheet);
  }

  logEngineInfo('workbook_read', {
    sheets: result.sheets.map((s) => s.name),
    skipped: result.skipped
  });
  return result;
}

export function readCsvSheet(text: string, name: string): RawSheet {
  let records: unknown;
  try {
    records = parse(text, { relax_column_count: true, skip_empty_lines: false, bom: true });
  } catch (err) {
    throw new EngineError(
      ErrorCodes.WORKBOOK_UNREADABLE,
      `File could not be read as CSV: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  if (!Array.isArray(records)) {
    throw new EngineError(ErrorCodes.WORKBOOK_UNREADABLE, 'File could not be read as CSV.');
  }

  const rows: CellValue[][] = records.map((record: unknown) =>
    trimTrailingBlanks(
      (Array.isArray(record) ? record : []).map((cell: unknown) =>
        typeof cell === 'string' && cell.trim() !== '' ? cell : null
      )
    )
  );
  while (rows.length > 0 && rows[rows.length - 1].length === 0) rows.pop();
  return freezeSheet(name, rows);
}

/** "Maple Court.csv" → "Maple Court" */
function baseName(fileName: string): string {
  const last = fileName.split(/[\\/]/).pop() ?? fileName;
  return last.replace(/\.[^.]+$/, '') || 'Sheet1';
}

export async function readRawSheets(buffer: Buffer, fileName = 'upload.xlsx'): Promise<ReadSheetsResult> {
  if (/\.csv$/i.test(fileName)) {
    const sheet = readCsvSheet(buffer.toString('utf8'), baseName(fileName));
    return { sheets: sheet.rows.length > 0 ? [sheet] : [], skipped: sheet.rows.length > 0 ? [] : [{ name: sheet.name, reason: 'empty' }] };
  }
  return readWorkbookSheets(buffer);
}

/** "Maple Court - CRES" / "Maple Court-Fin" → "Maple Court" */
export function propertyNameOf(sheetName: string): string {
  return sheetName.replace(FIN_SHEET_SUFFIX, '').replace(CRES_SHEET_SUFFIX, '').trim() || sheetName;
}
