// engine/analyzeUpload.ts
// Shared core for /api/analyze, /api/analyzeFile and /api/exportKpi:
// file bytes → sheets → pipeline results (+ summary text per sheet).

import type { ParseWarning, KpiSummary } from './types';
import type { EngineConfig } from './engineConfig';
import type { DetectionScore } from './formatRegistry';
import { ErrorCodes, type ErrorCode, type ErrorContext } from './errorCodes';
import { analyzeWorkbook, type PipelineResult } from './pipeline';
import { readRawSheets, type SkipReason } from './readRawSheets';
import { buildKpiSummaryText } from './kpiSummaryText';

export interface AnalyzeUploadOptions {
  sheetName?: string;
  formatName?: string;
}

export interface SheetSuccessOut {
  ok: true;
  sheet: string;
  format_name: string;
  confidence: number;
  record_count: number;
  summary: KpiSummary;
  summary_text: string;
  warnings: ParseWarning[];
}

export interface SheetFailureOut {
  ok: false;
  sheet: string;
  error_code: ErrorCode;
  error: string;
  user_message: string;
  context: ErrorContext;
  format_name?: string;
  scores?: DetectionScore[];
  warnings: ParseWarning[];
}

export type SheetResultOut = SheetSuccessOut | SheetFailureOut;

export interface AnalyzeResponse {
  file_name: string;
  sheet_count: number;
  ok_count: number;
  sheets: SheetResultOut[];
  skipped: Array<{ name: string; reason: SkipReason }>;
}

export interface AnalyzedUpload {
  response: AnalyzeResponse;
  /** Raw pipeline results, for exports. */
  results: PipelineResult[];
}

export function toSheetResultOut(result: PipelineResult): SheetResultOut {
  if (result.ok) {
    return {
      ok: true,
      sheet: result.sheet,
      format_name: result.format_name,
      confidence: result.confidence,
      record_count: result.table.length,
      summary: result.summary,
      summary_text: buildKpiSummaryText(result.summary),
      warnings: result.warnings
    };
  }

  const out: SheetFailureOut = {
    ok: false,
    sheet: result.sheet,
    error_code: result.code,
    error: result.message,
    user_message: result.user_message,
    context: result.context,
    warnings: result.warnings
  };
  if (result.format_name !== undefined) out.format_name = result.format_name;
  if (result.scores !== undefined) out.scores = result.scores;
  return out;
}

export async function analyzeUpload(
  file: Buffer,
  fileName: string,
  config: EngineConfig,
  options: AnalyzeUploadOptions = {}
): Promise<AnalyzedUpload> {
  const { sheets, skipped } = await readRawSheets(file, fileName);
  const results = analyzeWorkbook(sheets, config, options);
  const out = results.map(toSheetResultOut);

  return {
    results,
    response: {
      file_name: fileName,
      sheet_count: out.length,
      ok_count: out.filter((r) => r.ok).length,
      sheets: out,
      skipped
    }
  };
}

/** HTTP status for an EngineError that escapes analyzeUpload. */
export function statusForEngineError(code: ErrorCode): number {
  switch (code) {
    case ErrorCodes.INVALID_REQUEST_STRUCTURE:
    case ErrorCodes.INVALID_FILE_PAYLOAD:
      return 400;
    case ErrorCodes.WORKBOOK_UNREADABLE:
      return 422;
    default:
      return 500;
  }
}
