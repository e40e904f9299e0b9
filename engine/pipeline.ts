// engine/pipeline.ts
// Pipeline entry point:
//   raw sheet → detect → format processor → canonical table → KPI calculator → summary
//
// Expected failures (unknown format, layout mismatch, empty sheet, ambiguous
// period) come back as { ok: false } results; only programming errors throw.

import type { CanonicalTable, KpiSummary, ParseWarning, RawSheet, TidyResult } from './types';
import type { EngineConfig } from './engineConfig';
import type { DetectionScore } from './formatRegistry';
import type { FormatProcessor } from './formats/formatProcessor';
import {
  EngineError,
  ErrorCodes,
  describeError,
  isEngineError,
  type ErrorCode,
  type ErrorContext
} from './errorCodes';
import { logEngineInfo, logEngineWarn } from './logger';
import { BGT_SHEET_SUFFIX } from './regex';

export interface PipelineSuccess {
  ok: true;
  sheet: string;
  format_name: string;
  /** Detection confidence; 1 when the format was forced. */
  confidence: number;
  table: CanonicalTable;
  summary: KpiSummary;
  warnings: ParseWarning[];
}

export interface PipelineFailure {
  ok: false;
  sheet: string;
  code: ErrorCode;
  message: string;
  user_message: string;
  context: ErrorContext;
  format_name?: string;
  scores?: DetectionScore[];
  /** Present when the table was built but KPIs could not be computed. */
  table?: CanonicalTable;
  warnings: ParseWarning[];
}

export type PipelineResult = PipelineSuccess | PipelineFailure;

export interface RunPipelineOptions {
  /** Skip detection and use this registered format. */
  formatName?: string;
  /** Whole workbook, for layouts that read paired sheets. */
  workbook?: readonly RawSheet[];
}

function failure(
  sheet: RawSheet,
  err: EngineError,
  extra: Partial<Pick<PipelineFailure, 'format_name' | 'scores' | 'table' | 'warnings'>> = {}
): PipelineFailure {
  const result: PipelineFailure = {
    ok: false,
    sheet: sheet.name,
    code: err.code,
    message: err.message,
    user_message: describeError(err.code),
    context: { sheet: sheet.name, ...err.context },
    warnings: extra.warnings ?? []
  };
  if (extra.format_name !== undefined) result.format_name = extra.format_name;
  if (extra.scores !== undefined) result.scores = extra.scores;
  if (extra.table !== undefined) result.table = extra.table;

  logEngineWarn('pipeline_failed', {
    sheet: sheet.name,
    code: err.code,
    format: result.format_name ?? null,
    context: result.context
  });
  return result;
}

function selectProcessor(
  sheet: RawSheet,
  config: EngineConfig,
  formatName: string | undefined
): { processor: FormatProcessor; confidence: number } | PipelineFailure {
  if (formatName !== undefined) {
    const processor = config.formats.get(formatName);
    if (!processor) {
      return failure(
        sheet,
        new EngineError(ErrorCodes.FORMAT_UNKNOWN, `Format "${formatName}" is not registered.`, { format: formatName })
      );
    }
    return { processor, confidence: 1 };
  }

  const detection = config.formats.detect(sheet);
  if (detection.kind === 'unknown') {
    return failure(
      sheet,
      new EngineError(ErrorCodes.FORMAT_UNKNOWN, `Sheet "${sheet.name}" does not match any registered format.`),
      { scores: detection.scores }
    );
  }
  return { processor: detection.processor, confidence: detection.confidence };
}

export function runPipeline(sheet: RawSheet, config: EngineConfig, options: RunPipelineOptions = {}): PipelineResult {
  const selected = selectProcessor(sheet, config, options.formatName);
  if ('ok' in selected) return selected;

  const { processor, confidence } = selected;
  const calculator = config.kpis.require(processor.name);

  let tidy: TidyResult;
  try {
    tidy = processor.process(sheet, { workbook: options.workbook ?? [sheet] });
  } catch (err) {
    if (isEngineError(err)) return failure(sheet, err, { format_name: processor.name });
    throw err;
  }

  let summary: KpiSummary;
  try {
    summary = calculator.compute(tidy.table, {
      sheet: sheet.name,
      warnings: tidy.warnings,
      duplicatePeriods: tidy.duplicate_periods,
      tolerance: config.settings.ytdTolerance
    });
  } catch (err) {
    if (isEngineError(err)) {
      return failure(sheet, err, { format_name: processor.name, table: tidy.table, warnings: tidy.warnings });
    }
    throw err;
  }

  logEngineInfo('pipeline_completed', {
    sheet: sheet.name,
    format: processor.name,
    confidence,
    records: tidy.table.length,
    warnings: summary.warnings.length,
    as_of: summary.as_of
  });

  return {
    ok: true,
    sheet: sheet.name,
    format_name: processor.name,
    confidence,
    table: tidy.table,
    summary,
    warnings: summary.warnings
  };
}

// ------------------------------------------------------------
// Workbook level
// ------------------------------------------------------------

/** "-Bgt" sheets whose "-Fin" partner is present are read through that partner. */
export function eligibleSheets(workbook: readonly RawSheet[]): RawSheet[] {
  const names = new Set(workbook.map((s) => s.name));
  return workbook.filter((s) => {
    if (!BGT_SHEET_SUFFIX.test(s.name)) return true;
    return !names.has(s.name.replace(BGT_SHEET_SUFFIX, '-Fin'));
  });
}

export interface AnalyzeWorkbookOptions {
  sheetName?: string;
  formatName?: string;
}

export function analyzeWorkbook(
  workbook: readonly RawSheet[],
  config: EngineConfig,
  options: AnalyzeWorkbookOptions = {}
): PipelineResult[] {
  let targets: RawSheet[];
  if (options.sheetName !== undefined) {
    const named = workbook.find((s) => s.name === options.sheetName);
    if (!named) {
      throw new EngineError(
        ErrorCodes.INVALID_REQUEST_STRUCTURE,
        `Sheet "${options.sheetName}" not found. Available: ${workbook.map((s) => s.name).join(', ') || 'none'}.`,
        { sheet: options.sheetName }
      );
    }
    targets = [named];
  } else {
    targets = eligibleSheets(workbook);
  }

  return targets.map((sheet) => runPipeline(sheet, config, { formatName: options.formatName, workbook }));
}
