// engine/kpiWorkbook.ts
// Single source of truth for the KPI export .xlsx schema
// (Canonical + KPI_Summary + Warnings), shared by download and blob storage.

import ExcelJS from 'exceljs';
import type { PipelineResult } from './pipeline';

export const XLSX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export type SummaryRowSection = 'current' | 'ytd' | 'trend' | 'budget' | 'ratio' | 'noi';

function boldHeader(sheet: ExcelJS.Worksheet): void {
  sheet.getRow(1).font = { bold: true };
  sheet.views = [{ state: 'frozen', ySplit: 1 }];
}

function addCanonicalSheet(workbook: ExcelJS.Workbook, results: readonly PipelineResult[]): void {
  const sheet = workbook.addWorksheet('Canonical');
  sheet.columns = [
    { header: 'Sheet', key: 'sheet', width: 28 },
    { header: 'Metric', key: 'metric_name', width: 40 },
    { header: 'Period', key: 'period', width: 10 },
    { header: 'Period Label', key: 'period_label', width: 16 },
    { header: 'YTD', key: 'is_ytd', width: 6 },
    { header: 'Value', key: 'value', width: 16 },
    { header: 'Budget', key: 'budget_value', width: 16 },
    { header: 'Unmapped', key: 'unmapped', width: 10 },
    { header: 'Source Row', key: 'source_row_id', width: 11 },
    { header: 'Source Column', key: 'source_column', width: 13 }
  ];

  for (const result of results) {
    const table = result.ok ? result.table : result.table ?? [];
    for (const record of table) {
      sheet.addRow({
        sheet: result.sheet,
        metric_name: record.metric_name,
        period: record.period,
        period_label: record.period_label,
        is_ytd: record.is_ytd ? 'Y' : 'N',
        value: record.value,
        budget_value: record.budget_value ?? null,
        unmapped: record.unmapped ? 'Y' : 'N',
        source_row_id: record.source_row_id,
        source_column: record.source_column
      });
    }
  }
  boldHeader(sheet);
}

function addSummarySheet(workbook: ExcelJS.Workbook, results: readonly PipelineResult[]): void {
  const sheet = workbook.addWorksheet('KPI_Summary');
  sheet.columns = [
    { header: 'Sheet', key: 'sheet', width: 28 },
    { header: 'Format', key: 'format_name', width: 26 },
    { header: 'Section', key: 'section', width: 10 },
    { header: 'Period', key: 'period', width: 10 },
    { header: 'Metric', key: 'metric', width: 40 },
    { header: 'Value', key: 'value', width: 16 },
    { header: 'Comparison', key: 'comparison', width: 16 },
    { header: 'Change', key: 'change', width: 16 },
    { header: 'Change %', key: 'change_pct', width: 12 }
  ];

  for (const result of results) {
    if (!result.ok) continue;
    const s = result.summary;
    const base = { sheet: s.sheet, format_name: s.format_name };
    const add = (
      section: SummaryRowSection,
      period: string | null,
      metric: string,
      value: number,
      comparison?: number,
      change?: number,
      changePct?: number
    ): void => {
      sheet.addRow({
        ...base,
        section,
        period: period ?? '',
        metric,
        value,
        comparison: comparison ?? null,
        change: change ?? null,
        change_pct: changePct ?? null
      });
    };

    for (const [metric, value] of Object.entries(s.current_period)) add('current', s.as_of, metric, value);
    for (const [metric, value] of Object.entries(s.ytd)) add('ytd', s.ytd_as_of, metric, value);
    for (const [metric, d] of Object.entries(s.trend)) {
      add('trend', s.as_of, metric, d.current, d.prior, d.absolute_delta, d.percent_delta);
    }
    for (const [metric, b] of Object.entries(s.budget)) {
      add('budget', s.as_of, metric, b.actual, b.budget, b.variance, b.variance_pct);
    }
    for (const [name, value] of Object.entries(s.ratios)) add('ratio', s.as_of, name, value);
    if (s.noi?.derived !== undefined) add('noi', s.as_of, 'Derived NOI', s.noi.derived, s.noi.reported);
  }

  sheet.getColumn('change_pct').numFmt = '0.00%';
  boldHeader(sheet);
}

function addWarningsSheet(workbook: ExcelJS.Workbook, results: readonly PipelineResult[]): void {
  const sheet = workbook.addWorksheet('Warnings');
  sheet.columns = [
    { header: 'Sheet', key: 'sheet', width: 28 },
    { header: 'Severity', key: 'severity', width: 10 },
    { header: 'Code', key: 'code', width: 8 },
    { header: 'Message', key: 'message', width: 80 },
    { header: 'Row', key: 'row', width: 8 },
    { header: 'Column', key: 'column', width: 8 },
    { header: 'Metric', key: 'metric', width: 32 }
  ];

  for (const result of results) {
    if (!result.ok) {
      sheet.addRow({
        sheet: result.sheet,
        severity: 'error',
        code: result.code,
        message: result.message,
        row: result.context.row ?? null,
        column: result.context.column ?? null,
        metric: ''
      });
    }
    for (const w of result.warnings) {
      sheet.addRow({
        sheet: w.sheet,
        severity: 'warning',
        code: w.code,
        message: w.message,
        row: w.row ?? null,
        column: w.column ?? null,
        metric: w.metric ?? ''
      });
    }
  }
  boldHeader(sheet);
}

export async function buildKpiExportWorkbook(results: readonly PipelineResult[], dateISO: string): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  const createdAt = new Date(`${dateISO}T00:00:00.000Z`);
  if (!Number.isNaN(createdAt.getTime())) {
    workbook.created = createdAt;
    workbook.modified = createdAt;
  }

  addCanonicalSheet(workbook, results);
  addSummarySheet(workbook, results);
  addWarningsSheet(workbook, results);

  const buffer = await workbook.xlsx.writeBuffer();
  return Buffer.from(buffer);
}
