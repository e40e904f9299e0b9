import test from 'node:test';
import assert from 'node:assert/strict';
import ExcelJS from 'exceljs';

import { buildKpiExportWorkbook } from '../kpiWorkbook';
import { runPipeline } from '../pipeline';
import { buildEngineConfig } from '../engineConfig';
import { DEFAULT_ENGINE_SETTINGS } from '../config';
import { mapleCourtSheet, unknownSheet } from './fixtures';

const config = buildEngineConfig({ settings: DEFAULT_ENGINE_SETTINGS });

async function exportOf(): Promise<ExcelJS.Workbook> {
  const results = [runPipeline(mapleCourtSheet(), config), runPipeline(unknownSheet(), config)];
  const buffer = await buildKpiExportWorkbook(results, '2024-03-01');
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.load(buffer);
  return workbook;
}

function worksheet(workbook: ExcelJS.Workbook, name: string): ExcelJS.Worksheet {
  const sheet = workbook.getWorksheet(name);
  if (!sheet) assert.fail(`missing worksheet ${name}`);
  return sheet;
}

function rowValues(sheet: ExcelJS.Worksheet, row: number, columns: number): unknown[] {
  const values: unknown[] = [];
  for (let c = 1; c <= columns; c++) values.push(sheet.getRow(row).getCell(c).value);
  return values;
}

test('export has the three sheets in order', async () => {
  const workbook = await exportOf();
  assert.deepEqual(
    workbook.worksheets.map((s) => s.name),
    ['Canonical', 'KPI_Summary', 'Warnings']
  );
});

test('Canonical lists every record with its provenance', async () => {
  const sheet = worksheet(await exportOf(), 'Canonical');
  assert.equal(sheet.rowCount, 5);
  assert.deepEqual(rowValues(sheet, 1, 10), [
    'Sheet',
    'Metric',
    'Period',
    'Period Label',
    'YTD',
    'Value',
    'Budget',
    'Unmapped',
    'Source Row',
    'Source Column'
  ]);
  assert.deepEqual(rowValues(sheet, 2, 10), ['Maple Court', 'Net Eff. Gross Income', '2024-01', 'Jan 2024', 'N', 200, null, 'N', 2, 2]);
  assert.equal(sheet.getRow(1).getCell(1).font?.bold, true);
});

test('KPI_Summary has current values then trend rows', async () => {
  const sheet = worksheet(await exportOf(), 'KPI_Summary');
  assert.equal(sheet.rowCount, 5);
  assert.deepEqual(rowValues(sheet, 3, 9), [
    'Maple Court',
    'T12_Monthly_Financial',
    'current',
    '2024-02',
    'Total Expense',
    -110.15,
    null,
    null,
    null
  ]);
  assert.deepEqual(rowValues(sheet, 4, 9), [
    'Maple Court',
    'T12_Monthly_Financial',
    'trend',
    '2024-02',
    'Net Eff. Gross Income',
    196.57,
    200,
    -3.43,
    -0.01715
  ]);
});

test('Warnings leads with the failed sheet', async () => {
  const sheet = worksheet(await exportOf(), 'Warnings');
  assert.equal(sheet.rowCount, 2);
  assert.deepEqual(rowValues(sheet, 2, 6), [
    'Notes',
    'error',
    'E102',
    'Sheet "Notes" does not match any registered format.',
    null,
    null
  ]);
});
