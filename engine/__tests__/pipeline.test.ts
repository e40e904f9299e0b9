import test from 'node:test';
import assert from 'node:assert/strict';

import { analyzeWorkbook, eligibleSheets, runPipeline, type PipelineResult, type PipelineSuccess } from '../pipeline';
import { buildEngineConfig } from '../engineConfig';
import { DEFAULT_ENGINE_SETTINGS } from '../config';
import { ErrorCodes, isEngineError } from '../errorCodes';
import { MONTHLY_T12_FORMAT } from '../formats/monthlyT12Processor';
import { STANDARD_T12_FORMAT } from '../formats/standardT12Processor';
import { DATABASE_T12_FORMAT } from '../formats/databaseT12Processor';
import {
  databaseBgtSheet,
  databaseFinSheet,
  mapleCourtSheet,
  sheetOf,
  standardQ1Sheet,
  standardSheet,
  unknownSheet
} from './fixtures';

const config = buildEngineConfig({ settings: DEFAULT_ENGINE_SETTINGS });

function expectSuccess(result: PipelineResult): PipelineSuccess {
  if (!result.ok) assert.fail(`expected success, got ${result.code}: ${result.message}`);
  return result;
}

test('monthly report end to end', () => {
  const result = expectSuccess(runPipeline(mapleCourtSheet(), config));

  assert.equal(result.format_name, MONTHLY_T12_FORMAT);
  assert.equal(result.confidence, 1);
  assert.equal(result.table.length, 4);
  assert.deepEqual(result.table[1], {
    metric_name: 'Net Eff. Gross Income',
    period: '2024-02',
    period_label: 'Feb 2024',
    is_ytd: false,
    value: 196.57,
    unmapped: false,
    source_row_id: 2,
    source_column: 3
  });

  const { summary } = result;
  assert.equal(summary.as_of, '2024-02');
  assert.equal(summary.prior_period, '2024-01');
  assert.deepEqual(summary.trend['Total Expense'], {
    prior: -82.3,
    current: -110.15,
    absolute_delta: -27.85,
    percent_delta: -0.338396
  });
  assert.equal(summary.noi, null);
  assert.deepEqual(result.warnings, []);
});

test('standard workbook: YTD, budget variance and ratios', () => {
  const result = expectSuccess(runPipeline(standardSheet(), config));
  assert.equal(result.format_name, STANDARD_T12_FORMAT);

  const { summary } = result;
  assert.equal(summary.as_of, '2024-06');
  assert.equal(summary.ytd_as_of, '2024-06');
  assert.deepEqual(summary.current_period, {
    'Property Asking Rent': 1000,
    'Net Eff. Gross Income': 950,
    'Total Expense': 350,
    'EBITDA (NOI)': 600,
    'Monthly Cash Flow': 150,
    'Total Cash': 5000,
    'Valuation p/unit 5.5%': 2100000
  });
  assert.deepEqual(summary.ytd, {
    'Property Asking Rent': 6000,
    'Net Eff. Gross Income': 5450,
    'Total Expense': 2350,
    'EBITDA (NOI)': 3100,
    'Monthly Cash Flow': 650
  });
  assert.deepEqual(summary.trend['Net Eff. Gross Income'], {
    prior: 900,
    current: 950,
    absolute_delta: 50,
    percent_delta: 0.055556
  });
  assert.deepEqual(Object.keys(summary.trend), [
    'Property Asking Rent',
    'Net Eff. Gross Income',
    'Total Expense',
    'EBITDA (NOI)',
    'Monthly Cash Flow'
  ]);
  assert.deepEqual(summary.budget, {
    'Property Asking Rent': { actual: 1000, budget: 1000, variance: 0, variance_pct: 0 },
    'Net Eff. Gross Income': { actual: 950, budget: 920, variance: 30, variance_pct: 0.032609 },
    'Total Expense': { actual: 350, budget: 400, variance: -50, variance_pct: -0.125 },
    'EBITDA (NOI)': { actual: 600, budget: 520, variance: 80, variance_pct: 0.153846 }
  });
  assert.deepEqual(summary.ratios, { collection_rate: 0.95, noi_margin: 0.631579, expense_ratio: 0.368421 });
  assert.deepEqual(summary.noi, {
    expenses: { 'Total Expense': -350 },
    income: 950,
    reported: 600,
    derived: 600
  });
  assert.equal(summary.categories['Total Cash'], 'BALANCE_SHEET_ESCROW');
  assert.equal(summary.categories['Valuation p/unit 5.5%'], 'OTHER_METRICS');
  assert.deepEqual(summary.key_metrics, [
    'Property Asking Rent',
    'Net Eff. Gross Income',
    'Total Expense',
    'EBITDA (NOI)',
    'Monthly Cash Flow'
  ]);
  assert.deepEqual(
    summary.warnings.map((w) => [w.code, w.row, w.column, w.message]),
    [[ErrorCodes.UNMAPPED_METRIC, 14, 1, 'Metric "Valuation p/unit 5.5%" is not a known Standard_T12_Workbook line; kept as-is.']]
  );
});

test('database workbook reads the paired budget sheet', () => {
  const results = analyzeWorkbook([databaseFinSheet(), databaseBgtSheet()], config);
  assert.equal(results.length, 1);

  const result = expectSuccess(results[0]);
  assert.equal(result.format_name, DATABASE_T12_FORMAT);
  assert.equal(result.sheet, 'Maple Court-Fin');

  const { summary } = result;
  assert.equal(summary.as_of, '2024-03');
  assert.deepEqual(summary.ytd, { 'Net Eff. Gross Income': 330, 'Total Expense': -135, 'EBITDA (NOI)': 195 });

  const ytdIncome = result.table.find((r) => r.is_ytd && r.metric_name === 'Net Eff. Gross Income');
  assert.deepEqual(
    ytdIncome && [ytdIncome.period, ytdIncome.period_label, ytdIncome.source_row_id, ytdIncome.budget_value],
    ['2024-03', 'YTD', 8, 115]
  );

  assert.deepEqual(summary.budget, {
    'Net Eff. Gross Income': { actual: 120, budget: 115, variance: 5, variance_pct: 0.043478 },
    'Total Expense': { actual: -50, budget: -48, variance: -2, variance_pct: -0.041667 }
  });
  assert.deepEqual(summary.trend['EBITDA (NOI)'], { prior: 65, current: 70, absolute_delta: 5, percent_delta: 0.076923 });
  assert.deepEqual(summary.ratios, { noi_margin: 0.583333, expense_ratio: 0.416667 });
  assert.equal(summary.noi?.derived, 70);
  assert.deepEqual(
    summary.warnings.map((w) => [w.code, w.message]),
    [
      [
        ErrorCodes.BUDGET_WITHOUT_ACTUAL,
        '1 budget figure(s) on sheet "Maple Court-Bgt" have no matching actual and were not recorded (Insurance).'
      ]
    ]
  );
});

test('budget sheets are analysed through their actuals sheet', () => {
  const lone = sheetOf('Harbor-Bgt', [['x']]);
  assert.deepEqual(
    eligibleSheets([databaseFinSheet(), databaseBgtSheet(), lone]).map((s) => s.name),
    ['Maple Court-Fin', 'Harbor-Bgt']
  );
});

test('unrecognised sheet fails with E102 and the detection scores', () => {
  const result = runPipeline(unknownSheet(), config);
  assert.equal(result.ok, false);
  if (result.ok) return;
  assert.equal(result.code, ErrorCodes.FORMAT_UNKNOWN);
  assert.equal(result.message, 'Sheet "Notes" does not match any registered format.');
  assert.equal(result.user_message, 'Format not recognized. Upload a supported T12 statement.');
  assert.deepEqual(result.scores, [
    { format: MONTHLY_T12_FORMAT, confidence: 0 },
    { format: STANDARD_T12_FORMAT, confidence: 0 },
    { format: DATABASE_T12_FORMAT, confidence: 0 }
  ]);
});

test('forcing a format skips detection', () => {
  const layout = runPipeline(mapleCourtSheet(), config, { formatName: STANDARD_T12_FORMAT });
  assert.equal(layout.ok, false);
  if (layout.ok) return;
  assert.equal(layout.code, ErrorCodes.LAYOUT_MISMATCH);
  assert.equal(layout.format_name, STANDARD_T12_FORMAT);
  assert.deepEqual(layout.context, { sheet: 'Maple Court', row: 7 });
  assert.equal(layout.message, 'No header row with at least 6 month labels found in row 7 of sheet "Maple Court".');

  const unknown = runPipeline(mapleCourtSheet(), config, { formatName: 'Nope' });
  assert.equal(unknown.ok, false);
  if (unknown.ok) return;
  assert.equal(unknown.code, ErrorCodes.FORMAT_UNKNOWN);
  assert.equal(unknown.message, 'Format "Nope" is not registered.');
});

test('an ambiguous latest month keeps the table and the parse warnings', () => {
  const sheet = sheetOf('Dup', [
    [null, 'Jan 2024', 'Feb 2024', '2024-02'],
    ['Vacancy', 1, 2, null],
    ['Concessions', 1, null, 3]
  ]);
  const result = runPipeline(sheet, config);
  assert.equal(result.ok, false);
  if (result.ok) return;
  assert.equal(result.code, ErrorCodes.AMBIGUOUS_PERIOD);
  assert.equal(
    result.message,
    'Most recent month Feb 2024 appears in more than one column: column 3 ("Feb 2024"), column 4 ("2024-02").'
  );
  assert.deepEqual(result.context, { sheet: 'Dup', column: 4 });
  assert.ok(result.table && result.table.length > 0);
  assert.deepEqual(
    result.warnings.map((w) => w.code),
    [ErrorCodes.DUPLICATE_PERIOD_COLUMN]
  );
});

test('a latest month under two populated columns fails with E201', () => {
  const sheet = sheetOf('Dup', [
    [null, 'Jan 2024', 'Feb 2024', '2024-02'],
    ['Vacancy', 1, 2, 9],
    ['Concessions', 1, 3, 7]
  ]);
  const result = runPipeline(sheet, config, { formatName: MONTHLY_T12_FORMAT });
  assert.equal(result.ok, false);
  if (result.ok) return;
  assert.equal(result.code, ErrorCodes.AMBIGUOUS_PERIOD);
  assert.equal(
    result.message,
    'Most recent month Feb 2024 appears in more than one column: column 3 ("Feb 2024"), column 4 ("2024-02").'
  );
  assert.deepEqual(result.context, { sheet: 'Dup', column: 4 });
  assert.deepEqual(
    result.warnings.map((w) => [w.code, w.row, w.column]),
    [
      [ErrorCodes.DUPLICATE_PERIOD_COLUMN, 1, 4],
      [ErrorCodes.DUPLICATE_FACT, 2, 4],
      [ErrorCodes.DUPLICATE_FACT, 3, 4]
    ]
  );
});

test('a duplicated earlier month does not block the latest one', () => {
  const sheet = sheetOf('Early Dup', [
    [null, 'Jan 2024', '2024-01', 'Feb 2024'],
    ['Vacancy', 1, 5, 2]
  ]);
  const result = expectSuccess(runPipeline(sheet, config, { formatName: MONTHLY_T12_FORMAT }));
  assert.equal(result.summary.as_of, '2024-02');
  assert.deepEqual(result.summary.current_period, { Vacancy: 2 });
});

test('bare YTD runs through the last month with figures, not the last header', () => {
  const result = expectSuccess(runPipeline(standardQ1Sheet(), config, { formatName: STANDARD_T12_FORMAT }));
  const { summary } = result;

  assert.equal(summary.as_of, '2024-03');
  assert.equal(summary.ytd_as_of, '2024-03');
  assert.deepEqual(summary.ytd, { 'Net Eff. Gross Income': 2730, 'Total Expense': 1230, 'EBITDA (NOI)': 1500 });
  assert.deepEqual(summary.warnings, []);

  const ytdIncome = result.table.find((r) => r.is_ytd && r.metric_name === 'Net Eff. Gross Income');
  assert.equal(ytdIncome?.period, '2024-03');
  assert.equal(ytdIncome?.budget_value, 2800);
});

test('standard workbook carries T12 stats, rolling variance and highlights', () => {
  const { summary } = expectSuccess(runPipeline(standardSheet(), config));

  assert.deepEqual(summary.t12_trends['Net Eff. Gross Income'], {
    months_of_data: 6,
    average: 908.33,
    total: 5450,
    min: 900,
    min_period: '2024-01',
    max: 950,
    max_period: '2024-06',
    std_dev: 18.63,
    start_value: 900,
    end_value: 950,
    total_change: 0.055556,
    rolling_3mo_avg: 916.67,
    rolling_6mo_avg: 908.33,
    direction: 'stable',
    direction_change: 0.018519
  });
  assert.deepEqual(summary.rolling_variance['Net Eff. Gross Income'], {
    current: 950,
    prior_3mo_avg: 900,
    variance: 50,
    variance_pct: 0.055556
  });
  assert.equal(summary.highlights.months_with_data, 6);
  assert.deepEqual(
    summary.highlights.largest_changes.map((c) => c.metric),
    ['Monthly Cash Flow', 'EBITDA (NOI)', 'Total Expense', 'Net Eff. Gross Income', 'Property Asking Rent']
  );
  assert.deepEqual(summary.highlights.zero_value_metrics, []);
});

test('a missing sheet name is a request error', () => {
  assert.throws(
    () => analyzeWorkbook([mapleCourtSheet()], config, { sheetName: 'Nope' }),
    (err: unknown) =>
      isEngineError(err) &&
      err.code === ErrorCodes.INVALID_REQUEST_STRUCTURE &&
      err.message === 'Sheet "Nope" not found. Available: Maple Court.'
  );
});

test('sheet_name restricts the run to one sheet', () => {
  const results = analyzeWorkbook([unknownSheet(), mapleCourtSheet()], config, { sheetName: 'Maple Court' });
  assert.deepEqual(
    results.map((r) => [r.sheet, r.ok]),
    [['Maple Court', true]]
  );
});
