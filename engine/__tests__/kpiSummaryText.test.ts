import test from 'node:test';
import assert from 'node:assert/strict';

import { buildKpiSummaryText, describeTrend, formatCurrency, formatPercent, formatRatio } from '../kpiSummaryText';
import { runPipeline, type PipelineResult } from '../pipeline';
import { buildEngineConfig } from '../engineConfig';
import { DEFAULT_ENGINE_SETTINGS } from '../config';
import type { KpiSummary } from '../types';
import { mapleCourtSheet, standardSheet } from './fixtures';

const config = buildEngineConfig({ settings: DEFAULT_ENGINE_SETTINGS });

function summaryOf(result: PipelineResult): KpiSummary {
  if (!result.ok) assert.fail(`expected success, got ${result.code}`);
  return result.summary;
}

test('currency, percent and ratio formatting', () => {
  assert.equal(formatCurrency(1234.5), '$1,234.50');
  assert.equal(formatCurrency(-82.3), '-$82.30');
  assert.equal(formatCurrency(0), '$0.00');
  assert.equal(formatPercent(0.01715), '1.715%');
  assert.equal(formatPercent(-0.125), '-12.5%');
  assert.equal(formatRatio(0.95), '95.0%');
});

test('trend lines give direction, magnitude and both months', () => {
  assert.equal(
    describeTrend('Vacancy', { prior: 1000, current: 1000, absolute_delta: 0, percent_delta: 0 }),
    '• Vacancy: flat $0.00 (0%), $1,000.00 → $1,000.00'
  );
  assert.equal(
    describeTrend('Other Income', { prior: 0, current: 50, absolute_delta: 50 }),
    '• Other Income: up $50.00, $0.00 → $50.00'
  );
});

test('two-month report renders the full block', () => {
  const text = buildKpiSummaryText(summaryOf(runPipeline(mapleCourtSheet(), config)));
  assert.equal(
    text,
    [
      '=== T12 PROPERTY ANALYSIS - Feb 2024 ===',
      'Property: Maple Court',
      'Sheet: Maple Court',
      'Format: T12_Monthly_Financial',
      '',
      '=== REVENUE PERFORMANCE ===',
      '• Net Eff. Gross Income: $196.57',
      '',
      '=== EXPENSES ===',
      '• Total Expense: -$110.15',
      '',
      '=== MONTH-OVER-MONTH TRENDS (vs Jan 2024) ===',
      '• Net Eff. Gross Income: down $3.43 (1.715%), $200.00 → $196.57',
      '• Total Expense: down $27.85 (33.84%), -$82.30 → -$110.15'
    ].join('\n')
  );
});

test('standard workbook adds ratios, NOI, budget, YTD and notes', () => {
  const lines = buildKpiSummaryText(summaryOf(runPipeline(standardSheet(), config))).split('\n');

  assert.equal(lines[1], 'Property: Maple Court');
  assert.ok(lines.includes('=== BALANCE SHEET & ESCROW ==='));
  assert.ok(lines.includes('• Valuation p/unit 5.5%: $2,100,000.00'));

  const ratios = lines.indexOf('=== KEY PERFORMANCE RATIOS ===');
  assert.deepEqual(lines.slice(ratios + 1, ratios + 4), [
    '• Collection Rate: 95.0%',
    '• NOI Margin: 63.2%',
    '• Expense Ratio: 36.8%'
  ]);

  const noi = lines.indexOf('=== NOI ===');
  assert.deepEqual(lines.slice(noi + 1, noi + 3), [
    '• Reported NOI: $600.00',
    '• Derived NOI (income less expenses): $600.00'
  ]);

  assert.ok(
    lines.includes('• Net Eff. Gross Income: actual $950.00 vs budget $920.00 (variance $30.00, 3.261%)')
  );
  assert.ok(lines.includes('=== YEAR TO DATE (through Jun 2024) ==='));
  assert.ok(
    lines.includes(
      '• Net Eff. Gross Income: 6 months, avg $908.33, low $900.00 (Jan 2024), high $950.00 (Jun 2024), stable (1.852%)'
    )
  );
  const rolling = lines.indexOf('=== VS PRIOR 3-MONTH AVERAGE ===');
  assert.ok(rolling > 0);
  assert.ok(
    lines.includes('• Net Eff. Gross Income: $950.00 vs 3-month avg $900.00 (variance $50.00, 5.556%)')
  );
  assert.equal(
    lines[lines.length - 1],
    '• [E301] Metric "Valuation p/unit 5.5%" is not a known Standard_T12_Workbook line; kept as-is.'
  );
});
