// engine/kpis/standardT12Calculator.ts
// KPIs for standard T12 workbooks (actual vs budget, cap-rate valuation lines).

import type { FormatDescriptor } from '../config';
import { buildMetricLexicon } from '../metricLexicon';
import { createKpiCalculator, rentRollRatios, ratioOf, type KpiCalculator } from './kpiCore';

export const STANDARD_KEY_METRICS = [
  'Property Asking Rent',
  'Gross Scheduled Rent',
  'Net Eff. Gross Income',
  'Vacancy',
  'Total Expense',
  'EBITDA (NOI)',
  'Debt Service',
  'Monthly Cash Flow'
] as const;

export function createStandardT12Calculator(descriptor: FormatDescriptor): KpiCalculator {
  return createKpiCalculator({
    descriptor,
    lexicon: buildMetricLexicon(descriptor),
    description: 'Actual-vs-budget, rent roll and debt coverage KPIs for standard T12 workbooks',
    keyMetrics: STANDARD_KEY_METRICS,
    ratios: [
      ...rentRollRatios({
        askingRent: 'Property Asking Rent',
        grossRent: 'Gross Scheduled Rent',
        income: descriptor.income_metric,
        lossToLease: 'Loss to lease',
        vacancy: 'Vacancy',
        delinquency: 'Delinquency',
        noi: descriptor.noi_metric,
        totalExpense: 'Total Expense'
      }),
      // Debt service is reported positive here, like every other cost line.
      { name: 'debt_service_coverage', compute: (v) => ratioOf(v[descriptor.noi_metric], v['Debt Service']) }
    ]
  });
}
