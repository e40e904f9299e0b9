// engine/kpis/monthlyT12Calculator.ts
// KPIs for T12 monthly financial reports.

import type { FormatDescriptor } from '../config';
import { buildMetricLexicon } from '../metricLexicon';
import { createKpiCalculator, rentRollRatios, type KpiCalculator } from './kpiCore';

export const MONTHLY_KEY_METRICS = [
  'Property Asking Rent',
  'Effective Rental Income',
  'Gross Scheduled Rent',
  'Loss to lease',
  'Vacancy',
  'Concessions',
  'Delinquency',
  'EBITDA (NOI)',
  'Total Expense',
  'Monthly Cash Flow'
] as const;

export function createMonthlyT12Calculator(descriptor: FormatDescriptor): KpiCalculator {
  return createKpiCalculator({
    descriptor,
    lexicon: buildMetricLexicon(descriptor),
    description: 'Rent roll, revenue loss and NOI KPIs for T12 monthly financial reports',
    keyMetrics: MONTHLY_KEY_METRICS,
    ratios: rentRollRatios({
      askingRent: 'Property Asking Rent',
      grossRent: 'Gross Scheduled Rent',
      income: descriptor.income_metric,
      lossToLease: 'Loss to lease',
      vacancy: 'Vacancy',
      delinquency: 'Delinquency',
      noi: descriptor.noi_metric,
      totalExpense: 'Total Expense'
    })
  });
}
