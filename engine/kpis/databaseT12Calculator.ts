// engine/kpis/databaseT12Calculator.ts
// KPIs for portfolio database exports (adds physical occupancy).

import type { FormatDescriptor } from '../config';
import { buildMetricLexicon } from '../metricLexicon';
import { createKpiCalculator, rentRollRatios, ratioOf, type KpiCalculator, type MetricValues } from './kpiCore';

export const DATABASE_KEY_METRICS = [
  'Net Eff. Gross Income',
  'Total Expense',
  'EBITDA (NOI)',
  'Physical Occupancy',
  'Debt Service',
  'Monthly Cash Flow'
] as const;

/** Reported occupancy wins; otherwise units occupied / total units. */
export function physicalOccupancy(v: MetricValues): number | undefined {
  const reported = v['Physical Occupancy'];
  if (reported !== undefined) return reported > 1 ? ratioOf(reported, 100) : reported;
  return ratioOf(v['Units Occupied'], v['Total Units']);
}

export function createDatabaseT12Calculator(descriptor: FormatDescriptor): KpiCalculator {
  return createKpiCalculator({
    descriptor,
    lexicon: buildMetricLexicon(descriptor),
    description: 'Income, expense, NOI and occupancy KPIs for portfolio database exports',
    keyMetrics: DATABASE_KEY_METRICS,
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
      { name: 'physical_occupancy', compute: physicalOccupancy }
    ]
  });
}
