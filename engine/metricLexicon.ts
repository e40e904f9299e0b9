// engine/metricLexicon.ts
// Resolve raw metric labels to canonical names for one format.
//
// Built once per FormatDescriptor at startup:
//   - every alias maps to its canonical target
//   - every canonical name (alias targets, expected metrics, category members)
//     maps to itself
// Matching is case-insensitive and ignores repeated whitespace.

import type { FormatDescriptor, SignConvention } from './config';
import { labelKey, normalizeWhitespace } from './normalizeFields';

export interface ResolvedMetric {
  name: string;
  unmapped: boolean;
}

export interface MetricLexicon {
  readonly formatName: string;
  resolve(label: string): ResolvedMetric;
  categoryOf(metric: string): string | undefined;
  /** Sign convention this format uses when reporting the given cost line. */
  signOf(metric: string): SignConvention;
}

export function buildMetricLexicon(descriptor: FormatDescriptor): MetricLexicon {
  const canonicalByKey = new Map<string, string>();
  const categoryByMetric = new Map<string, string>();

  const addCanonical = (name: string) => {
    const key = labelKey(name);
    if (!canonicalByKey.has(key)) canonicalByKey.set(key, name);
  };

  for (const target of Object.values(descriptor.metric_aliases)) addCanonical(target);
  for (const metric of descriptor.expected_metrics) addCanonical(metric);
  for (const [category, metrics] of Object.entries(descriptor.metric_categories)) {
    for (const metric of metrics) {
      addCanonical(metric);
      if (!categoryByMetric.has(metric)) categoryByMetric.set(metric, category);
    }
  }
  addCanonical(descriptor.income_metric);
  addCanonical(descriptor.noi_metric);
  for (const metric of descriptor.expense_metrics) addCanonical(metric);

  // Aliases override canonical spellings.
  for (const [alias, target] of Object.entries(descriptor.metric_aliases)) {
    canonicalByKey.set(labelKey(alias), target);
  }

  return {
    formatName: descriptor.name,

    resolve(label: string): ResolvedMetric {
      const cleaned = normalizeWhitespace(label);
      const canonical = canonicalByKey.get(labelKey(cleaned));
      return canonical ? { name: canonical, unmapped: false } : { name: cleaned, unmapped: true };
    },

    categoryOf(metric: string): string | undefined {
      return categoryByMetric.get(metric);
    },

    signOf(metric: string): SignConvention {
      return descriptor.metric_signs[metric] ?? descriptor.expense_sign;
    }
  };
}
