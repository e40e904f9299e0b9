// engine/formats/monthlyT12Processor.ts
// T12 monthly financial report: text month headers ("Jul 2024") somewhere in
// the first rows, metric labels in column A, optional trailing YTD column.
// Sign convention: expenses are reported negative.

import type { FormatDescriptor } from '../config';
import type { RawSheet, TidyResult } from '../types';
import { buildMetricLexicon } from '../metricLexicon';
import { locateHeader, tidySheet, type TidyLayout } from '../tidyEngine';
import { PERIOD_MON_YYYY, FIN_SHEET_SUFFIX } from '../regex';
import { labelKey, cellToText } from '../normalizeFields';
import {
  cellAt,
  clampScore,
  hasKeywordInColumn,
  rowHasBudgetLabel,
  type FormatProcessor
} from './formatProcessor';

export const MONTHLY_T12_FORMAT = 'T12_Monthly_Financial';

// Rows below the header searched for a known metric label
const KEYWORD_WINDOW_ROWS = 40;

// Ceiling applied when the sheet carries another layout's signature
const FOREIGN_SIGNATURE_CAP = 0.3;

// Database exports label row 7 column A with "Actuals" / "Metric"
const DATABASE_MARKER_ROW = 6;

function hasDatabaseSignature(sheet: RawSheet): boolean {
  if (FIN_SHEET_SUFFIX.test(sheet.name)) return true;
  const marker = labelKey(cellToText(cellAt(sheet, DATABASE_MARKER_ROW, 0)));
  return marker.includes('actuals') || marker.includes('metric');
}

export function createMonthlyT12Processor(descriptor: FormatDescriptor): FormatProcessor {
  const lexicon = buildMetricLexicon(descriptor);

  const layout: TidyLayout = {
    scanRows: descriptor.header_scan_rows,
    minPeriodColumns: descriptor.min_period_columns,
    metricColumn: 0,
    nativeDates: 'dates'
  };

  return {
    name: descriptor.name,
    descriptor,
    lexicon,

    detect(sheet: RawSheet): number {
      const header = locateHeader(sheet, layout);
      if (!header) return 0;

      let score = 0.4;

      const strictLabels = header.columns.some((col) => !col.is_ytd && PERIOD_MON_YYYY.test(col.label));
      if (strictLabels) score += 0.2;

      const from = header.rowIndex + 1;
      if (hasKeywordInColumn(sheet, descriptor.detection_keywords, from, from + KEYWORD_WINDOW_ROWS)) {
        score += 0.4;
      }

      if (rowHasBudgetLabel(sheet, header.rowIndex) || hasDatabaseSignature(sheet)) {
        score = Math.min(score, FOREIGN_SIGNATURE_CAP);
      }

      return clampScore(score);
    },

    process(sheet: RawSheet): TidyResult {
      return tidySheet(sheet, layout, lexicon);
    }
  };
}
