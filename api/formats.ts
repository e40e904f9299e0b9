// api/formats.ts
// GET /api/formats → registered formats in detection order.

import { getDefaultEngineConfig, type EngineConfig } from '../engine/engineConfig';
import { rejectMethod, type HandlerRequest, type HandlerResponse } from '../engine/httpTypes';

// Built when the module loads: a misconfigured registry (E701) fails the cold start.
export const engineConfig = getDefaultEngineConfig();

export interface FormatInfo {
  name: string;
  description: string;
  key_metrics: string[];
  expected_metrics: string[];
  income_metric: string;
  noi_metric: string;
  expense_sign: string;
}

export interface FormatsResponse {
  detection_threshold: number;
  formats: FormatInfo[];
}

export function listFormats(config: EngineConfig): FormatsResponse {
  return {
    detection_threshold: config.formats.threshold,
    formats: config.formats.list().map((processor) => ({
      name: processor.name,
      description: processor.descriptor.description,
      key_metrics: [...(config.kpis.get(processor.name)?.keyMetrics ?? [])],
      expected_metrics: [...processor.descriptor.expected_metrics],
      income_metric: processor.descriptor.income_metric,
      noi_metric: processor.descriptor.noi_metric,
      expense_sign: processor.descriptor.expense_sign
    }))
  };
}

export default function handler(req: HandlerRequest, res: HandlerResponse): void {
  if (req.method !== 'GET') {
    rejectMethod(res, 'GET');
    return;
  }
  res.status(200).json(listFormats(engineConfig));
}
