// api/qualityCheck.ts
// POST /api/qualityCheck
// Body: { narrative, expected_keywords?, format_name?, summary? } → QualityReport
//
// Keyword source, first match wins: expected_keywords, summary, the named
// format's key metrics, none.

import { ErrorCodes } from '../engine/errorCodes';
import { getDefaultEngineConfig, type EngineConfig } from '../engine/engineConfig';
import { expectedKeywordsFor, extractNarrativeSections, validateNarrative } from '../engine/outputQuality';
import {
  parseJsonBody,
  validateQualityCheckTransport,
  type QualityCheckRequest
} from '../engine/validateTransport';
import { rejectMethod, type HandlerRequest, type HandlerResponse } from '../engine/httpTypes';
import { logEngineInfo, logEngineWarn } from '../engine/logger';

// Built when the module loads: a misconfigured registry (E701) fails the cold start.
export const engineConfig = getDefaultEngineConfig();

function keywordsFor(request: QualityCheckRequest, config: EngineConfig): string[] | null {
  if (request.expected_keywords) return request.expected_keywords;
  if (request.summary) return expectedKeywordsFor(request.summary);
  if (request.format_name !== undefined) {
    const calculator = config.kpis.get(request.format_name);
    return calculator ? [...calculator.keyMetrics] : null;
  }
  return [];
}

export function handleQualityCheck(req: HandlerRequest, res: HandlerResponse, config: EngineConfig): void {
  if (req.method !== 'POST') {
    rejectMethod(res, 'POST');
    return;
  }

  const parsed = parseJsonBody(req.body);
  if (!parsed.ok) {
    res.status(parsed.errorStatus).json(parsed.errorBody);
    return;
  }

  const transport = validateQualityCheckTransport(parsed.request);
  if (!transport.ok) {
    logEngineWarn('transport_validation_failed_4xx', {
      route: 'qualityCheck',
      status: transport.errorStatus,
      error_body: transport.errorBody
    });
    res.status(transport.errorStatus).json(transport.errorBody);
    return;
  }

  const request = transport.request;
  const keywords = keywordsFor(request, config);
  if (keywords === null) {
    res.status(400).json({
      error: `Format "${request.format_name ?? ''}" is not registered.`,
      error_codes: [ErrorCodes.FORMAT_UNKNOWN]
    });
    return;
  }

  const { settings } = config;
  const report = validateNarrative(request.narrative, keywords, {
    requiredSections: settings.requiredSections,
    minLength: settings.qualityMinLength,
    passScore: settings.qualityPassScore
  });

  logEngineInfo('quality_check_completed_200', {
    passed: report.passed,
    score: report.score,
    codes: report.codes,
    quality_level: report.quality_level
  });

  res.status(200).json({ ...report, sections: extractNarrativeSections(request.narrative) });
}

export default function handler(req: HandlerRequest, res: HandlerResponse): void {
  handleQualityCheck(req, res, engineConfig);
}
