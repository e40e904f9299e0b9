// api/analyze.ts
// POST /api/analyze
// Body: { file_base64, file_name?, sheet_name?, format_name? }
// Runs the pipeline on every eligible sheet (or the named one).

import { ErrorCodes, isEngineError } from '../engine/errorCodes';
import { analyzeUpload, statusForEngineError } from '../engine/analyzeUpload';
import { getDefaultEngineConfig, type EngineConfig } from '../engine/engineConfig';
import { parseJsonBody, validateAnalyzeTransport } from '../engine/validateTransport';
import { rejectMethod, type HandlerRequest, type HandlerResponse } from '../engine/httpTypes';
import { logEngineError, logEngineInfo, logEngineWarn } from '../engine/logger';

// Built when the module loads: a misconfigured registry (E701) fails the cold start.
export const engineConfig = getDefaultEngineConfig();

export async function handleAnalyze(req: HandlerRequest, res: HandlerResponse, config: EngineConfig): Promise<void> {
  if (req.method !== 'POST') {
    logEngineWarn('method_not_allowed', { route: 'analyze', method: req.method });
    rejectMethod(res, 'POST');
    return;
  }

  const parsed = parseJsonBody(req.body);
  if (!parsed.ok) {
    logEngineWarn('invalid_json_body', { route: 'analyze', error_body: parsed.errorBody });
    res.status(parsed.errorStatus).json(parsed.errorBody);
    return;
  }

  const transport = validateAnalyzeTransport(parsed.request);
  if (!transport.ok) {
    logEngineWarn('transport_validation_failed_4xx', {
      route: 'analyze',
      status: transport.errorStatus,
      error_body: transport.errorBody
    });
    res.status(transport.errorStatus).json(transport.errorBody);
    return;
  }

  const { file, file_name, sheet_name, format_name } = transport.request;
  try {
    const { response } = await analyzeUpload(file, file_name, config, {
      sheetName: sheet_name,
      formatName: format_name
    });

    logEngineInfo('analyze_request_completed_200', {
      file_name,
      sheet_count: response.sheet_count,
      ok_count: response.ok_count
    });
    res.status(200).json(response);
  } catch (err) {
    if (isEngineError(err)) {
      const status = statusForEngineError(err.code);
      logEngineWarn('analyze_request_rejected', { status, code: err.code, message: err.message });
      res.status(status).json({ error: err.message, error_codes: [err.code] });
      return;
    }

    logEngineError('analyze_unhandled_exception', {
      message: err instanceof Error ? err.message : String(err)
    });
    res.status(500).json({
      error: 'Internal analysis error.',
      error_codes: [ErrorCodes.INTERNAL_ENGINE_ERROR]
    });
  }
}

export default async function handler(req: HandlerRequest, res: HandlerResponse): Promise<void> {
  await handleAnalyze(req, res, engineConfig);
}
