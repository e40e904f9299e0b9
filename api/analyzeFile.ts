// api/analyzeFile.ts
// POST /api/analyzeFile
// Body: { file_id, file_name?, sheet_name?, format_name? }
// Used by the Custom GPT via the file handle: the upload lives in OpenAI file storage.

import OpenAI from 'openai';
import { ErrorCodes, isEngineError } from '../engine/errorCodes';
import { analyzeUpload, statusForEngineError } from '../engine/analyzeUpload';
import { getDefaultEngineConfig, type EngineConfig } from '../engine/engineConfig';
import { parseJsonBody, validateAnalyzeFileTransport } from '../engine/validateTransport';
import { rejectMethod, type HandlerRequest, type HandlerResponse } from '../engine/httpTypes';
import { logEngineError, logEngineInfo, logEngineWarn } from '../engine/logger';

// Built when the module loads: a misconfigured registry (E701) fails the cold start.
export const engineConfig = getDefaultEngineConfig();

export type FileDownloader = (fileId: string) => Promise<Buffer>;

export async function downloadOpenAiFile(fileId: string): Promise<Buffer> {
  const openai = new OpenAI({ apiKey: process.env.OPENAI_API_KEY });
  const fileResponse = await openai.files.content(fileId);
  return Buffer.from(await fileResponse.arrayBuffer());
}

export async function handleAnalyzeFile(
  req: HandlerRequest,
  res: HandlerResponse,
  config: EngineConfig,
  download: FileDownloader
): Promise<void> {
  if (req.method !== 'POST') {
    logEngineWarn('method_not_allowed', { route: 'analyzeFile', method: req.method });
    rejectMethod(res, 'POST');
    return;
  }

  const parsed = parseJsonBody(req.body);
  if (!parsed.ok) {
    res.status(parsed.errorStatus).json(parsed.errorBody);
    return;
  }

  const transport = validateAnalyzeFileTransport(parsed.request);
  if (!transport.ok) {
    logEngineWarn('transport_validation_failed_4xx', {
      route: 'analyzeFile',
      status: transport.errorStatus,
      error_body: transport.errorBody
    });
    res.status(transport.errorStatus).json(transport.errorBody);
    return;
  }

  const { file_id, file_name, sheet_name, format_name } = transport.request;

  let file: Buffer;
  try {
    file = await download(file_id);
  } catch (err) {
    logEngineError('file_download_failed', {
      file_id,
      message: err instanceof Error ? err.message : String(err)
    });
    res.status(502).json({
      error: 'Uploaded file could not be downloaded from file storage.',
      error_codes: [ErrorCodes.INVALID_FILE_PAYLOAD]
    });
    return;
  }

  try {
    const { response } = await analyzeUpload(file, file_name, config, {
      sheetName: sheet_name,
      formatName: format_name
    });
    logEngineInfo('analyze_file_completed_200', {
      file_id,
      sheet_count: response.sheet_count,
      ok_count: response.ok_count
    });
    res.status(200).json(response);
  } catch (err) {
    if (isEngineError(err)) {
      const status = statusForEngineError(err.code);
      logEngineWarn('analyze_file_rejected', { status, code: err.code, message: err.message });
      res.status(status).json({ error: err.message, error_codes: [err.code] });
      return;
    }
    logEngineError('analyze_file_unhandled_exception', {
      message: err instanceof Error ? err.message : String(err)
    });
    res.status(500).json({
      error: 'Internal analysis error.',
      error_codes: [ErrorCodes.INTERNAL_ENGINE_ERROR]
    });
  }
}

export default async function handler(req: HandlerRequest, res: HandlerResponse): Promise<void> {
  if (!process.env.OPENAI_API_KEY) {
    logEngineError('openai_key_missing', { route: 'analyzeFile' });
    res.status(500).json({
      error: 'File analysis is unavailable: OPENAI_API_KEY not set.',
      error_codes: [ErrorCodes.INTERNAL_ENGINE_ERROR]
    });
    return;
  }
  await handleAnalyzeFile(req, res, engineConfig, downloadOpenAiFile);
}
