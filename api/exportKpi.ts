// api/exportKpi.ts
// POST /api/exportKpi
// Body: as /api/analyze, plus store?: boolean
//   store = false → KPI_Export.xlsx as an attachment
//   store = true  → uploaded to Vercel Blob under kpi-exports/, URL returned
//
// Stored exports are removed by /api/cron/cleanupKpiExports after two hours.

import crypto from 'node:crypto';
import { put } from '@vercel/blob';
import { ErrorCodes, isEngineError } from '../engine/errorCodes';
import { analyzeUpload, statusForEngineError } from '../engine/analyzeUpload';
import { getDefaultEngineConfig, type EngineConfig } from '../engine/engineConfig';
import { buildKpiExportWorkbook, XLSX_CONTENT_TYPE } from '../engine/kpiWorkbook';
import { parseJsonBody, validateExportTransport } from '../engine/validateTransport';
import { rejectMethod, type HandlerRequest, type HandlerResponse } from '../engine/httpTypes';
import { logEngineError, logEngineInfo, logEngineWarn } from '../engine/logger';

// Built when the module loads: a misconfigured registry (E701) fails the cold start.
export const engineConfig = getDefaultEngineConfig();

export const KPI_EXPORTS_PREFIX = 'kpi-exports/';

export type BlobUploader = (pathname: string, body: Buffer) => Promise<{ url: string }>;

export async function uploadToBlob(pathname: string, body: Buffer): Promise<{ url: string }> {
  const blob = await put(pathname, body, {
    access: 'public',
    contentType: XLSX_CONTENT_TYPE,
    addRandomSuffix: false
  });
  return { url: blob.url };
}

/** 2024-07-01T10:20:30.123Z → 2024-07-01T10-20-30Z */
export function toSafeIsoTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z').replace(/:/g, '-');
}

export async function handleExportKpi(
  req: HandlerRequest,
  res: HandlerResponse,
  config: EngineConfig,
  upload: BlobUploader,
  now: () => Date = () => new Date()
): Promise<void> {
  if (req.method !== 'POST') {
    rejectMethod(res, 'POST');
    return;
  }

  const parsed = parseJsonBody(req.body);
  if (!parsed.ok) {
    res.status(parsed.errorStatus).json(parsed.errorBody);
    return;
  }

  const transport = validateExportTransport(parsed.request);
  if (!transport.ok) {
    logEngineWarn('transport_validation_failed_4xx', {
      route: 'exportKpi',
      status: transport.errorStatus,
      error_body: transport.errorBody
    });
    res.status(transport.errorStatus).json(transport.errorBody);
    return;
  }

  const { file, file_name, sheet_name, format_name, store } = transport.request;
  const stamp = now();
  const dateISO = stamp.toISOString().slice(0, 10);

  let xlsx: Buffer;
  let okCount: number;
  try {
    const { results, response } = await analyzeUpload(file, file_name, config, {
      sheetName: sheet_name,
      formatName: format_name
    });
    xlsx = await buildKpiExportWorkbook(results, dateISO);
    okCount = response.ok_count;
  } catch (err) {
    if (isEngineError(err)) {
      const status = statusForEngineError(err.code);
      res.status(status).json({ error: err.message, error_codes: [err.code] });
      return;
    }
    logEngineError('export_unhandled_exception', {
      message: err instanceof Error ? err.message : String(err)
    });
    res.status(500).json({
      error: 'Failed to generate KPI export workbook.',
      error_codes: [ErrorCodes.INTERNAL_ENGINE_ERROR]
    });
    return;
  }

  const fileName = `KPI_Export_${dateISO}.xlsx`;

  if (!store) {
    logEngineInfo('export_download_200', { file_name, ok_count: okCount, bytes: xlsx.length });
    res.setHeader('Content-Type', XLSX_CONTENT_TYPE);
    res.setHeader('Content-Disposition', `attachment; filename="${fileName}"`);
    res.status(200).send(xlsx);
    return;
  }

  const pathname = `${KPI_EXPORTS_PREFIX}${toSafeIsoTimestamp(stamp)}_${crypto.randomUUID()}.xlsx`;
  try {
    const blob = await upload(pathname, xlsx);
    logEngineInfo('export_stored_200', { pathname, ok_count: okCount });
    res.status(200).json({
      download_url: blob.url,
      ok_count: okCount,
      ui_message: `KPI export is ready. Click the link to download ${fileName}.`
    });
  } catch (err) {
    logEngineError('export_blob_upload_failed', {
      pathname,
      message: err instanceof Error ? err.message : String(err)
    });
    res.status(500).json({
      error: 'Export was built but could not be stored for download.',
      error_codes: [ErrorCodes.INTERNAL_ENGINE_ERROR]
    });
  }
}

export default async function handler(req: HandlerRequest, res: HandlerResponse): Promise<void> {
  await handleExportKpi(req, res, engineConfig, uploadToBlob);
}
