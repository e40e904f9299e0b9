// engine/validateTransport.ts
// Transport-level validation for the HTTP handlers.
//
// Responsibilities:
//  - Parse the JSON body (string or pre-parsed object)
//  - Check the top-level shape of each request type and decode file payloads
//  - Do NOT run the pipeline or look at workbook contents

import { ErrorCodes, type ErrorCode } from './errorCodes';
import type { KpiSummary } from './types';

/** Base64 text length accepted for an inline upload (~7.5 MB decoded). */
export const MAX_FILE_BASE64_CHARS = 10_000_000;

export interface TransportErrorBody {
  error: string;
  error_codes: ErrorCode[];
}

export type TransportValidationResult<T> =
  | { ok: true; request: T }
  | { ok: false; errorStatus: number; errorBody: TransportErrorBody };

export interface AnalyzeRequest {
  file: Buffer;
  file_name: string;
  sheet_name?: string;
  format_name?: string;
}

export interface ExportRequest extends AnalyzeRequest {
  store: boolean;
}

export interface AnalyzeFileRequest {
  file_id: string;
  file_name: string;
  sheet_name?: string;
  format_name?: string;
}

export type SummaryKeywordSource = Pick<KpiSummary, 'key_metrics' | 'current_period'>;

export interface QualityCheckRequest {
  narrative: string;
  expected_keywords?: string[];
  format_name?: string;
  summary?: SummaryKeywordSource;
}

function reject<T>(status: number, error: string, code: ErrorCode): TransportValidationResult<T> {
  return { ok: false, errorStatus: status, errorBody: { error, error_codes: [code] } };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined | null {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

/**
 * JSON body → object. Vercel hands over either a parsed object or the raw
 * string, depending on the request content type.
 */
export function parseJsonBody(raw: unknown): TransportValidationResult<Record<string, unknown>> {
  let body: unknown = raw;
  if (typeof raw === 'string') {
    try {
      body = JSON.parse(raw);
    } catch {
      return reject(400, 'Invalid JSON body.', ErrorCodes.INVALID_JSON_BODY);
    }
  }
  if (!isPlainObject(body)) {
    return reject(400, 'Invalid request structure.', ErrorCodes.INVALID_REQUEST_STRUCTURE);
  }
  return { ok: true, request: body };
}

const BASE64_BODY = /^[A-Za-z0-9+/]+={0,2}$/;

/** Accepts standard or url-safe base64, with or without padding and line breaks. */
export function decodeBase64File(value: string): Buffer | null {
  let base64 = value.replace(/\s+/g, '').replace(/-/g, '+').replace(/_/g, '/');
  const comma = base64.indexOf(',');
  if (base64.startsWith('data:') && comma !== -1) base64 = base64.slice(comma + 1);

  const pad = base64.length % 4;
  if (pad === 1) return null;
  if (pad === 2) base64 += '==';
  else if (pad === 3) base64 += '=';

  if (!BASE64_BODY.test(base64)) return null;
  const buffer = Buffer.from(base64, 'base64');
  return buffer.length > 0 ? buffer : null;
}

interface SelectorFields {
  sheet_name?: string;
  format_name?: string;
}

function readSelectors(body: Record<string, unknown>): SelectorFields | null {
  const sheet_name = optionalString(body.sheet_name);
  const format_name = optionalString(body.format_name);
  if (sheet_name === null || format_name === null) return null;

  const fields: SelectorFields = {};
  if (sheet_name !== undefined) fields.sheet_name = sheet_name;
  if (format_name !== undefined) fields.format_name = format_name;
  return fields;
}

export function validateAnalyzeTransport(body: Record<string, unknown>): TransportValidationResult<AnalyzeRequest> {
  const { file_base64 } = body;
  if (typeof file_base64 !== 'string' || file_base64.trim() === '') {
    return reject(400, 'file_base64 is required and must be a string.', ErrorCodes.INVALID_FILE_PAYLOAD);
  }
  if (file_base64.length > MAX_FILE_BASE64_CHARS) {
    return reject(413, 'Uploaded file is too large.', ErrorCodes.INVALID_FILE_PAYLOAD);
  }

  const file = decodeBase64File(file_base64);
  if (!file) {
    return reject(400, 'file_base64 is not valid base64.', ErrorCodes.INVALID_FILE_PAYLOAD);
  }

  const file_name = optionalString(body.file_name);
  const selectors = readSelectors(body);
  if (file_name === null || !selectors) {
    return reject(400, 'file_name, sheet_name and format_name must be strings.', ErrorCodes.INVALID_REQUEST_STRUCTURE);
  }

  return { ok: true, request: { file, file_name: file_name ?? 'upload.xlsx', ...selectors } };
}

export function validateExportTransport(body: Record<string, unknown>): TransportValidationResult<ExportRequest> {
  const analyze = validateAnalyzeTransport(body);
  if (!analyze.ok) return analyze;

  if (body.store !== undefined && typeof body.store !== 'boolean') {
    return reject(400, 'store must be a boolean.', ErrorCodes.INVALID_REQUEST_STRUCTURE);
  }
  return { ok: true, request: { ...analyze.request, store: body.store === true } };
}

export function validateAnalyzeFileTransport(body: Record<string, unknown>): TransportValidationResult<AnalyzeFileRequest> {
  const file_id = optionalString(body.file_id);
  if (!file_id) {
    return reject(400, 'file_id is required and must be a string.', ErrorCodes.INVALID_FILE_PAYLOAD);
  }

  const file_name = optionalString(body.file_name);
  const selectors = readSelectors(body);
  if (file_name === null || !selectors) {
    return reject(400, 'file_name, sheet_name and format_name must be strings.', ErrorCodes.INVALID_REQUEST_STRUCTURE);
  }

  return { ok: true, request: { file_id, file_name: file_name ?? 'upload.xlsx', ...selectors } };
}

function readSummary(value: unknown): SummaryKeywordSource | null {
  if (!isPlainObject(value)) return null;
  const { key_metrics, current_period } = value;
  if (!Array.isArray(key_metrics) || !isPlainObject(current_period)) return null;

  const metrics = key_metrics.filter((m): m is string => typeof m === 'string');
  const current: Record<string, number> = {};
  for (const [metric, v] of Object.entries(current_period)) {
    if (typeof v === 'number' && Number.isFinite(v)) current[metric] = v;
  }
  return { key_metrics: metrics, current_period: current };
}

export function validateQualityCheckTransport(body: Record<string, unknown>): TransportValidationResult<QualityCheckRequest> {
  const { narrative, expected_keywords, summary } = body;
  if (typeof narrative !== 'string') {
    return reject(400, 'narrative is required and must be a string.', ErrorCodes.INVALID_REQUEST_STRUCTURE);
  }

  const request: QualityCheckRequest = { narrative };

  if (expected_keywords !== undefined) {
    if (!Array.isArray(expected_keywords) || !expected_keywords.every((k) => typeof k === 'string')) {
      return reject(400, 'expected_keywords must be an array of strings.', ErrorCodes.INVALID_REQUEST_STRUCTURE);
    }
    request.expected_keywords = expected_keywords.filter((k): k is string => typeof k === 'string');
  }

  if (summary !== undefined) {
    const parsed = readSummary(summary);
    if (!parsed) {
      return reject(400, 'summary must carry key_metrics and current_period.', ErrorCodes.INVALID_REQUEST_STRUCTURE);
    }
    request.summary = parsed;
  }

  const format_name = optionalString(body.format_name);
  if (format_name === null) {
    return reject(400, 'format_name must be a string.', ErrorCodes.INVALID_REQUEST_STRUCTURE);
  }
  if (format_name !== undefined) request.format_name = format_name;

  return { ok: true, request };
}
