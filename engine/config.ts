// engine/config.ts
// Static configuration for the T12 KPI engine: format descriptors + tunable settings.

import formatDescriptorsJson from '../data/format_descriptors.json';
import { EngineError, ErrorCodes } from './errorCodes';
import { logEngineWarn } from './logger';

export type SignConvention = 'negative' | 'positive';

/**
 * FormatDescriptor – static metadata for one supported layout.
 * Loaded once at startup and frozen.
 */
export interface FormatDescriptor {
  name: string;
  description: string;

  /** 1-based fixed header row, or null when the header is located by scanning. */
  header_row: number | null;
  header_scan_rows: number;
  min_period_columns: number;

  /** How this layout reports expense lines. */
  expense_sign: SignConvention;
  /** Per-metric overrides of expense_sign (contra-revenue lines etc.). */
  metric_signs: Record<string, SignConvention>;

  detection_keywords: string[];

  income_metric: string;
  noi_metric: string;
  expense_metrics: string[];

  /** alias label → canonical metric name */
  metric_aliases: Record<string, string>;
  expected_metrics: string[];
  metric_categories: Record<string, string[]>;
}

export interface EngineSettings {
  /** A processor must score strictly above this to be selected. */
  detectionThreshold: number;
  /** Allowed |sum(monthly) - YTD| before a YTD identity warning is raised. */
  ytdTolerance: number;
  qualityMinLength: number;
  /** 0..1 score a narrative needs to pass the quality gate. */
  qualityPassScore: number;
  requiredSections: readonly string[];
}

export const DEFAULT_ENGINE_SETTINGS: EngineSettings = {
  detectionThreshold: 0.5,
  ytdTolerance: 0.01,
  qualityMinLength: 200,
  qualityPassScore: 0.6,
  requiredSections: ['KEY PERFORMANCE INSIGHTS', 'CONCERNING TRENDS', 'RECOMMENDATIONS']
};

// ------------------------------------------------------------
// Descriptor loading
// ------------------------------------------------------------

function fail(message: string): never {
  throw new EngineError(ErrorCodes.REGISTRY_MISCONFIGURED, message);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(obj: Record<string, unknown>, key: string, where: string): string {
  const v = obj[key];
  if (typeof v !== 'string' || v.trim() === '') fail(`${where}: "${key}" must be a non-empty string`);
  return v;
}

function readNumber(obj: Record<string, unknown>, key: string, where: string): number {
  const v = obj[key];
  if (typeof v !== 'number' || !Number.isFinite(v)) fail(`${where}: "${key}" must be a number`);
  return v;
}

function readStringList(obj: Record<string, unknown>, key: string, where: string): string[] {
  const v = obj[key];
  if (!Array.isArray(v) || v.some((s) => typeof s !== 'string')) {
    fail(`${where}: "${key}" must be an array of strings`);
  }
  return v.map(String);
}

function readStringMap(obj: Record<string, unknown>, key: string, where: string): Record<string, string> {
  const v = obj[key];
  if (!isRecord(v)) fail(`${where}: "${key}" must be an object`);
  const out: Record<string, string> = {};
  for (const [k, val] of Object.entries(v)) {
    if (typeof val !== 'string') fail(`${where}: "${key}.${k}" must be a string`);
    out[k] = val;
  }
  return out;
}

function readSign(value: unknown, where: string): SignConvention {
  if (value === 'negative' || value === 'positive') return value;
  return fail(`${where}: sign must be "negative" or "positive"`);
}

export function parseFormatDescriptor(raw: unknown): FormatDescriptor {
  if (!isRecord(raw)) fail('format descriptor must be an object');
  const name = readString(raw, 'name', 'format descriptor');
  const where = `format "${name}"`;

  let headerRow: number | null = null;
  if (typeof raw.header_row === 'number' && raw.header_row >= 1) {
    headerRow = raw.header_row;
  } else if (raw.header_row !== null) {
    fail(`${where}: "header_row" must be null or a 1-based row number`);
  }

  const metricSigns: Record<string, SignConvention> = {};
  for (const [metric, sign] of Object.entries(readStringMap(raw, 'metric_signs', where))) {
    metricSigns[metric] = readSign(sign, `${where} metric_signs.${metric}`);
  }

  const categoriesRaw = raw.metric_categories;
  if (!isRecord(categoriesRaw)) fail(`${where}: "metric_categories" must be an object`);
  const categories: Record<string, string[]> = {};
  for (const category of Object.keys(categoriesRaw)) {
    categories[category] = readStringList(categoriesRaw, category, `${where} metric_categories`);
  }

  return {
    name,
    description: readString(raw, 'description', where),
    header_row: headerRow,
    header_scan_rows: readNumber(raw, 'header_scan_rows', where),
    min_period_columns: readNumber(raw, 'min_period_columns', where),
    expense_sign: readSign(raw.expense_sign, where),
    metric_signs: metricSigns,
    detection_keywords: readStringList(raw, 'detection_keywords', where),
    income_metric: readString(raw, 'income_metric', where),
    noi_metric: readString(raw, 'noi_metric', where),
    expense_metrics: readStringList(raw, 'expense_metrics', where),
    metric_aliases: readStringMap(raw, 'metric_aliases', where),
    expected_metrics: readStringList(raw, 'expected_metrics', where),
    metric_categories: categories
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const inner of Object.values(value)) deepFreeze(inner);
    Object.freeze(value);
  }
  return value;
}

export function loadFormatDescriptors(raw: unknown = formatDescriptorsJson): ReadonlyMap<string, FormatDescriptor> {
  const formats: unknown = isRecord(raw) ? raw.formats : undefined;
  if (!Array.isArray(formats)) {
    fail('format descriptor file must contain a "formats" array');
  }

  const map = new Map<string, FormatDescriptor>();
  for (const entry of formats) {
    const descriptor = deepFreeze(parseFormatDescriptor(entry));
    if (map.has(descriptor.name)) fail(`duplicate format descriptor "${descriptor.name}"`);
    map.set(descriptor.name, descriptor);
  }
  return map;
}

// ------------------------------------------------------------
// Settings (env overrides)
// ------------------------------------------------------------

function envNumber(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
  min: number,
  max: number
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < min || n > max) {
    logEngineWarn('invalid_env_setting', { key, value: raw, fallback });
    return fallback;
  }
  return n;
}

export function loadEngineSettings(env: NodeJS.ProcessEnv = process.env): EngineSettings {
  return {
    ...DEFAULT_ENGINE_SETTINGS,
    detectionThreshold: envNumber(env, 'T12_DETECTION_THRESHOLD', DEFAULT_ENGINE_SETTINGS.detectionThreshold, 0, 1),
    qualityMinLength: envNumber(env, 'T12_QUALITY_MIN_LENGTH', DEFAULT_ENGINE_SETTINGS.qualityMinLength, 0, 100_000),
    qualityPassScore: envNumber(env, 'T12_QUALITY_PASS_SCORE', DEFAULT_ENGINE_SETTINGS.qualityPassScore, 0, 1)
  };
}
