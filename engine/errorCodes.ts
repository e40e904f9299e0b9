// engine/errorCodes.ts
// Canonical error codes for the T12 KPI engine
//
// Code ranges:
//
//  E100–E199 → Fatal layout / format errors (no CanonicalTable produced)
//  E200–E299 → KPI computation errors (CanonicalTable stays valid)
//  E300–E399 → Non-fatal parse warnings (collected, never thrown)
//  E400–E499 → Output quality gate findings (non-fatal)
//  E600–E699 → JSON / transport issues (API layer)
//  E700–E799 → Startup configuration errors

// NOTE:
// - E1xx / E2xx / E6xx / E7xx are raised as EngineError.
// - E3xx / E4xx are data: they travel beside a usable result and never abort a run.

export const ErrorCodes = {
  // 1xx – fatal layout / format
  LAYOUT_MISMATCH: 'E101',
  FORMAT_UNKNOWN: 'E102',
  EMPTY_SHEET: 'E103',

  // 2xx – KPI computation
  AMBIGUOUS_PERIOD: 'E201',
  NO_MONTHLY_DATA: 'E202',
  CALCULATOR_MISSING: 'E203',

  // 3xx – parse warnings
  UNMAPPED_METRIC: 'E301',
  NON_NUMERIC_CELL: 'E302',
  DUPLICATE_FACT: 'E303',
  DUPLICATE_PERIOD_COLUMN: 'E304',
  UNPARSEABLE_PERIOD_HEADER: 'E305',
  BUDGET_WITHOUT_ACTUAL: 'E306',
  YTD_IDENTITY_MISMATCH: 'E307',
  NOI_MISMATCH: 'E308',

  // 4xx – quality gate
  QUALITY_MISSING_SECTION: 'E401',
  QUALITY_MISSING_KEYWORD: 'E402',
  QUALITY_TOO_SHORT: 'E403',

  // 6xx – transport
  INVALID_JSON_BODY: 'E601',
  INVALID_REQUEST_STRUCTURE: 'E602',
  INVALID_FILE_PAYLOAD: 'E603',
  WORKBOOK_UNREADABLE: 'E604',
  INTERNAL_ENGINE_ERROR: 'E607',

  // 7xx – configuration
  REGISTRY_MISCONFIGURED: 'E701'
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export const ErrorCodeDescriptions: Record<ErrorCode, string> = {
  [ErrorCodes.LAYOUT_MISMATCH]: 'No header row with recognizable period labels was found.',
  [ErrorCodes.FORMAT_UNKNOWN]: 'The sheet does not match any registered format.',
  [ErrorCodes.EMPTY_SHEET]: 'The sheet has no data rows with numeric values.',

  [ErrorCodes.AMBIGUOUS_PERIOD]: 'More than one period column resolves to the most recent month.',
  [ErrorCodes.NO_MONTHLY_DATA]: 'The table has no monthly (non-YTD) records.',
  [ErrorCodes.CALCULATOR_MISSING]: 'No KPI calculator is registered for the detected format.',

  [ErrorCodes.UNMAPPED_METRIC]: 'Metric label is not in the format alias table and was kept verbatim.',
  [ErrorCodes.NON_NUMERIC_CELL]: 'Cell holds a non-numeric value and was skipped.',
  [ErrorCodes.DUPLICATE_FACT]: 'Duplicate metric/period fact; the first occurrence was kept.',
  [ErrorCodes.DUPLICATE_PERIOD_COLUMN]: 'Two header columns resolve to the same period.',
  [ErrorCodes.UNPARSEABLE_PERIOD_HEADER]: 'Header cell looks like a period but could not be parsed.',
  [ErrorCodes.BUDGET_WITHOUT_ACTUAL]: 'Budget figures without a matching actual were not recorded.',
  [ErrorCodes.YTD_IDENTITY_MISMATCH]: 'Monthly values do not sum to the reported YTD figure.',
  [ErrorCodes.NOI_MISMATCH]: 'Derived NOI differs from the reported NOI line.',

  [ErrorCodes.QUALITY_MISSING_SECTION]: 'Narrative is missing a required section.',
  [ErrorCodes.QUALITY_MISSING_KEYWORD]: 'Narrative never mentions an expected metric.',
  [ErrorCodes.QUALITY_TOO_SHORT]: 'Narrative is shorter than the minimum length.',

  [ErrorCodes.INVALID_JSON_BODY]: 'Request body is not valid JSON.',
  [ErrorCodes.INVALID_REQUEST_STRUCTURE]: 'Request structure is invalid or not a non-null object.',
  [ErrorCodes.INVALID_FILE_PAYLOAD]: 'File payload is missing or not valid base64.',
  [ErrorCodes.WORKBOOK_UNREADABLE]: 'Uploaded file could not be read as a workbook.',
  [ErrorCodes.INTERNAL_ENGINE_ERROR]: 'Internal backend processing failure.',

  [ErrorCodes.REGISTRY_MISCONFIGURED]: 'Format and KPI registries are not paired one-to-one.'
};

/** Messages shown to end users for fatal outcomes. */
export const USER_MESSAGES: Partial<Record<ErrorCode, string>> = {
  [ErrorCodes.LAYOUT_MISMATCH]: 'File could not be parsed: no month header row was found.',
  [ErrorCodes.FORMAT_UNKNOWN]: 'Format not recognized. Upload a supported T12 statement.',
  [ErrorCodes.EMPTY_SHEET]: 'File could not be parsed: the sheet contains no figures.',
  [ErrorCodes.AMBIGUOUS_PERIOD]: 'KPIs could not be computed: the latest month appears in more than one column.',
  [ErrorCodes.NO_MONTHLY_DATA]: 'KPIs could not be computed: the sheet has no monthly figures.'
};

export interface ErrorContext {
  sheet?: string;
  row?: number;
  column?: number;
  format?: string;
}

export class EngineError extends Error {
  readonly code: ErrorCode;
  readonly context: ErrorContext;

  constructor(code: ErrorCode, message: string, context: ErrorContext = {}) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = context;
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}

export function describeError(code: ErrorCode): string {
  return USER_MESSAGES[code] ?? ErrorCodeDescriptions[code];
}
