// engine/regex.ts
// Centralized regular expressions for the T12 KPI engine

// ------------------------------------------------------------
// Period header labels
// ------------------------------------------------------------

// Month names, short or long ("Sep", "Sept", "September")
const MONTH_NAME =
  '(jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)';

// Text month + year: "Jul 2024", "Jul-24", "July 2024", "Jul/2024", "Jul. 2024"
export const PERIOD_TEXT_MONTH_YEAR = new RegExp(`^${MONTH_NAME}\\.?[\\s\\-/]*(\\d{4}|\\d{2})$`, 'i');

// Strict T12 monthly report header: "Jul 2024"
export const PERIOD_MON_YYYY = /^[A-Za-z]{3} \d{4}$/;

// ISO: 2024-07 or 2024-07-31 (optionally with a time part)
export const PERIOD_ISO = /^(\d{4})-(\d{1,2})(?:-(\d{1,2}))?(?:[T\s].*)?$/;

// US numeric: 07/31/2024 or 7/31/24
export const PERIOD_US_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4}|\d{2})$/;

// Trailing "Actual" / "Actuals" qualifier on a month header
export const PERIOD_ACTUAL_SUFFIX = /\s+actuals?$/i;

// YTD markers: "YTD", "YTD Actual", "Year to Date", "YTD Jun 2024"
export const YTD_MARKER = /^(?:ytd|year[\s-]*to[\s-]*date)\b[\s:\-]*/i;

// Budget header label ("Budget", "YTD Budget")
export const BUDGET_LABEL = /\bbudget\b/i;

// ------------------------------------------------------------
// Money cells
// ------------------------------------------------------------

// Plain signed decimal after currency symbols / separators are stripped
export const PLAIN_DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:e[+-]?\d+)?$/i;

// Currency symbols accepted in front of (or inside) amounts
export const CURRENCY_SYMBOLS = /[$€£]/g;

// Accounting zero ("-", "—")
export const ACCOUNTING_ZERO = /^[-\u2012\u2013\u2014]$/;

// ------------------------------------------------------------
// Sheet names
// ------------------------------------------------------------

// "Maple Court - CRES" → "Maple Court"
export const CRES_SHEET_SUFFIX = /\s*-?\s*CRES$/i;

// "Maple Court-Fin" / "Maple Court-Bgt"
export const FIN_SHEET_SUFFIX = /-Fin$/;
export const BGT_SHEET_SUFFIX = /-Bgt$/;

// ------------------------------------------------------------
// Narrative structure
// ------------------------------------------------------------

export const MARKDOWN_HEADER = /^#{1,3}\s+\S/m;
export const BOLD_HEADER = /\*\*[A-Z][A-Z\s&]+\*\*/;
export const LIST_ITEM = /^\s*(?:\d+\.|[-*\u2022])\s+/m;
