// engine/outputQuality.ts
// Structural quality gate for narratives written against a KpiSummary.
//
// Checks only shape: required section markers, a mention of each expected
// metric, and a minimum length. It does not judge whether the prose is right.

import type { KpiSummary, QualityLevel, QualityReport } from './types';
import type { ErrorCode } from './errorCodes';
import { ErrorCodes } from './errorCodes';
import { DEFAULT_ENGINE_SETTINGS } from './config';
import { normalizeWhitespace, roundTo } from './normalizeFields';
import { BOLD_HEADER, LIST_ITEM, MARKDOWN_HEADER } from './regex';

export interface ValidateNarrativeOptions {
  requiredSections?: readonly string[];
  minLength?: number;
  /** 0..1 */
  passScore?: number;
}

// ------------------------------------------------------------
// Dimension scoring
// ------------------------------------------------------------

const DIMENSION_WEIGHTS = {
  completeness: 0.3,
  structure: 0.25,
  relevance: 0.25,
  actionability: 0.2
} as const;

const SECTION_KEYWORDS = ['QUESTION', 'RECOMMEND', 'CONCERN', 'TREND', 'RISK', 'INSIGHT'];

const RELEVANCE_KEYWORDS = [
  'rent',
  'occupancy',
  'vacancy',
  'noi',
  'revenue',
  'expense',
  'tenant',
  'lease',
  'property',
  'cash flow',
  'delinquency',
  'collection',
  'maintenance',
  'management',
  'market'
];

const ACTION_KEYWORDS = [
  'implement',
  'analyze',
  'review',
  'investigate',
  'improve',
  'reduce',
  'increase',
  'optimize',
  'monitor',
  'evaluate',
  'focus',
  'consider',
  'develop',
  'establish',
  'track'
];

const COMPLETENESS_MIN_CHARS = 100;
const STRUCTURE_LENGTH_RANGE = [200, 2000] as const;

function countFound(haystack: string, needles: readonly string[]): number {
  return needles.filter((n) => haystack.includes(n)).length;
}

export function scoreCompleteness(text: string): number {
  if (text.trim().length < COMPLETENESS_MIN_CHARS) return 0;
  const found = countFound(text.toUpperCase(), SECTION_KEYWORDS);
  return roundTo(Math.min(100, (found / SECTION_KEYWORDS.length) * 100), 1);
}

export function scoreStructure(text: string): number {
  let score = 0;
  if (BOLD_HEADER.test(text) || MARKDOWN_HEADER.test(text)) score += 40;
  if (LIST_ITEM.test(text)) score += 40;
  if (text.length >= STRUCTURE_LENGTH_RANGE[0] && text.length <= STRUCTURE_LENGTH_RANGE[1]) score += 20;
  return score;
}

export function scoreRelevance(text: string): number {
  const found = countFound(text.toLowerCase(), RELEVANCE_KEYWORDS);
  return roundTo(Math.min(100, (found / RELEVANCE_KEYWORDS.length) * 200), 1);
}

export function scoreActionability(text: string): number {
  const found = countFound(text.toLowerCase(), ACTION_KEYWORDS);
  return roundTo(Math.min(100, (found / ACTION_KEYWORDS.length) * 300), 1);
}

export function qualityLevelOf(overall: number): QualityLevel {
  if (overall >= 85) return 'Excellent';
  if (overall >= 70) return 'Good';
  if (overall >= 55) return 'Fair';
  return 'Poor';
}

function improvementHints(scores: QualityReport['dimension_scores']): string[] {
  const hints: string[] = [];
  if (scores.completeness < 70) hints.push('Include more comprehensive analysis covering all key areas');
  if (scores.structure < 70) hints.push('Improve formatting with clear headers and bullet points');
  if (scores.relevance < 70) hints.push('Focus more on property-specific financial metrics and terminology');
  if (scores.actionability < 70) hints.push('Provide more specific, actionable recommendations');
  return hints;
}

// ------------------------------------------------------------
// Gate
// ------------------------------------------------------------

/** Metric names the narrative is expected to mention. */
export function expectedKeywordsFor(summary: Pick<KpiSummary, 'key_metrics' | 'current_period'>): string[] {
  return summary.key_metrics.length > 0 ? [...summary.key_metrics] : Object.keys(summary.current_period);
}

/**
 * passed = long enough, every required section present, and the share of
 * satisfied checks (sections + keywords + length) at or above passScore.
 */
export function validateNarrative(
  text: string,
  expectedKeywords: readonly string[],
  options: ValidateNarrativeOptions = {}
): QualityReport {
  const requiredSections = options.requiredSections ?? DEFAULT_ENGINE_SETTINGS.requiredSections;
  const minLength = options.minLength ?? DEFAULT_ENGINE_SETTINGS.qualityMinLength;
  const passScore = options.passScore ?? DEFAULT_ENGINE_SETTINGS.qualityPassScore;

  const normalized = normalizeWhitespace(text);
  const upper = normalized.toUpperCase();
  const lower = normalized.toLowerCase();

  const missingSections = requiredSections.filter((s) => !upper.includes(normalizeWhitespace(s).toUpperCase()));
  const keywords = [...new Set(expectedKeywords.map(normalizeWhitespace).filter(Boolean))];
  const missingKeywords = keywords.filter((k) => !lower.includes(k.toLowerCase()));
  const tooShort = normalized.length < minLength;

  const codes: ErrorCode[] = [];
  if (missingSections.length > 0) codes.push(ErrorCodes.QUALITY_MISSING_SECTION);
  if (missingKeywords.length > 0) codes.push(ErrorCodes.QUALITY_MISSING_KEYWORD);
  if (tooShort) codes.push(ErrorCodes.QUALITY_TOO_SHORT);

  const totalChecks = requiredSections.length + keywords.length + 1;
  const failedChecks = missingSections.length + missingKeywords.length + (tooShort ? 1 : 0);
  const score = roundTo((totalChecks - failedChecks) / totalChecks, 4);

  const dimension_scores = {
    completeness: scoreCompleteness(text),
    structure: scoreStructure(text),
    relevance: scoreRelevance(text),
    actionability: scoreActionability(text)
  };
  const overall = roundTo(
    dimension_scores.completeness * DIMENSION_WEIGHTS.completeness +
      dimension_scores.structure * DIMENSION_WEIGHTS.structure +
      dimension_scores.relevance * DIMENSION_WEIGHTS.relevance +
      dimension_scores.actionability * DIMENSION_WEIGHTS.actionability,
    1
  );

  return {
    passed: !tooShort && missingSections.length === 0 && score >= passScore,
    missing: [...missingSections, ...missingKeywords],
    score,
    codes,
    overall_score: overall,
    quality_level: qualityLevelOf(overall),
    dimension_scores,
    recommendations: improvementHints(dimension_scores)
  };
}

// ------------------------------------------------------------
// Section extraction
// ------------------------------------------------------------

export interface NarrativeSections {
  questions: string[];
  recommendations: string[];
  concerns: string[];
  insights: string[];
  risks: string[];
}

type SectionKey = keyof NarrativeSections;

function sectionForHeader(header: string): SectionKey | null {
  const h = header.toUpperCase();
  if (h.includes('QUESTION') && (h.includes('STRATEGIC') || h.includes('MANAGEMENT'))) return 'questions';
  if (h.includes('RECOMMENDATION') || h.includes('ACTIONABLE')) return 'recommendations';
  if (h.includes('CONCERN') || h.includes('TREND') || h.includes('RED FLAG') || h.includes('IMMEDIATE ATTENTION')) {
    return 'concerns';
  }
  if (h.includes('OBSERVATION') || h.includes('INSIGHT')) return 'insights';
  if (h.includes('RISK')) return 'risks';
  return null;
}

const HEADER_LINE = /^(?:#{1,6}\s*.+|\*\*[^*]+\*\*:?)$/;
const NUMBERED_PREFIX = /^\d+\.\s+/;
const BULLET_PREFIX = /^[-*•]\s+/;

/** List items under each recognised "## ..." or "**...**" header. */
export function extractNarrativeSections(text: string): NarrativeSections {
  const sections: NarrativeSections = { questions: [], recommendations: [], concerns: [], insights: [], risks: [] };
  let current: SectionKey | null = null;

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();
    if (!line) continue;

    if (HEADER_LINE.test(line)) {
      current = sectionForHeader(line);
      continue;
    }
    if (!current || !(NUMBERED_PREFIX.test(line) || BULLET_PREFIX.test(line))) continue;

    const cleaned = line
      .replace(NUMBERED_PREFIX, '')
      .replace(BULLET_PREFIX, '')
      .replace(/\*\*(.*?)\*\*/g, '$1')
      .trim();
    if (cleaned) sections[current].push(cleaned);
  }

  return sections;
}
