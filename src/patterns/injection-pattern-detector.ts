/**
 * @module patterns/injection-pattern-detector
 * @description Weighted scoring of signs that SQL was built by string concatenation
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/constants.ts, src/patterns/data/safe-literals.json
 * @lastModified 2026-10-19
 *
 * Each sub-check is independent and adds a fixed weight (INJECTION_WEIGHTS)
 * to the risk level when it fires.
 */

import { INJECTION_WEIGHTS, SAFE_WORD_MAX_LENGTH } from '../constants';
import safeLiteralList from './data/safe-literals.json';

// ============================================================================
// Types
// ============================================================================

export interface InjectionRisk {
  riskLevel: number;
  indicators: string[];
}

export type InjectionCheck =
  | 'numeric_in_quotes'
  | 'injection_keywords'
  | 'comment_syntax'
  | 'consecutive_quotes'
  | 'unparameterized_like'
  | 'literal_in_where'
  | 'multiple_conditions';

// ============================================================================
// Constants
// ============================================================================

const SAFE_LITERALS: ReadonlySet<string> = new Set(safeLiteralList);

export const INDICATORS: Readonly<Record<InjectionCheck, string>> = {
  numeric_in_quotes: 'Numeric value in quotes (possible concatenation)',
  injection_keywords: 'SQL injection keywords detected in string',
  comment_syntax: 'SQL comment syntax in string value',
  consecutive_quotes: 'Consecutive quotes detected',
  unparameterized_like: 'LIKE clause without parameter',
  literal_in_where: 'WHERE clause with literal string instead of parameter',
  multiple_conditions: 'Multiple conditions with literal strings (possible injection)',
};

const PATTERNS = {
  keywordsInString: /'.*(?:UNION|--|#|\/\*).*'/i,
  tautology: /\b(?:OR|AND)\s+1\s*=\s*1\b/i,
  quotedTautology: /\b(?:OR|AND)\s+(['"])1\1\s*=\s*(['"])1\2/i,
  stringLiteral: /'((?:[^'\\]|\\.|'')*)'/g,
  commentInString: /['"].*(?:--|#|\/\*).*['"]/,
  consecutiveQuotes: /'{2,}|"{2,}/,
  where: /\bWHERE\b([\s\S]*)$/i,
  comparedLiteral: /(?:=|<>|!=|<=|>=|<|>|\bLIKE)\s*'((?:[^']|'')*)'/gi,
  likeLiteral: /\bLIKE\s+'((?:[^']|'')*)'/gi,
  anyQuoted: /['"]([^'"]*\d+[^'"]*)['"]/,
  uuid: /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i,
  date: /^\d{4}-\d{2}-\d{2}|^\d{2}\/\d{2}\/\d{4}/,
  time: /^\d{2}:\d{2}(?::\d{2})?$/,
  decimalOrVersion: /^\d+\.\d+(?:\.\d+)?$/,
  shortInteger: /^\d{1,10}$/,
} as const;

// ============================================================================
// Scoring
// ============================================================================

/**
 * Score the injection risk of one SQL string
 *
 * @example
 * detectInjectionRisk("SELECT * FROM t WHERE status = 'active'");
 * // { riskLevel: 0, indicators: [] }
 */
export function detectInjectionRisk(sql: string): InjectionRisk {
  const checks: Array<[InjectionCheck, boolean, number]> = [
    ['numeric_in_quotes', hasNumericValueInQuotes(sql), INJECTION_WEIGHTS.NUMERIC_IN_QUOTES],
    ['injection_keywords', hasSqlInjectionKeywords(sql), INJECTION_WEIGHTS.SQL_KEYWORDS],
    ['comment_syntax', hasCommentSyntaxInString(sql), INJECTION_WEIGHTS.COMMENT_SYNTAX],
    ['consecutive_quotes', hasConsecutiveQuotes(sql), INJECTION_WEIGHTS.CONSECUTIVE_QUOTES],
    ['unparameterized_like', hasUnparameterizedLike(sql), INJECTION_WEIGHTS.UNPARAMETERIZED_LIKE],
    ['literal_in_where', hasLiteralStringInWhere(sql), INJECTION_WEIGHTS.LITERAL_IN_WHERE],
    ['multiple_conditions', hasMultipleConditionsWithLiterals(sql), INJECTION_WEIGHTS.MULTIPLE_LITERAL_CONDITIONS],
  ];

  let riskLevel = 0;
  const indicators: string[] = [];
  for (const [check, fired, weight] of checks) {
    if (!fired) continue;
    riskLevel += weight;
    indicators.push(INDICATORS[check]);
  }

  return { riskLevel, indicators };
}

// ============================================================================
// Sub-checks
// ============================================================================

/**
 * A quoted literal containing digits that is not a UUID, date, time,
 * decimal or short integer
 */
export function hasNumericValueInQuotes(sql: string): boolean {
  const literals = whereLiterals(sql);
  if (literals.length > 0) {
    return literals.some(isSuspiciousNumericValue);
  }
  const quoted = PATTERNS.anyQuoted.exec(sql);
  return quoted !== null && isSuspiciousNumericValue(quoted[1]);
}

/**
 * UNION or comment markers inside quotes, `OR 1=1` inside a string literal,
 * or a quoted `OR '1'='1'`. A bare `WHERE 1=1 AND ...` from a query builder
 * does not count.
 */
export function hasSqlInjectionKeywords(sql: string): boolean {
  if (PATTERNS.keywordsInString.test(sql) || PATTERNS.quotedTautology.test(sql)) return true;
  for (const match of sql.matchAll(PATTERNS.stringLiteral)) {
    if (PATTERNS.tautology.test(match[1])) return true;
  }
  return false;
}

export function hasCommentSyntaxInString(sql: string): boolean {
  return PATTERNS.commentInString.test(sql);
}

export function hasConsecutiveQuotes(sql: string): boolean {
  return PATTERNS.consecutiveQuotes.test(sql);
}

/**
 * LIKE compared with a literal pattern containing a wildcard
 */
export function hasUnparameterizedLike(sql: string): boolean {
  for (const match of sql.matchAll(PATTERNS.likeLiteral)) {
    if (match[1].includes('%') || match[1].includes('_')) return true;
  }
  return false;
}

export function hasLiteralStringInWhere(sql: string): boolean {
  return whereLiterals(sql).some(isSuspiciousLiteralValue);
}

export function hasMultipleConditionsWithLiterals(sql: string): boolean {
  return whereLiterals(sql).filter(isSuspiciousLiteralValue).length >= 2;
}

// ============================================================================
// Literal Classification
// ============================================================================

/**
 * Enum-like values (allowlisted words, short lowercase words, empty) are
 * not suspicious
 */
export function isSafeLiteral(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === '') return true;
  if (SAFE_LITERALS.has(normalized)) return true;
  return normalized.length <= SAFE_WORD_MAX_LENGTH && /^[a-z]+$/.test(normalized);
}

function isSuspiciousLiteralValue(value: string): boolean {
  return !isSafeLiteral(value);
}

function isSuspiciousNumericValue(value: string): boolean {
  if (!/\d/.test(value)) return false;
  if (PATTERNS.uuid.test(value)) return false;
  if (PATTERNS.date.test(value)) return false;
  if (PATTERNS.time.test(value)) return false;
  if (PATTERNS.decimalOrVersion.test(value)) return false;
  if (PATTERNS.shortInteger.test(value)) return false;
  return true;
}

/**
 * Quoted values compared in the WHERE clause, unescaped
 */
function whereLiterals(sql: string): string[] {
  const where = PATTERNS.where.exec(sql);
  if (!where) return [];
  return Array.from(where[1].matchAll(PATTERNS.comparedLiteral), match => match[1].replace(/''/g, "'"));
}
