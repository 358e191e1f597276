/**
 * @module output/formatters/redaction
 * @description Mask SQL literals and personal data in report output
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies none
 * @lastModified 2026-10-19
 */

import type { OutputIssue } from './types';

// ============================================================================
// Redaction Patterns
// ============================================================================

export const REDACTED = '[REDACTED]';

/**
 * Default sensitive patterns to redact from free text
 */
export const DEFAULT_REDACTION_PATTERNS: readonly RegExp[] = [
  // Email addresses
  /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g,
  // Credit card patterns
  /\b\d{4}[-\s]?\d{4}[-\s]?\d{4}[-\s]?\d{4}\b/g,
  // Phone numbers (various formats)
  /\b\d{3}[-.]\d{3}[-.]\d{4}\b/g,
  // IP addresses
  /\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\b/g,
  // Access tokens
  /\b(access_?token|bearer|api_?key|password)[=:]\s*['"]?[\w-]+['"]?/gi,
];

/** Quoted string literal, with doubled or backslash-escaped quotes inside */
const STRING_LITERAL = /'(?:[^'\\]|\\.|'')*'|"(?:[^"\\]|\\.|"")*"/g;

// ============================================================================
// Redaction Implementation
// ============================================================================

/**
 * Replace every quoted literal in a SQL string
 *
 * @example
 * redactSqlLiterals("SELECT * FROM users WHERE email = 'a@b.io'");
 * // "SELECT * FROM users WHERE email = '[REDACTED]'"
 */
export function redactSqlLiterals(sql: string): string {
  return sql.replace(STRING_LITERAL, match => `${match[0]}${REDACTED}${match[0]}`);
}

/**
 * Redact a single string value
 */
export function redactString(value: string, patterns: readonly RegExp[] = DEFAULT_REDACTION_PATTERNS): string {
  let redacted = value;
  for (const pattern of patterns) {
    // Clone regex to reset lastIndex for global patterns
    const clonedPattern = new RegExp(pattern.source, pattern.flags);
    redacted = redacted.replace(clonedPattern, REDACTED);
  }
  return redacted;
}

/**
 * Copy of an output issue with queries, text and suggestion context masked
 */
export function redactIssue(issue: OutputIssue, customPatterns: readonly RegExp[] = []): OutputIssue {
  const patterns = [...DEFAULT_REDACTION_PATTERNS, ...customPatterns];
  const text = (value: string): string => redactString(redactSqlLiterals(value), patterns);

  return {
    ...issue,
    title: text(issue.title),
    description: text(issue.description),
    queries: issue.queries.map(text),
    suggestion: issue.suggestion
      ? { templateKey: issue.suggestion.templateKey, context: redactRecord(issue.suggestion.context, text) }
      : null,
    ...(issue.suggestionText !== undefined ? { suggestionText: text(issue.suggestionText) } : {}),
  };
}

/**
 * Recursively redact string values in a record
 */
function redactRecord(record: Record<string, unknown>, text: (value: string) => string): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    redacted[key] = redactValue(value, text);
  }
  return redacted;
}

function redactValue(value: unknown, text: (value: string) => string): unknown {
  if (typeof value === 'string') {
    return text(value);
  }

  if (Array.isArray(value)) {
    return value.map(v => redactValue(v, text));
  }

  if (isRecord(value)) {
    return redactRecord(value, text);
  }

  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
