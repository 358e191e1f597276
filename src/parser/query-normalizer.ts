/**
 * @module parser/query-normalizer
 * @description Reduces SQL to a signature that groups structurally identical queries
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/parser/sql-lexer.ts, src/parser/grammar.ts, src/parser/bounded-cache.ts
 * @lastModified 2026-10-19
 *
 * Signature contract (both paths):
 * - quoted strings, numbers (signed, decimal, hex) and placeholders become `?`
 * - double-quoted text becomes `?` only where it is a comparison operand
 * - IN lists made only of `?` collapse to `IN (?)`
 * - comments dropped, whitespace collapsed, result uppercased and trimmed
 */

import type { NormalizedSignature } from '../types/query';
import { tokenizeSql, isSignificant, type SqlToken } from './sql-lexer';
import { SqlGrammar } from './grammar';
import { BoundedCache } from './bounded-cache';

// ============================================================================
// Constants
// ============================================================================

/**
 * Words after which a leading minus or plus is a sign, not arithmetic
 */
const SIGN_CONTEXT_KEYWORDS = new Set([
  'SELECT', 'WHERE', 'AND', 'OR', 'NOT', 'IN', 'ON', 'WHEN', 'THEN', 'ELSE', 'CASE',
  'LIMIT', 'OFFSET', 'BETWEEN', 'VALUES', 'SET', 'RETURN', 'LIKE', 'IS', 'BY', 'HAVING',
]);

const SIGN_CONTEXT_OPERATORS = new Set(['=', '<', '>', '<>', '!=', '<=', '>=', '*', '/', '%']);

const COMPARISON_OPERATORS = new Set(['=', '<', '>', '<>', '!=', '<=', '>=']);

const SIGN_KEYWORD_ALTERNATION = Array.from(SIGN_CONTEXT_KEYWORDS).join('|');

const REGEX_RULES = {
  singleQuoted: /'(?:[^'\\]|\\.|'')*'/g,
  lineComment: /--[^\n]*/g,
  blockComment: /\/\*[\s\S]*?\*\//g,
  doubleQuotedOperand: /((?:[=<>]|\bI?LIKE)\s*)"(?:[^"\\]|\\.|"")*"/gi,
  hex: /\b0x[0-9a-f]+\b/gi,
  number: /(?<![\w.$])\d*\.?\d+(?:e[+-]?\d+)?(?![\w.])/gi,
  namedPlaceholder: /(?<!:):[A-Za-z_]\w*/g,
  numberedPlaceholder: /(?<![\w$])\$\d+/g,
  signedValue: new RegExp(`(^|[=<>(,*/%]|\\b(?:${SIGN_KEYWORD_ALTERNATION})\\b)(\\s*)[-+]\\s*\\?`, 'gi'),
  inList: /\bIN\s*\(\s*\?(?:\s*,\s*\?)*\s*\)/g,
} as const;

// ============================================================================
// Query Normalizer
// ============================================================================

/**
 * Produces normalized signatures. The grammar decides the path: SQL it
 * accepts is rewritten token by token, anything else through regexes.
 *
 * @example
 * const normalizer = new QueryNormalizer(new SqlGrammar());
 * normalizer.normalize('SELECT * FROM users   WHERE id = 1');
 * // 'SELECT * FROM USERS WHERE ID = ?'
 */
export class QueryNormalizer {
  private grammar: SqlGrammar;
  private cache: BoundedCache<NormalizedSignature>;

  constructor(grammar: SqlGrammar = new SqlGrammar(), cache: BoundedCache<NormalizedSignature> = new BoundedCache()) {
    this.grammar = grammar;
    this.cache = cache;
  }

  normalize(sql: string): NormalizedSignature {
    return this.cache.getOrCompute(sql, text =>
      this.grammar.accepts(text) ? normalizeWithLexer(text) : normalizeWithRegex(text)
    );
  }
}

// ============================================================================
// Token Path
// ============================================================================

/**
 * Normalize by rewriting lexer tokens
 */
export function normalizeWithLexer(sql: string): NormalizedSignature {
  const tokens = tokenizeSql(sql);
  const pieces: string[] = [];
  let previous: SqlToken | null = null;
  let i = 0;

  while (i < tokens.length) {
    const token = tokens[i];

    if (!isSignificant(token)) {
      pieces.push(' ');
      i++;
      continue;
    }

    if ((token.text === '-' || token.text === '+') && isSignPosition(previous)) {
      const operandIndex = nextSignificantIndex(tokens, i + 1);
      const operand = operandIndex === -1 ? null : tokens[operandIndex];
      if (operand && (operand.kind === 'number' || operand.kind === 'placeholder')) {
        pieces.push('?');
        previous = { kind: 'placeholder', text: '?' };
        i = operandIndex + 1;
        continue;
      }
    }

    if (isLiteralToken(token, previous)) {
      pieces.push('?');
      previous = { kind: 'placeholder', text: '?' };
    } else {
      pieces.push(token.text);
      previous = token;
    }
    i++;
  }

  return finalizeSignature(pieces.join(''));
}

function isLiteralToken(token: SqlToken, previous: SqlToken | null): boolean {
  switch (token.kind) {
    case 'string':
    case 'number':
    case 'placeholder':
      return true;
    case 'quoted':
      return token.text.startsWith('"') && isComparisonContext(previous);
    default:
      return false;
  }
}

function isComparisonContext(previous: SqlToken | null): boolean {
  if (!previous) return false;
  if (previous.kind === 'operator') return COMPARISON_OPERATORS.has(previous.text);
  if (previous.kind === 'word') {
    const upper = previous.text.toUpperCase();
    return upper === 'LIKE' || upper === 'ILIKE';
  }
  return false;
}

/**
 * A sign can follow the start of input, an opening paren, a comma, a
 * comparison or multiplicative operator, or a keyword.
 */
function isSignPosition(previous: SqlToken | null): boolean {
  if (!previous) return true;
  switch (previous.kind) {
    case 'punct':
      return previous.text === '(' || previous.text === ',';
    case 'operator':
      return SIGN_CONTEXT_OPERATORS.has(previous.text);
    case 'word':
      return SIGN_CONTEXT_KEYWORDS.has(previous.text.toUpperCase());
    default:
      return false;
  }
}

function nextSignificantIndex(tokens: SqlToken[], from: number): number {
  for (let i = from; i < tokens.length; i++) {
    if (isSignificant(tokens[i])) return i;
  }
  return -1;
}

// ============================================================================
// Regex Path
// ============================================================================

/**
 * Normalize with regex replacements over the raw text
 */
export function normalizeWithRegex(sql: string): NormalizedSignature {
  const replaced = sql
    .replace(REGEX_RULES.singleQuoted, '?')
    .replace(REGEX_RULES.lineComment, ' ')
    .replace(REGEX_RULES.blockComment, ' ')
    .replace(REGEX_RULES.doubleQuotedOperand, '$1?')
    .replace(REGEX_RULES.hex, '?')
    .replace(REGEX_RULES.number, '?')
    .replace(REGEX_RULES.namedPlaceholder, '?')
    .replace(REGEX_RULES.numberedPlaceholder, '?')
    .replace(REGEX_RULES.signedValue, '$1$2?');

  return finalizeSignature(replaced);
}

// ============================================================================
// Shared Finishing
// ============================================================================

function finalizeSignature(text: string): NormalizedSignature {
  return text
    .replace(/\s+/g, ' ')
    .trim()
    .toUpperCase()
    .replace(REGEX_RULES.inList, 'IN (?)');
}
