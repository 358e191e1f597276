/**
 * @module parser/sql-lexer
 * @description Splits SQL text into tokens (strings, numbers, placeholders, words, punctuation)
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies none
 * @lastModified 2026-10-19
 *
 * The lexer is lossless: concatenating every token's text reproduces the
 * input exactly. Unterminated strings and comments run to the end of input.
 */

// ============================================================================
// Types
// ============================================================================

export type SqlTokenKind =
  | 'string' // 'single quoted'
  | 'quoted' // "double quoted" or `backticked`
  | 'number' // 42, 3.14, 1e5, 0x1F
  | 'placeholder' // ?, :name, $1
  | 'word' // keywords and identifiers
  | 'operator' // = <> != <= >= < > + - * / % || ::
  | 'punct' // ( ) , . ;
  | 'whitespace'
  | 'comment';

export interface SqlToken {
  kind: SqlTokenKind;
  text: string;
}

// ============================================================================
// Constants
// ============================================================================

const MULTI_CHAR_OPERATORS = ['<>', '!=', '<=', '>=', '||', '::', '<=>'];

const OPERATOR_CHARS = new Set(['=', '<', '>', '!', '+', '-', '*', '/', '%', '|', '&', '^', '~', ':']);

const NUMBER_PATTERN = /^(?:0[xX][0-9a-fA-F]+|\d*\.?\d+(?:[eE][+-]?\d+)?)$/;

const PUNCT_CHARS = new Set(['(', ')', ',', '.', ';', '[', ']', '{', '}']);

// ============================================================================
// Tokenizer
// ============================================================================

/**
 * Tokenize SQL text
 *
 * @example
 * tokenizeSql("id = 'x'").map(t => t.kind);
 * // ['word', 'whitespace', 'operator', 'whitespace', 'string']
 */
export function tokenizeSql(sql: string): SqlToken[] {
  const tokens: SqlToken[] = [];
  let i = 0;

  while (i < sql.length) {
    const char = sql[i];
    const next = sql[i + 1] ?? '';

    // Whitespace
    if (/\s/.test(char)) {
      const end = scanWhile(sql, i, c => /\s/.test(c));
      tokens.push({ kind: 'whitespace', text: sql.slice(i, end) });
      i = end;
      continue;
    }

    // Comments
    if (char === '-' && next === '-') {
      const newline = sql.indexOf('\n', i);
      const end = newline === -1 ? sql.length : newline;
      tokens.push({ kind: 'comment', text: sql.slice(i, end) });
      i = end;
      continue;
    }
    if (char === '/' && next === '*') {
      const close = sql.indexOf('*/', i + 2);
      const end = close === -1 ? sql.length : close + 2;
      tokens.push({ kind: 'comment', text: sql.slice(i, end) });
      i = end;
      continue;
    }

    // Quoted literals and identifiers
    if (char === "'") {
      const end = scanQuoted(sql, i, "'");
      tokens.push({ kind: 'string', text: sql.slice(i, end) });
      i = end;
      continue;
    }
    if (char === '"' || char === '`') {
      const end = scanQuoted(sql, i, char);
      tokens.push({ kind: 'quoted', text: sql.slice(i, end) });
      i = end;
      continue;
    }

    // Numbers
    if (isDigit(char) || (char === '.' && isDigit(next))) {
      const end = scanNumber(sql, i);
      const text = sql.slice(i, end);
      tokens.push({ kind: NUMBER_PATTERN.test(text) ? 'number' : 'word', text });
      i = end;
      continue;
    }

    // Placeholders
    if (char === '?') {
      tokens.push({ kind: 'placeholder', text: '?' });
      i++;
      continue;
    }
    if (char === ':' && isWordStart(next) && sql[i - 1] !== ':') {
      const end = scanWhile(sql, i + 1, isWordChar);
      tokens.push({ kind: 'placeholder', text: sql.slice(i, end) });
      i = end;
      continue;
    }
    if (char === '$' && isDigit(next)) {
      const end = scanWhile(sql, i + 1, isDigit);
      tokens.push({ kind: 'placeholder', text: sql.slice(i, end) });
      i = end;
      continue;
    }

    // Words
    if (isWordStart(char)) {
      const end = scanWhile(sql, i, isWordChar);
      tokens.push({ kind: 'word', text: sql.slice(i, end) });
      i = end;
      continue;
    }

    // Operators
    const multi = MULTI_CHAR_OPERATORS.find(op => sql.startsWith(op, i));
    if (multi) {
      tokens.push({ kind: 'operator', text: multi });
      i += multi.length;
      continue;
    }
    if (OPERATOR_CHARS.has(char)) {
      tokens.push({ kind: 'operator', text: char });
      i++;
      continue;
    }

    // Punctuation and anything else
    tokens.push({ kind: PUNCT_CHARS.has(char) ? 'punct' : 'operator', text: char });
    i++;
  }

  return tokens;
}

/**
 * True for tokens that carry meaning (not whitespace or comments)
 */
export function isSignificant(token: SqlToken): boolean {
  return token.kind !== 'whitespace' && token.kind !== 'comment';
}

// ============================================================================
// Scanners
// ============================================================================

function scanWhile(sql: string, start: number, predicate: (char: string) => boolean): number {
  let i = start;
  while (i < sql.length && predicate(sql[i])) i++;
  return i;
}

/**
 * Scan a quoted run starting at `start`. A doubled quote is an escaped
 * quote; a backslash escapes the next character inside strings.
 */
function scanQuoted(sql: string, start: number, quote: string): number {
  let i = start + 1;
  while (i < sql.length) {
    const char = sql[i];
    if (char === '\\' && quote === "'") {
      i += 2;
      continue;
    }
    if (char === quote) {
      if (sql[i + 1] === quote) {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i++;
  }
  return sql.length;
}

function scanNumber(sql: string, start: number): number {
  if (sql[start] === '0' && (sql[start + 1] === 'x' || sql[start + 1] === 'X')) {
    return scanWhile(sql, start + 2, c => /[0-9a-fA-F]/.test(c));
  }

  let i = scanWhile(sql, start, isDigit);
  if (sql[i] === '.' && isDigit(sql[i + 1] ?? '')) {
    i = scanWhile(sql, i + 1, isDigit);
  }
  if ((sql[i] === 'e' || sql[i] === 'E') && /[0-9+-]/.test(sql[i + 1] ?? '')) {
    const exponentStart = sql[i + 1] === '+' || sql[i + 1] === '-' ? i + 2 : i + 1;
    if (isDigit(sql[exponentStart] ?? '')) {
      i = scanWhile(sql, exponentStart, isDigit);
    }
  }
  // 1abc is an identifier in some dialects
  if (isWordChar(sql[i] ?? '')) {
    return scanWhile(sql, i, isWordChar);
  }
  return i;
}

function isDigit(char: string): boolean {
  return char >= '0' && char <= '9';
}

function isWordStart(char: string): boolean {
  return /[A-Za-z_]/.test(char);
}

function isWordChar(char: string): boolean {
  return /[A-Za-z0-9_$]/.test(char);
}
