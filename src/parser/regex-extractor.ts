/**
 * @module parser/regex-extractor
 * @description Regex-based structure extraction for SQL the grammar rejects
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/types/query.ts
 * @lastModified 2026-10-19
 *
 * Lower precision than the grammar path but the same output shape. Clause
 * boundaries are found by keyword, so nested subqueries can leak into the
 * outer clause text.
 */

import type {
  AggregationFunction,
  JoinInfo,
  JoinType,
  LiteralValue,
  StatementType,
  StructuralQuery,
  TableReference,
  WhereCondition,
} from '../types/query';

// ============================================================================
// Patterns
// ============================================================================

const TABLE = '[`"\\[]?([\\w.$]+)[`"\\]]?';

const ALIAS_STOPWORDS =
  'WHERE|JOIN|INNER|LEFT|RIGHT|CROSS|FULL|OUTER|NATURAL|ON|USING|GROUP|ORDER|LIMIT|HAVING|UNION|OFFSET|SET|VALUES|FOR|WINDOW';

const ALIAS = `(?:\\s+(?:AS\\s+)?(?!(?:${ALIAS_STOPWORDS})\\b)(\\w+))?`;

const JOIN_KEYWORD = '(?:NATURAL\\s+)?(?:(?:LEFT|RIGHT|FULL)(?:\\s+OUTER)?|INNER|CROSS)?\\s*JOIN';

const JOIN_END =
  `(?=\\s+${JOIN_KEYWORD}\\b|\\s+WHERE\\b|\\s+GROUP\\s+BY\\b|\\s+ORDER\\s+BY\\b|\\s+LIMIT\\b|\\s+HAVING\\b|\\s+UNION\\b|\\s*;|\\s*\\)|\\s*$)`;

const PATTERNS = {
  select: /^\s*\(?\s*(?:WITH\b[\s\S]*?\)\s*)?SELECT\b/i,
  insert: new RegExp(`^\\s*(?:INSERT|REPLACE)\\s+(?:(?:LOW_PRIORITY|DELAYED|HIGH_PRIORITY|IGNORE)\\s+)*(?:INTO\\s+)?${TABLE}`, 'i'),
  update: new RegExp(`^\\s*UPDATE\\s+(?:(?:LOW_PRIORITY|IGNORE)\\s+)*${TABLE}${ALIAS}`, 'i'),
  delete: new RegExp(`^\\s*DELETE\\s+(?:(?:LOW_PRIORITY|QUICK|IGNORE)\\s+)*FROM\\s+${TABLE}${ALIAS}`, 'i'),
  from: new RegExp(`\\bFROM\\s+${TABLE}${ALIAS}`, 'i'),
  join: new RegExp(`\\b(${JOIN_KEYWORD})\\s+${TABLE}${ALIAS}(?:\\s+ON\\s+([\\s\\S]+?))?${JOIN_END}`, 'gi'),
  where: /\bWHERE\b([\s\S]*?)(?=\bGROUP\s+BY\b|\bORDER\s+BY\b|\bLIMIT\b|\bHAVING\b|\bUNION\b|\bFOR\s+UPDATE\b|;|$)/i,
  between: /\bBETWEEN\s+(\S+)\s+AND\s+(\S+)/gi,
  condition:
    /^(?:(\w+)\.)?(\w+)\s*(=|!=|<>|<=|>=|<|>|\bNOT\s+LIKE\b|\bI?LIKE\b|\bIS\s+NOT\b|\bIS\b|\bNOT\s+IN\b|\bIN\b|\bBETWEEN\b)\s*([\s\S]*)$/i,
  orderBy: /\bORDER\s+BY\s+([\s\S]+?)(?=\s+LIMIT\b|\s+OFFSET\b|\s+FOR\b|\s*;|\s*\)|\s*$)/i,
  groupBy: /\bGROUP\s+BY\s+([\s\S]+?)(?=\s+HAVING\b|\s+ORDER\s+BY\b|\s+LIMIT\b|\s*;|\s*\)|\s*$)/i,
  limit: /\bLIMIT\s+(\d+|\?|:\w+)(?:\s*,\s*(\d+|\?|:\w+))?(?:\s+OFFSET\s+(\d+|\?|:\w+))?/i,
  offset: /\bOFFSET\s+(?:\d+|\?|:\w+)/i,
  aggregation: /\b(COUNT|SUM|AVG|MIN|MAX)\s*\(/gi,
  functionCall: /\b([A-Za-z_]\w*)\s*\(/g,
  subquery: /\(\s*SELECT\b/i,
  distinct: /\bDISTINCT\b/i,
  bareColumn: /^(?:\w+\.)?(\w+)$/,
} as const;

const NON_FUNCTION_WORDS = new Set(['IN', 'EXISTS', 'NOT', 'AND', 'OR', 'ANY', 'ALL', 'SOME', 'SELECT', 'VALUES', 'ON']);

// ============================================================================
// Structure Reader
// ============================================================================

/**
 * Build a StructuralQuery with regexes only
 */
export function readStructureFallback(sql: string): StructuralQuery {
  const statementType = statementTypeOf(sql);
  const isSelect = statementType === 'SELECT';
  const limit = isSelect ? limitOf(sql) : { hasLimit: false, hasOffset: false, limitValue: null };

  return {
    statementType,
    mainTable: mainTableOf(sql, statementType),
    joins: isSelect ? joinsOf(sql) : [],
    whereConditions: whereConditionsOf(sql),
    orderByColumns: columnListOf(sql, PATTERNS.orderBy),
    groupByColumns: columnListOf(sql, PATTERNS.groupBy),
    aggregationFunctions: isSelect ? aggregationsOf(sql) : [],
    functionsInWhere: functionsInWhereOf(sql),
    hasLimit: limit.hasLimit,
    hasOffset: limit.hasOffset,
    limitValue: limit.limitValue,
    hasSubquery: PATTERNS.subquery.test(sql),
    hasDistinct: PATTERNS.distinct.test(sql),
    source: 'fallback',
  };
}

export function statementTypeOf(sql: string): StatementType {
  if (PATTERNS.select.test(sql)) return 'SELECT';
  const firstWord = /^\s*(\w+)/.exec(sql)?.[1]?.toUpperCase();
  switch (firstWord) {
    case 'INSERT':
    case 'REPLACE':
      return 'INSERT';
    case 'UPDATE':
      return 'UPDATE';
    case 'DELETE':
      return 'DELETE';
    default:
      return 'OTHER';
  }
}

// ============================================================================
// Tables and Joins
// ============================================================================

function mainTableOf(sql: string, statementType: StatementType): TableReference | null {
  const pattern =
    statementType === 'INSERT' ? PATTERNS.insert :
    statementType === 'UPDATE' ? PATTERNS.update :
    statementType === 'DELETE' ? PATTERNS.delete :
    PATTERNS.from;
  const match = pattern.exec(sql);
  if (!match) return null;
  return { table: stripSchema(match[1]), alias: match[2] ?? null };
}

function joinsOf(sql: string): JoinInfo[] {
  const joins: JoinInfo[] = [];
  for (const match of sql.matchAll(PATTERNS.join)) {
    joins.push({
      type: toJoinType(match[1]),
      table: stripSchema(match[2]),
      alias: match[3] ?? null,
      onConditions: match[4] ? splitOnConditions(match[4]) : [],
    });
  }
  return joins;
}

function toJoinType(keyword: string): JoinType {
  const upper = keyword.toUpperCase();
  if (upper.includes('LEFT')) return 'LEFT';
  if (upper.includes('RIGHT')) return 'RIGHT';
  return 'INNER';
}

function splitOnConditions(text: string): string[] {
  return text
    .split(/\s+AND\s+/i)
    .map(part => part.replace(/[()]/g, '').replace(/\s+/g, ' ').trim())
    .filter(part => part.length > 0);
}

function stripSchema(name: string): string {
  const dot = name.lastIndexOf('.');
  return dot === -1 ? name : name.slice(dot + 1);
}

// ============================================================================
// WHERE
// ============================================================================

/**
 * Text of the WHERE clause, without the keyword, or null
 */
export function whereClauseOf(sql: string): string | null {
  const match = PATTERNS.where.exec(sql);
  return match ? match[1].trim() : null;
}

function whereConditionsOf(sql: string): WhereCondition[] {
  const clause = whereClauseOf(sql);
  if (!clause) return [];

  const conditions: WhereCondition[] = [];
  const protectedClause = clause.replace(PATTERNS.between, 'BETWEEN $1\u0000$2');

  for (const rawPart of protectedClause.split(/\s+(?:AND|OR)\s+/i)) {
    const part = rawPart.replace(/^[\s(]+/, '').replace(/^NOT\s+/i, '').trim();
    const match = PATTERNS.condition.exec(part);
    if (!match) continue;

    const operator = match[3].toUpperCase().replace(/\s+/g, ' ');
    const literal = parseLiteral(match[4]);
    conditions.push({
      column: match[2],
      operator,
      alias: match[1] ?? null,
      ...(literal.found ? { literalValue: literal.value } : {}),
    });
  }

  return conditions;
}

type LiteralParse = { found: true; value: LiteralValue } | { found: false };

function parseLiteral(text: string): LiteralParse {
  const value = text.trim().replace(/\)+$/, '').trim();
  const quoted = /^'((?:[^']|'')*)'$/.exec(value) ?? /^"((?:[^"]|"")*)"$/.exec(value);
  if (quoted) return { found: true, value: quoted[1].replace(/''/g, "'").replace(/""/g, '"') };
  if (/^-?\d+(?:\.\d+)?$/.test(value)) return { found: true, value: Number(value) };
  const upper = value.toUpperCase();
  if (upper === 'NULL') return { found: true, value: null };
  if (upper === 'TRUE' || upper === 'FALSE') return { found: true, value: upper === 'TRUE' };
  return { found: false };
}

function functionsInWhereOf(sql: string): string[] {
  const clause = whereClauseOf(sql);
  if (!clause) return [];
  const names: string[] = [];
  for (const match of clause.matchAll(PATTERNS.functionCall)) {
    const name = match[1].toUpperCase();
    if (!NON_FUNCTION_WORDS.has(name) && !names.includes(name)) names.push(name);
  }
  return names;
}

// ============================================================================
// ORDER BY / GROUP BY / LIMIT / Aggregations
// ============================================================================

function columnListOf(sql: string, pattern: RegExp): string[] {
  const match = pattern.exec(sql);
  if (!match) return [];
  const columns: string[] = [];
  for (const item of match[1].split(',')) {
    const expression = item.trim().replace(/\s+(?:ASC|DESC)\b[\s\S]*$/i, '').replace(/\s+NULLS\s+(?:FIRST|LAST)$/i, '').trim();
    const column = PATTERNS.bareColumn.exec(expression);
    if (column) columns.push(column[1]);
  }
  return columns;
}

function limitOf(sql: string): { hasLimit: boolean; hasOffset: boolean; limitValue: number | null } {
  const match = PATTERNS.limit.exec(sql);
  if (!match) return { hasLimit: false, hasOffset: false, limitValue: null };

  // MySQL "LIMIT offset, count" puts the count second
  const count = match[2] ?? match[1];
  return {
    hasLimit: true,
    hasOffset: match[2] !== undefined || match[3] !== undefined || PATTERNS.offset.test(sql),
    limitValue: /^\d+$/.test(count) ? Number(count) : null,
  };
}

function aggregationsOf(sql: string): AggregationFunction[] {
  const found: AggregationFunction[] = [];
  for (const match of sql.matchAll(PATTERNS.aggregation)) {
    const name = match[1].toUpperCase();
    if (isAggregation(name) && !found.includes(name)) found.push(name);
  }
  return found;
}

function isAggregation(name: string): name is AggregationFunction {
  return name === 'COUNT' || name === 'SUM' || name === 'AVG' || name === 'MIN' || name === 'MAX';
}
