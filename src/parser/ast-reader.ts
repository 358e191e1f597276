/**
 * @module parser/ast-reader
 * @description Reads a StructuralQuery out of a node-sql-parser statement node
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/types/query.ts
 * @lastModified 2026-10-19
 *
 * The AST is handled as `unknown` and narrowed node by node, so shape
 * differences between grammar releases degrade to empty fields instead of
 * runtime errors.
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
// Node Helpers
// ============================================================================

export interface AstNode {
  readonly [key: string]: unknown;
}

export function isNode(value: unknown): value is AstNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringProp(node: AstNode, key: string): string | null {
  const value = node[key];
  return typeof value === 'string' ? value : null;
}

function nodeProp(node: AstNode, key: string): AstNode | null {
  const value = node[key];
  return isNode(value) ? value : null;
}

function arrayProp(node: AstNode, key: string): readonly unknown[] {
  const value = node[key];
  return Array.isArray(value) ? value : [];
}

/**
 * Depth-first walk over every node below `value`, root included
 */
function* walk(value: unknown, skipKeys: ReadonlySet<string> = new Set()): Generator<AstNode> {
  if (Array.isArray(value)) {
    for (const item of value) yield* walk(item, skipKeys);
    return;
  }
  if (!isNode(value)) return;
  yield value;
  for (const key of Object.keys(value)) {
    if (!skipKeys.has(key)) yield* walk(value[key], skipKeys);
  }
}

// ============================================================================
// Constants
// ============================================================================

const AGGREGATIONS: ReadonlySet<string> = new Set<AggregationFunction>(['COUNT', 'SUM', 'AVG', 'MIN', 'MAX']);

const STRING_LITERAL_TYPES = new Set([
  'single_quote_string',
  'double_quote_string',
  'string',
  'natural_string',
  'hex_string',
  'full_hex_string',
  'bit_string',
]);

// ============================================================================
// Structure Reader
// ============================================================================

/**
 * Build a StructuralQuery from a parsed statement, or null when the value
 * is not a statement node
 */
export function readStructure(statement: unknown): StructuralQuery | null {
  if (!isNode(statement)) return null;
  const rawType = stringProp(statement, 'type');
  if (rawType === null) return null;

  const statementType = toStatementType(rawType);
  const isSelect = statementType === 'SELECT';
  const tables = readTableEntries(statement, statementType);
  const limit = isSelect ? readLimit(statement) : { hasLimit: false, hasOffset: false, limitValue: null };

  return {
    statementType,
    mainTable: tables.main,
    joins: isSelect ? tables.joins : [],
    whereConditions: readWhereConditions(statement.where),
    orderByColumns: readOrderBy(statement),
    groupByColumns: readGroupBy(statement),
    aggregationFunctions: isSelect ? readAggregations(statement) : [],
    functionsInWhere: readFunctionNames(statement.where),
    hasLimit: limit.hasLimit,
    hasOffset: limit.hasOffset,
    limitValue: limit.limitValue,
    hasSubquery: tables.hasDerivedTable || containsSubquery(statement),
    hasDistinct: containsDistinct(statement),
    source: 'grammar',
  };
}

function toStatementType(rawType: string): StatementType {
  switch (rawType.toLowerCase()) {
    case 'select':
      return 'SELECT';
    case 'insert':
    case 'replace':
      return 'INSERT';
    case 'update':
      return 'UPDATE';
    case 'delete':
      return 'DELETE';
    default:
      return 'OTHER';
  }
}

// ============================================================================
// Tables and Joins
// ============================================================================

interface TableEntries {
  main: TableReference | null;
  joins: JoinInfo[];
  hasDerivedTable: boolean;
}

function readTableEntries(statement: AstNode, statementType: StatementType): TableEntries {
  const key = statementType === 'SELECT' || statementType === 'DELETE' ? 'from' : 'table';
  let entries = arrayProp(statement, key);
  if (entries.length === 0 && statementType === 'DELETE') {
    entries = arrayProp(statement, 'table');
  }

  const result: TableEntries = { main: null, joins: [], hasDerivedTable: false };

  for (const entry of entries) {
    if (!isNode(entry)) continue;
    const table = stringProp(entry, 'table');
    if (table === null) {
      if (nodeProp(entry, 'expr')) result.hasDerivedTable = true;
      continue;
    }

    const alias = stringProp(entry, 'as');
    const join = stringProp(entry, 'join');
    if (join !== null) {
      result.joins.push({
        type: toJoinType(join),
        table,
        alias,
        onConditions: splitConjunction(entry.on).map(renderExpression),
      });
    } else if (result.main === null) {
      result.main = { table, alias };
    }
  }

  return result;
}

function toJoinType(join: string): JoinType {
  const upper = join.toUpperCase();
  if (upper.includes('LEFT')) return 'LEFT';
  if (upper.includes('RIGHT')) return 'RIGHT';
  return 'INNER';
}

function splitConjunction(expr: unknown): unknown[] {
  if (!isNode(expr)) return [];
  if (expr.type === 'binary_expr' && stringProp(expr, 'operator')?.toUpperCase() === 'AND') {
    return [...splitConjunction(expr.left), ...splitConjunction(expr.right)];
  }
  return [expr];
}

// ============================================================================
// WHERE
// ============================================================================

function readWhereConditions(where: unknown): WhereCondition[] {
  const conditions: WhereCondition[] = [];
  collectConditions(where, conditions);
  return conditions;
}

function collectConditions(expr: unknown, out: WhereCondition[]): void {
  if (!isNode(expr) || expr.type !== 'binary_expr') return;

  const operator = (stringProp(expr, 'operator') ?? '').toUpperCase();
  if (operator === 'AND' || operator === 'OR') {
    collectConditions(expr.left, out);
    collectConditions(expr.right, out);
    return;
  }

  const left = nodeProp(expr, 'left');
  if (!left || left.type !== 'column_ref') return;
  const column = columnName(left);
  if (column === null) return;

  const literal = readLiteral(expr.right);
  out.push({
    column,
    operator,
    alias: stringProp(left, 'table'),
    ...(literal.found ? { literalValue: literal.value } : {}),
  });
}

type LiteralRead = { found: true; value: LiteralValue } | { found: false };

function readLiteral(value: unknown): LiteralRead {
  if (!isNode(value)) return { found: false };
  const type = stringProp(value, 'type');
  const raw = value.value;

  if (type === 'number' && typeof raw === 'number') return { found: true, value: raw };
  if (type === 'number' && typeof raw === 'string') return { found: true, value: Number(raw) };
  if (type !== null && STRING_LITERAL_TYPES.has(type)) return { found: true, value: String(raw) };
  if ((type === 'bool' || type === 'boolean') && typeof raw === 'boolean') return { found: true, value: raw };
  if (type === 'null') return { found: true, value: null };
  return { found: false };
}

function readFunctionNames(where: unknown): string[] {
  const names: string[] = [];
  for (const node of walk(where)) {
    if (node.type !== 'function') continue;
    const name = functionName(node);
    if (name !== null && !names.includes(name)) names.push(name);
  }
  return names;
}

function functionName(node: AstNode): string | null {
  const name = node.name;
  if (typeof name === 'string') return name.toUpperCase();
  if (isNode(name)) {
    const first = arrayProp(name, 'name')[0];
    if (isNode(first)) {
      const value = stringProp(first, 'value');
      if (value !== null) return value.toUpperCase();
    }
  }
  return null;
}

// ============================================================================
// ORDER BY / GROUP BY / LIMIT
// ============================================================================

function readOrderBy(statement: AstNode): string[] {
  const columns: string[] = [];
  for (const entry of arrayProp(statement, 'orderby')) {
    if (!isNode(entry)) continue;
    const expr = nodeProp(entry, 'expr');
    if (expr && expr.type === 'column_ref') {
      const column = columnName(expr);
      if (column !== null) columns.push(column);
    }
  }
  return columns;
}

function readGroupBy(statement: AstNode): string[] {
  const groupby = statement.groupby;
  const entries: readonly unknown[] = Array.isArray(groupby) ? groupby : isNode(groupby) ? arrayProp(groupby, 'columns') : [];
  const columns: string[] = [];
  for (const entry of entries) {
    if (isNode(entry) && entry.type === 'column_ref') {
      const column = columnName(entry);
      if (column !== null) columns.push(column);
    }
  }
  return columns;
}

interface LimitInfo {
  hasLimit: boolean;
  hasOffset: boolean;
  limitValue: number | null;
}

function readLimit(statement: AstNode): LimitInfo {
  const limit = nodeProp(statement, 'limit');
  const values = limit ? arrayProp(limit, 'value') : [];
  if (!limit || values.length === 0) {
    return { hasLimit: false, hasOffset: false, limitValue: null };
  }

  // MySQL "LIMIT offset, count" puts the count second
  const separator = stringProp(limit, 'seperator') ?? stringProp(limit, 'separator');
  const countNode = values.length > 1 && separator === ',' ? values[1] : values[0];
  const count = isNode(countNode) ? countNode.value : null;

  return {
    hasLimit: true,
    hasOffset: values.length > 1,
    limitValue: typeof count === 'number' ? count : null,
  };
}

// ============================================================================
// Whole-Statement Scans
// ============================================================================

function readAggregations(statement: AstNode): AggregationFunction[] {
  const found: AggregationFunction[] = [];
  for (const node of walk(statement)) {
    if (node.type !== 'aggr_func') continue;
    const name = stringProp(node, 'name')?.toUpperCase() ?? '';
    if (isAggregation(name) && !found.includes(name)) found.push(name);
  }
  return found;
}

function isAggregation(name: string): name is AggregationFunction {
  return AGGREGATIONS.has(name);
}

// UNION branches hang off `_next` and are not subqueries
const SUBQUERY_SKIP_KEYS: ReadonlySet<string> = new Set(['_next']);

function containsSubquery(statement: AstNode): boolean {
  for (const node of walk(statement, SUBQUERY_SKIP_KEYS)) {
    if (node === statement) continue;
    if (node.type === 'select' || isNode(node.ast)) return true;
  }
  return false;
}

function containsDistinct(statement: AstNode): boolean {
  for (const node of walk(statement)) {
    const distinct = node.distinct;
    if (typeof distinct === 'string' && distinct.toUpperCase() === 'DISTINCT') return true;
    if (isNode(distinct) && stringProp(distinct, 'type')?.toUpperCase() === 'DISTINCT') return true;
  }
  return false;
}

// ============================================================================
// Expression Rendering
// ============================================================================

/**
 * Column name of a column_ref, for both plain and wrapped column forms
 */
function columnName(node: AstNode): string | null {
  const column = node.column;
  if (typeof column === 'string') return column;
  if (isNode(column)) {
    const expr = nodeProp(column, 'expr');
    if (expr) {
      const value = stringProp(expr, 'value');
      if (value !== null) return value;
    }
  }
  return null;
}

/**
 * Render an expression back to compact SQL text (`o.user_id = u.id`)
 */
export function renderExpression(expr: unknown): string {
  if (!isNode(expr)) return '';

  switch (expr.type) {
    case 'column_ref': {
      const table = stringProp(expr, 'table');
      const column = columnName(expr) ?? '';
      return table ? `${table}.${column}` : column;
    }
    case 'binary_expr':
      return `${renderExpression(expr.left)} ${stringProp(expr, 'operator') ?? ''} ${renderExpression(expr.right)}`;
    case 'expr_list':
      return `(${arrayProp(expr, 'value').map(renderExpression).join(', ')})`;
    case 'null':
      return 'NULL';
    case 'bool':
    case 'boolean':
      return expr.value === true ? 'TRUE' : 'FALSE';
    case 'number':
      return String(expr.value);
    case 'param':
      return `:${String(expr.value)}`;
    case 'double_quote_string':
      return `"${String(expr.value)}"`;
    case 'function':
    case 'aggr_func': {
      const name = functionName(expr) ?? '';
      const args = nodeProp(expr, 'args');
      const inner = args ? (args.type === 'expr_list' ? arrayProp(args, 'value').map(renderExpression).join(', ') : renderExpression(args.expr)) : '';
      return `${name}(${inner})`;
    }
    default: {
      const type = stringProp(expr, 'type');
      if (type !== null && STRING_LITERAL_TYPES.has(type)) return `'${String(expr.value)}'`;
      const value = expr.value;
      return typeof value === 'string' || typeof value === 'number' ? String(value) : '';
    }
  }
}
