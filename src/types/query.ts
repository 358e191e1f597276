/**
 * @module types/query
 * @description Type definitions for recorded queries and their extracted structure
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/types/common.ts
 * @lastModified 2026-10-19
 */

import type { Milliseconds } from './common';

// ============================================================================
// Recorded Queries
// ============================================================================

/**
 * One call-stack frame captured when a query was issued
 */
export interface BacktraceFrame {
  file: string;
  line: number;
  function?: string;
  class?: string;
}

/**
 * Access metrics from an EXPLAIN plan, when the host collected one
 */
export interface ExplainMetrics {
  /** Rows the database examined to answer the query */
  rowsExamined: number;
  /** Access/scan type as reported by the database (ALL, index, ref, ...) */
  accessType?: string;
  /** Index used, or null when none */
  key?: string | null;
}

/**
 * Bound parameters: positional list or named map
 */
export type QueryParams = readonly unknown[] | Readonly<Record<string, unknown>>;

/**
 * A single executed query as captured by the host
 *
 * @example
 * const record: QueryRecord = {
 *   sql: 'SELECT * FROM users WHERE id = ?',
 *   executionTimeMs: 0.27,
 *   params: [42],
 * };
 */
export interface QueryRecord {
  readonly sql: string;
  readonly executionTimeMs: Milliseconds;
  readonly params: QueryParams;
  /** Rows returned or affected, when known */
  readonly rowCount?: number;
  readonly backtrace?: readonly BacktraceFrame[];
  readonly explain?: ExplainMetrics;
}

// ============================================================================
// Extracted Structure
// ============================================================================

export type StatementType = 'SELECT' | 'INSERT' | 'UPDATE' | 'DELETE' | 'OTHER';

/**
 * JOIN kind. OUTER variants fold into LEFT/RIGHT, CROSS and FULL into INNER.
 */
export type JoinType = 'INNER' | 'LEFT' | 'RIGHT';

export interface TableReference {
  table: string;
  alias: string | null;
}

export interface JoinInfo extends TableReference {
  type: JoinType;
  /** Individual ON conditions, split on AND */
  onConditions: string[];
}

export type LiteralValue = string | number | boolean | null;

export interface WhereCondition {
  column: string;
  /** Uppercase operator: =, <>, LIKE, IS NOT, IN, ... */
  operator: string;
  /** Set when the right-hand side is a literal; absent for placeholders and expressions */
  literalValue?: LiteralValue;
  alias: string | null;
}

export type ExtractionSource = 'grammar' | 'fallback';

/**
 * Structural facts about one SQL statement. Computed once per distinct SQL
 * text and never mutated.
 */
export interface StructuralQuery {
  readonly statementType: StatementType;
  readonly mainTable: TableReference | null;
  readonly joins: readonly JoinInfo[];
  readonly whereConditions: readonly WhereCondition[];
  readonly orderByColumns: readonly string[];
  readonly groupByColumns: readonly string[];
  readonly aggregationFunctions: readonly AggregationFunction[];
  readonly functionsInWhere: readonly string[];
  readonly hasLimit: boolean;
  readonly hasOffset: boolean;
  readonly limitValue: number | null;
  readonly hasSubquery: boolean;
  readonly hasDistinct: boolean;
  readonly source: ExtractionSource;
}

export type AggregationFunction = 'COUNT' | 'SUM' | 'AVG' | 'MIN' | 'MAX';

/**
 * SQL text with literals replaced by `?`, whitespace collapsed, uppercased
 */
export type NormalizedSignature = string;
