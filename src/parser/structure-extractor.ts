/**
 * @module parser/structure-extractor
 * @description Extracts structural facts from SQL: tables, joins, conditions, clauses
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/parser/grammar.ts, src/parser/ast-reader.ts, src/parser/regex-extractor.ts
 * @lastModified 2026-10-19
 *
 * Each SQL text is read once by either the grammar or the regex fallback,
 * never a mix of both, and the result is cached by content hash. Every
 * accessor is total: malformed SQL yields empty results.
 */

import type {
  AggregationFunction,
  JoinInfo,
  StructuralQuery,
  TableReference,
  WhereCondition,
} from '../types/query';
import { BoundedCache } from './bounded-cache';
import { SqlGrammar } from './grammar';
import { readStructure } from './ast-reader';
import { readStructureFallback, whereClauseOf } from './regex-extractor';
import { silentLogger, type Logger } from '../logging/logger';

// ============================================================================
// Constants
// ============================================================================

const EMPTY_STRUCTURE: StructuralQuery = Object.freeze({
  statementType: 'OTHER',
  mainTable: null,
  joins: [],
  whereConditions: [],
  orderByColumns: [],
  groupByColumns: [],
  aggregationFunctions: [],
  functionsInWhere: [],
  hasLimit: false,
  hasOffset: false,
  limitValue: null,
  hasSubquery: false,
  hasDistinct: false,
  source: 'fallback',
});

const LOCALE_COLUMNS = /\.(?:locale|language|lang|culture|translation_locale)\s*=/i;

// ============================================================================
// Structure Extractor
// ============================================================================

/**
 * @example
 * const extractor = new SqlStructureExtractor();
 * extractor.extractJoins('SELECT * FROM users u LEFT JOIN orders o ON o.user_id = u.id');
 * // [{ type: 'LEFT', table: 'orders', alias: 'o', onConditions: ['o.user_id = u.id'] }]
 */
export class SqlStructureExtractor {
  private grammar: SqlGrammar;
  private cache: BoundedCache<StructuralQuery>;
  private logger: Logger;

  constructor(options: StructureExtractorOptions = {}) {
    this.grammar = options.grammar ?? new SqlGrammar();
    this.cache = options.cache ?? new BoundedCache<StructuralQuery>();
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Full structural read of one statement
   */
  extract(sql: string): StructuralQuery {
    return this.cache.getOrCompute(sql, text => this.extractUncached(text));
  }

  private extractUncached(sql: string): StructuralQuery {
    if (sql.trim() === '') return EMPTY_STRUCTURE;
    try {
      const fromGrammar = readStructure(this.grammar.parse(sql));
      return Object.freeze(fromGrammar ?? readStructureFallback(sql));
    } catch (error) {
      this.logger.debug('Structure extraction failed, returning empty structure:', error);
      return EMPTY_STRUCTURE;
    }
  }

  // ==========================================================================
  // Tables
  // ==========================================================================

  extractMainTable(sql: string): TableReference | null {
    return this.extract(sql).mainTable;
  }

  extractJoins(sql: string): readonly JoinInfo[] {
    return this.extract(sql).joins;
  }

  hasJoin(sql: string): boolean {
    return this.extract(sql).joins.length > 0;
  }

  countJoins(sql: string): number {
    return this.extract(sql).joins.length;
  }

  // ==========================================================================
  // Clauses
  // ==========================================================================

  extractWhereConditions(sql: string): readonly WhereCondition[] {
    return this.extract(sql).whereConditions;
  }

  /**
   * Distinct column names compared in WHERE
   */
  extractWhereColumns(sql: string): string[] {
    const columns: string[] = [];
    for (const condition of this.extract(sql).whereConditions) {
      if (!columns.includes(condition.column)) columns.push(condition.column);
    }
    return columns;
  }

  extractAggregationFunctions(sql: string): readonly AggregationFunction[] {
    return this.extract(sql).aggregationFunctions;
  }

  extractGroupByColumns(sql: string): readonly string[] {
    return this.extract(sql).groupByColumns;
  }

  extractOrderByColumnNames(sql: string): readonly string[] {
    return this.extract(sql).orderByColumns;
  }

  extractFunctionsInWhere(sql: string): readonly string[] {
    return this.extract(sql).functionsInWhere;
  }

  hasSubquery(sql: string): boolean {
    return this.extract(sql).hasSubquery;
  }

  hasGroupBy(sql: string): boolean {
    return this.extract(sql).groupByColumns.length > 0 || /\bGROUP\s+BY\b/i.test(sql);
  }

  hasOrderBy(sql: string): boolean {
    return this.extract(sql).orderByColumns.length > 0 || /\bORDER\s+BY\b/i.test(sql);
  }

  hasDistinct(sql: string): boolean {
    return this.extract(sql).hasDistinct;
  }

  getLimitValue(sql: string): number | null {
    return this.extract(sql).limitValue;
  }

  // ==========================================================================
  // Text Checks
  // ==========================================================================

  /**
   * LIKE whose literal pattern starts with a wildcard
   */
  hasLeadingWildcardLike(sql: string): boolean {
    return /\bLIKE\s+(['"])%/i.test(sql);
  }

  /**
   * First `alias.field IS NOT NULL` in the WHERE clause, returning the field
   *
   * @example
   * findIsNotNullFieldOnAlias("... WHERE o.status IS NOT NULL", 'o'); // 'status'
   */
  findIsNotNullFieldOnAlias(sql: string, alias: string): string | null {
    const where = whereClauseOf(sql);
    if (!where) return null;
    const pattern = new RegExp(`\\b${escapeRegExp(alias)}\\.(\\w+)\\s+IS\\s+NOT\\s+NULL\\b`, 'i');
    return pattern.exec(where)?.[1] ?? null;
  }

  /**
   * Whether `alias.` appears anywhere outside the JOIN clause that
   * introduced the alias. `excludeJoinExpr`, when given and present in the
   * SQL, is the exact clause text to ignore; otherwise the clause is located
   * by the alias.
   *
   * @example
   * isAliasUsedInQuery('SELECT u.* FROM users u JOIN orders o ON o.user_id = u.id', 'o'); // false
   */
  isAliasUsedInQuery(sql: string, alias: string, excludeJoinExpr?: string): boolean {
    const escaped = escapeRegExp(alias);
    const used = new RegExp(`(?<![\\w.])${escaped}\\.`, 'i');
    if (excludeJoinExpr !== undefined && excludeJoinExpr !== '' && sql.includes(excludeJoinExpr)) {
      return used.test(sql.replace(excludeJoinExpr, ' '));
    }
    const ownJoin = new RegExp(
      `\\bJOIN\\s+[\\w.\`"]+\\s+(?:AS\\s+)?${escaped}\\b(?:\\s+ON\\s+[\\s\\S]*?)?(?=\\s+(?:(?:LEFT|RIGHT|INNER|CROSS|FULL)\\s+(?:OUTER\\s+)?)?JOIN\\b|\\s+WHERE\\b|\\s+GROUP\\s+BY\\b|\\s+ORDER\\s+BY\\b|\\s+LIMIT\\b|\\s+HAVING\\b|\\s*$)`,
      'i'
    );
    return used.test(sql.replace(ownJoin, ' '));
  }

  /**
   * JOIN restricted by a locale/language column, which makes a to-many join
   * return a single row per parent
   */
  hasLocaleConstraintInJoin(sql: string): boolean {
    return this.extract(sql).joins.some(join => join.onConditions.some(condition => LOCALE_COLUMNS.test(condition)))
      || LOCALE_COLUMNS.test(whereClauseOf(sql) ?? '');
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export interface StructureExtractorOptions {
  grammar?: SqlGrammar;
  cache?: BoundedCache<StructuralQuery>;
  logger?: Logger;
}
