/**
 * @module patterns/query-builder-pattern-detector
 * @description Query-construction mistakes: literals, NULL comparisons, empty IN, LIKE, unbound parameters
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/parser/structure-extractor.ts, src/types/query.ts
 * @lastModified 2026-10-19
 */

import type { QueryParams } from '../types/query';
import { SqlStructureExtractor } from '../parser/structure-extractor';

// ============================================================================
// Types
// ============================================================================

export type QueryBuilderPattern =
  | 'sql_injection'
  | 'incorrect_null'
  | 'empty_in'
  | 'unescaped_like'
  | 'missing_params';

export interface LiteralConditionResult {
  detected: boolean;
  /** `column operator <literal>` per offending condition */
  locations: string[];
}

export interface NullComparisonResult {
  detected: boolean;
  /** `column operator NULL` per offending condition */
  fields: string[];
}

export interface MissingParametersResult {
  hasMissing: boolean;
  missing: string[];
}

// ============================================================================
// Constants
// ============================================================================

const NULL_EQUALITY_OPERATORS = new Set(['=', '!=', '<>']);

// ============================================================================
// Detector
// ============================================================================

/**
 * @example
 * const detector = new QueryBuilderPatternDetector(extractor);
 * detector.detectIncorrectNullComparison('SELECT * FROM t WHERE deleted_at = NULL');
 * // { detected: true, fields: ['deleted_at = NULL'] }
 */
export class QueryBuilderPatternDetector {
  private extractor: SqlStructureExtractor;

  constructor(extractor: SqlStructureExtractor = new SqlStructureExtractor()) {
    this.extractor = extractor;
  }

  /**
   * WHERE conditions compared against a quoted string literal
   */
  detectPotentialSqlInjection(sql: string): LiteralConditionResult {
    const locations = this.extractor
      .extractWhereConditions(sql)
      .filter(condition => typeof condition.literalValue === 'string')
      .map(condition => `${condition.column} ${condition.operator} <literal>`);
    return { detected: locations.length > 0, locations };
  }

  /**
   * `= NULL`, `!= NULL` and `<> NULL`, which never match any row
   */
  detectIncorrectNullComparison(sql: string): NullComparisonResult {
    const fields = this.extractor
      .extractWhereConditions(sql)
      .filter(condition => condition.literalValue === null && NULL_EQUALITY_OPERATORS.has(condition.operator))
      .map(condition => `${condition.column} ${condition.operator} NULL`);
    return { detected: fields.length > 0, fields };
  }

  hasEmptyInClause(sql: string): boolean {
    return /\bIN\s*\(\s*\)/i.test(sql);
  }

  /**
   * LIKE against a quoted pattern that starts with a wildcard
   */
  hasUnescapedLike(sql: string): boolean {
    return /\bLIKE\s+['"][%_][^'"]*['"]/i.test(sql);
  }

  /**
   * Distinct `:name` placeholders in order of first appearance
   */
  extractParameterPlaceholders(sql: string): string[] {
    const names: string[] = [];
    for (const match of sql.matchAll(/(?<![:\w]):([A-Za-z_]\w*)/g)) {
      if (!names.includes(match[1])) names.push(match[1]);
    }
    return names;
  }

  /**
   * Named placeholders with no bound value. Positional parameter lists
   * cannot be matched by name and never report missing names.
   */
  detectMissingParameters(sql: string, params: QueryParams): MissingParametersResult {
    const placeholders = this.extractParameterPlaceholders(sql);
    if (placeholders.length === 0 || isPositional(params)) {
      return { hasMissing: false, missing: [] };
    }

    const missing = placeholders.filter(name => !Object.prototype.hasOwnProperty.call(params, name));
    return { hasMissing: missing.length > 0, missing };
  }

  getPatternDescription(pattern: QueryBuilderPattern): string {
    switch (pattern) {
      case 'sql_injection':
        return 'String concatenation in WHERE/AND/OR - use parameters instead';
      case 'incorrect_null':
        return 'Use IS NULL / IS NOT NULL instead of = NULL / != NULL';
      case 'empty_in':
        return 'Empty IN() clause will cause SQL syntax error';
      case 'unescaped_like':
        return 'LIKE with wildcards in SQL - should be parameterized and escaped';
      case 'missing_params':
        return 'Parameter placeholders without a bound value';
    }
  }

  getFixSuggestion(pattern: QueryBuilderPattern): string {
    switch (pattern) {
      case 'sql_injection':
        return 'Bind the value with a named parameter (:name) instead of concatenating it into the query';
      case 'incorrect_null':
        return "Compare with IS NULL or IS NOT NULL, e.g. WHERE deleted_at IS NULL";
      case 'empty_in':
        return 'Skip the IN() condition, or the whole query, when the list of values is empty';
      case 'unescaped_like':
        return "Escape % and _ in user input and bind the pattern as a parameter";
      case 'missing_params':
        return 'Bind a value for every placeholder before executing the query';
    }
  }
}

function isPositional(params: QueryParams): params is readonly unknown[] {
  return Array.isArray(params);
}
