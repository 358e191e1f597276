/**
 * @module types/issues
 * @description Type definitions for detected issues and the analyzer contract
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/types/query.ts, src/types/mapping.ts
 * @lastModified 2026-10-19
 */

import type { BacktraceFrame } from './query';
import type { MappingRecord } from './mapping';
import type { QueryTrace } from '../collections/query-trace';
import type { IssueCollection } from '../collections/issue-collection';
import type { SqlStructureExtractor } from '../parser/structure-extractor';
import type { QueryNormalizer } from '../parser/query-normalizer';
import type { Logger } from '../logging/logger';

// ============================================================================
// Issue Categories
// ============================================================================

/**
 * High-level issue categories
 */
export type IssueCategory =
  | 'performance' // N+1, slow queries, scans
  | 'security' // string-built SQL
  | 'integrity'; // mapping and data-correctness problems

/**
 * Specific issue types
 */
export type IssueType =
  // Performance Issues
  | 'n_plus_one'
  | 'lazy_loading'
  | 'frequent_query'
  | 'slow_query'
  | 'missing_index'
  | 'ineffective_like_pattern'
  | 'too_many_joins'
  | 'unused_join'
  | 'left_join_not_null'
  | 'limit_with_collection_join'
  | 'partial_collection_load'
  | 'find_all'
  | 'order_by_without_limit'
  | 'function_in_where'
  | 'hydration'
  | 'flush_in_loop'
  | 'entity_manager_clear'
  // Security Issues
  | 'sql_injection'
  | 'unescaped_like'
  // Query Correctness Issues
  | 'incorrect_null_comparison'
  | 'empty_in_clause'
  | 'missing_parameters'
  | 'division_by_zero'
  // Mapping Integrity Issues
  | 'cascade_all'
  | 'cascade_remove_on_independent_entity'
  | 'orphan_removal_without_cascade_remove'
  | 'on_delete_cascade_mismatch'
  | 'float_for_money'
  | 'decimal_missing_precision'
  | 'decimal_insufficient_precision'
  | 'decimal_excessive_precision'
  | 'decimal_unusual_scale'
  | 'foreign_key_as_scalar';

// ============================================================================
// Issue Severity
// ============================================================================

/**
 * Issue severity levels
 */
export type IssueSeverity =
  | 'critical' // Fix before shipping
  | 'warning' // Measurable cost, should fix
  | 'info'; // Worth knowing

/**
 * Total order over severities, lower rank is more severe
 */
export const SEVERITY_RANK: Readonly<Record<IssueSeverity, number>> = {
  critical: 0,
  warning: 1,
  info: 2,
};

export const SEVERITY_ORDER: readonly IssueSeverity[] = ['critical', 'warning', 'info'];

// ============================================================================
// Core Issue Interface
// ============================================================================

/**
 * Reference to a remediation template, rendered by a SuggestionRenderer
 */
export interface SuggestionRef {
  templateKey: string;
  context: Readonly<Record<string, unknown>>;
}

/**
 * Impact metrics the severity was derived from
 */
export type IssueMetrics = Readonly<Record<string, number>>;

/**
 * A detected problem. Frozen once created by createIssue().
 *
 * @example
 * const issue: Issue = {
 *   id: 'n_plus_one-3f2a9c1e0b7d',
 *   type: 'n_plus_one',
 *   title: 'N+1 query: 11 executions of the same query',
 *   description: '...',
 *   severity: 'warning',
 *   category: 'performance',
 *   originQueries: ['SELECT * FROM users WHERE id = ?'],
 *   backtrace: null,
 *   metrics: { count: 11, totalTimeMs: 2.97 },
 * };
 */
export interface Issue {
  /** Deterministic identifier derived from type and dedup key */
  readonly id: string;
  readonly type: IssueType;
  readonly title: string;
  readonly description: string;
  readonly severity: IssueSeverity;
  readonly category: IssueCategory;
  readonly suggestion?: SuggestionRef;
  /** Every distinct SQL string that contributed to the finding */
  readonly originQueries: readonly string[];
  readonly backtrace: readonly BacktraceFrame[] | null;
  readonly metrics: IssueMetrics;
  /** Narrower identity than the query signature (e.g. Entity.field) */
  readonly dedupKey?: string;
}

// ============================================================================
// Analyzer Interface
// ============================================================================

/**
 * Resolved settings for one analyzer
 */
export interface AnalyzerSettings {
  readonly enabled: boolean;
  readonly thresholds: Readonly<Record<string, number>>;
}

/**
 * Everything an analyzer receives besides the trace
 */
export interface AnalyzerContext {
  readonly extractor: SqlStructureExtractor;
  readonly normalizer: QueryNormalizer;
  readonly mappings: readonly MappingRecord[];
  readonly settings: AnalyzerSettings;
  readonly logger: Logger;
  /** Resolved threshold value; throws ConfigurationError when unknown */
  threshold(key: string): number;
}

/**
 * Interface for all analyzers
 */
export interface Analyzer {
  /** Configuration key, e.g. n_plus_one */
  readonly name: string;
  readonly issueTypes: readonly IssueType[];
  readonly category: IssueCategory;
  /** Analyze the trace. Pure apart from diagnostic logging. */
  analyze(trace: QueryTrace, context: AnalyzerContext): IssueCollection;
}
