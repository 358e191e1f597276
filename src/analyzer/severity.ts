/**
 * @module analyzer/severity
 * @description Maps impact metrics to severity, plus the per-type noise floor
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/constants.ts, src/types/issues.ts
 * @lastModified 2026-10-19
 *
 * Analyzers never compare metrics against severity thresholds themselves;
 * every severity decision goes through one of these functions.
 */

import type { IssueSeverity, IssueType } from '../types/issues';
import {
  N_PLUS_ONE_SEVERITY,
  MISSING_INDEX_SEVERITY,
  SLOW_QUERY_SEVERITY,
  FREQUENT_QUERY_SEVERITY,
  HYDRATION_SEVERITY,
  FLUSH_IN_LOOP_SEVERITY,
  BATCH_WRITE_SEVERITY,
  UNBOUNDED_RESULT_SEVERITY,
  INJECTION_RISK_SEVERITY,
  LIKE_PATTERN_SEVERITY,
  JOIN_COUNT_SEVERITY,
  SUPPRESSION_FLOORS,
} from '../constants';

// ============================================================================
// Severity Functions
// ============================================================================

/**
 * count > 100 or total > 100ms: critical; count > 10 or total > 10ms: warning
 */
export function severityForNPlusOne(count: number, totalTimeMs: number): IssueSeverity {
  if (count > N_PLUS_ONE_SEVERITY.CRITICAL_COUNT || totalTimeMs > N_PLUS_ONE_SEVERITY.CRITICAL_TOTAL_MS) {
    return 'critical';
  }
  if (count > N_PLUS_ONE_SEVERITY.WARNING_COUNT || totalTimeMs > N_PLUS_ONE_SEVERITY.WARNING_TOTAL_MS) {
    return 'warning';
  }
  return 'info';
}

/**
 * rows > 100 000 or > 100ms: critical; rows > 1 000 or > 10ms: warning
 */
export function severityForMissingIndex(rowsScanned: number, queryTimeMs: number): IssueSeverity {
  if (rowsScanned > MISSING_INDEX_SEVERITY.CRITICAL_ROWS || queryTimeMs > MISSING_INDEX_SEVERITY.CRITICAL_MS) {
    return 'critical';
  }
  if (rowsScanned > MISSING_INDEX_SEVERITY.WARNING_ROWS || queryTimeMs > MISSING_INDEX_SEVERITY.WARNING_MS) {
    return 'warning';
  }
  return 'info';
}

/**
 * > 100ms: critical; from 10ms (the reporting floor) up: warning
 */
export function severityForSlowQuery(timeMs: number): IssueSeverity {
  if (timeMs > SLOW_QUERY_SEVERITY.CRITICAL_MS) return 'critical';
  if (timeMs >= SLOW_QUERY_SEVERITY.WARNING_MS) return 'warning';
  return 'info';
}

export function severityForFrequentQuery(count: number, totalTimeMs: number): IssueSeverity {
  if (count > FREQUENT_QUERY_SEVERITY.CRITICAL_COUNT || totalTimeMs > FREQUENT_QUERY_SEVERITY.CRITICAL_TOTAL_MS) {
    return 'critical';
  }
  if (count > FREQUENT_QUERY_SEVERITY.WARNING_COUNT || totalTimeMs > FREQUENT_QUERY_SEVERITY.WARNING_TOTAL_MS) {
    return 'warning';
  }
  return 'info';
}

/**
 * Large result sets loaded into memory. Byte size is optional.
 */
export function severityForHydration(rowCount: number, bytes = 0): IssueSeverity {
  if (rowCount > HYDRATION_SEVERITY.CRITICAL_ROWS || bytes > HYDRATION_SEVERITY.CRITICAL_BYTES) {
    return 'critical';
  }
  if (rowCount > HYDRATION_SEVERITY.WARNING_ROWS || bytes > HYDRATION_SEVERITY.WARNING_BYTES) {
    return 'warning';
  }
  return 'info';
}

export function severityForFlushInLoop(flushCount: number): IssueSeverity {
  return flushCount >= FLUSH_IN_LOOP_SEVERITY.CRITICAL_FLUSHES ? 'critical' : 'warning';
}

export function severityForBatchWrites(writeCount: number): IssueSeverity {
  return writeCount >= BATCH_WRITE_SEVERITY.CRITICAL_WRITES ? 'critical' : 'warning';
}

/**
 * Queries returning every matching row (no WHERE/LIMIT, or ORDER BY without LIMIT)
 */
export function severityForUnboundedResult(rowCount: number, timeMs: number): IssueSeverity {
  if (rowCount > UNBOUNDED_RESULT_SEVERITY.CRITICAL_ROWS) return 'critical';
  if (rowCount > UNBOUNDED_RESULT_SEVERITY.WARNING_ROWS || timeMs > UNBOUNDED_RESULT_SEVERITY.WARNING_MS) {
    return 'warning';
  }
  return 'info';
}

export function severityForInjectionRisk(riskLevel: number): IssueSeverity {
  if (riskLevel >= INJECTION_RISK_SEVERITY.CRITICAL_SCORE) return 'critical';
  if (riskLevel >= INJECTION_RISK_SEVERITY.WARNING_SCORE) return 'warning';
  return 'info';
}

/**
 * A leading-wildcard LIKE is always at least a warning
 */
export function severityForLikePattern(timeMs: number): IssueSeverity {
  return timeMs >= LIKE_PATTERN_SEVERITY.CRITICAL_MS ? 'critical' : 'warning';
}

export function severityForJoinCount(joinCount: number): IssueSeverity {
  return joinCount > JOIN_COUNT_SEVERITY.CRITICAL_JOINS ? 'critical' : 'warning';
}

/**
 * cascade "all" is critical on a many-to-one or many-to-many association to
 * an entity that exists on its own (users, categories, ...)
 */
export function severityForCascadeAll(manyToSide: boolean, targetIsIndependent: boolean): IssueSeverity {
  return manyToSide && targetIsIndependent ? 'critical' : 'warning';
}

/**
 * Fixed severity of findings that carry no magnitude: the pattern itself
 * is the problem
 */
const PATTERN_SEVERITY: Partial<Record<IssueType, IssueSeverity>> = {
  unused_join: 'warning',
  left_join_not_null: 'warning',
  limit_with_collection_join: 'critical',
  function_in_where: 'warning',
  unescaped_like: 'warning',
  incorrect_null_comparison: 'critical',
  empty_in_clause: 'critical',
  missing_parameters: 'critical',
  division_by_zero: 'critical',
  cascade_all: 'warning',
  cascade_remove_on_independent_entity: 'critical',
  orphan_removal_without_cascade_remove: 'warning',
  on_delete_cascade_mismatch: 'warning',
  float_for_money: 'critical',
  decimal_missing_precision: 'warning',
  decimal_insufficient_precision: 'warning',
  decimal_excessive_precision: 'info',
  decimal_unusual_scale: 'info',
  foreign_key_as_scalar: 'warning',
};

/**
 * Severity of a magnitude-free finding; info for types measured by metrics
 */
export function severityForPattern(type: IssueType): IssueSeverity {
  return PATTERN_SEVERITY[type] ?? 'info';
}

// ============================================================================
// Suppression
// ============================================================================

export interface SuppressionMetrics {
  count?: number;
  timeMs?: number;
  rowsScanned?: number;
  rowCount?: number;
}

/**
 * True when a candidate is below the reporting floor for its type and
 * must not become an issue. Types without a floor are never suppressed.
 *
 * @example
 * shouldSuppress('n_plus_one', { count: 2 }); // true
 * shouldSuppress('n_plus_one', { count: 3 }); // false
 */
export function shouldSuppress(type: IssueType, metrics: SuppressionMetrics): boolean {
  switch (type) {
    case 'slow_query':
      return (metrics.timeMs ?? 0) < SUPPRESSION_FLOORS.SLOW_QUERY_MS;
    case 'missing_index':
      return (metrics.rowsScanned ?? 0) < SUPPRESSION_FLOORS.MISSING_INDEX_ROWS;
    case 'n_plus_one':
      return (metrics.count ?? 0) < SUPPRESSION_FLOORS.N_PLUS_ONE_COUNT;
    case 'frequent_query':
      return (metrics.count ?? 0) < SUPPRESSION_FLOORS.FREQUENT_QUERY_COUNT;
    case 'order_by_without_limit':
      return (metrics.rowCount ?? 0) < SUPPRESSION_FLOORS.ORDER_BY_WITHOUT_LIMIT_ROWS;
    case 'find_all':
      return (metrics.rowCount ?? 0) < SUPPRESSION_FLOORS.FIND_ALL_ROWS;
    default:
      return false;
  }
}
