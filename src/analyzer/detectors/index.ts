/**
 * @module analyzer/detectors
 * @description Analyzer exports and the ordered registry
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/types/issues.ts
 * @lastModified 2026-10-19
 */

// ============================================================================
// Analyzer Exports
// ============================================================================

export { nPlusOneAnalyzer } from './n-plus-one';
export { lazyLoadingAnalyzer, isInLoop } from './lazy-loading';
export { frequentQueryAnalyzer } from './frequent-query';
export { slowQueryAnalyzer, optimizationHints } from './slow-query';
export { missingIndexAnalyzer } from './missing-index';
export { ineffectiveLikeAnalyzer, leadingWildcardPattern } from './ineffective-like';
export { joinOptimizationAnalyzer } from './join-optimization';
export { limitWithCollectionJoinAnalyzer, isCollectionJoin } from './limit-with-collection-join';
export { partialCollectionLoadAnalyzer } from './partial-collection-load';
export { findAllAnalyzer, orderByWithoutLimitAnalyzer } from './unbounded-result';
export { functionInWhereAnalyzer, columnWrappingFunctions } from './function-in-where';
export { hydrationAnalyzer, hydratedRows } from './hydration';
export {
  flushInLoopAnalyzer,
  entityManagerClearAnalyzer,
  detectFlushGroups,
  isSequential,
  type FlushGroup,
} from './write-batching';
export { sqlInjectionAnalyzer } from './sql-injection';
export { divisionByZeroAnalyzer, unguardedDivisions, type Division } from './division-by-zero';
export { queryBuilderPracticesAnalyzer } from './query-builder-practices';
export { cascadeConfigurationAnalyzer, hasCascade, isIndependentEntity } from './cascade-configuration';
export { onDeleteConsistencyAnalyzer, identifyMismatch, type OnDeleteMismatch } from './on-delete-consistency';
export {
  floatForMoneyAnalyzer,
  decimalPrecisionAnalyzer,
  foreignKeyMappingAnalyzer,
  classifyField,
  referencedEntityOf,
  type FieldKind,
} from './column-types';

// ============================================================================
// All Analyzers Array
// ============================================================================

import { nPlusOneAnalyzer } from './n-plus-one';
import { lazyLoadingAnalyzer } from './lazy-loading';
import { frequentQueryAnalyzer } from './frequent-query';
import { slowQueryAnalyzer } from './slow-query';
import { missingIndexAnalyzer } from './missing-index';
import { ineffectiveLikeAnalyzer } from './ineffective-like';
import { joinOptimizationAnalyzer } from './join-optimization';
import { limitWithCollectionJoinAnalyzer } from './limit-with-collection-join';
import { partialCollectionLoadAnalyzer } from './partial-collection-load';
import { findAllAnalyzer, orderByWithoutLimitAnalyzer } from './unbounded-result';
import { functionInWhereAnalyzer } from './function-in-where';
import { hydrationAnalyzer } from './hydration';
import { flushInLoopAnalyzer, entityManagerClearAnalyzer } from './write-batching';
import { sqlInjectionAnalyzer } from './sql-injection';
import { divisionByZeroAnalyzer } from './division-by-zero';
import { queryBuilderPracticesAnalyzer } from './query-builder-practices';
import { cascadeConfigurationAnalyzer } from './cascade-configuration';
import { onDeleteConsistencyAnalyzer } from './on-delete-consistency';
import { floatForMoneyAnalyzer, decimalPrecisionAnalyzer, foreignKeyMappingAnalyzer } from './column-types';

import type { Analyzer, IssueType } from '../../types/issues';

/**
 * All available analyzers.
 * Order is the order issues are collected in; the deduplicator sorts the
 * final list, so it only affects log output.
 */
export const allAnalyzers: readonly Analyzer[] = [
  // Repetition
  nPlusOneAnalyzer,
  lazyLoadingAnalyzer,
  frequentQueryAnalyzer,
  partialCollectionLoadAnalyzer,
  // Cost
  slowQueryAnalyzer,
  missingIndexAnalyzer,
  ineffectiveLikeAnalyzer,
  functionInWhereAnalyzer,
  findAllAnalyzer,
  orderByWithoutLimitAnalyzer,
  hydrationAnalyzer,
  // Write batching
  flushInLoopAnalyzer,
  entityManagerClearAnalyzer,
  // Structure
  joinOptimizationAnalyzer,
  limitWithCollectionJoinAnalyzer,
  // Security and correctness
  sqlInjectionAnalyzer,
  queryBuilderPracticesAnalyzer,
  divisionByZeroAnalyzer,
  // Mapping integrity
  cascadeConfigurationAnalyzer,
  onDeleteConsistencyAnalyzer,
  floatForMoneyAnalyzer,
  decimalPrecisionAnalyzer,
  foreignKeyMappingAnalyzer,
];

/**
 * Get analyzer by name
 */
export function getAnalyzer(name: string): Analyzer | undefined {
  return allAnalyzers.find(a => a.name === name);
}

/**
 * Get analyzers that can emit a given issue type
 */
export function getAnalyzersForIssueType(issueType: IssueType): Analyzer[] {
  return allAnalyzers.filter(a => a.issueTypes.includes(issueType));
}
