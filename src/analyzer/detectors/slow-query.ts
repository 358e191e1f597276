/**
 * @module analyzer/detectors/slow-query
 * @description Reports queries slower than the configured threshold, with structural hints
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/parser/structure-extractor.ts, src/analyzer/severity.ts
 * @lastModified 2026-10-19
 */

import type { Analyzer, AnalyzerContext, Issue } from '../../types/issues';
import type { QueryRecord } from '../../types/query';
import type { SqlStructureExtractor } from '../../parser/structure-extractor';
import { QueryTrace } from '../../collections/query-trace';
import { IssueCollection } from '../../collections/issue-collection';
import { createIssue, formatMs } from '../issue-factory';
import { severityForSlowQuery, shouldSuppress } from '../severity';
import { runPerRecord } from '../context';

export const slowQueryAnalyzer: Analyzer = {
  name: 'slow_query',
  issueTypes: ['slow_query'],
  category: 'performance',

  analyze(trace: QueryTrace, context: AnalyzerContext): IssueCollection {
    const thresholdMs = context.threshold('threshold_ms');
    const slow = trace.filterSlow(thresholdMs);
    return IssueCollection.lazy(() =>
      runPerRecord('slow_query', slow, context.logger, record =>
        analyzeRecord(record, thresholdMs, context.extractor)
      )
    );
  },
};

function analyzeRecord(record: QueryRecord, thresholdMs: number, extractor: SqlStructureExtractor): Issue[] {
  const timeMs = record.executionTimeMs;
  if (shouldSuppress('slow_query', { timeMs })) return [];

  const hints = optimizationHints(record.sql, extractor);
  return [
    createIssue({
      type: 'slow_query',
      title: `Slow query: ${formatMs(timeMs)}`,
      description: `Query execution time (${formatMs(timeMs)}) exceeds threshold (${thresholdMs}ms). ${hints.join(' ')}`,
      severity: severityForSlowQuery(timeMs),
      category: 'performance',
      suggestion: { templateKey: 'slow_query', context: { executionTimeMs: timeMs, thresholdMs, hints } },
      originQueries: [record.sql],
      backtrace: record.backtrace ?? null,
      metrics: { timeMs, ...(record.rowCount !== undefined ? { rowCount: record.rowCount } : {}) },
    }),
  ];
}

/**
 * Structural reasons a query may be slow, in a fixed order
 *
 * @example
 * optimizationHints("SELECT * FROM users WHERE name LIKE '%son'", extractor);
 * // ['Leading wildcard LIKE detected - cannot use index efficiently']
 */
export function optimizationHints(sql: string, extractor: SqlStructureExtractor): string[] {
  const hints: string[] = [];
  if (extractor.hasSubquery(sql)) {
    hints.push('Subquery detected - consider rewriting as JOIN');
  }
  const orderBy = extractor.extractOrderByColumnNames(sql);
  if (orderBy.length > 0) {
    hints.push(`Ensure ORDER BY columns are indexed: ${orderBy.join(', ')}`);
  }
  const groupBy = extractor.extractGroupByColumns(sql);
  if (groupBy.length > 0) {
    hints.push(`Ensure GROUP BY columns are indexed: ${groupBy.join(', ')}`);
  }
  if (extractor.hasLeadingWildcardLike(sql)) {
    hints.push('Leading wildcard LIKE detected - cannot use index efficiently');
  }
  if (extractor.hasDistinct(sql)) {
    hints.push('DISTINCT operation can be expensive');
  }
  if (hints.length === 0) {
    hints.push('Review query structure and add appropriate indexes.');
  }
  return hints;
}
