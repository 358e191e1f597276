/**
 * @module analyzer/detectors/n-plus-one
 * @description Detects N+1 query patterns - the same query executed once per parent row
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/patterns/sql-pattern-detector.ts, src/analyzer/severity.ts
 * @lastModified 2026-10-19
 */

import type { Analyzer, AnalyzerContext, Issue } from '../../types/issues';
import type { ForeignKeyLookup } from '../../patterns/sql-pattern-detector';
import {
  detectNPlusOnePattern,
  detectNPlusOneFromJoin,
  detectLazyLoadingPattern,
} from '../../patterns/sql-pattern-detector';
import { QueryTrace } from '../../collections/query-trace';
import { IssueCollection } from '../../collections/issue-collection';
import { createIssue, formatMs } from '../issue-factory';
import { severityForNPlusOne, shouldSuppress } from '../severity';
import { runPerRecord } from '../context';
import { groupBySignature, firstBacktrace, type SignatureGroup } from './helpers';

// ============================================================================
// N+1 Query Detection
// ============================================================================

/**
 * Groups SELECTs by normalized signature.
 *
 * - `threshold` or more executions of a foreign-key or primary-key lookup
 *   is reported as an N+1 load of a relation
 * - `repetition_floor` or more executions of any other shape is still
 *   reported: repeating a query is the problem, however fast it is
 * - fewer is suppressed
 *
 * Example:
 *   11x SELECT * FROM users WHERE id = ?  (0.27ms each)
 *   → one warning, 11 executions, 2.97ms total
 */
export const nPlusOneAnalyzer: Analyzer = {
  name: 'n_plus_one',
  issueTypes: ['n_plus_one'],
  category: 'performance',

  analyze(trace: QueryTrace, context: AnalyzerContext): IssueCollection {
    const threshold = context.threshold('threshold');
    const repetitionFloor = context.threshold('repetition_floor');
    const groups = groupBySignature(trace.onlySelects(), context);

    return IssueCollection.lazy(() =>
      runPerRecord('n_plus_one', groups, context.logger, group =>
        analyzeGroup(group, threshold, repetitionFloor)
      )
    );
  },
};

// ============================================================================
// Detection Logic
// ============================================================================

type LoadShape =
  | { kind: 'foreign_key'; lookup: ForeignKeyLookup }
  | { kind: 'primary_key'; table: string }
  | { kind: 'repeated' };

function analyzeGroup(group: SignatureGroup, threshold: number, repetitionFloor: number): Issue[] {
  const count = group.records.size;
  if (shouldSuppress('n_plus_one', { count }) || count < repetitionFloor) {
    return [];
  }

  const representative = group.records.at(0);
  if (!representative) return [];

  const totalTimeMs = group.records.totalExecutionTime();
  const shape = count >= threshold ? loadShapeOf(representative.sql) : { kind: 'repeated' as const };
  const { title, description, context } = describe(shape, count, totalTimeMs);

  return [
    createIssue({
      type: 'n_plus_one',
      title,
      description,
      severity: severityForNPlusOne(count, totalTimeMs),
      category: 'performance',
      suggestion: {
        templateKey: shape.kind === 'repeated' ? 'repeated_query' : 'eager_loading',
        context: { ...context, count, signature: group.signature },
      },
      originQueries: group.records.distinctSql(),
      backtrace: firstBacktrace(group.records),
      metrics: { count, totalTimeMs, averageTimeMs: totalTimeMs / count },
    }),
  ];
}

function loadShapeOf(sql: string): LoadShape {
  const lookup = detectNPlusOnePattern(sql) ?? detectNPlusOneFromJoin(sql);
  if (lookup) return { kind: 'foreign_key', lookup };
  const table = detectLazyLoadingPattern(sql);
  if (table) return { kind: 'primary_key', table };
  return { kind: 'repeated' };
}

function describe(
  shape: LoadShape,
  count: number,
  totalTimeMs: number
): { title: string; description: string; context: Record<string, unknown> } {
  switch (shape.kind) {
    case 'foreign_key':
      return {
        title: `N+1 query: ${count} queries on ${shape.lookup.table}`,
        description:
          `Related rows of ${shape.lookup.table} were loaded one parent at a time by ${shape.lookup.foreignKeyColumn} ` +
          `(${count} queries, ${formatMs(totalTimeMs)} total). Load them in one query with a JOIN or an IN list.`,
        context: { table: shape.lookup.table, foreignKey: shape.lookup.foreignKeyColumn },
      };
    case 'primary_key':
      return {
        title: `N+1 query: ${count} queries on ${shape.table}`,
        description:
          `Rows of ${shape.table} were loaded one at a time by primary key ` +
          `(${count} queries, ${formatMs(totalTimeMs)} total). Fetch them together with a JOIN or WHERE id IN (...).`,
        context: { table: shape.table },
      };
    case 'repeated':
      return {
        title: `Repeated query: executed ${count} times`,
        description:
          `The same query ran ${count} times (${formatMs(totalTimeMs)} total). ` +
          'Repetition points to a query inside a loop; load the data once and reuse it.',
        context: {},
      };
  }
}
