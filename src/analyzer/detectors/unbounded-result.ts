/**
 * @module analyzer/detectors/unbounded-result
 * @description Detects queries that return every row: find-all and ORDER BY without LIMIT
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/parser/structure-extractor.ts, src/analyzer/severity.ts
 * @lastModified 2026-10-19
 */

import type { Analyzer, AnalyzerContext, Issue } from '../../types/issues';
import type { QueryRecord } from '../../types/query';
import { QueryTrace } from '../../collections/query-trace';
import { IssueCollection } from '../../collections/issue-collection';
import { createIssue, formatMs } from '../issue-factory';
import { severityForUnboundedResult, shouldSuppress } from '../severity';
import { runPerRecord } from '../context';

const EXISTS = /\bEXISTS\s*\(/i;

// ============================================================================
// Find All
// ============================================================================

/**
 * SELECT with neither WHERE nor LIMIT returning more than `threshold` rows
 */
export const findAllAnalyzer: Analyzer = {
  name: 'find_all',
  issueTypes: ['find_all'],
  category: 'performance',

  analyze(trace: QueryTrace, context: AnalyzerContext): IssueCollection {
    const threshold = context.threshold('threshold');
    const candidates = trace.onlySelects().withRowCountAbove(threshold);
    return IssueCollection.lazy(() =>
      runPerRecord('find_all', candidates, context.logger, record => analyzeFindAll(record, context))
    );
  },
};

function analyzeFindAll(record: QueryRecord, context: AnalyzerContext): Issue[] {
  const rowCount = record.rowCount ?? 0;
  if (shouldSuppress('find_all', { rowCount })) return [];

  const structure = context.extractor.extract(record.sql);
  if (!structure.mainTable || structure.hasLimit || /\bWHERE\b/i.test(record.sql)) return [];
  if (structure.aggregationFunctions.length > 0 || EXISTS.test(record.sql)) return [];

  const table = structure.mainTable.table;
  const timeMs = record.executionTimeMs;
  return [
    createIssue({
      type: 'find_all',
      title: `Unpaginated query: ${table} returned ${rowCount} rows`,
      description:
        `Query loads every row of ${table} (${rowCount} rows, ${formatMs(timeMs)}) with no WHERE or LIMIT. ` +
        'Consider adding pagination or filters.',
      severity: severityForUnboundedResult(rowCount, timeMs),
      category: 'performance',
      suggestion: { templateKey: 'pagination', context: { table, rowCount } },
      originQueries: [record.sql],
      backtrace: record.backtrace ?? null,
      metrics: { rowCount, timeMs },
    }),
  ];
}

// ============================================================================
// ORDER BY Without LIMIT
// ============================================================================

/**
 * Sorting a result that is returned in full: the database sorts every row
 * and the application receives all of them
 */
export const orderByWithoutLimitAnalyzer: Analyzer = {
  name: 'order_by_without_limit',
  issueTypes: ['order_by_without_limit'],
  category: 'performance',

  analyze(trace: QueryTrace, context: AnalyzerContext): IssueCollection {
    const candidates = trace.onlySelects().filter(record => record.rowCount !== undefined);
    return IssueCollection.lazy(() =>
      runPerRecord('order_by_without_limit', candidates, context.logger, record =>
        analyzeOrderBy(record, context)
      )
    );
  },
};

function analyzeOrderBy(record: QueryRecord, context: AnalyzerContext): Issue[] {
  const rowCount = record.rowCount ?? 0;
  if (shouldSuppress('order_by_without_limit', { rowCount })) return [];

  const sql = record.sql;
  if (!context.extractor.hasOrderBy(sql)) return [];
  const structure = context.extractor.extract(sql);
  if (structure.hasLimit || structure.aggregationFunctions.length > 0) return [];

  const columns = structure.orderByColumns;
  const timeMs = record.executionTimeMs;
  return [
    createIssue({
      type: 'order_by_without_limit',
      title: `ORDER BY without LIMIT: ${rowCount} rows sorted`,
      description:
        `Query sorts ${rowCount} rows${columns.length > 0 ? ` by ${columns.join(', ')}` : ''} and returns all of them ` +
        `(${formatMs(timeMs)}). Add a LIMIT, or drop the ORDER BY when the order is not used.`,
      severity: severityForUnboundedResult(rowCount, timeMs),
      category: 'performance',
      suggestion: { templateKey: 'pagination', context: { table: structure.mainTable?.table ?? null, rowCount } },
      originQueries: [sql],
      backtrace: record.backtrace ?? null,
      metrics: { rowCount, timeMs },
    }),
  ];
}
