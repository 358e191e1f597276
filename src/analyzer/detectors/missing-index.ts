/**
 * @module analyzer/detectors/missing-index
 * @description Detects filtered queries that scan many rows without an index
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
import { severityForMissingIndex, shouldSuppress } from '../severity';
import { runPerRecord } from '../context';

/**
 * Rows scanned come from the EXPLAIN plan when the host supplied one,
 * otherwise from the row count. A plan that shows an index in use on
 * anything but a full scan clears the query.
 */
export const missingIndexAnalyzer: Analyzer = {
  name: 'missing_index',
  issueTypes: ['missing_index'],
  category: 'performance',

  analyze(trace: QueryTrace, context: AnalyzerContext): IssueCollection {
    const minRowsScanned = context.threshold('min_rows_scanned');
    const selects = trace.onlySelects();
    return IssueCollection.lazy(() =>
      runPerRecord('missing_index', selects, context.logger, record =>
        analyzeRecord(record, minRowsScanned, context.extractor)
      )
    );
  },
};

function analyzeRecord(record: QueryRecord, minRowsScanned: number, extractor: SqlStructureExtractor): Issue[] {
  const rowsScanned = record.explain?.rowsExamined ?? record.rowCount;
  if (rowsScanned === undefined || rowsScanned < minRowsScanned) return [];
  if (shouldSuppress('missing_index', { rowsScanned })) return [];
  if (usesIndex(record)) return [];

  const columns = extractor.extractWhereColumns(record.sql);
  const table = extractor.extractMainTable(record.sql)?.table;
  if (columns.length === 0 || !table) return [];

  const timeMs = record.executionTimeMs;
  const indexStatement = `CREATE INDEX idx_${table}_${columns.join('_')} ON ${table} (${columns.join(', ')})`;

  return [
    createIssue({
      type: 'missing_index',
      title: `Missing index on ${table}: ${rowsScanned} rows scanned`,
      description:
        `Query filtering ${table} by ${columns.join(', ')} examined ${rowsScanned} rows in ${formatMs(timeMs)}. ` +
        'An index on the filtered columns would let the database skip the full scan.',
      severity: severityForMissingIndex(rowsScanned, timeMs),
      category: 'performance',
      suggestion: { templateKey: 'missing_index', context: { table, columns, indexStatement, rowsScanned } },
      originQueries: [record.sql],
      backtrace: record.backtrace ?? null,
      metrics: { rowsScanned, timeMs },
    }),
  ];
}

function usesIndex(record: QueryRecord): boolean {
  const explain = record.explain;
  if (!explain) return false;
  const fullScan = explain.accessType?.toUpperCase() === 'ALL';
  const hasKey = typeof explain.key === 'string' && explain.key !== '';
  return hasKey && !fullScan;
}
