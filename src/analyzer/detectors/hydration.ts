/**
 * @module analyzer/detectors/hydration
 * @description Detects SELECTs returning more rows than the application should turn into entities
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
import { severityForHydration } from '../severity';
import { runPerRecord } from '../context';
import { groupBySignature, tableToEntityName, type SignatureGroup } from './helpers';

interface SizedRecord {
  record: QueryRecord;
  rows: number;
}

/**
 * Rows come from the recorded row count, or the LIMIT when none was
 * recorded. Queries sharing a signature make one issue sized by the
 * largest of them.
 */
export const hydrationAnalyzer: Analyzer = {
  name: 'hydration',
  issueTypes: ['hydration'],
  category: 'performance',

  analyze(trace: QueryTrace, context: AnalyzerContext): IssueCollection {
    const rowThreshold = context.threshold('row_threshold');
    const selects = trace.onlySelects();

    return IssueCollection.lazy(() =>
      runPerRecord('hydration', groupBySignature(selects, context), context.logger, group =>
        analyzeGroup(group, rowThreshold, context)
      )
    );
  },
};

/**
 * Rows a SELECT hands back, or null when neither a row count nor a
 * numeric LIMIT is known
 *
 * @example
 * hydratedRows(createQueryRecord({ sql: 'SELECT * FROM users LIMIT 100, 300' }), extractor); // 300
 */
export function hydratedRows(record: QueryRecord, context: Pick<AnalyzerContext, 'extractor'>): number | null {
  if (record.rowCount !== undefined) return record.rowCount;
  return context.extractor.getLimitValue(record.sql);
}

function analyzeGroup(group: SignatureGroup, rowThreshold: number, context: AnalyzerContext): Issue[] {
  const oversized: SizedRecord[] = [];
  for (const record of group.records) {
    const rows = hydratedRows(record, context);
    if (rows !== null && rows > rowThreshold) oversized.push({ record, rows });
  }
  if (oversized.length === 0) return [];

  const largest = oversized.reduce((best, entry) => (entry.rows > best.rows ? entry : best));
  const { record, rows } = largest;
  const table = context.extractor.extractMainTable(record.sql)?.table ?? null;
  const subject = table === null ? 'Query' : `Query on ${table}`;

  return [
    createIssue({
      type: 'hydration',
      title: `Excessive hydration: ${rows} rows`,
      description:
        `${subject} returned ${rows} rows in ${formatMs(record.executionTimeMs)} (threshold: ${rowThreshold}). ` +
        'Turning every row into a managed entity adds hydration overhead and memory. ' +
        'Paginate the query, or read scalar results when the rows are only displayed.',
      severity: severityForHydration(rows),
      category: 'performance',
      suggestion: {
        templateKey: 'hydration',
        context: { rowCount: rows, threshold: rowThreshold, entity: table === null ? null : tableToEntityName(table) },
      },
      originQueries: [...new Set(oversized.map(entry => entry.record.sql))],
      backtrace: record.backtrace ?? null,
      metrics: { rowCount: rows, timeMs: record.executionTimeMs },
    }),
  ];
}
