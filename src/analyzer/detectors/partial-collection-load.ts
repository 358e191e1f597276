/**
 * @module analyzer/detectors/partial-collection-load
 * @description Detects paginated slices of a collection loaded repeatedly, one parent at a time
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/patterns/sql-pattern-detector.ts, src/analyzer/severity.ts
 * @lastModified 2026-10-19
 */

import type { Analyzer, AnalyzerContext, Issue } from '../../types/issues';
import { detectNPlusOnePattern, detectPartialCollectionLoad } from '../../patterns/sql-pattern-detector';
import { QueryTrace } from '../../collections/query-trace';
import { IssueCollection } from '../../collections/issue-collection';
import { createIssue, formatMs } from '../issue-factory';
import { severityForNPlusOne } from '../severity';
import { runPerRecord } from '../context';
import { groupBySignature, firstBacktrace, type SignatureGroup } from './helpers';

export const partialCollectionLoadAnalyzer: Analyzer = {
  name: 'partial_collection_load',
  issueTypes: ['partial_collection_load'],
  category: 'performance',

  analyze(trace: QueryTrace, context: AnalyzerContext): IssueCollection {
    const threshold = context.threshold('threshold');
    const groups = groupBySignature(trace.onlySelects(), context);
    return IssueCollection.lazy(() =>
      runPerRecord('partial_collection_load', groups, context.logger, group => analyzeGroup(group, threshold))
    );
  },
};

function analyzeGroup(group: SignatureGroup, threshold: number): Issue[] {
  const count = group.records.size;
  const sql = group.records.at(0)?.sql;
  if (count < threshold || sql === undefined || !detectPartialCollectionLoad(sql)) return [];

  const lookup = detectNPlusOnePattern(sql);
  const table = lookup?.table ?? 'collection';
  const totalTimeMs = group.records.totalExecutionTime();

  return [
    createIssue({
      type: 'partial_collection_load',
      title: `Partial collection load: ${count} limited queries on ${table}`,
      description:
        `A LIMITed slice of ${table} was loaded ${count} times, once per parent ` +
        `(${formatMs(totalTimeMs)} total). Load the slices for all parents in one query, ` +
        'or use a window function to rank rows per parent.',
      severity: severityForNPlusOne(count, totalTimeMs),
      category: 'performance',
      suggestion: {
        templateKey: 'partial_collection_load',
        context: { table, foreignKey: lookup?.foreignKeyColumn ?? null, count },
      },
      originQueries: group.records.distinctSql(),
      backtrace: firstBacktrace(group.records),
      metrics: { count, totalTimeMs },
    }),
  ];
}
