/**
 * @module analyzer/detectors/frequent-query
 * @description Flags queries executed many times in one trace, whatever their shape
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/analyzer/severity.ts
 * @lastModified 2026-10-19
 */

import type { Analyzer, AnalyzerContext, Issue } from '../../types/issues';
import { QueryTrace } from '../../collections/query-trace';
import { IssueCollection } from '../../collections/issue-collection';
import { createIssue, formatMs } from '../issue-factory';
import { severityForFrequentQuery, shouldSuppress } from '../severity';
import { runPerRecord } from '../context';
import { groupBySignature, firstBacktrace, type SignatureGroup } from './helpers';

export const frequentQueryAnalyzer: Analyzer = {
  name: 'frequent_query',
  issueTypes: ['frequent_query'],
  category: 'performance',

  analyze(trace: QueryTrace, context: AnalyzerContext): IssueCollection {
    const threshold = context.threshold('threshold');
    const groups = groupBySignature(trace, context);
    return IssueCollection.lazy(() =>
      runPerRecord('frequent_query', groups, context.logger, group => analyzeGroup(group, threshold))
    );
  },
};

function analyzeGroup(group: SignatureGroup, threshold: number): Issue[] {
  const count = group.records.size;
  if (count < threshold || shouldSuppress('frequent_query', { count })) return [];

  const totalTimeMs = group.records.totalExecutionTime();
  return [
    createIssue({
      type: 'frequent_query',
      title: `Frequent query: executed ${count} times (${formatMs(totalTimeMs)} total)`,
      description:
        `This query ran ${count} times in one trace. Cache the result, or batch the calls into a single query.`,
      severity: severityForFrequentQuery(count, totalTimeMs),
      category: 'performance',
      suggestion: { templateKey: 'query_caching', context: { count, totalTimeMs, signature: group.signature } },
      originQueries: group.records.distinctSql(),
      backtrace: firstBacktrace(group.records),
      metrics: { count, totalTimeMs },
    }),
  ];
}
