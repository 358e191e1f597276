/**
 * @module analyzer/detectors/lazy-loading
 * @description Detects entities lazy-loaded one by one inside a loop
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/patterns/sql-pattern-detector.ts, src/analyzer/severity.ts
 * @lastModified 2026-10-19
 */

import type { Analyzer, AnalyzerContext, Issue } from '../../types/issues';
import type { QueryRecord } from '../../types/query';
import { detectLazyLoadingPattern } from '../../patterns/sql-pattern-detector';
import { QueryTrace } from '../../collections/query-trace';
import { IssueCollection } from '../../collections/issue-collection';
import { createIssue, formatMs } from '../issue-factory';
import { severityForNPlusOne } from '../severity';
import { runPerRecord } from '../context';
import { firstBacktrace, relationFromBacktrace, tableToEntityName } from './helpers';

interface TableLoads {
  table: string;
  records: QueryRecord[];
  indices: number[];
}

/**
 * Primary-key loads of one table, `threshold` or more of them, whose
 * average distance in the trace is at most `max_sequential_gap` queries
 */
export const lazyLoadingAnalyzer: Analyzer = {
  name: 'lazy_loading',
  issueTypes: ['lazy_loading'],
  category: 'performance',

  analyze(trace: QueryTrace, context: AnalyzerContext): IssueCollection {
    const threshold = context.threshold('threshold');
    const maxGap = context.threshold('max_sequential_gap');

    return IssueCollection.lazy(() => {
      const loads = collectPrimaryKeyLoads(trace, context);
      return runPerRecord('lazy_loading', loads, context.logger, group =>
        analyzeTable(group, threshold, maxGap)
      );
    });
  },
};

function collectPrimaryKeyLoads(trace: QueryTrace, context: AnalyzerContext): TableLoads[] {
  const byTable = new Map<string, TableLoads>();
  let index = 0;
  for (const record of trace) {
    const position = index++;
    let table: string | null;
    try {
      table = detectLazyLoadingPattern(record.sql);
    } catch (error) {
      context.logger.debug('Lazy-loading shape check failed, skipping query:', error);
      continue;
    }
    if (table === null) continue;

    const key = table.toLowerCase();
    const loads = byTable.get(key);
    if (loads) {
      loads.records.push(record);
      loads.indices.push(position);
    } else {
      byTable.set(key, { table, records: [record], indices: [position] });
    }
  }
  return [...byTable.values()];
}

function analyzeTable(loads: TableLoads, threshold: number, maxGap: number): Issue[] {
  const count = loads.records.length;
  if (count < threshold || !isInLoop(loads.indices, maxGap)) return [];

  const records = new QueryTrace(loads.records);
  const totalTimeMs = records.totalExecutionTime();
  const backtrace = firstBacktrace(records);
  const entity = tableToEntityName(loads.table);
  const relation = relationFromBacktrace(backtrace) ?? 'relation';

  return [
    createIssue({
      type: 'lazy_loading',
      title: `Lazy loading in loop: ${count} queries on ${entity}`,
      description:
        `Detected ${count} sequential lazy-loaded queries on entity ${entity} (relation: ${relation}, ` +
        `${formatMs(totalTimeMs)} total). Use eager loading with a fetch join to load them together.`,
      severity: severityForNPlusOne(count, totalTimeMs),
      category: 'performance',
      suggestion: { templateKey: 'eager_loading', context: { table: loads.table, entity, relation, count } },
      originQueries: records.distinctSql(),
      backtrace,
      metrics: { count, totalTimeMs },
    }),
  ];
}

/**
 * Average gap between consecutive positions at most `maxGap`
 */
export function isInLoop(indices: readonly number[], maxGap: number): boolean {
  if (indices.length < 2) return false;
  const span = indices[indices.length - 1] - indices[0];
  return span / (indices.length - 1) <= maxGap;
}
