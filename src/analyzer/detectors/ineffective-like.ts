/**
 * @module analyzer/detectors/ineffective-like
 * @description Detects LIKE patterns starting with a wildcard, which cannot use an index
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/analyzer/severity.ts
 * @lastModified 2026-10-19
 */

import type { Analyzer, AnalyzerContext, Issue } from '../../types/issues';
import type { QueryRecord } from '../../types/query';
import { QueryTrace } from '../../collections/query-trace';
import { IssueCollection } from '../../collections/issue-collection';
import { createIssue, formatMs } from '../issue-factory';
import { severityForLikePattern } from '../severity';
import { runPerRecord } from '../context';
import { firstBacktrace, stringParams } from './helpers';

export type LikeType = 'contains' | 'ends_with';

const LITERAL_LEADING_WILDCARD = /\bLIKE\s+(['"])(%[^'"]+)\1/i;
const BOUND_LIKE = /\bLIKE\s+(?:\?|:\w+|\$\d+)/i;

/**
 * Only queries at or above `min_execution_time_ms` are reported. Queries
 * sharing a pattern make one issue, timed by the slowest of them.
 */
export const ineffectiveLikeAnalyzer: Analyzer = {
  name: 'ineffective_like',
  issueTypes: ['ineffective_like_pattern'],
  category: 'performance',

  analyze(trace: QueryTrace, context: AnalyzerContext): IssueCollection {
    const minTimeMs = context.threshold('min_execution_time_ms');
    const candidates = trace.filter(record => record.executionTimeMs >= minTimeMs);

    return IssueCollection.lazy(() =>
      runPerRecord('ineffective_like', groupByPattern(candidates), context.logger, ([pattern, records]) => {
        const slowest = records.slowest();
        return slowest ? [createLikeIssue(slowest, pattern, records)] : [];
      })
    );
  },
};

function groupByPattern(trace: QueryTrace): Array<[string, QueryTrace]> {
  const groups: Array<[string, QueryTrace]> = [];
  for (const [pattern, records] of trace.groupBy(leadingWildcardPattern)) {
    if (pattern !== null) groups.push([pattern, records]);
  }
  return groups;
}

/**
 * The first LIKE pattern starting with `%`, written in the SQL or bound
 * as a parameter
 */
export function leadingWildcardPattern(record: QueryRecord): string | null {
  const literal = LITERAL_LEADING_WILDCARD.exec(record.sql);
  if (literal) return literal[2];
  if (!BOUND_LIKE.test(record.sql)) return null;
  return stringParams(record).find(value => value.startsWith('%') && value.length > 1) ?? null;
}

export function likeTypeOf(pattern: string): LikeType {
  return pattern.length > 1 && pattern.endsWith('%') ? 'contains' : 'ends_with';
}

function createLikeIssue(record: QueryRecord, pattern: string, group: QueryTrace): Issue {
  const timeMs = record.executionTimeMs;
  const severity = severityForLikePattern(timeMs);
  const likeType = likeTypeOf(pattern);
  const shape = likeType === 'contains' ? "LIKE '%...%'" : "LIKE '%...'";

  return createIssue({
    type: 'ineffective_like_pattern',
    title:
      severity === 'critical'
        ? `LIKE pattern causing slow query (${formatMs(timeMs)})`
        : `LIKE pattern prevents index usage (${formatMs(timeMs)})`,
    description:
      `Pattern '${pattern}' starts with a wildcard (${shape}), so the database must scan every row. ` +
      'Use full-text search, or a prefix match when the search allows it.',
    severity,
    category: 'performance',
    suggestion: { templateKey: 'ineffective_like', context: { pattern, likeType, executionTimeMs: timeMs } },
    originQueries: group.distinctSql(),
    backtrace: record.backtrace ?? firstBacktrace(group),
    metrics: { timeMs },
    dedupKey: pattern,
  });
}
