/**
 * @module analyzer/detectors/join-optimization
 * @description Detects JOIN problems: too many joins, unused joins, LEFT JOINs that behave as INNER
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/parser/structure-extractor.ts, src/analyzer/severity.ts
 * @lastModified 2026-10-19
 */

import type { Analyzer, AnalyzerContext, Issue } from '../../types/issues';
import type { BacktraceFrame, JoinInfo } from '../../types/query';
import { QueryTrace } from '../../collections/query-trace';
import { IssueCollection } from '../../collections/issue-collection';
import { createIssue } from '../issue-factory';
import { severityForJoinCount, severityForPattern } from '../severity';
import { runPerRecord } from '../context';
import { firstBacktrace, groupBySql } from './helpers';

/** `SELECT *` or `SELECT DISTINCT *` returns the joined columns too */
const SELECT_STAR = /^\s*SELECT\s+(?:DISTINCT\s+)?\*/i;

export const joinOptimizationAnalyzer: Analyzer = {
  name: 'join_optimization',
  issueTypes: ['too_many_joins', 'unused_join', 'left_join_not_null'],
  category: 'performance',

  analyze(trace: QueryTrace, context: AnalyzerContext): IssueCollection {
    const maxJoins = context.threshold('max_joins');
    const queries = groupBySql(trace.onlySelects());
    return IssueCollection.lazy(() =>
      runPerRecord('join_optimization', queries, context.logger, ([sql, records]) =>
        analyzeQuery(sql, records, maxJoins, context)
      )
    );
  },
};

function analyzeQuery(sql: string, records: QueryTrace, maxJoins: number, context: AnalyzerContext): Issue[] {
  const joins = context.extractor.extractJoins(sql);
  if (joins.length === 0) return [];

  const issues: Issue[] = [];
  const signature = context.normalizer.normalize(sql);
  const backtrace = firstBacktrace(records);

  if (joins.length > maxJoins) {
    issues.push(
      createIssue({
        type: 'too_many_joins',
        title: `Too many JOINs in single query (${joins.length} tables)`,
        description:
          `Query contains ${joins.length} JOINs (recommended: ${maxJoins} max). ` +
          'Split it, or load some relations in a separate query.',
        severity: severityForJoinCount(joins.length),
        category: 'performance',
        suggestion: { templateKey: 'too_many_joins', context: { joinCount: joins.length, maxJoins } },
        originQueries: [sql],
        backtrace,
        metrics: { joinCount: joins.length },
      })
    );
  }

  for (const join of joins) {
    if (join.alias === null) continue;
    const unused = unusedJoinIssue(sql, join, join.alias, context, signature, backtrace);
    if (unused) {
      issues.push(unused);
      continue;
    }
    const notNull = leftJoinNotNullIssue(sql, join, join.alias, context, signature, backtrace);
    if (notNull) issues.push(notNull);
  }

  return issues;
}

function unusedJoinIssue(
  sql: string,
  join: JoinInfo,
  alias: string,
  context: AnalyzerContext,
  signature: string,
  backtrace: readonly BacktraceFrame[] | null
): Issue | null {
  if (SELECT_STAR.test(sql) || context.extractor.isAliasUsedInQuery(sql, alias)) return null;

  return createIssue({
    type: 'unused_join',
    title: `Unused JOIN on ${join.table}`,
    description:
      `Query performs ${join.type} JOIN on table '${join.table}' (alias '${alias}') but never uses it. ` +
      'Remove the join, or select the columns it was meant to provide.',
    severity: severityForPattern('unused_join'),
    category: 'performance',
    suggestion: { templateKey: 'unused_join', context: { table: join.table, alias, joinType: join.type } },
    originQueries: [sql],
    backtrace,
    metrics: {},
    dedupKey: `${signature}|${alias}`,
  });
}

function leftJoinNotNullIssue(
  sql: string,
  join: JoinInfo,
  alias: string,
  context: AnalyzerContext,
  signature: string,
  backtrace: readonly BacktraceFrame[] | null
): Issue | null {
  if (join.type !== 'LEFT') return null;
  const field = context.extractor.findIsNotNullFieldOnAlias(sql, alias);
  if (field === null) return null;

  return createIssue({
    type: 'left_join_not_null',
    title: `LEFT JOIN on ${join.table} filtered by IS NOT NULL`,
    description:
      `WHERE requires ${alias}.${field} IS NOT NULL, which discards every row the LEFT JOIN added for missing ` +
      `${join.table} rows. The join behaves as an INNER JOIN; write it as one.`,
    severity: severityForPattern('left_join_not_null'),
    category: 'performance',
    suggestion: { templateKey: 'left_join_not_null', context: { table: join.table, alias, field } },
    originQueries: [sql],
    backtrace,
    metrics: {},
    dedupKey: `${signature}|${alias}`,
  });
}
