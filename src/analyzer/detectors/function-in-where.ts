/**
 * @module analyzer/detectors/function-in-where
 * @description Detects functions applied to filtered columns, which disables index use
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/parser/structure-extractor.ts, src/parser/regex-extractor.ts
 * @lastModified 2026-10-19
 */

import type { Analyzer, AnalyzerContext, Issue } from '../../types/issues';
import { QueryTrace } from '../../collections/query-trace';
import { IssueCollection } from '../../collections/issue-collection';
import { createIssue } from '../issue-factory';
import { severityForPattern } from '../severity';
import { runPerRecord } from '../context';
import { whereClauseOf } from '../../parser/regex-extractor';
import { escapeRegExp } from '../../parser/structure-extractor';
import { firstBacktrace, groupBySql } from './helpers';

const COMPARISON = String.raw`(?:=|<>|!=|<=|>=|<|>|\bLIKE\b|\bIN\b|\bBETWEEN\b|\bIS\b)`;

export const functionInWhereAnalyzer: Analyzer = {
  name: 'function_in_where',
  issueTypes: ['function_in_where'],
  category: 'performance',

  analyze(trace: QueryTrace, context: AnalyzerContext): IssueCollection {
    const queries = groupBySql(trace);
    return IssueCollection.lazy(() =>
      runPerRecord('function_in_where', queries, context.logger, ([sql, records]) =>
        analyzeQuery(sql, records, context)
      )
    );
  },
};

function analyzeQuery(sql: string, records: QueryTrace, context: AnalyzerContext): Issue[] {
  const functions = columnWrappingFunctions(sql, context.extractor.extractFunctionsInWhere(sql));
  if (functions.length === 0) return [];

  const listed = functions.map(name => `${name}()`).join(', ');
  return [
    createIssue({
      type: 'function_in_where',
      title: `Function in WHERE prevents index use: ${listed}`,
      description:
        `WHERE applies ${listed} to a column before comparing it, so no index on that column can be used. ` +
        'Compare the raw column instead, for example a date range rather than YEAR(column) = value.',
      severity: severityForPattern('function_in_where'),
      category: 'performance',
      suggestion: { templateKey: 'function_in_where', context: { functions } },
      originQueries: [sql],
      backtrace: firstBacktrace(records),
      metrics: { functionCount: functions.length },
    }),
  ];
}

/**
 * Functions that appear on the left of a comparison, wrapping a column.
 * `created_at > NOW()` is fine; `DATE(created_at) = ?` is not.
 */
export function columnWrappingFunctions(sql: string, functionNames: readonly string[]): string[] {
  const where = whereClauseOf(sql);
  if (!where) return [];
  return functionNames.filter(name => {
    const wrapped = new RegExp(
      String.raw`\b${escapeRegExp(name)}\s*\(\s*[^()]*?[A-Za-z_][\w.` + '`' + String.raw`"]*[^()]*\)\s*${COMPARISON}`,
      'i'
    );
    return wrapped.test(where);
  });
}
