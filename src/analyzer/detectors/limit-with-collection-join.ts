/**
 * @module analyzer/detectors/limit-with-collection-join
 * @description Detects LIMIT applied to a query that joins a to-many collection
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/parser/structure-extractor.ts, src/analyzer/severity.ts
 * @lastModified 2026-10-19
 *
 * LIMIT counts joined rows, not parent entities: with a joined collection the
 * last parent comes back with a truncated collection and fewer parents than
 * asked for are returned.
 */

import type { Analyzer, AnalyzerContext, Issue } from '../../types/issues';
import type { JoinInfo, TableReference } from '../../types/query';
import { QueryTrace } from '../../collections/query-trace';
import { IssueCollection } from '../../collections/issue-collection';
import { createIssue } from '../issue-factory';
import { severityForPattern } from '../severity';
import { runPerRecord } from '../context';
import { escapeRegExp } from '../../parser/structure-extractor';
import { firstBacktrace, groupBySql } from './helpers';

export const limitWithCollectionJoinAnalyzer: Analyzer = {
  name: 'limit_with_collection_join',
  issueTypes: ['limit_with_collection_join'],
  category: 'performance',

  analyze(trace: QueryTrace, context: AnalyzerContext): IssueCollection {
    const queries = groupBySql(trace.onlySelects());
    return IssueCollection.lazy(() =>
      runPerRecord('limit_with_collection_join', queries, context.logger, ([sql, records]) =>
        analyzeQuery(sql, records, context)
      )
    );
  },
};

function analyzeQuery(sql: string, records: QueryTrace, context: AnalyzerContext): Issue[] {
  const structure = context.extractor.extract(sql);
  if (!structure.hasLimit || !structure.mainTable || structure.joins.length === 0) return [];
  if (structure.aggregationFunctions.length > 0 || structure.groupByColumns.length > 0) return [];
  if (context.extractor.hasLocaleConstraintInJoin(sql)) return [];

  const collection = structure.joins.find(join => isCollectionJoin(join, structure.mainTable));
  if (!collection) return [];

  return [
    createIssue({
      type: 'limit_with_collection_join',
      title: `LIMIT with collection join on ${collection.table}`,
      description:
        `The query joins the ${collection.table} collection and applies LIMIT ${structure.limitValue ?? '?'}. ` +
        'The limit applies to joined rows, so parents are cut off and collections come back partially loaded. ' +
        'Paginate the parent ids first, then load their collections.',
      severity: severityForPattern('limit_with_collection_join'),
      category: 'performance',
      suggestion: {
        templateKey: 'limit_with_collection_join',
        context: { table: collection.table, limit: structure.limitValue },
      },
      originQueries: [sql],
      backtrace: firstBacktrace(records),
      metrics: structure.limitValue !== null ? { limit: structure.limitValue } : {},
    }),
  ];
}

/**
 * The joined table holds a foreign key to the main table:
 * `JOIN child c ON c.<name>_id = p.id` (either side)
 */
export function isCollectionJoin(join: JoinInfo, main: TableReference | null): boolean {
  if (!main) return false;
  const child = escapeRegExp(join.alias ?? join.table);
  const parent = escapeRegExp(main.alias ?? main.table);
  const forward = new RegExp(`\\b${child}\\.\\w+_id\\s*=\\s*${parent}\\.id\\b`, 'i');
  const backward = new RegExp(`\\b${parent}\\.id\\s*=\\s*${child}\\.\\w+_id\\b`, 'i');
  return join.onConditions.some(condition => forward.test(condition) || backward.test(condition));
}
