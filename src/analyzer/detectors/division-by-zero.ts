/**
 * @module analyzer/detectors/division-by-zero
 * @description Detects divisions by a column or expression with no guard against a zero divisor
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/parser/sql-lexer.ts
 * @lastModified 2026-10-19
 */

import type { Analyzer, AnalyzerContext, Issue } from '../../types/issues';
import type { QueryRecord } from '../../types/query';
import { QueryTrace } from '../../collections/query-trace';
import { IssueCollection } from '../../collections/issue-collection';
import { createIssue } from '../issue-factory';
import { severityForPattern } from '../severity';
import { runPerRecord } from '../context';
import { tokenizeSql } from '../../parser/sql-lexer';
import { firstBacktrace } from './helpers';

const DIVISION = /(\w+(?:\.\w+)?)\s*\/\s*(\w+(?:\.\w+)?)/g;
const GUARDED = /\bNULLIF\b|\bCOALESCE\b|\bCASE\s+WHEN\b/i;
const NUMBER = /^\d*\.?\d+$/;

export interface Division {
  expression: string;
  dividend: string;
  divisor: string;
}

interface DivisionGroup {
  division: Division;
  records: QueryRecord[];
}

/**
 * Queries that use NULLIF, COALESCE or CASE WHEN anywhere are treated as
 * guarded. A division shared by several queries makes one issue.
 */
export const divisionByZeroAnalyzer: Analyzer = {
  name: 'division_by_zero',
  issueTypes: ['division_by_zero'],
  category: 'integrity',

  analyze(trace: QueryTrace, context: AnalyzerContext): IssueCollection {
    return IssueCollection.lazy(() =>
      runPerRecord('division_by_zero', groupByDivision(trace), context.logger, group => [createDivisionIssue(group)])
    );
  },
};

/**
 * Divisions outside string literals and comments whose divisor is not a
 * non-zero number
 *
 * @example
 * unguardedDivisions('SELECT revenue / quantity, total / 2 FROM sales');
 * // [{ expression: 'revenue / quantity', dividend: 'revenue', divisor: 'quantity' }]
 */
export function unguardedDivisions(sql: string): Division[] {
  const code = tokenizeSql(sql)
    .map(token => (token.kind === 'string' ? "''" : token.kind === 'comment' ? ' ' : token.text))
    .join('');
  if (GUARDED.test(code)) return [];

  const divisions: Division[] = [];
  for (const match of code.matchAll(DIVISION)) {
    const [expression, dividend, divisor] = match;
    if (NUMBER.test(divisor) && Number(divisor) !== 0) continue;
    divisions.push({ expression, dividend, divisor });
  }
  return divisions;
}

function groupByDivision(trace: QueryTrace): DivisionGroup[] {
  const groups = new Map<string, DivisionGroup>();
  for (const record of trace) {
    for (const division of unguardedDivisions(record.sql)) {
      const key = `${division.dividend}/${division.divisor}`;
      const group = groups.get(key);
      if (group) {
        if (!group.records.includes(record)) group.records.push(record);
      } else {
        groups.set(key, { division, records: [record] });
      }
    }
  }
  return [...groups.values()];
}

function createDivisionIssue({ division, records }: DivisionGroup): Issue {
  const { expression, dividend, divisor } = division;
  return createIssue({
    type: 'division_by_zero',
    title: `Possible division by zero: ${expression}`,
    description:
      `Division '${expression}' has no guard. When ${divisor} is zero the database raises an error ` +
      `or returns NULL, depending on its mode. Use NULLIF(${divisor}, 0).`,
    severity: severityForPattern('division_by_zero'),
    category: 'integrity',
    suggestion: {
      templateKey: 'division_by_zero',
      context: { unsafeDivision: expression, safeDivision: `${dividend} / NULLIF(${divisor}, 0)` },
    },
    originQueries: new QueryTrace(records).distinctSql(),
    backtrace: firstBacktrace(records),
    dedupKey: `${dividend}/${divisor}`,
  });
}
