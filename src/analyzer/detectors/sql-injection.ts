/**
 * @module analyzer/detectors/sql-injection
 * @description Flags SQL that shows signs of being built by string concatenation
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/patterns/injection-pattern-detector.ts, src/analyzer/severity.ts
 * @lastModified 2026-10-19
 */

import type { Analyzer, AnalyzerContext, Issue } from '../../types/issues';
import { detectInjectionRisk } from '../../patterns/injection-pattern-detector';
import { QueryTrace } from '../../collections/query-trace';
import { IssueCollection } from '../../collections/issue-collection';
import { createIssue } from '../issue-factory';
import { severityForInjectionRisk } from '../severity';
import { runPerRecord } from '../context';
import { firstBacktrace, groupBySql } from './helpers';

export const sqlInjectionAnalyzer: Analyzer = {
  name: 'sql_injection',
  issueTypes: ['sql_injection'],
  category: 'security',

  analyze(trace: QueryTrace, context: AnalyzerContext): IssueCollection {
    const minRiskLevel = context.threshold('min_risk_level');
    const queries = groupBySql(trace);
    return IssueCollection.lazy(() =>
      runPerRecord('sql_injection', queries, context.logger, ([sql, records]) => {
        const risk = detectInjectionRisk(sql);
        if (risk.riskLevel < minRiskLevel) return [];
        return [analyzeRisk(sql, records, risk.riskLevel, risk.indicators)];
      })
    );
  },
};

function analyzeRisk(sql: string, records: QueryTrace, riskLevel: number, indicators: string[]): Issue {
  return createIssue({
    type: 'sql_injection',
    title: `Potential SQL injection (risk level ${riskLevel})`,
    description:
      `Query text carries values that look concatenated into the SQL: ${indicators.join('; ')}. ` +
      'Bind every value as a parameter.',
    severity: severityForInjectionRisk(riskLevel),
    category: 'security',
    suggestion: { templateKey: 'sql_injection', context: { riskLevel, indicators } },
    originQueries: [sql],
    backtrace: firstBacktrace(records),
    metrics: { riskLevel },
  });
}
