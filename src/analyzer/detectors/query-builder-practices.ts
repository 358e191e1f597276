/**
 * @module analyzer/detectors/query-builder-practices
 * @description Query construction mistakes: = NULL, empty IN (), literal LIKE wildcards, unbound parameters
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/patterns/query-builder-pattern-detector.ts, src/analyzer/severity.ts
 * @lastModified 2026-10-19
 */

import type { Analyzer, AnalyzerContext, Issue, IssueCategory, IssueType } from '../../types/issues';
import type { QueryRecord } from '../../types/query';
import {
  QueryBuilderPatternDetector,
  type QueryBuilderPattern,
} from '../../patterns/query-builder-pattern-detector';
import { QueryTrace } from '../../collections/query-trace';
import { IssueCollection } from '../../collections/issue-collection';
import { createIssue } from '../issue-factory';
import { severityForPattern } from '../severity';
import { runPerRecord } from '../context';

interface Finding {
  type: IssueType;
  pattern: QueryBuilderPattern;
  category: IssueCategory;
  title: string;
  detail: string;
  context: Record<string, unknown>;
}

export const queryBuilderPracticesAnalyzer: Analyzer = {
  name: 'query_builder_practices',
  issueTypes: ['incorrect_null_comparison', 'empty_in_clause', 'unescaped_like', 'missing_parameters'],
  category: 'security',

  analyze(trace: QueryTrace, context: AnalyzerContext): IssueCollection {
    const detector = new QueryBuilderPatternDetector(context.extractor);
    return IssueCollection.lazy(() =>
      runPerRecord('query_builder_practices', trace, context.logger, record =>
        findingsFor(record, detector).map(finding => toIssue(record, finding, detector))
      )
    );
  },
};

function findingsFor(record: QueryRecord, detector: QueryBuilderPatternDetector): Finding[] {
  const sql = record.sql;
  const findings: Finding[] = [];

  const nullComparison = detector.detectIncorrectNullComparison(sql);
  if (nullComparison.detected) {
    findings.push({
      type: 'incorrect_null_comparison',
      pattern: 'incorrect_null',
      category: 'integrity',
      title: 'Incorrect NULL comparison',
      detail: `${nullComparison.fields.join(', ')} never matches any row.`,
      context: { fields: nullComparison.fields },
    });
  }

  if (detector.hasEmptyInClause(sql)) {
    findings.push({
      type: 'empty_in_clause',
      pattern: 'empty_in',
      category: 'integrity',
      title: 'Empty IN() clause',
      detail: 'The query contains IN () with no values.',
      context: {},
    });
  }

  if (detector.hasUnescapedLike(sql)) {
    findings.push({
      type: 'unescaped_like',
      pattern: 'unescaped_like',
      category: 'security',
      title: 'LIKE wildcard written into the SQL',
      detail: 'A LIKE pattern with a leading wildcard is part of the SQL text instead of a bound parameter.',
      context: {},
    });
  }

  const missing = detector.detectMissingParameters(sql, record.params);
  if (missing.hasMissing) {
    findings.push({
      type: 'missing_parameters',
      pattern: 'missing_params',
      category: 'integrity',
      title: `Missing query parameters: ${missing.missing.map(name => `:${name}`).join(', ')}`,
      detail: `No value is bound for ${missing.missing.map(name => `:${name}`).join(', ')}.`,
      context: { missing: missing.missing },
    });
  }

  return findings;
}

function toIssue(record: QueryRecord, finding: Finding, detector: QueryBuilderPatternDetector): Issue {
  return createIssue({
    type: finding.type,
    title: finding.title,
    description: `${finding.detail} ${detector.getPatternDescription(finding.pattern)}.`,
    severity: severityForPattern(finding.type),
    category: finding.category,
    suggestion: {
      templateKey: finding.type,
      context: { ...finding.context, fix: detector.getFixSuggestion(finding.pattern) },
    },
    originQueries: [record.sql],
    backtrace: record.backtrace ?? null,
    metrics: {},
  });
}
