/**
 * @module output/formatters/summary-builder.test
 * @description Unit tests for report summaries and text output
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/output/formatters/summary-builder.ts, src/output/formatters/text-formatter.ts
 * @lastModified 2026-10-19
 */

import { describe, it, expect } from 'vitest';
import { buildOutputSummary } from './summary-builder';
import { formatSummaryText, formatTextReport, truncate } from './text-formatter';
import { createIssue, type IssueInput } from '../../analyzer/issue-factory';
import { IssueCollection } from '../../collections/issue-collection';
import type { AnalysisMetadata, AnalysisResult } from '../../analyzer';
import type { Issue } from '../../types/issues';

// ============================================================================
// Test Helpers
// ============================================================================

function makeIssue(overrides: Partial<IssueInput> = {}): Issue {
  return createIssue({
    type: 'slow_query',
    title: 'Slow query: 50.00ms',
    description: 'Query took too long.',
    severity: 'warning',
    category: 'performance',
    ...overrides,
  });
}

function makeResult(issues: Issue[], metadata: Partial<AnalysisMetadata> = {}): AnalysisResult {
  return {
    issues: new IssueCollection(issues),
    metadata: {
      queryCount: 3,
      mappingCount: 1,
      analyzersRun: ['slow_query'],
      failedAnalyzers: [],
      rawIssueCount: issues.length,
      analysisTimeMs: 1,
      ...metadata,
    },
  };
}

// ============================================================================
// Tests
// ============================================================================

describe('buildOutputSummary', () => {
  it('counts issues and suggests next steps', () => {
    const summary = buildOutputSummary(
      makeResult(
        [
          makeIssue({ type: 'sql_injection', severity: 'critical', category: 'security' }),
          makeIssue(),
          makeIssue({ type: 'missing_index', title: 'Missing index on orders: 5000 rows scanned' }),
        ],
        { mappingCount: 0 }
      )
    );

    expect(summary.totalIssues).toBe(3);
    expect(summary.bySeverity).toEqual({ critical: 1, warning: 2, info: 0 });
    expect(summary.byCategory).toEqual({ performance: 2, security: 1, integrity: 0 });
    expect(summary.byType).toHaveLength(3);
    expect(summary.status).toBe('3 issues, 1 critical, 2 warnings');
    expect(summary.nextSteps).toEqual([
      'Address critical issues first',
      'Batch repeated queries and add the indexes the slow queries need',
      'No mapping metadata supplied - integrity checks were skipped',
    ]);
  });

  it('reports a clean run and failed analyzers', () => {
    const summary = buildOutputSummary(makeResult([], { failedAnalyzers: ['slow_query'] }));

    expect(summary.status).toBe('No issues detected');
    expect(summary.nextSteps).toEqual(['Some analyzers failed (slow_query) - results may be incomplete']);
  });
});

describe('formatSummaryText', () => {
  it('lists counts, top issues and next steps', () => {
    expect(formatSummaryText(makeResult([makeIssue()]))).toBe(
      [
        '=== Query Analysis Summary ===',
        '',
        'Queries analyzed: 3',
        'Status: 1 issue, 1 warning',
        '',
        'Top Issues:',
        '  1. [WARNING] Slow query: 50.00ms',
        '',
        'Next steps:',
        '  - Batch repeated queries and add the indexes the slow queries need',
      ].join('\n')
    );
  });
});

describe('formatTextReport', () => {
  const issue = makeIssue({
    originQueries: ["SELECT * FROM users WHERE email = 'a@b.io'"],
    backtrace: [{ file: 'src/users.ts', line: 42 }],
    suggestion: {
      templateKey: 'slow_query',
      context: { executionTimeMs: 50, thresholdMs: 10, hints: ['Review query structure and add appropriate indexes.'] },
    },
  });

  it('writes one block per issue, with masked literals when asked', () => {
    expect(formatTextReport(makeResult([issue]), { redact: true })).toBe(
      [
        'Query Analysis Report',
        '='.repeat(60),
        '',
        'Queries analyzed: 3',
        'Issues: 1 issue, 1 warning',
        '',
        '1. [WARNING] Slow query: 50.00ms',
        '   Type: slow_query (performance)',
        '   Query took too long.',
        '   Queries:',
        "     SELECT * FROM users WHERE email = '[REDACTED]'",
        '   At: src/users.ts:42',
        '   Suggestion:',
        '     The query took 50ms (threshold 10ms).',
        '     Review query structure and add appropriate indexes.',
      ].join('\n')
    );
  });

  it('limits the queries listed per issue', () => {
    const many = makeIssue({ originQueries: ['SELECT 1', 'SELECT 2', 'SELECT 3'] });
    const lines = formatTextReport(makeResult([many]), { maxQueriesPerIssue: 1, renderSuggestions: false }).split('\n');

    expect(lines.slice(-3)).toEqual(['   Queries:', '     SELECT 1', '     ... and 2 more']);
  });

  it('says so when there is nothing to report', () => {
    expect(formatTextReport(makeResult([])).split('\n').pop()).toBe('No issues detected.');
  });
});

describe('truncate', () => {
  it('collapses whitespace and cuts long SQL', () => {
    expect(truncate('SELECT  *\n  FROM t', 8)).toBe('SELECT *...');
    expect(truncate('SELECT 1', 8)).toBe('SELECT 1');
  });
});
