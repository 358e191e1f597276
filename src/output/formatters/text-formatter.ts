/**
 * @module output/formatters/text-formatter
 * @description Human-readable text report and one-screen summary
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/analyzer/index.ts, src/output/suggestions.ts
 * @lastModified 2026-10-19
 */

import type { Issue, IssueSeverity } from '../../types/issues';
import type { AnalysisResult } from '../../analyzer';
import type { ReportOptions } from './types';
import { OUTPUT_LIMITS } from '../../constants';
import { renderSuggestion, InMemoryTemplateRenderer, type SuggestionRenderer } from '../suggestions';
import { buildOutputSummary } from './summary-builder';
import { redactSqlLiterals, redactString } from './redaction';

const SEVERITY_MARKERS: Record<IssueSeverity, string> = {
  critical: '[CRITICAL]',
  warning: '[WARNING]',
  info: '[INFO]',
};

// ============================================================================
// Summary
// ============================================================================

/**
 * Short summary: counts and the top five issues
 */
export function formatSummaryText(analysis: AnalysisResult): string {
  const summary = buildOutputSummary(analysis);
  const lines: string[] = [
    '=== Query Analysis Summary ===',
    '',
    `Queries analyzed: ${analysis.metadata.queryCount}`,
    `Status: ${summary.status}`,
    '',
  ];

  if (summary.totalIssues > 0) {
    lines.push('Top Issues:');
    analysis.issues.toArray().slice(0, 5).forEach((issue, i) => {
      lines.push(`  ${i + 1}. ${SEVERITY_MARKERS[issue.severity]} ${issue.title}`);
    });
    lines.push('');
  }

  if (summary.nextSteps.length > 0) {
    lines.push('Next steps:');
    for (const step of summary.nextSteps) {
      lines.push(`  - ${step}`);
    }
  }

  return lines.join('\n').trimEnd();
}

// ============================================================================
// Full Report
// ============================================================================

/**
 * Full text report, one block per issue
 */
export function formatTextReport(
  analysis: AnalysisResult,
  options: ReportOptions = {},
  renderer: SuggestionRenderer = new InMemoryTemplateRenderer()
): string {
  const summary = buildOutputSummary(analysis);
  const lines: string[] = [
    'Query Analysis Report',
    '='.repeat(60),
    '',
    `Queries analyzed: ${analysis.metadata.queryCount}`,
    `Issues: ${summary.status}`,
    '',
  ];

  let issues = analysis.issues.toArray();
  if (options.maxIssues && options.maxIssues > 0) {
    issues = issues.slice(0, options.maxIssues);
  }

  if (issues.length === 0) {
    lines.push('No issues detected.');
    return lines.join('\n');
  }

  issues.forEach((issue, i) => {
    lines.push(...formatIssueBlock(issue, i + 1, options, renderer));
    lines.push('');
  });

  if (analysis.metadata.failedAnalyzers.length > 0) {
    lines.push(`Failed analyzers: ${analysis.metadata.failedAnalyzers.join(', ')}`);
  }

  return lines.join('\n').trimEnd();
}

function formatIssueBlock(
  issue: Issue,
  position: number,
  options: ReportOptions,
  renderer: SuggestionRenderer
): string[] {
  const mask = (text: string): string => (options.redact ? redactString(redactSqlLiterals(text)) : text);
  const maxQueries = options.maxQueriesPerIssue ?? OUTPUT_LIMITS.MAX_QUERIES_PER_ISSUE;
  const maxChars = options.maxSqlChars ?? OUTPUT_LIMITS.MAX_SQL_PREVIEW_CHARS;

  const lines = [
    `${position}. ${SEVERITY_MARKERS[issue.severity]} ${mask(issue.title)}`,
    `   Type: ${issue.type} (${issue.category})`,
    `   ${mask(issue.description)}`,
  ];

  if (issue.originQueries.length > 0) {
    lines.push('   Queries:');
    for (const sql of issue.originQueries.slice(0, maxQueries)) {
      lines.push(`     ${truncate(mask(sql), maxChars)}`);
    }
    const hidden = issue.originQueries.length - maxQueries;
    if (hidden > 0) {
      lines.push(`     ... and ${hidden} more`);
    }
  }

  const origin = issue.backtrace?.[0];
  if (origin) {
    lines.push(`   At: ${origin.file}:${origin.line}`);
  }

  if (options.renderSuggestions !== false) {
    const suggestion = renderSuggestion(issue, renderer);
    if (suggestion) {
      lines.push('   Suggestion:');
      for (const line of suggestion.split('\n')) {
        lines.push(`     ${mask(line)}`);
      }
    }
  }

  return lines;
}

/**
 * Collapse whitespace and cut to `maxChars`
 */
export function truncate(sql: string, maxChars: number): string {
  const compact = sql.replace(/\s+/g, ' ').trim();
  return compact.length > maxChars ? `${compact.slice(0, maxChars)}...` : compact;
}
