/**
 * @module output/json-formatter
 * @description Format an AnalysisResult as a JSON report
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/analyzer/index.ts, src/output/formatters
 * @lastModified 2026-10-19
 */

import type { AnalysisResult } from '../analyzer';
import type { JSONReport, ReportOptions } from './formatters/types';
import { formatIssues } from './formatters/issue-formatter';
import { buildOutputSummary } from './formatters/summary-builder';
import { redactIssue } from './formatters/redaction';
import { InMemoryTemplateRenderer, type SuggestionRenderer } from './suggestions';

export const REPORT_VERSION = '1.0';

/**
 * Default options
 */
const DEFAULT_OPTIONS = {
  maxIssues: 100,
  renderSuggestions: true,
  indent: 2,
  redact: false,
} as const;

// ============================================================================
// JSON Report
// ============================================================================

/**
 * Build the report object
 *
 * @example
 * const report = buildJSONReport(analyzeTrace(records));
 * report.summary.totalIssues;
 */
export function buildJSONReport(
  analysis: AnalysisResult,
  options: ReportOptions = {},
  renderer: SuggestionRenderer = new InMemoryTemplateRenderer()
): JSONReport {
  const renderSuggestions = options.renderSuggestions ?? DEFAULT_OPTIONS.renderSuggestions;
  let issues = formatIssues(analysis.issues, {
    maxIssues: options.maxIssues ?? DEFAULT_OPTIONS.maxIssues,
    ...(renderSuggestions ? { renderer } : {}),
  });

  if (options.redact ?? DEFAULT_OPTIONS.redact) {
    issues = issues.map(issue => redactIssue(issue));
  }

  const { queryCount, mappingCount, analyzersRun, failedAnalyzers, analysisTimeMs } = analysis.metadata;

  return {
    version: REPORT_VERSION,
    generatedAt: new Date().toISOString(),
    summary: buildOutputSummary(analysis),
    metadata: { queryCount, mappingCount, analyzersRun, failedAnalyzers, analysisTimeMs },
    issues,
  };
}

/**
 * Serialize the report
 */
export function formatJSON(
  analysis: AnalysisResult,
  options: ReportOptions = {},
  renderer?: SuggestionRenderer
): string {
  const indent = options.indent ?? DEFAULT_OPTIONS.indent;
  return JSON.stringify(buildJSONReport(analysis, options, renderer), null, indent > 0 ? indent : undefined);
}
