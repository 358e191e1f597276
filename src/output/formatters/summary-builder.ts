/**
 * @module output/formatters/summary-builder
 * @description Build the report summary and suggested next steps
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/analyzer/index.ts
 * @lastModified 2026-10-19
 */

import type { IssueCategory, IssueType } from '../../types/issues';
import type { AnalysisResult } from '../../analyzer';
import type { OutputSummary } from './types';

// ============================================================================
// Summary Building
// ============================================================================

/**
 * Build output summary from analysis result
 */
export function buildOutputSummary(analysis: AnalysisResult): OutputSummary {
  const { issues } = analysis;
  const bySeverity = issues.countBySeverity();

  const byCategory: Record<IssueCategory, number> = { performance: 0, security: 0, integrity: 0 };
  for (const issue of issues) {
    byCategory[issue.category]++;
  }

  const byType: Array<{ type: IssueType; count: number }> = [];
  for (const [type, group] of issues.groupByType()) {
    byType.push({ type, count: group.size });
  }
  byType.sort((a, b) => b.count - a.count);

  return {
    totalIssues: issues.size,
    bySeverity,
    byCategory,
    byType,
    status: oneLiner(issues.size, bySeverity.critical, bySeverity.warning),
    nextSteps: buildNextSteps(analysis, byCategory),
  };
}

function oneLiner(total: number, critical: number, warning: number): string {
  if (total === 0) return 'No issues detected';
  const parts = [`${total} issue${total === 1 ? '' : 's'}`];
  if (critical > 0) parts.push(`${critical} critical`);
  if (warning > 0) parts.push(`${warning} warning${warning === 1 ? '' : 's'}`);
  return parts.join(', ');
}

// ============================================================================
// Next Steps
// ============================================================================

const CATEGORIES: readonly IssueCategory[] = ['performance', 'security', 'integrity'];

/**
 * Category-specific advice
 */
const CATEGORY_ADVICE: Record<IssueCategory, string> = {
  performance: 'Batch repeated queries and add the indexes the slow queries need',
  security: 'Replace concatenated values with bound parameters',
  integrity: 'Align entity mappings with the database schema',
};

function buildNextSteps(analysis: AnalysisResult, byCategory: Record<IssueCategory, number>): string[] {
  const nextSteps: string[] = [];

  // Prioritize critical issues
  if (analysis.issues.hasCritical()) {
    nextSteps.push('Address critical issues first');
  }

  // Add category-specific advice
  const topCategory = CATEGORIES.filter(category => byCategory[category] > 0).sort(
    (a, b) => byCategory[b] - byCategory[a]
  )[0];

  if (topCategory) {
    nextSteps.push(CATEGORY_ADVICE[topCategory]);
  }

  // Partial results
  if (analysis.metadata.failedAnalyzers.length > 0) {
    nextSteps.push(
      `Some analyzers failed (${analysis.metadata.failedAnalyzers.join(', ')}) - results may be incomplete`
    );
  }

  if (analysis.metadata.mappingCount === 0) {
    nextSteps.push('No mapping metadata supplied - integrity checks were skipped');
  }

  return nextSteps;
}
