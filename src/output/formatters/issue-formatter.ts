/**
 * @module output/formatters/issue-formatter
 * @description Format Issue to output representation
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/types/issues.ts, src/output/suggestions.ts
 * @lastModified 2026-10-19
 */

import type { Issue } from '../../types/issues';
import type { OutputIssue, SerializedIssue } from './types';
import { renderSuggestion, type SuggestionRenderer } from '../suggestions';

// ============================================================================
// Issue Formatting
// ============================================================================

/**
 * Flatten an issue into plain, mutable data
 *
 * @example
 * serializeIssue(issue).queries; // ['SELECT * FROM users WHERE id = ?']
 */
export function serializeIssue(issue: Issue): SerializedIssue {
  return {
    type: issue.type,
    title: issue.title,
    description: issue.description,
    severity: issue.severity,
    category: issue.category,
    suggestion: issue.suggestion
      ? { templateKey: issue.suggestion.templateKey, context: { ...issue.suggestion.context } }
      : null,
    queries: [...issue.originQueries],
    backtrace: issue.backtrace ? issue.backtrace.map(frame => ({ ...frame })) : null,
  };
}

/**
 * Format single issue for a JSON report
 *
 * @param renderer - When given, the suggestion is rendered into `suggestionText`
 */
export function formatIssue(issue: Issue, renderer?: SuggestionRenderer): OutputIssue {
  const output: OutputIssue = {
    id: issue.id,
    ...serializeIssue(issue),
    metrics: { ...issue.metrics },
  };

  if (renderer) {
    const text = renderSuggestion(issue, renderer);
    if (text !== null) {
      output.suggestionText = text;
    }
  }

  return output;
}

/**
 * Format multiple issues with a limit
 */
export function formatIssues(
  issues: Iterable<Issue>,
  options: { maxIssues?: number; renderer?: SuggestionRenderer } = {}
): OutputIssue[] {
  let selected = [...issues];

  // Apply limit
  if (options.maxIssues && options.maxIssues > 0) {
    selected = selected.slice(0, options.maxIssues);
  }

  return selected.map(i => formatIssue(i, options.renderer));
}
