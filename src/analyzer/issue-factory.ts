/**
 * @module analyzer/issue-factory
 * @description Single construction point for Issue values
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/types/issues.ts
 * @lastModified 2026-10-19
 */

import * as crypto from 'crypto';
import type {
  Issue,
  IssueCategory,
  IssueMetrics,
  IssueSeverity,
  IssueType,
  SuggestionRef,
} from '../types/issues';
import type { BacktraceFrame } from '../types/query';

export interface IssueInput {
  type: IssueType;
  title: string;
  description: string;
  severity: IssueSeverity;
  category: IssueCategory;
  suggestion?: SuggestionRef;
  originQueries?: readonly string[];
  backtrace?: readonly BacktraceFrame[] | null;
  metrics?: Record<string, number>;
  dedupKey?: string;
}

/**
 * Build a frozen Issue. Origin queries are de-duplicated preserving first
 * appearance; the id is a hash of type and identity key, so the same
 * finding gets the same id on every run.
 *
 * @example
 * createIssue({
 *   type: 'slow_query',
 *   title: 'Slow query: 250.00ms',
 *   description: '...',
 *   severity: 'critical',
 *   category: 'performance',
 *   originQueries: [record.sql],
 * });
 */
export function createIssue(input: IssueInput): Issue {
  const originQueries = Object.freeze([...new Set(input.originQueries ?? [])]);
  const identity = input.dedupKey ?? originQueries[0] ?? input.title;
  const metrics: IssueMetrics = Object.freeze({ ...(input.metrics ?? {}) });

  const issue: Issue = {
    id: issueId(input.type, identity),
    type: input.type,
    title: input.title,
    description: input.description,
    severity: input.severity,
    category: input.category,
    ...(input.suggestion
      ? { suggestion: Object.freeze({ templateKey: input.suggestion.templateKey, context: Object.freeze({ ...input.suggestion.context }) }) }
      : {}),
    originQueries,
    backtrace: input.backtrace && input.backtrace.length > 0 ? Object.freeze([...input.backtrace]) : null,
    metrics,
    ...(input.dedupKey !== undefined ? { dedupKey: input.dedupKey } : {}),
  };
  return Object.freeze(issue);
}

/**
 * Copy of an issue with some fields replaced. The id is recomputed.
 */
export function withChanges(issue: Issue, changes: Partial<IssueInput>): Issue {
  return createIssue({
    type: issue.type,
    title: issue.title,
    description: issue.description,
    severity: issue.severity,
    category: issue.category,
    suggestion: issue.suggestion,
    originQueries: issue.originQueries,
    backtrace: issue.backtrace,
    metrics: { ...issue.metrics },
    dedupKey: issue.dedupKey,
    ...changes,
  });
}

export function issueId(type: IssueType, identity: string): string {
  const digest = crypto.createHash('sha1').update(`${type}\u0000${identity}`).digest('hex');
  return `${type}-${digest.slice(0, 12)}`;
}

/**
 * Milliseconds rounded to two decimals for titles and descriptions
 */
export function formatMs(ms: number): string {
  return `${ms.toFixed(2)}ms`;
}
