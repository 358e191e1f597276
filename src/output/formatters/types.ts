/**
 * @module output/formatters/types
 * @description Type definitions for serialized issues and report output
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/types/issues.ts
 * @lastModified 2026-10-19
 */

import type { IssueCategory, IssueSeverity, IssueType } from '../../types/issues';
import type { BacktraceFrame } from '../../types/query';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Report output configuration
 */
export interface ReportOptions {
  /** Maximum number of issues to include */
  maxIssues?: number;

  /** Queries listed per issue (text output) */
  maxQueriesPerIssue?: number;

  /** Characters of SQL shown per query (text output) */
  maxSqlChars?: number;

  /** Render suggestion templates into text */
  renderSuggestions?: boolean;

  /** Indent size for pretty printing (0 = minified) */
  indent?: number;

  /** Mask literals and personal data in queries and descriptions */
  redact?: boolean;
}

// ============================================================================
// Serialized Issue
// ============================================================================

/**
 * Flat record form of an Issue, safe to hand to JSON.stringify or a template engine
 */
export interface SerializedIssue {
  type: IssueType;
  title: string;
  description: string;
  severity: IssueSeverity;
  category: IssueCategory;
  suggestion: { templateKey: string; context: Record<string, unknown> } | null;
  queries: string[];
  backtrace: BacktraceFrame[] | null;
}

/**
 * Issue as written to JSON reports
 */
export interface OutputIssue extends SerializedIssue {
  id: string;
  metrics: Record<string, number>;
  /** Rendered remediation text (when enabled and a template exists) */
  suggestionText?: string;
}

// ============================================================================
// Report Types
// ============================================================================

/**
 * Output summary format
 */
export interface OutputSummary {
  /** Total issues */
  totalIssues: number;

  /** Issues by severity */
  bySeverity: Record<IssueSeverity, number>;

  /** Issues by category */
  byCategory: Record<IssueCategory, number>;

  /** Issues by type, most frequent first */
  byType: Array<{ type: IssueType; count: number }>;

  /** One-line status */
  status: string;

  /** Suggested next steps */
  nextSteps: string[];
}

/**
 * Complete JSON report structure
 */
export interface JSONReport {
  /** Output format version */
  version: string;

  /** Generation timestamp */
  generatedAt: string;

  summary: OutputSummary;

  metadata: {
    queryCount: number;
    mappingCount: number;
    analyzersRun: string[];
    failedAnalyzers: string[];
    analysisTimeMs: number;
  };

  issues: OutputIssue[];
}
