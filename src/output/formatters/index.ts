/**
 * @module output/formatters
 * @description Exports for issue, summary and text formatters
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies ./types.ts, ./issue-formatter.ts, ./summary-builder.ts
 * @lastModified 2026-10-19
 */

// Types
export * from './types';

// Issue formatting
export { serializeIssue, formatIssue, formatIssues } from './issue-formatter';

// Summary
export { buildOutputSummary } from './summary-builder';

// Text
export { formatTextReport, formatSummaryText, truncate } from './text-formatter';

// Redaction
export {
  redactIssue,
  redactSqlLiterals,
  redactString,
  DEFAULT_REDACTION_PATTERNS,
  REDACTED,
} from './redaction';
