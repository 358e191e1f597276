/**
 * @module cli/commands/issues
 * @description Issues command - list detected issues, filtered by severity and type
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies commander, src/analyzer, src/output
 * @lastModified 2026-10-19
 */

import { Command } from 'commander';
import type { Issue } from '../../types/issues';
import { SEVERITY_ORDER } from '../../types/issues';
import { serializeIssue } from '../../output';
import {
  collect,
  loadInputsOrExit,
  parseCountOption,
  parseSeverityOption,
  runAnalysis,
  type InputOptions,
} from '../shared';

// ============================================================================
// Types
// ============================================================================

interface IssuesOptions extends InputOptions {
  severity?: string;
  type?: string;
  limit?: string;
  format: 'json' | 'text';
}

// ============================================================================
// Command Definition
// ============================================================================

export const issuesCommand = new Command('issues')
  .description('List detected issues in a query trace')
  .argument('<trace>', 'Path to the query trace JSON file')
  .option('-m, --mappings <file>', 'Entity mapping metadata JSON file')
  .option('-c, --config <file>', 'Analyzer configuration JSON file')
  .option('-s, --severity <level>', 'Filter by severity (critical, warning, info)')
  .option('-t, --type <type>', 'Filter by issue type (substring match)')
  .option('-l, --limit <n>', 'Limit number of results')
  .option('-f, --format <format>', 'Output format: json or text', 'text')
  .option('--exclude-path <path>', 'Ignore queries issued only from this source path (repeatable)', collect)
  .option('--log-level <level>', 'Diagnostics on stderr: debug, info, warn, error, silent', 'warn')
  .action((file: string, options: IssuesOptions) => {
    runIssues(file, options);
  });

// ============================================================================
// Implementation
// ============================================================================

function runIssues(file: string, options: IssuesOptions): void {
  const inputs = loadInputsOrExit(file, options);
  const severity = parseSeverityOption(options.severity);
  const limit = parseCountOption(options.limit, 'limit');

  let issues = runAnalysis(inputs, {}, options.excludePath ?? []).issues;

  // Apply filters
  if (severity) {
    issues = issues.filterBySeverity(severity);
  }

  if (options.type) {
    const typeLower = options.type.toLowerCase();
    issues = issues.filter(i => i.type.includes(typeLower));
  }

  // Apply limit
  const total = issues.size;
  const selected = limit !== undefined ? issues.toArray().slice(0, limit) : issues.toArray();

  if (options.format === 'json') {
    console.log(
      JSON.stringify(
        {
          total,
          returned: selected.length,
          filters: { severity: options.severity, type: options.type },
          issues: selected.map(serializeIssue),
        },
        null,
        2
      )
    );
  } else {
    console.log(formatTextIssues(selected, total));
  }
}

// ============================================================================
// Helpers
// ============================================================================

function formatTextIssues(issues: Issue[], total: number): string {
  const lines: string[] = ['Detected Issues', '='.repeat(60), '', `Total Issues: ${total}`, ''];

  if (issues.length === 0) {
    lines.push('No issues detected.');
    return lines.join('\n');
  }

  // Group by severity
  for (const severity of SEVERITY_ORDER) {
    const group = issues.filter(i => i.severity === severity);
    if (group.length === 0) continue;
    lines.push(`${severity.toUpperCase()} (${group.length}):`);
    lines.push('-'.repeat(60));
    group.forEach((issue, i) => formatIssueText(issue, i + 1, lines));
  }

  return lines.join('\n').trimEnd();
}

function formatIssueText(issue: Issue, index: number, lines: string[]): void {
  lines.push(`  ${index}. ${issue.title}`);
  lines.push(`     ${issue.type} | ${issue.category}`);
  const origin = issue.backtrace?.[0];
  if (origin) {
    lines.push(`     At: ${origin.file}:${origin.line}`);
  }
  lines.push('');
}
