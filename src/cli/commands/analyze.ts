/**
 * @module cli/commands/analyze
 * @description Analyze command - run every analyzer over a query trace and print a report
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies commander, src/analyzer, src/output
 * @lastModified 2026-10-19
 */

import { Command } from 'commander';
import { formatJSON, formatSummaryText, formatTextReport } from '../../output';
import {
  collect,
  fail,
  loadInputsOrExit,
  parseCategoryOption,
  parseCountOption,
  parseSeverityOption,
  runAnalysis,
  writeOutput,
  type InputOptions,
} from '../shared';

// ============================================================================
// Types
// ============================================================================

interface AnalyzeOptions extends InputOptions {
  format: string;
  output?: string;
  minSeverity?: string;
  category?: string[];
  only?: string[];
  skip?: string[];
  maxIssues?: string;
  redact: boolean;
  failOn?: string;
}

// ============================================================================
// Command Definition
// ============================================================================

export const analyzeCommand = new Command('analyze')
  .description('Analyze a query trace (and optional mapping metadata) for anti-patterns')
  .argument('<trace>', 'Path to the query trace JSON file')
  .option('-m, --mappings <file>', 'Entity mapping metadata JSON file')
  .option('-c, --config <file>', 'Analyzer configuration JSON file')
  .option('-f, --format <format>', 'Output format: json, text, or summary', 'text')
  .option('-o, --output <file>', 'Write output to file instead of stdout')
  .option('-s, --min-severity <level>', 'Only report issues at or above: critical, warning, info')
  .option('--category <category>', 'Only report this category (repeatable)', collect)
  .option('--only <analyzer>', 'Run only this analyzer (repeatable)', collect)
  .option('--skip <analyzer>', 'Skip this analyzer (repeatable)', collect)
  .option('--exclude-path <path>', 'Ignore queries issued only from this source path (repeatable)', collect)
  .option('--max-issues <n>', 'Maximum issues to include in output')
  .option('-r, --redact', 'Mask SQL literals and personal data in output', false)
  .option('--fail-on <level>', 'Exit with code 3 when an issue at or above this severity is found')
  .option('--log-level <level>', 'Diagnostics on stderr: debug, info, warn, error, silent', 'warn')
  .action((file: string, options: AnalyzeOptions) => {
    runAnalyze(file, options);
  });

// ============================================================================
// Implementation
// ============================================================================

function runAnalyze(file: string, options: AnalyzeOptions): void {
  if (!['json', 'text', 'summary'].includes(options.format)) {
    fail(`Error: unknown format "${options.format}" (expected json, text, summary)`, 1);
  }

  const inputs = loadInputsOrExit(file, options);
  const minSeverity = parseSeverityOption(options.minSeverity);
  const categories = parseCategoryOption(options.category);
  const failOn = parseSeverityOption(options.failOn);
  const maxIssues = parseCountOption(options.maxIssues, 'max-issues');

  const analysis = runAnalysis(
    inputs,
    {
      ...(minSeverity ? { minSeverity } : {}),
      ...(categories ? { categories } : {}),
      ...(options.only ? { enabledAnalyzers: options.only } : {}),
      ...(options.skip ? { disabledAnalyzers: options.skip } : {}),
    },
    options.excludePath ?? []
  );

  const reportOptions = { redact: options.redact, ...(maxIssues !== undefined ? { maxIssues } : {}) };

  let output: string;
  if (options.format === 'summary') {
    output = formatSummaryText(analysis);
  } else if (options.format === 'text') {
    output = formatTextReport(analysis, reportOptions);
  } else {
    output = formatJSON(analysis, reportOptions);
  }

  writeOutput(output, options.output);

  if (failOn && !analysis.issues.atLeast(failOn).isEmpty()) {
    process.exitCode = 3;
  }
}
