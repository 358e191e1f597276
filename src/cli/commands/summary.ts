/**
 * @module cli/commands/summary
 * @description Summary command - issue counts and the top findings
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies commander, src/analyzer, src/output
 * @lastModified 2026-10-19
 */

import { Command } from 'commander';
import { buildOutputSummary, formatSummaryText } from '../../output';
import { collect, loadInputsOrExit, runAnalysis, type InputOptions } from '../shared';

// ============================================================================
// Types
// ============================================================================

interface SummaryOptions extends InputOptions {
  format: 'json' | 'text';
}

// ============================================================================
// Command Definition
// ============================================================================

export const summaryCommand = new Command('summary')
  .description('Print a short summary of the issues in a query trace')
  .argument('<trace>', 'Path to the query trace JSON file')
  .option('-m, --mappings <file>', 'Entity mapping metadata JSON file')
  .option('-c, --config <file>', 'Analyzer configuration JSON file')
  .option('-f, --format <format>', 'Output format: json or text', 'text')
  .option('--exclude-path <path>', 'Ignore queries issued only from this source path (repeatable)', collect)
  .option('--log-level <level>', 'Diagnostics on stderr: debug, info, warn, error, silent', 'warn')
  .action((file: string, options: SummaryOptions) => {
    runSummary(file, options);
  });

// ============================================================================
// Implementation
// ============================================================================

function runSummary(file: string, options: SummaryOptions): void {
  const inputs = loadInputsOrExit(file, options);
  const analysis = runAnalysis(inputs, {}, options.excludePath ?? []);

  if (options.format === 'json') {
    console.log(JSON.stringify(buildOutputSummary(analysis), null, 2));
  } else {
    console.log(formatSummaryText(analysis));
  }
}
