#!/usr/bin/env node
/**
 * @module cli/index
 * @description CLI entry point for developer-facing commands
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies commander, src/cli/commands
 * @lastModified 2026-10-19
 */

import { Command } from 'commander';
import { analyzeCommand, queriesCommand, issuesCommand, summaryCommand } from './commands';

// ============================================================================
// Program Definition
// ============================================================================

const program = new Command();

program
  .name('query-doctor')
  .description('Detect N+1 queries, missing indexes, unsafe SQL and mapping mistakes in query traces')
  .version('0.1.0');

// ============================================================================
// Register Commands
// ============================================================================

program.addCommand(analyzeCommand);
program.addCommand(queriesCommand);
program.addCommand(issuesCommand);
program.addCommand(summaryCommand);

// ============================================================================
// Default Action (no command)
// ============================================================================

program.action(() => {
  console.log(`
query-doctor - SQL query trace analyzer

Usage: query-doctor <command> [options]

Commands:
  analyze <trace>   Analyze a query trace and print a report
  queries <trace>   Show statistics and filtered query listings
  issues <trace>    List detected issues
  summary <trace>   Print a short summary

Examples:
  query-doctor analyze trace.json --mappings mappings.json --format json
  query-doctor queries trace.json --type SELECT --slower-than 50
  query-doctor issues trace.json --severity critical
  query-doctor summary trace.json

Options:
  -h, --help        Show help
  -V, --version     Show version

Run 'query-doctor <command> --help' for more information on a command.
`);
});

// ============================================================================
// Parse Arguments
// ============================================================================

program.parse(process.argv);
