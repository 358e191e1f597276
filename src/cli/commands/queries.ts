/**
 * @module cli/commands/queries
 * @description Queries command - statistics and filtered listings over a query trace
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies commander, src/collections/query-trace.ts
 * @lastModified 2026-10-19
 */

import { Command } from 'commander';
import * as path from 'path';
import type { QueryRecord, StatementType } from '../../types/query';
import { QueryTrace } from '../../collections/query-trace';
import { loadTraceFile } from '../../config';
import { formatMs } from '../../analyzer';
import { truncate } from '../../output';
import { collect, fail, parseCountOption } from '../shared';

// ============================================================================
// Types
// ============================================================================

interface QueriesOptions {
  type?: string;
  slowerThan?: string;
  match?: string;
  excludePath?: string[];
  limit: string;
  format: 'json' | 'text';
}

const STATEMENT_TYPES: readonly StatementType[] = ['SELECT', 'INSERT', 'UPDATE', 'DELETE', 'OTHER'];

// ============================================================================
// Command Definition
// ============================================================================

export const queriesCommand = new Command('queries')
  .description('Show statistics and filtered query listings for a trace')
  .argument('<trace>', 'Path to the query trace JSON file')
  .option('-t, --type <type>', 'Statement type: SELECT, INSERT, UPDATE, DELETE, OTHER')
  .option('--slower-than <ms>', 'Only queries slower than this many milliseconds')
  .option('--match <text>', 'Only queries whose SQL contains this text (case-insensitive)')
  .option('--exclude-path <path>', 'Ignore queries issued only from this source path (repeatable)', collect)
  .option('-l, --limit <n>', 'Limit number of listed queries', '20')
  .option('-f, --format <format>', 'Output format: json or text', 'text')
  .action((file: string, options: QueriesOptions) => {
    runQueries(file, options);
  });

// ============================================================================
// Implementation
// ============================================================================

function runQueries(file: string, options: QueriesOptions): void {
  const loaded = loadTraceFile(path.resolve(file));
  if (!loaded.success) {
    fail(`Error: ${loaded.error.message}`, 1);
  }

  let trace = new QueryTrace(loaded.data);
  if (options.excludePath && options.excludePath.length > 0) {
    trace = trace.excludePaths(options.excludePath);
  }

  const stats = {
    total: trace.size,
    byType: trace.countByType(),
    totalTimeMs: trace.totalExecutionTime(),
    averageTimeMs: trace.averageExecutionTime(),
    distinctQueries: trace.distinctSql().length,
  };

  // Apply filters
  if (options.type) {
    const wanted = options.type.toUpperCase();
    const type = STATEMENT_TYPES.find(candidate => candidate === wanted);
    if (!type) {
      fail(`Error: unknown statement type "${options.type}"`, 1);
    }
    trace = trace.filterByType(type);
  }

  const slowerThan = parseCountOption(options.slowerThan, 'slower-than');
  if (slowerThan !== undefined) {
    trace = trace.filterSlow(slowerThan);
  }

  if (options.match) {
    trace = trace.matchingSql(options.match);
  }

  const limit = parseCountOption(options.limit, 'limit') ?? 20;
  const listed = trace.sortByExecutionTime('desc').toArray().slice(0, limit);

  if (options.format === 'json') {
    console.log(JSON.stringify({ stats, matched: trace.size, queries: listed }, null, 2));
    return;
  }

  const lines = [
    'Query Trace',
    '='.repeat(60),
    '',
    `Queries: ${stats.total} (${stats.distinctQueries} distinct)`,
    `By type: ${STATEMENT_TYPES.map(type => `${type} ${stats.byType[type]}`).join(', ')}`,
    `Total time: ${formatMs(stats.totalTimeMs)} (average ${formatMs(stats.averageTimeMs)})`,
    '',
    `Matched: ${trace.size}, slowest first:`,
  ];
  listed.forEach((record, i) => lines.push(formatRecord(record, i + 1)));
  console.log(lines.join('\n'));
}

function formatRecord(record: QueryRecord, index: number): string {
  const rows = record.rowCount !== undefined ? `, ${record.rowCount} rows` : '';
  return `  ${index}. ${formatMs(record.executionTimeMs)}${rows}  ${truncate(record.sql, 120)}`;
}
