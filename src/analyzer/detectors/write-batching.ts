/**
 * @module analyzer/detectors/write-batching
 * @description Detects writes flushed one batch per loop iteration, and write batches that never clear the unit of work
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/collections/query-trace.ts, src/analyzer/severity.ts
 * @lastModified 2026-10-19
 *
 * Both analyzers read the order of statements in the trace. A flush shows
 * up as writes immediately followed by a read; a growing unit of work as
 * many writes on one table issued close together.
 */

import type { Analyzer, AnalyzerContext, Issue } from '../../types/issues';
import type { QueryRecord, StatementType } from '../../types/query';
import { QueryTrace, statementTypeOfRecord } from '../../collections/query-trace';
import { IssueCollection } from '../../collections/issue-collection';
import { createIssue } from '../issue-factory';
import { severityForBatchWrites, severityForFlushInLoop } from '../severity';
import { runPerRecord } from '../context';
import { BATCH_SEQUENTIAL_RATIO } from '../../constants';
import { firstBacktrace } from './helpers';

const WRITES: ReadonlySet<StatementType> = new Set(['INSERT', 'UPDATE', 'DELETE']);

// ============================================================================
// Flush In Loop
// ============================================================================

/**
 * Span of the trace between two flush boundaries
 */
export interface FlushGroup {
  start: number;
  end: number;
  writes: number;
}

/**
 * Reports when at least `flush_count` flush groups follow each other with
 * between one and `max_writes_per_flush` writes each on average
 */
export const flushInLoopAnalyzer: Analyzer = {
  name: 'flush_in_loop',
  issueTypes: ['flush_in_loop'],
  category: 'performance',

  analyze(trace: QueryTrace, context: AnalyzerContext): IssueCollection {
    const flushCount = context.threshold('flush_count');
    const maxWrites = context.threshold('max_writes_per_flush');

    return IssueCollection.lazy(() =>
      runPerRecord('flush_in_loop', [trace.toArray()], context.logger, records =>
        analyzeFlushes(records, flushCount, maxWrites)
      )
    );
  },
};

/**
 * Split the trace at flush boundaries: an INSERT or UPDATE directly
 * followed by a SELECT. Writes before the first boundary belong to no group.
 *
 * @example
 * // INSERT, SELECT, INSERT, SELECT, INSERT, SELECT
 * detectFlushGroups(records); // [{ start: 0, end: 2, writes: 1 }, { start: 2, end: 4, writes: 1 }]
 */
export function detectFlushGroups(records: readonly QueryRecord[]): FlushGroup[] {
  const types = records.map(statementTypeOfRecord);
  const groups: FlushGroup[] = [];
  let lastBoundary = -1;
  let writes = 0;

  types.forEach((type, index) => {
    if (WRITES.has(type)) writes++;
    const isBoundary = (type === 'INSERT' || type === 'UPDATE') && types[index + 1] === 'SELECT';
    if (!isBoundary) return;
    if (lastBoundary >= 0) groups.push({ start: lastBoundary, end: index, writes });
    lastBoundary = index;
    writes = 0;
  });

  return groups;
}

function analyzeFlushes(records: readonly QueryRecord[], threshold: number, maxWrites: number): Issue[] {
  const groups = detectFlushGroups(records);
  if (groups.length === 0 || groups.length < threshold) return [];

  const averageWrites = groups.reduce((sum, group) => sum + group.writes, 0) / groups.length;
  if (averageWrites <= 0 || averageWrites > maxWrites) return [];

  const affected = new Set<number>();
  for (const group of groups) {
    for (let index = group.start; index <= group.end; index++) affected.add(index);
  }
  const involved = [...affected].sort((a, b) => a - b).map(index => records[index]);
  const totalTimeMs = involved.reduce((sum, record) => sum + record.executionTimeMs, 0);
  const flushes = groups.length;
  const average = averageWrites.toFixed(1);

  return [
    createIssue({
      type: 'flush_in_loop',
      title: `Flush in loop: ${flushes} flushes`,
      description:
        `Detected ${flushes} write batches each followed by a read, with ${average} writes per batch on average ` +
        `(threshold: ${threshold}). Every flush is a separate round trip. Collect the changes and flush once after the loop.`,
      severity: severityForFlushInLoop(flushes),
      category: 'performance',
      suggestion: { templateKey: 'batch_flush', context: { flushCount: flushes, writesPerFlush: average } },
      originQueries: [...new Set(involved.map(record => record.sql))],
      backtrace: firstBacktrace(involved),
      metrics: { count: flushes, totalTimeMs },
    }),
  ];
}

// ============================================================================
// Entity Manager Clear
// ============================================================================

interface TableWrites {
  records: QueryRecord[];
  indices: number[];
}

/**
 * Reports tables written at least `batch_size` times in a tight sequence,
 * where the unit of work keeps every written entity until it is cleared
 */
export const entityManagerClearAnalyzer: Analyzer = {
  name: 'entity_manager_clear',
  issueTypes: ['entity_manager_clear'],
  category: 'performance',

  analyze(trace: QueryTrace, context: AnalyzerContext): IssueCollection {
    const batchSize = context.threshold('batch_size');
    const maxGap = context.threshold('max_gap');

    return IssueCollection.lazy(() =>
      runPerRecord('entity_manager_clear', writesByTable(trace, context), context.logger, ([table, writes]) =>
        writes.records.length >= batchSize && isSequential(writes.indices, maxGap)
          ? [createClearIssue(table, writes, batchSize)]
          : []
      )
    );
  },
};

/**
 * True when at least 70% of consecutive positions are at most `maxGap` apart
 */
export function isSequential(indices: readonly number[], maxGap: number): boolean {
  if (indices.length < 2) return false;
  let close = 0;
  for (let i = 1; i < indices.length; i++) {
    if (indices[i] - indices[i - 1] <= maxGap) close++;
  }
  return close / (indices.length - 1) >= BATCH_SEQUENTIAL_RATIO;
}

function writesByTable(trace: QueryTrace, context: AnalyzerContext): Array<[string, TableWrites]> {
  const tables = new Map<string, TableWrites>();
  let index = 0;
  for (const record of trace) {
    const position = index++;
    if (!WRITES.has(statementTypeOfRecord(record))) continue;
    const table = context.extractor.extractMainTable(record.sql)?.table;
    if (table === undefined) continue;
    const entry = tables.get(table);
    if (entry) {
      entry.records.push(record);
      entry.indices.push(position);
    } else {
      tables.set(table, { records: [record], indices: [position] });
    }
  }
  return [...tables];
}

function createClearIssue(table: string, writes: TableWrites, threshold: number): Issue {
  const count = writes.records.length;
  return createIssue({
    type: 'entity_manager_clear',
    title: `Unit of work not cleared: ${count} writes on ${table}`,
    description:
      `${count} INSERT/UPDATE/DELETE statements on ${table} ran close together without clearing the entity manager ` +
      `(threshold: ${threshold}). Every written entity stays managed and in memory until it is cleared.`,
    severity: severityForBatchWrites(count),
    category: 'performance',
    suggestion: { templateKey: 'batch_clear', context: { table, count } },
    originQueries: new QueryTrace(writes.records).distinctSql(),
    backtrace: firstBacktrace(writes.records),
    metrics: { count },
    dedupKey: table,
  });
}
