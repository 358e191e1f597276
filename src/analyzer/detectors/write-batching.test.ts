/**
 * @module analyzer/detectors/write-batching.test
 * @description Unit tests for flush-in-loop and uncleared write batch detection
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/analyzer/detectors/write-batching.ts
 * @lastModified 2026-10-19
 */

import { describe, it, expect } from 'vitest';
import { flushInLoopAnalyzer, entityManagerClearAnalyzer, detectFlushGroups, isSequential } from './write-batching';
import { createAnalyzerContext } from '../context';
import { createSharedServices } from '../index';
import { defaultConfig } from '../../config';
import { silentLogger } from '../../logging/logger';
import { QueryTrace, createQueryRecord, type QueryRecordInput } from '../../collections/query-trace';
import type { AnalyzerContext } from '../../types/issues';

// ============================================================================
// Test Helpers
// ============================================================================

const INSERT_ORDER = 'INSERT INTO orders (product_id) VALUES (?)';
const SELECT_STOCK = 'SELECT * FROM stock WHERE product_id = ?';

function contextFor(name: string): AnalyzerContext {
  const settings = defaultConfig().get(name) ?? { enabled: true, thresholds: {} };
  return createAnalyzerContext(name, settings, createSharedServices([], silentLogger));
}

/** `iterations` loop bodies of `writes` inserts followed by one read */
function loop(iterations: number, writes = 1): QueryRecordInput[] {
  const records: QueryRecordInput[] = [];
  for (let i = 0; i < iterations; i++) {
    for (let w = 0; w < writes; w++) records.push({ sql: INSERT_ORDER, executionTimeMs: 1, params: [i] });
    records.push({ sql: SELECT_STOCK, executionTimeMs: 1, params: [i] });
  }
  return records;
}

function inserts(count: number, readsBetween = 0): QueryRecordInput[] {
  const records: QueryRecordInput[] = [];
  for (let i = 0; i < count; i++) {
    if (i > 0) {
      for (let r = 0; r < readsBetween; r++) records.push({ sql: SELECT_STOCK, params: [r] });
    }
    records.push({ sql: INSERT_ORDER, params: [i] });
  }
  return records;
}

// ============================================================================
// Tests
// ============================================================================

describe('detectFlushGroups', () => {
  it('splits the trace at writes followed by a read', () => {
    const records = loop(3).map(input => createQueryRecord(input));

    expect(detectFlushGroups(records)).toEqual([
      { start: 0, end: 2, writes: 1 },
      { start: 2, end: 4, writes: 1 },
    ]);
  });

  it('does not treat a DELETE before a read as a flush', () => {
    const records = [
      createQueryRecord({ sql: 'DELETE FROM orders WHERE id = 1' }),
      createQueryRecord({ sql: SELECT_STOCK }),
      createQueryRecord({ sql: 'DELETE FROM orders WHERE id = 2' }),
      createQueryRecord({ sql: SELECT_STOCK }),
    ];

    expect(detectFlushGroups(records)).toEqual([]);
  });
});

describe('flushInLoopAnalyzer', () => {
  it('reports small write batches flushed once per iteration', () => {
    const [issue, ...rest] = flushInLoopAnalyzer
      .analyze(QueryTrace.from(loop(6)), contextFor('flush_in_loop'))
      .toArray();

    expect(rest).toEqual([]);
    expect(issue.title).toBe('Flush in loop: 5 flushes');
    expect(issue.description).toBe(
      'Detected 5 write batches each followed by a read, with 1.0 writes per batch on average (threshold: 5). ' +
        'Every flush is a separate round trip. Collect the changes and flush once after the loop.'
    );
    expect(issue.severity).toBe('warning');
    expect(issue.originQueries).toEqual([INSERT_ORDER, SELECT_STOCK]);
    expect(issue.metrics).toEqual({ count: 5, totalTimeMs: 11 });
    expect(issue.suggestion).toEqual({ templateKey: 'batch_flush', context: { flushCount: 5, writesPerFlush: '1.0' } });
  });

  it('needs as many flushes as the threshold', () => {
    expect(flushInLoopAnalyzer.analyze(QueryTrace.from(loop(5)), contextFor('flush_in_loop')).size).toBe(0);
  });

  it('accepts batches that are already large', () => {
    expect(flushInLoopAnalyzer.analyze(QueryTrace.from(loop(6, 11)), contextFor('flush_in_loop')).size).toBe(0);
  });

  it('escalates many flushes to critical', () => {
    const [issue] = flushInLoopAnalyzer.analyze(QueryTrace.from(loop(21)), contextFor('flush_in_loop')).toArray();

    expect(issue.title).toBe('Flush in loop: 20 flushes');
    expect(issue.severity).toBe('critical');
  });
});

describe('entityManagerClearAnalyzer', () => {
  it('reports a long run of writes on one table', () => {
    const [issue, ...rest] = entityManagerClearAnalyzer
      .analyze(QueryTrace.from(inserts(20)), contextFor('entity_manager_clear'))
      .toArray();

    expect(rest).toEqual([]);
    expect(issue.title).toBe('Unit of work not cleared: 20 writes on orders');
    expect(issue.severity).toBe('warning');
    expect(issue.dedupKey).toBe('orders');
    expect(issue.originQueries).toEqual([INSERT_ORDER]);
    expect(issue.metrics).toEqual({ count: 20 });
  });

  it('stays quiet below the batch size', () => {
    expect(entityManagerClearAnalyzer.analyze(QueryTrace.from(inserts(19)), contextFor('entity_manager_clear')).size).toBe(0);
  });

  it('ignores writes spread far apart', () => {
    const trace = QueryTrace.from(inserts(20, 11));

    expect(entityManagerClearAnalyzer.analyze(trace, contextFor('entity_manager_clear')).size).toBe(0);
  });

  it('escalates very large batches to critical', () => {
    const [issue] = entityManagerClearAnalyzer
      .analyze(QueryTrace.from(inserts(100)), contextFor('entity_manager_clear'))
      .toArray();

    expect(issue.severity).toBe('critical');
  });
});

describe('isSequential', () => {
  it('needs most gaps within the limit', () => {
    expect(isSequential([0, 1, 2, 3, 30], 10)).toBe(true);
    expect(isSequential([0, 20, 21, 22], 10)).toBe(false);
  });

  it('needs at least two positions', () => {
    expect(isSequential([4], 10)).toBe(false);
  });
});
