/**
 * @module collections/query-trace.test
 * @description Unit tests for the query trace collection
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/collections/query-trace.ts
 * @lastModified 2026-10-19
 */

import { describe, it, expect } from 'vitest';
import { QueryTrace, createQueryRecord, firstApplicationFrame } from './query-trace';

// ============================================================================
// Test Helpers
// ============================================================================

function sampleTrace(): QueryTrace {
  return QueryTrace.from([
    { sql: 'SELECT * FROM users WHERE id = ?', executionTimeMs: 5 },
    { sql: "INSERT INTO logs (msg) VALUES ('x')", executionTimeMs: 150 },
    { sql: 'SELECT * FROM orders', executionTimeMs: 150, rowCount: 500 },
    { sql: 'UPDATE users SET name = ? WHERE id = ?', executionTimeMs: 20 },
    { sql: 'DELETE FROM sessions', executionTimeMs: 1 },
  ]);
}

// ============================================================================
// Tests
// ============================================================================

describe('createQueryRecord', () => {
  it('clamps negative execution time and defaults params', () => {
    const record = createQueryRecord({ sql: 'SELECT 1', executionTimeMs: -3 });

    expect(record).toEqual({ sql: 'SELECT 1', executionTimeMs: 0, params: [] });
    expect(Object.isFrozen(record)).toBe(true);
  });
});

describe('QueryTrace', () => {
  describe('filtering', () => {
    it('filters by statement type', () => {
      const trace = sampleTrace();

      expect(trace.onlySelects().size).toBe(2);
      expect(trace.onlyInserts().size).toBe(1);
      expect(trace.onlyUpdates().size).toBe(1);
      expect(trace.onlyDeletes().size).toBe(1);
    });

    it('keeps queries strictly above the slow threshold', () => {
      expect(sampleTrace().filterSlow(20).sqlQueries()).toEqual([
        "INSERT INTO logs (msg) VALUES ('x')",
        'SELECT * FROM orders',
      ]);
      expect(sampleTrace().filterFast(20).size).toBe(3);
    });

    it('matches SQL case-insensitively or by regex', () => {
      expect(sampleTrace().matchingSql('from USERS').size).toBe(1);
      expect(sampleTrace().matchingSql(/^select/gi).size).toBe(2);
    });

    it('leaves the original trace untouched', () => {
      const trace = sampleTrace();
      trace.filterSlow(100);

      expect(trace.size).toBe(5);
    });

    it('filters by row count', () => {
      expect(sampleTrace().withRowCountAbove(100).sqlQueries()).toEqual(['SELECT * FROM orders']);
    });
  });

  describe('excludePaths', () => {
    const trace = QueryTrace.from([
      { sql: 'SELECT 1', backtrace: [{ file: 'vendor/orm/Loader.ts', line: 10 }] },
      { sql: 'SELECT 2', backtrace: [{ file: 'vendor/orm/Loader.ts', line: 10 }, { file: 'src/Controller.ts', line: 42 }] },
      { sql: 'SELECT 3' },
      { sql: 'SELECT 4', backtrace: [{ file: 'vendor\\orm\\Loader.ts', line: 3 }] },
    ]);

    it('drops queries issued only from excluded paths', () => {
      expect(trace.excludePaths(['vendor/']).sqlQueries()).toEqual(['SELECT 2', 'SELECT 3']);
    });

    it('returns the same trace for an empty list', () => {
      expect(trace.excludePaths([])).toBe(trace);
    });
  });

  describe('grouping and statistics', () => {
    it('counts every statement type', () => {
      expect(sampleTrace().countByType()).toEqual({ SELECT: 2, INSERT: 1, UPDATE: 1, DELETE: 1, OTHER: 0 });
    });

    it('groups in order of first appearance', () => {
      expect([...sampleTrace().groupByType().keys()]).toEqual(['SELECT', 'INSERT', 'UPDATE', 'DELETE']);
    });

    it('sums and averages execution time', () => {
      expect(sampleTrace().totalExecutionTime()).toBe(326);
      expect(sampleTrace().averageExecutionTime()).toBe(65.2);
      expect(new QueryTrace().averageExecutionTime()).toBe(0);
    });

    it('returns the first of the slowest on ties', () => {
      expect(sampleTrace().slowest()?.sql).toBe("INSERT INTO logs (msg) VALUES ('x')");
      expect(sampleTrace().fastest()?.sql).toBe('DELETE FROM sessions');
    });

    it('sorts stably by execution time', () => {
      expect(sampleTrace().sortByExecutionTime().sqlQueries().slice(0, 2)).toEqual([
        "INSERT INTO logs (msg) VALUES ('x')",
        'SELECT * FROM orders',
      ]);
      expect(sampleTrace().sortByExecutionTime('asc').at(0)?.sql).toBe('DELETE FROM sessions');
    });

    it('lists distinct SQL in order of first appearance', () => {
      const trace = QueryTrace.from([{ sql: 'A' }, { sql: 'B' }, { sql: 'A' }]);

      expect(trace.distinctSql()).toEqual(['A', 'B']);
    });
  });
});

describe('firstApplicationFrame', () => {
  it('skips frames without a file', () => {
    const frames = [{ file: '', line: 0 }, { file: 'vendor/x.ts', line: 1 }, { file: 'app/y.ts', line: 2 }];

    expect(firstApplicationFrame(frames, ['vendor/'])).toEqual({ file: 'app/y.ts', line: 2 });
  });
});
