/**
 * @module analyzer/detectors/slow-query.test
 * @description Unit tests for slow query and missing index detection
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/analyzer/detectors/slow-query.ts, src/analyzer/detectors/missing-index.ts
 * @lastModified 2026-10-19
 */

import { describe, it, expect } from 'vitest';
import { slowQueryAnalyzer, optimizationHints } from './slow-query';
import { missingIndexAnalyzer } from './missing-index';
import { createAnalyzerContext } from '../context';
import { createSharedServices } from '../index';
import { defaultConfig, resolveConfig, type AnalysisConfig } from '../../config';
import { silentLogger } from '../../logging/logger';
import { QueryTrace } from '../../collections/query-trace';
import { SqlStructureExtractor } from '../../parser/structure-extractor';
import type { AnalyzerContext } from '../../types/issues';

// ============================================================================
// Test Helpers
// ============================================================================

function contextFor(name: string, config: AnalysisConfig = defaultConfig()): AnalyzerContext {
  const settings = config.get(name) ?? { enabled: true, thresholds: {} };
  return createAnalyzerContext(name, settings, createSharedServices([], silentLogger));
}

// ============================================================================
// Tests
// ============================================================================

describe('slowQueryAnalyzer', () => {
  it('reports queries strictly slower than the threshold', () => {
    const trace = QueryTrace.from([
      { sql: 'SELECT * FROM orders', executionTimeMs: 250, rowCount: 12 },
      { sql: 'SELECT * FROM users', executionTimeMs: 100 },
    ]);
    const issues = slowQueryAnalyzer.analyze(trace, contextFor('slow_query')).toArray();

    expect(issues).toHaveLength(1);
    expect(issues[0].title).toBe('Slow query: 250.00ms');
    expect(issues[0].description).toBe(
      'Query execution time (250.00ms) exceeds threshold (100ms). Review query structure and add appropriate indexes.'
    );
    expect(issues[0].severity).toBe('critical');
    expect(issues[0].metrics).toEqual({ timeMs: 250, rowCount: 12 });
  });

  it('never reports below the 10ms floor, whatever the threshold', () => {
    const config = resolveConfig({ slow_query: { threshold_ms: 5 } });
    const trace = QueryTrace.from([
      { sql: 'SELECT * FROM a', executionTimeMs: 8 },
      { sql: 'SELECT * FROM b', executionTimeMs: 12 },
    ]);
    const issues = slowQueryAnalyzer.analyze(trace, contextFor('slow_query', config)).toArray();

    expect(issues.map(issue => [issue.originQueries[0], issue.severity])).toEqual([['SELECT * FROM b', 'warning']]);
  });
});

describe('optimizationHints', () => {
  const extractor = new SqlStructureExtractor();

  it('lists structural hints in a fixed order', () => {
    expect(optimizationHints("SELECT * FROM users WHERE name LIKE '%son' ORDER BY name", extractor)).toEqual([
      'Ensure ORDER BY columns are indexed: name',
      'Leading wildcard LIKE detected - cannot use index efficiently',
    ]);
  });

  it('falls back to a generic hint', () => {
    expect(optimizationHints('SELECT * FROM users', extractor)).toEqual(['Review query structure and add appropriate indexes.']);
  });
});

describe('missingIndexAnalyzer', () => {
  it('reports a full scan of a filtered table', () => {
    const trace = QueryTrace.from([
      {
        sql: "SELECT * FROM orders WHERE status = 'pending'",
        executionTimeMs: 50,
        explain: { rowsExamined: 5000, accessType: 'ALL', key: null },
      },
    ]);
    const [issue] = missingIndexAnalyzer.analyze(trace, contextFor('missing_index')).toArray();

    expect(issue.title).toBe('Missing index on orders: 5000 rows scanned');
    expect(issue.severity).toBe('warning');
    expect(issue.suggestion?.context.indexStatement).toBe('CREATE INDEX idx_orders_status ON orders (status)');
  });

  it('accepts a plan that uses an index', () => {
    const trace = QueryTrace.from([
      {
        sql: "SELECT * FROM orders WHERE status = 'pending'",
        executionTimeMs: 50,
        explain: { rowsExamined: 5000, accessType: 'ref', key: 'idx_status' },
      },
    ]);

    expect(missingIndexAnalyzer.analyze(trace, contextFor('missing_index')).size).toBe(0);
  });

  it('falls back to the row count and respects the minimum', () => {
    const trace = QueryTrace.from([
      { sql: "SELECT * FROM orders WHERE status = 'pending'", executionTimeMs: 1, rowCount: 400 },
      { sql: "SELECT * FROM orders WHERE customer_id = 'c-1'", executionTimeMs: 1, rowCount: 1200 },
    ]);
    const issues = missingIndexAnalyzer.analyze(trace, contextFor('missing_index')).toArray();

    expect(issues.map(issue => issue.title)).toEqual(['Missing index on orders: 1200 rows scanned']);
  });

  it('needs a WHERE clause', () => {
    const trace = QueryTrace.from([{ sql: 'SELECT * FROM orders', rowCount: 5000 }]);

    expect(missingIndexAnalyzer.analyze(trace, contextFor('missing_index')).size).toBe(0);
  });
});
