/**
 * @module analyzer/detectors/unbounded-result.test
 * @description Unit tests for find-all and ORDER BY without LIMIT detection
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/analyzer/detectors/unbounded-result.ts
 * @lastModified 2026-10-19
 */

import { describe, it, expect } from 'vitest';
import { findAllAnalyzer, orderByWithoutLimitAnalyzer } from './unbounded-result';
import { createAnalyzerContext } from '../context';
import { createSharedServices } from '../index';
import { defaultConfig } from '../../config';
import { silentLogger } from '../../logging/logger';
import { QueryTrace } from '../../collections/query-trace';
import type { AnalyzerContext } from '../../types/issues';

function contextFor(name: string): AnalyzerContext {
  const settings = defaultConfig().get(name) ?? { enabled: true, thresholds: {} };
  return createAnalyzerContext(name, settings, createSharedServices([], silentLogger));
}

describe('findAllAnalyzer', () => {
  it('reports an unfiltered, unpaginated SELECT returning many rows', () => {
    const trace = QueryTrace.from([{ sql: 'SELECT * FROM products', executionTimeMs: 5, rowCount: 500 }]);
    const [issue] = findAllAnalyzer.analyze(trace, contextFor('find_all')).toArray();

    expect(issue.title).toBe('Unpaginated query: products returned 500 rows');
    expect(issue.severity).toBe('warning');
  });

  it('ignores filtered, aggregated and small results', () => {
    const trace = QueryTrace.from([
      { sql: 'SELECT * FROM products WHERE active = 1', rowCount: 500 },
      { sql: 'SELECT COUNT(*) FROM products', rowCount: 500 },
      { sql: 'SELECT * FROM products', rowCount: 99 },
      { sql: 'SELECT * FROM products LIMIT 1000', rowCount: 500 },
    ]);

    expect(findAllAnalyzer.analyze(trace, contextFor('find_all')).size).toBe(0);
  });
});

describe('orderByWithoutLimitAnalyzer', () => {
  it('reports a sorted result returned in full', () => {
    const trace = QueryTrace.from([{ sql: 'SELECT * FROM products ORDER BY name', executionTimeMs: 5, rowCount: 60 }]);
    const [issue] = orderByWithoutLimitAnalyzer.analyze(trace, contextFor('order_by_without_limit')).toArray();

    expect(issue.title).toBe('ORDER BY without LIMIT: 60 rows sorted');
    expect(issue.description).toBe(
      'Query sorts 60 rows by name and returns all of them (5.00ms). Add a LIMIT, or drop the ORDER BY when the order is not used.'
    );
    expect(issue.severity).toBe('info');
  });

  it('ignores limited and small results', () => {
    const trace = QueryTrace.from([
      { sql: 'SELECT * FROM products ORDER BY name LIMIT 10', rowCount: 60 },
      { sql: 'SELECT * FROM products ORDER BY name', rowCount: 40 },
      { sql: 'SELECT * FROM products ORDER BY name' },
    ]);

    expect(orderByWithoutLimitAnalyzer.analyze(trace, contextFor('order_by_without_limit')).size).toBe(0);
  });
});
