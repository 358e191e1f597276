/**
 * @module analyzer/detectors/division-by-zero.test
 * @description Unit tests for unguarded division detection
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/analyzer/detectors/division-by-zero.ts
 * @lastModified 2026-10-19
 */

import { describe, it, expect } from 'vitest';
import { divisionByZeroAnalyzer, unguardedDivisions } from './division-by-zero';
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

describe('divisionByZeroAnalyzer', () => {
  it('reports a division by a column', () => {
    const trace = QueryTrace.from([{ sql: 'SELECT s.revenue / s.quantity FROM sales s' }]);
    const [issue] = divisionByZeroAnalyzer.analyze(trace, contextFor('division_by_zero')).toArray();

    expect(issue.title).toBe('Possible division by zero: s.revenue / s.quantity');
    expect(issue.description).toBe(
      "Division 's.revenue / s.quantity' has no guard. When s.quantity is zero the database raises an error " +
        'or returns NULL, depending on its mode. Use NULLIF(s.quantity, 0).'
    );
    expect(issue.severity).toBe('critical');
    expect(issue.category).toBe('integrity');
    expect(issue.dedupKey).toBe('s.revenue/s.quantity');
    expect(issue.suggestion?.context).toEqual({
      unsafeDivision: 's.revenue / s.quantity',
      safeDivision: 's.revenue / NULLIF(s.quantity, 0)',
    });
  });

  it('makes one issue for a division shared by several queries', () => {
    const trace = QueryTrace.from([
      { sql: 'SELECT total / items FROM carts WHERE id = 1' },
      { sql: 'SELECT total / items FROM carts WHERE id = 2' },
    ]);
    const issues = divisionByZeroAnalyzer.analyze(trace, contextFor('division_by_zero')).toArray();

    expect(issues).toHaveLength(1);
    expect(issues[0].originQueries).toEqual([
      'SELECT total / items FROM carts WHERE id = 1',
      'SELECT total / items FROM carts WHERE id = 2',
    ]);
  });

  it('skips guarded queries', () => {
    const trace = QueryTrace.from([
      { sql: 'SELECT revenue / NULLIF(quantity, 0) FROM sales' },
      { sql: 'SELECT CASE WHEN quantity = 0 THEN 0 ELSE revenue / quantity END FROM sales' },
    ]);

    expect(divisionByZeroAnalyzer.analyze(trace, contextFor('division_by_zero')).size).toBe(0);
  });
});

describe('unguardedDivisions', () => {
  it('skips non-zero constant divisors', () => {
    expect(unguardedDivisions('SELECT revenue / quantity, total / 2 FROM sales')).toEqual([
      { expression: 'revenue / quantity', dividend: 'revenue', divisor: 'quantity' },
    ]);
  });

  it('keeps a literal zero divisor', () => {
    expect(unguardedDivisions('SELECT price / 0 FROM t')).toEqual([
      { expression: 'price / 0', dividend: 'price', divisor: '0' },
    ]);
  });

  it('ignores slashes in strings and comments', () => {
    expect(unguardedDivisions("SELECT * FROM t /* a/b */ WHERE path = 'x/y'")).toEqual([]);
  });
});
