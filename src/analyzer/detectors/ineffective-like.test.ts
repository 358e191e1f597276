/**
 * @module analyzer/detectors/ineffective-like.test
 * @description Unit tests for leading-wildcard LIKE and function-in-WHERE detection
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/analyzer/detectors/ineffective-like.ts, src/analyzer/detectors/function-in-where.ts
 * @lastModified 2026-10-19
 */

import { describe, it, expect } from 'vitest';
import { ineffectiveLikeAnalyzer, leadingWildcardPattern, likeTypeOf } from './ineffective-like';
import { functionInWhereAnalyzer, columnWrappingFunctions } from './function-in-where';
import { createAnalyzerContext } from '../context';
import { createSharedServices } from '../index';
import { defaultConfig } from '../../config';
import { silentLogger } from '../../logging/logger';
import { QueryTrace, createQueryRecord } from '../../collections/query-trace';
import type { AnalyzerContext } from '../../types/issues';

function contextFor(name: string): AnalyzerContext {
  const settings = defaultConfig().get(name) ?? { enabled: true, thresholds: {} };
  return createAnalyzerContext(name, settings, createSharedServices([], silentLogger));
}

describe('ineffectiveLikeAnalyzer', () => {
  it('reports a literal leading wildcard', () => {
    const trace = QueryTrace.from([{ sql: "SELECT * FROM users WHERE name LIKE '%son'", executionTimeMs: 20 }]);
    const [issue] = ineffectiveLikeAnalyzer.analyze(trace, contextFor('ineffective_like')).toArray();

    expect(issue.title).toBe('LIKE pattern prevents index usage (20.00ms)');
    expect(issue.description).toBe(
      "Pattern '%son' starts with a wildcard (LIKE '%...'), so the database must scan every row. " +
        'Use full-text search, or a prefix match when the search allows it.'
    );
    expect(issue.severity).toBe('warning');
    expect(issue.dedupKey).toBe('%son');
  });

  it('reads a bound pattern and escalates slow queries', () => {
    const trace = QueryTrace.from([
      { sql: 'SELECT * FROM users WHERE name LIKE ?', executionTimeMs: 150, params: ['%smith%'] },
    ]);
    const [issue] = ineffectiveLikeAnalyzer.analyze(trace, contextFor('ineffective_like')).toArray();

    expect(issue.title).toBe('LIKE pattern causing slow query (150.00ms)');
    expect(issue.severity).toBe('critical');
    expect(issue.suggestion?.context.likeType).toBe('contains');
  });

  it('skips fast queries and repeated patterns', () => {
    const trace = QueryTrace.from([
      { sql: "SELECT * FROM users WHERE name LIKE '%a'", executionTimeMs: 2 },
      { sql: "SELECT * FROM users WHERE name LIKE '%b'", executionTimeMs: 30 },
      { sql: "SELECT id FROM users WHERE name LIKE '%b'", executionTimeMs: 40 },
    ]);

    expect(ineffectiveLikeAnalyzer.analyze(trace, contextFor('ineffective_like')).size).toBe(1);
  });

  it('keeps every query sharing a pattern, timed by the slowest', () => {
    const trace = QueryTrace.from([
      { sql: "SELECT * FROM users WHERE name LIKE '%son'", executionTimeMs: 20 },
      { sql: "SELECT * FROM products WHERE name LIKE '%son'", executionTimeMs: 35 },
      { sql: "SELECT * FROM users WHERE name LIKE '%son'", executionTimeMs: 12 },
    ]);
    const issues = ineffectiveLikeAnalyzer.analyze(trace, contextFor('ineffective_like')).toArray();

    expect(issues).toHaveLength(1);
    expect(issues[0].originQueries).toEqual([
      "SELECT * FROM users WHERE name LIKE '%son'",
      "SELECT * FROM products WHERE name LIKE '%son'",
    ]);
    expect(issues[0].title).toBe('LIKE pattern prevents index usage (35.00ms)');
    expect(issues[0].dedupKey).toBe('%son');
  });
});

describe('leadingWildcardPattern', () => {
  it('ignores prefix matches and a lone wildcard', () => {
    expect(leadingWildcardPattern(createQueryRecord({ sql: "SELECT * FROM t WHERE a LIKE 'abc%'" }))).toBeNull();
    expect(leadingWildcardPattern(createQueryRecord({ sql: 'SELECT * FROM t WHERE a LIKE :q', params: { q: '%' } }))).toBeNull();
  });

  it('reads named parameters', () => {
    const record = createQueryRecord({ sql: 'SELECT * FROM t WHERE a LIKE :q', params: { q: '%x' } });

    expect(leadingWildcardPattern(record)).toBe('%x');
  });
});

describe('likeTypeOf', () => {
  it('distinguishes contains from ends-with', () => {
    expect(likeTypeOf('%x%')).toBe('contains');
    expect(likeTypeOf('%x')).toBe('ends_with');
  });
});

describe('functionInWhereAnalyzer', () => {
  it('reports a function wrapping a filtered column', () => {
    const trace = QueryTrace.from([{ sql: 'SELECT * FROM orders WHERE YEAR(created_at) = 2024' }]);
    const [issue] = functionInWhereAnalyzer.analyze(trace, contextFor('function_in_where')).toArray();

    expect(issue.title).toBe('Function in WHERE prevents index use: YEAR()');
    expect(issue.severity).toBe('warning');
  });

  it('accepts a function on the value side', () => {
    const trace = QueryTrace.from([{ sql: 'SELECT * FROM orders WHERE created_at > NOW()' }]);

    expect(functionInWhereAnalyzer.analyze(trace, contextFor('function_in_where')).size).toBe(0);
  });
});

describe('columnWrappingFunctions', () => {
  it('keeps only functions applied to a column before a comparison', () => {
    const sql = "SELECT * FROM users WHERE LOWER(email) = 'a' AND created_at > NOW()";

    expect(columnWrappingFunctions(sql, ['LOWER', 'NOW'])).toEqual(['LOWER']);
  });
});
