/**
 * @module patterns/query-builder-pattern-detector.test
 * @description Unit tests for query-construction checks
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/patterns/query-builder-pattern-detector.ts
 * @lastModified 2026-10-19
 */

import { describe, it, expect } from 'vitest';
import { QueryBuilderPatternDetector } from './query-builder-pattern-detector';

describe('QueryBuilderPatternDetector', () => {
  const detector = new QueryBuilderPatternDetector();

  it('reports WHERE conditions compared to string literals', () => {
    expect(detector.detectPotentialSqlInjection("SELECT * FROM users WHERE email = 'x'")).toEqual({
      detected: true,
      locations: ['email = <literal>'],
    });
    expect(detector.detectPotentialSqlInjection('SELECT * FROM users WHERE email = ?').detected).toBe(false);
  });

  it('detects equality with NULL', () => {
    expect(detector.detectIncorrectNullComparison('SELECT * FROM t WHERE deleted_at = NULL')).toEqual({
      detected: true,
      fields: ['deleted_at = NULL'],
    });
    expect(detector.detectIncorrectNullComparison('SELECT * FROM t WHERE deleted_at IS NULL').detected).toBe(false);
  });

  it('detects an empty IN list', () => {
    expect(detector.hasEmptyInClause('SELECT * FROM t WHERE id IN ( )')).toBe(true);
    expect(detector.hasEmptyInClause('SELECT * FROM t WHERE id IN (1)')).toBe(false);
  });

  it('detects a literal LIKE pattern with a leading wildcard', () => {
    expect(detector.hasUnescapedLike("SELECT * FROM t WHERE name LIKE '%x'")).toBe(true);
    expect(detector.hasUnescapedLike('SELECT * FROM t WHERE name LIKE :pattern')).toBe(false);
  });

  it('lists named placeholders once each, skipping casts', () => {
    expect(detector.extractParameterPlaceholders('SELECT a::int FROM t WHERE a = :a OR b = :b OR c = :a')).toEqual(['a', 'b']);
  });

  it('reports unbound named parameters', () => {
    const sql = 'SELECT * FROM t WHERE a = :a AND b = :b';

    expect(detector.detectMissingParameters(sql, { a: 1 })).toEqual({ hasMissing: true, missing: ['b'] });
    expect(detector.detectMissingParameters(sql, { a: 1, b: 2 })).toEqual({ hasMissing: false, missing: [] });
    expect(detector.detectMissingParameters(sql, [1])).toEqual({ hasMissing: false, missing: [] });
  });
});
