/**
 * @module parser/regex-extractor.test
 * @description Unit tests for regex structure extraction
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/parser/regex-extractor.ts
 * @lastModified 2026-10-19
 */

import { describe, it, expect } from 'vitest';
import { readStructureFallback, statementTypeOf, whereClauseOf } from './regex-extractor';

describe('readStructureFallback', () => {
  it('reads a SELECT with a LEFT OUTER JOIN, WHERE, ORDER BY and LIMIT', () => {
    const sql =
      "SELECT * FROM users u LEFT OUTER JOIN orders o ON o.user_id = u.id WHERE u.status = 'active' ORDER BY u.created_at DESC LIMIT 10";

    expect(readStructureFallback(sql)).toEqual({
      statementType: 'SELECT',
      mainTable: { table: 'users', alias: 'u' },
      joins: [{ type: 'LEFT', table: 'orders', alias: 'o', onConditions: ['o.user_id = u.id'] }],
      whereConditions: [{ column: 'status', operator: '=', alias: 'u', literalValue: 'active' }],
      orderByColumns: ['created_at'],
      groupByColumns: [],
      aggregationFunctions: [],
      functionsInWhere: [],
      hasLimit: true,
      hasOffset: false,
      limitValue: 10,
      hasSubquery: false,
      hasDistinct: false,
      source: 'fallback',
    });
  });

  it('reads the count from MySQL "LIMIT offset, count"', () => {
    const structure = readStructureFallback('SELECT * FROM t LIMIT 20, 10');

    expect(structure.limitValue).toBe(10);
    expect(structure.hasOffset).toBe(true);
  });

  it('reads the target table of an UPDATE without taking SET as an alias', () => {
    const structure = readStructureFallback("UPDATE users SET name = 'x' WHERE id = 5");

    expect(structure.statementType).toBe('UPDATE');
    expect(structure.mainTable).toEqual({ table: 'users', alias: null });
    expect(structure.whereConditions).toEqual([{ column: 'id', operator: '=', alias: null, literalValue: 5 }]);
  });

  it('keeps BETWEEN bounds together when splitting on AND', () => {
    const structure = readStructureFallback('SELECT * FROM t WHERE a BETWEEN 1 AND 5 AND b = 2');

    expect(structure.whereConditions).toEqual([
      { column: 'a', operator: 'BETWEEN', alias: null },
      { column: 'b', operator: '=', alias: null, literalValue: 2 },
    ]);
  });

  it('reads IS NOT NULL as a null literal', () => {
    const structure = readStructureFallback('SELECT * FROM t WHERE deleted_at IS NOT NULL');

    expect(structure.whereConditions).toEqual([
      { column: 'deleted_at', operator: 'IS NOT', alias: null, literalValue: null },
    ]);
  });

  it('lists functions applied in WHERE, excluding IN', () => {
    const structure = readStructureFallback("SELECT * FROM users WHERE LOWER(email) = 'a' AND id IN (1, 2)");

    expect(structure.functionsInWhere).toEqual(['LOWER']);
  });

  it('reads aggregations and GROUP BY columns', () => {
    const structure = readStructureFallback('SELECT COUNT(*), MAX(id) FROM t GROUP BY status');

    expect(structure.aggregationFunctions).toEqual(['COUNT', 'MAX']);
    expect(structure.groupByColumns).toEqual(['status']);
  });

  it('strips a schema prefix from table names', () => {
    expect(readStructureFallback('SELECT * FROM shop.orders').mainTable).toEqual({ table: 'orders', alias: null });
  });
});

describe('statementTypeOf', () => {
  it.each([
    ['INSERT INTO t VALUES (1)', 'INSERT'],
    ['REPLACE INTO t VALUES (1)', 'INSERT'],
    ['(SELECT 1)', 'SELECT'],
    ['  delete from t', 'DELETE'],
    ['SHOW TABLES', 'OTHER'],
  ])('%s is %s', (sql, expected) => {
    expect(statementTypeOf(sql)).toBe(expected);
  });
});

describe('whereClauseOf', () => {
  it('stops at ORDER BY', () => {
    expect(whereClauseOf('SELECT * FROM t WHERE a = 1 ORDER BY b')).toBe('a = 1');
  });

  it('returns null without a WHERE clause', () => {
    expect(whereClauseOf('SELECT * FROM t')).toBeNull();
  });
});
