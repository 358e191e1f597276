/**
 * @module parser/structure-extractor.test
 * @description Unit tests for the structure extractor facade
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/parser/structure-extractor.ts
 * @lastModified 2026-10-19
 */

import { describe, it, expect } from 'vitest';
import { SqlStructureExtractor, escapeRegExp } from './structure-extractor';
import { BoundedCache } from './bounded-cache';
import type { StructuralQuery } from '../types/query';

const JOIN_SQL = 'SELECT u.* FROM users u LEFT JOIN orders o ON o.user_id = u.id';

describe('SqlStructureExtractor', () => {
  describe('extract', () => {
    it('returns an empty structure for blank SQL', () => {
      const extractor = new SqlStructureExtractor();
      const structure = extractor.extract('   ');

      expect(structure.statementType).toBe('OTHER');
      expect(structure.mainTable).toBeNull();
      expect(structure.joins).toEqual([]);
    });

    it('reads the main table and alias', () => {
      const extractor = new SqlStructureExtractor();

      expect(extractor.extractMainTable('SELECT * FROM users u WHERE u.id = 1')).toEqual({ table: 'users', alias: 'u' });
    });

    it('caches one structure per SQL text', () => {
      const cache = new BoundedCache<StructuralQuery>();
      const extractor = new SqlStructureExtractor({ cache });

      extractor.extract(JOIN_SQL);
      extractor.countJoins(JOIN_SQL);
      extractor.hasJoin(JOIN_SQL);

      expect(cache.stats()).toEqual({ size: 1, hits: 2, misses: 1 });
    });

    it('leaves the alias of an unaliased join null', () => {
      const extractor = new SqlStructureExtractor();
      const joins = extractor.extractJoins('SELECT * FROM users u LEFT JOIN orders ON u.id = orders.user_id');

      expect(joins.map(join => [join.type, join.table, join.alias])).toEqual([['LEFT', 'orders', null]]);
    });

    it('falls back to regexes for SQL the grammar rejects', () => {
      const extractor = new SqlStructureExtractor();
      const structure = extractor.extract('SELECT * FROM users WHERE id = 1 LOCK IN SHARE MODE NOWAIT SKIP');

      expect(structure.mainTable).toEqual({ table: 'users', alias: null });
    });
  });

  describe('text checks', () => {
    const extractor = new SqlStructureExtractor();

    it('detects a LIKE pattern that starts with a wildcard', () => {
      expect(extractor.hasLeadingWildcardLike("SELECT * FROM t WHERE name LIKE '%abc'")).toBe(true);
      expect(extractor.hasLeadingWildcardLike("SELECT * FROM t WHERE name LIKE 'abc%'")).toBe(false);
    });

    it('finds the IS NOT NULL field on an alias', () => {
      const sql = `${JOIN_SQL} WHERE o.status IS NOT NULL`;

      expect(extractor.findIsNotNullFieldOnAlias(sql, 'o')).toBe('status');
      expect(extractor.findIsNotNullFieldOnAlias(sql, 'u')).toBeNull();
    });

    it('ignores alias references inside the join that introduced it', () => {
      expect(extractor.isAliasUsedInQuery(JOIN_SQL, 'o')).toBe(false);
      expect(extractor.isAliasUsedInQuery(JOIN_SQL, 'u')).toBe(true);
    });

    it('ignores the exact join clause it is given', () => {
      const join = 'LEFT JOIN orders o ON o.user_id = u.id';
      const sql = `SELECT u.* FROM users u ${join} WHERE u.active = 1`;

      expect(extractor.isAliasUsedInQuery(sql, 'o', join)).toBe(false);
      expect(extractor.isAliasUsedInQuery(`${sql} AND o.total > 5`, 'o', join)).toBe(true);
    });

    it('locates the join itself when the given clause is not in the SQL', () => {
      expect(extractor.isAliasUsedInQuery(JOIN_SQL, 'o', 'JOIN orders x ON x.id = 1')).toBe(false);
    });

    it('sees an alias used in the select list', () => {
      const sql = 'SELECT o.id FROM users u LEFT JOIN orders o ON o.user_id = u.id';

      expect(extractor.isAliasUsedInQuery(sql, 'o')).toBe(true);
    });

    it('detects a locale constraint in WHERE', () => {
      expect(extractor.hasLocaleConstraintInJoin("SELECT * FROM p WHERE t.locale = 'en'")).toBe(true);
      expect(extractor.hasLocaleConstraintInJoin("SELECT * FROM p WHERE t.name = 'en'")).toBe(false);
    });
  });
});

describe('escapeRegExp', () => {
  it('escapes regex metacharacters', () => {
    expect(escapeRegExp('a.b*c')).toBe('a\\.b\\*c');
  });
});
