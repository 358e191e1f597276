/**
 * @module output/formatters/redaction.test
 * @description Unit tests for SQL literal and personal data masking
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/output/formatters/redaction.ts
 * @lastModified 2026-10-19
 */

import { describe, it, expect } from 'vitest';
import { redactSqlLiterals, redactString, redactIssue, REDACTED } from './redaction';
import { formatIssue } from './issue-formatter';
import { createIssue } from '../../analyzer/issue-factory';

describe('output/formatters/redaction', () => {
  describe('redactSqlLiterals', () => {
    it('masks quoted literals and keeps the quotes', () => {
      expect(redactSqlLiterals("SELECT * FROM users WHERE email = 'a@b.io'")).toBe(
        `SELECT * FROM users WHERE email = '${REDACTED}'`
      );
    });

    it('treats a doubled quote as part of the literal', () => {
      expect(redactSqlLiterals("SELECT * FROM t WHERE name = 'O''Brien' AND x = 1")).toBe(
        "SELECT * FROM t WHERE name = '[REDACTED]' AND x = 1"
      );
    });

    it('leaves placeholders alone', () => {
      expect(redactSqlLiterals('SELECT * FROM t WHERE a = ? AND b = :b')).toBe('SELECT * FROM t WHERE a = ? AND b = :b');
    });
  });

  describe('redactString', () => {
    it('masks email addresses', () => {
      expect(redactString('contact a.person@example.com today')).toBe('contact [REDACTED] today');
    });

    it('masks credentials', () => {
      expect(redactString('password=test-secret')).toBe('[REDACTED]');
    });

    it('applies custom patterns', () => {
      expect(redactString('order ORD-1234', [/ORD-\d+/g])).toBe('order [REDACTED]');
    });
  });

  describe('redactIssue', () => {
    it('masks queries, text and suggestion context', () => {
      const issue = formatIssue(
        createIssue({
          type: 'sql_injection',
          title: 'Potential SQL injection (risk level 6)',
          description: "Value '1 OR 1=1' was concatenated",
          severity: 'critical',
          category: 'security',
          suggestion: { templateKey: 'sql_injection', context: { riskLevel: 6, sample: ["id = '1 OR 1=1'"] } },
          originQueries: ["SELECT * FROM users WHERE id = '1 OR 1=1'"],
        })
      );
      const redacted = redactIssue(issue);

      expect(redacted.queries).toEqual(["SELECT * FROM users WHERE id = '[REDACTED]'"]);
      expect(redacted.description).toBe("Value '[REDACTED]' was concatenated");
      expect(redacted.suggestion?.context).toEqual({ riskLevel: 6, sample: ["id = '[REDACTED]'"] });
      expect(issue.queries).toEqual(["SELECT * FROM users WHERE id = '1 OR 1=1'"]);
    });
  });
});
