/**
 * @module analyzer/issue-factory.test
 * @description Unit tests for issue construction
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/analyzer/issue-factory.ts
 * @lastModified 2026-10-19
 */

import { describe, it, expect } from 'vitest';
import { createIssue, withChanges, issueId, formatMs, type IssueInput } from './issue-factory';

function input(overrides: Partial<IssueInput> = {}): IssueInput {
  return {
    type: 'slow_query',
    title: 'Slow query: 250.00ms',
    description: 'Query took 250.00ms',
    severity: 'critical',
    category: 'performance',
    originQueries: ['SELECT * FROM orders', 'SELECT * FROM orders', 'SELECT * FROM users'],
    ...overrides,
  };
}

describe('createIssue', () => {
  it('de-duplicates origin queries in order of first appearance', () => {
    expect(createIssue(input()).originQueries).toEqual(['SELECT * FROM orders', 'SELECT * FROM users']);
  });

  it('derives the id from the first origin query when there is no dedup key', () => {
    expect(createIssue(input()).id).toBe(issueId('slow_query', 'SELECT * FROM orders'));
  });

  it('prefers the dedup key for the id', () => {
    const issue = createIssue(input({ dedupKey: 'Order.total' }));

    expect(issue.id).toBe(issueId('slow_query', 'Order.total'));
    expect(issue.dedupKey).toBe('Order.total');
  });

  it('stores an empty backtrace as null', () => {
    expect(createIssue(input({ backtrace: [] })).backtrace).toBeNull();
  });

  it('freezes the issue', () => {
    const issue = createIssue(input({ metrics: { timeMs: 250 } }));

    expect(Object.isFrozen(issue)).toBe(true);
    expect(Object.isFrozen(issue.metrics)).toBe(true);
    expect(Object.isFrozen(issue.originQueries)).toBe(true);
  });

  it('omits the suggestion when none is given', () => {
    expect('suggestion' in createIssue(input())).toBe(false);
  });
});

describe('withChanges', () => {
  it('replaces fields and recomputes the id', () => {
    const original = createIssue(input());
    const changed = withChanges(original, { originQueries: ['SELECT 1'] });

    expect(changed.title).toBe(original.title);
    expect(changed.originQueries).toEqual(['SELECT 1']);
    expect(changed.id).toBe(issueId('slow_query', 'SELECT 1'));
  });
});

describe('issueId', () => {
  it('prefixes the type and keeps twelve hex characters', () => {
    expect(issueId('n_plus_one', 'x')).toMatch(/^n_plus_one-[0-9a-f]{12}$/);
  });
});

describe('formatMs', () => {
  it('rounds to two decimals', () => {
    expect(formatMs(2.969)).toBe('2.97ms');
  });
});
