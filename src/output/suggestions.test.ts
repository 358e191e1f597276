/**
 * @module output/suggestions.test
 * @description Unit tests for suggestion template rendering
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/output/suggestions.ts
 * @lastModified 2026-10-19
 */

import { describe, it, expect } from 'vitest';
import { InMemoryTemplateRenderer, formatValue, renderSuggestion } from './suggestions';
import { createIssue } from '../analyzer/issue-factory';

describe('InMemoryTemplateRenderer', () => {
  it('substitutes placeholders', () => {
    const renderer = new InMemoryTemplateRenderer({ hello: 'Hello {{ name }}' });

    expect(renderer.render('hello', { name: 'orders' })).toBe('Hello orders');
  });

  it('drops lines whose placeholders have no value', () => {
    const renderer = new InMemoryTemplateRenderer({ two: 'A {{x}}\nB {{y}}\nC' });

    expect(renderer.render('two', { x: 1, y: null })).toBe('A 1\nC');
  });

  it('returns null for an unknown key', () => {
    const renderer = new InMemoryTemplateRenderer({});

    expect(renderer.has('missing_index')).toBe(false);
    expect(renderer.render('missing_index', {})).toBeNull();
  });

  it('accepts templates registered later', () => {
    const renderer = new InMemoryTemplateRenderer({}).register('custom', '{{count}} times');

    expect(renderer.keys()).toEqual(['custom']);
    expect(renderer.render('custom', { count: 3 })).toBe('3 times');
  });

  it('ships a template for missing indexes', () => {
    const text = new InMemoryTemplateRenderer().render('missing_index', {
      table: 'orders',
      columns: ['status'],
      indexStatement: 'CREATE INDEX idx_orders_status ON orders (status)',
      rowsScanned: 5000,
    });

    expect(text).toBe(
      '5000 rows of orders were scanned to filter on status.\nCREATE INDEX idx_orders_status ON orders (status);'
    );
  });
});

describe('formatValue', () => {
  it.each([
    [3, '3'],
    [2.5, '2.50'],
    ['', null],
    ['text', 'text'],
    [true, 'yes'],
    [false, 'no'],
    [['a', null, 'b'], 'a, b'],
    [[], null],
    [{ a: 1 }, '{"a":1}'],
    [undefined, null],
  ])('%j is shown as %j', (value, expected) => {
    expect(formatValue(value)).toBe(expected);
  });
});

describe('renderSuggestion', () => {
  const base = {
    type: 'find_all' as const,
    title: 'Unpaginated query: products returned 500 rows',
    description: 'test description',
    severity: 'warning' as const,
    category: 'performance' as const,
  };

  it('renders the issue suggestion', () => {
    const issue = createIssue({
      ...base,
      suggestion: { templateKey: 'pagination', context: { table: 'products', rowCount: 500 } },
    });

    expect(renderSuggestion(issue, new InMemoryTemplateRenderer())).toBe(
      '500 rows of products were loaded at once.\n' +
        'Add LIMIT/OFFSET or keyset pagination, or iterate in batches and clear the identity map between them.'
    );
  });

  it('returns null without a suggestion', () => {
    expect(renderSuggestion(createIssue(base), new InMemoryTemplateRenderer())).toBeNull();
  });
});
