/**
 * @module analyzer/index.test
 * @description Tests for the analysis orchestrator: analyzer selection, failure isolation, filters
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/analyzer/index.ts
 * @lastModified 2026-10-19
 */

import { describe, it, expect } from 'vitest';
import { analyzeTrace, analyzerNames } from './index';
import { defaultConfig } from '../config';
import { createQueryRecord } from '../collections/query-trace';
import type { AnalyzerSettings } from '../types/issues';
import type { BacktraceFrame, QueryRecord } from '../types/query';

// ============================================================================
// Test Helpers
// ============================================================================

/**
 * Eleven primary-key loads of users, issued back to back
 */
function userLoads(backtrace?: BacktraceFrame[]): QueryRecord[] {
  return Array.from({ length: 11 }, (_, i) =>
    createQueryRecord({
      sql: `SELECT * FROM users WHERE id = ${i + 1}`,
      executionTimeMs: 0.27,
      ...(backtrace ? { backtrace } : {}),
    })
  );
}

// ============================================================================
// Tests
// ============================================================================

describe('analyzeTrace', () => {
  it('reports one issue for a repeated load and fills in metadata', () => {
    const result = analyzeTrace(userLoads());

    expect(result.issues.toArray().map(issue => [issue.type, issue.title, issue.severity])).toEqual([
      ['n_plus_one', 'N+1 query: 11 queries on users', 'warning'],
    ]);
    expect(result.metadata.queryCount).toBe(11);
    expect(result.metadata.mappingCount).toBe(0);
    expect(result.metadata.failedAnalyzers).toEqual([]);
    expect([...result.metadata.analyzersRun].sort()).toEqual(analyzerNames().sort());
    expect(result.metadata.rawIssueCount).toBeGreaterThan(result.issues.size);
  });

  it('lets the next repetition type through when n_plus_one is disabled', () => {
    const result = analyzeTrace(userLoads(), { disabledAnalyzers: ['n_plus_one'] });

    expect(result.issues.toArray().map(issue => issue.title)).toEqual(['Lazy loading in loop: 11 queries on Users']);
    expect(result.metadata.analyzersRun).not.toContain('n_plus_one');
  });

  it('runs only the enabled analyzers', () => {
    const result = analyzeTrace(userLoads(), { enabledAnalyzers: ['frequent_query', 'slow_query'] });

    expect(result.metadata.analyzersRun).toEqual(['frequent_query', 'slow_query']);
    expect(result.issues.toArray().map(issue => issue.type)).toEqual(['frequent_query']);
  });

  it('skips analyzers disabled in the configuration', () => {
    const config = new Map(defaultConfig());
    config.set('n_plus_one', { enabled: false, thresholds: { threshold: 5, repetition_floor: 3 } });

    expect(analyzeTrace(userLoads(), { config }).metadata.analyzersRun).not.toContain('n_plus_one');
  });

  it('isolates an analyzer that fails and keeps the others', () => {
    const broken: AnalyzerSettings = { enabled: true, thresholds: {} };
    const config = new Map(defaultConfig());
    config.set('n_plus_one', broken);

    const result = analyzeTrace(userLoads(), { config });

    expect(result.metadata.failedAnalyzers).toEqual(['n_plus_one']);
    expect(result.issues.toArray().map(issue => issue.type)).toEqual(['lazy_loading']);
  });

  it('filters by minimum severity and category', () => {
    expect(analyzeTrace(userLoads(), { minSeverity: 'critical' }).issues.size).toBe(0);
    expect(analyzeTrace(userLoads(), { categories: ['security'] }).issues.size).toBe(0);
    expect(analyzeTrace(userLoads(), { categories: ['performance'] }).issues.size).toBe(1);
  });

  it('drops queries issued only from excluded paths', () => {
    const result = analyzeTrace(userLoads([{ file: 'node_modules/orm/loader.js', line: 12 }]), {
      excludePaths: ['node_modules/'],
    });

    expect(result.metadata.queryCount).toBe(0);
    expect(result.issues.isEmpty()).toBe(true);
  });

  it('analyzes an empty trace', () => {
    const result = analyzeTrace([]);

    expect(result.issues.size).toBe(0);
    expect(result.metadata.queryCount).toBe(0);
  });
});
