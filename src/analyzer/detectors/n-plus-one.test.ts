/**
 * @module analyzer/detectors/n-plus-one.test
 * @description Unit tests for N+1 detection
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/analyzer/detectors/n-plus-one.ts
 * @lastModified 2026-10-19
 */

import { describe, it, expect } from 'vitest';
import { nPlusOneAnalyzer } from './n-plus-one';
import { createAnalyzerContext } from '../context';
import { createSharedServices } from '../index';
import { defaultConfig, resolveConfig, type AnalysisConfig } from '../../config';
import { silentLogger } from '../../logging/logger';
import { QueryTrace } from '../../collections/query-trace';
import { ConfigurationError } from '../../types/common';
import type { AnalyzerContext } from '../../types/issues';

// ============================================================================
// Test Helpers
// ============================================================================

function contextFor(config: AnalysisConfig = defaultConfig()): AnalyzerContext {
  const settings = config.get('n_plus_one') ?? { enabled: true, thresholds: {} };
  return createAnalyzerContext('n_plus_one', settings, createSharedServices([], silentLogger));
}

function repeated(sql: string, times: number, executionTimeMs = 1): QueryTrace {
  return QueryTrace.from(Array.from({ length: times }, () => ({ sql, executionTimeMs })));
}

// ============================================================================
// Tests
// ============================================================================

describe('nPlusOneAnalyzer', () => {
  it('reports eleven primary-key loads as one warning', () => {
    const issues = nPlusOneAnalyzer.analyze(repeated('SELECT * FROM users WHERE id = ?', 11, 0.27), contextFor()).toArray();

    expect(issues).toHaveLength(1);
    const [issue] = issues;
    expect(issue.title).toBe('N+1 query: 11 queries on users');
    expect(issue.severity).toBe('warning');
    expect(issue.metrics.count).toBe(11);
    expect(issue.metrics.totalTimeMs).toBeCloseTo(2.97, 5);
    expect(issue.suggestion?.templateKey).toBe('eager_loading');
    expect(issue.originQueries).toEqual(['SELECT * FROM users WHERE id = ?']);
  });

  it('suppresses two executions', () => {
    const issues = nPlusOneAnalyzer.analyze(repeated('SELECT * FROM users WHERE id = ?', 2, 0.27), contextFor());

    expect(issues.size).toBe(0);
  });

  it('groups literal values under one signature and names the foreign key', () => {
    const trace = QueryTrace.from(
      [1, 2, 3, 4, 5, 6].map(id => ({ sql: `SELECT * FROM posts WHERE user_id = ${id}`, executionTimeMs: 1 }))
    );
    const [issue] = nPlusOneAnalyzer.analyze(trace, contextFor()).toArray();

    expect(issue.title).toBe('N+1 query: 6 queries on posts');
    expect(issue.severity).toBe('info');
    expect(issue.suggestion?.context.foreignKey).toBe('user_id');
    expect(issue.originQueries).toHaveLength(6);
  });

  it('reports a repeated query below the N+1 threshold as repetition', () => {
    const [issue] = nPlusOneAnalyzer.analyze(repeated('SELECT COUNT(*) FROM logs', 3, 0), contextFor()).toArray();

    expect(issue.title).toBe('Repeated query: executed 3 times');
    expect(issue.suggestion?.templateKey).toBe('repeated_query');
    expect(issue.severity).toBe('info');
  });

  it('ignores statements other than SELECT', () => {
    expect(nPlusOneAnalyzer.analyze(repeated('UPDATE users SET seen = 1', 5), contextFor()).size).toBe(0);
  });

  it('reads the threshold from configuration', () => {
    const config = resolveConfig({ n_plus_one: { threshold: 20 } });
    const [issue] = nPlusOneAnalyzer.analyze(repeated('SELECT * FROM users WHERE id = ?', 11), contextFor(config)).toArray();

    expect(issue.title).toBe('Repeated query: executed 11 times');
  });

  it('throws when a threshold is missing from its settings', () => {
    const context = createAnalyzerContext(
      'n_plus_one',
      { enabled: true, thresholds: {} },
      createSharedServices([], silentLogger)
    );

    expect(() => nPlusOneAnalyzer.analyze(repeated('SELECT 1', 3), context)).toThrow(ConfigurationError);
  });
});
