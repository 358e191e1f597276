/**
 * @module config/index.test
 * @description Unit tests for configuration resolution and input file parsing
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/config/index.ts
 * @lastModified 2026-10-19
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  defaultConfig,
  resolveConfig,
  loadConfig,
  parseTrace,
  parseMappings,
  loadTraceFile,
} from './index';
import { ConfigurationError } from '../types/common';

// ============================================================================
// Test Helpers
// ============================================================================

function configError(raw: unknown): ConfigurationError | null {
  try {
    resolveConfig(raw);
  } catch (error) {
    if (error instanceof ConfigurationError) return error;
    throw error;
  }
  return null;
}

// ============================================================================
// Tests
// ============================================================================

describe('resolveConfig', () => {
  it('enables every analyzer with its defaults', () => {
    const config = defaultConfig();

    expect(config.get('n_plus_one')).toEqual({ enabled: true, thresholds: { threshold: 5, repetition_floor: 3 } });
    expect(config.get('slow_query')).toEqual({ enabled: true, thresholds: { threshold_ms: 100 } });
    expect(config.get('cascade_configuration')).toEqual({ enabled: true, thresholds: {} });
    expect(config.size).toBe(23);
  });

  it('merges overrides over the defaults', () => {
    const config = resolveConfig({ lazy_loading: { threshold: 20 }, find_all: { enabled: false } });

    expect(config.get('lazy_loading')?.thresholds).toEqual({ threshold: 20, max_sequential_gap: 5 });
    expect(config.get('find_all')?.enabled).toBe(false);
  });

  it('ignores unknown analyzers and keys', () => {
    const config = resolveConfig({ made_up: { x: 1 }, slow_query: { threshold_ms: 250, colour: 'red' } });

    expect(config.get('made_up')).toBeUndefined();
    expect(config.get('slow_query')?.thresholds).toEqual({ threshold_ms: 250 });
  });

  it('treats a missing configuration as the defaults', () => {
    expect(resolveConfig(undefined).get('frequent_query')?.thresholds).toEqual({ threshold: 10 });
  });

  it('rejects a negative threshold', () => {
    const error = configError({ n_plus_one: { threshold: -1 } });

    expect(error?.code).toBe('INVALID_THRESHOLD');
    expect(error?.message).toBe('n_plus_one.threshold must not be negative');
  });

  it('rejects a threshold that is not a number', () => {
    expect(configError({ n_plus_one: { threshold: '5' } })?.message).toBe('n_plus_one.threshold must be a number');
  });

  it('keeps the slow query threshold inside its open range', () => {
    expect(configError({ slow_query: { threshold_ms: 0 } })?.message).toBe(
      'slow_query.threshold_ms must be between 0 and 100000 (exclusive), got 0'
    );
    expect(configError({ slow_query: { threshold_ms: 100000 } })?.code).toBe('INVALID_THRESHOLD');
    expect(configError({ slow_query: { threshold_ms: 99999 } })).toBeNull();
  });

  it('rejects a non-boolean enabled flag', () => {
    const error = configError({ find_all: { enabled: 'yes' } });

    expect(error?.code).toBe('INVALID_CONFIG');
    expect(error?.message).toBe('find_all.enabled must be a boolean');
  });

  it('rejects analyzer settings that are not objects', () => {
    const error = configError({ slow_query: 5 });

    expect(error?.code).toBe('INVALID_CONFIG');
    expect(error?.message).toBe('slow_query must be a settings object');
  });

  it('ignores top-level keys of any shape that name no analyzer', () => {
    const config = resolveConfig({ version: 2, comment: 'team defaults', slow_query: { threshold_ms: 300 } });

    expect(config.size).toBe(23);
    expect(config.get('slow_query')?.thresholds).toEqual({ threshold_ms: 300 });
  });

  it('rejects a configuration that is not an object', () => {
    expect(configError([1, 2])?.code).toBe('INVALID_CONFIG');
  });
});

describe('parseTrace', () => {
  it('accepts a wrapped list of queries', () => {
    const result = parseTrace({ queries: [{ sql: 'SELECT 1', executionTimeMs: 2 }] });

    expect(result).toEqual({ success: true, data: [{ sql: 'SELECT 1', executionTimeMs: 2, params: [] }] });
  });

  it('clamps negative times and keeps named parameters', () => {
    const result = parseTrace([{ sql: 'SELECT * FROM t WHERE a = :a', executionTimeMs: -3, params: { a: 1 } }]);

    expect(result.success && result.data[0]).toEqual({
      sql: 'SELECT * FROM t WHERE a = :a',
      executionTimeMs: 0,
      params: { a: 1 },
    });
  });

  it('reports an invalid trace without throwing', () => {
    const result = parseTrace([{ sql: '' }]);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('INVALID_TRACE');
      expect(result.error.message).toMatch(/^Invalid query trace: /);
    }
  });
});

describe('parseMappings', () => {
  it('fills defaults and normalizes cascade and ON DELETE values', () => {
    const result = parseMappings([
      { entity: 'Order', field: 'items', associationType: 'OneToMany', cascade: ['PERSIST'], onDelete: 'set null' },
    ]);

    expect(result).toEqual({
      success: true,
      data: [
        {
          entity: 'Order',
          field: 'items',
          associationType: 'OneToMany',
          cascade: ['persist'],
          orphanRemoval: false,
          nullable: true,
          onDelete: 'SET NULL',
        },
      ],
    });
  });

  it('rejects an unknown ON DELETE action', () => {
    const result = parseMappings({ mappings: [{ entity: 'Order', field: 'items', onDelete: 'DROP' }] });

    expect(result.success).toBe(false);
  });
});

describe('file loading', () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'query-doctor-'));
    fs.writeFileSync(path.join(dir, 'config.json'), JSON.stringify({ slow_query: { threshold_ms: 50 } }));
    fs.writeFileSync(path.join(dir, 'broken.json'), '{ not json');
    fs.writeFileSync(path.join(dir, 'trace.json'), JSON.stringify([{ sql: 'SELECT 1' }]));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('loads a configuration file', () => {
    expect(loadConfig(path.join(dir, 'config.json')).get('slow_query')?.thresholds.threshold_ms).toBe(50);
  });

  it('raises a configuration error for invalid JSON', () => {
    expect(() => loadConfig(path.join(dir, 'broken.json'))).toThrow(ConfigurationError);
  });

  it('loads a trace file', () => {
    const result = loadTraceFile(path.join(dir, 'trace.json'));

    expect(result.success && result.data.map(record => record.sql)).toEqual(['SELECT 1']);
  });

  it('reports missing and malformed trace files', () => {
    const missing = loadTraceFile(path.join(dir, 'absent.json'));
    const broken = loadTraceFile(path.join(dir, 'broken.json'));

    expect(missing.success ? null : missing.error.code).toBe('FILE_NOT_FOUND');
    expect(broken.success ? null : broken.error.code).toBe('INVALID_JSON');
  });
});
