/**
 * @module collections/query-trace
 * @description Ordered, immutable collection of recorded queries for one analysis unit
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/types/query.ts, src/patterns/sql-pattern-detector.ts
 * @lastModified 2026-10-19
 */

import type { BacktraceFrame, QueryRecord, StatementType } from '../types/query';
import {
  isSelectQuery,
  detectInsertQuery,
  detectUpdateQuery,
  detectDeleteQuery,
} from '../patterns/sql-pattern-detector';

// ============================================================================
// Record Construction
// ============================================================================

export interface QueryRecordInput {
  sql: string;
  executionTimeMs?: number;
  params?: QueryRecord['params'];
  rowCount?: number;
  backtrace?: readonly BacktraceFrame[];
  explain?: QueryRecord['explain'];
}

/**
 * Build a frozen QueryRecord. Negative times clamp to 0.
 *
 * @example
 * const record = createQueryRecord({ sql: 'SELECT * FROM users WHERE id = ?', executionTimeMs: 0.27, params: [1] });
 */
export function createQueryRecord(input: QueryRecordInput): QueryRecord {
  const record: QueryRecord = {
    sql: input.sql,
    executionTimeMs: Math.max(0, input.executionTimeMs ?? 0),
    params: input.params ?? [],
    ...(input.rowCount !== undefined ? { rowCount: input.rowCount } : {}),
    ...(input.backtrace !== undefined ? { backtrace: Object.freeze([...input.backtrace]) } : {}),
    ...(input.explain !== undefined ? { explain: Object.freeze({ ...input.explain }) } : {}),
  };
  return Object.freeze(record);
}

/**
 * Statement kind of a recorded query, from its leading keyword
 */
export function statementTypeOfRecord(record: QueryRecord): StatementType {
  if (isSelectQuery(record.sql)) return 'SELECT';
  if (detectInsertQuery(record.sql)) return 'INSERT';
  if (detectUpdateQuery(record.sql)) return 'UPDATE';
  if (detectDeleteQuery(record.sql)) return 'DELETE';
  return 'OTHER';
}

// ============================================================================
// Query Trace
// ============================================================================

export type SortDirection = 'asc' | 'desc';

/**
 * Value-semantics collection: every transformation returns a new trace and
 * the original is never modified.
 *
 * @example
 * const trace = QueryTrace.from(records);
 * const slow = trace.onlySelects().filterSlow(50);
 */
export class QueryTrace implements Iterable<QueryRecord> {
  private readonly records: readonly QueryRecord[];

  constructor(records: Iterable<QueryRecord> = []) {
    this.records = Object.freeze([...records]);
  }

  static from(records: Iterable<QueryRecordInput | QueryRecord>): QueryTrace {
    return new QueryTrace(Array.from(records, createQueryRecord));
  }

  [Symbol.iterator](): Iterator<QueryRecord> {
    return this.records[Symbol.iterator]();
  }

  get size(): number {
    return this.records.length;
  }

  isEmpty(): boolean {
    return this.records.length === 0;
  }

  toArray(): QueryRecord[] {
    return [...this.records];
  }

  at(index: number): QueryRecord | undefined {
    return this.records[index];
  }

  // ==========================================================================
  // Filtering
  // ==========================================================================

  filter(predicate: (record: QueryRecord, index: number) => boolean): QueryTrace {
    return new QueryTrace(this.records.filter(predicate));
  }

  filterByType(type: StatementType): QueryTrace {
    return this.filter(record => statementTypeOfRecord(record) === type);
  }

  onlySelects(): QueryTrace {
    return this.filterByType('SELECT');
  }

  onlyInserts(): QueryTrace {
    return this.filterByType('INSERT');
  }

  onlyUpdates(): QueryTrace {
    return this.filterByType('UPDATE');
  }

  onlyDeletes(): QueryTrace {
    return this.filterByType('DELETE');
  }

  /** Queries strictly slower than the threshold */
  filterSlow(thresholdMs = 100): QueryTrace {
    return this.filter(record => record.executionTimeMs > thresholdMs);
  }

  /** Queries at or below the threshold */
  filterFast(thresholdMs = 100): QueryTrace {
    return this.filter(record => record.executionTimeMs <= thresholdMs);
  }

  withBacktrace(): QueryTrace {
    return this.filter(record => (record.backtrace?.length ?? 0) > 0);
  }

  withoutBacktrace(): QueryTrace {
    return this.filter(record => (record.backtrace?.length ?? 0) === 0);
  }

  /**
   * String patterns match case-insensitively as substrings
   */
  matchingSql(pattern: string | RegExp): QueryTrace {
    if (typeof pattern === 'string') {
      const needle = pattern.toLowerCase();
      return this.filter(record => record.sql.toLowerCase().includes(needle));
    }
    const regex = new RegExp(pattern.source, pattern.flags.replace('g', ''));
    return this.filter(record => regex.test(record.sql));
  }

  withRowCountAbove(threshold: number): QueryTrace {
    return this.filter(record => record.rowCount !== undefined && record.rowCount > threshold);
  }

  /**
   * Drop queries issued entirely from library code: a query is kept when it
   * has no backtrace or at least one frame outside every excluded path.
   * Separators are compared as forward slashes.
   *
   * @example
   * trace.excludePaths(['vendor/', 'var/cache/']);
   */
  excludePaths(excludedPaths: readonly string[]): QueryTrace {
    if (excludedPaths.length === 0) return this;
    const normalized = excludedPaths.map(toForwardSlashes);
    return this.filter(record => {
      const frames = record.backtrace ?? [];
      if (frames.length === 0) return true;
      return firstApplicationFrame(frames, normalized) !== null;
    });
  }

  // ==========================================================================
  // Grouping
  // ==========================================================================

  /**
   * Groups in order of first appearance
   */
  groupBy<K>(keyOf: (record: QueryRecord) => K): Map<K, QueryTrace> {
    const buckets = new Map<K, QueryRecord[]>();
    for (const record of this.records) {
      const key = keyOf(record);
      const bucket = buckets.get(key);
      if (bucket) {
        bucket.push(record);
      } else {
        buckets.set(key, [record]);
      }
    }
    const groups = new Map<K, QueryTrace>();
    for (const [key, bucket] of buckets) {
      groups.set(key, new QueryTrace(bucket));
    }
    return groups;
  }

  groupByType(): Map<StatementType, QueryTrace> {
    return this.groupBy(statementTypeOfRecord);
  }

  countByType(): Record<StatementType, number> {
    const counts: Record<StatementType, number> = { SELECT: 0, INSERT: 0, UPDATE: 0, DELETE: 0, OTHER: 0 };
    for (const record of this.records) {
      counts[statementTypeOfRecord(record)]++;
    }
    return counts;
  }

  // ==========================================================================
  // Ordering & Statistics
  // ==========================================================================

  /**
   * Stable sort by execution time; descending by default
   */
  sortByExecutionTime(direction: SortDirection = 'desc'): QueryTrace {
    const sign = direction === 'desc' ? -1 : 1;
    return new QueryTrace([...this.records].sort((a, b) => sign * (a.executionTimeMs - b.executionTimeMs)));
  }

  totalExecutionTime(): number {
    return this.records.reduce((sum, record) => sum + record.executionTimeMs, 0);
  }

  averageExecutionTime(): number {
    return this.records.length === 0 ? 0 : this.totalExecutionTime() / this.records.length;
  }

  /** First of the slowest on ties */
  slowest(): QueryRecord | null {
    let result: QueryRecord | null = null;
    for (const record of this.records) {
      if (result === null || record.executionTimeMs > result.executionTimeMs) result = record;
    }
    return result;
  }

  fastest(): QueryRecord | null {
    let result: QueryRecord | null = null;
    for (const record of this.records) {
      if (result === null || record.executionTimeMs < result.executionTimeMs) result = record;
    }
    return result;
  }

  sqlQueries(): string[] {
    return this.records.map(record => record.sql);
  }

  /** Distinct SQL strings in order of first appearance */
  distinctSql(): string[] {
    return [...new Set(this.sqlQueries())];
  }
}

// ============================================================================
// Backtrace Helpers
// ============================================================================

/**
 * First frame whose file lies outside every excluded path, or null
 */
export function firstApplicationFrame(
  frames: readonly BacktraceFrame[],
  excludedPaths: readonly string[]
): BacktraceFrame | null {
  for (const frame of frames) {
    if (frame.file === '') continue;
    const file = toForwardSlashes(frame.file);
    if (!excludedPaths.some(path => file.includes(toForwardSlashes(path)))) {
      return frame;
    }
  }
  return null;
}

function toForwardSlashes(path: string): string {
  return path.replace(/\\/g, '/');
}
