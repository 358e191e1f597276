/**
 * @module analyzer/detectors/helpers
 * @description Grouping and naming helpers shared by the query analyzers
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/collections/query-trace.ts
 * @lastModified 2026-10-19
 */

import type { AnalyzerContext } from '../../types/issues';
import type { BacktraceFrame, NormalizedSignature, QueryRecord } from '../../types/query';
import { QueryTrace } from '../../collections/query-trace';

// ============================================================================
// Types
// ============================================================================

export interface SignatureGroup {
  signature: NormalizedSignature;
  records: QueryTrace;
  /** Positions of the records in the analyzed trace */
  indices: number[];
}

// ============================================================================
// Grouping
// ============================================================================

/**
 * Group records by normalized signature, in order of first appearance.
 * A record whose SQL cannot be normalized is skipped.
 */
export function groupBySignature(trace: QueryTrace, context: AnalyzerContext): SignatureGroup[] {
  const groups = new Map<NormalizedSignature, { records: QueryRecord[]; indices: number[] }>();
  let index = 0;
  for (const record of trace) {
    const position = index++;
    let signature: NormalizedSignature;
    try {
      signature = context.normalizer.normalize(record.sql);
    } catch (error) {
      context.logger.debug('Could not normalize query, skipping it:', error);
      continue;
    }
    const group = groups.get(signature);
    if (group) {
      group.records.push(record);
      group.indices.push(position);
    } else {
      groups.set(signature, { records: [record], indices: [position] });
    }
  }

  return Array.from(groups, ([signature, group]) => ({
    signature,
    records: new QueryTrace(group.records),
    indices: group.indices,
  }));
}

/**
 * Distinct SQL strings of the trace, each with the records that share it
 */
export function groupBySql(trace: QueryTrace): Array<[string, QueryTrace]> {
  return Array.from(trace.groupBy(record => record.sql));
}

// ============================================================================
// Record Helpers
// ============================================================================

/**
 * Backtrace of the first record that has one
 */
export function firstBacktrace(records: Iterable<QueryRecord>): readonly BacktraceFrame[] | null {
  for (const record of records) {
    if (record.backtrace && record.backtrace.length > 0) return record.backtrace;
  }
  return null;
}

/**
 * `user_profiles` → `UserProfiles`, dropping tbl_/tb_ prefixes
 */
export function tableToEntityName(table: string): string {
  return table
    .replace(/^(?:tbl_|tb_)/i, '')
    .split('_')
    .filter(part => part !== '')
    .map(part => part.charAt(0).toUpperCase() + part.slice(1))
    .join('');
}

/**
 * Relation name from the first `getXxx` frame of a backtrace
 */
export function relationFromBacktrace(backtrace: readonly BacktraceFrame[] | null): string | null {
  for (const frame of backtrace ?? []) {
    const match = frame.function ? /^get([A-Z]\w*)/.exec(frame.function) : null;
    if (match) return match[1].charAt(0).toLowerCase() + match[1].slice(1);
  }
  return null;
}

/**
 * String values among bound parameters, positional or named
 */
export function stringParams(record: QueryRecord): string[] {
  const values: readonly unknown[] = Array.isArray(record.params) ? record.params : Object.values(record.params);
  return values.filter((value): value is string => typeof value === 'string');
}

/**
 * Short name of a possibly namespaced entity class
 */
export function shortEntityName(name: string): string {
  const parts = name.split(/[\\./]/);
  return parts[parts.length - 1] ?? name;
}

/**
 * Lowercase words of an identifier: `totalPrice` and `total_price` → ['total', 'price']
 */
export function identifierWords(identifier: string): string[] {
  return identifier
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter(word => word !== '');
}
