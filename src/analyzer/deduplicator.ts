/**
 * @module analyzer/deduplicator
 * @description Merges issues reported more than once into a single, canonically ordered collection
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/parser/query-normalizer.ts, src/collections/issue-collection.ts
 * @lastModified 2026-10-19
 *
 * The result depends only on the set of input issues, never on their order:
 * winners are chosen over whole groups by a total order and the output is
 * sorted by severity, type and key.
 */

import type { Issue, IssueType } from '../types/issues';
import { SEVERITY_RANK } from '../types/issues';
import { IssueCollection, compareText } from '../collections/issue-collection';
import { QueryNormalizer } from '../parser/query-normalizer';
import { withChanges } from './issue-factory';

// ============================================================================
// Constants
// ============================================================================

/**
 * Issue types that describe the same repeated query; when several share a
 * signature only the first listed survives
 */
export const REPETITION_FAMILY: readonly IssueType[] = ['n_plus_one', 'lazy_loading', 'frequent_query'];

// ============================================================================
// Deduplication
// ============================================================================

interface Keyed {
  issue: Issue;
  key: string;
}

/**
 * Collapse duplicate issues.
 *
 * Two issues are duplicates when they share a type and identity: the
 * dedupKey when set, otherwise the normalized signature of the smallest
 * origin query, otherwise the title.
 *
 * @example
 * const merged = deduplicate(issues);
 * merged.size; // <= issues.length
 */
export function deduplicate(
  issues: Iterable<Issue>,
  normalizer: QueryNormalizer = new QueryNormalizer()
): IssueCollection {
  const signatureOf = signatureFunction(normalizer);

  const groups = new Map<string, Keyed[]>();
  for (const issue of issues) {
    const key = identityKey(issue, signatureOf);
    const groupKey = `${issue.type}\u0000${key}`;
    const group = groups.get(groupKey);
    if (group) {
      group.push({ issue, key });
    } else {
      groups.set(groupKey, [{ issue, key }]);
    }
  }

  const merged: Keyed[] = [];
  for (const group of groups.values()) {
    merged.push({ issue: mergeGroup(group.map(entry => entry.issue)), key: group[0].key });
  }

  return new IssueCollection(collapseRepetitionFamily(merged, signatureOf).sort(canonicalOrder).map(entry => entry.issue));
}

function identityKey(issue: Issue, signatureOf: (sql: string) => string): string {
  if (issue.dedupKey !== undefined) return issue.dedupKey;
  const smallest = smallestQuery(issue);
  return smallest === null ? issue.title : signatureOf(smallest);
}

function smallestQuery(issue: Issue): string | null {
  if (issue.originQueries.length === 0) return null;
  return [...issue.originQueries].sort(compareText)[0];
}

function signatureFunction(normalizer: QueryNormalizer): (sql: string) => string {
  return sql => {
    try {
      return normalizer.normalize(sql);
    } catch {
      return sql;
    }
  };
}

// ============================================================================
// Merging
// ============================================================================

/**
 * Highest severity wins. Among equally severe issues the one with more
 * origin queries wins and carries the sorted union of all their queries;
 * remaining ties go to the smaller title, description, metrics, queries,
 * backtrace and suggestion, in that order.
 */
function mergeGroup(group: readonly Issue[]): Issue {
  if (group.length === 1) return group[0];

  const ranked = [...group].sort(precedence);
  const winner = ranked[0];
  const peers = ranked.filter(issue => issue.severity === winner.severity);
  if (peers.length === 1) return winner;

  const union = [...new Set(peers.flatMap(issue => issue.originQueries))].sort(compareText);
  return withChanges(winner, { originQueries: union });
}

function precedence(a: Issue, b: Issue): number {
  return (
    SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity] ||
    b.originQueries.length - a.originQueries.length ||
    compareText(a.title, b.title) ||
    compareText(a.description, b.description) ||
    compareText(JSON.stringify(a.metrics), JSON.stringify(b.metrics)) ||
    compareText(JSON.stringify(a.originQueries), JSON.stringify(b.originQueries)) ||
    compareText(JSON.stringify(a.backtrace), JSON.stringify(b.backtrace)) ||
    compareText(JSON.stringify(a.suggestion ?? null), JSON.stringify(b.suggestion ?? null))
  );
}

/**
 * Keep one member of the repetition family per signature
 */
function collapseRepetitionFamily(entries: Keyed[], signatureOf: (sql: string) => string): Keyed[] {
  const bestBySignature = new Map<string, Keyed>();
  const rest: Keyed[] = [];

  for (const entry of entries) {
    const priority = REPETITION_FAMILY.indexOf(entry.issue.type);
    const smallest = smallestQuery(entry.issue);
    if (priority === -1 || smallest === null) {
      rest.push(entry);
      continue;
    }
    const signature = signatureOf(smallest);
    const current = bestBySignature.get(signature);
    if (!current || familyPrecedence(entry, current) < 0) {
      bestBySignature.set(signature, entry);
    }
  }

  return [...rest, ...bestBySignature.values()];
}

function familyPrecedence(a: Keyed, b: Keyed): number {
  return (
    REPETITION_FAMILY.indexOf(a.issue.type) - REPETITION_FAMILY.indexOf(b.issue.type) ||
    compareText(a.key, b.key) ||
    precedence(a.issue, b.issue)
  );
}

function canonicalOrder(a: Keyed, b: Keyed): number {
  return (
    SEVERITY_RANK[a.issue.severity] - SEVERITY_RANK[b.issue.severity] ||
    compareText(a.issue.type, b.issue.type) ||
    compareText(a.key, b.key) ||
    compareText(a.issue.id, b.issue.id)
  );
}
