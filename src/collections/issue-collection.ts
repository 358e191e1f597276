/**
 * @module collections/issue-collection
 * @description Ordered issue container with filtering, grouping, sorting and statistics
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/types/issues.ts
 * @lastModified 2026-10-19
 *
 * A collection may be backed by a generator factory so analyzers can yield
 * issues without materializing them. The sequence is read once, on first
 * access, and cached; every derived collection is eager.
 */

import type { Issue, IssueCategory, IssueSeverity, IssueType } from '../types/issues';
import { SEVERITY_ORDER, SEVERITY_RANK } from '../types/issues';

// ============================================================================
// Issue Collection
// ============================================================================

export class IssueCollection implements Iterable<Issue> {
  private source: (() => Iterable<Issue>) | null;
  private materialized: readonly Issue[] | null = null;

  constructor(issues: Iterable<Issue> = []) {
    this.source = null;
    this.materialized = Object.freeze([...issues]);
  }

  /**
   * Collection whose contents are produced on first read
   *
   * @example
   * const issues = IssueCollection.lazy(function* () {
   *   for (const record of trace) yield createIssue({ ... });
   * });
   */
  static lazy(factory: () => Iterable<Issue>): IssueCollection {
    const collection = new IssueCollection();
    collection.materialized = null;
    collection.source = factory;
    return collection;
  }

  static empty(): IssueCollection {
    return new IssueCollection();
  }

  private items(): readonly Issue[] {
    if (this.materialized === null) {
      const factory = this.source;
      this.source = null;
      this.materialized = Object.freeze(factory ? [...factory()] : []);
    }
    return this.materialized;
  }

  [Symbol.iterator](): Iterator<Issue> {
    return this.items()[Symbol.iterator]();
  }

  get size(): number {
    return this.items().length;
  }

  /** Whether the backing sequence has been read */
  get isMaterialized(): boolean {
    return this.materialized !== null;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  toArray(): Issue[] {
    return [...this.items()];
  }

  merge(other: Iterable<Issue>): IssueCollection {
    return new IssueCollection([...this.items(), ...other]);
  }

  // ==========================================================================
  // Filtering
  // ==========================================================================

  filter(predicate: (issue: Issue) => boolean): IssueCollection {
    return new IssueCollection(this.items().filter(predicate));
  }

  filterBySeverity(severity: IssueSeverity): IssueCollection {
    return this.filter(issue => issue.severity === severity);
  }

  /** Issues at least as severe as `severity` */
  atLeast(severity: IssueSeverity): IssueCollection {
    return this.filter(issue => SEVERITY_RANK[issue.severity] <= SEVERITY_RANK[severity]);
  }

  onlyCritical(): IssueCollection {
    return this.filterBySeverity('critical');
  }

  onlyWarnings(): IssueCollection {
    return this.filterBySeverity('warning');
  }

  onlyInfo(): IssueCollection {
    return this.filterBySeverity('info');
  }

  filterByType(type: IssueType): IssueCollection {
    return this.filter(issue => issue.type === type);
  }

  filterByCategory(category: IssueCategory): IssueCollection {
    return this.filter(issue => issue.category === category);
  }

  withSuggestions(): IssueCollection {
    return this.filter(issue => issue.suggestion !== undefined);
  }

  withoutSuggestions(): IssueCollection {
    return this.filter(issue => issue.suggestion === undefined);
  }

  withBacktrace(): IssueCollection {
    return this.filter(issue => issue.backtrace !== null && issue.backtrace.length > 0);
  }

  // ==========================================================================
  // Grouping & Counting
  // ==========================================================================

  /**
   * Every severity is present, critical first, even when empty
   */
  groupBySeverity(): Map<IssueSeverity, IssueCollection> {
    const groups = new Map<IssueSeverity, IssueCollection>();
    for (const severity of SEVERITY_ORDER) {
      groups.set(severity, this.filterBySeverity(severity));
    }
    return groups;
  }

  /** Types in order of first appearance */
  groupByType(): Map<IssueType, IssueCollection> {
    const buckets = new Map<IssueType, Issue[]>();
    for (const issue of this.items()) {
      const bucket = buckets.get(issue.type);
      if (bucket) {
        bucket.push(issue);
      } else {
        buckets.set(issue.type, [issue]);
      }
    }
    const groups = new Map<IssueType, IssueCollection>();
    for (const [type, bucket] of buckets) {
      groups.set(type, new IssueCollection(bucket));
    }
    return groups;
  }

  countBySeverity(): Record<IssueSeverity, number> {
    const counts: Record<IssueSeverity, number> = { critical: 0, warning: 0, info: 0 };
    for (const issue of this.items()) {
      counts[issue.severity]++;
    }
    return counts;
  }

  countByType(): Partial<Record<IssueType, number>> {
    const counts: Partial<Record<IssueType, number>> = {};
    for (const issue of this.items()) {
      counts[issue.type] = (counts[issue.type] ?? 0) + 1;
    }
    return counts;
  }

  uniqueTypes(): IssueType[] {
    return [...new Set(this.items().map(issue => issue.type))];
  }

  // ==========================================================================
  // Ordering
  // ==========================================================================

  /**
   * Stable: issues of equal severity keep their relative order
   */
  sortBySeverity(): IssueCollection {
    return new IssueCollection(
      [...this.items()].sort((a, b) => SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity])
    );
  }

  /** First issue of the highest severity present */
  mostSevere(): Issue | null {
    let result: Issue | null = null;
    for (const issue of this.items()) {
      if (result === null || SEVERITY_RANK[issue.severity] < SEVERITY_RANK[result.severity]) {
        result = issue;
      }
    }
    return result;
  }

  hasCritical(): boolean {
    return this.items().some(issue => issue.severity === 'critical');
  }

  hasWarnings(): boolean {
    return this.items().some(issue => issue.severity === 'warning');
  }
}

/**
 * Locale-independent string comparison
 */
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
