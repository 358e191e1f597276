/**
 * @module analyzer/detectors/cascade-configuration
 * @description Detects risky ORM cascade settings on entity associations
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/types/mapping.ts, src/analyzer/data/independent-entities.json
 * @lastModified 2026-10-19
 */

import type { Analyzer, AnalyzerContext, Issue } from '../../types/issues';
import type { MappingRecord } from '../../types/mapping';
import { QueryTrace } from '../../collections/query-trace';
import { IssueCollection } from '../../collections/issue-collection';
import { createIssue } from '../issue-factory';
import { severityForCascadeAll, severityForPattern } from '../severity';
import { runPerRecord } from '../context';
import { shortEntityName } from './helpers';
import independentEntityList from '../data/independent-entities.json';

const INDEPENDENT_ENTITIES: ReadonlySet<string> = new Set(independentEntityList.map(name => name.toLowerCase()));

// ============================================================================
// Mapping Helpers
// ============================================================================

export function hasCascade(mapping: MappingRecord, operation: string): boolean {
  return mapping.cascade.some(entry => {
    const value = entry.toLowerCase();
    return value === operation || value === 'all';
  });
}

/**
 * Entities with a life of their own, never owned by the referring side
 */
export function isIndependentEntity(entity: string | undefined): boolean {
  return entity !== undefined && INDEPENDENT_ENTITIES.has(shortEntityName(entity).toLowerCase());
}

export function isManyToSide(mapping: MappingRecord): boolean {
  return mapping.associationType === 'ManyToOne' || mapping.associationType === 'ManyToMany';
}

export function fieldLabel(mapping: MappingRecord): string {
  return `${shortEntityName(mapping.entity)}.${mapping.field}`;
}

// ============================================================================
// Analyzer
// ============================================================================

export const cascadeConfigurationAnalyzer: Analyzer = {
  name: 'cascade_configuration',
  issueTypes: ['cascade_all', 'cascade_remove_on_independent_entity', 'orphan_removal_without_cascade_remove'],
  category: 'integrity',

  analyze(_trace: QueryTrace, context: AnalyzerContext): IssueCollection {
    const associations = context.mappings.filter(mapping => mapping.associationType !== null);
    return IssueCollection.lazy(() =>
      runPerRecord('cascade_configuration', associations, context.logger, analyzeMapping)
    );
  },
};

function analyzeMapping(mapping: MappingRecord): Issue[] {
  const issues: Issue[] = [];
  const label = fieldLabel(mapping);
  const target = mapping.targetEntity ?? 'unknown';
  const independent = isIndependentEntity(mapping.targetEntity);
  const cascadesAll = mapping.cascade.some(entry => entry.toLowerCase() === 'all');

  if (cascadesAll) {
    issues.push(
      createIssue({
        type: 'cascade_all',
        title: `cascade "all" on ${label}`,
        description:
          `${label} (${mapping.associationType} to ${target}) cascades every operation, including remove. ` +
          'List only the operations the association needs, usually persist.',
        severity: severityForCascadeAll(isManyToSide(mapping), independent),
        category: 'integrity',
        suggestion: { templateKey: 'cascade_all', context: { entity: mapping.entity, field: mapping.field, target } },
        metrics: {},
        dedupKey: label,
      })
    );
  } else if (hasCascade(mapping, 'remove') && isManyToSide(mapping) && independent) {
    issues.push(
      createIssue({
        type: 'cascade_remove_on_independent_entity',
        title: `cascade "remove" to independent entity on ${label}`,
        description:
          `Deleting a ${shortEntityName(mapping.entity)} deletes the ${target} it refers to, ` +
          `although other rows may still reference that ${target}.`,
        severity: severityForPattern('cascade_remove_on_independent_entity'),
        category: 'integrity',
        suggestion: {
          templateKey: 'cascade_remove_on_independent_entity',
          context: { entity: mapping.entity, field: mapping.field, target },
        },
        metrics: {},
        dedupKey: label,
      })
    );
  }

  if (mapping.orphanRemoval && !hasCascade(mapping, 'remove')) {
    issues.push(
      createIssue({
        type: 'orphan_removal_without_cascade_remove',
        title: `orphanRemoval without cascade "remove" on ${label}`,
        description:
          `${label} removes orphaned ${target} rows, but deleting the parent does not cascade the remove. ` +
          'Children are deleted when detached yet left behind when the parent goes; add cascade "remove".',
        severity: severityForPattern('orphan_removal_without_cascade_remove'),
        category: 'integrity',
        suggestion: {
          templateKey: 'orphan_removal_without_cascade_remove',
          context: { entity: mapping.entity, field: mapping.field, target },
        },
        metrics: {},
        dedupKey: label,
      })
    );
  }

  return issues;
}
