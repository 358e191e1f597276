/**
 * @module analyzer/detectors/on-delete-consistency
 * @description Detects ORM cascade settings that disagree with the database ON DELETE action
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/types/mapping.ts
 * @lastModified 2026-10-19
 */

import type { Analyzer, AnalyzerContext, Issue } from '../../types/issues';
import type { MappingRecord } from '../../types/mapping';
import { QueryTrace } from '../../collections/query-trace';
import { IssueCollection } from '../../collections/issue-collection';
import { createIssue } from '../issue-factory';
import { severityForPattern } from '../severity';
import { runPerRecord } from '../context';
import { fieldLabel, hasCascade } from './cascade-configuration';

export type OnDeleteMismatch =
  | 'orm_cascade_db_set_null'
  | 'orm_orphan_db_set_null'
  | 'db_cascade_no_orm'
  | 'orm_cascade_no_db';

const MISMATCH_DESCRIPTIONS: Readonly<Record<OnDeleteMismatch, string>> = {
  orm_cascade_db_set_null:
    'The ORM deletes children with the parent, but the database sets their foreign key to NULL. ' +
    'Deletes that bypass the ORM leave orphaned rows.',
  orm_orphan_db_set_null:
    'The ORM removes orphaned children, but the database sets their foreign key to NULL. ' +
    'Deletes that bypass the ORM leave orphaned rows.',
  db_cascade_no_orm:
    'The database deletes children with the parent, but the ORM does not know it. ' +
    'Entities already loaded in memory go stale after the delete.',
  orm_cascade_no_db:
    'The ORM cascades the delete, but the foreign key has no ON DELETE action. ' +
    'Deletes that bypass the ORM fail on the constraint.',
};

/**
 * Compares each one-to-many association with the ON DELETE action of the
 * owning side's foreign key (the `mappedBy` field on the target entity)
 */
export const onDeleteConsistencyAnalyzer: Analyzer = {
  name: 'on_delete_consistency',
  issueTypes: ['on_delete_cascade_mismatch'],
  category: 'integrity',

  analyze(_trace: QueryTrace, context: AnalyzerContext): IssueCollection {
    const mappings = context.mappings;
    const inverseSides = mappings.filter(
      mapping => mapping.associationType === 'OneToMany' && mapping.mappedBy !== undefined
    );
    return IssueCollection.lazy(() =>
      runPerRecord('on_delete_consistency', inverseSides, context.logger, mapping =>
        analyzeMapping(mapping, mappings)
      )
    );
  },
};

function analyzeMapping(mapping: MappingRecord, mappings: readonly MappingRecord[]): Issue[] {
  const owning = mappings.find(
    candidate => candidate.entity === mapping.targetEntity && candidate.field === mapping.mappedBy
  );
  if (!owning) return [];

  const onDelete = owning.onDelete ?? '';
  const mismatch = identifyMismatch(hasCascade(mapping, 'remove'), mapping.orphanRemoval, onDelete);
  if (mismatch === null) return [];

  const label = fieldLabel(mapping);
  return [
    createIssue({
      type: 'on_delete_cascade_mismatch',
      title: `ORM cascade / database ON DELETE mismatch on ${label}`,
      description: `${label}: ${MISMATCH_DESCRIPTIONS[mismatch]} (ORM cascade: ${mapping.cascade.join(', ') || 'none'}, ON DELETE: ${onDelete || 'NONE'}).`,
      severity: severityForPattern('on_delete_cascade_mismatch'),
      category: 'integrity',
      suggestion: {
        templateKey: 'on_delete_cascade_mismatch',
        context: { entity: mapping.entity, field: mapping.field, mismatch, onDelete: onDelete || 'NONE' },
      },
      metrics: {},
      dedupKey: label,
    }),
  ];
}

export function identifyMismatch(
  ormCascadesRemove: boolean,
  orphanRemoval: boolean,
  onDelete: string
): OnDeleteMismatch | null {
  if (ormCascadesRemove && onDelete === 'SET NULL') return 'orm_cascade_db_set_null';
  if (orphanRemoval && onDelete === 'SET NULL') return 'orm_orphan_db_set_null';
  if (onDelete === 'CASCADE' && !ormCascadesRemove) return 'db_cascade_no_orm';
  if (ormCascadesRemove && onDelete === '') return 'orm_cascade_no_db';
  return null;
}
