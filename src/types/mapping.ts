/**
 * @module types/mapping
 * @description Entity mapping metadata consumed by the integrity analyzers
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies none
 * @lastModified 2026-10-19
 */

export type AssociationType = 'OneToOne' | 'ManyToOne' | 'OneToMany' | 'ManyToMany';

/**
 * Database-level ON DELETE action of a foreign key
 */
export type OnDeleteAction = 'CASCADE' | 'SET NULL' | 'RESTRICT' | 'NO ACTION';

/**
 * One mapped field of an entity, supplied by the host's metadata provider.
 * `associationType` is null for scalar (column) fields.
 *
 * @example
 * const mapping: MappingRecord = {
 *   entity: 'Order',
 *   field: 'customer',
 *   associationType: 'ManyToOne',
 *   targetEntity: 'Customer',
 *   cascade: ['persist'],
 *   orphanRemoval: false,
 *   nullable: false,
 * };
 */
export interface MappingRecord {
  readonly entity: string;
  readonly field: string;
  readonly associationType: AssociationType | null;
  readonly targetEntity?: string;
  readonly mappedBy?: string;
  /** Lowercase ORM cascade operations: persist, remove, merge, detach, refresh, all */
  readonly cascade: readonly string[];
  readonly orphanRemoval: boolean;
  readonly nullable: boolean;
  /** Column type for scalar fields (decimal, float, integer, string, ...) */
  readonly columnType?: string;
  readonly precision?: number;
  readonly scale?: number;
  readonly onDelete?: OnDeleteAction;
}
