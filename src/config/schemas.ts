/**
 * @module config/schemas
 * @description Zod schemas for trace files, mapping files and configuration entries
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies zod
 * @lastModified 2026-10-19
 */

import { z } from 'zod';

// ============================================================================
// Query Trace
// ============================================================================

export const backtraceFrameSchema = z.object({
  file: z.string(),
  line: z.number().int().nonnegative(),
  function: z.string().optional(),
  class: z.string().optional(),
});

export const explainMetricsSchema = z.object({
  rowsExamined: z.number().nonnegative(),
  accessType: z.string().optional(),
  key: z.string().nullable().optional(),
});

export const queryRecordSchema = z.object({
  sql: z.string().min(1, 'sql must not be empty'),
  executionTimeMs: z.number().finite().optional(),
  params: z.union([z.array(z.unknown()), z.record(z.unknown())]).optional(),
  rowCount: z.number().int().nonnegative().optional(),
  backtrace: z.array(backtraceFrameSchema).optional(),
  explain: explainMetricsSchema.optional(),
});

/**
 * A trace file is either a bare array of records or `{ "queries": [...] }`
 */
export const traceFileSchema = z.union([
  z.array(queryRecordSchema),
  z.object({ queries: z.array(queryRecordSchema) }).transform(file => file.queries),
]);

// ============================================================================
// Entity Mappings
// ============================================================================

const onDeleteSchema = z
  .string()
  .transform(value => value.trim().toUpperCase())
  .pipe(z.enum(['CASCADE', 'SET NULL', 'RESTRICT', 'NO ACTION']));

export const mappingRecordSchema = z.object({
  entity: z.string().min(1),
  field: z.string().min(1),
  associationType: z.enum(['OneToOne', 'ManyToOne', 'OneToMany', 'ManyToMany']).nullable().default(null),
  targetEntity: z.string().optional(),
  mappedBy: z.string().optional(),
  cascade: z
    .array(z.string())
    .default([])
    .transform(operations => operations.map(operation => operation.toLowerCase())),
  orphanRemoval: z.boolean().default(false),
  nullable: z.boolean().default(true),
  columnType: z.string().optional(),
  precision: z.number().int().nonnegative().optional(),
  scale: z.number().int().nonnegative().optional(),
  onDelete: onDeleteSchema.optional(),
});

export const mappingFileSchema = z.union([
  z.array(mappingRecordSchema),
  z.object({ mappings: z.array(mappingRecordSchema) }).transform(file => file.mappings),
]);

// ============================================================================
// Configuration
// ============================================================================

/**
 * Top level of a configuration file. Only entries named after a known
 * analyzer are read, so other keys may hold values of any shape.
 */
export const rawConfigSchema = z.record(z.string(), z.unknown());

/**
 * Settings of one analyzer, checked key by key against the known settings
 */
export const analyzerEntrySchema = z.record(z.string(), z.unknown(), {
  invalid_type_error: 'must be a settings object',
});

export const enabledSchema = z.boolean({ invalid_type_error: 'enabled must be a boolean' });

export const thresholdSchema = z
  .number({ invalid_type_error: 'must be a number' })
  .finite('must be finite')
  .nonnegative('must not be negative');

// ============================================================================
// Helpers
// ============================================================================

/**
 * First validation problem as `path: message`
 */
export function describeZodError(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'invalid value';
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}
