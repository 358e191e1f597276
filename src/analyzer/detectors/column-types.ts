/**
 * @module analyzer/detectors/column-types
 * @description Column type checks on scalar fields: float money, decimal precision, scalar foreign keys
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/analyzer/data/money-fields.json, src/analyzer/data/foreign-key-fields.json
 * @lastModified 2026-10-19
 */

import type { Analyzer, AnalyzerContext, Issue, IssueType } from '../../types/issues';
import type { MappingRecord } from '../../types/mapping';
import { QueryTrace } from '../../collections/query-trace';
import { IssueCollection } from '../../collections/issue-collection';
import { createIssue } from '../issue-factory';
import { severityForPattern } from '../severity';
import { runPerRecord } from '../context';
import { identifierWords } from './helpers';
import { fieldLabel } from './cascade-configuration';
import moneyFields from '../data/money-fields.json';
import foreignKeyFields from '../data/foreign-key-fields.json';

// ============================================================================
// Constants
// ============================================================================

const MONEY_WORDS: ReadonlySet<string> = new Set(moneyFields.money);
const NON_MONEY_WORDS: ReadonlySet<string> = new Set(moneyFields.nonMoney);
const PERCENTAGE_WORDS: ReadonlySet<string> = new Set(moneyFields.percentage);
const REFERENCED_ENTITY_WORDS: ReadonlySet<string> = new Set(foreignKeyFields.entities);
const NON_FOREIGN_KEY_WORDS: ReadonlySet<string> = new Set(foreignKeyFields.nonForeignKey);

const FLOAT_TYPES = new Set(['float', 'double', 'real', 'double precision']);
const DECIMAL_TYPES = new Set(['decimal', 'numeric']);
const INTEGER_TYPES = new Set(['integer', 'int', 'bigint', 'smallint']);

const DECIMAL_RULES = {
  money: { minPrecision: 10, minScale: 2, usualScales: [2, 4] },
  percentage: { minPrecision: 5, minScale: 2 },
  maxPrecision: 30,
} as const;

// ============================================================================
// Field Classification
// ============================================================================

export type FieldKind = 'money' | 'percentage' | 'other';

/**
 * Percentage words win over money words: `discountRate` is a percentage
 */
export function classifyField(field: string): FieldKind {
  const words = identifierWords(field);
  if (words.some(word => PERCENTAGE_WORDS.has(word))) return 'percentage';
  if (words.some(word => NON_MONEY_WORDS.has(word))) return 'other';
  if (words.some(word => MONEY_WORDS.has(word))) return 'money';
  return 'other';
}

/**
 * Entity a scalar `*_id` / `*Id` field points at, or null
 *
 * @example
 * referencedEntityOf('customer_id'); // 'customer'
 * referencedEntityOf('externalId');  // null
 */
export function referencedEntityOf(field: string): string | null {
  const base = /^(.+?)(?:_id|Id|_ID)$/.exec(field)?.[1];
  if (!base) return null;
  const words = identifierWords(base);
  if (words.length === 0 || words.some(word => NON_FOREIGN_KEY_WORDS.has(word))) return null;
  const last = words[words.length - 1];
  return REFERENCED_ENTITY_WORDS.has(last) ? last : null;
}

function columnTypeOf(mapping: MappingRecord): string {
  return (mapping.columnType ?? '').toLowerCase();
}

function scalarFields(context: AnalyzerContext): MappingRecord[] {
  return context.mappings.filter(mapping => mapping.associationType === null);
}

function mappingIssue(
  mapping: MappingRecord,
  type: IssueType,
  title: string,
  description: string,
  suggestionContext: Record<string, unknown>
): Issue {
  const label = fieldLabel(mapping);
  return createIssue({
    type,
    title: `${title}: ${label}`,
    description,
    severity: severityForPattern(type),
    category: 'integrity',
    suggestion: { templateKey: type, context: { entity: mapping.entity, field: mapping.field, ...suggestionContext } },
    metrics: {},
    dedupKey: label,
  });
}

// ============================================================================
// Float For Money
// ============================================================================

export const floatForMoneyAnalyzer: Analyzer = {
  name: 'float_for_money',
  issueTypes: ['float_for_money'],
  category: 'integrity',

  analyze(_trace: QueryTrace, context: AnalyzerContext): IssueCollection {
    const fields = scalarFields(context);
    return IssueCollection.lazy(() =>
      runPerRecord('float_for_money', fields, context.logger, mapping => {
        if (!FLOAT_TYPES.has(columnTypeOf(mapping)) || classifyField(mapping.field) !== 'money') return [];
        return [
          mappingIssue(
            mapping,
            'float_for_money',
            'Float used for money',
            `${fieldLabel(mapping)} stores a monetary value as ${columnTypeOf(mapping)}, which cannot represent ` +
              'most decimal amounts exactly and accumulates rounding errors. Use decimal(10,2) or an integer amount of cents.',
            { columnType: columnTypeOf(mapping) }
          ),
        ];
      })
    );
  },
};

// ============================================================================
// Decimal Precision
// ============================================================================

export const decimalPrecisionAnalyzer: Analyzer = {
  name: 'decimal_precision',
  issueTypes: [
    'decimal_missing_precision',
    'decimal_insufficient_precision',
    'decimal_excessive_precision',
    'decimal_unusual_scale',
  ],
  category: 'integrity',

  analyze(_trace: QueryTrace, context: AnalyzerContext): IssueCollection {
    const decimals = scalarFields(context).filter(mapping => DECIMAL_TYPES.has(columnTypeOf(mapping)));
    return IssueCollection.lazy(() => runPerRecord('decimal_precision', decimals, context.logger, checkDecimal));
  },
};

function checkDecimal(mapping: MappingRecord): Issue[] {
  const label = fieldLabel(mapping);
  const { precision, scale } = mapping;

  if (precision === undefined) {
    return [
      mappingIssue(
        mapping,
        'decimal_missing_precision',
        'Missing decimal precision',
        `${label} is a decimal column without explicit precision and scale, so the database default applies.`,
        {}
      ),
    ];
  }

  const issues: Issue[] = [];
  const effectiveScale = scale ?? 0;
  const kind = classifyField(mapping.field);

  if (kind === 'money' || kind === 'percentage') {
    const rule = DECIMAL_RULES[kind];
    if (precision < rule.minPrecision || effectiveScale < rule.minScale) {
      issues.push(
        mappingIssue(
          mapping,
          'decimal_insufficient_precision',
          'Insufficient decimal precision',
          `${label} is decimal(${precision},${effectiveScale}); ${kind} values need at least ` +
            `decimal(${rule.minPrecision},${rule.minScale}).`,
          { precision, scale: effectiveScale, recommendedPrecision: rule.minPrecision, recommendedScale: rule.minScale }
        )
      );
    } else if (kind === 'money' && !DECIMAL_RULES.money.usualScales.some(usual => usual === effectiveScale)) {
      issues.push(
        mappingIssue(
          mapping,
          'decimal_unusual_scale',
          'Unusual decimal scale',
          `${label} has scale ${effectiveScale}; monetary values normally use 2 or 4 decimal places.`,
          { precision, scale: effectiveScale }
        )
      );
    }
  }

  if (precision > DECIMAL_RULES.maxPrecision) {
    issues.push(
      mappingIssue(
        mapping,
        'decimal_excessive_precision',
        'Excessive decimal precision',
        `${label} is decimal(${precision},${effectiveScale}); precision above ${DECIMAL_RULES.maxPrecision} ` +
          'costs storage and arithmetic speed without a realistic use.',
        { precision, scale: effectiveScale }
      )
    );
  }

  return issues;
}

// ============================================================================
// Foreign Key Mapping
// ============================================================================

export const foreignKeyMappingAnalyzer: Analyzer = {
  name: 'foreign_key_mapping',
  issueTypes: ['foreign_key_as_scalar'],
  category: 'integrity',

  analyze(_trace: QueryTrace, context: AnalyzerContext): IssueCollection {
    const fields = scalarFields(context).filter(mapping => {
      const type = columnTypeOf(mapping);
      return type === '' || INTEGER_TYPES.has(type) || type === 'guid' || type === 'uuid';
    });
    return IssueCollection.lazy(() =>
      runPerRecord('foreign_key_mapping', fields, context.logger, mapping => {
        const referenced = referencedEntityOf(mapping.field);
        if (referenced === null) return [];
        return [
          mappingIssue(
            mapping,
            'foreign_key_as_scalar',
            'Foreign key mapped as scalar',
            `${fieldLabel(mapping)} looks like a reference to ${referenced} but is mapped as a plain column. ` +
              'Map it as a ManyToOne association so the ORM keeps referential integrity.',
            { referencedEntity: referenced }
          ),
        ];
      })
    );
  },
};
