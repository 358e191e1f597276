/**
 * @module types/index
 * @description Central export for all type definitions
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies none
 * @lastModified 2026-10-19
 */

// Common types
export type {
  Result,
  AppError,
  InputError,
  InputErrorCode,
  ConfigErrorCode,
  Milliseconds,
} from './common';

export { ok, err, toError, QueryDoctorError, ConfigurationError } from './common';

// Query types
export type {
  BacktraceFrame,
  ExplainMetrics,
  QueryParams,
  QueryRecord,
  StatementType,
  JoinType,
  TableReference,
  JoinInfo,
  LiteralValue,
  WhereCondition,
  ExtractionSource,
  StructuralQuery,
  AggregationFunction,
  NormalizedSignature,
} from './query';

// Mapping types
export type { AssociationType, OnDeleteAction, MappingRecord } from './mapping';

// Issue types
export type {
  IssueCategory,
  IssueType,
  IssueSeverity,
  SuggestionRef,
  IssueMetrics,
  Issue,
  AnalyzerSettings,
  AnalyzerContext,
  Analyzer,
} from './issues';

export { SEVERITY_RANK, SEVERITY_ORDER } from './issues';
