/**
 * @module patterns/index
 * @description Pattern detector exports
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies none
 * @lastModified 2026-10-19
 */

export {
  isSelectQuery,
  detectInsertQuery,
  detectUpdateQuery,
  detectDeleteQuery,
  detectNPlusOnePattern,
  detectNPlusOneFromJoin,
  detectLazyLoadingPattern,
  detectPartialCollectionLoad,
  type ForeignKeyLookup,
} from './sql-pattern-detector';

export {
  detectInjectionRisk,
  isSafeLiteral,
  INDICATORS,
  type InjectionRisk,
  type InjectionCheck,
} from './injection-pattern-detector';

export {
  QueryBuilderPatternDetector,
  type QueryBuilderPattern,
  type NullComparisonResult,
  type MissingParametersResult,
  type LiteralConditionResult,
} from './query-builder-pattern-detector';
