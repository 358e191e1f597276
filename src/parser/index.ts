/**
 * @module parser/index
 * @description SQL structure extraction and normalization exports
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies ./grammar.ts, ./structure-extractor.ts, ./query-normalizer.ts
 * @lastModified 2026-10-19
 *
 * Two read paths share this module:
 *
 * 1. Grammar path - node-sql-parser AST, read by ast-reader
 * 2. Fallback path - regex extraction for SQL the grammar rejects
 *
 * Both caches are bounded; see bounded-cache.
 */

export { SqlStructureExtractor, escapeRegExp, type StructureExtractorOptions } from './structure-extractor';
export { QueryNormalizer, normalizeWithLexer, normalizeWithRegex } from './query-normalizer';
export { SqlGrammar, type SqlGrammarOptions, type ParseOutcome } from './grammar';
export { BoundedCache, type BoundedCacheOptions, type CacheStats } from './bounded-cache';
export { tokenizeSql, isSignificant, type SqlToken, type SqlTokenKind } from './sql-lexer';
export { readStructureFallback, statementTypeOf, whereClauseOf } from './regex-extractor';
