/**
 * @module index
 * @description Main package entry point
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies all modules
 * @lastModified 2026-10-19
 */

// Type exports
export * from './types';

// Parser exports
export { SqlStructureExtractor, QueryNormalizer, SqlGrammar, BoundedCache } from './parser';

// Pattern detector exports
export * from './patterns';

// Collection exports
export { QueryTrace, createQueryRecord, firstApplicationFrame } from './collections/query-trace';
export type { QueryRecordInput, SortDirection } from './collections/query-trace';
export { IssueCollection } from './collections/issue-collection';

// Analyzer exports
export {
  analyzeTrace,
  allAnalyzers,
  getAnalyzer,
  getAnalyzersForIssueType,
  deduplicate,
  createIssue,
  shouldSuppress,
} from './analyzer';
export type { AnalysisOptions, AnalysisResult, AnalysisMetadata } from './analyzer';

// Configuration exports
export {
  resolveConfig,
  loadConfig,
  defaultConfig,
  parseTrace,
  parseMappings,
  loadTraceFile,
  loadMappingFile,
  queryRecordSchema,
  mappingRecordSchema,
} from './config';
export type { AnalysisConfig } from './config';

// Output exports
export {
  serializeIssue,
  formatJSON,
  formatTextReport,
  formatSummaryText,
  buildOutputSummary,
  InMemoryTemplateRenderer,
} from './output';
export type { SuggestionRenderer, SerializedIssue } from './output';

// Logging exports
export { createConsoleLogger, silentLogger, type Logger, type LogLevel } from './logging/logger';
