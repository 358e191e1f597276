/**
 * @module analyzer/index
 * @description Issue detection and analysis orchestrator
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/analyzer/detectors, src/analyzer/deduplicator.ts, src/config
 * @lastModified 2026-10-19
 */

import type { Analyzer, IssueCategory, IssueSeverity } from '../types/issues';
import type { QueryRecord } from '../types/query';
import type { MappingRecord } from '../types/mapping';
import type { Logger } from '../logging/logger';
import { silentLogger } from '../logging/logger';
import { QueryTrace } from '../collections/query-trace';
import { IssueCollection } from '../collections/issue-collection';
import { SqlStructureExtractor } from '../parser/structure-extractor';
import { QueryNormalizer } from '../parser/query-normalizer';
import { SqlGrammar } from '../parser/grammar';
import { BoundedCache } from '../parser/bounded-cache';
import { defaultConfig, type AnalysisConfig } from '../config';
import { ANALYZER_DEFAULTS } from '../constants';
import { allAnalyzers } from './detectors';
import { createAnalyzerContext, type SharedServices } from './context';
import { deduplicate } from './deduplicator';
import { toError } from '../types/common';

// ============================================================================
// Main Analysis Function
// ============================================================================

/**
 * Analyze a query trace (and optional mapping metadata) for issues
 *
 * This is the main entry point for issue detection. It:
 * 1. Runs every selected analyzer over the immutable trace
 * 2. Deduplicates and orders what they report
 * 3. Applies the category and severity filters
 *
 * An analyzer that throws contributes nothing and is listed in
 * `metadata.failedAnalyzers`; the others still run.
 *
 * @example
 * const result = analyzeTrace(records, { mappings });
 * console.log(`Found ${result.issues.size} issues`);
 */
export function analyzeTrace(
  records: Iterable<QueryRecord> | QueryTrace,
  options: AnalysisOptions = {}
): AnalysisResult {
  const startTime = performance.now();
  const logger = options.logger ?? silentLogger;
  const config = options.config ?? defaultConfig();

  let trace = records instanceof QueryTrace ? records : new QueryTrace(records);
  if (options.excludePaths && options.excludePaths.length > 0) {
    trace = trace.excludePaths(options.excludePaths);
  }

  const services = createSharedServices(options.mappings ?? [], logger);
  const analyzersToRun = selectAnalyzers(config, options);

  const collected: IssueCollection[] = [];
  const failedAnalyzers: string[] = [];

  for (const analyzer of analyzersToRun) {
    try {
      const settings = config.get(analyzer.name) ?? { enabled: true, thresholds: {} };
      const issues = analyzer.analyze(trace, createAnalyzerContext(analyzer.name, settings, services));
      // Reading the size drains a lazy collection, so per-analyzer failures surface here
      logger.debug(`Analyzer ${analyzer.name} reported ${issues.size} issue(s)`);
      collected.push(issues);
    } catch (error) {
      // Log error but continue with other analyzers
      logger.warn(`Analyzer ${analyzer.name} failed:`, toError(error).message);
      failedAnalyzers.push(analyzer.name);
    }
  }

  const rawCount = collected.reduce((sum, issues) => sum + issues.size, 0);
  let issues = deduplicate(
    collected.flatMap(collection => collection.toArray()),
    services.normalizer
  );

  if (options.categories && options.categories.length > 0) {
    const categories = new Set(options.categories);
    issues = issues.filter(issue => categories.has(issue.category));
  }
  if (options.minSeverity) {
    issues = issues.atLeast(options.minSeverity);
  }

  const metadata: AnalysisMetadata = {
    queryCount: trace.size,
    mappingCount: services.mappings.length,
    analyzersRun: analyzersToRun.map(a => a.name),
    failedAnalyzers,
    rawIssueCount: rawCount,
    analysisTimeMs: performance.now() - startTime,
  };

  return { issues, metadata };
}

/**
 * Extractor and normalizer shared by every analyzer of one pass, each with
 * its own bounded cache
 */
export function createSharedServices(mappings: readonly MappingRecord[], logger: Logger): SharedServices {
  const grammar = new SqlGrammar({ logger });
  return {
    extractor: new SqlStructureExtractor({ grammar, cache: new BoundedCache(), logger }),
    normalizer: new QueryNormalizer(grammar, new BoundedCache()),
    mappings,
    logger,
  };
}

// ============================================================================
// Analyzer Selection
// ============================================================================

/**
 * Select which analyzers to run based on configuration and options
 */
function selectAnalyzers(config: AnalysisConfig, options: AnalysisOptions): Analyzer[] {
  let analyzers = allAnalyzers.filter(a => config.get(a.name)?.enabled ?? true);

  // Filter by enabled analyzers
  const enabled = options.enabledAnalyzers;
  if (enabled && enabled.length > 0) {
    analyzers = analyzers.filter(a => enabled.includes(a.name));
  }

  // Filter by disabled analyzers
  const disabled = options.disabledAnalyzers;
  if (disabled && disabled.length > 0) {
    analyzers = analyzers.filter(a => !disabled.includes(a.name));
  }

  return analyzers;
}

/**
 * Names accepted by `enabledAnalyzers` / `disabledAnalyzers`
 */
export function analyzerNames(): string[] {
  return Object.keys(ANALYZER_DEFAULTS);
}

// ============================================================================
// Types
// ============================================================================

/**
 * Analysis options
 */
export interface AnalysisOptions {
  /** Resolved configuration; defaults apply when omitted */
  config?: AnalysisConfig;
  /** Entity mapping metadata for the integrity analyzers */
  mappings?: readonly MappingRecord[];
  /** Only run these analyzers (by name) */
  enabledAnalyzers?: string[];
  /** Skip these analyzers (by name) */
  disabledAnalyzers?: string[];
  /** Only report issues of these categories */
  categories?: IssueCategory[];
  /** Minimum severity to report */
  minSeverity?: IssueSeverity;
  /** Drop queries issued only from these source paths (vendor code, tests) */
  excludePaths?: string[];
  /** Diagnostic sink; silent when omitted */
  logger?: Logger;
}

/**
 * Analysis metadata
 */
export interface AnalysisMetadata {
  /** Number of queries analyzed, after path exclusion */
  queryCount: number;
  mappingCount: number;
  /** Names of analyzers that ran */
  analyzersRun: string[];
  /** Analyzers that threw and contributed no issues */
  failedAnalyzers: string[];
  /** Issues reported before deduplication and filtering */
  rawIssueCount: number;
  /** Time taken for analysis in ms */
  analysisTimeMs: number;
}

/**
 * Complete analysis result
 */
export interface AnalysisResult {
  /** Deduplicated issues, most severe first */
  issues: IssueCollection;
  metadata: AnalysisMetadata;
}

// ============================================================================
// Re-exports
// ============================================================================

export * from './detectors';
export { deduplicate, REPETITION_FAMILY } from './deduplicator';
export * from './severity';
export { createIssue, withChanges, issueId, formatMs, type IssueInput } from './issue-factory';
export { createAnalyzerContext, runPerRecord, type SharedServices } from './context';
