/**
 * @module analyzer/context
 * @description Builds analyzer contexts and isolates per-record failures
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/types/issues.ts, src/types/common.ts
 * @lastModified 2026-10-19
 */

import type { AnalyzerContext, AnalyzerSettings, Issue } from '../types/issues';
import type { MappingRecord } from '../types/mapping';
import type { SqlStructureExtractor } from '../parser/structure-extractor';
import type { QueryNormalizer } from '../parser/query-normalizer';
import type { Logger } from '../logging/logger';
import { ConfigurationError } from '../types/common';

export interface SharedServices {
  extractor: SqlStructureExtractor;
  normalizer: QueryNormalizer;
  mappings: readonly MappingRecord[];
  logger: Logger;
}

/**
 * Context for one analyzer. `threshold()` throws when the analyzer asks for
 * a key its settings do not define, which the orchestrator treats as a
 * fatal failure of that analyzer alone.
 */
export function createAnalyzerContext(
  analyzerName: string,
  settings: AnalyzerSettings,
  services: SharedServices
): AnalyzerContext {
  return {
    extractor: services.extractor,
    normalizer: services.normalizer,
    mappings: services.mappings,
    logger: services.logger,
    settings,
    threshold(key: string): number {
      const value = Object.prototype.hasOwnProperty.call(settings.thresholds, key)
        ? settings.thresholds[key]
        : undefined;
      if (value === undefined) {
        throw new ConfigurationError('MISSING_THRESHOLD', `Analyzer ${analyzerName} has no threshold "${key}"`, {
          analyzer: analyzerName,
          key,
        });
      }
      return value;
    },
  };
}

/**
 * Run `analyzeOne` for every item, skipping (and logging at debug) any item
 * that throws. Yields whatever the successful calls return.
 */
export function* runPerRecord<T>(
  analyzerName: string,
  items: Iterable<T>,
  logger: Logger,
  analyzeOne: (item: T) => Iterable<Issue>
): Generator<Issue> {
  for (const item of items) {
    let produced: Issue[];
    try {
      produced = [...analyzeOne(item)];
    } catch (error) {
      logger.debug(`Analyzer ${analyzerName} skipped a record:`, error);
      continue;
    }
    yield* produced;
  }
}
