/**
 * @module config/index
 * @description Analyzer configuration and input file loading
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies zod, src/constants.ts, src/types/common.ts
 * @lastModified 2026-10-19
 *
 * Configuration is a flat map `analyzer -> { enabled, ...thresholds }`.
 * Missing analyzers and keys fall back to ANALYZER_DEFAULTS, unknown keys
 * are ignored and any invalid value raises ConfigurationError before an
 * analysis pass starts.
 */

import * as fs from 'fs';
import type { AnalyzerSettings } from '../types/issues';
import type { QueryRecord } from '../types/query';
import type { MappingRecord } from '../types/mapping';
import type { InputError, Result } from '../types/common';
import { ConfigurationError, err, ok, toError } from '../types/common';
import { ANALYZER_DEFAULTS, SLOW_QUERY_THRESHOLD_MAX_MS, type AnalyzerName } from '../constants';
import { createQueryRecord } from '../collections/query-trace';
import {
  analyzerEntrySchema,
  describeZodError,
  enabledSchema,
  mappingFileSchema,
  rawConfigSchema,
  thresholdSchema,
  traceFileSchema,
} from './schemas';

export * from './schemas';

// ============================================================================
// Types
// ============================================================================

/**
 * Resolved settings for every known analyzer
 */
export type AnalysisConfig = ReadonlyMap<string, AnalyzerSettings>;

export const ANALYZER_NAMES = Object.keys(ANALYZER_DEFAULTS).filter(isAnalyzerName);

function isAnalyzerName(name: string): name is AnalyzerName {
  return Object.prototype.hasOwnProperty.call(ANALYZER_DEFAULTS, name);
}

/**
 * Extra range checks on top of "finite and non-negative"
 */
const THRESHOLD_RANGES: Partial<Record<string, { min: number; max: number; exclusive: boolean }>> = {
  'slow_query.threshold_ms': { min: 0, max: SLOW_QUERY_THRESHOLD_MAX_MS, exclusive: true },
};

// ============================================================================
// Configuration
// ============================================================================

/**
 * Every analyzer enabled with its default thresholds
 */
export function defaultConfig(): AnalysisConfig {
  return resolveConfig({});
}

/**
 * Validate a parsed configuration object and merge it over the defaults
 *
 * @throws ConfigurationError on any invalid value
 *
 * @example
 * const config = resolveConfig({ slow_query: { threshold_ms: 250 }, find_all: { enabled: false } });
 * config.get('slow_query')?.thresholds.threshold_ms; // 250
 */
export function resolveConfig(raw: unknown): AnalysisConfig {
  const parsed = rawConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(
      'INVALID_CONFIG',
      `Configuration must be an object mapping analyzer names to settings (${describeZodError(parsed.error)})`
    );
  }

  const config = new Map<string, AnalyzerSettings>();
  for (const name of ANALYZER_NAMES) {
    config.set(name, resolveAnalyzer(name, analyzerEntry(name, parsed.data[name])));
  }
  return config;
}

function analyzerEntry(name: AnalyzerName, raw: unknown): Record<string, unknown> {
  if (raw === undefined || raw === null) return {};
  const result = analyzerEntrySchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError('INVALID_CONFIG', `${name} ${describeZodError(result.error)}`, { analyzer: name });
  }
  return result.data;
}

function resolveAnalyzer(name: AnalyzerName, raw: Record<string, unknown>): AnalyzerSettings {
  let enabled = true;
  if (raw.enabled !== undefined) {
    const result = enabledSchema.safeParse(raw.enabled);
    if (!result.success) {
      throw new ConfigurationError('INVALID_CONFIG', `${name}.${describeZodError(result.error)}`, { analyzer: name });
    }
    enabled = result.data;
  }

  const defaults: Readonly<Record<string, number>> = ANALYZER_DEFAULTS[name];
  const thresholds: Record<string, number> = {};
  for (const [key, fallback] of Object.entries(defaults)) {
    thresholds[key] = raw[key] === undefined ? fallback : validateThreshold(name, key, raw[key]);
  }

  return Object.freeze({ enabled, thresholds: Object.freeze(thresholds) });
}

function validateThreshold(analyzer: AnalyzerName, key: string, value: unknown): number {
  const qualified = `${analyzer}.${key}`;
  const result = thresholdSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError('INVALID_THRESHOLD', `${qualified} ${describeZodError(result.error)}`, {
      analyzer,
      key,
      value,
    });
  }

  const range = THRESHOLD_RANGES[qualified];
  if (range) {
    const below = range.exclusive ? result.data <= range.min : result.data < range.min;
    const above = range.exclusive ? result.data >= range.max : result.data > range.max;
    if (below || above) {
      throw new ConfigurationError(
        'INVALID_THRESHOLD',
        `${qualified} must be between ${range.min} and ${range.max} (exclusive), got ${result.data}`,
        { analyzer, key, value }
      );
    }
  }

  return result.data;
}

/**
 * Read and resolve a JSON configuration file
 *
 * @throws ConfigurationError when the file cannot be read, is not JSON, or holds invalid values
 */
export function loadConfig(filePath: string): AnalysisConfig {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError('INVALID_CONFIG', `Cannot read configuration file ${filePath}: ${toError(error).message}`, {
      path: filePath,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError('INVALID_CONFIG', `Configuration file ${filePath} is not valid JSON: ${toError(error).message}`, {
      path: filePath,
    });
  }

  return resolveConfig(raw);
}

// ============================================================================
// Input Files
// ============================================================================

/**
 * Validate parsed trace JSON into frozen query records
 */
export function parseTrace(raw: unknown): Result<QueryRecord[], InputError> {
  const parsed = traceFileSchema.safeParse(raw);
  if (!parsed.success) {
    return err({ code: 'INVALID_TRACE', message: `Invalid query trace: ${describeZodError(parsed.error)}` });
  }
  return ok(parsed.data.map(createQueryRecord));
}

export function parseMappings(raw: unknown): Result<MappingRecord[], InputError> {
  const parsed = mappingFileSchema.safeParse(raw);
  if (!parsed.success) {
    return err({ code: 'INVALID_MAPPINGS', message: `Invalid mapping metadata: ${describeZodError(parsed.error)}` });
  }
  return ok(parsed.data);
}

/**
 * Read a JSON file without throwing
 */
export function readJsonFile(filePath: string): Result<unknown, InputError> {
  if (!fs.existsSync(filePath)) {
    return err({ code: 'FILE_NOT_FOUND', message: `File not found: ${filePath}`, path: filePath });
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    const cause = toError(error);
    return err({ code: 'FILE_UNREADABLE', message: `Cannot read ${filePath}: ${cause.message}`, path: filePath, cause });
  }

  try {
    return ok(JSON.parse(content));
  } catch (error) {
    const cause = toError(error);
    return err({ code: 'INVALID_JSON', message: `${filePath} is not valid JSON: ${cause.message}`, path: filePath, cause });
  }
}

export function loadTraceFile(filePath: string): Result<QueryRecord[], InputError> {
  const json = readJsonFile(filePath);
  if (!json.success) return json;
  const trace = parseTrace(json.data);
  return trace.success ? trace : err({ ...trace.error, path: filePath });
}

export function loadMappingFile(filePath: string): Result<MappingRecord[], InputError> {
  const json = readJsonFile(filePath);
  if (!json.success) return json;
  const mappings = parseMappings(json.data);
  return mappings.success ? mappings : err({ ...mappings.error, path: filePath });
}
