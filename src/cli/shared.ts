/**
 * @module cli/shared
 * @description Input loading and option parsing shared by the CLI commands
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies src/config, src/analyzer, src/logging/logger.ts
 * @lastModified 2026-10-19
 */

import * as fs from 'fs';
import * as path from 'path';
import type { IssueCategory, IssueSeverity } from '../types/issues';
import type { QueryRecord } from '../types/query';
import type { MappingRecord } from '../types/mapping';
import type { AnalysisOptions, AnalysisResult } from '../analyzer';
import { analyzeTrace } from '../analyzer';
import { loadConfig, loadMappingFile, loadTraceFile, type AnalysisConfig } from '../config';
import { createConsoleLogger, parseLogLevel, type Logger } from '../logging/logger';
import { ConfigurationError } from '../types/common';

// ============================================================================
// Types
// ============================================================================

/**
 * Options every analysis command accepts
 */
export interface InputOptions {
  mappings?: string;
  config?: string;
  excludePath?: string[];
  logLevel?: string;
}

export interface LoadedInputs {
  records: QueryRecord[];
  mappings: MappingRecord[];
  config?: AnalysisConfig;
  logger: Logger;
}

const SEVERITIES: readonly IssueSeverity[] = ['critical', 'warning', 'info'];
const CATEGORIES: readonly IssueCategory[] = ['performance', 'security', 'integrity'];

// ============================================================================
// Input Loading
// ============================================================================

/**
 * Load trace, mappings and configuration, or exit with a message.
 * Input errors exit with 1, configuration errors with 2.
 */
export function loadInputsOrExit(file: string, options: InputOptions): LoadedInputs {
  const logger = createConsoleLogger(parseLogLevel(options.logLevel));

  const trace = loadTraceFile(path.resolve(file));
  if (!trace.success) {
    fail(`Error: ${trace.error.message}`, 1);
  }

  let mappings: MappingRecord[] = [];
  if (options.mappings) {
    const loaded = loadMappingFile(path.resolve(options.mappings));
    if (!loaded.success) {
      fail(`Error: ${loaded.error.message}`, 1);
    }
    mappings = loaded.data;
  }

  let config: AnalysisConfig | undefined;
  if (options.config) {
    try {
      config = loadConfig(path.resolve(options.config));
    } catch (error) {
      if (error instanceof ConfigurationError) {
        fail(`Configuration error (${error.code}): ${error.message}`, 2);
      }
      throw error;
    }
  }

  return { records: trace.data, mappings, ...(config ? { config } : {}), logger };
}

/**
 * Run the analysis over loaded inputs
 */
export function runAnalysis(inputs: LoadedInputs, extra: AnalysisOptions = {}, excludePaths: string[] = []): AnalysisResult {
  return analyzeTrace(inputs.records, {
    ...extra,
    mappings: inputs.mappings,
    logger: inputs.logger,
    ...(inputs.config ? { config: inputs.config } : {}),
    ...(excludePaths.length > 0 ? { excludePaths } : {}),
  });
}

// ============================================================================
// Option Parsing
// ============================================================================

export function parseSeverityOption(value: string | undefined): IssueSeverity | undefined {
  if (value === undefined) return undefined;
  const match = SEVERITIES.find(severity => severity === value.toLowerCase());
  if (!match) {
    fail(`Error: unknown severity "${value}" (expected ${SEVERITIES.join(', ')})`, 1);
  }
  return match;
}

export function parseCategoryOption(values: string[] | undefined): IssueCategory[] | undefined {
  if (!values || values.length === 0) return undefined;
  return values.map(value => {
    const match = CATEGORIES.find(category => category === value.toLowerCase());
    if (!match) {
      fail(`Error: unknown category "${value}" (expected ${CATEGORIES.join(', ')})`, 1);
    }
    return match;
  });
}

export function parseCountOption(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    fail(`Error: --${name} expects a non-negative integer, got "${value}"`, 1);
  }
  return parsed;
}

/**
 * Collector for repeatable options (`--exclude-path a --exclude-path b`)
 */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

// ============================================================================
// Output
// ============================================================================

export function writeOutput(output: string, outputFile: string | undefined): void {
  if (outputFile) {
    const outputPath = path.resolve(outputFile);
    fs.writeFileSync(outputPath, output, 'utf-8');
    console.error(`Output written to: ${outputPath}`);
  } else {
    console.log(output);
  }
}

export function fail(message: string, exitCode: number): never {
  console.error(message);
  process.exit(exitCode);
}
