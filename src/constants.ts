/**
 * @module constants
 * @description Central constants file for all threshold values and magic numbers
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies none
 * @lastModified 2026-10-19
 */

// ============================================================================
// Severity Thresholds
// ============================================================================

/**
 * N+1 severity: occurrence count and summed execution time (ms)
 */
export const N_PLUS_ONE_SEVERITY = {
  CRITICAL_COUNT: 100,
  CRITICAL_TOTAL_MS: 100,
  WARNING_COUNT: 10,
  WARNING_TOTAL_MS: 10,
} as const;

/**
 * Missing index severity: rows scanned and query time (ms)
 */
export const MISSING_INDEX_SEVERITY = {
  CRITICAL_ROWS: 100_000,
  CRITICAL_MS: 100,
  WARNING_ROWS: 1_000,
  WARNING_MS: 10,
} as const;

/**
 * Slow query severity (ms). Critical is strictly above, warning is inclusive.
 */
export const SLOW_QUERY_SEVERITY = {
  CRITICAL_MS: 100,
  WARNING_MS: 10,
} as const;

/**
 * Frequent query severity: occurrence count and summed execution time (ms)
 */
export const FREQUENT_QUERY_SEVERITY = {
  CRITICAL_COUNT: 100,
  CRITICAL_TOTAL_MS: 100,
  WARNING_COUNT: 20,
  WARNING_TOTAL_MS: 20,
} as const;

/**
 * Hydration severity for large result sets (rows, bytes)
 */
export const HYDRATION_SEVERITY = {
  CRITICAL_ROWS: 999,
  CRITICAL_BYTES: 50 * 1024 * 1024,
  WARNING_ROWS: 99,
  WARNING_BYTES: 10 * 1024 * 1024,
} as const;

/**
 * Write batches flushed one at a time inside a loop
 */
export const FLUSH_IN_LOOP_SEVERITY = {
  CRITICAL_FLUSHES: 20,
} as const;

/**
 * Writes accumulated in one unit of work without clearing it
 */
export const BATCH_WRITE_SEVERITY = {
  CRITICAL_WRITES: 100,
} as const;

/**
 * Unbounded result set severity (find-all, ORDER BY without LIMIT)
 */
export const UNBOUNDED_RESULT_SEVERITY = {
  CRITICAL_ROWS: 10_000,
  WARNING_ROWS: 100,
  WARNING_MS: 50,
} as const;

/**
 * Injection risk score boundaries
 */
export const INJECTION_RISK_SEVERITY = {
  CRITICAL_SCORE: 6,
  WARNING_SCORE: 3,
} as const;

/**
 * JOIN count above which a too-many-joins finding is critical
 */
export const JOIN_COUNT_SEVERITY = {
  CRITICAL_JOINS: 8,
} as const;

/**
 * Leading-wildcard LIKE: at or above this time it is critical
 */
export const LIKE_PATTERN_SEVERITY = {
  CRITICAL_MS: 100,
} as const;

// ============================================================================
// Suppression Floors
// ============================================================================

/**
 * Below these values an issue is never constructed
 */
export const SUPPRESSION_FLOORS = {
  SLOW_QUERY_MS: 10,
  MISSING_INDEX_ROWS: 500,
  N_PLUS_ONE_COUNT: 3,
  FREQUENT_QUERY_COUNT: 10,
  ORDER_BY_WITHOUT_LIMIT_ROWS: 50,
  FIND_ALL_ROWS: 100,
} as const;

// ============================================================================
// Injection Scoring
// ============================================================================

/**
 * Fixed weight contributed by each injection sub-check
 */
export const INJECTION_WEIGHTS = {
  NUMERIC_IN_QUOTES: 1,
  SQL_KEYWORDS: 3,
  COMMENT_SYNTAX: 2,
  CONSECUTIVE_QUOTES: 1,
  UNPARAMETERIZED_LIKE: 1,
  LITERAL_IN_WHERE: 2,
  MULTIPLE_LITERAL_CONDITIONS: 3,
} as const;

/**
 * Literals of at most this many lowercase letters are treated as enum values
 */
export const SAFE_WORD_MAX_LENGTH = 10;

// ============================================================================
// Analyzer Defaults
// ============================================================================

/**
 * Default thresholds per analyzer. Every key here is a recognized
 * configuration key; anything else in a configuration file is ignored.
 */
export const ANALYZER_DEFAULTS = {
  n_plus_one: { threshold: 5, repetition_floor: 3 },
  lazy_loading: { threshold: 10, max_sequential_gap: 5 },
  frequent_query: { threshold: 10 },
  slow_query: { threshold_ms: 100 },
  missing_index: { min_rows_scanned: 1000 },
  ineffective_like: { min_execution_time_ms: 5 },
  join_optimization: { max_joins: 5 },
  limit_with_collection_join: {},
  partial_collection_load: { threshold: 3 },
  find_all: { threshold: 99 },
  order_by_without_limit: {},
  function_in_where: {},
  sql_injection: { min_risk_level: 3 },
  query_builder_practices: {},
  cascade_configuration: {},
  on_delete_consistency: {},
  float_for_money: {},
  decimal_precision: {},
  foreign_key_mapping: {},
  hydration: { row_threshold: 99 },
  flush_in_loop: { flush_count: 5, max_writes_per_flush: 10 },
  entity_manager_clear: { batch_size: 20, max_gap: 10 },
  division_by_zero: {},
} as const;

/**
 * Share of consecutive writes on a table that must lie within `max_gap`
 * queries of each other for the writes to count as one batch
 */
export const BATCH_SEQUENTIAL_RATIO = 0.7;

export type AnalyzerName = keyof typeof ANALYZER_DEFAULTS;

/**
 * Upper bound accepted for the slow query threshold (ms)
 */
export const SLOW_QUERY_THRESHOLD_MAX_MS = 100_000;

// ============================================================================
// Cache Settings
// ============================================================================

/**
 * Default settings for the structure and signature caches
 */
export const CACHE_DEFAULTS = {
  /** Maximum entries per cache */
  MAX_ENTRIES: 1000,
  /** Share of entries evicted (oldest first) when the cache is full */
  EVICTION_RATIO: 0.2,
} as const;

// ============================================================================
// Output Limits
// ============================================================================

/**
 * Limits applied when rendering issues
 */
export const OUTPUT_LIMITS = {
  /** Queries listed per issue in text output */
  MAX_QUERIES_PER_ISSUE: 5,
  /** Characters of SQL shown per query in text output */
  MAX_SQL_PREVIEW_CHARS: 200,
} as const;
