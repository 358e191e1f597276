/**
 * @module types/common
 * @description Shared utility types used across all modules
 * @status COMPLETE
 * @see DESIGN.md
 * @dependencies none
 * @lastModified 2026-10-19
 */

// ============================================================================
// Result Type (Error Handling Without Throwing)
// ============================================================================

/**
 * Represents the outcome of an operation that can fail
 * @template T - The success data type
 * @template E - The error type (defaults to Error)
 *
 * @example
 * const result = loadTraceFile('trace.json');
 * if (result.success) {
 *   console.log(result.data.length);
 * } else {
 *   console.error(result.error.message);
 * }
 */
export type Result<T, E = Error> =
  | { success: true; data: T }
  | { success: false; error: E };

/**
 * Creates a successful Result
 */
export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

/**
 * Creates a failed Result
 */
export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}

// ============================================================================
// Error Types
// ============================================================================

/**
 * Standardized error structure for all modules
 */
export interface AppError {
  /** Machine-readable error code */
  code: string;
  /** Human-readable message */
  message: string;
  /** Additional context */
  context?: Record<string, unknown>;
  /** Original error if wrapping */
  cause?: Error;
}

/**
 * Input loading errors (trace and mapping files)
 */
export type InputErrorCode =
  | 'FILE_NOT_FOUND'
  | 'FILE_UNREADABLE'
  | 'INVALID_JSON'
  | 'INVALID_TRACE'
  | 'INVALID_MAPPINGS';

export interface InputError extends AppError {
  code: InputErrorCode;
  /** Path of the offending file */
  path?: string;
}

export type ConfigErrorCode = 'INVALID_CONFIG' | 'INVALID_THRESHOLD' | 'MISSING_THRESHOLD';

/**
 * Base class for errors thrown by the library
 */
export class QueryDoctorError extends Error implements AppError {
  readonly code: string;
  readonly context?: Record<string, unknown>;
  declare cause?: Error;

  constructor(code: string, message: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, cause ? { cause } : undefined);
    this.name = 'QueryDoctorError';
    this.code = code;
    this.context = context;
  }
}

/**
 * Invalid configuration. Raised while loading configuration, before any
 * analysis pass starts, and the only error that stops execution.
 */
export class ConfigurationError extends QueryDoctorError {
  declare readonly code: ConfigErrorCode;

  constructor(code: ConfigErrorCode, message: string, context?: Record<string, unknown>) {
    super(code, message, context);
    this.name = 'ConfigurationError';
  }
}

/**
 * Normalizes an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

// ============================================================================
// Time Types
// ============================================================================

/**
 * Duration in milliseconds
 */
export type Milliseconds = number;
