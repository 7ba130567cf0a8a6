/**
 * @module types/common
 * @description Shared utility types used across all modules
 * @status COMPLETE
 * @dependencies none
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
 * const result = parseTraceDocument(json);
 * if (result.success) {
 *   console.log(result.data.size);
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
 * Machine-readable error codes used across modules
 */
export type ErrorCode =
  | 'QUERY_RECORD_INVALID'
  | 'TRACE_INVALID'
  | 'METADATA_INVALID'
  | 'CONFIG_INVALID'
  | 'SQL_TOO_LONG'
  | 'SQL_SCAN_FAILED'
  | 'ISSUE_INCOMPLETE';

/**
 * Standardized error structure for all modules
 */
export interface AppError {
  /** Machine-readable error code */
  code: ErrorCode;
  /** Human-readable message */
  message: string;
  /** Additional context */
  context?: Record<string, unknown>;
  /** Original error if wrapping */
  cause?: Error;
}

/**
 * Creates an AppError value
 */
export function appError(
  code: ErrorCode,
  message: string,
  context?: Record<string, unknown>
): AppError {
  return context === undefined ? { code, message } : { code, message, context };
}

/**
 * Thrown counterpart of AppError, for failures that must unwind
 * (invalid configuration, structural scan failures)
 */
export class CodedError extends Error {
  readonly code: ErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
  }

  toAppError(): AppError {
    return appError(this.code, this.message, this.context);
  }
}

/** Raised when the structure extractor cannot scan a SQL string */
export class SqlStructureError extends CodedError {}

/** Raised when analyzer thresholds are out of range */
export class InvalidConfigurationError extends CodedError {
  constructor(message: string, context?: Record<string, unknown>) {
    super('CONFIG_INVALID', message, context);
  }
}

/** Raised when an issue is built without a required field */
export class IssueBuildError extends CodedError {
  constructor(missing: string[]) {
    super('ISSUE_INCOMPLETE', `Issue is missing required fields: ${missing.join(', ')}`, {
      missing,
    });
  }
}

// ============================================================================
// Logging
// ============================================================================

/**
 * Optional diagnostics sink. Analysis results never depend on it.
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}
