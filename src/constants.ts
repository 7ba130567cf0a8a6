/**
 * @module constants
 * @description Central constants file for all threshold values and magic numbers
 * @status COMPLETE
 * @dependencies none
 */

// ============================================================================
// SQL Scanning Limits
// ============================================================================

/**
 * Structural extraction limits
 */
export const SQL_LIMITS = {
  /** Maximum SQL length the extractor scans (1MB) */
  MAX_SQL_LENGTH: 1024 * 1024,
  /** Scanned SQL strings kept by the extractor itself */
  SCAN_CACHE_ENTRIES: 256,
  /** AND-ed WHERE predicates beyond which a WHERE clause counts as complex */
  COMPLEX_WHERE_CONDITIONS: 3,
  /** Characters of SQL kept in issue payloads */
  QUERY_PREVIEW_CHARS: 200,
} as const;

// ============================================================================
// Cache Settings
// ============================================================================

/**
 * Structural cache settings
 */
export const CACHE_DEFAULTS = {
  /** Distinct SQL strings kept before the least recently used is evicted */
  MAX_ENTRIES: 1000,
} as const;

// ============================================================================
// Trace Input
// ============================================================================

/**
 * Capture-layer conventions
 */
export const TRACE_DEFAULTS = {
  /** Times below this value (and above 0) are read as seconds */
  SECONDS_HEURISTIC_CEILING: 1,
} as const;

// ============================================================================
// Join Thresholds
// ============================================================================

/**
 * Excessive eager loading
 */
export const EAGER_LOADING_DEFAULTS = {
  /** JOIN count at which eager loading is reported */
  JOIN_THRESHOLD: 7,
  /** JOIN count above which the issue is critical */
  CRITICAL_JOIN_THRESHOLD: 10,
} as const;

/**
 * Join optimization
 */
export const JOIN_OPTIMIZATION_DEFAULTS = {
  /** JOINs above this count are too many */
  MAX_JOINS_RECOMMENDED: 5,
  /** JOINs above this count are critical */
  MAX_JOINS_CRITICAL: 8,
  /** Collection LEFT JOINs from which multi-step hydration is suggested */
  MIN_COLLECTION_JOINS: 2,
  /** Collection JOINs at which hydration cost is critical */
  CRITICAL_COLLECTION_JOINS: 3,
} as const;

// ============================================================================
// Read Thresholds
// ============================================================================

/**
 * Unpaginated reads
 */
export const FIND_ALL_DEFAULTS = {
  /** Rows above which an unfiltered read is reported */
  THRESHOLD: 99,
  /** Row count assumed when the capture layer did not record one */
  ESTIMATED_ROW_COUNT: 999,
} as const;

/**
 * Slow queries
 */
export const SLOW_QUERY_DEFAULTS = {
  THRESHOLD_MS: 100,
  /** Exclusive upper bound accepted for the threshold */
  MAX_THRESHOLD_MS: 100000,
} as const;

/**
 * Leading-wildcard LIKE
 */
export const INEFFECTIVE_LIKE_DEFAULTS = {
  /** Faster queries are ignored */
  MIN_EXECUTION_TIME_MS: 5.0,
  /** Execution time at which the issue becomes critical */
  CRITICAL_EXECUTION_TIME_MS: 100,
} as const;

// ============================================================================
// Repetition Thresholds
// ============================================================================

/**
 * N+1 query detection
 */
export const N_PLUS_ONE_DEFAULTS = {
  /** Executions of one pattern needed to report */
  THRESHOLD: 5,
} as const;

/**
 * Lazy loading inside a loop
 */
export const LAZY_LOADING_DEFAULTS = {
  /** Single-row loads on one table needed to report */
  THRESHOLD: 10,
  /** Maximum average capture-index gap between the loads */
  MAX_AVERAGE_GAP: 5,
} as const;

/**
 * Frequently repeated queries
 */
export const FREQUENT_QUERY_DEFAULTS = {
  THRESHOLD: 20,
} as const;

// ============================================================================
// Write Thresholds
// ============================================================================

/**
 * Flush inside a loop
 */
export const FLUSH_IN_LOOP_DEFAULTS = {
  /** Flush groups needed to report */
  FLUSH_COUNT_THRESHOLD: 5,
  /** Average write operations per flush above which batching is assumed */
  MAX_OPERATIONS_PER_FLUSH: 10,
} as const;

/**
 * Batch writes without clearing the unit of work.
 * The sequential-gap figures are approximations, kept tunable.
 */
export const BATCH_WITHOUT_CLEAR_DEFAULTS = {
  /** Same-table writes needed to report */
  BATCH_SIZE_THRESHOLD: 20,
  /** Largest capture-index gap that still counts as sequential */
  MAX_SEQUENTIAL_GAP: 10,
  /** Share of gaps that must be sequential */
  SEQUENTIAL_RATIO: 0.7,
} as const;

// ============================================================================
// Issue Payload Limits
// ============================================================================

/**
 * Sample sizes kept on aggregated issues
 */
export const SAMPLE_LIMITS = {
  /** Queries attached to batch-style issues */
  BATCH_QUERIES: 20,
  /** Queries attached to injection issues */
  INJECTION_QUERIES: 10,
} as const;

// ============================================================================
// Severity Scales
// ============================================================================

/**
 * Impact scales shared by analyzers that grade severity by magnitude
 */
export const SEVERITY_SCALES = {
  N_PLUS_ONE: { CRITICAL_COUNT: 100, CRITICAL_TIME_MS: 100, WARNING_COUNT: 10, WARNING_TIME_MS: 10 },
  FREQUENT_QUERY: { CRITICAL_COUNT: 100, CRITICAL_TIME_MS: 100, WARNING_COUNT: 20, WARNING_TIME_MS: 20 },
  SLOW_QUERY: { CRITICAL_TIME_MS: 100, WARNING_TIME_MS: 10 },
  FIND_ALL: { CRITICAL_ROWS: 10000, WARNING_ROWS: 100, WARNING_TIME_MS: 50 },
  FLUSH_IN_LOOP: { CRITICAL_FLUSHES: 50 },
} as const;

// ============================================================================
// Deduplication
// ============================================================================

/**
 * Priority of issue types that describe the same repeated-query root cause
 */
export const DEDUP_PRIORITY = {
  n_plus_one: 100,
  lazy_loading: 80,
  frequent_query: 50,
  /** Any type outside the repeated-query family */
  DEFAULT: 10,
} as const;

// ============================================================================
// Display/Formatting
// ============================================================================

/**
 * Text display limits
 */
export const DISPLAY_LIMITS = {
  /** Maximum characters of SQL printed per issue */
  SQL_PREVIEW_CHARS: 120,
  /** Queries listed per issue in text output */
  QUERIES_PER_ISSUE: 3,
} as const;

/**
 * Status indicator emojis for display
 */
export const STATUS_INDICATORS = {
  CRITICAL: '🔴',
  WARNING: '🟡',
  INFO: '🔵',
  OK: '🟢',
} as const;
