/**
 * @module analyzer/config
 * @description Threshold schemas for every analyzer, validated at construction
 * @status COMPLETE
 * @dependencies zod, src/constants.ts
 */

import { z } from 'zod';
import {
  BATCH_WITHOUT_CLEAR_DEFAULTS,
  EAGER_LOADING_DEFAULTS,
  FIND_ALL_DEFAULTS,
  FLUSH_IN_LOOP_DEFAULTS,
  FREQUENT_QUERY_DEFAULTS,
  INEFFECTIVE_LIKE_DEFAULTS,
  JOIN_OPTIMIZATION_DEFAULTS,
  LAZY_LOADING_DEFAULTS,
  N_PLUS_ONE_DEFAULTS,
  SLOW_QUERY_DEFAULTS,
} from '../constants';
import { InvalidConfigurationError } from '../types/common';

// ============================================================================
// Per-Analyzer Schemas
// ============================================================================

const count = z.number().int().positive();

export const eagerLoadingOptionsSchema = z
  .object({
    joinThreshold: count.default(EAGER_LOADING_DEFAULTS.JOIN_THRESHOLD),
    criticalJoinThreshold: count.default(EAGER_LOADING_DEFAULTS.CRITICAL_JOIN_THRESHOLD),
  })
  .strict()
  .refine((o) => o.criticalJoinThreshold >= o.joinThreshold, {
    message: 'criticalJoinThreshold must be at least joinThreshold',
  });

export const joinOptimizationOptionsSchema = z
  .object({
    maxJoinsRecommended: count.default(JOIN_OPTIMIZATION_DEFAULTS.MAX_JOINS_RECOMMENDED),
    maxJoinsCritical: count.default(JOIN_OPTIMIZATION_DEFAULTS.MAX_JOINS_CRITICAL),
  })
  .strict()
  .refine((o) => o.maxJoinsCritical >= o.maxJoinsRecommended, {
    message: 'maxJoinsCritical must be at least maxJoinsRecommended',
  });

export const findAllOptionsSchema = z
  .object({
    threshold: count.default(FIND_ALL_DEFAULTS.THRESHOLD),
  })
  .strict();

export const slowQueryOptionsSchema = z
  .object({
    thresholdMs: z
      .number()
      .positive()
      .lt(SLOW_QUERY_DEFAULTS.MAX_THRESHOLD_MS)
      .default(SLOW_QUERY_DEFAULTS.THRESHOLD_MS),
  })
  .strict();

export const flushInLoopOptionsSchema = z
  .object({
    flushCountThreshold: count.default(FLUSH_IN_LOOP_DEFAULTS.FLUSH_COUNT_THRESHOLD),
    maxOperationsPerFlush: z.number().positive().default(FLUSH_IN_LOOP_DEFAULTS.MAX_OPERATIONS_PER_FLUSH),
  })
  .strict();

export const batchWithoutClearOptionsSchema = z
  .object({
    batchSizeThreshold: count.default(BATCH_WITHOUT_CLEAR_DEFAULTS.BATCH_SIZE_THRESHOLD),
    maxSequentialGap: count.default(BATCH_WITHOUT_CLEAR_DEFAULTS.MAX_SEQUENTIAL_GAP),
    sequentialRatio: z.number().gt(0).lte(1).default(BATCH_WITHOUT_CLEAR_DEFAULTS.SEQUENTIAL_RATIO),
  })
  .strict();

export const ineffectiveLikeOptionsSchema = z
  .object({
    minExecutionTimeMs: z
      .number()
      .nonnegative()
      .lt(SLOW_QUERY_DEFAULTS.MAX_THRESHOLD_MS)
      .default(INEFFECTIVE_LIKE_DEFAULTS.MIN_EXECUTION_TIME_MS),
  })
  .strict();

export const nPlusOneOptionsSchema = z
  .object({
    threshold: z.number().int().min(2).default(N_PLUS_ONE_DEFAULTS.THRESHOLD),
  })
  .strict();

export const lazyLoadingOptionsSchema = z
  .object({
    threshold: z.number().int().min(2).default(LAZY_LOADING_DEFAULTS.THRESHOLD),
    maxAverageGap: z.number().positive().default(LAZY_LOADING_DEFAULTS.MAX_AVERAGE_GAP),
  })
  .strict();

export const frequentQueryOptionsSchema = z
  .object({
    threshold: z.number().int().min(2).default(FREQUENT_QUERY_DEFAULTS.THRESHOLD),
  })
  .strict();

export type EagerLoadingOptions = z.input<typeof eagerLoadingOptionsSchema>;
export type JoinOptimizationOptions = z.input<typeof joinOptimizationOptionsSchema>;
export type FindAllOptions = z.input<typeof findAllOptionsSchema>;
export type SlowQueryOptions = z.input<typeof slowQueryOptionsSchema>;
export type FlushInLoopOptions = z.input<typeof flushInLoopOptionsSchema>;
export type BatchWithoutClearOptions = z.input<typeof batchWithoutClearOptionsSchema>;
export type IneffectiveLikeOptions = z.input<typeof ineffectiveLikeOptionsSchema>;
export type NPlusOneOptions = z.input<typeof nPlusOneOptionsSchema>;
export type LazyLoadingOptions = z.input<typeof lazyLoadingOptionsSchema>;
export type FrequentQueryOptions = z.input<typeof frequentQueryOptionsSchema>;

// ============================================================================
// Whole Configuration
// ============================================================================

/**
 * Shape of a configuration file: per-analyzer thresholds plus selection
 */
export const analyzerConfigSchema = z
  .object({
    eagerLoading: eagerLoadingOptionsSchema.optional(),
    joinOptimization: joinOptimizationOptionsSchema.optional(),
    findAll: findAllOptionsSchema.optional(),
    slowQuery: slowQueryOptionsSchema.optional(),
    flushInLoop: flushInLoopOptionsSchema.optional(),
    batchWithoutClear: batchWithoutClearOptionsSchema.optional(),
    ineffectiveLike: ineffectiveLikeOptionsSchema.optional(),
    nPlusOne: nPlusOneOptionsSchema.optional(),
    lazyLoading: lazyLoadingOptionsSchema.optional(),
    frequentQuery: frequentQueryOptionsSchema.optional(),
    enabledAnalyzers: z.array(z.string()).optional(),
    disabledAnalyzers: z.array(z.string()).optional(),
    excludePaths: z.array(z.string()).optional(),
  })
  .strict();

export type AnalyzerConfig = z.input<typeof analyzerConfigSchema>;

// ============================================================================
// Validation
// ============================================================================

/**
 * Validate options, filling defaults
 *
 * @throws InvalidConfigurationError naming the offending field
 */
export function parseOptions<S extends z.ZodTypeAny>(scope: string, schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new InvalidConfigurationError(`Invalid ${scope} configuration: ${describeIssues(parsed.error)}`, {
      scope,
      issues: parsed.error.issues.map((issue) => issue.message),
    });
  }
  return parsed.data;
}

/**
 * Validate a configuration file's parsed JSON
 */
export function resolveAnalyzerConfig(input: unknown): z.output<typeof analyzerConfigSchema> {
  return parseOptions('analyzer', analyzerConfigSchema, input);
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
