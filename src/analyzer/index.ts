/**
 * @module analyzer/index
 * @description Issue detection and analysis orchestrator
 * @status COMPLETE
 * @dependencies ./detectors, ./deduplicator, ./categorizer, ./context, ./config
 */

import { createConsoleLogger } from '../logging/logger';
import type { StructuralCache, StructuralCacheStats } from '../sql/structural-cache';
import type { QueryTrace } from '../trace/query-trace';
import type { Logger } from '../types/common';
import type { Issue, IssueDetectionResult, IssueSeverity, IssueType } from '../types/issues';
import type { EntityMetadataProvider } from '../types/metadata';
import { categorizeIssues, filterBySeverity } from './categorizer';
import { resolveAnalyzerConfig, type AnalyzerConfig } from './config';
import { createAnalysisContext } from './context';
import { deduplicate } from './deduplicator';
import { createDefaultAnalyzers } from './detectors';
import type { QueryAnalyzer } from './types';

// ============================================================================
// Types
// ============================================================================

/**
 * Analysis options
 */
export interface AnalysisOptions {
  /** Thresholds, analyzer selection and excluded paths; validated before use */
  config?: AnalyzerConfig;
  /** Replaces the default pipeline */
  analyzers?: readonly QueryAnalyzer[];
  /** Only run these analyzers (by name); overrides the config's list */
  enabledAnalyzers?: readonly string[];
  /** Skip these analyzers (by name); added to the config's list */
  disabledAnalyzers?: readonly string[];
  metadata?: EntityMetadataProvider | null;
  logger?: Logger;
  /** Share a cache across calls on the same trace */
  cache?: StructuralCache;
  /** Merge overlapping issues (default true) */
  deduplicate?: boolean;
  /** Minimum severity to report */
  minSeverity?: IssueSeverity;
  /** Only report these issue types */
  issueTypes?: readonly IssueType[];
}

/**
 * Analysis metadata
 */
export interface AnalysisMetadata {
  /** Queries analyzed after path exclusion */
  queryCount: number;
  /** Names of analyzers that completed */
  analyzersRun: string[];
  /** Names of analyzers that threw; their issues are dropped */
  analyzersFailed: string[];
  /** Issues before deduplication and filtering */
  rawIssueCount: number;
  analysisTimeMs: number;
  cache: StructuralCacheStats;
}

/**
 * Complete analysis result
 */
export interface AnalysisResult extends IssueDetectionResult {
  metadata: AnalysisMetadata;
}

// ============================================================================
// Main Analysis Function
// ============================================================================

/**
 * Analyze a query trace for issues
 *
 * This is the main entry point for issue detection. It:
 * 1. Runs every selected analyzer against the trace with one shared context
 * 2. Merges overlapping issues
 * 3. Categorizes and prioritizes the rest
 *
 * @throws InvalidConfigurationError when `config` is invalid
 *
 * @example
 * const result = analyzeTrace(trace, { metadata });
 * console.log(`Found ${result.summary.totalCount} issues`);
 * console.log(`Health score: ${result.summary.healthScore}/100`);
 */
export function analyzeTrace(trace: QueryTrace, options: AnalysisOptions = {}): AnalysisResult {
  const startedAt = Date.now();
  const config = resolveAnalyzerConfig(options.config ?? {});
  const logger = options.logger ?? createConsoleLogger();
  const context = createAnalysisContext({ metadata: options.metadata, logger, cache: options.cache });
  const scoped = trace.excludePaths(config.excludePaths ?? []);

  const analyzersToRun = selectAnalyzers(options.analyzers ?? createDefaultAnalyzers(config), {
    enabled: options.enabledAnalyzers ?? config.enabledAnalyzers,
    disabled: [...(config.disabledAnalyzers ?? []), ...(options.disabledAnalyzers ?? [])],
  });

  const rawIssues: Issue[] = [];
  const analyzersRun: string[] = [];
  const analyzersFailed: string[] = [];

  for (const analyzer of analyzersToRun) {
    try {
      const issues = [...analyzer.analyze(scoped, context)];
      rawIssues.push(...issues);
      analyzersRun.push(analyzer.name);
    } catch (error) {
      // Log error but continue with other analyzers
      logger.warn(`Analyzer ${analyzer.name} failed`, {
        error: error instanceof Error ? error.message : String(error),
      });
      analyzersFailed.push(analyzer.name);
    }
  }

  let issues = options.deduplicate === false ? rawIssues : deduplicate(rawIssues);
  if (options.minSeverity) issues = filterBySeverity(issues, options.minSeverity);
  if (options.issueTypes && options.issueTypes.length > 0) {
    const wanted = new Set(options.issueTypes);
    issues = issues.filter((issue) => wanted.has(issue.type));
  }

  return {
    ...categorizeIssues(issues),
    metadata: {
      queryCount: scoped.size,
      analyzersRun,
      analyzersFailed,
      rawIssueCount: rawIssues.length,
      analysisTimeMs: Date.now() - startedAt,
      cache: context.cache.getStats(),
    },
  };
}

// ============================================================================
// Analyzer Selection
// ============================================================================

/**
 * Select which analyzers to run based on enable/disable lists
 */
export function selectAnalyzers(
  analyzers: readonly QueryAnalyzer[],
  selection: { enabled?: readonly string[]; disabled?: readonly string[] }
): QueryAnalyzer[] {
  let selected = [...analyzers];

  const enabled = selection.enabled;
  if (enabled && enabled.length > 0) {
    selected = selected.filter((analyzer) => enabled.includes(analyzer.name));
  }

  const disabled = selection.disabled;
  if (disabled && disabled.length > 0) {
    selected = selected.filter((analyzer) => !disabled.includes(analyzer.name));
  }

  return selected;
}

// ============================================================================
// Re-exports
// ============================================================================

export * from './detectors';
export { categorizeIssues, calculateHealthScore, filterBySeverity, getByCategory, prioritizeIssues } from './categorizer';
export { deduplicate, dedupKey, dedupPriority } from './deduplicator';
export { IssueBuilder, categoryOf, withDuplicates } from './issue-builder';
export { createAnalysisContext, type AnalysisContext, type AnalysisContextOptions } from './context';
export * from './config';
export * from './severity';
export * from './suggestions';
export type { QueryAnalyzer } from './types';
