/**
 * @module analyzer/detectors
 * @description Analyzer exports and the fixed-order default pipeline
 * @status COMPLETE
 * @dependencies src/analyzer/types.ts, src/analyzer/config.ts
 */

// ============================================================================
// Analyzer Exports
// ============================================================================

export { createEagerLoadingAnalyzer } from './eager-loading';
export { createJoinOptimizationAnalyzer, isCollectionJoin, isJoinNullable } from './join-optimization';
export { createFindAllAnalyzer } from './find-all';
export { createSlowQueryAnalyzer, optimizationHints } from './slow-query';
export { createIneffectiveLikeAnalyzer, likeSearchType, type LikeSearchType } from './ineffective-like';
export { createLimitWithCollectionJoinAnalyzer } from './limit-with-collection-join';
export { createFlushInLoopAnalyzer, findFlushGroups, type FlushGroup } from './flush-in-loop';
export { createBatchWithoutClearAnalyzer, isSequential } from './batch-without-clear';
export { createInjectionAnalyzer } from './injection';
export { createNPlusOneAnalyzer } from './n-plus-one';
export { createLazyLoadingAnalyzer } from './lazy-loading';
export { createFrequentQueryAnalyzer } from './frequent-query';

// ============================================================================
// Default Pipeline
// ============================================================================

import type { IssueType } from '../../types/issues';
import type { AnalyzerConfig } from '../config';
import type { QueryAnalyzer } from '../types';
import { createBatchWithoutClearAnalyzer } from './batch-without-clear';
import { createEagerLoadingAnalyzer } from './eager-loading';
import { createFindAllAnalyzer } from './find-all';
import { createFlushInLoopAnalyzer } from './flush-in-loop';
import { createFrequentQueryAnalyzer } from './frequent-query';
import { createIneffectiveLikeAnalyzer } from './ineffective-like';
import { createInjectionAnalyzer } from './injection';
import { createJoinOptimizationAnalyzer } from './join-optimization';
import { createLazyLoadingAnalyzer } from './lazy-loading';
import { createLimitWithCollectionJoinAnalyzer } from './limit-with-collection-join';
import { createNPlusOneAnalyzer } from './n-plus-one';
import { createSlowQueryAnalyzer } from './slow-query';

/**
 * Every analyzer, configured from one config object.
 * Order matters - security and integrity first, repetition families last.
 *
 * @throws InvalidConfigurationError when a threshold is out of range
 */
export function createDefaultAnalyzers(config: AnalyzerConfig = {}): QueryAnalyzer[] {
  return [
    createInjectionAnalyzer(),                                   // Security: injection risk
    createLimitWithCollectionJoinAnalyzer(),                     // Integrity: truncated collections
    createJoinOptimizationAnalyzer(config.joinOptimization),     // Performance: join misuse
    createEagerLoadingAnalyzer(config.eagerLoading),             // Performance: wide object graphs
    createFindAllAnalyzer(config.findAll),                       // Performance: unpaginated reads
    createSlowQueryAnalyzer(config.slowQuery),                   // Performance: slow statements
    createIneffectiveLikeAnalyzer(config.ineffectiveLike),       // Performance: leading wildcards
    createFlushInLoopAnalyzer(config.flushInLoop),               // Performance: flush per iteration
    createBatchWithoutClearAnalyzer(config.batchWithoutClear),   // Memory: unit-of-work growth
    createNPlusOneAnalyzer(config.nPlusOne),                     // Repetition: N+1
    createLazyLoadingAnalyzer(config.lazyLoading),               // Repetition: lazy loads in loop
    createFrequentQueryAnalyzer(config.frequentQuery),           // Repetition: repeated statements
  ];
}

/**
 * Get analyzer by name
 */
export function getAnalyzer(analyzers: readonly QueryAnalyzer[], name: string): QueryAnalyzer | undefined {
  return analyzers.find((analyzer) => analyzer.name === name);
}

/**
 * Get analyzers for a specific issue type
 */
export function getAnalyzersForIssueType(analyzers: readonly QueryAnalyzer[], issueType: IssueType): QueryAnalyzer[] {
  return analyzers.filter((analyzer) => analyzer.detects.includes(issueType));
}
