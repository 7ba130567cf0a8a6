/**
 * @module analyzer/severity
 * @description Severity grading by measured impact
 * @status COMPLETE
 * @dependencies src/constants.ts, src/types/issues.ts
 */

import { SEVERITY_SCALES } from '../constants';
import { SEVERITY_PRIORITY, type IssueSeverity } from '../types/issues';

/**
 * N+1: query count or time spent in the repeated queries
 */
export function nPlusOneSeverity(queryCount: number, totalTimeMs: number): IssueSeverity {
  const scale = SEVERITY_SCALES.N_PLUS_ONE;
  if (queryCount > scale.CRITICAL_COUNT || totalTimeMs > scale.CRITICAL_TIME_MS) return 'CRITICAL';
  if (queryCount > scale.WARNING_COUNT || totalTimeMs > scale.WARNING_TIME_MS) return 'WARNING';
  return 'INFO';
}

export function frequentQuerySeverity(executions: number, totalTimeMs: number): IssueSeverity {
  const scale = SEVERITY_SCALES.FREQUENT_QUERY;
  if (executions > scale.CRITICAL_COUNT || totalTimeMs > scale.CRITICAL_TIME_MS) return 'CRITICAL';
  if (executions > scale.WARNING_COUNT || totalTimeMs > scale.WARNING_TIME_MS) return 'WARNING';
  return 'INFO';
}

export function slowQuerySeverity(executionTimeMs: number): IssueSeverity {
  const scale = SEVERITY_SCALES.SLOW_QUERY;
  if (executionTimeMs > scale.CRITICAL_TIME_MS) return 'CRITICAL';
  if (executionTimeMs > scale.WARNING_TIME_MS) return 'WARNING';
  return 'INFO';
}

/**
 * Unpaginated reads: rows loaded, or a slow load of a modest set
 */
export function findAllSeverity(rowCount: number, executionTimeMs: number): IssueSeverity {
  const scale = SEVERITY_SCALES.FIND_ALL;
  if (rowCount > scale.CRITICAL_ROWS) return 'CRITICAL';
  if (rowCount > scale.WARNING_ROWS || executionTimeMs > scale.WARNING_TIME_MS) return 'WARNING';
  return 'INFO';
}

/**
 * Flushes in a loop are at least a warning; a long loop is critical
 */
export function flushInLoopSeverity(flushCount: number): IssueSeverity {
  return flushCount > SEVERITY_SCALES.FLUSH_IN_LOOP.CRITICAL_FLUSHES ? 'CRITICAL' : 'WARNING';
}

/**
 * Positive when `a` outranks `b`
 */
export function compareSeverity(a: IssueSeverity, b: IssueSeverity): number {
  return SEVERITY_PRIORITY[a] - SEVERITY_PRIORITY[b];
}
