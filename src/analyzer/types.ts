/**
 * @module analyzer/types
 * @description Analyzer contract shared by every detector
 * @status COMPLETE
 * @dependencies src/trace/query-trace.ts, src/analyzer/context.ts
 */

import type { QueryTrace } from '../trace/query-trace';
import type { Issue, IssueType } from '../types/issues';
import type { AnalysisContext } from './context';

/**
 * One detector per anti-pattern family.
 *
 * `analyze` returns a fresh lazy sequence on every call and never mutates
 * the trace. Failures on a single query are logged and skipped.
 */
export interface QueryAnalyzer {
  /** Stable identifier used by enable/disable lists */
  name: string;
  /** Issue types this analyzer can emit */
  detects: readonly IssueType[];
  analyze(trace: QueryTrace, context: AnalysisContext): IterableIterator<Issue>;
}
