/**
 * @module analyzer/detectors/ineffective-like
 * @description Detects LIKE patterns with a leading wildcard, which defeat B-tree indexes
 * @status COMPLETE
 * @dependencies src/analyzer/config.ts, src/sql/structural-cache.ts
 */

import { INEFFECTIVE_LIKE_DEFAULTS } from '../../constants';
import type { Issue } from '../../types/issues';
import type { QueryRecord } from '../../types/query';
import { ineffectiveLikeOptionsSchema, parseOptions, type IneffectiveLikeOptions } from '../config';
import type { AnalysisContext } from '../context';
import { IssueBuilder } from '../issue-builder';
import { leadingWildcardSuggestion } from '../suggestions';
import type { QueryAnalyzer } from '../types';
import { guarded, preview } from './shared';

export type LikeSearchType = 'contains search' | 'ends-with search';

/**
 * Each distinct pattern is reported once per trace, on its first
 * sufficiently slow occurrence.
 */
export function createIneffectiveLikeAnalyzer(options: IneffectiveLikeOptions = {}): QueryAnalyzer {
  const { minExecutionTimeMs } = parseOptions('ineffectiveLike', ineffectiveLikeOptionsSchema, options);
  const name = 'ineffective-like';

  return {
    name,
    detects: ['ineffective_like'],

    *analyze(trace, context): IterableIterator<Issue> {
      const reported = new Set<string>();

      for (const record of trace) {
        if (record.executionTimeMs < minExecutionTimeMs) continue;

        for (const pattern of leadingWildcardPatterns(record, context, name)) {
          if (reported.has(pattern)) continue;
          reported.add(pattern);
          yield createIssue(record, pattern);
        }
      }
    },
  };
}

/**
 * Literal patterns from the SQL, then `%`-prefixed string parameters of a LIKE query
 */
function leadingWildcardPatterns(record: QueryRecord, context: AnalysisContext, analyzer: string): string[] {
  const patterns = [
    ...(guarded(context, analyzer, record, () => context.cache.get(record.sql, 'likeLeadingWildcardPatterns')) ?? []),
  ];

  if (/\bLIKE\b/i.test(record.sql)) {
    for (const param of record.params) {
      if (typeof param === 'string' && param.length > 1 && param.startsWith('%') && !patterns.includes(param)) {
        patterns.push(param);
      }
    }
  }
  return patterns;
}

export function likeSearchType(pattern: string): LikeSearchType {
  return pattern.length > 1 && pattern.endsWith('%') ? 'contains search' : 'ends-with search';
}

function createIssue(record: QueryRecord, pattern: string): Issue {
  const time = record.executionTimeMs;
  const critical = time >= INEFFECTIVE_LIKE_DEFAULTS.CRITICAL_EXECUTION_TIME_MS;
  const severity = critical ? 'CRITICAL' : 'WARNING';
  const likeType = likeSearchType(pattern);

  return IssueBuilder.create()
    .withType('ineffective_like')
    .withSeverity(severity)
    .withTitle(
      critical
        ? `LIKE Pattern Causing Slow Query (${time.toFixed(2)}ms)`
        : `LIKE Pattern Prevents Index Usage (${time.toFixed(2)}ms)`
    )
    .withDescription(
      `Query uses LIKE '${pattern}' (${likeType}). ` +
        'A leading wildcard prevents index usage and forces a full scan of the table.'
    )
    .withSuggestion(leadingWildcardSuggestion(severity, pattern, likeType))
    .withQueries([record])
    .withDetails({
      pattern,
      like_type: likeType,
      execution_time_ms: time,
      query: preview(record.sql),
    })
    .build();
}
