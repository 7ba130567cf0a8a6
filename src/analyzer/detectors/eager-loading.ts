/**
 * @module analyzer/detectors/eager-loading
 * @description Detects queries that eagerly load too many associations at once
 * @status COMPLETE
 * @dependencies src/analyzer/config.ts, src/analyzer/issue-builder.ts
 */

import type { Issue } from '../../types/issues';
import { eagerLoadingOptionsSchema, parseOptions, type EagerLoadingOptions } from '../config';
import { IssueBuilder } from '../issue-builder';
import { eagerLoadingSuggestion } from '../suggestions';
import type { QueryAnalyzer } from '../types';
import { guarded } from './shared';

// ============================================================================
// Eager Loading Detection
// ============================================================================

/**
 * A query joining many tables usually hydrates a wide object graph in one go,
 * and collection joins multiply its rows.
 */
export function createEagerLoadingAnalyzer(options: EagerLoadingOptions = {}): QueryAnalyzer {
  const { joinThreshold, criticalJoinThreshold } = parseOptions('eagerLoading', eagerLoadingOptionsSchema, options);
  const name = 'eager-loading';

  return {
    name,
    detects: ['eager_loading'],

    *analyze(trace, context): IterableIterator<Issue> {
      for (const record of trace) {
        const joinCount = guarded(context, name, record, () => context.cache.get(record.sql, 'joinCount'));
        if (joinCount === undefined || joinCount < joinThreshold) continue;

        const severity = joinCount > criticalJoinThreshold ? 'CRITICAL' : 'WARNING';
        yield IssueBuilder.create()
          .withType('eager_loading')
          .withSeverity(severity)
          .withTitle(`Excessive Eager Loading: ${joinCount} JOINs`)
          .withDescription(
            `Query contains ${joinCount} JOINs which may cause cartesian product issues (threshold: ${joinThreshold})`
          )
          .withSuggestion(eagerLoadingSuggestion(severity, joinCount))
          .withQueries([record])
          .withDetails({ join_count: joinCount, threshold: joinThreshold })
          .build();
      }
    },
  };
}
