/**
 * @module analyzer/detectors/frequent-query
 * @description Detects statements repeated often enough to deserve caching or consolidation
 * @status COMPLETE
 * @dependencies src/analyzer/config.ts, src/analyzer/severity.ts
 */

import type { Issue } from '../../types/issues';
import { frequentQueryOptionsSchema, parseOptions, type FrequentQueryOptions } from '../config';
import { IssueBuilder } from '../issue-builder';
import { frequentQuerySeverity } from '../severity';
import { frequentQuerySuggestion } from '../suggestions';
import type { QueryAnalyzer } from '../types';
import { guarded, preview } from './shared';

export function createFrequentQueryAnalyzer(options: FrequentQueryOptions = {}): QueryAnalyzer {
  const { threshold } = parseOptions('frequentQuery', frequentQueryOptionsSchema, options);
  const name = 'frequent-query';

  return {
    name,
    detects: ['frequent_query'],

    *analyze(trace, context): IterableIterator<Issue> {
      const groups = trace.groupBy(
        (record) => guarded(context, name, record, () => context.cache.get(record.sql, 'normalized')) ?? null
      );

      for (const [pattern, group] of groups) {
        if (group.size < threshold) continue;

        const totalTime = group.totalExecutionTime();
        const severity = frequentQuerySeverity(group.size, totalTime);
        yield IssueBuilder.create()
          .withType('frequent_query')
          .withSeverity(severity)
          .withTitle(`Frequent Query: executed ${group.size} times`)
          .withDescription(
            `The same statement ran ${group.size} times for a total of ${totalTime.toFixed(2)}ms ` +
              `(average ${group.averageExecutionTime().toFixed(2)}ms).`
          )
          .withSuggestion(frequentQuerySuggestion(severity, group.size))
          .withQueries(group.toArray())
          .withDetails({
            execution_count: group.size,
            total_time_ms: Number(totalTime.toFixed(2)),
            pattern: preview(pattern),
          })
          .build();
      }
    },
  };
}
