/**
 * @module analyzer/detectors/slow-query
 * @description Detects individual queries slower than a threshold, with structural hints
 * @status COMPLETE
 * @dependencies src/analyzer/config.ts, src/analyzer/severity.ts
 */

import type { Issue } from '../../types/issues';
import type { QueryRecord } from '../../types/query';
import { parseOptions, slowQueryOptionsSchema, type SlowQueryOptions } from '../config';
import type { AnalysisContext } from '../context';
import { IssueBuilder } from '../issue-builder';
import { slowQuerySeverity } from '../severity';
import { slowQuerySuggestion } from '../suggestions';
import type { QueryAnalyzer } from '../types';
import { guarded, preview } from './shared';

const DEFAULT_HINT = 'Review query structure and add appropriate indexes.';

export function createSlowQueryAnalyzer(options: SlowQueryOptions = {}): QueryAnalyzer {
  const { thresholdMs } = parseOptions('slowQuery', slowQueryOptionsSchema, options);
  const name = 'slow-query';

  return {
    name,
    detects: ['slow_query'],

    *analyze(trace, context): IterableIterator<Issue> {
      for (const record of trace.filterSlow(thresholdMs)) {
        const hints = guarded(context, name, record, () => optimizationHints(record, context)) ?? DEFAULT_HINT;
        const severity = slowQuerySeverity(record.executionTimeMs);

        yield IssueBuilder.create()
          .withType('slow_query')
          .withSeverity(severity)
          .withTitle(`Slow Query: ${record.executionTimeMs.toFixed(2)}ms`)
          .withDescription(
            `Query took ${record.executionTimeMs.toFixed(2)}ms (threshold: ${thresholdMs}ms). ${hints}`
          )
          .withSuggestion(slowQuerySuggestion(severity, hints))
          .withQueries([record])
          .withDetails({
            execution_time_ms: record.executionTimeMs,
            threshold_ms: thresholdMs,
            query: preview(record.sql),
          })
          .build();
      }
    },
  };
}

/**
 * Sentences naming the structures that usually explain the time
 */
export function optimizationHints(record: QueryRecord, context: AnalysisContext): string {
  const { sql } = record;
  const hints: string[] = [];

  if (context.cache.get(sql, 'hasSubquery')) {
    hints.push('Subqueries may be rewritten as JOINs');
  }
  if (context.cache.get(sql, 'hasOrderBy')) {
    const columns = context.cache.get(sql, 'orderByColumns');
    hints.push(
      columns.length > 0
        ? `Index the ORDER BY columns (${columns.join(', ')}) to avoid a filesort`
        : 'ORDER BY may require a filesort without a matching index'
    );
  }
  if (context.cache.get(sql, 'hasGroupBy')) {
    hints.push('GROUP BY may create a temporary table');
  }
  if (context.cache.get(sql, 'likeLeadingWildcardPatterns').length > 0) {
    hints.push('A leading-wildcard LIKE prevents index usage');
  }
  if (context.cache.get(sql, 'hasDistinct')) {
    hints.push('DISTINCT forces deduplication of the result set');
  }

  return hints.length > 0 ? `${hints.join('. ')}.` : DEFAULT_HINT;
}
