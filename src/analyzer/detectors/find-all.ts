/**
 * @module analyzer/detectors/find-all
 * @description Detects unfiltered, unpaginated reads of whole tables
 * @status COMPLETE
 * @dependencies src/analyzer/config.ts, src/analyzer/suggestions.ts
 */

import { FIND_ALL_DEFAULTS } from '../../constants';
import { isSelect } from '../../trace/query-record';
import type { Issue } from '../../types/issues';
import type { QueryRecord } from '../../types/query';
import { findAllOptionsSchema, parseOptions, type FindAllOptions } from '../config';
import type { AnalysisContext } from '../context';
import { IssueBuilder } from '../issue-builder';
import { paginationSuggestion } from '../suggestions';
import type { QueryAnalyzer } from '../types';
import { guarded, preview } from './shared';

const AGGREGATE_ONLY = /^\s*SELECT\s+(?:COUNT|MAX|MIN|SUM|AVG)\s*\(/i;
const EXISTS_ONLY = /^\s*SELECT\s+EXISTS\s*\(/i;

/**
 * A SELECT without an outer WHERE and without LIMIT whose row count exceeds
 * the threshold. Severity follows the pagination suggestion.
 */
export function createFindAllAnalyzer(options: FindAllOptions = {}): QueryAnalyzer {
  const { threshold } = parseOptions('findAll', findAllOptionsSchema, options);
  const name = 'find-all';

  return {
    name,
    detects: ['find_all'],

    *analyze(trace, context): IterableIterator<Issue> {
      for (const record of trace) {
        if (!isSelect(record)) continue;
        if (AGGREGATE_ONLY.test(record.sql) || EXISTS_ONLY.test(record.sql)) continue;
        if (!isUnbounded(record, context, name)) continue;

        const estimated = record.rowCount === null;
        const rowCount = record.rowCount ?? FIND_ALL_DEFAULTS.ESTIMATED_ROW_COUNT;
        if (rowCount <= threshold) continue;

        const suggestion = paginationSuggestion(rowCount, record.executionTimeMs);
        const table = guarded(context, name, record, () => context.cache.get(record.sql, 'mainTable'))?.table ?? null;
        yield IssueBuilder.create()
          .withType('find_all')
          .withSeverity(suggestion.severity)
          .withTitle(`Unpaginated Query: ${rowCount} rows loaded`)
          .withDescription(
            `Query${table ? ` on '${table}'` : ''} has no WHERE clause and no LIMIT and ` +
              `${estimated ? 'is estimated to return' : 'returned'} ${rowCount} rows. ` +
              'Loading every row gets slower and heavier as the table grows.'
          )
          .withSuggestion(suggestion)
          .withQueries([record])
          .withDetails({
            row_count: rowCount,
            estimated,
            threshold,
            table,
            query: preview(record.sql),
          })
          .build();
      }
    },
  };
}

/**
 * No filter and no limit. A failing structural scan falls back to a
 * substring check on the upper-cased SQL.
 */
function isUnbounded(record: QueryRecord, context: AnalysisContext, analyzer: string): boolean {
  try {
    return !context.cache.get(record.sql, 'hasWhere') && !context.cache.get(record.sql, 'hasLimit');
  } catch (error) {
    context.logger?.warn(`Analyzer ${analyzer} fell back to a substring check for query ${record.index}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    const upper = record.sql.toUpperCase();
    return !upper.includes(' WHERE ') && !upper.includes(' LIMIT ');
  }
}
