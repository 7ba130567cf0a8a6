/**
 * @module analyzer/detectors/limit-with-collection-join
 * @description Detects LIMIT applied to a fetch-joined collection, which truncates collections silently
 * @status COMPLETE
 * @dependencies src/sql/structural-cache.ts, src/analyzer/suggestions.ts
 */

import { isSelect } from '../../trace/query-record';
import type { Issue } from '../../types/issues';
import type { QueryRecord } from '../../types/query';
import type { AnalysisContext } from '../context';
import { IssueBuilder } from '../issue-builder';
import { limitWithCollectionJoinSuggestion } from '../suggestions';
import type { QueryAnalyzer } from '../types';
import { guarded, preview } from './shared';

/**
 * A SELECT with LIMIT and a JOIN that selects columns of two or more aliases.
 * Joins guaranteed to match one row (locale-filtered translations, joins on
 * the joined table's id) are exempt.
 */
export function createLimitWithCollectionJoinAnalyzer(): QueryAnalyzer {
  const name = 'limit-with-collection-join';

  return {
    name,
    detects: ['limit_with_collection_join'],

    *analyze(trace, context): IterableIterator<Issue> {
      for (const record of trace) {
        if (!isSelect(record)) continue;
        const flagged = guarded(context, name, record, () => limitsFetchJoin(record, context));
        if (flagged !== true) continue;

        const main = context.cache.get(record.sql, 'mainTable');
        const aliases = context.cache.get(record.sql, 'tableAliasesInSelect');
        yield IssueBuilder.create()
          .withType('limit_with_collection_join')
          .withSeverity('CRITICAL')
          .withTitle('LIMIT with Collection Join Detected')
          .withDescription(
            `Query limits its rows while fetch-joining ${aliases.length} aliases (${aliases.join(', ')}). ` +
              'LIMIT counts joined rows, not root entities, so hydrated collections are silently incomplete.'
          )
          .withSuggestion(limitWithCollectionJoinSuggestion(main?.table ?? null))
          .withQueries([record])
          .withDetails({
            table: main?.table ?? null,
            selected_aliases: [...aliases],
            query: preview(record.sql),
          })
          .build();
      }
    },
  };
}

function limitsFetchJoin(record: QueryRecord, context: AnalysisContext): boolean {
  const { sql } = record;
  return (
    context.cache.get(sql, 'hasLimit') &&
    context.cache.get(sql, 'hasJoin') &&
    context.cache.get(sql, 'tableAliasesInSelect').length >= 2 &&
    !context.cache.get(sql, 'hasLocaleConstraintInJoin') &&
    !context.cache.get(sql, 'hasUniqueJoinConstraint')
  );
}
