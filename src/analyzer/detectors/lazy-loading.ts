/**
 * @module analyzer/detectors/lazy-loading
 * @description Detects single-row loads by identifier repeated inside a loop
 * @status COMPLETE
 * @dependencies src/analyzer/config.ts, src/sql/structural-cache.ts
 */

import { SAMPLE_LIMITS } from '../../constants';
import { isSelect } from '../../trace/query-record';
import type { Issue } from '../../types/issues';
import type { QueryRecord } from '../../types/query';
import { lazyLoadingOptionsSchema, parseOptions, type LazyLoadingOptions } from '../config';
import type { AnalysisContext } from '../context';
import { IssueBuilder } from '../issue-builder';
import { lazyLoadingSuggestion } from '../suggestions';
import type { QueryAnalyzer } from '../types';
import { entityName, guarded } from './shared';

const DEFAULT_IDENTIFIERS: readonly string[] = ['id'];

/**
 * Proxy initialization shows up as many `WHERE ...id = ?` loads on one table
 * close together in the trace. The identifier is the table's identifier
 * column from metadata, or `id` when the table is unknown.
 */
export function createLazyLoadingAnalyzer(options: LazyLoadingOptions = {}): QueryAnalyzer {
  const { threshold, maxAverageGap } = parseOptions('lazyLoading', lazyLoadingOptionsSchema, options);
  const name = 'lazy-loading';

  return {
    name,
    detects: ['lazy_loading'],

    *analyze(trace, context): IterableIterator<Issue> {
      const byTable = trace
        .onlySelects()
        .groupBy((record) => guarded(context, name, record, () => loadedTable(record, context)) ?? null);

      for (const [table, loads] of byTable) {
        if (loads.size < threshold) continue;
        const records = loads.toArray();
        const gap = averageGap(records);
        if (gap > maxAverageGap) continue;

        const entity = entityName(table);
        yield IssueBuilder.create()
          .withType('lazy_loading')
          .withSeverity('WARNING')
          .withTitle(`Lazy Loading in Loop: ${records.length} queries on ${entity}`)
          .withDescription(
            `${records.length} queries each loaded one ${entity} by identifier, ` +
              `on average ${gap.toFixed(1)} queries apart. An association is being initialized inside a loop.`
          )
          .withSuggestion(lazyLoadingSuggestion(entity))
          .withQueries(records.slice(0, SAMPLE_LIMITS.BATCH_QUERIES))
          .withDetails({ table, entity, query_count: records.length, average_gap: Number(gap.toFixed(2)) })
          .build();
      }
    },
  };
}

/**
 * Table of a single-row load by identifier, from the cached structural facts
 */
function loadedTable(record: QueryRecord, context: AnalysisContext): string | null {
  if (!isSelect(record)) return null;
  const main = context.cache.get(record.sql, 'mainTable');
  if (main === null || main.table === '(subquery)') return null;

  const identifiers = context.metadata?.hasTable(main.table)
    ? context.metadata.getIdentifierColumns(main.table)
    : DEFAULT_IDENTIFIERS;
  const wanted = new Set(identifiers.map((column) => column.toLowerCase()));
  const bound = context.cache.get(record.sql, 'parameterBoundColumns');
  return bound.some((column) => wanted.has(column.toLowerCase())) ? main.table : null;
}

/**
 * Mean distance in capture positions between consecutive loads
 */
function averageGap(records: readonly QueryRecord[]): number {
  const first = records[0];
  const last = records[records.length - 1];
  if (first === undefined || last === undefined || records.length < 2) return 0;
  return (last.index - first.index) / (records.length - 1);
}
