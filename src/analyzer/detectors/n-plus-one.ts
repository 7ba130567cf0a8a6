/**
 * @module analyzer/detectors/n-plus-one
 * @description Detects N+1 query patterns - queries executed once per loaded row
 * @status COMPLETE
 * @dependencies src/sql/structural-cache.ts, src/analyzer/severity.ts
 */

import { isSelect } from '../../trace/query-record';
import type { QueryTrace } from '../../trace/query-trace';
import type { Issue } from '../../types/issues';
import type { QueryRecord } from '../../types/query';
import { nPlusOneOptionsSchema, parseOptions, type NPlusOneOptions } from '../config';
import type { AnalysisContext } from '../context';
import { IssueBuilder } from '../issue-builder';
import { nPlusOneSeverity } from '../severity';
import { nPlusOneSuggestion } from '../suggestions';
import type { QueryAnalyzer } from '../types';
import { guarded, preview } from './shared';

// ============================================================================
// N+1 Query Detection
// ============================================================================

/**
 * N+1 Pattern: 1 initial query + N queries per row returned
 * Example:
 *   SELECT * FROM orders                      (returns 10 rows)
 *   -> 10x SELECT * FROM customers WHERE id = ?
 *
 * Detection Strategy:
 * 1. Group SELECTs by normalized SQL
 * 2. Keep filtered groups executed at least `threshold` times
 * 3. Look for the parent query whose row count matches the repetition
 */
export function createNPlusOneAnalyzer(options: NPlusOneOptions = {}): QueryAnalyzer {
  const { threshold } = parseOptions('nPlusOne', nPlusOneOptionsSchema, options);
  const name = 'n-plus-one';

  return {
    name,
    detects: ['n_plus_one'],

    *analyze(trace, context): IterableIterator<Issue> {
      const selects = trace.onlySelects();
      const groups = selects.groupBy(
        (record) => guarded(context, name, record, () => context.cache.get(record.sql, 'normalized')) ?? null
      );

      for (const group of groups.values()) {
        if (group.size < threshold) continue;
        const first = group.at(0);
        if (first === undefined || !hasFilter(first, context, name)) continue;

        yield createNPlusOneIssue(group, findParentQuery(group, trace, context), context);
      }
    },
  };
}

// ============================================================================
// Detection Logic
// ============================================================================

function hasFilter(record: QueryRecord, context: AnalysisContext, analyzer: string): boolean {
  const columns = guarded(context, analyzer, record, () => context.cache.get(record.sql, 'whereColumns'));
  return columns !== undefined ? columns.length > 0 : /\bWHERE\b/i.test(record.sql);
}

/**
 * Latest SELECT before the group, on another table, whose row count
 * correlates with the number of repeated queries
 */
function findParentQuery(group: QueryTrace, trace: QueryTrace, context: AnalysisContext): QueryRecord | null {
  const first = group.at(0);
  if (first === undefined) return null;
  const childTable = tableOf(first, context);

  const preceding = trace.filter((record) => record.index < first.index && isSelect(record)).toArray().reverse();
  for (const candidate of preceding) {
    if (tableOf(candidate, context) === childTable) continue;
    const rows = candidate.rowCount ?? 0;
    if (rows > 0 && isCountCorrelated(rows, group.size)) return candidate;
  }
  return null;
}

/**
 * Exact match, or within 20% to allow for filtered rows
 */
function isCountCorrelated(parentRows: number, childQueryCount: number): boolean {
  if (parentRows === childQueryCount) return true;
  const ratio = childQueryCount / parentRows;
  return ratio >= 0.8 && ratio <= 1.2;
}

function tableOf(record: QueryRecord, context: AnalysisContext): string | null {
  return mainTableName(record, context)?.toLowerCase() ?? null;
}

function mainTableName(record: QueryRecord, context: AnalysisContext): string | null {
  try {
    return context.cache.get(record.sql, 'mainTable')?.table ?? null;
  } catch (error) {
    context.logger?.debug('Main table unavailable', {
      index: record.index,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

// ============================================================================
// Issue Creation
// ============================================================================

function createNPlusOneIssue(group: QueryTrace, parent: QueryRecord | null, context: AnalysisContext): Issue {
  const queries = group.toArray();
  const count = queries.length;
  const totalTime = group.totalExecutionTime();
  const severity = nPlusOneSeverity(count, totalTime);
  const first = queries[0];
  const table = first ? mainTableName(first, context) : null;

  return IssueBuilder.create()
    .withType('n_plus_one')
    .withSeverity(severity)
    .withTitle(parent ? `N+1 Query: 1 + ${count} queries` : `N+1 Query: ${count} similar queries`)
    .withDescription(
      `The same filtered query${table ? ` on '${table}'` : ''} ran ${count} times ` +
        `for a total of ${totalTime.toFixed(2)}ms. ` +
        'Related rows are loaded one at a time instead of in a single query.'
    )
    .withSuggestion(nPlusOneSuggestion(severity, table))
    .withQueries(queries)
    .withDetails({
      query_count: count,
      total_time_ms: Number(totalTime.toFixed(2)),
      table,
      parent_query: parent ? preview(parent.sql) : null,
      pattern: first ? preview(context.cache.get(first.sql, 'normalized')) : null,
    })
    .build();
}
