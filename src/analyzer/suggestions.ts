/**
 * @module analyzer/suggestions
 * @description Structured fix suggestions attached to issues
 * @status COMPLETE
 * @dependencies src/analyzer/severity.ts, src/types/issues.ts
 *
 * Suggestions are data only. Turning blocks into HTML or terminal text is
 * left to whoever consumes the issues.
 */

import type { IssueSeverity, Suggestion, SuggestionBlock } from '../types/issues';
import { findAllSeverity, flushInLoopSeverity } from './severity';

function suggestion(
  title: string,
  severity: IssueSeverity,
  kind: Suggestion['kind'],
  tags: string[],
  blocks: SuggestionBlock[]
): Suggestion {
  return Object.freeze({ title, severity, kind, tags: Object.freeze(tags), blocks: Object.freeze(blocks) });
}

// ============================================================================
// Reads
// ============================================================================

/**
 * Pagination advice; its severity grades the unpaginated read
 */
export function paginationSuggestion(rowCount: number, executionTimeMs: number): Suggestion {
  return suggestion('Paginate or filter the result set', findAllSeverity(rowCount, executionTimeMs), 'performance', ['pagination', 'memory'], [
    { kind: 'text', content: `The query loaded ${rowCount} rows without any filter or limit.` },
    { kind: 'code', language: 'sql', content: 'SELECT ... FROM items ORDER BY id LIMIT 50 OFFSET 0' },
    { kind: 'list', items: ['Add a WHERE clause for the rows actually needed', 'Page through large sets with LIMIT/OFFSET or keyset pagination'] },
  ]);
}

export function slowQuerySuggestion(severity: IssueSeverity, hints: string): Suggestion {
  return suggestion('Optimize the slow query', severity, 'performance', ['index', 'execution-plan'], [
    { kind: 'text', content: hints },
    { kind: 'list', items: ['Run EXPLAIN on the query', 'Add indexes for filtered, joined and sorted columns'] },
  ]);
}

export function leadingWildcardSuggestion(severity: IssueSeverity, pattern: string, likeType: string): Suggestion {
  return suggestion('Avoid leading wildcards in LIKE', severity, 'performance', ['like', 'index', 'full-text'], [
    { kind: 'text', content: `The pattern '${pattern}' is a ${likeType}; a B-tree index cannot serve it.` },
    { kind: 'list', items: ['Use a prefix search (term%) where possible', 'Use a full-text index or search engine for contains searches', 'Store a reversed column for ends-with searches'] },
  ]);
}

export function limitWithCollectionJoinSuggestion(mainTable: string | null): Suggestion {
  const table = mainTable ?? 'the root table';
  return suggestion('Paginate the root entities, not the joined rows', 'CRITICAL', 'integrity', ['pagination', 'fetch-join', 'data-loss'], [
    { kind: 'text', content: `LIMIT applies to joined rows, so collections fetched with ${table} are silently truncated.` },
    { kind: 'list', items: ['Select the page of root identifiers first, then fetch-join by those identifiers', 'Use the ORM paginator that counts distinct roots'] },
  ]);
}

// ============================================================================
// Joins
// ============================================================================

export function eagerLoadingSuggestion(severity: IssueSeverity, joinCount: number): Suggestion {
  return suggestion('Reduce eager loading', severity, 'performance', ['joins', 'cartesian-product'], [
    { kind: 'text', content: `Loading ${joinCount} associations in one query multiplies the rows transferred.` },
    { kind: 'list', items: ['Fetch only the associations the caller uses', 'Split collection loading into separate queries'] },
  ]);
}

export function reduceJoinsSuggestion(severity: IssueSeverity, joinCount: number): Suggestion {
  return suggestion('Split the query', severity, 'performance', ['joins'], [
    { kind: 'text', content: `${joinCount} JOINs make the planner's job hard and the result set wide.` },
    { kind: 'list', items: ['Move rarely used associations to lazy or extra-lazy loading', 'Load secondary data in a follow-up query'] },
  ]);
}

export function innerJoinSuggestion(table: string): Suggestion {
  return suggestion('Use INNER JOIN for mandatory relations', 'CRITICAL', 'performance', ['joins', 'nullability'], [
    { kind: 'text', content: `Every row has a matching '${table}' row, so LEFT JOIN only costs the optimizer.` },
    { kind: 'code', language: 'sql', content: `-- before\nLEFT JOIN ${table} ...\n-- after\nINNER JOIN ${table} ...` },
  ]);
}

export function removeJoinSuggestion(table: string, alias: string): Suggestion {
  return suggestion('Remove the unused JOIN', 'WARNING', 'performance', ['joins'], [
    { kind: 'text', content: `No column of '${table}' (alias '${alias}') is read; the JOIN can be dropped.` },
  ]);
}

export function multiStepHydrationSuggestion(severity: IssueSeverity, tables: readonly string[]): Suggestion {
  return suggestion('Hydrate collections in separate steps', severity, 'performance', ['joins', 'hydration'], [
    { kind: 'text', content: `Collections ${tables.join(', ')} are joined together, multiplying row counts.` },
    { kind: 'list', items: ['Load the root entities first', 'Load each collection with its own query filtered by the root identifiers'] },
  ]);
}

// ============================================================================
// Writes
// ============================================================================

/**
 * Batching advice; its severity grades the flush loop
 */
export function flushInLoopSuggestion(flushCount: number, averageOperations: number): Suggestion {
  return suggestion('Flush once per batch', flushInLoopSeverity(flushCount), 'performance', ['flush', 'batch', 'transaction'], [
    { kind: 'text', content: `${flushCount} flushes averaging ${averageOperations.toFixed(1)} operations each.` },
    { kind: 'list', items: ['Persist inside the loop and flush after it', 'For large sets, flush and clear every N iterations'] },
  ]);
}

export function batchClearSuggestion(table: string, operationCount: number): Suggestion {
  return suggestion('Clear the unit of work between batches', 'WARNING', 'memory', ['batch', 'memory', 'unit-of-work'], [
    { kind: 'text', content: `${operationCount} writes on '${table}' keep every entity tracked until the end of the run.` },
    { kind: 'list', items: ['Flush and clear every 20-100 entities', 'Use a bulk UPDATE/DELETE statement when entity events are not needed'] },
  ]);
}

// ============================================================================
// Repetition
// ============================================================================

export function nPlusOneSuggestion(severity: IssueSeverity, table: string | null): Suggestion {
  return suggestion('Load related rows in one query', severity, 'performance', ['n+1', 'eager-loading'], [
    { kind: 'text', content: `Rows of ${table ?? 'one table'} are fetched one query at a time.` },
    { kind: 'list', items: ['Fetch-join the association in the parent query', 'Batch-load with WHERE ... IN (...)'] },
  ]);
}

export function lazyLoadingSuggestion(entity: string): Suggestion {
  return suggestion('Preload the association', 'WARNING', 'performance', ['lazy-loading', 'n+1'], [
    { kind: 'text', content: `Each ${entity} is loaded lazily inside a loop.` },
    { kind: 'list', items: ['Fetch-join the association before iterating', 'Batch-load the identifiers with WHERE id IN (...)'] },
  ]);
}

export function frequentQuerySuggestion(severity: IssueSeverity, executions: number): Suggestion {
  return suggestion('Cache or consolidate the repeated query', severity, 'performance', ['cache', 'repetition'], [
    { kind: 'text', content: `The same statement ran ${executions} times.` },
    { kind: 'list', items: ['Memoize the result for the duration of the request', 'Combine the lookups into one query'] },
  ]);
}

// ============================================================================
// Security
// ============================================================================

export function injectionSuggestion(severity: IssueSeverity): Suggestion {
  return suggestion('Bind values as parameters', severity, 'security', ['security', 'sql-injection'], [
    { kind: 'text', content: 'Values concatenated into SQL can change the statement itself.' },
    { kind: 'code', language: 'sql', content: "-- before\nWHERE name = '\" + name + \"'\n-- after\nWHERE name = :name" },
  ]);
}
