/**
 * @module analyzer/detectors/join-optimization
 * @description Detects JOIN misuse: too many joins, LEFT JOIN on mandatory relations,
 *              unused joins and multi-collection hydration
 * @status COMPLETE
 * @dependencies src/analyzer/config.ts, src/metadata/cached-provider.ts, src/sql/structural-cache.ts
 */

import { JOIN_OPTIMIZATION_DEFAULTS } from '../../constants';
import type { CachedMetadataProvider } from '../../metadata/cached-provider';
import type { Issue } from '../../types/issues';
import type { AssociationFact } from '../../types/metadata';
import type { JoinFact, QueryRecord, SourceTable, TableReference } from '../../types/query';
import { joinOptimizationOptionsSchema, parseOptions, type JoinOptimizationOptions } from '../config';
import type { AnalysisContext } from '../context';
import { IssueBuilder } from '../issue-builder';
import {
  innerJoinSuggestion,
  multiStepHydrationSuggestion,
  reduceJoinsSuggestion,
  removeJoinSuggestion,
} from '../suggestions';
import type { QueryAnalyzer } from '../types';
import { guarded, preview } from './shared';

// ============================================================================
// Join Optimization
// ============================================================================

interface JoinThresholds {
  maxJoinsRecommended: number;
  maxJoinsCritical: number;
}

/**
 * Per query with at least one JOIN, in this order: too many joins,
 * multi-step hydration, then for each join a suboptimal LEFT JOIN check
 * followed by an unused-join check.
 *
 * Metadata-dependent checks are skipped when the tables are unknown.
 */
export function createJoinOptimizationAnalyzer(options: JoinOptimizationOptions = {}): QueryAnalyzer {
  const thresholds = parseOptions('joinOptimization', joinOptimizationOptionsSchema, options);
  const name = 'join-optimization';

  return {
    name,
    detects: ['join_too_many', 'join_multi_step_hydration', 'join_suboptimal_left', 'join_unused'],

    *analyze(trace, context): IterableIterator<Issue> {
      for (const record of trace) {
        const issues = guarded(context, name, record, () => analyzeQuery(record, context, thresholds));
        if (issues !== undefined) yield* issues;
      }
    },
  };
}

function analyzeQuery(record: QueryRecord, context: AnalysisContext, thresholds: JoinThresholds): Issue[] {
  const { sql } = record;
  const joins = context.cache.get(sql, 'joins');
  if (joins.length === 0) return [];

  const issues: Issue[] = [];
  const seen = new Set<string>();
  const add = (key: string, issue: Issue): void => {
    if (seen.has(key)) return;
    seen.add(key);
    issues.push(issue);
  };

  const main = context.cache.get(sql, 'mainTable');
  const metadata = context.metadata;
  const knownMain = main !== null && metadata !== null && metadata.hasTable(main.table) ? main : null;

  const tooMany = tooManyJoins(record, joins.length, thresholds);
  if (tooMany) add(`${tooMany.title}|${main?.table ?? ''}`, tooMany);

  if (knownMain && metadata) {
    const hydration = multiStepHydration(record, context, metadata, knownMain, joins);
    if (hydration) add(`${hydration.issue.title}|${[...hydration.tables].sort().join(',')}`, hydration.issue);
  }

  for (const join of joins) {
    if (join.type === 'LEFT' && knownMain && metadata) {
      const suboptimal = suboptimalLeftJoin(record, context, metadata, knownMain, join);
      if (suboptimal) add(`${suboptimal.title}|${join.table}`, suboptimal);
    }

    if (join.alias !== null && !context.cache.extractor.isAliasUsedInQuery(sql, join.alias, join.text)) {
      const unused = unusedJoin(record, join, join.alias);
      add(`${unused.title}|${join.table}`, unused);
    }
  }

  return issues;
}

// ============================================================================
// Checks
// ============================================================================

function tooManyJoins(record: QueryRecord, joinCount: number, thresholds: JoinThresholds): Issue | null {
  if (joinCount <= thresholds.maxJoinsRecommended) return null;

  const severity = joinCount > thresholds.maxJoinsCritical ? 'CRITICAL' : 'WARNING';
  return IssueBuilder.create()
    .withType('join_too_many')
    .withSeverity(severity)
    .withTitle(`Too Many JOINs in Single Query (${joinCount} tables)`)
    .withDescription(
      `Query contains ${joinCount} JOINs (recommended: ${thresholds.maxJoinsRecommended} max). ` +
        'Every additional JOIN widens the result set and makes the execution plan harder to optimize.'
    )
    .withSuggestion(reduceJoinsSuggestion(severity, joinCount))
    .withQueries([record])
    .withDetails({
      join_count: joinCount,
      max_recommended: thresholds.maxJoinsRecommended,
      query: preview(record.sql),
    })
    .build();
}

function multiStepHydration(
  record: QueryRecord,
  context: AnalysisContext,
  metadata: CachedMetadataProvider,
  main: TableReference,
  joins: readonly JoinFact[]
): { issue: Issue; tables: string[] } | null {
  const leftJoins = joins.filter((join) => join.type === 'LEFT' && join.table !== '(subquery)');
  if (leftJoins.length < JOIN_OPTIMIZATION_DEFAULTS.MIN_COLLECTION_JOINS) return null;

  const collections = leftJoins
    .filter((join) => isCollectionJoin(record.sql, context, metadata, main, join))
    .map((join) => join.table);
  const k = collections.length;
  if (k < JOIN_OPTIMIZATION_DEFAULTS.MIN_COLLECTION_JOINS) return null;

  const severity = k >= JOIN_OPTIMIZATION_DEFAULTS.CRITICAL_COLLECTION_JOINS ? 'CRITICAL' : 'WARNING';
  const issue = IssueBuilder.create()
    .withType('join_multi_step_hydration')
    .withSeverity(severity)
    .withTitle(`Multiple Collection JOINs Causing O(n^${k}) Hydration`)
    .withDescription(
      `Query LEFT JOINs ${k} collections (${collections.join(', ')}) in one statement. ` +
        'Each collection multiplies the rows the ORM must hydrate.'
    )
    .withSuggestion(multiStepHydrationSuggestion(severity, collections))
    .withQueries([record])
    .withDetails({
      collection_joins: k,
      tables: collections,
      complexity: `${k} collection JOINs → O(n^${k}) hydration complexity`,
      query: preview(record.sql),
    })
    .build();
  return { issue, tables: collections };
}

function suboptimalLeftJoin(
  record: QueryRecord,
  context: AnalysisContext,
  metadata: CachedMetadataProvider,
  main: TableReference,
  join: JoinFact
): Issue | null {
  if (join.table === '(subquery)' || !metadata.hasTable(join.table)) return null;
  if (isCollectionJoin(record.sql, context, metadata, main, join)) return null;
  if (isJoinNullable(record.sql, context, metadata, main, join) !== false) return null;

  return IssueBuilder.create()
    .withType('join_suboptimal_left')
    .withSeverity('CRITICAL')
    .withTitle('Suboptimal LEFT JOIN on NOT NULL Relation')
    .withDescription(
      `Query uses LEFT JOIN on table '${join.table}' which appears to have a NOT NULL foreign key. ` +
        'Using INNER JOIN instead would be 20-30% faster.'
    )
    .withSuggestion(innerJoinSuggestion(join.table))
    .withQueries([record])
    .withDetails({ table: join.table, alias: join.alias, join_type: join.type, query: preview(record.sql) })
    .build();
}

function unusedJoin(record: QueryRecord, join: JoinFact, alias: string): Issue {
  return IssueBuilder.create()
    .withType('join_unused')
    .withSeverity('WARNING')
    .withTitle('Unused JOIN Detected')
    .withDescription(
      `Query performs ${join.type} JOIN on table '${join.table}' (alias '${alias}') but never uses it. ` +
        'Remove this JOIN to improve performance.'
    )
    .withSuggestion(removeJoinSuggestion(join.table, alias))
    .withQueries([record])
    .withDetails({ table: join.table, alias, join_type: join.type, query: preview(record.sql) })
    .build();
}

// ============================================================================
// Metadata Reasoning
// ============================================================================

/**
 * Whether the join fans out into a collection.
 *
 * Votes over the ON equalities: the other side on its table's identifier and
 * the joined side off its identifier means the FK lives in the joined table.
 * Conflicting or absent votes fall back to the association cardinalities.
 * A joined table without metadata is never a collection.
 * Best-effort: self-referencing schemas can stay ambiguous.
 */
export function isCollectionJoin(
  sql: string,
  context: AnalysisContext,
  metadata: CachedMetadataProvider,
  main: TableReference,
  join: JoinFact
): boolean {
  if (!metadata.hasTable(join.table)) return false;

  const tables = context.cache.get(sql, 'allTables');
  const joinedIds = lowered(metadata.getIdentifierColumns(join.table));
  let collection = 0;
  let notCollection = 0;

  for (const condition of context.cache.extractor.extractJoinOnConditions(sql, join.table)) {
    const otherTable = tableOfColumn(condition.left, tables) ?? main.table;
    const otherIds = lowered(metadata.getIdentifierColumns(otherTable));
    const leftIsKey = otherIds.includes(columnName(condition.left));
    const rightIsKey = joinedIds.includes(columnName(condition.right));

    if (leftIsKey && !rightIsKey) collection++;
    else if (!leftIsKey && rightIsKey) notCollection++;
  }

  if (collection > 0 && notCollection === 0) return true;
  if (notCollection > 0 && collection === 0) return false;

  return metadata
    .getAssociationsTargeting(join.table)
    .some((association) => association.cardinality === 'ONE_TO_MANY' || association.cardinality === 'MANY_TO_MANY');
}

/**
 * Nullability of the association the ON clause follows; null when no
 * association's join columns are all present in the condition
 */
export function isJoinNullable(
  sql: string,
  context: AnalysisContext,
  metadata: CachedMetadataProvider,
  main: TableReference,
  join: JoinFact
): boolean | null {
  if (join.onClause === null) return null;

  const onColumns = new Set<string>();
  for (const condition of context.cache.extractor.extractJoinOnConditions(sql, join.table)) {
    onColumns.add(columnName(condition.left));
    onColumns.add(columnName(condition.right));
  }
  for (const match of join.onClause.matchAll(/(?:\w+\.)?(\w+)\s*=/g)) {
    if (match[1] !== undefined) onColumns.add(match[1].toLowerCase());
  }

  const candidates: AssociationFact[] = [
    ...metadata.getAssociations(main.table),
    ...metadata.getAssociations(join.table),
  ];

  let best: AssociationFact | null = null;
  for (const association of candidates) {
    if (association.joinColumns.length === 0) continue;
    const allPresent = association.joinColumns.every((column) => onColumns.has(column.name.toLowerCase()));
    if (!allPresent) continue;
    if (best === null || association.joinColumns.length > best.joinColumns.length) best = association;
  }

  if (best === null) return null;
  return best.joinColumns.some((column) => column.nullable);
}

// ============================================================================
// Helpers
// ============================================================================

function columnName(column: string): string {
  const dot = column.lastIndexOf('.');
  return (dot === -1 ? column : column.slice(dot + 1)).toLowerCase();
}

function tableOfColumn(column: string, tables: readonly SourceTable[]): string | null {
  const dot = column.lastIndexOf('.');
  if (dot === -1) return null;
  const qualifier = column.slice(0, dot).toLowerCase();
  const source = tables.find(
    (table) => table.alias?.toLowerCase() === qualifier || table.table.toLowerCase() === qualifier
  );
  return source?.table ?? null;
}

function lowered(columns: readonly string[]): string[] {
  return columns.map((column) => column.toLowerCase());
}
