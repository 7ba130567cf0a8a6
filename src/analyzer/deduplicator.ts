/**
 * @module analyzer/deduplicator
 * @description Merges issues from different analyzers that describe the same root cause
 * @status COMPLETE
 * @dependencies src/analyzer/issue-builder.ts, src/sql/normalizer.ts, src/constants.ts
 */

import { DEDUP_PRIORITY } from '../constants';
import { normalizeQuery } from '../sql/normalizer';
import type { Issue, IssueDetails, IssueType } from '../types/issues';
import { withDuplicates } from './issue-builder';
import { compareSeverity } from './severity';

// ============================================================================
// Ontology
// ============================================================================

/**
 * Types that all describe one query repeated in a loop
 */
const REPEATED_QUERY_FAMILY: ReadonlySet<IssueType> = new Set<IssueType>(['n_plus_one', 'lazy_loading', 'frequent_query']);

function familyOf(type: IssueType): string {
  return REPEATED_QUERY_FAMILY.has(type) ? 'repeated_query' : type;
}

export function dedupPriority(type: IssueType): number {
  switch (type) {
    case 'n_plus_one':
      return DEDUP_PRIORITY.n_plus_one;
    case 'lazy_loading':
      return DEDUP_PRIORITY.lazy_loading;
    case 'frequent_query':
      return DEDUP_PRIORITY.frequent_query;
    default:
      return DEDUP_PRIORITY.DEFAULT;
  }
}

// ============================================================================
// Deduplication
// ============================================================================

/**
 * Equality key: family plus the sorted, distinct normalized SQL of the
 * affected queries. Outside the repeated-query family the issue details
 * are part of the key, so two findings of one analyzer on one query (two
 * unused joins, two LIKE patterns) stay apart. Null for issues without
 * queries, which never merge.
 */
export function dedupKey(issue: Issue, normalize: (sql: string) => string = normalizeQuery): string | null {
  if (issue.queries.length === 0) return null;
  const patterns = [...new Set(issue.queries.map((query) => normalize(query.sql)))].sort();
  const key = `${familyOf(issue.type)}\n${patterns.join('\n')}`;
  return REPEATED_QUERY_FAMILY.has(issue.type) ? key : `${key}\n${detailsKey(issue.details)}`;
}

function detailsKey(details: IssueDetails): string {
  const entries = Object.keys(details)
    .sort()
    .map((name) => [name, details[name] ?? null]);
  return JSON.stringify(entries);
}

/**
 * Whether `candidate` should replace `current` as the representative
 */
function outranks(candidate: Issue, current: Issue): boolean {
  const byType = dedupPriority(candidate.type) - dedupPriority(current.type);
  if (byType !== 0) return byType > 0;
  return compareSeverity(candidate.severity, current.severity) > 0;
}

/**
 * Keep one representative per key, in first-seen order of the key.
 * Suppressed issues, and the duplicates they already carried, are attached
 * to the representative.
 *
 * @example
 * const kept = deduplicate([lazyIssue, nPlusOneIssue]);
 * // [nPlusOneIssue with duplicatedIssues: [lazyIssue]]
 */
export function deduplicate(
  issues: readonly Issue[],
  normalize: (sql: string) => string = normalizeQuery
): Issue[] {
  const slots: Array<{ winner: Issue; losers: Issue[] }> = [];
  const slotByKey = new Map<string, number>();

  for (const issue of issues) {
    const key = dedupKey(issue, normalize);
    const existing = key === null ? undefined : slotByKey.get(key);
    const slot = existing === undefined ? undefined : slots[existing];

    if (key === null || slot === undefined) {
      if (key !== null) slotByKey.set(key, slots.length);
      slots.push({ winner: issue, losers: [] });
      continue;
    }

    if (outranks(issue, slot.winner)) {
      slot.losers.push(slot.winner);
      slot.winner = issue;
    } else {
      slot.losers.push(issue);
    }
  }

  return slots.map(({ winner, losers }) => {
    if (losers.length === 0) return winner;
    const absorbed: Issue[] = [...winner.duplicatedIssues];
    for (const loser of losers) {
      absorbed.push(withDuplicates(loser, []), ...loser.duplicatedIssues);
    }
    return withDuplicates(winner, absorbed);
  });
}
