/**
 * @module types/issues
 * @description Type definitions for issues detected in query traces
 * @status COMPLETE
 * @dependencies src/types/query.ts
 */

import type { BacktraceFrame, QueryRecord } from './query';

// ============================================================================
// Issue Categories
// ============================================================================

/**
 * High-level issue categories for grouping
 */
export type IssueCategory =
  | 'PERFORMANCE' // slow queries, joins, pagination
  | 'SECURITY' // injection risk
  | 'INTEGRITY' // silent data loss
  | 'MEMORY'; // unit-of-work growth

/**
 * Specific issue types
 */
export const ISSUE_TYPES = [
  // Loading strategy
  'eager_loading',
  'lazy_loading',
  'n_plus_one',
  'frequent_query',
  // Joins
  'join_too_many',
  'join_suboptimal_left',
  'join_unused',
  'join_multi_step_hydration',
  // Reads
  'find_all',
  'slow_query',
  'ineffective_like',
  'limit_with_collection_join',
  // Writes
  'flush_in_loop',
  'batch_without_clear',
  // Security
  'sql_injection',
] as const;

export type IssueType = (typeof ISSUE_TYPES)[number];

// ============================================================================
// Issue Severity
// ============================================================================

export const ISSUE_SEVERITIES = [
  'CRITICAL', // Immediate action needed
  'WARNING', // Should fix
  'INFO', // Informational only
] as const;

export type IssueSeverity = (typeof ISSUE_SEVERITIES)[number];

/**
 * Ordering weight of each severity
 */
export const SEVERITY_PRIORITY: Record<IssueSeverity, number> = {
  CRITICAL: 3,
  WARNING: 2,
  INFO: 1,
};

// ============================================================================
// Suggestions
// ============================================================================

export type SuggestionKind = 'performance' | 'security' | 'integrity' | 'memory';

/**
 * Content block of a suggestion; rendering is left to the consumer
 */
export type SuggestionBlock =
  | { kind: 'text'; content: string }
  | { kind: 'code'; language: 'sql' | 'text'; content: string }
  | { kind: 'list'; items: readonly string[] };

export interface Suggestion {
  title: string;
  severity: IssueSeverity;
  kind: SuggestionKind;
  tags: readonly string[];
  blocks: readonly SuggestionBlock[];
}

// ============================================================================
// Core Issue Interface
// ============================================================================

/**
 * Analyzer-specific payload value
 */
export type IssueDetailValue = string | number | boolean | null | readonly string[];

export type IssueDetails = Readonly<Record<string, IssueDetailValue>>;

/**
 * Represents a detected issue in the trace
 *
 * @example
 * const issue: Issue = {
 *   id: 'join_unused-3f2a9c01b7de',
 *   type: 'join_unused',
 *   category: 'PERFORMANCE',
 *   severity: 'WARNING',
 *   title: 'Unused JOIN Detected',
 *   description: "Query performs LEFT JOIN on table 'tags' (alias 't') but never uses it. ...",
 *   suggestion: { ... },
 *   queries: [record],
 *   backtrace: null,
 *   details: { table: 'tags', alias: 't', join_type: 'LEFT' },
 *   duplicatedIssues: [],
 * };
 */
export interface Issue {
  /** Deterministic ID derived from type, title and affected SQL */
  readonly id: string;
  readonly type: IssueType;
  readonly category: IssueCategory;
  readonly severity: IssueSeverity;
  /** Short title for display */
  readonly title: string;
  /** Detailed description */
  readonly description: string;
  readonly suggestion: Suggestion | null;
  /** Affected queries in capture order */
  readonly queries: readonly QueryRecord[];
  readonly backtrace: readonly BacktraceFrame[] | null;
  readonly details: IssueDetails;
  /** Overlapping issues merged into this one by the deduplicator */
  readonly duplicatedIssues: readonly Issue[];
}

// ============================================================================
// Detection Result
// ============================================================================

export interface IssueSummary {
  totalCount: number;
  criticalCount: number;
  warningCount: number;
  infoCount: number;
  /** Issues suppressed as duplicates of a kept issue */
  duplicateCount: number;
  /** 0-100, 100 meaning no issues */
  healthScore: number;
  /** One-line description of the worst findings */
  primaryConcern: string | null;
}

export interface IssueDetectionResult {
  /** Issues ordered by severity, then capture order */
  issues: Issue[];
  byCategory: Record<IssueCategory, Issue[]>;
  bySeverity: Record<IssueSeverity, Issue[]>;
  summary: IssueSummary;
}
