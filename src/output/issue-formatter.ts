/**
 * @module output/issue-formatter
 * @description Format analysis results for JSON and terminal output
 * @status COMPLETE
 * @dependencies src/analyzer/index.ts, src/constants.ts
 */

import type { AnalysisResult } from '../analyzer';
import { DISPLAY_LIMITS, STATUS_INDICATORS } from '../constants';
import type { Issue, IssueDetails, IssueSeverity } from '../types/issues';

// ============================================================================
// Types
// ============================================================================

export interface OutputQuery {
  index: number;
  sql: string;
  executionTimeMs: number;
}

/**
 * Flattened issue for JSON output
 */
export interface OutputIssue {
  id: string;
  type: string;
  category: string;
  severity: IssueSeverity;
  title: string;
  description: string;
  /** `file:line` of the innermost frame */
  location: string | null;
  queries: OutputQuery[];
  details: IssueDetails;
  suggestion: string | null;
  duplicates: number;
}

export interface OutputReport {
  queryCount: number;
  summary: AnalysisResult['summary'];
  /** Issues before --limit was applied */
  total: number;
  issues: OutputIssue[];
}

// ============================================================================
// Issue Formatting
// ============================================================================

/**
 * Format single issue for output
 */
export function formatIssue(issue: Issue): OutputIssue {
  const frame = issue.backtrace?.[0];
  return {
    id: issue.id,
    type: issue.type,
    category: issue.category,
    severity: issue.severity,
    title: issue.title,
    description: issue.description,
    location: frame ? `${frame.file}:${frame.line}` : null,
    queries: issue.queries.map((query) => ({
      index: query.index,
      sql: query.sql,
      executionTimeMs: query.executionTimeMs,
    })),
    details: issue.details,
    suggestion: issue.suggestion?.title ?? null,
    duplicates: issue.duplicatedIssues.length,
  };
}

export function formatReportJson(result: AnalysisResult, issues: readonly Issue[]): OutputReport {
  return {
    queryCount: result.metadata.queryCount,
    summary: result.summary,
    total: result.issues.length,
    issues: issues.map(formatIssue),
  };
}

// ============================================================================
// Text Formatting
// ============================================================================

/**
 * Human-readable report; `issues` is the (possibly limited) list to print
 */
export function formatReportText(result: AnalysisResult, issues: readonly Issue[]): string {
  const { summary } = result;
  const lines: string[] = [
    'Query Analysis Report',
    '=====================',
    `Queries analyzed: ${result.metadata.queryCount}`,
    `Health score: ${summary.healthScore}/100`,
    `Issues: ${summary.totalCount} (${summary.criticalCount} critical, ${summary.warningCount} warning, ${summary.infoCount} info)`,
  ];
  if (summary.primaryConcern !== null) lines.push(`Assessment: ${summary.primaryConcern}`);
  lines.push('');

  if (issues.length === 0) {
    lines.push(`${STATUS_INDICATORS.OK} No issues detected.`);
    return lines.join('\n');
  }

  issues.forEach((issue, i) => formatIssueText(issue, i + 1, lines));
  if (issues.length < result.issues.length) {
    lines.push(`... ${result.issues.length - issues.length} more issue(s) not shown`);
  }
  return lines.join('\n');
}

function formatIssueText(issue: Issue, position: number, lines: string[]): void {
  lines.push(`${position}. ${STATUS_INDICATORS[issue.severity]} [${issue.severity}] ${issue.title}`);
  lines.push(`   ${issue.description}`);

  const frame = issue.backtrace?.[0];
  if (frame) lines.push(`   at ${frame.file}:${frame.line}`);

  for (const query of issue.queries.slice(0, DISPLAY_LIMITS.QUERIES_PER_ISSUE)) {
    lines.push(`   #${query.index} ${truncate(query.sql.replace(/\s+/g, ' ').trim())}`);
  }
  if (issue.queries.length > DISPLAY_LIMITS.QUERIES_PER_ISSUE) {
    lines.push(`   (+${issue.queries.length - DISPLAY_LIMITS.QUERIES_PER_ISSUE} more queries)`);
  }
  if (issue.suggestion) lines.push(`   Fix: ${issue.suggestion.title}`);
  if (issue.duplicatedIssues.length > 0) {
    lines.push(`   Also reported as: ${issue.duplicatedIssues.map((d) => d.type).join(', ')}`);
  }
  lines.push('');
}

function truncate(sql: string): string {
  return sql.length > DISPLAY_LIMITS.SQL_PREVIEW_CHARS ? `${sql.slice(0, DISPLAY_LIMITS.SQL_PREVIEW_CHARS)}...` : sql;
}
