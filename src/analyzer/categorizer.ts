/**
 * @module analyzer/categorizer
 * @description Groups, scores and orders issues for presentation
 * @status COMPLETE
 * @dependencies src/types/issues.ts
 */

import {
  SEVERITY_PRIORITY,
  type Issue,
  type IssueCategory,
  type IssueDetectionResult,
  type IssueSeverity,
  type IssueSummary,
} from '../types/issues';

// ============================================================================
// Issue Categorization
// ============================================================================

/**
 * Categorize and prioritize detected issues
 *
 * This function:
 * 1. Groups issues by category and severity
 * 2. Calculates an overall health score
 * 3. Generates a summary
 * 4. Orders issues by severity, then capture order
 */
export function categorizeIssues(issues: readonly Issue[]): IssueDetectionResult {
  const sortedIssues = prioritizeIssues(issues);
  const healthScore = calculateHealthScore(sortedIssues);

  return {
    issues: sortedIssues,
    byCategory: groupByCategory(sortedIssues),
    bySeverity: groupBySeverity(sortedIssues),
    summary: generateSummary(sortedIssues, healthScore),
  };
}

// ============================================================================
// Grouping Functions
// ============================================================================

function groupByCategory(issues: readonly Issue[]): Record<IssueCategory, Issue[]> {
  const result: Record<IssueCategory, Issue[]> = {
    PERFORMANCE: [],
    SECURITY: [],
    INTEGRITY: [],
    MEMORY: [],
  };

  for (const issue of issues) {
    result[issue.category].push(issue);
  }

  return result;
}

function groupBySeverity(issues: readonly Issue[]): Record<IssueSeverity, Issue[]> {
  const result: Record<IssueSeverity, Issue[]> = {
    CRITICAL: [],
    WARNING: [],
    INFO: [],
  };

  for (const issue of issues) {
    result[issue.severity].push(issue);
  }

  return result;
}

// ============================================================================
// Health Score Calculation
// ============================================================================

const DEDUCTIONS: Record<IssueSeverity, number> = {
  CRITICAL: 25,
  WARNING: 10,
  INFO: 2,
};

/**
 * Calculate overall health score (0-100)
 *
 * Scoring logic:
 * - Start at 100
 * - Deduct points for each issue based on severity
 * - Each further issue of the same type deducts 30% less than the previous one
 * - Floor at 0
 */
export function calculateHealthScore(issues: readonly Issue[]): number {
  if (issues.length === 0) return 100;

  let score = 100;
  const seenByType = new Map<string, number>();

  for (const issue of issues) {
    const previous = seenByType.get(issue.type) ?? 0;
    seenByType.set(issue.type, previous + 1);
    score -= DEDUCTIONS[issue.severity] * Math.pow(0.7, previous);
  }

  return Math.max(0, Math.min(100, Math.round(score)));
}

// ============================================================================
// Summary Generation
// ============================================================================

function generateSummary(issues: readonly Issue[], healthScore: number): IssueSummary {
  const counts: Record<IssueSeverity, number> = { CRITICAL: 0, WARNING: 0, INFO: 0 };
  let duplicateCount = 0;

  for (const issue of issues) {
    counts[issue.severity]++;
    duplicateCount += issue.duplicatedIssues.length;
  }

  return {
    totalCount: issues.length,
    criticalCount: counts.CRITICAL,
    warningCount: counts.WARNING,
    infoCount: counts.INFO,
    duplicateCount,
    healthScore,
    primaryConcern: primaryConcern(issues, healthScore, counts),
  };
}

/**
 * One line naming the overall state and the worst category
 */
function primaryConcern(
  issues: readonly Issue[],
  healthScore: number,
  counts: Record<IssueSeverity, number>
): string | null {
  if (issues.length === 0) return null;

  const parts: string[] = [];
  if (healthScore >= 80) {
    parts.push('Mostly healthy');
  } else if (healthScore >= 60) {
    parts.push('Some concerns');
  } else if (healthScore >= 40) {
    parts.push('Significant issues');
  } else {
    parts.push('Critical problems');
  }

  if (counts.CRITICAL > 0) {
    parts.push(`${counts.CRITICAL} critical issue${counts.CRITICAL > 1 ? 's' : ''}`);
  }

  const byCategory = new Map<IssueCategory, number>();
  for (const issue of issues) {
    byCategory.set(issue.category, (byCategory.get(issue.category) ?? 0) + 1);
  }
  let top: IssueCategory | null = null;
  for (const [category, count] of byCategory) {
    if (top === null || count > (byCategory.get(top) ?? 0)) top = category;
  }
  if (top !== null) parts.push(`primary: ${top.toLowerCase()}`);

  return parts.join(' - ');
}

// ============================================================================
// Issue Prioritization
// ============================================================================

/**
 * Severity first, then the capture position of the first affected query.
 * Issues without queries keep their relative order after equal-severity ones.
 */
export function prioritizeIssues(issues: readonly Issue[]): Issue[] {
  return [...issues].sort((a, b) => {
    const severityDiff = SEVERITY_PRIORITY[b.severity] - SEVERITY_PRIORITY[a.severity];
    if (severityDiff !== 0) return severityDiff;
    return firstPosition(a) - firstPosition(b);
  });
}

function firstPosition(issue: Issue): number {
  return issue.queries[0]?.index ?? Number.MAX_SAFE_INTEGER;
}

// ============================================================================
// Additional Categorization Utilities
// ============================================================================

/**
 * Filter issues by minimum severity
 */
export function filterBySeverity(issues: readonly Issue[], minSeverity: IssueSeverity): Issue[] {
  const minimum = SEVERITY_PRIORITY[minSeverity];
  return issues.filter((issue) => SEVERITY_PRIORITY[issue.severity] >= minimum);
}

export function getByCategory(issues: readonly Issue[], category: IssueCategory): Issue[] {
  return issues.filter((issue) => issue.category === category);
}
