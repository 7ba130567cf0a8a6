/**
 * @module output/issue-formatter.test
 * @description Unit tests for JSON and text report formatting
 * @status COMPLETE
 * @dependencies src/output/issue-formatter.ts
 */

import { describe, it, expect } from 'vitest';
import { analyzeTrace, type AnalysisResult } from '../analyzer';
import { silentLogger } from '../logging/logger';
import { QueryTrace } from '../trace';
import { formatIssue, formatReportJson, formatReportText } from './issue-formatter';

// ============================================================================
// Test Helpers
// ============================================================================

const SLOW_SQL = 'SELECT * FROM orders ORDER BY created_at';

function slowQueryResult(): AnalysisResult {
  const trace = QueryTrace.fromInputs([
    {
      sql: SLOW_SQL,
      executionTimeMs: 150,
      rowCount: 10,
      backtrace: [{ file: 'src/report.ts', line: 42 }],
    },
  ]);
  return analyzeTrace(trace, { logger: silentLogger });
}

function twoIssueResult(): AnalysisResult {
  const trace = QueryTrace.fromInputs([
    { sql: SLOW_SQL, executionTimeMs: 150, rowCount: 10 },
    { sql: 'SELECT * FROM users', executionTimeMs: 2, rowCount: 150 },
  ]);
  return analyzeTrace(trace, { logger: silentLogger });
}

// ============================================================================
// Tests
// ============================================================================

describe('formatReportText', () => {
  it('renders an empty report', () => {
    const result = analyzeTrace(QueryTrace.empty(), { logger: silentLogger });

    expect(formatReportText(result, result.issues)).toBe(
      [
        'Query Analysis Report',
        '=====================',
        'Queries analyzed: 0',
        'Health score: 100/100',
        'Issues: 0 (0 critical, 0 warning, 0 info)',
        '',
        '🟢 No issues detected.',
      ].join('\n')
    );
  });

  it('renders each issue with location, queries and fix', () => {
    const result = slowQueryResult();

    expect(formatReportText(result, result.issues)).toBe(
      [
        'Query Analysis Report',
        '=====================',
        'Queries analyzed: 1',
        'Health score: 75/100',
        'Issues: 1 (1 critical, 0 warning, 0 info)',
        'Assessment: Some concerns - 1 critical issue - primary: performance',
        '',
        '1. 🔴 [CRITICAL] Slow Query: 150.00ms',
        '   Query took 150.00ms (threshold: 100ms). Index the ORDER BY columns (created_at) to avoid a filesort.',
        '   at src/report.ts:42',
        `   #0 ${SLOW_SQL}`,
        '   Fix: Optimize the slow query',
        '',
      ].join('\n')
    );
  });

  it('notes issues left out by a limit', () => {
    const result = twoIssueResult();

    const lines = formatReportText(result, result.issues.slice(0, 1)).split('\n');

    expect(lines[lines.length - 1]).toBe('... 1 more issue(s) not shown');
  });
});

describe('formatIssue', () => {
  it('flattens an issue for JSON output', () => {
    const [issue] = slowQueryResult().issues;
    if (issue === undefined) throw new Error('expected an issue');

    expect(formatIssue(issue)).toEqual({
      id: issue.id,
      type: 'slow_query',
      category: 'PERFORMANCE',
      severity: 'CRITICAL',
      title: 'Slow Query: 150.00ms',
      description: issue.description,
      location: 'src/report.ts:42',
      queries: [{ index: 0, sql: SLOW_SQL, executionTimeMs: 150 }],
      details: { execution_time_ms: 150, threshold_ms: 100, query: SLOW_SQL },
      suggestion: 'Optimize the slow query',
      duplicates: 0,
    });
  });
});

describe('formatReportJson', () => {
  it('reports the total before the limit', () => {
    const result = twoIssueResult();

    const report = formatReportJson(result, result.issues.slice(0, 1));

    expect(report.queryCount).toBe(2);
    expect(report.total).toBe(2);
    expect(report.issues.map((issue) => issue.type)).toEqual(['slow_query']);
    expect(report.summary.warningCount).toBe(1);
  });
});
