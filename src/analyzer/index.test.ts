/**
 * @module analyzer/index.test
 * @description Integration tests for the analysis pipeline
 * @status COMPLETE
 * @dependencies src/analyzer/index.ts
 */

import { describe, it, expect } from 'vitest';
import { silentLogger } from '../logging/logger';
import { QueryTrace, type QueryRecordInput } from '../trace';
import { InvalidConfigurationError, type Logger } from '../types/common';
import type { Issue } from '../types/issues';
import { analyzeTrace, createDefaultAnalyzers, selectAnalyzers, type QueryAnalyzer } from './index';

// ============================================================================
// Test Helpers
// ============================================================================

function repeatedLoads(count: number): QueryRecordInput[] {
  return Array.from({ length: count }, () => ({ sql: 'SELECT * FROM users WHERE id = ?', executionTimeMs: 1 }));
}

function recordingLogger(): { logger: Logger; warnings: string[] } {
  const warnings: string[] = [];
  const noop = (): void => undefined;
  return {
    warnings,
    logger: { debug: noop, info: noop, warn: (message) => warnings.push(message), error: noop },
  };
}

const failingAnalyzer: QueryAnalyzer = {
  name: 'boom',
  detects: [],
  *analyze(): IterableIterator<Issue> {
    throw new Error('kaboom');
  },
};

// ============================================================================
// Tests
// ============================================================================

describe('analyzeTrace', () => {
  it('merges the repeated-query family into one N+1 issue', () => {
    const result = analyzeTrace(QueryTrace.fromInputs(repeatedLoads(20)), { logger: silentLogger });

    expect(result.issues.map((issue) => issue.type)).toEqual(['n_plus_one']);
    expect(result.issues[0]?.severity).toBe('WARNING');
    expect(result.issues[0]?.duplicatedIssues.map((issue) => issue.type)).toEqual(['lazy_loading', 'frequent_query']);
    expect(result.summary.duplicateCount).toBe(2);
    expect(result.summary.healthScore).toBe(90);
    expect(result.metadata.rawIssueCount).toBe(3);
    expect(result.metadata.queryCount).toBe(20);
    expect(result.metadata.analyzersFailed).toEqual([]);
    expect(result.metadata.analyzersRun).toHaveLength(12);
  });

  it('keeps overlapping issues when deduplication is off', () => {
    const result = analyzeTrace(QueryTrace.fromInputs(repeatedLoads(20)), {
      logger: silentLogger,
      deduplicate: false,
    });

    expect(result.issues.map((issue) => issue.type)).toEqual(['n_plus_one', 'lazy_loading', 'frequent_query']);
  });

  it('produces the same issue ids on every run', () => {
    const trace = QueryTrace.fromInputs(repeatedLoads(20));

    const first = analyzeTrace(trace, { logger: silentLogger }).issues.map((issue) => issue.id);
    const second = analyzeTrace(trace, { logger: silentLogger }).issues.map((issue) => issue.id);

    expect(first).toEqual(second);
  });

  it('logs a failing analyzer and keeps going', () => {
    const { logger, warnings } = recordingLogger();
    const analyzers = [failingAnalyzer, ...createDefaultAnalyzers()];

    const result = analyzeTrace(QueryTrace.fromInputs(repeatedLoads(20)), { analyzers, logger });

    expect(result.metadata.analyzersFailed).toEqual(['boom']);
    expect(warnings).toEqual(['Analyzer boom failed']);
    expect(result.issues.map((issue) => issue.type)).toEqual(['n_plus_one']);
  });

  it('keeps separate unused joins on one query', () => {
    const trace = QueryTrace.fromInputs([{ sql: 'SELECT a.id FROM a JOIN b ON a.id = b.a_id JOIN c ON a.id = c.a_id' }]);

    const result = analyzeTrace(trace, { logger: silentLogger, enabledAnalyzers: ['join-optimization'] });

    expect(result.issues.map((issue) => issue.details['table'])).toEqual(['b', 'c']);
    expect(result.summary.duplicateCount).toBe(0);
  });

  it('keeps separate LIKE patterns on one query', () => {
    const trace = QueryTrace.fromInputs([
      { sql: "SELECT * FROM t WHERE x LIKE '%a' OR y LIKE '%b'", executionTimeMs: 20 },
    ]);

    const result = analyzeTrace(trace, { logger: silentLogger, enabledAnalyzers: ['ineffective-like'] });

    expect(result.issues.map((issue) => issue.details['pattern'])).toEqual(['%a', '%b']);
  });

  it('runs only the enabled analyzers', () => {
    const inputs = [...repeatedLoads(20), { sql: 'SELECT * FROM reports WHERE id = 1', executionTimeMs: 250 }];

    const result = analyzeTrace(QueryTrace.fromInputs(inputs), {
      logger: silentLogger,
      enabledAnalyzers: ['slow-query'],
    });

    expect(result.metadata.analyzersRun).toEqual(['slow-query']);
    expect(result.issues.map((issue) => issue.type)).toEqual(['slow_query']);
  });

  it('skips disabled analyzers from the config and the options', () => {
    const result = analyzeTrace(QueryTrace.fromInputs(repeatedLoads(20)), {
      logger: silentLogger,
      config: { disabledAnalyzers: ['n-plus-one'] },
      disabledAnalyzers: ['lazy-loading'],
    });

    expect(result.issues.map((issue) => issue.type)).toEqual(['frequent_query']);
  });

  it('drops queries from excluded paths', () => {
    const inputs = repeatedLoads(20).map((input) => ({
      ...input,
      backtrace: [{ file: 'vendor/orm/Loader.ts', line: 10 }],
    }));

    const result = analyzeTrace(QueryTrace.fromInputs(inputs), {
      logger: silentLogger,
      config: { excludePaths: ['vendor/'] },
    });

    expect(result.metadata.queryCount).toBe(0);
    expect(result.issues).toEqual([]);
  });

  it('filters by minimum severity and issue type', () => {
    const trace = QueryTrace.fromInputs(repeatedLoads(20));

    expect(
      analyzeTrace(trace, { logger: silentLogger, deduplicate: false, minSeverity: 'WARNING' }).issues.map(
        (issue) => issue.type
      )
    ).toEqual(['n_plus_one', 'lazy_loading']);
    expect(
      analyzeTrace(trace, { logger: silentLogger, deduplicate: false, issueTypes: ['frequent_query'] }).issues.map(
        (issue) => issue.type
      )
    ).toEqual(['frequent_query']);
  });

  it('rejects an invalid configuration', () => {
    expect(() =>
      analyzeTrace(QueryTrace.empty(), { logger: silentLogger, config: { slowQuery: { thresholdMs: 0 } } })
    ).toThrow(InvalidConfigurationError);
  });

  it('scores an empty trace as healthy', () => {
    const result = analyzeTrace(QueryTrace.empty(), { logger: silentLogger });

    expect(result.issues).toEqual([]);
    expect(result.summary.healthScore).toBe(100);
    expect(result.summary.primaryConcern).toBeNull();
  });
});

describe('selectAnalyzers', () => {
  it('applies the enabled list, then the disabled list', () => {
    const names = selectAnalyzers(createDefaultAnalyzers(), {
      enabled: ['slow-query', 'find-all'],
      disabled: ['find-all'],
    }).map((analyzer) => analyzer.name);

    expect(names).toEqual(['slow-query']);
  });

  it('keeps every analyzer without lists', () => {
    expect(selectAnalyzers(createDefaultAnalyzers(), {})).toHaveLength(12);
  });
});
