/**
 * @module cli/commands/analyze.test
 * @description Tests for option validation and exit codes of the analyze command
 * @status COMPLETE
 * @dependencies src/cli/commands/analyze.ts
 */

import { describe, it, expect } from 'vitest';
import { silentLogger } from '../../logging/logger';
import type { OutputReport } from '../../output';
import { executeAnalyze, type AnalyzeInputs } from './analyze';

// ============================================================================
// Test Helpers
// ============================================================================

const TRACE = JSON.stringify({
  queries: [
    { sql: 'SELECT * FROM orders ORDER BY created_at', executionTimeMs: 150, rowCount: 10 },
    { sql: 'SELECT * FROM users', executionTimeMs: 2, rowCount: 150 },
  ],
});

function run(inputs: AnalyzeInputs, options: Parameters<typeof executeAnalyze>[1] = {}) {
  return executeAnalyze(inputs, options, silentLogger);
}

function report(output: string): OutputReport {
  const parsed: OutputReport = JSON.parse(output);
  return parsed;
}

// ============================================================================
// Tests
// ============================================================================

describe('executeAnalyze', () => {
  it('renders JSON reports', () => {
    const outcome = run({ trace: TRACE }, { format: 'json' });

    expect(outcome.exitCode).toBe(0);
    expect(report(outcome.output).issues.map((issue) => issue.type)).toEqual(['slow_query', 'find_all']);
  });

  it('renders text reports by default', () => {
    const outcome = run({ trace: TRACE });

    expect(outcome.exitCode).toBe(0);
    expect(outcome.output.split('\n')[0]).toBe('Query Analysis Report');
  });

  it('filters by severity and type, case-insensitively', () => {
    expect(report(run({ trace: TRACE }, { format: 'json', severity: 'critical' }).output).total).toBe(1);
    expect(
      report(run({ trace: TRACE }, { format: 'json', type: 'FIND_ALL' }).output).issues.map((issue) => issue.type)
    ).toEqual(['find_all']);
  });

  it('limits printed issues', () => {
    const parsed = report(run({ trace: TRACE }, { format: 'json', limit: '1' }).output);

    expect(parsed.issues).toHaveLength(1);
    expect(parsed.total).toBe(2);
  });

  it('exits with 2 when an issue reaches the fail-on severity', () => {
    expect(run({ trace: TRACE }, { failOn: 'warning' }).exitCode).toBe(2);
  });

  it('exits with 0 when no issue reaches the fail-on severity', () => {
    const trace = JSON.stringify([{ sql: 'SELECT * FROM users', rowCount: 100 }]);

    expect(run({ trace }, { failOn: 'warning' }).exitCode).toBe(0);
  });

  describe('invalid input', () => {
    it('rejects unknown options', () => {
      expect(run({ trace: TRACE }, { format: 'xml' })).toEqual({ output: 'Unknown format: xml', exitCode: 1 });
      expect(run({ trace: TRACE }, { severity: 'urgent' })).toEqual({
        output: 'Unknown severity: urgent',
        exitCode: 1,
      });
      expect(run({ trace: TRACE }, { type: 'foo' })).toEqual({ output: 'Unknown issue type: foo', exitCode: 1 });
      expect(run({ trace: TRACE }, { limit: '0' })).toEqual({ output: 'Invalid limit: 0', exitCode: 1 });
    });

    it('reports a malformed trace', () => {
      expect(run({ trace: '{oops' })).toEqual({
        output: 'Trace error: Trace document is not valid JSON',
        exitCode: 1,
      });
    });

    it('reports invalid metadata', () => {
      const outcome = run({ trace: TRACE, metadata: JSON.stringify({ tables: 3 }) });

      expect(outcome.exitCode).toBe(1);
      expect(outcome.output.startsWith('Metadata error: Metadata document is invalid')).toBe(true);
    });

    it('reports an invalid configuration', () => {
      const outcome = run({ trace: TRACE, config: JSON.stringify({ slowQuery: { thresholdMs: 0 } }) });

      expect(outcome.exitCode).toBe(1);
      expect(outcome.output.startsWith('Config error: Invalid analyzer configuration')).toBe(true);
    });

    it('reports a configuration that is not JSON', () => {
      const outcome = run({ trace: TRACE, config: 'nope' });

      expect(outcome.exitCode).toBe(1);
      expect(outcome.output.startsWith('Config error: ')).toBe(true);
    });
  });
});
