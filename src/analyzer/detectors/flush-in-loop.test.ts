/**
 * @module analyzer/detectors/flush-in-loop.test
 * @description Unit tests for flush-per-iteration detection
 * @status COMPLETE
 * @dependencies src/analyzer/detectors/flush-in-loop.ts
 */

import { describe, it, expect } from 'vitest';
import { QueryTrace, type QueryRecordInput } from '../../trace';
import { createAnalysisContext } from '../context';
import { createFlushInLoopAnalyzer, findFlushGroups } from './flush-in-loop';

// ============================================================================
// Test Helpers
// ============================================================================

const INSERT = 'INSERT INTO order_lines (order_id, sku) VALUES (?, ?)';
const SELECT = 'SELECT * FROM products WHERE id = ?';

/**
 * `iterations` repetitions of `inserts` INSERTs followed by one SELECT
 */
function loop(iterations: number, inserts = 2): QueryTrace {
  const inputs: QueryRecordInput[] = [];
  for (let i = 0; i < iterations; i++) {
    for (let j = 0; j < inserts; j++) inputs.push({ sql: INSERT });
    inputs.push({ sql: SELECT });
  }
  return QueryTrace.fromInputs(inputs);
}

// ============================================================================
// Tests
// ============================================================================

describe('findFlushGroups', () => {
  it('starts groups at the first boundary', () => {
    expect(findFlushGroups(loop(2))).toEqual([{ start: 1, end: 4, operations: 2 }]);
  });

  it('splits on a change of calling line', () => {
    const trace = QueryTrace.fromInputs(
      [10, 10, 20, 20, 10].map((line) => ({
        sql: 'UPDATE stock SET qty = qty - 1 WHERE id = ?',
        backtrace: [{ file: 'src/import.ts', line }],
      }))
    );

    expect(findFlushGroups(trace)).toEqual([{ start: 1, end: 3, operations: 2 }]);
  });

  it('finds nothing in a read-only trace', () => {
    expect(findFlushGroups(QueryTrace.fromInputs([{ sql: SELECT }, { sql: SELECT }]))).toEqual([]);
  });
});

describe('createFlushInLoopAnalyzer', () => {
  it('reports many small flush groups', () => {
    const [issue, ...rest] = [...createFlushInLoopAnalyzer().analyze(loop(6), createAnalysisContext())];

    expect(rest).toHaveLength(0);
    expect(issue?.severity).toBe('WARNING');
    expect(issue?.title).toBe('Performance Anti-Pattern: 5 flush() calls in loop');
    expect(issue?.details).toEqual({
      flush_count: 5,
      average_operations: 2,
      total_operations: 10,
      threshold: 5,
    });
    expect(issue?.queries).toHaveLength(16);
    expect(issue?.queries[0]?.index).toBe(1);
  });

  it('takes its severity from the batching suggestion', () => {
    const [issue] = [...createFlushInLoopAnalyzer().analyze(loop(52), createAnalysisContext())];

    expect(issue?.details['flush_count']).toBe(51);
    expect(issue?.severity).toBe('CRITICAL');
    expect(issue?.suggestion?.severity).toBe('CRITICAL');
  });

  it('ignores fewer groups than the threshold', () => {
    expect([...createFlushInLoopAnalyzer().analyze(loop(5), createAnalysisContext())]).toEqual([]);
  });

  it('ignores groups that already batch their writes', () => {
    expect([...createFlushInLoopAnalyzer().analyze(loop(6, 11), createAnalysisContext())]).toEqual([]);
  });
});
