/**
 * @module trace/trace-document.test
 * @description Unit tests for trace document parsing
 * @status COMPLETE
 * @dependencies src/trace/trace-document.ts
 */

import { describe, it, expect } from 'vitest';
import { parseTraceDocument } from './trace-document';

describe('parseTraceDocument', () => {
  it('accepts a bare array and converts sub-second executionMS', () => {
    const result = parseTraceDocument(JSON.stringify([{ sql: 'SELECT 1', executionMS: 0.5 }]));

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.size).toBe(1);
    expect(result.data.at(0)?.executionTimeMs).toBe(500);
  });

  it('accepts a queries envelope', () => {
    const result = parseTraceDocument(
      JSON.stringify({
        queries: [
          { sql: 'SELECT 1', executionTimeMs: 2, params: { id: 1 } },
          { sql: 'SELECT 2', row_count: 3, backtrace: [{ file: 'src/a.ts', line: 4 }] },
        ],
      })
    );

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.at(0)?.params).toEqual([1]);
    expect(result.data.at(1)?.rowCount).toBe(3);
    expect(result.data.at(1)?.backtrace).toEqual([{ file: 'src/a.ts', line: 4 }]);
  });

  it('rejects malformed JSON', () => {
    const result = parseTraceDocument('{not json');

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe('TRACE_INVALID');
    expect(result.error.message).toBe('Trace document is not valid JSON');
  });

  it('rejects records without SQL', () => {
    const result = parseTraceDocument(JSON.stringify([{ executionTimeMs: 1 }]));

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe('TRACE_INVALID');
    expect(result.error.message.startsWith('Trace document is invalid')).toBe(true);
  });

  it('rejects negative times', () => {
    const result = parseTraceDocument(JSON.stringify({ queries: [{ sql: 'SELECT 1', executionTimeMs: -1 }] }));

    expect(result.success).toBe(false);
  });
});
