/**
 * @module analyzer/detectors/flush-in-loop
 * @description Detects unit-of-work flushes issued once per loop iteration
 * @status COMPLETE
 * @dependencies src/trace/query-record.ts, src/analyzer/config.ts
 */

import { SAMPLE_LIMITS } from '../../constants';
import { classifyQuery, topFrameLocation } from '../../trace/query-record';
import type { QueryTrace } from '../../trace/query-trace';
import type { Issue } from '../../types/issues';
import type { QueryRecord } from '../../types/query';
import { flushInLoopOptionsSchema, parseOptions, type FlushInLoopOptions } from '../config';
import { IssueBuilder } from '../issue-builder';
import { flushInLoopSuggestion } from '../suggestions';
import type { QueryAnalyzer } from '../types';

// ============================================================================
// Types
// ============================================================================

/**
 * Writes between two flush boundaries; positions are trace positions
 */
export interface FlushGroup {
  start: number;
  end: number;
  operations: number;
}

// ============================================================================
// Flush In Loop Detection
// ============================================================================

/**
 * Many small flush groups in a row mean the code flushes inside its loop
 * instead of once after it.
 */
export function createFlushInLoopAnalyzer(options: FlushInLoopOptions = {}): QueryAnalyzer {
  const { flushCountThreshold, maxOperationsPerFlush } = parseOptions(
    'flushInLoop',
    flushInLoopOptionsSchema,
    options
  );

  return {
    name: 'flush-in-loop',
    detects: ['flush_in_loop'],

    *analyze(trace): IterableIterator<Issue> {
      const records = trace.toArray();
      const groups = findFlushGroups(trace);
      if (groups.length < flushCountThreshold) return;

      const totalOperations = groups.reduce((sum, group) => sum + group.operations, 0);
      const average = totalOperations / groups.length;
      if (!(average > 0 && average <= maxOperationsPerFlush)) return;

      const samples = sampleQueries(records, groups);
      const suggestion = flushInLoopSuggestion(groups.length, average);
      yield IssueBuilder.create()
        .withType('flush_in_loop')
        .withSeverity(suggestion.severity)
        .withTitle(`Performance Anti-Pattern: ${groups.length} flush() calls in loop`)
        .withDescription(
          `Detected ${groups.length} separate flushes averaging ${average.toFixed(1)} write operations each. ` +
            'Each flush is a database round trip; persist inside the loop and flush once after it.'
        )
        .withSuggestion(suggestion)
        .withQueries(samples)
        .withDetails({
          flush_count: groups.length,
          average_operations: Number(average.toFixed(1)),
          total_operations: totalOperations,
          threshold: flushCountThreshold,
        })
        .build();
    },
  };
}

/**
 * Split the trace into groups of writes.
 *
 * A boundary follows position i when a next record exists and either an
 * INSERT/UPDATE is followed by a SELECT, or both records carry a backtrace
 * and their innermost `file:line` differs. The writes before the first
 * boundary never form a group.
 */
export function findFlushGroups(trace: QueryTrace): FlushGroup[] {
  const records = trace.toArray();
  const groups: FlushGroup[] = [];
  let lastFlush = -1;
  let operations = 0;

  for (const [i, current] of records.entries()) {
    const type = classifyQuery(current.sql);
    if (type === 'INSERT' || type === 'UPDATE' || type === 'DELETE') operations++;

    const next = records[i + 1];
    if (next === undefined || !isBoundary(current, next)) continue;

    if (lastFlush >= 0) groups.push({ start: lastFlush, end: i, operations });
    lastFlush = i;
    operations = 0;
  }

  return groups;
}

function isBoundary(current: QueryRecord, next: QueryRecord): boolean {
  const type = classifyQuery(current.sql);
  if ((type === 'INSERT' || type === 'UPDATE') && classifyQuery(next.sql) === 'SELECT') return true;

  if (current.backtrace === null || next.backtrace === null) return false;
  return topFrameLocation(current) !== topFrameLocation(next);
}

function sampleQueries(records: readonly QueryRecord[], groups: readonly FlushGroup[]): QueryRecord[] {
  const positions = new Set<number>();
  for (const group of groups) {
    for (let i = group.start; i <= group.end; i++) positions.add(i);
  }

  const samples: QueryRecord[] = [];
  for (const position of [...positions].sort((a, b) => a - b)) {
    const record = records[position];
    if (record !== undefined) samples.push(record);
    if (samples.length >= SAMPLE_LIMITS.BATCH_QUERIES) break;
  }
  return samples;
}
