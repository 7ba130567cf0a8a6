/**
 * @module analyzer/detectors/batch-without-clear
 * @description Detects long same-table write batches that keep every entity tracked
 * @status COMPLETE
 * @dependencies src/analyzer/config.ts, src/sql/structural-cache.ts
 */

import { SAMPLE_LIMITS } from '../../constants';
import { isWrite } from '../../trace/query-record';
import type { Issue } from '../../types/issues';
import type { QueryRecord } from '../../types/query';
import { batchWithoutClearOptionsSchema, parseOptions, type BatchWithoutClearOptions } from '../config';
import { IssueBuilder } from '../issue-builder';
import { batchClearSuggestion } from '../suggestions';
import type { QueryAnalyzer } from '../types';
import { guarded } from './shared';

/**
 * Same-table writes that are close together in the trace and numerous
 * enough that the unit of work grows without bound.
 */
export function createBatchWithoutClearAnalyzer(options: BatchWithoutClearOptions = {}): QueryAnalyzer {
  const { batchSizeThreshold, maxSequentialGap, sequentialRatio } = parseOptions(
    'batchWithoutClear',
    batchWithoutClearOptionsSchema,
    options
  );
  const name = 'batch-without-clear';

  return {
    name,
    detects: ['batch_without_clear'],

    *analyze(trace, context): IterableIterator<Issue> {
      const byTable = new Map<string, { table: string; writes: QueryRecord[] }>();
      for (const record of trace) {
        if (!isWrite(record)) continue;
        const target = guarded(context, name, record, () => context.cache.get(record.sql, 'writeTarget'));
        if (!target) continue;

        const key = target.table.toLowerCase();
        const batch = byTable.get(key);
        if (batch) batch.writes.push(record);
        else byTable.set(key, { table: target.table, writes: [record] });
      }

      for (const { table, writes } of byTable.values()) {
        if (writes.length < batchSizeThreshold) continue;
        if (!isSequential(writes, maxSequentialGap, sequentialRatio)) continue;

        yield IssueBuilder.create()
          .withType('batch_without_clear')
          .withSeverity('WARNING')
          .withTitle(`Memory Leak Risk: ${writes.length} operations on ${table}`)
          .withDescription(
            `${writes.length} write operations on '${table}' run back to back. ` +
              'Without a periodic clear, every written entity stays in the unit of work until the run ends.'
          )
          .withSuggestion(batchClearSuggestion(table, writes.length))
          .withQueries(writes.slice(0, SAMPLE_LIMITS.BATCH_QUERIES))
          .withDetails({ table, operation_count: writes.length, threshold: batchSizeThreshold })
          .build();
      }
    },
  };
}

/**
 * At least `ratio` of the consecutive capture-index gaps are `maxGap` or less.
 * Fewer than two writes are never sequential.
 */
export function isSequential(writes: readonly QueryRecord[], maxGap: number, ratio: number): boolean {
  if (writes.length < 2) return false;

  let close = 0;
  for (let i = 1; i < writes.length; i++) {
    const current = writes[i];
    const previous = writes[i - 1];
    if (current !== undefined && previous !== undefined && current.index - previous.index <= maxGap) close++;
  }
  return close / (writes.length - 1) >= ratio;
}
