/**
 * @module trace/query-trace
 * @description Ordered, read-only collection of captured queries with derived views
 * @status COMPLETE
 * @dependencies src/trace/query-record.ts, src/types/query.ts
 */

import { appError, err, ok, type AppError, type Result } from '../types/common';
import type { QueryRecord, QueryType } from '../types/query';
import { classifyQuery, createQueryRecord, fromRaw, type QueryRecordInput, type RawQueryRecord } from './query-record';

// ============================================================================
// Types
// ============================================================================

export type SortDirection = 'asc' | 'desc';

/**
 * A run of matching records whose capture positions are close together
 */
export interface SequentialRun {
  records: QueryRecord[];
  /** Capture position of the first record */
  startIndex: number;
  /** Capture position of the last record */
  endIndex: number;
}

// ============================================================================
// Query Trace
// ============================================================================

/**
 * Capture-ordered queries. Every view returns a new trace and never reorders
 * or mutates the records it was built from.
 *
 * @example
 * const trace = QueryTrace.fromInputs([{ sql: 'SELECT * FROM users', executionTimeMs: 3 }]);
 * trace.onlySelects().filterSlow(100).size;
 */
export class QueryTrace implements Iterable<QueryRecord> {
  private readonly records: readonly QueryRecord[];

  private constructor(records: readonly QueryRecord[]) {
    this.records = Object.freeze([...records]);
  }

  // ==========================================================================
  // Construction
  // ==========================================================================

  static empty(): QueryTrace {
    return new QueryTrace([]);
  }

  /**
   * Wrap records that already carry their capture index
   */
  static fromRecords(records: readonly QueryRecord[]): QueryTrace {
    return new QueryTrace(records);
  }

  /**
   * Build records from plain inputs; the array position becomes the capture index
   *
   * @throws Error when an input is invalid; use `tryFromInputs` to get a Result
   */
  static fromInputs(inputs: readonly QueryRecordInput[]): QueryTrace {
    const result = QueryTrace.tryFromInputs(inputs);
    if (!result.success) throw new Error(result.error.message);
    return result.data;
  }

  static tryFromInputs(inputs: readonly QueryRecordInput[]): Result<QueryTrace, AppError> {
    const records: QueryRecord[] = [];
    for (const [index, input] of inputs.entries()) {
      const record = createQueryRecord(input, index);
      if (!record.success) return record;
      records.push(record.data);
    }
    return ok(new QueryTrace(records));
  }

  /**
   * Build records from the loose capture shape
   */
  static fromRaw(raws: readonly RawQueryRecord[]): Result<QueryTrace, AppError> {
    const records: QueryRecord[] = [];
    for (const [index, raw] of raws.entries()) {
      const record = fromRaw(raw, index);
      if (!record.success) {
        return err(appError('TRACE_INVALID', `Query ${index}: ${record.error.message}`, { index }));
      }
      records.push(record.data);
    }
    return ok(new QueryTrace(records));
  }

  // ==========================================================================
  // Access
  // ==========================================================================

  get size(): number {
    return this.records.length;
  }

  isEmpty(): boolean {
    return this.records.length === 0;
  }

  at(position: number): QueryRecord | undefined {
    return this.records[position];
  }

  toArray(): QueryRecord[] {
    return [...this.records];
  }

  [Symbol.iterator](): Iterator<QueryRecord> {
    return this.records[Symbol.iterator]();
  }

  // ==========================================================================
  // Filtering
  // ==========================================================================

  filter(predicate: (record: QueryRecord) => boolean): QueryTrace {
    return new QueryTrace(this.records.filter(predicate));
  }

  filterByType(type: QueryType): QueryTrace {
    return this.filter((record) => classifyQuery(record.sql) === type);
  }

  onlySelects(): QueryTrace {
    return this.filterByType('SELECT');
  }

  onlyInserts(): QueryTrace {
    return this.filterByType('INSERT');
  }

  onlyUpdates(): QueryTrace {
    return this.filterByType('UPDATE');
  }

  onlyDeletes(): QueryTrace {
    return this.filterByType('DELETE');
  }

  onlyWrites(): QueryTrace {
    return this.filter((record) => {
      const type = classifyQuery(record.sql);
      return type === 'INSERT' || type === 'UPDATE' || type === 'DELETE';
    });
  }

  /**
   * Records strictly slower than the threshold; a non-positive threshold selects nothing
   */
  filterSlow(thresholdMs: number): QueryTrace {
    if (!(thresholdMs > 0)) return QueryTrace.empty();
    return this.filter((record) => record.executionTimeMs > thresholdMs);
  }

  withRowCountAbove(rows: number): QueryTrace {
    return this.filter((record) => record.rowCount !== null && record.rowCount > rows);
  }

  /**
   * Drop records whose innermost frame lives in a file matching any pattern
   */
  excludePaths(patterns: readonly string[]): QueryTrace {
    if (patterns.length === 0) return this;
    return this.filter((record) => {
      const file = record.backtrace?.[0]?.file;
      return file === undefined || !patterns.some((pattern) => file.includes(pattern));
    });
  }

  // ==========================================================================
  // Grouping & Sorting
  // ==========================================================================

  /**
   * Groups in order of first appearance
   */
  groupBy(keyOf: (record: QueryRecord) => string | null): Map<string, QueryTrace> {
    const buckets = new Map<string, QueryRecord[]>();
    for (const record of this.records) {
      const key = keyOf(record);
      if (key === null) continue;
      const bucket = buckets.get(key);
      if (bucket) {
        bucket.push(record);
      } else {
        buckets.set(key, [record]);
      }
    }

    const groups = new Map<string, QueryTrace>();
    for (const [key, records] of buckets) {
      groups.set(key, new QueryTrace(records));
    }
    return groups;
  }

  groupByPattern(normalize: (sql: string) => string): Map<string, QueryTrace> {
    return this.groupBy((record) => normalize(record.sql));
  }

  /**
   * Stable sort; equal times keep capture order
   */
  sortByExecutionTime(direction: SortDirection = 'desc'): QueryTrace {
    const factor = direction === 'desc' ? -1 : 1;
    return new QueryTrace(
      [...this.records].sort((a, b) => factor * (a.executionTimeMs - b.executionTimeMs))
    );
  }

  countByType(): Record<QueryType, number> {
    const counts: Record<QueryType, number> = { SELECT: 0, INSERT: 0, UPDATE: 0, DELETE: 0, OTHER: 0 };
    for (const record of this.records) {
      counts[classifyQuery(record.sql)]++;
    }
    return counts;
  }

  // ==========================================================================
  // Aggregates
  // ==========================================================================

  totalExecutionTime(): number {
    return this.records.reduce((sum, record) => sum + record.executionTimeMs, 0);
  }

  averageExecutionTime(): number {
    return this.records.length === 0 ? 0 : this.totalExecutionTime() / this.records.length;
  }

  /**
   * Runs of matching records where each capture-index gap is at most `maxGap`
   */
  findSequentialRuns(predicate: (record: QueryRecord) => boolean, maxGap: number): SequentialRun[] {
    const runs: SequentialRun[] = [];
    let current: QueryRecord[] = [];

    for (const record of this.records) {
      if (!predicate(record)) continue;
      const previous = current[current.length - 1];
      if (previous !== undefined && record.index - previous.index > maxGap) {
        runs.push(toRun(current));
        current = [];
      }
      current.push(record);
    }
    if (current.length > 0) runs.push(toRun(current));

    return runs;
  }
}

function toRun(records: QueryRecord[]): SequentialRun {
  const first = records[0];
  const last = records[records.length - 1];
  return {
    records,
    startIndex: first?.index ?? 0,
    endIndex: last?.index ?? 0,
  };
}
