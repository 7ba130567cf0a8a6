/**
 * @module analyzer/detectors/shared
 * @description Helpers shared by the detectors
 * @status COMPLETE
 * @dependencies src/analyzer/context.ts, src/constants.ts
 */

import { SQL_LIMITS } from '../../constants';
import type { QueryRecord } from '../../types/query';
import type { AnalysisContext } from '../context';

/**
 * Run per-query work; a throw is logged and reported as `undefined`
 */
export function guarded<T>(
  context: AnalysisContext,
  analyzer: string,
  record: QueryRecord,
  work: () => T
): T | undefined {
  try {
    return work();
  } catch (error) {
    context.logger?.warn(`Analyzer ${analyzer} skipped query ${record.index}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return undefined;
  }
}

/**
 * SQL shortened for issue payloads
 */
export function preview(sql: string, limit: number = SQL_LIMITS.QUERY_PREVIEW_CHARS): string {
  return sql.length > limit ? `${sql.slice(0, limit)}...` : sql;
}

/**
 * `orders` -> `Orders`, `tbl_order_items` -> `OrderItems`
 */
export function entityName(table: string): string {
  return table
    .replace(/^(?:tbl|tb)_/i, '')
    .split(/[_\s]+/)
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join('');
}
