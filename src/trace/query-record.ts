/**
 * @module trace/query-record
 * @description Creation and classification of captured query records
 * @status COMPLETE
 * @dependencies src/types/query.ts, src/types/common.ts, src/constants.ts
 */

import { TRACE_DEFAULTS } from '../constants';
import { appError, err, ok, type AppError, type Result } from '../types/common';
import type { BacktraceFrame, QueryParam, QueryRecord, QueryType } from '../types/query';

// ============================================================================
// Input
// ============================================================================

export interface QueryRecordInput {
  sql: string;
  executionTimeMs?: number;
  params?: readonly QueryParam[];
  rowCount?: number | null;
  backtrace?: readonly BacktraceFrame[] | null;
}

/**
 * Loose shape emitted by capture layers
 */
export interface RawQueryRecord {
  sql: string;
  executionTimeMs?: number;
  executionMS?: number;
  params?: readonly QueryParam[] | Readonly<Record<string, QueryParam>>;
  rowCount?: number | null;
  row_count?: number | null;
  backtrace?: readonly BacktraceFrame[] | null;
}

// ============================================================================
// Creation
// ============================================================================

/**
 * Create a frozen QueryRecord
 *
 * @example
 * const result = createQueryRecord({ sql: 'SELECT 1', executionTimeMs: 0.4 }, 0);
 * if (result.success) trace.push(result.data);
 */
export function createQueryRecord(input: QueryRecordInput, index: number): Result<QueryRecord, AppError> {
  const executionTimeMs = input.executionTimeMs ?? 0;
  const rowCount = input.rowCount ?? null;

  if (typeof input.sql !== 'string') {
    return err(appError('QUERY_RECORD_INVALID', 'SQL must be a string', { index }));
  }
  if (!Number.isFinite(executionTimeMs) || executionTimeMs < 0) {
    return err(
      appError('QUERY_RECORD_INVALID', `Execution time must be a non-negative number, got ${executionTimeMs}`, {
        index,
      })
    );
  }
  if (rowCount !== null && (!Number.isInteger(rowCount) || rowCount < 0)) {
    return err(
      appError('QUERY_RECORD_INVALID', `Row count must be a non-negative integer, got ${rowCount}`, { index })
    );
  }

  const backtrace = input.backtrace ? Object.freeze(input.backtrace.map((frame) => Object.freeze({ ...frame }))) : null;

  return ok(
    Object.freeze({
      sql: input.sql,
      executionTimeMs,
      params: Object.freeze([...(input.params ?? [])]),
      rowCount,
      backtrace,
      index,
    })
  );
}

/**
 * Create a record from the loose capture shape.
 * `executionMS` values between 0 and 1 are read as seconds.
 */
export function fromRaw(raw: RawQueryRecord, index: number): Result<QueryRecord, AppError> {
  let executionTimeMs = raw.executionTimeMs;
  if (executionTimeMs === undefined && raw.executionMS !== undefined) {
    executionTimeMs =
      raw.executionMS > 0 && raw.executionMS < TRACE_DEFAULTS.SECONDS_HEURISTIC_CEILING
        ? raw.executionMS * 1000
        : raw.executionMS;
  }

  return createQueryRecord(
    {
      sql: raw.sql,
      executionTimeMs,
      params: normalizeParams(raw.params),
      rowCount: raw.rowCount ?? raw.row_count ?? null,
      backtrace: raw.backtrace ?? null,
    },
    index
  );
}

function normalizeParams(
  params: readonly QueryParam[] | Readonly<Record<string, QueryParam>> | undefined
): QueryParam[] {
  if (params === undefined) return [];
  if (isParamList(params)) return [...params];
  return Object.values(params);
}

function isParamList(
  params: readonly QueryParam[] | Readonly<Record<string, QueryParam>>
): params is readonly QueryParam[] {
  return Array.isArray(params);
}

// ============================================================================
// Classification
// ============================================================================

const LEADING_NOISE = /^(?:\s+|--[^\n]*(?:\n|$)|\/\*[\s\S]*?\*\/|\()*/;

/**
 * Statement kind from the leading keyword, ignoring whitespace and comments
 */
export function classifyQuery(sql: string): QueryType {
  const rest = sql.replace(LEADING_NOISE, '');
  const keyword = /^[A-Za-z]+/.exec(rest)?.[0]?.toUpperCase();

  switch (keyword) {
    case 'SELECT':
      return 'SELECT';
    case 'INSERT':
    case 'REPLACE':
      return 'INSERT';
    case 'UPDATE':
      return 'UPDATE';
    case 'DELETE':
      return 'DELETE';
    case 'WITH':
      return classifyCommonTableExpression(rest);
    default:
      return 'OTHER';
  }
}

/**
 * Kind of the statement that follows a WITH clause
 */
function classifyCommonTableExpression(sql: string): QueryType {
  const statement = /(SELECT|INSERT|UPDATE|DELETE)\b/iy;
  let depth = 0;
  for (let i = 0; i < sql.length; i++) {
    const c = sql.charAt(i);
    if (c === '(') depth++;
    else if (c === ')') depth--;
    else if (depth === 0 && /[SIUD]/i.test(c) && !/[\w$]/.test(sql.charAt(i - 1))) {
      statement.lastIndex = i;
      const match = statement.exec(sql);
      if (match?.[1]) return classifyQuery(match[1]);
    }
  }
  return 'OTHER';
}

export function isSelect(record: QueryRecord): boolean {
  return classifyQuery(record.sql) === 'SELECT';
}

export function isInsert(record: QueryRecord): boolean {
  return classifyQuery(record.sql) === 'INSERT';
}

export function isUpdate(record: QueryRecord): boolean {
  return classifyQuery(record.sql) === 'UPDATE';
}

export function isDelete(record: QueryRecord): boolean {
  return classifyQuery(record.sql) === 'DELETE';
}

export function isWrite(record: QueryRecord): boolean {
  const type = classifyQuery(record.sql);
  return type === 'INSERT' || type === 'UPDATE' || type === 'DELETE';
}

/**
 * `file:line` of the innermost frame, or null without a backtrace
 */
export function topFrameLocation(record: QueryRecord): string | null {
  const frame = record.backtrace?.[0];
  return frame ? `${frame.file}:${frame.line}` : null;
}
