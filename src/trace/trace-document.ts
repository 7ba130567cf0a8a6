/**
 * @module trace/trace-document
 * @description Validation of JSON trace documents produced by capture layers
 * @status COMPLETE
 * @dependencies zod, src/trace/query-trace.ts
 */

import { z } from 'zod';
import { appError, err, type AppError, type Result } from '../types/common';
import { QueryTrace } from './query-trace';

// ============================================================================
// Schema
// ============================================================================

const backtraceFrameSchema = z.object({
  file: z.string(),
  line: z.number().int(),
  function: z.string().optional(),
});

const paramSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const rawQueryRecordSchema = z.object({
  sql: z.string(),
  executionTimeMs: z.number().nonnegative().optional(),
  executionMS: z.number().nonnegative().optional(),
  params: z.union([z.array(paramSchema), z.record(paramSchema)]).optional(),
  rowCount: z.number().int().nonnegative().nullable().optional(),
  row_count: z.number().int().nonnegative().nullable().optional(),
  backtrace: z.array(backtraceFrameSchema).nullable().optional(),
});

/**
 * Either a bare array of queries or `{ queries: [...] }`
 */
export const traceDocumentSchema = z.union([
  z.array(rawQueryRecordSchema),
  z.object({ queries: z.array(rawQueryRecordSchema) }),
]);

export type TraceDocument = z.infer<typeof traceDocumentSchema>;

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse and validate a JSON trace document
 *
 * @example
 * const result = parseTraceDocument(fs.readFileSync('trace.json', 'utf-8'));
 * if (!result.success) console.error(result.error.message);
 */
export function parseTraceDocument(content: string): Result<QueryTrace, AppError> {
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    return err({
      ...appError('TRACE_INVALID', 'Trace document is not valid JSON'),
      cause: error instanceof Error ? error : undefined,
    });
  }

  const parsed = traceDocumentSchema.safeParse(json);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first && first.path.length > 0 ? ` at ${first.path.join('.')}` : '';
    return err(
      appError('TRACE_INVALID', `Trace document is invalid${where}: ${first?.message ?? 'unknown error'}`, {
        issues: parsed.error.issues.length,
      })
    );
  }

  const queries = Array.isArray(parsed.data) ? parsed.data : parsed.data.queries;
  return QueryTrace.fromRaw(queries);
}
