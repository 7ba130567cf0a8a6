/**
 * @module trace
 * @description Captured query records and trace views
 * @status COMPLETE
 * @dependencies src/trace/query-record.ts, src/trace/query-trace.ts, src/trace/trace-document.ts
 */

export {
  createQueryRecord,
  fromRaw,
  classifyQuery,
  isSelect,
  isInsert,
  isUpdate,
  isDelete,
  isWrite,
  topFrameLocation,
  type QueryRecordInput,
  type RawQueryRecord,
} from './query-record';
export { QueryTrace, type SequentialRun, type SortDirection } from './query-trace';
export { parseTraceDocument, traceDocumentSchema, type TraceDocument } from './trace-document';
