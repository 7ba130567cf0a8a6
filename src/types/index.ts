/**
 * @module types/index
 * @description Central export for all type definitions
 * @status COMPLETE
 * @dependencies none
 */

// Common types
export type {
  Result,
  AppError,
  ErrorCode,
  Logger,
} from './common';

export {
  ok,
  err,
  appError,
  CodedError,
  SqlStructureError,
  InvalidConfigurationError,
  IssueBuildError,
} from './common';

// Query types
export type {
  QueryType,
  QueryParam,
  BacktraceFrame,
  QueryRecord,
  JoinType,
  TableReference,
  JoinFact,
  JoinCondition,
  SourceTable,
  WriteTarget,
  StructuralFacts,
  StructuralFactName,
} from './query';

// Metadata types
export type {
  Cardinality,
  JoinColumnFact,
  AssociationFact,
  EntityMetadataProvider,
} from './metadata';

// Issue types
export type {
  IssueCategory,
  IssueType,
  IssueSeverity,
  SuggestionKind,
  SuggestionBlock,
  Suggestion,
  IssueDetailValue,
  IssueDetails,
  Issue,
  IssueSummary,
  IssueDetectionResult,
} from './issues';

export { SEVERITY_PRIORITY, ISSUE_TYPES, ISSUE_SEVERITIES } from './issues';
