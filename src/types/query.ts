/**
 * @module types/query
 * @description Captured query records and the structural facts derived from SQL text
 * @status COMPLETE
 * @dependencies none
 */

// ============================================================================
// Captured Queries
// ============================================================================

/**
 * Statement kind derived from the leading keyword
 */
export type QueryType = 'SELECT' | 'INSERT' | 'UPDATE' | 'DELETE' | 'OTHER';

/**
 * Bound parameter value
 */
export type QueryParam = string | number | boolean | null;

/**
 * One frame of the call stack that issued a query
 */
export interface BacktraceFrame {
  file: string;
  line: number;
  function?: string;
}

/**
 * A captured query. Frozen at creation and owned by its trace.
 */
export interface QueryRecord {
  /** Raw SQL as sent to the database */
  readonly sql: string;
  /** Wall-clock execution time */
  readonly executionTimeMs: number;
  /** Positional bound parameters */
  readonly params: readonly QueryParam[];
  /** Rows returned or affected, when the capture layer knows it */
  readonly rowCount: number | null;
  /** Call stack, innermost frame first */
  readonly backtrace: readonly BacktraceFrame[] | null;
  /** Position in capture order */
  readonly index: number;
}

// ============================================================================
// Structural Facts
// ============================================================================

export type JoinType = 'INNER' | 'LEFT' | 'RIGHT' | 'CROSS' | 'FULL';

export interface TableReference {
  table: string;
  alias: string | null;
}

export interface JoinFact {
  type: JoinType;
  table: string;
  /** Explicit alias, or the table name when it is used as a qualifier */
  alias: string | null;
  aliasIsImplicit: boolean;
  /** Raw condition text after ON, null for USING/CROSS/unknown */
  onClause: string | null;
  /** The join header as written, e.g. `LEFT OUTER JOIN orders o` */
  text: string;
}

export interface JoinCondition {
  left: string;
  right: string;
}

export interface SourceTable extends TableReference {
  source: 'from' | 'join';
}

export interface WriteTarget {
  operation: 'INSERT' | 'UPDATE' | 'DELETE';
  table: string;
}

/**
 * Every fact the structural cache can serve, keyed by fact name.
 * Each value is a pure function of the SQL text.
 */
export interface StructuralFacts {
  mainTable: TableReference | null;
  joins: readonly JoinFact[];
  joinCount: number;
  hasJoin: boolean;
  allTables: readonly SourceTable[];
  whereColumns: readonly string[];
  hasWhere: boolean;
  parameterBoundColumns: readonly string[];
  groupByColumns: readonly string[];
  orderByColumns: readonly string[];
  hasLimit: boolean;
  hasDistinct: boolean;
  hasSubquery: boolean;
  hasOrderBy: boolean;
  hasGroupBy: boolean;
  hasComplexWhereConditions: boolean;
  likeLeadingWildcardPatterns: readonly string[];
  tableAliasesInSelect: readonly string[];
  aggregateFunctions: readonly string[];
  hasLocaleConstraintInJoin: boolean;
  hasUniqueJoinConstraint: boolean;
  writeTarget: WriteTarget | null;
  normalized: string;
}

export type StructuralFactName = keyof StructuralFacts;
