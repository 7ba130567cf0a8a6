/**
 * @module sql/structure-extractor
 * @description Lightweight structural parser answering questions about raw SQL text
 * @status COMPLETE
 * @dependencies src/sql/scanner.ts, src/types/query.ts, src/constants.ts
 *
 * No grammar: a linear masking scan followed by anchored keyword searches.
 * Questions that cannot be answered confidently yield null or empty values,
 * which callers read as "cannot conclude".
 */

import { SQL_LIMITS } from '../constants';
import type {
  JoinCondition,
  JoinFact,
  JoinType,
  SourceTable,
  TableReference,
  WriteTarget,
} from '../types/query';
import {
  escapeRegExp,
  scanSql,
  splitTopLevelCommas,
  unquoteIdentifier,
  type ScannedSql,
} from './scanner';

// ============================================================================
// Patterns
// ============================================================================

const IDENT = '(?:`[^`]+`|"[^"]+"|\\[[^\\]]+\\]|[A-Za-z_][\\w$]*)';
const QUALIFIED = `${IDENT}(?:\\.${IDENT})*`;

const JOIN_HEAD = /\b(?:NATURAL\s+)?(?:(LEFT|RIGHT|FULL)(?:\s+OUTER)?\s+|(INNER)\s+|(CROSS)\s+)?JOIN\s+/gi;
const TABLE_NAME = new RegExp(QUALIFIED, 'y');
const ALIAS = new RegExp(`\\s+(?:AS\\s+)?(${IDENT})`, 'iy');
const ON_OR_USING = /\s*(ON|USING)\b/iy;
const FROM_KEYWORD = /\bFROM\s+/gi;

/** Ends a JOIN condition */
const JOIN_CLAUSE_END =
  /\b(?:(?:NATURAL|LEFT|RIGHT|FULL|INNER|CROSS)\b(?!\s*\()|JOIN\b|WHERE\b|GROUP\s+BY\b|ORDER\s+BY\b|HAVING\b|LIMIT\b|UNION\b|WINDOW\b|OFFSET\b|FETCH\b|FOR\s+UPDATE\b|RETURNING\b)/gi;
const WHERE_CLAUSE_END =
  /\b(?:GROUP\s+BY|ORDER\s+BY|HAVING|LIMIT|UNION|WINDOW|OFFSET|FETCH|FOR\s+UPDATE|RETURNING)\b/gi;
const GROUP_BY_CLAUSE_END = /\b(?:HAVING|ORDER\s+BY|LIMIT|UNION|WINDOW|OFFSET|FETCH|FOR\s+UPDATE)\b/gi;
const ORDER_BY_CLAUSE_END = /\b(?:LIMIT|OFFSET|FETCH|UNION|FOR\s+UPDATE)\b/gi;

const WHERE_COLUMN =
  /(?<![\w$.`"])((?:[A-Za-z_][\w$]*\.)?[A-Za-z_][\w$]*)\s*(?:=|<>|!=|<=|>=|<|>|\bNOT\s+I?LIKE\b|\bI?LIKE\b|\bNOT\s+IN\b|\bIN\b|\bIS\b|\bNOT\s+BETWEEN\b|\bBETWEEN\b)/gi;
const PARAMETER_BOUND_COLUMN =
  /(?<![\w$.`"])((?:[A-Za-z_][\w$]*\.)?[A-Za-z_][\w$]*)\s*=\s*(?:\?|:[A-Za-z_]\w*|\$\d+)/g;
const SIMPLE_COLUMN = new RegExp(`^(?:${IDENT}\\.)*(${IDENT})$`);
const EQUALITY = new RegExp(`^(${QUALIFIED})\\s*=\\s*(${QUALIFIED})$`);
const ORDER_DIRECTION = /\s+(?:ASC|DESC)?(?:\s*NULLS\s+(?:FIRST|LAST))?\s*$/i;
const SELECT_QUALIFIER = /(?<![\w$.])([A-Za-z_][\w$]*)\s*\.\s*(?=[A-Za-z_*`"])/g;
const AGGREGATE = /\b(COUNT|SUM|AVG|MIN|MAX)\s*\(/gi;
const LIKE_LITERAL = /\bI?LIKE\s+(?=')/gi;
const LOCALE_CONDITION = /\blocale\s*(?:=|IN\b)/i;

const INSERT_TARGET = new RegExp(
  `^\\s*INSERT\\s+(?:(?:LOW_PRIORITY|DELAYED|HIGH_PRIORITY)\\s+)?(?:IGNORE\\s+)?INTO\\s+(${QUALIFIED})`,
  'i'
);
const UPDATE_TARGET = new RegExp(`^\\s*UPDATE\\s+(?:LOW_PRIORITY\\s+)?(?:IGNORE\\s+)?(${QUALIFIED})`, 'i');
const DELETE_TARGET = new RegExp(`^\\s*DELETE\\s+FROM\\s+(${QUALIFIED})`, 'i');

/**
 * Words that can follow a table reference but are never its alias
 */
const NON_ALIAS_KEYWORDS: ReadonlySet<string> = new Set([
  'ON', 'USING', 'WHERE', 'JOIN', 'LEFT', 'RIGHT', 'FULL', 'INNER', 'OUTER', 'CROSS',
  'NATURAL', 'GROUP', 'ORDER', 'HAVING', 'LIMIT', 'OFFSET', 'UNION', 'SET', 'VALUES',
  'WINDOW', 'FOR', 'FETCH', 'STRAIGHT_JOIN', 'RETURNING', 'AND', 'OR', 'AS', 'INTO',
  'LATERAL', 'USE', 'FORCE', 'IGNORE', 'EXCEPT', 'INTERSECT',
]);

// ============================================================================
// Internal Types
// ============================================================================

interface ScannedJoin extends JoinFact {
  /** Offset of the JOIN header */
  start: number;
  /** End of header, ON condition included */
  clauseEnd: number;
  /** Span of the ON condition, when present */
  onSpan: [number, number] | null;
}

// ============================================================================
// Extractor
// ============================================================================

/**
 * Structural questions over SQL text.
 *
 * Methods never throw on malformed SQL. SQL above SQL_LIMITS.MAX_SQL_LENGTH
 * raises SqlStructureError so that callers can take their fallback path.
 *
 * @example
 * const extractor = new SqlStructureExtractor();
 * extractor.extractJoins('SELECT * FROM a JOIN b ON a.id = b.a_id');
 * // [{ type: 'INNER', table: 'b', alias: null, ... }]
 */
export class SqlStructureExtractor {
  private readonly scans = new Map<string, ScannedSql>();
  private readonly joinLists = new Map<string, ScannedJoin[]>();
  private readonly maxScans: number;

  constructor(options: { maxScans?: number } = {}) {
    this.maxScans = options.maxScans ?? SQL_LIMITS.SCAN_CACHE_ENTRIES;
  }

  // ==========================================================================
  // Tables
  // ==========================================================================

  /**
   * First FROM target of the outer query
   */
  extractMainTable(sql: string): TableReference | null {
    const { topLevel } = this.scan(sql);
    FROM_KEYWORD.lastIndex = 0;
    const from = FROM_KEYWORD.exec(topLevel);
    if (!from) return null;

    const reference = readTableReference(topLevel, from.index + from[0].length);
    if (!reference) return null;
    return { table: reference.table, alias: reference.alias };
  }

  extractAllTables(sql: string): SourceTable[] {
    const tables: SourceTable[] = [];
    const main = this.extractMainTable(sql);
    if (main) tables.push({ ...main, source: 'from' });
    for (const join of this.scanJoins(sql)) {
      tables.push({ table: join.table, alias: join.alias, source: 'join' });
    }
    return tables;
  }

  extractWriteTarget(sql: string): WriteTarget | null {
    const { topLevel } = this.scan(sql);
    const insert = INSERT_TARGET.exec(topLevel);
    if (insert?.[1]) return { operation: 'INSERT', table: unquoteIdentifier(insert[1]) };
    const update = UPDATE_TARGET.exec(topLevel);
    if (update?.[1]) return { operation: 'UPDATE', table: unquoteIdentifier(update[1]) };
    const del = DELETE_TARGET.exec(topLevel);
    if (del?.[1]) return { operation: 'DELETE', table: unquoteIdentifier(del[1]) };
    return null;
  }

  // ==========================================================================
  // Joins
  // ==========================================================================

  extractJoins(sql: string): JoinFact[] {
    return this.scanJoins(sql).map(toJoinFact);
  }

  hasJoin(sql: string): boolean {
    return this.scanJoins(sql).length > 0;
  }

  countJoins(sql: string): number {
    return this.scanJoins(sql).length;
  }

  /**
   * Condition text of the join whose header matches `joinText`
   */
  extractJoinOnClause(sql: string, joinText: string): string | null {
    const join = this.findJoinByText(sql, joinText);
    return join ? join.onClause : null;
  }

  /**
   * Column equalities of the first join to `joinedTable`.
   * When qualifiers tell the sides apart, `right` is the joined table's column.
   */
  extractJoinOnConditions(sql: string, joinedTable: string): JoinCondition[] {
    const scanned = this.scan(sql);
    const wanted = joinedTable.toLowerCase();
    const join = this.scanJoins(sql).find((j) => j.table.toLowerCase() === wanted);
    if (!join?.onSpan) return [];

    const condition = scanned.masked.slice(join.onSpan[0], join.onSpan[1]);
    const joinedQualifier = (join.alias ?? join.table).toLowerCase();
    const conditions: JoinCondition[] = [];

    for (const part of condition.split(/\bAND\b/i)) {
      const match = EQUALITY.exec(part.replace(/[()]/g, ' ').trim());
      if (!match?.[1] || !match[2]) continue;

      const left = unquoteIdentifier(match[1]);
      const right = unquoteIdentifier(match[2]);
      const leftOnJoined = qualifierOf(left) === joinedQualifier;
      const rightOnJoined = qualifierOf(right) === joinedQualifier;

      conditions.push(leftOnJoined && !rightOnJoined ? { left: right, right: left } : { left, right });
    }

    return conditions;
  }

  /**
   * Whether `alias.` is referenced outside the clause of the join that introduced it.
   * An unqualified `SELECT *` uses every alias.
   */
  isAliasUsedInQuery(sql: string, alias: string, excludingJoinText: string): boolean {
    const scanned = this.scan(sql);
    if (selectsEverything(scanned.topLevel)) return true;

    let view = scanned.masked;
    const join = this.findJoinByText(sql, excludingJoinText);
    if (join) {
      view = blankRange(view, join.start, join.clauseEnd);
    } else {
      const at = view.toUpperCase().indexOf(collapse(excludingJoinText).toUpperCase());
      if (at !== -1) view = blankRange(view, at, at + excludingJoinText.length);
    }

    const usage = new RegExp(`(?<![\\w$."\`])${escapeRegExp(alias)}\\s*\\.`, 'i');
    return usage.test(view);
  }

  /**
   * A join condition filters a translation table by locale
   */
  hasLocaleConstraintInJoin(sql: string): boolean {
    const { masked } = this.scan(sql);
    return this.scanJoins(sql).some(
      (join) => join.onSpan !== null && LOCALE_CONDITION.test(masked.slice(join.onSpan[0], join.onSpan[1]))
    );
  }

  /**
   * A join condition matches the joined table's `id` column, so it yields one row
   */
  hasUniqueJoinConstraint(sql: string): boolean {
    return this.scanJoins(sql).some((join) =>
      this.extractJoinOnConditions(sql, join.table).some(
        (condition) => lastSegment(condition.right).toLowerCase() === 'id'
      )
    );
  }

  // ==========================================================================
  // Clauses
  // ==========================================================================

  /**
   * Distinct column names compared in the outer WHERE clause
   */
  extractWhereColumns(sql: string): string[] {
    const clause = this.clause(sql, /\bWHERE\b/i, WHERE_CLAUSE_END);
    if (clause === null) return [];

    const columns: string[] = [];
    WHERE_COLUMN.lastIndex = 0;
    let match: RegExpExecArray | null;
    while ((match = WHERE_COLUMN.exec(clause)) !== null) {
      const column = match[1];
      if (column === undefined) continue;
      const name = lastSegment(column);
      if (NON_ALIAS_KEYWORDS.has(name.toUpperCase()) || name.toUpperCase() === 'NOT') continue;
      if (!columns.includes(name)) columns.push(name);
    }
    return columns;
  }

  hasWhere(sql: string): boolean {
    return this.clause(sql, /\bWHERE\b/i, WHERE_CLAUSE_END) !== null;
  }

  /**
   * Bare names of outer WHERE columns compared for equality with a bound
   * parameter (`?`, `:name` or `$1`)
   */
  extractParameterBoundColumns(sql: string): string[] {
    const clause = this.clause(sql, /\bWHERE\b/i, WHERE_CLAUSE_END);
    if (clause === null) return [];

    const columns: string[] = [];
    for (const match of clause.matchAll(PARAMETER_BOUND_COLUMN)) {
      const column = match[1];
      if (column === undefined) continue;
      const name = lastSegment(column);
      if (!columns.includes(name)) columns.push(name);
    }
    return columns;
  }

  hasComplexWhereConditions(sql: string): boolean {
    const clause = this.clause(sql, /\bWHERE\b/i, WHERE_CLAUSE_END);
    if (clause === null) return false;
    if (/\bOR\b/i.test(clause)) return true;
    const andCount = (clause.match(/\bAND\b/gi) ?? []).length;
    return andCount + 1 > SQL_LIMITS.COMPLEX_WHERE_CONDITIONS;
  }

  extractGroupByColumns(sql: string): string[] {
    const clause = this.clause(sql, /\bGROUP\s+BY\b/i, GROUP_BY_CLAUSE_END);
    return clause === null ? [] : columnList(clause);
  }

  extractOrderByColumnNames(sql: string): string[] {
    const clause = this.clause(sql, /\bORDER\s+BY\b/i, ORDER_BY_CLAUSE_END);
    if (clause === null) return [];
    return columnList(
      splitTopLevelCommas(clause)
        .map((item) => item.replace(ORDER_DIRECTION, ''))
        .join(',')
    );
  }

  hasLimit(sql: string): boolean {
    const { topLevel } = this.scan(sql);
    return (
      /\bLIMIT\s+(?:\d+|\?|:\w+|\$\d+)/i.test(topLevel) ||
      /\bFETCH\s+(?:FIRST|NEXT)\b/i.test(topLevel) ||
      /\bSELECT\s+(?:DISTINCT\s+)?TOP\s*\(?\s*(?:\d+|\?)/i.test(topLevel)
    );
  }

  hasDistinct(sql: string): boolean {
    return /\bDISTINCT\b/i.test(this.scan(sql).topLevel);
  }

  hasSubquery(sql: string): boolean {
    return /\(\s*(?:SELECT|WITH)\b/i.test(this.scan(sql).masked);
  }

  hasOrderBy(sql: string): boolean {
    return /\bORDER\s+BY\b/i.test(this.scan(sql).topLevel);
  }

  hasGroupBy(sql: string): boolean {
    return /\bGROUP\s+BY\b/i.test(this.scan(sql).topLevel);
  }

  // ==========================================================================
  // SELECT List
  // ==========================================================================

  /**
   * Distinct table qualifiers used in the outer SELECT list
   */
  extractTableAliasesFromSelect(sql: string): string[] {
    const list = selectList(this.scan(sql).topLevel);
    if (list === null) return [];

    const aliases: string[] = [];
    SELECT_QUALIFIER.lastIndex = 0;
    let match: RegExpExecArray | null;
    while ((match = SELECT_QUALIFIER.exec(list)) !== null) {
      const alias = match[1];
      if (alias !== undefined && !aliases.includes(alias)) aliases.push(alias);
    }
    return aliases;
  }

  extractAggregationFunctions(sql: string): string[] {
    const list = selectList(this.scan(sql).topLevel);
    if (list === null) return [];

    const functions: string[] = [];
    AGGREGATE.lastIndex = 0;
    let match: RegExpExecArray | null;
    while ((match = AGGREGATE.exec(list)) !== null) {
      const name = match[1]?.toUpperCase();
      if (name !== undefined && !functions.includes(name)) functions.push(name);
    }
    return functions;
  }

  // ==========================================================================
  // LIKE Patterns
  // ==========================================================================

  /**
   * Literal LIKE patterns that start with `%`, in order of appearance
   */
  extractLeadingWildcardLikePatterns(sql: string): string[] {
    const { masked, literals } = this.scan(sql);
    const patterns: string[] = [];
    LIKE_LITERAL.lastIndex = 0;
    let match: RegExpExecArray | null;
    while ((match = LIKE_LITERAL.exec(masked)) !== null) {
      const pattern = literals.get(match.index + match[0].length);
      if (pattern !== undefined && pattern.length > 1 && pattern.startsWith('%')) {
        patterns.push(pattern);
      }
    }
    return patterns;
  }

  hasLeadingWildcardLike(sql: string): boolean {
    return this.extractLeadingWildcardLikePatterns(sql).length > 0;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private scan(sql: string): ScannedSql {
    const cached = this.scans.get(sql);
    if (cached) return cached;

    const scanned = scanSql(sql);
    if (this.scans.size >= this.maxScans) {
      const oldest = this.scans.keys().next();
      if (oldest.done !== true) {
        this.scans.delete(oldest.value);
        this.joinLists.delete(oldest.value);
      }
    }
    this.scans.set(sql, scanned);
    return scanned;
  }

  private scanJoins(sql: string): ScannedJoin[] {
    const scanned = this.scan(sql);
    const cached = this.joinLists.get(sql);
    if (cached) return cached;

    const joins = readJoins(scanned);
    this.joinLists.set(sql, joins);
    return joins;
  }

  private findJoinByText(sql: string, joinText: string): ScannedJoin | undefined {
    const wanted = collapse(joinText).toUpperCase();
    return this.scanJoins(sql).find(
      (join) =>
        collapse(join.text).toUpperCase() === wanted ||
        collapse(`${join.type} JOIN ${join.table}${join.alias !== null && !join.aliasIsImplicit ? ` ${join.alias}` : ''}`).toUpperCase() === wanted
    );
  }

  /**
   * Outer clause text between `opener` and the first `end` keyword after it
   */
  private clause(sql: string, opener: RegExp, end: RegExp): string | null {
    const { topLevel } = this.scan(sql);
    const start = opener.exec(topLevel);
    if (!start) return null;

    const from = start.index + start[0].length;
    end.lastIndex = from;
    const stop = end.exec(topLevel);
    return topLevel.slice(from, stop ? stop.index : topLevel.length);
  }
}

// ============================================================================
// Join Reading
// ============================================================================

function readJoins(scanned: ScannedSql): ScannedJoin[] {
  const { original, masked, topLevel } = scanned;
  const joins: ScannedJoin[] = [];

  JOIN_HEAD.lastIndex = 0;
  let head: RegExpExecArray | null;
  while ((head = JOIN_HEAD.exec(topLevel)) !== null) {
    const start = head.index;
    const type: JoinType = head[1]
      ? toJoinType(head[1])
      : head[3]
        ? 'CROSS'
        : 'INNER';

    let cursor = start + head[0].length;
    let table: string;
    if (topLevel.charAt(cursor) === '(') {
      const close = topLevel.indexOf(')', cursor);
      if (close === -1) continue;
      table = '(subquery)';
      cursor = close + 1;
    } else {
      TABLE_NAME.lastIndex = cursor;
      const name = TABLE_NAME.exec(topLevel);
      if (!name) continue;
      table = unquoteIdentifier(name[0]);
      cursor += name[0].length;
    }

    let alias: string | null = null;
    ALIAS.lastIndex = cursor;
    const aliasMatch = ALIAS.exec(topLevel);
    if (aliasMatch?.[1] && !NON_ALIAS_KEYWORDS.has(aliasMatch[1].toUpperCase())) {
      alias = unquoteIdentifier(aliasMatch[1]);
      cursor += aliasMatch[0].length;
    }
    const headerEnd = cursor;

    let onSpan: [number, number] | null = null;
    let clauseEnd = headerEnd;
    ON_OR_USING.lastIndex = headerEnd;
    const condition = ON_OR_USING.exec(topLevel);
    if (condition) {
      const conditionStart = headerEnd + condition[0].length;
      JOIN_CLAUSE_END.lastIndex = conditionStart;
      const boundary = JOIN_CLAUSE_END.exec(topLevel);
      clauseEnd = boundary ? boundary.index : topLevel.length;
      if (condition[1]?.toUpperCase() === 'ON') onSpan = [conditionStart, clauseEnd];
    }

    let aliasIsImplicit = false;
    if (alias === null && !table.includes('.') && table !== '(subquery)') {
      const qualifier = new RegExp(`(?<![\\w$."\`])${escapeRegExp(table)}\\s*\\.`, 'i');
      if (qualifier.test(masked)) {
        alias = table;
        aliasIsImplicit = true;
      }
    }

    joins.push({
      type,
      table,
      alias,
      aliasIsImplicit,
      onClause: onSpan ? original.slice(onSpan[0], onSpan[1]).trim() : null,
      text: original.slice(start, headerEnd).trim(),
      start,
      clauseEnd,
      onSpan,
    });

    JOIN_HEAD.lastIndex = headerEnd;
  }

  return joins;
}

function readTableReference(view: string, at: number): TableReference | null {
  TABLE_NAME.lastIndex = at;
  const name = TABLE_NAME.exec(view);
  if (!name) return null;

  let alias: string | null = null;
  ALIAS.lastIndex = at + name[0].length;
  const aliasMatch = ALIAS.exec(view);
  if (aliasMatch?.[1] && !NON_ALIAS_KEYWORDS.has(aliasMatch[1].toUpperCase())) {
    alias = unquoteIdentifier(aliasMatch[1]);
  }
  return { table: unquoteIdentifier(name[0]), alias };
}

function toJoinType(side: string): JoinType {
  switch (side.toUpperCase()) {
    case 'LEFT':
      return 'LEFT';
    case 'RIGHT':
      return 'RIGHT';
    default:
      return 'FULL';
  }
}

function toJoinFact(join: ScannedJoin): JoinFact {
  return {
    type: join.type,
    table: join.table,
    alias: join.alias,
    aliasIsImplicit: join.aliasIsImplicit,
    onClause: join.onClause,
    text: join.text,
  };
}

// ============================================================================
// Text Helpers
// ============================================================================

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function blankRange(text: string, start: number, end: number): string {
  return text.slice(0, start) + ' '.repeat(end - start) + text.slice(end);
}

function lastSegment(column: string): string {
  const dot = column.lastIndexOf('.');
  return dot === -1 ? column : column.slice(dot + 1);
}

function qualifierOf(column: string): string | null {
  const dot = column.lastIndexOf('.');
  return dot === -1 ? null : column.slice(0, dot).toLowerCase();
}

/**
 * Text between the outer SELECT (and DISTINCT) and its FROM
 */
function selectList(topLevel: string): string | null {
  const select = /\bSELECT\s+(?:DISTINCT\s+)?/i.exec(topLevel);
  if (!select) return null;
  const from = select.index + select[0].length;
  FROM_KEYWORD.lastIndex = from;
  const end = FROM_KEYWORD.exec(topLevel);
  return topLevel.slice(from, end ? end.index : topLevel.length);
}

function selectsEverything(topLevel: string): boolean {
  const list = selectList(topLevel);
  if (list === null) return false;
  return splitTopLevelCommas(list).some((item) => item === '*');
}

/**
 * Plain column names of a comma-separated clause; expressions are skipped
 */
function columnList(clause: string): string[] {
  const columns: string[] = [];
  for (const item of splitTopLevelCommas(clause)) {
    const match = SIMPLE_COLUMN.exec(item);
    if (match?.[1] === undefined) continue;
    const name = unquoteIdentifier(match[1]);
    if (/^\d+$/.test(name) || NON_ALIAS_KEYWORDS.has(name.toUpperCase())) continue;
    columns.push(name);
  }
  return columns;
}
