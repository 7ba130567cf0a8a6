/**
 * @module sql/structural-cache
 * @description Run-scoped memo of structural facts shared by every analyzer
 * @status COMPLETE
 * @dependencies src/sql/structure-extractor.ts, src/sql/normalizer.ts, src/types/query.ts
 */

import { CACHE_DEFAULTS } from '../constants';
import type { StructuralFactName, StructuralFacts } from '../types/query';
import { normalizeQuery } from './normalizer';
import { SqlStructureExtractor } from './structure-extractor';

// ============================================================================
// Fact Table
// ============================================================================

type FactComputers = {
  [K in StructuralFactName]: (extractor: SqlStructureExtractor, sql: string) => StructuralFacts[K];
};

const FACTS: FactComputers = {
  mainTable: (x, sql) => x.extractMainTable(sql),
  joins: (x, sql) => x.extractJoins(sql),
  joinCount: (x, sql) => x.countJoins(sql),
  hasJoin: (x, sql) => x.hasJoin(sql),
  allTables: (x, sql) => x.extractAllTables(sql),
  whereColumns: (x, sql) => x.extractWhereColumns(sql),
  hasWhere: (x, sql) => x.hasWhere(sql),
  parameterBoundColumns: (x, sql) => x.extractParameterBoundColumns(sql),
  groupByColumns: (x, sql) => x.extractGroupByColumns(sql),
  orderByColumns: (x, sql) => x.extractOrderByColumnNames(sql),
  hasLimit: (x, sql) => x.hasLimit(sql),
  hasDistinct: (x, sql) => x.hasDistinct(sql),
  hasSubquery: (x, sql) => x.hasSubquery(sql),
  hasOrderBy: (x, sql) => x.hasOrderBy(sql),
  hasGroupBy: (x, sql) => x.hasGroupBy(sql),
  hasComplexWhereConditions: (x, sql) => x.hasComplexWhereConditions(sql),
  likeLeadingWildcardPatterns: (x, sql) => x.extractLeadingWildcardLikePatterns(sql),
  tableAliasesInSelect: (x, sql) => x.extractTableAliasesFromSelect(sql),
  aggregateFunctions: (x, sql) => x.extractAggregationFunctions(sql),
  hasLocaleConstraintInJoin: (x, sql) => x.hasLocaleConstraintInJoin(sql),
  hasUniqueJoinConstraint: (x, sql) => x.hasUniqueJoinConstraint(sql),
  writeTarget: (x, sql) => x.extractWriteTarget(sql),
  normalized: (_x, sql) => normalizeQuery(sql),
};

// ============================================================================
// Cache
// ============================================================================

export interface StructuralCacheStats {
  hits: number;
  misses: number;
  /** Distinct SQL strings currently held */
  entries: number;
  evictions: number;
}

/**
 * Memoizes extractor answers by exact SQL text.
 *
 * Textually different SQL is cached separately even when equivalent.
 * Holds at most `maxEntries` SQL strings, dropping the least recently used.
 *
 * @example
 * const cache = new StructuralCache();
 * cache.get(sql, 'joinCount'); // computed
 * cache.get(sql, 'joinCount'); // served from cache
 */
export class StructuralCache {
  private readonly entries = new Map<string, Partial<StructuralFacts>>();
  private readonly maxEntries: number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(
    readonly extractor: SqlStructureExtractor = new SqlStructureExtractor(),
    options: { maxEntries?: number } = {}
  ) {
    this.maxEntries = Math.max(1, options.maxEntries ?? CACHE_DEFAULTS.MAX_ENTRIES);
  }

  /**
   * Cached or computed fact. Extractor errors propagate and are not cached.
   */
  get<K extends StructuralFactName>(sql: string, fact: K): StructuralFacts[K] {
    const facts = this.touch(sql);
    const cached = facts[fact];
    if (cached !== undefined) {
      this.hits++;
      return cached;
    }

    this.misses++;
    const value = FACTS[fact](this.extractor, sql);
    facts[fact] = value;
    return value;
  }

  getStats(): StructuralCacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      entries: this.entries.size,
      evictions: this.evictions,
    };
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
  }

  /**
   * Fact record for `sql`, moved to the most recently used position
   */
  private touch(sql: string): Partial<StructuralFacts> {
    const existing = this.entries.get(sql);
    if (existing) {
      this.entries.delete(sql);
      this.entries.set(sql, existing);
      return existing;
    }

    if (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done !== true) {
        this.entries.delete(oldest.value);
        this.evictions++;
      }
    }

    const created: Partial<StructuralFacts> = {};
    this.entries.set(sql, created);
    return created;
  }
}
