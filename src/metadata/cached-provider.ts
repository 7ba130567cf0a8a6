/**
 * @module metadata/cached-provider
 * @description Run-scoped memo over a metadata provider
 * @status COMPLETE
 * @dependencies src/types/metadata.ts
 */

import type { Logger } from '../types/common';
import type { AssociationFact, EntityMetadataProvider } from '../types/metadata';

/**
 * Loads every association once per run and answers table lookups from memory.
 * Owned by one AnalysisContext; never shared between runs.
 */
export class CachedMetadataProvider implements EntityMetadataProvider {
  private associations: ReadonlyMap<string, readonly AssociationFact[]> | null = null;
  private byTable: Map<string, readonly AssociationFact[]> | null = null;
  private readonly identifiers = new Map<string, readonly string[]>();
  private readonly known = new Map<string, boolean>();

  constructor(
    private readonly inner: EntityMetadataProvider,
    private readonly logger?: Logger
  ) {}

  getAllAssociations(): ReadonlyMap<string, readonly AssociationFact[]> {
    if (this.associations === null) {
      this.associations = this.inner.getAllAssociations();
      this.logger?.debug('Entity metadata loaded', { tables: this.associations.size });
    }
    return this.associations;
  }

  /**
   * Associations declared by one table, matched case-insensitively
   */
  getAssociations(table: string): readonly AssociationFact[] {
    if (this.byTable === null) {
      this.byTable = new Map();
      for (const [name, associations] of this.getAllAssociations()) {
        this.byTable.set(name.toLowerCase(), associations);
      }
    }
    return this.byTable.get(table.toLowerCase()) ?? [];
  }

  /**
   * Every association, from any table, that points at `table`
   */
  getAssociationsTargeting(table: string): AssociationFact[] {
    const wanted = table.toLowerCase();
    const found: AssociationFact[] = [];
    for (const associations of this.getAllAssociations().values()) {
      for (const association of associations) {
        if (association.targetTable.toLowerCase() === wanted) found.push(association);
      }
    }
    return found;
  }

  getIdentifierColumns(table: string): readonly string[] {
    const key = table.toLowerCase();
    const cached = this.identifiers.get(key);
    if (cached) return cached;

    const columns = this.inner.getIdentifierColumns(table);
    this.identifiers.set(key, columns);
    return columns;
  }

  hasTable(table: string): boolean {
    const key = table.toLowerCase();
    const cached = this.known.get(key);
    if (cached !== undefined) return cached;

    const result = this.inner.hasTable(table);
    this.known.set(key, result);
    return result;
  }
}
