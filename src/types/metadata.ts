/**
 * @module types/metadata
 * @description Entity association facts supplied by the ORM metadata collaborator
 * @status COMPLETE
 * @dependencies none
 */

export type Cardinality = 'ONE_TO_ONE' | 'ONE_TO_MANY' | 'MANY_TO_ONE' | 'MANY_TO_MANY';

export interface JoinColumnFact {
  /** Foreign key column on the owning table */
  name: string;
  nullable: boolean;
}

/**
 * One association declared by a table's entity
 */
export interface AssociationFact {
  /** Property name on the entity */
  field: string;
  targetTable: string;
  cardinality: Cardinality;
  /** Empty for inverse-side associations */
  joinColumns: readonly JoinColumnFact[];
}

/**
 * Read-only source of association metadata for one analysis run
 */
export interface EntityMetadataProvider {
  /** Associations keyed by owning table name */
  getAllAssociations(): ReadonlyMap<string, readonly AssociationFact[]>;
  /** Primary key columns of a table, empty when unknown */
  getIdentifierColumns(table: string): readonly string[];
  hasTable(table: string): boolean;
}
