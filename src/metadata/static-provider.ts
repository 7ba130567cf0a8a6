/**
 * @module metadata/static-provider
 * @description In-memory metadata provider built from a JSON document
 * @status COMPLETE
 * @dependencies zod, src/types/metadata.ts
 */

import { z } from 'zod';
import { appError, err, ok, type AppError, type Result } from '../types/common';
import type { AssociationFact, EntityMetadataProvider } from '../types/metadata';

// ============================================================================
// Schema
// ============================================================================

const joinColumnSchema = z.object({
  name: z.string().min(1),
  nullable: z.boolean().default(true),
});

const associationSchema = z.object({
  field: z.string().min(1),
  targetTable: z.string().min(1),
  cardinality: z.enum(['ONE_TO_ONE', 'ONE_TO_MANY', 'MANY_TO_ONE', 'MANY_TO_MANY']),
  joinColumns: z.array(joinColumnSchema).default([]),
});

const tableSchema = z.object({
  identifiers: z.array(z.string().min(1)).default(['id']),
  associations: z.array(associationSchema).default([]),
});

/**
 * `{ "tables": { "<table>": { "identifiers": [...], "associations": [...] } } }`
 */
export const metadataDocumentSchema = z.object({
  tables: z.record(tableSchema),
});

export type MetadataDocument = z.input<typeof metadataDocumentSchema>;

export interface TableMetadata {
  identifiers: readonly string[];
  associations: readonly AssociationFact[];
}

// ============================================================================
// Provider
// ============================================================================

/**
 * Table names are matched case-insensitively
 *
 * @example
 * const metadata = new StaticMetadataProvider({
 *   orders: {
 *     identifiers: ['id'],
 *     associations: [{ field: 'customer', targetTable: 'customers', cardinality: 'MANY_TO_ONE',
 *       joinColumns: [{ name: 'customer_id', nullable: false }] }],
 *   },
 * });
 */
export class StaticMetadataProvider implements EntityMetadataProvider {
  private readonly tables: Map<string, TableMetadata>;
  private readonly associations: ReadonlyMap<string, readonly AssociationFact[]>;

  constructor(tables: Readonly<Record<string, TableMetadata>>) {
    this.tables = new Map();
    const associations = new Map<string, readonly AssociationFact[]>();
    for (const [name, table] of Object.entries(tables)) {
      this.tables.set(name.toLowerCase(), table);
      associations.set(name, table.associations);
    }
    this.associations = associations;
  }

  /**
   * Validate a parsed JSON document and build a provider from it
   */
  static fromDocument(json: unknown): Result<StaticMetadataProvider, AppError> {
    const parsed = metadataDocumentSchema.safeParse(json);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      const where = first && first.path.length > 0 ? ` at ${first.path.join('.')}` : '';
      return err(appError('METADATA_INVALID', `Metadata document is invalid${where}: ${first?.message ?? 'unknown error'}`));
    }
    return ok(new StaticMetadataProvider(parsed.data.tables));
  }

  getAllAssociations(): ReadonlyMap<string, readonly AssociationFact[]> {
    return this.associations;
  }

  getIdentifierColumns(table: string): readonly string[] {
    return this.tables.get(table.toLowerCase())?.identifiers ?? [];
  }

  hasTable(table: string): boolean {
    return this.tables.has(table.toLowerCase());
  }
}
