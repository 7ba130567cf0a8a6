/**
 * @module metadata/static-provider.test
 * @description Unit tests for the JSON-backed metadata provider
 * @status COMPLETE
 * @dependencies src/metadata/static-provider.ts
 */

import { describe, it, expect } from 'vitest';
import { StaticMetadataProvider } from './static-provider';

const ORDERS = {
  Orders: {
    identifiers: ['id'],
    associations: [
      {
        field: 'customer',
        targetTable: 'customers',
        cardinality: 'MANY_TO_ONE' as const,
        joinColumns: [{ name: 'customer_id', nullable: false }],
      },
    ],
  },
};

describe('StaticMetadataProvider', () => {
  it('matches table names case-insensitively', () => {
    const provider = new StaticMetadataProvider(ORDERS);

    expect(provider.hasTable('orders')).toBe(true);
    expect(provider.hasTable('ORDERS')).toBe(true);
    expect(provider.getIdentifierColumns('orders')).toEqual(['id']);
  });

  it('returns no identifiers for unknown tables', () => {
    const provider = new StaticMetadataProvider(ORDERS);

    expect(provider.hasTable('invoices')).toBe(false);
    expect(provider.getIdentifierColumns('invoices')).toEqual([]);
  });

  it('keys associations by the declared table name', () => {
    const provider = new StaticMetadataProvider(ORDERS);

    expect([...provider.getAllAssociations().keys()]).toEqual(['Orders']);
    expect(provider.getAllAssociations().get('Orders')?.[0]?.targetTable).toBe('customers');
  });

  describe('fromDocument', () => {
    it('fills default identifiers, associations and nullability', () => {
      const result = StaticMetadataProvider.fromDocument({
        tables: {
          users: {},
          posts: {
            associations: [
              { field: 'author', targetTable: 'users', cardinality: 'MANY_TO_ONE', joinColumns: [{ name: 'user_id' }] },
            ],
          },
        },
      });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.getIdentifierColumns('users')).toEqual(['id']);
      expect(result.data.getAllAssociations().get('users')).toEqual([]);
      expect(result.data.getAllAssociations().get('posts')?.[0]?.joinColumns).toEqual([
        { name: 'user_id', nullable: true },
      ]);
    });

    it('rejects an unknown cardinality', () => {
      const result = StaticMetadataProvider.fromDocument({
        tables: { posts: { associations: [{ field: 'tags', targetTable: 'tags', cardinality: 'SOME' }] } },
      });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('METADATA_INVALID');
      expect(result.error.message.startsWith('Metadata document is invalid at tables.posts.associations.0.cardinality')).toBe(
        true
      );
    });

    it('rejects a document without tables', () => {
      expect(StaticMetadataProvider.fromDocument({}).success).toBe(false);
    });
  });
});
