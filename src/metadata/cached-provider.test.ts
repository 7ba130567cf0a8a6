/**
 * @module metadata/cached-provider.test
 * @description Unit tests for the run-scoped metadata memo
 * @status COMPLETE
 * @dependencies src/metadata/cached-provider.ts
 */

import { describe, it, expect } from 'vitest';
import type { Logger } from '../types/common';
import type { AssociationFact, EntityMetadataProvider } from '../types/metadata';
import { CachedMetadataProvider } from './cached-provider';

// ============================================================================
// Test Helpers
// ============================================================================

class CountingProvider implements EntityMetadataProvider {
  calls = { associations: 0, identifiers: 0, hasTable: 0 };

  getAllAssociations(): ReadonlyMap<string, readonly AssociationFact[]> {
    this.calls.associations++;
    return new Map<string, readonly AssociationFact[]>([
      [
        'Orders',
        [{ field: 'customer', targetTable: 'customers', cardinality: 'MANY_TO_ONE', joinColumns: [] }],
      ],
      ['invoices', [{ field: 'customer', targetTable: 'Customers', cardinality: 'MANY_TO_ONE', joinColumns: [] }]],
      ['customers', []],
    ]);
  }

  getIdentifierColumns(table: string): readonly string[] {
    this.calls.identifiers++;
    return table === 'orders' ? ['id'] : [];
  }

  hasTable(table: string): boolean {
    this.calls.hasTable++;
    return table === 'orders';
  }
}

function recordingLogger(): { logger: Logger; debug: string[] } {
  const debug: string[] = [];
  const noop = (): void => undefined;
  return {
    debug,
    logger: { debug: (message) => debug.push(message), info: noop, warn: noop, error: noop },
  };
}

// ============================================================================
// Tests
// ============================================================================

describe('CachedMetadataProvider', () => {
  it('loads associations once', () => {
    const inner = new CountingProvider();
    const cached = new CachedMetadataProvider(inner);

    cached.getAllAssociations();
    cached.getAssociations('orders');
    cached.getAssociationsTargeting('customers');

    expect(inner.calls.associations).toBe(1);
  });

  it('looks up associations by table case-insensitively', () => {
    const cached = new CachedMetadataProvider(new CountingProvider());

    expect(cached.getAssociations('ORDERS').map((a) => a.field)).toEqual(['customer']);
    expect(cached.getAssociations('missing')).toEqual([]);
  });

  it('finds associations targeting a table from any owner', () => {
    const cached = new CachedMetadataProvider(new CountingProvider());

    expect(cached.getAssociationsTargeting('customers').map((a) => a.targetTable)).toEqual([
      'customers',
      'Customers',
    ]);
  });

  it('memoizes identifier and table lookups', () => {
    const inner = new CountingProvider();
    const cached = new CachedMetadataProvider(inner);

    expect(cached.getIdentifierColumns('orders')).toEqual(['id']);
    expect(cached.getIdentifierColumns('orders')).toEqual(['id']);
    expect(cached.hasTable('orders')).toBe(true);
    expect(cached.hasTable('orders')).toBe(true);
    expect(cached.hasTable('users')).toBe(false);
    expect(cached.hasTable('users')).toBe(false);

    expect(inner.calls).toEqual({ associations: 0, identifiers: 1, hasTable: 2 });
  });

  it('logs the metadata load once', () => {
    const { logger, debug } = recordingLogger();
    const cached = new CachedMetadataProvider(new CountingProvider(), logger);

    cached.getAllAssociations();
    cached.getAllAssociations();

    expect(debug).toEqual(['Entity metadata loaded']);
  });
});
