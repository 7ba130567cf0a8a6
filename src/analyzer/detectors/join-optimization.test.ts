/**
 * @module analyzer/detectors/join-optimization.test
 * @description Unit tests for JOIN misuse detection
 * @status COMPLETE
 * @dependencies src/analyzer/detectors/join-optimization.ts
 */

import { describe, it, expect } from 'vitest';
import { StaticMetadataProvider, type TableMetadata } from '../../metadata';
import { QueryTrace } from '../../trace';
import type { Issue } from '../../types/issues';
import { createAnalysisContext } from '../context';
import { createJoinOptimizationAnalyzer } from './join-optimization';

// ============================================================================
// Test Helpers
// ============================================================================

function detect(sql: string, tables?: Record<string, TableMetadata>): Issue[] {
  const trace = QueryTrace.fromInputs([{ sql }]);
  const metadata = tables ? new StaticMetadataProvider(tables) : null;
  return [...createJoinOptimizationAnalyzer().analyze(trace, createAnalysisContext({ metadata }))];
}

function joins(count: number): string {
  const parts = ['SELECT * FROM a'];
  for (let i = 1; i <= count; i++) parts.push(`JOIN t${i} ON t${i}.a_id = a.id`);
  return parts.join(' ');
}

function ordersMetadata(nullable: boolean): Record<string, TableMetadata> {
  return {
    orders: {
      identifiers: ['id'],
      associations: [
        {
          field: 'customer',
          targetTable: 'customers',
          cardinality: 'MANY_TO_ONE',
          joinColumns: [{ name: 'customer_id', nullable }],
        },
      ],
    },
    customers: { identifiers: ['id'], associations: [] },
  };
}

const ORDERS_LEFT_JOIN = 'SELECT o FROM orders o LEFT JOIN customers c ON o.customer_id = c.id';

// ============================================================================
// Tests
// ============================================================================

describe('createJoinOptimizationAnalyzer', () => {
  describe('too many joins', () => {
    it('reports more joins than recommended', () => {
      const issues = detect(joins(6));

      expect(issues.map((issue) => issue.type)).toEqual(['join_too_many']);
      expect(issues[0]?.severity).toBe('WARNING');
      expect(issues[0]?.title).toBe('Too Many JOINs in Single Query (6 tables)');
    });

    it('becomes critical above the critical limit', () => {
      expect(detect(joins(9))[0]?.severity).toBe('CRITICAL');
    });

    it('accepts the recommended number of joins', () => {
      expect(detect(joins(5))).toEqual([]);
    });
  });

  describe('suboptimal LEFT JOIN', () => {
    it('reports a LEFT JOIN over a NOT NULL foreign key', () => {
      const issues = detect(ORDERS_LEFT_JOIN, ordersMetadata(false));

      expect(issues.map((issue) => [issue.type, issue.severity])).toEqual([
        ['join_suboptimal_left', 'CRITICAL'],
        ['join_unused', 'WARNING'],
      ]);
      expect(issues[0]?.details).toEqual({
        table: 'customers',
        alias: 'c',
        join_type: 'LEFT',
        query: ORDERS_LEFT_JOIN,
      });
    });

    it('accepts a LEFT JOIN over a nullable foreign key', () => {
      const issues = detect(ORDERS_LEFT_JOIN, ordersMetadata(true));

      expect(issues.map((issue) => issue.type)).toEqual(['join_unused']);
    });

    it('skips the check without metadata', () => {
      expect(detect(ORDERS_LEFT_JOIN).map((issue) => issue.type)).toEqual(['join_unused']);
    });

    it('never reports a collection join', () => {
      const issues = detect('SELECT c FROM customers c LEFT JOIN orders o ON c.id = o.customer_id', {
        customers: {
          identifiers: ['id'],
          associations: [{ field: 'orders', targetTable: 'orders', cardinality: 'ONE_TO_MANY', joinColumns: [] }],
        },
        orders: {
          identifiers: ['id'],
          associations: [
            {
              field: 'customer',
              targetTable: 'customers',
              cardinality: 'MANY_TO_ONE',
              joinColumns: [{ name: 'customer_id', nullable: false }],
            },
          ],
        },
      });

      expect(issues.map((issue) => issue.type)).toEqual(['join_unused']);
      expect(issues[0]?.details['table']).toBe('orders');
      expect(issues[0]?.details['alias']).toBe('o');
    });
  });

  describe('unused joins', () => {
    it('reports a join whose implicit alias is only used in its own condition', () => {
      const [issue] = detect('SELECT orders.id FROM orders JOIN customers ON orders.customer_id = customers.id');

      expect(issue?.type).toBe('join_unused');
      expect(issue?.description).toBe(
        "Query performs INNER JOIN on table 'customers' (alias 'customers') but never uses it. " +
          'Remove this JOIN to improve performance.'
      );
    });

    it('accepts a join whose alias is selected', () => {
      expect(detect('SELECT o.id, c.name FROM orders o JOIN customers c ON c.id = o.customer_id')).toEqual([]);
    });
  });

  describe('multi-step hydration', () => {
    it('reports two collection LEFT JOINs', () => {
      const issues = detect(
        'SELECT u FROM users u LEFT JOIN posts p ON p.user_id = u.id LEFT JOIN comments c ON c.user_id = u.id',
        {
          users: {
            identifiers: ['id'],
            associations: [
              { field: 'posts', targetTable: 'posts', cardinality: 'ONE_TO_MANY', joinColumns: [] },
              { field: 'comments', targetTable: 'comments', cardinality: 'ONE_TO_MANY', joinColumns: [] },
            ],
          },
          posts: { identifiers: ['id'], associations: [] },
          comments: { identifiers: ['id'], associations: [] },
        }
      );

      expect(issues.map((issue) => issue.type)).toEqual(['join_multi_step_hydration', 'join_unused', 'join_unused']);
      expect(issues[0]?.severity).toBe('WARNING');
      expect(issues[0]?.title).toBe('Multiple Collection JOINs Causing O(n^2) Hydration');
      expect(issues[0]?.details['tables']).toEqual(['posts', 'comments']);
    });

    it('ignores LEFT JOINs to tables without metadata', () => {
      const issues = detect(
        'SELECT u FROM users u LEFT JOIN posts p ON p.user_id = u.id LEFT JOIN comments c ON c.user_id = u.id',
        {
          users: {
            identifiers: ['id'],
            associations: [
              { field: 'posts', targetTable: 'posts', cardinality: 'ONE_TO_MANY', joinColumns: [] },
              { field: 'comments', targetTable: 'comments', cardinality: 'ONE_TO_MANY', joinColumns: [] },
            ],
          },
        }
      );

      expect(issues.map((issue) => issue.type)).toEqual(['join_unused', 'join_unused']);
    });
  });
});
