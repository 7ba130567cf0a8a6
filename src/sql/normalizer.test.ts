/**
 * @module sql/normalizer.test
 * @description Unit tests for query normalization
 * @status COMPLETE
 * @dependencies src/sql/normalizer.ts
 */

import { describe, it, expect } from 'vitest';
import { normalizeQuery } from './normalizer';

describe('normalizeQuery', () => {
  it('replaces string and number literals with placeholders', () => {
    expect(normalizeQuery("select * from users where id = 42 and name = 'bob'")).toBe(
      'SELECT * FROM USERS WHERE ID = ? AND NAME = ?'
    );
  });

  it('collapses IN lists of any length to one placeholder', () => {
    expect(normalizeQuery('SELECT * FROM t WHERE id IN (1, 2, 3)')).toBe('SELECT * FROM T WHERE ID IN (?)');
    expect(normalizeQuery('SELECT * FROM t WHERE id IN (7)')).toBe('SELECT * FROM T WHERE ID IN (?)');
  });

  it('collapses whitespace', () => {
    expect(normalizeQuery('SELECT  *\n   FROM t ')).toBe('SELECT * FROM T');
  });

  it('keeps digits that are part of identifiers', () => {
    expect(normalizeQuery('SELECT * FROM t2 WHERE c = 5')).toBe('SELECT * FROM T2 WHERE C = ?');
  });

  it('maps executions that differ only in values to the same pattern', () => {
    const a = normalizeQuery("SELECT * FROM orders WHERE customer_id = 1 AND status = 'paid'");
    const b = normalizeQuery("SELECT * FROM orders WHERE customer_id = 977 AND status = 'open'");

    expect(a).toBe(b);
  });
});
