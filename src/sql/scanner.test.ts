/**
 * @module sql/scanner.test
 * @description Unit tests for SQL masking views
 * @status COMPLETE
 * @dependencies src/sql/scanner.ts
 */

import { describe, it, expect } from 'vitest';
import { SQL_LIMITS } from '../constants';
import { SqlStructureError } from '../types/common';
import { scanSql, splitTopLevelCommas, unquoteIdentifier } from './scanner';

describe('scanSql', () => {
  describe('string literals', () => {
    it('blanks literal contents but keeps the quotes', () => {
      const scanned = scanSql("SELECT 'a JOIN b' FROM t");

      expect(scanned.masked).toBe(`SELECT '${' '.repeat(8)}' FROM t`);
      expect(scanned.masked.length).toBe(scanned.original.length);
    });

    it('records literal contents by the offset of the opening quote', () => {
      const scanned = scanSql("SELECT 'a JOIN b' FROM t");

      expect(scanned.literals.get(7)).toBe('a JOIN b');
    });

    it('unescapes doubled and backslashed quotes', () => {
      const scanned = scanSql("SELECT * FROM t WHERE n = 'O''Brien' OR m = 'it\\'s'");

      expect([...scanned.literals.values()]).toEqual(["O'Brien", "it's"]);
    });

    it('copies quoted identifiers unchanged', () => {
      const scanned = scanSql('SELECT "select" FROM `order`');

      expect(scanned.masked).toBe('SELECT "select" FROM `order`');
    });
  });

  describe('comments', () => {
    it('blanks line comments up to the newline', () => {
      const scanned = scanSql('SELECT 1 -- JOIN x\nFROM t');

      expect(scanned.masked).toBe(`SELECT 1 ${' '.repeat(9)}\nFROM t`);
    });

    it('blanks block comments', () => {
      const scanned = scanSql('SELECT /* JOIN u */ 1');

      expect(scanned.masked).not.toContain('JOIN');
      expect(scanned.masked.length).toBe(21);
    });
  });

  describe('subqueries', () => {
    it('blanks subquery bodies in the top-level view only', () => {
      const scanned = scanSql('SELECT * FROM a WHERE id IN (SELECT a_id FROM b)');

      expect(scanned.masked).toContain('FROM b');
      expect(scanned.topLevel).not.toContain('FROM b');
      expect(scanned.topLevel.startsWith('SELECT * FROM a WHERE id IN (')).toBe(true);
      expect(scanned.topLevel.endsWith(')')).toBe(true);
    });

    it('keeps ordinary parentheses', () => {
      const scanned = scanSql('SELECT COUNT(*) FROM t WHERE a IN (1, 2)');

      expect(scanned.topLevel).toBe('SELECT COUNT(*) FROM t WHERE a IN (1, 2)');
    });
  });

  it('throws SqlStructureError above the length limit', () => {
    const oversized = 'x'.repeat(SQL_LIMITS.MAX_SQL_LENGTH + 1);

    expect(() => scanSql(oversized)).toThrow(SqlStructureError);
  });
});

describe('helpers', () => {
  it('splits on top-level commas only', () => {
    expect(splitTopLevelCommas('a, f(b, c), d')).toEqual(['a', 'f(b, c)', 'd']);
  });

  it('strips identifier quoting', () => {
    expect(unquoteIdentifier('`users`')).toBe('users');
    expect(unquoteIdentifier('"app"."users"')).toBe('app.users');
    expect(unquoteIdentifier('[users]')).toBe('users');
  });
});
