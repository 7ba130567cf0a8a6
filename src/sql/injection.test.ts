/**
 * @module sql/injection.test
 * @description Unit tests for injection indicators
 * @status COMPLETE
 * @dependencies src/sql/injection.ts
 */

import { describe, it, expect } from 'vitest';
import { assessInjectionRisk, isSuspiciousLiteral, isSuspiciousNumeric } from './injection';

describe('assessInjectionRisk', () => {
  it('reports nothing for parameterized SQL', () => {
    expect(assessInjectionRisk('SELECT * FROM users WHERE id = ?')).toEqual({ riskLevel: 0, indicators: [] });
  });

  it('ignores enum-like status literals', () => {
    expect(assessInjectionRisk("SELECT * FROM orders WHERE status = 'active'").riskLevel).toBe(0);
  });

  it('rates a free-form WHERE literal as high', () => {
    expect(assessInjectionRisk("SELECT * FROM users WHERE email = 'alice@example.test'")).toEqual({
      riskLevel: 2,
      indicators: ['WHERE clause with literal string instead of parameter'],
    });
  });

  it('rates a tautology with a trailing comment as critical', () => {
    expect(assessInjectionRisk("SELECT * FROM users WHERE name = 'x' OR 1=1 -- '")).toEqual({
      riskLevel: 3,
      indicators: ['Boolean tautology (OR 1=1)', 'SQL comment sequence'],
    });
  });

  it('rates a stacked DROP as critical', () => {
    const assessment = assessInjectionRisk('SELECT * FROM t WHERE a = 1; DROP TABLE users');

    expect(assessment.riskLevel).toBe(3);
    expect(assessment.indicators).toContain('Stacked statement (; DROP / DELETE)');
  });

  it('adds a quoted-number indicator to a WHERE literal', () => {
    expect(assessInjectionRisk("SELECT * FROM items WHERE code = '12abc'")).toEqual({
      riskLevel: 3,
      indicators: [
        'WHERE clause with literal string instead of parameter',
        'Numeric value in quotes (possible concatenation)',
      ],
    });
  });
});

describe('literal classification', () => {
  it('accepts identifiers, dates and versions in quotes', () => {
    expect(isSuspiciousNumeric('123')).toBe(false);
    expect(isSuspiciousNumeric('2024-01-05')).toBe(false);
    expect(isSuspiciousNumeric('1.2.3')).toBe(false);
    expect(isSuspiciousNumeric('abc')).toBe(false);
  });

  it('flags mixed digits and letters', () => {
    expect(isSuspiciousNumeric('12abc')).toBe(true);
  });

  it('treats short words and known statuses as safe', () => {
    expect(isSuspiciousLiteral('pending')).toBe(false);
    expect(isSuspiciousLiteral('')).toBe(false);
    expect(isSuspiciousLiteral('Robert Tables')).toBe(true);
  });
});
