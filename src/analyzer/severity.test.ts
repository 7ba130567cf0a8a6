/**
 * @module analyzer/severity.test
 * @description Unit tests for impact-based severity grading
 * @status COMPLETE
 * @dependencies src/analyzer/severity.ts
 */

import { describe, it, expect } from 'vitest';
import {
  compareSeverity,
  findAllSeverity,
  flushInLoopSeverity,
  frequentQuerySeverity,
  nPlusOneSeverity,
  slowQuerySeverity,
} from './severity';

describe('severity grading', () => {
  it('grades N+1 by count or total time', () => {
    expect(nPlusOneSeverity(5, 5)).toBe('INFO');
    expect(nPlusOneSeverity(11, 5)).toBe('WARNING');
    expect(nPlusOneSeverity(5, 11)).toBe('WARNING');
    expect(nPlusOneSeverity(101, 0)).toBe('CRITICAL');
    expect(nPlusOneSeverity(5, 101)).toBe('CRITICAL');
  });

  it('grades frequent queries with a higher warning count', () => {
    expect(frequentQuerySeverity(20, 10)).toBe('INFO');
    expect(frequentQuerySeverity(21, 10)).toBe('WARNING');
    expect(frequentQuerySeverity(20, 150)).toBe('CRITICAL');
  });

  it('grades slow queries by time', () => {
    expect(slowQuerySeverity(10)).toBe('INFO');
    expect(slowQuerySeverity(10.5)).toBe('WARNING');
    expect(slowQuerySeverity(100)).toBe('WARNING');
    expect(slowQuerySeverity(100.01)).toBe('CRITICAL');
  });

  it('grades unpaginated reads by rows or time', () => {
    expect(findAllSeverity(100, 0)).toBe('INFO');
    expect(findAllSeverity(101, 0)).toBe('WARNING');
    expect(findAllSeverity(50, 51)).toBe('WARNING');
    expect(findAllSeverity(10001, 0)).toBe('CRITICAL');
  });

  it('grades flush loops by flush count', () => {
    expect(flushInLoopSeverity(50)).toBe('WARNING');
    expect(flushInLoopSeverity(51)).toBe('CRITICAL');
  });

  it('orders severities', () => {
    expect(compareSeverity('CRITICAL', 'WARNING')).toBeGreaterThan(0);
    expect(compareSeverity('INFO', 'WARNING')).toBeLessThan(0);
    expect(compareSeverity('INFO', 'INFO')).toBe(0);
  });
});
