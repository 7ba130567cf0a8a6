/**
 * @module analyzer/detectors/limit-with-collection-join.test
 * @description Unit tests for LIMIT over fetch-joined collections
 * @status COMPLETE
 * @dependencies src/analyzer/detectors/limit-with-collection-join.ts
 */

import { describe, it, expect } from 'vitest';
import { QueryTrace } from '../../trace';
import type { Issue } from '../../types/issues';
import { createAnalysisContext } from '../context';
import { createLimitWithCollectionJoinAnalyzer } from './limit-with-collection-join';

function detect(sql: string): Issue[] {
  const trace = QueryTrace.fromInputs([{ sql }]);
  return [...createLimitWithCollectionJoinAnalyzer().analyze(trace, createAnalysisContext())];
}

describe('createLimitWithCollectionJoinAnalyzer', () => {
  it('reports LIMIT over a fetch-joined collection', () => {
    const sql = 'SELECT p.id, c.body FROM posts p LEFT JOIN comments c ON c.post_id = p.id LIMIT 10';

    const [issue] = detect(sql);

    expect(issue?.severity).toBe('CRITICAL');
    expect(issue?.category).toBe('INTEGRITY');
    expect(issue?.details).toEqual({ table: 'posts', selected_aliases: ['p', 'c'], query: sql });
  });

  it('ignores queries without LIMIT', () => {
    expect(detect('SELECT p.id, c.body FROM posts p LEFT JOIN comments c ON c.post_id = p.id')).toEqual([]);
  });

  it('ignores locale-filtered translation joins', () => {
    expect(
      detect(
        'SELECT p.id, t.name FROM products p LEFT JOIN product_translations t ON t.product_id = p.id AND t.locale = ? LIMIT 10'
      )
    ).toEqual([]);
  });

  it('ignores joins on the joined table identifier', () => {
    expect(detect('SELECT o.id, c.name FROM orders o JOIN customers c ON c.id = o.customer_id LIMIT 5')).toEqual([]);
  });

  it('ignores queries selecting from one alias', () => {
    expect(detect('SELECT p.* FROM posts p LEFT JOIN comments c ON c.post_id = p.id LIMIT 10')).toEqual([]);
  });
});
