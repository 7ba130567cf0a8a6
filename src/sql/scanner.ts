/**
 * @module sql/scanner
 * @description Single-pass lexical masking of SQL text for keyword scans
 * @status COMPLETE
 * @dependencies src/constants.ts, src/types/common.ts
 *
 * Every view has the same length as the input, so a position found in a
 * masked view slices the original text directly.
 */

import { SQL_LIMITS } from '../constants';
import { SqlStructureError } from '../types/common';

// ============================================================================
// Types
// ============================================================================

export interface ScannedSql {
  /** Input text */
  original: string;
  /** String literal contents and comments replaced by spaces; quotes kept */
  masked: string;
  /** `masked` with the bodies of parenthesized subqueries blanked as well */
  topLevel: string;
  /** Unescaped literal contents, keyed by the offset of the opening quote */
  literals: ReadonlyMap<number, string>;
}

// ============================================================================
// Scanning
// ============================================================================

const SUBQUERY_OPENER = /\s*(?:SELECT|WITH)\b/iy;

/**
 * Scan a SQL string into its masked views
 *
 * @throws SqlStructureError when the text exceeds SQL_LIMITS.MAX_SQL_LENGTH
 */
export function scanSql(sql: string): ScannedSql {
  if (sql.length > SQL_LIMITS.MAX_SQL_LENGTH) {
    throw new SqlStructureError('SQL_TOO_LONG', `SQL exceeds ${SQL_LIMITS.MAX_SQL_LENGTH} characters`, {
      length: sql.length,
    });
  }

  const { masked, literals } = maskLiteralsAndComments(sql);
  return {
    original: sql,
    masked,
    topLevel: blankSubqueries(masked),
    literals,
  };
}

function maskLiteralsAndComments(sql: string): { masked: string; literals: Map<number, string> } {
  const out: string[] = [];
  const literals = new Map<number, string>();
  const n = sql.length;
  let i = 0;

  while (i < n) {
    const c = sql.charAt(i);
    const next = sql.charAt(i + 1);

    if (c === "'") {
      const start = i;
      let j = i + 1;
      let content = '';
      let closed = false;
      while (j < n) {
        const d = sql.charAt(j);
        if (d === '\\' && j + 1 < n) {
          content += sql.charAt(j + 1);
          j += 2;
          continue;
        }
        if (d === "'") {
          if (sql.charAt(j + 1) === "'") {
            content += "'";
            j += 2;
            continue;
          }
          closed = true;
          break;
        }
        content += d;
        j++;
      }
      literals.set(start, content);
      out.push("'", ' '.repeat(j - start - 1));
      if (closed) {
        out.push("'");
        j++;
      }
      i = j;
      continue;
    }

    if (c === '"' || c === '`') {
      // Quoted identifier: copied as is so its content is never read as a literal
      const close = sql.indexOf(c, i + 1);
      const end = close === -1 ? n : close + 1;
      out.push(sql.slice(i, end));
      i = end;
      continue;
    }

    if (c === '-' && next === '-') {
      const eol = sql.indexOf('\n', i);
      const end = eol === -1 ? n : eol;
      out.push(' '.repeat(end - i));
      i = end;
      continue;
    }

    if (c === '/' && next === '*') {
      const close = sql.indexOf('*/', i + 2);
      const end = close === -1 ? n : close + 2;
      out.push(' '.repeat(end - i));
      i = end;
      continue;
    }

    out.push(c);
    i++;
  }

  return { masked: out.join(''), literals };
}

/**
 * Blank everything between the parentheses of `( SELECT ... )` groups.
 * The outermost parentheses stay so that clause positions remain visible.
 */
function blankSubqueries(masked: string): string {
  const out: string[] = [];
  const stack: boolean[] = [];
  let subqueryDepth = 0;

  for (let i = 0; i < masked.length; i++) {
    const c = masked.charAt(i);

    if (c === '(') {
      SUBQUERY_OPENER.lastIndex = i + 1;
      const isSubquery = SUBQUERY_OPENER.test(masked);
      out.push(subqueryDepth > 0 ? ' ' : '(');
      stack.push(isSubquery);
      if (isSubquery) subqueryDepth++;
      continue;
    }

    if (c === ')' && stack.length > 0) {
      const wasSubquery = stack.pop();
      if (wasSubquery === true) subqueryDepth--;
      out.push(subqueryDepth > 0 ? ' ' : ')');
      continue;
    }

    out.push(subqueryDepth > 0 ? ' ' : c);
  }

  return out.join('');
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Escape a value for literal use inside a RegExp
 */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Strip identifier quoting (`name`, "name", [name])
 */
export function unquoteIdentifier(name: string): string {
  return name.replace(/[`"[\]]/g, '');
}

/**
 * Split on commas at parenthesis depth zero
 */
export function splitTopLevelCommas(text: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < text.length; i++) {
    const c = text.charAt(i);
    if (c === '(') depth++;
    else if (c === ')') depth = Math.max(0, depth - 1);
    else if (c === ',' && depth === 0) {
      parts.push(text.slice(start, i));
      start = i + 1;
    }
  }
  parts.push(text.slice(start));
  return parts.map((p) => p.trim()).filter((p) => p.length > 0);
}
