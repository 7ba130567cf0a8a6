/**
 * @module sql/normalizer
 * @description Reduces SQL to a pattern shared by executions that differ only in values
 * @status COMPLETE
 * @dependencies none
 */

const STRING_LITERAL = /'(?:[^'\\]|\\.|'')*'/g;
const NUMBER_LITERAL = /\b\d+(?:\.\d+)?\b/g;
const IN_LIST_OPENER = /\bIN\s*\(/gi;

/**
 * Normalize a query for pattern matching
 *
 * @example
 * normalizeQuery("select * from users where id = 42 and name = 'bob'");
 * // 'SELECT * FROM USERS WHERE ID = ? AND NAME = ?'
 */
export function normalizeQuery(sql: string): string {
  const withoutValues = sql.replace(STRING_LITERAL, '?').replace(NUMBER_LITERAL, '?');
  return collapseInLists(withoutValues).replace(/\s+/g, ' ').trim().toUpperCase();
}

/**
 * Replace every `IN (...)` list, nested parentheses included, with `IN (?)`
 */
function collapseInLists(sql: string): string {
  const parts: string[] = [];
  let cursor = 0;

  IN_LIST_OPENER.lastIndex = 0;
  let match: RegExpExecArray | null;
  while ((match = IN_LIST_OPENER.exec(sql)) !== null) {
    let depth = 1;
    let i = match.index + match[0].length;
    while (i < sql.length && depth > 0) {
      const c = sql.charAt(i);
      if (c === '(') depth++;
      else if (c === ')') depth--;
      i++;
    }
    if (depth > 0) break;

    parts.push(sql.slice(cursor, match.index), 'IN (?)');
    cursor = i;
    IN_LIST_OPENER.lastIndex = i;
  }

  parts.push(sql.slice(cursor));
  return parts.join('');
}
