/**
 * @module sql/injection
 * @description Pattern indicators of SQL injection in executed SQL text
 * @status COMPLETE
 * @dependencies src/sql/safe-literals.json
 *
 * Runs on the raw text on purpose: injected SQL is frequently malformed,
 * so the structural scanner cannot be relied on here.
 */

import safeLiteralList from './safe-literals.json';

// ============================================================================
// Types
// ============================================================================

/**
 * 0 = none, 1 = low, 2 = high, 3 = critical
 */
export type InjectionRiskLevel = 0 | 1 | 2 | 3;

export interface InjectionAssessment {
  riskLevel: InjectionRiskLevel;
  /** Labels of the indicators found, in detection order */
  indicators: string[];
}

interface InjectionIndicator {
  label: string;
  weight: number;
  matches(sql: string): boolean;
}

// ============================================================================
// Indicators
// ============================================================================

const SAFE_LITERALS: ReadonlySet<string> = new Set(safeLiteralList);

const QUOTED_VALUE = /'([^']*)'/g;
const WHERE_LITERAL = /\bWHERE\s+[^=]+?=\s*'([^'?:]+)'/i;
const EQUALS_LITERAL = /=\s*'([^']*)'/g;

export const INJECTION_INDICATORS: readonly InjectionIndicator[] = [
  {
    label: 'Boolean tautology (OR 1=1)',
    weight: 3,
    matches: (sql) =>
      /\bOR\s+(['"]?)(\w+)\1\s*=\s*\1\2\1(?!\w)/i.test(sql) || /'\s*OR\s+TRUE\b/i.test(sql),
  },
  {
    label: 'UNION SELECT after string literal',
    weight: 3,
    matches: (sql) => /'\s*\)?\s*UNION\s+(?:ALL\s+)?SELECT\b/i.test(sql),
  },
  {
    label: 'Stacked statement (; DROP / DELETE)',
    weight: 3,
    matches: (sql) => /;\s*(?:DROP\s+TABLE|DELETE\s+FROM|TRUNCATE\b)/i.test(sql),
  },
  {
    label: 'Time-based probe (SLEEP / BENCHMARK)',
    weight: 3,
    matches: (sql) => /\b(?:SLEEP|BENCHMARK|PG_SLEEP)\s*\(|\bWAITFOR\s+DELAY\b/i.test(sql),
  },
  {
    label: 'SQL comment sequence',
    weight: 2,
    matches: (sql) => /--|\/\*[\s\S]*?\*\//.test(sql),
  },
  {
    label: 'WHERE clause with literal string instead of parameter',
    weight: 2,
    matches: (sql) => {
      const match = WHERE_LITERAL.exec(sql);
      return match?.[1] !== undefined && isSuspiciousLiteral(match[1]);
    },
  },
  {
    label: 'Multiple conditions with literal strings',
    weight: 3,
    matches: (sql) => {
      const where = sql.search(/\bWHERE\b/i);
      if (where === -1) return false;
      let suspicious = 0;
      for (const match of sql.slice(where).matchAll(EQUALS_LITERAL)) {
        if (match[1] !== undefined && isSuspiciousLiteral(match[1])) suspicious++;
      }
      return suspicious >= 2;
    },
  },
  {
    label: 'Numeric value in quotes (possible concatenation)',
    weight: 1,
    matches: (sql) => {
      for (const match of sql.matchAll(QUOTED_VALUE)) {
        if (match[1] !== undefined && isSuspiciousNumeric(match[1])) return true;
      }
      return false;
    },
  },
  {
    label: 'Consecutive quotes',
    weight: 1,
    matches: (sql) => /'{2,}|"{2,}/.test(sql),
  },
  {
    label: 'LIKE clause without parameter',
    weight: 1,
    matches: (sql) => /\bLIKE\s+'[^'?:]*%[^'?:]*'/i.test(sql),
  },
];

// ============================================================================
// Assessment
// ============================================================================

/**
 * Sum the weights of matching indicators, capped at 3
 *
 * @example
 * assessInjectionRisk("SELECT * FROM users WHERE name = 'a' OR 1=1");
 * // { riskLevel: 3, indicators: ['Boolean tautology (OR 1=1)', ...] }
 */
export function assessInjectionRisk(sql: string): InjectionAssessment {
  let score = 0;
  const indicators: string[] = [];

  for (const indicator of INJECTION_INDICATORS) {
    if (indicator.matches(sql)) {
      score += indicator.weight;
      indicators.push(indicator.label);
    }
  }

  return { riskLevel: toRiskLevel(score), indicators };
}

function toRiskLevel(score: number): InjectionRiskLevel {
  if (score >= 3) return 3;
  if (score === 2) return 2;
  if (score === 1) return 1;
  return 0;
}

// ============================================================================
// Literal Classification
// ============================================================================

/**
 * Digits inside quotes that are not a UUID, date, time, version or plain ID
 */
export function isSuspiciousNumeric(value: string): boolean {
  if (!/\d/.test(value)) return false;
  if (/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i.test(value)) return false;
  if (/^\d{4}-\d{2}-\d{2}/.test(value) || /^\d{2}\/\d{2}\/\d{4}/.test(value)) return false;
  if (/^\d{2}:\d{2}(:\d{2})?$/.test(value)) return false;
  if (/^\d+\.\d+(\.\d+)?$/.test(value)) return false;
  if (/^\d{1,10}$/.test(value)) return false;
  return true;
}

/**
 * A string literal that is not an enum-like status word
 */
export function isSuspiciousLiteral(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === '') return false;
  if (SAFE_LITERALS.has(normalized)) return false;
  if (normalized.length <= 10 && /^[a-z]+$/.test(normalized)) return false;
  return true;
}
