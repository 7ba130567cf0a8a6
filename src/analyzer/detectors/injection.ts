/**
 * @module analyzer/detectors/injection
 * @description Detects executed SQL that shows signs of injected or concatenated input
 * @status COMPLETE
 * @dependencies src/sql/injection.ts
 */

import { SAMPLE_LIMITS } from '../../constants';
import { assessInjectionRisk } from '../../sql/injection';
import type { Issue, IssueSeverity } from '../../types/issues';
import type { QueryRecord } from '../../types/query';
import { IssueBuilder } from '../issue-builder';
import { injectionSuggestion } from '../suggestions';
import type { QueryAnalyzer } from '../types';
import { guarded } from './shared';

interface RiskGroup {
  records: QueryRecord[];
  indicators: string[];
}

/**
 * Critical (level 3) and high (level 2) findings are reported as two grouped
 * issues; lower levels are not reported.
 */
export function createInjectionAnalyzer(): QueryAnalyzer {
  const name = 'sql-injection';

  return {
    name,
    detects: ['sql_injection'],

    *analyze(trace, context): IterableIterator<Issue> {
      const critical: RiskGroup = { records: [], indicators: [] };
      const high: RiskGroup = { records: [], indicators: [] };

      for (const record of trace) {
        const assessment = guarded(context, name, record, () => assessInjectionRisk(record.sql));
        if (assessment === undefined) continue;

        const group = assessment.riskLevel === 3 ? critical : assessment.riskLevel === 2 ? high : null;
        if (group === null) continue;
        group.records.push(record);
        for (const indicator of assessment.indicators) {
          if (!group.indicators.includes(indicator)) group.indicators.push(indicator);
        }
      }

      if (critical.records.length > 0) {
        yield createIssue(
          critical,
          'CRITICAL',
          `Security Vulnerability: ${critical.records.length} queries with SQL injection risks`
        );
      }
      if (high.records.length > 0) {
        yield createIssue(high, 'WARNING', `Security Warning: ${high.records.length} queries with potential injection risks`);
      }
    },
  };
}

function createIssue(group: RiskGroup, severity: IssueSeverity, title: string): Issue {
  return IssueBuilder.create()
    .withType('sql_injection')
    .withSeverity(severity)
    .withTitle(title)
    .withDescription(
      `${group.records.length} executed queries match injection indicators: ${group.indicators.join('; ')}. ` +
        'User input appears to be concatenated into SQL instead of bound as parameters.'
    )
    .withSuggestion(injectionSuggestion(severity))
    .withQueries(group.records.slice(0, SAMPLE_LIMITS.INJECTION_QUERIES))
    .withDetails({ query_count: group.records.length, indicators: [...group.indicators] })
    .build();
}
