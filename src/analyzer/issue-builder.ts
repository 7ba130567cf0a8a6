/**
 * @module analyzer/issue-builder
 * @description Immutable builder producing frozen Issue values
 * @status COMPLETE
 * @dependencies node:crypto, src/types/issues.ts
 */

import { createHash } from 'crypto';
import { IssueBuildError } from '../types/common';
import type {
  Issue,
  IssueCategory,
  IssueDetails,
  IssueDetailValue,
  IssueSeverity,
  IssueType,
  Suggestion,
} from '../types/issues';
import type { BacktraceFrame, QueryRecord } from '../types/query';

// ============================================================================
// Categories
// ============================================================================

const CATEGORY_BY_TYPE: Record<IssueType, IssueCategory> = {
  eager_loading: 'PERFORMANCE',
  lazy_loading: 'PERFORMANCE',
  n_plus_one: 'PERFORMANCE',
  frequent_query: 'PERFORMANCE',
  join_too_many: 'PERFORMANCE',
  join_suboptimal_left: 'PERFORMANCE',
  join_unused: 'PERFORMANCE',
  join_multi_step_hydration: 'PERFORMANCE',
  find_all: 'PERFORMANCE',
  slow_query: 'PERFORMANCE',
  ineffective_like: 'PERFORMANCE',
  limit_with_collection_join: 'INTEGRITY',
  flush_in_loop: 'PERFORMANCE',
  batch_without_clear: 'MEMORY',
  sql_injection: 'SECURITY',
};

export function categoryOf(type: IssueType): IssueCategory {
  return CATEGORY_BY_TYPE[type];
}

// ============================================================================
// Builder
// ============================================================================

interface IssueDraft {
  type?: IssueType;
  severity?: IssueSeverity;
  title?: string;
  description?: string;
  suggestion: Suggestion | null;
  queries: readonly QueryRecord[];
  backtrace: readonly BacktraceFrame[] | null;
  details: IssueDetails;
}

/**
 * Every `with*` call returns a new builder; a builder can be shared as a template.
 *
 * @example
 * const issue = IssueBuilder.create()
 *   .withType('slow_query')
 *   .withSeverity('WARNING')
 *   .withTitle('Slow Query: 120.00ms')
 *   .withDescription('...')
 *   .withQueries([record])
 *   .build();
 */
export class IssueBuilder {
  private constructor(private readonly draft: IssueDraft) {}

  static create(): IssueBuilder {
    return new IssueBuilder({ suggestion: null, queries: [], backtrace: null, details: {} });
  }

  withType(type: IssueType): IssueBuilder {
    return this.with({ type });
  }

  withSeverity(severity: IssueSeverity): IssueBuilder {
    return this.with({ severity });
  }

  withTitle(title: string): IssueBuilder {
    return this.with({ title });
  }

  withDescription(description: string): IssueBuilder {
    return this.with({ description });
  }

  withSuggestion(suggestion: Suggestion | null): IssueBuilder {
    return this.with({ suggestion });
  }

  /**
   * Sets the affected queries; the backtrace defaults to the first query's
   */
  withQueries(queries: readonly QueryRecord[]): IssueBuilder {
    const backtrace = this.draft.backtrace ?? queries[0]?.backtrace ?? null;
    return this.with({ queries: [...queries], backtrace });
  }

  withBacktrace(backtrace: readonly BacktraceFrame[] | null): IssueBuilder {
    return this.with({ backtrace });
  }

  withDetail(key: string, value: IssueDetailValue): IssueBuilder {
    return this.with({ details: { ...this.draft.details, [key]: value } });
  }

  withDetails(details: IssueDetails): IssueBuilder {
    return this.with({ details: { ...this.draft.details, ...details } });
  }

  /**
   * @throws IssueBuildError when type, severity, title or description is missing
   */
  build(): Issue {
    const { type, severity, title, description } = this.draft;
    if (type === undefined || severity === undefined || title === undefined || description === undefined) {
      const missing: string[] = [];
      if (type === undefined) missing.push('type');
      if (severity === undefined) missing.push('severity');
      if (title === undefined) missing.push('title');
      if (description === undefined) missing.push('description');
      throw new IssueBuildError(missing);
    }

    return Object.freeze({
      id: issueId(type, title, this.draft.queries),
      type,
      category: categoryOf(type),
      severity,
      title,
      description,
      suggestion: this.draft.suggestion,
      queries: Object.freeze([...this.draft.queries]),
      backtrace: this.draft.backtrace,
      details: Object.freeze({ ...this.draft.details }),
      duplicatedIssues: Object.freeze([]),
    });
  }

  private with(patch: Partial<IssueDraft>): IssueBuilder {
    return new IssueBuilder({ ...this.draft, ...patch });
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Copy of an issue carrying the given duplicates
 */
export function withDuplicates(issue: Issue, duplicates: readonly Issue[]): Issue {
  return Object.freeze({ ...issue, duplicatedIssues: Object.freeze([...duplicates]) });
}

function issueId(type: IssueType, title: string, queries: readonly QueryRecord[]): string {
  const hash = createHash('sha1');
  hash.update(type);
  hash.update('\0');
  hash.update(title);
  for (const query of queries) {
    hash.update('\0');
    hash.update(query.sql);
  }
  return `${type}-${hash.digest('hex').slice(0, 12)}`;
}
