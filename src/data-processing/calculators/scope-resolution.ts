// Scope Resolution
// Picks the single scope each company is scored under, from what the benchmark publishes

import { ISSUE_TYPE, SCORING_SCOPE_PRIORITY, type BenchmarkScope, type Scope } from '../../constants';
import type { CompanyRecord, ScoringIssue } from '../../types';
import type { BenchmarkTable } from '../benchmark-table';
import { recordIssue, warningIssue } from '../issues';

export interface ScopeResolution {
  companyScopes: Map<string, Scope>;
  /** Company IDs the benchmark cannot score, in input order */
  unresolved: string[];
}

function isScoringScope(scope: BenchmarkScope): scope is Scope {
  return SCORING_SCOPE_PRIORITY.some((s) => s === scope);
}

/**
 * Choose a scope from the benchmark's published scopes.
 * A single published scope is used as-is; otherwise the first match of S1S2S3, S1S2, S1, S3.
 */
export function chooseScope(published: BenchmarkScope[]): Scope | null {
  if (published.length === 1) {
    const only = published[0];
    return isScoringScope(only) ? only : null;
  }
  return SCORING_SCOPE_PRIORITY.find((scope) => published.includes(scope)) ?? null;
}

/**
 * Resolve the scoring scope of every company.
 * Unresolvable companies are reported once, as a single aggregated issue.
 */
export function resolveCompanyScopes(
  companies: CompanyRecord[],
  benchmarks: BenchmarkTable,
  issues: ScoringIssue[]
): ScopeResolution {
  const companyScopes = new Map<string, Scope>();
  const unresolved: string[] = [];

  for (const company of companies) {
    const scope = chooseScope(benchmarks.scopesFor(company.sector, company.region));
    if (scope === null) {
      unresolved.push(company.companyId);
    } else {
      companyScopes.set(company.companyId, scope);
    }
  }

  if (unresolved.length > 0) {
    recordIssue(
      issues,
      warningIssue(
        ISSUE_TYPE.UNRESOLVABLE_SCOPE,
        'The following companies do not disclose scope data required by benchmark and will be removed',
        { companyIds: unresolved }
      )
    );
  }

  return { companyScopes, unresolved };
}
