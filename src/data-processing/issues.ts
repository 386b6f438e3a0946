// Issue collection. Every data problem is recorded once and logged at its severity

import { ISSUE_SEVERITY, type IssueType } from '../constants';
import Logger from '../logger';
import type { ScoringIssue } from '../types';

type IssueDetails = Omit<ScoringIssue, 'type' | 'severity' | 'message'>;

function describe(issue: ScoringIssue): string {
  const subject = issue.companyId ? ` [${issue.companyId}${issue.scope ? `/${issue.scope}` : ''}]` : '';
  return `${issue.type}${subject}: ${issue.message}`;
}

/** Append an issue to the run's issue list and log it */
export function recordIssue(issues: ScoringIssue[], issue: ScoringIssue): void {
  issues.push(issue);
  const data = issue.companyIds ?? (issue.years?.length ? { years: issue.years } : null);
  if (issue.severity === ISSUE_SEVERITY.ERROR) {
    Logger.error(describe(issue), data);
  } else {
    Logger.warn(describe(issue), data);
  }
}

export function warningIssue(type: IssueType, message: string, details: IssueDetails = {}): ScoringIssue {
  return { type, severity: ISSUE_SEVERITY.WARNING, message, ...details };
}

export function errorIssue(type: IssueType, message: string, details: IssueDetails = {}): ScoringIssue {
  return { type, severity: ISSUE_SEVERITY.ERROR, message, ...details };
}
