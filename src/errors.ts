// Scoring errors, thrown when a computation cannot continue for one company
// (or one unit conversion). The warehouse catches them per company.

import type { ScoringIssue } from './types';

export class ScoringError extends Error {
  readonly issue: ScoringIssue;

  constructor(issue: ScoringIssue) {
    super(issue.message);
    this.name = 'ScoringError';
    this.issue = issue;
  }
}

export function isScoringError(err: unknown): err is ScoringError {
  return err instanceof ScoringError;
}
