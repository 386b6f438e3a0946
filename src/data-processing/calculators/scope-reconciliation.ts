// Scope Reconciliation
// Production-centric benchmarks count a company's S3 emissions against its direct scopes.
// Folds S3 into S1 and S1S2 across base-year totals, historic series, trajectories and targets,
// then clears S3 and S1S2S3 everywhere. Running it twice is a no-op.

import { ISSUE_TYPE, SCOPE, type Scope } from '../../constants';
import { ScoringError, isScoringError } from '../../errors';
import type { CompanyRecord, Quantity, ScopeBundle, ScoringIssue, YearSeries } from '../../types';
import { addQuantities } from '../../units';
import { errorIssue, recordIssue, warningIssue } from '../issues';
import {
  addAligned,
  convertSeries,
  copySeries,
  firstValidPoint,
  getScopeSeries,
  isEmptySeries,
  isMissing,
  makeSeries,
  seriesYears,
  withScopeSeries,
  withoutScopes
} from '../utils';

const FOLDED_SCOPES: Scope[] = [SCOPE.S3, SCOPE.S1S2S3];
const PRIMARY_SCOPES: Scope[] = [SCOPE.S1, SCOPE.S1S2];

interface FoldContext {
  companyId: string;
  issues: ScoringIssue[];
}

/** Run a fold; on a unit mismatch, report it and keep `fallback` */
function guardUnits<T>(ctx: FoldContext, what: string, fold: () => T, fallback: T): T {
  try {
    return fold();
  } catch (err) {
    if (isScoringError(err) && err.issue.type === ISSUE_TYPE.UNIT_MISMATCH) {
      recordIssue(ctx.issues, { ...err.issue, companyId: ctx.companyId, message: `${what}: ${err.issue.message}` });
      return fallback;
    }
    throw err;
  }
}

/**
 * Add S3 onto a primary series by year.
 * Disjoint years cannot be reconciled: the primary is returned unfolded.
 * S3 years the primary does not cover are reported and dropped.
 */
function foldSeries(primary: YearSeries, s3: YearSeries, scope: Scope, label: string, ctx: FoldContext): YearSeries {
  const { series, unmatchedYears, droppedYears, disjoint } = addAligned(primary, s3);
  if (disjoint) {
    const years = seriesYears(s3);
    recordIssue(
      ctx.issues,
      errorIssue(
        ISSUE_TYPE.IRRECOVERABLE_MISALIGNMENT,
        `${label} ${scope} (${primary.points[0].year}-${primary.points[primary.points.length - 1].year}) not aligned with S3 (${years[0]}-${years[years.length - 1]}); ignoring S3 data`,
        { companyId: ctx.companyId, scope, years }
      )
    );
    return primary;
  }
  if (unmatchedYears.length > 0) {
    recordIssue(
      ctx.issues,
      warningIssue(ISSUE_TYPE.DATA_REPAIR_APPLIED, `${label} ${scope} years without S3 data left unfolded`, {
        companyId: ctx.companyId,
        scope,
        years: unmatchedYears
      })
    );
  }
  if (droppedYears.length > 0) {
    recordIssue(
      ctx.issues,
      warningIssue(ISSUE_TYPE.DATA_REPAIR_APPLIED, `${label} S3 years outside the ${scope} series dropped`, {
        companyId: ctx.companyId,
        scope,
        years: droppedYears
      })
    );
  }
  return series;
}

// ============================================================================
// BASE-YEAR TOTALS
// ============================================================================

function foldGhgTotals(company: CompanyRecord, ctx: FoldContext): Quantity {
  const s3 = company.ghgS3;
  if (!s3 || !Number.isFinite(s3.magnitude)) return company.ghgS1S2;
  return guardUnits(ctx, 'ghg_s1s2 + ghg_s3', () => addQuantities(company.ghgS1S2, s3), company.ghgS1S2);
}

// ============================================================================
// HISTORIC DATA
// ============================================================================

/**
 * Fold S3 into one historic primary series.
 *
 * S3 disclosure usually starts later than the primary scope. Primary points before the
 * first S3 year get a back-cast S3 value that follows the primary's own shape:
 *   s3(year) = s3(anchor) × primary(year) / primary(reference)
 * where the reference is the latest primary point at or before the anchor year.
 * This assumes S3's share tracks the primary scope's growth; it is a heuristic.
 */
function foldHistoricSeries(
  primary: YearSeries | undefined,
  s3: YearSeries,
  scope: Scope,
  label: string,
  ctx: FoldContext
): YearSeries {
  if (!primary) return copySeries(s3);

  const s3InPrimaryUnit = convertSeries(s3, primary.unit);
  const anchor = firstValidPoint(s3InPrimaryUnit);
  if (!anchor) return primary;

  const preAnchor = primary.points.filter((p) => p.year <= anchor.year && !isMissing(p.value));
  const reference = preAnchor[preAnchor.length - 1];
  if (!reference || reference.value === 0) {
    throw new ScoringError(
      errorIssue(
        ISSUE_TYPE.INVARIANT_VIOLATION,
        `No usable historic ${label} ${scope} value at or before ${anchor.year} to align S3 with`,
        { companyId: ctx.companyId, scope, years: [anchor.year] }
      )
    );
  }

  const backCast = preAnchor
    .filter((p) => p.year < anchor.year)
    .map((p) => [p.year, (anchor.value * p.value) / reference.value] as const);
  const extendedS3 = makeSeries(primary.unit, [...backCast, ...s3InPrimaryUnit.points.map((p) => [p.year, p.value] as const)]);

  return foldSeries(primary, extendedS3, scope, `Historic ${label}`, ctx);
}

function foldHistoricBundle(bundle: ScopeBundle, label: string, ctx: FoldContext): ScopeBundle {
  const s3 = getScopeSeries(bundle, SCOPE.S3);
  if (!s3 || isEmptySeries(s3)) return withoutScopes(bundle, FOLDED_SCOPES);

  let next = bundle;
  for (const scope of PRIMARY_SCOPES) {
    const primary = getScopeSeries(next, scope);
    const folded = guardUnits(
      ctx,
      `Historic ${label} ${scope}`,
      () => foldHistoricSeries(primary, s3, scope, label, ctx),
      primary
    );
    next = withScopeSeries(next, scope, folded);
  }
  return withoutScopes(next, FOLDED_SCOPES);
}

// ============================================================================
// TRAJECTORIES
// ============================================================================

function foldTrajectories(bundle: ScopeBundle, ctx: FoldContext): ScopeBundle {
  const s3 = getScopeSeries(bundle, SCOPE.S3);
  if (!s3 || isEmptySeries(s3)) return withoutScopes(bundle, FOLDED_SCOPES);

  let next = bundle;
  for (const scope of PRIMARY_SCOPES) {
    const primary = getScopeSeries(next, scope);
    const folded = primary
      ? guardUnits(ctx, `Trajectory ${scope}`, () => foldSeries(primary, s3, scope, 'Trajectory', ctx), primary)
      : copySeries(s3);
    next = withScopeSeries(next, scope, folded);
  }
  return withoutScopes(next, FOLDED_SCOPES);
}

// ============================================================================
// TARGETS
// ============================================================================

/** S1S2 target to fold S3 into, synthesized from S1 (and S2) when the company has none */
function repairS1S2Target(bundle: ScopeBundle, s1: YearSeries | undefined, ctx: FoldContext): YearSeries | undefined {
  const existing = getScopeSeries(bundle, SCOPE.S1S2);
  if (existing) return existing;
  if (!s1) return undefined;

  const s2 = getScopeSeries(bundle, SCOPE.S2);
  if (s2) {
    recordIssue(
      ctx.issues,
      warningIssue(ISSUE_TYPE.DATA_REPAIR_APPLIED, 'Scope 1+2 target projections should have been created; repairing from S1 + S2', {
        companyId: ctx.companyId,
        scope: SCOPE.S1S2
      })
    );
    return guardUnits(ctx, 'Target S1 + S2', () => addAligned(s1, s2).series, copySeries(s1));
  }

  recordIssue(
    ctx.issues,
    warningIssue(ISSUE_TYPE.DATA_REPAIR_APPLIED, 'Scope 2 target projections missing; treating as zero', {
      companyId: ctx.companyId,
      scope: SCOPE.S2
    })
  );
  return copySeries(s1);
}

function foldTargets(bundle: ScopeBundle, ctx: FoldContext): ScopeBundle {
  const s3 = getScopeSeries(bundle, SCOPE.S3);
  if (!s3 || isEmptySeries(s3)) return withoutScopes(bundle, FOLDED_SCOPES);

  // S1 as disclosed, before S3 is folded into it, so a synthesized S1S2 absorbs S3 only once
  const s1 = getScopeSeries(bundle, SCOPE.S1);
  let next = bundle;
  if (s1) {
    next = withScopeSeries(
      next,
      SCOPE.S1,
      guardUnits(ctx, 'Target S1', () => foldSeries(s1, s3, SCOPE.S1, 'Target', ctx), s1)
    );
  }

  const s1s2 = repairS1S2Target(bundle, s1, ctx);
  if (s1s2) {
    next = withScopeSeries(
      next,
      SCOPE.S1S2,
      guardUnits(ctx, 'Target S1S2', () => foldSeries(s1s2, s3, SCOPE.S1S2, 'Target', ctx), s1s2)
    );
  } else {
    recordIssue(
      ctx.issues,
      warningIssue(ISSUE_TYPE.DATA_REPAIR_APPLIED, 'No S1 or S1S2 target to fold S3 into; using the S3 target as S1S2', {
        companyId: ctx.companyId,
        scope: SCOPE.S1S2
      })
    );
    next = withScopeSeries(next, SCOPE.S1S2, copySeries(s3));
  }
  return withoutScopes(next, FOLDED_SCOPES);
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Fold a company's S3 data into S1 and S1S2 for a production-centric benchmark.
 * Returns a new record; throws ScoringError (INVARIANT_VIOLATION) when historic S3
 * cannot be aligned with the primary series at all.
 */
export function reconcileProductionCentric(company: CompanyRecord, issues: ScoringIssue[]): CompanyRecord {
  const ctx: FoldContext = { companyId: company.companyId, issues };
  return {
    ...company,
    ghgS1S2: foldGhgTotals(company, ctx),
    ghgS3: null,
    historicEmissions: foldHistoricBundle(company.historicEmissions, 'emissions', ctx),
    historicIntensities: foldHistoricBundle(company.historicIntensities, 'intensities', ctx),
    projectedIntensities: foldTrajectories(company.projectedIntensities, ctx),
    projectedTargets: foldTargets(company.projectedTargets, ctx)
  };
}
