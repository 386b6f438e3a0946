import { describe, expect, it } from 'vitest';
import { ISSUE_TYPE } from '../../constants';
import { ScoringError } from '../../errors';
import type { ScoringIssue } from '../../types';
import { reconcileProductionCentric } from '../calculators/scope-reconciliation';
import { makeCompany, series, values, years } from './test-utils';

const EI = 't CO2/(t Steel)';

function issueTypes(issues: ScoringIssue[]): string[] {
  return issues.map((i) => i.type);
}

// ============================================================================
// Base-year totals
// ============================================================================

describe('reconcileProductionCentric - totals', () => {
  it('adds S3 into S1S2 and clears S3', () => {
    const issues: ScoringIssue[] = [];
    const result = reconcileProductionCentric(
      makeCompany({ ghgS1S2: { magnitude: 100, unit: 't CO2' }, ghgS3: { magnitude: 0.05, unit: 'kt CO2' } }),
      issues
    );
    expect(result.ghgS1S2.unit).toBe('t CO2');
    expect(result.ghgS1S2.magnitude).toBeCloseTo(150, 9);
    expect(result.ghgS3).toBeNull();
    expect(issues).toEqual([]);
  });

  it('leaves S1S2 alone when S3 is not disclosed', () => {
    const company = makeCompany();
    expect(reconcileProductionCentric(company, []).ghgS1S2).toBe(company.ghgS1S2);
  });
});

// ============================================================================
// Trajectories
// ============================================================================

describe('reconcileProductionCentric - trajectories', () => {
  it('folds S3 into S1S2 and copies it into a missing S1', () => {
    const result = reconcileProductionCentric(
      makeCompany({
        projectedIntensities: {
          S1S2: series(EI, 2020, [1, 1, 1]),
          S3: series(EI, 2020, [0.5, 0.5, 0.5]),
          S1S2S3: series(EI, 2020, [1.5, 1.5, 1.5])
        }
      }),
      []
    );
    expect(values(result.projectedIntensities.S1S2)).toEqual([1.5, 1.5, 1.5]);
    expect(values(result.projectedIntensities.S1)).toEqual([0.5, 0.5, 0.5]);
    expect(result.projectedIntensities.S3).toBeUndefined();
    expect(result.projectedIntensities.S1S2S3).toBeUndefined();
  });

  it('reports primary years without S3 and leaves them unfolded', () => {
    const issues: ScoringIssue[] = [];
    const result = reconcileProductionCentric(
      makeCompany({
        projectedIntensities: { S1: series(EI, 2020, [1, 1, 1]), S3: series(EI, 2021, [0.5, 0.5]) }
      }),
      issues
    );
    expect(values(result.projectedIntensities.S1)).toEqual([1, 1.5, 1.5]);
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatchObject({ type: ISSUE_TYPE.DATA_REPAIR_APPLIED, scope: 'S1', years: [2020] });
  });

  it('reports S3 years beyond the primary and drops them', () => {
    const issues: ScoringIssue[] = [];
    const result = reconcileProductionCentric(
      makeCompany({
        projectedIntensities: { S1S2: series(EI, 2020, [1, 1]), S3: series(EI, 2020, [0.5, 0.5, 0.5]) }
      }),
      issues
    );
    expect(years(result.projectedIntensities.S1S2)).toEqual([2020, 2021]);
    expect(values(result.projectedIntensities.S1S2)).toEqual([1.5, 1.5]);
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatchObject({ type: ISSUE_TYPE.DATA_REPAIR_APPLIED, scope: 'S1S2', years: [2022] });
  });

  it('skips the fold on a unit mismatch', () => {
    const issues: ScoringIssue[] = [];
    const result = reconcileProductionCentric(
      makeCompany({
        projectedIntensities: { S1S2: series(EI, 2020, [1, 1]), S3: series('t CO2/GJ', 2020, [0.5, 0.5]) }
      }),
      issues
    );
    expect(values(result.projectedIntensities.S1S2)).toEqual([1, 1]);
    expect(result.projectedIntensities.S3).toBeUndefined();
    expect(issueTypes(issues)).toEqual([ISSUE_TYPE.UNIT_MISMATCH]);
    expect(issues[0].companyId).toBe('C1');
  });
});

// ============================================================================
// Historic data
// ============================================================================

describe('reconcileProductionCentric - historic data', () => {
  it('back-casts S3 before its first year along the primary shape', () => {
    const issues: ScoringIssue[] = [];
    const result = reconcileProductionCentric(
      makeCompany({
        historicEmissions: {
          S1S2: series('t CO2', 2017, [100, 110, 120, 130]),
          S3: series('t CO2', 2019, [20, 22])
        }
      }),
      issues
    );
    const folded = values(result.historicEmissions.S1S2);
    expect(years(result.historicEmissions.S1S2)).toEqual([2017, 2018, 2019, 2020]);
    // 2017: 100 + 20 × 100/120, 2018: 110 + 20 × 110/120
    expect(folded[0]).toBeCloseTo(116.6667, 3);
    expect(folded[1]).toBeCloseTo(128.3333, 3);
    expect(folded.slice(2)).toEqual([140, 152]);
    expect(values(result.historicEmissions.S1)).toEqual([20, 22]);
    expect(result.historicEmissions.S3).toBeUndefined();
    expect(issues).toEqual([]);
  });

  it('uses the latest primary value before the first S3 year as reference', () => {
    const result = reconcileProductionCentric(
      makeCompany({
        historicEmissions: {
          S1S2: series('t CO2', 2017, [100, 110]),
          S3: series('t CO2', 2019, [20])
        }
      }),
      []
    );
    const folded = values(result.historicEmissions.S1S2);
    expect(folded[0]).toBeCloseTo(100 + (20 * 100) / 110, 9);
    expect(folded[1]).toBeCloseTo(130, 9);
  });

  it('throws INVARIANT_VIOLATION when no primary value precedes S3', () => {
    const company = makeCompany({
      historicEmissions: { S1S2: series('t CO2', 2021, [100]), S3: series('t CO2', 2019, [20]) }
    });
    let caught: unknown;
    try {
      reconcileProductionCentric(company, []);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ScoringError);
    if (caught instanceof ScoringError) {
      expect(caught.issue.type).toBe(ISSUE_TYPE.INVARIANT_VIOLATION);
      expect(caught.issue.companyId).toBe('C1');
    }
  });
});

// ============================================================================
// Targets
// ============================================================================

describe('reconcileProductionCentric - targets', () => {
  it('repairs a missing S1S2 target from S1 + S2 and adds S3 once', () => {
    const issues: ScoringIssue[] = [];
    const result = reconcileProductionCentric(
      makeCompany({
        projectedTargets: {
          S1: series(EI, 2020, [1, 1]),
          S2: series(EI, 2020, [0.2, 0.2]),
          S3: series(EI, 2020, [0.5, 0.5])
        }
      }),
      issues
    );
    expect(values(result.projectedTargets.S1)).toEqual([1.5, 1.5]);
    const s1s2 = values(result.projectedTargets.S1S2);
    expect(s1s2[0]).toBeCloseTo(1.7, 12);
    expect(s1s2[1]).toBeCloseTo(1.7, 12);
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatchObject({ type: ISSUE_TYPE.DATA_REPAIR_APPLIED, scope: 'S1S2' });
  });

  it('treats a missing S2 target as zero', () => {
    const issues: ScoringIssue[] = [];
    const result = reconcileProductionCentric(
      makeCompany({
        projectedTargets: { S1: series(EI, 2020, [1, 1]), S3: series(EI, 2020, [0.5, 0.5]) }
      }),
      issues
    );
    expect(values(result.projectedTargets.S1S2)).toEqual([1.5, 1.5]);
    expect(issues[0]).toMatchObject({ type: ISSUE_TYPE.DATA_REPAIR_APPLIED, scope: 'S2' });
  });

  it('uses the S3 target as S1S2 when there is no primary target', () => {
    const result = reconcileProductionCentric(
      makeCompany({ projectedTargets: { S3: series(EI, 2020, [0.5, 0.4]) } }),
      []
    );
    expect(values(result.projectedTargets.S1S2)).toEqual([0.5, 0.4]);
    expect(result.projectedTargets.S3).toBeUndefined();
  });

  it('ignores S3 targets on disjoint years', () => {
    const issues: ScoringIssue[] = [];
    const result = reconcileProductionCentric(
      makeCompany({
        projectedTargets: { S1S2: series(EI, 2020, [1, 1]), S3: series(EI, 2030, [0.5, 0.5]) }
      }),
      issues
    );
    expect(values(result.projectedTargets.S1S2)).toEqual([1, 1]);
    expect(result.projectedTargets.S3).toBeUndefined();
    expect(issues[0]).toMatchObject({
      type: ISSUE_TYPE.IRRECOVERABLE_MISALIGNMENT,
      scope: 'S1S2',
      years: [2030, 2031]
    });
  });
});

// ============================================================================
// Idempotence
// ============================================================================

describe('reconcileProductionCentric - idempotence', () => {
  it('changes nothing on a second run', () => {
    const company = makeCompany({
      ghgS3: { magnitude: 1, unit: 'Mt CO2' },
      historicEmissions: { S1S2: series('Mt CO2', 2019, [2, 2]), S3: series('Mt CO2', 2019, [1, 1]) },
      projectedIntensities: { S1S2: series(EI, 2020, [1, 1]), S3: series(EI, 2020, [0.5, 0.5]) },
      projectedTargets: { S1S2: series(EI, 2020, [1, 0.8]), S3: series(EI, 2020, [0.5, 0.4]) }
    });
    const once = reconcileProductionCentric(company, []);
    const issues: ScoringIssue[] = [];
    const twice = reconcileProductionCentric(once, issues);
    expect(twice).toEqual(once);
    expect(issues).toEqual([]);
    expect(once.ghgS1S2).toEqual({ magnitude: 3, unit: 'Mt CO2' });
  });
});
