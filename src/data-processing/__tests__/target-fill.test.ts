import { describe, expect, it } from 'vitest';
import { ISSUE_TYPE } from '../../constants';
import type { ScoringIssue } from '../../types';
import { fillTargetGaps } from '../calculators/target-fill';
import { row, series, values } from './test-utils';

const EI = 't CO2/(t Steel)';
const gap = Number.NaN;

describe('fillTargetGaps', () => {
  it('takes leading gaps from the trajectory and interpolates interior ones', () => {
    const issues: ScoringIssue[] = [];
    const [filled] = fillTargetGaps(
      [row('A', 'S1S2', series(EI, 2020, [gap, gap, 3, gap, 5]))],
      [row('A', 'S1S2', series(EI, 2020, [10, 9, 8, 7, 6]))],
      issues
    );
    expect(values(filled.series)).toEqual([10, 9, 3, 4, 5]);
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatchObject({ type: ISSUE_TYPE.DATA_REPAIR_APPLIED, companyId: 'A', years: [2020, 2021] });
  });

  it('leaves trailing gaps', () => {
    const [filled] = fillTargetGaps(
      [row('A', 'S1S2', series(EI, 2020, [1, gap]))],
      [row('A', 'S1S2', series(EI, 2020, [2, 2]))],
      []
    );
    expect(filled.series.points[0].value).toBe(1);
    expect(Number.isNaN(filled.series.points[1].value)).toBe(true);
  });

  it('leaves leading gaps without a trajectory', () => {
    const issues: ScoringIssue[] = [];
    const [filled] = fillTargetGaps([row('A', 'S1S2', series(EI, 2020, [gap, 2]))], [], issues);
    expect(Number.isNaN(filled.series.points[0].value)).toBe(true);
    expect(issues).toEqual([]);
  });

  it('converts the trajectory into the target unit', () => {
    const [filled] = fillTargetGaps(
      [row('A', 'S1S2', series('kg CO2/(t Steel)', 2020, [gap, 500]))],
      [row('A', 'S1S2', series(EI, 2020, [2, 2]))],
      []
    );
    expect(values(filled.series)).toEqual([2000, 500]);
  });

  it('reports a trajectory in an incompatible unit', () => {
    const issues: ScoringIssue[] = [];
    const [filled] = fillTargetGaps(
      [row('A', 'S1S2', series(EI, 2020, [gap, 1]))],
      [row('A', 'S1S2', series('t CO2/GJ', 2020, [2, 2]))],
      issues
    );
    expect(Number.isNaN(filled.series.points[0].value)).toBe(true);
    expect(issues[0]).toMatchObject({ type: ISSUE_TYPE.UNIT_MISMATCH, companyId: 'A', scope: 'S1S2' });
  });
});
