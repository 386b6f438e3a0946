import { describe, expect, it } from 'vitest';
import { ISSUE_TYPE } from '../../constants';
import type { ScoringIssue } from '../../types';
import { calculateCumulativeEmissions } from '../calculators/cumulative-emissions';
import { row, series, values } from './test-utils';

const production = [row('A', 'S1S2', series('GJ', 2020, [2, 4])), row('B', 'S1S2', series('GJ', 2020, [6, 8]))];

/** Values in t CO2 for readable assertions */
function inTonnes(s: { points: Array<{ value: number }> }): number[] {
  return s.points.map((p) => p.value * 1e6);
}

describe('calculateCumulativeEmissions', () => {
  it('accumulates intensity × production in Mt CO2', () => {
    const issues: ScoringIssue[] = [];
    const result = calculateCumulativeEmissions(
      [row('A', 'S1S2', series('t CO2/GJ', 2020, [1, 2])), row('B', 'S1S2', series('t CO2/GJ', 2020, [3, 4]))],
      production,
      issues
    );

    expect(result.map((r) => r.companyId)).toEqual(['A', 'B']);
    expect(result[0].series.unit).toBe('Mt CO2');
    const [a2020, a2021] = inTonnes(result[0].series);
    const [b2020, b2021] = inTonnes(result[1].series);
    expect(a2020).toBeCloseTo(2, 9);
    expect(a2021).toBeCloseTo(10, 9);
    expect(b2020).toBeCloseTo(18, 9);
    expect(b2021).toBeCloseTo(50, 9);
    expect(issues).toEqual([]);
  });

  it('drops rows without production', () => {
    const issues: ScoringIssue[] = [];
    const result = calculateCumulativeEmissions(
      [row('A', 'S1', series('t CO2/GJ', 2020, [1, 2])), row('B', 'S1S2', series('t CO2/GJ', 2020, [1, 1]))],
      production,
      issues
    );
    expect(result.map((r) => r.companyId)).toEqual(['B']);
    expect(issues[0]).toMatchObject({ type: ISSUE_TYPE.INVARIANT_VIOLATION, companyId: 'A', scope: 'S1' });
  });

  it('drops rows with missing values and names the years', () => {
    const issues: ScoringIssue[] = [];
    const result = calculateCumulativeEmissions(
      [row('A', 'S1S2', series('t CO2/GJ', 2020, [1, Number.NaN]))],
      production,
      issues
    );
    expect(result).toEqual([]);
    expect(issues[0]).toMatchObject({ type: ISSUE_TYPE.INVARIANT_VIOLATION, years: [2021] });
  });

  it('drops rows whose product is not an emissions quantity', () => {
    const issues: ScoringIssue[] = [];
    const result = calculateCumulativeEmissions(
      [row('A', 'S1S2', series('t CO2/(t Steel)', 2020, [1, 1]))],
      production,
      issues
    );
    expect(result).toEqual([]);
    expect(issues[0]).toMatchObject({ type: ISSUE_TYPE.UNIT_MISMATCH, companyId: 'A' });
  });

  it('keeps exact values when the product is already in Mt CO2', () => {
    const result = calculateCumulativeEmissions(
      [row('A', 'S1S2', series('t CO2/(t Steel)', 2020, [2, 2, 2]))],
      [row('A', 'S1S2', series('Mt Steel', 2020, [1, 1, 1]))],
      []
    );
    expect(values(result[0].series)).toEqual([2, 4, 6]);
  });
});
