// Target Gap Filling
// Target projections often start later than the base year. The ragged left edge is
// filled from the trajectory, and interior gaps are interpolated.

import { ISSUE_TYPE } from '../../constants';
import { isScoringError } from '../../errors';
import type { ScoringIssue, SeriesRow, SeriesTable } from '../../types';
import { recordIssue, warningIssue } from '../issues';
import { convertSeries, indexRows, interpolateInteriorGaps, isMissing, rowKey, seriesToMap } from '../utils';

function fillLeadingGaps(target: SeriesRow, trajectory: SeriesRow | undefined, issues: ScoringIssue[]): SeriesRow {
  const firstValid = target.series.points.findIndex((p) => !isMissing(p.value));
  if (firstValid === 0 || !trajectory) return target;

  let trajectoryValues: Map<number, number>;
  try {
    trajectoryValues = seriesToMap(convertSeries(trajectory.series, target.series.unit));
  } catch (err) {
    if (isScoringError(err) && err.issue.type === ISSUE_TYPE.UNIT_MISMATCH) {
      recordIssue(issues, { ...err.issue, companyId: target.companyId, scope: target.scope });
      return target;
    }
    throw err;
  }

  const leadingEnd = firstValid === -1 ? target.series.points.length : firstValid;
  const filledYears: number[] = [];
  const points = target.series.points.map((p, i) => {
    const fill = trajectoryValues.get(p.year);
    if (i >= leadingEnd || fill === undefined || isMissing(fill)) return { ...p };
    filledYears.push(p.year);
    return { year: p.year, value: fill };
  });

  if (filledYears.length > 0) {
    recordIssue(
      issues,
      warningIssue(ISSUE_TYPE.DATA_REPAIR_APPLIED, 'Target projections start late; earlier years taken from trajectory', {
        companyId: target.companyId,
        scope: target.scope,
        years: filledYears
      })
    );
  }
  return { ...target, series: { unit: target.series.unit, points } };
}

/**
 * Fill missing target values: leading gaps from the same row's trajectory,
 * interior gaps by linear interpolation. Trailing gaps are left for the
 * cumulative calculator to report.
 */
export function fillTargetGaps(targets: SeriesTable, trajectories: SeriesTable, issues: ScoringIssue[]): SeriesTable {
  const trajectoryRows = indexRows(trajectories);
  return targets.map((target) => {
    const filled = fillLeadingGaps(target, trajectoryRows.get(rowKey(target.companyId, target.scope)), issues);
    return { ...filled, series: interpolateInteriorGaps(filled.series) };
  });
}
