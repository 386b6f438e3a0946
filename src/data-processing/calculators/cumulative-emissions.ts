// Cumulative Emissions
// Intensity × production per company/scope row, accumulated year over year in Mt CO2

import { CANONICAL_EMISSIONS_UNIT, ISSUE_TYPE } from '../../constants';
import { isScoringError } from '../../errors';
import type { ScoringIssue, SeriesRow, SeriesTable, YearSeries } from '../../types';
import { errorIssue, recordIssue } from '../issues';
import { convertSeries, indexRows, isMissing, multiplySeries, rowKey } from '../utils';

function runningSum(series: YearSeries): YearSeries {
  let total = 0;
  return {
    unit: series.unit,
    points: series.points.map((p) => {
      total += p.value;
      return { year: p.year, value: total };
    })
  };
}

function cumulativeRow(row: SeriesRow, production: SeriesRow | undefined, issues: ScoringIssue[]): SeriesRow | null {
  const details = { companyId: row.companyId, scope: row.scope };
  if (!production) {
    recordIssue(issues, errorIssue(ISSUE_TYPE.INVARIANT_VIOLATION, 'No projected production for this row', details));
    return null;
  }

  const emissions = multiplySeries(row.series, production.series);
  const missingYears = emissions.points.filter((p) => isMissing(p.value)).map((p) => p.year);
  if (missingYears.length > 0) {
    recordIssue(
      issues,
      errorIssue(ISSUE_TYPE.INVARIANT_VIOLATION, 'Missing emissions values; cannot accumulate', {
        ...details,
        years: missingYears
      })
    );
    return null;
  }

  try {
    return { ...row, series: runningSum(convertSeries(emissions, CANONICAL_EMISSIONS_UNIT)) };
  } catch (err) {
    if (isScoringError(err) && err.issue.type === ISSUE_TYPE.UNIT_MISMATCH) {
      recordIssue(issues, { ...err.issue, ...details });
      return null;
    }
    throw err;
  }
}

/**
 * Cumulative emissions for each intensity row, in input order, on the intensity's years.
 * Rows that cannot be computed are reported and left out.
 */
export function calculateCumulativeEmissions(
  intensity: SeriesTable,
  production: SeriesTable,
  issues: ScoringIssue[]
): SeriesTable {
  const productionByRow = indexRows(production);
  const result: SeriesTable = [];
  for (const row of intensity) {
    const cumulative = cumulativeRow(row, productionByRow.get(rowKey(row.companyId, row.scope)), issues);
    if (cumulative) result.push(cumulative);
  }
  return result;
}
