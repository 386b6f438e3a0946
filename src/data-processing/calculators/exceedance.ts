// Exceedance
// Finds the last year a cumulative subject (trajectory or target) stays within its cumulative budget

import { NO_EXCEEDANCE, type ExceedanceYear } from '../../constants';
import type { ExceedanceResult, ProjectionControls, SeriesTable, YearSeries } from '../../types';
import { conversionFactor } from '../../units';
import { indexRows, isMissing, rowKey, seriesToMap, valueAt } from '../utils';

/** Budget by year in `unit`; years before `budgetYear` take the budget-year value */
function budgetByYear(budget: YearSeries, unit: string, budgetYear: number | undefined): Map<number, number> {
  const factor = conversionFactor(budget.unit, unit);
  const values = seriesToMap(budget);
  const flat = budgetYear === undefined ? undefined : valueAt(budget, budgetYear);
  const result = new Map<number, number>();
  for (const [year, value] of values) {
    const effective = budgetYear !== undefined && flat !== undefined && year < budgetYear ? flat : value;
    result.set(year, effective * factor);
  }
  return result;
}

/** Latest year with subject ≤ budget, or undefined */
function lastAlignedYear(subject: YearSeries, budget: Map<number, number>): number | undefined {
  for (let i = subject.points.length - 1; i >= 0; i--) {
    const { year, value } = subject.points[i];
    const limit = budget.get(year);
    if (isMissing(value) || limit === undefined || isMissing(limit)) continue;
    if (value <= limit) return year;
  }
  return undefined;
}

export function toExceedanceYear(aligned: number | undefined, controls: ProjectionControls): ExceedanceYear {
  if (aligned === undefined) return controls.baseYear;
  return aligned >= controls.targetYear ? NO_EXCEEDANCE : aligned;
}

/**
 * Exceedance year per row present in both tables, in subject order.
 *
 * - never within budget → the base year
 * - within budget at or after the target year → NO_EXCEEDANCE
 * - otherwise the last year within budget
 *
 * With `budgetYear`, the whole budget up to that year is available from the start.
 */
export function getExceedanceYears(
  subject: SeriesTable,
  budget: SeriesTable,
  controls: ProjectionControls,
  budgetYear?: number
): ExceedanceResult[] {
  const budgetRows = indexRows(budget);
  const results: ExceedanceResult[] = [];
  for (const row of subject) {
    const budgetRow = budgetRows.get(rowKey(row.companyId, row.scope));
    if (!budgetRow) continue;
    const aligned = lastAlignedYear(row.series, budgetByYear(budgetRow.series, row.series.unit, budgetYear));
    results.push({ companyId: row.companyId, scope: row.scope, exceedanceYear: toExceedanceYear(aligned, controls) });
  }
  return results;
}
