// Data Processing Utility Functions
// YearSeries, ScopeBundle and company × scope table helpers shared across calculators

import type { Scope } from '../constants';
import { conversionFactor, multiplyUnits } from '../units';
import type { ScopeBundle, SeriesRow, SeriesTable, YearPoint, YearSeries } from '../types';

// ============================================================================
// YEAR SERIES
// ============================================================================

/** Build a series from [year, value] pairs, sorted by year; a later duplicate year wins */
export function makeSeries(unit: string, entries: Iterable<readonly [number, number]>): YearSeries {
  const byYear = new Map<number, number>();
  for (const [year, value] of entries) byYear.set(year, value);
  const points = Array.from(byYear, ([year, value]) => ({ year, value })).sort((a, b) => a.year - b.year);
  return { unit, points };
}

export function isMissing(value: number | undefined): boolean {
  return value === undefined || Number.isNaN(value);
}

/** True when the series is absent, has no points, or has only missing values */
export function isEmptySeries(series: YearSeries | undefined): boolean {
  return !series || series.points.every((p) => isMissing(p.value));
}

export function seriesYears(series: YearSeries): number[] {
  return series.points.map((p) => p.year);
}

export function seriesToMap(series: YearSeries): Map<number, number> {
  return new Map(series.points.map((p) => [p.year, p.value]));
}

export function valueAt(series: YearSeries, year: number): number | undefined {
  return series.points.find((p) => p.year === year)?.value;
}

/** First point with a value, or undefined */
export function firstValidPoint(series: YearSeries): YearPoint | undefined {
  return series.points.find((p) => !isMissing(p.value));
}

export function copySeries(series: YearSeries): YearSeries {
  return { unit: series.unit, points: series.points.map((p) => ({ ...p })) };
}

/** Express the series in `unit`; throws UNIT_MISMATCH */
export function convertSeries(series: YearSeries, unit: string): YearSeries {
  const factor = conversionFactor(series.unit, unit);
  if (factor === 1) return { unit, points: series.points.map((p) => ({ ...p })) };
  return { unit, points: series.points.map((p) => ({ year: p.year, value: p.value * factor })) };
}

export function filterYears(series: YearSeries, predicate: (year: number) => boolean): YearSeries {
  return { unit: series.unit, points: series.points.filter((p) => predicate(p.year)) };
}

/** Values of `source` at each of `years`, NaN where `source` has none */
export function restrictToYears(source: YearSeries, years: number[]): YearSeries {
  const values = seriesToMap(source);
  return { unit: source.unit, points: years.map((year) => ({ year, value: values.get(year) ?? Number.NaN })) };
}

export interface AlignedSum {
  series: YearSeries;
  /** Years of the primary series that the addend had no value for (left unchanged) */
  unmatchedYears: number[];
  /** Years of the addend outside the primary's years (not added anywhere) */
  droppedYears: number[];
  /** True when the two series share no year at all */
  disjoint: boolean;
}

/**
 * Add `addend` onto `primary` year by year, in the primary's unit.
 * Only the primary's years are kept. Throws UNIT_MISMATCH.
 */
export function addAligned(primary: YearSeries, addend: YearSeries): AlignedSum {
  const factor = conversionFactor(addend.unit, primary.unit);
  const addendValues = seriesToMap(addend);
  const unmatchedYears: number[] = [];
  const points = primary.points.map((p) => {
    const extra = addendValues.get(p.year);
    if (extra === undefined) {
      unmatchedYears.push(p.year);
      return { ...p };
    }
    return { year: p.year, value: p.value + extra * factor };
  });
  const primaryYears = new Set(primary.points.map((p) => p.year));
  return {
    series: { unit: primary.unit, points },
    unmatchedYears,
    droppedYears: addend.points.filter((p) => !primaryYears.has(p.year)).map((p) => p.year),
    disjoint: primary.points.length > 0 && unmatchedYears.length === primary.points.length
  };
}

/** Year-by-year product on the years of `a`; NaN where `b` has no value */
export function multiplySeries(a: YearSeries, b: YearSeries): YearSeries {
  const bValues = seriesToMap(b);
  return {
    unit: multiplyUnits(a.unit, b.unit),
    points: a.points.map((p) => ({ year: p.year, value: p.value * (bValues.get(p.year) ?? Number.NaN) }))
  };
}

/** Linear interpolation across interior missing values; leading and trailing gaps are left as-is */
export function interpolateInteriorGaps(series: YearSeries): YearSeries {
  const points = series.points.map((p) => ({ ...p }));
  let lastValid = -1;
  points.forEach((point, i) => {
    if (isMissing(point.value)) return;
    if (lastValid >= 0 && i - lastValid > 1) {
      const start = points[lastValid];
      const slope = (point.value - start.value) / (point.year - start.year);
      for (let j = lastValid + 1; j < i; j++) {
        points[j].value = start.value + slope * (points[j].year - start.year);
      }
    }
    lastValid = i;
  });
  return { unit: series.unit, points };
}

// ============================================================================
// SCOPE BUNDLES
// ============================================================================

/** Series for a scope, treating an empty series as absent */
export function getScopeSeries(bundle: ScopeBundle, scope: Scope): YearSeries | undefined {
  const series = bundle[scope];
  return series && series.points.length > 0 ? series : undefined;
}

/** New bundle with `scope` set to `series`, or removed when `series` is undefined */
export function withScopeSeries(bundle: ScopeBundle, scope: Scope, series: YearSeries | undefined): ScopeBundle {
  const next: ScopeBundle = { ...bundle };
  if (series) next[scope] = series;
  else delete next[scope];
  return next;
}

export function withoutScopes(bundle: ScopeBundle, scopes: Scope[]): ScopeBundle {
  const next: ScopeBundle = { ...bundle };
  for (const scope of scopes) delete next[scope];
  return next;
}

// ============================================================================
// TABLES
// ============================================================================

export function rowKey(companyId: string, scope: Scope): string {
  return `${companyId}|${scope}`;
}

/** Index table rows by (companyId, scope) */
export function indexRows(table: SeriesTable): Map<string, SeriesRow> {
  const index = new Map<string, SeriesRow>();
  for (const row of table) index.set(rowKey(row.companyId, row.scope), row);
  return index;
}

/** Last point of a series (the final horizon year) */
export function lastPoint(series: YearSeries): YearPoint | undefined {
  return series.points[series.points.length - 1];
}

