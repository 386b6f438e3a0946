// Production benchmark provider
// Benchmarks publish year-over-year production growth per sector/region; a company's
// production compounds that growth from its base-year production.

import { ANY_SCOPE } from '../constants';
import type { BenchmarkTable } from '../data-processing/benchmark-table';
import { seriesToMap } from '../data-processing/utils';
import Logger from '../logger';
import type { BaseYearRow, ProductionBenchmarkDataProvider, ProjectionControls, SeriesTable, YearSeries } from '../types';
import { conversionFactor } from '../units';

export class BenchmarkProductionProvider implements ProductionBenchmarkDataProvider {
  constructor(
    /** Growth rates, published under the AnyScope tag */
    readonly benchmarks: BenchmarkTable,
    private readonly controls: ProjectionControls
  ) {}

  /** Growth per year as a plain fraction, or undefined when the sector/region is not covered */
  private growthFor(sector: string, region: string): Map<number, number> | undefined {
    const growth = this.benchmarks.lookup(sector, region, ANY_SCOPE);
    if (!growth) return undefined;
    const factor = conversionFactor(growth.unit, 'dimensionless');
    return new Map([...seriesToMap(growth)].map(([year, rate]) => [year, rate * factor]));
  }

  private project(row: BaseYearRow, growth: Map<number, number>): YearSeries {
    const { baseYear, targetYear } = this.controls;
    const points = [{ year: baseYear, value: row.baseYearProduction.magnitude }];
    for (let year = baseYear + 1; year <= targetYear; year++) {
      const previous = points[points.length - 1].value;
      points.push({ year, value: previous * (1 + (growth.get(year) ?? Number.NaN)) });
    }
    return { unit: row.baseYearProduction.unit, points };
  }

  getCompanyProjectedProduction(baseYearRows: BaseYearRow[]): SeriesTable {
    const table: SeriesTable = [];
    for (const row of baseYearRows) {
      const growth = this.growthFor(row.sector, row.region);
      if (!growth) {
        Logger.warn(`No production benchmark for ${row.sector}/${row.region}; skipping ${row.companyId}`);
        continue;
      }
      table.push({ companyId: row.companyId, scope: row.scope, series: this.project(row, growth) });
    }
    return table;
  }
}
