// Intensity benchmark provider
// Holds the emissions-intensity pathways per sector/region/scope and derives each
// company's Sectoral Decarbonization Approach (SDA) budget pathway from them.

import type { BenchmarkTable } from '../data-processing/benchmark-table';
import { convertSeries, isMissing, valueAt } from '../data-processing/utils';
import { isScoringError } from '../errors';
import Logger from '../logger';
import type {
  BaseYearRow,
  IntensityBenchmarkDataProvider,
  ProjectionControls,
  Quantity,
  SeriesTable,
  YearPoint,
  YearSeries
} from '../types';
import { conversionFactor } from '../units';

export interface IntensityBenchmarkData {
  benchmarks: BenchmarkTable;
  benchmarkGlobalBudget: Quantity;
  benchmarkTemperature: Quantity;
  isAfoluIncluded: boolean;
}

export class BenchmarkIntensityProvider implements IntensityBenchmarkDataProvider {
  readonly benchmarks: BenchmarkTable;
  readonly benchmarkGlobalBudget: Quantity;
  readonly benchmarkTemperature: Quantity;
  readonly isAfoluIncluded: boolean;

  constructor(
    data: IntensityBenchmarkData,
    private readonly controls: ProjectionControls
  ) {
    this.benchmarks = data.benchmarks;
    this.benchmarkGlobalBudget = data.benchmarkGlobalBudget;
    this.benchmarkTemperature = data.benchmarkTemperature;
    this.isAfoluIncluded = data.isAfoluIncluded;
  }

  /**
   * SDA convergence: the company's intensity closes the gap to the benchmark in
   * proportion to how far the benchmark itself has come.
   *
   *   ei(y) = (bm(y) − bm(end)) / (bm(base) − bm(end)) × (ei(base) − bm(end)) + bm(end)
   *
   * A benchmark that is flat over the horizon has no progress to measure, so the
   * company converges linearly by year instead.
   */
  private converge(baseEi: number, benchmark: YearSeries): YearSeries {
    const { baseYear, targetYear } = this.controls;
    const bmBase = valueAt(benchmark, baseYear) ?? Number.NaN;
    const bmEnd = valueAt(benchmark, targetYear) ?? Number.NaN;
    const flat = bmBase === bmEnd;

    const points: YearPoint[] = [];
    for (let year = baseYear; year <= targetYear; year++) {
      const bm = valueAt(benchmark, year) ?? Number.NaN;
      const progress = flat ? (year - baseYear) / (targetYear - baseYear) : (bmBase - bm) / (bmBase - bmEnd);
      points.push({ year, value: baseEi + (bmEnd - baseEi) * progress });
    }
    return { unit: benchmark.unit, points };
  }

  getSdaIntensityBenchmarks(baseYearRows: BaseYearRow[]): SeriesTable {
    const table: SeriesTable = [];
    for (const row of baseYearRows) {
      const benchmark = this.benchmarks.lookup(row.sector, row.region, row.scope);
      if (!benchmark) {
        Logger.warn(`No ${row.scope} intensity benchmark for ${row.sector}/${row.region}; skipping ${row.companyId}`);
        continue;
      }
      if (isMissing(row.baseEi.magnitude)) {
        Logger.warn(`No base-year intensity for ${row.companyId}; skipping SDA budget`);
        continue;
      }
      try {
        const baseEi = row.baseEi.magnitude * conversionFactor(row.baseEi.unit, benchmark.unit);
        // Expressed in the company's unit so the budget multiplies against production like the trajectory
        const budget = convertSeries(this.converge(baseEi, benchmark), row.baseEi.unit);
        table.push({ companyId: row.companyId, scope: row.scope, series: budget });
      } catch (err) {
        if (!isScoringError(err)) throw err;
        Logger.warn(`SDA budget for ${row.companyId} skipped:`, err.message);
      }
    }
    return table;
  }
}
