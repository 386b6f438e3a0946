// Benchmark Importers
// Turns validated production and intensity benchmark files into BenchmarkTables

import { ALL_SCOPES, ANY_SCOPE, GLOBAL_BUDGET_UNIT, type Scope, TEMPERATURE_UNIT } from '../../constants';
import Logger from '../../logger';
import type { IntensityBenchmarkData } from '../../providers/intensity-benchmark-provider';
import type { Quantity, YearSeries } from '../../types';
import { convertQuantity, parseQuantity, parseUnit } from '../../units';
import type { BenchmarkProjection, IntensityBenchmarkFile, ProductionBenchmarkFile } from '../../validators';
import { type BenchmarkEntry, BenchmarkTable } from '../benchmark-table';
import { makeSeries } from '../utils';

/** Production growth rates are plain fractions per year */
const GROWTH_UNIT = 'dimensionless';

function projectionSeries(unit: string, projections: BenchmarkProjection[]): YearSeries {
  return makeSeries(
    unit,
    projections.map((p) => [p.year, p.value ?? Number.NaN] as const)
  );
}

/** A bare number is taken in `unit`; a quantity string is converted to it */
function toQuantity(value: number | string, unit: string): Quantity {
  if (typeof value === 'number') return { magnitude: value, unit };
  return convertQuantity(parseQuantity(value), unit);
}

export function buildProductionBenchmarkTable(file: ProductionBenchmarkFile): BenchmarkTable {
  const entries: BenchmarkEntry[] = file.benchmarks.map((bm) => ({
    sector: bm.sector,
    region: bm.region,
    scope: ANY_SCOPE,
    series: projectionSeries(GROWTH_UNIT, bm.projections)
  }));
  Logger.debug(`Production benchmark: ${entries.length} sector/region pathways`);
  return new BenchmarkTable(entries);
}

/** Throws ScoringError (UNIT_MISMATCH) on an unparseable metric, budget or temperature */
export function buildIntensityBenchmarkData(file: IntensityBenchmarkFile): IntensityBenchmarkData {
  const entries: BenchmarkEntry[] = [];
  const productionCentric: Scope[] = [];

  for (const scope of ALL_SCOPES) {
    const block = file.scopes[scope];
    if (!block) continue;
    if (block.production_centric) productionCentric.push(scope);
    for (const bm of block.benchmarks) {
      parseUnit(bm.benchmark_metric);
      entries.push({
        sector: bm.sector,
        region: bm.region,
        scope,
        series: projectionSeries(bm.benchmark_metric, bm.projections)
      });
    }
  }

  Logger.debug(`Intensity benchmark: ${entries.length} pathways, production-centric scopes:`, productionCentric);
  return {
    benchmarks: new BenchmarkTable(entries, productionCentric),
    benchmarkGlobalBudget: toQuantity(file.benchmark_global_budget, GLOBAL_BUDGET_UNIT),
    benchmarkTemperature: toQuantity(file.benchmark_temperature, TEMPERATURE_UNIT),
    isAfoluIncluded: file.is_AFOLU_included
  };
}
