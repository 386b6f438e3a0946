import { describe, expect, it, vi } from 'vitest';
import { ISSUE_TYPE, NO_EXCEEDANCE } from '../constants';
import { entry, growthTable, makeCompany, series } from '../data-processing/__tests__/test-utils';
import { BenchmarkTable } from '../data-processing/benchmark-table';
import { createDataStore } from '../data-store';
import { DataWarehouse } from '../data-warehouse';
import Logger from '../logger';
import { InMemoryCompanyDataProvider } from '../providers/company-data-provider';
import { BenchmarkIntensityProvider } from '../providers/intensity-benchmark-provider';
import { BenchmarkProductionProvider } from '../providers/production-benchmark-provider';
import type { CompanyRecord, ProjectionControls } from '../types';

const EI = 't CO2/(t Steel)';
const controls: ProjectionControls = { baseYear: 2020, targetYear: 2022 };

interface Setup {
  productionCentric?: boolean;
  withS3Benchmark?: boolean;
  estimateMissingS3?: boolean;
}

function buildWarehouse(companies: CompanyRecord[], setup: Setup = {}) {
  const store = createDataStore();
  for (const company of companies) store.companies.set(company.companyId, company);
  const companyData = new InMemoryCompanyDataProvider(store, controls);

  const entries = [entry('Steel', 'Global', 'S1S2', series(EI, 2020, [2, 1.5, 1]))];
  if (setup.withS3Benchmark) entries.push(entry('Steel', 'Global', 'S3', series(EI, 2020, [0.5, 0.5, 0.5])));
  const intensity = new BenchmarkIntensityProvider(
    {
      benchmarks: new BenchmarkTable(entries, setup.productionCentric ? ['S1S2'] : []),
      benchmarkGlobalBudget: { magnitude: 396, unit: 'Gt CO2' },
      benchmarkTemperature: { magnitude: 1.5, unit: 'delta_degC' },
      isAfoluIncluded: false
    },
    controls
  );
  const production = new BenchmarkProductionProvider(growthTable([['Steel', 'Global']], 2021, [0, 0]), controls);

  const warehouse = new DataWarehouse(companyData, production, intensity, {
    estimateMissingS3: setup.estimateMissingS3
  });
  return { warehouse, companyData };
}

// Production 1 Mt Steel every year; trajectory 2 t CO2/t Steel → cumulative 2, 4, 6 Mt CO2.
// SDA budget 2, 1.5, 1 → cumulative 2, 3.5, 4.5 Mt CO2.
function steelCompany(overrides: Partial<CompanyRecord> = {}): CompanyRecord {
  return makeCompany({
    projectedIntensities: { S1S2: series(EI, 2020, [2, 2, 2]) },
    projectedTargets: { S1S2: series(EI, 2020, [2, 1.5, 1]) },
    ...overrides
  });
}

// ============================================================================
// Aggregates
// ============================================================================

describe('DataWarehouse aggregates', () => {
  it('scores cumulative trajectory, target and budget', () => {
    const { warehouse } = buildWarehouse([steelCompany({ companyId: 'A', companyRevenue: 100 })]);
    const [aggregate] = warehouse.getPreprocessedCompanyData(['A']);

    expect(aggregate).toEqual({
      companyId: 'A',
      companyName: 'Company One',
      sector: 'Steel',
      region: 'Europe',
      scope: 'S1S2',
      baseYearProduction: { magnitude: 1, unit: 'Mt Steel' },
      ghgS1S2: { magnitude: 2, unit: 'Mt CO2' },
      ghgS3: null,
      companyRevenue: 100,
      cumulativeTrajectory: { magnitude: 6, unit: 'Mt CO2' },
      cumulativeTarget: { magnitude: 4.5, unit: 'Mt CO2' },
      cumulativeBudget: { magnitude: 4.5, unit: 'Mt CO2' },
      // Budget fully available from 2020: 4 ≤ 4.5 in 2021, 6 > 4.5 in 2022
      trajectoryExceedanceYear: 2021,
      targetExceedanceYear: NO_EXCEEDANCE,
      benchmarkGlobalBudget: { magnitude: 396, unit: 'Gt CO2' },
      benchmarkTemperature: { magnitude: 1.5, unit: 'delta_degC' }
    });
    expect(warehouse.issues).toEqual([]);
  });

  it('leaves target fields empty for a company without targets', () => {
    const { warehouse } = buildWarehouse([steelCompany({ companyId: 'NT', projectedTargets: {} })]);
    const [aggregate] = warehouse.getPreprocessedCompanyData(['NT']);
    expect(aggregate.cumulativeTarget).toBeNull();
    expect(aggregate.targetExceedanceYear).toBeNull();
    expect(aggregate.trajectoryExceedanceYear).toBe(2021);
  });

  it('drops a company whose disclosed target cannot be accumulated', () => {
    // Trailing target gap: no trajectory fill, no interpolation, so 2022 stays missing
    const { warehouse } = buildWarehouse([
      steelCompany({ companyId: 'T', projectedTargets: { S1S2: series(EI, 2020, [2, 1.5, Number.NaN]) } })
    ]);
    expect(warehouse.getPreprocessedCompanyData(['T'])).toEqual([]);
    expect(warehouse.issues).toHaveLength(2);
    expect(warehouse.issues[0]).toMatchObject({ type: ISSUE_TYPE.INVARIANT_VIOLATION, companyId: 'T', years: [2022] });
    expect(warehouse.issues[1]).toMatchObject({
      type: ISSUE_TYPE.INVARIANT_VIOLATION,
      companyId: 'T',
      scope: 'S1S2',
      message: 'Cumulative target could not be computed for the scoring scope; company dropped'
    });
  });

  it('excludes companies the benchmark does not cover', () => {
    const { warehouse } = buildWarehouse([
      steelCompany({ companyId: 'A' }),
      steelCompany({ companyId: 'P', sector: 'Power' })
    ]);
    expect(warehouse.getScoredCompanyIds()).toEqual(['A']);
    expect(warehouse.getPreprocessedCompanyData(['A', 'P']).map((a) => a.companyId)).toEqual(['A']);
    expect(warehouse.issues).toHaveLength(1);
    expect(warehouse.issues[0]).toMatchObject({ type: ISSUE_TYPE.UNRESOLVABLE_SCOPE, companyIds: ['P'] });
  });

  it('drops a company without a trajectory for its scoring scope', () => {
    const { warehouse } = buildWarehouse([steelCompany({ companyId: 'A', projectedIntensities: {} })]);
    expect(warehouse.getPreprocessedCompanyData(['A'])).toEqual([]);
    expect(warehouse.issues.map((i) => i.type)).toContain(ISSUE_TYPE.INVARIANT_VIOLATION);
  });
});

// ============================================================================
// Preparation
// ============================================================================

describe('DataWarehouse preparation', () => {
  it('folds S3 into S1S2 for a production-centric benchmark', () => {
    const { warehouse, companyData } = buildWarehouse(
      [
        steelCompany({
          companyId: 'PC',
          ghgS1S2: { magnitude: 1, unit: 'Mt CO2' },
          ghgS3: { magnitude: 1, unit: 'Mt CO2' },
          projectedIntensities: { S1S2: series(EI, 2020, [1, 1, 1]), S3: series(EI, 2020, [1, 1, 1]) },
          projectedTargets: {}
        })
      ],
      { productionCentric: true }
    );

    const [record] = companyData.getCompanyData(['PC']);
    expect(record.projectedIntensities.S3).toBeUndefined();
    expect(record.scoringScope).toBe('S1S2');

    const [aggregate] = warehouse.getPreprocessedCompanyData(['PC']);
    expect(aggregate.ghgS1S2).toEqual({ magnitude: 2, unit: 'Mt CO2' });
    expect(aggregate.ghgS3).toBeNull();
    expect(aggregate.cumulativeTrajectory).toEqual({ magnitude: 6, unit: 'Mt CO2' });
  });

  it('drops companies whose historic S3 cannot be aligned', () => {
    const { warehouse } = buildWarehouse(
      [
        steelCompany({ companyId: 'OK' }),
        steelCompany({
          companyId: 'BAD',
          historicEmissions: { S1S2: series('Mt CO2', 2021, [1]), S3: series('Mt CO2', 2019, [0.5]) }
        })
      ],
      { productionCentric: true }
    );
    expect(warehouse.getScoredCompanyIds()).toEqual(['OK']);
    expect(warehouse.issues).toHaveLength(1);
    expect(warehouse.issues[0]).toMatchObject({ type: ISSUE_TYPE.INVARIANT_VIOLATION, companyId: 'BAD' });
  });

  it('estimates missing S3 when asked', () => {
    const { warehouse } = buildWarehouse([steelCompany({ companyId: 'A' })], {
      withS3Benchmark: true,
      estimateMissingS3: true
    });
    const [aggregate] = warehouse.getPreprocessedCompanyData(['A']);
    expect(aggregate.scope).toBe('S1S2');
    expect(aggregate.ghgS3).toEqual({ magnitude: 0.5, unit: 'Mt CO2' });
  });

  it('keeps estimating S3 for other companies when one has incompatible units', () => {
    const { warehouse } = buildWarehouse(
      [
        steelCompany({ companyId: 'OK' }),
        steelCompany({ companyId: 'BAD', baseYearProduction: { magnitude: 1, unit: 'GJ' } })
      ],
      { withS3Benchmark: true, estimateMissingS3: true }
    );
    const aggregates = warehouse.getPreprocessedCompanyData(['OK', 'BAD']);
    expect(aggregates.map((a) => a.companyId)).toEqual(['OK']);
    expect(aggregates[0].ghgS3).toEqual({ magnitude: 0.5, unit: 'Mt CO2' });

    const mismatches = warehouse.issues.filter((i) => i.type === ISSUE_TYPE.UNIT_MISMATCH);
    expect(mismatches.length).toBeGreaterThan(0);
    expect(mismatches.every((i) => i.companyId === 'BAD')).toBe(true);
    expect(mismatches[0].scope).toBe('S3');
  });

  it('skips S3 estimation when the benchmark has no S3 intensities', () => {
    const warn = vi.spyOn(Logger, 'warn');
    const { warehouse } = buildWarehouse([steelCompany({ companyId: 'A' })], { estimateMissingS3: true });
    expect(warn).toHaveBeenCalledWith('S3 estimation requested but the benchmark publishes no S3 intensities; skipping');
    expect(warehouse.getPreprocessedCompanyData(['A'])[0].ghgS3).toBeNull();
    warn.mockRestore();
  });

  it('does not estimate S3 by default', () => {
    const { warehouse } = buildWarehouse([steelCompany({ companyId: 'A' })], { withS3Benchmark: true });
    expect(warehouse.getPreprocessedCompanyData(['A'])[0].ghgS3).toBeNull();
  });
});
