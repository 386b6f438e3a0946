// Data Warehouse
// Prepares company data against the benchmarks once (S3 estimation, production-centric
// reconciliation, scope resolution) and serves per-company aggregates from it.

import { SCOPE } from './constants';
import { buildCompanyAggregates } from './data-processing/calculators';
import { estimateMissingS3 } from './data-processing/calculators/s3-estimation';
import { reconcileProductionCentric } from './data-processing/calculators/scope-reconciliation';
import { resolveCompanyScopes } from './data-processing/calculators/scope-resolution';
import { recordIssue } from './data-processing/issues';
import { isScoringError } from './errors';
import Logger from './logger';
import type {
  CompanyAggregate,
  CompanyDataProvider,
  CompanyRecord,
  IntensityBenchmarkDataProvider,
  ProductionBenchmarkDataProvider,
  ScoringIssue
} from './types';

export interface DataWarehouseOptions {
  /** Synthesize S3 from the benchmark for companies that disclose none */
  estimateMissingS3?: boolean;
}

export class DataWarehouse {
  /** Every issue found, from construction onwards */
  readonly issues: ScoringIssue[] = [];
  private readonly scoredCompanyIds = new Set<string>();

  constructor(
    private readonly companyData: CompanyDataProvider,
    private readonly productionBenchmark: ProductionBenchmarkDataProvider,
    private readonly intensityBenchmark: IntensityBenchmarkDataProvider,
    options: DataWarehouseOptions = {}
  ) {
    let companies = companyData.getCompanyData(companyData.getCompanyIds());

    if (options.estimateMissingS3 && !intensityBenchmark.benchmarks.hasScope(SCOPE.S3)) {
      Logger.warn('S3 estimation requested but the benchmark publishes no S3 intensities; skipping');
    } else if (options.estimateMissingS3) {
      const ctx = {
        intensityBenchmarks: intensityBenchmark.benchmarks,
        productionBenchmark,
        controls: companyData.projectionControls
      };
      companies = companies.map((c) => estimateMissingS3(c, ctx, this.issues));
    }

    if (intensityBenchmark.benchmarks.isProductionCentric(SCOPE.S1S2)) {
      Logger.info('Shifting S3 emissions data into S1 according to production-centric benchmark rules');
      companies = companies.flatMap((c) => this.reconcile(c));
    }

    const { companyScopes } = resolveCompanyScopes(companies, intensityBenchmark.benchmarks, this.issues);
    const resolved = companies.map((c) => ({ ...c, scoringScope: companyScopes.get(c.companyId) }));
    companyData.replaceCompanyData(resolved);
    for (const id of companyScopes.keys()) this.scoredCompanyIds.add(id);

    Logger.info(`Warehouse ready: ${this.scoredCompanyIds.size} of ${companyData.getCompanyIds().length} companies scorable`);
  }

  /** Reconciled company, or nothing when its data cannot be reconciled */
  private reconcile(company: CompanyRecord): CompanyRecord[] {
    try {
      return [reconcileProductionCentric(company, this.issues)];
    } catch (err) {
      if (!isScoringError(err)) throw err;
      recordIssue(this.issues, { ...err.issue, companyId: company.companyId });
      return [];
    }
  }

  /** IDs of companies that survived preparation and have a scoring scope */
  getScoredCompanyIds(): string[] {
    return this.companyData.getCompanyIds().filter((id) => this.scoredCompanyIds.has(id));
  }

  /**
   * Aggregates for the requested companies. Companies excluded during preparation,
   * or whose cumulative emissions cannot be computed, are left out (see `issues`).
   */
  getPreprocessedCompanyData(companyIds: string[]): CompanyAggregate[] {
    const excluded = companyIds.filter((id) => !this.scoredCompanyIds.has(id));
    if (excluded.length > 0) Logger.warn('Skipping companies that cannot be scored:', excluded);
    const validIds = companyIds.filter((id) => this.scoredCompanyIds.has(id));

    const baseYearRows = this.companyData.getCompanyIntensityAndProductionAtBaseYear(validIds);
    const production = this.productionBenchmark.getCompanyProjectedProduction(baseYearRows);

    return buildCompanyAggregates(
      {
        companies: this.companyData.getCompanyData(validIds),
        baseYearRows,
        production,
        trajectories: this.companyData.getCompanyProjectedTrajectories(validIds),
        targets: this.companyData.getCompanyProjectedTargets(validIds),
        budgetIntensities: this.intensityBenchmark.getSdaIntensityBenchmarks(baseYearRows),
        controls: this.companyData.projectionControls,
        benchmarkGlobalBudget: this.intensityBenchmark.benchmarkGlobalBudget,
        benchmarkTemperature: this.intensityBenchmark.benchmarkTemperature
      },
      this.issues
    );
  }
}
