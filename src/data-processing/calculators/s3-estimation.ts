// S3 Estimation
// Fills in S3 data for companies that disclose none, from the benchmark's S3 intensity
// multiplied by the company's benchmark-projected production.

import { CANONICAL_EMISSIONS_UNIT, ISSUE_TYPE, SCOPE } from '../../constants';
import { isScoringError } from '../../errors';
import Logger from '../../logger';
import type {
  BaseYearRow,
  CompanyRecord,
  ProductionBenchmarkDataProvider,
  ProjectionControls,
  ScopeBundle,
  ScoringIssue,
  YearSeries
} from '../../types';
import type { BenchmarkTable } from '../benchmark-table';
import { errorIssue, recordIssue } from '../issues';
import {
  addAligned,
  convertSeries,
  filterYears,
  getScopeSeries,
  isEmptySeries,
  multiplySeries,
  restrictToYears,
  seriesYears,
  valueAt,
  withScopeSeries
} from '../utils';

export interface S3EstimationContext {
  intensityBenchmarks: BenchmarkTable;
  productionBenchmark: ProductionBenchmarkDataProvider;
  controls: ProjectionControls;
}

/** S3 at the primary's years plus primary + S3, or the bundle unchanged without a primary */
function withEstimatedS3(bundle: ScopeBundle, s3: YearSeries, baseYear: number): ScopeBundle {
  const s1s2 = getScopeSeries(bundle, SCOPE.S1S2);
  if (!s1s2) return bundle;
  const primary = filterYears(s1s2, (year) => year >= baseYear);
  const estimated = restrictToYears(s3, seriesYears(primary));
  const withS3 = withScopeSeries(bundle, SCOPE.S3, estimated);
  return withScopeSeries(withS3, SCOPE.S1S2S3, addAligned(primary, estimated).series);
}

function estimateTrajectories(bundle: ScopeBundle, s3Intensity: YearSeries): ScopeBundle {
  const s1s2 = getScopeSeries(bundle, SCOPE.S1S2);
  if (s1s2) {
    const estimated = restrictToYears(s3Intensity, seriesYears(s1s2));
    const withS3 = withScopeSeries(bundle, SCOPE.S3, estimated);
    return withScopeSeries(withS3, SCOPE.S1S2S3, addAligned(s1s2, estimated).series);
  }
  // Without S1S2 there is no S1S2S3 to build
  const s1 = getScopeSeries(bundle, SCOPE.S1);
  if (!s1) return bundle;
  return withScopeSeries(bundle, SCOPE.S3, restrictToYears(s3Intensity, seriesYears(s1)));
}

/**
 * Estimate S3 for a company that has no historic S3 emissions.
 * Returns the company unchanged when the benchmark has no S3 for its sector/region,
 * when production cannot be projected, or when the units do not combine into emissions.
 */
export function estimateMissingS3(
  company: CompanyRecord,
  ctx: S3EstimationContext,
  issues: ScoringIssue[]
): CompanyRecord {
  if (!isEmptySeries(getScopeSeries(company.historicEmissions, SCOPE.S3))) return company;

  const { sector, region, companyId } = company;
  const s3Intensity = ctx.intensityBenchmarks.lookup(sector, region, SCOPE.S3);
  // Sectors such as buildings publish no S3 benchmark
  if (!s3Intensity) return company;

  const { baseYear } = ctx.controls;
  const request: BaseYearRow = {
    companyId,
    sector,
    region,
    scope: SCOPE.S3,
    baseEi: { magnitude: valueAt(s3Intensity, baseYear) ?? Number.NaN, unit: s3Intensity.unit },
    baseYearProduction: company.baseYearProduction,
    ghgS1S2: company.ghgS1S2
  };
  const production = ctx.productionBenchmark.getCompanyProjectedProduction([request])[0];
  if (!production) {
    recordIssue(
      issues,
      errorIssue(ISSUE_TYPE.INVARIANT_VIOLATION, `No production benchmark for ${sector}/${region}; S3 not estimated`, {
        companyId,
        scope: SCOPE.S3
      })
    );
    return company;
  }

  let s3Emissions: YearSeries;
  let historicEmissions: ScopeBundle;
  let historicIntensities: ScopeBundle;
  let projectedIntensities: ScopeBundle;
  try {
    s3Emissions = convertSeries(multiplySeries(production.series, s3Intensity), CANONICAL_EMISSIONS_UNIT);
    historicEmissions = withEstimatedS3(company.historicEmissions, s3Emissions, baseYear);
    historicIntensities = withEstimatedS3(company.historicIntensities, s3Intensity, baseYear);
    projectedIntensities = estimateTrajectories(company.projectedIntensities, s3Intensity);
  } catch (err) {
    if (isScoringError(err) && err.issue.type === ISSUE_TYPE.UNIT_MISMATCH) {
      recordIssue(issues, {
        ...err.issue,
        companyId,
        scope: SCOPE.S3,
        message: `S3 not estimated from production (${production.series.unit}) and S3 intensity (${s3Intensity.unit}): ${err.issue.message}`
      });
      return company;
    }
    throw err;
  }

  const ghgS3 = valueAt(s3Emissions, baseYear);
  Logger.info(`Added S3 estimates for ${companyId} (sector = ${sector}, region = ${region})`);
  return {
    ...company,
    ghgS3: ghgS3 === undefined ? company.ghgS3 : { magnitude: ghgS3, unit: CANONICAL_EMISSIONS_UNIT },
    historicEmissions,
    historicIntensities,
    projectedIntensities
  };
}
