// Core Type Definitions for the carbon budget scorer
// Single source of truth for all data structure types

import type { ExceedanceYear, IssueSeverity, IssueType, Scope } from './constants';
import type { BenchmarkTable } from './data-processing/benchmark-table';

// ============================================================================
// QUANTITIES & SERIES
// ============================================================================

/** A physical quantity: magnitude plus a unit expression such as "t CO2/GWh" */
export interface Quantity {
  magnitude: number;
  unit: string;
}

export interface YearPoint {
  year: number;
  /** NaN marks a missing value */
  value: number;
}

/**
 * Year-indexed series sharing a single unit.
 * Points are sorted ascending by year with no duplicate years.
 */
export interface YearSeries {
  unit: string;
  points: YearPoint[];
}

/** Optional series per scope tag. An absent key and an empty series both mean "no data". */
export type ScopeBundle = Partial<Record<Scope, YearSeries>>;

// ============================================================================
// COMPANY DATA
// ============================================================================

export interface CompanyRecord {
  companyId: string;
  companyName: string;
  sector: string;
  region: string;
  baseYearProduction: Quantity;
  ghgS1S2: Quantity;
  ghgS3: Quantity | null;
  companyRevenue?: number;
  companyMarketCap?: number;
  historicEmissions: ScopeBundle;
  historicIntensities: ScopeBundle;
  /** Trajectory: intensity projected from historic data */
  projectedIntensities: ScopeBundle;
  projectedTargets: ScopeBundle;
  /** Assigned by scope resolution; undefined until then */
  scoringScope?: Scope;
}

/** Fundamental numeric fields that can be read with CompanyDataProvider.getValue */
export type CompanyValueField = 'companyRevenue' | 'companyMarketCap';

// ============================================================================
// TABLES
// ============================================================================

/** One row of a company × scope table */
export interface SeriesRow {
  companyId: string;
  scope: Scope;
  series: YearSeries;
}

/** Ordered rows; row identity is (companyId, scope) */
export type SeriesTable = SeriesRow[];

export interface BaseYearRow {
  companyId: string;
  sector: string;
  region: string;
  scope: Scope;
  /** Emissions intensity at the base year for `scope` */
  baseEi: Quantity;
  baseYearProduction: Quantity;
  ghgS1S2: Quantity;
}

export interface ExceedanceResult {
  companyId: string;
  scope: Scope;
  exceedanceYear: ExceedanceYear;
}

// ============================================================================
// PROCESSING CONTEXT
// ============================================================================

/** Horizon endpoints bounding all projections and comparisons */
export interface ProjectionControls {
  baseYear: number;
  targetYear: number;
}

// ============================================================================
// ISSUES
// ============================================================================

export interface ScoringIssue {
  type: IssueType;
  severity: IssueSeverity;
  message: string;
  companyId?: string;
  /** Set on batch-level issues that aggregate several companies */
  companyIds?: string[];
  scope?: Scope;
  years?: number[];
}

// ============================================================================
// PROVIDERS
// ============================================================================

export interface CompanyDataProvider {
  readonly projectionControls: ProjectionControls;
  getCompanyIds(): string[];
  getCompanyData(companyIds: string[]): CompanyRecord[];
  /** Commit reconciled records back to the provider, replacing those with the same companyId */
  replaceCompanyData(records: CompanyRecord[]): void;
  /** Trajectory rows for every scope each company has a trajectory for */
  getCompanyProjectedTrajectories(companyIds: string[]): SeriesTable;
  getCompanyProjectedTargets(companyIds: string[]): SeriesTable;
  /** Rows only for companies with a resolved scoring scope */
  getCompanyIntensityAndProductionAtBaseYear(companyIds: string[]): BaseYearRow[];
  getValue(companyIds: string[], field: CompanyValueField): Map<string, number | null>;
}

export interface ProductionBenchmarkDataProvider {
  /** Production per (company, scope) row from the base year to the target year */
  getCompanyProjectedProduction(baseYearRows: BaseYearRow[]): SeriesTable;
}

export interface IntensityBenchmarkDataProvider {
  readonly benchmarks: BenchmarkTable;
  readonly benchmarkGlobalBudget: Quantity;
  readonly benchmarkTemperature: Quantity;
  readonly isAfoluIncluded: boolean;
  getSdaIntensityBenchmarks(baseYearRows: BaseYearRow[]): SeriesTable;
}

// ============================================================================
// CONFIGURATION
// ============================================================================

/** Contents of config.json; file paths are relative to the data directory */
export interface AppConfig {
  baseYear: number;
  targetYear: number;
  estimateMissingS3: boolean;
  companyWorkbook: string;
  productionBenchmark: string;
  intensityBenchmark: string;
  outputFile: string;
  logToFile: boolean;
}

// ============================================================================
// OUTPUT
// ============================================================================

export interface CompanyAggregate {
  companyId: string;
  companyName: string;
  sector: string;
  region: string;
  scope: Scope;
  baseYearProduction: Quantity;
  ghgS1S2: Quantity;
  ghgS3: Quantity | null;
  companyRevenue?: number;
  companyMarketCap?: number;
  /** Cumulative emissions at the final horizon year */
  cumulativeTrajectory: Quantity;
  /** Null when the company has no usable target */
  cumulativeTarget: Quantity | null;
  cumulativeBudget: Quantity;
  trajectoryExceedanceYear: ExceedanceYear;
  targetExceedanceYear: ExceedanceYear | null;
  benchmarkGlobalBudget: Quantity;
  benchmarkTemperature: Quantity;
}

export interface ScoringRunResult {
  aggregates: CompanyAggregate[];
  issues: ScoringIssue[];
}
