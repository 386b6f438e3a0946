// Application-wide Constants
// Single source of truth for scope tags, issue types, units and input column names

// ============================================================================
// EMISSIONS SCOPES
// ============================================================================

export const SCOPE = {
  S1: 'S1', // Direct emissions
  S2: 'S2', // Purchased energy
  S1S2: 'S1S2',
  S3: 'S3', // Value chain
  S1S2S3: 'S1S2S3'
} as const;

export type Scope = (typeof SCOPE)[keyof typeof SCOPE];

export const ALL_SCOPES: readonly Scope[] = [SCOPE.S1, SCOPE.S2, SCOPE.S1S2, SCOPE.S3, SCOPE.S1S2S3];

/** Scopes a company can be scored under, in resolution priority order */
export const SCORING_SCOPE_PRIORITY: readonly Scope[] = [SCOPE.S1S2S3, SCOPE.S1S2, SCOPE.S1, SCOPE.S3];

/** Production benchmarks are published once per sector/region, independent of scope */
export const ANY_SCOPE = 'AnyScope' as const;

export type BenchmarkScope = Scope | typeof ANY_SCOPE;

export const GLOBAL_REGION = 'Global';

// ============================================================================
// UNITS
// ============================================================================

/** Cumulative emissions and S3 estimates are expressed in this unit */
export const CANONICAL_EMISSIONS_UNIT = 'Mt CO2';
export const GLOBAL_BUDGET_UNIT = 'Gt CO2';
export const TEMPERATURE_UNIT = 'delta_degC';

// ============================================================================
// EXCEEDANCE
// ============================================================================

/** Exceedance result for a company that stays within budget through the target year */
export const NO_EXCEEDANCE = 'NO_EXCEEDANCE' as const;

export type ExceedanceYear = number | typeof NO_EXCEEDANCE;

// ============================================================================
// ISSUES (one type per data problem found during a run)
// ============================================================================

export const ISSUE_TYPE = {
  UNRESOLVABLE_SCOPE: 'UNRESOLVABLE_SCOPE', // Benchmark has no scope for the company's sector/region
  UNIT_MISMATCH: 'UNIT_MISMATCH', // Units cannot be combined; the operation was abandoned
  DATA_REPAIR_APPLIED: 'DATA_REPAIR_APPLIED', // Heuristic substitution; result may be approximate
  IRRECOVERABLE_MISALIGNMENT: 'IRRECOVERABLE_MISALIGNMENT', // Year ranges could not be reconciled; fold skipped
  INVARIANT_VIOLATION: 'INVARIANT_VIOLATION', // Company's computation failed
  SCHEMA_VALIDATION_FAILURE: 'SCHEMA_VALIDATION_FAILURE' // Row could not be materialized; company dropped
} as const;

export type IssueType = (typeof ISSUE_TYPE)[keyof typeof ISSUE_TYPE];

export const ISSUE_SEVERITY = {
  WARNING: 'warning',
  ERROR: 'error'
} as const;

export type IssueSeverity = (typeof ISSUE_SEVERITY)[keyof typeof ISSUE_SEVERITY];

// ============================================================================
// COMPANY WORKBOOK
// ============================================================================

export const WORKBOOK_TABS = {
  FUNDAMENTAL: 'fundamental_data',
  HISTORIC: 'historic_data',
  PROJECTED_EI: 'projected_ei',
  PROJECTED_TARGET: 'projected_target'
} as const;

export const FUNDAMENTAL_COLUMNS = {
  COMPANY_ID: 'company_id',
  COMPANY_NAME: 'company_name',
  SECTOR: 'sector',
  REGION: 'region',
  PRODUCTION_METRIC: 'production_metric',
  BASE_YEAR_PRODUCTION: 'base_year_production',
  EMISSIONS_METRIC: 'emissions_metric',
  GHG_S1S2: 'ghg_s1s2',
  GHG_S3: 'ghg_s3',
  COMPANY_REVENUE: 'company_revenue',
  COMPANY_MARKET_CAP: 'company_market_cap'
} as const;

export const SERIES_COLUMNS = {
  COMPANY_ID: 'company_id',
  VARIABLE: 'variable',
  SCOPE: 'scope',
  METRIC: 'metric'
} as const;

// historic_data "variable" column values
export const HISTORIC_VARIABLE = {
  EMISSIONS: 'emissions',
  INTENSITY: 'intensity'
} as const;

// ============================================================================
// PIPELINE FILES
// ============================================================================

export const LOG_FILE_NAME = 'scoring.log';
export const CONFIG_FILE_NAME = 'config.json';
