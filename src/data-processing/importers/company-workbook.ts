// Company Workbook Importer
// Materializes CompanyRecords from the fundamental_data, historic_data,
// projected_ei and projected_target tabs.

import { HISTORIC_VARIABLE, ISSUE_TYPE, SERIES_COLUMNS, WORKBOOK_TABS, type Scope } from '../../constants';
import type { DataStore } from '../../data-store';
import { isScoringError } from '../../errors';
import Logger from '../../logger';
import type { CompanyRecord, ScopeBundle, ScoringIssue, YearSeries } from '../../types';
import { parseUnit } from '../../units';
import { type FundamentalRow, validateFundamentalRow, validateSeriesRowHeader } from '../../validators';
import { errorIssue, recordIssue, warningIssue } from '../issues';
import { isEmptySeries, makeSeries, withScopeSeries } from '../utils';
import type { CellScalar, ParsedSheet, RawRow } from './excel';

const YEAR_HEADER = /^\d{4}$/;

type BundleField = 'historicEmissions' | 'historicIntensities' | 'projectedIntensities' | 'projectedTargets';

function schemaIssue(message: string, companyId?: string): ScoringIssue {
  return errorIssue(ISSUE_TYPE.SCHEMA_VALIDATION_FAILURE, message, companyId ? { companyId } : {});
}

function rawCompanyId(row: RawRow): string | undefined {
  const id = row[SERIES_COLUMNS.COMPANY_ID];
  return id === null || id === undefined ? undefined : String(id);
}

function isKnownUnit(unit: string): boolean {
  try {
    parseUnit(unit);
    return true;
  } catch (err) {
    if (isScoringError(err)) return false;
    throw err;
  }
}

function toNumber(value: CellScalar | undefined): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : Number.NaN;
  }
  return Number.NaN;
}

/** Year columns of a sheet, as [header, year] pairs */
function yearColumns(sheet: ParsedSheet): Array<[string, number]> {
  return sheet.headers.filter((h) => YEAR_HEADER.test(h)).map((h): [string, number] => [h, Number(h)]);
}

function rowSeries(row: RawRow, unit: string, years: Array<[string, number]>): YearSeries {
  return makeSeries(
    unit,
    years.map(([header, year]) => [year, toNumber(row[header])] as const)
  );
}

// ============================================================================
// FUNDAMENTAL DATA
// ============================================================================

function toCompanyRecord(row: FundamentalRow): CompanyRecord {
  const record: CompanyRecord = {
    companyId: row.company_id,
    companyName: row.company_name,
    sector: row.sector,
    region: row.region,
    baseYearProduction: { magnitude: row.base_year_production, unit: row.production_metric },
    ghgS1S2: { magnitude: row.ghg_s1s2, unit: row.emissions_metric },
    ghgS3: row.ghg_s3 == null ? null : { magnitude: row.ghg_s3, unit: row.emissions_metric },
    historicEmissions: {},
    historicIntensities: {},
    projectedIntensities: {},
    projectedTargets: {}
  };
  if (row.company_revenue != null) record.companyRevenue = row.company_revenue;
  if (row.company_market_cap != null) record.companyMarketCap = row.company_market_cap;
  return record;
}

function importFundamentals(sheet: ParsedSheet, issues: ScoringIssue[]): Map<string, CompanyRecord> {
  const companies = new Map<string, CompanyRecord>();
  sheet.rows.forEach((raw, i) => {
    const validation = validateFundamentalRow(raw);
    if (!validation.data) {
      recordIssue(issues, schemaIssue(`fundamental_data row ${i + 2}: ${validation.issues.join('; ')}`, rawCompanyId(raw)));
      return;
    }
    const row = validation.data;
    const badUnit = [row.production_metric, row.emissions_metric].find((unit) => !isKnownUnit(unit));
    if (badUnit !== undefined) {
      recordIssue(issues, schemaIssue(`Unknown unit "${badUnit}"`, row.company_id));
      return;
    }
    if (companies.has(row.company_id)) {
      recordIssue(issues, schemaIssue('Duplicate fundamental_data row; keeping the first', row.company_id));
      return;
    }
    companies.set(row.company_id, toCompanyRecord(row));
  });
  return companies;
}

// ============================================================================
// SERIES TABS
// ============================================================================

/** Apply every row of a series tab to the field its `pick` selects; rows without data are skipped */
function importSeriesTab(
  sheet: ParsedSheet,
  tab: string,
  companies: Map<string, CompanyRecord>,
  pick: (row: RawRow) => BundleField | null,
  issues: ScoringIssue[]
): void {
  const years = yearColumns(sheet);
  const unknownCompanies = new Set<string>();

  sheet.rows.forEach((raw, i) => {
    const validation = validateSeriesRowHeader(raw);
    if (!validation.data) {
      recordIssue(issues, schemaIssue(`${tab} row ${i + 2}: ${validation.issues.join('; ')}`, rawCompanyId(raw)));
      return;
    }
    const { company_id: companyId, scope, metric } = validation.data;
    const company = companies.get(companyId);
    if (!company) {
      unknownCompanies.add(companyId);
      return;
    }
    const field = pick(raw);
    if (field === null) {
      recordIssue(issues, schemaIssue(`${tab} row ${i + 2}: unrecognized variable`, companyId));
      return;
    }
    if (!isKnownUnit(metric)) {
      recordIssue(issues, schemaIssue(`${tab} row ${i + 2}: unknown unit "${metric}"`, companyId));
      return;
    }
    const series = rowSeries(raw, metric, years);
    if (isEmptySeries(series)) return;
    setSeries(company, field, scope, series);
  });

  if (unknownCompanies.size > 0) {
    recordIssue(
      issues,
      warningIssue(ISSUE_TYPE.SCHEMA_VALIDATION_FAILURE, `${tab} rows for companies missing from fundamental_data were ignored`, {
        companyIds: [...unknownCompanies]
      })
    );
  }
}

function setSeries(company: CompanyRecord, field: BundleField, scope: Scope, series: YearSeries): void {
  const bundle: ScopeBundle = company[field];
  company[field] = withScopeSeries(bundle, scope, series);
}

function historicField(row: RawRow): BundleField | null {
  const variable = String(row[SERIES_COLUMNS.VARIABLE] ?? '').toLowerCase();
  if (variable === HISTORIC_VARIABLE.EMISSIONS) return 'historicEmissions';
  if (variable === HISTORIC_VARIABLE.INTENSITY) return 'historicIntensities';
  return null;
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Import a parsed company workbook into the store.
 * Invalid rows are reported as SCHEMA_VALIDATION_FAILURE and skipped.
 * Returns false when the workbook has no fundamental_data tab.
 */
export function importCompanyWorkbook(
  store: DataStore,
  sheets: Map<string, ParsedSheet>,
  issues: ScoringIssue[]
): boolean {
  const fundamentals = sheets.get(WORKBOOK_TABS.FUNDAMENTAL);
  if (!fundamentals) {
    Logger.error(`Company workbook has no ${WORKBOOK_TABS.FUNDAMENTAL} tab`);
    return false;
  }
  const companies = importFundamentals(fundamentals, issues);

  const historic = sheets.get(WORKBOOK_TABS.HISTORIC);
  if (historic) importSeriesTab(historic, WORKBOOK_TABS.HISTORIC, companies, historicField, issues);

  const trajectories = sheets.get(WORKBOOK_TABS.PROJECTED_EI);
  if (trajectories) {
    importSeriesTab(trajectories, WORKBOOK_TABS.PROJECTED_EI, companies, () => 'projectedIntensities', issues);
  }

  const targets = sheets.get(WORKBOOK_TABS.PROJECTED_TARGET);
  if (targets) {
    importSeriesTab(targets, WORKBOOK_TABS.PROJECTED_TARGET, companies, () => 'projectedTargets', issues);
  }

  for (const [id, company] of companies) store.companies.set(id, company);
  Logger.info(`Imported ${companies.size} companies from workbook`);
  return true;
}
