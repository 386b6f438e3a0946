// In-memory company data provider backed by the DataStore

import { ALL_SCOPES } from '../constants';
import type { DataStore } from '../data-store';
import { filterYears, getScopeSeries, isMissing, valueAt } from '../data-processing/utils';
import Logger from '../logger';
import type {
  BaseYearRow,
  CompanyDataProvider,
  CompanyRecord,
  CompanyValueField,
  ProjectionControls,
  ScopeBundle,
  SeriesTable
} from '../types';

export class InMemoryCompanyDataProvider implements CompanyDataProvider {
  constructor(
    private readonly store: DataStore,
    readonly projectionControls: ProjectionControls
  ) {}

  getCompanyIds(): string[] {
    return [...this.store.companies.keys()];
  }

  getCompanyData(companyIds: string[]): CompanyRecord[] {
    const records: CompanyRecord[] = [];
    const unknown: string[] = [];
    for (const id of companyIds) {
      const record = this.store.companies.get(id);
      if (record) records.push(record);
      else unknown.push(id);
    }
    if (unknown.length > 0) Logger.warn('Unknown company IDs requested:', unknown);
    return records;
  }

  replaceCompanyData(records: CompanyRecord[]): void {
    for (const record of records) this.store.companies.set(record.companyId, record);
  }

  getCompanyProjectedTrajectories(companyIds: string[]): SeriesTable {
    return this.projectBundles(companyIds, (c) => c.projectedIntensities);
  }

  getCompanyProjectedTargets(companyIds: string[]): SeriesTable {
    return this.projectBundles(companyIds, (c) => c.projectedTargets);
  }

  getCompanyIntensityAndProductionAtBaseYear(companyIds: string[]): BaseYearRow[] {
    const { baseYear } = this.projectionControls;
    const rows: BaseYearRow[] = [];
    for (const company of this.getCompanyData(companyIds)) {
      const scope = company.scoringScope;
      if (!scope) continue;
      const source =
        getScopeSeries(company.projectedIntensities, scope) ?? getScopeSeries(company.historicIntensities, scope);
      const baseEi = source ? valueAt(source, baseYear) : undefined;
      if (!source || isMissing(baseEi)) {
        Logger.warn(`No ${scope} intensity at ${baseYear} for ${company.companyId}`);
      }
      rows.push({
        companyId: company.companyId,
        sector: company.sector,
        region: company.region,
        scope,
        baseEi: { magnitude: baseEi ?? Number.NaN, unit: source?.unit ?? 'dimensionless' },
        baseYearProduction: company.baseYearProduction,
        ghgS1S2: company.ghgS1S2
      });
    }
    return rows;
  }

  getValue(companyIds: string[], field: CompanyValueField): Map<string, number | null> {
    return new Map(this.getCompanyData(companyIds).map((c) => [c.companyId, c[field] ?? null]));
  }

  /** One row per company and non-empty scope, restricted to the projection horizon */
  private projectBundles(companyIds: string[], pick: (company: CompanyRecord) => ScopeBundle): SeriesTable {
    const { baseYear, targetYear } = this.projectionControls;
    const table: SeriesTable = [];
    for (const company of this.getCompanyData(companyIds)) {
      const bundle = pick(company);
      for (const scope of ALL_SCOPES) {
        const series = getScopeSeries(bundle, scope);
        if (!series) continue;
        table.push({
          companyId: company.companyId,
          scope,
          series: filterYears(series, (year) => year >= baseYear && year <= targetYear)
        });
      }
    }
    return table;
  }
}
