// Data Store — Plain data container and factory for imported company data

import type { CompanyRecord } from './types';

export interface DataStoreMetadata {
  /** Files the data was imported from, in import order */
  sources: string[];
  lastImport: string | null;
}

export interface DataStore {
  /** Keyed by companyId, in import order */
  companies: Map<string, CompanyRecord>;
  metadata: DataStoreMetadata;
}

export type ReadonlyDataStore = Readonly<DataStore>;

export function createDataStore(): DataStore {
  return {
    companies: new Map(),
    metadata: {
      sources: [],
      lastImport: null
    }
  };
}
