// Data Pipeline
// Reads the company workbook and benchmark files from the data directory,
// builds the providers, and runs the warehouse over the requested companies.

import * as fs from 'node:fs';
import * as path from 'node:path';
import { ISSUE_TYPE } from './constants';
import { DataWarehouse } from './data-warehouse';
import {
  buildIntensityBenchmarkData,
  buildProductionBenchmarkTable,
  importCompanyWorkbook,
  type ParsedSheet,
  parseWorkbook
} from './data-processing/importers';
import { errorIssue, recordIssue } from './data-processing/issues';
import { createDataStore, type ReadonlyDataStore } from './data-store';
import { isScoringError } from './errors';
import { loadJsonFile } from './json-file-utils';
import Logger, { getErrorMessage } from './logger';
import { InMemoryCompanyDataProvider } from './providers/company-data-provider';
import { BenchmarkIntensityProvider, type IntensityBenchmarkData } from './providers/intensity-benchmark-provider';
import { BenchmarkProductionProvider } from './providers/production-benchmark-provider';
import type { AppConfig, ProjectionControls, ScoringIssue, ScoringRunResult } from './types';
import { type ValidationResult, validateIntensityBenchmarkFile, validateProductionBenchmarkFile } from './validators';

export interface LoadDataResult {
  store: ReadonlyDataStore;
  companyData: InMemoryCompanyDataProvider;
  productionBenchmark: BenchmarkProductionProvider;
  intensityBenchmark: BenchmarkIntensityProvider;
  /** Problems found while importing */
  issues: ScoringIssue[];
}

// ============================================================================
// FILE READING
// ============================================================================

/** Read and validate a JSON benchmark file; null (with an issue) when missing or malformed */
function readBenchmarkFile<T>(
  filePath: string,
  validate: (data: unknown) => ValidationResult<T>,
  issues: ScoringIssue[]
): T | null {
  const raw = loadJsonFile(filePath);
  if (raw === null) {
    recordIssue(issues, errorIssue(ISSUE_TYPE.SCHEMA_VALIDATION_FAILURE, `Benchmark file missing or unreadable: ${filePath}`));
    return null;
  }
  const validation = validate(raw);
  if (!validation.data) {
    recordIssue(
      issues,
      errorIssue(
        ISSUE_TYPE.SCHEMA_VALIDATION_FAILURE,
        `${path.basename(filePath)}: ${validation.issues.slice(0, 5).join('; ')}`
      )
    );
    return null;
  }
  return validation.data;
}

async function readCompanyWorkbook(filePath: string): Promise<Map<string, ParsedSheet> | null> {
  if (!fs.existsSync(filePath)) return null;
  const buffer = fs.readFileSync(filePath);
  // Cast needed: ExcelJS types load() against its own Buffer declaration, not Node's Buffer<ArrayBufferLike>
  return parseWorkbook(buffer as unknown as ArrayBuffer);
}

// ============================================================================
// PUBLIC API
// ============================================================================

export function projectionControlsFrom(config: AppConfig): ProjectionControls {
  return { baseYear: config.baseYear, targetYear: config.targetYear };
}

/**
 * Load company and benchmark data from `dataDir`.
 * Returns null when any of the three input files cannot be used.
 */
export async function loadData(dataDir: string, config: AppConfig): Promise<LoadDataResult | null> {
  const issues: ScoringIssue[] = [];
  const controls = projectionControlsFrom(config);

  const productionFile = readBenchmarkFile(
    path.join(dataDir, config.productionBenchmark),
    validateProductionBenchmarkFile,
    issues
  );
  const intensityFile = readBenchmarkFile(path.join(dataDir, config.intensityBenchmark), validateIntensityBenchmarkFile, issues);
  if (!productionFile || !intensityFile) return null;

  let intensityData: IntensityBenchmarkData;
  try {
    intensityData = buildIntensityBenchmarkData(intensityFile);
  } catch (err) {
    if (!isScoringError(err)) throw err;
    recordIssue(issues, errorIssue(ISSUE_TYPE.SCHEMA_VALIDATION_FAILURE, `Intensity benchmark: ${err.message}`));
    return null;
  }

  const workbookPath = path.join(dataDir, config.companyWorkbook);
  let sheets: Map<string, ParsedSheet> | null;
  try {
    sheets = await readCompanyWorkbook(workbookPath);
  } catch (err) {
    Logger.error(`Failed to parse ${config.companyWorkbook}: ${getErrorMessage(err)}`);
    return null;
  }
  if (!sheets) {
    Logger.error(`Company workbook not found: ${workbookPath}`);
    return null;
  }

  const store = createDataStore();
  if (!importCompanyWorkbook(store, sheets, issues)) return null;
  store.metadata.sources.push(config.companyWorkbook, config.productionBenchmark, config.intensityBenchmark);
  store.metadata.lastImport = new Date().toISOString();

  const frozenStore: ReadonlyDataStore = store;
  return {
    store: frozenStore,
    companyData: new InMemoryCompanyDataProvider(store, controls),
    productionBenchmark: new BenchmarkProductionProvider(buildProductionBenchmarkTable(productionFile), controls),
    intensityBenchmark: new BenchmarkIntensityProvider(intensityData, controls),
    issues
  };
}

/**
 * Load the data and score the requested companies (all companies when none are given).
 * Returns null when the inputs could not be loaded.
 */
export async function runScoring(dataDir: string, config: AppConfig, companyIds: string[] = []): Promise<ScoringRunResult | null> {
  const loaded = await loadData(dataDir, config);
  if (!loaded) return null;

  const warehouse = new DataWarehouse(loaded.companyData, loaded.productionBenchmark, loaded.intensityBenchmark, {
    estimateMissingS3: config.estimateMissingS3
  });
  const ids = companyIds.length > 0 ? companyIds : warehouse.getScoredCompanyIds();
  const aggregates = warehouse.getPreprocessedCompanyData(ids);

  Logger.info('Scoring complete:', { companies: aggregates.length, issues: loaded.issues.length + warehouse.issues.length });
  return { aggregates, issues: [...loaded.issues, ...warehouse.issues] };
}
