// Data Importers — Re-exports for public API

export { buildIntensityBenchmarkData, buildProductionBenchmarkTable } from './benchmarks';
export { importCompanyWorkbook } from './company-workbook';
export type { CellScalar, ParsedSheet, RawRow } from './excel';
export { cellToScalar, parseWorkbook } from './excel';
