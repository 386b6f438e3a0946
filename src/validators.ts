// Runtime validators for external data at the parse boundary, and for the
// aggregates the scorer emits. Failures are reported, never thrown.

import { z } from 'zod';
import { NO_EXCEEDANCE, SCOPE } from './constants';
import type { AppConfig } from './types';

export interface ValidationResult<T> {
  valid: boolean;
  issues: string[];
  data: T | null;
}

function fromZodResult<T>(
  result: { success: true; data: T } | { success: false; error: { issues: Array<{ path: PropertyKey[]; message: string }> } }
): ValidationResult<T> {
  if (result.success) return { valid: true, issues: [], data: result.data };
  const issues = result.error.issues.map((i) => `${i.path.map(String).join('.')}: ${i.message}`);
  return { valid: false, issues, data: null };
}

const scopeSchema = z.enum([SCOPE.S1, SCOPE.S2, SCOPE.S1S2, SCOPE.S3, SCOPE.S1S2S3]);

// ============================================================================
// Company workbook rows
// ============================================================================

/** Spreadsheet cell as read by the importer: empty cells arrive as null */
const textCell = z
  .union([z.string(), z.number()])
  .transform((v) => String(v).trim())
  .pipe(z.string().min(1));

const numberCell = z
  .union([z.number(), z.string().trim().min(1).transform(Number)])
  .pipe(z.number().finite());

const fundamentalRowSchema = z
  .object({
    company_id: textCell,
    company_name: z
      .union([z.string(), z.number()])
      .nullish()
      .transform((v) => (v == null ? '' : String(v).trim())),
    sector: textCell,
    region: textCell,
    production_metric: textCell,
    base_year_production: numberCell,
    emissions_metric: textCell,
    ghg_s1s2: numberCell,
    ghg_s3: numberCell.nullable().optional(),
    company_revenue: numberCell.nullable().optional(),
    company_market_cap: numberCell.nullable().optional()
  })
  .passthrough();

export type FundamentalRow = z.infer<typeof fundamentalRowSchema>;

/** Validate one fundamental_data row (keys are the header names) */
export function validateFundamentalRow(row: unknown): ValidationResult<FundamentalRow> {
  return fromZodResult(fundamentalRowSchema.safeParse(row));
}

const seriesRowHeaderSchema = z
  .object({
    company_id: textCell,
    scope: z
      .string()
      .transform((v) => v.trim().toUpperCase().replace(/\+/g, ''))
      .pipe(scopeSchema),
    metric: textCell
  })
  .passthrough();

export type SeriesRowHeader = z.infer<typeof seriesRowHeaderSchema>;

/** Validate the identifying columns of a historic_data / projected_* row */
export function validateSeriesRowHeader(row: unknown): ValidationResult<SeriesRowHeader> {
  return fromZodResult(seriesRowHeaderSchema.safeParse(row));
}

// ============================================================================
// Benchmark files
// ============================================================================

/** JSON has no NaN: a missing benchmark value is null */
const projectionSchema = z
  .object({
    year: z.number().int(),
    value: z.number().nullable()
  })
  .passthrough();

export type BenchmarkProjection = z.infer<typeof projectionSchema>;

const productionBenchmarkFileSchema = z
  .object({
    benchmarks: z.array(
      z
        .object({
          sector: z.string().min(1),
          region: z.string().min(1),
          projections: z.array(projectionSchema)
        })
        .passthrough()
    )
  })
  .passthrough();

export type ProductionBenchmarkFile = z.infer<typeof productionBenchmarkFileSchema>;

export function validateProductionBenchmarkFile(data: unknown): ValidationResult<ProductionBenchmarkFile> {
  return fromZodResult(productionBenchmarkFileSchema.safeParse(data));
}

const scopeBenchmarksSchema = z
  .object({
    production_centric: z.boolean().default(false),
    benchmarks: z.array(
      z
        .object({
          sector: z.string().min(1),
          region: z.string().min(1),
          benchmark_metric: z.string().min(1),
          projections: z.array(projectionSchema)
        })
        .passthrough()
    )
  })
  .passthrough();

export type ScopeBenchmarks = z.infer<typeof scopeBenchmarksSchema>;

/** A number in the file's default unit, or a quantity string such as "1.5 delta_degC" */
const quantityField = z.union([z.number(), z.string().min(1)]);

const intensityBenchmarkFileSchema = z
  .object({
    benchmark_temperature: quantityField,
    benchmark_global_budget: quantityField,
    is_AFOLU_included: z.boolean().default(false),
    scopes: z
      .object({
        S1: scopeBenchmarksSchema.optional(),
        S2: scopeBenchmarksSchema.optional(),
        S1S2: scopeBenchmarksSchema.optional(),
        S3: scopeBenchmarksSchema.optional(),
        S1S2S3: scopeBenchmarksSchema.optional()
      })
      .strict()
  })
  .passthrough();

export type IntensityBenchmarkFile = z.infer<typeof intensityBenchmarkFileSchema>;

export function validateIntensityBenchmarkFile(data: unknown): ValidationResult<IntensityBenchmarkFile> {
  return fromZodResult(intensityBenchmarkFileSchema.safeParse(data));
}

// ============================================================================
// Output
// ============================================================================

const quantitySchema = z.object({
  magnitude: z.number().finite(),
  unit: z.string().min(1)
});

const exceedanceYearSchema = z.union([z.number().int(), z.literal(NO_EXCEEDANCE)]);

const companyAggregateSchema = z.object({
  companyId: z.string().min(1),
  companyName: z.string(),
  sector: z.string().min(1),
  region: z.string().min(1),
  scope: scopeSchema,
  baseYearProduction: quantitySchema,
  ghgS1S2: quantitySchema,
  ghgS3: quantitySchema.nullable(),
  companyRevenue: z.number().finite().optional(),
  companyMarketCap: z.number().finite().optional(),
  cumulativeTrajectory: quantitySchema,
  cumulativeTarget: quantitySchema.nullable(),
  cumulativeBudget: quantitySchema,
  trajectoryExceedanceYear: exceedanceYearSchema,
  targetExceedanceYear: exceedanceYearSchema.nullable(),
  benchmarkGlobalBudget: quantitySchema,
  benchmarkTemperature: quantitySchema
});

/** Validate an assembled aggregate before it leaves the scorer */
export function validateCompanyAggregate(data: unknown): ValidationResult<z.infer<typeof companyAggregateSchema>> {
  return fromZodResult(companyAggregateSchema.safeParse(data));
}

// ============================================================================
// Configuration
// ============================================================================

/** Config schema where every wrong-typed or missing key falls back to its default */
export function createConfigSchema(defaults: AppConfig) {
  return z.object({
    baseYear: z.number().int().catch(defaults.baseYear),
    targetYear: z.number().int().catch(defaults.targetYear),
    estimateMissingS3: z.boolean().catch(defaults.estimateMissingS3),
    companyWorkbook: z.string().min(1).catch(defaults.companyWorkbook),
    productionBenchmark: z.string().min(1).catch(defaults.productionBenchmark),
    intensityBenchmark: z.string().min(1).catch(defaults.intensityBenchmark),
    outputFile: z.string().min(1).catch(defaults.outputFile),
    logToFile: z.boolean().catch(defaults.logToFile)
  });
}
