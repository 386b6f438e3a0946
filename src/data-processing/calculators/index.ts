// Data Calculators - Main Orchestrator
// Coordinates the per-row calculators to build one aggregate per scored company

import { ISSUE_TYPE } from '../../constants';
import type {
  BaseYearRow,
  CompanyAggregate,
  CompanyRecord,
  ExceedanceResult,
  ProjectionControls,
  Quantity,
  ScoringIssue,
  SeriesRow,
  SeriesTable
} from '../../types';
import { validateCompanyAggregate } from '../../validators';
import { errorIssue, recordIssue } from '../issues';
import { indexRows, lastPoint, rowKey } from '../utils';
import { calculateCumulativeEmissions } from './cumulative-emissions';
import { getExceedanceYears } from './exceedance';
import { fillTargetGaps } from './target-fill';

export interface AggregateInputs {
  companies: CompanyRecord[];
  baseYearRows: BaseYearRow[];
  production: SeriesTable;
  trajectories: SeriesTable;
  targets: SeriesTable;
  /** SDA benchmark intensities per company/scope */
  budgetIntensities: SeriesTable;
  controls: ProjectionControls;
  benchmarkGlobalBudget: Quantity;
  benchmarkTemperature: Quantity;
}

interface CumulativeTables {
  trajectory: SeriesTable;
  target: SeriesTable;
  budget: SeriesTable;
  /** Keys of scored rows with target values inside the horizon, before accumulation */
  targetKeys: Set<string>;
}

/** Keep only rows the production table covers, i.e. each company's scoring scope */
function restrictToScored(table: SeriesTable, production: SeriesTable): SeriesTable {
  const scored = indexRows(production);
  return table.filter((row) => scored.has(rowKey(row.companyId, row.scope)));
}

function finalValue(row: SeriesRow | undefined): Quantity | null {
  const last = row && lastPoint(row.series);
  return row && last ? { magnitude: last.value, unit: row.series.unit } : null;
}

function indexResults(results: ExceedanceResult[]): Map<string, ExceedanceResult> {
  return new Map(results.map((r) => [rowKey(r.companyId, r.scope), r]));
}

/** Trajectory, target and budget cumulative emissions over the horizon */
function buildCumulativeTables(inputs: AggregateInputs, issues: ScoringIssue[]): CumulativeTables {
  const { production } = inputs;
  const trajectories = restrictToScored(inputs.trajectories, production);
  const targets = fillTargetGaps(restrictToScored(inputs.targets, production), trajectories, issues);

  return {
    trajectory: calculateCumulativeEmissions(trajectories, production, issues),
    target: calculateCumulativeEmissions(targets, production, issues),
    budget: calculateCumulativeEmissions(inputs.budgetIntensities, production, issues),
    targetKeys: new Set(
      targets.filter((row) => row.series.points.length > 0).map((row) => rowKey(row.companyId, row.scope))
    )
  };
}

/** Build one aggregate per company with a scoring scope, trajectory and budget */
function buildCompanyAggregates(inputs: AggregateInputs, issues: ScoringIssue[]): CompanyAggregate[] {
  const { controls } = inputs;
  const cumulative = buildCumulativeTables(inputs, issues);

  // The budget is fully available from the start: everything up to the target year may be spent early
  const trajectoryExceedance = indexResults(
    getExceedanceYears(cumulative.trajectory, cumulative.budget, controls, controls.targetYear)
  );
  const targetExceedance = indexResults(getExceedanceYears(cumulative.target, cumulative.budget, controls, controls.targetYear));

  const trajectoryRows = indexRows(cumulative.trajectory);
  const targetRows = indexRows(cumulative.target);
  const budgetRows = indexRows(cumulative.budget);
  const companiesById = new Map(inputs.companies.map((c) => [c.companyId, c]));

  const aggregates: CompanyAggregate[] = [];
  for (const baseRow of inputs.baseYearRows) {
    const company = companiesById.get(baseRow.companyId);
    if (!company) continue;
    const key = rowKey(baseRow.companyId, baseRow.scope);
    const cumulativeTrajectory = finalValue(trajectoryRows.get(key));
    const cumulativeBudget = finalValue(budgetRows.get(key));
    const trajectoryExceedanceYear = trajectoryExceedance.get(key)?.exceedanceYear;

    if (!cumulativeTrajectory || !cumulativeBudget || trajectoryExceedanceYear === undefined) {
      recordIssue(
        issues,
        errorIssue(ISSUE_TYPE.INVARIANT_VIOLATION, 'No cumulative trajectory or budget for the scoring scope; company dropped', {
          companyId: baseRow.companyId,
          scope: baseRow.scope
        })
      );
      continue;
    }

    const cumulativeTarget = finalValue(targetRows.get(key));
    if (!cumulativeTarget && cumulative.targetKeys.has(key)) {
      // A disclosed target that failed to accumulate must not read as "no target"
      recordIssue(
        issues,
        errorIssue(ISSUE_TYPE.INVARIANT_VIOLATION, 'Cumulative target could not be computed for the scoring scope; company dropped', {
          companyId: baseRow.companyId,
          scope: baseRow.scope
        })
      );
      continue;
    }

    const aggregate: CompanyAggregate = {
      companyId: company.companyId,
      companyName: company.companyName,
      sector: company.sector,
      region: company.region,
      scope: baseRow.scope,
      baseYearProduction: company.baseYearProduction,
      ghgS1S2: company.ghgS1S2,
      ghgS3: company.ghgS3,
      ...(company.companyRevenue !== undefined && { companyRevenue: company.companyRevenue }),
      ...(company.companyMarketCap !== undefined && { companyMarketCap: company.companyMarketCap }),
      cumulativeTrajectory,
      cumulativeTarget,
      cumulativeBudget,
      trajectoryExceedanceYear,
      targetExceedanceYear: targetExceedance.get(key)?.exceedanceYear ?? null,
      benchmarkGlobalBudget: inputs.benchmarkGlobalBudget,
      benchmarkTemperature: inputs.benchmarkTemperature
    };

    const validation = validateCompanyAggregate(aggregate);
    if (!validation.valid) {
      recordIssue(
        issues,
        errorIssue(ISSUE_TYPE.SCHEMA_VALIDATION_FAILURE, `Aggregate failed validation: ${validation.issues.join('; ')}`, {
          companyId: company.companyId,
          scope: baseRow.scope
        })
      );
      continue;
    }
    aggregates.push(aggregate);
  }
  return aggregates;
}

export { buildCompanyAggregates, buildCumulativeTables };
