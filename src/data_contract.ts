/**
 * Purpose: Validate input tables against the per-chart structural contracts.
 * Intent: Fail fast with a typed error before any chart is assembled.
 */

import { ChartDataError } from "./chart_errors.js";
import { fmtString, fmtVector } from "./contract_common.js";
import { extractScenarios, isScenarioMetric } from "./metric_classify.js";
import { distinct } from "./table_ops.js";
import type {
  EmissionIntensityRow,
  InputRow,
  MarketShareRow,
  TrajectoryMetricType,
  TrajectoryRow,
} from "./types.js";

export interface TableContract {
  /** Name of the reference dataset the table should look like. */
  dataset: string;
  required: readonly string[];
  singleValued: readonly string[];
}

export const MARKET_SHARE_COLUMNS = Object.freeze([
  "sector",
  "technology",
  "year",
  "region",
  "scenario_source",
  "metric",
]);

export const techmixContract: TableContract = Object.freeze({
  dataset: "market_share",
  required: Object.freeze([...MARKET_SHARE_COLUMNS, "technology_share"]),
  singleValued: Object.freeze(["sector", "region", "scenario_source"]),
});

export const trajectoryContract: TableContract = Object.freeze({
  dataset: "trajectory",
  required: Object.freeze(["year", "metric_type", "metric", "value", "technology"]),
  singleValued: Object.freeze(["technology"]),
});

export const emissionIntensityContract: TableContract = Object.freeze({
  dataset: "sda",
  required: Object.freeze(["sector", "year", "emission_factor_metric", "emission_factor_value"]),
  singleValued: Object.freeze(["sector"]),
});

export const MAX_EMISSION_INTENSITY_LINES = 7;

const metricTypes = new Set<string>(["portfolio", "benchmark", "scenario"]);

function invalid(column: string, row: number, expected: string): ChartDataError {
  return new ChartDataError(
    { kind: "InvalidValue", column, row, expected },
    `rows[${row}].${column} must be ${expected}`
  );
}

export function readString(row: InputRow, column: string, index: number): string {
  const v = row[column];
  if (typeof v !== "string" || !v.trim()) throw invalid(column, index, "a non-empty string");
  return v;
}

export function readOptionalString(row: InputRow, column: string, index: number): string | undefined {
  const v = row[column];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "string") throw invalid(column, index, "a string when present");
  return v;
}

export function readInteger(row: InputRow, column: string, index: number): number {
  const v = row[column];
  if (typeof v !== "number" || !Number.isInteger(v)) throw invalid(column, index, "an integer");
  return v;
}

export function readNumber(row: InputRow, column: string, index: number): number {
  const v = row[column];
  if (typeof v !== "number" || !Number.isFinite(v)) throw invalid(column, index, "a finite number");
  return v;
}

function readMetricType(row: InputRow, index: number): TrajectoryMetricType {
  const v = row.metric_type;
  if (v === "portfolio" || v === "benchmark" || v === "scenario") return v;
  throw invalid("metric_type", index, `one of ${fmtVector([...metricTypes])}`);
}

export function assertNotEmpty(rows: readonly unknown[]): void {
  if (rows.length === 0) {
    throw new ChartDataError({ kind: "EmptyInput" }, "`data` must have some rows", "Does the table come out of a filter that matched nothing?");
  }
}

export function assertHasColumns(rows: readonly InputRow[], required: readonly string[], dataset: string): void {
  const missing = required.filter(
    (column) => !rows.every((row) => Object.prototype.hasOwnProperty.call(row, column))
  );
  if (missing.length === 0) return;
  throw new ChartDataError(
    { kind: "MissingColumns", columns: missing, dataset },
    `\`data\` must have columns: ${missing.join(", ")}`,
    `Is your data \`${dataset}\`-like?`
  );
}

export function assertSingleValue<T>(rows: readonly T[], column: string, get: (row: T) => string): void {
  const values = distinct(rows, get);
  const first = values[0];
  if (first === undefined || values.length === 1) return;
  throw new ChartDataError(
    { kind: "MultipleValues", column, values },
    `\`data.${column}\` must have a single value`,
    `Do you need to pick one value? E.g. pick ${fmtString(first)} with: ` +
      `\`rows.filter((row) => row.${column} === ${fmtString(first)})\`. Provided: ${values.join(", ")}.`
  );
}

function checkShape(rows: readonly InputRow[], contract: TableContract): void {
  assertNotEmpty(rows);
  assertHasColumns(rows, contract.required, contract.dataset);
}

/** Runs after the typed read, so every single-valued column already holds a string. */
function checkSingleValued(rows: readonly InputRow[], contract: TableContract): void {
  for (const column of contract.singleValued) assertSingleValue(rows, column, (row) => String(row[column]));
}

export function toMarketShareRow(row: InputRow, index: number): MarketShareRow {
  const label = readOptionalString(row, "label", index);
  const labelTech = readOptionalString(row, "label_tech", index);
  return {
    sector: readString(row, "sector", index),
    technology: readString(row, "technology", index),
    year: readInteger(row, "year", index),
    region: readString(row, "region", index),
    scenario_source: readString(row, "scenario_source", index),
    metric: readString(row, "metric", index),
    technology_share: readNumber(row, "technology_share", index),
    ...(label !== undefined ? { label } : {}),
    ...(labelTech !== undefined ? { label_tech: labelTech } : {}),
  };
}

export function assertSingleScenario(rows: readonly { metric: string }[]): void {
  const scenarios = extractScenarios(rows.map((r) => r.metric));
  const first = scenarios[0];
  if (first === undefined) {
    throw new ChartDataError({ kind: "NoScenario" }, "`data.metric` must have one scenario", "It has none.");
  }
  if (scenarios.length === 1) return;

  const others = distinct(rows, (r) => r.metric).filter((m) => !isScenarioMetric(m));
  const example = [...others, first];
  throw new ChartDataError(
    { kind: "MultipleScenarios", values: scenarios },
    `\`data.metric\` must have a single scenario not ${scenarios.length}`,
    `Do you need to pick one scenario? E.g. pick ${fmtString(first)} with: ` +
      `\`rows.filter((row) => ${fmtVector(example)}.includes(row.metric))\`. Provided: ${scenarios.join(", ")}.`
  );
}

export function validateTechmixData(rows: readonly InputRow[]): MarketShareRow[] {
  checkShape(rows, techmixContract);
  const typed = rows.map(toMarketShareRow);
  checkSingleValued(rows, techmixContract);
  assertSingleScenario(typed);
  return typed;
}

export function validateTrajectoryData(rows: readonly InputRow[]): TrajectoryRow[] {
  checkShape(rows, trajectoryContract);
  const typed = rows.map((row, index): TrajectoryRow => {
    const label = readOptionalString(row, "label", index);
    return {
      year: readInteger(row, "year", index),
      metric_type: readMetricType(row, index),
      metric: readString(row, "metric", index),
      value: readNumber(row, "value", index),
      technology: readString(row, "technology", index),
      ...(label !== undefined ? { label } : {}),
    };
  });
  checkSingleValued(rows, trajectoryContract);
  return typed;
}

export function validateEmissionIntensityData(
  rows: readonly InputRow[],
  maxLines: number = MAX_EMISSION_INTENSITY_LINES
): EmissionIntensityRow[] {
  checkShape(rows, emissionIntensityContract);
  const typed = rows.map((row, index): EmissionIntensityRow => {
    const label = readOptionalString(row, "label", index);
    return {
      sector: readString(row, "sector", index),
      year: readInteger(row, "year", index),
      emission_factor_metric: readString(row, "emission_factor_metric", index),
      emission_factor_value: readNumber(row, "emission_factor_value", index),
      ...(label !== undefined ? { label } : {}),
    };
  });
  checkSingleValued(rows, emissionIntensityContract);

  const lines = distinct(typed, (r) => r.emission_factor_metric);
  if (lines.length > maxLines) {
    throw new ChartDataError(
      { kind: "TooManyLines", count: lines.length, max: maxLines },
      `Can't plot more than ${maxLines} lines. Found ${lines.length} lines: ${lines.join(", ")}`,
      "Do you need to pick fewer values of `emission_factor_metric`?"
    );
  }
  return typed;
}
