import { ChartDataError } from "../chart_errors.js";
import type { InputRow } from "../types.js";

export function caught(fn: () => unknown): ChartDataError {
  try {
    fn();
  } catch (e) {
    if (e instanceof ChartDataError) return e;
    throw e;
  }
  throw new Error("expected a ChartDataError");
}

export function without(row: InputRow, column: string): InputRow {
  return Object.fromEntries(Object.entries(row).filter(([key]) => key !== column));
}

export function marketShareRow(overrides: InputRow = {}): InputRow {
  return {
    sector: "power",
    technology: "coalcap",
    year: 2020,
    region: "global",
    scenario_source: "demo_2020",
    metric: "projected",
    technology_share: 0.5,
    ...overrides,
  };
}

/** Two technologies, three metrics, the given years. */
export function techmixRows(years: readonly number[] = [2020, 2025]): InputRow[] {
  const rows: InputRow[] = [];
  for (const year of years) {
    for (const metric of ["projected", "corporate_economy", "target_sds"]) {
      rows.push(marketShareRow({ year, metric, technology: "renewablescap", technology_share: 1 }));
      rows.push(marketShareRow({ year, metric, technology: "coalcap", technology_share: 3 }));
    }
  }
  return rows;
}

export function trajectoryRow(year: number, metric_type: string, metric: string, value: number, technology = "coalcap"): InputRow {
  return { year, metric_type, metric, value, technology };
}

/**
 * Brown technology: sds is the good (low) scenario, cps the bad (high) one.
 * Values span [30, 70] with the portfolio starting at 50, so the borders stay put.
 */
export function brownTrajectoryRows(): InputRow[] {
  return [
    trajectoryRow(2020, "portfolio", "projected", 50),
    trajectoryRow(2025, "portfolio", "projected", 55),
    trajectoryRow(2020, "benchmark", "corporate_economy", 45),
    trajectoryRow(2025, "benchmark", "corporate_economy", 50),
    trajectoryRow(2020, "scenario", "sds", 40),
    trajectoryRow(2025, "scenario", "sds", 30),
    trajectoryRow(2020, "scenario", "cps", 60),
    trajectoryRow(2025, "scenario", "cps", 70),
  ];
}

/**
 * Green technology: sds is the good (high) scenario, cps the bad (low) one.
 * Values span [40, 80] with the portfolio starting at 50, so the lower border drops to 20.
 */
export function greenTrajectoryRows(): InputRow[] {
  return [
    trajectoryRow(2020, "portfolio", "projected", 50, "renewablescap"),
    trajectoryRow(2025, "portfolio", "projected", 55, "renewablescap"),
    trajectoryRow(2020, "scenario", "sds", 60, "renewablescap"),
    trajectoryRow(2025, "scenario", "sds", 80, "renewablescap"),
    trajectoryRow(2020, "scenario", "cps", 40, "renewablescap"),
    trajectoryRow(2025, "scenario", "cps", 45, "renewablescap"),
  ];
}

export function emissionRow(year: number, metric: string, value: number, overrides: InputRow = {}): InputRow {
  return { sector: "cement", year, emission_factor_metric: metric, emission_factor_value: value, ...overrides };
}

export function emissionRows(): InputRow[] {
  return [
    emissionRow(2020, "projected", 0.9),
    emissionRow(2025, "projected", 0.8),
    emissionRow(2020, "corporate_economy", 0.7),
    emissionRow(2025, "corporate_economy", 0.85),
    emissionRow(2020, "target_demo", 0.9),
    emissionRow(2025, "target_demo", 0.5),
  ];
}
