/**
 * Purpose: Turn market_share-like rows into the trajectory chart input table.
 * Intent: Slice one sector/technology/region/source and tag each metric's role.
 */

import { ChartDataError } from "./chart_errors.js";
import {
  MARKET_SHARE_COLUMNS,
  assertHasColumns,
  assertNotEmpty,
  readInteger,
  readNumber,
  readString,
} from "./data_contract.js";
import { classifyMetric, trajectoryMetricType } from "./metric_classify.js";
import type { InputRow, TrajectoryRow } from "./types.js";

export type TrajectoryValueName = "production" | "technology_share";

export interface TrajectoryFilters {
  sector: string;
  technology: string;
  region: string;
  scenarioSource: string;
  valueName: TrajectoryValueName;
}

export function prepareForTrajectoryChart(rows: readonly InputRow[], filters: TrajectoryFilters): TrajectoryRow[] {
  assertNotEmpty(rows);
  assertHasColumns(rows, [...MARKET_SHARE_COLUMNS, filters.valueName], "market_share");

  const out: TrajectoryRow[] = [];
  rows.forEach((row, index) => {
    if (readString(row, "sector", index) !== filters.sector) return;
    if (readString(row, "technology", index) !== filters.technology) return;
    if (readString(row, "region", index) !== filters.region) return;
    if (readString(row, "scenario_source", index) !== filters.scenarioSource) return;

    const metric = readString(row, "metric", index);
    const cls = classifyMetric(metric);
    out.push({
      year: readInteger(row, "year", index),
      metric_type: trajectoryMetricType(metric),
      metric: cls.kind === "scenario" ? cls.scenario : metric,
      value: readNumber(row, filters.valueName, index),
      technology: filters.technology,
    });
  });

  if (out.length === 0) {
    throw new ChartDataError(
      { kind: "EmptyInput" },
      "No rows match the trajectory filters",
      `Filters: sector=${filters.sector}, technology=${filters.technology}, region=${filters.region}, ` +
        `scenario_source=${filters.scenarioSource}.`
    );
  }
  return out;
}
