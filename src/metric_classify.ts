/**
 * Purpose: Classify metric identifiers into portfolio, benchmark, scenario, or other.
 * Intent: Keep the metric naming convention in one place for every chart.
 */

import type { TrajectoryMetricType } from "./types.js";

export const PORTFOLIO_METRIC = "projected";
export const SCENARIO_PREFIX = "target_";
export const BENCHMARK_SUFFIX = "_economy";

export type MetricClass =
  | { kind: "portfolio" }
  | { kind: "benchmark" }
  | { kind: "scenario"; scenario: string }
  | { kind: "other" };

export function classifyMetric(metric: string): MetricClass {
  if (metric === PORTFOLIO_METRIC) return { kind: "portfolio" };
  if (metric.startsWith(SCENARIO_PREFIX) && metric.length > SCENARIO_PREFIX.length) {
    return { kind: "scenario", scenario: metric.slice(SCENARIO_PREFIX.length) };
  }
  if (metric.endsWith(BENCHMARK_SUFFIX)) return { kind: "benchmark" };
  return { kind: "other" };
}

export function isScenarioMetric(metric: string): boolean {
  return classifyMetric(metric).kind === "scenario";
}

/** Distinct scenario metrics, in the order they first appear. */
export function extractScenarios(metrics: Iterable<string>): string[] {
  const out: string[] = [];
  const seen = new Set<string>();
  for (const m of metrics) {
    if (seen.has(m) || !isScenarioMetric(m)) continue;
    seen.add(m);
    out.push(m);
  }
  return out;
}

export function trajectoryMetricType(metric: string): TrajectoryMetricType {
  const cls = classifyMetric(metric);
  switch (cls.kind) {
    case "portfolio":
      return "portfolio";
    case "scenario":
      return "scenario";
    case "benchmark":
    case "other":
      // Anything that is neither the portfolio nor a target is drawn as a comparison line.
      return "benchmark";
  }
}
