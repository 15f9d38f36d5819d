import { describe, it, expect } from "vitest";
import { classifyMetric, extractScenarios, trajectoryMetricType } from "../metric_classify.js";

describe("classifyMetric", () => {
  it("tags the portfolio metric", () => {
    expect(classifyMetric("projected")).toEqual({ kind: "portfolio" });
  });

  it("tags target_ metrics as scenarios and strips the prefix", () => {
    expect(classifyMetric("target_sds")).toEqual({ kind: "scenario", scenario: "sds" });
  });

  it("tags *_economy metrics as benchmarks", () => {
    expect(classifyMetric("corporate_economy")).toEqual({ kind: "benchmark" });
  });

  it("falls back to other for anything else", () => {
    expect(classifyMetric("adjusted_scenario_demo")).toEqual({ kind: "other" });
    expect(classifyMetric("target_")).toEqual({ kind: "other" });
    expect(classifyMetric("Projected")).toEqual({ kind: "other" });
  });
});

describe("extractScenarios", () => {
  it("returns distinct scenario metrics in first-seen order", () => {
    expect(extractScenarios(["projected", "target_sds", "corporate_economy", "target_cps", "target_sds"])).toEqual([
      "target_sds",
      "target_cps",
    ]);
  });

  it("returns an empty list when there is no scenario", () => {
    expect(extractScenarios(["projected", "corporate_economy"])).toEqual([]);
  });
});

describe("trajectoryMetricType", () => {
  it("maps each class onto the trajectory vocabulary", () => {
    expect(trajectoryMetricType("projected")).toBe("portfolio");
    expect(trajectoryMetricType("target_cps")).toBe("scenario");
    expect(trajectoryMetricType("corporate_economy")).toBe("benchmark");
    expect(trajectoryMetricType("adjusted_scenario_demo")).toBe("benchmark");
  });
});
