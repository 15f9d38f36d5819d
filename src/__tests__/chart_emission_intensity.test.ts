import { describe, it, expect } from "vitest";
import { plotEmissionIntensity, qplotEmissionIntensity } from "../chart_emission_intensity.js";
import { createChartContext } from "../reference_data.js";
import { caught, emissionRow, emissionRows } from "./fixtures.js";

describe("plotEmissionIntensity", () => {
  it("draws one line per metric, highest last value first", () => {
    const { chart } = plotEmissionIntensity(emissionRows());
    expect(chart.layers.map((l) => l.id)).toEqual(["line:corporate_economy", "line:projected", "line:target_demo"]);
    expect(chart.layers[0]).toEqual({
      type: "line",
      id: "line:corporate_economy",
      points: [
        { x: "2020-01-01", y: 0.7 },
        { x: "2025-01-01", y: 0.85 },
      ],
      color: "#1b324f",
      lineType: "solid",
      label: "corporate_economy",
    });
  });

  it("gives the top legend entry the first palette colour", () => {
    const { chart } = plotEmissionIntensity(emissionRows());
    expect(chart.scales.colour?.values).toEqual(["#1b324f", "#00c082", "#ff9623"]);
    expect(chart.legend?.entries.map((e) => e.label)).toEqual(["corporate_economy", "projected", "target_demo"]);
    expect(chart.legend?.position).toBe("right");
  });

  it("starts the y axis at zero", () => {
    const { chart } = plotEmissionIntensity(emissionRows());
    expect(chart.scales.y).toEqual({ kind: "continuous", domain: [0, 0.9], expand: [0, 0.1], breaks: [0, 0.5] });
    expect(chart.scales.x).toEqual({ kind: "date", domain: ["2020-01-01", "2025-01-01"], expand: [0, 0.1] });
  });

  it("reaches below zero for negative intensities", () => {
    const { chart } = plotEmissionIntensity([emissionRow(2020, "projected", -1), emissionRow(2025, "projected", 1)]);
    expect(chart.scales.y.kind === "continuous" ? chart.scales.y.domain : null).toEqual([-1, 1]);
  });

  it("follows the context line cap", () => {
    const context = createChartContext({ maxEmissionIntensityLines: 2 });
    expect(caught(() => plotEmissionIntensity(emissionRows(), {}, context)).detail).toEqual({
      kind: "TooManyLines",
      count: 3,
      max: 2,
    });
  });
});

describe("qplotEmissionIntensity", () => {
  it("titles the chart after the sector", () => {
    const { chart } = qplotEmissionIntensity(emissionRows());
    expect(chart.title).toBe("Emission Intensity Trend for the Cement Sector");
    expect(chart.labels).toEqual({ x: "Year", y: "Tons of CO2 per Ton of Production Unit" });
    expect(chart.legend?.entries.map((e) => e.label)).toEqual(["Corporate Economy", "Projected", "Target Demo"]);
  });

  it("keeps the first six years", () => {
    const { chart } = qplotEmissionIntensity([...emissionRows(), emissionRow(2031, "projected", 0.1)]);
    expect(chart.scales.x).toMatchObject({ domain: ["2020-01-01", "2025-01-01"] });
  });
});
