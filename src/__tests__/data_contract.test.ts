import { describe, it, expect } from "vitest";
import {
  validateEmissionIntensityData,
  validateTechmixData,
  validateTrajectoryData,
} from "../data_contract.js";
import {
  brownTrajectoryRows,
  caught,
  emissionRow,
  emissionRows,
  marketShareRow,
  techmixRows,
  trajectoryRow,
  without,
} from "./fixtures.js";

describe("validateTechmixData", () => {
  it("returns typed rows for a valid table", () => {
    const rows = validateTechmixData(techmixRows());
    expect(rows).toHaveLength(12);
    expect(rows[0]).toEqual({
      sector: "power",
      technology: "renewablescap",
      year: 2020,
      region: "global",
      scenario_source: "demo_2020",
      metric: "projected",
      technology_share: 1,
    });
  });

  it("keeps optional labels", () => {
    const [row] = validateTechmixData([marketShareRow({ metric: "target_sds", label: "Target", label_tech: "Coal" })]);
    expect(row?.label).toBe("Target");
    expect(row?.label_tech).toBe("Coal");
  });

  it("rejects an empty table", () => {
    const err = caught(() => validateTechmixData([]));
    expect(err.kind).toBe("EmptyInput");
    expect(err.code).toBe("AP_EMPTY_INPUT");
    expect(err.message).toBe("`data` must have some rows\nDoes the table come out of a filter that matched nothing?");
  });

  it("names the missing columns", () => {
    const rows = techmixRows();
    rows[3] = without(marketShareRow(), "technology_share");
    const err = caught(() => validateTechmixData(rows));
    expect(err.detail).toEqual({ kind: "MissingColumns", columns: ["technology_share"], dataset: "market_share" });
    expect(err.message).toBe("`data` must have columns: technology_share\nIs your data `market_share`-like?");
  });

  it("reports the first cell with the wrong type", () => {
    const rows = [marketShareRow({ metric: "target_sds" }), marketShareRow({ year: "2020" })];
    const err = caught(() => validateTechmixData(rows));
    expect(err.detail).toEqual({ kind: "InvalidValue", column: "year", row: 1, expected: "an integer" });
    expect(err.message).toBe("rows[1].year must be an integer");
  });

  it("requires a single sector", () => {
    const rows = [...techmixRows(), marketShareRow({ sector: "automotive", metric: "target_sds" })];
    const err = caught(() => validateTechmixData(rows));
    expect(err.detail).toEqual({ kind: "MultipleValues", column: "sector", values: ["power", "automotive"] });
    expect(err.hint).toBe(
      "Do you need to pick one value? E.g. pick \"power\" with: `rows.filter((row) => row.sector === \"power\")`. " +
        "Provided: power, automotive."
    );
  });

  it("requires one scenario", () => {
    const rows = [marketShareRow(), marketShareRow({ metric: "corporate_economy" })];
    const err = caught(() => validateTechmixData(rows));
    expect(err.kind).toBe("NoScenario");
    expect(err.message).toBe("`data.metric` must have one scenario\nIt has none.");
  });

  it("rejects several scenarios with a filter example", () => {
    const rows = [...techmixRows(), marketShareRow({ metric: "target_cps" })];
    const err = caught(() => validateTechmixData(rows));
    expect(err.detail).toEqual({ kind: "MultipleScenarios", values: ["target_sds", "target_cps"] });
    expect(err.message).toBe(
      "`data.metric` must have a single scenario not 2\n" +
        "Do you need to pick one scenario? E.g. pick \"target_sds\" with: " +
        "`rows.filter((row) => [\"projected\", \"corporate_economy\", \"target_sds\"].includes(row.metric))`. " +
        "Provided: target_sds, target_cps."
    );
  });
});

describe("validateTrajectoryData", () => {
  it("accepts the trajectory table", () => {
    const rows = validateTrajectoryData(brownTrajectoryRows());
    expect(rows).toHaveLength(8);
    expect(rows[4]).toEqual({ year: 2020, metric_type: "scenario", metric: "sds", value: 40, technology: "coalcap" });
  });

  it("rejects an empty table", () => {
    const err = caught(() => validateTrajectoryData([]));
    expect(err.kind).toBe("EmptyInput");
    expect(err.code).toBe("AP_EMPTY_INPUT");
  });

  it("rejects an unknown metric type", () => {
    const err = caught(() => validateTrajectoryData([trajectoryRow(2020, "target", "sds", 1)]));
    expect(err.message).toBe("rows[0].metric_type must be one of [\"portfolio\", \"benchmark\", \"scenario\"]");
  });

  it("rejects non-finite values", () => {
    const err = caught(() => validateTrajectoryData([trajectoryRow(2020, "portfolio", "projected", Number.NaN)]));
    expect(err.detail).toEqual({ kind: "InvalidValue", column: "value", row: 0, expected: "a finite number" });
  });

  it("requires a single technology", () => {
    const rows = [...brownTrajectoryRows(), trajectoryRow(2020, "portfolio", "projected", 1, "gascap")];
    const err = caught(() => validateTrajectoryData(rows));
    expect(err.detail).toEqual({ kind: "MultipleValues", column: "technology", values: ["coalcap", "gascap"] });
  });
});

describe("validateEmissionIntensityData", () => {
  it("accepts the sda table", () => {
    expect(validateEmissionIntensityData(emissionRows())).toHaveLength(6);
  });

  it("rejects an empty table", () => {
    expect(caught(() => validateEmissionIntensityData([])).kind).toBe("EmptyInput");
  });

  it("rejects a label that is not a string", () => {
    const err = caught(() => validateEmissionIntensityData([emissionRow(2020, "projected", 1, { label: 3 })]));
    expect(err.message).toBe("rows[0].label must be a string when present");
  });

  it("caps the number of lines", () => {
    const rows = ["a", "b", "c", "d", "e", "f", "g", "h"].map((metric) => emissionRow(2020, metric, 1));
    const err = caught(() => validateEmissionIntensityData(rows));
    expect(err.detail).toEqual({ kind: "TooManyLines", count: 8, max: 7 });
    expect(err.message).toBe(
      "Can't plot more than 7 lines. Found 8 lines: a, b, c, d, e, f, g, h\n" +
        "Do you need to pick fewer values of `emission_factor_metric`?"
    );
  });

  it("takes a custom line cap", () => {
    const err = caught(() => validateEmissionIntensityData(emissionRows(), 2));
    expect(err.detail).toEqual({ kind: "TooManyLines", count: 3, max: 2 });
  });
});
