/**
 * Purpose: Compute the stacked scenario-band geometry behind the trajectory chart.
 * Intent: Keep border centring and band stacking pure, so the assembler only draws.
 *
 * Bands are stacked so that, for every year, the intervals in `order` are contiguous and
 * together cover exactly `[borders.lower, borders.upper]`, even when scenarios cross. The
 * last band in the good-to-bad direction is the synthetic `worse` band.
 */

import { ChartDataError } from "./chart_errors.js";
import { uniqueSortedNumbers } from "./chart_math.js";
import { WORSE_BAND } from "./reference_data.js";
import { extent } from "./table_ops.js";
import type { GreenOrBrown, TrajectoryMetricType } from "./types.js";

/** Largest tolerated gap between the start value's distances to the two borders, as a share of the span. */
export const MAX_DELTA_DISTANCE = 0.1;

export interface AreaBorders {
  lower: number;
  upper: number;
}

export interface BandRow {
  year: number;
  metric: string;
  value_low: number;
  value: number;
}

export interface BandLayout {
  borders: AreaBorders;
  startValue: number;
  direction: GreenOrBrown;
  /** Stacking order, bottom to top. */
  order: string[];
  bands: BandRow[];
}

export interface BandInputRow {
  year: number;
  metric_type: TrajectoryMetricType;
  metric: string;
  value: number;
}

export function computeAreaBorders(lower: number, upper: number, startValue: number): AreaBorders {
  const span = upper - lower;
  if (span === 0) {
    throw new ChartDataError(
      { kind: "DegenerateRange", value: lower },
      `Can't lay out scenario bands: every value equals ${lower}`,
      "The trajectory needs at least two distinct values."
    );
  }

  const distanceUpper = (upper - startValue) / span;
  const distanceLower = (startValue - lower) / span;
  if (Math.abs(distanceUpper - distanceLower) <= MAX_DELTA_DISTANCE) return { lower, upper };

  // Only one border moves: the one nearer the start value is pushed out to mirror the other.
  if (distanceUpper > distanceLower) {
    return { lower: startValue - distanceUpper * span, upper };
  }
  return { lower, upper: distanceLower * span + startValue };
}

function cellKey(year: number, metric: string): string {
  return `${year}\u0000${metric}`;
}

export function layoutBands(
  rows: readonly BandInputRow[],
  scenariosGoodToBad: readonly string[],
  direction: GreenOrBrown
): BandLayout {
  const range = extent(
    rows.map((r) => r.value),
    "layoutBands"
  );
  const years = uniqueSortedNumbers(rows.map((r) => r.year));
  const firstYear = extent(years, "layoutBands").min;

  const start = rows.find((r) => r.year === firstYear && r.metric_type === "portfolio");
  if (!start) {
    throw new ChartDataError(
      { kind: "MissingStartValue", year: firstYear },
      `The portfolio has no value in the first year (${firstYear})`,
      "The trajectory is centred on the portfolio's starting value."
    );
  }

  const scenarioValues = new Map<string, number>();
  for (const r of rows) {
    if (r.metric_type !== "scenario") continue;
    const key = cellKey(r.year, r.metric);
    if (!scenarioValues.has(key)) scenarioValues.set(key, r.value);
  }

  const present = new Set(rows.filter((r) => r.metric_type === "scenario").map((r) => r.metric));
  const absent = scenariosGoodToBad.filter((s) => !present.has(s));
  if (absent.length) {
    throw new ChartDataError(
      { kind: "ScenarioNotFound", scenarios: absent },
      `Scenario specs name scenarios the data does not have: ${absent.join(", ")}`,
      `Available scenarios: ${[...present].join(", ") || "none"}.`
    );
  }

  const borders = computeAreaBorders(range.min, range.max, start.value);
  const bands: BandRow[] = [];

  if (direction === "brown") {
    // High values are bad: stack upwards from the lower border, `worse` tops out at the upper one.
    const order = [...scenariosGoodToBad, WORSE_BAND];
    for (const year of years) {
      let low = borders.lower;
      for (const metric of order) {
        const raw = metric === WORSE_BAND ? borders.upper : scenarioValues.get(cellKey(year, metric));
        if (raw === undefined) continue;
        // Crossing scenarios collapse to an empty band instead of overlapping the one below.
        const value = Math.max(low, raw);
        bands.push({ year, metric, value_low: low, value });
        low = value;
      }
    }
    return { borders, startValue: start.value, direction, order, bands };
  }

  // Low values are bad: `worse` sits on the lower border and each band reaches up to the next one.
  const order = [WORSE_BAND, ...[...scenariosGoodToBad].reverse()];
  for (const year of years) {
    const lows: Array<{ metric: string; low: number }> = [];
    for (const metric of order) {
      const raw = metric === WORSE_BAND ? borders.lower : scenarioValues.get(cellKey(year, metric));
      if (raw === undefined) continue;
      const previous = lows[lows.length - 1];
      lows.push({ metric, low: previous ? Math.max(previous.low, raw) : raw });
    }
    lows.forEach((entry, i) => {
      const next = lows[i + 1];
      bands.push({ year, metric: entry.metric, value_low: entry.low, value: next ? next.low : borders.upper });
    });
  }
  return { borders, startValue: start.value, direction, order, bands };
}
