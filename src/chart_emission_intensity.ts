/**
 * Purpose: Assemble the emission intensity chart: one coloured line per metric over time.
 * Intent: Keep legend order and axis ranges deterministic.
 */

import { axisBreaks, expandRange } from "./chart_math.js";
import { DEFAULT_THEME, type AlignmentChart, type ChartLayer } from "./chart_types.js";
import { toTitle, withoutInfo } from "./contract_common.js";
import { validateEmissionIntensityData } from "./data_contract.js";
import { prepareEmissionIntensityData, type EmissionIntensityPlotRow, type PrepOptions } from "./data_reshape.js";
import { defaultChartContext } from "./reference_data.js";
import { extent, groupBy, sortBy } from "./table_ops.js";
import type { ChartContext, ChartMessage, InputRow } from "./types.js";

export interface EmissionIntensityChartOptions {
  title?: string;
  xTitle?: string;
  yTitle?: string;
  quiet?: boolean;
}

export interface EmissionIntensityChartResult {
  chart: AlignmentChart;
  messages: ChartMessage[];
}

const TOP_EXPANSION = 0.1;
const Y_TICK_COUNT = 5;

interface LineGroup {
  label: string;
  hex: string;
  rows: EmissionIntensityPlotRow[];
}

/** Lines ordered by their value at their own last year, highest first. */
export function orderLines(rows: readonly EmissionIntensityPlotRow[]): LineGroup[] {
  const groups = groupBy(rows, (r) => r.label).map(({ key, rows: own }) => {
    const sorted = sortBy(own, (r) => r.year);
    return { label: key, hex: sorted[0]?.hex ?? "", rows: sorted };
  });
  const lastValue = (g: LineGroup): number => g.rows[g.rows.length - 1]?.value ?? 0;
  return sortBy(groups, lastValue, "desc");
}

function assembleEmissionIntensity(
  rows: readonly EmissionIntensityPlotRow[],
  labels: { title: string; x: string; y: string }
): AlignmentChart {
  const lines = orderLines(rows);
  const layers = lines.map((line): ChartLayer => ({
    type: "line",
    id: `line:${line.label}`,
    points: line.rows.map((r) => ({ x: r.date, y: r.value })),
    color: line.hex,
    lineType: "solid",
    label: line.label,
  }));

  const values = extent(
    rows.map((r) => r.value),
    "emissionIntensity"
  );
  // The y axis always reaches down (or up) to zero.
  const lo = Math.min(0, values.min);
  const hi = Math.max(0, values.max);
  const expanded = expandRange(lo, hi, [0, TOP_EXPANSION]);
  const breaks = axisBreaks(lo, hi, Y_TICK_COUNT, expanded);

  const dates = sortBy(rows, (r) => r.year);
  const firstDate = dates[0]?.date ?? "";
  const lastDate = dates[dates.length - 1]?.date ?? firstDate;

  return {
    kind: "emission_intensity",
    title: labels.title,
    labels: { x: labels.x, y: labels.y },
    layers,
    scales: {
      x: { kind: "date", domain: [firstDate, lastDate], expand: [0, TOP_EXPANSION] },
      y: { kind: "continuous", domain: [lo, hi], expand: [0, TOP_EXPANSION], breaks },
      colour: {
        kind: "manual",
        levels: lines.map((l) => l.label),
        labels: lines.map((l) => l.label),
        values: lines.map((l) => l.hex),
      },
    },
    coord: { flip: false, expand: true, clip: true },
    legend: { position: "right", entries: lines.map((l) => ({ label: l.label, color: l.hex })) },
    theme: DEFAULT_THEME,
  };
}

function buildEmissionIntensity(
  rows: readonly InputRow[],
  prep: PrepOptions,
  labels: (sector: string) => { title: string; x: string; y: string },
  opts: EmissionIntensityChartOptions,
  context: ChartContext
): EmissionIntensityChartResult {
  const data = validateEmissionIntensityData(rows, context.maxEmissionIntensityLines);
  const prepared = prepareEmissionIntensityData(data, prep, context);
  const defaults = labels(prepared.rows[0]?.sector ?? "");
  const chart = assembleEmissionIntensity(prepared.rows, {
    title: opts.title ?? defaults.title,
    x: opts.xTitle ?? defaults.x,
    y: opts.yTitle ?? defaults.y,
  });
  return { chart, messages: withoutInfo(prepared.messages, opts.quiet) };
}

export function plotEmissionIntensity(
  rows: readonly InputRow[],
  opts: EmissionIntensityChartOptions = {},
  context: ChartContext = defaultChartContext()
): EmissionIntensityChartResult {
  return buildEmissionIntensity(rows, {}, () => ({ title: "", x: "", y: "" }), opts, context);
}

export function qplotEmissionIntensity(
  rows: readonly InputRow[],
  opts: EmissionIntensityChartOptions = {},
  context: ChartContext = defaultChartContext()
): EmissionIntensityChartResult {
  return buildEmissionIntensity(
    rows,
    { span5yr: true, convertLabel: toTitle },
    (sector) => ({
      title: `Emission Intensity Trend for the ${toTitle(sector)} Sector`,
      x: "Year",
      y: "Tons of CO2 per Ton of Production Unit",
    }),
    opts,
    context
  );
}
