/**
 * Purpose: Assemble the trajectory chart: scenario bands, portfolio line, supporting lines.
 * Intent: Turn a band layout into ordered draw instructions, nothing more.
 */

import { layoutBands, type BandLayout, type BandRow } from "./chart_bands.js";
import { ChartDataError } from "./chart_errors.js";
import {
  DEFAULT_MARGIN,
  DEFAULT_THEME,
  type AlignmentChart,
  type ChartLayer,
  type ChartPoint,
  type LineType,
} from "./chart_types.js";
import { spellOutTechnology, toTitle, warn, withoutInfo } from "./contract_common.js";
import { validateTrajectoryData } from "./data_contract.js";
import { prepareTrajectoryData, type TrajectoryPlotRow } from "./data_reshape.js";
import { WORSE_BAND, defaultChartContext, technologyDirection } from "./reference_data.js";
import { distinct, extent, sortBy } from "./table_ops.js";
import type {
  ChartContext,
  ChartMessage,
  GreenOrBrown,
  InputRow,
  LineMetricSpec,
  ScenarioSpec,
} from "./types.js";

export interface TrajectoryChartOptions {
  /** Ordered from the most to the least sustainable scenario. */
  scenarioSpecs: readonly ScenarioSpec[];
  mainLineMetric: LineMetricSpec;
  additionalLineMetrics?: readonly LineMetricSpec[];
  title?: string;
  xTitle?: string;
  yTitle?: string;
  annotate?: boolean;
  quiet?: boolean;
}

export interface QuickTrajectoryOptions {
  annotate?: boolean;
  quiet?: boolean;
}

export interface TrajectoryChartResult {
  chart: AlignmentChart;
  layout: BandLayout;
  messages: ChartMessage[];
}

export const BAND_ALPHA = 0.75;
export const MAIN_LINE_COLOUR = "black";

/**
 * Styles of the supporting lines, applied by position. There are four; a fifth line wraps
 * around to the first style.
 */
export const SUPPORTING_LINE_STYLES: ReadonlyArray<{ lineType: LineType; color: string }> = Object.freeze([
  { lineType: "dashed", color: "black" },
  { lineType: "solid", color: "gray" },
  { lineType: "solid", color: "grey46" },
  { lineType: "twodash", color: "black" },
]);

export function supportingLineStyle(index: number): { lineType: LineType; color: string } {
  const style = SUPPORTING_LINE_STYLES[index % SUPPORTING_LINE_STYLES.length];
  if (!style) throw new Error("supportingLineStyle: no styles defined");
  return style;
}

const ANNOTATION_SIZE = 3;
const SEGMENT_LENGTH = 0.75;
const BAND_LABEL_OFFSET = 0.85;
const LINE_LABEL_OFFSET = 0.1;
const ANNOTATED_RIGHT_MARGIN = 4;

interface ResolvedSpecs {
  scenarios: ScenarioSpec[];
  worse: ScenarioSpec;
}

function resolveScenarioSpecs(specs: readonly ScenarioSpec[], context: ChartContext): ResolvedSpecs {
  const scenarios = specs.filter((s) => s.scenario !== WORSE_BAND);
  if (scenarios.length === 0) {
    throw new ChartDataError(
      { kind: "NoScenario" },
      "`scenarioSpecs` must name at least one scenario",
      "Pass the scenarios ordered from the most to the least sustainable."
    );
  }
  const worse = specs.find((s) => s.scenario === WORSE_BAND) ?? context.worseBand;
  return { scenarios, worse: { ...worse, scenario: WORSE_BAND } };
}

function resolveDirection(technology: string, context: ChartContext): GreenOrBrown {
  const direction = technologyDirection(context, technology);
  if (direction) return direction;
  throw new ChartDataError(
    { kind: "UnknownTechnology", technology },
    `Can't tell whether ${technology} is a green or a brown technology`,
    "Add it to the context's `greenOrBrown` table."
  );
}

function linePoints(rows: readonly TrajectoryPlotRow[], metric: string): ChartPoint[] {
  return sortBy(
    rows.filter((r) => r.metric === metric),
    (r) => r.year
  ).map((r) => ({ x: r.year, y: r.value }));
}

function bandAt(bands: readonly BandRow[], metric: string, year: number): BandRow | undefined {
  return bands.find((b) => b.metric === metric && b.year === year);
}

function pointAt(points: readonly ChartPoint[], year: number): ChartPoint | undefined {
  return points.find((p) => p.x === year);
}

/** Label carried by the metric's first row. */
function labelOf(rows: readonly TrajectoryPlotRow[], metric: string): string {
  return rows.find((r) => r.metric === metric)?.label ?? metric;
}

function technologyOf(rows: readonly TrajectoryPlotRow[]): string {
  const first = rows[0];
  if (!first) throw new Error("trajectory: expected at least one row");
  return first.technology;
}

function assembleTrajectory(
  rows: readonly TrajectoryPlotRow[],
  opts: TrajectoryChartOptions,
  context: ChartContext,
  messages: ChartMessage[]
): { chart: AlignmentChart; layout: BandLayout } {
  const specs = resolveScenarioSpecs(opts.scenarioSpecs, context);
  const direction = resolveDirection(technologyOf(rows), context);

  const specified = new Set(specs.scenarios.map((s) => s.scenario));
  const unused = distinct(
    rows.filter((r) => r.metric_type === "scenario"),
    (r) => r.metric
  ).filter((m) => !specified.has(m));
  if (unused.length) {
    warn(messages, "AP_TRAJECTORY_SCENARIO_UNUSED", `Scenarios without a spec are not drawn: ${unused.join(", ")}`);
  }

  const layout = layoutBands(
    rows,
    specs.scenarios.map((s) => s.scenario),
    direction
  );
  const years = extent(
    rows.map((r) => r.year),
    "trajectory"
  );
  const lastYear = years.max;
  const annotate = opts.annotate ?? false;

  const specByScenario = new Map<string, ScenarioSpec>();
  for (const s of specs.scenarios) specByScenario.set(s.scenario, s);
  specByScenario.set(WORSE_BAND, specs.worse);

  const layers: ChartLayer[] = [];
  for (const metric of layout.order) {
    const spec = specByScenario.get(metric);
    if (!spec) continue;
    const data = layout.bands.filter((b) => b.metric === metric);
    layers.push({ type: "ribbon", id: `band:${metric}`, data, fill: spec.color, alpha: BAND_ALPHA });

    if (metric !== WORSE_BAND) {
      // The boundary line follows the scenario's own value, which is the band's top for brown
      // technologies and its bottom for green ones.
      const points = data.map((b) => ({ x: b.year, y: direction === "brown" ? b.value : b.value_low }));
      layers.push({ type: "line", id: `band-line:${metric}`, points, color: spec.color, lineType: "solid" });
    }

    const last = annotate ? bandAt(data, metric, lastYear) : undefined;
    if (last) {
      layers.push({
        type: "segment",
        id: `band-segment:${metric}`,
        x: lastYear,
        xend: lastYear + SEGMENT_LENGTH,
        y: last.value,
        yend: last.value,
        color: spec.color,
      });
      layers.push({
        type: "text",
        id: `band-label:${metric}`,
        x: lastYear + BAND_LABEL_OFFSET,
        y: last.value,
        label: spec.label,
        hjust: 0,
        size: ANNOTATION_SIZE,
      });
    }
  }

  const lines: Array<{ spec: LineMetricSpec; lineType: LineType; color: string }> = [
    { spec: opts.mainLineMetric, lineType: "solid", color: MAIN_LINE_COLOUR },
    ...(opts.additionalLineMetrics ?? []).map((spec, i) => ({ spec, ...supportingLineStyle(i) })),
  ];
  for (const line of lines) {
    const points = linePoints(rows, line.spec.metric);
    if (points.length === 0) {
      warn(messages, "AP_TRAJECTORY_METRIC_ABSENT", `No rows for line metric: ${line.spec.metric}`);
    }
    layers.push({
      type: "line",
      id: `line:${line.spec.metric}`,
      points,
      color: line.color,
      lineType: line.lineType,
      label: line.spec.label,
    });

    const last = annotate ? pointAt(points, lastYear) : undefined;
    if (last) {
      layers.push({
        type: "text",
        id: `line-label:${line.spec.metric}`,
        x: lastYear + LINE_LABEL_OFFSET,
        y: last.y,
        label: line.spec.label,
        hjust: 0,
        size: ANNOTATION_SIZE,
      });
    }
  }

  const chart: AlignmentChart = {
    kind: "trajectory",
    title: opts.title ?? "",
    labels: { x: opts.xTitle ?? "", y: opts.yTitle ?? "" },
    layers,
    scales: {
      x: { kind: "continuous", domain: [years.min, years.max], expand: [0, 0] },
      y: { kind: "continuous", domain: [layout.borders.lower, layout.borders.upper], expand: [0, 0] },
    },
    coord: { flip: false, expand: false, clip: false },
    theme: {
      ...DEFAULT_THEME,
      axisLineX: false,
      axisLineY: false,
      margin: annotate ? { ...DEFAULT_MARGIN, right: ANNOTATED_RIGHT_MARGIN } : DEFAULT_MARGIN,
    },
  };
  return { chart, layout };
}

export function plotTrajectory(
  rows: readonly InputRow[],
  opts: TrajectoryChartOptions,
  context: ChartContext = defaultChartContext()
): TrajectoryChartResult {
  const messages: ChartMessage[] = [];
  const prepared = prepareTrajectoryData(validateTrajectoryData(rows));
  const { chart, layout } = assembleTrajectory(prepared, opts, context, messages);
  return { chart, layout, messages: withoutInfo(messages, opts.quiet) };
}

/**
 * Orders the data's scenarios from good to bad by their value in the last year: lower is
 * better for brown technologies, higher for green ones. Labels come from the rows.
 */
export function scenarioSpecsFromData(
  rows: readonly TrajectoryPlotRow[],
  direction: GreenOrBrown,
  context: ChartContext,
  messages: ChartMessage[]
): ScenarioSpec[] {
  const scenarioRows = rows.filter((r) => r.metric_type === "scenario");
  const scenarios = distinct(scenarioRows, (r) => r.metric);
  const lastValue = (scenario: string): number => {
    const own = scenarioRows.filter((r) => r.metric === scenario);
    const latest = own.reduce((acc, r) => (r.year > acc.year ? r : acc));
    return latest.value;
  };
  const ordered = sortBy(scenarios, lastValue, direction === "brown" ? "asc" : "desc");

  const palette = context.scenarioColours;
  if (ordered.length > palette.length) {
    warn(
      messages,
      "AP_PALETTE_TOO_SMALL",
      `${ordered.length} scenarios share a palette of ${palette.length} colours; colours repeat.`
    );
  }
  return ordered.map((scenario, i) => {
    const colour = palette.length ? palette[i % palette.length] : undefined;
    return { scenario, label: labelOf(rows, scenario), color: colour ? colour.hex : context.fallbackColour };
  });
}

export function qplotTrajectory(
  rows: readonly InputRow[],
  opts: QuickTrajectoryOptions = {},
  context: ChartContext = defaultChartContext()
): TrajectoryChartResult {
  const messages: ChartMessage[] = [];
  const prepared = prepareTrajectoryData(validateTrajectoryData(rows), { span5yr: true, convertLabel: toTitle });
  const technology = technologyOf(prepared);
  const direction = resolveDirection(technology, context);

  const mainMetric =
    distinct(
      prepared.filter((r) => r.metric_type === "portfolio"),
      (r) => r.metric
    )[0] ?? "projected";
  const benchmarks = distinct(
    prepared.filter((r) => r.metric_type === "benchmark"),
    (r) => r.metric
  );

  const { chart, layout } = assembleTrajectory(
    prepared,
    {
      scenarioSpecs: scenarioSpecsFromData(prepared, direction, context, messages),
      mainLineMetric: { metric: mainMetric, label: labelOf(prepared, mainMetric) },
      additionalLineMetrics: benchmarks.map((metric) => ({ metric, label: labelOf(prepared, metric) })),
      title: `Production Trajectory of ${spellOutTechnology(technology)}`,
      xTitle: "Year",
      yTitle: "Production",
      annotate: opts.annotate ?? true,
    },
    context,
    messages
  );
  return { chart, layout, messages: withoutInfo(messages, opts.quiet) };
}
