/**
 * Purpose: Assemble the techmix chart: proportionally stacked bars per year and category.
 * Intent: Keep category order, technology colours, and legend layout in one place.
 */

import { uniqueSortedNumbers } from "./chart_math.js";
import { DEFAULT_THEME, type AlignmentChart, type BarSegment, type StackedBar } from "./chart_types.js";
import { spellOutTechnology, toTitle, warn, withoutInfo } from "./contract_common.js";
import { validateTechmixData } from "./data_contract.js";
import { prepareTechmixData, type TechmixPlotRow, type TechmixPrepOptions } from "./data_reshape.js";
import { classifyMetric } from "./metric_classify.js";
import { defaultChartContext } from "./reference_data.js";
import { distinct, sortBy } from "./table_ops.js";
import type { ChartContext, ChartMessage, InputRow } from "./types.js";

export interface TechmixChartOptions {
  title?: string;
  quiet?: boolean;
}

export interface TechmixChartResult {
  chart: AlignmentChart;
  messages: ChartMessage[];
}

export interface TechnologyFill {
  technology: string;
  label: string;
  hex: string;
}

export const BAR_WIDTH = 0.5;
const LEGEND_COLUMNS = 3;
const FACET_ROWS = 2;

/**
 * Category labels, bottom to top: the scenario, the other metrics in reverse table order,
 * then the portfolio, so the portfolio reads first once the axis is flipped.
 */
export function techmixCategoryLabels(rows: readonly TechmixPlotRow[]): string[] {
  const metrics = distinct(rows, (r) => r.metric);
  const kindOf = (m: string) => classifyMetric(m).kind;
  const order = [
    ...metrics.filter((m) => kindOf(m) === "portfolio"),
    ...metrics.filter((m) => kindOf(m) !== "portfolio" && kindOf(m) !== "scenario"),
    ...metrics.filter((m) => kindOf(m) === "scenario"),
  ];
  const rank = new Map(order.map((m, i) => [m, i]));
  const sorted = sortBy(rows, (r) => rank.get(r.metric) ?? order.length);
  return distinct(sorted, (r) => r.label).reverse();
}

/** Palette entries for the table's sector and technologies, in palette order. */
export function technologyFills(
  rows: readonly TechmixPlotRow[],
  context: ChartContext,
  messages: ChartMessage[]
): TechnologyFill[] {
  const sector = rows[0]?.sector;
  const labelByTechnology = new Map<string, string>();
  for (const r of rows) {
    if (!labelByTechnology.has(r.technology)) labelByTechnology.set(r.technology, r.label_tech);
  }

  const fills: TechnologyFill[] = [];
  for (const c of context.technologyColours) {
    if (c.sector !== sector) continue;
    const label = labelByTechnology.get(c.technology);
    if (label === undefined || fills.some((f) => f.technology === c.technology)) continue;
    fills.push({ technology: c.technology, label, hex: c.hex });
  }

  for (const [technology, label] of labelByTechnology) {
    if (fills.some((f) => f.technology === technology)) continue;
    warn(
      messages,
      "AP_TECHNOLOGY_COLOUR_MISSING",
      `No colour for technology ${technology} in sector ${sector ?? "?"}; using ${context.fallbackColour}`
    );
    fills.push({ technology, label, hex: context.fallbackColour });
  }
  return fills;
}

function stackBar(
  year: number,
  category: string,
  rows: readonly TechmixPlotRow[],
  fills: readonly TechnologyFill[],
  fallbackColour: string
): StackedBar {
  const level = new Map(fills.map((f, i) => [f.technology, i]));
  const colour = new Map(fills.map((f) => [f.technology, f.hex]));
  const ordered = sortBy(rows, (r) => level.get(r.technology) ?? fills.length);
  const total = ordered.reduce((acc, r) => acc + r.value, 0);

  let start = 0;
  const segments: BarSegment[] = ordered.map((r) => {
    const share = total > 0 ? r.value / total : 0;
    const segment = {
      key: r.technology,
      value: r.value,
      share,
      start,
      end: start + share,
      color: colour.get(r.technology) ?? fallbackColour,
    };
    start += share;
    return segment;
  });
  return { facet: year, category, segments };
}

function assembleTechmix(
  rows: readonly TechmixPlotRow[],
  title: string,
  context: ChartContext,
  messages: ChartMessage[]
): AlignmentChart {
  const categories = techmixCategoryLabels(rows);
  const fills = technologyFills(rows, context, messages);
  const years = uniqueSortedNumbers(rows.map((r) => r.year));

  const bars: StackedBar[] = [];
  for (const year of years) {
    for (const category of categories) {
      const group = rows.filter((r) => r.year === year && r.label === category);
      if (group.length === 0) continue;
      bars.push(stackBar(year, category, group, fills, context.fallbackColour));
    }
  }

  return {
    kind: "techmix",
    title,
    labels: { x: "", y: "" },
    layers: [{ type: "bar", id: "techmix", position: "fill", width: BAR_WIDTH, bars }],
    scales: {
      x: { kind: "discrete", levels: categories },
      y: { kind: "continuous", domain: [0, 1], expand: [0, 0], format: "percent", secondaryAxis: true },
      fill: {
        kind: "manual",
        levels: fills.map((f) => f.technology),
        labels: fills.map((f) => f.label),
        values: fills.map((f) => f.hex),
      },
    },
    coord: { flip: true, expand: true, clip: true },
    facet: { by: "year", levels: years, nrow: FACET_ROWS, stripPosition: "right" },
    legend: {
      position: "bottom",
      ncol: LEGEND_COLUMNS,
      byrow: true,
      entries: fills.map((f) => ({ label: f.label, color: f.hex })).reverse(),
    },
    theme: { ...DEFAULT_THEME, axisLineY: false, axisTicksY: false },
  };
}

function buildTechmix(
  rows: readonly InputRow[],
  prep: TechmixPrepOptions,
  title: (sector: string) => string,
  opts: TechmixChartOptions,
  context: ChartContext
): TechmixChartResult {
  const prepared = prepareTechmixData(validateTechmixData(rows), prep);
  const messages = [...prepared.messages];
  const sector = prepared.rows[0]?.sector ?? "";
  const chart = assembleTechmix(prepared.rows, opts.title ?? title(sector), context, messages);
  return { chart, messages: withoutInfo(messages, opts.quiet) };
}

export function plotTechmix(
  rows: readonly InputRow[],
  opts: TechmixChartOptions = {},
  context: ChartContext = defaultChartContext()
): TechmixChartResult {
  return buildTechmix(rows, {}, () => "", opts, context);
}

export function qplotTechmix(
  rows: readonly InputRow[],
  opts: TechmixChartOptions = {},
  context: ChartContext = defaultChartContext()
): TechmixChartResult {
  return buildTechmix(
    rows,
    { span5yr: true, convertLabel: toTitle, convertTechLabel: spellOutTechnology },
    (sector) => `Technology Mix for the ${toTitle(sector)} Sector`,
    opts,
    context
  );
}
