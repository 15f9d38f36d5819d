/**
 * Purpose: Reshape validated tables into canonical plot-ready rows.
 * Intent: Derive labels, colours, and year windows without touching chart layout.
 */

import { inform, warn } from "./contract_common.js";
import { distinct, extent, groupBy, sortBy } from "./table_ops.js";
import type {
  ChartContext,
  ChartMessage,
  EmissionIntensityRow,
  MarketShareRow,
  TrajectoryRow,
} from "./types.js";

export type LabelConverter = (label: string) => string;

const identity: LabelConverter = (label) => label;

export const SPAN_YEARS = 5;

export interface TechmixPlotRow {
  sector: string;
  region: string;
  scenario_source: string;
  technology: string;
  year: number;
  metric: string;
  label: string;
  label_tech: string;
  value: number;
}

export interface EmissionIntensityPlotRow {
  sector: string;
  year: number;
  /** First day of `year`, ISO formatted. */
  date: string;
  metric: string;
  value: number;
  label: string;
  hex: string;
}

export interface TrajectoryPlotRow extends TrajectoryRow {
  label: string;
}

export interface PrepOptions {
  convertLabel?: LabelConverter;
  span5yr?: boolean;
}

export interface TechmixPrepOptions extends PrepOptions {
  convertTechLabel?: LabelConverter;
}

export interface Prepared<T> {
  rows: T[];
  messages: ChartMessage[];
}

export function recodeSector(name: string): string {
  if (/power/i.test(name)) return "power";
  if (/auto[a-zA-Z]+/i.test(name)) return "automotive";
  if (/oil.*gas/i.test(name)) return "oil&gas";
  if (/fossil[a-zA-Z]+/i.test(name)) return "fossil fuels";
  return name.toLowerCase();
}

function startYear(rows: readonly { year: number }[]): number {
  return extent(
    rows.map((r) => r.year),
    "startYear"
  ).min;
}

/** Keeps the start year and the following five. */
export function span5yr<T extends { year: number }>(rows: readonly T[]): T[] {
  if (rows.length === 0) return [];
  const start = startYear(rows);
  return rows.filter((r) => r.year <= start + SPAN_YEARS);
}

export function prepareTechmixData(rows: readonly MarketShareRow[], opts: TechmixPrepOptions = {}): Prepared<TechmixPlotRow> {
  const messages: ChartMessage[] = [];
  const convertLabel = opts.convertLabel ?? identity;
  const convertTechLabel = opts.convertTechLabel ?? identity;

  const out: TechmixPlotRow[] = rows.map((r) => ({
    sector: recodeSector(r.sector),
    region: r.region,
    scenario_source: r.scenario_source,
    technology: r.technology,
    year: r.year,
    metric: r.metric,
    label: convertLabel(r.label ?? r.metric),
    label_tech: convertTechLabel(r.label_tech ?? r.technology),
    value: r.technology_share,
  }));
  if (out.length === 0) return { rows: out, messages };

  const years = extent(
    out.map((r) => r.year),
    "prepareTechmixData"
  );

  if (opts.span5yr) {
    // The literal start + 5 year is kept even when the table has no row for it.
    const future = years.min + SPAN_YEARS;
    return { rows: out.filter((r) => r.year === years.min || r.year === future), messages };
  }

  if (distinct(out, (r) => r.year).length > 2) {
    inform(
      messages,
      "AP_TECHMIX_EXTREME_YEARS",
      `The \`technology_share\` values are plotted for extreme years (${years.min} and ${years.max}). ` +
        `Do you want to plot different years? E.g. filter the rows with: ` +
        `\`rows.filter((row) => [${years.min}, ${years.min + SPAN_YEARS}].includes(row.year))\`.`
    );
  }
  return { rows: out.filter((r) => r.year === years.min || r.year === years.max), messages };
}

/**
 * Metrics ordered by their value at their own last year, highest first. Palette colours are
 * handed out in this order, so the top legend entry always takes the first colour.
 */
function legendOrder(rows: readonly EmissionIntensityRow[]): string[] {
  const lines = groupBy(rows, (r) => r.emission_factor_metric).map(({ key, rows: own }) => {
    const last = own.reduce((acc, r) => (r.year >= acc.year ? r : acc));
    return { metric: key, last: last.emission_factor_value };
  });
  return sortBy(lines, (l) => l.last, "desc").map((l) => l.metric);
}

export function prepareEmissionIntensityData(
  rows: readonly EmissionIntensityRow[],
  opts: PrepOptions,
  context: ChartContext
): Prepared<EmissionIntensityPlotRow> {
  const messages: ChartMessage[] = [];
  const convertLabel = opts.convertLabel ?? identity;
  const windowed = opts.span5yr ? span5yr(rows) : [...rows];

  const metrics = legendOrder(windowed);
  const palette = context.paletteColours;
  if (metrics.length > palette.length) {
    warn(
      messages,
      "AP_PALETTE_TOO_SMALL",
      `${metrics.length} lines share a palette of ${palette.length} colours; colours repeat and the chart may be hard to read.`
    );
  }
  const hexByMetric = new Map<string, string>();
  metrics.forEach((metric, i) => {
    const colour = palette.length ? palette[i % palette.length] : undefined;
    hexByMetric.set(metric, colour ? colour.hex : context.fallbackColour);
  });

  const out = windowed.map((r) => ({
    sector: r.sector,
    year: r.year,
    date: `${String(r.year).padStart(4, "0")}-01-01`,
    metric: r.emission_factor_metric,
    value: r.emission_factor_value,
    label: convertLabel(r.label ?? r.emission_factor_metric),
    hex: hexByMetric.get(r.emission_factor_metric) ?? context.fallbackColour,
  }));
  return { rows: out, messages };
}

export function prepareTrajectoryData(rows: readonly TrajectoryRow[], opts: PrepOptions = {}): TrajectoryPlotRow[] {
  const convertLabel = opts.convertLabel ?? identity;
  const windowed = opts.span5yr ? span5yr(rows) : [...rows];
  return windowed.map((r) => ({ ...r, label: convertLabel(r.label ?? r.metric) }));
}
