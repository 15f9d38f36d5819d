/**
 * Purpose: Declare shared alignment-plot table, diagnostic, and reference-data types.
 * Intent: Keep cross-module contracts explicit and stable.
 */

export type ChartMessageSeverity = "warning" | "info";

export interface ChartMessage {
  severity: ChartMessageSeverity;
  code: string;
  message: string;
}

export type ChartKind = "techmix" | "trajectory" | "emission_intensity";

/** A row as handed over by the caller, before any contract check. */
export type InputRow = Record<string, unknown>;

export type GreenOrBrown = "green" | "brown";

export type TrajectoryMetricType = "portfolio" | "benchmark" | "scenario";

export interface MarketShareRow {
  sector: string;
  technology: string;
  year: number;
  region: string;
  scenario_source: string;
  metric: string;
  technology_share: number;
  label?: string;
  label_tech?: string;
}

export interface TrajectoryRow {
  year: number;
  metric_type: TrajectoryMetricType;
  metric: string;
  value: number;
  technology: string;
  label?: string;
}

export interface EmissionIntensityRow {
  sector: string;
  year: number;
  emission_factor_metric: string;
  emission_factor_value: number;
  label?: string;
}

export interface ScenarioSpec {
  scenario: string;
  label: string;
  color: string;
}

export interface LineMetricSpec {
  metric: string;
  label: string;
}

export interface TechnologyColour {
  sector: string;
  technology: string;
  label: string;
  hex: string;
}

export interface TechnologyDirection {
  sector: string;
  technology: string;
  green_or_brown: GreenOrBrown;
}

export interface PaletteColour {
  label: string;
  hex: string;
}

export interface ChartContext {
  technologyColours: readonly TechnologyColour[];
  greenOrBrown: readonly TechnologyDirection[];
  paletteColours: readonly PaletteColour[];
  scenarioColours: readonly PaletteColour[];
  /** Label and colour of the synthetic band below/above every scenario. */
  worseBand: ScenarioSpec;
  fallbackColour: string;
  maxEmissionIntensityLines: number;
}
