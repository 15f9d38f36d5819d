/**
 * Purpose: Define the declarative chart specification handed to a rendering library.
 * Intent: Describe layers, scales, facets, and theme without committing to a renderer.
 */

import type { BandRow } from "./chart_bands.js";
import type { ChartKind } from "./types.js";

export type LineType = "solid" | "dashed" | "twodash";

export interface ChartPoint {
  x: number | string;
  y: number;
}

export interface RibbonLayer {
  type: "ribbon";
  id: string;
  data: BandRow[];
  fill: string;
  alpha: number;
}

export interface LineLayer {
  type: "line";
  id: string;
  points: ChartPoint[];
  color: string;
  lineType: LineType;
  label?: string;
}

export interface BarSegment {
  /** Fill level, i.e. the technology. */
  key: string;
  value: number;
  /** Share of the bar, 0..1. */
  share: number;
  start: number;
  end: number;
  color: string;
}

export interface StackedBar {
  facet: number;
  category: string;
  segments: BarSegment[];
}

export interface BarLayer {
  type: "bar";
  id: string;
  position: "fill";
  width: number;
  bars: StackedBar[];
}

export interface TextAnnotation {
  type: "text";
  id: string;
  x: number;
  y: number;
  label: string;
  hjust: number;
  size: number;
}

export interface SegmentAnnotation {
  type: "segment";
  id: string;
  x: number;
  xend: number;
  y: number;
  yend: number;
  color: string;
}

export type ChartLayer = RibbonLayer | LineLayer | BarLayer | TextAnnotation | SegmentAnnotation;

export interface ContinuousScale {
  kind: "continuous";
  domain: [number, number];
  /** Multiplicative expansion below and above the domain. */
  expand: [number, number];
  format?: "number" | "percent";
  breaks?: number[];
  secondaryAxis?: boolean;
}

export interface DateScale {
  kind: "date";
  domain: [string, string];
  expand: [number, number];
}

export interface DiscreteScale {
  kind: "discrete";
  levels: string[];
}

export interface ManualScale {
  kind: "manual";
  levels: string[];
  labels: string[];
  values: string[];
}

export type PositionScale = ContinuousScale | DateScale | DiscreteScale;

export interface ChartScales {
  x: PositionScale;
  y: PositionScale;
  fill?: ManualScale;
  colour?: ManualScale;
}

export interface ChartCoord {
  flip: boolean;
  expand: boolean;
  clip: boolean;
}

export interface FacetSpec {
  by: "year";
  levels: number[];
  nrow: number;
  stripPosition: "right" | "top";
}

export interface LegendEntry {
  label: string;
  color: string;
}

export interface LegendSpec {
  position: "bottom" | "right";
  ncol?: number;
  byrow?: boolean;
  /** Entries in display order. */
  entries: LegendEntry[];
}

export interface ChartMargin {
  top: number;
  right: number;
  bottom: number;
  left: number;
  unit: "cm";
}

export interface ChartTheme {
  margin: ChartMargin;
  axisLineX: boolean;
  axisLineY: boolean;
  axisTicksY: boolean;
}

export interface AlignmentChart {
  kind: ChartKind;
  title: string;
  labels: { x: string; y: string };
  layers: ChartLayer[];
  scales: ChartScales;
  coord: ChartCoord;
  facet?: FacetSpec;
  legend?: LegendSpec;
  theme: ChartTheme;
}

export const DEFAULT_MARGIN: ChartMargin = Object.freeze({ top: 0.5, right: 0.5, bottom: 0.5, left: 0.5, unit: "cm" });

export const DEFAULT_THEME: ChartTheme = Object.freeze({
  margin: DEFAULT_MARGIN,
  axisLineX: true,
  axisLineY: true,
  axisTicksY: true,
});
