/**
 * Purpose: Load bundled reference datasets and build the read-only chart context.
 * Intent: Replace ambient lookup tables with an explicit, injectable object.
 */

import { readFileSync } from "node:fs";

import { asString, deepFreeze, isPlainObject } from "./contract_common.js";
import { MAX_EMISSION_INTENSITY_LINES } from "./data_contract.js";
import type { ChartContext, GreenOrBrown, PaletteColour, TechnologyColour, TechnologyDirection } from "./types.js";

export const WORSE_BAND = "worse";

const DEFAULT_WORSE_COLOUR = "#e07b73";
const DEFAULT_FALLBACK_COLOUR = "#d0d7e1";

function readJsonTable(file: string): unknown[] {
  const url = new URL(`../data/${file}`, import.meta.url);
  const parsed: unknown = JSON.parse(readFileSync(url, "utf8"));
  if (!Array.isArray(parsed)) throw new Error(`reference data: ${file} must hold a JSON array`);
  return parsed;
}

function field(entry: Record<string, unknown>, key: string, file: string, index: number): string {
  const v = asString(entry[key]);
  if (v === null) throw new Error(`reference data: ${file}[${index}].${key} must be a non-empty string`);
  return v;
}

function entries(file: string): Array<Record<string, unknown>> {
  return readJsonTable(file).map((entry, index) => {
    if (!isPlainObject(entry)) throw new Error(`reference data: ${file}[${index}] must be an object`);
    return entry;
  });
}

export function loadTechnologyColours(file = "technology_colours.json"): TechnologyColour[] {
  return entries(file).map((e, i) => ({
    sector: field(e, "sector", file, i),
    technology: field(e, "technology", file, i),
    label: field(e, "label", file, i),
    hex: field(e, "hex", file, i),
  }));
}

function parseGreenOrBrown(v: string, file: string, index: number): GreenOrBrown {
  if (v === "green" || v === "brown") return v;
  throw new Error(`reference data: ${file}[${index}].green_or_brown must be 'green' or 'brown'`);
}

export function loadGreenOrBrown(file = "green_or_brown.json"): TechnologyDirection[] {
  return entries(file).map((e, i) => ({
    sector: field(e, "sector", file, i),
    technology: field(e, "technology", file, i),
    green_or_brown: parseGreenOrBrown(field(e, "green_or_brown", file, i), file, i),
  }));
}

export function loadPalette(file: string): PaletteColour[] {
  return entries(file).map((e, i) => ({
    label: field(e, "label", file, i),
    hex: field(e, "hex", file, i),
  }));
}

function copyEntries<T extends object>(entries: readonly T[] | undefined): T[] | undefined {
  return entries?.map((e) => ({ ...e }));
}

/** Overrides are copied, so freezing the context leaves the caller's values mutable. */
export function createChartContext(overrides: Partial<ChartContext> = {}): ChartContext {
  const context: ChartContext = {
    technologyColours: copyEntries(overrides.technologyColours) ?? loadTechnologyColours(),
    greenOrBrown: copyEntries(overrides.greenOrBrown) ?? loadGreenOrBrown(),
    paletteColours: copyEntries(overrides.paletteColours) ?? loadPalette("palette_colours.json"),
    scenarioColours: copyEntries(overrides.scenarioColours) ?? loadPalette("scenario_colours.json"),
    worseBand: overrides.worseBand
      ? { ...overrides.worseBand }
      : { scenario: WORSE_BAND, label: "Worse", color: DEFAULT_WORSE_COLOUR },
    fallbackColour: overrides.fallbackColour ?? DEFAULT_FALLBACK_COLOUR,
    maxEmissionIntensityLines: overrides.maxEmissionIntensityLines ?? MAX_EMISSION_INTENSITY_LINES,
  };
  return deepFreeze(context);
}

let bundled: ChartContext | null = null;

export function defaultChartContext(): ChartContext {
  if (!bundled) bundled = createChartContext();
  return bundled;
}

export function technologyDirection(context: ChartContext, technology: string): GreenOrBrown | null {
  const match = context.greenOrBrown.find((d) => d.technology === technology);
  return match ? match.green_or_brown : null;
}
