/**
 * Purpose: Provide shared utilities for table-contract checks and advisory messages.
 * Intent: Centralize message helpers, value guards, and label formatting.
 */

import type { ChartMessage } from "./types.js";

export function warn(messages: ChartMessage[], code: string, message: string): void {
  messages.push({ severity: "warning", code, message });
}

export function inform(messages: ChartMessage[], code: string, message: string): void {
  messages.push({ severity: "info", code, message });
}

export function withoutInfo(messages: ChartMessage[], quiet: boolean | undefined): ChartMessage[] {
  return quiet ? messages.filter((m) => m.severity !== "info") : messages;
}

export function isPlainObject(v: unknown): v is Record<string, unknown> {
  return Boolean(v) && typeof v === "object" && !Array.isArray(v);
}

export function asString(v: unknown): string | null {
  return typeof v === "string" && v.trim() ? v : null;
}

export function fmtString(s: string): string {
  return JSON.stringify(s);
}

export function fmtVector(values: readonly string[]): string {
  return `[${values.map(fmtString).join(", ")}]`;
}

const labelAbbreviations = new Map<string, string>([
  ["co2", "CO2"],
  ["cps", "CPS"],
  ["etp", "ETP"],
  ["hdv", "HDV"],
  ["ice", "ICE"],
  ["iea", "IEA"],
  ["ipr", "IPR"],
  ["nze", "NZE"],
  ["sds", "SDS"],
  ["sps", "SPS"],
  ["steps", "STEPS"],
  ["weo", "WEO"],
]);

/** "corporate_economy" -> "Corporate Economy", "target_sds" -> "Target SDS". */
export function toTitle(text: string): string {
  const raw = text.trim();
  if (!raw) return text;

  const parts = raw.split(/[\s_-]+/).filter(Boolean);
  if (parts.length === 0) return text;

  const words = parts.map((part) => {
    const abbr = labelAbbreviations.get(part.toLowerCase());
    if (abbr) return abbr;
    const first = part[0];
    if (!first) return part;
    return first.toUpperCase() + part.slice(1);
  });

  return words.join(" ");
}

export function spellOutTechnology(technology: string): string {
  const capacity = technology.trim().match(/^(.+?)cap$/i);
  const base = capacity?.[1];
  return toTitle(base ? `${base} capacity` : technology);
}

export function deepFreeze<T>(value: T, seen = new WeakSet<object>()): T {
  if (typeof value !== "object" || value === null) return value;
  if (seen.has(value)) return value;
  seen.add(value);

  for (const child of Object.values(value)) deepFreeze(child, seen);
  Object.freeze(value);
  return value;
}
