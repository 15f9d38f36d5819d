/**
 * Purpose: Implement relational helpers for typed row arrays.
 * Intent: Provide deterministic grouping, distinct values, and stable ordering.
 */

type GroupKey = string | number;

function mapKeyOf(v: GroupKey): string {
  return typeof v === "number" ? `n:${String(v)}` : `s:${v}`;
}

/** Distinct keys in first-seen order. */
export function distinct<T, K extends GroupKey>(rows: readonly T[], key: (row: T) => K): K[] {
  const seen = new Set<string>();
  const out: K[] = [];
  for (const row of rows) {
    const k = key(row);
    const mk = mapKeyOf(k);
    if (seen.has(mk)) continue;
    seen.add(mk);
    out.push(k);
  }
  return out;
}

export function groupBy<T, K extends GroupKey>(rows: readonly T[], key: (row: T) => K): Array<{ key: K; rows: T[] }> {
  const by = new Map<string, { key: K; rows: T[] }>();
  const ordered: Array<{ key: K; rows: T[] }> = [];

  for (const row of rows) {
    const k = key(row);
    const mk = mapKeyOf(k);
    const existing = by.get(mk);
    if (existing) {
      existing.rows.push(row);
      continue;
    }
    const group = { key: k, rows: [row] };
    by.set(mk, group);
    ordered.push(group);
  }

  return ordered;
}

/** Stable sort: ties keep their input order. */
export function sortBy<T>(rows: readonly T[], key: (row: T) => number, direction: "asc" | "desc" = "asc"): T[] {
  const dir = direction === "desc" ? -1 : 1;
  return rows
    .map((row, index) => ({ row, index, k: key(row) }))
    .sort((a, b) => {
      const d = a.k - b.k;
      if (d !== 0) return d * dir;
      return a.index - b.index;
    })
    .map((r) => r.row);
}

export function extent(values: readonly number[], label: string): { min: number; max: number } {
  const first = values[0];
  if (first === undefined) throw new Error(`${label}: expected at least one value`);
  let min = first;
  let max = first;
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return { min, max };
}
