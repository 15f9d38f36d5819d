/**
 * Purpose: Axis math shared by the chart assemblers (breaks, ranges, year sets).
 * Intent: Keep scale construction deterministic and free of rendering concerns.
 */

/** Step of 1, 2 or 5 times a power of ten that cuts `span` into about `count - 1` pieces. */
export function niceStep(span: number, count: number): number {
  const raw = Math.abs(span) / Math.max(1, count - 1);
  if (!Number.isFinite(raw) || raw === 0) return 1;
  const magnitude = 10 ** Math.floor(Math.log10(raw));
  const residual = raw / magnitude;
  if (residual <= 1) return magnitude;
  if (residual <= 2) return 2 * magnitude;
  if (residual <= 5) return 5 * magnitude;
  return 10 * magnitude;
}

/**
 * Round-numbered axis breaks covering `[lo, hi]`, then clipped to `within` when given.
 * A zero-width range gets a single break at its value.
 */
export function axisBreaks(lo: number, hi: number, count: number, within?: readonly [number, number]): number[] {
  if (!Number.isFinite(lo) || !Number.isFinite(hi)) return [];
  if (lo === hi) return [lo];

  const step = niceStep(hi - lo, count);
  const first = Math.floor(Math.min(lo, hi) / step);
  const last = Math.ceil(Math.max(lo, hi) / step);
  const breaks: number[] = [];
  // Multiplying the index keeps float error from piling up across steps.
  for (let i = first; i <= last; i++) breaks.push(i * step);
  if (!within) return breaks;
  return breaks.filter((b) => b >= within[0] && b <= within[1]);
}

export function uniqueSortedNumbers(values: readonly number[]): number[] {
  return [...new Set(values)].sort((a, b) => a - b);
}

/** Widens `[min, max]` by a fraction of its span below and above. */
export function expandRange(min: number, max: number, mult: readonly [number, number]): [number, number] {
  const span = max - min;
  return [min - span * mult[0], max + span * mult[1]];
}
