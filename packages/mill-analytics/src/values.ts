// ---------------------------------------------------------------------------
// Field extraction: absent sensor values are skipped, never coerced to 0
// ---------------------------------------------------------------------------

import type { NumericField, Reading } from '@millscope/types';

/** Present values of a field, in collection order. */
export function presentValues(readings: readonly Reading[], field: NumericField): number[] {
  const values: number[] = [];
  for (const reading of readings) {
    const value = reading[field];
    if (value !== null) values.push(value);
  }
  return values;
}

/** Values of two fields from readings where both are present. */
export function pairedValues(
  readings: readonly Reading[],
  x: NumericField,
  y: NumericField,
): { xs: number[]; ys: number[] } {
  const xs: number[] = [];
  const ys: number[] = [];
  for (const reading of readings) {
    const xv = reading[x];
    const yv = reading[y];
    if (xv === null || yv === null) continue;
    xs.push(xv);
    ys.push(yv);
  }
  return { xs, ys };
}

export function arithmeticMean(values: readonly number[]): number | undefined {
  if (values.length === 0) return undefined;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}
