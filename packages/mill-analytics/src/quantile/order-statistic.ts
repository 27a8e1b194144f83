// ---------------------------------------------------------------------------
// Quantile Engine: rank-selected order statistics
// ---------------------------------------------------------------------------
// Position for fraction f over N ranked values: p = clamp(⌊f·N⌋, 1, N),
// 1-based. No interpolation between neighbours: IQR fences downstream are
// tuned against exactly this selection.

import type { NumericField, Reading } from '@millscope/types';
import { EmptyInputError, InvalidParameterError } from '../errors.js';
import type { QuartileFrame } from '../types.js';
import { presentValues } from '../values.js';

/**
 * Present values of a field sorted ascending. The sort is stable, so equal
 * values keep collection order.
 */
export function rankValues(readings: readonly Reading[], field: NumericField): number[] {
  return presentValues(readings, field).sort((a, b) => a - b);
}

/** 1-based rank selected for fraction `f` of `n` values. */
export function rankPosition(f: number, n: number): number {
  return Math.min(n, Math.max(1, Math.floor(f * n)));
}

/**
 * Value at fractional rank `f` of an ascending array.
 *
 * @throws EmptyInputError when `sorted` is empty
 * @throws InvalidParameterError when `f` lies outside [0, 1]
 */
export function orderStatistic(sorted: readonly number[], f: number, subject = 'values'): number {
  if (!(f >= 0 && f <= 1)) {
    throw new InvalidParameterError('fraction', `${f} is outside [0, 1]`);
  }
  const n = sorted.length;
  if (n === 0) throw new EmptyInputError(subject);
  return sorted[rankPosition(f, n) - 1]!;
}

/** Q1, median and Q3 of a field from a single ranking pass. */
export function quartiles(readings: readonly Reading[], field: NumericField): QuartileFrame {
  const sorted = rankValues(readings, field);
  return {
    field,
    count: sorted.length,
    q1: orderStatistic(sorted, 0.25, field),
    median: orderStatistic(sorted, 0.5, field),
    q3: orderStatistic(sorted, 0.75, field),
  };
}
