// ---------------------------------------------------------------------------
// Moment Engine: second pass (standardized third and fourth moments)
// ---------------------------------------------------------------------------
// skewness = (1/N) Σ(x − μ)³ / σ³
// kurtosis = (1/N) Σ(x − μ)⁴ / σ⁴      (raw ratio: a normal sample gives ≈ 3)
// μ, σ come from the first pass and are passed in, never recomputed per row.

import { DegenerateVarianceError } from '../errors.js';
import type { BaseMoments } from '../types.js';

function centralSum(values: readonly number[], mean: number, power: 3 | 4): number {
  let sum = 0;
  for (let i = 0; i < values.length; i++) {
    const d = values[i]! - mean;
    sum += power === 3 ? d * d * d : d * d * d * d;
  }
  return sum;
}

/**
 * Third standardized moment.
 *
 * @throws DegenerateVarianceError when the standard deviation is zero
 */
export function skewness(values: readonly number[], base: BaseMoments): number {
  if (base.stddev === 0) throw new DegenerateVarianceError('skewness', base.count);
  return centralSum(values, base.mean, 3) / (base.count * base.stddev ** 3);
}

/**
 * Fourth standardized moment, without the −3 excess correction.
 *
 * @throws DegenerateVarianceError when the variance is zero
 */
export function kurtosis(values: readonly number[], base: BaseMoments): number {
  if (base.variance === 0) throw new DegenerateVarianceError('kurtosis', base.count);
  return centralSum(values, base.mean, 4) / (base.count * base.variance ** 2);
}
