// ---------------------------------------------------------------------------
// Correlation Analyzer: Pearson product-moment
// ---------------------------------------------------------------------------
// r = Σ(x−x̄)(y−ȳ) / (√Σ(x−x̄)² · √Σ(y−ȳ)²)

import type { NumericField, Reading } from '@millscope/types';
import { EmptyInputError, InvalidParameterError, ZeroVarianceError } from '../errors.js';
import { arithmeticMean, pairedValues } from '../values.js';

/** Every value equals the first; a floating-point mean would not detect this exactly. */
function isConstant(values: readonly number[]): boolean {
  for (const v of values) if (v !== values[0]) return false;
  return true;
}

/**
 * Pearson r of two equal-length series, clamped to [−1, 1].
 *
 * @throws EmptyInputError when the series are empty
 * @throws ZeroVarianceError when either series is constant
 */
export function pearson(xs: readonly number[], ys: readonly number[]): number {
  if (xs.length !== ys.length) {
    throw new InvalidParameterError('series', `length mismatch (${xs.length} vs ${ys.length})`);
  }
  const xMean = arithmeticMean(xs);
  const yMean = arithmeticMean(ys);
  if (xMean === undefined || yMean === undefined) throw new EmptyInputError('correlation pairs');
  if (isConstant(xs)) throw new ZeroVarianceError('x');
  if (isConstant(ys)) throw new ZeroVarianceError('y');

  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (let i = 0; i < xs.length; i++) {
    const dx = xs[i]! - xMean;
    const dy = ys[i]! - yMean;
    sxy += dx * dy;
    sxx += dx * dx;
    syy += dy * dy;
  }

  const r = sxy / (Math.sqrt(sxx) * Math.sqrt(syy));
  return Math.max(-1, Math.min(1, r));
}

/**
 * Correlation between two fields over readings where both are present.
 *
 * @throws ZeroVarianceError naming the constant field
 */
export function pearsonCorrelation(readings: readonly Reading[], x: NumericField, y: NumericField): number {
  const { xs, ys } = pairedValues(readings, x, y);
  if (xs.length === 0) throw new EmptyInputError(`${x} × ${y}`);
  try {
    return pearson(xs, ys);
  } catch (err) {
    if (err instanceof ZeroVarianceError) {
      throw new ZeroVarianceError(err.side === 'x' ? x : y);
    }
    throw err;
  }
}
