// ---------------------------------------------------------------------------
// Moment Engine: first pass (Welford)
// ---------------------------------------------------------------------------
// mean_k = mean_{k-1} + (x_k − mean_{k-1}) / k
// M2_k   = M2_{k-1} + (x_k − mean_{k-1})(x_k − mean_k)
// Population variance = M2 / N. Avoids the cancellation of Σx² − N·mean².

import { EmptyInputError } from '../errors.js';
import type { BaseMoments } from '../types.js';

/**
 * Count, mean, population variance, stddev and range in one pass.
 *
 * @throws EmptyInputError when `values` is empty
 */
export function accumulateMoments(values: readonly number[], subject = 'values'): BaseMoments {
  const n = values.length;
  if (n === 0) throw new EmptyInputError(subject);

  let mean = 0;
  let m2 = 0;
  let min = Infinity;
  let max = -Infinity;

  for (let i = 0; i < n; i++) {
    const x = values[i]!;
    const delta = x - mean;
    mean += delta / (i + 1);
    m2 += delta * (x - mean);
    if (x < min) min = x;
    if (x > max) max = x;
  }

  const variance = m2 / n;
  return {
    count: n,
    mean,
    m2,
    variance,
    stddev: Math.sqrt(variance),
    min,
    max,
  };
}
