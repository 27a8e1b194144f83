import type { NumericField, Reading } from '@millscope/types';
import { DegenerateVarianceError } from '../errors.js';
import type { StatisticalSummary } from '../types.js';
import { arithmeticMean, presentValues } from '../values.js';
import { kurtosis, skewness } from './shape.js';
import { accumulateMoments } from './welford.js';

/**
 * Descriptive statistics for one field. A zero-variance field yields
 * `shape: 'degenerate'` with null skewness and kurtosis.
 *
 * @throws EmptyInputError when the field has no present values
 */
export function summarize(readings: readonly Reading[], field: NumericField): StatisticalSummary {
  const values = presentValues(readings, field);
  const base = accumulateMoments(values, field);
  const common = {
    field,
    count: base.count,
    mean: base.mean,
    min: base.min,
    max: base.max,
    variance: base.variance,
    stddev: base.stddev,
  };

  try {
    return {
      ...common,
      shape: 'defined',
      skewness: skewness(values, base),
      kurtosis: kurtosis(values, base),
    };
  } catch (err) {
    if (!(err instanceof DegenerateVarianceError)) throw err;
    return { ...common, shape: 'degenerate', skewness: null, kurtosis: null };
  }
}

/** Mean of the present values of a field; undefined when there are none. */
export function meanOf(readings: readonly Reading[], field: NumericField): number | undefined {
  return arithmeticMean(presentValues(readings, field));
}

/** Means of several fields at once (e.g. inlet/outlet temperature vs throughput). */
export function fieldMeans<F extends NumericField>(
  readings: readonly Reading[],
  fields: readonly F[],
): Partial<Record<F, number | null>> {
  const result: Partial<Record<F, number | null>> = {};
  for (const field of fields) {
    result[field] = meanOf(readings, field) ?? null;
  }
  return result;
}
