// ---------------------------------------------------------------------------
// Outlier Detector: Tukey fences on rank-selected quartiles
// ---------------------------------------------------------------------------
// lower = Q1 − k·(Q3 − Q1),  upper = Q3 + k·(Q3 − Q1),  k = 1.5 by default
// A reading is an outlier when ANY tested field lies strictly outside its
// fence. Detection only flags; removal is a separate call.

import type { NumericField, Reading } from '@millscope/types';
import { InvalidParameterError } from '../errors.js';
import { quartiles } from '../quantile/order-statistic.js';
import { sortByTime } from '../time/timestamps.js';
import type { Fence, OutlierOptions, OutlierReport } from '../types.js';

export const DEFAULT_IQR_MULTIPLIER = 1.5;

function resolveMultiplier(options: OutlierOptions): number {
  const k = options.multiplier ?? DEFAULT_IQR_MULTIPLIER;
  if (!Number.isFinite(k) || k < 0) {
    throw new InvalidParameterError('multiplier', `${k} must be a non-negative finite number`);
  }
  return k;
}

/**
 * IQR fence for one field.
 *
 * @throws EmptyInputError when the field has no present values
 */
export function computeFence(
  readings: readonly Reading[],
  field: NumericField,
  options: OutlierOptions = {},
): Fence {
  const k = resolveMultiplier(options);
  const { q1, q3 } = quartiles(readings, field);
  const iqr = q3 - q1;
  return { field, q1, q3, iqr, lower: q1 - k * iqr, upper: q3 + k * iqr };
}

export function isOutside(value: number | null, fence: Fence): boolean {
  return value !== null && (value < fence.lower || value > fence.upper);
}

function flagged(readings: readonly Reading[], fences: readonly Fence[]): Reading[] {
  const outliers = readings.filter((reading) =>
    fences.some((fence) => isOutside(reading[fence.field], fence)),
  );
  return sortByTime(outliers, 'desc');
}

/**
 * Readings outside the fence of at least one tested field, most recent first.
 *
 * @throws EmptyInputError when a tested field has no present values
 */
export function detectOutliers(
  readings: readonly Reading[],
  fields: readonly NumericField[],
  options: OutlierOptions = {},
): Reading[] {
  return analyzeOutliers(readings, fields, options).outliers.slice();
}

/** Like {@link detectOutliers}, also returning the fences that were applied. */
export function analyzeOutliers(
  readings: readonly Reading[],
  fields: readonly NumericField[],
  options: OutlierOptions = {},
): OutlierReport {
  if (fields.length === 0) {
    throw new InvalidParameterError('fields', 'at least one field is required');
  }
  const fences = fields.map((field) => computeFence(readings, field, options));
  return { fences, outliers: flagged(readings, fences) };
}

/** Collection without the given readings (by identity), order preserved. */
export function removeOutliers(readings: readonly Reading[], outliers: readonly Reading[]): Reading[] {
  const drop = new Set(outliers);
  return readings.filter((reading) => !drop.has(reading));
}
