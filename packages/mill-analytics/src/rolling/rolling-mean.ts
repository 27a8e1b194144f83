// ---------------------------------------------------------------------------
// Rolling Window Aggregator: trailing moving average
// ---------------------------------------------------------------------------
// Window for reading i covers readings max(0, i − w + 1) … i, so it grows
// from 1 to w at the start of the series. Each window is summed afresh, so
// rounding from a value that has left the window never carries forward.

import type { NumericField, Reading } from '@millscope/types';
import { InvalidParameterError } from '../errors.js';
import type { RollingOptions, RollingPoint } from '../types.js';

export const DEFAULT_ROLLING_WINDOW = 11;

function* rollingPoints(
  readings: readonly Reading[],
  field: NumericField,
  window: number,
): Generator<RollingPoint> {
  for (let i = 0; i < readings.length; i++) {
    let sum = 0;
    let count = 0;
    for (let j = Math.max(0, i - window + 1); j <= i; j++) {
      const value = readings[j]![field];
      if (value !== null) {
        sum += value;
        count++;
      }
    }
    yield { recordedAt: readings[i]!.recordedAt, value: count > 0 ? sum / count : null };
  }
}

/**
 * Trailing mean of `field` for each reading of a time-ordered collection.
 * The result is lazy and restartable: every iteration recomputes from the
 * input, and no state survives between iterations.
 *
 * @throws InvalidParameterError when the window is not a positive integer
 */
export function rollingMean(
  readings: readonly Reading[],
  field: NumericField,
  options: RollingOptions = {},
): Iterable<RollingPoint> {
  const window = options.window ?? DEFAULT_ROLLING_WINDOW;
  if (!Number.isInteger(window) || window < 1) {
    throw new InvalidParameterError('window', `${window} must be a positive integer`);
  }
  return {
    [Symbol.iterator]: () => rollingPoints(readings, field, window),
  };
}
