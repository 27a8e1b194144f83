// ---------------------------------------------------------------------------
// Monthly Trend Aggregator
// ---------------------------------------------------------------------------
// Bucket by (year, month), aggregate each series per bucket, then compare
// every bucket with the month before it in the data:
//   growth = (current − previous) / previous × 100
// The earliest month has no growth. A zero baseline leaves growth undefined
// rather than reporting 0 or ±Infinity.

import type { NumericField, Reading } from '@millscope/types';
import { DivisionByZeroError } from '../errors.js';
import { meanOf } from '../moments/summary.js';
import { formatMonthKey, monthKeyOf, monthOrdinal, tryParseTimestamp } from '../time/timestamps.js';
import type { Growth, MonthKey, MonthlyAggregate, MonthlyBucket, MonthlySeries, SeriesPoint } from '../types.js';
import { presentValues } from '../values.js';

/**
 * Percent change from `previous` to `current`.
 *
 * @throws DivisionByZeroError when `previous` is zero
 */
export function percentChange(current: number, previous: number): number {
  if (previous === 0) throw new DivisionByZeroError(current);
  return ((current - previous) / previous) * 100;
}

function sum(readings: readonly Reading[], field: NumericField): number | null {
  const values = presentValues(readings, field);
  if (values.length === 0) return null;
  let total = 0;
  for (const v of values) total += v;
  return total;
}

/** Value of one aggregate over a set of readings; null when it cannot be formed. */
export function aggregate(readings: readonly Reading[], by: MonthlyAggregate): number | null {
  if (by.kind === 'mean') return meanOf(readings, by.field) ?? null;

  const numerator = sum(readings, by.numerator);
  const denominator = sum(readings, by.denominator);
  if (numerator === null || denominator === null || denominator === 0) return null;
  return numerator / denominator;
}

function growthOf(current: number | null, previous: number | null | undefined): Growth {
  if (previous === undefined) return { kind: 'undefined', reason: 'first-period' };
  if (current === null || previous === null) return { kind: 'undefined', reason: 'missing-value' };
  try {
    return { kind: 'percent', value: percentChange(current, previous) };
  } catch (err) {
    if (err instanceof DivisionByZeroError) return { kind: 'undefined', reason: 'zero-baseline' };
    throw err;
  }
}

interface MonthGroup {
  month: MonthKey;
  ordinal: number;
  readings: Reading[];
}

/** Readings grouped by calendar month, oldest first. Undated readings are dropped. */
export function bucketByMonth(readings: readonly Reading[]): MonthGroup[] {
  const groups = new Map<number, MonthGroup>();
  for (const reading of readings) {
    const timestamp = tryParseTimestamp(reading.recordedAt);
    if (!timestamp) continue;
    const month = monthKeyOf(timestamp);
    const ordinal = monthOrdinal(month);
    let group = groups.get(ordinal);
    if (!group) {
      group = { month, ordinal, readings: [] };
      groups.set(ordinal, group);
    }
    group.readings.push(reading);
  }
  return [...groups.values()].sort((a, b) => a.ordinal - b.ordinal);
}

/**
 * Per-month aggregates with month-over-month growth, most recent month first.
 */
export function monthlyTrend<K extends string>(
  readings: readonly Reading[],
  series: readonly MonthlySeries<K>[],
): MonthlyBucket<K>[] {
  const buckets: MonthlyBucket<K>[] = [];
  let previous: SeriesPoint<K>[] | undefined;

  for (const group of bucketByMonth(readings)) {
    const points = series.map((s, i): SeriesPoint<K> => {
      const value = aggregate(group.readings, s);
      return { name: s.name, value, growth: growthOf(value, previous?.[i]?.value) };
    });
    buckets.push({
      month: group.month,
      label: formatMonthKey(group.month),
      readings: group.readings.length,
      series: points,
    });
    previous = points;
  }

  return buckets.reverse();
}
