// ---------------------------------------------------------------------------
// Performance breakdowns: one field summarized per distinct value of another
// ---------------------------------------------------------------------------

import type { NumericField, Reading } from '@millscope/types';
import { InvalidParameterError } from '../errors.js';
import type { GroupedMean, RunningHours } from '../types.js';
import { arithmeticMean, presentValues } from '../values.js';

export const DEFAULT_RUNNING_HOURS_LIMIT = 100;

/** Absent keys form their own group and sort first. */
function compareKeys(a: number | null, b: number | null): number {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  return a - b;
}

function groupBy(readings: readonly Reading[], by: NumericField): Map<number | null, Reading[]> {
  const groups = new Map<number | null, Reading[]>();
  for (const reading of readings) {
    const key = reading[by];
    const group = groups.get(key);
    if (group) group.push(reading);
    else groups.set(key, [reading]);
  }
  return groups;
}

/**
 * Mean of `of` for each distinct value of `by`, keys ascending.
 * e.g. average throughput per separator speed.
 */
export function groupedMean(readings: readonly Reading[], by: NumericField, of: NumericField): GroupedMean[] {
  const result: GroupedMean[] = [];
  for (const [key, group] of groupBy(readings, by)) {
    result.push({ key, mean: arithmeticMean(presentValues(group, of)) ?? null, count: group.length });
  }
  return result.sort((a, b) => compareKeys(a.key, b.key));
}

/**
 * Hours logged at each distinct value of `field` (one reading per hour).
 * More than `limit` hours at the same load marks the unit for maintenance.
 */
export function runningHours(
  readings: readonly Reading[],
  field: NumericField,
  limit: number = DEFAULT_RUNNING_HOURS_LIMIT,
): RunningHours[] {
  if (!Number.isFinite(limit) || limit < 0) {
    throw new InvalidParameterError('limit', `${limit} must be a non-negative finite number`);
  }
  const result: RunningHours[] = [];
  for (const [key, group] of groupBy(readings, field)) {
    result.push({
      key,
      hours: group.length,
      status: group.length > limit ? 'maintenance-required' : 'running-normally',
    });
  }
  return result.sort((a, b) => compareKeys(a.key, b.key));
}
