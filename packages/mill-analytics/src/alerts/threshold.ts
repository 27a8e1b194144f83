// ---------------------------------------------------------------------------
// Threshold Alerter: evaluation engine
// ---------------------------------------------------------------------------
// Each test compares a field against multiplier × reference, strictly.
// References are resolved once per evaluation over the whole collection.
// An absent value, or a reference that cannot be computed, never matches.

import type { NumericField, Reading } from '@millscope/types';
import { meanOf } from '../moments/summary.js';
import { sortByTime } from '../time/timestamps.js';
import type {
  AlertDefinition,
  AlertGroup,
  AlertResult,
  ResolvedThreshold,
  ThresholdReference,
  ThresholdTest,
} from '../types.js';

function resolveReference(
  readings: readonly Reading[],
  field: NumericField,
  reference: ThresholdReference,
): number | null {
  switch (reference.kind) {
    case 'mean':
      return meanOf(readings, field) ?? null;
    case 'meanOf':
      return meanOf(readings, reference.field) ?? null;
    case 'constant':
      return reference.value;
  }
}

/** Resolve every test of a definition to a concrete numeric limit. */
export function resolveThresholds(
  readings: readonly Reading[],
  tests: readonly ThresholdTest[],
): ResolvedThreshold[] {
  return tests.map((test) => {
    const reference = resolveReference(readings, test.field, test.reference);
    return {
      field: test.field,
      direction: test.direction,
      reference,
      limit: reference === null ? null : test.multiplier * reference,
    };
  });
}

export function matchesThreshold(reading: Reading, threshold: ResolvedThreshold): boolean {
  const value = reading[threshold.field];
  if (value === null || threshold.limit === null) return false;
  return threshold.direction === 'above' ? value > threshold.limit : value < threshold.limit;
}

function isFlagged(
  reading: Reading,
  thresholds: readonly ResolvedThreshold[],
  combine: AlertDefinition['combine'],
): boolean {
  return combine === 'any'
    ? thresholds.some((t) => matchesThreshold(reading, t))
    : thresholds.every((t) => matchesThreshold(reading, t));
}

function groupReadings(readings: readonly Reading[], by: readonly NumericField[]): AlertGroup[] {
  const groups = new Map<string, AlertGroup>();
  for (const reading of readings) {
    const values: Partial<Record<NumericField, number | null>> = {};
    for (const field of by) values[field] = reading[field];
    const key = by.map((field) => String(reading[field])).join('|');
    const group = groups.get(key);
    if (group) {
      group.occurrences++;
    } else {
      groups.set(key, { values, occurrences: 1 });
    }
  }
  // Stable: ties keep first-seen order
  return [...groups.values()].sort((a, b) => b.occurrences - a.occurrences);
}

/**
 * Evaluate an alert against a collection. Pure: the same readings and
 * definition always produce the same ordered result.
 */
export function evaluateAlert(readings: readonly Reading[], definition: AlertDefinition): AlertResult {
  const thresholds = resolveThresholds(readings, definition.tests);
  const required = definition.requirePresent ?? [];

  const hits = readings.filter(
    (reading) =>
      required.every((field) => reading[field] !== null) &&
      isFlagged(reading, thresholds, definition.combine),
  );

  if (definition.output.mode === 'grouped') {
    return {
      alert: definition.id,
      mode: 'grouped',
      thresholds,
      groups: groupReadings(sortByTime(hits, 'desc'), definition.output.by),
    };
  }
  return { alert: definition.id, mode: 'readings', thresholds, readings: sortByTime(hits, 'desc') };
}
