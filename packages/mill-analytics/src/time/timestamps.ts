// ---------------------------------------------------------------------------
// Historian timestamps: `MM/DD/YYYY HH:MM`, wall-clock, no zone
// ---------------------------------------------------------------------------

import { DateTime } from 'luxon';
import type { Reading } from '@millscope/types';
import { UnparsableTimestampError } from '../errors.js';
import type { MonthKey, SortDirection } from '../types.js';

/** Unpadded tokens also accept zero-padded input ("3/7/2024 6:05" and "03/07/2024 06:05"). */
const HISTORIAN_FORMAT = 'M/d/yyyy H:mm';

/**
 * Parse historian text into a UTC DateTime.
 *
 * @throws UnparsableTimestampError for malformed text or impossible dates
 */
export function parseTimestamp(text: string): DateTime {
  const parsed = DateTime.fromFormat(text.trim(), HISTORIAN_FORMAT, { zone: 'utc' });
  if (!parsed.isValid) {
    throw new UnparsableTimestampError(text);
  }
  return parsed;
}

/** Parsed timestamp, or undefined when missing or malformed. */
export function tryParseTimestamp(text: string | null | undefined): DateTime | undefined {
  if (text == null) return undefined;
  try {
    return parseTimestamp(text);
  } catch (err) {
    if (err instanceof UnparsableTimestampError) return undefined;
    throw err;
  }
}

/** Epoch milliseconds used for ordering; unparsable timestamps rank lowest. */
export function timeKey(reading: Pick<Reading, 'recordedAt'>): number {
  return tryParseTimestamp(reading.recordedAt)?.toMillis() ?? Number.NEGATIVE_INFINITY;
}

/**
 * Stable sort by timestamp. Readings without a usable timestamp come first
 * ascending and last descending; equal timestamps keep collection order.
 */
export function sortByTime<T extends Pick<Reading, 'recordedAt'>>(
  readings: readonly T[],
  direction: SortDirection = 'asc',
): T[] {
  const sign = direction === 'asc' ? 1 : -1;
  return readings
    .map((reading, index) => ({ reading, index, key: timeKey(reading) }))
    .sort((a, b) => {
      if (a.key !== b.key) return a.key < b.key ? -sign : sign;
      return a.index - b.index;
    })
    .map((entry) => entry.reading);
}

// ---------------------------------------------------------------------------
// Month truncation
// ---------------------------------------------------------------------------

export function monthKeyOf(timestamp: DateTime): MonthKey {
  return { year: timestamp.year, month: timestamp.month };
}

/** Months since year 0; consecutive calendar months differ by one. */
export function monthOrdinal(key: MonthKey): number {
  return key.year * 12 + (key.month - 1);
}

export function formatMonthKey(key: MonthKey): string {
  return `${String(key.year).padStart(4, '0')}-${String(key.month).padStart(2, '0')}`;
}
