// ---------------------------------------------------------------------------
// Cleaning boundary: raw rows → analyzable readings
// ---------------------------------------------------------------------------
// 1. Rows without throughput are dropped.
// 2. Rows whose dedup key fields all match an earlier-timestamped row are
//    dropped. A null key field never matches (null ≠ null), so such rows
//    always survive. Rows without a parseable timestamp take no part in the
//    election: they always survive and never displace a dated row.

import { DEDUP_KEY_FIELDS, NUMERIC_FIELDS, type NumericField, type RawReading, type Reading } from '@millscope/types';
import { tryParseTimestamp } from '../time/timestamps.js';

export interface CleaningResult {
  readings: Reading[];
  droppedNullThroughput: number;
  droppedDuplicates: number;
}

function toReading(raw: RawReading, millTph: number): Reading {
  return { ...raw, millTph };
}

function dedupKey(reading: Reading): string | undefined {
  const parts: number[] = [];
  for (const field of DEDUP_KEY_FIELDS) {
    const value = reading[field];
    if (value === null) return undefined;
    parts.push(value);
  }
  return parts.join('|');
}

/**
 * Drop rows with null throughput, then keep only the earliest row of each
 * duplicate group. Output preserves input order.
 */
export function cleanReadings(raw: readonly RawReading[]): CleaningResult {
  const present: Reading[] = [];
  let droppedNullThroughput = 0;

  for (const row of raw) {
    if (row.millTph === null) {
      droppedNullThroughput++;
      continue;
    }
    present.push(toReading(row, row.millTph));
  }

  // Pick the survivor of each key group among dated rows: smallest timestamp, then first seen
  const survivors = new Map<string, { index: number; key: number }>();
  const times = present.map((reading) => tryParseTimestamp(reading.recordedAt)?.toMillis());
  const keys = present.map((reading, i) => (times[i] === undefined ? undefined : dedupKey(reading)));
  for (let i = 0; i < present.length; i++) {
    const key = keys[i];
    const time = times[i];
    if (key === undefined || time === undefined) continue;
    const current = survivors.get(key);
    if (!current || time < current.key) {
      survivors.set(key, { index: i, key: time });
    }
  }

  const readings: Reading[] = [];
  let droppedDuplicates = 0;
  for (let i = 0; i < present.length; i++) {
    const key = keys[i];
    if (key !== undefined && survivors.get(key)?.index !== i) {
      droppedDuplicates++;
      continue;
    }
    readings.push(present[i]!);
  }

  return { readings, droppedNullThroughput, droppedDuplicates };
}

export type NullProfile = Record<NumericField | 'recordedAt', number>;

/** Count of null values per column. */
export function nullProfile(raw: readonly RawReading[]): NullProfile {
  const profile: NullProfile = {
    recordedAt: 0,
    millTph: 0,
    clinkerTph: 0,
    gypsumTph: 0,
    dryFlyAshTph: 0,
    wetFlyAshTph: 0,
    millKw: 0,
    millInletTemp: 0,
    millOutletTemp: 0,
    separatorRpm: 0,
    separatorKw: 0,
    ventFanRpm: 0,
    ventFanKw: 0,
    caFanKw: 0,
    residue: 0,
    reject: 0,
  };
  for (const row of raw) {
    if (row.recordedAt === null) profile.recordedAt++;
    for (const field of NUMERIC_FIELDS) {
      if (row[field] === null) profile[field]++;
    }
  }
  return profile;
}
