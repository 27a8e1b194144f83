// ---------------------------------------------------------------------------
// Test fixtures: reading builders and a seedable PRNG
// ---------------------------------------------------------------------------
import { DateTime } from 'luxon';
import type { NumericField, RawReading, Reading } from '@millscope/types';

export type PRNG = () => number;

/** Simple seedable PRNG (xorshift128+) */
export function createPRNG(seed: number): PRNG {
  let s0 = seed | 0 || 1;
  let s1 = (seed >>> 16) ^ 0x5DEECE66D;
  if (s1 === 0) s1 = 0xDEADBEEF;
  return () => {
    let x = s0;
    const y = s1;
    s0 = y;
    x ^= x << 23;
    x ^= x >> 17;
    x ^= y;
    x ^= y >> 26;
    s1 = x;
    return ((s0 + s1) >>> 0) / 0x100000000;
  };
}

const EMPTY_ROW: RawReading = {
  recordedAt: null,
  millTph: null,
  clinkerTph: null,
  gypsumTph: null,
  dryFlyAshTph: null,
  wetFlyAshTph: null,
  millKw: null,
  millInletTemp: null,
  millOutletTemp: null,
  separatorRpm: null,
  separatorKw: null,
  ventFanRpm: null,
  ventFanKw: null,
  caFanKw: null,
  residue: null,
  reject: null,
};

/** Historian text for `hours` after 2024-01-01 00:00. */
export function hourStamp(hours: number, start = DateTime.utc(2024, 1, 1)): string {
  return start.plus({ hours }).toFormat('MM/dd/yyyy HH:mm');
}

export function rawReading(overrides: Partial<RawReading> = {}): RawReading {
  return { ...EMPTY_ROW, recordedAt: hourStamp(0), millTph: 100, ...overrides };
}

export function reading(overrides: Partial<Reading> = {}): Reading {
  return { ...EMPTY_ROW, recordedAt: hourStamp(0), millTph: 100, ...overrides };
}

export function withField(base: Reading, field: NumericField, value: number | null): Reading {
  if (field === 'millTph') return { ...base, millTph: value ?? 0 };
  const copy: RawReading = { ...base };
  copy[field] = value;
  return { ...copy, millTph: base.millTph };
}

/** One reading per hour with `field` set to each value in turn. */
export function hourly(field: NumericField, values: readonly (number | null)[]): Reading[] {
  return values.map((value, i) => withField(reading({ recordedAt: hourStamp(i) }), field, value));
}
