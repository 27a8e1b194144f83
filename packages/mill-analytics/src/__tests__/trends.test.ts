// ---------------------------------------------------------------------------
// Monthly Trend Aggregator Tests
// ---------------------------------------------------------------------------
import { describe, it, expect } from 'vitest';
import { aggregate, bucketByMonth, monthlyTrend, percentChange } from '../trends/monthly.js';
import { TREND_PRESETS, isTrendPreset } from '../trends/presets.js';
import { DivisionByZeroError } from '../errors.js';
import type { MonthlyBucket, SeriesPoint } from '../types.js';
import { reading } from './fixtures.js';

function point<K extends string>(bucket: MonthlyBucket<K> | undefined, name: K): SeriesPoint<K> | undefined {
  return bucket?.series.find((p) => p.name === name);
}

describe('Monthly Trend Aggregator', () => {
  const janFeb = [
    reading({ recordedAt: '01/15/2024 08:00', millTph: 90, millKw: 1000 }),
    reading({ recordedAt: '02/03/2024 10:00', millTph: 120, millKw: 1500 }),
    reading({ recordedAt: '01/20/2024 09:30', millTph: 110, millKw: 1000 }),
    reading({ recordedAt: '02/28/2024 23:59', millTph: 120, millKw: 900 }),
  ];

  describe('percentChange', () => {
    it('is relative to the previous value', () => {
      expect(percentChange(120, 100)).toBeCloseTo(20, 12);
      expect(percentChange(50, 100)).toBeCloseTo(-50, 12);
    });

    it('throws DivisionByZeroError for a zero baseline', () => {
      expect(() => percentChange(1, 0)).toThrow(DivisionByZeroError);
    });
  });

  describe('monthlyTrend', () => {
    it('reports month-over-month growth, most recent month first', () => {
      const buckets = monthlyTrend(janFeb, TREND_PRESETS.growth);
      expect(buckets.map((b) => b.label)).toEqual(['2024-02', '2024-01']);
      expect(buckets.map((b) => b.readings)).toEqual([2, 2]);

      const feb = point(buckets[0], 'avgProduction');
      const jan = point(buckets[1], 'avgProduction');
      expect(jan?.value).toBe(100);
      expect(jan?.growth).toEqual({ kind: 'undefined', reason: 'first-period' });
      expect(feb?.value).toBe(120);
      expect(feb?.growth.kind).toBe('percent');
      if (feb?.growth.kind === 'percent') expect(feb.growth.value).toBeCloseTo(20, 10);
    });

    it('aggregates every series of a preset', () => {
      const [feb] = monthlyTrend(janFeb, TREND_PRESETS.production);
      expect(feb?.series.map((p) => p.name)).toEqual(['avgProduction', 'avgPower']);
      expect(point(feb, 'avgPower')?.value).toBe(1200);
    });

    it('computes ratio series as Σnumerator / Σdenominator', () => {
      // Jan 2000 / 200, Feb 2400 / 240
      const [feb, jan] = monthlyTrend(janFeb, TREND_PRESETS.energy);
      expect(point(jan, 'energyPerTon')?.value).toBe(10);
      expect(point(feb, 'energyPerTon')?.value).toBe(10);
      expect(point(feb, 'energyPerTon')?.growth).toEqual({ kind: 'percent', value: 0 });
    });

    it('excludes readings without a usable timestamp', () => {
      const buckets = monthlyTrend(
        [...janFeb, reading({ recordedAt: 'not a date', millTph: 5000 }), reading({ recordedAt: null, millTph: 5000 })],
        TREND_PRESETS.growth,
      );
      expect(buckets).toHaveLength(2);
      expect(point(buckets[1], 'avgProduction')?.value).toBe(100);
    });

    it('compares with the previous month present in the data', () => {
      const buckets = monthlyTrend(
        [
          reading({ recordedAt: '01/10/2024 00:00', millTph: 100 }),
          reading({ recordedAt: '03/10/2024 00:00', millTph: 150 }),
        ],
        TREND_PRESETS.growth,
      );
      expect(buckets.map((b) => b.label)).toEqual(['2024-03', '2024-01']);
      expect(point(buckets[0], 'avgProduction')?.growth).toEqual({ kind: 'percent', value: 50 });
    });

    it('leaves growth undefined after a zero baseline', () => {
      const [feb] = monthlyTrend(
        [
          reading({ recordedAt: '01/10/2024 00:00', millKw: 0 }),
          reading({ recordedAt: '02/10/2024 00:00', millKw: 50 }),
        ],
        TREND_PRESETS.production,
      );
      expect(point(feb, 'avgPower')?.growth).toEqual({ kind: 'undefined', reason: 'zero-baseline' });
    });

    it('leaves growth undefined around a month with no values', () => {
      const [mar, feb] = monthlyTrend(
        [
          reading({ recordedAt: '01/10/2024 00:00', millKw: 100 }),
          reading({ recordedAt: '02/10/2024 00:00', millKw: null }),
          reading({ recordedAt: '03/10/2024 00:00', millKw: 120 }),
        ],
        TREND_PRESETS.production,
      );
      expect(point(feb, 'avgPower')?.value).toBeNull();
      expect(point(feb, 'avgPower')?.growth).toEqual({ kind: 'undefined', reason: 'missing-value' });
      expect(point(mar, 'avgPower')?.growth).toEqual({ kind: 'undefined', reason: 'missing-value' });
    });

    it('orders months across a year boundary', () => {
      const buckets = monthlyTrend(
        [
          reading({ recordedAt: '01/02/2024 00:00', millTph: 110 }),
          reading({ recordedAt: '12/30/2023 00:00', millTph: 100 }),
        ],
        TREND_PRESETS.growth,
      );
      expect(buckets.map((b) => b.label)).toEqual(['2024-01', '2023-12']);
      expect(buckets[0]?.month).toEqual({ year: 2024, month: 1 });
    });

    it('is empty for an empty collection', () => {
      expect(monthlyTrend([], TREND_PRESETS.growth)).toEqual([]);
    });
  });

  describe('aggregate / bucketByMonth', () => {
    it('ratio is null when the denominator sums to zero or is absent', () => {
      const rows = [reading({ millKw: 100, millTph: 0 })];
      expect(aggregate(rows, { kind: 'ratio', numerator: 'millKw', denominator: 'millTph' })).toBeNull();
      expect(aggregate(rows, { kind: 'ratio', numerator: 'millKw', denominator: 'residue' })).toBeNull();
    });

    it('buckets oldest first', () => {
      expect(bucketByMonth(janFeb).map((g) => g.month.month)).toEqual([1, 2]);
    });
  });

  it('recognises preset names', () => {
    expect(isTrendPreset('energy')).toBe(true);
    expect(isTrendPreset('weather')).toBe(false);
  });
});
