// ---------------------------------------------------------------------------
// Quantile Engine Tests
// ---------------------------------------------------------------------------
import { describe, it, expect } from 'vitest';
import { orderStatistic, quartiles, rankPosition, rankValues } from '../quantile/order-statistic.js';
import { EmptyInputError, InvalidParameterError } from '../errors.js';
import { hourly } from './fixtures.js';

describe('Quantile Engine', () => {
  describe('rankPosition', () => {
    it('floors f·N', () => {
      expect(rankPosition(0.25, 8)).toBe(2);
      expect(rankPosition(0.75, 8)).toBe(6);
      expect(rankPosition(0.75, 5)).toBe(3);
    });

    it('clamps to [1, N]', () => {
      expect(rankPosition(0.25, 3)).toBe(1);
      expect(rankPosition(0, 10)).toBe(1);
      expect(rankPosition(1, 10)).toBe(10);
    });
  });

  describe('orderStatistic', () => {
    const sorted = [10, 20, 30, 40, 50, 60, 70, 80];

    it('selects without interpolation', () => {
      expect(orderStatistic(sorted, 0.25)).toBe(20);
      expect(orderStatistic(sorted, 0.5)).toBe(40);
      expect(orderStatistic(sorted, 0.75)).toBe(60);
      expect(orderStatistic(sorted, 0.3)).toBe(20);
    });

    it('returns extremes at f = 0 and f = 1', () => {
      expect(orderStatistic(sorted, 0)).toBe(10);
      expect(orderStatistic(sorted, 1)).toBe(80);
    });

    it('rejects fractions outside [0, 1]', () => {
      expect(() => orderStatistic(sorted, 1.2)).toThrow(InvalidParameterError);
      expect(() => orderStatistic(sorted, -0.1)).toThrow(InvalidParameterError);
      expect(() => orderStatistic(sorted, Number.NaN)).toThrow(InvalidParameterError);
    });

    it('throws EmptyInputError on empty input', () => {
      expect(() => orderStatistic([], 0.5)).toThrow(EmptyInputError);
    });
  });

  describe('quartiles', () => {
    it('ranks the field ascending before selecting', () => {
      const frame = quartiles(hourly('millTph', [5, 1, 4, 2, 3]), 'millTph');
      expect(frame).toEqual({ field: 'millTph', count: 5, q1: 1, median: 2, q3: 3 });
    });

    it('collapses to the single value when N = 1', () => {
      const frame = quartiles(hourly('residue', [42]), 'residue');
      expect(frame.q1).toBe(42);
      expect(frame.median).toBe(42);
      expect(frame.q3).toBe(42);
    });

    it('ranks only present values', () => {
      const frame = quartiles(hourly('residue', [null, 5, null, 1]), 'residue');
      expect(frame.count).toBe(2);
      expect(frame.q1).toBe(1);
      expect(frame.q3).toBe(1);
    });

    it('throws EmptyInputError for an empty collection', () => {
      expect(() => quartiles([], 'millTph')).toThrow(EmptyInputError);
    });

    it('throws EmptyInputError when every value is absent', () => {
      expect(() => quartiles(hourly('reject', [null, null]), 'reject')).toThrow(EmptyInputError);
    });
  });

  it('rankValues does not reorder the input collection', () => {
    const readings = hourly('millTph', [3, 1, 2]);
    expect(rankValues(readings, 'millTph')).toEqual([1, 2, 3]);
    expect(readings.map((r) => r.millTph)).toEqual([3, 1, 2]);
  });
});
