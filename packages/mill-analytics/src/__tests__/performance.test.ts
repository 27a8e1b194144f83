// ---------------------------------------------------------------------------
// Performance Breakdown Tests
// ---------------------------------------------------------------------------
import { describe, it, expect } from 'vitest';
import { groupedMean, runningHours } from '../performance/breakdowns.js';
import { InvalidParameterError } from '../errors.js';
import { hourly, hourStamp, reading } from './fixtures.js';

describe('groupedMean', () => {
  it('averages one field per distinct value of another, keys ascending', () => {
    const readings = [
      reading({ recordedAt: hourStamp(0), separatorRpm: 900, millTph: 100 }),
      reading({ recordedAt: hourStamp(1), separatorRpm: 800, millTph: 80 }),
      reading({ recordedAt: hourStamp(2), separatorRpm: 900, millTph: 120 }),
      reading({ recordedAt: hourStamp(3), separatorRpm: null, millTph: 50 }),
    ];
    expect(groupedMean(readings, 'separatorRpm', 'millTph')).toEqual([
      { key: null, mean: 50, count: 1 },
      { key: 800, mean: 80, count: 1 },
      { key: 900, mean: 110, count: 2 },
    ]);
  });

  it('reports a null mean when the averaged field is absent in a group', () => {
    const readings = [reading({ separatorRpm: 900, residue: null })];
    expect(groupedMean(readings, 'separatorRpm', 'residue')).toEqual([{ key: 900, mean: null, count: 1 }]);
  });
});

describe('runningHours', () => {
  const readings = hourly('millKw', [3000, 3000, 3000, 2500]);

  it('counts hours per load and flags those over the limit', () => {
    expect(runningHours(readings, 'millKw', 2)).toEqual([
      { key: 2500, hours: 1, status: 'running-normally' },
      { key: 3000, hours: 3, status: 'maintenance-required' },
    ]);
  });

  it('is strict at the limit', () => {
    expect(runningHours(readings, 'millKw', 3)[1]?.status).toBe('running-normally');
  });

  it('rejects a negative limit', () => {
    expect(() => runningHours(readings, 'millKw', -1)).toThrow(InvalidParameterError);
  });
});
