// ---------------------------------------------------------------------------
// Batch Report & Reading Store Tests
// ---------------------------------------------------------------------------
import { describe, it, expect } from 'vitest';
import { DEFAULT_ANALYSIS_CONFIG } from '@millscope/config';
import { analyzeBatch, attempt } from '../report/batch.js';
import { InMemoryReadingStore, loadCleanReadings } from '../store/reading-store.js';
import { EmptyInputError } from '../errors.js';
import { hourStamp, rawReading, reading } from './fixtures.js';

describe('attempt', () => {
  it('wraps a value', () => {
    expect(attempt(() => 5)).toEqual({ status: 'ok', value: 5 });
  });

  it('captures analytics errors', () => {
    expect(
      attempt(() => {
        throw new EmptyInputError('residue');
      }),
    ).toEqual({
      status: 'failed',
      error: { name: 'EmptyInputError', kind: 'empty-input', message: 'No values to analyze for residue' },
    });
  });

  it('lets any other error through', () => {
    expect(() =>
      attempt(() => {
        throw new TypeError('boom');
      }),
    ).toThrow(TypeError);
  });
});

describe('analyzeBatch', () => {
  const readings = [90, 100, 110, 120].map((millTph, i) =>
    reading({ recordedAt: hourStamp(i), millTph, millKw: millTph * 10 + 100 }),
  );
  const report = analyzeBatch(readings);

  it('counts the snapshot', () => {
    expect(report.readings).toBe(4);
  });

  it('summarizes every field independently', () => {
    const tph = report.summaries.millTph;
    expect(tph?.status).toBe('ok');
    if (tph?.status === 'ok') expect(tph.value.mean).toBeCloseTo(105, 12);

    expect(report.summaries.clinkerTph).toEqual({
      status: 'failed',
      error: { name: 'EmptyInputError', kind: 'empty-input', message: 'No values to analyze for clinkerTph' },
    });
  });

  it('records a failed outlier pass without aborting the rest', () => {
    expect(report.outliers.status).toBe('failed');
    expect(report.correlation.status).toBe('ok');
    if (report.correlation.status === 'ok') expect(report.correlation.value).toBeCloseTo(1, 12);
  });

  it('evaluates every alert', () => {
    expect(Object.keys(report.alerts)).toHaveLength(9);
    expect(report.alerts['reject-rate']?.status).toBe('ok');
  });

  it('rolls residue over time, most recent first', () => {
    expect(report.rollingResidue.status).toBe('ok');
    if (report.rollingResidue.status !== 'ok') return;
    expect(report.rollingResidue.value.map((p) => p.recordedAt)).toEqual([
      hourStamp(3),
      hourStamp(2),
      hourStamp(1),
      hourStamp(0),
    ]);
    expect(report.rollingResidue.value.every((p) => p.value === null)).toBe(true);
  });

  it('builds every trend preset', () => {
    const production = report.trends.production;
    expect(production?.status).toBe('ok');
    if (production?.status === 'ok') expect(production.value.map((b) => b.label)).toEqual(['2024-01']);
  });

  it('uses the configured running-hours limit', () => {
    const strict = analyzeBatch(readings, { ...DEFAULT_ANALYSIS_CONFIG, RUNNING_HOURS_LIMIT: 0 });
    expect(strict.runningHours.status).toBe('ok');
    if (strict.runningHours.status === 'ok') {
      expect(strict.runningHours.value.map((h) => h.status)).toEqual([
        'maintenance-required',
        'maintenance-required',
        'maintenance-required',
        'maintenance-required',
      ]);
    }
  });
});

describe('InMemoryReadingStore', () => {
  it('returns a copy of its rows', async () => {
    const rows = [rawReading({ residue: 1 })];
    const store = new InMemoryReadingStore(rows);
    rows.push(rawReading({ residue: 2 }));
    expect(await store.loadRaw()).toHaveLength(1);
  });

  it('appends copies of ingested rows', async () => {
    const store = new InMemoryReadingStore();
    expect(await store.append([rawReading({ residue: 1 }), rawReading({ residue: 2 })])).toBe(2);
    const rows = await store.loadRaw();
    expect(rows.map((r) => r.residue)).toEqual([1, 2]);
  });

  it('loadCleanReadings runs the cleaning boundary once', async () => {
    const store = new InMemoryReadingStore([
      rawReading({ recordedAt: hourStamp(0), millTph: null }),
      rawReading({ recordedAt: hourStamp(1), millTph: 110 }),
    ]);
    const result = await loadCleanReadings(store);
    expect(result.droppedNullThroughput).toBe(1);
    expect(result.readings.map((r) => r.millTph)).toEqual([110]);
  });
});
