// ---------------------------------------------------------------------------
// Reading Store: the engine's only input boundary
// ---------------------------------------------------------------------------

import type { RawReading } from '@millscope/types';
import { cleanReadings, type CleaningResult } from '../cleaning/clean.js';

/** Supplies one raw snapshot per call. Implementations own all I/O. */
export interface ReadingStore {
  loadRaw(): Promise<readonly RawReading[]>;
}

/** A store that also accepts newly ingested rows. */
export interface WritableReadingStore extends ReadingStore {
  /** Append rows as given; returns how many were stored. */
  append(rows: readonly RawReading[]): Promise<number>;
}

/** Snapshot held in memory. */
export class InMemoryReadingStore implements WritableReadingStore {
  private readonly rows: RawReading[];

  constructor(rows: readonly RawReading[] = []) {
    this.rows = rows.map((row) => ({ ...row }));
  }

  async loadRaw(): Promise<readonly RawReading[]> {
    return this.rows.slice();
  }

  async append(rows: readonly RawReading[]): Promise<number> {
    for (const row of rows) this.rows.push({ ...row });
    return rows.length;
  }
}

/** Load a snapshot and run the cleaning boundary over it once. */
export async function loadCleanReadings(store: ReadingStore): Promise<CleaningResult> {
  return cleanReadings(await store.loadRaw());
}
