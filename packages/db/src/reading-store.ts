import { asc } from 'drizzle-orm'
import type { RawReading } from '@millscope/types'
import type { WritableReadingStore } from '@millscope/mill-analytics'
import { db as defaultDb, type Database } from './client'
import { millReadings } from './schema/index'

/** Columns selected for a snapshot; shaped exactly like a RawReading. */
const readingColumns = {
  recordedAt: millReadings.recordedAt,
  millTph: millReadings.millTph,
  clinkerTph: millReadings.clinkerTph,
  gypsumTph: millReadings.gypsumTph,
  dryFlyAshTph: millReadings.dryFlyAshTph,
  wetFlyAshTph: millReadings.wetFlyAshTph,
  millKw: millReadings.millKw,
  millInletTemp: millReadings.millInletTemp,
  millOutletTemp: millReadings.millOutletTemp,
  separatorRpm: millReadings.separatorRpm,
  separatorKw: millReadings.separatorKw,
  ventFanRpm: millReadings.ventFanRpm,
  ventFanKw: millReadings.ventFanKw,
  caFanKw: millReadings.caFanKw,
  residue: millReadings.residue,
  reject: millReadings.reject,
}

const INSERT_CHUNK = 500

/** Reading store backed by the `mill_readings` table. */
export class PgReadingStore implements WritableReadingStore {
  constructor(private readonly database: Database = defaultDb) {}

  /** Every stored row in ingestion order. */
  async loadRaw(): Promise<readonly RawReading[]> {
    return this.database.select(readingColumns).from(millReadings).orderBy(asc(millReadings.id))
  }

  /** Insert a batch atomically: either every chunk is committed or none is. */
  async append(rows: readonly RawReading[]): Promise<number> {
    if (rows.length === 0) return 0

    return await this.database.transaction(async (tx) => {
      let stored = 0
      for (let i = 0; i < rows.length; i += INSERT_CHUNK) {
        const chunk = rows.slice(i, i + INSERT_CHUNK)
        const inserted = await tx
          .insert(millReadings)
          .values(chunk)
          .returning({ id: millReadings.id })
        stored += inserted.length
      }
      return stored
    })
  }
}
