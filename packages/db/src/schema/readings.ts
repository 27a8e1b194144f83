import { pgTable, serial, text, doublePrecision, timestamp } from 'drizzle-orm/pg-core'

/**
 * Hourly historian rows, stored as exported. `recorded_at` keeps the
 * source text; parsing and cleaning happen in the analytics engine.
 */
export const millReadings = pgTable('mill_readings', {
  id: serial('id').primaryKey(),
  recordedAt: text('recorded_at'),
  millTph: doublePrecision('mill_tph'),
  clinkerTph: doublePrecision('clinker_tph'),
  gypsumTph: doublePrecision('gypsum_tph'),
  dryFlyAshTph: doublePrecision('dry_fly_ash_tph'),
  wetFlyAshTph: doublePrecision('wet_fly_ash_tph'),
  millKw: doublePrecision('mill_kw'),
  millInletTemp: doublePrecision('mill_inlet_temp'),
  millOutletTemp: doublePrecision('mill_outlet_temp'),
  separatorRpm: doublePrecision('separator_rpm'),
  separatorKw: doublePrecision('separator_kw'),
  ventFanRpm: doublePrecision('vent_fan_rpm'),
  ventFanKw: doublePrecision('vent_fan_kw'),
  caFanKw: doublePrecision('ca_fan_kw'),
  residue: doublePrecision('residue'),
  reject: doublePrecision('reject'),
  ingestedAt: timestamp('ingested_at', { withTimezone: true }).notNull().defaultNow(),
})

export type MillReadingRow = typeof millReadings.$inferSelect
export type NewMillReadingRow = typeof millReadings.$inferInsert
