// ─── Fields ──────────────────────────────────────────────────────────────────

/** Feed-rate fields, tons per hour. */
export type FeedRateField =
  | 'millTph'
  | 'clinkerTph'
  | 'gypsumTph'
  | 'dryFlyAshTph'
  | 'wetFlyAshTph'

/** Power draw fields, kW. */
export type PowerField = 'millKw' | 'separatorKw' | 'ventFanKw' | 'caFanKw'

export type TemperatureField = 'millInletTemp' | 'millOutletTemp'

export type SpeedField = 'separatorRpm' | 'ventFanRpm'

/** Quality fields, percent. */
export type QualityField = 'residue' | 'reject'

/** Every numeric column a mill reading carries. */
export type NumericField = FeedRateField | PowerField | TemperatureField | SpeedField | QualityField

// ─── Readings ────────────────────────────────────────────────────────────────

/**
 * One row as it arrives from ingestion. Any column may be missing.
 * `recordedAt` keeps the source text (`MM/DD/YYYY HH:MM`).
 */
export type RawReading = {
  recordedAt: string | null
} & { [K in NumericField]: number | null }

/**
 * A cleaned reading: throughput is guaranteed present, every other
 * column stays nullable.
 */
export type Reading = Readonly<
  Omit<RawReading, 'millTph'> & {
    millTph: number
  }
>

/** Numeric value of a field, or null when the sensor reported nothing. */
export function fieldValue(reading: Reading, field: NumericField): number | null {
  return reading[field]
}
