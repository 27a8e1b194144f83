import { z } from 'zod'
import type { RawReading } from '@millscope/types'

const sensorValue = z.number().finite().nullable()

/** One historian row. Timestamp text is kept as-is; the engine parses it. */
export const rawReadingSchema = z.object({
  recordedAt: z.string().max(32).nullable(),
  millTph: sensorValue,
  clinkerTph: sensorValue,
  gypsumTph: sensorValue,
  dryFlyAshTph: sensorValue,
  wetFlyAshTph: sensorValue,
  millKw: sensorValue,
  millInletTemp: sensorValue,
  millOutletTemp: sensorValue,
  separatorRpm: sensorValue,
  separatorKw: sensorValue,
  ventFanRpm: sensorValue,
  ventFanKw: sensorValue,
  caFanKw: sensorValue,
  residue: sensorValue,
  reject: sensorValue,
}) satisfies z.ZodType<RawReading>

export const rawReadingBatchSchema = z.array(rawReadingSchema).max(5000, 'At most 5000 rows per batch')

export type RawReadingInput = z.infer<typeof rawReadingSchema>
