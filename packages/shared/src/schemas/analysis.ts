import { z } from 'zod'
import { isNumericField, type NumericField } from '@millscope/types'
import { isAlertId, isTrendPreset, type AlertId, type TrendPreset } from '@millscope/mill-analytics'

export const numericFieldSchema = z
  .string()
  .refine((value): value is NumericField => isNumericField(value), 'Unknown reading field')

export const fieldParam = z.object({
  field: numericFieldSchema,
})

export const alertParam = z.object({
  alertId: z.string().refine((value): value is AlertId => isAlertId(value), 'Unknown alert'),
})

export const trendParam = z.object({
  preset: z.string().refine((value): value is TrendPreset => isTrendPreset(value), 'Unknown trend preset'),
})

export const rollingQuery = z.object({
  window: z.coerce.number().int().positive().max(10_000).optional(),
})

/** `fields` is a comma-separated list, e.g. `?fields=millTph,clinkerTph`. */
export const outlierQuery = z.object({
  fields: z
    .string()
    .default('millTph,clinkerTph')
    .transform((list) => list.split(',').map((f) => f.trim()).filter((f) => f.length > 0))
    .pipe(z.array(numericFieldSchema).min(1, 'At least one field is required')),
  multiplier: z.coerce.number().finite().nonnegative().optional(),
})

export const correlationQuery = z.object({
  x: numericFieldSchema.default('millTph'),
  y: numericFieldSchema.default('millKw'),
})

/** Mean of `of` per distinct value of `by`. */
export const breakdownQuery = z.object({
  by: numericFieldSchema.default('separatorRpm'),
  of: numericFieldSchema.default('millTph'),
})

export const runningHoursQuery = z.object({
  limit: z.coerce.number().finite().nonnegative().optional(),
})

export type OutlierQuery = z.infer<typeof outlierQuery>
export type CorrelationQuery = z.infer<typeof correlationQuery>
export type RollingQuery = z.infer<typeof rollingQuery>
export type BreakdownQuery = z.infer<typeof breakdownQuery>
