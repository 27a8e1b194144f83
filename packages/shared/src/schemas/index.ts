export {
  rawReadingSchema,
  rawReadingBatchSchema,
  type RawReadingInput,
} from './readings'

export {
  numericFieldSchema,
  fieldParam,
  alertParam,
  trendParam,
  rollingQuery,
  outlierQuery,
  correlationQuery,
  breakdownQuery,
  runningHoursQuery,
  type OutlierQuery,
  type CorrelationQuery,
  type RollingQuery,
  type BreakdownQuery,
} from './analysis'
