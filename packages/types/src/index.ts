// Reading model and field catalogue shared by analytics, storage and the API.

export {
  fieldValue,
  type FeedRateField,
  type PowerField,
  type TemperatureField,
  type SpeedField,
  type QualityField,
  type NumericField,
  type RawReading,
  type Reading,
} from './readings'

export {
  FIELD_CATALOG,
  NUMERIC_FIELDS,
  DEDUP_KEY_FIELDS,
  isNumericField,
  type FieldInfo,
  type FieldUnit,
} from './catalog'
