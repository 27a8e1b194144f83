import type { NumericField } from './readings'

export type FieldUnit = 't/h' | 'kW' | '°C' | 'rpm' | '%'

export interface FieldInfo {
  /** Column heading in the plant historian export */
  column: string
  unit: FieldUnit
  label: string
}

/** Metadata for every numeric field, keyed by field name. */
export const FIELD_CATALOG: Readonly<Record<NumericField, FieldInfo>> = {
  millTph: { column: 'MILL TPH', unit: 't/h', label: 'Mill throughput' },
  clinkerTph: { column: 'CLINKER TPH', unit: 't/h', label: 'Clinker feed' },
  gypsumTph: { column: 'GYPSUM TPH', unit: 't/h', label: 'Gypsum feed' },
  dryFlyAshTph: { column: 'DFA TPH', unit: 't/h', label: 'Dry fly ash feed' },
  wetFlyAshTph: { column: 'WFA TPH', unit: 't/h', label: 'Wet fly ash feed' },
  millKw: { column: 'MILL KW', unit: 'kW', label: 'Mill power' },
  millInletTemp: { column: 'MILL I/L TEMP', unit: '°C', label: 'Mill inlet temperature' },
  millOutletTemp: { column: 'MILL O/L TEMP', unit: '°C', label: 'Mill outlet temperature' },
  separatorRpm: { column: 'SEP RPM', unit: 'rpm', label: 'Separator speed' },
  separatorKw: { column: 'SEP KW', unit: 'kW', label: 'Separator power' },
  ventFanRpm: { column: 'MILL VENT FAN RPM', unit: 'rpm', label: 'Vent fan speed' },
  ventFanKw: { column: 'MILL VENT FAN KW', unit: 'kW', label: 'Vent fan power' },
  caFanKw: { column: 'CA FAN KW', unit: 'kW', label: 'Combustion-air fan power' },
  residue: { column: 'RESIDUE', unit: '%', label: 'Residue' },
  reject: { column: 'REJECT', unit: '%', label: 'Reject rate' },
}

/** All numeric field keys, in catalogue order. */
export const NUMERIC_FIELDS: readonly NumericField[] = [
  'millTph',
  'clinkerTph',
  'gypsumTph',
  'dryFlyAshTph',
  'wetFlyAshTph',
  'millKw',
  'millInletTemp',
  'millOutletTemp',
  'separatorRpm',
  'separatorKw',
  'ventFanRpm',
  'ventFanKw',
  'caFanKw',
  'residue',
  'reject',
]

/** Fields compared when deciding whether two readings are duplicates. */
export const DEDUP_KEY_FIELDS: readonly NumericField[] = [
  'millTph',
  'clinkerTph',
  'gypsumTph',
  'dryFlyAshTph',
  'wetFlyAshTph',
  'millKw',
  'millInletTemp',
  'millOutletTemp',
]

export function isNumericField(value: string): value is NumericField {
  return Object.prototype.hasOwnProperty.call(FIELD_CATALOG, value)
}
