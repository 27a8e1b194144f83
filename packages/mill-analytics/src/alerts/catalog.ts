// ---------------------------------------------------------------------------
// Built-in alert catalogue
// ---------------------------------------------------------------------------

import { DEFAULT_ALERT_THRESHOLDS, type AlertThresholds } from '@millscope/config';
import type { NumericField } from '@millscope/types';
import type { AlertDefinition, AlertId, ThresholdTest } from '../types.js';

export const ALERT_IDS: readonly AlertId[] = [
  'reject-rate',
  'high-temperature',
  'separator-inefficiency',
  'maintenance',
  'power-spike',
  'fan-failure',
  'separator-wear',
  'underperformance',
  'outlet-temperature-rise',
];

export function isAlertId(value: string): value is AlertId {
  return ALERT_IDS.some((id) => id === value);
}

function aboveMean(field: NumericField, multiplier: number): ThresholdTest {
  return { field, direction: 'above', multiplier, reference: { kind: 'mean' } };
}

function belowMean(field: NumericField, multiplier: number): ThresholdTest {
  return { field, direction: 'below', multiplier, reference: { kind: 'mean' } };
}

/** Alert definitions parameterized by the configured multipliers. */
export function buildAlertCatalog(
  thresholds: AlertThresholds = DEFAULT_ALERT_THRESHOLDS,
): Record<AlertId, AlertDefinition> {
  const readings = { mode: 'readings' } as const;
  return {
    'reject-rate': {
      id: 'reject-rate',
      description: 'Reject rate well above its average',
      combine: 'any',
      tests: [aboveMean('reject', thresholds.REJECT_RATE_MULTIPLIER)],
      output: readings,
    },
    'high-temperature': {
      id: 'high-temperature',
      description: 'Mill outlet temperature above the fixed limit',
      combine: 'any',
      tests: [
        {
          field: 'millOutletTemp',
          direction: 'above',
          multiplier: 1,
          reference: { kind: 'constant', value: thresholds.HIGH_OUTLET_TEMP },
        },
      ],
      output: readings,
    },
    'separator-inefficiency': {
      id: 'separator-inefficiency',
      description: 'Separator drawing more power than usual',
      combine: 'any',
      tests: [aboveMean('separatorKw', thresholds.SEPARATOR_INEFFICIENCY_MULTIPLIER)],
      output: readings,
    },
    maintenance: {
      id: 'maintenance',
      description: 'Vent fan or separator power trending high',
      combine: 'any',
      tests: [
        aboveMean('ventFanKw', thresholds.MAINTENANCE_MULTIPLIER),
        aboveMean('separatorKw', thresholds.MAINTENANCE_MULTIPLIER),
      ],
      output: readings,
    },
    'power-spike': {
      id: 'power-spike',
      description: 'Power spike on the mill, separator or combustion-air fan',
      combine: 'any',
      tests: [
        aboveMean('millKw', thresholds.POWER_SPIKE_MULTIPLIER),
        aboveMean('separatorKw', thresholds.POWER_SPIKE_MULTIPLIER),
        aboveMean('caFanKw', thresholds.POWER_SPIKE_MULTIPLIER),
      ],
      output: readings,
    },
    'fan-failure': {
      id: 'fan-failure',
      description: 'Vent fan running slow while drawing high power',
      combine: 'all',
      tests: [
        belowMean('ventFanRpm', thresholds.FAN_FAILURE_RPM_MULTIPLIER),
        aboveMean('ventFanKw', thresholds.FAN_FAILURE_KW_MULTIPLIER),
      ],
      requirePresent: ['ventFanRpm', 'ventFanKw'],
      output: { mode: 'grouped', by: ['ventFanRpm', 'ventFanKw'] },
    },
    'separator-wear': {
      id: 'separator-wear',
      description: 'Separator slowing down while residue climbs',
      combine: 'all',
      tests: [
        belowMean('separatorRpm', thresholds.SEPARATOR_WEAR_RPM_MULTIPLIER),
        aboveMean('residue', thresholds.SEPARATOR_WEAR_RESIDUE_MULTIPLIER),
      ],
      output: readings,
    },
    underperformance: {
      id: 'underperformance',
      description: 'Throughput well below its average',
      combine: 'any',
      tests: [belowMean('millTph', thresholds.UNDERPERFORMANCE_MULTIPLIER)],
      output: readings,
    },
    'outlet-temperature-rise': {
      id: 'outlet-temperature-rise',
      description: 'Outlet temperature well above its average',
      combine: 'any',
      tests: [aboveMean('millOutletTemp', thresholds.OUTLET_TEMP_RISE_MULTIPLIER)],
      output: readings,
    },
  };
}
