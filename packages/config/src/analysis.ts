/** Multipliers and constants used by the built-in alert catalogue. */
export interface AlertThresholds {
  REJECT_RATE_MULTIPLIER: number
  HIGH_OUTLET_TEMP: number
  SEPARATOR_INEFFICIENCY_MULTIPLIER: number
  MAINTENANCE_MULTIPLIER: number
  POWER_SPIKE_MULTIPLIER: number
  FAN_FAILURE_RPM_MULTIPLIER: number
  FAN_FAILURE_KW_MULTIPLIER: number
  SEPARATOR_WEAR_RPM_MULTIPLIER: number
  SEPARATOR_WEAR_RESIDUE_MULTIPLIER: number
  UNDERPERFORMANCE_MULTIPLIER: number
  OUTLET_TEMP_RISE_MULTIPLIER: number
}

/** Parameters for the non-alert analyses. */
export interface AnalysisSettings {
  IQR_MULTIPLIER: number
  ROLLING_WINDOW: number
  RUNNING_HOURS_LIMIT: number
}

export type AnalysisConfig = AlertThresholds & AnalysisSettings

export type AnalysisConfigKey = keyof AnalysisConfig

export const DEFAULT_ALERT_THRESHOLDS: AlertThresholds = {
  REJECT_RATE_MULTIPLIER: 1.5,
  HIGH_OUTLET_TEMP: 100,
  SEPARATOR_INEFFICIENCY_MULTIPLIER: 1.3,
  MAINTENANCE_MULTIPLIER: 1.2,
  POWER_SPIKE_MULTIPLIER: 1.2,
  FAN_FAILURE_RPM_MULTIPLIER: 0.85,
  FAN_FAILURE_KW_MULTIPLIER: 1.1,
  SEPARATOR_WEAR_RPM_MULTIPLIER: 0.95,
  SEPARATOR_WEAR_RESIDUE_MULTIPLIER: 1.1,
  UNDERPERFORMANCE_MULTIPLIER: 0.8,
  OUTLET_TEMP_RISE_MULTIPLIER: 1.3,
}

export const DEFAULT_ANALYSIS_SETTINGS: AnalysisSettings = {
  IQR_MULTIPLIER: 1.5,
  ROLLING_WINDOW: 11,
  RUNNING_HOURS_LIMIT: 100,
}

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  ...DEFAULT_ALERT_THRESHOLDS,
  ...DEFAULT_ANALYSIS_SETTINGS,
}

/** All config keys for iteration. */
export const ANALYSIS_CONFIG_KEYS: AnalysisConfigKey[] = [
  'REJECT_RATE_MULTIPLIER',
  'HIGH_OUTLET_TEMP',
  'SEPARATOR_INEFFICIENCY_MULTIPLIER',
  'MAINTENANCE_MULTIPLIER',
  'POWER_SPIKE_MULTIPLIER',
  'FAN_FAILURE_RPM_MULTIPLIER',
  'FAN_FAILURE_KW_MULTIPLIER',
  'SEPARATOR_WEAR_RPM_MULTIPLIER',
  'SEPARATOR_WEAR_RESIDUE_MULTIPLIER',
  'UNDERPERFORMANCE_MULTIPLIER',
  'OUTLET_TEMP_RISE_MULTIPLIER',
  'IQR_MULTIPLIER',
  'ROLLING_WINDOW',
  'RUNNING_HOURS_LIMIT',
]

const ENV_PREFIX = 'MILLSCOPE_'

type EnvSource = Record<string, string | undefined>

/** Finite number from an env var, or undefined when unset or not numeric. */
export function readEnvNumber(env: EnvSource, key: string): number | undefined {
  const raw = env[key]
  if (raw === undefined || raw.trim() === '') return undefined
  const value = Number(raw)
  return Number.isFinite(value) ? value : undefined
}

/** Resolve a single value: env override (`MILLSCOPE_<KEY>`) > default. */
export function resolveSetting(key: AnalysisConfigKey, env: EnvSource = process.env): number {
  return readEnvNumber(env, `${ENV_PREFIX}${key}`) ?? DEFAULT_ANALYSIS_CONFIG[key]
}

/** Full analysis config with env overrides applied. */
export function resolveAnalysisConfig(env: EnvSource = process.env): AnalysisConfig {
  const config = { ...DEFAULT_ANALYSIS_CONFIG }
  for (const key of ANALYSIS_CONFIG_KEYS) {
    config[key] = resolveSetting(key, env)
  }
  return config
}
