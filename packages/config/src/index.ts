// Analysis configuration: alert multipliers, fence/window settings and env overrides.

export {
  resolveAnalysisConfig,
  resolveSetting,
  readEnvNumber,
  DEFAULT_ALERT_THRESHOLDS,
  DEFAULT_ANALYSIS_SETTINGS,
  DEFAULT_ANALYSIS_CONFIG,
  ANALYSIS_CONFIG_KEYS,
  type AlertThresholds,
  type AnalysisSettings,
  type AnalysisConfig,
  type AnalysisConfigKey,
} from './analysis'
