export { monthlyTrend, bucketByMonth, aggregate, percentChange } from './monthly.js';
export { TREND_PRESETS, TREND_PRESET_NAMES, isTrendPreset, type TrendPreset } from './presets.js';
