import type { MonthlySeries } from '../types.js';

/** Standard monthly review series. */
export const TREND_PRESETS = {
  production: [
    { name: 'avgProduction', kind: 'mean', field: 'millTph' },
    { name: 'avgPower', kind: 'mean', field: 'millKw' },
  ],
  separator: [
    { name: 'avgSeparatorRpm', kind: 'mean', field: 'separatorRpm' },
    { name: 'avgResidue', kind: 'mean', field: 'residue' },
  ],
  energy: [{ name: 'energyPerTon', kind: 'ratio', numerator: 'millKw', denominator: 'millTph' }],
  growth: [{ name: 'avgProduction', kind: 'mean', field: 'millTph' }],
} as const satisfies Record<string, readonly MonthlySeries[]>;

export type TrendPreset = keyof typeof TREND_PRESETS;

export const TREND_PRESET_NAMES: readonly TrendPreset[] = ['production', 'separator', 'energy', 'growth'];

export function isTrendPreset(value: string): value is TrendPreset {
  return TREND_PRESET_NAMES.some((name) => name === value);
}
