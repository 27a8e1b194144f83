// ---------------------------------------------------------------------------
// Batch report: every analysis over one snapshot
// ---------------------------------------------------------------------------
// Analyses only read the collection, so each runs independently. An
// AnalyticsError is recorded against its own entry and never aborts the
// others; any other error is a bug and propagates.

import { DEFAULT_ANALYSIS_CONFIG, type AnalysisConfig } from '@millscope/config';
import { NUMERIC_FIELDS, type NumericField, type Reading } from '@millscope/types';
import { ALERT_IDS, buildAlertCatalog } from '../alerts/catalog.js';
import { evaluateAlert } from '../alerts/threshold.js';
import { pearsonCorrelation } from '../correlation/pearson.js';
import { AnalyticsError, type AnalyticsErrorKind } from '../errors.js';
import { summarize } from '../moments/summary.js';
import { analyzeOutliers } from '../outliers/iqr-fence.js';
import { runningHours } from '../performance/breakdowns.js';
import { rollingMean } from '../rolling/rolling-mean.js';
import { sortByTime } from '../time/timestamps.js';
import { monthlyTrend } from '../trends/monthly.js';
import { TREND_PRESET_NAMES, TREND_PRESETS, type TrendPreset } from '../trends/presets.js';
import type {
  AlertId,
  AlertResult,
  MonthlyBucket,
  OutlierReport,
  RollingPoint,
  RunningHours,
  StatisticalSummary,
} from '../types.js';

export type Outcome<T> =
  | { status: 'ok'; value: T }
  | { status: 'failed'; error: { name: string; kind: AnalyticsErrorKind; message: string } };

/** Run one analysis, capturing analytics failures as a failed outcome. */
export function attempt<T>(analysis: () => T): Outcome<T> {
  try {
    return { status: 'ok', value: analysis() };
  } catch (err) {
    if (!(err instanceof AnalyticsError)) throw err;
    return { status: 'failed', error: { name: err.name, kind: err.kind, message: err.message } };
  }
}

export const OUTLIER_FIELDS: readonly NumericField[] = ['millTph', 'clinkerTph'];

export interface BatchReport {
  readings: number;
  summaries: Partial<Record<NumericField, Outcome<StatisticalSummary>>>;
  outliers: Outcome<OutlierReport>;
  /** Throughput vs mill power */
  correlation: Outcome<number>;
  alerts: Partial<Record<AlertId, Outcome<AlertResult>>>;
  /** Rolling residue, most recent first */
  rollingResidue: Outcome<RollingPoint[]>;
  trends: Partial<Record<TrendPreset, Outcome<MonthlyBucket[]>>>;
  runningHours: Outcome<RunningHours[]>;
}

export function analyzeBatch(
  readings: readonly Reading[],
  config: AnalysisConfig = DEFAULT_ANALYSIS_CONFIG,
): BatchReport {
  const summaries: BatchReport['summaries'] = {};
  for (const field of NUMERIC_FIELDS) {
    summaries[field] = attempt(() => summarize(readings, field));
  }

  const catalog = buildAlertCatalog(config);
  const alerts: BatchReport['alerts'] = {};
  for (const id of ALERT_IDS) {
    alerts[id] = attempt(() => evaluateAlert(readings, catalog[id]));
  }

  const trends: BatchReport['trends'] = {};
  for (const preset of TREND_PRESET_NAMES) {
    trends[preset] = attempt(() => monthlyTrend<string>(readings, TREND_PRESETS[preset]));
  }

  return {
    readings: readings.length,
    summaries,
    outliers: attempt(() => analyzeOutliers(readings, OUTLIER_FIELDS, { multiplier: config.IQR_MULTIPLIER })),
    correlation: attempt(() => pearsonCorrelation(readings, 'millTph', 'millKw')),
    alerts,
    rollingResidue: attempt(() =>
      [...rollingMean(sortByTime(readings, 'asc'), 'residue', { window: config.ROLLING_WINDOW })].reverse(),
    ),
    trends,
    runningHours: attempt(() => runningHours(readings, 'millKw', config.RUNNING_HOURS_LIMIT)),
  };
}
