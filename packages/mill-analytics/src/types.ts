// ---------------------------------------------------------------------------
// @millscope/mill-analytics: Analysis Result Types
// ---------------------------------------------------------------------------

import type { NumericField, Reading } from '@millscope/types';

export type SortDirection = 'asc' | 'desc';

// ---------------------------------------------------------------------------
// Quantiles & moments
// ---------------------------------------------------------------------------

export interface QuartileFrame {
  field: NumericField;
  /** Number of present values ranked */
  count: number;
  q1: number;
  median: number;
  q3: number;
}

/** First-pass moments from Welford's recurrence. */
export interface BaseMoments {
  count: number;
  mean: number;
  /** Sum of squared deviations from the mean */
  m2: number;
  /** Population variance (m2 / count) */
  variance: number;
  stddev: number;
  min: number;
  max: number;
}

interface SummaryBase {
  field: NumericField;
  count: number;
  mean: number;
  min: number;
  max: number;
  variance: number;
  stddev: number;
}

/**
 * Descriptive statistics for one field. Skewness and kurtosis are null only
 * when the variance is zero, never as a stand-in for a computed zero.
 */
export type StatisticalSummary =
  | (SummaryBase & { shape: 'defined'; skewness: number; kurtosis: number })
  | (SummaryBase & { shape: 'degenerate'; skewness: null; kurtosis: null });

// ---------------------------------------------------------------------------
// Outliers
// ---------------------------------------------------------------------------

export interface Fence {
  field: NumericField;
  q1: number;
  q3: number;
  iqr: number;
  lower: number;
  upper: number;
}

export interface OutlierOptions {
  /** IQR multiplier for the fences (default 1.5) */
  multiplier?: number;
}

export interface OutlierReport {
  fences: Fence[];
  /** Flagged readings, most recent first */
  outliers: readonly Reading[];
}

// ---------------------------------------------------------------------------
// Threshold alerts
// ---------------------------------------------------------------------------

export type AlertId =
  | 'reject-rate'
  | 'high-temperature'
  | 'separator-inefficiency'
  | 'maintenance'
  | 'power-spike'
  | 'fan-failure'
  | 'separator-wear'
  | 'underperformance'
  | 'outlet-temperature-rise';

export type ThresholdReference =
  | { kind: 'mean' }
  | { kind: 'meanOf'; field: NumericField }
  | { kind: 'constant'; value: number };

export interface ThresholdTest {
  field: NumericField;
  direction: 'above' | 'below';
  multiplier: number;
  reference: ThresholdReference;
}

export type AlertOutput =
  | { mode: 'readings' }
  | { mode: 'grouped'; by: readonly NumericField[] };

export interface AlertDefinition {
  id: AlertId;
  description: string;
  /** 'any' flags when one test matches (OR), 'all' when every test matches (AND) */
  combine: 'any' | 'all';
  tests: readonly ThresholdTest[];
  /** Fields that must be present for a reading to be considered at all */
  requirePresent?: readonly NumericField[];
  output: AlertOutput;
}

/** A test with its reference statistic resolved against the collection. */
export interface ResolvedThreshold {
  field: NumericField;
  direction: 'above' | 'below';
  /** Reference statistic value; null when it could not be computed */
  reference: number | null;
  /** multiplier × reference; null when the reference is unavailable */
  limit: number | null;
}

export interface AlertGroup {
  values: Partial<Record<NumericField, number | null>>;
  occurrences: number;
}

export type AlertResult =
  | { alert: AlertId; mode: 'readings'; thresholds: ResolvedThreshold[]; readings: readonly Reading[] }
  | { alert: AlertId; mode: 'grouped'; thresholds: ResolvedThreshold[]; groups: AlertGroup[] };

// ---------------------------------------------------------------------------
// Rolling window
// ---------------------------------------------------------------------------

export interface RollingOptions {
  /** Trailing window length including the current reading (default 11) */
  window?: number;
}

export interface RollingPoint {
  recordedAt: string | null;
  /** Mean of present values in the window; null when none are present */
  value: number | null;
}

// ---------------------------------------------------------------------------
// Monthly trends
// ---------------------------------------------------------------------------

export interface MonthKey {
  year: number;
  /** 1–12 */
  month: number;
}

export type MonthlyAggregate =
  | { kind: 'mean'; field: NumericField }
  /** Σnumerator / Σdenominator over the month, e.g. kWh per ton */
  | { kind: 'ratio'; numerator: NumericField; denominator: NumericField };

export type MonthlySeries<K extends string = string> = MonthlyAggregate & { name: K };

export type Growth =
  | { kind: 'percent'; value: number }
  | { kind: 'undefined'; reason: 'first-period' | 'zero-baseline' | 'missing-value' };

export interface SeriesPoint<K extends string = string> {
  name: K;
  value: number | null;
  growth: Growth;
}

export interface MonthlyBucket<K extends string = string> {
  month: MonthKey;
  /** `YYYY-MM` */
  label: string;
  readings: number;
  /** One point per requested series, in request order */
  series: SeriesPoint<K>[];
}

// ---------------------------------------------------------------------------
// Performance breakdowns
// ---------------------------------------------------------------------------

export interface GroupedMean {
  key: number | null;
  mean: number | null;
  count: number;
}

export type RunningStatus = 'maintenance-required' | 'running-normally';

export interface RunningHours {
  key: number | null;
  hours: number;
  status: RunningStatus;
}
