// ---------------------------------------------------------------------------
// @millscope/mill-analytics: Barrel Export
// ---------------------------------------------------------------------------
// Pure batch analytics over cleaned cement-mill readings. Every function
// takes its reading collection explicitly and never mutates it.

// Result types
export type {
  SortDirection,
  QuartileFrame,
  BaseMoments,
  StatisticalSummary,
  Fence,
  OutlierOptions,
  OutlierReport,
  AlertId,
  ThresholdReference,
  ThresholdTest,
  AlertOutput,
  AlertDefinition,
  ResolvedThreshold,
  AlertGroup,
  AlertResult,
  RollingOptions,
  RollingPoint,
  MonthKey,
  MonthlyAggregate,
  MonthlySeries,
  Growth,
  SeriesPoint,
  MonthlyBucket,
  GroupedMean,
  RunningStatus,
  RunningHours,
} from './types.js';

// Errors
export {
  AnalyticsError,
  EmptyInputError,
  DegenerateVarianceError,
  ZeroVarianceError,
  DivisionByZeroError,
  UnparsableTimestampError,
  InvalidParameterError,
  isAnalyticsError,
  type AnalyticsErrorKind,
} from './errors.js';

export { presentValues, pairedValues } from './values.js';

// Timestamps & ordering
export * from './time/index.js';

// Cleaning boundary
export * from './cleaning/index.js';

// Quantile Engine
export * from './quantile/index.js';

// Moment Engine
export * from './moments/index.js';

// Outlier Detector
export * from './outliers/index.js';

// Correlation Analyzer
export * from './correlation/index.js';

// Threshold Alerter
export * from './alerts/index.js';

// Rolling Window Aggregator
export * from './rolling/index.js';

// Monthly Trend Aggregator
export * from './trends/index.js';

// Performance breakdowns
export * from './performance/index.js';

// Batch report
export * from './report/index.js';

// Reading Store
export * from './store/index.js';
