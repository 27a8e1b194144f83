// ---------------------------------------------------------------------------
// Analytics error taxonomy
// ---------------------------------------------------------------------------
// Every failure the engine raises is scoped to a single statistic, field or
// bucket. None of them is fatal; callers decide per field how to report it.

export type AnalyticsErrorKind =
  | 'empty-input'
  | 'degenerate-variance'
  | 'zero-variance'
  | 'division-by-zero'
  | 'unparsable-timestamp'
  | 'invalid-parameter';

/** Base class for every condition raised by the analytics engine. */
export abstract class AnalyticsError extends Error {
  abstract readonly kind: AnalyticsErrorKind;
}

/** No readings (or no present values of the field) to analyze. */
export class EmptyInputError extends AnalyticsError {
  readonly kind = 'empty-input';

  constructor(public readonly subject: string) {
    super(`No values to analyze for ${subject}`);
    this.name = 'EmptyInputError';
  }
}

/** Skewness/kurtosis are undefined because every value is identical. */
export class DegenerateVarianceError extends AnalyticsError {
  readonly kind = 'degenerate-variance';

  constructor(
    public readonly statistic: 'skewness' | 'kurtosis',
    public readonly count: number,
  ) {
    super(`Cannot compute ${statistic}: variance is zero across ${count} values`);
    this.name = 'DegenerateVarianceError';
  }
}

/** Pearson correlation is undefined because one side is constant. */
export class ZeroVarianceError extends AnalyticsError {
  readonly kind = 'zero-variance';

  constructor(public readonly side: string) {
    super(`Cannot correlate: ${side} is constant`);
    this.name = 'ZeroVarianceError';
  }
}

/** Period-over-period change against a zero baseline. */
export class DivisionByZeroError extends AnalyticsError {
  readonly kind = 'division-by-zero';

  constructor(public readonly current: number) {
    super(`Cannot compute change from a zero baseline (current ${current})`);
    this.name = 'DivisionByZeroError';
  }
}

/** Timestamp text that does not match `MM/DD/YYYY HH:MM`. Recovered by exclusion. */
export class UnparsableTimestampError extends AnalyticsError {
  readonly kind = 'unparsable-timestamp';

  constructor(public readonly text: string) {
    super(`Unparsable timestamp: "${text}"`);
    this.name = 'UnparsableTimestampError';
  }
}

/** A caller-supplied parameter is out of its domain. */
export class InvalidParameterError extends AnalyticsError {
  readonly kind = 'invalid-parameter';

  constructor(
    public readonly parameter: string,
    detail: string,
  ) {
    super(`Invalid ${parameter}: ${detail}`);
    this.name = 'InvalidParameterError';
  }
}

export function isAnalyticsError(err: unknown): err is AnalyticsError {
  return err instanceof AnalyticsError;
}
