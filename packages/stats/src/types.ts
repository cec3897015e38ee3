/**
 * Statistical types for Monte Carlo pricing
 */

/** Source of uniform draws in [0, 1). */
export interface UniformSource {
  next(): number;
}

/** Source of draws from a fixed Normal distribution. Advances on every call. */
export interface NormalSource {
  sample(): number;
}

export interface SampleSummary {
  /** Number of observations */
  readonly count: number;
  /** Arithmetic mean */
  readonly mean: number;
  /** Sample standard deviation (N−1 denominator), 0 for a single observation */
  readonly stdDev: number;
  /** Standard error of the mean */
  readonly standardError: number;
  readonly min: number;
  readonly max: number;
  /** 5th percentile */
  readonly p05: number;
  /** Median */
  readonly p50: number;
  /** 95th percentile */
  readonly p95: number;
}
