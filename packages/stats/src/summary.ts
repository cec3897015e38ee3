/**
 * Sample statistics over simulated prices
 */

import type { SampleSummary } from "./types.js";

/**
 * Arithmetic mean, 0 for an empty sample
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Unbiased sample standard deviation.
 *
 * With fewer than two observations the N−1 denominator is undefined; 0 is
 * reported instead.
 */
export function sampleStdDev(values: readonly number[], sampleMean = mean(values)): number {
  if (values.length < 2) {
    return 0;
  }
  const squared = values.reduce((sum, v) => sum + Math.pow(v - sampleMean, 2), 0);
  return Math.sqrt(squared / (values.length - 1));
}

/**
 * Calculate percentile from sorted array
 */
export function percentile(sortedArray: readonly number[], p: number): number {
  if (sortedArray.length === 0) {
    return 0;
  }
  const index = (sortedArray.length - 1) * p;
  const lower = Math.floor(index);
  const upper = Math.ceil(index);
  const weight = index - lower;

  if (lower === upper) {
    return sortedArray[lower]!;
  }

  return sortedArray[lower]! * (1 - weight) + sortedArray[upper]! * weight;
}

/**
 * Summarise a sample of simulated values
 *
 * @throws Error when the sample is empty
 */
export function summarize(values: readonly number[]): SampleSummary {
  if (values.length === 0) {
    throw new Error("Cannot summarize an empty sample");
  }

  const sampleMean = mean(values);
  const stdDev = sampleStdDev(values, sampleMean);
  const sorted = [...values].sort((a, b) => a - b);

  return {
    count: values.length,
    mean: sampleMean,
    stdDev,
    standardError: stdDev / Math.sqrt(values.length),
    min: sorted[0]!,
    max: sorted[sorted.length - 1]!,
    p05: percentile(sorted, 0.05),
    p50: percentile(sorted, 0.5),
    p95: percentile(sorted, 0.95),
  };
}
