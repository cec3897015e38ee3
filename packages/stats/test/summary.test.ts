/**
 * Tests for sample statistics
 */

import test from "node:test";
import assert from "node:assert/strict";
import { mean, percentile, sampleStdDev, summarize } from "../src/index.js";

test("mean averages the sample", () => {
  assert.equal(mean([1, 2, 3, 4]), 2.5);
  assert.equal(mean([]), 0);
});

test("sampleStdDev uses the N-1 denominator", () => {
  const values = [2, 4, 4, 4, 5, 5, 7, 9];
  // squared deviations from 5 sum to 32
  assert.ok(Math.abs(sampleStdDev(values) - Math.sqrt(32 / 7)) < 1e-12);
});

test("sampleStdDev is zero for a single observation", () => {
  assert.equal(sampleStdDev([1000]), 0);
  assert.equal(sampleStdDev([]), 0);
});

test("sampleStdDev is zero for a constant sample", () => {
  assert.equal(sampleStdDev([3, 3, 3]), 0);
});

test("percentile interpolates between ranks", () => {
  const sorted = [10, 20, 30, 40, 50];
  assert.equal(percentile(sorted, 0), 10);
  assert.equal(percentile(sorted, 0.5), 30);
  assert.equal(percentile(sorted, 1), 50);
  assert.ok(Math.abs(percentile(sorted, 0.05) - 12) < 1e-12);
  assert.equal(percentile([], 0.5), 0);
});

test("summarize reports moments, extremes and percentiles", () => {
  const summary = summarize([5, 1, 4, 2, 3]);

  assert.equal(summary.count, 5);
  assert.equal(summary.mean, 3);
  assert.ok(Math.abs(summary.stdDev - Math.sqrt(2.5)) < 1e-12);
  assert.ok(Math.abs(summary.standardError - Math.sqrt(2.5) / Math.sqrt(5)) < 1e-12);
  assert.equal(summary.min, 1);
  assert.equal(summary.max, 5);
  assert.equal(summary.p50, 3);
  assert.ok(summary.p05 >= 1 && summary.p05 <= summary.p50);
  assert.ok(summary.p95 <= 5 && summary.p95 >= summary.p50);
});

test("summarize does not reorder its input", () => {
  const values = [3, 1, 2];
  summarize(values);
  assert.deepEqual(values, [3, 1, 2]);
});

test("summarize throws on an empty sample", () => {
  assert.throws(() => summarize([]), /Cannot summarize an empty sample/);
});
