/**
 * @fileoverview Monte Carlo sampling of analyst estimates.
 * @module src/services/causalModel/quantification/estimate
 */

import type { EstimateSpec } from "../core/modelTypes.js";
import { type RandomSource, standardNormal } from "./random.js";

/** Two-sided 95% quantile of the standard normal distribution. */
export const Z_95 = 1.959963984540054;

const clampUnit = (value: number): number => Math.min(1, Math.max(0, value));

/**
 * Draws `size` samples of `estimate`.
 *
 * UNIFORM samples lie in [a, b]. NORMAL treats [a, b] as a 95% interval
 * around its midpoint; samples are clamped to [0, 1].
 */
export function sampleEstimate(
  estimate: EstimateSpec,
  size: number,
  random: RandomSource,
): Float64Array {
  const samples = new Float64Array(size);
  const { a, b } = estimate;

  if (estimate.type === "UNIFORM") {
    const width = b - a;
    for (let i = 0; i < size; i += 1) {
      samples[i] = a + width * random.next();
    }
    return samples;
  }

  const mean = (a + b) / 2;
  const sd = (b - mean) / Z_95;
  for (let i = 0; i < size; i += 1) {
    samples[i] = sd === 0 ? mean : clampUnit(mean + sd * standardNormal(random));
  }
  return samples;
}

export interface SampleSummary {
  mean: number;
  p05: number;
  p95: number;
}

/** Linear-interpolated percentile of an ascending array, `q` in [0, 1]. */
function percentile(sorted: Float64Array, q: number): number {
  if (sorted.length === 0) return Number.NaN;
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const lowerValue = sorted[lower] ?? Number.NaN;
  const upperValue = sorted[upper] ?? Number.NaN;
  return lowerValue + (upperValue - lowerValue) * (position - lower);
}

export function summarizeSamples(samples: Float64Array): SampleSummary {
  let total = 0;
  for (const value of samples) {
    total += value;
  }
  const sorted = Float64Array.from(samples).sort();
  return {
    mean: samples.length ? total / samples.length : Number.NaN,
    p05: percentile(sorted, 0.05),
    p95: percentile(sorted, 0.95),
  };
}
