import { describe, expect, it } from "vitest";
import {
  SeededRandom,
  sampleEstimate,
  summarizeSamples,
} from "../../../src/services/causalModel/index.js";

describe("SeededRandom", () => {
  it("repeats its sequence for the same seed", () => {
    const first = new SeededRandom(42);
    const second = new SeededRandom(42);
    const draws = Array.from({ length: 5 }, () => first.next());

    expect(Array.from({ length: 5 }, () => second.next())).toEqual(draws);
    expect(draws.every((value) => value >= 0 && value < 1)).toBe(true);
  });
});

describe("sampleEstimate", () => {
  it("draws UNIFORM samples inside [a, b]", () => {
    const samples = sampleEstimate({ type: "UNIFORM", a: 0.2, b: 0.4 }, 1000, new SeededRandom(7));

    expect(samples).toHaveLength(1000);
    expect(Math.min(...samples)).toBeGreaterThanOrEqual(0.2);
    expect(Math.max(...samples)).toBeLessThanOrEqual(0.4);
  });

  it("returns the midpoint for a NORMAL estimate with a zero-width interval", () => {
    const samples = sampleEstimate({ type: "NORMAL", a: 0.3, b: 0.3 }, 4, new SeededRandom(7));

    expect(Array.from(samples)).toEqual([0.3, 0.3, 0.3, 0.3]);
  });

  it("treats a NORMAL interval as 95% bounds and clamps to [0, 1]", () => {
    const narrow = summarizeSamples(sampleEstimate({ type: "NORMAL", a: 0.4, b: 0.6 }, 20000, new SeededRandom(11)));
    expect(narrow.mean).toBeCloseTo(0.5, 2);
    expect(narrow.p05).toBeCloseTo(0.416, 1);
    expect(narrow.p95).toBeCloseTo(0.584, 1);

    const wide = sampleEstimate({ type: "NORMAL", a: 0, b: 1 }, 5000, new SeededRandom(3));
    expect(Math.min(...wide)).toBeGreaterThanOrEqual(0);
    expect(Math.max(...wide)).toBeLessThanOrEqual(1);
  });
});

describe("summarizeSamples", () => {
  it("reports the mean and interpolated 5th and 95th percentiles", () => {
    const summary = summarizeSamples(Float64Array.from([5, 1, 4, 2, 3]));

    expect(summary.mean).toBe(3);
    expect(summary.p05).toBeCloseTo(1.2, 10);
    expect(summary.p95).toBeCloseTo(4.8, 10);
  });
});
