import { describe, expect, it } from "vitest";

import { lambdaFromMu, temperatureFromMu, TEMPERATURE_MAX, TEMPERATURE_MIN } from "../functions.js";

describe("temperatureFromMu", () => {
  it("starts at t0 for zero influence and falls linearly", () => {
    expect(temperatureFromMu(0, 0.7, 0.8)).toBeCloseTo(0.7, 10);
    expect(temperatureFromMu(0.5, 0.7, 0.8)).toBeCloseTo(0.3, 10);
  });

  it("clamps to the allowed range", () => {
    expect(temperatureFromMu(10, 0.7, 1.2)).toBe(TEMPERATURE_MIN);
    expect(temperatureFromMu(-10, 0.7, 1.2)).toBe(TEMPERATURE_MAX);
    expect(temperatureFromMu(Number.POSITIVE_INFINITY, 0.7, 0.4)).toBe(TEMPERATURE_MIN);
    expect(temperatureFromMu(Number.NEGATIVE_INFINITY, 0.7, 0.4)).toBe(TEMPERATURE_MAX);
    expect(temperatureFromMu(Number.NaN, 0.7, 0.4)).toBe(TEMPERATURE_MIN);
  });

  it("never increases with mu", () => {
    let previous = Number.POSITIVE_INFINITY;
    for (let mu = -2; mu <= 2; mu += 0.05) {
      const value = temperatureFromMu(mu, 0.7, 0.8);
      expect(value).toBeLessThanOrEqual(previous);
      expect(value).toBeGreaterThanOrEqual(TEMPERATURE_MIN);
      expect(value).toBeLessThanOrEqual(TEMPERATURE_MAX);
      previous = value;
    }
  });
});

describe("lambdaFromMu", () => {
  it("is exactly one half at the midpoint", () => {
    expect(lambdaFromMu(0.5, 6, 0.5)).toBe(0.5);
    expect(lambdaFromMu(0.3, 3, 0.3)).toBe(0.5);
  });

  it("increases with mu for positive k", () => {
    const values = [0, 0.25, 0.5, 0.75, 1].map((mu) => lambdaFromMu(mu, 6, 0.5));
    for (let i = 1; i < values.length; i += 1) {
      expect(values[i]).toBeGreaterThan(values[i - 1]);
    }
  });

  it("stays strictly inside (0, 1)", () => {
    expect(lambdaFromMu(1000, 50, 0)).toBeLessThan(1);
    expect(lambdaFromMu(-1000, 50, 0)).toBeGreaterThan(0);
    expect(lambdaFromMu(Number.NaN, 6, 0.5)).toBe(0.5);
  });
});
