import { describe, expect, it } from "vitest";

import { makeConfig } from "../../__tests__/helpers.js";
import { FeedbackAccumulator } from "../feedback.js";
import { deriveInfluenceProfile } from "../profile.js";

describe("FeedbackAccumulator", () => {
  it("blends from the prior with weight beta", () => {
    const accumulator = new FeedbackAccumulator(0);
    expect(accumulator.receiveFeedback("critic", 0.8, 0.5)).toBeCloseTo(0.4, 10);
    expect(accumulator.receiveFeedback("critic", 0.8, 0.5)).toBeCloseTo(0.6, 10);
  });

  it("is memoryless at beta = 1 and frozen at beta = 0", () => {
    const memoryless = new FeedbackAccumulator(0);
    memoryless.receiveFeedback("planner", 0.2, 1);
    expect(memoryless.receiveFeedback("planner", 0.9, 1)).toBe(0.9);

    const frozen = new FeedbackAccumulator(0.3);
    frozen.receiveFeedback("planner", 0.9, 0);
    expect(frozen.receiveFeedback("planner", 1, 0)).toBe(0.3);
  });

  it("seeds from the first score when the prior is null", () => {
    const accumulator = new FeedbackAccumulator(null);
    expect(accumulator.receiveFeedback("researcher", 0.6, 0.2)).toBeCloseTo(0.6, 10);
  });

  it("clamps scores and rejects beta outside [0, 1]", () => {
    const accumulator = new FeedbackAccumulator(0);
    expect(accumulator.receiveFeedback("critic", 4, 1)).toBe(1);
    expect(accumulator.receiveFeedback("critic", -3, 1)).toBe(0);
    expect(() => accumulator.receiveFeedback("critic", 0.5, 1.5)).toThrow(RangeError);
    expect(() => accumulator.receiveFeedback("critic", 0.5, -0.1)).toThrow(RangeError);
  });

  it("averages peer scores into mu", () => {
    const accumulator = new FeedbackAccumulator(0);
    expect(accumulator.mu()).toBe(0);
    accumulator.receiveFeedback("planner", 0.8, 1);
    accumulator.receiveFeedback("critic", 0.4, 1);
    expect(accumulator.mu()).toBeCloseTo(0.6, 10);
    expect(accumulator.snapshot()).toEqual({ planner: 0.8, critic: 0.4 });
  });
});

describe("deriveInfluenceProfile", () => {
  const point = { alpha: 0.8, beta: 0.5, k: 6, tau: 0.5, seed: 1, adversarial: false };

  it("pins every role to the baseline mu", () => {
    const profile = deriveInfluenceProfile(point, "baseline", makeConfig());
    expect(profile.mu).toEqual({ planner: 0, researcher: 0, critic: 0 });
    expect(profile.peerScores.planner).toEqual({});
  });

  it("replays the cooperative seed table with the point's beta", () => {
    const profile = deriveInfluenceProfile(point, "influence", makeConfig());
    // planner: critic 0.9 and researcher 0.8, each halved from a zero prior
    expect(profile.mu.planner).toBeCloseTo(0.425, 10);
    expect(profile.mu.researcher).toBeCloseTo(0.3875, 10);
    expect(profile.mu.critic).toBeCloseTo(0.3875, 10);
    expect(profile.peerScores.planner).toEqual({ critic: 0.45, researcher: 0.4 });
  });

  it("uses the adversarial table for adversarial points", () => {
    const profile = deriveInfluenceProfile({ ...point, adversarial: true }, "influence", makeConfig());
    expect(profile.mu.planner).toBeCloseTo(0.225, 10);
    expect(profile.mu.critic).toBeCloseTo(0.2, 10);
  });
});
