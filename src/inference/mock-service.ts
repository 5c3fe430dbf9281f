import { FEATURE_WHITELIST } from "../config/defaults.js";
import { fingerprint } from "../utils/fingerprint.js";
import { createSeededRng, pickOne, seededShuffle, type Rng } from "../utils/seeded-rng.js";
import type { InferenceRequest, InferenceService } from "./service.js";

const FEATURES_PER_PAYLOAD = 3;

const pickFeatures = (consensus: string[], pool: ReadonlyArray<string>, pull: number, rng: Rng): string[] => {
  const chosen = new Set<string>();
  for (const feature of consensus) {
    if (chosen.size >= FEATURES_PER_PAYLOAD) {
      break;
    }
    chosen.add(rng() < pull ? feature : pickOne(pool, rng));
  }
  for (const feature of seededShuffle(pool, rng)) {
    if (chosen.size >= FEATURES_PER_PAYLOAD) {
      break;
    }
    chosen.add(feature);
  }
  return [...chosen];
};

const buildPayload = (
  role: InferenceRequest["role"],
  consensus: string[],
  pool: ReadonlyArray<string>,
  pull: number,
  rng: Rng
): Record<string, unknown> => {
  switch (role) {
    case "planner": {
      const features = pickFeatures(consensus, pool, pull, rng);
      return {
        features,
        steps: features.map((feature, index) => `Step ${index + 1}: threshold ${feature} per flow window`)
      };
    }
    case "researcher":
      return { features: pickFeatures(consensus, pool, pull, rng) };
    case "critic":
      return { decision: rng() < 0.25 + 0.5 * pull ? "APPROVE" : "REVISE" };
  }
};

/**
 * Offline stand-in for the inference service. Output depends only on the
 * request content, so a grid produces the same rows in any execution order.
 * Lower temperatures pull agents towards a per-seed consensus feature set.
 */
export const createMockInferenceService = (
  options: { whitelist?: ReadonlyArray<string> } = {}
): InferenceService => {
  const pool = options.whitelist ?? FEATURE_WHITELIST;

  return {
    name: "mock",
    complete: async (request: InferenceRequest) => {
      const rng = createSeededRng("mock", fingerprint(request.messages), request.attempt);
      const consensus = seededShuffle(pool, createSeededRng("consensus", request.seed)).slice(
        0,
        FEATURES_PER_PAYLOAD
      );
      const pull = Math.min(1, Math.max(0, 1.1 - request.temperature / 1.5));

      const payload = buildPayload(request.role, consensus, pool, pull, rng);

      return {
        text: JSON.stringify(payload),
        model: "mock",
        latencyMs: 0,
        retryCount: 0
      };
    }
  };
};
