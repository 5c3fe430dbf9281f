import type { ResolvedConfig } from "../config/types.js";
import { ROLES, type Condition, type GridPoint, type PeerScores, type Role } from "../core/types.js";
import { FeedbackAccumulator } from "./feedback.js";

export type InfluenceProfile = {
  condition: Condition;
  mu: Record<Role, number>;
  peerScores: Record<Role, PeerScores>;
};

const emptyScores = (): Record<Role, PeerScores> => ({
  planner: {},
  researcher: {},
  critic: {}
});

/**
 * Per-role μ and starting peer scores for one condition of a grid point.
 *
 * The influence condition replays the configured peer feedback (cooperative or
 * adversarial) through an EMA with the point's beta; baseline pins every role
 * to the neutral μ.
 */
export const deriveInfluenceProfile = (
  point: GridPoint,
  condition: Condition,
  config: ResolvedConfig
): InfluenceProfile => {
  if (condition === "baseline") {
    const mu = config.influence.baseline_mu;
    return {
      condition,
      mu: { planner: mu, researcher: mu, critic: mu },
      peerScores: emptyScores()
    };
  }

  const accumulators = new Map<Role, FeedbackAccumulator>(
    ROLES.map((role) => [role, new FeedbackAccumulator(config.feedback.prior)])
  );
  const table = point.adversarial
    ? config.feedback.seed_scores.adversarial
    : config.feedback.seed_scores.cooperative;

  for (const entry of table) {
    accumulators.get(entry.to)?.receiveFeedback(entry.from, entry.score, point.beta);
  }

  const mu: Record<Role, number> = { planner: 0, researcher: 0, critic: 0 };
  const peerScores = emptyScores();
  accumulators.forEach((accumulator, role) => {
    mu[role] = accumulator.mu();
    peerScores[role] = accumulator.snapshot();
  });

  return { condition, mu, peerScores };
};
