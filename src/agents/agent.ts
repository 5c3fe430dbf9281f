import type { ResolvedConfig } from "../config/types.js";
import type {
  AgentState,
  Condition,
  GridPoint,
  PeerScores,
  Role,
  Turn,
  TurnResult
} from "../core/types.js";
import { FeedbackAccumulator } from "../influence/feedback.js";
import { lambdaFromMu, temperatureFromMu } from "../influence/functions.js";
import type { InferenceService } from "../inference/service.js";
import { canonicalTags, criticDecision, extractFeatureTags, jaccard } from "../metrics/metrics.js";
import { buildTurnMessages } from "../protocol/prompts.js";
import { requestValidatedPayload } from "../protocol/validator.js";
import { mixFeatureWeights } from "./mixing.js";

export type AgentOptions = {
  role: Role;
  point: GridPoint;
  condition: Condition;
  mu: number;
  peerScores?: PeerScores;
  config: ResolvedConfig;
  service: InferenceService;
};

const latestTurns = (history: ReadonlyArray<Turn>): Map<Role, Turn> => {
  const latest = new Map<Role, Turn>();
  for (const turn of history) {
    const current = latest.get(turn.role);
    if (!current || current.roundIndex <= turn.roundIndex) {
      latest.set(turn.role, turn);
    }
  }
  return latest;
};

/**
 * How much `observer` trusts what `peer` just said, in [0, 1]; `null` when the
 * turn carries nothing to score.
 */
export const scorePeerTurn = (input: {
  observer: Role;
  peerTurn: Turn;
  ownTurn?: Turn;
  adversarial: boolean;
  config: ResolvedConfig;
}): number | null => {
  const { observer, peerTurn, ownTurn, adversarial, config } = input;
  const { feedback } = config;
  const whitelist = config.protocol.feature_whitelist;

  if (peerTurn.role === "critic") {
    const decision = criticDecision(peerTurn.payload);
    if (!decision) {
      return null;
    }
    if (adversarial) {
      return feedback.adversarial_critic_score;
    }
    return decision === "APPROVE" ? feedback.approve_score : feedback.revise_score;
  }

  if (observer === "critic") {
    if (adversarial) {
      return feedback.adversarial_producer_score;
    }
    const tags = extractFeatureTags(peerTurn.payload);
    if (tags.size === 0) {
      return 0;
    }
    return canonicalTags(peerTurn.payload, whitelist).size / tags.size;
  }

  return jaccard(canonicalTags(ownTurn?.payload, whitelist), canonicalTags(peerTurn.payload, whitelist)) ?? 0;
};

/** One role in one conversation. μ, temperature and λ are fixed for its lifetime. */
export class Agent {
  readonly role: Role;
  readonly mu: number;
  readonly temperature: number;
  readonly lambdaGate: number;

  private readonly point: GridPoint;
  private readonly condition: Condition;
  private readonly config: ResolvedConfig;
  private readonly service: InferenceService;
  private readonly accumulator: FeedbackAccumulator;
  private readonly observed = new Set<string>();

  constructor(options: AgentOptions) {
    this.role = options.role;
    this.point = options.point;
    this.condition = options.condition;
    this.config = options.config;
    this.service = options.service;
    this.mu = options.mu;
    this.temperature = temperatureFromMu(options.mu, options.config.influence.t0, options.point.alpha);
    this.lambdaGate = lambdaFromMu(options.mu, options.point.k, options.point.tau);
    this.accumulator = new FeedbackAccumulator(options.config.feedback.prior, options.peerScores);
  }

  state(): AgentState {
    return {
      role: this.role,
      mu: this.mu,
      temperature: this.temperature,
      lambdaGate: this.lambdaGate,
      peerScores: this.accumulator.snapshot()
    };
  }

  async produceTurn(history: ReadonlyArray<Turn>, roundIndex: number): Promise<TurnResult> {
    const whitelist = this.config.protocol.feature_whitelist;
    const latest = latestTurns(history);
    const peers = [...latest.values()].filter((turn) => turn.role !== this.role);

    const ranking =
      this.condition === "influence"
        ? mixFeatureWeights({
            candidates: whitelist,
            own: canonicalTags(latest.get(this.role)?.payload, whitelist),
            peers: peers.map((turn) => ({
              role: turn.role,
              tags: canonicalTags(turn.payload, whitelist),
              score: this.accumulator.score(turn.role) ?? 0
            })),
            lambdaGate: this.lambdaGate
          })
        : [];

    const messages = buildTurnMessages({
      role: this.role,
      roundIndex,
      seed: this.point.seed,
      whitelist,
      history,
      mu: this.mu,
      lambdaGate: this.lambdaGate,
      ranking
    });

    const result = await requestValidatedPayload({
      service: this.service,
      protocol: this.config.protocol,
      role: this.role,
      condition: this.condition,
      round: roundIndex,
      messages,
      temperature: this.temperature,
      seed: this.point.seed
    });

    if (result.status === "failed") {
      return {
        status: "failed",
        failure: {
          role: this.role,
          roundIndex,
          reason: result.reason,
          message: result.message,
          attempts: result.attempts
        }
      };
    }

    const turn: Turn = {
      role: this.role,
      roundIndex,
      payload: result.payload,
      rawText: result.rawText,
      repaired: result.repaired
    };
    this.observePeers(peers, turn);
    return { status: "success", turn };
  }

  private observePeers(peers: ReadonlyArray<Turn>, ownTurn: Turn): void {
    for (const peerTurn of peers) {
      const key = `${peerTurn.role}:${peerTurn.roundIndex}`;
      if (this.observed.has(key)) {
        continue;
      }
      this.observed.add(key);
      const score = scorePeerTurn({
        observer: this.role,
        peerTurn,
        ownTurn,
        adversarial: this.point.adversarial,
        config: this.config
      });
      if (score !== null) {
        this.accumulator.receiveFeedback(peerTurn.role, score, this.point.beta);
      }
    }
  }
}
